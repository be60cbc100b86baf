import type { PackingInstance, Rectangle, Variant } from '@packbench/shared';
import { area } from './instance';

/** Rectangle counts picked from when none is requested */
export const DEFAULT_RECTANGLE_COUNTS = [3, 5, 10, 25, 5000] as const;

/** Average rectangle area of a generated container */
export const AVG_RECTANGLE_AREA = 50;

export interface GenerateOptions {
  rectangles?: number;
  container?: Rectangle;
  variant?: Variant['kind'];
  allowRotation?: boolean;
}

/** Uniform in [0, 1) */
export type RandomSource = () => number;

/** Deterministic source (mulberry32) for reproducible corpora */
export function seededRandom(seed: number): RandomSource {
  let a = seed | 0;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function randInt(random: RandomSource, lo: number, hi: number): number {
  return lo + Math.floor(random() * (hi - lo));
}

function gaussian(random: RandomSource, mean: number, stdDev: number): number {
  // Box-Muller
  const u = 1 - random();
  const v = random();
  return mean + stdDev * Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/**
 * A rectangle of exactly `targetArea`, favouring divisor pairs from the middle
 * of the divisor list so containers are neither square nor sliver-thin.
 */
export function containerWithArea(targetArea: number, random: RandomSource = Math.random): Rectangle {
  const divisors: number[] = [];
  for (let i = 1; i * i <= targetArea; i++) {
    if (targetArea % i === 0) divisors.push(i);
  }
  const n = divisors.length;
  const idx = Math.trunc(Math.min(n - 1, Math.max(0, gaussian(random, n / 2, n / 7))));
  const side = divisors[idx];
  return random() < 0.5
    ? { width: side, height: targetArea / side }
    : { width: targetArea / side, height: side };
}

/** One random guillotine cut; `r` must be larger than 1x1. */
export function splitRectangle(r: Rectangle, random: RandomSource): [Rectangle, Rectangle] {
  const vertical =
    r.height === 1 || (r.width > 1 && randInt(random, 0, r.width + r.height) < r.width);
  if (vertical) {
    const x = randInt(random, 1, r.width);
    return [
      { width: x, height: r.height },
      { width: r.width - x, height: r.height },
    ];
  }
  const y = randInt(random, 1, r.height);
  return [
    { width: r.width, height: y },
    { width: r.width, height: r.height - y },
  ];
}

/**
 * Generates an instance with a known optimum by cutting a container into
 * pieces; the container is recorded as the bounding box.
 */
export function generateInstance(
  options: GenerateOptions = {},
  random: RandomSource = Math.random,
): PackingInstance {
  let n =
    options.rectangles ??
    DEFAULT_RECTANGLE_COUNTS[randInt(random, 0, DEFAULT_RECTANGLE_COUNTS.length)];
  const container = options.container ?? containerWithArea(n * AVG_RECTANGLE_AREA, random);
  n = Math.min(n, area(container));

  const kind = options.variant ?? (random() < 0.5 ? 'free' : 'fixed');
  const variant: Variant =
    kind === 'fixed' ? { kind: 'fixed', height: container.height } : { kind: 'free' };
  const allowRotation = options.allowRotation ?? random() < 0.5;

  const pieces: Rectangle[] = [container];
  while (pieces.length < n) {
    const i = randInt(random, 0, pieces.length);
    const [picked] = pieces.splice(i, 1);
    if (picked.width > 1 || picked.height > 1) {
      pieces.push(...splitRectangle(picked, random));
    } else {
      pieces.push(picked);
    }
  }

  return { variant, allowRotation, rectangles: pieces, boundingBox: { ...container } };
}

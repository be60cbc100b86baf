import { LoadError, type PackingInstance, type Rectangle, type Variant } from '@packbench/shared';

export interface SerializeOptions {
  /** Keep the `bounding box:` line; solvers are never shown it */
  includeBoundingBox?: boolean;
}

const POSITIVE_INT = /^[1-9]\d*$/;

function positiveInt(token: string | undefined, what: string, path?: string, line?: number): number {
  if (token === undefined || !POSITIVE_INT.test(token)) {
    throw new LoadError(`Invalid ${what}: expected a positive integer, got "${token ?? ''}"`, {
      path,
      line,
    });
  }
  return Number(token);
}

function parseVariant(tokens: string[], path?: string): Variant {
  if (tokens[0] !== 'container' || tokens[1] !== 'height:') {
    throw new LoadError(`Invalid format: ${tokens.join(' ')}`, { path, line: 1 });
  }
  if (tokens[2] === 'free' && tokens.length === 3) {
    return { kind: 'free' };
  }
  if (tokens[2] === 'fixed' && tokens.length === 4) {
    return { kind: 'fixed', height: positiveInt(tokens[3], 'container height', path, 1) };
  }
  throw new LoadError(`Invalid container height: ${tokens.slice(2).join(' ')}`, { path, line: 1 });
}

function parseRectangle(tokens: string[], what: string, path?: string, line?: number): Rectangle {
  if (tokens.length !== 2) {
    throw new LoadError(`Invalid ${what}: expected "<width> <height>", got "${tokens.join(' ')}"`, {
      path,
      line,
    });
  }
  return {
    width: positiveInt(tokens[0], `${what} width`, path, line),
    height: positiveInt(tokens[1], `${what} height`, path, line),
  };
}

/**
 * Parses a packing instance:
 *
 * ```
 * container height: free | fixed <h>
 * rotations allowed: yes | no
 * number of rectangles: <n>
 * [bounding box: <w> <h>]
 * <w> <h>
 * ...
 * ```
 *
 * Blank lines are ignored. Errors are `LoadError`s naming the 1-based line.
 */
export function parseInstance(text: string, path?: string): PackingInstance {
  const lines = text
    .split(/\r?\n/)
    .map((content, i) => ({ tokens: content.trim().split(/\s+/), line: i + 1 }))
    .filter(({ tokens }) => tokens[0] !== '');

  const [first, second, third, ...rest] = lines;
  if (!first || !second || !third) {
    throw new LoadError('Unexpected end of file: incomplete instance header', { path });
  }

  const variant = parseVariant(first.tokens, path);

  const rotation = second.tokens.join(' ');
  let allowRotation: boolean;
  if (rotation === 'rotations allowed: yes') {
    allowRotation = true;
  } else if (rotation === 'rotations allowed: no') {
    allowRotation = false;
  } else {
    throw new LoadError(`Invalid format: ${rotation}`, { path, line: second.line });
  }

  const [n1, n2, n3, count] = third.tokens;
  if (n1 !== 'number' || n2 !== 'of' || n3 !== 'rectangles:' || third.tokens.length !== 4) {
    throw new LoadError(`Invalid format: ${third.tokens.join(' ')}`, { path, line: third.line });
  }
  const n = positiveInt(count, 'number of rectangles', path, third.line);

  let boundingBox: Rectangle | undefined;
  let body = rest;
  const maybeBox = rest[0];
  if (maybeBox && maybeBox.tokens[0] === 'bounding' && maybeBox.tokens[1] === 'box:') {
    boundingBox = parseRectangle(maybeBox.tokens.slice(2), 'bounding box', path, maybeBox.line);
    body = rest.slice(1);
  }

  const rectangles = body.map(({ tokens, line }) => parseRectangle(tokens, 'rectangle', path, line));
  if (rectangles.length !== n) {
    throw new LoadError(
      `Rectangle count mismatch: header declares ${n}, found ${rectangles.length}`,
      { path, line: third.line },
    );
  }

  return boundingBox
    ? { variant, allowRotation, rectangles, boundingBox }
    : { variant, allowRotation, rectangles };
}

export function formatVariant(variant: Variant): string {
  return variant.kind === 'free' ? 'free' : `fixed ${variant.height}`;
}

/** Renders the canonical text form, newline-terminated. */
export function serializeInstance(instance: PackingInstance, options: SerializeOptions = {}): string {
  const lines = [
    `container height: ${formatVariant(instance.variant)}`,
    `rotations allowed: ${instance.allowRotation ? 'yes' : 'no'}`,
    `number of rectangles: ${instance.rectangles.length}`,
  ];
  if (options.includeBoundingBox && instance.boundingBox) {
    lines.push(`bounding box: ${instance.boundingBox.width} ${instance.boundingBox.height}`);
  }
  for (const r of instance.rectangles) {
    lines.push(`${r.width} ${r.height}`);
  }
  return lines.join('\n') + '\n';
}

export function area(r: Rectangle): number {
  return r.width * r.height;
}

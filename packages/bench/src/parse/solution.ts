import {
  ParseError,
  type PackingInstance,
  type Rectangle,
  type SolutionEvaluation,
} from '@packbench/shared';

export const PLACEMENT_MARKER = 'placement of rectangles';

export interface Placement {
  rectangle: Rectangle;
  rotated: boolean;
  x: number;
  y: number;
}

export interface EvaluatedSolution {
  feasible: boolean;
  /** Bounding box area; `null` when the placement is infeasible */
  objective: number | null;
  evaluation?: SolutionEvaluation;
  /** Why the solution is infeasible */
  reason?: string;
}

const COORDINATE = /^\d+$/;

function coordinate(token: string, line: string): number {
  if (!COORDINATE.test(token)) {
    throw new ParseError(`Invalid placement coordinate "${token}" in "${line}"`);
  }
  return Number(token);
}

/**
 * Parses the placement section of a solution-format output: one `x y` line per
 * rectangle, or `yes|no x y` when rotations are allowed.
 */
export function parsePlacements(section: string, instance: PackingInstance): Placement[] {
  const lines = section
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l !== '');

  if (lines.length !== instance.rectangles.length) {
    throw new ParseError(
      `Solution contains ${lines.length} placements for ${instance.rectangles.length} rectangles`,
    );
  }

  return lines.map((line, i) => {
    const tokens = line.split(/\s+/);
    let rotated = false;
    let coords = tokens;
    if (instance.allowRotation) {
      if (tokens.length !== 3 || (tokens[0] !== 'yes' && tokens[0] !== 'no')) {
        throw new ParseError(`Invalid placement: "${line}"`);
      }
      rotated = tokens[0] === 'yes';
      coords = tokens.slice(1);
    } else if (tokens.length !== 2) {
      throw new ParseError(`Invalid placement: "${line}"`);
    }
    return {
      rectangle: instance.rectangles[i],
      rotated,
      x: coordinate(coords[0], line),
      y: coordinate(coords[1], line),
    };
  });
}

function extent(p: Placement): { x2: number; y2: number } {
  const w = p.rotated ? p.rectangle.height : p.rectangle.width;
  const h = p.rotated ? p.rectangle.width : p.rectangle.height;
  // Exclusive upper corner
  return { x2: p.x + w, y2: p.y + h };
}

function overlaps(a: Placement, b: Placement): boolean {
  const ea = extent(a);
  const eb = extent(b);
  return a.x < eb.x2 && b.x < ea.x2 && a.y < eb.y2 && b.y < ea.y2;
}

/**
 * Checks a placement for overlaps and height bounds and measures it. Quadratic in
 * the number of rectangles.
 */
export function evaluatePlacements(placements: Placement[], instance: PackingInstance): EvaluatedSolution {
  for (let i = 0; i < placements.length; i++) {
    for (let j = i + 1; j < placements.length; j++) {
      if (overlaps(placements[i], placements[j])) {
        return { feasible: false, objective: null, reason: `Rectangles ${i + 1} and ${j + 1} overlap` };
      }
    }
  }

  let width = 0;
  let height = 0;
  for (const p of placements) {
    const { x2, y2 } = extent(p);
    width = Math.max(width, x2);
    height = Math.max(height, y2);
  }

  const { variant } = instance;
  if (variant.kind === 'fixed') {
    if (height > variant.height) {
      return {
        feasible: false,
        objective: null,
        reason: `Placements exceed the container height: top ${height}, bound ${variant.height}`,
      };
    }
    height = variant.height;
  }

  const container = { width, height };
  const containerArea = width * height;
  const minArea = instance.rectangles.reduce((sum, r) => sum + r.width * r.height, 0);
  return {
    feasible: true,
    objective: containerArea,
    evaluation: {
      container,
      minArea,
      emptyArea: containerArea - minArea,
      fillingRate: containerArea === 0 ? 0 : minArea / containerArea,
    },
  };
}

/** Parses and evaluates everything after the placement marker in `output`. */
export function evaluateSolution(output: string, instance: PackingInstance): EvaluatedSolution {
  const at = output.indexOf(PLACEMENT_MARKER);
  if (at < 0) {
    throw new ParseError(`Output has no "${PLACEMENT_MARKER}" section`);
  }
  const placements = parsePlacements(output.slice(at + PLACEMENT_MARKER.length), instance);
  return evaluatePlacements(placements, instance);
}

import { ParseError, type PackingInstance } from '@packbench/shared';
import { evaluatePlacements, evaluateSolution, parsePlacements } from './solution';

const fixed: PackingInstance = {
  variant: { kind: 'fixed', height: 4 },
  allowRotation: true,
  rectangles: [
    { width: 3, height: 1 },
    { width: 2, height: 2 },
  ],
};

describe('parsePlacements', () => {
  it('requires rotation tokens when rotations are allowed', () => {
    expect(parsePlacements('yes 0 0\nno 1 0', fixed)).toEqual([
      { rectangle: { width: 3, height: 1 }, rotated: true, x: 0, y: 0 },
      { rectangle: { width: 2, height: 2 }, rotated: false, x: 1, y: 0 },
    ]);
    expect(() => parsePlacements('0 0\n1 0', fixed)).toThrow('Invalid placement: "0 0"');
  });

  it('rejects a placement count that differs from the rectangle count', () => {
    expect(() => parsePlacements('yes 0 0', fixed)).toThrow(
      'Solution contains 1 placements for 2 rectangles',
    );
  });

  it('rejects negative or non-integer coordinates', () => {
    expect(() => parsePlacements('no -1 0\nno 0 0', fixed)).toThrow(ParseError);
  });
});

describe('evaluatePlacements', () => {
  it('charges the full fixed height', () => {
    const result = evaluatePlacements(parsePlacements('yes 0 0\nno 1 0', fixed), fixed);
    expect(result).toEqual({
      feasible: true,
      objective: 12,
      evaluation: {
        container: { width: 3, height: 4 },
        minArea: 7,
        emptyArea: 5,
        fillingRate: 7 / 12,
      },
    });
  });

  it('rejects placements above a fixed height', () => {
    const result = evaluatePlacements(parsePlacements('yes 0 2\nno 1 0', fixed), fixed);
    expect(result).toEqual({
      feasible: false,
      objective: null,
      reason: 'Placements exceed the container height: top 5, bound 4',
    });
  });

  it('treats edge contact as non-overlapping', () => {
    const result = evaluatePlacements(parsePlacements('no 0 0\nno 3 0', fixed), fixed);
    expect(result.feasible).toBe(true);
    expect(result.objective).toBe(20);
  });
});

describe('evaluateSolution', () => {
  it('requires the placement marker', () => {
    expect(() => evaluateSolution('0 0\n1 0', fixed)).toThrow(
      'Output has no "placement of rectangles" section',
    );
  });
});

import { ParseError, type PackingInstance } from '@packbench/shared';
import { parseSolverOutput } from './parser';

const instance: PackingInstance = {
  variant: { kind: 'free' },
  allowRotation: false,
  rectangles: [
    { width: 2, height: 2 },
    { width: 1, height: 2 },
  ],
};

describe('parseSolverOutput', () => {
  it('reads a bare result line', () => {
    expect(parseSolverOutput('objective: 42\n')).toEqual({ objective: 42, feasible: null });
  });

  it('ignores log noise and trailing whitespace around the result line', () => {
    const out = ['loading instance', 'iteration 1 best=50', '  OBJECTIVE = 42   ', 'done'].join('\n');
    expect(parseSolverOutput(out)).toEqual({ objective: 42, feasible: null });
  });

  it('takes the last result line', () => {
    const out = 'objective: 50 feasible\nobjective: 45 feasible\n';
    expect(parseSolverOutput(out)).toEqual({ objective: 45, feasible: true });
  });

  it('reads fractional and exponent values with a dot separator only', () => {
    expect(parseSolverOutput('objective: 12.75').objective).toBe(12.75);
    expect(parseSolverOutput('objective=1e2').objective).toBe(100);
    expect(() => parseSolverOutput('objective: 12,75')).toThrow(ParseError);
  });

  it('reads the feasibility marker', () => {
    expect(parseSolverOutput('Objective: 7 INFEASIBLE')).toEqual({ objective: 7, feasible: false });
  });

  it('lets a standalone infeasible line override the result', () => {
    expect(parseSolverOutput('infeasible\nobjective: 7 feasible')).toEqual({
      objective: 7,
      feasible: false,
    });
    expect(parseSolverOutput('no packing found\nInfeasible\n')).toEqual({
      objective: null,
      feasible: false,
    });
  });

  it('fails on output without a result', () => {
    expect(() => parseSolverOutput('')).toThrow('Solver output contains no result line');
    expect(() => parseSolverOutput('objective: n/a\n')).toThrow(ParseError);
  });

  it('evaluates solution-format output against the case instance', () => {
    const out = [
      'container height: free',
      'rotations allowed: no',
      'number of rectangles: 2',
      '2 2',
      '1 2',
      'placement of rectangles',
      '0 0',
      '2 0',
    ].join('\n');

    expect(parseSolverOutput(out, instance)).toEqual({
      objective: 6,
      feasible: true,
      evaluation: {
        container: { width: 3, height: 2 },
        minArea: 6,
        emptyArea: 0,
        fillingRate: 1,
      },
    });
  });

  it('marks overlapping solutions infeasible', () => {
    const out = 'placement of rectangles\n0 0\n1 0\n';
    expect(parseSolverOutput(out, instance)).toEqual({
      objective: null,
      feasible: false,
      reason: 'Rectangles 1 and 2 overlap',
    });
  });

  it('prefers a result line over a solution section', () => {
    const out = 'placement of rectangles\n0 0\n2 0\nobjective: 9\n';
    expect(parseSolverOutput(out, instance)).toEqual({ objective: 9, feasible: null });
  });
});

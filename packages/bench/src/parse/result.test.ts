import type { TestCase } from '@packbench/shared';
import type { SolverRun } from '@packbench/exec';
import { toRunResult } from './result';

const testCase: TestCase = {
  id: 'c01',
  path: '/cases/c01.txt',
  payload: '',
  instance: {
    variant: { kind: 'free' },
    allowRotation: false,
    rectangles: [{ width: 6, height: 7 }],
  },
  knownOptimal: 42,
  optimalSource: 'baseline',
};

function run(overrides: Partial<SolverRun>): SolverRun {
  return {
    outcome: 'exited',
    exitCode: 0,
    signal: null,
    elapsedMs: 120,
    stdout: '',
    stderr: '',
    truncated: false,
    ...overrides,
  };
}

describe('toRunResult', () => {
  it('parses a clean exit', () => {
    expect(toRunResult(testCase, run({ stdout: 'objective: 42\n' }))).toEqual({
      caseId: 'c01',
      status: 'ok',
      exitCode: 0,
      signal: null,
      elapsedMs: 120,
      objective: 42,
      feasible: null,
      stdout: 'objective: 42\n',
      stderr: '',
      truncated: false,
    });
  });

  it('drops aborted runs', () => {
    expect(toRunResult(testCase, run({ outcome: 'aborted' }))).toBeNull();
  });

  it('keeps the pinned elapsed time and no objective on timeout', () => {
    const result = toRunResult(
      testCase,
      run({
        outcome: 'timeout',
        exitCode: null,
        signal: 'SIGTERM',
        elapsedMs: 300_000,
        stdout: 'objective: 40\n',
        error: 'Solver timed out after 300000ms',
      }),
    );
    expect(result).toMatchObject({
      status: 'timeout',
      elapsedMs: 300_000,
      objective: null,
      error: 'Solver timed out after 300000ms',
    });
  });

  it('reports non-zero exits and foreign signals as crashes', () => {
    expect(toRunResult(testCase, run({ exitCode: 3, stderr: 'boom' }))).toMatchObject({
      status: 'crash',
      objective: null,
      stderr: 'boom',
      error: 'Solver exited with code 3',
    });
    expect(toRunResult(testCase, run({ exitCode: null, signal: 'SIGSEGV' }))?.error).toBe(
      'Solver terminated by signal SIGSEGV',
    );
  });

  it('reports spawn failures as crashes', () => {
    expect(
      toRunResult(testCase, run({ outcome: 'spawn-failed', exitCode: null, error: 'spawn java ENOENT' })),
    ).toMatchObject({ status: 'crash', error: 'Failed to start solver: spawn java ENOENT' });
  });

  it('turns unrecognisable output into a parse error', () => {
    expect(toRunResult(testCase, run({ stdout: 'done\n' }))).toMatchObject({
      status: 'parse-error',
      objective: null,
      error: 'Solver output contains no result line',
    });
    expect(toRunResult(testCase, run({ stdout: 'x', truncated: true }))?.error).toBe(
      'Solver output contains no result line (output was truncated)',
    );
  });

  it('marks infeasible reports', () => {
    expect(toRunResult(testCase, run({ stdout: 'objective: 40 infeasible' }))).toMatchObject({
      status: 'infeasible',
      objective: 40,
      feasible: false,
      error: 'Solver reported an infeasible solution',
    });
  });

  it('attaches the evaluation of solution-format output', () => {
    const result = toRunResult(testCase, run({ stdout: 'placement of rectangles\n0 0\n' }));
    expect(result?.status).toBe('ok');
    expect(result?.objective).toBe(42);
    expect(result?.evaluation?.fillingRate).toBe(1);
  });
});

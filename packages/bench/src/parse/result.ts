import { ParseError, errorMessage, type RunResult, type TestCase } from '@packbench/shared';
import type { SolverRun } from '@packbench/exec';
import { parseSolverOutput } from './parser';

/**
 * Turns a finished solver run into a RunResult. Aborted runs yield `null`:
 * they never produce a ledger row.
 */
export function toRunResult(testCase: TestCase, run: SolverRun): RunResult | null {
  if (run.outcome === 'aborted') return null;

  const base = {
    caseId: testCase.id,
    exitCode: run.exitCode,
    signal: run.signal,
    elapsedMs: run.elapsedMs,
    stdout: run.stdout,
    stderr: run.stderr,
    truncated: run.truncated,
  };
  const failed = (status: RunResult['status'], error: string): RunResult => ({
    ...base,
    status,
    objective: null,
    feasible: null,
    error,
  });

  if (run.outcome === 'timeout') {
    return failed('timeout', run.error ?? `Solver timed out after ${run.elapsedMs}ms`);
  }
  if (run.outcome === 'spawn-failed') {
    return failed('crash', `Failed to start solver: ${run.error ?? 'unknown error'}`);
  }
  if (run.signal) {
    return failed('crash', `Solver terminated by signal ${run.signal}`);
  }
  if (run.exitCode !== 0) {
    return failed('crash', `Solver exited with code ${run.exitCode ?? 'unknown'}`);
  }

  try {
    const parsed = parseSolverOutput(run.stdout, testCase.instance);
    const result: RunResult = {
      ...base,
      status: parsed.feasible === false ? 'infeasible' : 'ok',
      objective: parsed.objective,
      feasible: parsed.feasible,
    };
    if (parsed.feasible === false) {
      result.error = parsed.reason ?? 'Solver reported an infeasible solution';
    }
    if (parsed.evaluation) result.evaluation = parsed.evaluation;
    return result;
  } catch (err) {
    if (err instanceof ParseError) {
      return failed('parse-error', err.message + (run.truncated ? ' (output was truncated)' : ''));
    }
    return failed('parse-error', errorMessage(err));
  }
}

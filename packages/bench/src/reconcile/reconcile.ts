import {
  type BatchSummary,
  type Classification,
  type ReconcileConfig,
  type ReconciliationRecord,
  type RunResult,
  type TestCase,
} from '@packbench/shared';

export type ReconcileOptions = Pick<ReconcileConfig, 'sense' | 'tolerance'>;

function compare(reported: number, optimal: number, options: ReconcileOptions): Classification {
  // Integral optima are compared exactly; a tolerance only applies to fractional ones.
  const equal = Number.isInteger(optimal)
    ? reported === optimal
    : Math.abs(reported - optimal) <= options.tolerance;
  if (equal) return 'match';

  const better = options.sense === 'minimize' ? reported < optimal : reported > optimal;
  return better ? 'better' : 'worse';
}

/**
 * Derives the ledger row for one run. Failed runs and cases without a known
 * optimum are never compared.
 */
export function reconcile(
  result: RunResult,
  testCase: TestCase,
  artifact: string,
  options: ReconcileOptions,
): ReconciliationRecord {
  const base = {
    caseId: testCase.id,
    artifact,
    status: result.status,
    reported: result.objective,
    optimal: testCase.knownOptimal,
    elapsedMs: result.elapsedMs,
  };

  if (result.status !== 'ok' || result.objective === null) {
    return { ...base, delta: null, classification: 'failed' };
  }
  if (testCase.knownOptimal === null) {
    return { ...base, delta: null, classification: 'no-baseline' };
  }

  return {
    ...base,
    delta: result.objective - testCase.knownOptimal,
    classification: compare(result.objective, testCase.knownOptimal, options),
  };
}

export interface SummaryContext {
  wallClockMs: number;
  loadErrors: number;
  cancelled: boolean;
}

function emptyCounts(): Pick<BatchSummary, 'classifications' | 'statuses'> {
  return {
    classifications: { match: 0, better: 0, worse: 0, 'no-baseline': 0, failed: 0 },
    statuses: { ok: 0, timeout: 0, crash: 0, 'parse-error': 0, infeasible: 0 },
  };
}

export function summarize(records: readonly ReconciliationRecord[], context: SummaryContext): BatchSummary {
  const { classifications, statuses } = emptyCounts();
  let worseDeltaSum = 0;
  let worseCount = 0;
  const better: string[] = [];

  for (const record of records) {
    classifications[record.classification] += 1;
    statuses[record.status] += 1;
    if (record.classification === 'worse' && record.delta !== null) {
      worseDeltaSum += record.delta;
      worseCount += 1;
    }
    if (record.classification === 'better') better.push(record.caseId);
  }

  return {
    total: records.length,
    classifications,
    statuses,
    worseDeltaSum,
    worseDeltaMean: worseCount === 0 ? null : worseDeltaSum / worseCount,
    better,
    wallClockMs: context.wallClockMs,
    loadErrors: context.loadErrors,
    cancelled: context.cancelled,
  };
}

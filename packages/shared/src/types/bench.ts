/**
 * Container height regime of a packing instance.
 *
 * - `free`: the bounding box height is part of the objective
 * - `fixed`: every placement must fit below `height`
 */
export type Variant = { kind: 'free' } | { kind: 'fixed'; height: number };

export interface Rectangle {
  width: number;
  height: number;
}

/**
 * A parsed rectangle packing instance.
 */
export interface PackingInstance {
  variant: Variant;
  allowRotation: boolean;
  rectangles: Rectangle[];
  /** Source rectangle the instance was generated from, when known */
  boundingBox?: Rectangle;
}

/**
 * One packing problem to hand to the solver. Immutable once loaded.
 */
export interface TestCase {
  /** Case identifier (file name without extension) */
  readonly id: string;
  /** Absolute path of the case file */
  readonly path: string;
  /** Canonical instance text written to the solver */
  readonly payload: string;
  readonly instance: PackingInstance;
  /** Known optimal objective, `null` when unknown */
  readonly knownOptimal: number | null;
  readonly optimalSource: 'baseline' | 'instance' | null;
}

/**
 * The solver artifact under test, validated before any run starts.
 */
export interface SolverArtifactRef {
  /** Absolute path of the artifact */
  readonly path: string;
  /** Full command prefix: launcher, artifact and extra args */
  readonly command: readonly string[];
}

export type RunStatus = 'ok' | 'timeout' | 'crash' | 'parse-error' | 'infeasible';

/** Measurements derived from a solution-format output. */
export interface SolutionEvaluation {
  container: Rectangle;
  /** Sum of rectangle areas: a lower bound on the container area */
  minArea: number;
  emptyArea: number;
  fillingRate: number;
}

/**
 * Outcome of one (TestCase, SolverArtifactRef) pairing.
 */
export interface RunResult {
  caseId: string;
  status: RunStatus;
  exitCode: number | null;
  signal: string | null;
  elapsedMs: number;
  objective: number | null;
  feasible: boolean | null;
  stdout: string;
  stderr: string;
  truncated: boolean;
  /** Human-readable reason for any non-`ok` status */
  error?: string;
  evaluation?: SolutionEvaluation;
}

export type Classification = 'match' | 'better' | 'worse' | 'no-baseline' | 'failed';

export const CLASSIFICATIONS: readonly Classification[] = [
  'match',
  'better',
  'worse',
  'no-baseline',
  'failed',
];

export const RUN_STATUSES: readonly RunStatus[] = [
  'ok',
  'timeout',
  'crash',
  'parse-error',
  'infeasible',
];

/**
 * One ledger row. Appended, never mutated.
 */
export interface ReconciliationRecord {
  readonly caseId: string;
  readonly artifact: string;
  readonly status: RunStatus;
  readonly reported: number | null;
  readonly optimal: number | null;
  readonly delta: number | null;
  readonly classification: Classification;
  readonly elapsedMs: number;
}

/**
 * End-of-batch aggregates.
 */
export interface BatchSummary {
  total: number;
  classifications: Record<Classification, number>;
  statuses: Record<RunStatus, number>;
  worseDeltaSum: number;
  /** Mean delta over `worse` rows, `null` when there are none */
  worseDeltaMean: number | null;
  /** Cases that beat their recorded optimum */
  better: string[];
  wallClockMs: number;
  loadErrors: number;
  cancelled: boolean;
}

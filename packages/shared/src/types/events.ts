import type { BatchSummary, ReconciliationRecord } from './bench';

/**
 * Base interface for all harness events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the batch */
  batchId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted once setup succeeded, before the first solver is spawned.
 */
export interface BatchStarted extends BaseEvent {
  type: 'BatchStarted';
  payload: {
    artifact: string;
    casePath: string;
    ledgerPath: string;
    caseCount: number;
    loadErrors: number;
    concurrency: number;
    timeoutMs: number;
  };
}

/** Emitted for every case that ran to completion, in completion order */
export interface CaseFinished extends BaseEvent {
  type: 'CaseFinished';
  payload: {
    index: number;
    record: ReconciliationRecord;
    error?: string;
  };
}

/** Emitted after the last ledger row was flushed */
export interface BatchFinished extends BaseEvent {
  type: 'BatchFinished';
  payload: {
    summary: BatchSummary;
  };
}

export type BenchEvent = BatchStarted | CaseFinished | BatchFinished;

export interface EventWriter {
  write(event: BenchEvent): void;
  close(): Promise<void>;
}

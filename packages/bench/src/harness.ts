import { randomUUID } from 'crypto';
import {
  logger as defaultLogger,
  relative,
  type BatchSummary,
  type BenchEvent,
  type Config,
  type EventWriter,
  type Logger,
  type ReconciliationRecord,
} from '@packbench/shared';
import {
  SolverInvoker,
  resolveArtifact,
  runPool,
  type ResolveArtifactOptions,
} from '@packbench/exec';
import { loadCases } from './cases/loader';
import { toRunResult } from './parse/result';
import { reconcile, summarize } from './reconcile/reconcile';
import { LedgerWriter } from './report/ledger';
import { ProgressRenderer } from './report/progress';

export interface BenchRunRequest {
  artifactPath: string;
  /** A case file or a directory of case files */
  casePath: string;
  ledgerPath: string;
  baselinePath?: string;
  /** Aborting stops new cases, kills running solvers and keeps finished rows */
  signal?: AbortSignal;
}

export interface BenchRunOutcome {
  batchId: string;
  /** Rows appended to the ledger, in ledger order */
  records: ReconciliationRecord[];
  summary: BatchSummary;
}

export interface BenchHarnessOptions {
  config: Config;
  logger?: Logger;
  renderer?: ProgressRenderer;
  /** Receives BatchStarted, CaseFinished and BatchFinished */
  events?: EventWriter;
  /** Millisecond clock for solver and batch timing */
  now?: () => number;
  cwd?: string;
  findExecutable?: ResolveArtifactOptions['findExecutable'];
}

const EVENT_SCHEMA_VERSION = 1;

export class BenchHarness {
  private readonly logger: Logger;
  private readonly renderer: ProgressRenderer;
  private readonly now: () => number;
  private readonly cwd: string;

  constructor(private readonly options: BenchHarnessOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.renderer = options.renderer ?? new ProgressRenderer();
    this.now = options.now ?? (() => performance.now());
    this.cwd = options.cwd ?? process.cwd();
  }

  async run(request: BenchRunRequest): Promise<BenchRunOutcome> {
    const { config } = this.options;
    const { signal } = request;

    // Setup: nothing is spawned until all three succeed.
    const artifact = await resolveArtifact(request.artifactPath, config.solver, {
      cwd: this.cwd,
      findExecutable: this.options.findExecutable,
    });
    const loaded = await loadCases(request.casePath, {
      baselineFile: config.cases.baselineFile,
      baselinePath: request.baselinePath,
      extensions: config.cases.extensions,
    });
    const ledger = await LedgerWriter.open(request.ledgerPath, { delimiter: config.ledger.delimiter });

    const batchId = randomUUID();
    const log = this.logger.child({ batch: batchId.slice(0, 8) });
    const artifactLabel = relative(this.cwd, artifact.path);
    const { cases } = loaded;

    for (const error of loaded.errors) {
      this.renderer.loadError(error);
    }
    log.debug(`loaded ${cases.length} case(s), ${loaded.errors.length} load error(s)`);
    if (loaded.baselinePath) log.debug(`baseline table: ${loaded.baselinePath}`);

    await this.emit({
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      batchId,
      type: 'BatchStarted',
      payload: {
        artifact: artifact.path,
        casePath: request.casePath,
        ledgerPath: request.ledgerPath,
        caseCount: cases.length,
        loadErrors: loaded.errors.length,
        concurrency: config.harness.concurrency,
        timeoutMs: config.harness.timeoutMs,
      },
    });
    this.renderer.batchStarted({
      artifact: artifactLabel,
      caseCount: cases.length,
      concurrency: config.harness.concurrency,
      timeoutMs: config.harness.timeoutMs,
    });

    const invoker = new SolverInvoker(artifact, {
      ...config.harness,
      payload: config.solver.payload,
      env: config.solver.env,
      envAllowlist: config.solver.envAllowlist,
      cwd: this.cwd,
      logger: log,
      now: this.now,
    });

    const records: Array<ReconciliationRecord | undefined> = new Array(cases.length);
    let finished = 0;
    const start = this.now();

    let poolError: unknown;
    try {
      await runPool(
        cases,
        config.harness.concurrency,
        async (testCase, index) => {
          const run = await invoker.invoke(testCase, { signal });
          const result = toRunResult(testCase, run);
          if (!result) {
            log.debug(`${testCase.id}: aborted, no row`);
            return;
          }
          const record = reconcile(result, testCase, artifactLabel, config.reconcile);
          records[index] = record;
          finished += 1;

          this.renderer.caseFinished(finished, cases.length, record, {
            result,
            rerun: record.classification === 'failed' ? await invoker.rerunCommand(testCase) : undefined,
          });
          await this.emit({
            schemaVersion: EVENT_SCHEMA_VERSION,
            timestamp: new Date().toISOString(),
            batchId,
            type: 'CaseFinished',
            payload: { index, record, ...(result.error ? { error: result.error } : {}) },
          });
          await ledger.submit(index, record);
        },
        { signal },
      );
    } catch (err) {
      poolError = err;
    }

    // Finished rows are flushed even when the batch was cut short.
    try {
      await ledger.close();
    } catch (err) {
      poolError ??= err;
    }
    if (poolError !== undefined) throw poolError;

    const written = records.filter((r): r is ReconciliationRecord => r !== undefined);
    const summary = summarize(written, {
      wallClockMs: Math.round(this.now() - start),
      loadErrors: loaded.errors.length,
      cancelled: signal?.aborted ?? false,
    });
    this.renderer.summary(summary, request.ledgerPath);
    await this.emit({
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      batchId,
      type: 'BatchFinished',
      payload: { summary },
    });

    return { batchId, records: written, summary };
  }

  private async emit(event: BenchEvent): Promise<void> {
    this.options.events?.write(event);
    await this.logger.log(event);
  }
}

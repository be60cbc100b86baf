import chalk from 'chalk';
import type {
  BatchSummary,
  Classification,
  LoadError,
  ReconciliationRecord,
  RunResult,
} from '@packbench/shared';

export interface ProgressRendererOptions {
  /** Defaults to chalk's detection of the output terminal */
  color?: boolean;
  /** Line sink; defaults to stdout */
  write?: (line: string) => void;
  /** Lines of stderr shown for a failed case */
  stderrTailLines?: number;
}

export interface CaseContext {
  result: RunResult;
  /** Shell command that re-runs this single case */
  rerun?: string;
}

function tail(text: string, lines: number): string[] {
  const all = text.split(/\r?\n/).filter((l) => l.trim() !== '');
  return all.slice(-lines);
}

function formatValue(value: number | null): string {
  return value === null ? '-' : String(value);
}

/**
 * Human-readable progress stream: one line per finished case as it happens, and
 * the summary once at the end.
 */
export class ProgressRenderer {
  private readonly c: chalk.Chalk;
  private readonly write: (line: string) => void;
  private readonly stderrTailLines: number;

  constructor(options: ProgressRendererOptions = {}) {
    const level = options.color === false ? 0 : options.color === true && chalk.level === 0 ? 1 : chalk.level;
    this.c = new chalk.Instance({ level });
    this.write = options.write ?? ((line) => process.stdout.write(line + '\n'));
    this.stderrTailLines = options.stderrTailLines ?? 5;
  }

  batchStarted(info: { artifact: string; caseCount: number; concurrency: number; timeoutMs: number }) {
    this.write(
      this.c.bold.cyan(`Running ${info.caseCount} case(s) against ${info.artifact}`) +
        this.c.gray(` (concurrency ${info.concurrency}, timeout ${info.timeoutMs}ms)`),
    );
  }

  loadError(error: LoadError) {
    const where = error.path ? `${error.path}${error.line ? `:${error.line}` : ''}: ` : '';
    this.write(`${this.c.red.bold('LOAD ERROR')} ${where}${error.message}`);
  }

  caseFinished(position: number, total: number, record: ReconciliationRecord, context: CaseContext) {
    const counter = this.c.gray(`[${position}/${total}]`);
    const badge = this.badge(record.classification);
    const timing = this.c.gray(`(${record.elapsedMs}ms)`);

    if (record.classification === 'failed') {
      this.write(`${counter} ${this.c.bold(record.caseId)} ${badge} ${record.status} ${timing}`);
      const { result } = context;
      if (result.error) this.write(`    error: ${result.error}`);
      if (result.exitCode !== null && result.exitCode !== 0) this.write(`    exit code: ${result.exitCode}`);
      if (result.signal) this.write(`    signal: ${result.signal}`);
      const stderr = tail(result.stderr, this.stderrTailLines);
      if (stderr.length > 0) {
        this.write('    stderr:');
        for (const line of stderr) this.write(this.c.gray(`      ${line}`));
      }
      if (context.rerun) this.write(`    re-run: ${context.rerun}`);
      return;
    }

    const values = `reported=${formatValue(record.reported)} optimal=${formatValue(record.optimal)} delta=${formatValue(record.delta)}`;
    const line = `${counter} ${this.c.bold(record.caseId)} ${badge} ${values} ${timing}`;
    if (record.classification === 'better') {
      this.write(line + ' ' + this.c.bgYellow.black(' BEATS RECORDED OPTIMUM '));
    } else {
      this.write(line);
    }
  }

  summary(summary: BatchSummary, ledgerPath: string) {
    const { classifications: cl, statuses: st } = summary;
    this.write('='.repeat(60));
    this.write(this.c.bold.cyan(summary.cancelled ? 'Batch interrupted' : 'Batch summary'));
    this.write(`  cases:        ${summary.total}`);
    this.write(
      `  match:        ${this.c.green(String(cl.match))}   better: ${this.c.yellow(String(cl.better))}   worse: ${this.c.red(String(cl.worse))}   no-baseline: ${cl['no-baseline']}   failed: ${this.c.red(String(cl.failed))}`,
    );
    if (cl.failed > 0) {
      this.write(
        `  failures:     timeout ${st.timeout}, crash ${st.crash}, parse-error ${st['parse-error']}, infeasible ${st.infeasible}`,
      );
    }
    if (summary.worseDeltaMean !== null) {
      this.write(`  worse delta:  sum ${summary.worseDeltaSum}, mean ${summary.worseDeltaMean.toFixed(2)}`);
    }
    if (summary.better.length > 0) {
      this.write(this.c.yellow.bold(`  better than recorded optimum: ${summary.better.join(', ')}`));
    }
    if (summary.loadErrors > 0) {
      this.write(this.c.red(`  load errors:  ${summary.loadErrors}`));
    }
    this.write(`  wall clock:   ${(summary.wallClockMs / 1000).toFixed(2)}s`);
    this.write(this.c.cyan(`  ledger:       ${ledgerPath}`));
  }

  private badge(classification: Classification): string {
    switch (classification) {
      case 'match':
        return this.c.green.bold('MATCH');
      case 'better':
        return this.c.yellow.bold('BETTER');
      case 'worse':
        return this.c.red.bold('WORSE');
      case 'no-baseline':
        return this.c.gray.bold('NO-BASELINE');
      case 'failed':
        return this.c.red.bold('FAILED');
    }
  }
}

import { promises as fs } from 'fs';
import {
  LedgerError,
  ensureParentDir,
  errorMessage,
  isErrnoException,
  type LedgerConfig,
  type ReconciliationRecord,
} from '@packbench/shared';

export const LEDGER_COLUMNS = [
  'case',
  'artifact',
  'status',
  'reported',
  'optimal',
  'delta',
  'classification',
  'elapsed_ms',
] as const;

export type LedgerOptions = Partial<Pick<LedgerConfig, 'delimiter'>>;

export function formatField(value: string | number | null, delimiter: string): string {
  if (value === null) return '';
  const text = String(value);
  if (text.includes(delimiter) || /["\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatRow(record: ReconciliationRecord, delimiter = ','): string {
  return [
    record.caseId,
    record.artifact,
    record.status,
    record.reported,
    record.optimal,
    record.delta,
    record.classification,
    record.elapsedMs,
  ]
    .map((v) => formatField(v, delimiter))
    .join(delimiter);
}

async function readHead(path: string): Promise<{ firstLine: string; endsWithNewline: boolean } | null> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw err;
  }
  if (content.length === 0) return null;
  return {
    firstLine: content.split(/\r?\n/, 1)[0],
    endsWithNewline: content.endsWith('\n'),
  };
}

/**
 * Append-only CSV ledger. Rows are submitted by batch index and appended in index
 * order whatever order they complete in; appends run one at a time.
 */
export class LedgerWriter {
  private readonly pending = new Map<number, ReconciliationRecord>();
  private nextIndex = 0;
  private chain: Promise<void> = Promise.resolve();
  private written = 0;
  private closed = false;

  private constructor(
    readonly path: string,
    private readonly delimiter: string,
    private needsNewline: boolean,
  ) {}

  /**
   * Opens `path` for appending, creating it (and its directory) with a header when
   * missing or empty.
   *
   * @throws LedgerError when the file is unwritable or carries a different header
   */
  static async open(path: string, options: LedgerOptions = {}): Promise<LedgerWriter> {
    const delimiter = options.delimiter ?? ',';
    const header = LEDGER_COLUMNS.join(delimiter);
    try {
      await ensureParentDir(path);
      const head = await readHead(path);
      if (head && head.firstLine !== header) {
        throw new LedgerError(`Ledger ${path} has an unexpected header`, {
          details: { expected: header, found: head.firstLine },
        });
      }
      // Appending nothing still proves the file is writable.
      await fs.appendFile(path, head ? '' : header + '\n');
      return new LedgerWriter(path, delimiter, head ? !head.endsWithNewline : false);
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      throw new LedgerError(`Cannot open ledger ${path}: ${errorMessage(err)}`, { cause: err });
    }
  }

  get rowsWritten(): number {
    return this.written;
  }

  /**
   * Queues the row of batch position `index` and appends every row that is now
   * contiguous. Resolves once those rows are on disk.
   */
  submit(index: number, record: ReconciliationRecord): Promise<void> {
    if (this.closed) {
      return Promise.reject(new LedgerError(`Ledger ${this.path} is closed`));
    }
    this.pending.set(index, record);

    const ready: ReconciliationRecord[] = [];
    let next = this.pending.get(this.nextIndex);
    while (next) {
      ready.push(next);
      this.pending.delete(this.nextIndex);
      this.nextIndex += 1;
      next = this.pending.get(this.nextIndex);
    }
    return this.enqueue(ready);
  }

  /**
   * Appends rows still waiting for an earlier index (runs that never finished), in
   * index order, and returns the number of rows this writer appended.
   */
  async close(): Promise<number> {
    if (!this.closed) {
      this.closed = true;
      const rest = [...this.pending.entries()].sort(([a], [b]) => a - b).map(([, r]) => r);
      this.pending.clear();
      await this.enqueue(rest);
    }
    await this.chain;
    return this.written;
  }

  private enqueue(records: ReconciliationRecord[]): Promise<void> {
    if (records.length === 0) return this.chain;
    const text = records.map((r) => formatRow(r, this.delimiter) + '\n').join('');
    this.chain = this.chain.then(async () => {
      const prefix = this.needsNewline ? '\n' : '';
      try {
        await fs.appendFile(this.path, prefix + text);
      } catch (err) {
        throw new LedgerError(`Cannot append to ledger ${this.path}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      this.needsNewline = false;
      this.written += records.length;
    });
    return this.chain;
  }
}

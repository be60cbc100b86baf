import { spawn, type ChildProcess } from 'child_process';
import { promises as fs } from 'fs';
import { file, tmpName, type FileResult } from 'tmp-promise';
import {
  TimeoutError,
  errorMessage,
  isWindows,
  type Logger,
  type SolverArtifactRef,
  type TestCase,
} from '@packbench/shared';
import { formatCommand } from '../command/parser';
import { getSafeEnv, killProcessTree } from './process';

/**
 * How a solver process ended.
 *
 * - `exited`: the process ended on its own (any exit code or signal)
 * - `timeout`: the deadline fired first and the process tree was killed
 * - `aborted`: the batch was cancelled while the process was running
 * - `spawn-failed`: the process never started
 */
export type SolverRunOutcome = 'exited' | 'timeout' | 'aborted' | 'spawn-failed';

export interface SolverRun {
  outcome: SolverRunOutcome;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Wall-clock milliseconds; pinned to the timeout for `timeout` runs */
  elapsedMs: number;
  stdout: string;
  stderr: string;
  truncated: boolean;
  error?: string;
}

export interface SolverInvokerOptions {
  timeoutMs: number;
  /** Delay between SIGTERM and SIGKILL when terminating */
  killGraceMs: number;
  /** Per-stream capture limit; the tail is kept */
  maxOutputBytes: number;
  payload: 'stdin' | 'path';
  /** Where payload files are written; defaults to the OS temp directory */
  payloadDir?: string;
  env?: Record<string, string>;
  envAllowlist?: string[];
  cwd?: string;
  logger?: Logger;
  now?: () => number;
}

interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
}

type RaceWinner = { kind: 'exit'; exit: ExitInfo } | { kind: 'timeout' } | { kind: 'aborted' };

/** Keeps the last `limit` bytes written to it. */
class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.limit && this.chunks.length > 0) {
      this.truncated = true;
      const overflow = this.size - this.limit;
      const head = this.chunks[0];
      if (head.length <= overflow) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(overflow);
        this.size -= overflow;
      }
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

function waitForExit(child: ChildProcess): Promise<ExitInfo> {
  return new Promise((resolve) => {
    let settled = false;
    child.once('error', (error) => {
      if (settled) return;
      settled = true;
      resolve({ code: null, signal: null, error });
    });
    child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      resolve({ code, signal });
    });
  });
}

/**
 * Runs the solver artifact once per case in an isolated subprocess.
 *
 * The lifecycle is spawn, race(exit, deadline, abort), terminate the process tree if the
 * exit did not win, await the exit, then report. Exit status interpretation is left to the
 * caller.
 */
export class SolverInvoker {
  private readonly now: () => number;

  constructor(
    private readonly artifact: SolverArtifactRef,
    private readonly options: SolverInvokerOptions,
  ) {
    this.now = options.now ?? (() => performance.now());
  }

  /**
   * A shell command that reproduces the invocation of a single case.
   *
   * The payload is written to a file that is kept after the batch, so the command feeds the
   * solver exactly what it received, without fields the harness strips from the case file.
   */
  async rerunCommand(testCase: TestCase): Promise<string> {
    const payloadPath = await tmpName({
      dir: this.options.payloadDir,
      prefix: `packbench-${testCase.id}-`,
      postfix: '.txt',
    });
    await fs.writeFile(payloadPath, testCase.payload);
    if (this.options.payload === 'path') {
      return formatCommand([...this.artifact.command, payloadPath]);
    }
    return `${formatCommand(this.artifact.command)} < ${formatCommand([payloadPath])}`;
  }

  async invoke(testCase: TestCase, ctx: { signal?: AbortSignal } = {}): Promise<SolverRun> {
    if (ctx.signal?.aborted) {
      return this.emptyRun('aborted', 0);
    }
    if (this.options.payload === 'stdin') {
      return this.execute(testCase, [], ctx.signal);
    }

    let payloadFile: FileResult;
    try {
      payloadFile = await file({ dir: this.options.payloadDir, prefix: `${testCase.id}-`, postfix: '.txt' });
      await fs.writeFile(payloadFile.path, testCase.payload);
    } catch (err) {
      return this.emptyRun('spawn-failed', 0, `Cannot write payload file: ${errorMessage(err)}`);
    }
    try {
      return await this.execute(testCase, [payloadFile.path], ctx.signal);
    } finally {
      await payloadFile.cleanup();
    }
  }

  private async execute(testCase: TestCase, extraArgs: string[], signal?: AbortSignal): Promise<SolverRun> {
    const log = this.options.logger?.child({ caseId: testCase.id });
    const [bin, ...args] = [...this.artifact.command, ...extraArgs];
    const env = getSafeEnv(process.env, this.options.envAllowlist, this.options.env);
    const stdout = new TailBuffer(this.options.maxOutputBytes);
    const stderr = new TailBuffer(this.options.maxOutputBytes);

    const start = this.now();
    let child: ChildProcess;
    try {
      child = spawn(bin, args, {
        cwd: this.options.cwd,
        env,
        stdio: ['pipe', 'pipe', 'pipe'],
        // Own process group, so the whole tree can be signalled on timeout.
        detached: !isWindows(),
      });
    } catch (err) {
      return this.emptyRun('spawn-failed', this.elapsedSince(start), errorMessage(err));
    }
    log?.debug(`spawned pid=${child.pid ?? '?'}: ${formatCommand([bin, ...args])}`);

    const exited = waitForExit(child);
    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    if (child.stdin) {
      // Writing to stdin can race with process exit and produce EPIPE.
      child.stdin.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code !== 'EPIPE') {
          log?.warn(`stdin write failed: ${err.message}`);
        }
      });
      child.stdin.end(this.options.payload === 'stdin' ? testCase.payload : undefined);
    }

    // Race: whichever of exit, deadline or abort happens first decides the outcome.
    let deadlineTimer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const deadline = new Promise<RaceWinner>((resolve) => {
      deadlineTimer = setTimeout(() => resolve({ kind: 'timeout' }), this.options.timeoutMs);
    });
    const aborted = new Promise<RaceWinner>((resolve) => {
      if (!signal) return;
      onAbort = () => resolve({ kind: 'aborted' });
      signal.addEventListener('abort', onAbort, { once: true });
    });

    const winner = await Promise.race<RaceWinner>([
      exited.then((exit) => ({ kind: 'exit', exit })),
      deadline,
      aborted,
    ]);
    clearTimeout(deadlineTimer);
    if (onAbort) signal?.removeEventListener('abort', onAbort);

    // Cleanup: terminate and wait for the process to be gone before classifying.
    let exit: ExitInfo;
    if (winner.kind === 'exit') {
      exit = winner.exit;
    } else {
      log?.debug(`terminating after ${winner.kind}`);
      exit = await this.terminate(child, exited);
    }

    const base = {
      exitCode: exit.code,
      signal: exit.signal,
      stdout: stdout.toString(),
      stderr: stderr.toString(),
      truncated: stdout.truncated || stderr.truncated,
    };

    if (winner.kind === 'timeout') {
      return {
        ...base,
        outcome: 'timeout',
        elapsedMs: this.options.timeoutMs,
        error: new TimeoutError(this.options.timeoutMs).message,
      };
    }
    if (winner.kind === 'aborted') {
      return { ...base, outcome: 'aborted', elapsedMs: this.elapsedSince(start), error: 'Aborted' };
    }
    if (exit.error) {
      return {
        ...base,
        outcome: 'spawn-failed',
        elapsedMs: this.elapsedSince(start),
        error: exit.error.message,
      };
    }
    return { ...base, outcome: 'exited', elapsedMs: this.elapsedSince(start) };
  }

  private async terminate(child: ChildProcess, exited: Promise<ExitInfo>): Promise<ExitInfo> {
    const pid = child.pid;
    if (pid === undefined) {
      return exited;
    }
    killProcessTree(pid, 'SIGTERM');
    const escalation = setTimeout(() => killProcessTree(pid, 'SIGKILL'), this.options.killGraceMs);
    try {
      return await exited;
    } finally {
      clearTimeout(escalation);
    }
  }

  private elapsedSince(start: number): number {
    return Math.round(this.now() - start);
  }

  private emptyRun(outcome: SolverRunOutcome, elapsedMs: number, error?: string): SolverRun {
    return {
      outcome,
      exitCode: null,
      signal: null,
      elapsedMs,
      stdout: '',
      stderr: '',
      truncated: false,
      error: error ?? (outcome === 'aborted' ? 'Aborted' : undefined),
    };
  }
}

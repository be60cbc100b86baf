import { Option, type Command } from 'commander';
import {
  ConsoleLogger,
  JsonlEventWriter,
  type ConfigInput,
} from '@packbench/shared';
import { BenchHarness, ConfigLoader, ProgressRenderer } from '@packbench/bench';
import { OutputRenderer } from '../output/renderer';
import { collectEnv, parseLauncher, parsePositiveInt, type GlobalOptions } from './options';

/** Conventional exit status of a process stopped by SIGINT */
export const INTERRUPTED_EXIT_CODE = 130;

interface RunOptions {
  baseline?: string;
  timeout?: number;
  concurrency?: number;
  launcher?: string[];
  payload?: 'stdin' | 'path';
  env?: Record<string, string>;
  trace?: string;
  color: boolean;
}

export function registerRunCommand(program: Command) {
  program
    .command('run')
    .description('Run every case against a solver and append the results to a ledger')
    .argument('<artifact>', 'Solver artifact (a .jar runs through "java -jar")')
    .argument('<cases>', 'Case file or directory of case files')
    .argument('<ledger>', 'CSV ledger to append to (created when missing)')
    .option('--baseline <path>', 'Baseline table of known optima')
    .option('--timeout <ms>', 'Wall-clock bound per case', parsePositiveInt)
    .option('--concurrency <n>', 'Cases run at the same time', parsePositiveInt)
    .option('--launcher <cmd>', 'Command prefix placed before the artifact', parseLauncher)
    .addOption(
      new Option('--payload <mode>', 'How the solver receives the instance').choices(['stdin', 'path']),
    )
    .option('--env <KEY=VALUE>', 'Extra solver environment variable (repeatable)', collectEnv)
    .option('--trace <path>', 'Append batch events as JSON lines to this file')
    .option('--no-color', 'Disable colored progress output')
    .action(async (artifact: string, cases: string, ledger: string, options: RunOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const flags: ConfigInput = {
        harness: { timeoutMs: options.timeout, concurrency: options.concurrency },
        solver: { launcher: options.launcher, payload: options.payload, env: options.env },
      };
      const config = ConfigLoader.load({ configPath: globalOpts.config, flags });
      const logger = new ConsoleLogger({ verbose: !!globalOpts.verbose });

      // In JSON mode stdout carries only the final document.
      const progress = new ProgressRenderer({
        color: options.color === false ? false : undefined,
        write: globalOpts.json
          ? (line) => process.stderr.write(line + '\n')
          : (line) => process.stdout.write(line + '\n'),
      });

      let events: JsonlEventWriter | undefined;
      if (options.trace) {
        events = await JsonlEventWriter.open(options.trace);
        if (globalOpts.verbose) renderer.log(`Tracing events to ${options.trace}`);
      }

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals) => {
        logger.warn(`Received ${signal}, stopping the batch (completed rows are kept)`);
        controller.abort();
      };
      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);

      try {
        const harness = new BenchHarness({ config, logger, renderer: progress, events });
        const outcome = await harness.run({
          artifactPath: artifact,
          casePath: cases,
          ledgerPath: ledger,
          baselinePath: options.baseline,
          signal: controller.signal,
        });

        renderer.render({
          command: 'run',
          batchId: outcome.batchId,
          ledgerPath: ledger,
          summary: outcome.summary,
        });
        if (outcome.summary.cancelled) {
          process.exitCode = INTERRUPTED_EXIT_CODE;
        }
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
        await events?.close();
      }
    });
}

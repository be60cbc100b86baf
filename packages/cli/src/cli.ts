import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import { registerRunCommand } from './commands/run';
import { registerCheckCommand } from './commands/check';
import { registerGenerateCommand } from './commands/generate';
import type { GlobalOptions } from './commands/options';

import { AppError, ConfigError, UsageError } from '@packbench/shared';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('packbench')
    .description('Benchmark harness for rectangle packing solvers')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    // Parse failures surface as CommanderError instead of exiting the process.
    .exitOverride();

  registerRunCommand(program);
  registerCheckCommand(program);
  registerGenerateCommand(program);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses argv and runs the selected command. Commands report their own status through
 * process.exitCode; failures map to 2 (user-correctable) or 1.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
  } catch (e) {
    if (e instanceof CommanderError) {
      // Commander already printed the usage message; help and --version exit 0.
      process.exitCode = e.exitCode === 0 ? 0 : 2;
      return;
    }

    reportError(e, program.opts<GlobalOptions>());

    if (e instanceof ConfigError || e instanceof UsageError) {
      process.exitCode = 2;
    } else {
      process.exitCode = 1;
    }
  }
}

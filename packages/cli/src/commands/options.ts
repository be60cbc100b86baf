import { InvalidArgumentError } from 'commander';
import { splitCommand } from '@packbench/exec';

/** Global flags shared by every command */
export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
};

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return Number(value);
}

export function parseLauncher(value: string): string[] {
  const argv = splitCommand(value);
  if (argv.length === 0) {
    throw new InvalidArgumentError('Launcher must not be empty.');
  }
  return argv;
}

/** Collects repeated `--env KEY=VALUE` flags */
export function collectEnv(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const eq = value.indexOf('=');
  if (eq <= 0) {
    throw new InvalidArgumentError(`Expected KEY=VALUE, got "${value}".`);
  }
  return { ...previous, [value.slice(0, eq)]: value.slice(eq + 1) };
}

export function parseYesNo(value: string): boolean {
  if (value === 'yes') return true;
  if (value === 'no') return false;
  throw new InvalidArgumentError(`Expected "yes" or "no", got "${value}".`);
}

export function parseSeed(value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError(`Expected an integer seed, got "${value}".`);
  }
  return Number(value);
}

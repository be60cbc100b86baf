import fs from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import which from 'which';
import {
  InvocationError,
  isErrnoException,
  type SolverArtifactRef,
  type SolverConfig,
} from '@packbench/shared';

/** Solvers packaged as jars run through the JVM unless a launcher is configured. */
export function defaultLauncherFor(artifactPath: string): string[] {
  return path.extname(artifactPath).toLowerCase() === '.jar' ? ['java', '-jar'] : [];
}

export interface ResolveArtifactOptions {
  cwd?: string;
  /** Looks a command up on PATH; resolves null when it is absent */
  findExecutable?: (command: string) => Promise<string | null>;
}

function findOnPath(command: string): Promise<string | null> {
  return which(command, { nothrow: true });
}

/**
 * Validates that the artifact exists and can be invoked, and builds the shared command prefix.
 * Throws InvocationError before any case runs when it cannot.
 */
export async function resolveArtifact(
  artifactPath: string,
  solver: Pick<SolverConfig, 'launcher' | 'args'>,
  options: ResolveArtifactOptions = {},
): Promise<SolverArtifactRef> {
  const { cwd = process.cwd(), findExecutable = findOnPath } = options;
  const absolute = path.resolve(cwd, artifactPath);

  let stat;
  try {
    stat = await fs.stat(absolute);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new InvocationError(`Solver artifact not found: ${absolute}`);
    }
    throw new InvocationError(`Cannot inspect solver artifact: ${absolute}`, { cause: err });
  }
  if (!stat.isFile()) {
    throw new InvocationError(`Solver artifact is not a regular file: ${absolute}`);
  }

  const launcher = solver.launcher.length > 0 ? solver.launcher : defaultLauncherFor(absolute);

  if (launcher.length === 0) {
    try {
      await fs.access(absolute, constants.X_OK);
    } catch (err) {
      throw new InvocationError(`Solver artifact is not executable: ${absolute}`, {
        cause: err,
        details: 'Set execute permission or configure solver.launcher (e.g. --launcher "java -jar").',
      });
    }
  } else {
    try {
      await fs.access(absolute, constants.R_OK);
    } catch (err) {
      throw new InvocationError(`Solver artifact is not readable: ${absolute}`, { cause: err });
    }
    const resolved = await findExecutable(launcher[0]);
    if (!resolved) {
      throw new InvocationError(`Launcher "${launcher[0]}" was not found on PATH`, {
        details: { launcher },
      });
    }
  }

  return {
    path: absolute,
    command: [...launcher, absolute, ...solver.args],
  };
}

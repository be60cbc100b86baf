import { spawnSync } from 'child_process';
import { isErrnoException, isWindows } from '@packbench/shared';

export function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): void {
  if (isWindows()) {
    // On Windows, process.kill is not effective for killing process trees.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  // Signalling the negative PID reaches the whole process group.
  // The child must have been spawned detached for it to lead its own group.
  try {
    process.kill(-pid, signal);
  } catch (err) {
    // ESRCH: the group is already gone.
    if (!isErrnoException(err) || err.code !== 'ESRCH') throw err;
  }
}

// Minimal env vars that are safe and commonly needed by solver runtimes (JVMs included).
// Anything else must be allowlisted or set explicitly in the solver config.
const BASELINE_ENV_KEYS = [
  'HOME',
  'USER',
  'LOGNAME',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'LC_CTYPE',
  'TMPDIR',
  'TMP',
  'TEMP',
  'JAVA_HOME',
  // Windows
  'USERPROFILE',
  'APPDATA',
  'LOCALAPPDATA',
  'SYSTEMROOT',
  'COMSPEC',
  'PATHEXT',
];

export function getSafeEnv(
  baseEnv: NodeJS.ProcessEnv,
  envAllowlist: readonly string[] = [],
  extraEnv: Record<string, string> = {},
): Record<string, string> {
  const safeEnv: Record<string, string> = {};

  // Always include PATH for basic command resolution.
  const pathValue = baseEnv.PATH ?? baseEnv.Path;
  if (pathValue) {
    safeEnv.PATH = pathValue;
  }

  for (const key of [...BASELINE_ENV_KEYS, ...envAllowlist]) {
    const value = baseEnv[key];
    if (value === undefined) continue;
    safeEnv[key] = value;
  }

  return { ...safeEnv, ...extraEnv };
}

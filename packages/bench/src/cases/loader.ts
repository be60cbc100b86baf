import { promises as fs } from 'fs';
import path from 'path';
import {
  LoadError,
  caseIdFromPath,
  errorMessage,
  isErrnoException,
  type TestCase,
} from '@packbench/shared';
import { parseBaseline } from './baseline';
import { area, parseInstance, serializeInstance } from './instance';

export interface LoadCasesOptions {
  /** File name of the baseline table looked up beside the cases */
  baselineFile?: string;
  /** Explicit baseline table; must exist when given */
  baselinePath?: string;
  /** Only files with these extensions are cases; empty means every file */
  extensions?: readonly string[];
}

export interface LoadedCases {
  /** Cases in lexicographic file name order */
  cases: TestCase[];
  /** Per-case and per-entry failures; none of them stops the batch */
  errors: LoadError[];
  baselinePath: string | null;
}

async function statOrNull(p: string) {
  try {
    return await fs.stat(p);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return null;
    throw new LoadError(`Cannot inspect ${p}: ${errorMessage(err)}`, { path: p, cause: err });
  }
}

async function listCaseFiles(
  dir: string,
  baselineName: string,
  extensions: readonly string[],
): Promise<string[]> {
  const names = (await fs.readdir(dir)).filter((name) => {
    if (name.startsWith('.') || name === baselineName) return false;
    if (extensions.length === 0) return true;
    return extensions.includes(path.extname(name).toLowerCase());
  });
  // Default sort compares UTF-16 code units, independent of locale.
  names.sort();

  const files: string[] = [];
  for (const name of names) {
    const full = path.join(dir, name);
    const stat = await statOrNull(full);
    if (stat?.isFile()) files.push(full);
  }
  return files;
}

/**
 * Discovers and parses the cases under `casePath`, a single case file or a
 * directory of them, and attaches known-optimal values.
 *
 * @throws LoadError when `casePath` (or an explicit baseline table) does not exist
 */
export async function loadCases(casePath: string, options: LoadCasesOptions = {}): Promise<LoadedCases> {
  const root = path.resolve(casePath);
  const rootStat = await statOrNull(root);
  if (!rootStat) {
    throw new LoadError(`Case path does not exist: ${root}`, { path: root });
  }

  const baselineName = options.baselineFile ?? 'baseline.csv';
  const isDirectory = rootStat.isDirectory();
  const dir = isDirectory ? root : path.dirname(root);
  const files = isDirectory
    ? await listCaseFiles(root, baselineName, options.extensions ?? [])
    : [root];

  const errors: LoadError[] = [];

  // Baseline table
  let baselinePath: string | null = null;
  let baseline = new Map<string, { value: number; line: number }>();
  if (options.baselinePath) {
    baselinePath = path.resolve(options.baselinePath);
    if (!(await statOrNull(baselinePath))) {
      throw new LoadError(`Baseline table does not exist: ${baselinePath}`, { path: baselinePath });
    }
  } else {
    const candidate = path.join(dir, baselineName);
    if ((await statOrNull(candidate))?.isFile()) baselinePath = candidate;
  }
  if (baselinePath) {
    const table = parseBaseline(await fs.readFile(baselinePath, 'utf8'), baselinePath);
    baseline = table.entries;
    errors.push(...table.errors);
  }

  const cases: TestCase[] = [];
  const seenIds = new Set<string>();
  for (const file of files) {
    const id = caseIdFromPath(file);
    if (seenIds.has(id)) {
      errors.push(new LoadError(`Duplicate case id "${id}"`, { path: file }));
      continue;
    }
    seenIds.add(id);

    try {
      const instance = parseInstance(await fs.readFile(file, 'utf8'), file);
      const entry = baseline.get(id);
      let knownOptimal: number | null = null;
      let optimalSource: TestCase['optimalSource'] = null;
      if (entry) {
        knownOptimal = entry.value;
        optimalSource = 'baseline';
      } else if (instance.boundingBox) {
        knownOptimal = area(instance.boundingBox);
        optimalSource = 'instance';
      }
      cases.push({
        id,
        path: file,
        payload: serializeInstance(instance),
        instance,
        knownOptimal,
        optimalSource,
      });
    } catch (err) {
      errors.push(
        err instanceof LoadError
          ? err
          : new LoadError(`Cannot read case ${file}: ${errorMessage(err)}`, { path: file, cause: err }),
      );
    }
  }

  // A single case file shares its directory's table, so other entries are not orphans.
  if (isDirectory && baselinePath) {
    for (const [id, { line }] of baseline) {
      if (!seenIds.has(id)) {
        errors.push(
          new LoadError(`Baseline entry references unknown case "${id}"`, {
            path: baselinePath,
            line,
          }),
        );
      }
    }
  }

  return { cases, errors, baselinePath };
}

import { LoadError } from '@packbench/shared';

export interface BaselineTable {
  /** Known-optimal objective by case id, in file order */
  entries: Map<string, { value: number; line: number }>;
  errors: LoadError[];
}

const NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Parses a locale-invariant decimal, `null` when `text` is not one. */
export function parseNumber(text: string): number | null {
  if (!NUMBER.test(text)) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function unquote(field: string): string {
  const trimmed = field.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/""/g, '"');
  }
  return trimmed;
}

/**
 * Parses a baseline table of `case-identifier,optimal-value` rows.
 * Blank lines and `#` comments are skipped; a first row whose value is not a
 * number is taken as a header. Bad rows become per-entry errors.
 */
export function parseBaseline(text: string, path: string): BaselineTable {
  const entries: BaselineTable['entries'] = new Map();
  const errors: LoadError[] = [];
  let sawRow = false;

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = i + 1;
    const content = raw.trim();
    if (content === '' || content.startsWith('#')) return;

    const isFirstRow = !sawRow;
    sawRow = true;

    const fields = content.split(',').map(unquote);
    const [id, valueText] = fields;
    if (fields.length !== 2 || !id) {
      errors.push(new LoadError(`Malformed baseline row: "${content}"`, { path, line }));
      return;
    }

    const value = parseNumber(valueText);
    if (value === null) {
      if (isFirstRow) return;
      errors.push(
        new LoadError(`Invalid optimal value for case "${id}": "${valueText}"`, { path, line }),
      );
      return;
    }

    const existing = entries.get(id);
    if (existing) {
      errors.push(
        new LoadError(`Duplicate baseline entry for case "${id}" (first on line ${existing.line})`, {
          path,
          line,
        }),
      );
      return;
    }
    entries.set(id, { value, line });
  });

  return { entries, errors };
}

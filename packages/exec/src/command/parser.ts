/**
 * Splits a command line into argv tokens, honouring single quotes, double quotes and
 * backslash escapes. No variable expansion or globbing is performed.
 */
export function splitCommand(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let escape = false;

  const trimmed = input.trim();

  for (let i = 0; i < trimmed.length; i++) {
    const char = trimmed[i];

    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

const SAFE_TOKEN = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quotes a single argument for a POSIX shell. */
export function quoteArg(arg: string): string {
  if (arg.length > 0 && SAFE_TOKEN.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/** Renders argv as a command line that can be pasted into a shell. */
export function formatCommand(argv: readonly string[]): string {
  return argv.map(quoteArg).join(' ');
}

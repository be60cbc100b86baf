import { describe, it, expect } from 'vitest';
import { splitCommand, quoteArg, formatCommand } from './parser';

describe('splitCommand', () => {
  it('splits on whitespace', () => {
    expect(splitCommand('java -jar')).toEqual(['java', '-jar']);
  });

  it('keeps quoted segments together', () => {
    expect(splitCommand('java "-Dname=a b" -jar')).toEqual(['java', '-Dname=a b', '-jar']);
    expect(splitCommand("run 'x y'")).toEqual(['run', 'x y']);
  });

  it('honours backslash escapes outside single quotes', () => {
    expect(splitCommand('a\\ b c')).toEqual(['a b', 'c']);
    expect(splitCommand("'a\\b'")).toEqual(['a\\b']);
  });

  it('keeps empty quoted arguments', () => {
    expect(splitCommand('tool "" end')).toEqual(['tool', '', 'end']);
  });

  it('handles empty input', () => {
    expect(splitCommand('   ')).toEqual([]);
  });
});

describe('quoteArg', () => {
  it('leaves plain tokens untouched', () => {
    expect(quoteArg('/opt/solver-1.2.jar')).toBe('/opt/solver-1.2.jar');
  });

  it('quotes spaces, empty strings and single quotes', () => {
    expect(quoteArg('my cases')).toBe("'my cases'");
    expect(quoteArg('')).toBe("''");
    expect(quoteArg("it's")).toBe("'it'\\''s'");
  });
});

describe('formatCommand', () => {
  it('joins quoted arguments', () => {
    expect(formatCommand(['java', '-jar', '/a b/solver.jar'])).toBe("java -jar '/a b/solver.jar'");
  });
});

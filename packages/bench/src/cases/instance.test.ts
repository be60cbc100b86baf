import { LoadError } from '@packbench/shared';
import { parseInstance, serializeInstance } from './instance';

const FIXED = `container height: fixed 22
rotations allowed: no
number of rectangles: 2
12 8
10 9
`;

describe('parseInstance', () => {
  it('parses a fixed-height instance', () => {
    expect(parseInstance(FIXED)).toEqual({
      variant: { kind: 'fixed', height: 22 },
      allowRotation: false,
      rectangles: [
        { width: 12, height: 8 },
        { width: 10, height: 9 },
      ],
    });
  });

  it('parses the bounding box line and tolerates CRLF and trailing blanks', () => {
    const text =
      'container height: free\r\nrotations allowed: yes\r\nnumber of rectangles: 1\r\nbounding box: 4 5\r\n4 5\r\n\r\n';
    expect(parseInstance(text)).toEqual({
      variant: { kind: 'free' },
      allowRotation: true,
      rectangles: [{ width: 4, height: 5 }],
      boundingBox: { width: 4, height: 5 },
    });
  });

  it('names the line of a non-numeric dimension', () => {
    const text = FIXED.replace('10 9', '10 nine');
    let caught: unknown;
    try {
      parseInstance(text, 'cases/c01.txt');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(LoadError);
    expect(caught).toMatchObject({
      path: 'cases/c01.txt',
      line: 5,
      message: 'Invalid rectangle height: expected a positive integer, got "nine"',
    });
  });

  it('rejects non-positive dimensions', () => {
    expect(() => parseInstance(FIXED.replace('12 8', '0 8'))).toThrow(
      'Invalid rectangle width: expected a positive integer, got "0"',
    );
  });

  it('rejects an unknown variant', () => {
    expect(() => parseInstance(FIXED.replace('fixed 22', 'elastic'))).toThrow(
      'Invalid container height: elastic',
    );
  });

  it('rejects a bad rotation line', () => {
    expect(() => parseInstance(FIXED.replace('no', 'maybe'))).toThrow(
      'Invalid format: rotations allowed: maybe',
    );
  });

  it('rejects a rectangle count that disagrees with the header', () => {
    expect(() => parseInstance(FIXED.replace('rectangles: 2', 'rectangles: 3'))).toThrow(
      'Rectangle count mismatch: header declares 3, found 2',
    );
  });

  it('rejects a truncated header', () => {
    expect(() => parseInstance('container height: free\n')).toThrow(
      'Unexpected end of file: incomplete instance header',
    );
  });
});

describe('serializeInstance', () => {
  it('renders the canonical form', () => {
    expect(serializeInstance(parseInstance(FIXED))).toBe(FIXED);
  });

  it('keeps the bounding box only on request', () => {
    const instance = parseInstance(
      'container height: free\nrotations allowed: no\nnumber of rectangles: 1\nbounding box: 3 3\n3 3\n',
    );
    expect(serializeInstance(instance)).toBe(
      'container height: free\nrotations allowed: no\nnumber of rectangles: 1\n3 3\n',
    );
    expect(serializeInstance(instance, { includeBoundingBox: true })).toBe(
      'container height: free\nrotations allowed: no\nnumber of rectangles: 1\nbounding box: 3 3\n3 3\n',
    );
  });
});

import { normalizePath, relative, caseIdFromPath, isWindows } from './path';

describe('path', () => {
  describe('normalizePath', () => {
    it('should replace backslashes with forward slashes', () => {
      expect(normalizePath('foo\\bar')).toBe('foo/bar');
    });

    it('should not alter paths with forward slashes', () => {
      expect(normalizePath('foo/bar')).toBe('foo/bar');
    });
  });

  describe('relative', () => {
    it('should return relative path with forward slashes', () => {
      expect(relative('/home/user/bench', '/home/user/bench/cases/c01.txt')).toBe('cases/c01.txt');
    });

    it('should handle parent directory traversal', () => {
      expect(relative('/home/user/bench/cases', '/home/user/bench/solver')).toBe('../solver');
    });
  });

  describe('caseIdFromPath', () => {
    it('drops directory and last extension', () => {
      expect(caseIdFromPath('/data/cases/c01.txt')).toBe('c01');
      expect(caseIdFromPath('cases/set.a.in')).toBe('set.a');
    });

    it('keeps names without extension and dotfiles intact', () => {
      expect(caseIdFromPath('cases/c02')).toBe('c02');
      expect(caseIdFromPath('cases/.hidden')).toBe('.hidden');
    });
  });

  describe('isWindows', () => {
    it('should return a boolean', () => {
      expect(typeof isWindows()).toBe('boolean');
    });
  });
});

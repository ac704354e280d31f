import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { DirectoryWalker, WalkerFs } from './index';

function systemError(code: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: simulated`), { code });
}

/**
 * Real filesystem, except that `readdir` on `dir` fails with `code` from the
 * `fromCall`-th call on (1-based).
 */
function failingReaddir(dir: string, code: string, fromCall = 1): WalkerFs {
  let calls = 0;
  return {
    readdir: async (p, options) => {
      if (p === dir) {
        calls++;
        if (calls >= fromCall) throw systemError(code);
      }
      return fs.readdir(p, options);
    },
    stat: (p) => fs.stat(p),
  };
}

describe('DirectoryWalker', () => {
  let tmpDir: string;
  let walker: DirectoryWalker;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'checkwalk-walker-test-'));
    walker = new DirectoryWalker();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  const inTmp = (...names: string[]) => names.map((n) => path.join(tmpDir, n)).sort();

  describe('listDirectory', () => {
    it('returns every file when nothing is excluded', async () => {
      await createFiles({ 'a.txt': 'a', 'b.log': 'b', 'c.csv': 'c' });

      const files = await walker.listDirectory(tmpDir, '', '*');
      expect(files).toHaveLength(3);
      expect(files.sort()).toEqual(inTmp('a.txt', 'b.log', 'c.csv'));
    });

    it('returns an empty list for a missing directory', async () => {
      await expect(walker.listDirectory(path.join(tmpDir, 'missing'))).resolves.toEqual([]);
    });

    it('returns an empty list when the path is a file', async () => {
      await createFiles({ 'a.txt': 'a' });
      await expect(walker.listDirectory(path.join(tmpDir, 'a.txt'))).resolves.toEqual([]);
    });

    it('removes paths matching the exclude glob', async () => {
      await createFiles({ 'a.txt': 'a', 'b.log': 'b' });

      const files = await walker.listDirectory(tmpDir, '*.log', '*');
      expect(files).toEqual(inTmp('a.txt'));
    });

    it('matches the match glob against the whole file name', async () => {
      await createFiles({ 'a.csv': 'a', 'b.csv': 'b', 'c.bak': 'c', 'd.csv.bak': 'd' });

      const files = await walker.listDirectory(tmpDir, '', '*.csv');
      expect(files.sort()).toEqual(inTmp('a.csv', 'b.csv'));
    });

    it('does not match a bare extension as a substring of the name', async () => {
      await createFiles({ 'data.csv': 'x' });

      await expect(walker.listDirectory(tmpDir, '', 'csv')).resolves.toEqual([]);
    });

    it('treats ? as exactly one character', async () => {
      await createFiles({ 'file1.txt': '1', 'file2.txt': '2', 'file10.txt': '10' });

      const files = await walker.listDirectory(tmpDir, '', 'file?.txt');
      expect(files.sort()).toEqual(inTmp('file1.txt', 'file2.txt'));
    });

    it('treats . in the match glob literally', async () => {
      await createFiles({ 'a.txt': 'a', 'aXtxt': 'b' });

      const files = await walker.listDirectory(tmpDir, '', 'a.txt');
      expect(files).toEqual(inTmp('a.txt'));
    });

    it('does not list subdirectories or their files', async () => {
      await createFiles({ 'a.txt': 'a', 'sub.txt/inner.txt': 'x' });

      const files = await walker.listDirectory(tmpDir, '', '*.txt');
      expect(files).toEqual(inTmp('a.txt'));
    });

    it('includes symlinks to files and skips dangling links', async () => {
      await createFiles({ 'a.txt': 'a' });
      await fs.symlink(path.join(tmpDir, 'a.txt'), path.join(tmpDir, 'link.txt'));
      await fs.symlink(path.join(tmpDir, 'gone.txt'), path.join(tmpDir, 'dangling.txt'));

      const files = await walker.listDirectory(tmpDir);
      expect(files.sort()).toEqual(inTmp('a.txt', 'link.txt'));
    });

    it('returns an empty list when access is denied', async () => {
      await createFiles({ 'a.txt': 'a' });
      const denied = new DirectoryWalker(failingReaddir(tmpDir, 'EACCES'));

      await expect(denied.listDirectory(tmpDir)).resolves.toEqual([]);
    });

    it('propagates unrelated filesystem errors', async () => {
      const broken = new DirectoryWalker(failingReaddir(tmpDir, 'EIO'));

      await expect(broken.listDirectory(tmpDir)).rejects.toMatchObject({ code: 'EIO' });
    });
  });

  describe('listRecursive', () => {
    beforeEach(async () => {
      await createFiles({
        'a.txt': 'a',
        'one/b.txt': 'b',
        'one/deep/c.txt': 'c',
        'two/d.txt': 'd',
        'two/e.log': 'e',
      });
    });

    it('stays in the base directory without recurse', async () => {
      const files = await walker.listRecursive(tmpDir, '', '*', false);
      expect(files).toEqual(inTmp('a.txt'));
    });

    it('collects files from every level with recurse', async () => {
      const files = await walker.listRecursive(tmpDir, '', '*.txt', true);
      expect(files.sort()).toEqual(
        inTmp('a.txt', 'one/b.txt', 'one/deep/c.txt', 'two/d.txt'),
      );
    });

    it('applies the exclude glob to directory components', async () => {
      const files = await walker.listRecursive(tmpDir, '*deep*', '*', true);
      expect(files.sort()).toEqual(inTmp('a.txt', 'one/b.txt', 'two/d.txt', 'two/e.log'));
    });

    it('follows symlinked subdirectories', async () => {
      await createFiles({ 'real/x.txt': 'x' });
      await fs.symlink(path.join(tmpDir, 'real'), path.join(tmpDir, 'link'));

      const files = await walker.listRecursive(tmpDir, '', 'x.txt', true);
      expect(files.sort()).toEqual(inTmp('link/x.txt', 'real/x.txt'));
    });

    it('ends a symlink cycle once the path can no longer be resolved', async () => {
      await createFiles({ 'loop/x.txt': 'x' });
      await fs.symlink(path.join(tmpDir, 'loop'), path.join(tmpDir, 'loop', 'self'));

      const files = await walker.listRecursive(path.join(tmpDir, 'loop'), '', 'x.txt', true);
      expect(files).toContain(path.join(tmpDir, 'loop', 'x.txt'));
      expect(files).toContain(path.join(tmpDir, 'loop', 'self', 'x.txt'));
      expect(files.every((f) => f.endsWith('x.txt'))).toBe(true);
    });

    it('returns an empty list for a missing base directory', async () => {
      await expect(
        walker.listRecursive(path.join(tmpDir, 'missing'), '', '*', true),
      ).resolves.toEqual([]);
    });

    it('skips only the denied subtree when a subdirectory cannot be read', async () => {
      const locked = path.join(tmpDir, 'one');
      const denied = new DirectoryWalker(failingReaddir(locked, 'EPERM'));

      const files = await denied.listRecursive(tmpDir, '', '*', true);
      expect(files.sort()).toEqual(inTmp('a.txt', 'two/d.txt', 'two/e.log'));
    });

    it('drops every subdirectory at a level whose discovery is denied', async () => {
      // First readdir (file listing) succeeds, second (subdirectory discovery) fails.
      const denied = new DirectoryWalker(failingReaddir(tmpDir, 'EACCES', 2));

      const files = await denied.listRecursive(tmpDir, '', '*', true);
      expect(files).toEqual(inTmp('a.txt'));
    });
  });

  describe('walk', () => {
    it('reports ok when nothing was skipped', async () => {
      await createFiles({ 'a.txt': 'a' });

      const result = await walker.walk(tmpDir, '', '*', true);
      expect(result).toEqual({ kind: 'ok', files: inTmp('a.txt') });
    });

    it('reports skipped directories once', async () => {
      await createFiles({ 'a.txt': 'a', 'locked/b.txt': 'b' });
      const locked = path.join(tmpDir, 'locked');
      const denied = new DirectoryWalker(failingReaddir(locked, 'EACCES'));

      const result = await denied.walk(tmpDir, '', '*', true);
      expect(result).toEqual({
        kind: 'partial',
        files: inTmp('a.txt'),
        skipped: [{ path: locked, reason: 'access-denied' }],
      });
    });
  });
});

import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { isAccessDenied, isPathNotFound } from '@checkwalk/shared';
import { globToRegExp } from './glob';
import type { SkippedPath, WalkResult, WalkerFs } from './types';

export * from './types';
export * from './glob';

type Listing = { kind: 'ok'; entries: Dirent[] } | { kind: 'denied' };

function toResult(files: string[], skipped: SkippedPath[]): WalkResult {
  return skipped.length > 0 ? { kind: 'partial', files, skipped } : { kind: 'ok', files };
}

export class DirectoryWalker {
  private fs: WalkerFs;

  constructor(fs: WalkerFs = nodeFs) {
    this.fs = fs;
  }

  /**
   * Files directly inside `dir` whose name matches `matchGlob`, minus any path
   * matching `excludeGlob`. A missing or unreadable directory yields `[]`.
   */
  async listDirectory(dir: string, excludeGlob = '', matchGlob = '*'): Promise<string[]> {
    const result = await this.readDirectory(dir, excludeGlob, matchGlob);
    return result.files;
  }

  /**
   * `listDirectory(basePath)` followed, when `recurse` is set, by the same
   * listing for every subdirectory below it.
   */
  async listRecursive(
    basePath: string,
    excludeGlob = '',
    matchGlob = '*',
    recurse = false,
  ): Promise<string[]> {
    const result = await this.walk(basePath, excludeGlob, matchGlob, recurse);
    return result.files;
  }

  /**
   * Same traversal as `listRecursive`, also reporting the directories that
   * were skipped because access was denied.
   *
   * When subdirectory discovery at a level is denied, every remaining result
   * at that level is dropped, including sibling subdirectories not yet visited.
   */
  async walk(
    basePath: string,
    excludeGlob: string,
    matchGlob: string,
    recurse: boolean,
  ): Promise<WalkResult> {
    const listing = await this.readDirectory(basePath, excludeGlob, matchGlob);
    const files = [...listing.files];
    const skipped = listing.kind === 'partial' ? [...listing.skipped] : [];

    if (!recurse) {
      return toResult(files, skipped);
    }

    try {
      for (const subDir of await this.listSubdirectories(basePath)) {
        const child = await this.walk(subDir, excludeGlob, matchGlob, recurse);
        files.push(...child.files);
        if (child.kind === 'partial') {
          skipped.push(...child.skipped);
        }
      }
    } catch (error) {
      if (!isAccessDenied(error)) throw error;
      if (!skipped.some((s) => s.path === basePath)) {
        skipped.push({ path: basePath, reason: 'access-denied' });
      }
    }

    return toResult(files, skipped);
  }

  private async readDirectory(
    dir: string,
    excludeGlob: string,
    matchGlob: string,
  ): Promise<WalkResult> {
    const listing = await this.readEntries(dir);
    if (listing.kind === 'denied') {
      return toResult([], [{ path: dir, reason: 'access-denied' }]);
    }

    const match = globToRegExp(matchGlob, { anchored: true });
    const exclude = excludeGlob ? globToRegExp(excludeGlob) : undefined;

    const files: string[] = [];
    for (const entry of listing.entries) {
      if (!match.test(entry.name)) continue;

      const filePath = path.join(dir, entry.name);
      if (exclude?.test(filePath)) continue;
      if (!(await this.isFile(entry, filePath))) continue;

      files.push(filePath);
    }
    return toResult(files, []);
  }

  private async readEntries(dir: string): Promise<Listing> {
    try {
      return { kind: 'ok', entries: await this.fs.readdir(dir, { withFileTypes: true }) };
    } catch (error) {
      if (isPathNotFound(error)) return { kind: 'ok', entries: [] };
      if (isAccessDenied(error)) return { kind: 'denied' };
      throw error;
    }
  }

  private async listSubdirectories(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await this.fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (isPathNotFound(error)) return [];
      throw error;
    }
    const subDirs: string[] = [];
    for (const entry of entries) {
      const subDir = path.join(dir, entry.name);
      if (await this.isDirectory(entry, subDir)) subDirs.push(subDir);
    }
    return subDirs;
  }

  private async isFile(entry: Dirent, filePath: string): Promise<boolean> {
    if (entry.isFile()) return true;
    if (!entry.isSymbolicLink()) return false;
    return (await this.statLinkTarget(filePath))?.isFile() ?? false;
  }

  private async isDirectory(entry: Dirent, dirPath: string): Promise<boolean> {
    if (entry.isDirectory()) return true;
    if (!entry.isSymbolicLink()) return false;
    return (await this.statLinkTarget(dirPath))?.isDirectory() ?? false;
  }

  /**
   * Follows a symlink. A link cycle ends here once the OS refuses to resolve
   * the path (ELOOP or ENAMETOOLONG).
   */
  private async statLinkTarget(linkPath: string): Promise<Stats | undefined> {
    try {
      return await this.fs.stat(linkPath);
    } catch (error) {
      // Dangling, looping or unreadable link target
      if (isPathNotFound(error) || isAccessDenied(error)) return undefined;
      throw error;
    }
  }
}

import type { Dirent, Stats } from 'node:fs';

/**
 * The slice of `fs/promises` the walker reads through.
 */
export interface WalkerFs {
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  stat(path: string): Promise<Stats>;
}

export interface SkippedPath {
  path: string;
  reason: 'access-denied';
}

export type WalkResult =
  | { kind: 'ok'; files: string[] }
  | { kind: 'partial'; files: string[]; skipped: SkippedPath[] };

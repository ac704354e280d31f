import nodeFs from 'node:fs';
import { createHash, type Hash } from 'node:crypto';
import type { Readable } from 'node:stream';
import {
  ChecksumKind,
  ChecksumKindSchema,
  InvalidChecksumKindError,
  isSystemError,
} from '@checkwalk/shared';

/** Returned by `computeChecksum` when the file could not be read. Never a valid digest. */
export const EMPTY_DIGEST = '';

/**
 * The slice of `fs` the digest computer reads through.
 */
export interface DigestFs {
  createReadStream(path: string): Readable;
}

const DIGEST_LENGTHS: Record<ChecksumKind, number> = {
  MD5: 32,
  SHA1: 40,
  SHA256: 64,
  SHA512: 128,
};

/**
 * Node's algorithm name for a checksum kind. Kinds outside the supported set
 * can only arrive from untyped callers and are rejected.
 */
export function hashAlgorithmFor(kind: ChecksumKind): string {
  switch (kind) {
    case 'MD5':
      return 'md5';
    case 'SHA1':
      return 'sha1';
    case 'SHA256':
      return 'sha256';
    case 'SHA512':
      return 'sha512';
    default:
      throw new InvalidChecksumKindError(String(kind));
  }
}

/**
 * Hex length of a digest of the given kind.
 */
export function digestLength(kind: ChecksumKind): number {
  return DIGEST_LENGTHS[kind];
}

/**
 * Parses a user-supplied kind name. Case and dashes are ignored, so
 * `sha-256`, `Sha256` and `SHA256` are equivalent.
 */
export function parseChecksumKind(value: string): ChecksumKind {
  const result = ChecksumKindSchema.safeParse(value.toUpperCase().replace(/-/g, ''));
  if (!result.success) {
    throw new InvalidChecksumKindError(value);
  }
  return result.data;
}

export class DigestComputer {
  private fs: DigestFs;

  constructor(fs: DigestFs = nodeFs) {
    this.fs = fs;
  }

  /**
   * Lowercase hex digest of the file's full contents, or `EMPTY_DIGEST` when
   * the file cannot be opened or read.
   *
   * @throws InvalidChecksumKindError before the file is opened
   */
  async computeChecksum(filePath: string, kind: ChecksumKind): Promise<string> {
    const hasher: Hash = createHash(hashAlgorithmFor(kind));
    let stream: Readable | undefined;

    try {
      stream = this.fs.createReadStream(filePath);
      for await (const chunk of stream) {
        hasher.update(chunk);
      }
      return hasher.digest('hex');
    } catch (error) {
      if (isSystemError(error)) {
        return EMPTY_DIGEST;
      }
      throw error;
    } finally {
      stream?.destroy();
      hasher.destroy();
    }
  }
}

import {
  ChecksumKind,
  Logger,
  ScanRequestInput,
  SilentLogger,
  parseScanRequest,
} from '@checkwalk/shared';
import { DirectoryWalker } from '../walker';
import { DigestComputer, EMPTY_DIGEST, hashAlgorithmFor } from '../digest';

export interface FileChecksum {
  path: string;
  /** Lowercase hex digest, or `EMPTY_DIGEST` when the file could not be read. */
  digest: string;
}

export interface ChecksumScannerOptions {
  walker?: DirectoryWalker;
  digests?: DigestComputer;
  logger?: Logger;
}

/**
 * Feeds walker output, one path at a time, into the digest computer.
 */
export class ChecksumScanner {
  private walker: DirectoryWalker;
  private digests: DigestComputer;
  private logger: Logger;

  constructor(options: ChecksumScannerOptions = {}) {
    this.walker = options.walker ?? new DirectoryWalker();
    this.digests = options.digests ?? new DigestComputer();
    this.logger = options.logger ?? new SilentLogger();
  }

  async scan(input: ScanRequestInput, kind: ChecksumKind): Promise<FileChecksum[]> {
    const request = parseScanRequest(input);
    // Reject an unsupported kind even when the walk finds nothing to hash.
    hashAlgorithmFor(kind);

    const log = this.logger.child({ basePath: request.basePath });
    const walked = await this.walker.walk(
      request.basePath,
      request.excludeGlob,
      request.matchGlob,
      request.recurse,
    );

    if (walked.kind === 'partial') {
      for (const skipped of walked.skipped) {
        await log.debug(`Skipped ${skipped.path} (${skipped.reason})`);
      }
    }

    const results: FileChecksum[] = [];
    for (const filePath of walked.files) {
      const digest = await this.digests.computeChecksum(filePath, kind);
      if (digest === EMPTY_DIGEST) {
        await log.warn(`Could not compute ${kind} checksum for ${filePath}`);
      }
      results.push({ path: filePath, digest });
    }

    await log.info(`Computed ${kind} checksums for ${results.length} file(s)`);
    return results;
  }
}

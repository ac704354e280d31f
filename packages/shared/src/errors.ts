/**
 * Error codes used throughout checkwalk.
 */
export type ErrorCode = 'ConfigError' | 'InvalidChecksumKind';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all checkwalk errors.
 * Carries a classification code, an optional cause and optional details.
 *
 * @example
 * ```typescript
 * throw new AppError('ConfigError', 'scan.basePath is required', {
 *   details: { profile: 'checksums.yaml' },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when a scan request or profile is invalid or missing.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when a checksum kind outside MD5/SHA1/SHA256/SHA512 is requested.
 */
export class InvalidChecksumKindError extends AppError {
  /** The rejected kind, as supplied by the caller */
  public readonly kind: string;

  constructor(kind: string, options: AppErrorOptions = {}) {
    super('InvalidChecksumKind', `Unsupported checksum kind "${kind}"`, options);
    this.kind = kind;
  }
}

/**
 * A Node.js system error carrying an errno-style `code` such as `ENOENT`.
 */
export type SystemError = Error & { code: string };

// errno names (EACCES, EISDIR); Node's own ERR_* codes mark programming errors.
const ERRNO_CODE = /^E[A-Z0-9]+$/;

/**
 * Narrows an unknown thrown value to a Node.js system error.
 */
export function isSystemError(error: unknown): error is SystemError {
  return (
    error instanceof Error &&
    !(error instanceof AppError) &&
    'code' in error &&
    typeof error.code === 'string' &&
    ERRNO_CODE.test(error.code)
  );
}

const ACCESS_DENIED_CODES = new Set(['EACCES', 'EPERM']);
const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'ELOOP', 'ENAMETOOLONG']);

/** Permission failures on a file or directory. */
export function isAccessDenied(error: unknown): error is SystemError {
  return isSystemError(error) && ACCESS_DENIED_CODES.has(error.code);
}

/**
 * The path, or one of its parents, does not exist, is not a directory, or
 * cannot be resolved (symlink loop, path too long).
 */
export function isPathNotFound(error: unknown): error is SystemError {
  return isSystemError(error) && NOT_FOUND_CODES.has(error.code);
}

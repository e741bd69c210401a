/**
 * Error codes used throughout sstable-age.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'PermissionError'
  | 'UnexpectedError'
  | 'AbortError'
  | 'UnknownError';

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
 * Base error class for all sstable-age errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('PermissionError', 'Could not list directory', {
 *   cause: originalError,
 *   details: { path: '/mnt/cassandra/ks1' }
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
 * Error thrown when configuration is invalid, or the scan root is missing.
 * User-correctable - suggests fixing the root path or flags.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when a directory cannot be listed for lack of permission.
 * A partial scan could miss the true oldest file, so this aborts the whole scan.
 */
export class PermissionError extends AppError {
  /** Directory whose listing was denied */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('PermissionError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown for any other fault met while traversing the tree.
 */
export class UnexpectedScanError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UnexpectedError', message, options);
  }
}

/**
 * Error thrown when a scan is cancelled through its abort signal.
 */
export class ScanAbortedError extends AppError {
  constructor(message = 'Scan was aborted.', options: AppErrorOptions = {}) {
    super('AbortError', message, options);
  }
}

/**
 * Reads the `code` property Node attaches to system errors (`ENOENT`, `EACCES`, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Human-readable description of an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

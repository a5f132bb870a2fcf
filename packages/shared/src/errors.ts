/**
 * Error codes used throughout repowarden.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ScanError'
  | 'CacheError'
  | 'GitCommandError'
  | 'SummarizerError'
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
 * Base error class for all repowarden errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('CacheError', 'Failed to write cache file', {
 *   cause: originalError,
 *   details: { filePath: '/srv/repos/.repowarden_cache.txt' }
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
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage or an API call sequence is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error recorded when part of the directory tree cannot be scanned.
 */
export class ScanError extends AppError {
  /** Directory the failure applies to */
  public readonly path: string;

  constructor(path: string, message: string, options: AppErrorOptions = {}) {
    super('ScanError', message, options);
    this.path = path;
  }
}

/**
 * Error thrown when the cache file cannot be read or written,
 * or when a key/value cannot be represented in the file format.
 */
export class CacheError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('CacheError', message, options);
  }
}

/**
 * Error describing a failed git invocation.
 * Carries the command line, exit code and (redacted) stderr.
 */
export class GitCommandError extends AppError {
  public readonly command: string;
  /** Exit code of the git process, null when it could not be started */
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(
    command: string,
    message: string,
    options: AppErrorOptions & { exitCode?: number | null; stderr?: string } = {},
  ) {
    super('GitCommandError', message, options);
    this.command = command;
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';
  }
}

/**
 * Error thrown when a summarizer cannot produce a commit message.
 */
export class SummarizerError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('SummarizerError', message, options);
  }
}

/**
 * Wraps any thrown value in an AppError, keeping AppErrors as they are.
 */
export function toAppError(error: unknown, fallbackMessage = 'Unexpected error'): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError('UnknownError', error.message || fallbackMessage, { cause: error });
  }
  return new AppError('UnknownError', fallbackMessage, { details: String(error) });
}

/**
 * Returns the exit code the CLI should use for an error.
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof ConfigError || error instanceof UsageError ? 2 : 1;
}

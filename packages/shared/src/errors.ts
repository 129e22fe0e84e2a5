/**
 * Error codes used throughout the indexing engine.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'ProviderError'
  | 'RateLimitError'
  | 'TimeoutError'
  | 'ParseError'
  | 'IndexError'
  | 'StoreError'
  | 'NotFoundError'
  | 'ConflictError'
  | 'StateError'
  | 'CancelledError'
  | 'InterruptedError'
  | 'GitError'
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
 * Base error class for all engine errors.
 *
 * @example
 * ```typescript
 * throw new AppError('ProviderError', 'Embedding request failed', {
 *   cause: originalError,
 *   details: { statusCode: 500, provider: 'openai' }
 * });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown> | string;
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
 * Invalid or missing configuration.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Incorrect use of the API or CLI, including malformed repository references.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * An embedding provider failed. `retriable` marks failures worth another attempt.
 */
export class ProviderError extends AppError {
  public readonly retriable: boolean;

  constructor(message: string, options: AppErrorOptions & { retriable?: boolean } = {}) {
    super('ProviderError', message, options);
    this.retriable = options.retriable ?? false;
  }
}

/**
 * Rate limited by a provider.
 */
export class RateLimitError extends AppError {
  /** Suggested wait time in seconds before retrying */
  public readonly retryAfter?: number;

  constructor(message: string, options: AppErrorOptions & { retryAfter?: number } = {}) {
    super('RateLimitError', message, options);
    this.retryAfter = options.retryAfter;
  }
}

export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * A single file could not be parsed. The pipeline skips the file.
 */
export class ParseError extends AppError {
  public readonly filePath: string;

  constructor(filePath: string, message: string, options: AppErrorOptions = {}) {
    super('ParseError', `${filePath}: ${message}`, options);
    this.filePath = filePath;
  }
}

/**
 * Structural indexing failure, e.g. a full reindex that produced no chunks.
 */
export class IndexError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('IndexError', message, options);
  }
}

export class StoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('StoreError', message, options);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('NotFoundError', message, options);
  }
}

/**
 * A submission collided with the repository's active task.
 */
export class TaskConflictError extends AppError {
  public readonly existingTaskId: string;

  constructor(repoId: string, existingTaskId: string, options: AppErrorOptions = {}) {
    super(
      'ConflictError',
      `Repository ${repoId} already has an active task: ${existingTaskId}`,
      options,
    );
    this.existingTaskId = existingTaskId;
  }
}

export class InvalidTransitionError extends AppError {
  constructor(from: string, to: string, options: AppErrorOptions = {}) {
    super('StateError', `Invalid task transition: ${from} -> ${to}`, options);
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Task was cancelled', options: AppErrorOptions = {}) {
    super('CancelledError', message, options);
  }
}

export class InterruptedError extends AppError {
  constructor(message = 'Task was interrupted', options: AppErrorOptions = {}) {
    super('InterruptedError', message, options);
  }
}

export class GitError extends AppError {
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('GitError', message, options);
    this.exitCode = options.exitCode;
  }
}

const TRANSIENT_NETWORK_CODES = new Set([
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
]);

function readNumberField(value: unknown, key: string): number | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

function readStringField(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' ? field : undefined;
}

/**
 * True when an error is worth retrying: rate limits, timeouts, 5xx responses
 * and dropped connections.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof ProviderError) {
    return error.retriable;
  }
  if (error instanceof AppError) {
    return false;
  }

  const status = readNumberField(error, 'status') ?? readNumberField(error, 'statusCode');
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  const code =
    readStringField(error, 'code') ??
    (typeof error === 'object' && error !== null && 'cause' in error
      ? readStringField(Reflect.get(error, 'cause'), 'code')
      : undefined);
  return code !== undefined && TRANSIENT_NETWORK_CODES.has(code);
}

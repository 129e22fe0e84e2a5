import type { Logger } from '@repoindex/shared';

/**
 * Retry behaviour for transient provider failures.
 *
 * @example
 * ```typescript
 * const retryOptions: RetryOptions = {
 *   maxRetries: 5,
 *   initialDelayMs: 2000,
 *   maxDelayMs: 30000,
 *   backoffFactor: 1.5,
 * };
 * ```
 */
export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Delay before the first retry. Default: 1000 */
  initialDelayMs?: number;
  /** Cap on any single delay. Default: 10000 */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff. Default: 2 */
  backoffFactor?: number;
}

/**
 * Per-request context for provider calls.
 */
export interface AdapterContext {
  /** Task (or synthetic run) the request belongs to */
  runId: string;
  logger: Logger;
  /** Cancels the request; an aborted request is never retried */
  abortSignal?: AbortSignal;
  /** Per-attempt ceiling */
  timeoutMs?: number;
  retryOptions?: RetryOptions;
}

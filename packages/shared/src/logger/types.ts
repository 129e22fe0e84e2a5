import type { EngineEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logging surface used by every package.
 *
 * Structured engine events go through `log`/`trace`; free-form diagnostics go
 * through the level methods.
 *
 * @example
 * ```typescript
 * logger.log({ type: 'FileSkipped', ...eventEnvelope(taskId), payload: { path, reason } });
 * logger.child({ taskId }).info('Parsing 12 files');
 * ```
 */
export interface Logger {
  /** Persist a structured engine event */
  log(event: EngineEvent): MaybePromise<void>;

  /** Structured event plus a human-readable summary */
  trace(event: EngineEvent, message: string): MaybePromise<void>;

  debug(message: string): MaybePromise<void>;
  info(message: string): MaybePromise<void>;
  warn(message: string): MaybePromise<void>;
  error(error: Error, message?: string): MaybePromise<void>;

  /**
   * Child logger whose messages carry `bindings` as a `[k=v]` prefix.
   */
  child(bindings: Record<string, unknown>): Logger;
}

import { ConfigError, TimeoutError, eventEnvelope, isTransientError } from '@repoindex/shared';
import type { AdapterContext, RetryOptions } from '../types';

export { ConcurrencyGate } from './gate';
export type { GateTask } from './gate';

/**
 * Defaults for provider retries.
 *
 * Retried: `RateLimitError`, `TimeoutError`, retriable `ProviderError`s,
 * HTTP 429 and 5xx, and dropped connections (see `isTransientError`).
 * Never retried: `ConfigError`, other 4xx responses and caller aborts.
 *
 * ```
 * delay = min(maxDelayMs, initialDelayMs * backoffFactor ^ (attempt - 1))
 * finalDelay = max(0, delay +/- 10% jitter)
 * ```
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffFactor: 2,
};

export function computeRetryDelay(attempt: number, options: Required<RetryOptions>): number {
  const delay = Math.min(
    options.maxDelayMs,
    options.initialDelayMs * Math.pow(options.backoffFactor, attempt - 1),
  );
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.max(0, delay + jitter);
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a provider call with a per-attempt timeout, caller cancellation and
 * exponential-backoff retries, logging `ProviderRequestStarted` and
 * `ProviderRequestFinished`.
 *
 * ```typescript
 * const vectors = await executeProviderRequest(ctx, 'openai', model, (signal) =>
 *   client.embeddings.create({ model, input }, { signal }),
 * );
 * ```
 */
export async function executeProviderRequest<T>(
  ctx: AdapterContext,
  provider: string,
  model: string,
  requestFn: (signal: AbortSignal) => Promise<T>,
  optionsOverride: RetryOptions = {},
): Promise<T> {
  const options: Required<RetryOptions> = {
    ...DEFAULT_OPTIONS,
    ...ctx.retryOptions,
    ...optionsOverride,
  };

  const startTime = Date.now();

  await ctx.logger.log({
    type: 'ProviderRequestStarted',
    ...eventEnvelope(ctx.runId),
    payload: { provider, model },
  });

  let attempts = 0;
  let lastError: unknown;

  while (attempts <= options.maxRetries) {
    const abortController = new AbortController();
    const abortHandler = () => abortController.abort(ctx.abortSignal?.reason);

    if (ctx.abortSignal) {
      if (ctx.abortSignal.aborted) {
        abortController.abort(ctx.abortSignal.reason);
      } else {
        ctx.abortSignal.addEventListener('abort', abortHandler);
      }
    }

    let timeoutId: NodeJS.Timeout | undefined;
    if (ctx.timeoutMs) {
      const timeoutMs = ctx.timeoutMs;
      timeoutId = setTimeout(() => {
        abortController.abort(new TimeoutError(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    try {
      const result = await requestFn(abortController.signal);

      await ctx.logger.log({
        type: 'ProviderRequestFinished',
        ...eventEnvelope(ctx.runId),
        payload: {
          provider,
          durationMs: Date.now() - startTime,
          success: true,
          retries: attempts,
        },
      });

      return result;
    } catch (error: unknown) {
      // SDKs surface their own abort error; report our timeout instead.
      const reason: unknown = abortController.signal.reason;
      lastError =
        reason instanceof TimeoutError && !(error instanceof TimeoutError)
          ? new TimeoutError(reason.message, { cause: error })
          : error;

      if (ctx.abortSignal?.aborted) {
        throw error;
      }
      if (lastError instanceof ConfigError) {
        break;
      }
      if (!isTransientError(lastError) || attempts >= options.maxRetries) {
        break;
      }

      attempts++;
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
      if (ctx.abortSignal) ctx.abortSignal.removeEventListener('abort', abortHandler);
    }

    const delay = computeRetryDelay(attempts, options);
    await new Promise((resolve) => setTimeout(resolve, delay));
  }

  await ctx.logger.log({
    type: 'ProviderRequestFinished',
    ...eventEnvelope(ctx.runId),
    payload: {
      provider,
      durationMs: Date.now() - startTime,
      success: false,
      error: describeError(lastError),
      retries: attempts,
    },
  });

  throw lastError;
}

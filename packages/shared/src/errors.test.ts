import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  ParseError,
  ProviderError,
  RateLimitError,
  TaskConflictError,
  TimeoutError,
  InvalidTransitionError,
  UsageError,
  isTransientError,
} from './errors';

describe('AppError', () => {
  it('carries code, message, cause and details', () => {
    const cause = new Error('socket hang up');
    const error = new AppError('ProviderError', 'embed failed', { cause, details: { batch: 2 } });

    expect(error.code).toBe('ProviderError');
    expect(error.message).toBe('embed failed');
    expect(error.name).toBe('AppError');
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual({ batch: 2 });
  });

  it('names subclasses after themselves', () => {
    expect(new ConfigError('x').name).toBe('ConfigError');
    expect(new UsageError('x').code).toBe('UsageError');
  });
});

describe('domain errors', () => {
  it('formats parse errors with the file path', () => {
    const error = new ParseError('src/a.py', 'parse timed out');
    expect(error.message).toBe('src/a.py: parse timed out');
    expect(error.filePath).toBe('src/a.py');
  });

  it('reports the active task on conflict', () => {
    const error = new TaskConflictError('repo-1', 'task-9');
    expect(error.code).toBe('ConflictError');
    expect(error.existingTaskId).toBe('task-9');
    expect(error.message).toBe('Repository repo-1 already has an active task: task-9');
  });

  it('describes invalid transitions', () => {
    expect(new InvalidTransitionError('completed', 'parsing').message).toBe(
      'Invalid task transition: completed -> parsing',
    );
  });

  it('keeps retryAfter on rate limits', () => {
    expect(new RateLimitError('slow down', { retryAfter: 12 }).retryAfter).toBe(12);
  });
});

describe('isTransientError', () => {
  it('treats rate limits and timeouts as transient', () => {
    expect(isTransientError(new RateLimitError('429'))).toBe(true);
    expect(isTransientError(new TimeoutError('slow'))).toBe(true);
  });

  it('follows the retriable flag on provider errors', () => {
    expect(isTransientError(new ProviderError('503', { retriable: true }))).toBe(true);
    expect(isTransientError(new ProviderError('bad request'))).toBe(false);
  });

  it('never retries other application errors', () => {
    expect(isTransientError(new ConfigError('missing key'))).toBe(false);
    expect(isTransientError(new ParseError('a.py', 'x'))).toBe(false);
  });

  it('reads HTTP status codes from foreign errors', () => {
    expect(isTransientError({ status: 429 })).toBe(true);
    expect(isTransientError({ statusCode: 502 })).toBe(true);
    expect(isTransientError({ status: 400 })).toBe(false);
  });

  it('recognises network error codes, including on the cause', () => {
    expect(isTransientError({ code: 'ECONNRESET' })).toBe(true);
    expect(isTransientError({ cause: { code: 'EAI_AGAIN' } })).toBe(true);
    expect(isTransientError(new Error('plain'))).toBe(false);
  });
});

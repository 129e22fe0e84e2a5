import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import { ConfigError, ProviderError, RateLimitError, TimeoutError } from '@repoindex/shared';
import { OpenAIEmbedder } from './openai_embedder';

const { mockEmbeddingsCreate, mockConstructor } = vi.hoisted(() => ({
  mockEmbeddingsCreate: vi.fn(),
  mockConstructor: vi.fn(),
}));

vi.mock('openai', async (importOriginal) => {
  const actual = await importOriginal<typeof import('openai')>();
  return {
    ...actual,
    default: class MockOpenAI {
      embeddings = { create: mockEmbeddingsCreate };
      constructor(options: unknown) {
        mockConstructor(options);
      }
    },
  };
});

describe('OpenAIEmbedder', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('requires an API key', () => {
    expect(() => new OpenAIEmbedder({})).toThrow(ConfigError);
  });

  it('disables SDK retries and passes the base URL', () => {
    new OpenAIEmbedder({ apiKey: 'test-secret', baseUrl: 'http://localhost:8080/v1' });
    expect(mockConstructor).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'http://localhost:8080/v1',
      maxRetries: 0,
    });
  });

  it('embeds texts in input order and forwards the abort signal', async () => {
    mockEmbeddingsCreate.mockResolvedValue({
      data: [
        { index: 1, embedding: [3, 4] },
        { index: 0, embedding: [1, 2] },
      ],
    });
    const controller = new AbortController();
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret', model: 'm', dimensions: 2 });

    await expect(embedder.embedTexts(['a', 'b'], { signal: controller.signal })).resolves.toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(mockEmbeddingsCreate).toHaveBeenCalledWith(
      { model: 'm', input: ['a', 'b'], dimensions: 2 },
      { signal: controller.signal },
    );
  });

  it('skips the request for an empty batch', async () => {
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });
    await expect(embedder.embedTexts([])).resolves.toEqual([]);
    expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
  });

  it('rejects a response with the wrong number of embeddings', async () => {
    mockEmbeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [1] }] });
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });
    await expect(embedder.embedTexts(['a', 'b'])).rejects.toThrow(
      'OpenAI returned 1 embeddings for 2 inputs',
    );
  });

  it('maps rate limits with their retry-after header', async () => {
    mockEmbeddingsCreate.mockRejectedValue(
      new APIError(429, undefined, 'rate limited', { 'retry-after': '7' }),
    );
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    const error = await embedder.embedTexts(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfter: 7 });
  });

  it('maps auth failures to ConfigError', async () => {
    mockEmbeddingsCreate.mockRejectedValue(new APIError(401, undefined, 'unauthorized', {}));
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });
    await expect(embedder.embedTexts(['a'])).rejects.toBeInstanceOf(ConfigError);
  });

  it('marks server errors retriable and client errors permanent', async () => {
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    mockEmbeddingsCreate.mockRejectedValueOnce(new APIError(502, undefined, 'bad gateway', {}));
    const server = await embedder.embedTexts(['a']).catch((e: unknown) => e);
    expect(server).toBeInstanceOf(ProviderError);
    expect(server).toMatchObject({ retriable: true });

    mockEmbeddingsCreate.mockRejectedValueOnce(new APIError(400, undefined, 'too long', {}));
    const client = await embedder.embedTexts(['a']).catch((e: unknown) => e);
    expect(client).toMatchObject({ retriable: false });
  });

  it('maps connection failures and timeouts', async () => {
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });

    mockEmbeddingsCreate.mockRejectedValueOnce(new APIConnectionTimeoutError());
    await expect(embedder.embedTexts(['a'])).rejects.toBeInstanceOf(TimeoutError);

    mockEmbeddingsCreate.mockRejectedValueOnce(new APIConnectionError({ message: 'socket hang up' }));
    const dropped = await embedder.embedTexts(['a']).catch((e: unknown) => e);
    expect(dropped).toBeInstanceOf(ProviderError);
    expect(dropped).toMatchObject({ retriable: true, message: 'socket hang up' });
  });

  it('passes caller aborts through untouched', async () => {
    const abort = new APIUserAbortError();
    mockEmbeddingsCreate.mockRejectedValue(abort);
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });
    await expect(embedder.embedTexts(['a'])).rejects.toBe(abort);
  });

  it('wraps non-Error failures', async () => {
    mockEmbeddingsCreate.mockRejectedValue('boom');
    const embedder = new OpenAIEmbedder({ apiKey: 'test-secret' });
    await expect(embedder.embedTexts(['a'])).rejects.toThrow('boom');
  });

  it('reports dimensions and id', () => {
    expect(new OpenAIEmbedder({ apiKey: 'test-secret', model: 'm', dimensions: 12 }).dims()).toBe(12);
    expect(new OpenAIEmbedder({ apiKey: 'test-secret' }).dims()).toBe(1536);
    expect(
      new OpenAIEmbedder({ apiKey: 'test-secret', model: 'text-embedding-3-large' }).dims(),
    ).toBe(3072);
    expect(new OpenAIEmbedder({ apiKey: 'test-secret', model: 'unknown' }).dims()).toBe(0);
    expect(new OpenAIEmbedder({ apiKey: 'test-secret', model: 'm' }).id()).toBe('openai:m');
  });
});

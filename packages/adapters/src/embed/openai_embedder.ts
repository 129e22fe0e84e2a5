import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from 'openai';
import { ConfigError, ProviderError, RateLimitError, TimeoutError } from '@repoindex/shared';
import type { EmbedOptions, Embedder } from './embedder';

export interface OpenAIEmbedderConfig {
  apiKey?: string;
  model?: string;
  dimensions?: number;
  baseUrl?: string;
}

const DEFAULT_MODEL = 'text-embedding-3-small';

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: string;
  private dimensions?: number;

  constructor(config: OpenAIEmbedderConfig) {
    if (!config.apiKey) {
      throw new ConfigError('Missing API key for the OpenAI embedding provider');
    }
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions;
    // Retries and timeouts are handled by executeProviderRequest.
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
    });
  }

  async embedTexts(texts: string[], opts: EmbedOptions = {}): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.client.embeddings
      .create(
        {
          model: this.model,
          input: texts,
          dimensions: this.dimensions,
        },
        { signal: opts.signal },
      )
      .catch((error: unknown) => {
        throw this.mapError(error);
      });

    if (response.data.length !== texts.length) {
      throw new ProviderError(
        `OpenAI returned ${response.data.length} embeddings for ${texts.length} inputs`,
      );
    }
    return [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
  }

  dims(): number {
    return this.dimensions ?? MODEL_DIMENSIONS[this.model] ?? 0;
  }

  id(): string {
    return `openai:${this.model}`;
  }

  private mapError(error: unknown): unknown {
    if (error instanceof APIUserAbortError) {
      return error;
    }
    if (error instanceof APIConnectionTimeoutError) {
      return new TimeoutError(error.message, { cause: error });
    }
    if (error instanceof APIConnectionError) {
      return new ProviderError(error.message, { cause: error, retriable: true });
    }
    if (error instanceof APIError) {
      const status = error.status;
      if (status === 429) {
        const retryAfter = Number(error.headers?.['retry-after']);
        return new RateLimitError(error.message, {
          cause: error,
          retryAfter: Number.isFinite(retryAfter) ? retryAfter : undefined,
        });
      }
      if (status === 401 || status === 403) {
        return new ConfigError(error.message, { cause: error });
      }
      return new ProviderError(error.message, {
        cause: error,
        retriable: status !== undefined && status >= 500,
        details: { status, provider: 'openai' },
      });
    }
    return error instanceof Error ? error : new ProviderError(String(error));
  }
}

import { ConfigError, type EmbeddingsConfig } from '@repoindex/shared';
import type { Embedder } from './embedder';
import { OpenAIEmbedder } from './openai_embedder';
import { LocalHashEmbedder } from './local_hash_embedder';
import { CachingEmbedder } from './caching_embedder';

export function createEmbedder(
  config: EmbeddingsConfig,
  env: NodeJS.ProcessEnv = process.env,
): Embedder {
  let embedder: Embedder;
  switch (config.provider) {
    case 'openai': {
      const apiKey = env[config.apiKeyEnv];
      if (!apiKey) {
        throw new ConfigError(
          `Missing API key for the OpenAI embedding provider: set ${config.apiKeyEnv}`,
        );
      }
      embedder = new OpenAIEmbedder({
        apiKey,
        model: config.model,
        dimensions: config.dims,
        baseUrl: config.baseUrl,
      });
      break;
    }
    case 'local-hash':
      embedder = new LocalHashEmbedder(config.dims);
      break;
    default:
      throw new ConfigError(`Unsupported embedder provider: ${String(config.provider)}`);
  }

  return new CachingEmbedder(embedder);
}

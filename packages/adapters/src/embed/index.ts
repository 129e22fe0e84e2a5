export type { EmbedOptions, Embedder } from './embedder';
export { OpenAIEmbedder } from './openai_embedder';
export type { OpenAIEmbedderConfig } from './openai_embedder';
export { LocalHashEmbedder } from './local_hash_embedder';
export { CachingEmbedder } from './caching_embedder';
export { createEmbedder } from './factory';

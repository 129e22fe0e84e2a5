import { z } from 'zod';

export const DEFAULT_ORM_BASE_CLASSES = [
  'Base',
  'DeclarativeBase',
  'Model',
  'db.Model',
  'models.Model',
];

export const ChunkingConfigSchema = z
  .object({
    /** Token ceiling per chunk; larger units are split */
    maxChunkTokens: z.number().int().positive().default(6000),
    /** Lines shared by adjacent fragments of a split unit */
    overlapLines: z.number().int().nonnegative().default(20),
    /** Base-class names that mark a class as an ORM model (word-boundary match) */
    ormBaseClasses: z.array(z.string().min(1)).default(DEFAULT_ORM_BASE_CLASSES),
    maxFileSizeBytes: z.number().int().positive().default(1_000_000),
    /** Also index Markdown, reStructuredText, plain text and known config files */
    documents: z.boolean().default(true),
    maxDocumentSizeBytes: z.number().int().positive().default(100 * 1024),
    parseTimeoutMs: z.number().int().positive().default(5000),
    /** Extra ignore patterns, gitignore syntax */
    exclude: z.array(z.string()).default([]),
  })
  .refine((c) => c.overlapLines * 4 < c.maxChunkTokens, {
    message: 'overlapLines must be small relative to maxChunkTokens',
    path: ['overlapLines'],
  });

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  initialDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(10_000),
  backoffFactor: z.number().positive().default(2),
});

export const EmbeddingsConfigSchema = z.object({
  provider: z.enum(['openai', 'local-hash']).default('local-hash'),
  model: z.string().optional(),
  dims: z.number().int().positive().default(384),
  batchSize: z.number().int().positive().default(32),
  /** Process-wide ceiling on concurrent provider calls */
  concurrency: z.number().int().positive().default(4),
  /** Per provider call */
  timeoutMs: z.number().int().positive().default(30_000),
  apiKeyEnv: z.string().default('OPENAI_API_KEY'),
  /** OpenAI-compatible endpoint */
  baseUrl: z.string().url().optional(),
  retry: RetryConfigSchema.default({}),
});

export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;

export const StorageConfigSchema = z.object({
  /** Relational state (repositories, tasks, checkpoints, structural index) */
  statePath: z.string().default('.repoindex/state.sqlite'),
  vectors: z
    .object({
      backend: z.enum(['sqlite', 'memory']).default('sqlite'),
      path: z.string().default('.repoindex/vectors.sqlite'),
    })
    .default({}),
  /** Clones of remote repositories */
  reposDir: z.string().default('.repoindex/repos'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const PipelineConfigSchema = z.object({
  /** Task-level retries for transient failures */
  maxTaskRetries: z.number().int().nonnegative().default(2),
  /** Base delay; doubles with every retry */
  retryDelayMs: z.number().int().nonnegative().default(30_000),
  /** Idle interval between progress keep-alives */
  keepAliveMs: z.number().int().positive().default(15_000),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  jsonlPath: z.string().optional(),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  storage: StorageConfigSchema.default({}),
  chunking: ChunkingConfigSchema.default({}),
  embeddings: EmbeddingsConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

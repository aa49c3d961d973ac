import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const llmProviderSchema = z.enum(['openai', 'groq', 'openrouter', 'anthropic']);

export const configSchema = z
  .object({
    server: z.object({
      nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(8000),
      logLevel: logLevelSchema.default('info'),
      version: z.string().min(1).default('0.3.0'),
    }),
    qdrant: z.object({
      url: z.string().url().optional(),
      apiKey: z.string().min(1).optional(),
      host: z.string().min(1).default('localhost'),
      port: z.number().int().min(1).max(65535).default(6333),
      collection: z.string().min(1).default('documents'),
    }),
    embedding: z.object({
      apiKey: z.string().min(1, 'OPENAI_API_KEY is required for embeddings'),
      model: z.string().min(1).default('text-embedding-3-small'),
      dimension: z.number().int().min(128).max(4096).default(1536),
      azureEndpoint: z.string().url().optional(),
      azureApiVersion: z.string().min(1).optional(),
    }),
    llm: z.object({
      provider: llmProviderSchema,
      model: z.string().min(1),
      apiKey: z.string().min(1),
      temperature: z.number().min(0).max(2).default(0.7),
      maxTokens: z.number().int().min(1).max(4096).default(1024),
      timeoutMs: z.number().int().positive().default(60_000),
    }),
    chunking: z.object({
      chunkSize: z.number().int().min(128).max(2048).default(512),
      chunkOverlap: z.number().int().min(0).max(500).default(50),
    }),
    retrieval: z.object({
      topK: z.number().int().min(1).max(20).default(5),
      minScore: z.number().min(0).max(1).default(0.5),
    }),
    retry: z.object({
      embedAttempts: z.number().int().min(1).default(3),
      searchAttempts: z.number().int().min(1).default(2),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(4000),
    }),
    storage: z.object({
      maxUploadSizeMB: z.number().int().min(1).max(100).default(10),
    }),
  })
  .refine(cfg => cfg.chunking.chunkOverlap < cfg.chunking.chunkSize, {
    message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
    path: ['chunking', 'chunkOverlap'],
  })
  .refine(cfg => !cfg.embedding.azureEndpoint || cfg.embedding.azureApiVersion, {
    message: 'AZURE_OPENAI_API_VERSION is required when AZURE_OPENAI_ENDPOINT is set',
    path: ['embedding', 'azureApiVersion'],
  });

export type Config = z.infer<typeof configSchema>;
export type LLMProvider = z.infer<typeof llmProviderSchema>;

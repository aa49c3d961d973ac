import 'dotenv/config';
import { loadConfig, type Config } from './config/index.js';
import { logger } from './utils/logger.js';
import { ConfigurationError } from './utils/errors.js';
import { QdrantVectorStore } from './services/vector/QdrantVectorStore.js';
import { EmbeddingClientFactory } from './services/vector/EmbeddingClientFactory.js';
import { OpenAIEmbeddingService } from './services/vector/EmbeddingService.js';
import { WordSplitter } from './services/chunking/WordSplitter.js';
import { IndexingOrchestrator } from './services/ingestion/IndexingOrchestrator.js';
import { RetrievalOrchestrator } from './services/query/RetrievalOrchestrator.js';
import { LLMServiceFactory } from './services/llm/LLMServiceFactory.js';
import { buildServer } from './api/server.js';

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`${error.message}:`);
      for (const issue of error.issues) console.error(`  - ${issue}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const startedAt = Date.now();

logger.info({ env: config.server.nodeEnv, llm: `${config.llm.provider}:${config.llm.model}` }, 'Initializing services...');

const vectorStore = new QdrantVectorStore({
  ...config.qdrant,
  dimension: config.embedding.dimension,
});
await vectorStore.connect();

const embeddingService = new OpenAIEmbeddingService(EmbeddingClientFactory.create(config.embedding), {
  model: config.embedding.model,
  dimension: config.embedding.dimension,
});

const indexing = new IndexingOrchestrator(
  new WordSplitter(config.chunking.chunkSize, config.chunking.chunkOverlap),
  embeddingService,
  vectorStore
);

const backoff = {
  baseDelayMs: config.retry.baseDelayMs,
  maxDelayMs: config.retry.maxDelayMs,
  jitter: 0.25,
};

const retrieval = new RetrievalOrchestrator(
  embeddingService,
  vectorStore,
  () => LLMServiceFactory.createLLMService(config.llm),
  {
    topK: config.retrieval.topK,
    minScore: config.retrieval.minScore,
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
    generationTimeoutMs: config.llm.timeoutMs,
    embedRetry: { ...backoff, maxAttempts: config.retry.embedAttempts },
    searchRetry: { ...backoff, maxAttempts: config.retry.searchAttempts },
  }
);

const fastify = await buildServer(
  { indexing, retrieval, vectorStore, info: { version: config.server.version, startedAt } },
  { maxUploadSizeMB: config.storage.maxUploadSizeMB }
);

logger.info('Services initialized');

const shutdown = async (signal: string) => {
  logger.info({ signal }, 'Shutting down gracefully...');
  try {
    await fastify.close();
    await vectorStore.disconnect();
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Shutdown failed');
    process.exit(1);
  }
};

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

try {
  await fastify.listen({ port: config.server.port, host: config.server.host });
  logger.info(`Server listening on ${config.server.host}:${config.server.port}`);
} catch (error) {
  logger.error({ error }, 'Failed to start server');
  process.exit(1);
}

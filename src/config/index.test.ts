import { describe, it, expect } from 'vitest';
import { loadConfig } from './index.js';
import { ConfigurationError } from '../utils/errors.js';

function configError(env: Record<string, string>): ConfigurationError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigurationError) return error;
    throw error;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  it('applies defaults when only the OpenAI key is set', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-key' });

    expect(config.server).toMatchObject({ host: '0.0.0.0', port: 8000, version: '0.3.0' });
    expect(config.qdrant).toMatchObject({ host: 'localhost', port: 6333, collection: 'documents' });
    expect(config.embedding).toMatchObject({ model: 'text-embedding-3-small', dimension: 1536 });
    expect(config.llm).toEqual({
      provider: 'openai',
      model: 'gpt-4o-mini',
      apiKey: 'test-key',
      temperature: 0.7,
      maxTokens: 1024,
      timeoutMs: 60000,
    });
    expect(config.chunking).toEqual({ chunkSize: 512, chunkOverlap: 50 });
    expect(config.retrieval).toEqual({ topK: 5, minScore: 0.5 });
    expect(config.retry).toEqual({ embedAttempts: 3, searchAttempts: 2, baseDelayMs: 500, maxDelayMs: 4000 });
  });

  it('parses provider:model and picks the provider key', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      LLM_PROVIDER: 'openrouter:meta-llama/llama-3.1-8b-instruct:free',
      OPENROUTER_API_KEY: 'test-openrouter-key',
    });

    expect(config.llm).toMatchObject({
      provider: 'openrouter',
      model: 'meta-llama/llama-3.1-8b-instruct:free',
      apiKey: 'test-openrouter-key',
    });
  });

  it('reads numeric settings from strings', () => {
    const config = loadConfig({
      OPENAI_API_KEY: 'test-key',
      PORT: '9000',
      RETRIEVAL_TOP_K: '8',
      MIN_SIMILARITY_SCORE: '0.25',
      CHUNK_SIZE: '256',
      CHUNK_OVERLAP: '32',
    });

    expect(config.server.port).toBe(9000);
    expect(config.retrieval).toEqual({ topK: 8, minScore: 0.25 });
    expect(config.chunking).toEqual({ chunkSize: 256, chunkOverlap: 32 });
  });

  it('requires the embedding key', () => {
    const error = configError({});

    expect(error.message).toBe('Invalid configuration');
    expect(error.issues).toContain('embedding.apiKey: OPENAI_API_KEY is required for embeddings');
  });

  it('rejects an unknown provider', () => {
    const error = configError({ OPENAI_API_KEY: 'test-key', LLM_PROVIDER: 'mystery:model-1' });

    expect(error.issues.some(issue => issue.startsWith('llm.provider:'))).toBe(true);
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    const error = configError({ OPENAI_API_KEY: 'test-key', CHUNK_SIZE: '128', CHUNK_OVERLAP: '128' });

    expect(error.issues).toEqual(['chunking.chunkOverlap: CHUNK_OVERLAP must be smaller than CHUNK_SIZE']);
  });

  it('rejects an out-of-range top_k', () => {
    const error = configError({ OPENAI_API_KEY: 'test-key', RETRIEVAL_TOP_K: '50' });

    expect(error.issues).toEqual(['retrieval.topK: Number must be less than or equal to 20']);
  });
});

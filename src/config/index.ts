import { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { configSchema, type Config } from './validation.js';

export type { Config, LLMProvider } from './validation.js';

type Env = Record<string, string | undefined>;

const toInt = (value: string | undefined) => (value ? parseInt(value, 10) : undefined);
const toFloat = (value: string | undefined) => (value ? parseFloat(value) : undefined);
const orUndefined = (value: string | undefined) => (value && value.trim() ? value : undefined);

function llmApiKey(provider: string, env: Env): string {
  switch (provider) {
    case 'groq':
      return env.GROQ_API_KEY || '';
    case 'openrouter':
      return env.OPENROUTER_API_KEY || '';
    case 'anthropic':
      return env.ANTHROPIC_API_KEY || '';
    default:
      return env.OPENAI_API_KEY || '';
  }
}

/**
 * Builds the settings snapshot from environment variables.
 *
 * `LLM_PROVIDER` takes the form `provider:model`, e.g. `groq:llama-3.3-70b-versatile`.
 * Throws {@link ConfigurationError} listing every invalid field.
 */
export function loadConfig(env: Env = process.env): Config {
  const [provider = '', ...modelParts] = (env.LLM_PROVIDER || 'openai:gpt-4o-mini').split(':');

  const rawConfig = {
    server: {
      nodeEnv: orUndefined(env.NODE_ENV),
      host: orUndefined(env.HOST),
      port: toInt(env.PORT),
      logLevel: orUndefined(env.LOG_LEVEL)?.toLowerCase(),
      version: orUndefined(env.APP_VERSION),
    },
    qdrant: {
      url: orUndefined(env.QDRANT_URL),
      apiKey: orUndefined(env.QDRANT_API_KEY),
      host: orUndefined(env.QDRANT_HOST),
      port: toInt(env.QDRANT_PORT),
      collection: orUndefined(env.QDRANT_COLLECTION_NAME),
    },
    embedding: {
      apiKey: env.OPENAI_API_KEY || '',
      model: orUndefined(env.EMBEDDING_MODEL),
      dimension: toInt(env.EMBEDDING_DIMENSION),
      azureEndpoint: orUndefined(env.AZURE_OPENAI_ENDPOINT),
      azureApiVersion: orUndefined(env.AZURE_OPENAI_API_VERSION),
    },
    llm: {
      provider,
      model: modelParts.join(':'),
      apiKey: llmApiKey(provider, env),
      temperature: toFloat(env.LLM_TEMPERATURE),
      maxTokens: toInt(env.LLM_MAX_TOKENS),
      timeoutMs: toInt(env.GENERATION_TIMEOUT_MS),
    },
    chunking: {
      chunkSize: toInt(env.CHUNK_SIZE),
      chunkOverlap: toInt(env.CHUNK_OVERLAP),
    },
    retrieval: {
      topK: toInt(env.RETRIEVAL_TOP_K),
      minScore: toFloat(env.MIN_SIMILARITY_SCORE),
    },
    retry: {
      embedAttempts: toInt(env.RETRY_EMBED_ATTEMPTS),
      searchAttempts: toInt(env.RETRY_SEARCH_ATTEMPTS),
      baseDelayMs: toInt(env.RETRY_BASE_DELAY_MS),
      maxDelayMs: toInt(env.RETRY_MAX_DELAY_MS),
    },
    storage: {
      maxUploadSizeMB: toInt(env.MAX_UPLOAD_SIZE_MB),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError('Invalid configuration', issues);
    }
    throw error;
  }
}

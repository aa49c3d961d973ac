export type PipelineStage = 'embedding' | 'search' | 'generation';

export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends Error {
  code = 'NOT_FOUND';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A provider or store call failed after local retries were exhausted.
 * `cause` carries the last underlying error.
 */
export class ExternalServiceError extends Error {
  code = 'EXTERNAL_SERVICE_ERROR';
  constructor(message: string, public stage: PipelineStage, public cause?: unknown) {
    super(message);
    this.name = 'ExternalServiceError';
  }
}

export class GenerationTimeoutError extends ExternalServiceError {
  constructor(public timeoutMs: number, cause?: unknown) {
    super(`Generation timed out after ${timeoutMs}ms`, 'generation', cause);
    this.code = 'GENERATION_TIMEOUT';
    this.name = 'GenerationTimeoutError';
  }
}

export class VectorStoreError extends Error {
  code = 'VECTOR_STORE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'VectorStoreError';
  }
}

export class EmbeddingProviderError extends Error {
  code = 'EMBEDDING_PROVIDER_ERROR';
  constructor(message: string, public details?: unknown, public retryable = false) {
    super(message);
    this.name = 'EmbeddingProviderError';
  }
}

export class GenerationProviderError extends Error {
  code = 'GENERATION_PROVIDER_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'GenerationProviderError';
  }
}

import OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { EmbeddingProviderError, ValidationError } from '../../utils/errors.js';

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export interface OpenAIEmbeddingOptions {
  model: string;
  dimension: number;
  maxBatchSize?: number;
}

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export function isTransientProviderError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) {
    return error.status === undefined || TRANSIENT_STATUSES.has(error.status) || error.status >= 500;
  }
  return false;
}

export class OpenAIEmbeddingService implements EmbeddingService {
  private maxBatchSize: number;

  constructor(private client: OpenAI, private options: OpenAIEmbeddingOptions) {
    this.maxBatchSize = options.maxBatchSize ?? 2048;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedMany([text]);
    if (!embedding) {
      throw new EmbeddingProviderError('Provider returned no embedding');
    }
    return embedding;
  }

  /** Embeddings come back in input order; empty inputs are rejected, not dropped. */
  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    if (texts.some(t => !t || t.trim().length === 0)) {
      throw new ValidationError('Cannot embed empty text');
    }

    const allEmbeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      const batch = texts.slice(i, i + this.maxBatchSize);
      allEmbeddings.push(...(await this.requestBatch(batch)));

      if (texts.length > this.maxBatchSize) {
        logger.debug(
          { batch: Math.floor(i / this.maxBatchSize) + 1, processed: allEmbeddings.length, total: texts.length },
          'Batch embeddings progress'
        );
      }
    }

    return allEmbeddings;
  }

  private async requestBatch(batch: string[]): Promise<number[][]> {
    const { model, dimension } = this.options;
    try {
      const response = await this.client.embeddings.create({
        model,
        input: batch,
        ...(model.startsWith('text-embedding-3') ? { dimensions: dimension } : {}),
      });

      const embeddings = [...response.data].sort((a, b) => a.index - b.index).map(item => item.embedding);
      if (embeddings.length !== batch.length) {
        throw new EmbeddingProviderError(
          `Expected ${batch.length} embeddings, received ${embeddings.length}`
        );
      }

      logger.debug({ count: embeddings.length, dimension: embeddings[0]?.length }, 'Generated embeddings');
      return embeddings;
    } catch (error) {
      if (error instanceof EmbeddingProviderError) throw error;
      const retryable = isTransientProviderError(error);
      logger.error({ error, count: batch.length, retryable }, 'Failed to generate embeddings');
      throw new EmbeddingProviderError('Embedding generation failed', error, retryable);
    }
  }
}

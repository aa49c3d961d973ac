import { logger } from '../../utils/logger.js';
import {
  EmbeddingProviderError,
  ExternalServiceError,
  GenerationTimeoutError,
  ValidationError,
} from '../../utils/errors.js';
import { RetryExhaustedError, withRetry, type RetryPolicy } from '../../utils/retry.js';
import { raceAbort } from '../../utils/abort.js';
import type { Document } from '../../domain/Document.js';
import type { EmbeddingService } from '../vector/EmbeddingService.js';
import type { VectorStore } from '../vector/VectorStore.interface.js';
import type { LLMService } from '../llm/LLMService.interface.js';
import { NO_ANSWER_GENERATED, RAG_ANSWER_PROMPT } from '../llm/prompts/rag-answer.js';
import {
  toRetrievedDocument,
  type QueryRequest,
  type QueryResult,
  type RetrievalMetadata,
  type StageTimings,
  type StreamEvent,
  type StreamStage,
} from './types.js';

export interface RetrievalOptions {
  topK: number;
  minScore: number;
  temperature: number;
  maxTokens: number;
  generationTimeoutMs: number;
  embedRetry: RetryPolicy;
  searchRetry: RetryPolicy;
}

interface RetrievedContext {
  query: string;
  topK: number;
  documents: Document[];
  timings: { embedding: number; search: number };
}

export function normalizeQuery(query: string): string {
  const trimmed = query.trim();
  if (!trimmed) {
    throw new ValidationError('Query must not be empty');
  }
  return trimmed;
}

const elapsed = (start: number) => Math.round(performance.now() - start);

export class RetrievalOrchestrator {
  constructor(
    private embeddingService: EmbeddingService,
    private vectorStore: VectorStore,
    private createLLMService: () => LLMService,
    private options: RetrievalOptions
  ) {}

  async query(request: QueryRequest): Promise<QueryResult> {
    const started = performance.now();
    const context = await this.retrieve(request);

    const promptStart = performance.now();
    const prompt = RAG_ANSWER_PROMPT(context.documents.map(doc => doc.content), context.query);
    const promptMs = elapsed(promptStart);

    const generationStart = performance.now();
    const answer = await this.generate(prompt);
    const timings: StageTimings = {
      ...context.timings,
      prompt: promptMs,
      generation: elapsed(generationStart),
      total: elapsed(started),
    };

    logger.info(
      { documents: context.documents.length, topK: context.topK, timings },
      'Query answered'
    );

    return {
      query: context.query,
      documents: context.documents,
      answer,
      metadata: this.metadata(context, timings),
    };
  }

  /**
   * Emits one `documents` event, zero or more `token` events, then exactly one
   * terminal `done` or `error` event. Failures never escape as exceptions.
   *
   * Aborting `cancel` stops generation and ends the stream without a terminal event.
   */
  async *stream(request: QueryRequest, cancel?: AbortSignal): AsyncGenerator<StreamEvent> {
    const started = performance.now();
    let stage: StreamStage = 'init';
    const advance = (next: StreamStage) => {
      logger.debug({ from: stage, to: next }, 'Stream stage');
      stage = next;
    };

    let context: RetrievedContext;
    try {
      advance('embedding');
      context = await this.retrieve(request, () => advance('searching'));
    } catch (error) {
      advance('error');
      yield this.errorEvent(error);
      return;
    }

    const retrievalTimings: StageTimings = { ...context.timings, total: elapsed(started) };
    yield {
      type: 'documents',
      count: context.documents.length,
      documents: context.documents.map(toRetrievedDocument),
      metadata: this.metadata(context, retrievalTimings),
    };

    if (cancel?.aborted) {
      logger.debug('Stream cancelled before generation');
      return;
    }

    advance('streaming_tokens');
    const prompt = RAG_ANSWER_PROMPT(context.documents.map(doc => doc.content), context.query);
    const generationStart = performance.now();
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new GenerationTimeoutError(this.options.generationTimeoutMs));
    }, this.options.generationTimeoutMs);
    const onCancel = () => controller.abort(new Error('Stream cancelled by consumer'));
    cancel?.addEventListener('abort', onCancel, { once: true });

    let tokenCount = 0;
    try {
      const iterator = this.createLLMService()
        .stream({
          prompt,
          temperature: this.options.temperature,
          maxTokens: this.options.maxTokens,
          signal: controller.signal,
        })
        [Symbol.asyncIterator]();

      for (;;) {
        const next = await raceAbort(iterator.next(), controller.signal);
        if (next.done) break;
        tokenCount++;
        yield { type: 'token', content: next.value };
      }
    } catch (error) {
      if (cancel?.aborted && !timedOut) {
        logger.info({ tokenCount }, 'Stream cancelled during generation');
        return;
      }
      advance('error');
      yield this.errorEvent(
        timedOut
          ? new GenerationTimeoutError(this.options.generationTimeoutMs, error)
          : new ExternalServiceError('Answer generation failed', 'generation', error)
      );
      return;
    } finally {
      clearTimeout(timer);
      cancel?.removeEventListener('abort', onCancel);
      controller.abort();
    }

    advance('done');
    const timings: StageTimings = {
      ...context.timings,
      generation: elapsed(generationStart),
      total: elapsed(started),
    };
    logger.info({ documents: context.documents.length, tokenCount, timings }, 'Streamed answer');
    yield { type: 'done', token_count: tokenCount, metadata: { timings_ms: timings } };
  }

  private async retrieve(request: QueryRequest, onEmbedded?: () => void): Promise<RetrievedContext> {
    const query = normalizeQuery(request.query);
    const topK = request.topK ?? this.options.topK;
    if (!Number.isInteger(topK) || topK < 1) {
      throw new ValidationError(`top_k must be a positive integer, got ${topK}`);
    }

    const embeddingStart = performance.now();
    const vector = await this.embedQuery(query);
    const embedding = elapsed(embeddingStart);
    onEmbedded?.();

    const searchStart = performance.now();
    const documents = await this.searchDocuments(vector, topK, request);
    const search = elapsed(searchStart);

    logger.debug({ found: documents.length, topK, embedding, search }, 'Retrieved context');
    return { query, topK, documents, timings: { embedding, search } };
  }

  private async embedQuery(query: string): Promise<number[]> {
    try {
      return await withRetry(
        () => this.embeddingService.embed(query),
        {
          ...this.options.embedRetry,
          shouldRetry: error => error instanceof EmbeddingProviderError && error.retryable,
        },
        {
          onRetry: (error, attempt, delayMs) =>
            logger.warn({ error, attempt, delayMs }, 'Query embedding failed, retrying'),
        }
      );
    } catch (error) {
      if (error instanceof ValidationError) throw error;
      if (error instanceof RetryExhaustedError) {
        throw new ExternalServiceError(
          `Embedding service unavailable after ${error.attempts} attempts`,
          'embedding',
          error.lastError
        );
      }
      throw new ExternalServiceError('Query embedding failed', 'embedding', error);
    }
  }

  private async searchDocuments(vector: number[], topK: number, request: QueryRequest): Promise<Document[]> {
    try {
      return await withRetry(
        () => this.vectorStore.search(vector, topK, request.filters, this.options.minScore),
        this.options.searchRetry,
        {
          onRetry: (error, attempt, delayMs) =>
            logger.warn({ error, attempt, delayMs }, 'Vector search failed, retrying'),
        }
      );
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      throw new ExternalServiceError('Vector store unavailable', 'search', cause);
    }
  }

  private async generate(prompt: string): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new GenerationTimeoutError(this.options.generationTimeoutMs));
    }, this.options.generationTimeoutMs);

    try {
      const result = await raceAbort(
        this.createLLMService().generate({
          prompt,
          temperature: this.options.temperature,
          maxTokens: this.options.maxTokens,
          signal: controller.signal,
        }),
        controller.signal
      );
      return result.replies[0] ?? NO_ANSWER_GENERATED;
    } catch (error) {
      if (timedOut) {
        logger.error({ timeoutMs: this.options.generationTimeoutMs }, 'Generation timed out');
        throw new GenerationTimeoutError(this.options.generationTimeoutMs, error);
      }
      logger.error({ error }, 'Generation failed');
      throw new ExternalServiceError('Answer generation failed', 'generation', error);
    } finally {
      clearTimeout(timer);
    }
  }

  private metadata(context: RetrievedContext, timings: StageTimings): RetrievalMetadata {
    return {
      num_documents_retrieved: context.documents.length,
      top_k: context.topK,
      timings_ms: timings,
    };
  }

  private errorEvent(error: unknown): StreamEvent {
    if (error instanceof ValidationError || error instanceof ExternalServiceError) {
      logger.warn({ error, code: error.code }, 'Stream ended with error');
      return { type: 'error', code: error.code, error: error.message };
    }
    logger.error({ error }, 'Stream failed unexpectedly');
    return { type: 'error', code: 'INTERNAL_ERROR', error: 'Internal server error' };
  }
}

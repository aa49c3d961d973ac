import { logger } from '../../utils/logger.js';
import { generateId } from '../../utils/uuid.js';
import { ExternalServiceError, ValidationError } from '../../utils/errors.js';
import type { Document } from '../../domain/Document.js';
import type { WordSplitter } from '../chunking/WordSplitter.js';
import type { EmbeddingService } from '../vector/EmbeddingService.js';
import type { VectorStore } from '../vector/VectorStore.interface.js';

export interface IndexingResult {
  documentsReceived: number;
  chunksCreated: number;
  chunksWritten: number;
}

export interface IndexedDocument extends IndexingResult {
  documentId: string;
}

/**
 * Split, embed, write. Every chunk is embedded before anything is written, so an
 * embedding failure leaves the index untouched for the whole call.
 */
export class IndexingOrchestrator {
  constructor(
    private splitter: WordSplitter,
    private embeddingService: EmbeddingService,
    private vectorStore: VectorStore,
    private writeBatchSize = 100
  ) {}

  async index(documents: Document[]): Promise<IndexingResult> {
    const startTime = Date.now();
    const chunks = this.splitter.splitDocuments(documents);

    if (chunks.length === 0) {
      logger.warn({ documents: documents.length }, 'Nothing to index, no chunks produced');
      return { documentsReceived: documents.length, chunksCreated: 0, chunksWritten: 0 };
    }

    let embeddings: number[][];
    try {
      embeddings = await this.embeddingService.embedMany(chunks.map(chunk => chunk.content));
    } catch (error) {
      logger.error({ error, chunks: chunks.length }, 'Chunk embedding failed, aborting indexing');
      if (error instanceof ValidationError) throw error;
      throw new ExternalServiceError('Embedding service failed while indexing', 'embedding', error);
    }

    const embedded = chunks.map((chunk, i) => ({ ...chunk, embedding: embeddings[i] }));
    const chunksWritten = await this.vectorStore.write(embedded, this.writeBatchSize);

    logger.info(
      { documents: documents.length, chunksCreated: chunks.length, chunksWritten, durationMs: Date.now() - startTime },
      'Indexing complete'
    );
    return { documentsReceived: documents.length, chunksCreated: chunks.length, chunksWritten };
  }

  async indexText(content: string, metadata: Record<string, unknown> = {}): Promise<IndexedDocument> {
    if (!content || !content.trim()) {
      throw new ValidationError('Content cannot be empty');
    }
    const documentId = generateId();
    const result = await this.index([{ id: documentId, content, metadata }]);
    return { documentId, ...result };
  }
}

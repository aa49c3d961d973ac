import { QdrantClient, type Schemas } from '@qdrant/js-client-rest';
import { logger } from '../../utils/logger.js';
import { VectorStoreError } from '../../utils/errors.js';
import type { Document, MetadataFilter, StoredChunk } from '../../domain/Document.js';
import type { DeleteRequest, DeleteResult, ListPage, VectorStore } from './VectorStore.interface.js';
import { toPointId } from './pointId.js';

export interface QdrantStoreOptions {
  url?: string;
  apiKey?: string;
  host: string;
  port: number;
  collection: string;
  dimension: number;
}

type Payload = Record<string, unknown>;

const RESERVED_PAYLOAD_KEYS = new Set(['content', 'doc_id']);
const SCROLL_PAGE_SIZE = 256;

export function toQdrantFilter(filters?: MetadataFilter): Schemas['Filter'] | undefined {
  if (!filters) return undefined;
  const must = Object.entries(filters).map(([key, value]) => ({
    key,
    match: { value },
  }));
  return must.length > 0 ? { must } : undefined;
}

function splitPayload(pointId: string | number, payload: Payload | null | undefined): StoredChunk {
  const body = payload ?? {};
  const metadata: Payload = {};
  for (const [key, value] of Object.entries(body)) {
    if (!RESERVED_PAYLOAD_KEYS.has(key)) metadata[key] = value;
  }
  return {
    id: typeof body.doc_id === 'string' ? body.doc_id : String(pointId),
    content: typeof body.content === 'string' ? body.content : '',
    metadata,
  };
}

export class QdrantVectorStore implements VectorStore {
  private client: QdrantClient | null = null;
  readonly collectionName: string;

  constructor(private options: QdrantStoreOptions) {
    this.collectionName = options.collection;
  }

  async connect(): Promise<void> {
    const { url, apiKey, host, port } = this.options;
    try {
      this.client = url ? new QdrantClient({ url, apiKey }) : new QdrantClient({ host, port, apiKey });
      await this.ensureCollection();
      logger.info({ target: url ?? `${host}:${port}`, collection: this.collectionName }, 'Connected to Qdrant');
    } catch (error) {
      this.client = null;
      logger.error({ error }, 'Failed to connect to Qdrant');
      if (error instanceof VectorStoreError) throw error;
      throw new VectorStoreError('Qdrant connection failed', error);
    }
  }

  async disconnect(): Promise<void> {
    this.client = null;
    logger.info('Disconnected from Qdrant');
  }

  async testConnection(): Promise<boolean> {
    if (!this.client) return false;
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private getClient(): QdrantClient {
    if (!this.client) {
      throw new VectorStoreError('Qdrant client not initialized');
    }
    return this.client;
  }

  async ensureCollection(): Promise<void> {
    const client = this.getClient();
    try {
      const collections = await client.getCollections();
      const exists = collections.collections.some(c => c.name === this.collectionName);

      if (exists) {
        logger.info({ collection: this.collectionName }, 'Using existing Qdrant collection');
        return;
      }

      await client.createCollection(this.collectionName, {
        vectors: {
          size: this.options.dimension,
          distance: 'Cosine',
        },
      });
      logger.info(
        { collection: this.collectionName, dimension: this.options.dimension },
        'Created Qdrant collection'
      );
    } catch (error) {
      logger.error({ error, collection: this.collectionName }, 'Failed to ensure collection exists');
      throw new VectorStoreError('Collection setup failed', error);
    }
  }

  async write(documents: Document[], batchSize = 100): Promise<number> {
    if (documents.length === 0) {
      logger.warn('No documents to write');
      return 0;
    }
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new VectorStoreError(`Invalid batch size: ${batchSize}`);
    }

    const points: Schemas['PointStruct'][] = [];
    for (const doc of documents) {
      if (!doc.embedding) {
        logger.warn({ documentId: doc.id }, 'Document has no embedding, skipping');
        continue;
      }
      points.push({
        id: toPointId(doc.id),
        vector: doc.embedding,
        payload: { content: doc.content, doc_id: String(doc.id), ...doc.metadata },
      });
    }

    if (points.length === 0) {
      logger.warn({ received: documents.length }, 'No valid points to write, all documents lack embeddings');
      return 0;
    }

    const client = this.getClient();
    let written = 0;
    for (let i = 0; i < points.length; i += batchSize) {
      const batch = points.slice(i, i + batchSize);
      try {
        await client.upsert(this.collectionName, { wait: true, points: batch });
      } catch (error) {
        logger.error({ error, written, batchSize: batch.length }, 'Failed to upsert batch');
        throw new VectorStoreError('Vector upsert failed', error);
      }
      written += batch.length;
      logger.debug({ count: batch.length, written }, 'Upserted batch to Qdrant');
    }

    logger.info({ written, skipped: documents.length - written }, 'Wrote documents to Qdrant');
    return written;
  }

  async search(
    queryVector: number[],
    topK: number,
    filters?: MetadataFilter,
    scoreThreshold?: number
  ): Promise<Document[]> {
    const client = this.getClient();
    let results: Schemas['ScoredPoint'][];
    try {
      results = await client.search(this.collectionName, {
        vector: queryVector,
        limit: topK,
        filter: toQdrantFilter(filters),
        score_threshold: scoreThreshold,
        with_payload: true,
      });
    } catch (error) {
      logger.error({ error, topK }, 'Vector search failed');
      throw new VectorStoreError('Vector search failed', error);
    }

    const documents = results.map(result => ({
      ...splitPayload(result.id, result.payload),
      score: result.score,
    }));

    logger.debug({ found: documents.length, topK, filtered: Boolean(filters) }, 'Similarity search complete');
    return documents;
  }

  async delete(request: DeleteRequest): Promise<DeleteResult> {
    const { ids, filters } = request;
    const client = this.getClient();

    if (ids && ids.length > 0) {
      try {
        await client.delete(this.collectionName, { wait: true, points: ids.map(toPointId) });
      } catch (error) {
        logger.error({ error, count: ids.length }, 'Failed to delete documents by id');
        throw new VectorStoreError('Vector deletion failed', error);
      }
      logger.info({ count: ids.length }, 'Deleted documents by id');
      return { kind: 'deleted', count: ids.length };
    }

    const filter = toQdrantFilter(filters);
    if (filter) {
      try {
        await client.delete(this.collectionName, { wait: true, filter });
      } catch (error) {
        logger.error({ error, filters }, 'Failed to delete documents by filter');
        throw new VectorStoreError('Vector deletion failed', error);
      }
      logger.info({ filters }, 'Deleted documents matching filter');
      return { kind: 'deleted-unknown-count' };
    }

    logger.warn('No ids or filters provided for deletion');
    return { kind: 'deleted', count: 0 };
  }

  async count(filters?: MetadataFilter): Promise<number> {
    const client = this.getClient();
    try {
      const response = await client.count(this.collectionName, {
        filter: toQdrantFilter(filters),
        exact: true,
      });
      return response.count;
    } catch (error) {
      logger.error({ error, filters }, 'Failed to count documents');
      throw new VectorStoreError('Vector count failed', error);
    }
  }

  async list(limit: number, offset: number): Promise<ListPage> {
    const total = await this.count();
    if (total === 0 || offset >= total) {
      return { chunks: [], total };
    }

    const client = this.getClient();
    const wanted = offset + limit;
    const points: Schemas['Record'][] = [];
    try {
      let next: Schemas['ExtendedPointId'] | Record<string, unknown> | undefined;
      do {
        const response = await client.scroll(this.collectionName, {
          limit: Math.min(wanted - points.length, SCROLL_PAGE_SIZE),
          offset: next,
          with_payload: true,
          with_vector: false,
        });
        points.push(...response.points);
        next = response.next_page_offset ?? undefined;
      } while (next !== undefined && points.length < wanted);
    } catch (error) {
      logger.error({ error, limit, offset }, 'Failed to scroll documents');
      throw new VectorStoreError('Vector scroll failed', error);
    }

    return {
      chunks: points.slice(offset, wanted).map(point => splitPayload(point.id, point.payload)),
      total,
    };
  }

  async dropCollection(): Promise<void> {
    const client = this.getClient();
    try {
      await client.deleteCollection(this.collectionName);
      logger.warn({ collection: this.collectionName }, 'Dropped Qdrant collection');
    } catch (error) {
      logger.error({ error, collection: this.collectionName }, 'Failed to drop collection');
      throw new VectorStoreError('Collection drop failed', error);
    }
  }
}

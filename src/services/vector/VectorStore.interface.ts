import type { Document, MetadataFilter, StoredChunk } from '../../domain/Document.js';

/**
 * Outcome of a delete. Filter-based deletes cannot report how many points
 * went away, so they use the `deleted-unknown-count` variant.
 */
export type DeleteResult =
  | { kind: 'deleted'; count: number }
  | { kind: 'deleted-unknown-count' };

export interface DeleteRequest {
  ids?: string[];
  filters?: MetadataFilter;
}

export interface ListPage {
  chunks: StoredChunk[];
  total: number;
}

export interface VectorStore {
  readonly collectionName: string;

  connect(): Promise<void>;
  disconnect(): Promise<void>;
  testConnection(): Promise<boolean>;

  ensureCollection(): Promise<void>;
  write(documents: Document[], batchSize?: number): Promise<number>;
  search(
    queryVector: number[],
    topK: number,
    filters?: MetadataFilter,
    scoreThreshold?: number
  ): Promise<Document[]>;
  delete(request: DeleteRequest): Promise<DeleteResult>;
  count(filters?: MetadataFilter): Promise<number>;
  list(limit: number, offset: number): Promise<ListPage>;
  dropCollection(): Promise<void>;
}

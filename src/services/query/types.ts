import type { Document, MetadataFilter } from '../../domain/Document.js';

export interface QueryRequest {
  query: string;
  topK?: number;
  filters?: MetadataFilter;
}

export interface StageTimings {
  embedding: number;
  search: number;
  prompt?: number;
  generation?: number;
  total: number;
}

export interface RetrievalMetadata {
  num_documents_retrieved: number;
  top_k: number;
  timings_ms: StageTimings;
}

export interface QueryResult {
  query: string;
  documents: Document[];
  answer: string;
  metadata: RetrievalMetadata;
}

export interface RetrievedDocument {
  id: string;
  content: string;
  score: number | null;
  metadata: Record<string, unknown>;
}

export type StreamEvent =
  | { type: 'documents'; count: number; documents: RetrievedDocument[]; metadata: RetrievalMetadata }
  | { type: 'token'; content: string }
  | { type: 'done'; token_count: number; metadata: { timings_ms: StageTimings } }
  | { type: 'error'; code: string; error: string };

/** Streaming pipeline stages; `done` and `error` are terminal. */
export type StreamStage = 'init' | 'embedding' | 'searching' | 'streaming_tokens' | 'done' | 'error';

export function toRetrievedDocument(doc: Document): RetrievedDocument {
  return { id: doc.id, content: doc.content, score: doc.score ?? null, metadata: doc.metadata };
}

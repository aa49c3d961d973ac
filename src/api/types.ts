import type { MetadataFilter } from '../domain/Document.js';

export interface QueryBody {
  query: string;
  top_k?: number;
  stream?: boolean;
  filters?: MetadataFilter;
}

export interface AddDocumentBody {
  content: string;
  metadata?: Record<string, unknown>;
}

export interface ListDocumentsQuery {
  limit: number;
  offset: number;
}

export interface DocumentIdParams {
  id: string;
}

export interface DeleteAllQuery {
  all: boolean;
}

export interface ErrorBody {
  error: string;
  detail: string;
}

import type { FastifyInstance } from 'fastify';
import { createQueryHandler } from './handlers/query.handler.js';
import {
  createAddDocumentHandler,
  createDeleteAllDocumentsHandler,
  createDeleteDocumentHandler,
  createListDocumentsHandler,
  createUploadDocumentHandler,
} from './handlers/documents.handler.js';
import { createHealthHandler, createRootHandler, type ServiceInfo } from './handlers/health.handler.js';
import { queryRequestSchema } from './schemas/query.schema.js';
import { errorResponseSchema } from './schemas/common.schema.js';
import {
  addDocumentRequestSchema,
  deleteAllQuerySchema,
  documentIdParamsSchema,
  listDocumentsQuerySchema,
} from './schemas/documents.schema.js';
import type { AddDocumentBody, DeleteAllQuery, DocumentIdParams, ListDocumentsQuery, QueryBody } from './types.js';
import type { IndexingOrchestrator } from '../services/ingestion/IndexingOrchestrator.js';
import type { RetrievalOrchestrator } from '../services/query/RetrievalOrchestrator.js';
import type { VectorStore } from '../services/vector/VectorStore.interface.js';

export interface RouteDependencies {
  indexing: IndexingOrchestrator;
  retrieval: RetrievalOrchestrator;
  vectorStore: VectorStore;
  info: ServiceInfo;
}

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  const { indexing, retrieval, vectorStore, info } = deps;

  fastify.get('/', { handler: createRootHandler(info) });

  fastify.get('/health', { handler: createHealthHandler(vectorStore, info) });

  fastify.post<{ Body: QueryBody }>('/query', {
    schema: {
      body: queryRequestSchema,
      response: { 400: errorResponseSchema, 502: errorResponseSchema, 504: errorResponseSchema },
    },
    handler: createQueryHandler(retrieval),
  });

  fastify.post<{ Body: AddDocumentBody }>('/documents', {
    schema: {
      body: addDocumentRequestSchema,
      response: { 400: errorResponseSchema, 502: errorResponseSchema },
    },
    handler: createAddDocumentHandler(indexing),
  });

  fastify.post('/documents/upload', {
    handler: createUploadDocumentHandler(indexing),
  });

  fastify.get<{ Querystring: ListDocumentsQuery }>('/documents', {
    schema: { querystring: listDocumentsQuerySchema },
    handler: createListDocumentsHandler(vectorStore),
  });

  fastify.delete<{ Params: DocumentIdParams }>('/documents/:id', {
    schema: {
      params: documentIdParamsSchema,
      response: { 404: errorResponseSchema },
    },
    handler: createDeleteDocumentHandler(vectorStore),
  });

  fastify.delete<{ Querystring: DeleteAllQuery }>('/documents', {
    schema: { querystring: deleteAllQuerySchema },
    handler: createDeleteAllDocumentsHandler(vectorStore),
  });
}

import { extname } from 'node:path';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { logger } from '../../utils/logger.js';
import { NotFoundError, ValidationError } from '../../utils/errors.js';
import { sendError } from '../errors.js';
import type { AddDocumentBody, DeleteAllQuery, DocumentIdParams, ListDocumentsQuery } from '../types.js';
import type { IndexingOrchestrator } from '../../services/ingestion/IndexingOrchestrator.js';
import type { VectorStore } from '../../services/vector/VectorStore.interface.js';

const UPLOAD_EXTENSIONS = new Set(['.txt', '.md']);
const PREVIEW_LENGTH = 200;

export function contentPreview(content: string): string {
  return content.length > PREVIEW_LENGTH ? `${content.slice(0, PREVIEW_LENGTH)}...` : content;
}

export function createAddDocumentHandler(indexing: IndexingOrchestrator) {
  return async (request: FastifyRequest<{ Body: AddDocumentBody }>, reply: FastifyReply) => {
    try {
      const { content, metadata = {} } = request.body;
      const result = await indexing.indexText(content, metadata);

      return reply.code(201).send({
        document_id: result.documentId,
        chunk_count: result.chunksWritten,
        message: `Document indexed successfully with ${result.chunksWritten} chunks`,
      });
    } catch (error) {
      return sendError(reply, error, 'Add document handler error');
    }
  };
}

export function createUploadDocumentHandler(indexing: IndexingOrchestrator) {
  const decoder = new TextDecoder('utf-8', { fatal: true });

  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const data = await request.file();
      if (!data) {
        throw new ValidationError('No file uploaded');
      }

      const extension = extname(data.filename).toLowerCase();
      if (!UPLOAD_EXTENSIONS.has(extension)) {
        throw new ValidationError(`Unsupported file type '${extension || data.filename}'. Allowed: .txt, .md`);
      }

      const buffer = await data.toBuffer();

      let content: string;
      try {
        content = decoder.decode(buffer);
      } catch (error) {
        throw new ValidationError('File is not valid UTF-8 text', error);
      }

      logger.info({ fileName: data.filename, size: buffer.length }, 'Received file upload');

      const result = await indexing.indexText(content, { filename: data.filename, source: 'file_upload' });

      return reply.code(201).send({
        document_id: result.documentId,
        chunk_count: result.chunksWritten,
        message: `File '${data.filename}' indexed successfully with ${result.chunksWritten} chunks`,
      });
    } catch (error) {
      return sendError(reply, error, 'Upload handler error');
    }
  };
}

export function createListDocumentsHandler(vectorStore: VectorStore) {
  return async (request: FastifyRequest<{ Querystring: ListDocumentsQuery }>, reply: FastifyReply) => {
    try {
      const { limit, offset } = request.query;
      const page = await vectorStore.list(limit, offset);

      return reply.code(200).send({
        documents: page.chunks.map(chunk => ({
          id: chunk.id,
          content_preview: contentPreview(chunk.content),
          metadata: chunk.metadata,
        })),
        total_count: page.total,
        limit,
        offset,
      });
    } catch (error) {
      return sendError(reply, error, 'List documents handler error');
    }
  };
}

/** Deletes every chunk indexed from the logical document `id`. */
export function createDeleteDocumentHandler(vectorStore: VectorStore) {
  return async (request: FastifyRequest<{ Params: DocumentIdParams }>, reply: FastifyReply) => {
    try {
      const { id } = request.params;
      const filters = { source_id: id };

      const existing = await vectorStore.count(filters);
      if (existing === 0) {
        throw new NotFoundError(`Document '${id}' not found`);
      }

      const result = await vectorStore.delete({ filters });
      const deletedCount = result.kind === 'deleted' ? result.count : existing;

      logger.info({ documentId: id, deletedCount }, 'Deleted document');
      return reply.code(200).send({
        message: `Document '${id}' deleted`,
        document_id: id,
        deleted_count: deletedCount,
      });
    } catch (error) {
      return sendError(reply, error, 'Delete document handler error');
    }
  };
}

export function createDeleteAllDocumentsHandler(vectorStore: VectorStore) {
  return async (request: FastifyRequest<{ Querystring: DeleteAllQuery }>, reply: FastifyReply) => {
    try {
      if (!request.query.all) {
        throw new ValidationError("Must provide 'all=true' query parameter to confirm bulk deletion");
      }

      const countBefore = await vectorStore.count();
      if (countBefore === 0) {
        return reply.code(200).send({ message: 'No documents to delete', deleted_count: 0 });
      }

      await vectorStore.dropCollection();
      await vectorStore.ensureCollection();

      logger.warn({ deletedCount: countBefore }, 'Deleted all documents');
      return reply.code(200).send({
        message: `Deleted all ${countBefore} documents`,
        deleted_count: countBefore,
      });
    } catch (error) {
      return sendError(reply, error, 'Delete all documents handler error');
    }
  };
}

import type { FastifyReply, FastifyRequest } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { VectorStore } from '../../services/vector/VectorStore.interface.js';

export interface ServiceInfo {
  version: string;
  startedAt: number;
}

export function createHealthHandler(vectorStore: VectorStore, info: ServiceInfo) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    const timestamp = new Date().toISOString();
    const uptime = Math.floor((Date.now() - info.startedAt) / 1000);

    try {
      const documentCount = await vectorStore.count();

      return reply.code(200).send({
        status: 'healthy',
        qdrant: 'connected',
        collection: vectorStore.collectionName,
        document_count: documentCount,
        timestamp,
        uptime,
        version: info.version,
      });
    } catch (error) {
      logger.error({ error }, 'Health check failed');

      return reply.code(503).send({
        status: 'unhealthy',
        qdrant: 'disconnected',
        error: 'Vector store unavailable',
        timestamp,
        uptime,
        version: info.version,
      });
    }
  };
}

export function createRootHandler(info: ServiceInfo) {
  return async () => ({
    message: 'ragdesk retrieval-augmented generation API',
    version: info.version,
    features: ['RAG', 'Streaming', 'Document Management'],
  });
}

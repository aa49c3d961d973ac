import Fastify, { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import { logger } from '../utils/logger.js';
import { generateId } from '../utils/uuid.js';
import { registerRoutes, type RouteDependencies } from './routes.js';
import { sendError } from './errors.js';

export interface ServerOptions {
  maxUploadSizeMB: number;
}

export async function buildServer(deps: RouteDependencies, options: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => generateId(),
  });

  await fastify.register(multipart, {
    limits: {
      fileSize: options.maxUploadSizeMB * 1024 * 1024,
      files: 1,
    },
  });

  fastify.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
    logger.info({ requestId: request.id, method: request.method, url: request.url }, 'Request started');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.info(
      { requestId: request.id, statusCode: reply.statusCode, durationMs: Math.round(reply.elapsedTime) },
      'Request completed'
    );
  });

  fastify.setErrorHandler((error, _request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ error: 'VALIDATION_ERROR', detail: error.message });
    }
    return sendError(reply, error, 'Request error');
  });

  await registerRoutes(fastify, deps);

  return fastify;
}

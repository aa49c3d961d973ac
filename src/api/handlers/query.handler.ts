import type { FastifyReply, FastifyRequest } from 'fastify';
import { logger } from '../../utils/logger.js';
import { sendError } from '../errors.js';
import { writeSseEvent, writeSseHeaders } from '../sse.js';
import type { QueryBody } from '../types.js';
import { normalizeQuery, type RetrievalOrchestrator } from '../../services/query/RetrievalOrchestrator.js';
import { toRetrievedDocument, type QueryRequest } from '../../services/query/types.js';

function toQueryRequest(body: QueryBody): QueryRequest {
  return { query: normalizeQuery(body.query), topK: body.top_k, filters: body.filters };
}

export function createQueryHandler(retrieval: RetrievalOrchestrator) {
  return async (request: FastifyRequest<{ Body: QueryBody }>, reply: FastifyReply) => {
    let queryRequest: QueryRequest;
    try {
      queryRequest = toQueryRequest(request.body);
    } catch (error) {
      return sendError(reply, error, 'Query handler error');
    }

    if (request.body.stream) {
      return streamAnswer(retrieval, queryRequest, request, reply);
    }

    try {
      logger.debug({ requestId: request.id, topK: queryRequest.topK }, 'Query request');

      const result = await retrieval.query(queryRequest);

      return reply.code(200).send({
        query: result.query,
        answer: result.answer,
        documents: result.documents.map(toRetrievedDocument),
        metadata: result.metadata,
      });
    } catch (error) {
      return sendError(reply, error, 'Query handler error');
    }
  };
}

async function streamAnswer(
  retrieval: RetrievalOrchestrator,
  queryRequest: QueryRequest,
  request: FastifyRequest,
  reply: FastifyReply
) {
  reply.hijack();
  const res = reply.raw;
  writeSseHeaders(res, request.id);

  // Cancels generation as soon as the client goes away, even between tokens.
  const disconnect = new AbortController();
  const onClose = () => {
    if (!res.writableEnded) disconnect.abort();
  };
  res.on('close', onClose);

  let events = 0;
  try {
    for await (const event of retrieval.stream(queryRequest, disconnect.signal)) {
      if (disconnect.signal.aborted || res.destroyed) break;
      writeSseEvent(res, event);
      events++;
    }
  } catch (error) {
    logger.error({ error, requestId: request.id }, 'Stream handler error');
    if (!res.destroyed) {
      writeSseEvent(res, { type: 'error', code: 'INTERNAL_ERROR', error: 'Internal server error' });
    }
  } finally {
    res.off('close', onClose);
    res.end();
  }

  if (disconnect.signal.aborted) {
    logger.info({ requestId: request.id, events }, 'Client disconnected, stream cancelled');
  } else {
    logger.info({ requestId: request.id, events }, 'Stream completed');
  }
  return reply;
}

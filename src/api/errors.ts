import type { FastifyReply } from 'fastify';
import { logger } from '../utils/logger.js';
import {
  ExternalServiceError,
  GenerationTimeoutError,
  NotFoundError,
  ValidationError,
} from '../utils/errors.js';
import type { ErrorBody } from './types.js';

interface HttpFailure {
  statusCode: number;
  body: ErrorBody;
}

/** Errors raised by Fastify or its plugins (413, 415, ...) carry their own client status. */
function clientStatusOf(error: unknown): number | undefined {
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode >= 400 && error.statusCode < 500 ? error.statusCode : undefined;
  }
  return undefined;
}

export function toHttpFailure(error: unknown): HttpFailure {
  if (error instanceof ValidationError) {
    return { statusCode: 400, body: { error: error.code, detail: error.message } };
  }
  if (error instanceof NotFoundError) {
    return { statusCode: 404, body: { error: error.code, detail: error.message } };
  }
  if (error instanceof GenerationTimeoutError) {
    return { statusCode: 504, body: { error: error.code, detail: error.message } };
  }
  if (error instanceof ExternalServiceError) {
    return { statusCode: 502, body: { error: error.code, detail: error.message } };
  }

  const clientStatus = clientStatusOf(error);
  if (clientStatus !== undefined && error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'BAD_REQUEST';
    return { statusCode: clientStatus, body: { error: code, detail: error.message } };
  }

  return { statusCode: 500, body: { error: 'INTERNAL_ERROR', detail: 'Internal server error' } };
}

export function sendError(reply: FastifyReply, error: unknown, context: string): FastifyReply {
  const { statusCode, body } = toHttpFailure(error);
  if (statusCode >= 500) {
    logger.error({ error, requestId: reply.request.id }, context);
  } else {
    logger.warn({ error: body, requestId: reply.request.id }, context);
  }
  return reply.code(statusCode).send(body);
}

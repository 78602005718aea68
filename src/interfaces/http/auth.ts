import { Buffer } from 'node:buffer';
import { timingSafeEqual } from 'node:crypto';
import type { FastifyReply, FastifyRequest } from 'fastify';

const BEARER = /^Bearer\s+(\S+)$/i;

/**
 * preHandler that enforces `Authorization: Bearer <apiKey>`.
 *
 * Missing credentials → 403, wrong credentials → 401.
 */
export function createApiKeyGuard(apiKey: string) {
  const expected = Buffer.from(apiKey, 'utf8');

  return async (request: FastifyRequest, reply: FastifyReply) => {
    const match = BEARER.exec(request.headers.authorization ?? '');
    const token = match?.[1];

    if (!token) {
      return reply.status(403).send(errorBody('Forbidden', 'Not authenticated'));
    }

    const given = Buffer.from(token, 'utf8');
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      request.log.warn({ ip: request.ip }, 'Rejected request with invalid API key');
      return reply.status(401).send(errorBody('Unauthorized', 'Invalid API key'));
    }
  };
}

export function errorBody(error: string, message: string) {
  return {
    success: false as const,
    error,
    message,
    timestamp: new Date().toISOString(),
  };
}

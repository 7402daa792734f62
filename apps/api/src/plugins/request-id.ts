/**
 * Request ID Plugin
 *
 * Assigns a correlation ID to every request:
 * - Accepts inbound X-Request-Id header from clients
 * - Generates a UUID if none provided
 * - Binds requestId to pino logger for structured logging
 * - Records the arrival time used for execution timing
 * - Returns X-Request-Id header on every response
 *
 * Installed directly on the root instance (not via register) so the hooks
 * apply to every route.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { randomUUID } from 'crypto';

declare module 'fastify' {
  interface FastifyRequest {
    requestId: string;
    startedAt: number;
  }
}

export function requestIdPlugin(fastify: FastifyInstance): void {
  fastify.decorateRequest('requestId', '');
  fastify.decorateRequest('startedAt', 0);

  fastify.addHook('onRequest', (request: FastifyRequest, _reply: FastifyReply, done) => {
    const inbound = request.headers['x-request-id'];
    const requestId = typeof inbound === 'string' && inbound.length > 0 && inbound.length <= 128
      ? inbound
      : randomUUID();
    request.requestId = requestId;
    request.startedAt = Date.now();
    // Rebind pino child logger with requestId for all subsequent logs
    request.log = request.log.child({ requestId });
    done();
  });

  fastify.addHook('onSend', (request: FastifyRequest, reply: FastifyReply, payload: unknown, done) => {
    reply.header('X-Request-Id', request.requestId);
    done(null, payload);
  });
}

/**
 * Centralized error handler: consistent error envelope, no stack traces.
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import { AppError } from '../utils/errors.js';
import { fail, failWith } from '../utils/reply.js';

export function installErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        request.log.error({ err: error.cause ?? error, code: error.code }, 'Request failed');
      }
      return failWith(reply, error);
    }
    // Fastify validation / body parsing errors (e.g., content-type, malformed JSON)
    if (error.validation || (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500)) {
      return fail(reply, 'VALIDATION_ERROR', error.message, error.statusCode ?? 400);
    }
    request.log.error({ err: error }, 'Unhandled error');
    return fail(reply, 'INTERNAL_ERROR', 'Internal server error', 500);
  });
}

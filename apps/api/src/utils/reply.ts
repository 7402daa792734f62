/**
 * Standardized API Reply Helpers
 *
 * JSON responses use a consistent envelope:
 *   Success: { data: <payload> }
 *   Error:   { detail: string, code: string, details?: unknown }
 *
 * Usage:
 *   return ok(reply, { mode });
 *   return fail(reply, 'VALIDATION_ERROR', 'case_ids list cannot be empty', 400);
 *   return failWith(reply, err);   // err: AppError
 */

import type { FastifyReply } from 'fastify';
import type { AppError } from './errors.js';

/**
 * Send a success response wrapped in { data }.
 */
export function ok<T>(reply: FastifyReply, data: T, statusCode = 200): FastifyReply {
  return reply.status(statusCode).send({ data });
}

/**
 * Send an error response as { detail, code, details? }.
 */
export function fail(
  reply: FastifyReply,
  code: string,
  message: string,
  statusCode = 400,
  details?: unknown,
): FastifyReply {
  const body: { detail: string; code: string; details?: unknown } = { detail: message, code };
  if (details !== undefined) {
    body.details = details;
  }
  return reply.status(statusCode).send(body);
}

/** Send the envelope for a request-terminating error. */
export function failWith(reply: FastifyReply, err: AppError): FastifyReply {
  return fail(reply, err.code, err.message, err.statusCode);
}

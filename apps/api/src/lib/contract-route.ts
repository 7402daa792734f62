/**
 * Contract Route Adapter
 *
 * Registers Fastify routes from contract definitions with automatic:
 * - params/query/body validation (Zod, before handler)
 * - response validation (Zod, after handler, before serialization)
 * - standardized error envelope for validation failures
 *
 * Handlers receive `request.contractData` typed from the route's schemas.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';
import type { ContractRoute, RouteBody, RouteParams, RouteQuery } from '@casevault/contract';
import type { z } from 'zod';
import { fail } from '../utils/reply.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Parsed and validated contract data attached to request. */
export interface ContractData<R extends ContractRoute> {
  params: RouteParams<R>;
  query: RouteQuery<R>;
  body: RouteBody<R>;
}

export type ContractRequest<R extends ContractRoute> = FastifyRequest & { contractData: ContractData<R> };

/** Handler receives request with .contractData populated. */
export type ContractHandler<R extends ContractRoute> = (
  request: ContractRequest<R>,
  reply: FastifyReply,
) => Promise<FastifyReply | void>;

export interface ContractRouteOptions<R extends ContractRoute> {
  /** Fastify preHandler hooks (auth, etc.) */
  preHandler?: preHandlerAsyncHookHandler | preHandlerAsyncHookHandler[];
  /** The route handler function. */
  handler: ContractHandler<R>;
  /** Status for 'void' routes whose handler writes no reply (default 204). */
  successStatus?: number;
}

// ---------------------------------------------------------------------------
// Path conversion
// ---------------------------------------------------------------------------

/**
 * Contract paths are absolute (e.g. /admin/settings/compression-mode).
 * Fastify routes are relative to their registration prefix.
 */
function contractPathToFastify(contractPath: string, prefix: string): string {
  if (prefix && contractPath.startsWith(prefix)) {
    const relative = contractPath.slice(prefix.length);
    return relative || '/';
  }
  return contractPath;
}

// ---------------------------------------------------------------------------
// Input parsing
// ---------------------------------------------------------------------------

type SectionResult =
  | { ok: true; data: z.output<z.ZodTypeAny> }
  | { ok: false; error: z.ZodError };

function parseSection(schema: z.ZodTypeAny | undefined, value: unknown): SectionResult {
  if (!schema) {
    return { ok: true, data: undefined };
  }
  const result = schema.safeParse(value);
  return result.success ? { ok: true, data: result.data } : { ok: false, error: result.error };
}

// ---------------------------------------------------------------------------
// Response validation
// ---------------------------------------------------------------------------

function hasDataField(payload: unknown): payload is { data: unknown } {
  return typeof payload === 'object' && payload !== null && 'data' in payload;
}

/**
 * Validate the unwrapped `{ data }` payload against the contract response schema.
 */
function validateResponse(
  responseSchema: z.ZodTypeAny,
  payload: unknown,
  request: FastifyRequest,
): boolean {
  const result = responseSchema.safeParse(payload);
  if (result.success) {
    return true;
  }

  request.log.error({
    code: 'SERVER_RESPONSE_INVALID',
    method: request.method,
    url: request.url,
    issues: result.error.issues.map(i => ({
      path: i.path,
      code: i.code,
      message: i.message,
    })),
  });
  return false;
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

/**
 * Register a single contract-authoritative route on a Fastify instance.
 *
 * @param prefix - Registration prefix the contract path starts with
 *                 (e.g. '/backoffice'); stripped to get the relative URL.
 */
export function registerContractRoute<R extends ContractRoute>(
  fastify: FastifyInstance,
  route: R,
  prefix: string,
  options: ContractRouteOptions<R>,
): void {
  const { preHandler, handler, successStatus } = options;
  const responseSchema = route.response;

  fastify.route({
    method: route.method,
    url: contractPathToFastify(route.path, prefix),
    preHandler: preHandler ? (Array.isArray(preHandler) ? preHandler : [preHandler]) : [],
    preSerialization: async (request: FastifyRequest, reply: FastifyReply, payload: unknown) => {
      if (responseSchema === 'void' || reply.statusCode >= 400 || !hasDataField(payload)) {
        return payload;
      }
      if (validateResponse(responseSchema, payload.data, request)) {
        return payload;
      }
      reply.status(500);
      return { detail: 'Response validation failed', code: 'SERVER_RESPONSE_INVALID' };
    },
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      const params = parseSection(route.params, request.params);
      if (!params.ok) {
        return fail(reply, 'VALIDATION_ERROR', 'Invalid path parameters', 400, params.error.flatten());
      }

      const query = parseSection(route.query, request.query);
      if (!query.ok) {
        return fail(reply, 'VALIDATION_ERROR', 'Invalid query parameters', 400, query.error.flatten());
      }

      const body = parseSection(route.body, request.body);
      if (!body.ok) {
        return fail(reply, 'VALIDATION_ERROR', 'Validation error', 400, body.error.flatten());
      }

      const contractData: ContractData<R> = {
        params: params.data,
        query: query.data,
        body: body.data,
      };
      const result = await handler(Object.assign(request, { contractData }), reply);

      if (responseSchema === 'void' && result === undefined && !reply.sent) {
        return reply.status(successStatus ?? 204).send();
      }
      return result;
    },
  });
}

/**
 * Contract route definition helper.
 *
 * Each route in the contract registry is a plain object describing the HTTP
 * method, path, and Zod schemas for params/query/body/response. The `Route*`
 * helpers infer the parsed shapes so handlers receive typed input.
 */

import type { z } from 'zod';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export interface ContractRoute {
  method: HttpMethod;
  path: string;
  summary?: string;
  params?: z.ZodTypeAny;
  query?: z.ZodTypeAny;
  body?: z.ZodTypeAny;
  /**
   * Schema of the payload inside `{ data }`, or 'void' when the handler
   * writes the reply itself (binary download) or answers 204.
   */
  response: z.ZodTypeAny | 'void';
}

type Parsed<S> = S extends z.ZodTypeAny ? z.output<S> : undefined;

export type RouteParams<R extends ContractRoute> = Parsed<R['params']>;
export type RouteQuery<R extends ContractRoute> = Parsed<R['query']>;
export type RouteBody<R extends ContractRoute> = Parsed<R['body']>;
export type RouteResponse<R extends ContractRoute> = Parsed<R['response']>;

/**
 * Identity helper that provides type checking for route definitions.
 * Returns the definition as-is with full type inference.
 */
export function defineRoute<T extends ContractRoute>(def: T): T {
  return def;
}

/**
 * Standard API envelope helpers.
 *
 * All API responses use:
 *   Success: { data: <payload> }   (binary downloads excepted)
 *   Error:   { detail, code, details? }
 */

import { z } from 'zod';

/** Wrap a payload schema in the standard `{ data: T }` envelope. */
export function DataEnvelope<T extends z.ZodTypeAny>(schema: T) {
  return z.object({ data: schema });
}

/** Standard error envelope: `{ detail, code, details? }` */
export const ErrorEnvelope = z.object({
  detail: z.string(),
  code: z.string(),
  details: z.unknown().optional(),
});
export type ErrorEnvelope = z.infer<typeof ErrorEnvelope>;

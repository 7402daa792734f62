/**
 * Runtime settings route contracts.
 */

import { z } from 'zod';
import { CompressionMode } from '@casevault/domain';
import { defineRoute } from '../define-route.js';
import { CallerQuerySchema } from './case-images.js';

export const CompressionModeApiSchema = z.object({
  mode: CompressionMode,
});
export type CompressionModeApi = z.infer<typeof CompressionModeApiSchema>;

export const settingsRoutes = {
  getCompressionMode: defineRoute({
    method: 'GET',
    path: '/admin/settings/compression-mode',
    summary: 'Current compression mode used by the case-file pipeline',
    query: CallerQuerySchema,
    response: CompressionModeApiSchema,
  }),

  setCompressionMode: defineRoute({
    method: 'PUT',
    path: '/admin/settings/compression-mode',
    summary: 'Switch compression mode; running pipelines pick it up on their next file',
    query: CallerQuerySchema,
    body: CompressionModeApiSchema,
    response: CompressionModeApiSchema,
  }),
};

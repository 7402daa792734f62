import { z } from 'zod';
import { defineRoute } from '../define-route.js';

export const SecretsCacheStatsApiSchema = z.object({
  region: z.string(),
  cachedSecrets: z.number().int().nonnegative(),
  hits: z.number().int().nonnegative(),
  misses: z.number().int().nonnegative(),
  oldestAgeSeconds: z.number().nonnegative().nullable(),
  newestAgeSeconds: z.number().nonnegative().nullable(),
  status: z.enum(['empty', 'very_fresh', 'healthy', 'aging', 'stale']),
  timestamp: z.string(),
});
export type SecretsCacheStatsApi = z.infer<typeof SecretsCacheStatsApiSchema>;

export const monitoringRoutes = {
  secretsCacheStats: defineRoute({
    method: 'GET',
    path: '/monitoring/secrets-cache-stats',
    summary: 'Secrets Manager cache counters and entry ages',
    response: SecretsCacheStatsApiSchema,
  }),
};

import { z } from 'zod';
import { defineRoute } from '../define-route.js';

export const HealthApiSchema = z.object({
  status: z.literal('ok'),
  timestamp: z.string(),
});
export type HealthApi = z.infer<typeof HealthApiSchema>;

export const systemRoutes = {
  health: defineRoute({
    method: 'GET',
    path: '/health',
    response: HealthApiSchema,
  }),
};

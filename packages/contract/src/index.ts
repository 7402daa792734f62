/**
 * @casevault/contract: Canonical API contract definitions.
 *
 * Exports route contracts, envelope helpers, and the contract registry.
 */

// Core types
export type {
  ContractRoute,
  HttpMethod,
  RouteParams,
  RouteQuery,
  RouteBody,
  RouteResponse,
} from './define-route.js';
export { defineRoute } from './define-route.js';

// Envelope helpers
export { DataEnvelope, ErrorEnvelope } from './envelope.js';

// Route contracts & registry
export { contract, caseImagesRoutes, settingsRoutes, systemRoutes, monitoringRoutes } from './routes/index.js';

// Schemas consumers need for type inference and header names
export {
  CallerQuerySchema,
  type CallerQuery,
  CaseImagesBodySchema,
  type CaseImagesBody,
  CASE_IMAGES_HEADERS,
  ARCHIVE_MEDIA_TYPE,
} from './routes/case-images.js';
export { CompressionModeApiSchema, type CompressionModeApi } from './routes/settings.js';
export { HealthApiSchema, type HealthApi } from './routes/system.js';
export { SecretsCacheStatsApiSchema, type SecretsCacheStatsApi } from './routes/monitoring.js';

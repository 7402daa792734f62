/**
 * Contract registry: aggregates all route contracts.
 */

export { caseImagesRoutes } from './case-images.js';
export { settingsRoutes } from './settings.js';
export { systemRoutes } from './system.js';
export { monitoringRoutes } from './monitoring.js';

import { caseImagesRoutes } from './case-images.js';
import { settingsRoutes } from './settings.js';
import { systemRoutes } from './system.js';
import { monitoringRoutes } from './monitoring.js';

/** The full contract registry. */
export const contract = {
  caseImages: caseImagesRoutes,
  settings: settingsRoutes,
  system: systemRoutes,
  monitoring: monitoringRoutes,
} as const;

/**
 * Bulk case-file download contract.
 *
 * The success response is a zip stream rather than a JSON envelope, so the
 * route declares a 'void' response and publishes its counters as headers.
 */

import { z } from 'zod';
import { defineRoute } from '../define-route.js';

/** Caller identity travels as a query parameter on back-office routes. */
export const CallerQuerySchema = z.object({
  user_id: z.string().trim().min(1, 'user_id is required'),
});
export type CallerQuery = z.infer<typeof CallerQuerySchema>;

// Empty lists are allowed through so the handler can report them with its own code.
export const CaseImagesBodySchema = z.object({
  case_ids: z.array(z.string().trim().min(1)).max(1000),
});
export type CaseImagesBody = z.infer<typeof CaseImagesBodySchema>;

export const CASE_IMAGES_HEADERS = {
  downloadedFiles: 'X-Downloaded-Files',
  downloadErrors: 'X-Download-Errors',
  casesProcessed: 'X-Cases-Processed',
  casesNotFound: 'X-Cases-Not-Found',
  imagesCompressed: 'X-Images-Compressed',
  pdfsCompressed: 'X-PDFs-Compressed',
  compressionErrors: 'X-Compression-Errors',
} as const;

export const ARCHIVE_MEDIA_TYPE = 'application/zip';

export const caseImagesRoutes = {
  download: defineRoute({
    method: 'POST',
    path: '/backoffice/case-images',
    summary: 'Download the files of several cases as one compressed archive',
    query: CallerQuerySchema,
    body: CaseImagesBodySchema,
    response: 'void',
  }),
};

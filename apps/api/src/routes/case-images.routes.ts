/**
 * Back-office case images.
 *
 * POST /api/backoffice/case-images?user_id=
 * Streams a zip of every attachment of the requested cases. Counts are
 * reported in X-* headers; the archive file is removed once sent.
 */

import { createReadStream } from 'fs';
import { rm } from 'fs/promises';
import type { FastifyPluginAsync } from 'fastify';
import { contract, ARCHIVE_MEDIA_TYPE, CASE_IMAGES_HEADERS } from '@casevault/contract';
import { registerContractRoute } from '../lib/contract-route.js';
import type { CaseImagesArchive, CaseImagesService } from '../services/case-images/case-images.service.js';
import { errorMessage } from '../utils/errors.js';

export interface CaseImagesRouteOptions {
  service: Pick<CaseImagesService, 'createArchive'>;
}

export function caseImagesHeaders(archive: CaseImagesArchive): Record<string, string> {
  return {
    [CASE_IMAGES_HEADERS.downloadedFiles]: String(archive.downloadedFiles),
    [CASE_IMAGES_HEADERS.downloadErrors]: String(archive.downloadErrors),
    [CASE_IMAGES_HEADERS.casesProcessed]: String(archive.casesProcessed),
    [CASE_IMAGES_HEADERS.casesNotFound]: String(archive.casesNotFound.length),
    [CASE_IMAGES_HEADERS.imagesCompressed]: String(archive.compressionStats.imagesCompressed),
    [CASE_IMAGES_HEADERS.pdfsCompressed]: String(archive.compressionStats.pdfsCompressed),
    [CASE_IMAGES_HEADERS.compressionErrors]: String(archive.compressionStats.compressionErrors),
  };
}

export const caseImagesRoutes: FastifyPluginAsync<CaseImagesRouteOptions> = async (fastify, opts) => {
  const PREFIX = '/backoffice';

  registerContractRoute(fastify, contract.caseImages.download, PREFIX, {
    handler: async (request, reply) => {
      const archive = await opts.service.createArchive({
        userId: request.contractData.query.user_id,
        caseIds: request.contractData.body.case_ids,
        endpoint: request.routeOptions.url ?? request.url,
        method: request.method,
        clientIp: request.ip,
      });

      const stream = createReadStream(archive.archivePath);
      stream.on('close', () => {
        rm(archive.archivePath, { force: true }).catch((err: unknown) => {
          request.log.warn(
            { code: 'CASE_IMAGES_ARCHIVE_CLEANUP_FAILED', path: archive.archivePath, error: errorMessage(err) },
            'Could not remove sent archive'
          );
        });
      });

      return reply
        .status(200)
        .type(ARCHIVE_MEDIA_TYPE)
        .header('Content-Disposition', `attachment; filename="${archive.downloadName}"`)
        .headers(caseImagesHeaders(archive))
        .send(stream);
    },
  });
};

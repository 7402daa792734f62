/**
 * Bulk case-file download.
 *
 * Validating → Authorizing → FetchingMetadata → Processing → Assembling →
 * Responding, with Cleanup after every exit path. Cleanup removes the
 * request working directory (not the archive) and writes the request log
 * exactly once.
 */

import { randomUUID } from 'crypto';
import { mkdir, rm } from 'fs/promises';
import { join } from 'path';
import type { FastifyBaseLogger } from 'fastify';
import { hasRoleLevel, type CompressionStats } from '@casevault/domain';
import type { ICaseFileRepository, IUserRepository } from '../../repositories/index.js';
import {
  AppError,
  AuthorizationError,
  InternalError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../../utils/errors.js';
import type { RequestLogger } from '../request-log.service.js';
import type { ArchiveAssembler } from './archive-assembler.js';
import type { BatchScheduler } from './batch-scheduler.js';

export type PipelineState =
  | 'Validating'
  | 'Authorizing'
  | 'FetchingMetadata'
  | 'Processing'
  | 'Assembling'
  | 'Responding';

export interface CaseImagesRequest {
  userId: string;
  caseIds: readonly string[];
  endpoint: string;
  method: string;
  clientIp?: string | null;
}

export interface CaseImagesArchive {
  archivePath: string;
  /** Name offered to the client in Content-Disposition. */
  downloadName: string;
  downloadedFiles: number;
  downloadErrors: number;
  casesProcessed: number;
  casesNotFound: string[];
  compressionStats: CompressionStats;
}

export interface CaseImagesDeps {
  cases: ICaseFileRepository;
  users: IUserRepository;
  scheduler: Pick<BatchScheduler, 'run'>;
  assembler: Pick<ArchiveAssembler, 'assemble'>;
  requestLog: RequestLogger;
  workRoot: string;
  minRoleLevel: number;
  logger: FastifyBaseLogger;
  now?: () => Date;
  shortId?: () => string;
}

/** UTC `YYYYMMDD_HHMMSS`. */
export function archiveTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replaceAll('-', '')}_${iso.slice(11, 19).replaceAll(':', '')}`;
}

export class CaseImagesService {
  private readonly now: () => Date;
  private readonly shortId: () => string;

  constructor(private readonly deps: CaseImagesDeps) {
    this.now = deps.now ?? (() => new Date());
    this.shortId = deps.shortId ?? (() => randomUUID().slice(0, 8));
  }

  async createArchive(request: CaseImagesRequest): Promise<CaseImagesArchive> {
    const { cases, users, scheduler, assembler, requestLog, logger } = this.deps;
    const startedAt = Date.now();
    const stamp = archiveTimestamp(this.now());
    const runName = `case_images_${stamp}_${this.shortId()}`;
    const workDir = join(this.deps.workRoot, runName);
    const archivePath = join(this.deps.workRoot, `${runName}.zip`);

    let state: PipelineState = 'Validating';
    let status = 500;
    let failure: string | null = null;

    try {
      if (request.caseIds.length === 0) {
        throw new ValidationError('case_ids list cannot be empty');
      }

      state = 'Authorizing';
      const level = await users.getRoleLevel(request.userId);
      if (!hasRoleLevel(level, this.deps.minRoleLevel)) {
        logger.warn({ code: 'AUTHZ_DENIED', userId: request.userId, roleLevel: level }, 'Case images access denied');
        throw new AuthorizationError('User does not have permission to access case images.');
      }

      state = 'FetchingMetadata';
      const requestedIds = [...new Set(request.caseIds)];
      const records = await cases.fetchActiveCases(requestedIds);
      if (records.length === 0) {
        throw new NotFoundError('No valid cases found for provided case_ids');
      }
      const found = new Set(records.map(r => r.caseId));
      const casesNotFound = requestedIds.filter(id => !found.has(id));
      if (casesNotFound.length > 0) {
        logger.warn({ code: 'CASE_IMAGES_CASES_NOT_FOUND', caseIds: casesNotFound }, 'Some requested cases were not found');
      }

      state = 'Processing';
      await mkdir(workDir, { recursive: true });
      const result = await scheduler.run(records, workDir);
      if (result.downloadedFiles.length === 0) {
        throw new NotFoundError('No files were successfully downloaded');
      }

      state = 'Assembling';
      const archive = await assembler.assemble(result.downloadedFiles, workDir, result.downloadErrors, archivePath);

      state = 'Responding';
      status = 200;
      logger.info(
        {
          code: 'CASE_IMAGES_READY',
          casesProcessed: result.casesProcessed,
          downloadedFiles: archive.fileCount,
          downloadErrors: archive.errors.length,
          ...result.compressionStats,
        },
        'Case images archive ready'
      );

      return {
        archivePath: archive.path,
        downloadName: `case_images_${stamp}.zip`,
        downloadedFiles: archive.fileCount,
        downloadErrors: archive.errors.length,
        casesProcessed: result.casesProcessed,
        casesNotFound,
        compressionStats: result.compressionStats,
      };
    } catch (err) {
      if (err instanceof AppError) {
        status = err.statusCode;
        failure = err.message;
        throw err;
      }
      status = 500;
      failure = errorMessage(err);
      logger.error({ code: 'CASE_IMAGES_FAILED', state, err }, 'Case images pipeline failed');
      await this.removeQuietly(archivePath, 'CASE_IMAGES_ARCHIVE_CLEANUP_FAILED');
      throw new InternalError('Failed to create case images archive', { cause: err });
    } finally {
      await this.removeQuietly(workDir, 'CASE_IMAGES_CLEANUP_FAILED');
      await requestLog.record({
        userId: request.userId,
        endpoint: request.endpoint,
        method: request.method,
        requestPayload: { case_ids: request.caseIds },
        queryParams: { user_id: request.userId },
        responseStatus: status,
        responsePayload: { cases_requested: request.caseIds.length },
        executionTimeMs: Date.now() - startedAt,
        errorMessage: failure,
        clientIp: request.clientIp ?? null,
      });
    }
  }

  private async removeQuietly(path: string, code: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (err) {
      this.deps.logger.warn({ code, path, error: errorMessage(err) }, 'Cleanup failed');
    }
  }
}

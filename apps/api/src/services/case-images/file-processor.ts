/**
 * One file task end to end: download the original, compress it into the
 * final path, keep the original when compression gives up.
 *
 * Every task resolves to exactly one outcome; nothing here throws.
 */

import { rename, rm } from 'fs/promises';
import { basename, join } from 'path';
import type { FastifyBaseLogger } from 'fastify';
import type { FileTask } from '@casevault/domain';
import type { CompressionStatsCounter } from '../../lib/compression-stats.js';
import { errorMessage } from '../../utils/errors.js';
import type { ObjectStore } from '../object-store.service.js';
import type { FileCompressor } from '../compression/file-compressor.js';

export type FileTaskResult =
  | { success: true; path: string }
  | { success: false; error: string };

export type CaseFileCompressor = Pick<FileCompressor, 'compress'>;

export function originalFilePath(task: FileTask): string {
  return join(task.destinationDirectory, `original_${task.kind}_${basename(task.filename)}`);
}

export function finalFilePath(task: FileTask): string {
  return join(task.destinationDirectory, `${task.kind}_${basename(task.filename)}`);
}

export class FileProcessor {
  constructor(
    private readonly store: ObjectStore,
    private readonly compressor: CaseFileCompressor,
    private readonly logger: FastifyBaseLogger,
  ) {}

  async process(task: FileTask, stats: CompressionStatsCounter): Promise<FileTaskResult> {
    const originalPath = originalFilePath(task);
    const finalPath = finalFilePath(task);

    let downloaded: boolean;
    try {
      downloaded = await this.store.download(task.ownerId, task.filename, originalPath);
    } catch (err) {
      return { success: false, error: `Error downloading ${task.kind} file for case ${task.caseId}: ${errorMessage(err)}` };
    }
    if (!downloaded) {
      this.logger.warn({ code: 'CASE_FILE_DOWNLOAD_FAILED', caseId: task.caseId, kind: task.kind }, 'Case file download failed');
      return { success: false, error: `Failed to download ${task.kind} file for case ${task.caseId}: ${task.filename}` };
    }

    let compressed = false;
    try {
      compressed = await this.compressor.compress(originalPath, finalPath, stats);
    } catch (err) {
      stats.increment('compressionErrors');
      this.logger.warn({ code: 'CASE_FILE_COMPRESSION_ERROR', caseId: task.caseId, kind: task.kind, error: errorMessage(err) }, 'Compression threw, keeping original');
    }

    if (compressed) {
      try {
        await rm(originalPath, { force: true });
      } catch (err) {
        this.logger.warn({ code: 'CASE_FILE_ORIGINAL_CLEANUP_FAILED', path: originalPath, error: errorMessage(err) }, 'Could not remove original file');
      }
      return { success: true, path: finalPath };
    }

    try {
      await rename(originalPath, finalPath);
      return { success: true, path: finalPath };
    } catch (err) {
      return { success: false, error: `Error processing ${task.kind} file for case ${task.caseId}: ${errorMessage(err)}` };
    }
  }
}

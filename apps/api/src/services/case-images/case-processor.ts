/**
 * All files of one case, in their own directory, on a small per-case pool.
 * A failing file never stops its siblings.
 */

import { mkdir } from 'fs/promises';
import { join } from 'path';
import type { FastifyBaseLogger } from 'fastify';
import {
  caseAttachments,
  caseDirectoryName,
  emptyCompressionStats,
  type CaseFileRecord,
  type CaseProcessingResult,
  type FileTask,
} from '@casevault/domain';
import { CompressionStatsCounter } from '../../lib/compression-stats.js';
import { WorkerPool } from '../../lib/worker-pool.js';
import { errorMessage } from '../../utils/errors.js';
import type { FileProcessor } from './file-processor.js';

export class CaseProcessor {
  constructor(
    private readonly fileProcessor: Pick<FileProcessor, 'process'>,
    private readonly fileWorkersPerCase: number,
    private readonly logger: FastifyBaseLogger,
  ) {}

  async process(
    record: CaseFileRecord,
    workDir: string,
    directoryName: string = caseDirectoryName(record),
  ): Promise<CaseProcessingResult> {
    const caseDir = join(workDir, directoryName);
    try {
      await mkdir(caseDir, { recursive: true });
    } catch (err) {
      this.logger.error({ code: 'CASE_DIRECTORY_FAILED', caseId: record.caseId, error: errorMessage(err) }, 'Could not create case directory');
      return {
        files: [],
        errors: [`Error processing case ${record.caseId}: ${errorMessage(err)}`],
        stats: emptyCompressionStats(),
      };
    }

    const tasks: FileTask[] = caseAttachments(record).map(({ kind, filename }) => ({
      kind,
      filename,
      ownerId: record.ownerId,
      caseId: record.caseId,
      destinationDirectory: caseDir,
    }));

    const stats = new CompressionStatsCounter();
    const files: string[] = [];
    const errors: string[] = [];

    const pool = new WorkerPool(Math.min(this.fileWorkersPerCase, tasks.length));
    await pool.map(
      tasks,
      task => this.fileProcessor.process(task, stats),
      outcome => {
        if (outcome.status === 'rejected') {
          errors.push(`Error processing ${outcome.item.kind} file for case ${record.caseId}: ${errorMessage(outcome.reason)}`);
        } else if (outcome.value.success) {
          files.push(outcome.value.path);
        } else {
          errors.push(outcome.value.error);
        }
      },
    );

    return { files, errors, stats: stats.snapshot() };
  }
}

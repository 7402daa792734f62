/**
 * Runs cases batch by batch. Batches are strictly sequential; cases inside a
 * batch share one bounded pool and are merged as each one finishes. Case
 * directories are assigned once per run so no two cases share a folder.
 */

import type { FastifyBaseLogger } from 'fastify';
import {
  assignCaseDirectories,
  chunk,
  planBatches,
  type BatchTuning,
  type CaseFileRecord,
  type PipelineResult,
} from '@casevault/domain';
import { CompressionStatsCounter } from '../../lib/compression-stats.js';
import { WorkerPool } from '../../lib/worker-pool.js';
import { errorMessage } from '../../utils/errors.js';
import type { CaseProcessor } from './case-processor.js';

export class BatchScheduler {
  constructor(
    private readonly caseProcessor: Pick<CaseProcessor, 'process'>,
    private readonly tuning: BatchTuning,
    private readonly availableCores: () => number,
    private readonly logger: FastifyBaseLogger,
  ) {}

  async run(records: readonly CaseFileRecord[], workDir: string): Promise<PipelineResult> {
    const downloadedFiles: string[] = [];
    const downloadErrors: string[] = [];
    const stats = new CompressionStatsCounter();
    let casesProcessed = 0;

    if (records.length === 0) {
      return { downloadedFiles, downloadErrors, compressionStats: stats.snapshot(), casesProcessed };
    }

    const plan = planBatches(records.length, this.availableCores(), this.tuning);
    const batches = chunk(assignCaseDirectories(records), plan.batchSize);
    this.logger.info(
      { code: 'CASE_BATCH_PLAN', totalCases: records.length, batchSize: plan.batchSize, workers: plan.workers, batchCount: batches.length },
      'Planned case batches'
    );

    for (const [batchIndex, batch] of batches.entries()) {
      const pool = new WorkerPool(plan.workers);
      await pool.map(
        batch,
        ({ record, directoryName }) => this.caseProcessor.process(record, workDir, directoryName),
        outcome => {
          casesProcessed++;
          if (outcome.status === 'fulfilled') {
            downloadedFiles.push(...outcome.value.files);
            downloadErrors.push(...outcome.value.errors);
            stats.merge(outcome.value.stats);
          } else {
            this.logger.error(
              { code: 'CASE_PROCESSING_CRASHED', caseId: outcome.item.record.caseId, error: errorMessage(outcome.reason) },
              'Case processing failed unexpectedly'
            );
            downloadErrors.push(`Unexpected error processing case ${outcome.item.record.caseId}: ${errorMessage(outcome.reason)}`);
          }
          this.logger.info(
            { code: 'CASE_BATCH_PROGRESS', batch: batchIndex + 1, batchCount: batches.length, casesProcessed, totalCases: records.length },
            'Case processed'
          );
        },
      );
    }

    return { downloadedFiles, downloadErrors, compressionStats: stats.snapshot(), casesProcessed };
  }
}

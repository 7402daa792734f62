/**
 * Batch planning for bulk case processing.
 *
 * The case list is split into batches that run one after another; cases
 * inside a batch run concurrently on a pool sized from the host CPU count.
 */

export interface BatchTuning {
  /** Share of host cores given to case-level workers. */
  coreFraction: number;
  /** Hard cap on case-level workers regardless of core count. */
  maxCaseWorkers: number;
  /** Up to this many cases run as a single batch. */
  singleBatchMaxCases: number;
  /** Upper bound (inclusive) of the medium tier. */
  mediumBatchMaxCases: number;
  mediumBatchSize: number;
  largeBatchSize: number;
}

export const DEFAULT_BATCH_TUNING: BatchTuning = {
  coreFraction: 0.75,
  maxCaseWorkers: 24,
  singleBatchMaxCases: 10,
  mediumBatchMaxCases: 50,
  mediumBatchSize: 40,
  largeBatchSize: 30,
};

export interface BatchPlan {
  batchSize: number;
  workers: number;
  batchCount: number;
}

/**
 * floor(cores × fraction), capped. Never below one worker so a single-core
 * host still makes progress.
 */
export function computeMaxCaseWorkers(availableCores: number, tuning: BatchTuning = DEFAULT_BATCH_TUNING): number {
  const byCores = Math.floor(availableCores * tuning.coreFraction);
  return Math.max(1, Math.min(byCores, tuning.maxCaseWorkers));
}

export function planBatches(
  caseCount: number,
  availableCores: number,
  tuning: BatchTuning = DEFAULT_BATCH_TUNING,
): BatchPlan {
  if (caseCount <= 0) {
    return { batchSize: 0, workers: 0, batchCount: 0 };
  }

  const maxWorkers = computeMaxCaseWorkers(availableCores, tuning);

  if (caseCount <= tuning.singleBatchMaxCases) {
    return {
      batchSize: caseCount,
      workers: Math.min(maxWorkers, caseCount),
      batchCount: 1,
    };
  }

  const batchSize = caseCount <= tuning.mediumBatchMaxCases
    ? tuning.mediumBatchSize
    : tuning.largeBatchSize;

  return {
    batchSize,
    workers: maxWorkers,
    batchCount: Math.ceil(caseCount / batchSize),
  };
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

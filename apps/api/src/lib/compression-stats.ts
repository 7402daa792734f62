import { emptyCompressionStats, type CompressionStats } from '@casevault/domain';

/**
 * Shared compression counters.
 *
 * One instance is passed by reference to every file worker of a case.
 * Increments are synchronous, so no two workers can interleave inside one.
 */
export class CompressionStatsCounter {
  private readonly counts: CompressionStats = emptyCompressionStats();

  increment(field: keyof CompressionStats, by = 1): void {
    this.counts[field] += by;
  }

  merge(other: CompressionStats): void {
    this.counts.imagesCompressed += other.imagesCompressed;
    this.counts.pdfsCompressed += other.pdfsCompressed;
    this.counts.compressionErrors += other.compressionErrors;
  }

  snapshot(): CompressionStats {
    return { ...this.counts };
  }
}

/**
 * FileCompressor
 *
 * Shrinks one downloaded case file into its final path. Compression is an
 * optimization only: whenever a compressor gives up, the caller still gets
 * a usable file.
 *
 * - Below the skip threshold, or not an image/PDF: verbatim copy, no stats.
 * - Images: size-tiered JPEG re-encode. Failure counts a compression error
 *   and returns false so the caller keeps the original.
 * - PDFs: Ghostscript, then document-level re-serialization, then a verbatim
 *   copy. Ending on the copy counts a compression error but still returns true.
 *
 * The compression mode is read through the provider on every call so a
 * change made while a pipeline runs applies to the next file.
 */

import { copyFile, rm, stat } from 'fs/promises';
import type { FastifyBaseLogger } from 'fastify';
import {
  classifyFile,
  selectImageTier,
  selectPdfTier,
  skipThreshold,
  type CompressionMode,
} from '@casevault/domain';
import type { CompressionStatsCounter } from '../../lib/compression-stats.js';
import { runStrategyChain } from '../../lib/strategy-chain.js';
import { errorMessage } from '../../utils/errors.js';
import type { CompressionPrimitives } from './primitives.js';

export class FileCompressor {
  constructor(
    private readonly primitives: CompressionPrimitives,
    private readonly compressionMode: () => CompressionMode,
    private readonly logger: FastifyBaseLogger,
  ) {}

  async compress(source: string, destination: string, stats: CompressionStatsCounter): Promise<boolean> {
    let size: number;
    try {
      size = (await stat(source)).size;
    } catch (err) {
      this.logger.warn({ code: 'COMPRESSION_SOURCE_MISSING', file: source, error: errorMessage(err) }, 'Cannot read file to compress');
      stats.increment('compressionErrors');
      return false;
    }

    const fileClass = classifyFile(source);
    if (fileClass === 'other' || size < skipThreshold(this.compressionMode())) {
      return this.copyVerbatim(source, destination, stats);
    }

    if (fileClass === 'image') {
      return this.compressImage(source, destination, size, stats);
    }
    return this.compressPdf(source, destination, size, stats);
  }

  private async compressImage(
    source: string,
    destination: string,
    size: number,
    stats: CompressionStatsCounter,
  ): Promise<boolean> {
    const { quality, maxWidth } = selectImageTier(size);
    let compressed = false;
    try {
      compressed = await this.primitives.compressImage(source, destination, quality, maxWidth);
    } catch (err) {
      this.logger.warn({ code: 'IMAGE_COMPRESSION_FAILED', file: source, error: errorMessage(err) }, 'Image compression failed');
    }

    if (compressed) {
      stats.increment('imagesCompressed');
      return true;
    }
    stats.increment('compressionErrors');
    await rm(destination, { force: true });
    return false;
  }

  private async compressPdf(
    source: string,
    destination: string,
    size: number,
    stats: CompressionStatsCounter,
  ): Promise<boolean> {
    const { preset } = selectPdfTier(size);
    const result = await runStrategyChain([
      { name: 'ghostscript', run: () => this.primitives.compressPdf(source, destination, preset) },
      { name: 'document-rewrite', run: () => this.primitives.compressPdfFallback(source, destination) },
      { name: 'copy', run: () => this.copy(source, destination) },
    ]);

    switch (result.succeeded) {
      case 'ghostscript':
      case 'document-rewrite':
        stats.increment('pdfsCompressed');
        return true;
      case 'copy':
        this.logger.warn(
          { code: 'PDF_COMPRESSION_EXHAUSTED', file: source, failed: result.failures.map(f => f.name) },
          'PDF compression failed, kept original'
        );
        stats.increment('compressionErrors');
        return true;
      default:
        stats.increment('compressionErrors');
        await rm(destination, { force: true });
        return false;
    }
  }

  private async copyVerbatim(source: string, destination: string, stats: CompressionStatsCounter): Promise<boolean> {
    try {
      return await this.copy(source, destination);
    } catch (err) {
      this.logger.warn({ code: 'COMPRESSION_COPY_FAILED', file: source, error: errorMessage(err) }, 'Verbatim copy failed');
      stats.increment('compressionErrors');
      return false;
    }
  }

  private async copy(source: string, destination: string): Promise<boolean> {
    await copyFile(source, destination);
    return true;
  }
}

/**
 * Streams the produced files into one zip on disk.
 *
 * Entries keep their path relative to the request working directory, so
 * the archive mirrors the per-case folders. Each file is read in chunks and
 * deflated as it arrives; the reader is not pulled again until the archive
 * file has drained. A file that cannot be opened is recorded and skipped.
 * Errors, if any, go into `download_errors.txt`.
 */

import { createReadStream, createWriteStream, type WriteStream } from 'fs';
import { mkdir, rm } from 'fs/promises';
import { once } from 'events';
import { finished } from 'stream/promises';
import { dirname, relative, sep } from 'path';
import { Zip, ZipDeflate, strToU8 } from 'fflate';
import type { FastifyBaseLogger } from 'fastify';
import { NotFoundError, errorMessage } from '../../utils/errors.js';

export const ERROR_MANIFEST_NAME = 'download_errors.txt';
const ARCHIVE_COMPRESSION_LEVEL = 6;

export interface AssembledArchive {
  path: string;
  /** Case files in the archive, manifest excluded. */
  fileCount: number;
  /** Input errors followed by any archive read errors. */
  errors: string[];
}

export type EntryReader = (path: string) => AsyncIterable<Uint8Array>;

export function archiveEntryName(workDir: string, file: string): string {
  return relative(workDir, file).split(sep).join('/');
}

/** The archive file. Write failures surface from `drained()` and `finished()`. */
class ArchiveOutput {
  private failure: Error | null = null;

  private constructor(private readonly stream: WriteStream) {
    stream.on('error', err => {
      this.failure = err;
    });
  }

  static async open(path: string): Promise<ArchiveOutput> {
    const stream = createWriteStream(path);
    const output = new ArchiveOutput(stream);
    await once(stream, 'open');
    return output;
  }

  write(chunk: Uint8Array): void {
    if (!this.failure) {
      this.stream.write(chunk);
    }
  }

  end(): void {
    this.stream.end();
  }

  fail(err: Error): void {
    this.stream.destroy(err);
  }

  async drained(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.stream.writableNeedDrain) {
      await once(this.stream, 'drain');
    }
  }

  async finished(): Promise<void> {
    await finished(this.stream);
  }

  close(): void {
    this.stream.destroy();
  }
}

export class ArchiveAssembler {
  constructor(
    private readonly logger: FastifyBaseLogger,
    private readonly readEntry: EntryReader = path => createReadStream(path),
  ) {}

  async assemble(
    files: readonly string[],
    workDir: string,
    errors: readonly string[],
    archivePath: string,
  ): Promise<AssembledArchive> {
    await mkdir(dirname(archivePath), { recursive: true });
    const output = await ArchiveOutput.open(archivePath);

    const allErrors = [...errors];
    let fileCount = 0;

    try {
      const zip = new Zip((err, chunk, final) => {
        if (err) {
          output.fail(err);
          return;
        }
        output.write(chunk);
        if (final) {
          output.end();
        }
      });

      for (const file of files) {
        const entryName = archiveEntryName(workDir, file);
        const failure = await this.addEntry(zip, output, entryName, file);
        if (failure === null) {
          fileCount++;
          continue;
        }
        this.logger.warn({ code: 'ARCHIVE_ENTRY_FAILED', entry: entryName, error: failure }, 'Could not add file to archive');
        allErrors.push(`Error adding ${entryName} to archive: ${failure}`);
      }

      if (allErrors.length > 0) {
        const manifest = new ZipDeflate(ERROR_MANIFEST_NAME, { level: ARCHIVE_COMPRESSION_LEVEL });
        zip.add(manifest);
        manifest.push(strToU8(allErrors.join('\n') + '\n'), true);
      }

      zip.end();
      await output.finished();
    } catch (err) {
      output.close();
      await this.discard(archivePath);
      throw err;
    }

    if (fileCount === 0) {
      await this.discard(archivePath);
      throw new NotFoundError('No files were successfully downloaded');
    }

    return { path: archivePath, fileCount, errors: allErrors };
  }

  /**
   * Stream one file into the zip. Resolves to null when added, or to the read
   * error message. A file that fails after its first chunk stays in the
   * archive truncated and is not counted. Write errors reject.
   */
  private async addEntry(zip: Zip, output: ArchiveOutput, entryName: string, file: string): Promise<string | null> {
    const source = this.readEntry(file)[Symbol.asyncIterator]();

    let step: IteratorResult<Uint8Array>;
    try {
      step = await source.next();
    } catch (err) {
      return errorMessage(err);
    }

    const entry = new ZipDeflate(entryName, { level: ARCHIVE_COMPRESSION_LEVEL });
    zip.add(entry);

    let readFailure: string | null = null;
    while (!step.done) {
      entry.push(step.value);
      await output.drained();
      try {
        step = await source.next();
      } catch (err) {
        readFailure = errorMessage(err);
        break;
      }
    }
    entry.push(new Uint8Array(0), true);
    await output.drained();
    return readFailure;
  }

  private async discard(archivePath: string): Promise<void> {
    try {
      await rm(archivePath, { force: true });
    } catch (err) {
      this.logger.warn({ code: 'ARCHIVE_DISCARD_FAILED', path: archivePath, error: errorMessage(err) }, 'Could not remove archive');
    }
  }
}

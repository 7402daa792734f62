import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { copyFile, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import type { FileTask } from '@casevault/domain';
import { FileProcessor } from '../src/services/case-images/file-processor.js';
import type { ObjectStore } from '../src/services/object-store.service.js';
import type { FileCompressor } from '../src/services/compression/file-compressor.js';
import { CompressionStatsCounter } from '../src/lib/compression-stats.js';
import { makeTempDir, removeDir, silentLogger } from './helpers.js';

let dir: string;

const download = vi.fn<ObjectStore['download']>();
const compress = vi.fn<FileCompressor['compress']>();

function task(overrides: Partial<FileTask> = {}): FileTask {
  return {
    kind: 'demo',
    filename: 'scan.pdf',
    ownerId: 'owner-1',
    caseId: 'C1',
    destinationDirectory: dir,
    ...overrides,
  };
}

function processor(): FileProcessor {
  return new FileProcessor({ download }, { compress }, silentLogger);
}

beforeEach(async () => {
  dir = await makeTempDir();
  download.mockReset().mockImplementation(async (_owner, filename, localPath) => {
    await writeFile(localPath, `bytes of ${filename}`);
    return true;
  });
  compress.mockReset().mockImplementation(async (source, destination) => {
    await copyFile(source, destination);
    return true;
  });
});

afterEach(async () => {
  await removeDir(dir);
});

describe('FileProcessor', () => {
  it('downloads to the original name, compresses to the final name and removes the original', async () => {
    const result = await processor().process(task(), new CompressionStatsCounter());

    expect(result).toEqual({ success: true, path: join(dir, 'demo_scan.pdf') });
    expect(download).toHaveBeenCalledWith('owner-1', 'scan.pdf', join(dir, 'original_demo_scan.pdf'));
    expect(compress).toHaveBeenCalledWith(
      join(dir, 'original_demo_scan.pdf'),
      join(dir, 'demo_scan.pdf'),
      expect.any(CompressionStatsCounter),
    );
    expect(existsSync(join(dir, 'original_demo_scan.pdf'))).toBe(false);
  });

  it('names local files after the last path segment of the stored filename', async () => {
    const result = await processor().process(task({ kind: 'misc', filename: 'uploads/2024/xray.png' }), new CompressionStatsCounter());

    expect(result).toEqual({ success: true, path: join(dir, 'misc_xray.png') });
  });

  it('reports a failed download without compressing', async () => {
    download.mockResolvedValue(false);

    const result = await processor().process(task(), new CompressionStatsCounter());

    expect(result).toEqual({ success: false, error: 'Failed to download demo file for case C1: scan.pdf' });
    expect(compress).not.toHaveBeenCalled();
  });

  it('reports a download that throws', async () => {
    download.mockRejectedValue(new Error('network down'));

    const result = await processor().process(task({ kind: 'note' }), new CompressionStatsCounter());

    expect(result).toEqual({ success: false, error: 'Error downloading note file for case C1: network down' });
  });

  it('keeps the original under the final name when compression gives up', async () => {
    compress.mockResolvedValue(false);

    const result = await processor().process(task(), new CompressionStatsCounter());

    expect(result).toEqual({ success: true, path: join(dir, 'demo_scan.pdf') });
    expect(await readFile(join(dir, 'demo_scan.pdf'), 'utf8')).toBe('bytes of scan.pdf');
    expect(existsSync(join(dir, 'original_demo_scan.pdf'))).toBe(false);
  });

  it('counts a compression error when the compressor throws and still keeps the file', async () => {
    compress.mockRejectedValue(new Error('sharp crashed'));
    const stats = new CompressionStatsCounter();

    const result = await processor().process(task(), stats);

    expect(result.success).toBe(true);
    expect(stats.snapshot().compressionErrors).toBe(1);
  });

  it('fails when the original cannot be moved into place', async () => {
    download.mockResolvedValue(true);
    compress.mockResolvedValue(false);

    const result = await processor().process(task(), new CompressionStatsCounter());

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatch(/^Error processing demo file for case C1: /);
    }
  });
});

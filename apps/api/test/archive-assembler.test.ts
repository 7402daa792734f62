import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { strFromU8, strToU8, unzipSync } from 'fflate';
import { ArchiveAssembler, ERROR_MANIFEST_NAME, archiveEntryName } from '../src/services/case-images/archive-assembler.js';
import { NotFoundError } from '../src/utils/errors.js';
import { makeTempDir, removeDir, silentLogger } from './helpers.js';

let root: string;
let workDir: string;
let archivePath: string;

async function caseFile(caseDir: string, name: string, content: string): Promise<string> {
  await mkdir(join(workDir, caseDir), { recursive: true });
  const path = join(workDir, caseDir, name);
  await writeFile(path, content);
  return path;
}

async function readArchive(path: string): Promise<Record<string, string>> {
  const entries = unzipSync(new Uint8Array(await readFile(path)));
  return Object.fromEntries(Object.entries(entries).map(([name, data]) => [name, strFromU8(data)]));
}

beforeEach(async () => {
  root = await makeTempDir();
  workDir = join(root, 'case_images_run');
  archivePath = join(root, 'case_images_run.zip');
});

afterEach(async () => {
  await removeDir(root);
});

describe('ArchiveAssembler', () => {
  it('mirrors the per-case layout and omits the manifest when there are no errors', async () => {
    const files = [
      await caseFile('C1_Jane_Doe', 'demo_a.pdf', 'pdf-a'),
      await caseFile('C1_Jane_Doe', 'note_b.jpg', 'jpg-b'),
      await caseFile('C2', 'misc_c.txt', 'txt-c'),
    ];

    const archive = await new ArchiveAssembler(silentLogger).assemble(files, workDir, [], archivePath);

    expect(archive).toEqual({ path: archivePath, fileCount: 3, errors: [] });
    expect(await readArchive(archivePath)).toEqual({
      'C1_Jane_Doe/demo_a.pdf': 'pdf-a',
      'C1_Jane_Doe/note_b.jpg': 'jpg-b',
      'C2/misc_c.txt': 'txt-c',
    });
  });

  it('writes every error line into the manifest', async () => {
    const files = [await caseFile('A', 'demo_a.pdf', 'a')];
    const errors = ['Failed to download demo file for case B: b.pdf', 'Error processing case C: EACCES'];

    const archive = await new ArchiveAssembler(silentLogger).assemble(files, workDir, errors, archivePath);

    const entries = await readArchive(archivePath);
    expect(Object.keys(entries).sort()).toEqual(['A/demo_a.pdf', ERROR_MANIFEST_NAME]);
    expect(entries[ERROR_MANIFEST_NAME]).toBe(
      'Failed to download demo file for case B: b.pdf\nError processing case C: EACCES\n',
    );
    expect(archive.fileCount).toBe(1);
  });

  it('skips files that cannot be read and records them', async () => {
    const good = await caseFile('A', 'demo_a.pdf', 'a');
    const missing = join(workDir, 'A', 'note_gone.pdf');

    const archive = await new ArchiveAssembler(silentLogger).assemble([good, missing], workDir, [], archivePath);

    expect(archive.fileCount).toBe(1);
    expect(archive.errors).toHaveLength(1);
    expect(archive.errors[0]).toMatch(/^Error adding A\/note_gone\.pdf to archive: /);
    const entries = await readArchive(archivePath);
    expect(Object.keys(entries).sort()).toEqual(['A/demo_a.pdf', ERROR_MANIFEST_NAME]);
    expect(entries[ERROR_MANIFEST_NAME]).toBe(`${archive.errors[0]}\n`);
  });

  it('fails with not found and leaves no archive when no file can be added', async () => {
    const files = [await caseFile('A', 'demo_a.pdf', 'a'), await caseFile('B', 'demo_b.pdf', 'b')];
    const assembler = new ArchiveAssembler(silentLogger, async function* () {
      throw new Error('disk read error');
    });

    await expect(assembler.assemble(files, workDir, [], archivePath)).rejects.toBeInstanceOf(NotFoundError);
    expect(existsSync(archivePath)).toBe(false);
  });

  it('streams multi-chunk files without altering their bytes', async () => {
    const big = new Uint8Array(3 * 1024 * 1024).map((_, i) => (i * 31) % 251);
    const path = join(workDir, 'A', 'demo_big.pdf');
    await mkdir(join(workDir, 'A'), { recursive: true });
    await writeFile(path, big);

    const archive = await new ArchiveAssembler(silentLogger).assemble([path], workDir, [], archivePath);

    expect(archive.fileCount).toBe(1);
    const entries = unzipSync(new Uint8Array(await readFile(archivePath)));
    expect(Object.keys(entries)).toEqual(['A/demo_big.pdf']);
    expect(Buffer.from(entries['A/demo_big.pdf']).equals(Buffer.from(big))).toBe(true);
  });

  it('records a file whose read fails part way and keeps the others', async () => {
    const good = await caseFile('A', 'demo_a.pdf', 'a');
    const broken = join(workDir, 'B', 'demo_b.pdf');
    const assembler = new ArchiveAssembler(silentLogger, async function* (path) {
      if (path === broken) {
        yield strToU8('part');
        throw new Error('EIO: i/o error, read');
      }
      yield strToU8('a');
    });

    const archive = await assembler.assemble([good, broken], workDir, [], archivePath);

    expect(archive.fileCount).toBe(1);
    expect(archive.errors).toEqual(['Error adding B/demo_b.pdf to archive: EIO: i/o error, read']);
    const entries = await readArchive(archivePath);
    expect(entries[ERROR_MANIFEST_NAME]).toBe('Error adding B/demo_b.pdf to archive: EIO: i/o error, read\n');
  });

  it('rejects when the archive file cannot be written', async () => {
    const files = [await caseFile('A', 'demo_a.pdf', 'a')];
    await mkdir(archivePath);
    const readEntry = vi.fn(async function* () {
      await new Promise(r => setTimeout(r, 50));
      yield strToU8('a');
    });

    await expect(new ArchiveAssembler(silentLogger, readEntry).assemble(files, workDir, [], archivePath))
      .rejects.toMatchObject({ code: 'EISDIR' });
    expect(readEntry).not.toHaveBeenCalled();
  });
});

describe('archiveEntryName', () => {
  it('uses forward slashes relative to the working directory', () => {
    expect(archiveEntryName('/tmp/run', join('/tmp/run', 'C1', 'demo_a.pdf'))).toBe('C1/demo_a.pdf');
  });
});

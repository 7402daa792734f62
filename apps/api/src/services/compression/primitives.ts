/**
 * Compression primitives.
 *
 * Each primitive writes `output` from `input` and reports success. A false
 * result may leave a partial output behind; callers clear it.
 */

import { spawn } from 'child_process';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import type { FastifyBaseLogger } from 'fastify';
import { pdfPresetDpi, type PdfPreset } from '@casevault/domain';
import { errorMessage } from '../../utils/errors.js';

export interface CompressionPrimitives {
  compressImage(input: string, output: string, quality: number, maxWidth: number): Promise<boolean>;
  compressPdf(input: string, output: string, preset: PdfPreset): Promise<boolean>;
  compressPdfFallback(input: string, output: string): Promise<boolean>;
}

export interface PrimitiveOptions {
  ghostscriptPath: string;
  ghostscriptTimeoutMs: number;
  logger: FastifyBaseLogger;
}

/** True when the file parses as a PDF with at least one page. */
export async function isReadablePdf(path: string): Promise<boolean> {
  try {
    const doc = await PDFDocument.load(await readFile(path), { updateMetadata: false });
    return doc.getPageCount() > 0;
  } catch {
    return false;
  }
}

/**
 * Re-encode as JPEG: EXIF orientation applied, metadata dropped,
 * transparency flattened onto white, width capped without enlarging.
 */
export async function compressImageWithSharp(
  input: string,
  output: string,
  quality: number,
  maxWidth: number,
): Promise<boolean> {
  await mkdir(dirname(output), { recursive: true });
  await sharp(input)
    .rotate()
    .flatten({ background: '#ffffff' })
    .resize({ width: maxWidth, fit: 'inside', withoutEnlargement: true })
    .jpeg({ quality, mozjpeg: true })
    .toFile(output);
  return true;
}

export function ghostscriptArgs(input: string, output: string, preset: PdfPreset): string[] {
  const dpi = pdfPresetDpi(preset);
  return [
    '-sDEVICE=pdfwrite',
    '-dCompatibilityLevel=1.4',
    `-dPDFSETTINGS=/${preset}`,
    '-dNOPAUSE',
    '-dQUIET',
    '-dBATCH',
    '-dColorImageDownsampleType=/Bicubic',
    `-dColorImageResolution=${dpi}`,
    '-dGrayImageDownsampleType=/Bicubic',
    `-dGrayImageResolution=${dpi}`,
    '-dMonoImageDownsampleType=/Bicubic',
    `-dMonoImageResolution=${dpi}`,
    `-sOutputFile=${output}`,
    input,
  ];
}

/**
 * Run a command to completion. Rejects on spawn failure, non-zero exit or
 * timeout (the child is killed).
 */
export function runCommand(command: string, args: string[], timeoutMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    let err = '';
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.stderr.on('data', (c: Buffer) => (err += c.toString()));
    child.on('error', (e) => {
      clearTimeout(timer);
      reject(e);
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      if (timedOut) reject(new Error(`${command} timed out after ${timeoutMs}ms`));
      else if (code === 0) resolve();
      else reject(new Error(err.trim() || `${command} exited with code ${code}`));
    });
  });
}

export function createCompressionPrimitives(options: PrimitiveOptions): CompressionPrimitives {
  const { ghostscriptPath, ghostscriptTimeoutMs, logger } = options;

  return {
    async compressImage(input, output, quality, maxWidth) {
      try {
        return await compressImageWithSharp(input, output, quality, maxWidth);
      } catch (err) {
        logger.warn({ code: 'IMAGE_COMPRESSION_FAILED', file: input, error: errorMessage(err) }, 'Image compression failed');
        return false;
      }
    },

    async compressPdf(input, output, preset) {
      try {
        await mkdir(dirname(output), { recursive: true });
        await runCommand(ghostscriptPath, ghostscriptArgs(input, output, preset), ghostscriptTimeoutMs);
      } catch (err) {
        logger.warn({ code: 'PDF_COMPRESSION_FAILED', file: input, preset, error: errorMessage(err) }, 'Ghostscript compression failed');
        return false;
      }
      if (!(await isReadablePdf(output))) {
        logger.warn({ code: 'PDF_COMPRESSION_INVALID', file: input, preset }, 'Ghostscript produced an unreadable PDF');
        return false;
      }
      return true;
    },

    async compressPdfFallback(input, output) {
      try {
        const doc = await PDFDocument.load(await readFile(input), { updateMetadata: false });
        const bytes = await doc.save({ useObjectStreams: true });
        await mkdir(dirname(output), { recursive: true });
        await writeFile(output, bytes);
      } catch (err) {
        logger.warn({ code: 'PDF_FALLBACK_FAILED', file: input, error: errorMessage(err) }, 'Fallback PDF compression failed');
        return false;
      }
      return isReadablePdf(output);
    },
  };
}

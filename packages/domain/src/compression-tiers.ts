/**
 * Size-tiered compression settings.
 *
 * Tier boundaries are strict: a file must be larger than the threshold to
 * fall into the lower-quality tier.
 */

import type { CompressionMode } from './case-files.js';

export const KiB = 1024;
export const MiB = 1024 * KiB;

export const SMALL_FILE_THRESHOLD = 100 * KiB;
export const AGGRESSIVE_SMALL_FILE_THRESHOLD = 50 * KiB;

export type FileClass = 'image' | 'pdf' | 'other';

export type PdfPreset = 'screen' | 'ebook';

export interface ImageTier {
  quality: number;
  maxWidth: number;
}

export interface PdfTier {
  preset: PdfPreset;
}

const IMAGE_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'tiff', 'tif', 'bmp']);

// Ordered largest threshold first; the first match wins.
const IMAGE_TIERS: Array<{ above: number; tier: ImageTier }> = [
  { above: 10 * MiB, tier: { quality: 60, maxWidth: 1200 } },
  { above: 5 * MiB, tier: { quality: 70, maxWidth: 1400 } },
];
const DEFAULT_IMAGE_TIER: ImageTier = { quality: 75, maxWidth: 1600 };

const PDF_TIERS: Array<{ above: number; tier: PdfTier }> = [
  { above: 20 * MiB, tier: { preset: 'screen' } },
  { above: 10 * MiB, tier: { preset: 'ebook' } },
];
const DEFAULT_PDF_TIER: PdfTier = { preset: 'ebook' };

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  if (dot < 0 || dot === filename.length - 1) return '';
  return filename.slice(dot + 1).toLowerCase();
}

export function classifyFile(filename: string): FileClass {
  const ext = fileExtension(filename);
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  if (ext === 'pdf') return 'pdf';
  return 'other';
}

export function skipThreshold(mode: CompressionMode): number {
  return mode === 'aggressive' ? AGGRESSIVE_SMALL_FILE_THRESHOLD : SMALL_FILE_THRESHOLD;
}

export function selectImageTier(sizeBytes: number): ImageTier {
  return IMAGE_TIERS.find(t => sizeBytes > t.above)?.tier ?? DEFAULT_IMAGE_TIER;
}

export function selectPdfTier(sizeBytes: number): PdfTier {
  return PDF_TIERS.find(t => sizeBytes > t.above)?.tier ?? DEFAULT_PDF_TIER;
}

/** Image downsampling resolution Ghostscript uses for each preset. */
export function pdfPresetDpi(preset: PdfPreset): number {
  return preset === 'screen' ? 72 : 150;
}

import { z } from 'zod';

// ============================================================================
// ENUMS
// ============================================================================

/** Attachment slots a case can carry. Order is the processing order. */
export const FileKind = z.enum(['demo', 'note', 'misc']);
export type FileKind = z.infer<typeof FileKind>;

export const CompressionMode = z.enum(['standard', 'aggressive']);
export type CompressionMode = z.infer<typeof CompressionMode>;

// ============================================================================
// ROLE LEVELS
// ============================================================================

/** Minimum user_type allowed to pull case files in bulk. */
export const ADMIN_ROLE_LEVEL = 10;

export function hasRoleLevel(level: number | null, minimum: number): boolean {
  return level !== null && level >= minimum;
}

// ============================================================================
// PIPELINE RECORDS
// ============================================================================

/** Read-only snapshot of one active case, as fetched for a bulk download. */
export interface CaseFileRecord {
  caseId: string;
  ownerId: string;
  demoFile: string | null;
  noteFile: string | null;
  miscFile: string | null;
  patientFirst: string | null;
  patientLast: string | null;
}

export interface FileTask {
  kind: FileKind;
  filename: string;
  ownerId: string;
  caseId: string;
  destinationDirectory: string;
}

export interface CompressionStats {
  imagesCompressed: number;
  pdfsCompressed: number;
  compressionErrors: number;
}

export interface CaseProcessingResult {
  files: string[];
  errors: string[];
  stats: CompressionStats;
}

export interface PipelineResult {
  downloadedFiles: string[];
  downloadErrors: string[];
  compressionStats: CompressionStats;
  casesProcessed: number;
}

export function emptyCompressionStats(): CompressionStats {
  return { imagesCompressed: 0, pdfsCompressed: 0, compressionErrors: 0 };
}

/**
 * Attachment filenames of a case in processing order, skipping empty slots.
 */
export function caseAttachments(record: CaseFileRecord): Array<{ kind: FileKind; filename: string }> {
  const slots: Array<[FileKind, string | null]> = [
    ['demo', record.demoFile],
    ['note', record.noteFile],
    ['misc', record.miscFile],
  ];
  const attachments: Array<{ kind: FileKind; filename: string }> = [];
  for (const [kind, filename] of slots) {
    if (filename && filename.trim() !== '') {
      attachments.push({ kind, filename });
    }
  }
  return attachments;
}

/**
 * Directory name for one case: `<caseId>_<first last>` with whitespace and
 * path separators collapsed to underscores. Not unique on its own; see
 * `assignCaseDirectories`.
 */
export function caseDirectoryName(record: Pick<CaseFileRecord, 'caseId' | 'patientFirst' | 'patientLast'>): string {
  const patientName = `${record.patientFirst ?? ''} ${record.patientLast ?? ''}`.trim();
  const raw = patientName ? `${record.caseId}_${patientName}` : record.caseId;
  const name = raw.replace(/[\s/\\]+/g, '_');
  return /^\.*$/.test(name) ? name.replace(/\./g, '_') || '_' : name;
}

export interface CaseDirectoryAssignment {
  record: CaseFileRecord;
  directoryName: string;
}

/**
 * One directory per case for a whole run. Names that collapse to the same
 * folder (compared case-insensitively) get a `_2`, `_3`, ... suffix in
 * input order.
 */
export function assignCaseDirectories(records: readonly CaseFileRecord[]): CaseDirectoryAssignment[] {
  const taken = new Set<string>();
  return records.map(record => {
    const base = caseDirectoryName(record);
    let directoryName = base;
    for (let n = 2; taken.has(directoryName.toLowerCase()); n++) {
      directoryName = `${base}_${n}`;
    }
    taken.add(directoryName.toLowerCase());
    return { record, directoryName };
  });
}

/**
 * PostgreSQL Case File Repository Implementation
 */

import type { CaseFileRecord } from '@casevault/domain';
import { query } from '../../db/index.js';
import type { ICaseFileRepository } from '../interfaces/case-file.repository.js';

interface CaseFileRow {
  case_id: string;
  user_id: string;
  demo_file: string | null;
  note_file: string | null;
  misc_file: string | null;
  patient_first: string | null;
  patient_last: string | null;
}

function mapCaseFileRow(row: CaseFileRow): CaseFileRecord {
  return {
    caseId: row.case_id,
    ownerId: row.user_id,
    demoFile: row.demo_file,
    noteFile: row.note_file,
    miscFile: row.misc_file,
    patientFirst: row.patient_first,
    patientLast: row.patient_last,
  };
}

export class PostgresCaseFileRepository implements ICaseFileRepository {
  async fetchActiveCases(caseIds: readonly string[]): Promise<CaseFileRecord[]> {
    if (caseIds.length === 0) {
      return [];
    }
    const result = await query<CaseFileRow>(
      `SELECT case_id, user_id, demo_file, note_file, misc_file, patient_first, patient_last
       FROM cases
       WHERE case_id = ANY($1::text[]) AND active = true`,
      [caseIds]
    );
    return result.rows.map(mapCaseFileRow);
  }
}

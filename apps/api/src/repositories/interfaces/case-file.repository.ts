/**
 * Case File Repository Interface
 * Read-only access to the attachment slots of active cases
 */

import type { CaseFileRecord } from '@casevault/domain';

export interface ICaseFileRepository {
  /**
   * Active cases whose id is in `caseIds`. Unknown or inactive ids are
   * simply absent from the result; order is unspecified.
   */
  fetchActiveCases(caseIds: readonly string[]): Promise<CaseFileRecord[]>;
}

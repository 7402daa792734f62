/**
 * PostgreSQL User Repository Implementation
 */

import { query } from '../../db/index.js';
import type { IUserRepository } from '../interfaces/user.repository.js';

export class PostgresUserRepository implements IUserRepository {
  async getRoleLevel(userId: string): Promise<number | null> {
    const result = await query<{ user_type: number | string | null }>(
      `SELECT user_type FROM user_profile WHERE user_id = $1 AND active = true`,
      [userId]
    );
    const raw = result.rows[0]?.user_type;
    if (raw === null || raw === undefined) {
      return null;
    }
    // user_type may arrive as text depending on the column type
    const level = Number(raw);
    return Number.isFinite(level) ? level : null;
  }
}

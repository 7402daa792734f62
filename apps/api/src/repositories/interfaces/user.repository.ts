/**
 * User Repository Interface
 */

export interface IUserRepository {
  /** Role level (`user_type`) of an active user, or null when unknown. */
  getRoleLevel(userId: string): Promise<number | null>;
}

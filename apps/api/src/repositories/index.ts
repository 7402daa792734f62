/**
 * Repository Factory
 *
 * Provides singleton repository instances backed by PostgreSQL.
 */

import type { ICaseFileRepository, IUserRepository } from './interfaces/index.js';
import { PostgresCaseFileRepository, PostgresUserRepository } from './postgres/index.js';

// Singleton instances
let caseFileRepository: ICaseFileRepository | null = null;
let userRepository: IUserRepository | null = null;

/**
 * Get the case file repository instance
 */
export function getCaseFileRepository(): ICaseFileRepository {
  if (!caseFileRepository) {
    caseFileRepository = new PostgresCaseFileRepository();
  }
  return caseFileRepository;
}

/**
 * Get the user repository instance
 */
export function getUserRepository(): IUserRepository {
  if (!userRepository) {
    userRepository = new PostgresUserRepository();
  }
  return userRepository;
}

/**
 * Reset all repository instances (useful for testing)
 */
export function resetRepositories(): void {
  caseFileRepository = null;
  userRepository = null;
}

// Re-export interfaces for convenience
export * from './interfaces/index.js';

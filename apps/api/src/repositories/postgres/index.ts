/**
 * PostgreSQL Repository Implementations
 */

export { PostgresCaseFileRepository } from './case-file.repository.js';
export { PostgresUserRepository } from './user.repository.js';

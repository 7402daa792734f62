/**
 * Repository Interfaces
 */

export * from './case-file.repository.js';
export * from './user.repository.js';

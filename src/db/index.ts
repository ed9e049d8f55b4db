/**
 * Database module exports.
 */

export { createDatabase } from './client';
export type { VectorDatabase, DatabaseConnection } from './client';

// Schemas
export * from './schema';

/**
 * Vector Store Schema (Drizzle ORM)
 *
 * One table holds every document's chunks and their embeddings.
 */

import {
  pgTable,
  varchar,
  text,
  integer,
  bigserial,
  timestamp,
  jsonb,
  index,
  customType,
} from 'drizzle-orm/pg-core';
import type { ChunkMetadata } from '../../types/rag';
import { DEFAULT_EMBEDDING_DIMENSIONS } from '../../lib/rag/config';

// =============================================================================
// Custom Type: pgvector
// =============================================================================

/**
 * Custom type for pgvector embeddings.
 * Stores vectors as float arrays, serializes to/from pgvector format.
 */
export const vector = customType<{
  data: number[];
  driverData: string;
  config: { dimensions: number };
}>({
  dataType(config) {
    return `vector(${config?.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS})`;
  },
  toDriver(value: number[]): string {
    return toVectorLiteral(value);
  },
  fromDriver(value: string): number[] {
    // Parse pgvector format: [0.1,0.2,0.3,...]
    return value
      .slice(1, -1)
      .split(',')
      .map(Number);
  },
});

export function toVectorLiteral(value: number[]): string {
  return `[${value.join(',')}]`;
}

/**
 * Column width for drizzle-kit migrations. Follows EMBEDDING_DIMENSIONS so a
 * generated table matches the one `PgVectorStore.ensureSchema` creates.
 */
export const EMBEDDING_COLUMN_DIMENSIONS =
  Number.parseInt(process.env.EMBEDDING_DIMENSIONS ?? '', 10) || DEFAULT_EMBEDDING_DIMENSIONS;

// =============================================================================
// Document Chunks Table
// =============================================================================

export const documentChunks = pgTable('document_chunks', {
  // `${documentId}_${chunkIndex}`
  id: varchar('id', { length: 255 }).primaryKey(),
  documentId: varchar('document_id', { length: 255 }).notNull(),
  content: text('content').notNull(),

  embedding: vector('embedding', { dimensions: EMBEDDING_COLUMN_DIMENSIONS }).notNull(),

  // Position tracking
  pageNumber: integer('page_number').notNull(),
  chunkIndex: integer('chunk_index').notNull(),
  // Insertion order, used to break similarity ties
  position: bigserial('position', { mode: 'number' }).notNull(),

  metadata: jsonb('metadata').$type<ChunkMetadata>().notNull(),

  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
}, (table) => ({
  documentIdIdx: index('idx_document_chunks_document_id').on(table.documentId),
  // Note: HNSW index for vector search is created by ensureSchema
}));

// =============================================================================
// Type Exports
// =============================================================================

export type DocumentChunkRow = typeof documentChunks.$inferSelect;
export type NewDocumentChunkRow = typeof documentChunks.$inferInsert;

/**
 * pgvector Store
 *
 * Postgres-backed vector store. Similarity search uses pgvector's cosine
 * distance operator and breaks ties by insertion position.
 */

import { asc, count, eq, sql } from 'drizzle-orm';
import { type DatabaseConnection, documentChunks, toVectorLiteral } from '@/db';
import { ValidationError } from '@/lib/errors';
import { logDbOperation, loggers } from '@/lib/logger';
import type { DocumentChunk } from '@/types/rag';
import type { VectorMatch, VectorQuery, VectorRecord, VectorStore } from './vector-store';

const log = loggers.db.child({ service: 'PgVectorStore' });

const chunkColumns = {
  id: documentChunks.id,
  documentId: documentChunks.documentId,
  content: documentChunks.content,
  pageNumber: documentChunks.pageNumber,
  chunkIndex: documentChunks.chunkIndex,
  metadata: documentChunks.metadata,
};

export class PgVectorStore implements VectorStore {
  readonly backend = 'pgvector';

  constructor(private connection: DatabaseConnection) {}

  private get db() {
    return this.connection.db;
  }

  /**
   * Create the extension, table and indexes if they do not exist.
   */
  async ensureSchema(dimensions: number): Promise<void> {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ValidationError(`Invalid embedding dimensions: ${dimensions}`);
    }

    const start = Date.now();
    await this.db.execute(sql`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.db.execute(
      sql.raw(`
        CREATE TABLE IF NOT EXISTS document_chunks (
          id varchar(255) PRIMARY KEY,
          document_id varchar(255) NOT NULL,
          content text NOT NULL,
          embedding vector(${dimensions}) NOT NULL,
          page_number integer NOT NULL,
          chunk_index integer NOT NULL,
          position bigserial NOT NULL,
          metadata jsonb NOT NULL,
          created_at timestamptz DEFAULT now()
        )
      `)
    );
    await this.db.execute(
      sql`CREATE INDEX IF NOT EXISTS idx_document_chunks_document_id ON document_chunks (document_id)`
    );
    await this.db.execute(
      sql`CREATE INDEX IF NOT EXISTS idx_document_chunks_embedding ON document_chunks USING hnsw (embedding vector_cosine_ops)`
    );

    logDbOperation(log, 'ensure_schema', { table: 'document_chunks', duration_ms: Date.now() - start });
  }

  async add(records: VectorRecord[], signal?: AbortSignal): Promise<void> {
    if (records.length === 0) return;

    const start = Date.now();
    await this.db.transaction(async (tx) => {
      signal?.throwIfAborted();
      await tx.insert(documentChunks).values(
        records.map((record) => ({
          id: record.id,
          documentId: record.documentId,
          content: record.content,
          embedding: record.embedding,
          pageNumber: record.pageNumber,
          chunkIndex: record.chunkIndex,
          metadata: record.metadata,
        }))
      );
      // Throwing here rolls the insert back
      signal?.throwIfAborted();
    });

    logDbOperation(log, 'insert', {
      table: 'document_chunks',
      rows: records.length,
      duration_ms: Date.now() - start,
    });
  }

  async query({ embedding, topK, documentId }: VectorQuery, signal?: AbortSignal): Promise<VectorMatch[]> {
    signal?.throwIfAborted();
    const start = Date.now();
    const distance = sql<number>`${documentChunks.embedding} <=> ${toVectorLiteral(embedding)}::vector`.mapWith(Number);

    const rows = await this.db
      .select({ ...chunkColumns, distance, position: documentChunks.position })
      .from(documentChunks)
      .where(documentId !== undefined ? eq(documentChunks.documentId, documentId) : undefined)
      .orderBy(asc(distance), asc(documentChunks.position))
      .limit(topK);

    logDbOperation(log, 'select', {
      table: 'document_chunks',
      rows: rows.length,
      duration_ms: Date.now() - start,
    });

    return rows;
  }

  async get({ documentId }: { documentId: string }): Promise<DocumentChunk[]> {
    return this.db
      .select(chunkColumns)
      .from(documentChunks)
      .where(eq(documentChunks.documentId, documentId))
      .orderBy(asc(documentChunks.chunkIndex));
  }

  async deleteByDocument(documentId: string, signal?: AbortSignal): Promise<number> {
    const start = Date.now();
    const deleted = await this.db.transaction(async (tx) => {
      signal?.throwIfAborted();
      const rows = await tx
        .delete(documentChunks)
        .where(eq(documentChunks.documentId, documentId))
        .returning({ id: documentChunks.id });
      signal?.throwIfAborted();
      return rows;
    });

    logDbOperation(log, 'delete', {
      table: 'document_chunks',
      rows: deleted.length,
      duration_ms: Date.now() - start,
    });

    return deleted.length;
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(documentChunks);
    return row?.value ?? 0;
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}

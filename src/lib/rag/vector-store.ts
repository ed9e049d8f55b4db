/**
 * Vector Store
 *
 * Storage contract behind the vector index, plus an in-process implementation
 * used when no database is configured. Distances are cosine distances
 * (1 - cosine similarity), matching pgvector's `<=>` operator.
 */

import { StorageFailure } from '@/lib/errors';
import type { DocumentChunk } from '@/types/rag';

// =============================================================================
// Types
// =============================================================================

export interface VectorRecord extends DocumentChunk {
  embedding: number[];
}

export interface VectorMatch extends DocumentChunk {
  distance: number;
  /** Insertion sequence; breaks ties between equal distances */
  position: number;
}

export interface VectorQuery {
  embedding: number[];
  topK: number;
  documentId?: string;
}

/**
 * Mutations take an abort signal: once it has fired, nothing may be committed.
 */
export interface VectorStore {
  readonly backend: string;
  /** Adds every record or none of them */
  add(records: VectorRecord[], signal?: AbortSignal): Promise<void>;
  /** Nearest records by ascending distance */
  query(query: VectorQuery, signal?: AbortSignal): Promise<VectorMatch[]>;
  /** Records of one document, by chunk index */
  get(filter: { documentId: string }): Promise<DocumentChunk[]>;
  /** Returns the number of records removed */
  deleteByDocument(documentId: string, signal?: AbortSignal): Promise<number>;
  count(): Promise<number>;
  close(): Promise<void>;
}

// =============================================================================
// Distance
// =============================================================================

/**
 * Cosine distance between two vectors of equal length.
 * A zero vector is treated as unrelated to everything (distance 1).
 */
export function cosineDistance(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 1;
  }

  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// =============================================================================
// In-memory Store
// =============================================================================

interface StoredRecord {
  record: VectorRecord;
  position: number;
}

function toChunk({ embedding: _embedding, ...chunk }: VectorRecord): DocumentChunk {
  return chunk;
}

export class MemoryVectorStore implements VectorStore {
  readonly backend = 'memory';
  private records = new Map<string, StoredRecord>();
  private nextPosition = 0;

  async add(records: VectorRecord[], signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();

    const ids = new Set<string>();
    for (const record of records) {
      if (this.records.has(record.id) || ids.has(record.id)) {
        throw new StorageFailure(`Duplicate chunk id: ${record.id}`);
      }
      ids.add(record.id);
    }

    for (const record of records) {
      this.records.set(record.id, { record, position: this.nextPosition++ });
    }
  }

  async query({ embedding, topK, documentId }: VectorQuery, signal?: AbortSignal): Promise<VectorMatch[]> {
    signal?.throwIfAborted();
    const matches: VectorMatch[] = [];

    for (const { record, position } of this.records.values()) {
      if (documentId !== undefined && record.documentId !== documentId) continue;
      matches.push({ ...toChunk(record), distance: cosineDistance(embedding, record.embedding), position });
    }

    return matches
      .sort((a, b) => a.distance - b.distance || a.position - b.position)
      .slice(0, topK);
  }

  async get({ documentId }: { documentId: string }): Promise<DocumentChunk[]> {
    return Array.from(this.records.values())
      .filter(({ record }) => record.documentId === documentId)
      .map(({ record }) => toChunk(record))
      .sort((a, b) => a.chunkIndex - b.chunkIndex);
  }

  async deleteByDocument(documentId: string, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();

    let removed = 0;
    for (const [id, { record }] of this.records) {
      if (record.documentId === documentId) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}

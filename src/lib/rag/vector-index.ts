/**
 * Vector Index
 *
 * Stores chunk embeddings and answers nearest-neighbour queries with
 * similarity scores. Every vector must have the index dimensionality.
 */

import { DimensionMismatch, StorageFailure, ValidationError, toErrorMessage } from '@/lib/errors';
import { logRagStep, loggers } from '@/lib/logger';
import { withTimeout } from '@/lib/retry';
import type { DocumentChunk, RetrievedChunk } from '@/types/rag';
import { countDistinctPages } from './chunker';
import {
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_TOP_K,
} from './config';
import type { VectorStore } from './vector-store';

const log = loggers.rag.child({ service: 'VectorIndex' });

// =============================================================================
// Types
// =============================================================================

export interface VectorIndexOptions {
  dimensions: number;
  topK: number;
  /** Results below this similarity are dropped */
  similarityThreshold: number;
  timeoutMs: number;
}

export interface SearchOptions {
  documentId?: string;
  topK?: number;
}

export interface DocumentStats {
  documentId: string;
  chunkCount: number;
  distinctPageCount: number;
}

export interface CollectionStats {
  totalChunkCount: number;
}

const DEFAULT_OPTIONS: VectorIndexOptions = {
  dimensions: DEFAULT_EMBEDDING_DIMENSIONS,
  topK: DEFAULT_TOP_K,
  similarityThreshold: DEFAULT_SIMILARITY_THRESHOLD,
  timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
};

// =============================================================================
// Vector Index
// =============================================================================

export class VectorIndex {
  readonly options: VectorIndexOptions;

  constructor(
    private vectors: VectorStore,
    options: Partial<VectorIndexOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get backend(): string {
    return this.vectors.backend;
  }

  /**
   * Store chunks with their embeddings. Either all chunks are stored or none.
   *
   * @throws ValidationError if chunk and vector counts differ
   * @throws DimensionMismatch if any vector has the wrong length
   * @throws StorageFailure if the backing store rejects the write
   */
  async store(chunks: DocumentChunk[], vectors: number[][]): Promise<void> {
    if (chunks.length !== vectors.length) {
      throw new ValidationError(`Got ${vectors.length} vectors for ${chunks.length} chunks`);
    }
    vectors.forEach((vector) => this.assertDimensions(vector));

    const start = Date.now();
    await this.run('store', (signal) =>
      this.vectors.add(
        chunks.map((chunk, i) => ({ ...chunk, embedding: vectors[i] })),
        signal
      )
    );

    logRagStep(log, 'storage', { chunks: chunks.length, duration_ms: Date.now() - start });
  }

  /**
   * Nearest chunks by cosine similarity, optionally limited to one document.
   * Ordered by similarity, then by insertion order; ranks are 1-based.
   */
  async search(queryVector: number[], options: SearchOptions = {}): Promise<RetrievedChunk[]> {
    this.assertDimensions(queryVector);
    const topK = options.topK ?? this.options.topK;
    if (topK <= 0) {
      return [];
    }

    const matches = await this.run('search', (signal) =>
      this.vectors.query({ embedding: queryVector, topK, documentId: options.documentId }, signal)
    );

    return matches
      .map(({ distance, ...match }) => ({ ...match, similarity: 1 - distance }))
      .filter((match) => match.similarity >= this.options.similarityThreshold)
      .sort((a, b) => b.similarity - a.similarity || a.position - b.position)
      .map(({ position: _position, ...match }, i) => ({ ...match, rank: i + 1 }));
  }

  /**
   * Chunk and page counts for one document, or the total chunk count.
   */
  stats(): Promise<CollectionStats>;
  stats(documentId: string): Promise<DocumentStats>;
  async stats(documentId?: string): Promise<DocumentStats | CollectionStats> {
    if (documentId === undefined) {
      const totalChunkCount = await this.run('count', () => this.vectors.count());
      return { totalChunkCount };
    }

    const chunks = await this.run('get', () => this.vectors.get({ documentId }));
    return {
      documentId,
      chunkCount: chunks.length,
      distinctPageCount: countDistinctPages(chunks),
    };
  }

  /**
   * Remove every chunk of a document.
   *
   * @returns whether anything was removed
   */
  async delete(documentId: string): Promise<boolean> {
    const removed = await this.run('delete', (signal) => this.vectors.deleteByDocument(documentId, signal));
    logRagStep(log, 'deletion', { chunks: removed });
    return removed > 0;
  }

  async close(): Promise<void> {
    await this.vectors.close();
  }

  private assertDimensions(vector: number[]): void {
    if (vector.length !== this.options.dimensions) {
      throw new DimensionMismatch(this.options.dimensions, vector.length);
    }
  }

  /**
   * The signal fires when the deadline passes; stores must not commit after it.
   */
  private async run<T>(operation: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn, this.options.timeoutMs, `vector ${operation}`);
    } catch (error) {
      if (error instanceof StorageFailure) throw error;
      throw new StorageFailure(`Vector ${operation} failed: ${toErrorMessage(error)}`, error);
    }
  }
}

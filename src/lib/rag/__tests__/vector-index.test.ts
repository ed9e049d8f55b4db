/**
 * Tests for vector index and in-memory store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DimensionMismatch, StorageFailure, ValidationError } from '@/lib/errors';
import type { DocumentChunk } from '@/types/rag';
import { VectorIndex } from '../vector-index';
import { MemoryVectorStore, type VectorStore, cosineDistance } from '../vector-store';
import { SlowStore, sleep } from './helpers';

function chunk(documentId: string, chunkIndex: number, pageNumber = 1): DocumentChunk {
  return {
    id: `${documentId}_${chunkIndex}`,
    documentId,
    content: `${documentId} chunk ${chunkIndex}`,
    pageNumber,
    chunkIndex,
    metadata: { filename: `${documentId}.txt`, chunkLength: 10, pageNumber },
  };
}

describe('cosineDistance', () => {
  it('should be 0 for parallel vectors', () => {
    expect(cosineDistance([1, 2], [2, 4])).toBeCloseTo(0);
  });

  it('should be 1 for orthogonal vectors', () => {
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
  });

  it('should be 1 when either vector is zero', () => {
    expect(cosineDistance([0, 0], [1, 1])).toBe(1);
  });
});

describe('VectorIndex', () => {
  let store: MemoryVectorStore;
  let index: VectorIndex;

  beforeEach(() => {
    store = new MemoryVectorStore();
    index = new VectorIndex(store, { dimensions: 2, topK: 5, similarityThreshold: 0.1, timeoutMs: 1000 });
  });

  describe('store', () => {
    it('should reject mismatched chunk and vector counts', async () => {
      await expect(index.store([chunk('a', 0)], [])).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject vectors of the wrong dimension without storing anything', async () => {
      await expect(index.store([chunk('a', 0), chunk('a', 1)], [[1, 0], [1, 0, 0]])).rejects.toBeInstanceOf(
        DimensionMismatch
      );
      expect(await store.count()).toBe(0);
    });

    it('should reject duplicate ids as a whole', async () => {
      await index.store([chunk('a', 0)], [[1, 0]]);

      await expect(index.store([chunk('a', 1), chunk('a', 0)], [[1, 0], [0, 1]])).rejects.toBeInstanceOf(
        StorageFailure
      );
      expect(await store.count()).toBe(1);
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await index.store(
        [chunk('a', 0), chunk('a', 1), chunk('b', 0), chunk('b', 1)],
        [
          [1, 0],
          [0.6, 0.8],
          [1, 0],
          [0, 1],
        ]
      );
    });

    it('should rank by similarity and break ties by insertion order', async () => {
      const results = await index.search([1, 0]);

      expect(results.map((r) => [r.id, r.rank])).toEqual([
        ['a_0', 1],
        ['b_0', 2],
        ['a_1', 3],
      ]);
      expect(results[0].similarity).toBeCloseTo(1);
      expect(results[2].similarity).toBeCloseTo(0.6);
    });

    it('should drop results below the similarity threshold', async () => {
      const results = await index.search([1, 0]);

      expect(results.map((r) => r.id)).not.toContain('b_1');
    });

    it('should filter by document', async () => {
      const results = await index.search([0, 1], { documentId: 'b' });

      expect(results.map((r) => r.id)).toEqual(['b_1']);
    });

    it('should honour topK', async () => {
      expect(await index.search([1, 0], { topK: 1 })).toHaveLength(1);
      expect(await index.search([1, 0], { topK: 0 })).toEqual([]);
    });

    it('should reject a query of the wrong dimension', async () => {
      await expect(index.search([1])).rejects.toBeInstanceOf(DimensionMismatch);
    });

    it('should return nothing for an empty store', async () => {
      const empty = new VectorIndex(new MemoryVectorStore(), { dimensions: 2 });
      expect(await empty.search([1, 0])).toEqual([]);
    });
  });

  describe('abort signal', () => {
    it('should leave the memory store untouched once aborted', async () => {
      const controller = new AbortController();
      controller.abort(new Error('deadline passed'));
      await store.add([{ ...chunk('a', 0), embedding: [1, 0] }]);

      await expect(store.add([{ ...chunk('a', 1), embedding: [1, 0] }], controller.signal)).rejects.toThrow(
        'deadline passed'
      );
      await expect(store.deleteByDocument('a', controller.signal)).rejects.toThrow('deadline passed');
      expect(await store.count()).toBe(1);
    });
  });

  describe('stats and delete', () => {
    it('should count chunks and distinct pages per document', async () => {
      await index.store([chunk('a', 0, 1), chunk('a', 1, 1), chunk('a', 2, 2)], [[1, 0], [1, 0], [1, 0]]);

      expect(await index.stats('a')).toEqual({ documentId: 'a', chunkCount: 3, distinctPageCount: 2 });
      expect(await index.stats('missing')).toEqual({ documentId: 'missing', chunkCount: 0, distinctPageCount: 0 });
      expect(await index.stats()).toEqual({ totalChunkCount: 3 });
    });

    it('should delete only the given document', async () => {
      await index.store([chunk('a', 0), chunk('b', 0)], [[1, 0], [0, 1]]);

      expect(await index.delete('a')).toBe(true);
      expect(await index.delete('a')).toBe(false);
      expect(await index.stats()).toEqual({ totalChunkCount: 1 });
    });
  });

  describe('store failures', () => {
    it('should wrap backend errors as StorageFailure', async () => {
      const broken: VectorStore = {
        backend: 'broken',
        add: async () => undefined,
        query: async () => {
          throw new Error('connection reset');
        },
        get: async () => [],
        deleteByDocument: async () => 0,
        count: async () => 0,
        close: async () => undefined,
      };
      const brokenIndex = new VectorIndex(broken, { dimensions: 2 });

      await expect(brokenIndex.search([1, 0])).rejects.toThrow('Vector search failed: connection reset');
    });

    it('should not commit a write that timed out', async () => {
      const slowStore = new SlowStore(40);
      const slowIndex = new VectorIndex(slowStore, { dimensions: 2, timeoutMs: 10 });

      await expect(slowIndex.store([chunk('a', 0)], [[1, 0]])).rejects.toThrow(
        'Vector store failed: vector store timed out after 10ms'
      );
      await sleep(80);

      expect(await slowStore.count()).toBe(0);
      expect(await slowIndex.stats('a')).toEqual({ documentId: 'a', chunkCount: 0, distinctPageCount: 0 });
    });

    it('should time out slow backends', async () => {
      const slow: VectorStore = {
        backend: 'slow',
        add: async () => undefined,
        query: () => new Promise(() => {}),
        get: async () => [],
        deleteByDocument: async () => 0,
        count: async () => 0,
        close: async () => undefined,
      };
      const slowIndex = new VectorIndex(slow, { dimensions: 2, timeoutMs: 5 });

      await expect(slowIndex.search([1, 0])).rejects.toThrow(
        'Vector search failed: vector search timed out after 5ms'
      );
    });
  });
});

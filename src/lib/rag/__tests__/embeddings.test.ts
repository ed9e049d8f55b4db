/**
 * Tests for Embedding Service
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Store mock references for tests
const mockEmbeddingsCreate = vi.fn();
const mockConstructorCalls: Array<Record<string, unknown>> = [];

// Mock OpenAI before importing - use actual class definition
vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      embeddings = { create: mockEmbeddingsCreate };
      constructor(config: Record<string, unknown>) {
        mockConstructorCalls.push(config);
      }
    },
  };
});

import { DimensionMismatch, EmbeddingUnavailable, ValidationError } from '@/lib/errors';
import { EmbeddingService, createEmbeddingService } from '../embeddings';
import { DEFAULT_EMBEDDING_DIMENSIONS, DEFAULT_EMBEDDING_MODEL } from '../config';

// =============================================================================
// Test Setup
// =============================================================================

const vector = (seed: number, dimensions = 4) => Array.from({ length: dimensions }, (_, i) => seed + i / 10);

function embeddingResponse(vectors: number[][], order?: number[]) {
  const indices = order ?? vectors.map((_, i) => i);
  return {
    data: indices.map((index) => ({ object: 'embedding', index, embedding: vectors[index] })),
    usage: { prompt_tokens: 10, total_tokens: 10 },
  };
}

const statusError = (status: number, message: string) => Object.assign(new Error(message), { status });

const createService = (config = {}) =>
  new EmbeddingService('test-secret', { dimensions: 4, retryDelayMs: 0, ...config });

beforeEach(() => {
  mockEmbeddingsCreate.mockReset();
  mockConstructorCalls.length = 0;
});

afterEach(() => {
  vi.unstubAllEnvs();
});

// =============================================================================
// EmbeddingService Tests
// =============================================================================

describe('EmbeddingService', () => {
  describe('constructor', () => {
    it('should create service with default config', () => {
      const service = new EmbeddingService('test-secret');

      expect(mockConstructorCalls).toEqual([{ apiKey: 'test-secret', maxRetries: 0 }]);
      expect(service.model).toBe(DEFAULT_EMBEDDING_MODEL);
      expect(service.dimensions).toBe(DEFAULT_EMBEDDING_DIMENSIONS);
    });
  });

  describe('embed', () => {
    it('should request the configured model and dimensions', async () => {
      mockEmbeddingsCreate.mockResolvedValue(embeddingResponse([vector(1)]));
      const service = createService();

      const result = await service.embed('What is the refund window?');

      expect(result).toEqual(vector(1));
      expect(mockEmbeddingsCreate).toHaveBeenCalledWith(
        { model: 'text-embedding-3-small', input: ['What is the refund window?'], dimensions: 4 },
        { signal: expect.any(AbortSignal) }
      );
    });

    it('should omit dimensions for models that cannot shorten', async () => {
      mockEmbeddingsCreate.mockResolvedValue(embeddingResponse([vector(1)]));
      const service = createService({ model: 'text-embedding-ada-002' });

      await service.embed('hello');

      expect(mockEmbeddingsCreate.mock.calls[0][0].dimensions).toBeUndefined();
    });

    it('should reject blank text without calling the API', async () => {
      const service = createService();

      await expect(service.embed('   ')).rejects.toBeInstanceOf(ValidationError);
      expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
    });
  });

  describe('embedBatch', () => {
    it('should return an empty list for no input', async () => {
      await expect(createService().embedBatch([])).resolves.toEqual([]);
      expect(mockEmbeddingsCreate).not.toHaveBeenCalled();
    });

    it('should restore input order from response indices', async () => {
      mockEmbeddingsCreate.mockResolvedValue(embeddingResponse([vector(1), vector(2), vector(3)], [2, 0, 1]));

      const result = await createService().embedBatch(['a', 'b', 'c']);

      expect(result).toEqual([vector(1), vector(2), vector(3)]);
    });

    it('should split input into batches', async () => {
      mockEmbeddingsCreate
        .mockResolvedValueOnce(embeddingResponse([vector(1), vector(2)]))
        .mockResolvedValueOnce(embeddingResponse([vector(3)]));

      const result = await createService({ batchSize: 2 }).embedBatch(['a', 'b', 'c']);

      expect(mockEmbeddingsCreate).toHaveBeenCalledTimes(2);
      expect(mockEmbeddingsCreate.mock.calls[1][0].input).toEqual(['c']);
      expect(result).toHaveLength(3);
    });

    it('should reject vectors of the wrong length', async () => {
      mockEmbeddingsCreate.mockResolvedValue(embeddingResponse([vector(1, 3)]));

      const error = await createService().embed('text').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DimensionMismatch);
      expect(error).toHaveProperty('message', 'Vector has 3 dimensions, index expects 4');
    });

    it('should reject a response with missing vectors', async () => {
      mockEmbeddingsCreate.mockResolvedValue(embeddingResponse([vector(1)]));

      await expect(createService().embedBatch(['a', 'b'])).rejects.toThrow(
        'Embedding response returned 1 vectors for 2 inputs'
      );
    });
  });

  describe('error handling', () => {
    it('should retry transient failures', async () => {
      mockEmbeddingsCreate
        .mockRejectedValueOnce(statusError(429, 'Rate limit exceeded'))
        .mockResolvedValueOnce(embeddingResponse([vector(1)]));

      await expect(createService().embed('text')).resolves.toEqual(vector(1));
      expect(mockEmbeddingsCreate).toHaveBeenCalledTimes(2);
    });

    it('should give up after the configured attempts', async () => {
      mockEmbeddingsCreate.mockRejectedValue(new Error('socket hang up'));

      await expect(createService({ maxAttempts: 3 }).embed('text')).rejects.toThrow(
        'Embedding service unavailable: socket hang up'
      );
      expect(mockEmbeddingsCreate).toHaveBeenCalledTimes(3);
    });

    it('should not retry client errors', async () => {
      mockEmbeddingsCreate.mockRejectedValue(statusError(401, 'Invalid API key'));

      await expect(createService().embed('text')).rejects.toBeInstanceOf(EmbeddingUnavailable);
      expect(mockEmbeddingsCreate).toHaveBeenCalledTimes(1);
    });

    it('should time out slow requests', async () => {
      mockEmbeddingsCreate.mockReturnValue(new Promise(() => {}));

      await expect(createService({ timeoutMs: 5, maxAttempts: 1 }).embed('text')).rejects.toThrow(
        'Embedding service unavailable: embedding request timed out after 5ms'
      );
    });
  });
});

// =============================================================================
// Factory Tests
// =============================================================================

describe('createEmbeddingService', () => {
  it('should use the given key', () => {
    createEmbeddingService('test-secret');
    expect(mockConstructorCalls[0]).toMatchObject({ apiKey: 'test-secret' });
  });

  it('should fall back to OPENAI_API_KEY', () => {
    vi.stubEnv('OPENAI_API_KEY', 'env-secret');
    createEmbeddingService();
    expect(mockConstructorCalls[0]).toMatchObject({ apiKey: 'env-secret' });
  });

  it('should throw when no key is available', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    expect(() => createEmbeddingService()).toThrow(EmbeddingUnavailable);
  });
});

/**
 * Embedding Service
 *
 * Generates vector embeddings for text using OpenAI's API.
 * Every vector has the configured dimensionality; a response that does not
 * is rejected rather than padded or truncated.
 */

import OpenAI from 'openai';
import {
  DimensionMismatch,
  EmbeddingUnavailable,
  ValidationError,
  toErrorMessage,
} from '@/lib/errors';
import { logExternalCall, loggers } from '@/lib/logger';
import { isTransientError, retry, withTimeout } from '@/lib/retry';
import {
  DEFAULT_EMBEDDING_BATCH_SIZE,
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  EMBEDDING_MAX_ATTEMPTS,
} from './config';

const log = loggers.external;

// =============================================================================
// Types
// =============================================================================

/**
 * Maps text to fixed-length vectors. The same text and model always yield
 * the same vector.
 */
export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  /** One vector per input, in input order */
  embedBatch(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingConfig {
  model: string;
  dimensions: number;
  batchSize: number;
  timeoutMs: number;
  maxAttempts: number;
  /** Delay before the first retry of a failed request */
  retryDelayMs: number;
}

// =============================================================================
// Constants
// =============================================================================

const MAX_BATCH_SIZE = 2048; // OpenAI limit

// Only the text-embedding-3 family accepts a `dimensions` parameter
const SHORTENABLE_MODEL_PREFIX = 'text-embedding-3';

// =============================================================================
// Embedding Service Class
// =============================================================================

export class EmbeddingService implements Embedder {
  readonly model: string;
  readonly dimensions: number;
  private client: OpenAI;
  private batchSize: number;
  private timeoutMs: number;
  private maxAttempts: number;
  private retryDelayMs: number;

  constructor(apiKey: string, config: Partial<EmbeddingConfig> = {}) {
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
    this.model = config.model ?? DEFAULT_EMBEDDING_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
    this.batchSize = Math.min(config.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE, MAX_BATCH_SIZE);
    this.timeoutMs = config.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.maxAttempts = config.maxAttempts ?? EMBEDDING_MAX_ATTEMPTS;
    this.retryDelayMs = config.retryDelayMs ?? 250;
  }

  /**
   * Generate embedding for a single text.
   */
  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  /**
   * Generate embeddings for multiple texts in batches.
   *
   * @throws ValidationError if any text is blank
   * @throws EmbeddingUnavailable if the service cannot be reached after retries
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const blank = texts.findIndex((t) => !t.trim());
    if (blank !== -1) {
      throw new ValidationError(`Cannot generate embedding for empty text (input ${blank})`);
    }

    const allEmbeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      allEmbeddings.push(...(await this.requestBatch(batch)));
    }

    return allEmbeddings;
  }

  private async requestBatch(batch: string[]): Promise<number[][]> {
    const start = Date.now();
    const dimensions = this.model.startsWith(SHORTENABLE_MODEL_PREFIX) ? this.dimensions : undefined;

    try {
      const response = await retry(
        () =>
          withTimeout(
            (signal) =>
              this.client.embeddings.create(
                {
                  model: this.model,
                  input: batch,
                  dimensions,
                },
                { signal }
              ),
            this.timeoutMs,
            'embedding request'
          ),
        {
          maxRetries: this.maxAttempts,
          initialDelay: this.retryDelayMs,
          shouldRetry: isTransientError,
          onRetry: (error, attempt) =>
            log.warn({ attempt, error: error.message, model: this.model }, 'Retrying embedding request'),
        }
      );

      // Ensure embeddings are in the same order as input
      const sortedData = [...response.data].sort((a, b) => a.index - b.index);
      if (sortedData.length !== batch.length) {
        throw new EmbeddingUnavailable(
          `Embedding response returned ${sortedData.length} vectors for ${batch.length} inputs`
        );
      }

      for (const item of sortedData) {
        if (item.embedding.length !== this.dimensions) {
          throw new DimensionMismatch(this.dimensions, item.embedding.length);
        }
      }

      logExternalCall(log, 'openai', 'embeddings', {
        duration_ms: Date.now() - start,
        model: this.model,
        count: batch.length,
        tokens: response.usage.total_tokens,
      });

      return sortedData.map((d) => d.embedding);
    } catch (error) {
      if (error instanceof EmbeddingUnavailable || error instanceof DimensionMismatch) {
        throw error;
      }

      logExternalCall(log, 'openai', 'embeddings', {
        duration_ms: Date.now() - start,
        model: this.model,
        error: toErrorMessage(error),
      });
      throw new EmbeddingUnavailable(`Embedding service unavailable: ${toErrorMessage(error)}`, error);
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Create an EmbeddingService, falling back to the OPENAI_API_KEY environment variable.
 *
 * @throws EmbeddingUnavailable if no API key is available
 */
export function createEmbeddingService(
  apiKey?: string | null,
  config?: Partial<EmbeddingConfig>
): EmbeddingService {
  const key = apiKey ?? process.env.OPENAI_API_KEY;

  if (!key) {
    throw new EmbeddingUnavailable('No OpenAI API key provided and OPENAI_API_KEY not set');
  }

  return new EmbeddingService(key, config);
}

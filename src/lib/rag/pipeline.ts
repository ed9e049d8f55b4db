/**
 * RAG Pipeline
 *
 * Orchestrates ingest and question answering:
 * 1. Extract, chunk, embed and store uploaded documents
 * 2. Embed the question and retrieve similar chunks
 * 3. Generate a grounded answer with sources and confidence
 *
 * This is the only layer that turns errors into result objects; every
 * public method resolves, never rejects.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { type AppConfig, loadConfig } from '@/lib/config';
import {
  EmptyDocument,
  StorageFailure,
  TimeoutError,
  ValidationError,
  isRagError,
  toErrorMessage,
} from '@/lib/errors';
import { createAdaptersFromConfig } from '@/lib/llm/factory';
import {
  type Logger,
  Timer,
  createRequestContext,
  createRequestLogger,
  logRagStep,
  loggers,
  truncateText,
} from '@/lib/logger';
import { FileTextExtractor, type TextExtractor } from '@/lib/parsers';
import { createDatabase } from '@/db';
import type {
  AnswerResult,
  AskRequest,
  DocumentStatsResult,
  SystemStatus,
  UploadResult,
} from '@/types/api';
import type { RetrievedChunk } from '@/types/rag';
import { type ChunkOptions, chunkDocument, countDistinctPages } from './chunker';
import {
  CONFIDENCE_BOOST_FACTOR,
  CONFIDENCE_BOOST_MIN_CHUNKS,
  CONFIDENCE_BOOST_THRESHOLD,
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  MAX_MAX_TOKENS,
  MAX_QUESTION_LENGTH,
  MIN_MAX_TOKENS,
  NO_RELEVANT_INFORMATION_ANSWER,
  PROCESSING_ERROR_ANSWER,
} from './config';
import { type Embedder, createEmbeddingService } from './embeddings';
import { Generator } from './generator';
import { PgVectorStore } from './pg-vector-store';
import { VectorIndex } from './vector-index';
import { MemoryVectorStore, type VectorStore } from './vector-store';

const log = loggers.rag.child({ service: 'Pipeline' });

// =============================================================================
// Types
// =============================================================================

export interface PipelineDependencies {
  extractor: TextExtractor;
  embedder: Embedder;
  index: VectorIndex;
  generator: Generator;
  chunking: ChunkOptions;
}

const askSchema = z.object({
  message: z
    .string()
    .trim()
    .min(1, 'Question must not be empty')
    .max(MAX_QUESTION_LENGTH, `Question must be at most ${MAX_QUESTION_LENGTH} characters`),
  documentId: z.string().min(1).optional(),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
      })
    )
    .default([]),
  temperature: z.number().min(0).max(1).default(DEFAULT_TEMPERATURE),
  maxTokens: z.number().int().min(MIN_MAX_TOKENS).max(MAX_MAX_TOKENS).default(DEFAULT_MAX_TOKENS),
});

// =============================================================================
// Scoring
// =============================================================================

/**
 * Mean similarity, boosted when several chunks agree strongly. Rounded to
 * two decimals and always within [0, 1].
 */
export function calculateConfidence(chunks: ReadonlyArray<{ similarity: number }>): number {
  if (chunks.length === 0) {
    return 0;
  }

  let confidence = chunks.reduce((sum, chunk) => sum + chunk.similarity, 0) / chunks.length;

  if (chunks.length >= CONFIDENCE_BOOST_MIN_CHUNKS && confidence > CONFIDENCE_BOOST_THRESHOLD) {
    confidence = confidence * CONFIDENCE_BOOST_FACTOR;
  }

  const bounded = Math.min(1, Math.max(0, confidence));
  return Math.round(bounded * 100) / 100;
}

/**
 * Citation line for a retrieved chunk.
 */
export function formatSource(chunk: RetrievedChunk): string {
  return `${chunk.metadata.filename} (Page ${chunk.pageNumber}, Similarity: ${chunk.similarity.toFixed(2)})`;
}

// =============================================================================
// Pipeline Class
// =============================================================================

export class RAGPipeline {
  private extractor: TextExtractor;
  private embedder: Embedder;
  private index: VectorIndex;
  private generator: Generator;
  private chunking: ChunkOptions;

  constructor(deps: PipelineDependencies) {
    this.extractor = deps.extractor;
    this.embedder = deps.embedder;
    this.index = deps.index;
    this.generator = deps.generator;
    this.chunking = deps.chunking;
  }

  /**
   * Ingest a document. Nothing is stored unless every chunk is stored.
   */
  async uploadDocument(bytes: Uint8Array, filename: string, documentId: string = randomUUID()): Promise<UploadResult> {
    const ctx = createRequestContext('upload');
    const reqLog = createRequestLogger(log, ctx);
    const timer = new Timer();
    let chunksCreated = 0;

    const result = (success: boolean, message: string, pagesProcessed = 0): UploadResult => ({
      success,
      documentId,
      filename,
      message,
      pagesProcessed,
      chunksCreated,
      processingTimeMs: timer.elapsed(),
    });

    try {
      timer.mark('extraction');
      const text = await this.extractor.extract(bytes, filename);
      logRagStep(reqLog, 'extraction', { duration_ms: timer.measure('extraction') });

      timer.mark('chunking');
      const chunks = chunkDocument(text, { documentId, filename }, this.chunking);
      if (chunks.length === 0) {
        throw new EmptyDocument(filename);
      }
      chunksCreated = chunks.length;
      const pagesProcessed = countDistinctPages(chunks);
      logRagStep(reqLog, 'chunking', {
        chunks: chunks.length,
        pages: pagesProcessed,
        duration_ms: timer.measure('chunking'),
      });

      timer.mark('embedding');
      const vectors = await this.embedder.embedBatch(chunks.map((chunk) => chunk.content));
      logRagStep(reqLog, 'embedding', { chunks: vectors.length, duration_ms: timer.measure('embedding') });

      try {
        await this.index.store(chunks, vectors);
      } catch (error) {
        if (error instanceof StorageFailure && error.cause instanceof TimeoutError) {
          await this.discardTimedOutWrite(documentId, reqLog);
        }
        throw error;
      }

      reqLog.info(
        { documentId, filename, chunks: chunks.length, pages: pagesProcessed, ...timer.getAllDurations() },
        'Document processed'
      );
      return result(
        true,
        `Successfully processed ${filename}: ${chunks.length} chunks from ${pagesProcessed} page(s)`,
        pagesProcessed
      );
    } catch (error) {
      reqLog.warn({ filename, chunks: chunksCreated, error: toErrorMessage(error) }, 'Document processing failed');

      if (error instanceof StorageFailure) {
        return result(false, `Failed to store document: ${error.message}`);
      }
      if (error instanceof EmptyDocument || error instanceof ValidationError) {
        return result(false, error.message);
      }
      return result(false, `Failed to process document: ${toErrorMessage(error)}`);
    }
  }

  /**
   * Answer a question from stored documents.
   */
  async ask(request: AskRequest): Promise<AnswerResult> {
    const ctx = createRequestContext('ask');
    const reqLog = createRequestLogger(log, ctx);
    const timer = new Timer();

    const parsed = askSchema.safeParse(request);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message);
      reqLog.info({ issues }, 'Rejected question');
      return {
        success: false,
        response: `Invalid request: ${issues.join('; ')}`,
        sources: [],
        confidence: 0,
        processingTimeMs: timer.elapsed(),
        provider: 'none',
      };
    }

    const { message, documentId, history, temperature, maxTokens } = parsed.data;
    reqLog.info({ question: truncateText(message, 100), documentId }, 'Answering question');

    try {
      timer.mark('embedding');
      const queryVector = await this.embedder.embed(message);
      timer.measure('embedding');

      timer.mark('retrieval');
      const chunks = await this.retrieve(queryVector, documentId, reqLog);
      logRagStep(reqLog, 'retrieval', { chunks: chunks.length, duration_ms: timer.measure('retrieval') });

      if (chunks.length === 0) {
        return {
          success: true,
          response: NO_RELEVANT_INFORMATION_ANSWER,
          sources: [],
          confidence: 0,
          processingTimeMs: timer.elapsed(),
          provider: 'none',
        };
      }

      timer.mark('generation');
      const generation = await this.generator.generate(message, chunks, { temperature, maxTokens, history });
      timer.measure('generation');

      const confidence = calculateConfidence(chunks);
      reqLog.info(
        { provider: generation.provider, confidence, chunks: chunks.length, ...timer.getAllDurations() },
        'Question answered'
      );

      return {
        success: true,
        response: generation.text,
        sources: chunks.map(formatSource),
        confidence,
        processingTimeMs: timer.elapsed(),
        provider: generation.provider,
      };
    } catch (error) {
      reqLog.error(
        { error: toErrorMessage(error), code: isRagError(error) ? error.code : undefined },
        'Question answering failed'
      );
      return {
        success: false,
        response: PROCESSING_ERROR_ANSWER,
        sources: [],
        confidence: 0,
        processingTimeMs: timer.elapsed(),
        provider: 'none',
      };
    }
  }

  /**
   * Remove every chunk of a document. False when nothing was stored for it
   * or the store could not be reached.
   */
  async deleteDocument(documentId: string): Promise<boolean> {
    try {
      const deleted = await this.index.delete(documentId);
      log.info({ documentId, deleted }, 'Document delete requested');
      return deleted;
    } catch (error) {
      log.error({ documentId, error: toErrorMessage(error) }, 'Document delete failed');
      return false;
    }
  }

  async documentStats(documentId: string): Promise<DocumentStatsResult> {
    try {
      const stats = await this.index.stats(documentId);
      return { documentId, chunks: stats.chunkCount, pages: stats.distinctPageCount };
    } catch (error) {
      log.error({ documentId, error: toErrorMessage(error) }, 'Document stats failed');
      return { documentId, chunks: 0, pages: 0 };
    }
  }

  async status(): Promise<SystemStatus> {
    try {
      const { totalChunkCount } = await this.index.stats();
      return {
        status: 'healthy',
        vectorStore: {
          backend: this.index.backend,
          totalChunks: totalChunkCount,
        },
        models: {
          embeddingModel: this.embedder.model,
          generationProviders: this.generator.availableProviders(),
        },
        configuration: {
          chunkSize: this.chunking.chunkSize,
          chunkOverlap: this.chunking.chunkOverlap,
          retrievalK: this.index.options.topK,
          similarityThreshold: this.index.options.similarityThreshold,
        },
      };
    } catch (error) {
      return { status: 'error', error: toErrorMessage(error) };
    }
  }

  async close(): Promise<void> {
    await this.index.close();
  }

  /**
   * Remove whatever a timed-out write managed to commit, so a failed upload
   * leaves nothing behind and the id can be uploaded again.
   */
  private async discardTimedOutWrite(documentId: string, reqLog: Logger): Promise<void> {
    try {
      const removed = await this.index.delete(documentId);
      reqLog.warn({ documentId, removed }, 'Discarded chunks of timed-out upload');
    } catch (error) {
      reqLog.error({ documentId, error: toErrorMessage(error) }, 'Could not discard chunks of timed-out upload');
    }
  }

  /**
   * Search within the requested document, widening to every document once
   * when the filtered search finds nothing. A storage failure reads as no results.
   */
  private async retrieve(
    queryVector: number[],
    documentId: string | undefined,
    reqLog: Logger
  ): Promise<RetrievedChunk[]> {
    try {
      const chunks = await this.index.search(queryVector, { documentId });
      if (chunks.length > 0 || documentId === undefined) {
        return chunks;
      }

      const widened = await this.index.search(queryVector);
      logRagStep(reqLog, 'retrieval', { chunks: widened.length, widened: true });
      return widened;
    } catch (error) {
      if (error instanceof StorageFailure) {
        logRagStep(reqLog, 'retrieval', { error: error.message });
        return [];
      }
      throw error;
    }
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Build a pipeline and its dependencies from configuration. Uses pgvector
 * when a database URL is configured, otherwise an in-memory store.
 */
export async function createPipeline(config: AppConfig): Promise<RAGPipeline> {
  const embedder = createEmbeddingService(config.embedding.apiKey, {
    model: config.embedding.model,
    dimensions: config.embedding.dimensions,
    batchSize: config.embedding.batchSize,
    timeoutMs: config.embedding.timeoutMs,
  });

  let store: VectorStore;
  if (config.databaseUrl) {
    const pgStore = new PgVectorStore(createDatabase(config.databaseUrl));
    await pgStore.ensureSchema(config.embedding.dimensions);
    store = pgStore;
  } else {
    log.warn('DATABASE_URL not set, storing vectors in memory');
    store = new MemoryVectorStore();
  }

  const index = new VectorIndex(store, {
    dimensions: config.embedding.dimensions,
    topK: config.retrieval.topK,
    similarityThreshold: config.retrieval.similarityThreshold,
    timeoutMs: config.embedding.timeoutMs,
  });

  const generator = new Generator(createAdaptersFromConfig(config.generation), {
    timeoutMs: config.generation.timeoutMs,
  });

  log.info(
    { vectorStore: store.backend, providers: generator.availableProviders() },
    'RAG pipeline ready'
  );

  return new RAGPipeline({
    extractor: new FileTextExtractor(),
    embedder,
    index,
    generator,
    chunking: config.chunking,
  });
}

/**
 * Build a pipeline from `process.env`.
 *
 * @throws ValidationError if the environment is invalid
 */
export async function createPipelineFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<RAGPipeline> {
  return createPipeline(loadConfig(env));
}

/**
 * RAG Module Exports
 *
 * Provides all RAG pipeline functionality:
 * - Document chunking
 * - Embedding generation
 * - Vector storage and retrieval
 * - Answer generation with backend fallback
 * - Complete ingest/ask pipeline
 */

// Chunker
export {
  chunkText,
  chunkPages,
  chunkDocument,
  splitPages,
  normalizeText,
  countDistinctPages,
  type TextChunk,
  type PageChunk,
  type PageText,
  type ChunkOptions,
  type ChunkSource,
} from './chunker';

// Embeddings
export {
  EmbeddingService,
  createEmbeddingService,
  type Embedder,
  type EmbeddingConfig,
} from './embeddings';

// Vector storage
export {
  MemoryVectorStore,
  cosineDistance,
  type VectorStore,
  type VectorRecord,
  type VectorMatch,
  type VectorQuery,
} from './vector-store';
export { PgVectorStore } from './pg-vector-store';
export {
  VectorIndex,
  type VectorIndexOptions,
  type SearchOptions,
  type DocumentStats,
  type CollectionStats,
} from './vector-index';

// Generation
export {
  Generator,
  cleanResponse,
  buildExtractiveAnswer,
  EXTRACTIVE_PROVIDER,
  NO_EXTRACTIVE_CONTEXT_ANSWER,
  type GeneratorOptions,
  type GenerateParams,
  type GenerationResult,
} from './generator';

// Pipeline
export {
  RAGPipeline,
  createPipeline,
  createPipelineFromEnv,
  calculateConfidence,
  formatSource,
  type PipelineDependencies,
} from './pipeline';

export * from './config';

export type { ChunkMetadata, DocumentChunk, RetrievedChunk } from '@/types/rag';
export type {
  AnswerResult,
  AskRequest,
  DocumentStatsResult,
  SystemStatus,
  UploadResult,
} from '@/types/api';

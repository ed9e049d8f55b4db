/**
 * Pipeline result types.
 *
 * Every public pipeline operation reports failure through these objects;
 * none of them throws.
 */

import type { ConversationTurn } from './llm';

// =============================================================================
// Upload
// =============================================================================

export interface UploadResult {
  success: boolean;
  documentId: string;
  filename: string;
  message: string;
  /** Distinct pages that produced at least one chunk */
  pagesProcessed: number;
  chunksCreated: number;
  processingTimeMs: number;
}

// =============================================================================
// Ask
// =============================================================================

export interface AskRequest {
  message: string;
  /** Restrict retrieval to one document */
  documentId?: string;
  history?: ConversationTurn[];
  temperature?: number;
  maxTokens?: number;
}

export interface AnswerResult {
  success: boolean;
  response: string;
  /** `${filename} (Page N, Similarity: 0.xx)` per retrieved chunk */
  sources: string[];
  /** 0..1, rounded to two decimals */
  confidence: number;
  processingTimeMs: number;
  /** Backend that wrote the answer: a provider name, 'extractive' or 'none' */
  provider: string;
}

// =============================================================================
// Status
// =============================================================================

export interface HealthyStatus {
  status: 'healthy';
  vectorStore: {
    backend: string;
    totalChunks: number;
  };
  models: {
    embeddingModel: string;
    /** Configured backends in the order they are tried */
    generationProviders: string[];
  };
  configuration: {
    chunkSize: number;
    chunkOverlap: number;
    retrievalK: number;
    similarityThreshold: number;
  };
}

export interface ErrorStatus {
  status: 'error';
  error: string;
}

export type SystemStatus = HealthyStatus | ErrorStatus;

export interface DocumentStatsResult {
  documentId: string;
  chunks: number;
  pages: number;
}

/**
 * RAG Configuration Constants
 *
 * Centralized defaults for the pipeline. Every value can be overridden
 * through the environment (see `loadConfig` in `@/lib/config`).
 */

// =============================================================================
// Chunking Configuration
// =============================================================================

/**
 * Default chunk size in characters.
 */
export const DEFAULT_CHUNK_SIZE = 1000;

/**
 * Default overlap between consecutive chunks in characters.
 * Keeps context across chunk boundaries.
 */
export const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * Chunks whose trimmed length falls below this are discarded at creation.
 */
export const MIN_CHUNK_LENGTH = 50;

// =============================================================================
// Embedding Configuration
// =============================================================================

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

/**
 * Requested output dimensions. text-embedding-3 models shorten natively.
 */
export const DEFAULT_EMBEDDING_DIMENSIONS = 384;

/**
 * Inputs per embeddings request (OpenAI accepts up to 2048).
 */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 96;

export const EMBEDDING_MAX_ATTEMPTS = 3;

// =============================================================================
// Retrieval Configuration
// =============================================================================

/**
 * Number of chunks to retrieve per query.
 */
export const DEFAULT_TOP_K = 5;

/**
 * Minimum similarity (1 - cosine distance) for a chunk to be returned.
 * Kept low so sparse corpora still produce results.
 */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.1;

// =============================================================================
// Confidence Scoring
// =============================================================================

/**
 * Minimum number of retrieved chunks before the corroboration boost applies.
 */
export const CONFIDENCE_BOOST_MIN_CHUNKS = 3;

/**
 * Mean similarity that must be exceeded for the boost to apply.
 */
export const CONFIDENCE_BOOST_THRESHOLD = 0.8;

export const CONFIDENCE_BOOST_FACTOR = 1.1;

// =============================================================================
// Generation Configuration
// =============================================================================

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 500;

/**
 * Generated answers are cut to this many characters (plus an ellipsis).
 */
export const MAX_ANSWER_CHARS = 1000;

/**
 * Answers shorter than this after cleanup count as a failed generation.
 */
export const MIN_ANSWER_CHARS = 10;

/**
 * Per-chunk snippet length used by the extractive fallback.
 */
export const EXTRACTIVE_SNIPPET_CHARS = 200;

/**
 * Number of top chunks quoted by the extractive fallback.
 */
export const EXTRACTIVE_CHUNK_COUNT = 2;

/**
 * Prior messages forwarded to generation backends (three exchanges).
 */
export const HISTORY_WINDOW = 6;

/**
 * Deadline for a single provider, embedding or vector store call.
 */
export const DEFAULT_PROVIDER_TIMEOUT_MS = 30_000;

// =============================================================================
// Request Limits
// =============================================================================

export const MAX_QUESTION_LENGTH = 1000;
export const MIN_MAX_TOKENS = 50;
export const MAX_MAX_TOKENS = 2000;

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024; // 10MB

// =============================================================================
// Canned Responses
// =============================================================================

export const NO_RELEVANT_INFORMATION_ANSWER =
  "I couldn't find relevant information in the documents to answer your question. Please try rephrasing your question or upload a relevant document.";

export const PROCESSING_ERROR_ANSWER =
  "I'm sorry, I encountered an error while processing your question. Please try again.";

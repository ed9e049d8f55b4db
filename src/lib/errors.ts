/**
 * Error Taxonomy
 *
 * Typed failures raised by the chunking, embedding, storage and generation
 * layers. Only the pipeline boundary turns these into result objects.
 */

// =============================================================================
// Base Error
// =============================================================================

export type RagErrorCode =
  | 'VALIDATION_ERROR'
  | 'EXTRACTION_FAILURE'
  | 'EMPTY_DOCUMENT'
  | 'EMBEDDING_UNAVAILABLE'
  | 'STORAGE_FAILURE'
  | 'DIMENSION_MISMATCH'
  | 'PROVIDER_ERROR'
  | 'GENERATION_EXHAUSTED'
  | 'TIMEOUT'
  | 'NOT_FOUND';

export class RagError extends Error {
  public readonly code: RagErrorCode;
  public readonly cause: unknown;

  constructor(code: RagErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = 'RagError';
    this.code = code;
    this.cause = cause;
  }
}

// =============================================================================
// Input Errors
// =============================================================================

export class ValidationError extends RagError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ExtractionFailure extends RagError {
  constructor(message: string, cause?: unknown) {
    super('EXTRACTION_FAILURE', message, cause);
    this.name = 'ExtractionFailure';
  }
}

export class EmptyDocument extends RagError {
  constructor(filename: string) {
    super('EMPTY_DOCUMENT', `No usable text content could be extracted from ${filename}`);
    this.name = 'EmptyDocument';
  }
}

// =============================================================================
// Infrastructure Errors
// =============================================================================

export class EmbeddingUnavailable extends RagError {
  constructor(message: string, cause?: unknown) {
    super('EMBEDDING_UNAVAILABLE', message, cause);
    this.name = 'EmbeddingUnavailable';
  }
}

export class StorageFailure extends RagError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE_FAILURE', message, cause);
    this.name = 'StorageFailure';
  }
}

/**
 * Raised when a vector's length differs from the index dimensionality.
 * Vectors are never truncated or padded to fit.
 */
export class DimensionMismatch extends RagError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super('DIMENSION_MISMATCH', `Vector has ${actual} dimensions, index expects ${expected}`);
    this.name = 'DimensionMismatch';
    this.expected = expected;
    this.actual = actual;
  }
}

export class TimeoutError extends RagError {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// =============================================================================
// Generation Errors
// =============================================================================

export class ProviderError extends RagError {
  public readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super('PROVIDER_ERROR', `${provider}: ${message}`, cause);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export interface ProviderAttempt {
  provider: string;
  error: string;
  durationMs: number;
}

export class GenerationExhausted extends RagError {
  public readonly attempts: ProviderAttempt[];

  constructor(attempts: ProviderAttempt[]) {
    super(
      'GENERATION_EXHAUSTED',
      attempts.length === 0
        ? 'No generation backend is configured'
        : `All ${attempts.length} generation backends failed`
    );
    this.name = 'GenerationExhausted';
    this.attempts = attempts;
  }
}

export class NotFound extends RagError {
  constructor(what: string) {
    super('NOT_FOUND', `${what} not found`);
    this.name = 'NotFound';
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

/**
 * Normalize any thrown value into a message string.
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * Read an HTTP status off SDK or fetch errors without depending on their classes.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

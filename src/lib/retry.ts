/**
 * Retry and Timeout Helpers
 *
 * Bounded retries with exponential backoff, and per-call deadlines that
 * abort the underlying request.
 */

import { TimeoutError, getErrorStatus } from './errors';

// =============================================================================
// Types
// =============================================================================

export interface RetryOptions {
  /** Total attempts, including the first one. */
  maxRetries: number;
  /** Delay in milliseconds before the first retry. */
  initialDelay: number;
  maxDelay: number;
  /** Backoff multiplier applied after each failed attempt. */
  factor: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelay: 250,
  maxDelay: 5000,
  factor: 2,
};

// =============================================================================
// Retry
// =============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an async operation, retrying failures with exponential backoff and jitter.
 * Rethrows the last error once attempts are exhausted.
 */
export async function retry<T>(
  operation: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const attempts = Math.max(1, config.maxRetries);

  let lastError: Error = new Error('retry: operation was never attempted');
  let delay = config.initialDelay;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= attempts || (config.shouldRetry && !config.shouldRetry(lastError))) {
        break;
      }

      config.onRetry?.(lastError, attempt);

      const jitter = delay * 0.2 * (Math.random() - 0.5);
      await sleep(Math.max(0, delay + jitter));
      delay = Math.min(delay * config.factor, config.maxDelay);
    }
  }

  throw lastError;
}

/**
 * Transient failures worth retrying: timeouts, connection errors without a
 * status, rate limits and server errors.
 */
export function isTransientError(error: Error): boolean {
  if (error instanceof TimeoutError) return true;
  const status = getErrorStatus(error);
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

// =============================================================================
// Timeout
// =============================================================================

/**
 * Run an abortable operation with a deadline.
 * The signal passed to the operation is aborted when the deadline passes.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Structured Logging System
 *
 * Pino-based logging with:
 * - Request tracing via traceId
 * - Environment-based configuration
 * - Sensitive data redaction
 * - Layer-specific child loggers
 * - Timing utilities
 */

import pino, { Logger, LoggerOptions } from 'pino';
import { randomUUID } from 'crypto';

// =============================================================================
// Configuration
// =============================================================================

const IS_PRODUCTION = process.env.NODE_ENV === 'production';
const IS_TEST = process.env.NODE_ENV === 'test';
const LOG_LEVEL = process.env.LOG_LEVEL || (IS_TEST ? 'silent' : 'info');

/**
 * JSON with ISO timestamps in production, pretty output in development,
 * plain JSON under test so no transport worker is started.
 */
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  ...(IS_PRODUCTION || IS_TEST
    ? {
        formatters: {
          level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
      }
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
      }),
};

// =============================================================================
// Main Logger Instance
// =============================================================================

/**
 * Root logger instance.
 * Use child loggers for specific contexts.
 */
export const logger: Logger = pino(pinoOptions);

export type LogLayer = 'rag' | 'db' | 'external' | 'security' | 'parser';

/**
 * Pre-configured layer loggers (without request context)
 */
export const loggers: Record<LogLayer, Logger> = {
  rag: logger.child({ layer: 'rag' }),
  db: logger.child({ layer: 'db' }),
  external: logger.child({ layer: 'external' }),
  security: logger.child({ layer: 'security' }),
  parser: logger.child({ layer: 'parser' }),
};

// =============================================================================
// Request Context
// =============================================================================

export interface RequestContext {
  traceId: string;
  operation: string;
  startTime: number;
}

/**
 * Generate a new request context with unique traceId
 */
export function createRequestContext(operation: string): RequestContext {
  return {
    traceId: randomUUID(),
    operation,
    startTime: Date.now(),
  };
}

/**
 * Create a child of a layer logger bound to a request context
 */
export function createRequestLogger(base: Logger, ctx: RequestContext): Logger {
  return base.child({ traceId: ctx.traceId, operation: ctx.operation });
}

// =============================================================================
// Sanitization Utilities
// =============================================================================

const MAX_TEXT_LENGTH = 200;

const SENSITIVE_PATTERNS = [
  /sk-[a-zA-Z0-9_-]{20,}/g, // OpenAI-style API keys
  /postgres(ql)?:\/\/[^@\s]+@/g, // Database URLs with credentials
  /Bearer [a-zA-Z0-9._-]+/g, // Bearer tokens
  /x-api-key[=:]\s*["']?[^"'\s]+/gi,
  /api[_-]?key[=:]\s*["']?[^"'\s]+/gi,
];

/**
 * Redact credentials from a string
 */
export function sanitizeString(value: string): string {
  return SENSITIVE_PATTERNS.reduce((result, pattern) => result.replace(pattern, '[REDACTED]'), value);
}

/**
 * Truncate text content for logging
 */
export function truncateText(text: string, maxLength = MAX_TEXT_LENGTH): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

// =============================================================================
// Timing Utilities
// =============================================================================

/**
 * Timer class for tracking operation durations
 */
export class Timer {
  private startTime: number;
  private marks: Map<string, number> = new Map();
  private durations: Map<string, number> = new Map();

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Mark the start of an operation
   */
  mark(name: string): void {
    this.marks.set(name, Date.now());
  }

  /**
   * Record the duration since a mark
   */
  measure(name: string): number {
    const markTime = this.marks.get(name);
    if (markTime === undefined) {
      return 0;
    }
    const duration = Date.now() - markTime;
    this.durations.set(name, duration);
    return duration;
  }

  getDuration(name: string): number | undefined {
    return this.durations.get(name);
  }

  elapsed(): number {
    return Date.now() - this.startTime;
  }

  /**
   * All measured durations keyed as `<name>_ms`
   */
  getAllDurations(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [key, value] of this.durations) {
      result[`${key}_ms`] = value;
    }
    return result;
  }
}

// =============================================================================
// Logging Helpers
// =============================================================================

/**
 * Log an external service call
 */
export function logExternalCall(
  log: Logger,
  service: string,
  operation: string,
  details: {
    duration_ms?: number;
    status?: number | string;
    error?: string;
    tokens?: number;
    model?: string;
    count?: number;
  }
): void {
  const error = details.error ? sanitizeString(details.error) : undefined;
  const baseLog = {
    event: 'external_call',
    service,
    operation,
    ...details,
    error,
  };

  if (error) {
    log.warn(baseLog, `${service} ${operation} failed: ${error}`);
  } else {
    log.debug(baseLog, `${service} ${operation} completed`);
  }
}

/**
 * Log a database operation
 */
export function logDbOperation(
  log: Logger,
  operation: string,
  details: {
    table?: string;
    rows?: number;
    duration_ms: number;
    error?: string;
  }
): void {
  if (details.error) {
    log.error({ event: 'db_operation', operation, ...details }, `Database ${operation} failed: ${details.error}`);
  } else {
    log.debug({ event: 'db_operation', operation, ...details }, `Database ${operation} completed`);
  }
}

/**
 * Log a security event
 */
export function logSecurityEvent(
  log: Logger,
  event: 'prompt_injection' | 'suspicious_input',
  details: {
    input?: string;
    reason?: string;
  }
): void {
  log.warn(
    {
      event: `security_${event}`,
      ...details,
      input: details.input ? truncateText(details.input, 100) : undefined,
    },
    `Security event: ${event}`
  );
}

/**
 * Log a RAG pipeline step
 */
export function logRagStep(
  log: Logger,
  step: 'extraction' | 'chunking' | 'embedding' | 'storage' | 'retrieval' | 'generation' | 'deletion',
  details: {
    duration_ms?: number;
    chunks?: number;
    pages?: number;
    confidence?: number;
    provider?: string;
    widened?: boolean;
    error?: string;
  }
): void {
  const baseLog = {
    event: `rag_${step}`,
    ...details,
  };

  if (details.error) {
    log.error(baseLog, `RAG ${step} failed: ${details.error}`);
  } else {
    log.debug(baseLog, `RAG ${step} completed`);
  }
}

// =============================================================================
// Export Types
// =============================================================================

export type { Logger } from 'pino';

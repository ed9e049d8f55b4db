/**
 * Application Configuration
 *
 * Parses the process environment into a typed configuration object.
 * Defaults come from `@/lib/rag/config`.
 */

import { z } from 'zod';
import { ValidationError } from './errors';
import {
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_EMBEDDING_BATCH_SIZE,
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_SIMILARITY_THRESHOLD,
  DEFAULT_TOP_K,
  MIN_CHUNK_LENGTH,
} from './rag/config';
import { LLM_PROVIDERS, type LLMProvider } from '@/types/llm';

// =============================================================================
// Schema
// =============================================================================

const DEFAULT_PROVIDER_ORDER: LLMProvider[] = ['cohere', 'openai', 'anthropic', 'local'];

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const booleanFlag = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => value === 'true');

const providerOrder = z
  .string()
  .optional()
  .transform((value, ctx): LLMProvider[] => {
    if (!value) return DEFAULT_PROVIDER_ORDER;

    const providers: LLMProvider[] = [];
    for (const name of value.split(',').map((p) => p.trim().toLowerCase()).filter(Boolean)) {
      const provider = LLM_PROVIDERS.find((p) => p === name);
      if (!provider) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown provider "${name}" (expected one of ${LLM_PROVIDERS.join(', ')})`,
        });
        return z.NEVER;
      }
      if (!providers.includes(provider)) providers.push(provider);
    }
    return providers;
  });

const envSchema = z
  .object({
    RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(DEFAULT_CHUNK_OVERLAP),
    RAG_MIN_CHUNK_LENGTH: z.coerce.number().int().nonnegative().default(MIN_CHUNK_LENGTH),
    RAG_TOP_K: z.coerce.number().int().positive().default(DEFAULT_TOP_K),
    RAG_SIMILARITY_THRESHOLD: z.coerce.number().min(-1).max(1).default(DEFAULT_SIMILARITY_THRESHOLD),

    EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
    EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSIONS),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().max(2048).default(DEFAULT_EMBEDDING_BATCH_SIZE),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),

    OPENAI_API_KEY: optionalSecret,
    OPENAI_MODEL: z.string().min(1).default('gpt-4o-mini'),
    ANTHROPIC_API_KEY: optionalSecret,
    ANTHROPIC_MODEL: z.string().min(1).default('claude-3-5-haiku-latest'),
    COHERE_API_KEY: optionalSecret,
    COHERE_MODEL: z.string().min(1).default('command-r-plus'),
    USE_LOCAL_LLM: booleanFlag,
    LOCAL_LLM_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    LOCAL_LLM_MODEL: z.string().min(1).default('llama3.2'),
    LLM_PROVIDER_ORDER: providerOrder,
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROVIDER_TIMEOUT_MS),

    DATABASE_URL: optionalSecret,
  })
  .refine((env) => env.RAG_CHUNK_OVERLAP < env.RAG_CHUNK_SIZE, {
    message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
    path: ['RAG_CHUNK_OVERLAP'],
  });

// =============================================================================
// Types
// =============================================================================

export interface ProviderSettings {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  enabled: boolean;
}

export interface AppConfig {
  chunking: {
    chunkSize: number;
    chunkOverlap: number;
    minChunkLength: number;
  };
  retrieval: {
    topK: number;
    similarityThreshold: number;
  };
  embedding: {
    apiKey?: string;
    model: string;
    dimensions: number;
    batchSize: number;
    timeoutMs: number;
  };
  generation: {
    providerOrder: LLMProvider[];
    timeoutMs: number;
    providers: Record<LLMProvider, ProviderSettings>;
  };
  databaseUrl?: string;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load configuration from an environment map.
 *
 * @throws ValidationError listing every invalid key
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings behave like unset variables
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`
    );
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;

  return {
    chunking: {
      chunkSize: e.RAG_CHUNK_SIZE,
      chunkOverlap: e.RAG_CHUNK_OVERLAP,
      minChunkLength: e.RAG_MIN_CHUNK_LENGTH,
    },
    retrieval: {
      topK: e.RAG_TOP_K,
      similarityThreshold: e.RAG_SIMILARITY_THRESHOLD,
    },
    embedding: {
      apiKey: e.OPENAI_API_KEY,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      batchSize: e.EMBEDDING_BATCH_SIZE,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    generation: {
      providerOrder: e.LLM_PROVIDER_ORDER,
      timeoutMs: e.LLM_TIMEOUT_MS,
      providers: {
        openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL, enabled: true },
        anthropic: { apiKey: e.ANTHROPIC_API_KEY, model: e.ANTHROPIC_MODEL, enabled: true },
        cohere: { apiKey: e.COHERE_API_KEY, model: e.COHERE_MODEL, enabled: true },
        local: {
          model: e.LOCAL_LLM_MODEL,
          baseUrl: e.LOCAL_LLM_BASE_URL,
          enabled: e.USE_LOCAL_LLM,
        },
      },
    },
    databaseUrl: e.DATABASE_URL,
  };
}

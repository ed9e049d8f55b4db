/**
 * Answer Generator
 *
 * Walks the configured LLM backends in order and returns the first usable
 * answer. When every backend fails, or none is configured, it falls back to
 * an extractive answer assembled from the top retrieved chunks, so a call
 * with retrieved context always produces text.
 */

import { GenerationExhausted, type ProviderAttempt, toErrorMessage } from '@/lib/errors';
import { formatContext } from '@/lib/llm/prompts';
import { logExternalCall, logRagStep, loggers } from '@/lib/logger';
import { withTimeout } from '@/lib/retry';
import type { ConversationTurn, LLMAdapter } from '@/types/llm';
import type { RetrievedChunk } from '@/types/rag';
import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_TEMPERATURE,
  EXTRACTIVE_CHUNK_COUNT,
  EXTRACTIVE_SNIPPET_CHARS,
  HISTORY_WINDOW,
  MAX_ANSWER_CHARS,
  MIN_ANSWER_CHARS,
} from './config';

const log = loggers.rag.child({ service: 'Generator' });

// =============================================================================
// Types
// =============================================================================

export const EXTRACTIVE_PROVIDER = 'extractive';

export interface GeneratorOptions {
  /** Per-backend deadline */
  timeoutMs: number;
  maxAnswerChars: number;
  /** Cleaned answers shorter than this count as a failed attempt */
  minAnswerChars: number;
  snippetChars: number;
  /** Most recent history turns passed to a backend */
  historyWindow: number;
}

export interface GenerateParams {
  temperature?: number;
  maxTokens?: number;
  history?: ConversationTurn[];
}

export interface GenerationResult {
  text: string;
  /** Backend that produced the answer, or 'extractive' */
  provider: string;
  /** Failed attempts, in order */
  attempts: ProviderAttempt[];
}

const DEFAULT_OPTIONS: GeneratorOptions = {
  timeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
  maxAnswerChars: MAX_ANSWER_CHARS,
  minAnswerChars: MIN_ANSWER_CHARS,
  snippetChars: EXTRACTIVE_SNIPPET_CHARS,
  historyWindow: HISTORY_WINDOW,
};

// =============================================================================
// Response Cleanup
// =============================================================================

const ROLE_PREFIX = /^\s*(Assistant|AI):\s*/i;

/**
 * Strip role labels from each line, drop blank and recently repeated lines,
 * and cap length.
 */
export function cleanResponse(text: string, maxChars: number = MAX_ANSWER_CHARS): string {
  const lines: string[] = [];

  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(ROLE_PREFIX, '').trim();
    if (!line) continue;
    // Models sometimes loop on the same sentence
    if (lines.slice(-3).includes(line)) continue;
    lines.push(line);
  }

  const cleaned = lines.join('\n');
  if (cleaned.length > maxChars) {
    return `${cleaned.slice(0, maxChars)}...`;
  }
  return cleaned;
}

// =============================================================================
// Extractive Fallback
// =============================================================================

const EXTRACTIVE_TEMPLATES: Array<{ keywords: RegExp; lead: string }> = [
  { keywords: /\b(what|about|describe|summary|summarize)\b/i, lead: 'Based on the document, this appears to be about: ' },
  { keywords: /\b(when|time|date|schedule)\b/i, lead: 'According to the document: ' },
  { keywords: /\b(where|location|place)\b/i, lead: 'The document mentions: ' },
  { keywords: /\b(who|person|people)\b/i, lead: 'From the document: ' },
  { keywords: /\b(how|process|method)\b/i, lead: 'The document explains: ' },
];

export const NO_EXTRACTIVE_CONTEXT_ANSWER =
  "I couldn't find relevant information in the document to answer your question.";

/**
 * Answer from the top chunks verbatim, introduced by a lead-in chosen from
 * the question's keywords.
 */
export function buildExtractiveAnswer(
  query: string,
  chunks: RetrievedChunk[],
  snippetChars: number = EXTRACTIVE_SNIPPET_CHARS
): string {
  if (chunks.length === 0) {
    return NO_EXTRACTIVE_CONTEXT_ANSWER;
  }

  const snippets = chunks
    .slice(0, EXTRACTIVE_CHUNK_COUNT)
    .map((chunk) =>
      chunk.content.length > snippetChars ? `${chunk.content.slice(0, snippetChars)}...` : chunk.content
    )
    .join(' ');

  const template = EXTRACTIVE_TEMPLATES.find(({ keywords }) => keywords.test(query));
  const lead = template
    ? template.lead
    : `Based on your question about '${query}', here's what I found in the document: `;

  return `${lead}${snippets}`;
}

// =============================================================================
// Generator
// =============================================================================

export class Generator {
  readonly options: GeneratorOptions;

  constructor(
    private adapters: LLMAdapter[],
    options: Partial<GeneratorOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Backends that will be tried, in order.
   */
  availableProviders(): string[] {
    return this.adapters.filter((adapter) => adapter.isConfigured()).map((adapter) => adapter.provider);
  }

  /**
   * Generate an answer grounded in the retrieved chunks. Never throws:
   * exhausted backends degrade to the extractive answer.
   */
  async generate(query: string, chunks: RetrievedChunk[], params: GenerateParams = {}): Promise<GenerationResult> {
    const start = Date.now();
    const context = formatContext(chunks.map((chunk) => ({ content: chunk.content, pageNumber: chunk.pageNumber })));
    const history = (params.history ?? []).slice(-this.options.historyWindow);
    const attempts: ProviderAttempt[] = [];

    for (const adapter of this.adapters) {
      if (!adapter.isConfigured()) continue;

      const attemptStart = Date.now();
      try {
        const response = await withTimeout(
          (signal) =>
            adapter.complete({
              question: query,
              context,
              history,
              temperature: params.temperature ?? DEFAULT_TEMPERATURE,
              maxTokens: params.maxTokens ?? DEFAULT_MAX_TOKENS,
              signal,
            }),
          this.options.timeoutMs,
          `${adapter.provider} generation`
        );

        const text = cleanResponse(response.content, this.options.maxAnswerChars);
        if (text.length < this.options.minAnswerChars) {
          throw new Error(`answer too short (${text.length} chars)`);
        }

        logExternalCall(log, adapter.provider, 'generate', {
          duration_ms: Date.now() - attemptStart,
          model: adapter.model,
          tokens: response.usage.totalTokens,
        });
        logRagStep(log, 'generation', { provider: adapter.provider, duration_ms: Date.now() - start });

        return { text, provider: adapter.provider, attempts };
      } catch (error) {
        const attempt: ProviderAttempt = {
          provider: adapter.provider,
          error: toErrorMessage(error),
          durationMs: Date.now() - attemptStart,
        };
        attempts.push(attempt);
        logExternalCall(log, adapter.provider, 'generate', {
          duration_ms: attempt.durationMs,
          model: adapter.model,
          error: attempt.error,
        });
      }
    }

    const exhausted = new GenerationExhausted(attempts);
    log.warn({ attempts }, `${exhausted.message}; using extractive answer`);
    logRagStep(log, 'generation', { provider: EXTRACTIVE_PROVIDER, duration_ms: Date.now() - start });

    return {
      text: buildExtractiveAnswer(query, chunks, this.options.snippetChars),
      provider: EXTRACTIVE_PROVIDER,
      attempts,
    };
  }
}

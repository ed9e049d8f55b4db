/**
 * Base LLM adapter class.
 *
 * Provides the interface that all generation backends implement, so the
 * generator can walk an ordered provider list without knowing wire formats.
 */

import {
  LLMAdapter,
  LLMAdapterConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
  FinishReason,
  TokenUsage,
} from '@/types/llm';

export const EMPTY_USAGE: TokenUsage = {
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
};

/**
 * Abstract base class for LLM adapters.
 *
 * Subclasses implement complete(). isConfigured() defaults to "enabled and has
 * an API key"; credential-free backends override it.
 */
export abstract class BaseLLMAdapter implements LLMAdapter {
  abstract readonly provider: string;
  readonly model: string;

  protected apiKey?: string;
  protected baseUrl?: string;
  protected enabled: boolean;

  constructor(config: LLMAdapterConfig, defaultModel: string) {
    this.apiKey = config.apiKey;
    this.model = config.model ?? defaultModel;
    this.baseUrl = config.baseUrl;
    this.enabled = config.enabled ?? true;
  }

  isConfigured(): boolean {
    return this.enabled && Boolean(this.apiKey);
  }

  abstract complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

/**
 * Map provider-specific stop reasons onto the shared set.
 */
export function mapFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
    case 'end_turn':
    case 'stop_sequence':
    case 'COMPLETE':
      return 'stop';
    case 'length':
    case 'max_tokens':
    case 'MAX_TOKENS':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    default:
      return null;
  }
}

// Re-export types for convenience
export type { LLMAdapter, LLMAdapterConfig, LLMCompletionRequest, LLMCompletionResponse, FinishReason };

/**
 * LLM adapter interface types.
 *
 * Every generation backend, whatever its wire shape (chat completion,
 * prompt completion, single message with a preamble), is driven through
 * the same `complete(request)` call.
 */

/**
 * Generation backends known to the adapter registry.
 */
export const LLM_PROVIDERS = ['openai', 'anthropic', 'cohere', 'local'] as const;

export type LLMProvider = (typeof LLM_PROVIDERS)[number];

/**
 * Message in a chat conversation.
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * A prior turn supplied by the caller.
 */
export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Normalized generation request.
 */
export interface LLMCompletionRequest {
  /** The user's question. */
  question: string;
  /** Retrieved passages, already formatted as a numbered source list. */
  context: string;
  /** Prior turns, oldest first. */
  history: ConversationTurn[];
  temperature: number;
  maxTokens: number;
  /** Aborted when the caller's deadline passes. */
  signal?: AbortSignal;
}

/**
 * Reason for completion stopping.
 */
export type FinishReason = 'stop' | 'length' | 'content_filter' | null;

/**
 * Token usage statistics.
 */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * Response from text completion.
 */
export interface LLMCompletionResponse {
  content: string;
  finishReason: FinishReason;
  usage: TokenUsage;
}

/**
 * Constructor options shared by all adapters.
 */
export interface LLMAdapterConfig {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  /** Backends that need no credentials (local servers) are opt-in. */
  enabled?: boolean;
}

/**
 * Core LLM adapter interface.
 */
export interface LLMAdapter {
  /** Provider name (e.g., 'openai', 'cohere') */
  readonly provider: string;
  readonly model: string;

  /**
   * Whether credentials or an endpoint are present. Unconfigured adapters
   * are skipped by the generator.
   */
  isConfigured(): boolean;

  /**
   * Generate an answer grounded in the request's context.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

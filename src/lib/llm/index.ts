/**
 * LLM module exports.
 */

export { BaseLLMAdapter, EMPTY_USAGE, mapFinishReason } from './adapter';
export type {
  LLMAdapter,
  LLMAdapterConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
  FinishReason,
} from './adapter';

export { OpenAIAdapter } from './openai-adapter';
export { AnthropicAdapter } from './anthropic-adapter';
export { CohereAdapter } from './cohere-adapter';
export { LocalModelAdapter, DEFAULT_LOCAL_BASE_URL } from './local-adapter';

export {
  createLLMAdapter,
  createAdaptersFromConfig,
  getSupportedProviders,
  registerLLMAdapter,
  isProviderSupported,
} from './factory';

export {
  buildSystemPrompt,
  buildUserPrompt,
  buildChatMessages,
  buildCompletionPrompt,
  buildPreambleMessage,
  formatContext,
  formatHistory,
  DECLINE_ANSWER,
} from './prompts';

export type { PromptSource } from './prompts';

export {
  sanitize,
  sanitizeQuestion,
  sanitizeHistoryMessage,
  sanitizeChunkContent,
  detectInjectionPatterns,
  truncateAtWord,
  MAX_LENGTHS,
} from './sanitize';

export type { SanitizeResult, SanitizeOptions } from './sanitize';

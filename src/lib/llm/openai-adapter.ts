/**
 * OpenAI adapter implementation.
 *
 * Chat-completion shape: system prompt, prior turns and the grounded
 * question are sent as separate messages. The SDK's own retries are
 * disabled; the generator moves on to the next backend instead.
 */

import OpenAI from 'openai';
import { ProviderError } from '@/lib/errors';
import { BaseLLMAdapter, LLMAdapterConfig, LLMCompletionRequest, LLMCompletionResponse, mapFinishReason } from './adapter';
import { buildChatMessages } from './prompts';

export class OpenAIAdapter extends BaseLLMAdapter {
  readonly provider: string = 'openai';
  private client: OpenAI | null = null;

  constructor(config: LLMAdapterConfig) {
    super(config, 'gpt-4o-mini');
  }

  /**
   * The SDK refuses to construct without a key, so the client is created lazily.
   */
  protected getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.apiKey,
        baseURL: this.baseUrl,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const response = await this.getClient().chat.completions.create(
      {
        model: this.model,
        messages: buildChatMessages(request),
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { signal: request.signal }
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new ProviderError(this.provider, 'response contained no choices');
    }

    return {
      content: choice.message.content ?? '',
      finishReason: mapFinishReason(choice.finish_reason),
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
    };
  }
}

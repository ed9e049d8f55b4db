/**
 * Anthropic adapter implementation.
 *
 * Single-message shape: the instructions go in the `system` preamble and
 * history, question and context travel in one user message.
 */

import { z } from 'zod';
import { ProviderError } from '@/lib/errors';
import { BaseLLMAdapter, LLMAdapterConfig, LLMCompletionRequest, LLMCompletionResponse, mapFinishReason } from './adapter';
import { buildPreambleMessage } from './prompts';

const ANTHROPIC_DEFAULT_BASE = 'https://api.anthropic.com/v1';
const ANTHROPIC_VERSION = '2023-06-01';

interface AnthropicMessagesRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

const anthropicMessagesResponse = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

export class AnthropicAdapter extends BaseLLMAdapter {
  readonly provider = 'anthropic';

  constructor(config: LLMAdapterConfig) {
    super(config, 'claude-3-5-haiku-latest');
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const { preamble, message } = buildPreambleMessage(request);
    const body: AnthropicMessagesRequest = {
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      system: preamble,
      messages: [{ role: 'user', content: message }],
    };

    const response = await fetch(`${this.baseUrl ?? ANTHROPIC_DEFAULT_BASE}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey ?? '',
        'anthropic-version': ANTHROPIC_VERSION,
      },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ProviderError(this.provider, `API error ${response.status}: ${errorText.slice(0, 200)}`);
    }

    const parsed = anthropicMessagesResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.provider, 'malformed messages response', parsed.error);
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('');
    const usage = parsed.data.usage;

    return {
      content: text.trim(),
      finishReason: mapFinishReason(parsed.data.stop_reason),
      usage: {
        promptTokens: usage?.input_tokens ?? 0,
        completionTokens: usage?.output_tokens ?? 0,
        totalTokens: (usage?.input_tokens ?? 0) + (usage?.output_tokens ?? 0),
      },
    };
  }
}

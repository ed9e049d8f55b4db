/**
 * Cohere adapter implementation.
 *
 * Prompt-completion shape: instructions, history, question and context are
 * flattened into one prompt string for the generate endpoint.
 */

import { z } from 'zod';
import { ProviderError } from '@/lib/errors';
import {
  BaseLLMAdapter,
  EMPTY_USAGE,
  LLMAdapterConfig,
  LLMCompletionRequest,
  LLMCompletionResponse,
  mapFinishReason,
} from './adapter';
import { buildCompletionPrompt } from './prompts';

const COHERE_DEFAULT_BASE = 'https://api.cohere.ai/v1';

interface CohereGenerateRequest {
  model: string;
  prompt: string;
  max_tokens: number;
  temperature: number;
  truncate: 'NONE' | 'START' | 'END';
}

const cohereGenerateResponse = z.object({
  generations: z
    .array(
      z.object({
        text: z.string(),
        finish_reason: z.string().optional(),
      })
    )
    .min(1),
  meta: z
    .object({
      billed_units: z
        .object({
          input_tokens: z.number().optional(),
          output_tokens: z.number().optional(),
        })
        .optional(),
    })
    .optional(),
});

export class CohereAdapter extends BaseLLMAdapter {
  readonly provider = 'cohere';

  constructor(config: LLMAdapterConfig) {
    super(config, 'command-r-plus');
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const body: CohereGenerateRequest = {
      model: this.model,
      prompt: buildCompletionPrompt(request),
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      truncate: 'END',
    };

    const response = await fetch(`${this.baseUrl ?? COHERE_DEFAULT_BASE}/generate`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey ?? ''}`,
      },
      body: JSON.stringify(body),
      signal: request.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new ProviderError(this.provider, `API error ${response.status}: ${errorText.slice(0, 200)}`);
    }

    const parsed = cohereGenerateResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError(this.provider, 'malformed generate response', parsed.error);
    }

    const [generation] = parsed.data.generations;
    const billed = parsed.data.meta?.billed_units;
    const promptTokens = billed?.input_tokens ?? 0;
    const completionTokens = billed?.output_tokens ?? 0;

    return {
      content: generation.text.trim(),
      finishReason: mapFinishReason(generation.finish_reason),
      usage: billed
        ? { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens }
        : EMPTY_USAGE,
    };
  }
}

/**
 * Local model adapter.
 *
 * Talks to an OpenAI-compatible server on the local machine (Ollama,
 * llama.cpp, vLLM). Needs no credentials, so it only runs when enabled.
 */

import { LLMAdapterConfig } from './adapter';
import { OpenAIAdapter } from './openai-adapter';

export const DEFAULT_LOCAL_BASE_URL = 'http://localhost:11434/v1';

export class LocalModelAdapter extends OpenAIAdapter {
  readonly provider: string = 'local';

  constructor(config: LLMAdapterConfig) {
    super({
      ...config,
      // Local servers ignore the key, but the SDK requires one
      apiKey: config.apiKey ?? 'local',
      model: config.model ?? 'llama3.2',
      baseUrl: config.baseUrl ?? DEFAULT_LOCAL_BASE_URL,
      enabled: config.enabled ?? false,
    });
  }

  isConfigured(): boolean {
    return this.enabled && Boolean(this.baseUrl);
  }
}

/**
 * LLM Adapter Factory.
 *
 * Creates adapters by provider name and assembles the ordered backend list
 * the generator walks through.
 */

import type { AppConfig } from '@/lib/config';
import { LLM_PROVIDERS, type LLMProvider } from '@/types/llm';
import { LLMAdapter, LLMAdapterConfig } from './adapter';
import { AnthropicAdapter } from './anthropic-adapter';
import { CohereAdapter } from './cohere-adapter';
import { LocalModelAdapter } from './local-adapter';
import { OpenAIAdapter } from './openai-adapter';

// =============================================================================
// Adapter Registry
// =============================================================================

type AdapterConstructor = new (config: LLMAdapterConfig) => LLMAdapter;

const adapterRegistry = new Map<LLMProvider, AdapterConstructor>([
  ['openai', OpenAIAdapter],
  ['anthropic', AnthropicAdapter],
  ['cohere', CohereAdapter],
  ['local', LocalModelAdapter],
]);

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create an LLM adapter for a specific provider.
 *
 * @throws Error if provider is not supported
 *
 * @example
 * const adapter = createLLMAdapter('cohere', {
 *   apiKey: process.env.COHERE_API_KEY,
 *   model: 'command-r-plus',
 * });
 */
export function createLLMAdapter(provider: LLMProvider, config: LLMAdapterConfig): LLMAdapter {
  const AdapterClass = adapterRegistry.get(provider);

  if (!AdapterClass) {
    throw new Error(
      `Unsupported LLM provider: ${provider}. ` +
      `Supported providers: ${getSupportedProviders().join(', ')}`
    );
  }

  return new AdapterClass(config);
}

/**
 * Build adapters in preference order from application config.
 * Unconfigured adapters are included; the generator skips them.
 */
export function createAdaptersFromConfig(generation: AppConfig['generation']): LLMAdapter[] {
  return generation.providerOrder.map((provider) => createLLMAdapter(provider, generation.providers[provider]));
}

// =============================================================================
// Registry Management
// =============================================================================

export function getSupportedProviders(): LLMProvider[] {
  return Array.from(adapterRegistry.keys());
}

/**
 * Replace the adapter used for a provider name.
 *
 * @example
 * class AzureOpenAIAdapter extends OpenAIAdapter { ... }
 * registerLLMAdapter('openai', AzureOpenAIAdapter);
 */
export function registerLLMAdapter(provider: LLMProvider, adapterClass: AdapterConstructor): void {
  adapterRegistry.set(provider, adapterClass);
}

export function isProviderSupported(provider: string): provider is LLMProvider {
  const match = LLM_PROVIDERS.find((p) => p === provider);
  return match !== undefined && adapterRegistry.has(match);
}

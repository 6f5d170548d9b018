import { LLMProvider, LLMProviderName, LLMProviderConfig, LLM_PROVIDER_NAMES } from './types';
import { OpenAIProvider } from './providers/openai-provider';
import { AnthropicProvider } from './providers/anthropic-provider';
import { GeminiProvider } from './providers/gemini-provider';
import { logger } from '../observability/logger';

export type ProviderConfigs = Record<LLMProviderName, LLMProviderConfig>;

/**
 * Create a single LLM provider by name.
 */
export function createProvider(name: LLMProviderName, config: LLMProviderConfig): LLMProvider {
  switch (name) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'gemini':
      return new GeminiProvider(config);
  }
}

/**
 * Build all configured providers. Only creates providers whose API keys are set.
 */
export function buildProviders(configs: ProviderConfigs): Map<LLMProviderName, LLMProvider> {
  const providers = new Map<LLMProviderName, LLMProvider>();
  const log = logger.child({ component: 'provider-factory' });

  for (const name of LLM_PROVIDER_NAMES) {
    const config = configs[name];
    if (!config.apiKey) continue;
    providers.set(name, createProvider(name, config));
    log.info({ provider: name, model: config.model }, 'LLM provider initialized');
  }

  if (providers.size === 0) {
    throw new Error(
      'No LLM providers configured. Set at least one of: GEMINI_API_KEY, OPENAI_API_KEY, ANTHROPIC_API_KEY',
    );
  }

  log.info({ providers: Array.from(providers.keys()) }, `${providers.size} LLM provider(s) initialized`);
  return providers;
}

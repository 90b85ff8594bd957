/**
 * LLM provider factory - creates and resolves provider instances.
 */
import type { ILLMProvider, LLMProvider, LLMConfig } from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import type { LLMSettings, LLMProviderConfig } from '../../core/config/schema.js';
import { ExplanationError, ErrorCodes } from '../../utils/errors.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';
import { PromptProvider } from './prompt.js';

/**
 * Convert config file settings to LLMConfig format.
 * A key in the config file wins over the environment variable.
 */
function toProviderConfig(
  providerConfig: LLMProviderConfig | undefined,
  provider: LLMProvider,
  timeoutMs?: number
): Partial<LLMConfig> {
  if (!providerConfig) return { provider, timeoutMs };

  return {
    provider,
    model: providerConfig.model,
    apiKey: providerConfig.api_key,
    baseUrl: providerConfig.base_url,
    maxTokens: providerConfig.max_tokens,
    temperature: providerConfig.temperature,
    timeoutMs,
  };
}

/**
 * Create an LLM provider instance.
 */
export function createProvider(
  provider: LLMProvider,
  config: Partial<LLMConfig> = {}
): ILLMProvider {
  switch (provider) {
    case 'openai':
      return new OpenAIProvider(config);
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'prompt':
      return new PromptProvider();
    default:
      throw new ExplanationError(ErrorCodes.UNKNOWN_PROVIDER, `Unknown LLM provider: ${String(provider)}`);
  }
}

/**
 * Create an LLM provider from config file settings.
 * @param provider - The provider type
 * @param settings - LLM settings from config.yaml
 */
export function createProviderFromSettings(
  provider: LLMProvider,
  settings?: LLMSettings
): ILLMProvider {
  if (!settings) {
    return createProvider(provider);
  }

  const providerConfig = provider === 'prompt' ? undefined : settings.providers[provider];
  return createProvider(provider, toProviderConfig(providerConfig, provider, settings.timeout_ms));
}

/**
 * Get the first available provider (has API key configured).
 * Falls back to 'prompt' if no API providers are available.
 * @param preferred - Preferred provider to try first
 */
export function getAvailableProvider(
  preferred?: LLMProvider,
  settings?: LLMSettings
): ILLMProvider {
  if (preferred) {
    const provider = createProviderFromSettings(preferred, settings);
    if (provider.isAvailable()) {
      return provider;
    }
  }

  // Try OpenAI first
  const openai = createProviderFromSettings('openai', settings);
  if (openai.isAvailable()) {
    return openai;
  }

  // Try Anthropic
  const anthropic = createProviderFromSettings('anthropic', settings);
  if (anthropic.isAvailable()) {
    return anthropic;
  }

  // Fall back to prompt mode
  return new PromptProvider();
}

/**
 * List all providers with their configuration.
 */
export function listProviders(settings?: LLMSettings): Array<{
  name: LLMProvider;
  available: boolean;
  model?: string;
  baseUrl?: string;
}> {
  const openaiConfig = settings?.providers.openai;
  const anthropicConfig = settings?.providers.anthropic;

  return [
    {
      name: 'openai',
      available: createProviderFromSettings('openai', settings).isAvailable(),
      model: openaiConfig?.model || DEFAULT_CONFIGS.openai.model,
      baseUrl: openaiConfig?.base_url || DEFAULT_CONFIGS.openai.baseUrl,
    },
    {
      name: 'anthropic',
      available: createProviderFromSettings('anthropic', settings).isAvailable(),
      model: anthropicConfig?.model || DEFAULT_CONFIGS.anthropic.model,
      baseUrl: anthropicConfig?.base_url || DEFAULT_CONFIGS.anthropic.baseUrl,
    },
    { name: 'prompt', available: true },
  ];
}

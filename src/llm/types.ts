/**
 * LLM provider types for violation explanations.
 * Designed to be provider-agnostic (OpenAI, Anthropic, or external agents).
 */

import type { Evidence, Principle } from '../core/analysis/types.js';

/**
 * Supported LLM providers.
 * - openai: OpenAI-compatible chat completions API
 * - anthropic: Anthropic messages API
 * - prompt: returns the prompt itself for an external agent or a person to run
 */
export type LLMProvider = 'openai' | 'anthropic' | 'prompt';

export const LLM_PROVIDERS: readonly LLMProvider[] = ['openai', 'anthropic', 'prompt'];

/**
 * Configuration for LLM providers.
 */
export interface LLMConfig {
  provider: LLMProvider;
  model?: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens?: number;
  temperature?: number;
  /** Transport timeout for a single HTTP call */
  timeoutMs?: number;
}

/**
 * Default configurations per provider.
 */
export const DEFAULT_CONFIGS: Record<LLMProvider, Partial<LLMConfig>> = {
  openai: {
    model: 'gpt-4o-mini',
    baseUrl: 'https://api.openai.com/v1',
    maxTokens: 1500,
    temperature: 0,
  },
  anthropic: {
    model: 'claude-3-haiku-20240307',
    baseUrl: 'https://api.anthropic.com',
    maxTokens: 1500,
    temperature: 0,
  },
  prompt: {
    // No API config needed
  },
};

/**
 * One explanation request per Violation.
 */
export interface ExplanationRequest {
  principle: Principle;
  principleName: string;
  evidences: readonly Evidence[];
  /** Fully rendered user prompt */
  prompt: string;
}

/**
 * The explanation collaborator. Rejects on failure; the signal aborts on timeout.
 */
export type RequestExplanation = (request: ExplanationRequest, signal: AbortSignal) => Promise<string>;

/**
 * Interface for LLM providers.
 */
export interface ILLMProvider {
  readonly name: LLMProvider;

  /**
   * Explain a violation. Rejects when the provider is unavailable or the call fails.
   */
  explain(request: ExplanationRequest, signal?: AbortSignal): Promise<string>;

  /**
   * Check if the provider is available (API key set, etc.)
   */
  isAvailable(): boolean;
}

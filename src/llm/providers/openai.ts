/**
 * OpenAI provider for violation explanations.
 * Extends BaseLLMProvider with OpenAI-specific API handling.
 */
import type { LLMConfig } from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import { BaseLLMProvider, type APIResponse } from './base.js';

/**
 * OpenAI API provider (also works against OpenAI-compatible servers via baseUrl).
 */
export class OpenAIProvider extends BaseLLMProvider {
  readonly name = 'openai' as const;

  constructor(config: Partial<LLMConfig> = {}) {
    const defaults = DEFAULT_CONFIGS.openai;
    super({
      provider: 'openai',
      model: config.model || defaults.model,
      apiKey: config.apiKey || process.env.OPENAI_API_KEY,
      baseUrl: config.baseUrl || defaults.baseUrl,
      maxTokens: config.maxTokens || defaults.maxTokens,
      temperature: config.temperature ?? defaults.temperature,
      timeoutMs: config.timeoutMs,
    });
  }

  isAvailable(): boolean {
    return !!this.config.apiKey;
  }

  protected getUnavailableError(): string {
    return 'OpenAI API key not configured. Set OPENAI_API_KEY environment variable.';
  }

  protected async callAPI(prompt: string, signal: AbortSignal): Promise<APIResponse> {
    const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [
          { role: 'system', content: this.getSystemPrompt() },
          { role: 'user', content: prompt },
        ],
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
      }),
      signal,
    });

    if (!response.ok) {
      throw await this.apiError('OpenAI', response);
    }

    const data = await response.json() as {
      choices?: Array<{ message?: { content?: string } }>;
      usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
    };

    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== 'string') {
      throw new Error('Invalid response structure from OpenAI API');
    }

    return {
      content,
      usage: data.usage ? {
        input: data.usage.prompt_tokens ?? 0,
        output: data.usage.completion_tokens ?? 0,
        total: data.usage.total_tokens ?? 0,
      } : undefined,
    };
  }
}

/**
 * Anthropic provider for violation explanations.
 */
import type { LLMConfig } from '../types.js';
import { DEFAULT_CONFIGS } from '../types.js';
import { BaseLLMProvider, type APIResponse } from './base.js';

export class AnthropicProvider extends BaseLLMProvider {
  readonly name = 'anthropic' as const;

  constructor(config: Partial<LLMConfig> = {}) {
    const defaults = DEFAULT_CONFIGS.anthropic;
    super({
      provider: 'anthropic',
      model: config.model || defaults.model,
      apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
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
    return 'Anthropic API key not configured. Set ANTHROPIC_API_KEY environment variable.';
  }

  protected async callAPI(prompt: string, signal: AbortSignal): Promise<APIResponse> {
    const response = await fetch(`${this.config.baseUrl}/v1/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.config.apiKey ?? '',
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages: [{ role: 'user', content: prompt }],
        system: this.getSystemPrompt(),
      }),
      signal,
    });

    if (!response.ok) {
      throw await this.apiError('Anthropic', response);
    }

    const data = await response.json() as {
      content?: Array<{ type?: string; text?: string }>;
      usage?: { input_tokens?: number; output_tokens?: number };
    };

    if (!Array.isArray(data.content)) {
      throw new Error('Invalid response structure from Anthropic API');
    }

    const textContent = data.content.find(c => c.type === 'text');
    const content = textContent?.text ?? '';

    return {
      content,
      usage: data.usage ? {
        input: data.usage.input_tokens ?? 0,
        output: data.usage.output_tokens ?? 0,
        total: (data.usage.input_tokens ?? 0) + (data.usage.output_tokens ?? 0),
      } : undefined,
    };
  }
}

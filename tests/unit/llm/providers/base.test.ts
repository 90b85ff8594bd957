import { describe, it, expect } from 'vitest';
import { BaseLLMProvider, type APIResponse } from '../../../../src/llm/providers/base.js';
import { buildExplanationRequest } from '../../../../src/llm/prompts.js';
import { createViolation, createEvidence } from '../../../../src/core/analysis/store.js';
import type { LLMConfig } from '../../../../src/llm/types.js';

const REQUEST = buildExplanationRequest(createViolation('DIP', [
  createEvidence({ file: 'src/a.ts', line: 1, snippet: 'class A {}', subject: 'A', reason: 'concrete' }),
]));

/**
 * Concrete implementation for testing abstract base class.
 */
class TestProvider extends BaseLLMProvider {
  readonly name = 'openai' as const;
  prompts: string[] = [];
  signals: AbortSignal[] = [];
  respond: (signal: AbortSignal) => Promise<APIResponse> = async () => ({ content: ' ok ' });

  constructor(config: LLMConfig, private available = true) {
    super(config);
  }

  isAvailable(): boolean {
    return this.available;
  }

  protected getUnavailableError(): string {
    return 'Test provider not available';
  }

  protected async callAPI(prompt: string, signal: AbortSignal): Promise<APIResponse> {
    this.prompts.push(prompt);
    this.signals.push(signal);
    return this.respond(signal);
  }
}

describe('BaseLLMProvider', () => {
  const config: LLMConfig = { provider: 'openai', apiKey: 'test-key' };

  it('should send the rendered prompt and trim the answer', async () => {
    const provider = new TestProvider(config);

    expect(await provider.explain(REQUEST)).toBe('ok');
    expect(provider.prompts).toEqual([REQUEST.prompt]);
  });

  it('should reject with the unavailable message without calling the API', async () => {
    const provider = new TestProvider(config, false);

    await expect(provider.explain(REQUEST)).rejects.toThrow('Test provider not available');
    expect(provider.prompts).toEqual([]);
  });

  it('should abort the call when the transport timeout expires', async () => {
    const provider = new TestProvider({ ...config, timeoutMs: 5 });
    provider.respond = (signal) => new Promise((_, reject) => {
      signal.addEventListener('abort', () => reject(new Error('transport aborted')));
    });

    await expect(provider.explain(REQUEST)).rejects.toThrow('transport aborted');
  });

  it('should abort the call when the caller aborts', async () => {
    const provider = new TestProvider(config);
    const controller = new AbortController();
    provider.respond = (signal) => new Promise((_, reject) => {
      signal.addEventListener('abort', () => reject(new Error('caller aborted')));
    });

    const pending = provider.explain(REQUEST, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow('caller aborted');
  });
});

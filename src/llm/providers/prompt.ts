/**
 * Prompt provider: returns the explanation prompt instead of calling an API,
 * so an external agent or a person can run it.
 */

import type { ILLMProvider, ExplanationRequest } from '../types.js';

export class PromptProvider implements ILLMProvider {
  readonly name = 'prompt' as const;

  isAvailable(): boolean {
    return true; // Always available - no API needed
  }

  async explain(request: ExplanationRequest): Promise<string> {
    return [
      `[Prompt for external explanation: ${request.principleName}]`,
      '',
      request.prompt,
    ].join('\n');
  }
}

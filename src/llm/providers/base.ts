/**
 * Base class for LLM providers with shared implementation.
 * Providers only need to implement callAPI() and provider-specific config.
 */
import type { ILLMProvider, LLMConfig, LLMProvider, ExplanationRequest } from '../types.js';
import { SYSTEM_PROMPT } from '../prompts.js';
import { ExplanationError, ErrorCodes } from '../../utils/errors.js';

/**
 * API response from provider.
 */
export interface APIResponse {
  content: string;
  usage?: { input: number; output: number; total: number };
}

const DEFAULT_TRANSPORT_TIMEOUT_MS = 60000;

/**
 * Base class for LLM providers.
 * Subclasses must implement callAPI() for provider-specific API calls.
 */
export abstract class BaseLLMProvider implements ILLMProvider {
  abstract readonly name: LLMProvider;

  protected config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
  }

  abstract isAvailable(): boolean;

  /**
   * Make API call to the LLM provider.
   * Subclasses implement provider-specific request/response handling.
   */
  protected abstract callAPI(prompt: string, signal: AbortSignal): Promise<APIResponse>;

  /**
   * Get the error message when provider is not available.
   */
  protected abstract getUnavailableError(): string;

  async explain(request: ExplanationRequest, signal?: AbortSignal): Promise<string> {
    if (!this.isAvailable()) {
      throw new ExplanationError(ErrorCodes.EXPLANATION_FAILED, this.getUnavailableError(), {
        provider: this.name,
      });
    }

    const { signal: callSignal, release } = this.linkSignal(signal);
    try {
      const response = await this.callAPI(request.prompt, callSignal);
      return response.content.trim();
    } finally {
      release();
    }
  }

  /**
   * Abort signal that fires on the caller's signal or the transport timeout.
   */
  private linkSignal(outer?: AbortSignal): { signal: AbortSignal; release: () => void } {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort(outer?.reason);
    const timeoutId = setTimeout(
      () => controller.abort(),
      this.config.timeoutMs ?? DEFAULT_TRANSPORT_TIMEOUT_MS
    );

    if (outer?.aborted) {
      controller.abort(outer.reason);
    } else {
      outer?.addEventListener('abort', onAbort, { once: true });
    }

    return {
      signal: controller.signal,
      release: () => {
        clearTimeout(timeoutId);
        outer?.removeEventListener('abort', onAbort);
      },
    };
  }

  /**
   * Error for a non-2xx response. The whole body is kept, since the message
   * becomes the stored explanation.
   */
  protected async apiError(label: string, response: Response): Promise<ExplanationError> {
    const errorText = await response.text();
    return new ExplanationError(
      ErrorCodes.EXPLANATION_FAILED,
      `${label} API error: ${response.status} - ${errorText}`,
      { provider: this.name, status: response.status }
    );
  }

  /**
   * Get the system prompt for the LLM.
   */
  protected getSystemPrompt(): string {
    return SYSTEM_PROMPT;
  }
}

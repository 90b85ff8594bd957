/**
 * Explanation step: asks the explanation collaborator about each Violation
 * in turn and folds the answer (or the failure) into a new Violation value.
 */

import type { Violation } from '../core/analysis/types.js';
import { withExplanation } from '../core/analysis/store.js';
import { ExplanationError, ErrorCodes, errorMessage } from '../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { ExplanationRequest, ILLMProvider, RequestExplanation } from './types.js';
import { buildExplanationRequest } from './prompts.js';

export interface ExplainOptions {
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  /** Extra attempts after a failure (default: 0) */
  retries?: number;
  /** Base delay before a retry, doubled per attempt (default: 500) */
  retryBackoffMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30000;
const DEFAULT_RETRY_BACKOFF_MS = 500;
const LOG_MESSAGE_LIMIT = 200;

/**
 * Explain every violation, sequentially. Failures and timeouts never abort
 * the step; their message becomes the explanation text.
 */
export async function explainViolations(
  violations: readonly Violation[],
  requestExplanation: RequestExplanation,
  options: ExplainOptions = {}
): Promise<Violation[]> {
  const log = options.logger ?? defaultLogger.child('explain');
  const explained: Violation[] = [];

  for (const violation of violations) {
    const request = buildExplanationRequest(violation);
    log.debug(`Requesting explanation for ${violation.principle} (${violation.evidences.length} evidence)`);

    const text = await explainOne(request, requestExplanation, options, log);
    explained.push(withExplanation(violation, text));
  }

  return explained;
}

async function explainOne(
  request: ExplanationRequest,
  requestExplanation: RequestExplanation,
  options: ExplainOptions,
  log: Logger
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retries = options.retries ?? 0;
  const backoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0) {
      await sleep(backoffMs * 2 ** (attempt - 1));
    }
    try {
      return await requestWithTimeout(request, requestExplanation, timeoutMs);
    } catch (error) {
      lastError = error;
      log.warn(`Explanation for ${request.principle} failed (attempt ${attempt + 1}/${retries + 1}): ${truncateForLog(errorMessage(error))}`);
    }
  }

  return errorMessage(lastError);
}

/**
 * Race the request against a timer; on expiry the request's signal is aborted.
 */
export async function requestWithTimeout(
  request: ExplanationRequest,
  requestExplanation: RequestExplanation,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject before aborting so the race settles with the timeout, not the abort it causes
      reject(new ExplanationError(
        ErrorCodes.EXPLANATION_TIMEOUT,
        `Explanation request timed out after ${timeoutMs}ms`,
        { principle: request.principle, timeoutMs }
      ));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([requestExplanation(request, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Adapt a provider to the request function.
 */
export function explainerFromProvider(provider: ILLMProvider): RequestExplanation {
  return (request, signal) => provider.explain(request, signal);
}

function truncateForLog(message: string): string {
  return message.length > LOG_MESSAGE_LIMIT ? `${message.substring(0, LOG_MESSAGE_LIMIT)}...` : message;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

import { describe, it, expect, vi } from 'vitest';
import {
  explainViolations,
  explainerFromProvider,
  requestWithTimeout,
} from '../../../src/llm/explainer.js';
import { buildExplanationRequest } from '../../../src/llm/prompts.js';
import { createViolation, createEvidence } from '../../../src/core/analysis/store.js';
import type { ExplanationRequest, ILLMProvider, RequestExplanation } from '../../../src/llm/types.js';
import type { Violation } from '../../../src/core/analysis/types.js';
import { Logger } from '../../../src/utils/logger.js';

function violation(principle: Violation['principle'], subject = 'A'): Violation {
  return createViolation(principle, [
    createEvidence({ file: 'src/a.ts', line: 1, snippet: `class ${subject} {}`, subject, reason: 'flagged' }),
  ]);
}

function silentLogger(): Logger {
  const log = new Logger();
  log.setLevel('silent');
  return log;
}

/** Never settles on its own; rejects once the signal aborts. */
const hangUntilAborted: RequestExplanation = (_request, signal) => new Promise((_, reject) => {
  signal.addEventListener('abort', () => reject(new Error('aborted')));
});

describe('explainViolations', () => {
  it('should attach each answer to its violation, preserving order', async () => {
    const ask = vi.fn<RequestExplanation>(async (request) => `About ${request.principle}`);
    const input = [violation('SRP'), violation('DIP')];

    const result = await explainViolations(input, ask, { logger: silentLogger() });

    expect(result.map((v) => [v.principle, v.explanation])).toEqual([
      ['SRP', 'About SRP'],
      ['DIP', 'About DIP'],
    ]);
    expect(result[0]?.evidences).toEqual(input[0]?.evidences);
  });

  it('should leave the input violations untouched', async () => {
    const input = [violation('SRP')];

    await explainViolations(input, async () => 'text', { logger: silentLogger() });

    expect(input[0]?.explanation).toBeUndefined();
  });

  it('should send one request per violation built from its evidence', async () => {
    const ask = vi.fn<RequestExplanation>(async () => 'text');
    const input = violation('LSP', 'Square');

    await explainViolations([input], ask, { logger: silentLogger() });

    expect(ask).toHaveBeenCalledTimes(1);
    expect(ask.mock.calls[0]?.[0]).toEqual(buildExplanationRequest(input));
  });

  it('should ask one violation at a time', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const ask: RequestExplanation = async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight--;
      return 'text';
    };

    await explainViolations([violation('SRP'), violation('OCP'), violation('ISP')], ask, { logger: silentLogger() });

    expect(maxInFlight).toBe(1);
  });

  it('should record a failure message as the explanation and continue', async () => {
    const ask = vi.fn<RequestExplanation>()
      .mockRejectedValueOnce(new Error('OpenAI API error: 500 - boom'))
      .mockResolvedValueOnce('Second answer');

    const result = await explainViolations([violation('SRP'), violation('OCP')], ask, { logger: silentLogger() });

    expect(result.map((v) => v.explanation)).toEqual(['OpenAI API error: 500 - boom', 'Second answer']);
  });

  it('should store a long failure message whole but shorten it in the warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const log = new Logger();
    log.setLevel('warn');
    const ask = vi.fn<RequestExplanation>().mockRejectedValueOnce(new Error('z'.repeat(300)));

    const result = await explainViolations([violation('SRP')], ask, { logger: log });

    expect(result[0]?.explanation).toBe('z'.repeat(300));
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toContain(`${'z'.repeat(200)}...`);
    expect(String(warn.mock.calls[0]?.[0])).not.toContain('z'.repeat(201));
    warn.mockRestore();
  });

  it('should record a timeout as the explanation', async () => {
    const result = await explainViolations([violation('SRP')], hangUntilAborted, {
      timeoutMs: 10,
      logger: silentLogger(),
    });

    expect(result[0]?.explanation).toBe('Explanation request timed out after 10ms');
  });

  it('should retry and keep the first success', async () => {
    const ask = vi.fn<RequestExplanation>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('Recovered');

    const result = await explainViolations([violation('SRP')], ask, {
      retries: 2,
      retryBackoffMs: 0,
      logger: silentLogger(),
    });

    expect(result[0]?.explanation).toBe('Recovered');
    expect(ask).toHaveBeenCalledTimes(2);
  });

  it('should record the last error once retries are exhausted', async () => {
    const ask = vi.fn<RequestExplanation>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    const result = await explainViolations([violation('SRP')], ask, {
      retries: 1,
      retryBackoffMs: 0,
      logger: silentLogger(),
    });

    expect(result[0]?.explanation).toBe('second');
    expect(ask).toHaveBeenCalledTimes(2);
  });

  it('should return an empty list without asking anything', async () => {
    const ask = vi.fn<RequestExplanation>();

    expect(await explainViolations([], ask, { logger: silentLogger() })).toEqual([]);
    expect(ask).not.toHaveBeenCalled();
  });
});

describe('requestWithTimeout', () => {
  const request: ExplanationRequest = buildExplanationRequest(violation('ISP'));

  it('should resolve with the answer when it arrives in time', async () => {
    expect(await requestWithTimeout(request, async () => 'fast', 1000)).toBe('fast');
  });

  it('should abort the request signal on expiry', async () => {
    const signals: AbortSignal[] = [];
    const ask: RequestExplanation = (req, signal) => {
      signals.push(signal);
      return hangUntilAborted(req, signal);
    };

    await expect(requestWithTimeout(request, ask, 5)).rejects.toThrow('Explanation request timed out after 5ms');
    expect(signals[0]?.aborted).toBe(true);
  });
});

describe('explainerFromProvider', () => {
  it('should forward the request and signal to the provider', async () => {
    const explain = vi.fn<ILLMProvider['explain']>(async () => 'answer');
    const provider: ILLMProvider = { name: 'prompt', explain, isAvailable: () => true };
    const request = buildExplanationRequest(violation('SRP'));
    const signal = new AbortController().signal;

    expect(await explainerFromProvider(provider)(request, signal)).toBe('answer');
    expect(explain).toHaveBeenCalledWith(request, signal);
  });
});

/**
 * Prompt text for violation explanations.
 */

import type { Evidence, Principle, Violation } from '../core/analysis/types.js';
import { PRINCIPLE_NAMES } from '../core/analysis/types.js';
import type { ExplanationRequest } from './types.js';

export const SYSTEM_PROMPT = 'You are a seasoned software development expert with extensive experience in SOLID principles. '
  + 'Your goal is to identify violations of these principles in code and provide thorough suggestions for improvement.';

export function formatEvidenceList(evidences: readonly Evidence[]): string {
  return evidences
    .map((e) => `File: ${e.file}, Line: ${e.line}, Declaration: ${e.subject} (${e.reason})`)
    .join('\n');
}

/**
 * User prompt for one violation: every evidence location plus the full code
 * of the first flagged declaration.
 */
export function buildExplanationPrompt(principle: Principle, evidences: readonly Evidence[]): string {
  const first = evidences[0];

  return `I need your expertise to analyze a suspected violation of a SOLID principle. The locations of the violation and the full code of the first flagged declaration are provided below. Examine the code, identify the issues related to the principle, and rewrite the code so it complies with it. Explain the changes you make.

Principle violated: ${principle} (${PRINCIPLE_NAMES[principle]})

Flagged declarations:
${formatEvidenceList(evidences)}

Complete code of the first flagged declaration:

${first ? first.snippet : '(no code available)'}

Please provide a detailed analysis and a rewritten version of the code that adheres to the principle.`;
}

export function buildExplanationRequest(violation: Violation): ExplanationRequest {
  return {
    principle: violation.principle,
    principleName: PRINCIPLE_NAMES[violation.principle],
    evidences: violation.evidences,
    prompt: buildExplanationPrompt(violation.principle, violation.evidences),
  };
}

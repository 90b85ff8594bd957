/**
 * LLM module exports.
 */

export * from './types.js';
export * from './prompts.js';
export * from './providers/index.js';
export * from './explainer.js';

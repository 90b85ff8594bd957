/**
 * LLM providers barrel file.
 */
export * from './base.js';
export * from './openai.js';
export * from './anthropic.js';
export * from './prompt.js';
export * from './factory.js';

/**
 * solidscan: heuristic SOLID principle scanner.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/schema.js';
export * from './core/config/loader.js';

// Source model
export * from './source/types.js';
export * from './source/symbols.js';
export { TypeScriptSourceModel, type TypeScriptSourceModelOptions } from './source/typescript.js';

// Analysis
export * from './core/analysis/index.js';

// Explanations
export * from './llm/index.js';

// Reports
export * from './cli/formatters/index.js';
export { writeReport } from './cli/commands/scan.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';

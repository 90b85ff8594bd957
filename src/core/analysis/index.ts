/**
 * Barrel export for the analysis engine.
 */

export * from './types.js';
export {
  ViolationStore,
  ViolationHandle,
  createEvidence,
  evidenceFor,
  createViolation,
  withExplanation,
} from './store.js';
export {
  ALL_CHECKERS,
  createAnalysisContext,
  analyzeUnit,
  runAnalysis,
  buildSummary,
  formatSummaryLine,
} from './engine.js';
export type { AnalysisContext } from './engine.js';
export * from './checkers/index.js';

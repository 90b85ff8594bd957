/**
 * Core type definitions for the principle analysis engine.
 * Shared across all checkers, the store and the orchestrator.
 */

import type { Declaration, SourceModel, SourceUnit } from '../../source/types.js';
import type { Config, HeuristicSettings } from '../config/schema.js';
import type { Logger } from '../../utils/logger.js';

// ---------------------------------------------------------------------------
// Principles
// ---------------------------------------------------------------------------

export type Principle = 'SRP' | 'OCP' | 'LSP' | 'ISP' | 'DIP';

/** Checker visiting order within a file */
export const PRINCIPLES: readonly Principle[] = ['SRP', 'OCP', 'LSP', 'ISP', 'DIP'];

export const PRINCIPLE_NAMES: Record<Principle, string> = {
  SRP: 'Single Responsibility Principle',
  OCP: 'Open/Closed Principle',
  LSP: 'Liskov Substitution Principle',
  ISP: 'Interface Segregation Principle',
  DIP: 'Dependency Inversion Principle',
};

export function isPrinciple(value: string): value is Principle {
  return (PRINCIPLES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Findings
// ---------------------------------------------------------------------------

export interface Evidence {
  readonly file: string;
  /** 1-based line of the flagged declaration */
  readonly line: number;
  /** Full source text of the flagged declaration */
  readonly snippet: string;
  /** Declaration name */
  readonly subject: string;
  /** Short human-readable cause */
  readonly reason: string;
}

export interface Violation {
  readonly principle: Principle;
  readonly evidences: readonly Evidence[];
  readonly explanation?: string;
}

/** A file the SourceModel could not turn into declarations */
export interface SkippedFile {
  file: string;
  reason: string;
}

// ---------------------------------------------------------------------------
// Summary & Result
// ---------------------------------------------------------------------------

export interface AnalysisSummary {
  filesScanned: number;
  filesSkipped: number;
  declarationsChecked: number;
  /** Evidence count per principle that fired */
  byPrinciple: Partial<Record<Principle, number>>;
  totalViolations: number;
}

export interface AnalysisResult {
  violations: Violation[];
  summary: AnalysisSummary;
  skipped: SkippedFile[];
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface AnalysisOptions {
  /** Restrict to specific principles (default: all) */
  principles?: Principle[];
  /** Explicit file list instead of globbing (absolute or relative to the project root) */
  files?: string[];
  /** Config file path relative to the project root */
  configPath?: string;
  /** Already-loaded config; configPath is ignored when set */
  config?: Config;
  /** Injected source model (default: ts-morph backed) */
  sourceModel?: SourceModel;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Checker Interface
// ---------------------------------------------------------------------------

/**
 * What a checker may consult besides the declaration itself.
 */
export interface CheckContext {
  unit: SourceUnit;
  heuristics: HeuristicSettings;
}

/**
 * A pure function from one declaration to zero or more Evidence.
 * Checkers ignore declaration kinds they do not apply to.
 */
export interface PrincipleChecker {
  principle: Principle;
  name: string;
  check(declaration: Declaration, context: CheckContext): Evidence[];
}

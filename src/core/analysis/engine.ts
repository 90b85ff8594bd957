/**
 * Analysis engine orchestrator: loads config, discovers files, parses each
 * one through the source model and files checker evidence into the store.
 */

import * as path from 'node:path';
import { loadConfig, getDefaultHeuristics } from '../config/loader.js';
import type { HeuristicSettings } from '../config/schema.js';
import { TypeScriptSourceModel } from '../../source/typescript.js';
import type { SourceUnit } from '../../source/types.js';
import { globFiles, sortPaths } from '../../utils/file-system.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { ViolationStore } from './store.js';
import {
  srpChecker,
  ocpChecker,
  lspChecker,
  ispChecker,
  dipChecker,
} from './checkers/index.js';
import type {
  AnalysisOptions,
  AnalysisResult,
  AnalysisSummary,
  Principle,
  PrincipleChecker,
  SkippedFile,
  Violation,
} from './types.js';

// ---------------------------------------------------------------------------
// All registered checkers, in visiting order
// ---------------------------------------------------------------------------

export const ALL_CHECKERS: readonly PrincipleChecker[] = [
  srpChecker,
  ocpChecker,
  lspChecker,
  ispChecker,
  dipChecker,
];

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

/**
 * Everything one run needs. Created per run; nothing is shared between runs.
 */
export interface AnalysisContext {
  store: ViolationStore;
  checkers: readonly PrincipleChecker[];
  heuristics: HeuristicSettings;
  logger: Logger;
  /** Declarations visited so far */
  declarationsChecked: number;
}

export function createAnalysisContext(options: {
  principles?: Principle[];
  heuristics?: HeuristicSettings;
  logger?: Logger;
} = {}): AnalysisContext {
  const { principles } = options;
  const checkers = principles
    ? ALL_CHECKERS.filter((c) => principles.includes(c.principle))
    : ALL_CHECKERS;

  return {
    store: new ViolationStore(),
    checkers,
    heuristics: options.heuristics ?? getDefaultHeuristics(),
    logger: options.logger ?? defaultLogger.child('analysis'),
    declarationsChecked: 0,
  };
}

/**
 * Run every enabled checker over one unit. Checkers run in order, each over
 * all declarations in source order.
 */
export function analyzeUnit(unit: SourceUnit, context: AnalysisContext): void {
  const checkContext = { unit, heuristics: context.heuristics };

  for (const checker of context.checkers) {
    for (const declaration of unit.declarations) {
      for (const evidence of checker.check(declaration, checkContext)) {
        context.logger.debug(`${checker.principle}: ${declaration.name} (${unit.filePath}:${evidence.line})`);
        context.store.append(context.store.getOrCreate(checker.principle), evidence);
      }
    }
  }

  context.declarationsChecked += unit.declarations.length;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Scan a project.
 *
 * 1. Loads config (defaults when there is no config file).
 * 2. Collects files from the scan globs, or takes the explicit list.
 * 3. Parses files in sorted path order; unparseable files are skipped and recorded.
 * 4. Returns the violations in first-detection order with a summary.
 */
export async function runAnalysis(
  projectRoot: string,
  options: AnalysisOptions = {},
): Promise<AnalysisResult> {
  const root = path.resolve(projectRoot);
  const config = options.config ?? await loadConfig(root, options.configPath);
  const log = options.logger ?? defaultLogger.child('analysis');

  const context = createAnalysisContext({
    principles: options.principles,
    heuristics: config.heuristics,
    logger: log,
  });

  const files = options.files
    ? sortPaths(options.files.map((f) => path.resolve(root, f)))
    : await globFiles(config.files.scan.include, {
      cwd: root,
      ignore: config.files.scan.exclude,
      absolute: true,
    });

  log.debug(`Scanning ${files.length} file(s) under ${root}`);

  const sourceModel = options.sourceModel ?? new TypeScriptSourceModel();
  const skipped: SkippedFile[] = [];
  let filesScanned = 0;

  try {
    for (const file of files) {
      const displayPath = path.relative(root, file) || file;
      let unit: SourceUnit;
      try {
        unit = await sourceModel.parseFile(file);
      } catch (error) {
        const reason = errorMessage(error);
        log.warn(`Skipping ${displayPath}: ${reason}`);
        skipped.push({ file: displayPath, reason });
        continue;
      }

      analyzeUnit({ ...unit, filePath: displayPath }, context);
      filesScanned++;
    }
  } finally {
    // Injected models belong to the caller
    if (!options.sourceModel) sourceModel.dispose();
  }

  const violations = context.store.toViolations();
  return {
    violations,
    summary: buildSummary(violations, filesScanned, skipped.length, context.declarationsChecked),
    skipped,
  };
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function buildSummary(
  violations: readonly Violation[],
  filesScanned: number,
  filesSkipped: number,
  declarationsChecked: number,
): AnalysisSummary {
  const byPrinciple: AnalysisSummary['byPrinciple'] = {};
  for (const violation of violations) {
    byPrinciple[violation.principle] = violation.evidences.length;
  }

  return {
    filesScanned,
    filesSkipped,
    declarationsChecked,
    byPrinciple,
    totalViolations: violations.length,
  };
}

/**
 * One-line summary for logs and the terminal report.
 */
export function formatSummaryLine(summary: AnalysisSummary): string {
  const parts = Object.entries(summary.byPrinciple)
    .map(([principle, count]) => `${principle}: ${count}`);
  const findings = parts.length > 0 ? ` (${parts.join(', ')})` : '';
  const skipped = summary.filesSkipped > 0 ? `, ${summary.filesSkipped} skipped` : '';
  return `${summary.totalViolations} principle(s) violated${findings} across ${summary.filesScanned} file(s)${skipped}`;
}

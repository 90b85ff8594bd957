/**
 * Formatter type definitions.
 */
import type { AnalysisSummary, SkippedFile, Violation } from '../../core/analysis/types.js';
import type { ReportFormat } from '../../core/config/schema.js';

/**
 * Output format options.
 */
export type OutputFormat = ReportFormat;

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'html'];

/**
 * Everything a report renders: the final violation list plus run metadata.
 */
export interface AnalysisReport {
  violations: readonly Violation[];
  summary: AnalysisSummary;
  skipped: readonly SkippedFile[];
}

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Verbose output (human format shows each evidence's code) */
  verbose: boolean;
}

/**
 * Interface for report formatters.
 */
export interface IReportFormatter {
  format(report: AnalysisReport): string;
}

import { PRINCIPLE_NAMES } from '../../core/analysis/types.js';
import type { Evidence, Violation } from '../../core/analysis/types.js';
import type { AnalysisReport, IReportFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IReportFormatter {
  private transformEvidence(e: Evidence): Record<string, unknown> {
    return {
      file: e.file,
      line: e.line,
      code: e.snippet,
      subject: e.subject,
      reason: e.reason,
    };
  }

  private transformViolation(v: Violation): Record<string, unknown> {
    return {
      principle: v.principle,
      name: PRINCIPLE_NAMES[v.principle],
      evidences: v.evidences.map((e) => this.transformEvidence(e)),
      explanation: v.explanation ?? null,
    };
  }

  format(report: AnalysisReport): string {
    return JSON.stringify({
      summary: report.summary,
      skipped: report.skipped,
      violations: report.violations.map((v) => this.transformViolation(v)),
    }, null, 2);
  }
}

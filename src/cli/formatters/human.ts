import chalk from 'chalk';
import type { Evidence, Violation } from '../../core/analysis/types.js';
import { PRINCIPLE_NAMES } from '../../core/analysis/types.js';
import { formatSummaryLine } from '../../core/analysis/engine.js';
import type { AnalysisReport, FormatOptions, IReportFormatter } from './types.js';

type Color = 'red' | 'yellow' | 'green' | 'cyan' | 'dim' | 'bold';

/**
 * Human-readable terminal formatter.
 */
export class HumanFormatter implements IReportFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
    };
  }

  format(report: AnalysisReport): string {
    const lines: string[] = [];

    if (report.violations.length === 0) {
      lines.push(this.colorize('No SOLID violations suspected.', 'green'));
    } else {
      for (const violation of report.violations) {
        lines.push(...this.formatViolation(violation));
        lines.push('');
      }
    }

    if (report.skipped.length > 0) {
      lines.push(this.colorize(`Skipped (${report.skipped.length}):`, 'yellow'));
      for (const skipped of report.skipped) {
        lines.push(`  ${skipped.file}: ${skipped.reason}`);
      }
      lines.push('');
    }

    lines.push(this.colorize('---', 'dim'));
    lines.push(formatSummaryLine(report.summary));

    return lines.join('\n');
  }

  private formatViolation(violation: Violation): string[] {
    const lines: string[] = [];
    const heading = `${violation.principle} - ${PRINCIPLE_NAMES[violation.principle]} (${violation.evidences.length})`;
    lines.push(this.colorize(heading, 'bold'));

    for (const evidence of violation.evidences) {
      lines.push(...this.formatEvidence(evidence));
    }

    if (violation.explanation !== undefined) {
      lines.push('');
      lines.push(`  ${this.colorize('Explanation:', 'cyan')}`);
      for (const line of violation.explanation.split('\n')) {
        lines.push(`    ${line}`);
      }
    }

    return lines;
  }

  private formatEvidence(evidence: Evidence): string[] {
    const location = this.colorize(`${evidence.file}:${evidence.line}`, 'red');
    const lines = [`  ${location}  ${evidence.subject} – ${evidence.reason}`];

    if (this.options.verbose) {
      for (const line of evidence.snippet.split('\n')) {
        lines.push(this.colorize(`      ${line}`, 'dim'));
      }
    }

    return lines;
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) return text;
    return chalk[color](text);
  }
}

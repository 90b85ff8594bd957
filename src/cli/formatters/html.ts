/**
 * Standalone HTML report.
 */
import type { Evidence, Violation } from '../../core/analysis/types.js';
import { PRINCIPLE_NAMES } from '../../core/analysis/types.js';
import type { AnalysisReport, IReportFormatter } from './types.js';

export const REPORT_TITLE = 'SOLID Metrics Report';
export const EMPTY_REPORT_MESSAGE = 'Congratulations, No SOLID Violations Suspected.';

const STYLES = `
      body { font-family: Arial, sans-serif; margin: 20px; background-color: #f0f0f0; }
      h1 { color: #333; }
      h2 { color: #555; }
      ul { list-style-type: none; padding: 0; }
      li { background: #fff; margin: 10px 0; padding: 15px; border: 1px solid #ddd; border-radius: 5px; }
      .file-name { font-weight: bold; }
      .line-number { color: #888; }
      .reason { display: block; margin: 5px 0; color: #a33; }
      .code { font-family: 'Courier New', Courier, monospace; background: #f4f4f4; padding: 5px; display: block; white-space: pre-wrap; }
      .explanation { margin-top: 10px; padding: 10px; background: #e8e8e8; border-left: 5px solid #ccc; }
      .explanation pre { white-space: pre-wrap; }`;

/**
 * Escape HTML special characters.
 */
export function escapeHtml(text: string): string {
  const htmlEntities: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
  };
  return text.replace(/[&<>"']/g, (char) => htmlEntities[char] ?? char);
}

export class HtmlFormatter implements IReportFormatter {
  format(report: AnalysisReport): string {
    const body = report.violations.length === 0
      ? `    <h2>${EMPTY_REPORT_MESSAGE}</h2>`
      : report.violations.map((v) => this.renderViolation(v)).join('\n');

    return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>${REPORT_TITLE}</title>
    <style>${STYLES}
    </style>
  </head>
  <body>
    <h1>${REPORT_TITLE}</h1>
${body}
  </body>
</html>
`;
  }

  private renderViolation(violation: Violation): string {
    const items = violation.evidences.map((e) => this.renderEvidence(e)).join('\n');
    const explanation = violation.explanation === undefined
      ? ''
      : `
    <div class="explanation">
      <strong>Explanation:</strong>
      <pre>${escapeHtml(violation.explanation)}</pre>
    </div>`;

    return `    <h2>${violation.principle} - ${escapeHtml(PRINCIPLE_NAMES[violation.principle])}</h2>
    <ul>
${items}
    </ul>${explanation}`;
  }

  private renderEvidence(evidence: Evidence): string {
    return `      <li>
        <span class="file-name">${escapeHtml(evidence.file)}</span>
        <span class="line-number">(Line ${evidence.line})</span>:
        <span class="reason">${escapeHtml(evidence.subject)}: ${escapeHtml(evidence.reason)}</span>
        <span class="code">${escapeHtml(evidence.snippet)}</span>
      </li>`;
  }
}

import type { FormatOptions, IReportFormatter, OutputFormat } from './types.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import { HtmlFormatter } from './html.js';

export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';
export { HtmlFormatter, escapeHtml, REPORT_TITLE, EMPTY_REPORT_MESSAGE } from './html.js';

/**
 * Formatter for an output format.
 */
export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IReportFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'html':
      return new HtmlFormatter();
    case 'human':
      return new HumanFormatter(options);
  }
}

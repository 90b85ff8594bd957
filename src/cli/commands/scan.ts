/**
 * CLI command that scans a project and emits the SOLID report.
 */
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  runAnalysis,
  isPrinciple,
  PRINCIPLES,
  type Principle,
  type Violation,
} from '../../core/analysis/index.js';
import { loadConfig } from '../../core/config/loader.js';
import {
  explainViolations,
  explainerFromProvider,
  getAvailableProvider,
  LLM_PROVIDERS,
  type LLMProvider,
} from '../../llm/index.js';
import { createFormatter, OUTPUT_FORMATS, type OutputFormat } from '../formatters/index.js';
import { writeFile } from '../../utils/file-system.js';
import { ReportError, ErrorCodes, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ScanOptions {
  principles?: string;
  format?: string;
  output?: string;
  explain?: boolean;
  provider?: string;
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  failOnViolation?: boolean;
}

const DEFAULT_HTML_REPORT = 'Report.html';

/**
 * Create the scan command.
 */
export function createScanCommand(): Command {
  return new Command('scan')
    .description('Scan a TypeScript project for suspected SOLID principle violations')
    .argument('[directory]', 'Project directory to scan', '.')
    .option('-p, --principles <list>', `Principles to check (comma-separated: ${PRINCIPLES.join(',')})`)
    .option('-f, --format <format>', `Report format (${OUTPUT_FORMATS.join(', ')})`)
    .option('-o, --output <file>', `Write the report to a file (html defaults to ${DEFAULT_HTML_REPORT})`)
    .option('--explain', 'Ask an LLM to explain each violation')
    .option('--provider <provider>', `Explanation provider (${LLM_PROVIDERS.join(', ')})`)
    .option('--config <path>', 'Config file path relative to the directory')
    .option('--verbose', 'Show debug output and the code of each finding')
    .option('--quiet', 'Only show warnings and errors')
    .option('--fail-on-violation', 'Exit with code 1 when any violation is found')
    .action(async (directory: string, options: ScanOptions) => {
      try {
        const exitCode = await runScan(directory, options);
        if (exitCode !== 0) process.exit(exitCode);
      } catch (error) {
        logger.error(errorMessage(error));
        process.exit(1);
      }
    });
}

/**
 * Run a scan and emit the report. Resolves to the process exit code.
 */
export async function runScan(directory: string, options: ScanOptions): Promise<number> {
  if (options.verbose) logger.setLevel('debug');
  else if (options.quiet) logger.setLevel('warn');

  const principles = parsePrinciples(options.principles);
  if (principles === null) return 1;

  const format = parseOne(options.format, OUTPUT_FORMATS, 'format');
  const provider = parseOne(options.provider, LLM_PROVIDERS, 'provider');
  if (format === null || provider === null) return 1;

  const projectRoot = path.resolve(directory);
  const config = await loadConfig(projectRoot, options.config);

  const result = await runAnalysis(projectRoot, {
    principles,
    config,
    logger: logger.child('analysis'),
  });

  let violations: Violation[] = result.violations;
  if (options.explain && violations.length > 0) {
    const llm = getAvailableProvider(provider ?? config.llm.default_provider, config.llm);
    logger.info(`Explaining ${violations.length} violation(s) with ${llm.name}`);
    violations = await explainViolations(violations, explainerFromProvider(llm), {
      timeoutMs: config.llm.timeout_ms,
      retries: config.llm.retries,
      retryBackoffMs: config.llm.retry_backoff_ms,
      logger: logger.child('explain'),
    });
  }

  const reportFormat = format ?? config.report.format;
  const output = options.output
    ?? config.report.output
    ?? (reportFormat === 'html' ? DEFAULT_HTML_REPORT : undefined);

  const content = createFormatter(reportFormat, {
    colors: output === undefined,
    verbose: options.verbose,
  }).format({ violations, summary: result.summary, skipped: result.skipped });

  if (output) {
    const outputPath = path.resolve(output);
    await writeReport(outputPath, content);
    logger.success(`Report written to ${outputPath}`);
  } else {
    console.log(content);
  }

  return options.failOnViolation && violations.length > 0 ? 1 : 0;
}

/**
 * Write a rendered report. Any failure is fatal to the run.
 */
export async function writeReport(outputPath: string, content: string): Promise<void> {
  try {
    await writeFile(outputPath, content);
  } catch (error) {
    throw new ReportError(
      ErrorCodes.REPORT_WRITE_FAILED,
      `Failed to write report to ${outputPath}: ${errorMessage(error)}`,
      { path: outputPath }
    );
  }
}

// ---------------------------------------------------------------------------
// Option parsing
// ---------------------------------------------------------------------------

function printInvalid(label: string, invalid: string[], valid: readonly string[]): void {
  console.log(chalk.red(`Invalid ${label}: ${invalid.join(', ')}`));
  console.log(chalk.dim(`Valid ${label}s: ${valid.join(', ')}`));
}

/**
 * Comma-separated principle list, case-insensitive; undefined when absent, null when invalid.
 */
function parsePrinciples(value: string | undefined): Principle[] | undefined | null {
  if (value === undefined) return undefined;

  const requested = value.split(',').map((v) => v.trim().toUpperCase()).filter(Boolean);
  const invalid = requested.filter((v) => !isPrinciple(v));
  if (invalid.length > 0) {
    printInvalid('principle', invalid, PRINCIPLES);
    return null;
  }
  return requested.filter(isPrinciple);
}

function parseOne<T extends OutputFormat | LLMProvider>(
  value: string | undefined,
  valid: readonly T[],
  label: string
): T | undefined | null {
  if (value === undefined) return undefined;

  const match = valid.find((v) => v === value);
  if (match === undefined) {
    printInvalid(label, [value], valid);
    return null;
  }
  return match;
}

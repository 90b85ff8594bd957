/**
 * Tests for the analysis engine: file ordering, evidence aggregation,
 * skipped files, principle filtering and the summary.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  runAnalysis,
  analyzeUnit,
  createAnalysisContext,
  buildSummary,
  formatSummaryLine,
} from '../../../../src/core/analysis/engine.js';
import { createViolation } from '../../../../src/core/analysis/store.js';
import { getDefaultConfig } from '../../../../src/core/config/loader.js';
import type { SourceModel, SourceUnit } from '../../../../src/source/types.js';
import { Logger } from '../../../../src/utils/logger.js';
import { SystemError, ErrorCodes } from '../../../../src/utils/errors.js';
import { classDecl, method, sourceUnit } from '../../../helpers/declarations.js';

const TWO_SERVICES = [
  'class OrderService {',
  '  calculateTotal(): number { return 0; }',
  '  saveOrder(): void {}',
  '}',
  'class InvoiceService {',
  '  computeTax(): number { return 0; }',
  '  loadInvoice(): void {}',
  '}',
  '',
].join('\n');

const ONE_SERVICE = [
  'class ReportService {',
  '  formatReport(): string { return ""; }',
  '  fetchRows(): void {}',
  '}',
  '',
].join('\n');

function silentLogger(): Logger {
  const log = new Logger();
  log.setLevel('silent');
  return log;
}

describe('runAnalysis', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'solidscan-engine-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function write(relative: string, content: string): Promise<void> {
    const full = path.join(root, relative);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, 'utf-8');
  }

  it('should aggregate evidence of one principle into a single violation in source order', async () => {
    await write('a.ts', TWO_SERVICES);

    const result = await runAnalysis(root, { principles: ['SRP'], logger: silentLogger() });

    expect(result.violations).toHaveLength(1);
    const [violation] = result.violations;
    expect(violation?.principle).toBe('SRP');
    expect(violation?.evidences.map((e) => [e.file, e.line, e.subject])).toEqual([
      ['a.ts', 1, 'OrderService'],
      ['a.ts', 5, 'InvoiceService'],
    ]);
    expect(violation?.evidences[0]?.reason).toBe('Class mixes 2 responsibilities (Calculation, DataAccess)');
  });

  it('should visit files in sorted path order', async () => {
    await write('b.ts', ONE_SERVICE);
    await write('a.ts', TWO_SERVICES);

    const result = await runAnalysis(root, { principles: ['SRP'], logger: silentLogger() });

    expect(result.violations[0]?.evidences.map((e) => e.subject)).toEqual([
      'OrderService',
      'InvoiceService',
      'ReportService',
    ]);
  });

  it('should order violations by first detection', async () => {
    await write('a.ts', TWO_SERVICES);

    const result = await runAnalysis(root, { logger: silentLogger() });

    expect(result.violations.map((v) => v.principle)).toEqual(['SRP', 'OCP']);
    expect(result.violations[1]?.evidences[0]?.reason).toBe('Class has no extension point');
    expect(result.summary).toEqual({
      filesScanned: 1,
      filesSkipped: 0,
      declarationsChecked: 2,
      byPrinciple: { SRP: 2, OCP: 2 },
      totalViolations: 2,
    });
  });

  it('should only run the requested principles', async () => {
    await write('a.ts', TWO_SERVICES);

    const result = await runAnalysis(root, { principles: ['OCP'], logger: silentLogger() });

    expect(result.violations.map((v) => v.principle)).toEqual(['OCP']);
  });

  it('should record files that cannot be read and keep going', async () => {
    await write('a.ts', TWO_SERVICES);

    const result = await runAnalysis(root, {
      principles: ['SRP'],
      files: ['missing.ts', 'a.ts'],
      logger: silentLogger(),
    });

    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0]?.file).toBe('missing.ts');
    expect(result.skipped[0]?.reason).toMatch(/^Failed to read /);
    expect(result.summary.filesScanned).toBe(1);
    expect(result.summary.filesSkipped).toBe(1);
    expect(result.violations[0]?.evidences).toHaveLength(2);
  });

  it('should honor scan globs from the config file', async () => {
    await write('src/a.ts', TWO_SERVICES);
    await write('scripts/b.ts', ONE_SERVICE);
    await write('.solidscan/config.yaml', 'files:\n  scan:\n    include:\n      - "src/**/*.ts"\n');

    const result = await runAnalysis(root, { principles: ['SRP'], logger: silentLogger() });

    expect(result.violations[0]?.evidences.map((e) => e.file)).toEqual(['src/a.ts', 'src/a.ts']);
  });

  it('should use configured heuristics', async () => {
    await write('a.ts', ONE_SERVICE);
    const config = getDefaultConfig();
    config.heuristics.srp.max_methods = 1;

    const result = await runAnalysis(root, { principles: ['SRP'], config, logger: silentLogger() });

    expect(result.violations[0]?.evidences[0]?.reason).toBe(
      'Class mixes 2 responsibilities (Formatting, DataAccess); has 2 methods (max 1)'
    );
  });

  it('should return an empty result for a directory without sources', async () => {
    const result = await runAnalysis(root, { logger: silentLogger() });

    expect(result.violations).toEqual([]);
    expect(result.summary.totalViolations).toBe(0);
    expect(result.summary.filesScanned).toBe(0);
  });

  describe('with an injected source model', () => {
    function fakeModel(units: Record<string, SourceUnit>) {
      return {
        parseFile: vi.fn(async (filePath: string) => {
          const unit = units[path.basename(filePath)];
          if (!unit) throw new SystemError(ErrorCodes.PARSE_ERROR, `Cannot parse ${path.basename(filePath)}`);
          return unit;
        }),
        dispose: vi.fn(),
      } satisfies SourceModel;
    }

    it('should leave disposal to the caller', async () => {
      const model = fakeModel({ 'a.ts': sourceUnit([classDecl('Empty')]) });

      await runAnalysis(root, { files: ['a.ts'], sourceModel: model, logger: silentLogger() });

      expect(model.parseFile).toHaveBeenCalledWith(path.join(root, 'a.ts'));
      expect(model.dispose).not.toHaveBeenCalled();
    });

    it('should report evidence against the path relative to the root', async () => {
      const unit = sourceUnit(
        [classDecl('Mixed', { members: [method('calculate'), method('save')] })],
        new Map(),
        '/somewhere/else.ts'
      );
      const model = fakeModel({ 'mixed.ts': unit });

      const result = await runAnalysis(root, {
        files: ['lib/mixed.ts'],
        principles: ['SRP'],
        sourceModel: model,
        logger: silentLogger(),
      });

      expect(result.violations[0]?.evidences[0]?.file).toBe(path.join('lib', 'mixed.ts'));
    });

    it('should record the parse failure reason', async () => {
      const model = fakeModel({});

      const result = await runAnalysis(root, { files: ['bad.ts'], sourceModel: model, logger: silentLogger() });

      expect(result.skipped).toEqual([{ file: 'bad.ts', reason: 'Cannot parse bad.ts' }]);
    });
  });
});

describe('analyzeUnit', () => {
  it('should run checkers in principle order, each over every declaration', () => {
    const context = createAnalysisContext({ logger: silentLogger() });
    const unit = sourceUnit([
      classDecl('First', { members: [method('calculate'), method('save')] }),
      classDecl('Second', { members: [method('compute'), method('load')] }),
    ]);

    analyzeUnit(unit, context);

    const violations = context.store.toViolations();
    expect(violations.map((v) => v.principle)).toEqual(['SRP', 'OCP']);
    expect(violations[0]?.evidences.map((e) => e.subject)).toEqual(['First', 'Second']);
    expect(context.declarationsChecked).toBe(2);
  });

  it('should restrict checkers to the requested principles', () => {
    const context = createAnalysisContext({ principles: ['DIP', 'LSP'], logger: silentLogger() });

    expect(context.checkers.map((c) => c.principle)).toEqual(['LSP', 'DIP']);
  });
});

describe('buildSummary', () => {
  it('should count evidence per principle', () => {
    const evidence = { file: 'a.ts', line: 1, snippet: '', subject: 'A', reason: 'r' };
    const violations = [
      createViolation('SRP', [evidence, evidence]),
      createViolation('DIP', [evidence]),
    ];

    expect(buildSummary(violations, 3, 1, 9)).toEqual({
      filesScanned: 3,
      filesSkipped: 1,
      declarationsChecked: 9,
      byPrinciple: { SRP: 2, DIP: 1 },
      totalViolations: 2,
    });
  });
});

describe('formatSummaryLine', () => {
  it('should list counts per principle and skipped files', () => {
    expect(formatSummaryLine({
      filesScanned: 4,
      filesSkipped: 1,
      declarationsChecked: 10,
      byPrinciple: { SRP: 2, OCP: 1 },
      totalViolations: 2,
    })).toBe('2 principle(s) violated (SRP: 2, OCP: 1) across 4 file(s), 1 skipped');
  });

  it('should omit empty parts', () => {
    expect(formatSummaryLine({
      filesScanned: 2,
      filesSkipped: 0,
      declarationsChecked: 0,
      byPrinciple: {},
      totalViolations: 0,
    })).toBe('0 principle(s) violated across 2 file(s)');
  });
});

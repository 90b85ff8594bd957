/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import { parseYaml, parseYamlWithSchema, loadYamlWithSchema } from '../../../src/utils/yaml.js';
import { SystemError, ErrorCodes } from '../../../src/utils/errors.js';
import { readFile } from '../../../src/utils/file-system.js';

// Mock file-system for async load
vi.mock('../../../src/utils/file-system.js', () => ({
  readFile: vi.fn(),
}));

const mockReadFile = vi.mocked(readFile);

const Schema = z.object({
  name: z.string(),
  limit: z.number().default(3),
});

describe('parseYaml', () => {
  it('should parse nested structures', () => {
    expect(parseYaml('config:\n  items:\n    - one\n    - two\n')).toEqual({ config: { items: ['one', 'two'] } });
  });

  it('should throw a parse error for invalid YAML', () => {
    expect(() => parseYaml('key: [unclosed')).toThrow(SystemError);
    expect(() => parseYaml('key: [unclosed')).toThrow(/^Failed to parse YAML: /);
  });
});

describe('parseYamlWithSchema', () => {
  it('should validate and apply defaults', () => {
    expect(parseYamlWithSchema('name: scan\n', Schema)).toEqual({ name: 'scan', limit: 3 });
  });

  it('should report the path of invalid values', () => {
    try {
      parseYamlWithSchema('name: 42\n', Schema);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (!(error instanceof SystemError)) return;
      expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
      expect(error.message).toMatch(/^YAML validation failed: name: /);
    }
  });
});

describe('loadYamlWithSchema', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should load and validate a file', async () => {
    mockReadFile.mockResolvedValue('name: scan\nlimit: 5\n');

    expect(await loadYamlWithSchema('/cfg.yaml', Schema)).toEqual({ name: 'scan', limit: 5 });
    expect(mockReadFile).toHaveBeenCalledWith('/cfg.yaml');
  });

  it('should add the file path to validation errors', async () => {
    mockReadFile.mockResolvedValue('limit: 5\n');

    await expect(loadYamlWithSchema('/cfg.yaml', Schema)).rejects.toThrow(/\(file: \/cfg\.yaml\)$/);
  });

  it('should wrap read failures', async () => {
    mockReadFile.mockRejectedValue(new Error('ENOENT'));

    await expect(loadYamlWithSchema('/missing.yaml', Schema)).rejects.toThrow('Failed to load YAML file: /missing.yaml');
  });
});

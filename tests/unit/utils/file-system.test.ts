/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  readFile,
  writeFile,
  fileExists,
  isDirectory,
  ensureDir,
  globFiles,
  sortPaths,
} from '../../../src/utils/file-system.js';
import { mkdirSync, writeFileSync, rmSync, existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('file-system utilities', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `solidscan-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file content', async () => {
      writeFileSync(join(testDir, 'a.txt'), 'hello');

      expect(await readFile(join(testDir, 'a.txt'))).toBe('hello');
    });

    it('should reject for missing files', async () => {
      await expect(readFile(join(testDir, 'missing.txt'))).rejects.toThrow();
    });
  });

  describe('writeFile', () => {
    it('should create parent directories', async () => {
      const target = join(testDir, 'deep', 'nested', 'file.txt');

      await writeFile(target, 'content');

      expect(readFileSync(target, 'utf-8')).toBe('content');
    });
  });

  describe('fileExists / isDirectory', () => {
    it('should distinguish files, directories and missing paths', async () => {
      writeFileSync(join(testDir, 'file.txt'), '');

      expect(await fileExists(join(testDir, 'file.txt'))).toBe(true);
      expect(await fileExists(join(testDir, 'missing.txt'))).toBe(false);
      expect(await isDirectory(testDir)).toBe(true);
      expect(await isDirectory(join(testDir, 'file.txt'))).toBe(false);
      expect(await isDirectory(join(testDir, 'missing'))).toBe(false);
    });
  });

  describe('ensureDir', () => {
    it('should create nested directories and tolerate existing ones', async () => {
      const dir = join(testDir, 'a', 'b');

      await ensureDir(dir);
      await ensureDir(dir);

      expect(existsSync(dir)).toBe(true);
    });
  });

  describe('globFiles', () => {
    beforeEach(() => {
      mkdirSync(join(testDir, 'src', 'nested'), { recursive: true });
      mkdirSync(join(testDir, 'node_modules', 'pkg'), { recursive: true });
      writeFileSync(join(testDir, 'src', 'b.ts'), '');
      writeFileSync(join(testDir, 'src', 'a.ts'), '');
      writeFileSync(join(testDir, 'src', 'nested', 'c.ts'), '');
      writeFileSync(join(testDir, 'src', 'readme.md'), '');
      writeFileSync(join(testDir, 'node_modules', 'pkg', 'index.ts'), '');
    });

    it('should return sorted absolute paths and skip node_modules by default', async () => {
      const files = await globFiles('**/*.ts', { cwd: testDir });

      expect(files).toEqual([
        join(testDir, 'src', 'a.ts'),
        join(testDir, 'src', 'b.ts'),
        join(testDir, 'src', 'nested', 'c.ts'),
      ]);
    });

    it('should apply ignore patterns and relative output', async () => {
      const files = await globFiles(['src/**/*.ts'], { cwd: testDir, ignore: ['**/nested/**'], absolute: false });

      expect(files).toEqual(['src/a.ts', 'src/b.ts']);
    });
  });

  describe('sortPaths', () => {
    it('should sort by code unit without touching the input', () => {
      const input = ['src/b.ts', 'src/B.ts', 'lib/a.ts', 'src/a.ts'];

      expect(sortPaths(input)).toEqual(['lib/a.ts', 'src/B.ts', 'src/a.ts', 'src/b.ts']);
      expect(input[0]).toBe('src/b.ts');
    });
  });
});

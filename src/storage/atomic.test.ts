import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { atomicWriteJson, readJson, readJsonIfExists, fileExists } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteJson', () => {
    it('creates file with correct content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      const data = { foo: 'bar', num: 42 };

      await atomicWriteJson(filePath, data);

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual(data);
    });

    it('creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'test.json');
      await atomicWriteJson(filePath, { test: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ test: true });
    });

    it('uses 2-space indentation', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { a: 1 });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('{\n  "a": 1\n}');
    });

    it('leaves no temp files behind', async () => {
      const filePath = path.join(tempDir, 'courts.json');
      await atomicWriteJson(filePath, [{ place_id: 'a' }]);

      expect(await fs.readdir(tempDir)).toEqual(['courts.json']);
    });

    it('reports the target path when the write fails', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'x');
      const filePath = path.join(blocker, 'courts.json');

      await expect(atomicWriteJson(filePath, [])).rejects.toThrow(
        `Atomic write failed for ${filePath}`
      );
    });

    it('overwrites existing file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { first: true });
      await atomicWriteJson(filePath, { second: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ second: true });
    });
  });

  describe('readJson', () => {
    it('returns parsed content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{"foo":"bar"}');

      const data = await readJson(filePath);
      expect(data).toEqual({ foo: 'bar' });
    });

    it('throws for non-existent file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      await expect(readJson(filePath)).rejects.toThrow('File not found');
    });

    it('throws for invalid JSON', async () => {
      const filePath = path.join(tempDir, 'invalid.json');
      await fs.writeFile(filePath, 'not json');

      await expect(readJson(filePath)).rejects.toThrow('Invalid JSON');
    });

    it('handles arrays', async () => {
      const filePath = path.join(tempDir, 'array.json');
      await fs.writeFile(filePath, '[1, 2, 3]');

      const data = await readJson(filePath);
      expect(data).toEqual([1, 2, 3]);
    });
  });

  describe('readJsonIfExists', () => {
    it('returns undefined for a missing file', async () => {
      expect(await readJsonIfExists(path.join(tempDir, 'missing.json'))).toBeUndefined();
    });

    it('still rejects invalid JSON', async () => {
      const filePath = path.join(tempDir, 'broken.json');
      await fs.writeFile(filePath, '[{');

      await expect(readJsonIfExists(filePath)).rejects.toThrow(`Invalid JSON in file: ${filePath}`);
    });
  });

  describe('fileExists', () => {
    it('returns true for existing file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{}');

      expect(await fileExists(filePath)).toBe(true);
    });

    it('returns false for non-existent file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      expect(await fileExists(filePath)).toBe(false);
    });

    it('rethrows errors other than a missing file', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'x');

      await expect(fileExists(path.join(blocker, 'inner.json'))).rejects.toMatchObject({
        code: 'ENOTDIR',
      });
    });

    it('returns false for directories', async () => {
      expect(await fileExists(tempDir)).toBe(false);
    });
  });
});

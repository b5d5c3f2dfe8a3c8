import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { atomicWriteFile, readJson, fileExists, isErrnoException } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteFile', () => {
    it('creates file with correct content', async () => {
      const filePath = path.join(tempDir, 'out.csv');

      await atomicWriteFile(filePath, 'a,b\n1,2');

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('a,b\n1,2');
    });

    it('creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'out.csv');
      await atomicWriteFile(filePath, 'x');

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('x');
    });

    it('overwrites existing file', async () => {
      const filePath = path.join(tempDir, 'out.csv');
      await atomicWriteFile(filePath, 'first');
      await atomicWriteFile(filePath, 'second');

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('second');
    });

    it('leaves no temp files behind', async () => {
      await atomicWriteFile(path.join(tempDir, 'out.csv'), 'x');

      const entries = await fs.readdir(tempDir);
      expect(entries).toEqual(['out.csv']);
    });

    it('fails when the target is a directory', async () => {
      const dirPath = path.join(tempDir, 'taken');
      await fs.mkdir(path.join(dirPath, 'child'), { recursive: true });

      await expect(atomicWriteFile(dirPath, 'x')).rejects.toThrow(
        `Atomic write failed for ${dirPath}`
      );
      const entries = await fs.readdir(tempDir);
      expect(entries).toEqual(['taken']);
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
      await fs.writeFile(filePath, '["one", "two"]');

      const data = await readJson(filePath);
      expect(data).toEqual(['one', 'two']);
    });
  });

  describe('fileExists', () => {
    it('returns true for existing file', async () => {
      const filePath = path.join(tempDir, 'exists.txt');
      await fs.writeFile(filePath, 'content');

      expect(await fileExists(filePath)).toBe(true);
    });

    it('returns false for non-existent file', async () => {
      expect(await fileExists(path.join(tempDir, 'missing.txt'))).toBe(false);
    });

    it('returns false for directory', async () => {
      expect(await fileExists(tempDir)).toBe(false);
    });
  });

  describe('isErrnoException', () => {
    it('recognizes system errors by their code', async () => {
      const error = await fs.readFile(path.join(tempDir, 'missing.txt')).catch((e: unknown) => e);
      expect(isErrnoException(error)).toBe(true);
    });

    it('recognizes error-shaped objects from another realm', () => {
      const foreign = Object.assign(Object.create(null), {
        code: 'ENOENT',
        message: 'no such file',
      });
      expect(isErrnoException(foreign)).toBe(true);
    });

    it('rejects plain errors and non-errors', () => {
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException('ENOENT')).toBe(false);
    });
  });
});

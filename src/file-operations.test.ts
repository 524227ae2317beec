import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { DestinationExistsError, PathLocks, movePath, pathExists, sameContent } from './file-operations.js';
import { TimeoutError, withTimeout } from './timeout.js';

describe('FileOperations', () => {
  const tempDir = join(process.cwd(), '.test-tmp', 'file-operations');

  beforeEach(() => {
    mkdirSync(tempDir, { recursive: true });
    writeFileSync(join(tempDir, 'a.pdf'), 'same');
    writeFileSync(join(tempDir, 'b.pdf'), 'same');
    writeFileSync(join(tempDir, 'c.pdf'), 'diff');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('movePath', () => {
    it('should create missing parents', async () => {
      const destination = join(tempDir, 'deep', 'er', 'a.pdf');
      await movePath(join(tempDir, 'a.pdf'), destination);

      expect(readFileSync(destination, 'utf-8')).toBe('same');
      expect(existsSync(join(tempDir, 'a.pdf'))).toBe(false);
    });

    it('should never overwrite an existing destination', async () => {
      await expect(movePath(join(tempDir, 'a.pdf'), join(tempDir, 'c.pdf'))).rejects.toBeInstanceOf(DestinationExistsError);
      expect(readFileSync(join(tempDir, 'c.pdf'), 'utf-8')).toBe('diff');
    });

    it('should reject a missing source', async () => {
      await expect(movePath(join(tempDir, 'nope.pdf'), join(tempDir, 'x.pdf'))).rejects.toThrow(/ENOENT/);
    });
  });

  describe('Content checks', () => {
    it('should compare files by content', async () => {
      expect(await sameContent(join(tempDir, 'a.pdf'), join(tempDir, 'b.pdf'))).toBe(true);
      expect(await sameContent(join(tempDir, 'a.pdf'), join(tempDir, 'c.pdf'))).toBe(false);
      expect(await sameContent(join(tempDir, 'a.pdf'), tempDir)).toBe(false);
    });

    it('should report whether a path exists', async () => {
      expect(await pathExists(join(tempDir, 'a.pdf'))).toBe(true);
      expect(await pathExists(join(tempDir, 'missing.pdf'))).toBe(false);
    });
  });

  describe('PathLocks', () => {
    it('should serve holders of the same key one at a time, in order', async () => {
      const locks = new PathLocks();
      const events: string[] = [];

      const first = await locks.acquire('/lib/a.pdf');
      const second = locks.acquire('/lib/a.pdf').then(release => {
        events.push('second');
        release();
      });
      const other = locks.acquire('/lib/b.pdf').then(release => {
        events.push('other');
        release();
      });

      await other;
      expect(events).toEqual(['other']);

      events.push('first');
      first();
      await second;

      expect(events).toEqual(['other', 'first', 'second']);
    });
  });

  describe('withTimeout', () => {
    it('should pass through results and reject slow work', async () => {
      await expect(withTimeout(Promise.resolve(7), 50, 'fast')).resolves.toBe(7);

      const slow = withTimeout(new Promise(resolve => setTimeout(resolve, 200)), 10, 'move /lib/a.pdf');
      await expect(slow).rejects.toBeInstanceOf(TimeoutError);
      await expect(slow).rejects.toThrow('move /lib/a.pdf timed out after 10ms');
    });
  });
});

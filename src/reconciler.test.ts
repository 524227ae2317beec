import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import { classify, isInFileTypes, type ClassifyOptions } from './reconciler.js';
import type { AttachmentRecord, FileEntry, LibraryIndex, ScanResult } from './types.js';

const root = resolve('/lib');

function linked(itemId: string, relativePath: string): AttachmentRecord {
  return {
    itemId,
    storedOrLinkedPath: `attachments:${relativePath}`,
    kind: 'linked',
    filename: relativePath.split('/').pop() ?? null,
    absolutePath: join(root, ...relativePath.split('/')),
  };
}

function file(relativePath: string, extra: Partial<FileEntry> = {}): FileEntry {
  return {
    absolutePath: join(root, ...relativePath.split('/')),
    relativePath,
    sizeBytes: 1,
    modifiedTime: '2024-01-01T00:00:00.000Z',
    isDirectory: false,
    ...extra,
  };
}

function dir(relativePath: string, extra: Partial<FileEntry> = {}): FileEntry {
  return { ...file(relativePath, extra), sizeBytes: 0, isDirectory: true };
}

function index(records: AttachmentRecord[]): LibraryIndex {
  return { records, attachmentRoot: root, fetchedAt: '2024-01-01T00:00:00.000Z', pages: 1, skipped: 0 };
}

function scan(files: FileEntry[], directories: FileEntry[] = []): ScanResult {
  return { root, files, directories, warnings: [] };
}

const linux: ClassifyOptions = { platform: 'linux' };

describe('Reconciler', () => {
  describe('Classification', () => {
    it('should split linked, unlinked and empty directories', () => {
      const result = classify(
        index([linked('A', 'a.pdf'), linked('B', 'b.pdf')]),
        scan([file('a.pdf'), file('b.pdf'), file('orphan.pdf')], [dir('old')]),
        linux
      );

      expect(result.linked.map(entry => entry.relativePath)).toEqual(['a.pdf', 'b.pdf']);
      expect(result.unlinked.map(entry => entry.relativePath)).toEqual(['orphan.pdf']);
      expect(result.ambiguous).toEqual([]);
      expect(result.emptyDirectories).toEqual([join(root, 'old')]);
      expect(result.clearableDirectories).toEqual([join(root, 'old')]);
      expect(result.byPath.get(join(root, 'a.pdf'))?.itemIds).toEqual(['A']);
    });

    it('should put every scanned file in exactly one bucket', () => {
      const files = [file('a.pdf'), file('x/a.pdf'), file('c.pdf'), file('d.pdf')];
      const result = classify(index([linked('A', 'a.pdf'), linked('C', 'c.pdf')]), scan(files), linux);

      const buckets = [
        ...result.linked.map(entry => entry.absolutePath),
        ...result.unlinked.map(entry => entry.absolutePath),
        ...result.ambiguous.map(item => item.entry.absolutePath),
      ].sort();
      expect(buckets).toEqual(files.map(entry => entry.absolutePath).sort());
      expect(result.files).toHaveLength(files.length);
    });

    it('should mark a file whose name is attached elsewhere as ambiguous', () => {
      const result = classify(
        index([linked('P1', 'Smith/paper.pdf')]),
        scan([file('Other/paper.pdf')]),
        linux
      );

      expect(result.ambiguous).toHaveLength(1);
      expect(result.ambiguous[0]).toMatchObject({
        status: 'ambiguous',
        itemIds: ['P1'],
        reason: 'filename matches an attachment in another location',
      });
    });

    it('should treat a case-only difference as ambiguous when case matters', () => {
      const records = [linked('P1', 'Paper.pdf')];
      const files = [file('paper.pdf')];

      const strict = classify(index(records), scan(files), { ...linux, caseFolding: 'off' });
      expect(strict.ambiguous[0].reason).toBe('path differs from an attachment only by case');

      const folded = classify(index(records), scan(files), { ...linux, caseFolding: 'on' });
      expect(folded.linked.map(entry => entry.relativePath)).toEqual(['paper.pdf']);
    });

    it('should fold case on macOS in auto mode', () => {
      const result = classify(index([linked('P1', 'Paper.pdf')]), scan([file('paper.pdf')]), { platform: 'darwin' });
      expect(result.linked).toHaveLength(1);
    });

    it('should honour case-sensitive filename comparison', () => {
      const records = [linked('P1', 'Smith/Paper.pdf')];
      const files = [file('Other/paper.pdf')];

      const sensitive = classify(index(records), scan(files), { ...linux, fuzzyFilenameCaseInsensitive: false });
      expect(sensitive.unlinked).toHaveLength(1);

      const insensitive = classify(index(records), scan(files), { ...linux, fuzzyFilenameCaseInsensitive: true });
      expect(insensitive.ambiguous).toHaveLength(1);
    });

    it('should match stored files by filename only', () => {
      const stored: AttachmentRecord = {
        itemId: 'S1',
        storedOrLinkedPath: 'storage:S1/report.pdf',
        kind: 'stored',
        filename: 'report.pdf',
        absolutePath: null,
      };

      const result = classify(index([stored]), scan([file('report.pdf')]), linux);
      expect(result.ambiguous.map(item => item.itemIds)).toEqual([['S1']]);
    });
  });

  describe('Symbolic Links', () => {
    const viaLink = file('ext/x.pdf', { realPath: resolve('/real/x.pdf'), viaSymlink: true });
    const record: AttachmentRecord = {
      itemId: 'X',
      storedOrLinkedPath: resolve('/real/x.pdf'),
      kind: 'linked',
      filename: 'x.pdf',
      absolutePath: resolve('/real/x.pdf'),
    };

    it('should match through real paths', () => {
      const result = classify(index([record]), scan([viaLink]), linux);
      expect(result.linked).toHaveLength(1);
    });

    it('should fall back to the filename when real paths are ignored', () => {
      const result = classify(index([record]), scan([viaLink]), { ...linux, resolveSymlinks: false });
      expect(result.ambiguous).toHaveLength(1);
    });

    it('should never offer directories reached through a link for pruning', () => {
      const result = classify(
        index([]),
        scan([], [dir('ext', { viaSymlink: true }), dir('ext/empty', { viaSymlink: true })]),
        linux
      );
      expect(result.emptyDirectories).toEqual([]);
      expect(result.clearableDirectories).toEqual([]);
    });
  });

  describe('Directories', () => {
    it('should protect directories holding linked or ambiguous files', () => {
      const result = classify(
        index([linked('A', 'Smith/a.pdf'), linked('N', 'Kept/name.pdf')]),
        scan(
          [file('Smith/a.pdf'), file('Smith/extra.pdf'), file('Junk/x.pdf'), file('Maybe/name.pdf'), file('Kept/name.pdf')],
          [dir('Junk'), dir('Kept'), dir('Maybe'), dir('Old'), dir('Old/Deeper'), dir('Smith')]
        ),
        linux
      );

      expect(result.emptyDirectories).toEqual([join(root, 'Old'), join(root, 'Old', 'Deeper')]);
      expect(result.clearableDirectories).toEqual([join(root, 'Junk'), join(root, 'Old'), join(root, 'Old', 'Deeper')]);
    });

    it('should protect directories holding files outside the configured types', () => {
      const result = classify(
        index([]),
        scan([file('Notes/todo.txt'), file('Scans/orphan.pdf')], [dir('Notes'), dir('Scans')]),
        { ...linux, fileTypes: ['PDF'] }
      );

      expect(result.byPath.get(join(root, 'Notes', 'todo.txt'))).toMatchObject({ status: 'unlinked', outOfScope: true });
      expect(result.byPath.get(join(root, 'Scans', 'orphan.pdf'))).toMatchObject({ outOfScope: false });
      expect(result.clearableDirectories).toEqual([join(root, 'Scans')]);
    });
  });

  describe('Unreadable Directories', () => {
    it('should never report an unreadable directory or its parents as empty', () => {
      const locked = join(root, 'Smith', 'locked');
      const result = classify(
        index([]),
        {
          ...scan([], [dir('Smith'), dir('Smith/locked'), dir('old')]),
          warnings: [{ code: 'UNREADABLE', path: locked, message: `Cannot read directory ${locked}: EACCES` }],
        },
        linux
      );

      expect(result.emptyDirectories).toEqual([join(root, 'old')]);
      expect(result.clearableDirectories).toEqual([join(root, 'old')]);
    });
  });

  describe('Missing Attachments', () => {
    it('should list records inside the root whose file was not scanned', () => {
      const outsideRecord: AttachmentRecord = { ...linked('OUT', 'x.pdf'), absolutePath: resolve('/elsewhere/x.pdf') };
      const result = classify(
        index([linked('Z', 'gone.pdf'), linked('A', 'a.pdf'), linked('G', 'sub/gone.pdf'), outsideRecord]),
        scan([file('a.pdf')]),
        linux
      );

      expect(result.missing.map(record => record.itemId)).toEqual(['G', 'Z']);
    });
  });

  describe('Determinism', () => {
    it('should give the same result whatever the input order', () => {
      const records = [linked('A', 'a.pdf'), linked('B', 'x/b.pdf'), linked('C', 'y/c.pdf')];
      const files = [file('a.pdf'), file('b.pdf'), file('x/b.pdf'), file('z.pdf'), file('y/q.pdf')];
      const directories = [dir('x'), dir('y'), dir('w')];

      const forward = classify(index(records), scan(files, directories), linux);
      const backward = classify(
        index([...records].reverse()),
        scan([...files].reverse(), [...directories].reverse()),
        linux
      );

      expect(backward).toEqual(forward);
      expect(forward.files.map(item => item.entry.relativePath)).toEqual(['a.pdf', 'b.pdf', 'x/b.pdf', 'y/q.pdf', 'z.pdf']);
    });
  });

  describe('isInFileTypes', () => {
    it('should accept everything without a type list', () => {
      expect(isInFileTypes('/lib/a.txt', [])).toBe(true);
      expect(isInFileTypes('/lib/a.PDF', ['pdf'])).toBe(true);
      expect(isInFileTypes('/lib/a.txt', ['pdf'])).toBe(false);
    });
  });
});

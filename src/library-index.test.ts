import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, symlinkSync, writeFileSync, realpathSync } from 'fs';
import { join, resolve } from 'path';
import { buildIndex, parseAttachmentRecord, resolveRecordTargets, type AttachmentItem } from './library-index.js';
import { AuthError, ServiceUnavailableError } from './errors.js';
import type { AttachmentPage, AttachmentSource } from './zotero-client.js';

class HttpError extends Error {
  constructor(public response: { status: number }) {
    super(`HTTP ${response.status}`);
  }
}

function linkedItem(key: string, path: string): AttachmentItem {
  return { key, data: { itemType: 'attachment', linkMode: 'linked_file', path } };
}

/**
 * In-memory paginated source; `failures` are thrown before the matching call succeeds.
 */
class FakeSource implements AttachmentSource {
  calls = 0;

  constructor(private items: unknown[], private pageSize = 100, private failures: Error[] = []) {}

  async listAttachments(cursor: string | null): Promise<AttachmentPage> {
    this.calls++;
    const failure = this.failures.shift();
    if (failure) throw failure;

    const start = cursor ? Number(cursor) : 0;
    const records = this.items.slice(start, start + this.pageSize);
    const next = start + this.pageSize;
    return { records, nextCursor: next < this.items.length ? String(next) : null };
  }
}

const fast = { maxRetries: 2, retryDelayMs: 1, timeoutMs: 1000 };

describe('LibraryIndex', () => {
  describe('parseAttachmentRecord', () => {
    it('should resolve attachments: paths against the attachment root', () => {
      const record = parseAttachmentRecord(linkedItem('AAAA1111', 'attachments:Smith/paper.pdf'), '/lib');
      expect(record).toEqual({
        itemId: 'AAAA1111',
        storedOrLinkedPath: 'attachments:Smith/paper.pdf',
        kind: 'linked',
        parentItemId: undefined,
        filename: 'paper.pdf',
        absolutePath: resolve('/lib', 'Smith', 'paper.pdf'),
        contentType: undefined,
      });
    });

    it('should accept backslash separated relative paths', () => {
      const record = parseAttachmentRecord(linkedItem('K', 'attachments:Smith\\paper.pdf'), '/lib');
      expect(record?.absolutePath).toBe(resolve('/lib', 'Smith', 'paper.pdf'));
      expect(record?.filename).toBe('paper.pdf');
    });

    it('should keep absolute linked paths', () => {
      const record = parseAttachmentRecord(linkedItem('K', '/elsewhere/b.pdf'), '/lib');
      expect(record?.absolutePath).toBe(resolve('/elsewhere/b.pdf'));
    });

    it('should leave unresolvable linked paths without an absolute path', () => {
      const record = parseAttachmentRecord(linkedItem('K', 'relative/c.pdf'), '/lib');
      expect(record?.absolutePath).toBeNull();
      expect(record?.filename).toBe('c.pdf');
    });

    it('should map stored files into the data directory', () => {
      const item: AttachmentItem = {
        key: 'STOR0001',
        data: { itemType: 'attachment', linkMode: 'imported_file', filename: 'scan.pdf', parentItem: 'PARENT01' },
      };
      const record = parseAttachmentRecord(item, '/lib', '/data');
      expect(record).toMatchObject({
        kind: 'stored',
        storedOrLinkedPath: 'storage:STOR0001/scan.pdf',
        absolutePath: join(resolve('/data'), 'storage', 'STOR0001', 'scan.pdf'),
        parentItemId: 'PARENT01',
      });
    });

    it('should leave stored files unresolved without a data directory', () => {
      const item: AttachmentItem = {
        key: 'STOR0002',
        data: { itemType: 'attachment', linkMode: 'imported_url', path: 'storage:page.html' },
      };
      const record = parseAttachmentRecord(item, '/lib');
      expect(record?.filename).toBe('page.html');
      expect(record?.absolutePath).toBeNull();
    });

    it('should skip linked URLs and non-attachments', () => {
      expect(parseAttachmentRecord({ key: 'U', data: { itemType: 'attachment', linkMode: 'linked_url' } }, '/lib')).toBeNull();
      expect(parseAttachmentRecord({ key: 'N', data: { itemType: 'note' } }, '/lib')).toBeNull();
    });
  });

  describe('buildIndex', () => {
    it('should drain every page before returning', async () => {
      const items = ['a', 'b', 'c', 'd', 'e'].map(name => linkedItem(name.toUpperCase(), `attachments:${name}.pdf`));
      const source = new FakeSource(items, 2);

      const index = await buildIndex(source, { attachmentRoot: '/lib', ...fast });

      expect(source.calls).toBe(3);
      expect(index.pages).toBe(3);
      expect(index.records.map(record => record.itemId)).toEqual(['A', 'B', 'C', 'D', 'E']);
      expect(index.attachmentRoot).toBe(resolve('/lib'));
    });

    it('should count records without a local file', async () => {
      const source = new FakeSource([
        linkedItem('A', 'attachments:a.pdf'),
        { key: 'U', data: { itemType: 'attachment', linkMode: 'linked_url', url: 'https://example.org' } },
      ]);

      const index = await buildIndex(source, { attachmentRoot: '/lib', ...fast });

      expect(index.records).toHaveLength(1);
      expect(index.skipped).toBe(1);
    });

    it('should retry transient failures', async () => {
      const source = new FakeSource([linkedItem('A', 'attachments:a.pdf')], 100, [new Error('socket hang up')]);

      const index = await buildIndex(source, { attachmentRoot: '/lib', ...fast });

      expect(source.calls).toBe(2);
      expect(index.records).toHaveLength(1);
    });

    it('should fail with ServiceUnavailable once retries are exhausted', async () => {
      const failures = [new Error('down'), new Error('down'), new Error('down')];
      const source = new FakeSource([], 100, failures);

      await expect(buildIndex(source, { attachmentRoot: '/lib', ...fast })).rejects.toBeInstanceOf(ServiceUnavailableError);
      expect(source.calls).toBe(3);
    });

    it('should fail immediately on rejected credentials', async () => {
      const source = new FakeSource([], 100, [new HttpError({ status: 403 })]);

      await expect(buildIndex(source, { attachmentRoot: '/lib', ...fast })).rejects.toBeInstanceOf(AuthError);
      expect(source.calls).toBe(1);
    });

    it('should time out a hanging page request', async () => {
      const source: AttachmentSource = { listAttachments: () => new Promise<AttachmentPage>(() => undefined) };

      await expect(
        buildIndex(source, { attachmentRoot: '/lib', maxRetries: 0, retryDelayMs: 1, timeoutMs: 20 })
      ).rejects.toThrow(/timed out after 20ms/);
    });

    it('should reject malformed records', async () => {
      const source = new FakeSource([{ data: { itemType: 'attachment' } }]);

      await expect(buildIndex(source, { attachmentRoot: '/lib', ...fast })).rejects.toThrow(/malformed attachment record/);
    });

    it('should reject pagination that does not advance', async () => {
      const source: AttachmentSource = {
        listAttachments: async () => ({ records: [], nextCursor: 'same' }),
      };

      await expect(buildIndex(source, { attachmentRoot: '/lib', ...fast })).rejects.toThrow(/did not advance/);
    });
  });

  describe('resolveRecordTargets', () => {
    const tempDir = join(process.cwd(), '.test-tmp', 'library-index');

    beforeEach(() => {
      mkdirSync(join(tempDir, 'real'), { recursive: true });
      writeFileSync(join(tempDir, 'real', 'paper.pdf'), 'pdf');
      symlinkSync(join(tempDir, 'real', 'paper.pdf'), join(tempDir, 'link.pdf'));
    });

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true });
    });

    it('should record the target of symlinked attachments', async () => {
      const source = new FakeSource([
        linkedItem('LINK', 'attachments:link.pdf'),
        linkedItem('REAL', 'attachments:real/paper.pdf'),
        linkedItem('GONE', 'attachments:gone.pdf'),
      ]);
      const index = await resolveRecordTargets(await buildIndex(source, { attachmentRoot: realpathSync(tempDir), ...fast }));

      const [link, real, gone] = index.records;
      expect(link.realPath).toBe(join(realpathSync(tempDir), 'real', 'paper.pdf'));
      expect(real.realPath).toBeUndefined();
      expect(gone.realPath).toBeUndefined();
    });
  });
});

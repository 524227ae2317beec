import { describe, it, expect, beforeEach, vi } from 'vitest';

const client = vi.hoisted(() => ({
  library: vi.fn(),
  get: vi.fn(),
}));

vi.mock('zotero-api-client', () => ({
  default: (apiKey: string) => ({
    library: (libraryType: string, libraryId: string) => {
      client.library(apiKey, libraryType, libraryId);
      return { items: () => ({ get: client.get }) };
    },
  }),
}));

import { ZoteroAttachmentSource, responseStatus } from './zotero-client.js';

describe('ZoteroAttachmentSource', () => {
  beforeEach(() => {
    client.library.mockReset();
    client.get.mockReset();
  });

  it('should request attachment pages by offset', async () => {
    client.get
      .mockResolvedValueOnce({ raw: [{ key: 'A' }, { key: 'B' }] })
      .mockResolvedValueOnce({ raw: [{ key: 'C' }] });
    const source = new ZoteroAttachmentSource({ apiKey: 'test-secret', libraryId: '12345', libraryType: 'group', pageSize: 2 });

    const first = await source.listAttachments(null);
    expect(first).toEqual({ records: [{ key: 'A' }, { key: 'B' }], nextCursor: '2' });

    const second = await source.listAttachments(first.nextCursor);
    expect(second).toEqual({ records: [{ key: 'C' }], nextCursor: null });

    expect(client.library).toHaveBeenCalledWith('test-secret', 'group', '12345');
    expect(client.get).toHaveBeenNthCalledWith(1, {
      itemType: 'attachment',
      start: 0,
      limit: 2,
      sort: 'dateAdded',
      direction: 'asc',
    });
    expect(client.get).toHaveBeenNthCalledWith(2, expect.objectContaining({ start: 2 }));
  });

  it('should default to a user library and treat a missing body as empty', async () => {
    client.get.mockResolvedValueOnce({ raw: undefined });
    const source = new ZoteroAttachmentSource({ apiKey: 'test-secret', libraryId: '1' });

    expect(await source.listAttachments(null)).toEqual({ records: [], nextCursor: null });
    expect(client.library).toHaveBeenCalledWith('test-secret', 'user', '1');
  });
});

describe('responseStatus', () => {
  it('should read the status of an API error response', () => {
    expect(responseStatus({ response: { status: 403 } })).toBe(403);
    expect(responseStatus({ response: {} })).toBeNull();
    expect(responseStatus(new Error('socket hang up'))).toBeNull();
    expect(responseStatus(null)).toBeNull();
  });
});

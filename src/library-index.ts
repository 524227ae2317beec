/**
 * Library index: an immutable snapshot of every attachment the Zotero
 * library knows about. Pagination is drained completely before the index
 * is handed out; a partial index would turn linked files into "unlinked".
 */

import { realpath } from 'fs/promises';
import { isAbsolute, join, posix, resolve } from 'path';
import pRetry, { AbortError } from 'p-retry';
import { z } from 'zod';
import { AuthError, ServiceUnavailableError } from './errors.js';
import { logger, errorMessage } from './logger.js';
import { expandHome } from './path-normalizer.js';
import { withTimeout } from './timeout.js';
import type { AttachmentRecord, LibraryIndex } from './types.js';
import { responseStatus, type AttachmentPage, type AttachmentSource } from './zotero-client.js';

const LINKED_PREFIX = 'attachments:';
const STORED_PREFIX = 'storage:';
const STORED_LINK_MODES = new Set(['imported_file', 'imported_url', 'embedded_image']);

const attachmentItemSchema = z.object({
  key: z.string().min(1),
  data: z.object({
    itemType: z.string(),
    linkMode: z.string().optional(),
    path: z.string().optional(),
    filename: z.string().optional(),
    contentType: z.string().optional(),
    parentItem: z.string().optional(),
  }),
});

export type AttachmentItem = z.infer<typeof attachmentItemSchema>;

export interface BuildIndexOptions {
  attachmentRoot: string;
  dataDirectory?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  maxPages?: number;
}

/**
 * Normalize one raw API item. Returns null for items that never have a
 * local file (linked URLs, non-attachments).
 */
export function parseAttachmentRecord(
  item: AttachmentItem,
  attachmentRoot: string,
  dataDirectory?: string
): AttachmentRecord | null {
  const { data } = item;
  if (data.itemType !== 'attachment' || !data.linkMode) {
    return null;
  }

  if (data.linkMode === 'linked_file') {
    const rawPath = data.path ?? '';
    if (!rawPath) return null;

    let absolutePath: string | null = null;
    if (rawPath.startsWith(LINKED_PREFIX)) {
      // Relative to the base attachment directory, always '/' separated
      const relativePath = rawPath.slice(LINKED_PREFIX.length).replace(/\\/g, '/');
      absolutePath = resolve(attachmentRoot, ...relativePath.split('/'));
    } else if (isAbsolute(rawPath)) {
      absolutePath = resolve(rawPath);
    }

    return {
      itemId: item.key,
      storedOrLinkedPath: rawPath,
      kind: 'linked',
      parentItemId: data.parentItem,
      filename: posix.basename(rawPath.replace(LINKED_PREFIX, '').replace(/\\/g, '/')) || null,
      absolutePath,
      contentType: data.contentType,
    };
  }

  if (STORED_LINK_MODES.has(data.linkMode)) {
    const filename = data.filename
      ?? (data.path?.startsWith(STORED_PREFIX) ? data.path.slice(STORED_PREFIX.length) : null);

    return {
      itemId: item.key,
      storedOrLinkedPath: `${STORED_PREFIX}${item.key}/${filename ?? ''}`,
      kind: 'stored',
      parentItemId: data.parentItem,
      filename,
      absolutePath: filename && dataDirectory
        ? join(resolve(expandHome(dataDirectory)), 'storage', item.key, filename)
        : null,
      contentType: data.contentType,
    };
  }

  return null;
}

async function fetchPage(
  source: AttachmentSource,
  cursor: string | null,
  options: BuildIndexOptions
): Promise<AttachmentPage> {
  return pRetry(
    async () => {
      try {
        return await withTimeout(
          source.listAttachments(cursor),
          options.timeoutMs ?? 30000,
          `Attachment page ${cursor ?? 'start'}`
        );
      } catch (error) {
        const status = responseStatus(error);
        if (error instanceof AuthError) {
          throw new AbortError(error);
        }
        if (status === 401 || status === 403) {
          throw new AbortError(new AuthError(`Zotero rejected the API credentials (HTTP ${status})`, { status }));
        }
        throw error;
      }
    },
    {
      retries: options.maxRetries ?? 3,
      minTimeout: options.retryDelayMs ?? 1000,
      factor: 2,
      onFailedAttempt: error => {
        logger.warn(
          `Attachment page request failed (attempt ${error.attemptNumber}, ${error.retriesLeft} left)`,
          { cursor, error: error.message },
          'LibraryIndex'
        );
      },
    }
  );
}

/**
 * Fetch every attachment page and normalize it into a LibraryIndex.
 */
export async function buildIndex(source: AttachmentSource, options: BuildIndexOptions): Promise<LibraryIndex> {
  const attachmentRoot = resolve(expandHome(options.attachmentRoot));
  const maxPages = options.maxPages ?? 10_000;
  const records: AttachmentRecord[] = [];
  let skipped = 0;
  let pages = 0;
  let cursor: string | null = null;

  do {
    let page: AttachmentPage;
    try {
      page = await fetchPage(source, cursor, options);
    } catch (error) {
      if (error instanceof AuthError) throw error;
      throw new ServiceUnavailableError(
        `Zotero API unavailable: ${errorMessage(error)}`,
        { cursor, pagesFetched: pages }
      );
    }

    pages++;
    for (const raw of page.records) {
      const parsed = attachmentItemSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ServiceUnavailableError('Zotero API returned a malformed attachment record', {
          page: pages,
          issues: parsed.error.issues.map(issue => issue.message),
        });
      }

      const record = parseAttachmentRecord(parsed.data, attachmentRoot, options.dataDirectory);
      if (record) {
        records.push(record);
      } else {
        skipped++;
      }
    }

    if (page.nextCursor !== null && page.nextCursor === cursor) {
      throw new ServiceUnavailableError('Zotero API pagination did not advance', { cursor });
    }
    cursor = page.nextCursor;

    if (pages >= maxPages && cursor !== null) {
      throw new ServiceUnavailableError(`Zotero API pagination exceeded ${maxPages} pages`, { cursor });
    }
  } while (cursor !== null);

  logger.info(
    `Indexed ${records.length} attachments`,
    { pages, skipped, linked: records.filter(r => r.kind === 'linked').length },
    'LibraryIndex'
  );

  return {
    records,
    attachmentRoot,
    fetchedAt: new Date().toISOString(),
    pages,
    skipped,
  };
}

/**
 * Attach symlink-resolved targets to records whose file exists.
 */
export async function resolveRecordTargets(index: LibraryIndex): Promise<LibraryIndex> {
  const records = await Promise.all(
    index.records.map(async record => {
      if (!record.absolutePath) return record;
      try {
        const target = await realpath(record.absolutePath);
        return target === record.absolutePath ? record : { ...record, realPath: target };
      } catch (error) {
        logger.debug('Attachment target not resolvable', { path: record.absolutePath, error: errorMessage(error) }, 'LibraryIndex');
        return record;
      }
    })
  );

  return { ...index, records };
}

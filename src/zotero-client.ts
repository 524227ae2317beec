/**
 * Zotero API helper: thin wrapper around zotero-api-client.
 *
 * Exposes the library's attachments as a paginated source. The cursor is
 * the `start` offset of the next page, as a string.
 */

import zoteroApiClient from 'zotero-api-client';
import type { LibraryType } from './config.js';

const api = zoteroApiClient.default ?? zoteroApiClient;

export interface AttachmentPage {
  records: unknown[];
  nextCursor: string | null;
}

/**
 * Read-only, paginated view of a library's attachment items
 */
export interface AttachmentSource {
  listAttachments(cursor: string | null): Promise<AttachmentPage>;
}

export interface ZoteroClientOptions {
  apiKey: string;
  libraryId: string;
  libraryType?: LibraryType;
  pageSize?: number;
}

/**
 * HTTP status carried by a zotero-api-client ErrorResponse, if any
 */
export function responseStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return null;
  }
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('status' in response)) {
    return null;
  }
  return typeof response.status === 'number' ? response.status : null;
}

export class ZoteroAttachmentSource implements AttachmentSource {
  private pageSize: number;

  constructor(private options: ZoteroClientOptions) {
    this.pageSize = options.pageSize ?? 100;
  }

  private library() {
    return api(this.options.apiKey).library(this.options.libraryType ?? 'user', this.options.libraryId);
  }

  async listAttachments(cursor: string | null): Promise<AttachmentPage> {
    const start = cursor ? Number.parseInt(cursor, 10) : 0;
    const response = await this.library().items().get({
      itemType: 'attachment',
      start,
      limit: this.pageSize,
      sort: 'dateAdded',
      direction: 'asc',
    });

    const records = Array.isArray(response.raw) ? response.raw : [];

    // A short page is the last one; a full page may be followed by an empty one.
    return {
      records,
      nextCursor: records.length === this.pageSize ? String(start + records.length) : null,
    };
  }
}

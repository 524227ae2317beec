// zotero-api-client ships no type declarations; only the calls used here are typed.
declare module 'zotero-api-client' {
  interface ZoteroRequestOptions {
    itemType?: string;
    start?: number;
    limit?: number;
    sort?: string;
    direction?: 'asc' | 'desc';
    format?: string;
  }

  interface ZoteroMultiReadResponse {
    raw: unknown[];
  }

  interface ZoteroItemsRequest {
    get(options?: ZoteroRequestOptions): Promise<ZoteroMultiReadResponse>;
  }

  interface ZoteroLibraryRequest {
    items(itemKey?: string): ZoteroItemsRequest;
  }

  interface ZoteroApi {
    library(libraryType: 'user' | 'group', libraryId: string): ZoteroLibraryRequest;
  }

  type ZoteroApiFactory = (apiKey: string) => ZoteroApi;

  const api: ZoteroApiFactory & { default?: ZoteroApiFactory };
  export default api;
}

import type { Result } from '../core/result.js';
import type { WikiError } from '../core/errors.js';

export type WikiResult<T> = Result<T, WikiError>;

export type EntryKind = 'page' | 'media';

/** DokuWiki change types: create, edit, minor edit, delete, revert. */
export type ChangeType = 'C' | 'E' | 'e' | 'D' | 'R';

export interface WikiPage {
  id: string;
  revision: number;
  mtime: number;
  author: string;
  size: number;
}

export interface WikiMedia {
  id: string;
  revision: number;
  size: number;
  author: string;
  isImage: boolean;
}

export interface WikiRevision {
  id: string;
  kind: EntryKind;
  revision: number; // second-resolution timestamp
  author: string;
  summary: string;
  type: ChangeType;
  isMinor: boolean;
  deleted: boolean;
}

/**
 * Everything the exporter and importer need from a wiki. `WikiClient`
 * implements it over JSON-RPC; tests use an in-memory wiki.
 */
export interface WikiRemote {
  /** Host used to build author e-mail addresses. */
  readonly host: string;

  listPages(namespace: string): Promise<WikiResult<WikiPage[]>>;
  listMedia(namespace: string): Promise<WikiResult<WikiMedia[]>>;
  getPageInfo(id: string): Promise<WikiResult<WikiPage>>;
  getMediaInfo(id: string): Promise<WikiResult<WikiMedia>>;
  /** Newest first, including the current revision. */
  getPageHistory(id: string): Promise<WikiResult<WikiRevision[]>>;
  getMediaHistory(id: string): Promise<WikiResult<WikiRevision[]>>;
  getPage(id: string, revision?: number): Promise<WikiResult<string>>;
  getMedia(id: string, revision?: number): Promise<WikiResult<Buffer>>;
  savePage(id: string, text: string, summary: string, minor?: boolean): Promise<WikiResult<void>>;
  deletePage(id: string, summary: string): Promise<WikiResult<void>>;
  saveMedia(id: string, data: Buffer): Promise<WikiResult<void>>;
  deleteMedia(id: string): Promise<WikiResult<void>>;
}

import { RemoteProtocolError, type WikiError } from '../core/errors.js';
import { err, ok } from '../core/result.js';
import type { SessionManager } from '../session/sessionManager.js';
import { logger } from '../util/logger.js';
import type { JsonRpcClient } from './jsonRpcClient.js';
import type {
  ChangeType,
  EntryKind,
  WikiMedia,
  WikiPage,
  WikiRemote,
  WikiResult,
  WikiRevision
} from './types.js';

export const MIN_API_VERSION = 14;
const MAX_HISTORY_PAGES = 1000;

export interface WikiClientConfig {
  rpc: JsonRpcClient;
  session: SessionManager;
  host: string;
  /** Upper bound on change-log requests per file. */
  maxHistoryPages?: number;
}

type Decoder<T> = (value: unknown) => T | null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First of `names` present on the record, for fields renamed between API versions. */
function pick(record: Record<string, unknown>, ...names: string[]): unknown {
  for (const name of names) {
    if (record[name] !== undefined && record[name] !== null) return record[name];
  }
  return undefined;
}

function asNumber(value: unknown, fallback = 0): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  return fallback;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function decodePage(value: unknown): WikiPage | null {
  if (!isRecord(value)) return null;
  const id = asString(value.id);
  const revision = asNumber(pick(value, 'revision', 'rev'), NaN);
  if (!id || Number.isNaN(revision)) return null;
  return {
    id,
    revision,
    mtime: asNumber(pick(value, 'lastModified', 'mtime'), revision),
    author: asString(pick(value, 'author', 'user')),
    size: asNumber(value.size)
  };
}

export function decodeMedia(value: unknown): WikiMedia | null {
  if (!isRecord(value)) return null;
  const id = asString(value.id);
  const revision = asNumber(pick(value, 'revision', 'rev', 'mtime'), NaN);
  if (!id || Number.isNaN(revision)) return null;
  return {
    id,
    revision,
    size: asNumber(value.size),
    author: asString(pick(value, 'author', 'user')),
    isImage: pick(value, 'isimage', 'isImage') === true
  };
}

function toChangeType(value: unknown): ChangeType {
  switch (value) {
    case 'C':
    case 'E':
    case 'e':
    case 'D':
    case 'R':
      return value;
    default:
      return 'E';
  }
}

export function decodeRevision(id: string, kind: EntryKind): Decoder<WikiRevision> {
  return (value) => {
    if (!isRecord(value)) return null;
    const revision = asNumber(pick(value, 'revision', 'version'), NaN);
    if (Number.isNaN(revision)) return null;
    const type = toChangeType(value.type);
    return {
      id,
      kind,
      revision,
      author: asString(pick(value, 'author', 'user')),
      summary: asString(value.summary),
      type,
      isMinor: type === 'e',
      deleted: type === 'D'
    };
  };
}

const BASE64 = /^[A-Za-z0-9+/=\s]*$/;

/**
 * Typed DokuWiki operations over JSON-RPC. Every call runs inside a valid
 * session; a call rejected as unauthenticated is retried once after logging
 * in again.
 */
export class WikiClient implements WikiRemote {
  private readonly rpc: JsonRpcClient;
  private readonly session: SessionManager;
  private apiChecked = false;
  private readonly maxHistoryPages: number;
  readonly host: string;

  constructor(config: WikiClientConfig) {
    this.rpc = config.rpc;
    this.session = config.session;
    this.host = config.host;
    this.maxHistoryPages = config.maxHistoryPages ?? MAX_HISTORY_PAGES;
  }

  /**
   * Log in and verify the wiki speaks a recent enough API.
   */
  async connect(): Promise<WikiResult<number>> {
    const version = await this.getApiVersion();
    if (!version.ok) return version;
    if (version.value < MIN_API_VERSION) {
      return err(new RemoteProtocolError(
        `DokuWiki API version ${version.value} is too old, at least ${MIN_API_VERSION} is required`,
        { method: 'core.getAPIVersion' }
      ));
    }
    this.apiChecked = true;
    logger.debug('API version', { version: version.value });
    return version;
  }

  get connected(): boolean {
    return this.apiChecked;
  }

  async getApiVersion(): Promise<WikiResult<number>> {
    const result = await this.invoke('core.getAPIVersion', {});
    if (!result.ok) return result;
    const version = asNumber(result.value, NaN);
    if (Number.isNaN(version)) return this.shapeError('core.getAPIVersion', 'expected a number');
    return ok(version);
  }

  listPages(namespace: string): Promise<WikiResult<WikiPage[]>> {
    return this.list('core.listPages', { namespace, depth: 0 }, decodePage);
  }

  listMedia(namespace: string): Promise<WikiResult<WikiMedia[]>> {
    return this.list('core.listMedia', { namespace, pattern: '', depth: 0 }, decodeMedia);
  }

  async getPageInfo(id: string): Promise<WikiResult<WikiPage>> {
    return this.single('core.getPageInfo', { page: id }, decodePage);
  }

  async getMediaInfo(id: string): Promise<WikiResult<WikiMedia>> {
    return this.single('core.getMediaInfo', { media: id }, decodeMedia);
  }

  getPageHistory(id: string): Promise<WikiResult<WikiRevision[]>> {
    return this.history('core.getPageHistory', 'page', id, 'page');
  }

  getMediaHistory(id: string): Promise<WikiResult<WikiRevision[]>> {
    return this.history('core.getMediaHistory', 'media', id, 'media');
  }

  async getPage(id: string, revision?: number): Promise<WikiResult<string>> {
    const params: Record<string, unknown> = { page: id };
    if (revision !== undefined) params.rev = revision;
    const result = await this.invoke('core.getPage', params);
    if (!result.ok) return result;
    if (typeof result.value !== 'string') return this.shapeError('core.getPage', 'expected page text');
    return ok(result.value);
  }

  async getMedia(id: string, revision?: number): Promise<WikiResult<Buffer>> {
    const params: Record<string, unknown> = { media: id };
    if (revision !== undefined) params.rev = revision;
    const result = await this.invoke('core.getMedia', params);
    if (!result.ok) return result;
    if (typeof result.value !== 'string' || !BASE64.test(result.value)) {
      return this.shapeError('core.getMedia', 'expected base64 data');
    }
    return ok(Buffer.from(result.value, 'base64'));
  }

  savePage(id: string, text: string, summary: string, minor = false): Promise<WikiResult<void>> {
    return this.mutate('core.savePage', { page: id, text, summary, isminor: minor });
  }

  /** DokuWiki deletes a page when it is saved with empty text. */
  deletePage(id: string, summary: string): Promise<WikiResult<void>> {
    return this.mutate('core.savePage', { page: id, text: '', summary, isminor: false });
  }

  saveMedia(id: string, data: Buffer): Promise<WikiResult<void>> {
    return this.mutate('core.saveMedia', { media: id, base64: data.toString('base64'), overwrite: true });
  }

  deleteMedia(id: string): Promise<WikiResult<void>> {
    return this.mutate('core.deleteMedia', { media: id });
  }

  private async invoke(method: string, params: Record<string, unknown>): Promise<WikiResult<unknown>> {
    const session = await this.session.ensure();
    if (!session.ok) return session;
    const generation = this.session.generation;

    const first = await this.rpc.call(method, params);
    if (first.ok || first.error.kind !== 'Unauthenticated') return first;

    // Parallel calls that fail together renew the session once.
    await this.session.invalidate(generation);
    const again = await this.session.ensure();
    if (!again.ok) return again;
    return this.rpc.call(method, params);
  }

  private async mutate(method: string, params: Record<string, unknown>): Promise<WikiResult<void>> {
    const result = await this.invoke(method, params);
    if (!result.ok) return result;
    if (result.value === false) {
      return this.shapeError(method, 'the wiki refused the change');
    }
    return ok(undefined);
  }

  private async single<T>(method: string, params: Record<string, unknown>, decode: Decoder<T>): Promise<WikiResult<T>> {
    const result = await this.invoke(method, params);
    if (!result.ok) return result;
    const decoded = decode(result.value);
    if (decoded === null) return this.shapeError(method, 'unexpected response shape');
    return ok(decoded);
  }

  private async list<T>(method: string, params: Record<string, unknown>, decode: Decoder<T>): Promise<WikiResult<T[]>> {
    const result = await this.invoke(method, params);
    if (!result.ok) return result;
    return this.decodeArray(method, result.value, decode);
  }

  private decodeArray<T>(method: string, value: unknown, decode: Decoder<T>): WikiResult<T[]> {
    if (!Array.isArray(value)) return this.shapeError(method, 'expected an array');
    const items: T[] = [];
    for (const raw of value) {
      const item = decode(raw);
      if (item === null) return this.shapeError(method, 'unexpected item shape');
      items.push(item);
    }
    return ok(items);
  }

  /**
   * Page through a change log. Pages may overlap; revisions are deduplicated
   * and returned newest first.
   */
  private async history(
    method: string,
    param: 'page' | 'media',
    id: string,
    kind: EntryKind
  ): Promise<WikiResult<WikiRevision[]>> {
    const seen = new Map<number, WikiRevision>();
    let first = 0;
    let complete = false;

    for (let page = 0; page < this.maxHistoryPages; page++) {
      const result = await this.invoke(method, { [param]: id, first });
      if (!result.ok) return result;
      const decoded = this.decodeArray(method, result.value, decodeRevision(id, kind));
      if (!decoded.ok) return decoded;

      let fresh = 0;
      for (const revision of decoded.value) {
        if (!seen.has(revision.revision)) {
          seen.set(revision.revision, revision);
          fresh++;
        }
      }
      if (decoded.value.length === 0 || fresh === 0) {
        complete = true;
        break;
      }
      first = Math.max(first + 1, first + decoded.value.length - 1);
    }

    if (!complete) {
      logger.warn('History paging limit reached', { method, id, pages: this.maxHistoryPages, revisions: seen.size });
      return this.shapeError(method, `history of ${id} did not end within ${this.maxHistoryPages} pages`);
    }

    return ok([...seen.values()].sort((a, b) => b.revision - a.revision));
  }

  private shapeError<T>(method: string, message: string): WikiResult<T> {
    const error: WikiError = new RemoteProtocolError(`${method}: ${message}`, { method });
    return err(error);
  }
}

/**
 * In-memory wiki implementing WikiRemote, for exporter, importer and protocol tests.
 */

import { ForbiddenError, NotFoundError, type WikiError } from '../../src/core/errors.js';
import { err, ok } from '../../src/core/result.js';
import type {
  ChangeType,
  EntryKind,
  WikiMedia,
  WikiPage,
  WikiRemote,
  WikiResult,
  WikiRevision
} from '../../src/dokuwiki/types.js';

export interface FakeRevision {
  revision: number;
  author: string;
  summary: string;
  type: ChangeType;
  /** null for a deletion */
  content: Buffer | null;
}

export interface SeedRevision {
  revision: number;
  author?: string;
  summary?: string;
  type?: ChangeType;
  content: string | Buffer | null;
}

export class FakeWiki implements WikiRemote {
  readonly host = 'wiki.test';
  readonly pages = new Map<string, FakeRevision[]>();
  readonly media = new Map<string, FakeRevision[]>();
  readonly calls: string[] = [];
  /** Errors returned (once each) by the named operation. */
  readonly failures = new Map<string, WikiError[]>();
  clock = 1_700_000_000;
  editor = 'alice';

  addPage(id: string, revisions: SeedRevision[]): this {
    this.seed(this.pages, id, revisions);
    return this;
  }

  addMedia(id: string, revisions: SeedRevision[]): this {
    this.seed(this.media, id, revisions);
    return this;
  }

  failNext(operation: string, error: WikiError): this {
    const queue = this.failures.get(operation) ?? [];
    queue.push(error);
    this.failures.set(operation, queue);
    return this;
  }

  /** Current text of a page, or null when it does not exist. */
  currentText(id: string): string | null {
    const latest = this.latest(this.pages, id);
    return latest?.content ? latest.content.toString('utf8') : null;
  }

  currentMedia(id: string): Buffer | null {
    return this.latest(this.media, id)?.content ?? null;
  }

  /** Simulates an edit made by someone else through the wiki's web UI. */
  editPage(id: string, text: string, author = 'bob', summary = ''): number {
    const revision = this.tick();
    this.append(this.pages, id, {
      revision,
      author,
      summary,
      type: this.latest(this.pages, id)?.content ? 'E' : 'C',
      content: Buffer.from(text)
    });
    return revision;
  }

  private seed(store: Map<string, FakeRevision[]>, id: string, revisions: SeedRevision[]): void {
    for (const seed of revisions) {
      const content = seed.content === null ? null
        : typeof seed.content === 'string' ? Buffer.from(seed.content) : seed.content;
      this.append(store, id, {
        revision: seed.revision,
        author: seed.author ?? 'alice',
        summary: seed.summary ?? '',
        type: seed.type ?? (content === null ? 'D' : (store.get(id)?.length ?? 0) === 0 ? 'C' : 'E'),
        content
      });
      this.clock = Math.max(this.clock, seed.revision);
    }
  }

  private append(store: Map<string, FakeRevision[]>, id: string, revision: FakeRevision): void {
    const list = store.get(id) ?? [];
    list.push(revision);
    list.sort((a, b) => a.revision - b.revision);
    store.set(id, list);
  }

  private tick(): number {
    this.clock += 1;
    return this.clock;
  }

  private latest(store: Map<string, FakeRevision[]>, id: string): FakeRevision | undefined {
    const list = store.get(id);
    return list ? list[list.length - 1] : undefined;
  }

  private record(operation: string, detail: string): WikiError | undefined {
    this.calls.push(`${operation} ${detail}`.trim());
    const queue = this.failures.get(operation);
    const failure = queue?.shift();
    if (queue && queue.length === 0) this.failures.delete(operation);
    return failure;
  }

  private inNamespace(id: string, namespace: string): boolean {
    return namespace === '' || id.startsWith(namespace + ':');
  }

  private live(store: Map<string, FakeRevision[]>, namespace: string): Array<[string, FakeRevision]> {
    const result: Array<[string, FakeRevision]> = [];
    for (const [id] of store) {
      const latest = this.latest(store, id);
      if (latest?.content && this.inNamespace(id, namespace)) result.push([id, latest]);
    }
    return result.sort(([a], [b]) => (a < b ? -1 : 1));
  }

  private toPage(id: string, latest: FakeRevision): WikiPage {
    return { id, revision: latest.revision, mtime: latest.revision, author: latest.author, size: latest.content?.length ?? 0 };
  }

  private toMedia(id: string, latest: FakeRevision): WikiMedia {
    return { id, revision: latest.revision, author: latest.author, size: latest.content?.length ?? 0, isImage: /\.(png|jpe?g|gif)$/.test(id) };
  }

  private history(store: Map<string, FakeRevision[]>, id: string, kind: EntryKind): WikiResult<WikiRevision[]> {
    const list = store.get(id);
    if (!list) return err(new NotFoundError(`${id} does not exist`));
    return ok([...list].reverse().map((r) => ({
      id,
      kind,
      revision: r.revision,
      author: r.author,
      summary: r.summary,
      type: r.type,
      isMinor: r.type === 'e',
      deleted: r.type === 'D'
    })));
  }

  async listPages(namespace: string): Promise<WikiResult<WikiPage[]>> {
    const failure = this.record('listPages', namespace);
    if (failure) return err(failure);
    return ok(this.live(this.pages, namespace).map(([id, latest]) => this.toPage(id, latest)));
  }

  async listMedia(namespace: string): Promise<WikiResult<WikiMedia[]>> {
    const failure = this.record('listMedia', namespace);
    if (failure) return err(failure);
    return ok(this.live(this.media, namespace).map(([id, latest]) => this.toMedia(id, latest)));
  }

  async getPageInfo(id: string): Promise<WikiResult<WikiPage>> {
    const failure = this.record('getPageInfo', id);
    if (failure) return err(failure);
    const latest = this.latest(this.pages, id);
    if (!latest?.content) return err(new NotFoundError(`page ${id} does not exist`));
    return ok(this.toPage(id, latest));
  }

  async getMediaInfo(id: string): Promise<WikiResult<WikiMedia>> {
    const failure = this.record('getMediaInfo', id);
    if (failure) return err(failure);
    const latest = this.latest(this.media, id);
    if (!latest?.content) return err(new NotFoundError(`media ${id} does not exist`));
    return ok(this.toMedia(id, latest));
  }

  async getPageHistory(id: string): Promise<WikiResult<WikiRevision[]>> {
    const failure = this.record('getPageHistory', id);
    if (failure) return err(failure);
    return this.history(this.pages, id, 'page');
  }

  async getMediaHistory(id: string): Promise<WikiResult<WikiRevision[]>> {
    const failure = this.record('getMediaHistory', id);
    if (failure) return err(failure);
    return this.history(this.media, id, 'media');
  }

  async getPage(id: string, revision?: number): Promise<WikiResult<string>> {
    const failure = this.record('getPage', revision === undefined ? id : `${id}@${revision}`);
    if (failure) return err(failure);
    const list = this.pages.get(id) ?? [];
    const found = revision === undefined ? list[list.length - 1] : list.find((r) => r.revision === revision);
    if (!found) return revision === undefined ? ok('') : err(new NotFoundError(`${id}@${revision} not found`));
    return ok(found.content ? found.content.toString('utf8') : '');
  }

  async getMedia(id: string, revision?: number): Promise<WikiResult<Buffer>> {
    const failure = this.record('getMedia', revision === undefined ? id : `${id}@${revision}`);
    if (failure) return err(failure);
    const list = this.media.get(id) ?? [];
    const found = revision === undefined ? list[list.length - 1] : list.find((r) => r.revision === revision);
    if (!found?.content) return err(new NotFoundError(`${id} not found`));
    return ok(found.content);
  }

  async savePage(id: string, text: string, summary: string): Promise<WikiResult<void>> {
    const failure = this.record('savePage', id);
    if (failure) return err(failure);
    const exists = Boolean(this.latest(this.pages, id)?.content);
    if (text === '') {
      if (exists) {
        this.append(this.pages, id, { revision: this.tick(), author: this.editor, summary, type: 'D', content: null });
      }
      return ok(undefined);
    }
    if (this.currentText(id) === text) return ok(undefined);
    this.append(this.pages, id, {
      revision: this.tick(),
      author: this.editor,
      summary,
      type: exists ? 'E' : 'C',
      content: Buffer.from(text)
    });
    return ok(undefined);
  }

  deletePage(id: string, summary: string): Promise<WikiResult<void>> {
    return this.savePage(id, '', summary);
  }

  async saveMedia(id: string, data: Buffer): Promise<WikiResult<void>> {
    const failure = this.record('saveMedia', id);
    if (failure) return err(failure);
    const exists = Boolean(this.latest(this.media, id)?.content);
    this.append(this.media, id, {
      revision: this.tick(),
      author: this.editor,
      summary: '',
      type: exists ? 'E' : 'C',
      content: Buffer.from(data)
    });
    return ok(undefined);
  }

  async deleteMedia(id: string): Promise<WikiResult<void>> {
    const failure = this.record('deleteMedia', id);
    if (failure) return err(failure);
    if (!this.latest(this.media, id)?.content) return err(new NotFoundError(`${id} not found`));
    this.append(this.media, id, { revision: this.tick(), author: this.editor, summary: '', type: 'D', content: null });
    return ok(undefined);
  }
}

export function forbidden(message = 'not allowed'): WikiError {
  return new ForbiddenError(message, { code: 111 });
}

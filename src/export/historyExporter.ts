import pLimit from 'p-limit';
import { AmbiguousMappingError, type WikiError } from '../core/errors.js';
import { err, ok } from '../core/result.js';
import type { EntryKind, WikiRemote, WikiResult, WikiRevision } from '../dokuwiki/types.js';
import type { MarksFile } from '../git/marks.js';
import { PathRegistry, type PathMapper } from '../mapping/pathMapper.js';
import type { IdentityEntry, IdentityMap, MarkFilter, SquashedBase, SyncHead } from '../state/identityMap.js';
import { silentProgress, type ProgressReporter } from '../cli/progress.js';
import { logger } from '../util/logger.js';
import type { CommitRecord } from './fastImportWriter.js';
import { sortRevisions } from './revisionOrder.js';

export interface HistoryExporterOptions {
  remote: WikiRemote;
  mapper: PathMapper;
  identity: IdentityMap;
  marks: MarksFile;
  concurrency: number;
  depth?: number;
  /** Whether the private ref already exists, for when the head mark is gone. */
  privateRefExists?: boolean;
  progress?: ProgressReporter;
}

export interface ExportPlan {
  commits: CommitRecord[];
  head: SyncHead | null;
  nextMark: number;
  entries: IdentityEntry[];
  squashedBases: SquashedBase[];
}

interface ExportTarget {
  path: string;
  id: string;
  kind: EntryKind;
  /** Revision reported by the listing; null when the file is gone from the wiki. */
  current: { revision: number; author: string } | null;
}

interface PendingRevision {
  target: ExportTarget;
  entry: WikiRevision;
  /** Timestamp of `entry`, the ordering key. */
  revision: number;
  squashed: boolean;
  path: string;
}

/**
 * Turns wiki revisions newer than the synchronized head into a linear
 * sequence of commits, one per revision, in a deterministic order.
 */
export class HistoryExporter {
  private readonly remote: WikiRemote;
  private readonly mapper: PathMapper;
  private readonly identity: IdentityMap;
  private readonly progress: ProgressReporter;
  private readonly limit: ReturnType<typeof pLimit>;
  /**
   * Identity entries count as synchronized only while git still has their
   * commit. Without any marks, the existing private ref vouches for them.
   */
  private readonly known: MarkFilter;

  constructor(private readonly options: HistoryExporterOptions) {
    this.remote = options.remote;
    this.mapper = options.mapper;
    this.identity = options.identity;
    this.progress = options.progress ?? silentProgress;
    this.limit = pLimit(Math.max(1, options.concurrency));
    const { marks } = options;
    const refExists = options.privateRefExists === true;
    this.known = (mark) => (marks.size > 0 ? marks.has(mark) : refExists);
  }

  async plan(): Promise<WikiResult<ExportPlan>> {
    const targets = await this.collectTargets();
    if (!targets.ok) return targets;

    const pending = await this.collectRevisions(targets.value);
    if (!pending.ok) return pending;

    const ordered = sortRevisions(pending.value);
    logger.info('Revisions to export', { files: targets.value.length, revisions: ordered.length });

    const contents = await this.fetchContents(ordered);
    if (!contents.ok) return contents;

    return ok(this.materialize(ordered, contents.value));
  }

  private async collectTargets(): Promise<WikiResult<ExportTarget[]>> {
    const namespace = this.mapper.namespace;
    const [pages, media] = await Promise.all([
      this.remote.listPages(namespace),
      this.remote.listMedia(namespace)
    ]);
    if (!pages.ok) return pages;
    if (!media.ok) return media;

    const registry = new PathRegistry();
    const targets = new Map<string, ExportTarget>();

    const listed: Array<{ id: string; kind: EntryKind; revision: number; author: string }> = [
      ...pages.value.map((page) => ({ id: page.id, kind: 'page' as const, revision: page.revision, author: page.author })),
      ...media.value.map((file) => ({ id: file.id, kind: 'media' as const, revision: file.revision, author: file.author }))
    ];

    for (const entry of listed) {
      const path = this.mapper.toPath(entry.id, entry.kind);
      if (path === null) continue;

      const claimed = registry.claim(path, `${entry.kind} ${entry.id}`);
      if (!claimed.ok) return claimed;

      const back = this.mapper.toWikiId(path);
      if (back.id !== entry.id || back.kind !== entry.kind) {
        return err(new AmbiguousMappingError(
          `Wiki ${entry.kind} "${entry.id}" maps to ${path}, which reads back as ${back.kind} "${back.id}"`,
          { path, wikiId: entry.id }
        ));
      }
      targets.set(path, {
        path,
        id: entry.id,
        kind: entry.kind,
        current: { revision: entry.revision, author: entry.author }
      });
    }

    // Synchronized files missing from the listing were deleted on the wiki.
    for (const path of this.identity.livePaths(this.known)) {
      if (targets.has(path)) continue;
      const { id, kind } = this.mapper.toWikiId(path);
      targets.set(path, { path, id, kind, current: null });
    }

    return ok([...targets.values()].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)));
  }

  private async collectRevisions(targets: ExportTarget[]): Promise<WikiResult<PendingRevision[]>> {
    const startTime = Date.now();
    let processed = 0;

    const results = await Promise.all(targets.map((target) => this.limit(async () => {
      const result = await this.revisionsFor(target);
      processed++;
      this.progress.update({ phase: 'history', processed, total: targets.length, startTime });
      return result;
    })));

    const pending: PendingRevision[] = [];
    for (const result of results) {
      if (!result.ok) return result;
      pending.push(...result.value);
    }
    return ok(pending);
  }

  private async revisionsFor(target: ExportTarget): Promise<WikiResult<PendingRevision[]>> {
    const fetched = target.kind === 'page'
      ? await this.remote.getPageHistory(target.id)
      : await this.remote.getMediaHistory(target.id);

    let history: WikiRevision[];
    if (fetched.ok) {
      history = fetched.value;
    } else if (fetched.error.kind === 'NotFound') {
      history = [];
    } else {
      return fetched;
    }

    const byRevision = new Map<number, WikiRevision>();
    for (const revision of history) byRevision.set(revision.revision, revision);
    if (target.current && !byRevision.has(target.current.revision)) {
      byRevision.set(target.current.revision, {
        id: target.id,
        kind: target.kind,
        revision: target.current.revision,
        author: target.current.author,
        summary: '',
        type: byRevision.size === 0 ? 'C' : 'E',
        isMinor: false,
        deleted: false
      });
    }

    const latest = this.identity.latestFor(target.path, this.known);
    if (!target.current && latest && ![...byRevision.values()].some((r) => r.deleted && r.revision > latest.revision)) {
      // Gone from the wiki without a recorded delete: remove it one second
      // after the newest known revision.
      const newest = Math.max(latest.revision, ...byRevision.keys());
      byRevision.set(newest + 1, {
        id: target.id,
        kind: target.kind,
        revision: newest + 1,
        author: '',
        summary: '',
        type: 'D',
        isMinor: false,
        deleted: true
      });
      logger.debug('Synthesized deletion', { path: target.path, revision: newest + 1 });
    }

    // Newest first
    const full = [...byRevision.values()].sort((a, b) => b.revision - a.revision);
    const depth = this.options.depth;
    const window = depth !== undefined ? full.slice(0, depth) : full;
    const truncated = window.length < full.length;
    const retained = window.filter((r) => !latest || r.revision > latest.revision);

    const oldest = retained[retained.length - 1];
    const squashedRevision = truncated && oldest && oldest === window[window.length - 1]
      ? oldest.revision
      : null;

    const base = this.identity.squashedBaseFor(target.path);
    if (base && window.some((r) => r.revision < base.revision)) {
      logger.warn('History before a squashed base is not fetched again; clone anew to get it', {
        path: target.path,
        base: base.revision
      });
    }

    return ok(retained.map((entry) => ({
      target,
      entry,
      revision: entry.revision,
      path: target.path,
      squashed: entry.revision === squashedRevision
    })));
  }

  private async fetchContents(ordered: PendingRevision[]): Promise<WikiResult<Array<Buffer | null | undefined>>> {
    const startTime = Date.now();
    let processed = 0;

    const results = await Promise.all(ordered.map((item) => this.limit(async () => {
      const result = await this.contentFor(item);
      processed++;
      this.progress.update({ phase: 'content', processed, total: ordered.length, startTime });
      return result;
    })));

    const contents: Array<Buffer | null | undefined> = [];
    for (const result of results) {
      if (!result.ok) return result;
      contents.push(result.value);
    }
    return ok(contents);
  }

  /**
   * Content of one revision: a buffer, null for a deletion, or undefined when
   * the wiki no longer has that revision.
   */
  private async contentFor(item: PendingRevision): Promise<WikiResult<Buffer | null | undefined>> {
    const { target, entry: revision } = item;
    if (revision.deleted) return ok(null);

    const rev = target.current?.revision === revision.revision ? undefined : revision.revision;
    if (target.kind === 'page') {
      const text = await this.remote.getPage(target.id, rev);
      if (!text.ok) return this.missingIsSkipped(text.error, item);
      return ok(text.value.length === 0 ? null : Buffer.from(text.value, 'utf8'));
    }

    const data = await this.remote.getMedia(target.id, rev);
    if (!data.ok) return this.missingIsSkipped(data.error, item);
    return ok(data.value);
  }

  private missingIsSkipped(error: WikiError, item: PendingRevision): WikiResult<undefined> {
    if (error.kind !== 'NotFound') return err(error);
    logger.warn('Skipping revision the wiki no longer has', {
      id: item.target.id,
      revision: item.revision
    });
    return ok(undefined);
  }

  private materialize(ordered: PendingRevision[], contents: Array<Buffer | null | undefined>): ExportPlan {
    const head = this.identity.head;
    let nextMark = Math.max(this.identity.nextMark, this.options.marks.highest + 1);
    let parent = this.startingParent();

    const commits: CommitRecord[] = [];
    const entries: IdentityEntry[] = [];
    const squashedBases: SquashedBase[] = [];

    ordered.forEach((item, index) => {
      const content = contents[index];
      if (content === undefined) return;

      const { target, entry: revision } = item;
      const mark = nextMark++;
      const author = revision.author.trim() || 'unknown';

      commits.push({
        mark,
        path: item.path,
        wikiId: target.id,
        kind: target.kind,
        revision: revision.revision,
        author,
        email: `${author.replace(/\s+/g, '.')}@${this.remote.host}`,
        timestamp: revision.revision,
        message: this.messageFor(item, content === null),
        content,
        parent
      });
      entries.push({
        path: item.path,
        revision: revision.revision,
        mark,
        deleted: content === null,
        squashed: item.squashed,
        origin: 'fetch'
      });
      if (item.squashed) {
        squashedBases.push({ path: item.path, revision: revision.revision, mark });
      }

      parent = mark;
    });

    const last = commits[commits.length - 1];
    return {
      commits,
      head: last ? { mark: last.mark, revision: last.revision } : head,
      nextMark,
      entries,
      squashedBases
    };
  }

  /**
   * Where the first new commit attaches: the synchronized head, else the
   * newest commit git still has a mark for, else the private ref.
   */
  private startingParent(): number | 'ref' | null {
    const head = this.identity.head;
    const { marks } = this.options;
    if (head && marks.has(head.mark)) return head.mark;

    const imported = this.identity.highestMark((mark) => marks.has(mark));
    if (imported !== undefined) {
      logger.warn('Synchronized head is unknown to git, continuing from the last imported commit', {
        head: head?.mark,
        mark: imported
      });
      return imported;
    }
    if (head && this.options.privateRefExists) return 'ref';
    if (head) {
      logger.warn('Synchronized head is unknown to git, starting a new history', { mark: head.mark });
    }
    return null;
  }

  private messageFor(item: PendingRevision, removed: boolean): string {
    const { entry: revision, target } = item;
    let message = revision.summary.trim();
    if (!message) {
      if (removed) message = `Delete ${target.id}`;
      else if (revision.type === 'C') message = `Create ${target.id}`;
      else message = `Edit ${target.id}`;
    }
    if (item.squashed) {
      message += `\n\nSquashed base: earlier history of ${target.id} was not fetched (depth ${this.options.depth ?? 0}).`;
    }
    return message + '\n';
  }
}

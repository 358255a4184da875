import pLimit from 'p-limit';
import {
  AmbiguousMappingError,
  ConflictError,
  RemoteProtocolError,
  describeError,
  type WikiError
} from '../core/errors.js';
import { err, ok, type Result } from '../core/result.js';
import type { EntryKind, WikiRemote, WikiResult } from '../dokuwiki/types.js';
import type { PathMapper } from '../mapping/pathMapper.js';
import type { IdentityMap } from '../state/identityMap.js';
import { silentProgress, type ProgressReporter } from '../cli/progress.js';
import { logger } from '../util/logger.js';
import type { FastExportStream, ParsedCommit } from './fastExportParser.js';

export const PUSHABLE_REF = 'refs/heads/main';
const GITLINK_MODE = '160000';

export type ConflictScope = 'touched' | 'namespace';

export interface PushImporterOptions {
  remote: WikiRemote;
  mapper: PathMapper;
  identity: IdentityMap;
  conflictScope: ConflictScope;
  concurrency: number;
  dryRun?: boolean;
  progress?: ProgressReporter;
}

export type RefOutcome =
  | { ref: string; ok: true }
  | { ref: string; ok: false; reason: string };

export interface WikiChange {
  path: string;
  id: string;
  kind: EntryKind;
  action: 'put' | 'delete';
  content: Buffer | null;
}

export interface PlannedCommit {
  mark: number;
  subject: string;
  changes: WikiChange[];
}

function subjectOf(message: string): string {
  return (message.split('\n').find((line) => line.trim().length > 0) ?? '').trim();
}

/**
 * Replays pushed commits onto the wiki, one remote edit per changed file.
 */
export class PushImporter {
  private readonly remote: WikiRemote;
  private readonly mapper: PathMapper;
  private readonly identity: IdentityMap;
  private readonly progress: ProgressReporter;

  constructor(private readonly options: PushImporterOptions) {
    this.remote = options.remote;
    this.mapper = options.mapper;
    this.identity = options.identity;
    this.progress = options.progress ?? silentProgress;
  }

  async push(stream: FastExportStream): Promise<RefOutcome[]> {
    const refs: string[] = [];
    for (const ref of [...stream.commits.map((c) => c.ref), ...stream.resets.map((r) => r.ref)]) {
      if (!refs.includes(ref)) refs.push(ref);
    }

    const outcomes: RefOutcome[] = [];
    for (const ref of refs) {
      if (ref !== PUSHABLE_REF) {
        outcomes.push({ ref, ok: false, reason: `only ${PUSHABLE_REF} can be pushed to a wiki` });
        continue;
      }
      const commits = stream.commits.filter((commit) => commit.ref === ref);
      outcomes.push(await this.pushRef(ref, commits, stream));
    }
    return outcomes;
  }

  private async pushRef(ref: string, commits: ParsedCommit[], stream: FastExportStream): Promise<RefOutcome> {
    const planned = this.planCommits(commits, stream);
    if (!planned.ok) {
      logger.error('Push rejected', { ref, error: planned.error.message });
      return { ref, ok: false, reason: planned.error.message };
    }
    if (planned.value.length === 0) return { ref, ok: true };

    const conflict = await this.checkConflicts(planned.value);
    if (!conflict.ok) {
      logger.error('Push rejected', { ref, kind: conflict.error.kind, error: conflict.error.message });
      return { ref, ok: false, reason: conflict.error.kind === 'Conflict' ? 'fetch first' : conflict.error.message };
    }

    if (this.options.dryRun) {
      logger.info('Dry run: wiki left unchanged', { ref, commits: planned.value.length });
      return { ref, ok: true };
    }

    const startTime = Date.now();
    const total = planned.value.length;
    for (const [index, commit] of planned.value.entries()) {
      const applied = await this.applyCommit(commit);
      if (!applied.ok) {
        const reason = `pushed ${index} of ${total} commits; :${commit.mark} failed: ${applied.error.message}`;
        logger.error('Push stopped', { ref, kind: applied.error.kind, reason });
        return { ref, ok: false, reason };
      }
      this.progress.update({ phase: 'push', processed: index + 1, total, startTime });
    }

    this.progress.summary(`Pushed ${total} commit${total === 1 ? '' : 's'} to the wiki`);
    return { ref, ok: true };
  }

  /**
   * Resolve every commit into wiki changes, validating paths before anything
   * is sent to the wiki.
   */
  planCommits(commits: ParsedCommit[], stream: FastExportStream): Result<PlannedCommit[], WikiError> {
    const live = new Set(this.identity.livePaths());
    const planned: PlannedCommit[] = [];

    for (const commit of commits) {
      if (commit.mark === null) {
        return err(new RemoteProtocolError('fast-export commit without a mark'));
      }
      if (commit.merges.length > 0) {
        logger.debug('Pushing merge commit as its first-parent diff', { mark: commit.mark });
      }

      const changes = new Map<string, WikiChange>();
      for (const change of commit.changes) {
        switch (change.type) {
          case 'deleteall':
            for (const path of live) {
              const target = this.mapper.toWikiId(path);
              changes.set(path, { path, ...target, action: 'delete', content: null });
            }
            break;
          case 'delete': {
            const target = this.mapper.toWikiId(change.path);
            changes.set(change.path, { path: change.path, ...target, action: 'delete', content: null });
            break;
          }
          case 'modify': {
            if (change.mode === GITLINK_MODE) {
              logger.warn('Skipping submodule', { path: change.path });
              break;
            }
            let content: Buffer | undefined;
            if (change.ref.kind === 'inline') content = change.ref.data;
            else if (change.ref.kind === 'mark') content = stream.blobs.get(change.ref.mark);
            if (content === undefined) {
              return err(new RemoteProtocolError(`Content of ${change.path} is not in the push stream`, { path: change.path }));
            }
            const target = this.mapper.toWikiId(change.path);
            // A page saved with empty text is deleted by the wiki.
            const empty = target.kind === 'page' && content.length === 0;
            changes.set(change.path, {
              path: change.path,
              ...target,
              action: empty ? 'delete' : 'put',
              content: empty ? null : content
            });
            break;
          }
          case 'rename':
          case 'copy':
            return err(new RemoteProtocolError(
              `Unsupported ${change.type} of ${change.source} in push stream`,
              { path: change.path }
            ));
        }
      }

      const effective: WikiChange[] = [];
      for (const change of changes.values()) {
        if (change.action === 'delete' && !live.has(change.path)) continue;
        if (!this.mapper.isCanonicalPath(change.path)) {
          return err(new AmbiguousMappingError(
            `${change.path} is not a valid wiki name (use lowercase letters, digits, '_', '.' and '-')`,
            { path: change.path, wikiId: change.id }
          ));
        }
        effective.push(change);
        if (change.action === 'put') live.add(change.path);
        else live.delete(change.path);
      }

      planned.push({ mark: commit.mark, subject: subjectOf(commit.message), changes: effective });
    }

    return ok(planned);
  }

  private async checkConflicts(commits: PlannedCommit[]): Promise<Result<void, WikiError>> {
    return this.options.conflictScope === 'namespace'
      ? this.checkNamespace()
      : this.checkTouched(commits);
  }

  private async checkTouched(commits: PlannedCommit[]): Promise<Result<void, WikiError>> {
    const touched = new Map<string, WikiChange>();
    for (const commit of commits) {
      for (const change of commit.changes) {
        if (!touched.has(change.path)) touched.set(change.path, change);
      }
    }

    const limit = pLimit(Math.max(1, this.options.concurrency));
    const results = await Promise.all([...touched.values()].map((change) => limit(async () => {
      const remote = await this.currentRevision(change.id, change.kind);
      if (!remote.ok) return remote;
      return this.compare(change.path, remote.value);
    })));

    for (const result of results) {
      if (!result.ok) return result;
    }
    return ok(undefined);
  }

  private async checkNamespace(): Promise<Result<void, WikiError>> {
    const namespace = this.mapper.namespace;
    const [pages, media] = await Promise.all([
      this.remote.listPages(namespace),
      this.remote.listMedia(namespace)
    ]);
    if (!pages.ok) return pages;
    if (!media.ok) return media;

    const remote = new Map<string, number>();
    for (const page of pages.value) {
      const path = this.mapper.toPath(page.id, 'page');
      if (path !== null) remote.set(path, page.revision);
    }
    for (const file of media.value) {
      const path = this.mapper.toPath(file.id, 'media');
      if (path !== null) remote.set(path, file.revision);
    }

    for (const [path, revision] of remote) {
      const result = this.compare(path, revision);
      if (!result.ok) return result;
    }
    for (const path of this.identity.livePaths()) {
      if (!remote.has(path)) return this.compare(path, null);
    }
    return ok(undefined);
  }

  private compare(path: string, remoteRevision: number | null): Result<void, WikiError> {
    const latest = this.identity.latestFor(path);
    const expected = latest && !latest.deleted ? latest.revision : null;
    if (expected === remoteRevision) return ok(undefined);

    logger.info('Wiki changed since last fetch', { path, expected, actual: remoteRevision });
    return err(new ConflictError(
      `${path} changed on the wiki since the last fetch`,
      { path }
    ));
  }

  private async currentRevision(id: string, kind: EntryKind): Promise<WikiResult<number | null>> {
    const info = kind === 'page' ? await this.remote.getPageInfo(id) : await this.remote.getMediaInfo(id);
    if (info.ok) return ok(info.value.revision);
    return info.error.kind === 'NotFound' ? ok(null) : info;
  }

  private async applyCommit(commit: PlannedCommit): Promise<Result<void, WikiError>> {
    let headRevision = this.identity.head?.revision ?? 0;

    for (const change of commit.changes) {
      const applied = await this.applyChange(change, commit.subject);
      if (!applied.ok) return applied;

      const revision = await this.readBack(change);
      if (!revision.ok) return revision;

      await this.identity.record({
        path: change.path,
        revision: revision.value,
        mark: commit.mark,
        deleted: change.action === 'delete',
        squashed: false,
        origin: 'push'
      });
      headRevision = Math.max(headRevision, revision.value);
      logger.debug('Applied change', { path: change.path, action: change.action, revision: revision.value });
    }

    await this.identity.advanceHead({ mark: commit.mark, revision: headRevision });
    return ok(undefined);
  }

  private async applyChange(change: WikiChange, summary: string): Promise<WikiResult<void>> {
    if (change.action === 'put' && change.content !== null) {
      return change.kind === 'page'
        ? this.remote.savePage(change.id, change.content.toString('utf8'), summary)
        : this.remote.saveMedia(change.id, change.content);
    }

    const deleted = change.kind === 'page'
      ? await this.remote.deletePage(change.id, summary)
      : await this.remote.deleteMedia(change.id);
    if (!deleted.ok && deleted.error.kind === 'NotFound') {
      logger.debug('Already gone from the wiki', { id: change.id, kind: change.kind });
      return ok(undefined);
    }
    return deleted;
  }

  /** Revision the wiki assigned to the change just applied. */
  private async readBack(change: WikiChange): Promise<WikiResult<number>> {
    if (change.action === 'put') {
      const current = await this.currentRevision(change.id, change.kind);
      if (!current.ok) return current;
      if (current.value !== null) return ok(current.value);
      return err(new RemoteProtocolError(`${change.id} is missing right after it was saved`, { wikiId: change.id }));
    }

    const history = change.kind === 'page'
      ? await this.remote.getPageHistory(change.id)
      : await this.remote.getMediaHistory(change.id);
    if (!history.ok) {
      if (history.error.kind !== 'NotFound') return history;
      logger.debug('No history for deleted entry', { id: change.id, error: describeError(history.error) });
    }
    const newest = history.ok ? history.value[0]?.revision : undefined;
    const latest = this.identity.latestFor(change.path)?.revision ?? 0;
    if (newest !== undefined && newest > latest) return ok(newest);
    // The wiki kept no record of the delete; stamp it after what we know.
    return ok(Math.max(latest + 1, Math.floor(Date.now() / 1000)));
  }
}

import { readFile, truncate } from 'fs/promises';
import { join } from 'path';
import { atomicWriteJson, durableAppend, isMissingFileError } from '../fs/atomicWriter.js';
import { logger } from '../util/logger.js';

export const REVISIONS_FILE = 'revisions.jsonl';
export const STATE_FILE = 'state.json';
const STATE_VERSION = 1;

export type EntryOrigin = 'fetch' | 'push';

/** Decides whether git still knows the commit behind a mark. */
export type MarkFilter = (mark: number) => boolean;

/**
 * One synchronized (path, revision) and the commit mark that carries it.
 */
export interface IdentityEntry {
  path: string;
  revision: number;
  mark: number;
  deleted: boolean;
  squashed: boolean;
  origin: EntryOrigin;
}

export interface SyncHead {
  mark: number;
  revision: number;
}

export interface SquashedBase {
  path: string;
  revision: number;
  mark: number;
}

export interface SyncState {
  version: number;
  head: SyncHead | null;
  nextMark: number;
  squashedBases: SquashedBase[];
}

export function createEmptyState(): SyncState {
  return { version: STATE_VERSION, head: null, nextMark: 1, squashedBases: [] };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function parseIdentityEntry(value: unknown): IdentityEntry | null {
  if (!isRecord(value)) return null;
  const { path, revision, mark, deleted, squashed, origin } = value;
  if (typeof path !== 'string' || path.length === 0) return null;
  if (typeof revision !== 'number' || !Number.isInteger(revision)) return null;
  if (!isPositiveInteger(mark)) return null;
  if (origin !== 'fetch' && origin !== 'push') return null;
  return {
    path,
    revision,
    mark,
    deleted: deleted === true,
    squashed: squashed === true,
    origin
  };
}

function parseState(value: unknown): SyncState | null {
  if (!isRecord(value)) return null;
  const { head, nextMark, squashedBases } = value;
  if (!isPositiveInteger(nextMark)) return null;

  let parsedHead: SyncHead | null = null;
  if (head !== null && head !== undefined) {
    if (!isRecord(head) || !isPositiveInteger(head.mark) || typeof head.revision !== 'number') return null;
    parsedHead = { mark: head.mark, revision: head.revision };
  }

  const bases: SquashedBase[] = [];
  if (Array.isArray(squashedBases)) {
    for (const base of squashedBases) {
      if (isRecord(base) && typeof base.path === 'string' && typeof base.revision === 'number' && isPositiveInteger(base.mark)) {
        bases.push({ path: base.path, revision: base.revision, mark: base.mark });
      }
    }
  }

  return { version: STATE_VERSION, head: parsedHead, nextMark, squashedBases: bases };
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
}

function keyOf(path: string, revision: number): string {
  return `${revision}\u0000${path}`;
}

/**
 * Persistent bidirectional mapping between wiki revisions and commit marks.
 *
 * `revisions.jsonl` is append-only: every batch is one write followed by an
 * fsync, so a crash leaves at most a torn final line, which `load` drops.
 * `state.json` holds the synchronized head and is replaced atomically.
 */
export class IdentityMap {
  private readonly entries: IdentityEntry[] = [];
  private readonly byKey = new Map<string, IdentityEntry>();
  private readonly byPath = new Map<string, IdentityEntry[]>();
  private staged: IdentityEntry[] = [];
  private state: SyncState;

  private constructor(readonly directory: string, state: SyncState) {
    this.state = state;
  }

  static async load(directory: string): Promise<IdentityMap> {
    const stateText = await readOptional(join(directory, STATE_FILE));
    let state = createEmptyState();
    if (stateText !== null) {
      const parsed = parseState(JSON.parse(stateText));
      if (!parsed) {
        throw new Error(`Unreadable sync state: ${join(directory, STATE_FILE)}`);
      }
      state = parsed;
    }

    const map = new IdentityMap(directory, state);
    const revisionsPath = join(directory, REVISIONS_FILE);
    const text = await readOptional(revisionsPath);
    if (text !== null) {
      await map.ingest(revisionsPath, text);
    }

    logger.debug('Identity map loaded', {
      directory,
      entries: map.entries.length,
      head: map.state.head?.mark
    });
    return map;
  }

  private async ingest(revisionsPath: string, text: string): Promise<void> {
    const lines = text.split('\n');
    let validLength = 0;
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      const isLast = i === lines.length - 1;
      if (line.trim().length === 0) {
        if (!isLast) validLength += line.length + 1;
        continue;
      }

      let entry: IdentityEntry | null = null;
      try {
        entry = parseIdentityEntry(JSON.parse(line));
      } catch (error) {
        logger.debug('Unparseable identity map line', {
          line: i + 1,
          error: error instanceof Error ? error.message : String(error)
        });
      }

      if (entry === null || isLast) {
        // Only an unterminated final line can be the residue of a crash.
        if (isLast) {
          if (entry !== null) {
            this.remember(entry, true);
            validLength += line.length;
            await durableAppend(revisionsPath, '\n');
          } else {
            logger.warn('Dropping torn identity map line', { path: revisionsPath });
            await truncate(revisionsPath, Buffer.byteLength(text.slice(0, validLength)));
          }
          continue;
        }
        throw new Error(`Corrupt identity map entry at ${revisionsPath}:${i + 1}`);
      }

      this.remember(entry, true);
      validLength += line.length + 1;
    }
  }

  /**
   * Index an entry. A repeated (path, revision) is ignored unless `supersede`
   * is set and it carries a different mark: the revision was imported again
   * after git lost the commit, and the later line wins.
   */
  private remember(entry: IdentityEntry, supersede = false): boolean {
    const key = keyOf(entry.path, entry.revision);
    const existing = this.byKey.get(key);
    if (existing && (!supersede || existing.mark === entry.mark)) return false;

    this.byKey.set(key, entry);
    const forPath = this.byPath.get(entry.path) ?? [];
    if (existing) {
      this.entries[this.entries.indexOf(existing)] = entry;
      forPath[forPath.indexOf(existing)] = entry;
    } else {
      this.entries.push(entry);
      forPath.push(entry);
    }
    this.byPath.set(entry.path, forPath);
    return true;
  }

  get head(): SyncHead | null {
    return this.state.head;
  }

  get nextMark(): number {
    return this.state.nextMark;
  }

  get squashedBases(): readonly SquashedBase[] {
    return this.state.squashedBases;
  }

  /** Newest squashed base recorded for a path. */
  squashedBaseFor(path: string): SquashedBase | undefined {
    let found: SquashedBase | undefined;
    for (const base of this.state.squashedBases) {
      if (base.path === path && (!found || base.revision > found.revision)) found = base;
    }
    return found;
  }

  get size(): number {
    return this.entries.length;
  }

  has(path: string, revision: number): boolean {
    return this.byKey.has(keyOf(path, revision));
  }

  /**
   * Newest synchronized revision of a path. With `known`, entries whose mark
   * fails the check are left out.
   */
  latestFor(path: string, known?: MarkFilter): IdentityEntry | undefined {
    let latest: IdentityEntry | undefined;
    for (const entry of this.byPath.get(path) ?? []) {
      if (known && !known(entry.mark)) continue;
      if (!latest || entry.revision > latest.revision) latest = entry;
    }
    return latest;
  }

  /** Highest mark among the entries, optionally only those `known` accepts. */
  highestMark(known?: MarkFilter): number | undefined {
    let highest: number | undefined;
    for (const entry of this.entries) {
      if (known && !known(entry.mark)) continue;
      if (highest === undefined || entry.mark > highest) highest = entry.mark;
    }
    return highest;
  }

  /** Every path ever synchronized, sorted. */
  trackedPaths(): string[] {
    return [...this.byPath.keys()].sort();
  }

  /** Paths whose latest synchronized revision is not a deletion, sorted. */
  livePaths(known?: MarkFilter): string[] {
    return this.trackedPaths().filter((path) => this.latestFor(path, known)?.deleted === false);
  }

  entriesForMark(mark: number): IdentityEntry[] {
    return this.entries.filter((entry) => entry.mark === mark);
  }

  /**
   * Hold entries produced by an export until the stream that carries their
   * commits has been written. Nothing is visible before `commitStaged`.
   */
  stage(entries: IdentityEntry[]): void {
    this.staged.push(...entries);
  }

  discardStaged(): void {
    this.staged = [];
  }

  get stagedCount(): number {
    return this.staged.length;
  }

  async commitStaged(update: { head: SyncHead | null; nextMark: number; squashedBases?: SquashedBase[] }): Promise<void> {
    const fresh = this.staged.filter((entry) => this.remember(entry, true));
    this.staged = [];
    await durableAppend(
      join(this.directory, REVISIONS_FILE),
      fresh.map((entry) => JSON.stringify(entry) + '\n').join('')
    );

    const bases = new Map<string, SquashedBase>();
    for (const base of [...this.state.squashedBases, ...(update.squashedBases ?? [])]) {
      bases.set(keyOf(base.path, base.revision), base);
    }
    await this.saveState({
      version: STATE_VERSION,
      head: update.head,
      nextMark: Math.max(this.state.nextMark, update.nextMark),
      squashedBases: [...bases.values()]
    });
    logger.debug('Identity map entries committed', { entries: fresh.length, head: update.head?.mark });
  }

  /**
   * Append a single entry immediately. Used while pushing, where each wiki
   * mutation must be recorded before the next one starts.
   */
  async record(entry: IdentityEntry): Promise<void> {
    if (!this.remember(entry)) return;
    await durableAppend(join(this.directory, REVISIONS_FILE), JSON.stringify(entry) + '\n');
  }

  async advanceHead(head: SyncHead): Promise<void> {
    await this.saveState({
      ...this.state,
      head,
      nextMark: Math.max(this.state.nextMark, head.mark + 1)
    });
  }

  private async saveState(state: SyncState): Promise<void> {
    await atomicWriteJson(join(this.directory, STATE_FILE), state);
    this.state = state;
  }
}

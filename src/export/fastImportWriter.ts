import type { EntryKind } from '../dokuwiki/types.js';

/**
 * One materialized wiki revision. `content === null` removes the path.
 */
export interface CommitRecord {
  mark: number;
  path: string;
  wikiId: string;
  kind: EntryKind;
  revision: number;
  author: string;
  email: string;
  timestamp: number;
  message: string;
  content: Buffer | null;
  /** Previous commit on the branch: a mark, the existing private ref, or none. */
  parent: number | 'ref' | null;
}

const NEEDS_QUOTING = /[\x00-\x1f"\\\x7f]/;

/**
 * C-style quoting for paths git would otherwise misread.
 */
export function quotePath(path: string): string {
  if (!NEEDS_QUOTING.test(path)) return path;
  let quoted = '"';
  for (const ch of path) {
    switch (ch) {
      case '"': quoted += '\\"'; break;
      case '\\': quoted += '\\\\'; break;
      case '\n': quoted += '\\n'; break;
      case '\t': quoted += '\\t'; break;
      default: {
        const code = ch.charCodeAt(0);
        quoted += code < 0x20 || code === 0x7f ? `\\${code.toString(8).padStart(3, '0')}` : ch;
      }
    }
  }
  return quoted + '"';
}

function identity(name: string, email: string, timestamp: number): string {
  const cleanName = name.replace(/[<>\n]/g, '').trim() || 'unknown';
  const cleanEmail = email.replace(/[<>\s]/g, '');
  return `${cleanName} <${cleanEmail}> ${timestamp} +0000`;
}

function data(payload: Buffer | string): Buffer[] {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  return [Buffer.from(`data ${body.length}\n`), body, Buffer.from('\n')];
}

export interface StreamHeader {
  marksPath: string;
}

/**
 * Serializes commit records into a git fast-import stream.
 */
export class FastImportWriter {
  private readonly chunks: Buffer[] = [];

  header({ marksPath }: StreamHeader): this {
    this.line('feature done');
    this.line(`feature import-marks-if-exists=${marksPath}`);
    this.line(`feature export-marks=${marksPath}`);
    return this;
  }

  commit(ref: string, record: CommitRecord): this {
    const who = identity(record.author, record.email, record.timestamp);
    this.line(`commit ${ref}`);
    this.line(`mark :${record.mark}`);
    this.line(`author ${who}`);
    this.line(`committer ${who}`);
    this.chunks.push(...data(record.message));
    if (record.parent === 'ref') {
      this.line(`from ${ref}^0`);
    } else if (record.parent !== null) {
      this.line(`from :${record.parent}`);
    }
    if (record.content === null) {
      this.line(`D ${quotePath(record.path)}`);
    } else {
      this.line(`M 100644 inline ${quotePath(record.path)}`);
      this.chunks.push(...data(record.content));
    }
    this.line('');
    return this;
  }

  done(): this {
    this.line('done');
    return this;
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }

  private line(text: string): void {
    this.chunks.push(Buffer.from(text + '\n', 'utf8'));
  }
}

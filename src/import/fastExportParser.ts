import type { LineReader } from '../protocol/lineReader.js';

export type DataRef =
  | { kind: 'mark'; mark: number }
  | { kind: 'sha'; sha: string }
  | { kind: 'inline'; data: Buffer };

export type FileChange =
  | { type: 'modify'; mode: string; path: string; ref: DataRef }
  | { type: 'delete'; path: string }
  | { type: 'deleteall' }
  | { type: 'rename' | 'copy'; source: string; path: string };

export interface PersonLine {
  name: string;
  email: string;
  timestamp: number;
  timezone: string;
}

export interface ParsedCommit {
  ref: string;
  mark: number | null;
  author: PersonLine | null;
  committer: PersonLine | null;
  message: string;
  from: string | null;
  merges: string[];
  changes: FileChange[];
}

export interface ParsedReset {
  ref: string;
  from: string | null;
}

export interface FastExportStream {
  features: string[];
  blobs: Map<number, Buffer>;
  commits: ParsedCommit[];
  resets: ParsedReset[];
}

export class FastExportSyntaxError extends Error {
  constructor(message: string, readonly line?: string) {
    super(line === undefined ? message : `${message}: ${JSON.stringify(line)}`);
    this.name = 'FastExportSyntaxError';
  }
}

const ESCAPES: Record<string, number> = {
  a: 0x07, b: 0x08, f: 0x0c, n: 0x0a, r: 0x0d, t: 0x09, v: 0x0b, '"': 0x22, '\\': 0x5c
};

/**
 * Reads a path at the start of `text`, C-style quoted or bare. Bare paths end
 * at the first space when `untilSpace` is set, otherwise at end of line.
 */
export function readPath(text: string, untilSpace = false): { path: string; rest: string } {
  if (!text.startsWith('"')) {
    if (!untilSpace) return { path: text, rest: '' };
    const space = text.indexOf(' ');
    return space < 0
      ? { path: text, rest: '' }
      : { path: text.slice(0, space), rest: text.slice(space + 1) };
  }

  const bytes: number[] = [];
  let i = 1;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (ch === '"') {
      const rest = text.slice(i + 1).replace(/^ /, '');
      return { path: Buffer.from(bytes).toString('utf8'), rest };
    }
    if (ch === '\\') {
      const next = text.charAt(i + 1);
      const escape = ESCAPES[next];
      if (escape !== undefined) {
        bytes.push(escape);
        i += 2;
        continue;
      }
      const octal = /^[0-7]{3}/.exec(text.slice(i + 1));
      if (octal) {
        bytes.push(parseInt(octal[0], 8));
        i += 4;
        continue;
      }
      throw new FastExportSyntaxError('Bad escape in quoted path', text);
    }
    bytes.push(...Buffer.from(ch, 'utf8'));
    i += ch.length;
  }
  throw new FastExportSyntaxError('Unterminated quoted path', text);
}

export function parsePerson(text: string): PersonLine {
  const match = /^(.*?) ?<([^>]*)> (\d+) ([+-]\d{4})$/.exec(text);
  if (!match) throw new FastExportSyntaxError('Malformed identity', text);
  return {
    name: match[1] ?? '',
    email: match[2] ?? '',
    timestamp: Number(match[3]),
    timezone: match[4] ?? '+0000'
  };
}

function parseDataRef(text: string): DataRef | 'inline' {
  if (text === 'inline') return 'inline';
  if (text.startsWith(':')) return { kind: 'mark', mark: Number(text.slice(1)) };
  return { kind: 'sha', sha: text };
}

/**
 * Parser for the stream `git fast-export` writes to the helper during a push.
 * Reads up to and including the terminating `done`.
 */
export class FastExportParser {
  private peeked: string | null = null;

  constructor(private readonly reader: LineReader) {}

  async parse(): Promise<FastExportStream> {
    const stream: FastExportStream = { features: [], blobs: new Map(), commits: [], resets: [] };

    for (;;) {
      const line = await this.nextLine();
      if (line === null) throw new FastExportSyntaxError('Stream ended before done');
      if (line === '') continue;
      if (line === 'done') return stream;

      const [command = '', ...args] = line.split(' ');
      const rest = args.join(' ');
      switch (command) {
        case 'feature':
          stream.features.push(rest);
          break;
        case 'blob':
          await this.parseBlob(stream);
          break;
        case 'commit':
          stream.commits.push(await this.parseCommit(rest));
          break;
        case 'reset':
          stream.resets.push(await this.parseReset(rest));
          break;
        case 'progress':
        case 'checkpoint':
          break;
        case 'tag':
          throw new FastExportSyntaxError('Tags cannot be pushed to a wiki', line);
        default:
          throw new FastExportSyntaxError('Unexpected command', line);
      }
    }
  }

  private async nextLine(): Promise<string | null> {
    if (this.peeked !== null) {
      const line = this.peeked;
      this.peeked = null;
      return line;
    }
    return this.reader.readLine();
  }

  private async requireLine(context: string): Promise<string> {
    const line = await this.nextLine();
    if (line === null) throw new FastExportSyntaxError(`Stream ended inside ${context}`);
    return line;
  }

  private async readData(line: string): Promise<Buffer> {
    if (!line.startsWith('data ')) throw new FastExportSyntaxError('Expected data', line);
    const spec = line.slice(5);

    if (spec.startsWith('<<')) {
      const delimiter = spec.slice(2);
      const lines: string[] = [];
      for (;;) {
        const next = await this.requireLine('delimited data');
        if (next === delimiter) break;
        lines.push(next + '\n');
      }
      return Buffer.from(lines.join(''), 'utf8');
    }

    const length = Number(spec);
    if (!Number.isInteger(length) || length < 0) throw new FastExportSyntaxError('Bad data length', line);
    return this.reader.readBytes(length);
  }

  private async parseBlob(stream: FastExportStream): Promise<void> {
    let mark: number | null = null;
    let line = await this.requireLine('blob');
    if (line.startsWith('mark :')) {
      mark = Number(line.slice(6));
      line = await this.requireLine('blob');
    }
    if (line.startsWith('original-oid ')) {
      line = await this.requireLine('blob');
    }
    const data = await this.readData(line);
    if (mark !== null) stream.blobs.set(mark, data);
  }

  private async parseReset(ref: string): Promise<ParsedReset> {
    const line = await this.nextLine();
    if (line !== null && line.startsWith('from ')) {
      return { ref, from: line.slice(5) };
    }
    this.peeked = line;
    return { ref, from: null };
  }

  private async parseCommit(ref: string): Promise<ParsedCommit> {
    const commit: ParsedCommit = {
      ref,
      mark: null,
      author: null,
      committer: null,
      message: '',
      from: null,
      merges: [],
      changes: []
    };

    // Header up to and including the message.
    for (;;) {
      const line = await this.requireLine('commit');
      if (line.startsWith('mark :')) commit.mark = Number(line.slice(6));
      else if (line.startsWith('original-oid ')) continue;
      else if (line.startsWith('author ')) commit.author = parsePerson(line.slice(7));
      else if (line.startsWith('committer ')) commit.committer = parsePerson(line.slice(10));
      else if (line.startsWith('encoding ')) continue;
      else if (line.startsWith('data ')) {
        commit.message = (await this.readData(line)).toString('utf8');
        break;
      } else throw new FastExportSyntaxError('Unexpected commit header', line);
    }

    for (;;) {
      const line = await this.nextLine();
      if (line === null || line === '') return commit;

      if (line.startsWith('from ')) {
        commit.from = line.slice(5);
      } else if (line.startsWith('merge ')) {
        commit.merges.push(line.slice(6));
      } else if (line === 'deleteall') {
        commit.changes.push({ type: 'deleteall' });
      } else if (line.startsWith('M ')) {
        commit.changes.push(await this.parseModify(line));
      } else if (line.startsWith('D ')) {
        commit.changes.push({ type: 'delete', path: readPath(line.slice(2)).path });
      } else if (line.startsWith('R ') || line.startsWith('C ')) {
        const { path: source, rest } = readPath(line.slice(2), true);
        commit.changes.push({
          type: line.startsWith('R ') ? 'rename' : 'copy',
          source,
          path: readPath(rest).path
        });
      } else if (line.startsWith('N ')) {
        // Notes are not part of the tree.
        const [, dataref = ''] = line.split(' ');
        if (dataref === 'inline') await this.readData(await this.requireLine('note'));
      } else {
        this.peeked = line;
        return commit;
      }
    }
  }

  private async parseModify(line: string): Promise<FileChange> {
    const match = /^M (\d{6}) (\S+) (.+)$/.exec(line);
    if (!match?.[1] || !match[2] || !match[3]) throw new FastExportSyntaxError('Malformed filemodify', line);
    const mode = match[1];
    const path = readPath(match[3]).path;
    const ref = parseDataRef(match[2]);
    if (ref === 'inline') {
      const data = await this.readData(await this.requireLine('inline data'));
      return { type: 'modify', mode, path, ref: { kind: 'inline', data } };
    }
    return { type: 'modify', mode, path, ref };
  }
}

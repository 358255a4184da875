import { readFile } from 'fs/promises';
import { isMissingFileError } from '../fs/atomicWriter.js';

/**
 * Marks written by fast-import/fast-export (`:<mark> <sha>` per line).
 */
export class MarksFile {
  constructor(private readonly marks: ReadonlyMap<number, string>) {}

  static parse(text: string): MarksFile {
    const marks = new Map<number, string>();
    for (const line of text.split('\n')) {
      const match = /^:(\d+) ([0-9a-f]{40,64})$/.exec(line.trim());
      if (match?.[1] && match[2]) {
        marks.set(Number(match[1]), match[2]);
      }
    }
    return new MarksFile(marks);
  }

  static async load(filePath: string): Promise<MarksFile> {
    try {
      return MarksFile.parse(await readFile(filePath, 'utf8'));
    } catch (error) {
      if (isMissingFileError(error)) return new MarksFile(new Map());
      throw error;
    }
  }

  has(mark: number): boolean {
    return this.marks.has(mark);
  }

  sha(mark: number): string | undefined {
    return this.marks.get(mark);
  }

  /** Highest mark in the file, 0 when empty. */
  get highest(): number {
    let max = 0;
    for (const mark of this.marks.keys()) {
      if (mark > max) max = mark;
    }
    return max;
  }

  get size(): number {
    return this.marks.size;
  }
}

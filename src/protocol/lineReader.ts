/**
 * Buffered reader over a byte stream (stdin) that hands out newline-terminated
 * lines and exact-length byte blocks, as fast-export `data` sections need.
 */
export class LineReader {
  private buffer: Buffer = Buffer.alloc(0);
  private ended = false;
  private readonly iterator: AsyncIterator<unknown>;

  constructor(source: AsyncIterable<unknown>) {
    this.iterator = source[Symbol.asyncIterator]();
  }

  /**
   * Next line without its terminator (a trailing `\r` is kept), or null at
   * end of input.
   */
  async readLine(): Promise<string | null> {
    for (;;) {
      const idx = this.buffer.indexOf(0x0a);
      if (idx >= 0) {
        const line = this.buffer.subarray(0, idx).toString('utf8');
        this.buffer = this.buffer.subarray(idx + 1);
        return line;
      }
      if (!(await this.fill())) {
        if (this.buffer.length === 0) return null;
        const line = this.buffer.toString('utf8');
        this.buffer = Buffer.alloc(0);
        return line;
      }
    }
  }

  /**
   * Exactly `length` bytes. Fails if the input ends first.
   */
  async readBytes(length: number): Promise<Buffer> {
    while (this.buffer.length < length) {
      if (!(await this.fill())) {
        throw new Error(`Unexpected end of input: wanted ${length} bytes, got ${this.buffer.length}`);
      }
    }
    const bytes = Buffer.from(this.buffer.subarray(0, length));
    this.buffer = this.buffer.subarray(length);
    return bytes;
  }

  private async fill(): Promise<boolean> {
    if (this.ended) return false;
    const { value, done } = await this.iterator.next();
    if (done) {
      this.ended = true;
      return false;
    }
    const chunk = typeof value === 'string'
      ? Buffer.from(value, 'utf8')
      : value instanceof Uint8Array ? Buffer.from(value) : null;
    if (chunk === null) {
      throw new TypeError('LineReader source must yield strings or bytes');
    }
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    return true;
  }
}

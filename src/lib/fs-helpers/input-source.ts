import { EMPTY_BUFFER, READ_CHUNK_SIZE } from '../constants.js';
import type { ChunkReader, ChunkReaderKind } from './chunk-reader.js';

const NEWLINE = 0x0a;

export class InputSource {
  private pending: Buffer = EMPTY_BUFFER;
  private exhausted = false;
  private closed = false;

  constructor(
    readonly name: string,
    private readonly reader: ChunkReader,
    private readonly chunkSize: number = READ_CHUNK_SIZE
  ) {}

  get kind(): ChunkReaderKind {
    return this.reader.kind;
  }

  private async next(size: number): Promise<Buffer> {
    if (this.exhausted) return EMPTY_BUFFER;

    const chunk = await this.reader.read(size);
    if (chunk.length === 0) this.exhausted = true;
    return chunk;
  }

  private consume(length: number): Buffer {
    const taken = this.pending.subarray(0, length);
    this.pending = this.pending.subarray(length);
    return taken;
  }

  /**
   * Next line including its `\n` terminator. The last line of a source comes
   * back without one when the data does not end in a newline; an empty buffer
   * means end of source.
   */
  async readLine(): Promise<Buffer> {
    const buffered = this.pending.indexOf(NEWLINE);
    if (buffered !== -1) return this.consume(buffered + 1);

    const parts: Buffer[] = [this.consume(this.pending.length)];
    for (;;) {
      const chunk = await this.next(this.chunkSize);
      if (chunk.length === 0) return Buffer.concat(parts);

      const newLineIndex = chunk.indexOf(NEWLINE);
      if (newLineIndex === -1) {
        parts.push(chunk);
        continue;
      }
      parts.push(chunk.subarray(0, newLineIndex + 1));
      this.pending = chunk.subarray(newLineIndex + 1);
      return Buffer.concat(parts);
    }
  }

  /**
   * Up to `count` bytes; fewer only when the source ends first. Each request
   * asks for at most the bytes still missing.
   */
  async readBytes(count: number): Promise<Buffer> {
    if (this.pending.length >= count) return this.consume(count);

    const head = this.consume(this.pending.length);
    const parts: Buffer[] = [head];
    let collected = head.length;
    while (collected < count) {
      const chunk = await this.next(Math.min(this.chunkSize, count - collected));
      if (chunk.length === 0) break;
      parts.push(chunk);
      collected += chunk.length;
    }

    // Stream readers may hand back more than was asked for.
    this.pending = Buffer.concat(parts);
    return this.consume(Math.min(count, this.pending.length));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const unread = this.pending;
    this.pending = EMPTY_BUFFER;
    await this.reader.close(unread);
  }
}

import type { FileHandle } from 'node:fs/promises';
import type { Readable } from 'node:stream';

import { EMPTY_BUFFER } from '../constants.js';

export type ChunkReaderKind = 'file' | 'stream';

/**
 * Byte-level capability behind an input source. A file-backed reader owns its
 * handle; a stream-backed reader borrows a stream (standard input) it must
 * never close.
 */
export interface ChunkReader {
  readonly kind: ChunkReaderKind;
  /**
   * Resolves to an empty buffer once the data is exhausted. Stream readers may
   * return more than `size` bytes.
   */
  read(size: number): Promise<Buffer>;
  /** `unread` holds bytes that were buffered but never consumed. */
  close(unread: Buffer): Promise<void>;
}

export class FileChunkReader implements ChunkReader {
  readonly kind = 'file';

  constructor(private readonly handle: FileHandle) {}

  async read(size: number): Promise<Buffer> {
    const buffer = Buffer.alloc(size);
    const { bytesRead } = await this.handle.read(buffer, 0, size, null);
    return buffer.subarray(0, bytesRead);
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) return chunk;
  if (typeof chunk === 'string') return Buffer.from(chunk, 'utf8');
  if (chunk instanceof Uint8Array) return Buffer.from(chunk);
  return Buffer.from(String(chunk), 'utf8');
}

function waitForReadable(stream: Readable): Promise<void> {
  return new Promise((resolve, reject) => {
    const onReady = (): void => {
      cleanup();
      resolve();
    };
    const onError = (error: Error): void => {
      cleanup();
      reject(error);
    };
    const cleanup = (): void => {
      stream.off('readable', onReady);
      stream.off('end', onReady);
      stream.off('close', onReady);
      stream.off('error', onError);
    };

    stream.on('readable', onReady);
    stream.on('end', onReady);
    stream.on('close', onReady);
    stream.on('error', onError);
  });
}

/**
 * Pulls chunks from a readable stream in paused mode. Bytes handed back on
 * close are carried over to the next read, so a stream opened again by name
 * resumes where the previous source stopped consuming.
 */
export class StreamChunkReader implements ChunkReader {
  readonly kind = 'stream';
  private carry: Buffer = EMPTY_BUFFER;
  private failure: Error | undefined;

  constructor(private readonly stream: Readable) {
    stream.on('error', (error: Error) => {
      this.failure ??= error;
    });
  }

  async read(): Promise<Buffer> {
    if (this.carry.length > 0) {
      const carried = this.carry;
      this.carry = EMPTY_BUFFER;
      return carried;
    }

    for (;;) {
      if (this.failure) throw this.failure;
      if (this.stream.errored) throw this.stream.errored;
      const chunk: unknown = this.stream.read();
      if (chunk !== null) return toBuffer(chunk);
      if (this.stream.readableEnded || this.stream.destroyed) {
        return EMPTY_BUFFER;
      }
      await waitForReadable(this.stream);
    }
  }

  close(unread: Buffer): Promise<void> {
    if (unread.length > 0) {
      this.carry =
        this.carry.length === 0 ? unread : Buffer.concat([unread, this.carry]);
    }
    return Promise.resolve();
  }
}

const STREAM_READERS = new WeakMap<Readable, StreamChunkReader>();

export function getStreamChunkReader(stream: Readable): StreamChunkReader {
  let reader = STREAM_READERS.get(stream);
  if (!reader) {
    reader = new StreamChunkReader(stream);
    STREAM_READERS.set(stream, reader);
  }
  return reader;
}

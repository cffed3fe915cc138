import type { Writable } from 'node:stream';

import { outputFailed } from './errors.js';
import type { HeadSink } from './fs-helpers.js';

function writeChunk(stream: Writable, chunk: Buffer | string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(chunk, (error?: Error | null) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * Awaits every write so output stays ordered with diagnostics. Any failure,
 * including one the stream reports through its `error` event, becomes an
 * `E_OUTPUT_FAILED` error.
 */
export class OutputSink implements HeadSink {
  private failure: Error | undefined;

  constructor(
    private readonly stream: Writable,
    readonly channel: string
  ) {
    stream.on('error', (error: Error) => {
      this.failure ??= error;
    });
  }

  async write(chunk: Buffer | string): Promise<void> {
    if (this.failure) throw outputFailed(this.channel, this.failure);
    try {
      await writeChunk(this.stream, chunk);
    } catch (error: unknown) {
      throw outputFailed(this.channel, error);
    }
  }

  async writeLine(line: string): Promise<void> {
    await this.write(`${line}\n`);
  }
}

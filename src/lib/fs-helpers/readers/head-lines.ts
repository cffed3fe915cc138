import type { InputSource } from '../input-source.js';
import type { HeadSink } from './head-sink.js';

/**
 * Copies up to `numLines` lines, writing each as soon as it is read. Lines are
 * passed through as raw bytes. Resolves to the number of bytes consumed.
 */
export async function copyHeadLines(
  source: InputSource,
  numLines: number,
  sink: HeadSink
): Promise<number> {
  let bytesRead = 0;

  for (let emitted = 0; emitted < numLines; emitted++) {
    const line = await source.readLine();
    if (line.length === 0) break;

    bytesRead += line.length;
    await sink.write(line);
  }

  return bytesRead;
}

import type { InputSource } from '../input-source.js';
import type { HeadSink } from './head-sink.js';
import { decodeUtf8Lossy } from './utf8.js';

export async function copyHeadBytes(
  source: InputSource,
  maxBytes: number,
  sink: HeadSink
): Promise<number> {
  const bytes = await source.readBytes(maxBytes);
  if (bytes.length > 0) {
    await sink.write(decodeUtf8Lossy(bytes));
  }
  return bytes.length;
}

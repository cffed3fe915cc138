import { TextDecoder } from 'node:util';

// A leading BOM is kept: the output mirrors the bytes that were read.
const LOSSY_DECODER = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });

/** Invalid or truncated sequences become U+FFFD. */
export function decodeUtf8Lossy(bytes: Uint8Array): string {
  return LOSSY_DECODER.decode(bytes);
}

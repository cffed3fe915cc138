import * as fs from 'node:fs/promises';
import type { Readable } from 'node:stream';

import { STDIN_SOURCE } from '../constants.js';
import type { HeadError } from '../errors.js';
import { openFailed } from '../errors.js';
import { FileChunkReader, getStreamChunkReader } from './chunk-reader.js';
import { InputSource } from './input-source.js';

export type OpenSourceResult =
  | { readonly ok: true; readonly source: InputSource }
  | { readonly ok: false; readonly error: HeadError };

/**
 * `-` binds to `stdin` and never fails here; read failures on it surface
 * later. Any other name is opened read-only as a path.
 */
export async function openSource(
  name: string,
  stdin: Readable
): Promise<OpenSourceResult> {
  if (name === STDIN_SOURCE) {
    return {
      ok: true,
      source: new InputSource(name, getStreamChunkReader(stdin)),
    };
  }

  try {
    const handle = await fs.open(name, 'r');
    return { ok: true, source: new InputSource(name, new FileChunkReader(handle)) };
  } catch (error: unknown) {
    return { ok: false, error: openFailed(name, error) };
  }
}

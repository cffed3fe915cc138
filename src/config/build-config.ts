import { DEFAULT_LINE_COUNT, STDIN_SOURCE } from '../lib/constants.js';
import {
  conflictingFlags,
  ErrorCode,
  HeadError,
  isHeadError,
} from '../lib/errors.js';
import { parsePositiveInt } from '../lib/positive-int.js';
import type { HeadConfig, HeaderPolicy, HeadMode } from './types.js';

export interface RawHeadOptions {
  files: readonly string[];
  lines?: string | undefined;
  bytes?: string | undefined;
  headers?: HeaderPolicy | undefined;
}

type CountUnit = 'line' | 'byte';

function parseCount(token: string, unit: CountUnit): number {
  try {
    return parsePositiveInt(token);
  } catch (error: unknown) {
    if (isHeadError(error, ErrorCode.E_INVALID_COUNT)) {
      throw new HeadError(
        ErrorCode.E_INVALID_COUNT,
        `illegal ${unit} count -- ${token}`,
        undefined,
        { token, unit },
        error
      );
    }
    throw error;
  }
}

function resolveSources(
  files: readonly string[]
): readonly [string, ...string[]] {
  const [first, ...rest] = files;
  return first === undefined ? [STDIN_SOURCE] : [first, ...rest];
}

function resolveMode(lineCount: number, byteCount?: number): HeadMode {
  if (byteCount !== undefined) return { kind: 'bytes', count: byteCount };
  return { kind: 'lines', count: lineCount };
}

export function buildConfig(raw: RawHeadOptions): HeadConfig {
  if (raw.lines !== undefined && raw.bytes !== undefined) {
    throw conflictingFlags();
  }

  const lineCount =
    raw.lines === undefined ? DEFAULT_LINE_COUNT : parseCount(raw.lines, 'line');
  const byteCount =
    raw.bytes === undefined ? undefined : parseCount(raw.bytes, 'byte');

  return {
    sources: resolveSources(raw.files),
    lineCount,
    mode: resolveMode(lineCount, byteCount),
    headers: raw.headers ?? 'auto',
  };
}

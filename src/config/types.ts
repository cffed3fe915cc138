import type { HeadError } from '../lib/errors.js';

export type HeadMode =
  | { readonly kind: 'lines'; readonly count: number }
  | { readonly kind: 'bytes'; readonly count: number };

export type HeadModeKind = HeadMode['kind'];

export type HeaderPolicy = 'auto' | 'always' | 'never';

export interface HeadConfig {
  readonly sources: readonly [string, ...string[]];
  /** Kept at its default when byte mode is active. */
  readonly lineCount: number;
  readonly mode: HeadMode;
  readonly headers: HeaderPolicy;
}

export type SourceOutcome =
  | { readonly ok: true; readonly source: string; readonly bytesRead: number }
  | { readonly ok: false; readonly source: string; readonly error: HeadError };

export interface HeadRunSummary {
  readonly sources: number;
  readonly outcomes: readonly SourceOutcome[];
  readonly succeeded: number;
  readonly failed: number;
}

export const ErrorCode = {
  E_INVALID_COUNT: 'E_INVALID_COUNT',
  E_CONFLICTING_FLAGS: 'E_CONFLICTING_FLAGS',
  E_OPEN_FAILED: 'E_OPEN_FAILED',
  E_READ_FAILED: 'E_READ_FAILED',
  E_OUTPUT_FAILED: 'E_OUTPUT_FAILED',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

import { createHash } from 'node:crypto';
import { channel } from 'node:diagnostics_channel';
import { performance } from 'node:perf_hooks';

import type { HeadModeKind, SourceOutcome } from '../../config/types.js';
import { formatUnknownErrorMessage } from '../errors.js';

type DiagnosticsDetail = 0 | 1 | 2;

export interface SourceDiagnosticsEvent {
  phase: 'start' | 'end';
  mode: HeadModeKind;
  source?: string;
  ok?: boolean;
  durationMs?: number;
  bytesRead?: number;
  error?: string;
}

export const SOURCE_CHANNEL_NAME = 'headr:source';

const SOURCE_CHANNEL = channel(SOURCE_CHANNEL_NAME);

function isTrue(val?: string): boolean {
  const norm = val?.trim().toLowerCase();
  return norm === '1' || norm === 'true' || norm === 'yes';
}

function parseDetail(val?: string): DiagnosticsDetail {
  const normalized = val?.trim();
  if (normalized === '2') return 2;
  if (normalized === '1') return 1;
  return 0;
}

function readConfig(): { enabled: boolean; detail: DiagnosticsDetail } {
  return {
    enabled: isTrue(process.env['HEADR_DIAGNOSTICS']),
    detail: parseDetail(process.env['HEADR_DIAGNOSTICS_DETAIL']),
  };
}

function hashSourceName(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

function normalizeSourceName(
  name: string,
  detail: DiagnosticsDetail
): string | undefined {
  if (detail === 0) return undefined;
  if (detail === 2) return name;
  return hashSourceName(name);
}

function publishStart(mode: HeadModeKind, source?: string): void {
  const event: SourceDiagnosticsEvent = { phase: 'start', mode };
  if (source !== undefined) event.source = source;
  SOURCE_CHANNEL.publish(event);
}

function publishEnd(
  mode: HeadModeKind,
  durationMs: number,
  outcome: { ok: boolean; bytesRead?: number; error?: string },
  source?: string
): void {
  const event: SourceDiagnosticsEvent = {
    phase: 'end',
    mode,
    ok: outcome.ok,
    durationMs,
  };
  if (source !== undefined) event.source = source;
  if (outcome.bytesRead !== undefined) event.bytesRead = outcome.bytesRead;
  if (outcome.error !== undefined) event.error = outcome.error;
  SOURCE_CHANNEL.publish(event);
}

/**
 * Publishes start/end events on `headr:source` around one source when
 * `HEADR_DIAGNOSTICS` is enabled and the channel has subscribers.
 */
export async function withSourceDiagnostics(
  name: string,
  mode: HeadModeKind,
  run: () => Promise<SourceOutcome>
): Promise<SourceOutcome> {
  const { enabled, detail } = readConfig();
  if (!enabled || !SOURCE_CHANNEL.hasSubscribers) {
    return await run();
  }

  const source = normalizeSourceName(name, detail);
  const startMs = performance.now();
  publishStart(mode, source);

  try {
    const outcome = await run();
    const durationMs = performance.now() - startMs;
    if (outcome.ok) {
      publishEnd(mode, durationMs, { ok: true, bytesRead: outcome.bytesRead }, source);
    } else {
      publishEnd(mode, durationMs, { ok: false, error: outcome.error.message }, source);
    }
    return outcome;
  } catch (error: unknown) {
    publishEnd(
      mode,
      performance.now() - startMs,
      { ok: false, error: formatUnknownErrorMessage(error) },
      source
    );
    throw error;
  }
}

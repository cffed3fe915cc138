import * as diagnosticsChannel from 'node:diagnostics_channel';
import * as path from 'node:path';
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { buildConfig } from '../../../config/build-config.js';
import { printHeads } from '../../../lib/file-operations/print-heads.js';
import { SOURCE_CHANNEL_NAME } from '../../../lib/observability/diagnostics.js';
import { createCapturedIo } from '../../shared/capture-streams.js';
import {
  enableDiagnosticsEnv,
  restoreDiagnosticsEnv,
} from '../../shared/diagnostics-env.js';
import { withHeadFixture } from '../fixtures/head-hooks.js';

interface PublishedEvent {
  phase?: unknown;
  mode?: unknown;
  source?: unknown;
  ok?: unknown;
  durationMs?: unknown;
  bytesRead?: unknown;
  error?: unknown;
}

interface SourceSubscription {
  events: PublishedEvent[];
  unsubscribe: () => void;
}

function isPublishedEvent(value: unknown): value is PublishedEvent {
  return typeof value === 'object' && value !== null;
}

function subscribeSourceEvents(): SourceSubscription {
  const events: PublishedEvent[] = [];
  const onMessage = (message: unknown): void => {
    if (isPublishedEvent(message)) {
      events.push(message);
    }
  };

  diagnosticsChannel.subscribe(SOURCE_CHANNEL_NAME, onMessage);
  return {
    events,
    unsubscribe: () => {
      diagnosticsChannel.unsubscribe(SOURCE_CHANNEL_NAME, onMessage);
    },
  };
}

async function runWithEvents(
  files: string[],
  detail?: string
): Promise<PublishedEvent[]> {
  const envSnapshot =
    detail === undefined ? undefined : enableDiagnosticsEnv(detail);
  const subscription = subscribeSourceEvents();
  try {
    const { io } = createCapturedIo();
    await printHeads(buildConfig({ files, lines: '2' }), io);
    return subscription.events;
  } finally {
    subscription.unsubscribe();
    if (envSnapshot !== undefined) restoreDiagnosticsEnv(envSnapshot);
  }
}

void describe('source diagnostics', () => {
  withHeadFixture((getTestDir) => {
    const fixture = (name: string): string => path.join(getTestDir(), name);

    void it('publishes start and end events with raw names at detail 2', async () => {
      const name = fixture('alpha.txt');
      const events = await runWithEvents([name], '2');

      assert.strictEqual(events.length, 2);
      const [start, end] = events;
      assert.deepStrictEqual(start, { phase: 'start', mode: 'lines', source: name });
      assert.ok(end);
      assert.strictEqual(end.phase, 'end');
      assert.strictEqual(end.source, name);
      assert.strictEqual(end.ok, true);
      assert.strictEqual(end.bytesRead, 4);
      assert.strictEqual(typeof end.durationMs, 'number');
    });

    void it('reports the failure message for a missing source', async () => {
      if (process.platform === 'win32') return;
      const missing = fixture('missing.txt');
      const events = await runWithEvents([missing], '2');

      const end = events.find((event) => event.phase === 'end');
      assert.ok(end);
      assert.strictEqual(end.ok, false);
      assert.strictEqual(end.error, 'No such file or directory (os error 2)');
      assert.strictEqual(end.bytesRead, undefined);
    });

    void it('omits source names at detail 0', async () => {
      const events = await runWithEvents([fixture('alpha.txt')], '0');

      assert.strictEqual(events.length, 2);
      for (const event of events) {
        assert.strictEqual('source' in event, false);
      }
    });

    void it('hashes source names at detail 1', async () => {
      const name = fixture('alpha.txt');
      const events = await runWithEvents([name], '1');

      const [start] = events;
      assert.ok(start);
      assert.strictEqual(typeof start.source, 'string');
      assert.match(String(start.source), /^[0-9a-f]{16}$/);
      assert.notStrictEqual(start.source, name);
    });

    void it('publishes one pair of events per source', async () => {
      const events = await runWithEvents(
        [fixture('alpha.txt'), fixture('two-lines.txt')],
        '0'
      );
      assert.deepStrictEqual(
        events.map((event) => event.phase),
        ['start', 'end', 'start', 'end']
      );
    });

    void it('publishes nothing when diagnostics are disabled', async () => {
      const previous = process.env['HEADR_DIAGNOSTICS'];
      Reflect.deleteProperty(process.env, 'HEADR_DIAGNOSTICS');
      try {
        const events = await runWithEvents([fixture('alpha.txt')]);
        assert.deepStrictEqual(events, []);
      } finally {
        if (previous !== undefined) process.env['HEADR_DIAGNOSTICS'] = previous;
      }
    });
  });
});

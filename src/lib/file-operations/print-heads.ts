import type { Readable, Writable } from 'node:stream';

import { formatSourceHeader } from '../../config/formatting.js';
import type {
  HeadConfig,
  HeadMode,
  HeadRunSummary,
  SourceOutcome,
} from '../../config/types.js';
import {
  ErrorCode,
  formatDiagnostic,
  isHeadError,
  readFailed,
} from '../errors.js';
import { copyHeadBytes, copyHeadLines, openSource } from '../fs-helpers.js';
import type { HeadSink, InputSource } from '../fs-helpers.js';
import { withSourceDiagnostics } from '../observability/diagnostics.js';
import { OutputSink } from '../output.js';

export interface HeadIo {
  readonly stdin: Readable;
  readonly stdout: Writable;
  readonly stderr: Writable;
}

interface SourceTask {
  readonly name: string;
  readonly index: number;
  readonly mode: HeadMode;
  readonly showHeaders: boolean;
  readonly stdin: Readable;
  readonly output: OutputSink;
}

export function createProcessIo(): HeadIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  };
}

export function shouldPrintHeaders(config: HeadConfig): boolean {
  if (config.headers === 'always') return true;
  if (config.headers === 'never') return false;
  return config.sources.length > 1;
}

function copyHead(
  source: InputSource,
  mode: HeadMode,
  sink: HeadSink
): Promise<number> {
  if (mode.kind === 'bytes') return copyHeadBytes(source, mode.count, sink);
  return copyHeadLines(source, mode.count, sink);
}

/**
 * Closes `source` after it was processed. A close failure turns a successful
 * outcome into a read failure; an outcome that already failed keeps its first
 * error.
 */
export async function closeSource(
  source: InputSource,
  outcome: SourceOutcome
): Promise<SourceOutcome> {
  try {
    await source.close();
  } catch (error: unknown) {
    if (outcome.ok) {
      return {
        ok: false,
        source: outcome.source,
        error: readFailed(outcome.source, error),
      };
    }
  }
  return outcome;
}

async function processSource(task: SourceTask): Promise<SourceOutcome> {
  const opened = await openSource(task.name, task.stdin);
  if (!opened.ok) {
    return { ok: false, source: task.name, error: opened.error };
  }

  const { source } = opened;
  let outcome: SourceOutcome;
  try {
    if (task.showHeaders) {
      await task.output.write(formatSourceHeader(task.name, task.index));
    }
    const bytesRead = await copyHead(source, task.mode, task.output);
    outcome = { ok: true, source: task.name, bytesRead };
  } catch (error: unknown) {
    // Standard output is shared by every source, so its failures end the run.
    if (isHeadError(error, ErrorCode.E_OUTPUT_FAILED)) {
      await closeSource(source, { ok: false, source: task.name, error });
      throw error;
    }
    outcome = { ok: false, source: task.name, error: readFailed(task.name, error) };
  }
  return await closeSource(source, outcome);
}

function summarizeOutcomes(outcomes: readonly SourceOutcome[]): HeadRunSummary {
  const succeeded = outcomes.filter((outcome) => outcome.ok).length;
  return {
    sources: outcomes.length,
    outcomes,
    succeeded,
    failed: outcomes.length - succeeded,
  };
}

/**
 * Prints the head of every configured source in order. Open and read
 * failures are written to `io.stderr` as `<source>: <cause>` and the run moves
 * on; a failure writing to either output stream rejects with
 * `E_OUTPUT_FAILED`.
 */
export async function printHeads(
  config: HeadConfig,
  io: HeadIo = createProcessIo()
): Promise<HeadRunSummary> {
  const output = new OutputSink(io.stdout, 'standard output');
  const diagnostics = new OutputSink(io.stderr, 'standard error');
  const showHeaders = shouldPrintHeaders(config);
  const outcomes: SourceOutcome[] = [];

  for (const [index, name] of config.sources.entries()) {
    const outcome = await withSourceDiagnostics(name, config.mode.kind, () =>
      processSource({
        name,
        index,
        mode: config.mode,
        showHeaders,
        stdin: io.stdin,
        output,
      })
    );
    if (!outcome.ok) {
      await diagnostics.writeLine(formatDiagnostic(outcome.error));
    }
    outcomes.push(outcome);
  }

  return summarizeOutcomes(outcomes);
}

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  conflictingFlags,
  describeCause,
  ErrorCode,
  formatDiagnostic,
  HeadError,
  invalidCount,
  isHeadError,
  isNodeError,
  openFailed,
  outputFailed,
  readFailed,
} from '../../lib/errors.js';

function nodeError(code: string, errno?: number): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: simulated`);
  error.code = code;
  if (errno !== undefined) error.errno = errno;
  return error;
}

void describe('isNodeError', () => {
  void it('accepts errors carrying a string code', () => {
    assert.strictEqual(isNodeError(nodeError('ENOENT')), true);
  });

  void it('rejects plain errors and non-errors', () => {
    assert.strictEqual(isNodeError(new Error('test')), false);
    assert.strictEqual(isNodeError({ code: 'ENOENT' }), false);
    assert.strictEqual(isNodeError('ENOENT'), false);
    assert.strictEqual(isNodeError(null), false);
  });

  void it('rejects errors with a non-string code', () => {
    const error = Object.assign(new Error('test'), { code: 123 });
    assert.strictEqual(isNodeError(error), false);
  });
});

void describe('describeCause', () => {
  void it('renders known codes with the positive errno', () => {
    assert.strictEqual(
      describeCause(nodeError('ENOENT', -2)),
      'No such file or directory (os error 2)'
    );
    assert.strictEqual(
      describeCause(nodeError('EACCES', -13)),
      'Permission denied (os error 13)'
    );
  });

  void it('omits the errno suffix when none is available', () => {
    assert.strictEqual(describeCause(nodeError('EISDIR')), 'Is a directory');
  });

  void it('falls back to the error message for unknown codes', () => {
    assert.strictEqual(describeCause(nodeError('EWHATEVER', -99)), 'EWHATEVER: simulated');
    assert.strictEqual(describeCause(new Error('plain failure')), 'plain failure');
    assert.strictEqual(describeCause('text failure'), 'text failure');
  });
});

void describe('HeadError factories', () => {
  void it('invalidCount carries the token as message and detail', () => {
    const error = invalidCount('abc');
    assert.strictEqual(error.code, ErrorCode.E_INVALID_COUNT);
    assert.strictEqual(error.message, 'abc');
    assert.deepStrictEqual(error.details, { token: 'abc' });
  });

  void it('conflictingFlags names both options', () => {
    const error = conflictingFlags();
    assert.strictEqual(error.code, ErrorCode.E_CONFLICTING_FLAGS);
    assert.strictEqual(
      error.message,
      "option '--bytes' cannot be used with option '--lines'"
    );
  });

  void it('openFailed keeps the source and the cause', () => {
    const cause = nodeError('ENOENT', -2);
    const error = openFailed('missing.txt', cause);
    assert.strictEqual(error.code, ErrorCode.E_OPEN_FAILED);
    assert.strictEqual(error.source, 'missing.txt');
    assert.strictEqual(error.cause, cause);
    assert.match(String(error.stack), /Caused by: Error: ENOENT: simulated/);
  });

  void it('readFailed uses the read error code', () => {
    const error = readFailed('dir', nodeError('EISDIR', -21));
    assert.strictEqual(error.code, ErrorCode.E_READ_FAILED);
    assert.strictEqual(error.message, 'Is a directory (os error 21)');
  });

  void it('outputFailed names the channel', () => {
    const error = outputFailed('standard output', nodeError('EPIPE', -32));
    assert.strictEqual(error.code, ErrorCode.E_OUTPUT_FAILED);
    assert.strictEqual(
      error.message,
      'error writing to standard output: Broken pipe (os error 32)'
    );
    assert.deepStrictEqual(error.details, { channel: 'standard output' });
  });
});

void describe('isHeadError', () => {
  void it('matches by class and optionally by code', () => {
    const error = invalidCount('x');
    assert.strictEqual(isHeadError(error), true);
    assert.strictEqual(isHeadError(error, ErrorCode.E_INVALID_COUNT), true);
    assert.strictEqual(isHeadError(error, ErrorCode.E_OUTPUT_FAILED), false);
    assert.strictEqual(isHeadError(new Error('x')), false);
  });
});

void describe('formatDiagnostic', () => {
  void it('prefixes the source name', () => {
    const error = openFailed('missing.txt', nodeError('ENOENT', -2));
    assert.strictEqual(
      formatDiagnostic(error),
      'missing.txt: No such file or directory (os error 2)'
    );
  });

  void it('uses the bare message without a source', () => {
    const error = new HeadError(ErrorCode.E_OUTPUT_FAILED, 'stream closed');
    assert.strictEqual(formatDiagnostic(error), 'stream closed');
  });
});

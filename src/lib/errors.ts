import { ErrorCode } from '../config/types.js';

export { ErrorCode };

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

// Wording follows the operating system's strerror text.
export const NODE_ERROR_DESCRIPTIONS: Readonly<Record<string, string>> = {
  ENOENT: 'No such file or directory',
  EACCES: 'Permission denied',
  EPERM: 'Operation not permitted',
  EISDIR: 'Is a directory',
  ENOTDIR: 'Not a directory',
  ELOOP: 'Too many levels of symbolic links',
  ENAMETOOLONG: 'File name too long',
  EMFILE: 'Too many open files',
  ENFILE: 'Too many open files in system',
  EIO: 'Input/output error',
  EBUSY: 'Device or resource busy',
  ENXIO: 'No such device or address',
  EAGAIN: 'Resource temporarily unavailable',
  EPIPE: 'Broken pipe',
} as const;

export class HeadError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly source?: string,
    public readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'HeadError';
    Object.setPrototypeOf(this, HeadError.prototype);
  }

  static fromError(
    code: ErrorCode,
    message: string,
    originalError: unknown,
    source?: string,
    details?: Record<string, unknown>
  ): HeadError {
    const headError = new HeadError(
      code,
      message,
      source,
      details,
      originalError
    );
    if (originalError instanceof Error && originalError.stack) {
      headError.stack = `${String(headError.stack)}\nCaused by: ${originalError.stack}`;
    }
    return headError;
  }
}

export function isHeadError(
  error: unknown,
  code?: ErrorCode
): error is HeadError {
  if (!(error instanceof HeadError)) return false;
  return code === undefined || error.code === code;
}

export function formatUnknownErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Renders a Node I/O failure as `<description> (os error <errno>)`. */
export function describeCause(error: unknown): string {
  if (isNodeError(error) && error.code !== undefined) {
    const description = NODE_ERROR_DESCRIPTIONS[error.code];
    if (description !== undefined) {
      return typeof error.errno === 'number'
        ? `${description} (os error ${Math.abs(error.errno)})`
        : description;
    }
  }
  return formatUnknownErrorMessage(error);
}

/** The message is the offending token itself so callers can prefix it. */
export function invalidCount(token: string): HeadError {
  return new HeadError(ErrorCode.E_INVALID_COUNT, token, undefined, {
    token,
  });
}

export function conflictingFlags(): HeadError {
  return new HeadError(
    ErrorCode.E_CONFLICTING_FLAGS,
    "option '--bytes' cannot be used with option '--lines'"
  );
}

export function openFailed(source: string, cause: unknown): HeadError {
  return HeadError.fromError(
    ErrorCode.E_OPEN_FAILED,
    describeCause(cause),
    cause,
    source
  );
}

export function readFailed(source: string, cause: unknown): HeadError {
  return HeadError.fromError(
    ErrorCode.E_READ_FAILED,
    describeCause(cause),
    cause,
    source
  );
}

export function outputFailed(channel: string, cause: unknown): HeadError {
  return HeadError.fromError(
    ErrorCode.E_OUTPUT_FAILED,
    `error writing to ${channel}: ${describeCause(cause)}`,
    cause,
    undefined,
    { channel }
  );
}

export function formatDiagnostic(error: HeadError): string {
  return error.source === undefined
    ? error.message
    : `${error.source}: ${error.message}`;
}

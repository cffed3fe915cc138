// Helper function for parsing and validating integer environment variables
export function parseEnvInt(
  envVar: string,
  defaultValue: number,
  min: number,
  max: number
): number {
  const value = process.env[envVar];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min || parsed > max) {
    console.error(
      `[WARNING] Invalid ${envVar} value: ${value} (must be ${min}-${max}). Using default: ${defaultValue}`
    );
    return defaultValue;
  }

  return parsed;
}

export const STDIN_SOURCE = '-';

export const DEFAULT_LINE_COUNT = 10;

export const READ_CHUNK_SIZE = parseEnvInt(
  'HEADR_CHUNK_SIZE',
  64 * 1024,
  1,
  16 * 1024 * 1024
);

export const EMPTY_BUFFER: Buffer = Buffer.alloc(0);

import { z } from 'zod';

import { invalidCount } from './errors.js';

const PositiveCountSchema = z
  .string()
  .regex(/^\+?\d+$/)
  .transform((value) => Number(value))
  .pipe(z.number().int().positive().max(Number.MAX_SAFE_INTEGER));

/**
 * Parses a base-10 count that must be strictly positive. Zero, negative and
 * non-numeric tokens all fail with the same `E_INVALID_COUNT` error carrying
 * the token unchanged.
 */
export function parsePositiveInt(token: string): number {
  const result = PositiveCountSchema.safeParse(token);
  if (!result.success) {
    throw invalidCount(token);
  }
  return result.data;
}

/**
 * Row Validation
 * Rows coming back from PostgREST are untyped; parse them before mapping
 */

import type { z } from 'zod';

import { StorageError } from './errors.js';

/**
 * Parse a stored row (or row array) or throw StorageError
 */
export function parseRow<S extends z.ZodTypeAny>(
  schema: S,
  data: unknown,
  what: string
): z.output<S> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new StorageError(`Malformed ${what}`, { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Shared validation helpers
 */

import { z } from 'zod';

/**
 * zValidator hook: rethrow so the global error handler renders the
 * VALIDATION_ERROR envelope.
 */
export function rejectInvalid(result: { success: boolean; error?: z.ZodError }): void {
  if (!result.success && result.error) {
    throw result.error;
  }
}

/** Family member identifiers are graph node ids, not uuids */
export const memberIdSchema = z.string().trim().min(1).max(200);

export const pagingLimit = (max: number, fallback: number) =>
  z.coerce.number().int().positive().max(max).default(fallback);

/**
 * Chat API Validation Schemas
 */

import { z } from 'zod';
import { memberIdSchema, pagingLimit } from '@/validators/api';

/**
 * Session ID path parameter
 */
export const sessionIdParamSchema = z.object({
  id: z.string().uuid(),
}).strict();

/**
 * Session creation body
 */
export const createSessionSchema = z.object({
  familyMemberId: memberIdSchema,
  title: z.string().trim().min(1).max(200).optional(),
}).strict();

/**
 * Session listing query params
 */
export const listSessionsQuerySchema = z.object({
  familyMemberId: memberIdSchema.optional(),
  limit: pagingLimit(200, 50),
}).strict();

/**
 * Session update body; at least one field
 */
export const updateSessionSchema = z.object({
  title: z.string().trim().min(1).max(200).optional(),
  isPinned: z.boolean().optional(),
  sortOrder: z.number().int().optional(),
}).strict().refine(
  (patch) => patch.title !== undefined || patch.isPinned !== undefined || patch.sortOrder !== undefined,
  { message: 'At least one of title, isPinned or sortOrder is required' }
);

/**
 * Bulk reorder body
 */
export const reorderSessionsSchema = z.object({
  orders: z.array(z.object({
    id: z.string().uuid(),
    sortOrder: z.number().int(),
  }).strict()).min(1).max(500),
}).strict();

/**
 * Message listing query params
 */
export const listMessagesQuerySchema = z.object({
  limit: pagingLimit(500, 100),
  offset: z.coerce.number().int().nonnegative().default(0),
}).strict();

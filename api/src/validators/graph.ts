/**
 * Graph API Validation Schemas
 *
 * Zod schemas for health-graph read endpoints
 */

import { z } from 'zod';
import { memberIdSchema } from '@/validators/api';

/**
 * Semantic history search query params.
 * topK above the configured maximum is capped, not rejected.
 */
export const searchQuerySchema = z.object({
  query: z.string().trim().min(1).max(2000),
  familyMemberId: memberIdSchema,
  topK: z.coerce.number().int().positive().optional(),
  actorId: memberIdSchema.optional(),
}).strict();

/**
 * Family member path parameter
 */
export const memberIdParamSchema = z.object({
  id: memberIdSchema,
}).strict();

/**
 * Optional asking member on member-scoped reads
 */
export const actorQuerySchema = z.object({
  actorId: memberIdSchema.optional(),
}).strict();

/**
 * Lab event path parameters
 */
export const labEventParamSchema = z.object({
  id: memberIdSchema,
  labEventId: z.string().trim().min(1).max(200),
}).strict();

/**
 * Similar lab events query params, topK capped like search
 */
export const similarQuerySchema = z.object({
  topK: z.coerce.number().int().positive().optional(),
  actorId: memberIdSchema.optional(),
}).strict();

/**
 * Consent API Validation Schemas
 */

import { z } from 'zod';
import { memberIdSchema } from '@/validators/api';

export const listConsentQuerySchema = z.object({
  actorId: memberIdSchema,
}).strict();

/**
 * Grant or revoke body. Category '*' covers every category of the person.
 */
export const consentGrantSchema = z.object({
  actorId: memberIdSchema,
  personId: memberIdSchema,
  category: z.string().trim().min(1).max(100).regex(/^(\*|[a-z0-9_]+)$/),
}).strict().refine((grant) => grant.actorId !== grant.personId, {
  message: 'Members always see their own records',
  path: ['personId'],
});

/**
 * Consent Routes
 *
 * Manage which family members may see another member's consent_required data
 *
 * Routes:
 * - GET    /v1/consent?actorId=   - Active grants held by an actor
 * - POST   /v1/consent            - Grant { actorId, personId, category }
 * - DELETE /v1/consent            - Revoke { actorId, personId, category }
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { ConsentGrant } from '@/services/consent.service';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';
import { rejectInvalid } from '@/validators/api';
import { consentGrantSchema, listConsentQuerySchema } from '@/validators/consent';

const consent = new Hono<HonoEnv>();

function serializeGrant(grant: ConsentGrant) {
  return {
    id: grant.id,
    actor_id: grant.actorId,
    person_id: grant.personId,
    category: grant.category,
    granted_at: grant.grantedAt.toISOString(),
  };
}

consent.get('/', zValidator('query', listConsentQuerySchema, rejectInvalid), async (c) => {
  const { consent: store } = c.get('services');
  const { actorId } = c.req.valid('query');

  const grants = await store.listActiveGrants(actorId);

  return c.json({ data: grants.map(serializeGrant) });
});

consent.post('/', zValidator('json', consentGrantSchema, rejectInvalid), async (c) => {
  const { consent: store } = c.get('services');
  const input = c.req.valid('json');

  const grant = await store.grant(input);

  return c.json({ data: serializeGrant(grant) }, 201);
});

consent.delete('/', zValidator('json', consentGrantSchema, rejectInvalid), async (c) => {
  const { consent: store } = c.get('services');
  const input = c.req.valid('json');

  const revoked = await store.revoke(input);
  if (revoked > 0) {
    logger.info('Consent revoked via API', { revoked });
  }

  return c.json({ data: { revoked } });
});

export default consent;

import { KincareValidationError } from '../errors.js';
import type { ChatApiTransport } from '../http.js';
import type { ConsentGrant, ConsentGrantInput } from '../types.js';

interface GrantWire {
  id: string;
  actor_id: string;
  person_id: string;
  category: string;
  granted_at: string;
}

function mapGrant(wire: GrantWire): ConsentGrant {
  return {
    id: wire.id,
    actorId: wire.actor_id,
    personId: wire.person_id,
    category: wire.category,
    grantedAt: wire.granted_at,
  };
}

function assertDistinctMembers(method: string, input: ConsentGrantInput): void {
  if (input.actorId === input.personId) {
    throw new KincareValidationError(`${method}: members always see their own records`, {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
}

export async function listConsentMethod(
  api: ChatApiTransport,
  actorId: string,
): Promise<ConsentGrant[]> {
  const grants = await api.data<GrantWire[]>({ method: 'GET', path: '/consent', params: { actorId } });
  return grants.map(mapGrant);
}

export async function grantConsentMethod(
  api: ChatApiTransport,
  input: ConsentGrantInput,
): Promise<ConsentGrant> {
  assertDistinctMembers('grantConsent', input);

  return mapGrant(await api.data<GrantWire>({ method: 'POST', path: '/consent', body: input }));
}

export async function revokeConsentMethod(
  api: ChatApiTransport,
  input: ConsentGrantInput,
): Promise<number> {
  assertDistinctMembers('revokeConsent', input);

  const { revoked } = await api.data<{ revoked: number }>({ method: 'DELETE', path: '/consent', body: input });
  return revoked;
}

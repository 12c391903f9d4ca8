/**
 * Consent Service
 *
 * Grants that let one family member (the actor) see another member's
 * consent_required data, per category.
 *
 * Features:
 * - Category wildcard ('*' covers every category of the person)
 * - Revocation keeps the row for history; revoked grants are ignored
 * - Deny by default
 */

import { and, eq, isNull } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { consentGrants } from '@/db/schema';
import type { SharingFlags } from '@/services/graph.service';
import { createActorContext, type ActorContext } from '@/services/privacy.service';
import { logger } from '@/utils/logger';

export interface ConsentGrant {
  id: string;
  actorId: string;
  personId: string;
  category: string;
  grantedAt: Date;
  revokedAt: Date | null;
}

export interface ConsentGrantInput {
  actorId: string;
  personId: string;
  category: string;
}

export interface ConsentStore {
  listActiveGrants(actorId: string): Promise<ConsentGrant[]>;
  grant(input: ConsentGrantInput): Promise<ConsentGrant>;
  /** Returns the number of grants revoked */
  revoke(input: ConsentGrantInput): Promise<number>;
}

export class DrizzleConsentStore implements ConsentStore {
  constructor(private readonly db: Database) {}

  async listActiveGrants(actorId: string): Promise<ConsentGrant[]> {
    return this.db
      .select()
      .from(consentGrants)
      .where(and(eq(consentGrants.actorId, actorId), isNull(consentGrants.revokedAt)))
      .orderBy(consentGrants.grantedAt);
  }

  async grant(input: ConsentGrantInput): Promise<ConsentGrant> {
    const existing = await this.db
      .select()
      .from(consentGrants)
      .where(
        and(
          eq(consentGrants.actorId, input.actorId),
          eq(consentGrants.personId, input.personId),
          eq(consentGrants.category, input.category),
          isNull(consentGrants.revokedAt)
        )
      )
      .limit(1);
    if (existing[0]) return existing[0];

    const [row] = await this.db.insert(consentGrants).values(input).returning();
    logger.info('Consent granted', { actorId: input.actorId, personId: input.personId });
    return row;
  }

  async revoke(input: ConsentGrantInput): Promise<number> {
    const rows = await this.db
      .update(consentGrants)
      .set({ revokedAt: new Date() })
      .where(
        and(
          eq(consentGrants.actorId, input.actorId),
          eq(consentGrants.personId, input.personId),
          eq(consentGrants.category, input.category),
          isNull(consentGrants.revokedAt)
        )
      )
      .returning({ id: consentGrants.id });
    if (rows.length > 0) {
      logger.info('Consent revoked', { actorId: input.actorId, personId: input.personId });
    }
    return rows.length;
  }
}

export class InMemoryConsentStore implements ConsentStore {
  private readonly grants: ConsentGrant[] = [];
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async listActiveGrants(actorId: string): Promise<ConsentGrant[]> {
    return this.grants.filter((grant) => grant.actorId === actorId && grant.revokedAt === null);
  }

  async grant(input: ConsentGrantInput): Promise<ConsentGrant> {
    const existing = this.grants.find((grant) => matches(grant, input) && grant.revokedAt === null);
    if (existing) return existing;

    const grant: ConsentGrant = {
      id: `grant-${this.nextId++}`,
      ...input,
      grantedAt: this.now(),
      revokedAt: null,
    };
    this.grants.push(grant);
    return grant;
  }

  async revoke(input: ConsentGrantInput): Promise<number> {
    let revoked = 0;
    for (const grant of this.grants) {
      if (matches(grant, input) && grant.revokedAt === null) {
        grant.revokedAt = this.now();
        revoked++;
      }
    }
    return revoked;
  }
}

function matches(grant: ConsentGrant, input: ConsentGrantInput): boolean {
  return (
    grant.actorId === input.actorId &&
    grant.personId === input.personId &&
    grant.category === input.category
  );
}

/**
 * Resolve the actor for one turn: active grants plus the owners' flags.
 */
export async function resolveActorContext(
  store: ConsentStore,
  actorId: string,
  owners: ReadonlyArray<{ id: string; sharing: SharingFlags }>
): Promise<ActorContext> {
  const grants = await store.listActiveGrants(actorId);
  return createActorContext({
    actorId,
    grants,
    sharing: new Map(owners.map((owner) => [owner.id, owner.sharing])),
  });
}

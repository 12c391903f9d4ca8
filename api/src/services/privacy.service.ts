/**
 * Privacy Gate
 *
 * Decides, per unit, whether health data may reach the prompt for a given
 * actor. Units are the smallest separately classified pieces:
 * a retrieved lab event, each condition, each appointment.
 *
 *   auto_share / normal / absent  → always
 *   consent_required              → actor.hasConsent(personId, category)
 *   member_controlled             → owner's share_<category> flag
 *
 * A category listed in CONSENT_REQUIRED_CATEGORIES is treated as
 * consent_required unless the unit is explicitly auto_share.
 *
 * Pure and deterministic: same input, same output, no I/O, never throws
 * for a denied unit. Denials are counted, never named, in logs.
 */

import type {
  AppointmentRecord,
  ConditionRecord,
  HealthProfile,
  PrivacyLevel,
  SharingFlags,
} from '@/services/graph.service';
import type { ContextItem } from '@/services/retrieval.service';
import { logger } from '@/utils/logger';

/** Category used when a sensitive unit carries none */
export const DEFAULT_PRIVACY_CATEGORY = 'general';

export interface ActorContext {
  actorId: string;
  hasConsent(personId: string, category: string): boolean;
  /** Owner's share_<category> flag; false when unset */
  sharingFlag(personId: string, category: string): boolean;
}

export interface ClassifiedUnit {
  personId: string;
  privacy: PrivacyLevel | null | undefined;
  category: string | null | undefined;
}

export interface PrivacyPolicy {
  consentRequiredCategories: readonly string[];
}

interface FilterStats {
  denied: number;
}

export class PrivacyGate {
  private readonly consentRequiredCategories: ReadonlySet<string>;

  constructor(policy: PrivacyPolicy) {
    this.consentRequiredCategories = new Set(policy.consentRequiredCategories);
  }

  effectiveClassification(unit: ClassifiedUnit): PrivacyLevel {
    const level = unit.privacy ?? 'normal';
    if (level === 'normal' && unit.category && this.consentRequiredCategories.has(unit.category)) {
      return 'consent_required';
    }
    return level;
  }

  isVisible(unit: ClassifiedUnit, actor: ActorContext): boolean {
    const category = unit.category ?? DEFAULT_PRIVACY_CATEGORY;
    switch (this.effectiveClassification(unit)) {
      case 'auto_share':
      case 'normal':
        return true;
      case 'consent_required':
        return actor.hasConsent(unit.personId, category);
      case 'member_controlled':
        return actor.sharingFlag(unit.personId, category);
    }
  }

  /**
   * Drop denied lab events, and inside each kept event drop denied
   * conditions and appointments. A denied condition never removes the
   * event it is attached to.
   */
  filterContextItems(items: ContextItem[], actor: ActorContext): ContextItem[] {
    const stats: FilterStats = { denied: 0 };
    const visible: ContextItem[] = [];

    for (const item of items) {
      if (!this.isVisible(item, actor)) {
        stats.denied++;
        continue;
      }
      visible.push({
        ...item,
        conditions: this.filterConditions(item.personId, item.conditions, actor, stats),
        appointments: this.filterAppointments(item.personId, item.appointments, actor, stats),
      });
    }

    if (stats.denied > 0) {
      logger.debug('privacy gate filtered context items', {
        actorId: actor.actorId,
        denied: stats.denied,
        kept: visible.length,
      });
    }
    return visible;
  }

  filterProfile(profile: HealthProfile, actor: ActorContext): HealthProfile {
    const stats: FilterStats = { denied: 0 };
    const personId = profile.person.id;
    const filtered: HealthProfile = {
      ...profile,
      conditions: this.filterConditions(personId, profile.conditions, actor, stats),
      appointments: this.filterAppointments(personId, profile.appointments, actor, stats),
    };

    if (stats.denied > 0) {
      logger.debug('privacy gate filtered profile', { actorId: actor.actorId, denied: stats.denied });
    }
    return filtered;
  }

  /**
   * Drop denied entries from a flat list whose classification is read
   * through `classify`, such as a parent's condition or a lab event.
   */
  filterUnits<T>(units: T[], classify: (unit: T) => ClassifiedUnit, actor: ActorContext): T[] {
    const visible = units.filter((unit) => this.isVisible(classify(unit), actor));
    const denied = units.length - visible.length;
    if (denied > 0) {
      logger.debug('privacy gate filtered units', { actorId: actor.actorId, denied, kept: visible.length });
    }
    return visible;
  }

  private filterConditions(
    personId: string,
    conditions: ConditionRecord[],
    actor: ActorContext,
    stats: FilterStats
  ): ConditionRecord[] {
    return conditions.filter((condition) => {
      const allowed = this.isVisible(
        { personId, privacy: condition.privacy, category: condition.category },
        actor
      );
      if (!allowed) stats.denied++;
      return allowed;
    });
  }

  private filterAppointments(
    personId: string,
    appointments: AppointmentRecord[],
    actor: ActorContext,
    stats: FilterStats
  ): AppointmentRecord[] {
    return appointments.filter((appointment) => {
      const allowed = this.isVisible(
        { personId, privacy: appointment.privacy, category: appointment.category },
        actor
      );
      if (!allowed) stats.denied++;
      return allowed;
    });
  }
}

/**
 * Build an actor from explicit grants and owner sharing flags.
 * An actor reading their own record holds consent for all of it.
 */
export function createActorContext(input: {
  actorId: string;
  grants: ReadonlyArray<{ personId: string; category: string }>;
  sharing: ReadonlyMap<string, SharingFlags>;
}): ActorContext {
  const granted = new Set(input.grants.map((grant) => `${grant.personId}\u0000${grant.category}`));

  return {
    actorId: input.actorId,
    hasConsent(personId, category) {
      if (personId === input.actorId) return true;
      return granted.has(`${personId}\u0000${category}`) || granted.has(`${personId}\u0000*`);
    },
    sharingFlag(personId, category) {
      return input.sharing.get(personId)?.[category] === true;
    },
  };
}

/**
 * Context Assembler
 *
 * Turns the privacy-filtered profile and retrieved items into one bounded
 * plain-text block. Sections always appear in this order:
 *
 *   ### PERSONA
 *   ### HEALTH PROFILE
 *   ### RELEVANT MEDICAL HISTORY
 *   ### UPCOMING APPOINTMENTS
 *
 * Units are added in that priority order until the next one would cross the
 * budget; that unit and everything after it are dropped, never cut. A header
 * is written only together with its section's first unit, and a section with
 * no units is omitted.
 */

import type {
  AppointmentRecord,
  ConditionRecord,
  HealthProfile,
  LabResultRecord,
  MedicationRecord,
} from '@/services/graph.service';
import type { ContextItem } from '@/services/retrieval.service';

export type ContextSection = 'persona' | 'profile' | 'history' | 'appointments';

export const SECTION_HEADERS: Record<ContextSection, string> = {
  persona: '### PERSONA',
  profile: '### HEALTH PROFILE',
  history: '### RELEVANT MEDICAL HISTORY',
  appointments: '### UPCOMING APPOINTMENTS',
};

export const PERSONA_TEMPLATE = [
  'You are a warm, patient health companion for a family.',
  'You help people keep track of their health information and prepare for doctor visits.',
  'When the user says "I" or "my", they mean the family member whose profile appears below.',
  'Use the records below when they are relevant and say plainly when something is not in them.',
  'Write dates in a readable form such as "March 21, 2023".',
  'You are not a doctor: never diagnose, never prescribe, and encourage talking to a clinician.',
  'For urgent symptoms such as chest pain or trouble breathing, calmly advise seeking care right away.',
].join('\n');

export interface ContextUnit {
  section: ContextSection;
  text: string;
  labEventId?: string;
}

export interface AssembleContextInput {
  profile: HealthProfile | null;
  retrieved: ContextItem[];
  budget: number;
}

export interface AssembledContext {
  text: string;
  /** Units that made it into the text, in order */
  units: ContextUnit[];
  droppedUnits: number;
  /** Retrieved lab events that made it into the text */
  includedLabEventIds: string[];
}

// ── Formatting ─────────────────────────────────────────────────────────

function joinDefined(parts: Array<string | null | undefined>, separator: string): string {
  return parts.filter((part): part is string => !!part && part.trim().length > 0).join(separator);
}

function formatIdentity(profile: HealthProfile): string {
  const { person } = profile;
  const displayName = person.preferredName ?? person.name;
  return joinDefined(
    [
      `Name: ${displayName}`,
      person.preferredName && person.preferredName !== person.name ? `legal name ${person.name}` : null,
      person.dateOfBirth ? `born ${person.dateOfBirth}` : null,
      person.gender,
      person.bloodType ? `blood type ${person.bloodType}` : null,
    ],
    '; '
  );
}

export function formatCondition(condition: ConditionRecord): string {
  const code = condition.icd10Code ? ` (${condition.icd10Code})` : '';
  const details = joinDefined(
    [
      condition.status,
      condition.diagnosisDate ? `diagnosed ${condition.diagnosisDate}` : null,
      condition.hereditary ? 'hereditary' : null,
    ],
    ', '
  );
  return `- Condition: ${condition.name}${code}${details ? `, ${details}` : ''}`;
}

export function formatMedication(medication: MedicationRecord): string {
  const details = joinDefined([medication.dosage, medication.frequency], ', ');
  const since = medication.startDate ? ` since ${medication.startDate}` : '';
  return `- Medication: ${medication.name}${details ? ` ${details}` : ''}${since}`;
}

function formatLabResult(result: LabResultRecord): string {
  const value = joinDefined([result.value, result.unit], ' ');
  const range = result.referenceRange ? ` [ref ${result.referenceRange}]` : '';
  const flag = result.flag ? ` (${result.flag})` : '';
  return `${result.testName}${value ? ` ${value}` : ''}${range}${flag}`;
}

export function formatContextItem(item: ContextItem): string {
  const lines = [`- Lab event ${item.date ?? 'undated'}: ${item.summary}`];
  if (item.labResults.length > 0) {
    lines.push(`  Results: ${item.labResults.map(formatLabResult).join('; ')}`);
  }
  if (item.conditions.length > 0) {
    lines.push(`  Related conditions: ${item.conditions.map((c) => c.name).join(', ')}`);
  }
  return lines.join('\n');
}

export function formatAppointment(appointment: AppointmentRecord): string {
  const when = joinDefined([appointment.date, appointment.time ? `at ${appointment.time}` : null], ' ');
  const what = joinDefined([appointment.purpose ?? 'Appointment', appointment.provider ? `with ${appointment.provider}` : null], ' ');
  return `- ${when}: ${what}`;
}

// ── Units ──────────────────────────────────────────────────────────────

function isCurrentCondition(condition: ConditionRecord): boolean {
  return condition.status !== 'resolved';
}

/**
 * Appointments from the profile and from retrieved items, deduplicated by
 * id and ordered soonest first.
 */
function collectAppointments(profile: HealthProfile | null, retrieved: ContextItem[]): AppointmentRecord[] {
  const byId = new Map<string, AppointmentRecord>();
  for (const appointment of profile?.appointments ?? []) byId.set(appointment.id, appointment);
  for (const item of retrieved) {
    for (const appointment of item.appointments) {
      if (!byId.has(appointment.id)) byId.set(appointment.id, appointment);
    }
  }
  return [...byId.values()].sort((a, b) => {
    const left = `${a.date} ${a.time ?? ''}`;
    const right = `${b.date} ${b.time ?? ''}`;
    if (left !== right) return left < right ? -1 : 1;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}

export function buildContextUnits(profile: HealthProfile | null, retrieved: ContextItem[]): ContextUnit[] {
  const units: ContextUnit[] = [{ section: 'persona', text: PERSONA_TEMPLATE }];

  if (profile) {
    units.push({ section: 'profile', text: formatIdentity(profile) });
    for (const condition of profile.conditions.filter(isCurrentCondition)) {
      units.push({ section: 'profile', text: formatCondition(condition) });
    }
    for (const medication of profile.medications) {
      units.push({ section: 'profile', text: formatMedication(medication) });
    }
    for (const allergy of profile.allergies) {
      units.push({
        section: 'profile',
        text: `- Allergy: ${allergy.name}${allergy.reaction ? ` (${allergy.reaction})` : ''}`,
      });
    }
  }

  for (const item of retrieved) {
    units.push({ section: 'history', text: formatContextItem(item), labEventId: item.labEventId });
  }

  for (const appointment of collectAppointments(profile, retrieved)) {
    units.push({ section: 'appointments', text: formatAppointment(appointment) });
  }

  return units;
}

// ── Assembly ───────────────────────────────────────────────────────────

/**
 * Fit units into the budget. Output length is always <= budget and the
 * output is the rendering of a prefix of the unit list.
 */
export function fitUnits(units: ContextUnit[], budget: number): { text: string; included: number } {
  const limit = Number.isNaN(budget) ? 0 : Math.max(0, Math.floor(budget));
  let text = '';
  let currentSection: ContextSection | null = null;
  let included = 0;

  for (const unit of units) {
    const piece =
      unit.section === currentSection
        ? `\n${unit.text}`
        : `${text.length > 0 ? '\n\n' : ''}${SECTION_HEADERS[unit.section]}\n${unit.text}`;

    if (text.length + piece.length > limit) break;

    text += piece;
    currentSection = unit.section;
    included++;
  }

  return { text, included };
}

export function assembleContext(input: AssembleContextInput): AssembledContext {
  const units = buildContextUnits(input.profile, input.retrieved);
  const { text, included } = fitUnits(units, input.budget);
  const kept = units.slice(0, included);

  return {
    text,
    units: kept,
    droppedUnits: units.length - included,
    includedLabEventIds: kept
      .map((unit) => unit.labEventId)
      .filter((id): id is string => id !== undefined),
  };
}

import { describe, it, expect } from 'vitest';
import {
  PERSONA_TEMPLATE,
  assembleContext,
  buildContextUnits,
  fitUnits,
  formatAppointment,
  formatCondition,
  formatContextItem,
  formatMedication,
} from '@/services/contextAssembler.service';
import type { HealthProfile } from '@/services/graph.service';
import type { ContextItem } from '@/services/retrieval.service';
import { makeAppointment, makeCondition, makeMedication, makePerson } from '../../helpers/fakes';

// =====================================================
// Fixtures
// =====================================================

const prediabetes = makeCondition('Prediabetes', { icd10Code: 'R73.03', diagnosisDate: '2024-11-20' });
const endoVisit = makeAppointment('appt-endo', '2025-02-10', {
  time: '09:30',
  provider: 'Dr. Patel',
  purpose: 'Endocrinology follow-up',
});

function makeProfile(overrides: Partial<HealthProfile> = {}): HealthProfile {
  return {
    person: makePerson('member-ana', { name: 'Ana Ruiz' }),
    conditions: [prediabetes],
    medications: [],
    allergies: [],
    appointments: [endoVisit],
    ...overrides,
  };
}

function makeItem(overrides: Partial<ContextItem> = {}): ContextItem {
  return {
    labEventId: 'lab-a1c',
    personId: 'member-ana',
    date: '2024-11-20',
    summary: 'A1C 5.8% Nov 2024',
    score: 1,
    privacy: 'normal',
    category: null,
    labResults: [{ testName: 'HbA1c', value: '5.8', unit: '%', referenceRange: '4.0-5.6', flag: 'H' }],
    conditions: [prediabetes],
    medications: [],
    appointments: [],
    ...overrides,
  };
}

const LAB_LINES = [
  '- Lab event 2024-11-20: A1C 5.8% Nov 2024',
  '  Results: HbA1c 5.8 % [ref 4.0-5.6] (H)',
  '  Related conditions: Prediabetes',
].join('\n');

const FULL_TEXT = [
  `### PERSONA\n${PERSONA_TEMPLATE}`,
  '### HEALTH PROFILE\nName: Ana Ruiz\n- Condition: Prediabetes (R73.03), active, diagnosed 2024-11-20',
  `### RELEVANT MEDICAL HISTORY\n${LAB_LINES}`,
  '### UPCOMING APPOINTMENTS\n- 2025-02-10 at 09:30: Endocrinology follow-up with Dr. Patel',
].join('\n\n');

// =====================================================
// Tests
// =====================================================

describe('contextAssembler.service', () => {
  describe('formatters', () => {
    it('formats a condition with code, status and hereditary marker', () => {
      expect(formatCondition(makeCondition('Type 2 diabetes', { icd10Code: 'E11', status: 'managed', hereditary: true }))).toBe(
        '- Condition: Type 2 diabetes (E11), managed, hereditary'
      );
    });

    it('formats a medication with dosage, frequency and start date', () => {
      expect(
        formatMedication(makeMedication('Metformin', { dosage: '500 mg', frequency: 'twice daily', startDate: '2024-12-01' }))
      ).toBe('- Medication: Metformin 500 mg, twice daily since 2024-12-01');
    });

    it('formats a lab event with results and related conditions', () => {
      expect(formatContextItem(makeItem())).toBe(LAB_LINES);
    });

    it('formats an appointment without optional fields', () => {
      expect(formatAppointment(makeAppointment('appt-1', '2025-03-01'))).toBe('- 2025-03-01: Appointment');
    });
  });

  describe('assembleContext()', () => {
    it('renders sections in fixed order with the lab summary and the condition', () => {
      const result = assembleContext({ profile: makeProfile(), retrieved: [makeItem()], budget: 10_000 });

      expect(result.text).toBe(FULL_TEXT);
      expect(result.droppedUnits).toBe(0);
      expect(result.includedLabEventIds).toEqual(['lab-a1c']);
    });

    it('emits only the persona when there is no profile and nothing retrieved', () => {
      const result = assembleContext({ profile: null, retrieved: [], budget: 10_000 });

      expect(result.text).toBe(`### PERSONA\n${PERSONA_TEMPLATE}`);
      expect(result.units).toHaveLength(1);
    });

    it('never exceeds the budget and always yields a prefix of the full rendering', () => {
      const input = { profile: makeProfile(), retrieved: [makeItem()] };

      for (let budget = 0; budget <= FULL_TEXT.length + 5; budget += 7) {
        const { text } = assembleContext({ ...input, budget });
        expect(text.length).toBeLessThanOrEqual(budget);
        expect(FULL_TEXT.startsWith(text)).toBe(true);
      }
    });

    it('drops a unit that does not fit whole instead of cutting it', () => {
      const result = assembleContext({
        profile: makeProfile(),
        retrieved: [makeItem()],
        budget: FULL_TEXT.length - 1,
      });

      expect(result.text).toBe(FULL_TEXT.slice(0, FULL_TEXT.indexOf('\n\n### UPCOMING APPOINTMENTS')));
      expect(result.droppedUnits).toBe(1);
    });

    it('leaves the lab event out of includedLabEventIds when the budget cuts it', () => {
      const budget = FULL_TEXT.indexOf('\n\n### RELEVANT MEDICAL HISTORY');
      const result = assembleContext({ profile: makeProfile(), retrieved: [makeItem()], budget });

      expect(result.includedLabEventIds).toEqual([]);
      expect(result.droppedUnits).toBe(2);
    });

    it('returns empty text for a budget smaller than the persona', () => {
      const result = assembleContext({ profile: makeProfile(), retrieved: [], budget: 10 });

      expect(result.text).toBe('');
      expect(result.units).toEqual([]);
    });

    it('does not throw on a negative or NaN budget', () => {
      expect(assembleContext({ profile: null, retrieved: [], budget: -5 }).text).toBe('');
      expect(assembleContext({ profile: null, retrieved: [], budget: Number.NaN }).text).toBe('');
    });
  });

  describe('buildContextUnits()', () => {
    it('leaves resolved conditions out of the profile section', () => {
      const units = buildContextUnits(
        makeProfile({ conditions: [prediabetes, makeCondition('Sinusitis', { status: 'resolved' })], appointments: [] }),
        []
      );

      expect(units.filter((unit) => unit.section === 'profile').map((unit) => unit.text)).toEqual([
        'Name: Ana Ruiz',
        '- Condition: Prediabetes (R73.03), active, diagnosed 2024-11-20',
      ]);
    });

    it('merges appointments from the profile and retrieved items once each, soonest first', () => {
      const later = makeAppointment('appt-eye', '2025-04-02', { purpose: 'Eye exam' });
      const units = buildContextUnits(makeProfile({ appointments: [later, endoVisit] }), [
        makeItem({ appointments: [endoVisit] }),
      ]);

      expect(units.filter((unit) => unit.section === 'appointments').map((unit) => unit.text)).toEqual([
        '- 2025-02-10 at 09:30: Endocrinology follow-up with Dr. Patel',
        '- 2025-04-02: Eye exam',
      ]);
    });
  });

  describe('fitUnits()', () => {
    it('writes a header only with the first unit of its section', () => {
      const { text, included } = fitUnits(
        [
          { section: 'profile', text: 'a' },
          { section: 'profile', text: 'b' },
          { section: 'appointments', text: 'c' },
        ],
        1_000
      );

      expect(text).toBe('### HEALTH PROFILE\na\nb\n\n### UPCOMING APPOINTMENTS\nc');
      expect(included).toBe(3);
    });
  });
});

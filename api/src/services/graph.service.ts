/**
 * Graph Query Layer
 *
 * Parameterised, person-scoped Cypher over the family medical graph:
 *
 *   (Person)-[:HAS_CONDITION]->(Condition)
 *   (Person)-[:TAKES]->(Medication)-[:INTERACTS_WITH]-(Medication)
 *   (Person)-[:ALLERGIC_TO]->(Allergen)
 *   (Person)-[:HAD_LAB_EVENT]->(LabEvent)-[:INCLUDES]->(LabResult)
 *   (Person)-[:HAS_APPOINTMENT]->(Appointment)
 *   (Person)-[:HAS_ALIAS]->(Alias)
 *   (Person)-[:PARENT_OF]->(Person)
 *
 * Every member query starts from `(p:Person {id: $personId})`, so no query
 * can return another member's nodes. The one exception is hereditary risk,
 * which walks to the member's parents and returns their hereditary
 * conditions with each parent's id for the privacy gate. Embedding stats
 * are counts only. Rows are validated with zod before they leave this
 * module.
 */

import { z } from 'zod';
import type { GraphReader, GraphRow } from '@/db/graph';
import { toCypherInt } from '@/db/graph';
import { logger } from '@/utils/logger';

// ── Types ──────────────────────────────────────────────────────────────

export const PRIVACY_LEVELS = ['auto_share', 'normal', 'consent_required', 'member_controlled'] as const;
export type PrivacyLevel = (typeof PRIVACY_LEVELS)[number];

export type ConditionStatus = 'active' | 'resolved' | 'managed';
export type InheritancePattern =
  | 'autosomal_dominant'
  | 'autosomal_recessive'
  | 'multifactorial'
  | 'x_linked'
  | 'none';

/** share_<category> flags keyed by category */
export type SharingFlags = Record<string, boolean>;

export interface PersonRecord {
  id: string;
  name: string;
  preferredName: string | null;
  role: string | null;
  dateOfBirth: string | null;
  gender: string | null;
  bloodType: string | null;
  aliases: string[];
  sharing: SharingFlags;
}

export interface ConditionRecord {
  name: string;
  icd10Code: string | null;
  category: string | null;
  hereditary: boolean;
  inheritancePattern: InheritancePattern | null;
  heritabilityPercent: number | null;
  diagnosisDate: string | null;
  status: ConditionStatus | null;
  privacy: PrivacyLevel;
}

export interface MedicationRecord {
  name: string;
  drugClass: string | null;
  dosage: string | null;
  frequency: string | null;
  startDate: string | null;
  endDate: string | null;
  prescriber: string | null;
}

export interface AllergyRecord {
  name: string;
  reaction: string | null;
}

export interface LabResultRecord {
  testName: string;
  value: string | null;
  unit: string | null;
  referenceRange: string | null;
  flag: string | null;
}

export interface AppointmentRecord {
  id: string;
  date: string;
  time: string | null;
  provider: string | null;
  purpose: string | null;
  category: string | null;
  privacy: PrivacyLevel;
}

export interface HealthProfile {
  person: PersonRecord;
  conditions: ConditionRecord[];
  medications: MedicationRecord[];
  allergies: AllergyRecord[];
  appointments: AppointmentRecord[];
}

export interface LabEventCandidate {
  labEventId: string;
  personId: string;
  date: string | null;
  summary: string;
  privacy: PrivacyLevel;
  category: string | null;
  score: number;
}

export interface DateWindow {
  from: string;
  to: string;
}

export interface CandidateExpansion {
  conditions: ConditionRecord[];
  medications: MedicationRecord[];
  appointments: AppointmentRecord[];
  labResults: Map<string, LabResultRecord[]>;
}

export interface MedicationInteraction {
  medicationA: string;
  medicationB: string;
  severity: string | null;
  description: string | null;
}

export interface InteractionEdge {
  from: string;
  to: string;
  severity: string | null;
  description: string | null;
}

/** A parent's hereditary condition, seen from the child */
export interface HereditaryRisk {
  parentId: string;
  parentName: string;
  parentSharing: SharingFlags;
  condition: string;
  category: string | null;
  privacy: PrivacyLevel;
  inheritancePattern: InheritancePattern | 'unknown';
  /** heritability_percent on the condition, 0 when unset */
  riskPercent: number;
}

export interface EmbeddingStats {
  totalLabEvents: number;
  withEmbeddings: number;
  withSummaries: number;
  missingEmbeddings: number;
  /** Percent of lab events with an embedding, one decimal */
  coveragePercent: number;
  vectorIndexes: string[];
}

/** Targets must score above this to count as similar */
export const MIN_SIMILAR_SCORE = 0.5;

export interface GraphQueryLayer {
  /** Cosine top-N over the person's embedded lab events */
  searchLabEvents(personId: string, embedding: number[], limit: number): Promise<LabEventCandidate[]>;
  expandCandidates(
    personId: string,
    labEventIds: string[],
    window: DateWindow,
    today: string
  ): Promise<CandidateExpansion>;
  getHealthProfile(personId: string, window: DateWindow, today: string): Promise<HealthProfile | null>;
  findMedicationInteractions(personId: string, today: string): Promise<MedicationInteraction[]>;
  findHereditaryRisks(personId: string): Promise<HereditaryRisk[]>;
  /**
   * The person's other lab events closest to one of theirs, best first.
   * null when the source is not theirs or was never embedded.
   */
  findSimilarLabEvents(personId: string, labEventId: string, limit: number): Promise<LabEventCandidate[] | null>;
  getEmbeddingStats(): Promise<EmbeddingStats>;
}

// ── Row Schemas ────────────────────────────────────────────────────────

const nullableString = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const privacySchema = z.enum(PRIVACY_LEVELS).catch('normal');

const candidateRowSchema = z.object({
  labEventId: z.union([z.string(), z.number()]).transform(String),
  personId: z.string(),
  date: nullableString,
  summary: z.string(),
  privacy: privacySchema,
  category: nullableString,
  score: z.number(),
});

const personRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  preferredName: nullableString,
  role: nullableString,
  dateOfBirth: nullableString,
  gender: nullableString,
  bloodType: nullableString,
  aliases: z.array(z.string().nullable()).transform((names) => names.filter((n): n is string => !!n)),
  properties: z.record(z.string(), z.unknown()),
});

const conditionRowSchema = z.object({
  name: z.string(),
  icd10Code: nullableString,
  category: nullableString,
  hereditary: z.boolean().nullish().transform((value) => value ?? false),
  inheritancePattern: z
    .enum(['autosomal_dominant', 'autosomal_recessive', 'multifactorial', 'x_linked', 'none'])
    .nullish()
    .catch(null)
    .transform((value) => value ?? null),
  heritabilityPercent: z.number().min(0).max(100).nullish().catch(null).transform((value) => value ?? null),
  diagnosisDate: nullableString,
  status: z.enum(['active', 'resolved', 'managed']).nullish().catch(null).transform((value) => value ?? null),
  privacy: privacySchema,
});

const medicationRowSchema = z.object({
  name: z.string(),
  drugClass: nullableString,
  dosage: nullableString,
  frequency: nullableString,
  startDate: nullableString,
  endDate: nullableString,
  prescriber: nullableString,
});

const allergyRowSchema = z.object({
  name: z.string(),
  reaction: nullableString,
});

const labResultRowSchema = z.object({
  labEventId: z.union([z.string(), z.number()]).transform(String),
  testName: z.string(),
  value: nullableString,
  unit: nullableString,
  referenceRange: nullableString,
  flag: nullableString,
});

const appointmentRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  date: z.string(),
  time: nullableString,
  provider: nullableString,
  purpose: nullableString,
  category: nullableString,
  privacy: privacySchema,
});

const interactionRowSchema = z.object({
  from: z.string(),
  to: z.string(),
  severity: nullableString,
  description: nullableString,
});

const medicationNameRowSchema = z.object({ name: z.string() });

const hereditaryRiskRowSchema = z.object({
  parentId: z.string(),
  parentName: z.string(),
  parentProperties: z.record(z.string(), z.unknown()),
  condition: z.string(),
  category: nullableString,
  privacy: privacySchema,
  inheritancePattern: z
    .enum(['autosomal_dominant', 'autosomal_recessive', 'multifactorial', 'x_linked', 'none'])
    .nullish()
    .catch(null)
    .transform((value) => value ?? 'unknown'),
  riskPercent: z.number().min(0).max(100).nullish().catch(null).transform((value) => value ?? 0),
});

const sourceLabEventRowSchema = z.object({ embedded: z.boolean() });

const embeddingCountsRowSchema = z.object({
  total: z.number().int().nonnegative(),
  withEmbeddings: z.number().int().nonnegative(),
  withSummaries: z.number().int().nonnegative(),
});

const indexNameRowSchema = z.object({ name: z.string() });

/**
 * Parse rows, dropping (and logging) any row that does not match.
 * A malformed node must not take down the whole query.
 */
function parseRows<T>(rows: GraphRow[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string): T[] {
  const parsed: T[] = [];
  let skipped = 0;
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      parsed.push(result.data);
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    logger.warn('Skipped malformed graph rows', { query: label, skipped });
  }
  return parsed;
}

export function extractSharingFlags(properties: Record<string, unknown>): SharingFlags {
  const flags: SharingFlags = {};
  for (const [key, value] of Object.entries(properties)) {
    if (key.startsWith('share_') && typeof value === 'boolean') {
      flags[key.slice('share_'.length)] = value;
    }
  }
  return flags;
}

/**
 * Pair each active medication with every other one it interacts with.
 * Each unordered pair appears once, names sorted within and across pairs.
 */
export function pairInteractions(
  activeMedications: string[],
  edges: InteractionEdge[]
): MedicationInteraction[] {
  const active = new Set(activeMedications);
  const pairs = new Map<string, MedicationInteraction>();

  for (const edge of edges) {
    if (edge.from === edge.to) continue;
    if (!active.has(edge.from) || !active.has(edge.to)) continue;

    const [medicationA, medicationB] = edge.from < edge.to ? [edge.from, edge.to] : [edge.to, edge.from];
    const key = `${medicationA}\u0000${medicationB}`;
    if (pairs.has(key)) continue;

    pairs.set(key, {
      medicationA,
      medicationB,
      severity: edge.severity,
      description: edge.description,
    });
  }

  return [...pairs.values()].sort((a, b) => {
    if (a.medicationA !== b.medicationA) return a.medicationA < b.medicationA ? -1 : 1;
    if (a.medicationB !== b.medicationB) return a.medicationB < b.medicationB ? -1 : 1;
    return 0;
  });
}

export function summarizeEmbeddingStats(
  counts: { total: number; withEmbeddings: number; withSummaries: number },
  vectorIndexes: string[]
): EmbeddingStats {
  return {
    totalLabEvents: counts.total,
    withEmbeddings: counts.withEmbeddings,
    withSummaries: counts.withSummaries,
    missingEmbeddings: counts.total - counts.withEmbeddings,
    coveragePercent: counts.total > 0 ? Math.round((counts.withEmbeddings / counts.total) * 1000) / 10 : 0,
    vectorIndexes,
  };
}

// ── Cypher ─────────────────────────────────────────────────────────────

const SEARCH_LAB_EVENTS = `
  MATCH (p:Person {id: $personId})-[:HAD_LAB_EVENT]->(le:LabEvent)
  WHERE le.summary IS NOT NULL
    AND le.summary_embedding IS NOT NULL
    AND size(le.summary_embedding) = $dimension
  WITH p, le, vector.similarity.cosine(le.summary_embedding, $embedding) AS score
  RETURN le.id AS labEventId,
         p.id AS personId,
         toString(le.date) AS date,
         le.summary AS summary,
         coalesce(le.privacy_level, 'normal') AS privacy,
         le.privacy_category AS category,
         score
  ORDER BY score DESC, le.date DESC
  LIMIT $limit
`;

const PERSON = `
  MATCH (p:Person {id: $personId})
  OPTIONAL MATCH (p)-[:HAS_ALIAS]->(a:Alias)
  RETURN p.id AS id,
         p.name AS name,
         p.preferred_name AS preferredName,
         p.role AS role,
         toString(p.date_of_birth) AS dateOfBirth,
         p.gender AS gender,
         p.blood_type AS bloodType,
         collect(DISTINCT a.name) AS aliases,
         properties(p) AS properties
`;

const CONDITIONS = `
  MATCH (p:Person {id: $personId})-[hc:HAS_CONDITION]->(c:Condition)
  RETURN c.name AS name,
         c.icd10_code AS icd10Code,
         c.category AS category,
         c.hereditary AS hereditary,
         c.inheritance_pattern AS inheritancePattern,
         c.heritability_percent AS heritabilityPercent,
         toString(hc.diagnosis_date) AS diagnosisDate,
         hc.status AS status,
         coalesce(hc.privacy_level, c.privacy_level, 'normal') AS privacy
  ORDER BY c.name
`;

const ACTIVE_MEDICATIONS = `
  MATCH (p:Person {id: $personId})-[t:TAKES]->(m:Medication)
  WHERE t.end_date IS NULL OR date(t.end_date) > date($today)
  RETURN m.name AS name,
         m.drug_class AS drugClass,
         coalesce(t.dosage, m.dosage) AS dosage,
         coalesce(t.frequency, m.frequency) AS frequency,
         toString(t.start_date) AS startDate,
         toString(t.end_date) AS endDate,
         t.prescriber AS prescriber
  ORDER BY m.name
`;

const ALLERGIES = `
  MATCH (p:Person {id: $personId})-[:ALLERGIC_TO]->(al:Allergen)
  RETURN al.name AS name, al.reaction AS reaction
  ORDER BY al.name
`;

const LAB_RESULTS = `
  MATCH (p:Person {id: $personId})-[:HAD_LAB_EVENT]->(le:LabEvent)-[:INCLUDES]->(lr:LabResult)
  WHERE le.id IN $labEventIds
  RETURN le.id AS labEventId,
         lr.test_name AS testName,
         toString(lr.value) AS value,
         lr.unit AS unit,
         lr.reference_range AS referenceRange,
         lr.flag AS flag
  ORDER BY lr.test_name
`;

const APPOINTMENTS_IN_WINDOW = `
  MATCH (p:Person {id: $personId})-[:HAS_APPOINTMENT]->(apt:Appointment)
  WHERE date(apt.date) >= date($from) AND date(apt.date) <= date($to)
  RETURN coalesce(apt.id, elementId(apt)) AS id,
         toString(apt.date) AS date,
         apt.time AS time,
         coalesce(apt.provider, apt.facility, apt.clinic) AS provider,
         coalesce(apt.purpose, apt.appointment_type) AS purpose,
         apt.privacy_category AS category,
         coalesce(apt.privacy_level, 'normal') AS privacy
  ORDER BY apt.date, apt.time
`;

const INTERACTIONS = `
  MATCH (p:Person {id: $personId})-[t1:TAKES]->(m1:Medication)-[i:INTERACTS_WITH]-(m2:Medication)<-[t2:TAKES]-(p)
  WHERE (t1.end_date IS NULL OR date(t1.end_date) > date($today))
    AND (t2.end_date IS NULL OR date(t2.end_date) > date($today))
  RETURN m1.name AS from, m2.name AS to, i.severity AS severity, i.description AS description
`;

const HEREDITARY_RISKS = `
  MATCH (parent:Person)-[:PARENT_OF]->(p:Person {id: $personId})
  MATCH (parent)-[hc:HAS_CONDITION]->(c:Condition)
  WHERE c.hereditary = true
  RETURN parent.id AS parentId,
         parent.name AS parentName,
         properties(parent) AS parentProperties,
         c.name AS condition,
         c.category AS category,
         coalesce(hc.privacy_level, c.privacy_level, 'normal') AS privacy,
         c.inheritance_pattern AS inheritancePattern,
         c.heritability_percent AS riskPercent
  ORDER BY c.name, parent.name
`;

const SOURCE_LAB_EVENT = `
  MATCH (p:Person {id: $personId})-[:HAD_LAB_EVENT]->(src:LabEvent {id: $labEventId})
  RETURN src.summary_embedding IS NOT NULL AS embedded
  LIMIT 1
`;

const SIMILAR_LAB_EVENTS = `
  MATCH (p:Person {id: $personId})-[:HAD_LAB_EVENT]->(src:LabEvent {id: $labEventId})
  MATCH (p)-[:HAD_LAB_EVENT]->(le:LabEvent)
  WHERE le.id <> src.id
    AND le.summary IS NOT NULL
    AND le.summary_embedding IS NOT NULL
    AND size(le.summary_embedding) = size(src.summary_embedding)
  WITH p, le, vector.similarity.cosine(le.summary_embedding, src.summary_embedding) AS score
  WHERE score > $minScore
  RETURN le.id AS labEventId,
         p.id AS personId,
         toString(le.date) AS date,
         le.summary AS summary,
         coalesce(le.privacy_level, 'normal') AS privacy,
         le.privacy_category AS category,
         score
  ORDER BY score DESC, le.date DESC
  LIMIT $limit
`;

const EMBEDDING_COUNTS = `
  MATCH (le:LabEvent)
  RETURN count(le) AS total,
         sum(CASE WHEN le.summary_embedding IS NOT NULL THEN 1 ELSE 0 END) AS withEmbeddings,
         sum(CASE WHEN le.summary IS NOT NULL THEN 1 ELSE 0 END) AS withSummaries
`;

const VECTOR_INDEXES = `
  SHOW INDEXES YIELD name, type
  WHERE type = 'VECTOR'
  RETURN name
  ORDER BY name
`;

// ── Neo4j Implementation ───────────────────────────────────────────────

export class Neo4jGraphQueryLayer implements GraphQueryLayer {
  constructor(
    private readonly reader: GraphReader,
    private readonly embeddingDimension: number
  ) {}

  async searchLabEvents(personId: string, embedding: number[], limit: number): Promise<LabEventCandidate[]> {
    const rows = await this.reader.read(SEARCH_LAB_EVENTS, {
      personId,
      embedding,
      dimension: toCypherInt(this.embeddingDimension),
      limit: toCypherInt(limit),
    });
    return parseRows(rows, candidateRowSchema, 'searchLabEvents');
  }

  async expandCandidates(
    personId: string,
    labEventIds: string[],
    window: DateWindow,
    today: string
  ): Promise<CandidateExpansion> {
    const [conditions, medications, appointments, labResultRows] = await Promise.all([
      this.conditions(personId),
      this.activeMedications(personId, today),
      this.appointments(personId, window),
      labEventIds.length > 0
        ? this.reader.read(LAB_RESULTS, { personId, labEventIds })
        : Promise.resolve([]),
    ]);

    const labResults = new Map<string, LabResultRecord[]>();
    for (const { labEventId, ...result } of parseRows(labResultRows, labResultRowSchema, 'labResults')) {
      const list = labResults.get(labEventId) ?? [];
      list.push(result);
      labResults.set(labEventId, list);
    }

    return { conditions, medications, appointments, labResults };
  }

  async getHealthProfile(personId: string, window: DateWindow, today: string): Promise<HealthProfile | null> {
    const personRows = parseRows(await this.reader.read(PERSON, { personId }), personRowSchema, 'person');
    const row = personRows[0];
    if (!row) return null;

    const [conditions, medications, allergies, appointments] = await Promise.all([
      this.conditions(personId),
      this.activeMedications(personId, today),
      this.reader.read(ALLERGIES, { personId }).then((rows) => parseRows(rows, allergyRowSchema, 'allergies')),
      this.appointments(personId, window),
    ]);

    const { properties, ...person } = row;
    return {
      person: { ...person, sharing: extractSharingFlags(properties) },
      conditions,
      medications,
      allergies,
      appointments,
    };
  }

  async findMedicationInteractions(personId: string, today: string): Promise<MedicationInteraction[]> {
    const [medications, edgeRows] = await Promise.all([
      this.reader
        .read(ACTIVE_MEDICATIONS, { personId, today })
        .then((rows) => parseRows(rows, medicationNameRowSchema, 'activeMedicationNames')),
      this.reader.read(INTERACTIONS, { personId, today }),
    ]);

    return pairInteractions(
      medications.map((m) => m.name),
      parseRows(edgeRows, interactionRowSchema, 'interactions')
    );
  }

  async findHereditaryRisks(personId: string): Promise<HereditaryRisk[]> {
    const rows = parseRows(
      await this.reader.read(HEREDITARY_RISKS, { personId }),
      hereditaryRiskRowSchema,
      'hereditaryRisks'
    );
    return rows.map(({ parentProperties, ...risk }) => ({
      ...risk,
      parentSharing: extractSharingFlags(parentProperties),
    }));
  }

  async findSimilarLabEvents(
    personId: string,
    labEventId: string,
    limit: number
  ): Promise<LabEventCandidate[] | null> {
    const [source] = parseRows(
      await this.reader.read(SOURCE_LAB_EVENT, { personId, labEventId }),
      sourceLabEventRowSchema,
      'sourceLabEvent'
    );
    if (!source?.embedded) return null;

    const rows = await this.reader.read(SIMILAR_LAB_EVENTS, {
      personId,
      labEventId,
      minScore: MIN_SIMILAR_SCORE,
      limit: toCypherInt(limit),
    });
    return parseRows(rows, candidateRowSchema, 'similarLabEvents');
  }

  async getEmbeddingStats(): Promise<EmbeddingStats> {
    const [countRows, indexRows] = await Promise.all([
      this.reader.read(EMBEDDING_COUNTS),
      this.reader.read(VECTOR_INDEXES),
    ]);
    const [counts] = parseRows(countRows, embeddingCountsRowSchema, 'embeddingCounts');
    return summarizeEmbeddingStats(
      counts ?? { total: 0, withEmbeddings: 0, withSummaries: 0 },
      parseRows(indexRows, indexNameRowSchema, 'vectorIndexes').map((row) => row.name)
    );
  }

  private async conditions(personId: string): Promise<ConditionRecord[]> {
    return parseRows(await this.reader.read(CONDITIONS, { personId }), conditionRowSchema, 'conditions');
  }

  private async activeMedications(personId: string, today: string): Promise<MedicationRecord[]> {
    return parseRows(
      await this.reader.read(ACTIVE_MEDICATIONS, { personId, today }),
      medicationRowSchema,
      'activeMedications'
    );
  }

  private async appointments(personId: string, window: DateWindow): Promise<AppointmentRecord[]> {
    return parseRows(
      await this.reader.read(APPOINTMENTS_IN_WINDOW, { personId, from: window.from, to: window.to }),
      appointmentRowSchema,
      'appointments'
    );
  }
}

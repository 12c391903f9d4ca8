import { KincareValidationError } from '../errors.js';
import type { ChatApiTransport } from '../http.js';
import type {
  EmbeddingStats,
  HereditaryRisk,
  HereditaryRisksInput,
  HistoryMatch,
  MedicationInteraction,
  SearchHistoryInput,
  SearchHistoryResult,
  SimilarLabEventsInput,
  SimilarLabEventsResult,
} from '../types.js';

interface HistoryMatchWire {
  lab_event_id: string;
  person_id: string;
  date: string | null;
  summary: string;
  score: number;
  lab_results: Array<{
    test_name: string;
    value: string | null;
    unit: string | null;
    reference_range: string | null;
    flag: string | null;
  }>;
  conditions: Array<{
    name: string;
    icd10_code: string | null;
    status: string | null;
    diagnosis_date: string | null;
  }>;
  medications: Array<{ name: string; dosage: string | null; frequency: string | null }>;
  appointments: Array<{
    id: string;
    date: string;
    time: string | null;
    provider: string | null;
    purpose: string | null;
  }>;
}

interface InteractionWire {
  medication_a: string;
  medication_b: string;
  severity: string | null;
  description: string | null;
}

interface HereditaryRiskWire {
  parent_id: string;
  parent_name: string;
  condition: string;
  inheritance_pattern: string;
  risk_percent: number;
}

interface SimilarLabEventWire {
  lab_event_id: string;
  date: string | null;
  summary: string;
  score: number;
}

interface EmbeddingStatsWire {
  total_lab_events: number;
  with_embeddings: number;
  with_summaries: number;
  missing_embeddings: number;
  coverage_percent: number;
  vector_indexes: string[];
}

function memberPath(method: string, familyMemberId: string): string {
  if (!familyMemberId || familyMemberId.trim().length === 0) {
    throw new KincareValidationError(`${method} requires familyMemberId`, {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  return `/graph/members/${encodeURIComponent(familyMemberId)}`;
}

function assertTopK(method: string, topK: number | undefined): void {
  if (topK !== undefined && (!Number.isInteger(topK) || topK <= 0)) {
    throw new KincareValidationError(`${method} topK must be a positive integer`, {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
}

function mapMatch(wire: HistoryMatchWire): HistoryMatch {
  return {
    labEventId: wire.lab_event_id,
    personId: wire.person_id,
    date: wire.date,
    summary: wire.summary,
    score: wire.score,
    labResults: wire.lab_results.map((result) => ({
      testName: result.test_name,
      value: result.value,
      unit: result.unit,
      referenceRange: result.reference_range,
      flag: result.flag,
    })),
    conditions: wire.conditions.map((condition) => ({
      name: condition.name,
      icd10Code: condition.icd10_code,
      status: condition.status,
      diagnosisDate: condition.diagnosis_date,
    })),
    medications: wire.medications,
    appointments: wire.appointments,
  };
}

export async function searchHistoryMethod(
  api: ChatApiTransport,
  input: SearchHistoryInput,
): Promise<SearchHistoryResult> {
  if (!input.query || input.query.trim().length === 0) {
    throw new KincareValidationError('searchHistory requires a non-empty query', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  assertTopK('searchHistory', input.topK);

  const { data, meta } = await api.page<HistoryMatchWire[], { total: number; topK: number }>({
    method: 'GET',
    path: '/graph/search',
    params: {
      query: input.query,
      familyMemberId: input.familyMemberId,
      topK: input.topK,
      actorId: input.actorId,
    },
  });

  return {
    matches: data.map(mapMatch),
    total: meta.total,
    topK: meta.topK,
  };
}

export async function getMedicationInteractionsMethod(
  api: ChatApiTransport,
  familyMemberId: string,
): Promise<MedicationInteraction[]> {
  const interactions = await api.data<InteractionWire[]>({
    method: 'GET',
    path: `${memberPath('getMedicationInteractions', familyMemberId)}/interactions`,
  });

  return interactions.map((interaction) => ({
    medicationA: interaction.medication_a,
    medicationB: interaction.medication_b,
    severity: interaction.severity,
    description: interaction.description,
  }));
}

export async function getHereditaryRisksMethod(
  api: ChatApiTransport,
  input: HereditaryRisksInput,
): Promise<HereditaryRisk[]> {
  const risks = await api.data<HereditaryRiskWire[]>({
    method: 'GET',
    path: `${memberPath('getHereditaryRisks', input.familyMemberId)}/hereditary-risks`,
    params: { actorId: input.actorId },
  });

  return risks.map((risk) => ({
    parentId: risk.parent_id,
    parentName: risk.parent_name,
    condition: risk.condition,
    inheritancePattern: risk.inheritance_pattern,
    riskPercent: risk.risk_percent,
  }));
}

export async function findSimilarLabEventsMethod(
  api: ChatApiTransport,
  input: SimilarLabEventsInput,
): Promise<SimilarLabEventsResult> {
  if (!input.labEventId || input.labEventId.trim().length === 0) {
    throw new KincareValidationError('findSimilarLabEvents requires labEventId', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  assertTopK('findSimilarLabEvents', input.topK);

  const { data, meta } = await api.page<
    SimilarLabEventWire[],
    { total: number; topK: number; sourceLabEventId: string }
  >({
    method: 'GET',
    path: `${memberPath('findSimilarLabEvents', input.familyMemberId)}/lab-events/${encodeURIComponent(
      input.labEventId,
    )}/similar`,
    params: { topK: input.topK, actorId: input.actorId },
  });

  return {
    sourceLabEventId: meta.sourceLabEventId,
    labEvents: data.map((event) => ({
      labEventId: event.lab_event_id,
      date: event.date,
      summary: event.summary,
      score: event.score,
    })),
    total: meta.total,
    topK: meta.topK,
  };
}

export async function getEmbeddingStatsMethod(api: ChatApiTransport): Promise<EmbeddingStats> {
  const stats = await api.data<EmbeddingStatsWire>({ method: 'GET', path: '/graph/embedding-stats' });

  return {
    totalLabEvents: stats.total_lab_events,
    withEmbeddings: stats.with_embeddings,
    withSummaries: stats.with_summaries,
    missingEmbeddings: stats.missing_embeddings,
    coveragePercent: stats.coverage_percent,
    vectorIndexes: stats.vector_indexes,
  };
}

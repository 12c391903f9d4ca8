/**
 * Graph Routes
 *
 * Read endpoints over the family health graph
 *
 * Routes:
 * - GET /v1/graph/search                                      - Semantic search over a member's lab history
 * - GET /v1/graph/members/:id/interactions                    - Interacting pairs among active medications
 * - GET /v1/graph/members/:id/hereditary-risks                - Parents' hereditary conditions
 * - GET /v1/graph/members/:id/lab-events/:labEventId/similar  - Closest of the member's other lab events
 * - GET /v1/graph/embedding-stats                             - Lab event embedding coverage
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { LabEventNotFoundError, RetrievalUnavailableError } from '@/errors/chat';
import { resolveActorContext } from '@/services/consent.service';
import type {
  EmbeddingStats,
  HealthProfile,
  HereditaryRisk,
  LabEventCandidate,
  MedicationInteraction,
} from '@/services/graph.service';
import { resolveTopK, type ContextItem } from '@/services/retrieval.service';
import type { HonoEnv } from '@/types/hono';
import { dateWindow, toIsoDate } from '@/utils/dates';
import { logger } from '@/utils/logger';
import { rejectInvalid } from '@/validators/api';
import {
  actorQuerySchema,
  labEventParamSchema,
  memberIdParamSchema,
  searchQuerySchema,
  similarQuerySchema,
} from '@/validators/graph';

const graph = new Hono<HonoEnv>();

function serializeItem(item: ContextItem) {
  return {
    lab_event_id: item.labEventId,
    person_id: item.personId,
    date: item.date,
    summary: item.summary,
    score: item.score,
    lab_results: item.labResults.map((result) => ({
      test_name: result.testName,
      value: result.value,
      unit: result.unit,
      reference_range: result.referenceRange,
      flag: result.flag,
    })),
    conditions: item.conditions.map((condition) => ({
      name: condition.name,
      icd10_code: condition.icd10Code,
      status: condition.status,
      diagnosis_date: condition.diagnosisDate,
    })),
    medications: item.medications.map((medication) => ({
      name: medication.name,
      dosage: medication.dosage,
      frequency: medication.frequency,
    })),
    appointments: item.appointments.map((appointment) => ({
      id: appointment.id,
      date: appointment.date,
      time: appointment.time,
      provider: appointment.provider,
      purpose: appointment.purpose,
    })),
  };
}

function serializeInteraction(interaction: MedicationInteraction) {
  return {
    medication_a: interaction.medicationA,
    medication_b: interaction.medicationB,
    severity: interaction.severity,
    description: interaction.description,
  };
}

function serializeRisk(risk: HereditaryRisk) {
  return {
    parent_id: risk.parentId,
    parent_name: risk.parentName,
    condition: risk.condition,
    inheritance_pattern: risk.inheritancePattern,
    risk_percent: risk.riskPercent,
  };
}

function serializeSimilar(candidate: LabEventCandidate) {
  return {
    lab_event_id: candidate.labEventId,
    date: candidate.date,
    summary: candidate.summary,
    score: candidate.score,
  };
}

function serializeStats(stats: EmbeddingStats) {
  return {
    total_lab_events: stats.totalLabEvents,
    with_embeddings: stats.withEmbeddings,
    with_summaries: stats.withSummaries,
    missing_embeddings: stats.missingEmbeddings,
    coverage_percent: stats.coveragePercent,
    vector_indexes: stats.vectorIndexes,
  };
}

/**
 * GET /v1/graph/search
 *
 * Same retrieval and privacy filtering a chat turn uses. Returns no items
 * for a member the graph does not know.
 */
graph.get('/search', zValidator('query', searchQuerySchema, rejectInvalid), async (c) => {
  const { graph: graphLayer, retrieval, privacy, consent, settings, now } = c.get('services');
  const query = c.req.valid('query');
  const today = now();
  const topK = query.topK ?? settings.defaultTopK;

  let profile: HealthProfile | null;
  try {
    profile = await graphLayer.getHealthProfile(
      query.familyMemberId,
      dateWindow(today, settings.recencyWindowMonths),
      toIsoDate(today)
    );
  } catch (error) {
    throw new RetrievalUnavailableError('Health profile lookup failed', error);
  }

  if (!profile) {
    logger.debug('Search for unknown family member');
    return c.json({ data: [], meta: { total: 0, topK } });
  }

  const actor = await resolveActorContext(consent, query.actorId ?? query.familyMemberId, [
    { id: profile.person.id, sharing: profile.person.sharing },
  ]);
  const retrieved = await retrieval.retrieve({
    query: query.query,
    personId: query.familyMemberId,
    topK,
  });
  const items = privacy.filterContextItems(retrieved, actor);

  return c.json({
    data: items.map(serializeItem),
    meta: { total: items.length, topK },
  });
});

graph.get(
  '/members/:id/interactions',
  zValidator('param', memberIdParamSchema, rejectInvalid),
  async (c) => {
    const { graph: graphLayer, now } = c.get('services');
    const { id } = c.req.valid('param');

    let interactions: MedicationInteraction[];
    try {
      interactions = await graphLayer.findMedicationInteractions(id, toIsoDate(now()));
    } catch (error) {
      throw new RetrievalUnavailableError('Medication interaction lookup failed', error);
    }

    return c.json({
      data: interactions.map(serializeInteraction),
      meta: { total: interactions.length },
    });
  }
);

/**
 * GET /v1/graph/members/:id/hereditary-risks
 *
 * Conditions belong to the parent, so each is gated as the parent's unit.
 */
graph.get(
  '/members/:id/hereditary-risks',
  zValidator('param', memberIdParamSchema, rejectInvalid),
  zValidator('query', actorQuerySchema, rejectInvalid),
  async (c) => {
    const { graph: graphLayer, privacy, consent } = c.get('services');
    const { id } = c.req.valid('param');
    const { actorId } = c.req.valid('query');

    let risks: HereditaryRisk[];
    try {
      risks = await graphLayer.findHereditaryRisks(id);
    } catch (error) {
      throw new RetrievalUnavailableError('Hereditary risk lookup failed', error);
    }

    const parents = new Map(risks.map((risk) => [risk.parentId, risk.parentSharing]));
    const actor = await resolveActorContext(
      consent,
      actorId ?? id,
      [...parents].map(([parentId, sharing]) => ({ id: parentId, sharing }))
    );
    const visible = privacy.filterUnits(
      risks,
      (risk) => ({ personId: risk.parentId, privacy: risk.privacy, category: risk.category }),
      actor
    );

    return c.json({
      data: visible.map(serializeRisk),
      meta: { total: visible.length },
    });
  }
);

/**
 * GET /v1/graph/members/:id/lab-events/:labEventId/similar
 *
 * 404 when the lab event is not the member's or has no embedding.
 */
graph.get(
  '/members/:id/lab-events/:labEventId/similar',
  zValidator('param', labEventParamSchema, rejectInvalid),
  zValidator('query', similarQuerySchema, rejectInvalid),
  async (c) => {
    const { graph: graphLayer, privacy, consent, settings, now } = c.get('services');
    const { id, labEventId } = c.req.valid('param');
    const query = c.req.valid('query');
    const today = now();
    const topK = resolveTopK(query.topK ?? settings.defaultTopK, settings.maxTopK);

    let profile: HealthProfile | null;
    let similar: LabEventCandidate[] | null;
    try {
      [profile, similar] = await Promise.all([
        graphLayer.getHealthProfile(id, dateWindow(today, settings.recencyWindowMonths), toIsoDate(today)),
        graphLayer.findSimilarLabEvents(id, labEventId, topK),
      ]);
    } catch (error) {
      throw new RetrievalUnavailableError('Similar lab event lookup failed', error);
    }

    if (!profile || !similar) {
      throw new LabEventNotFoundError(labEventId);
    }

    const actor = await resolveActorContext(consent, query.actorId ?? id, [
      { id: profile.person.id, sharing: profile.person.sharing },
    ]);
    const visible = privacy.filterUnits(similar, (candidate) => candidate, actor);

    return c.json({
      data: visible.map(serializeSimilar),
      meta: { total: visible.length, topK, sourceLabEventId: labEventId },
    });
  }
);

/**
 * GET /v1/graph/embedding-stats
 *
 * Counts only; no member data leaves this route.
 */
graph.get('/embedding-stats', async (c) => {
  const { graph: graphLayer } = c.get('services');

  let stats: EmbeddingStats;
  try {
    stats = await graphLayer.getEmbeddingStats();
  } catch (error) {
    throw new RetrievalUnavailableError('Embedding stats lookup failed', error);
  }

  return c.json({ data: serializeStats(stats) });
});

export default graph;

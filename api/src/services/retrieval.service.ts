/**
 * Retrieval Service: hybrid GraphRAG retrieval engine
 *
 * query → embedding → person-scoped cosine search → graph expansion → ranking
 *
 * Exports:
 *   Pure functions (no I/O):
 *     - resolveTopK()
 *     - rankContextItems()
 *
 *   Async orchestrator:
 *     - RetrievalEngine.retrieve()
 *
 * Read-only. Privacy filtering happens afterwards in the privacy gate;
 * every item here still carries its own classification.
 */

import type { EmbeddingGateway } from '@/services/embedding.service';
import type {
  AppointmentRecord,
  CandidateExpansion,
  ConditionRecord,
  GraphQueryLayer,
  LabEventCandidate,
  LabResultRecord,
  MedicationRecord,
  PrivacyLevel,
} from '@/services/graph.service';
import { ChatValidationError, ConfigurationError, RetrievalUnavailableError } from '@/errors/chat';
import { dateWindow, toIsoDate } from '@/utils/dates';
import { logger } from '@/utils/logger';

// ── Types ──────────────────────────────────────────────────────────────

export interface ContextItem {
  labEventId: string;
  personId: string;
  date: string | null;
  summary: string;
  score: number;
  privacy: PrivacyLevel;
  category: string | null;
  labResults: LabResultRecord[];
  conditions: ConditionRecord[];
  medications: MedicationRecord[];
  appointments: AppointmentRecord[];
}

export interface RetrievalRequest {
  query: string;
  personId: string;
  topK: number;
  /** Months ahead of now for upcoming appointments */
  recencyWindowMonths?: number;
}

export interface RetrievalSettings {
  maxTopK: number;
  candidateMultiplier: number;
  recencyWindowMonths: number;
}

interface RetrievalEngineDeps {
  embeddings: EmbeddingGateway;
  graph: GraphQueryLayer;
  settings: RetrievalSettings;
  now?: () => Date;
}

// ── Pure Functions ─────────────────────────────────────────────────────

/**
 * Validate and cap the requested result count.
 * Values above the configured maximum are capped silently.
 */
export function resolveTopK(topK: number, maxTopK: number): number {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ChatValidationError('topK must be a positive integer', { topK });
  }
  return Math.min(topK, maxTopK);
}

/** Newer dates first; undated events last */
function compareDatesDesc(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? 1 : -1;
}

/**
 * Order by similarity descending, then event date descending, then id.
 * The id tie-break makes the ordering total.
 */
export function rankContextItems(items: ContextItem[], topK: number): ContextItem[] {
  return [...items]
    .sort((a, b) => {
      if (a.score !== b.score) return b.score - a.score;
      const byDate = compareDatesDesc(a.date, b.date);
      if (byDate !== 0) return byDate;
      return a.labEventId < b.labEventId ? -1 : a.labEventId > b.labEventId ? 1 : 0;
    })
    .slice(0, topK);
}

// ── Engine ─────────────────────────────────────────────────────────────

export class RetrievalEngine {
  private readonly embeddings: EmbeddingGateway;
  private readonly graph: GraphQueryLayer;
  private readonly settings: RetrievalSettings;
  private readonly now: () => Date;

  constructor(deps: RetrievalEngineDeps) {
    this.embeddings = deps.embeddings;
    this.graph = deps.graph;
    this.settings = deps.settings;
    this.now = deps.now ?? (() => new Date());
  }

  async retrieve(request: RetrievalRequest): Promise<ContextItem[]> {
    const topK = resolveTopK(request.topK, this.settings.maxTopK);
    const startTime = Date.now();

    let embedding: number[];
    try {
      embedding = await this.embeddings.embed(request.query);
    } catch (error) {
      throw new RetrievalUnavailableError('Query embedding failed', error);
    }
    if (embedding.length !== this.embeddings.dimension) {
      throw new ConfigurationError(
        `Query embedding has ${embedding.length} dimensions, expected ${this.embeddings.dimension}`
      );
    }

    const candidateLimit = topK * this.settings.candidateMultiplier;
    let candidates: LabEventCandidate[];
    try {
      candidates = await this.graph.searchLabEvents(request.personId, embedding, candidateLimit);
    } catch (error) {
      throw new RetrievalUnavailableError('Vector search failed', error);
    }

    const scoped = candidates.filter((candidate) => candidate.personId === request.personId);
    if (scoped.length !== candidates.length) {
      logger.error('Dropped lab events outside the requested person scope', {
        personId: request.personId,
        dropped: candidates.length - scoped.length,
      });
    }
    if (scoped.length === 0) {
      logger.debug('retrieve: no embedded lab events', { personId: request.personId });
      return [];
    }

    const now = this.now();
    const window = dateWindow(now, request.recencyWindowMonths ?? this.settings.recencyWindowMonths);
    let expansion: CandidateExpansion;
    try {
      expansion = await this.graph.expandCandidates(
        request.personId,
        scoped.map((candidate) => candidate.labEventId),
        window,
        toIsoDate(now)
      );
    } catch (error) {
      throw new RetrievalUnavailableError('Graph expansion failed', error);
    }

    const items: ContextItem[] = scoped.map((candidate) => ({
      labEventId: candidate.labEventId,
      personId: candidate.personId,
      date: candidate.date,
      summary: candidate.summary,
      score: candidate.score,
      privacy: candidate.privacy,
      category: candidate.category,
      labResults: expansion.labResults.get(candidate.labEventId) ?? [],
      conditions: expansion.conditions,
      medications: expansion.medications,
      appointments: expansion.appointments,
    }));

    const ranked = rankContextItems(items, topK);
    logger.debug('retrieve complete', {
      personId: request.personId,
      candidates: scoped.length,
      returned: ranked.length,
      timingMs: Date.now() - startTime,
    });
    return ranked;
  }
}

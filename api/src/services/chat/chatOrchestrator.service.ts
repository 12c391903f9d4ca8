/**
 * Chat Orchestrator
 *
 * Runs one chat turn end to end:
 *   validate → persist user message → profile + retrieval → privacy gate →
 *   assemble context → stream completion → persist assistant message
 *
 * Turns of one session run strictly in submission order; turns of different
 * sessions run concurrently. The user message is stored before anything can
 * fail, so a failed turn leaves it in the transcript with no reply.
 *
 * A client that goes away stops receiving frames but the completion keeps
 * running and is persisted. An explicit cancel aborts the completion and
 * stores the partial reply with an interruption marker.
 */

import { randomUUID } from 'node:crypto';
import {
  ChatError,
  ChatValidationError,
  GenerationCancelledError,
  GenerationFailureError,
  RetrievalUnavailableError,
  SessionNotFoundError,
  SessionStoreUnavailableError,
  describeError,
} from '@/errors/chat';
import { resolveActorContext, type ConsentStore } from '@/services/consent.service';
import { assembleContext, type AssembledContext } from '@/services/contextAssembler.service';
import type { GraphQueryLayer, HealthProfile } from '@/services/graph.service';
import type { LlmGateway } from '@/services/llm.service';
import type { ActorContext, PrivacyGate } from '@/services/privacy.service';
import { buildChatPrompt } from '@/services/prompt.service';
import type { ContextItem, RetrievalEngine } from '@/services/retrieval.service';
import {
  DEFAULT_SESSION_TITLE,
  type ChatMessageRecord,
  type ChatSessionRecord,
  type RagContextEntry,
  type SessionStore,
} from '@/services/sessionStore.service';
import type { TitleGenerator } from '@/services/title.service';
import { KeyedSerialQueue } from '@/services/chat/turnQueue';
import { TurnStateMachine, type TurnState } from '@/services/chat/turnState';
import { dateWindow, toIsoDate } from '@/utils/dates';
import { logger, type Logger } from '@/utils/logger';
import type { ChatServerMessage } from '@/ws/protocol';

export const INTERRUPTED_MARKER = '\n\n[response interrupted]';

// ── Types ──────────────────────────────────────────────────────────────

export interface ChatTurnInput {
  sessionId?: string;
  familyMemberId: string;
  message: string;
  /** Base64 image passed to the model, never stored */
  image?: string;
  /** Stored reference to the uploaded image */
  imageRef?: string;
  /** Who is asking; defaults to the member the session belongs to */
  actorId?: string;
}

/** Where a turn's frames go. Frames are dropped once the sink detaches. */
export interface TurnSink {
  send(message: ChatServerMessage): void;
  isAttached(): boolean;
}

export interface TurnOutcome {
  sessionId: string;
  state: TurnState;
  assistantMessage?: ChatMessageRecord;
  error?: ChatError;
}

export interface ChatOrchestratorSettings {
  chatModel: string;
  defaultTopK: number;
  recencyWindowMonths: number;
  contextBudgetChars: number;
  historyMaxMessages: number;
}

export interface ChatOrchestratorDeps {
  sessions: SessionStore;
  consent: ConsentStore;
  graph: GraphQueryLayer;
  retrieval: RetrievalEngine;
  privacy: PrivacyGate;
  llm: LlmGateway;
  titles: TitleGenerator;
  settings: ChatOrchestratorSettings;
  now?: () => Date;
}

interface PreparedContext {
  context: AssembledContext;
  items: ContextItem[];
}

// ── Orchestrator ───────────────────────────────────────────────────────

export class ChatOrchestrator {
  private readonly queue = new KeyedSerialQueue();
  private readonly inflight = new Map<string, AbortController>();
  private readonly titlesInFlight = new Set<string>();
  private readonly now: () => Date;

  constructor(private readonly deps: ChatOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Queue a turn. Rejects with ChatValidationError or SessionNotFoundError
   * for bad input; every later failure resolves as an Errored outcome and is
   * reported to the sink.
   */
  async submitTurn(input: ChatTurnInput, sink: TurnSink): Promise<TurnOutcome> {
    const familyMemberId = input.familyMemberId.trim();
    if (!familyMemberId) {
      throw new ChatValidationError('familyMemberId is required');
    }
    if (input.message.trim().length === 0 && !input.image) {
      throw new ChatValidationError('A message or an image is required');
    }

    const turn = { ...input, familyMemberId };
    const start = (session: ChatSessionRecord) => {
      deliver(sink, { type: 'session', sessionId: session.id, title: session.title });
      return this.runTurn(session, turn, sink);
    };

    // Join the session's queue before the first await; the lookup runs inside the turn
    if (input.sessionId) {
      const sessionId = input.sessionId;
      return this.queue.run(sessionId, async () => start(await this.resolveSession(sessionId, familyMemberId)));
    }

    const session = await this.resolveSession(undefined, familyMemberId);
    return this.queue.run(session.id, () => start(session));
  }

  /** Abort the in-flight completion of a session. Returns false when idle. */
  cancel(sessionId: string): boolean {
    const controller = this.inflight.get(sessionId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  private async resolveSession(sessionId: string | undefined, familyMemberId: string): Promise<ChatSessionRecord> {
    let session: ChatSessionRecord | null;
    try {
      session = sessionId
        ? await this.deps.sessions.getSession(sessionId)
        : await this.deps.sessions.createSession({ familyMemberId });
    } catch (error) {
      throw new SessionStoreUnavailableError('Session lookup failed', error);
    }

    if (!session) throw new SessionNotFoundError(sessionId ?? 'new');
    if (session.familyMemberId !== familyMemberId) {
      throw new ChatValidationError('Session belongs to a different family member');
    }
    return session;
  }

  private async runTurn(session: ChatSessionRecord, input: ChatTurnInput, sink: TurnSink): Promise<TurnOutcome> {
    const machine = new TurnStateMachine();
    const log = logger.child({ sessionId: session.id, turnId: randomUUID() });
    const controller = new AbortController();
    this.inflight.set(session.id, controller);
    const startTime = Date.now();

    const fail = (error: ChatError): TurnOutcome => {
      machine.transition('Errored');
      log.warn('Chat turn failed', { code: error.code, error: describeError(error.cause ?? error) });
      deliver(sink, {
        type: 'error',
        sessionId: session.id,
        code: error.code,
        message: error.userMessage,
        retryable: error.retryable,
      });
      return { sessionId: session.id, state: machine.state, error };
    };

    try {
      machine.transition('AwaitingContext');

      let history: ChatMessageRecord[];
      try {
        history = await this.deps.sessions.recentMessages(session.id, this.deps.settings.historyMaxMessages);
        await this.deps.sessions.appendMessage({
          sessionId: session.id,
          role: 'user',
          content: input.message,
          imageRef: input.imageRef ?? null,
        });
      } catch (error) {
        return fail(new SessionStoreUnavailableError('Could not store the user message', error));
      }

      let prepared: PreparedContext;
      try {
        prepared = await this.prepareContext(input, log);
      } catch (error) {
        return fail(
          error instanceof ChatError ? error : new RetrievalUnavailableError('Context preparation failed', error)
        );
      }
      deliver(sink, {
        type: 'context',
        sessionId: session.id,
        labEventIds: prepared.context.includedLabEventIds,
        droppedUnits: prepared.context.droppedUnits,
      });

      machine.transition('AwaitingCompletion');
      const messages = buildChatPrompt({
        systemContext: prepared.context.text,
        history,
        message: input.message,
        image: input.image,
      });

      let partial = '';
      let content: string;
      let model = this.deps.settings.chatModel;
      let truncated = false;
      try {
        const completion = await this.deps.llm.streamChat(
          { model: this.deps.settings.chatModel, messages, signal: controller.signal },
          (token) => {
            if (machine.state === 'AwaitingCompletion') machine.transition('Streaming');
            partial += token;
            deliver(sink, { type: 'token', sessionId: session.id, content: token });
          }
        );
        content = completion.content;
        model = completion.model;
      } catch (error) {
        if (!(error instanceof GenerationCancelledError)) {
          return fail(error instanceof ChatError ? error : new GenerationFailureError('Completion failed', error));
        }
        content = partial ? `${partial}${INTERRUPTED_MARKER}` : INTERRUPTED_MARKER.trim();
        truncated = true;
        log.info('Chat turn cancelled by client', { partialChars: partial.length });
      }

      let assistantMessage: ChatMessageRecord;
      try {
        assistantMessage = await this.deps.sessions.appendMessage({
          sessionId: session.id,
          role: 'assistant',
          content,
          model,
          ragContext: toRagContext(prepared),
        });
      } catch (error) {
        return fail(new SessionStoreUnavailableError('Could not store the assistant message', error));
      }

      machine.transition('Finalized');
      deliver(sink, {
        type: 'done',
        sessionId: session.id,
        messageId: assistantMessage.id,
        content,
        model,
        truncated,
      });
      log.info('Chat turn finalized', {
        durationMs: Date.now() - startTime,
        contextItems: prepared.context.includedLabEventIds.length,
        truncated,
        attached: sink.isAttached(),
      });

      if (!truncated && session.title === DEFAULT_SESSION_TITLE) {
        this.scheduleTitle(session.id, log);
      }

      return { sessionId: session.id, state: machine.state, assistantMessage };
    } finally {
      if (this.inflight.get(session.id) === controller) {
        this.inflight.delete(session.id);
      }
    }
  }

  /**
   * Profile, retrieval and privacy filtering for the turn's member.
   * An unknown member gets the persona alone.
   */
  private async prepareContext(input: ChatTurnInput, log: Logger): Promise<PreparedContext> {
    const { graph, retrieval, privacy, consent, settings } = this.deps;
    const now = this.now();

    let profile: HealthProfile | null;
    try {
      profile = await graph.getHealthProfile(
        input.familyMemberId,
        dateWindow(now, settings.recencyWindowMonths),
        toIsoDate(now)
      );
    } catch (error) {
      throw new RetrievalUnavailableError('Health profile lookup failed', error);
    }

    if (!profile) {
      log.warn('Family member not found in graph, using persona only');
      return {
        context: assembleContext({ profile: null, retrieved: [], budget: settings.contextBudgetChars }),
        items: [],
      };
    }

    let actor: ActorContext;
    try {
      actor = await resolveActorContext(consent, input.actorId ?? input.familyMemberId, [
        { id: profile.person.id, sharing: profile.person.sharing },
      ]);
    } catch (error) {
      throw new RetrievalUnavailableError('Consent lookup failed', error);
    }

    const retrieved = input.message.trim()
      ? await retrieval.retrieve({
          query: input.message,
          personId: input.familyMemberId,
          topK: settings.defaultTopK,
          recencyWindowMonths: settings.recencyWindowMonths,
        })
      : [];

    const items = privacy.filterContextItems(retrieved, actor);
    const context = assembleContext({
      profile: privacy.filterProfile(profile, actor),
      retrieved: items,
      budget: settings.contextBudgetChars,
    });
    return { context, items };
  }

  private scheduleTitle(sessionId: string, log: Logger): void {
    if (this.titlesInFlight.has(sessionId)) return;
    this.titlesInFlight.add(sessionId);

    void this.deps.titles
      .generateTitle(sessionId)
      .then((session) => log.debug('Session title generated', { titleChars: session.title.length }))
      .catch((error: unknown) => log.warn('Session title generation failed', { error: describeError(error) }))
      .finally(() => this.titlesInFlight.delete(sessionId));
  }
}

// ── Helpers ────────────────────────────────────────────────────────────

function deliver(sink: TurnSink, message: ChatServerMessage): void {
  if (!sink.isAttached()) return;
  try {
    sink.send(message);
  } catch (error) {
    logger.warn('Dropping chat frame for unreachable client', { type: message.type, error: describeError(error) });
  }
}

function toRagContext(prepared: PreparedContext): RagContextEntry[] {
  const included = new Set(prepared.context.includedLabEventIds);
  return prepared.items
    .filter((item) => included.has(item.labEventId))
    .map((item) => ({ labEventId: item.labEventId, personId: item.personId, score: item.score }));
}

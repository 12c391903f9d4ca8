import { describe, it, expect, vi } from 'vitest';
import {
  ChatValidationError,
  GenerationFailureError,
  GenerationTimeoutError,
  SessionNotFoundError,
} from '@/errors/chat';
import { INTERRUPTED_MARKER } from '@/services/chat/chatOrchestrator.service';
import { PERSONA_TEMPLATE } from '@/services/contextAssembler.service';
import { InMemorySessionStore, type ChatSessionRecord } from '@/services/sessionStore.service';
import { A1C_QUESTION as QUESTION, ANA, LEO, createTestContext, seedFamily, type TestContext } from '../../../helpers/app';
import { RecordingSink, deferred } from '../../../helpers/fakes';

// =====================================================
// Helpers
// =====================================================

function setup(overrides: Parameters<typeof createTestContext>[0] = {}) {
  const ctx = createTestContext(overrides);
  seedFamily(ctx);
  return ctx;
}

function systemPrompt(ctx: TestContext, index = 0): string {
  return ctx.llm.streamRequests[index]?.messages[0]?.content ?? '';
}

async function transcript(ctx: TestContext, sessionId: string) {
  const messages = await ctx.sessions.listMessages(sessionId, { limit: 100, offset: 0 });
  return messages.map((m) => `${m.role}:${m.content}`);
}

/** Holds the first session lookup until `release` is called */
class SlowFirstLookupStore extends InMemorySessionStore {
  private readonly firstLookup = deferred();
  private lookups = 0;

  release(): void {
    this.firstLookup.resolve();
  }

  async getSession(id: string): Promise<ChatSessionRecord | null> {
    this.lookups++;
    if (this.lookups === 1) await this.firstLookup.promise;
    return super.getSession(id);
  }
}

function flush() {
  return new Promise((resolve) => setImmediate(resolve));
}

// =====================================================
// Tests
// =====================================================

describe('ChatOrchestrator', () => {
  describe('completed turns', () => {
    it('answers from the retrieved lab event and the profile condition', async () => {
      const ctx = setup();
      ctx.llm.enqueue({ kind: 'reply', tokens: ['Your A1C', ' was 5.8%.'] });
      const sink = new RecordingSink();

      const outcome = await ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: QUESTION }, sink);

      expect(outcome.state).toBe('Finalized');
      expect(sink.types()).toEqual(['session', 'context', 'token', 'token', 'done']);
      expect(sink.ofType('context')[0].labEventIds).toEqual(['lab-a1c']);
      expect(sink.ofType('done')[0]).toMatchObject({
        content: 'Your A1C was 5.8%.',
        model: 'test-chat-model',
        truncated: false,
      });

      const prompt = systemPrompt(ctx);
      expect(prompt).toContain('- Lab event 2024-11-20: A1C 5.8% Nov 2024');
      expect(prompt).toContain('- Condition: Prediabetes (R73.03), active');
    });

    it('persists the user message, then the assistant reply with its rag context', async () => {
      const ctx = setup();
      ctx.llm.enqueue({ kind: 'reply', tokens: ['Your A1C was 5.8%.'] });

      const outcome = await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: QUESTION },
        new RecordingSink()
      );

      expect(await transcript(ctx, outcome.sessionId)).toEqual([`user:${QUESTION}`, 'assistant:Your A1C was 5.8%.']);
      expect(outcome.assistantMessage?.ragContext).toEqual([{ labEventId: 'lab-a1c', personId: ANA, score: 1 }]);
      expect(outcome.assistantMessage?.model).toBe('test-chat-model');
    });

    it('keeps consent_required conditions away from a relative without consent', async () => {
      const ctx = setup();

      await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: QUESTION, actorId: LEO },
        new RecordingSink()
      );

      expect(systemPrompt(ctx)).toContain('Prediabetes');
      expect(systemPrompt(ctx)).not.toContain('Genital herpes');
    });

    it('shows the member their own consent_required conditions', async () => {
      const ctx = setup();

      await ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: QUESTION }, new RecordingSink());

      expect(systemPrompt(ctx)).toContain('- Condition: Genital herpes, active');
    });

    it('includes a relative once consent is granted', async () => {
      const ctx = setup();
      await ctx.consent.grant({ actorId: LEO, personId: ANA, category: 'sexual_health' });

      await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: QUESTION, actorId: LEO },
        new RecordingSink()
      );

      expect(systemPrompt(ctx)).toContain('Genital herpes');
    });

    it('falls back to the persona alone for a member the graph does not know', async () => {
      const ctx = setup();

      const outcome = await ctx.services.orchestrator.submitTurn(
        { familyMemberId: 'member-removed', message: QUESTION },
        new RecordingSink()
      );

      expect(outcome.state).toBe('Finalized');
      expect(systemPrompt(ctx)).toBe(`### PERSONA\n${PERSONA_TEMPLATE}`);
      expect(ctx.embeddings.calls).toEqual([]);
    });

    it('sends prior turns as history, capped at the configured count', async () => {
      const ctx = setup({ settings: { chat: { contextBudgetChars: 6_000, historyMaxMessages: 2 } } });
      const session = await ctx.sessions.createSession({ familyMemberId: ANA, title: 'Labs' });
      for (const [role, content] of [
        ['user', 'q1'],
        ['assistant', 'a1'],
        ['user', 'q2'],
        ['assistant', 'a2'],
      ] as const) {
        await ctx.sessions.appendMessage({ sessionId: session.id, role, content });
      }

      await ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: ANA, message: QUESTION },
        new RecordingSink()
      );

      const sent = ctx.llm.streamRequests[0].messages.map((m) => `${m.role}:${m.content}`);
      expect(sent.slice(1)).toEqual(['user:q2', 'assistant:a2', `user:${QUESTION}`]);
    });

    it('passes an attached image to the model and stores its reference', async () => {
      const ctx = setup();

      const outcome = await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: '', image: 'aW1hZ2U=', imageRef: 'uploads/rash.png' },
        new RecordingSink()
      );

      const messages = ctx.llm.streamRequests[0].messages;
      expect(messages[messages.length - 1]).toEqual({ role: 'user', content: '', images: ['aW1hZ2U='] });
      expect(ctx.embeddings.calls).toEqual([]);
      const [stored] = await ctx.sessions.listMessages(outcome.sessionId, { limit: 1, offset: 0 });
      expect(stored.imageRef).toBe('uploads/rash.png');
    });
  });

  describe('validation', () => {
    it('rejects an empty message before any external call', async () => {
      const ctx = setup();

      await expect(
        ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: '   ' }, new RecordingSink())
      ).rejects.toBeInstanceOf(ChatValidationError);
      expect(await ctx.sessions.listSessions({ limit: 10 })).toEqual([]);
      expect(ctx.embeddings.calls).toEqual([]);
      expect(ctx.llm.streamRequests).toEqual([]);
    });

    it('rejects a missing family member', async () => {
      const ctx = setup();

      await expect(
        ctx.services.orchestrator.submitTurn({ familyMemberId: '', message: QUESTION }, new RecordingSink())
      ).rejects.toThrow('familyMemberId is required');
    });

    it('rejects an unknown session', async () => {
      const ctx = setup();

      await expect(
        ctx.services.orchestrator.submitTurn(
          { sessionId: '00000000-0000-4000-8000-000000000000', familyMemberId: ANA, message: QUESTION },
          new RecordingSink()
        )
      ).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it("rejects a session that belongs to another member", async () => {
      const ctx = setup();
      const session = await ctx.sessions.createSession({ familyMemberId: LEO });

      await expect(
        ctx.services.orchestrator.submitTurn(
          { sessionId: session.id, familyMemberId: ANA, message: QUESTION },
          new RecordingSink()
        )
      ).rejects.toThrow('Session belongs to a different family member');
    });
  });

  describe('failed turns', () => {
    it('errors with GenerationTimeout, keeps the user message and stores no reply', async () => {
      const ctx = setup();
      ctx.llm.enqueue({ kind: 'fail', error: new GenerationTimeoutError(180_000), tokens: ['Your A1C'] });
      const sink = new RecordingSink();

      const outcome = await ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: QUESTION }, sink);

      expect(outcome.state).toBe('Errored');
      expect(outcome.error?.code).toBe('GENERATION_TIMEOUT');
      expect(await transcript(ctx, outcome.sessionId)).toEqual([`user:${QUESTION}`]);
      expect(sink.frames[sink.frames.length - 1]).toEqual({
        type: 'error',
        sessionId: outcome.sessionId,
        code: 'GENERATION_TIMEOUT',
        message: 'That took longer than expected. Please try asking again.',
        retryable: true,
      });
      expect(sink.ofType('done')).toEqual([]);
    });

    it('errors with GenerationFailure when the model fails', async () => {
      const ctx = setup();
      ctx.llm.enqueue({ kind: 'fail', error: new GenerationFailureError('model not found') });

      const outcome = await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: QUESTION },
        new RecordingSink()
      );

      expect(outcome.error?.code).toBe('GENERATION_FAILURE');
    });

    it('errors with RetrievalUnavailable when embedding fails, without calling the model', async () => {
      const ctx = setup();
      ctx.embeddings.failure = new Error('connect ECONNREFUSED 127.0.0.1:11434');
      const sink = new RecordingSink();

      const outcome = await ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: QUESTION }, sink);

      expect(outcome.state).toBe('Errored');
      expect(outcome.error?.code).toBe('RETRIEVAL_UNAVAILABLE');
      expect(ctx.llm.streamRequests).toEqual([]);
      expect(await transcript(ctx, outcome.sessionId)).toEqual([`user:${QUESTION}`]);
      expect(JSON.stringify(sink.frames)).not.toContain('ECONNREFUSED');
    });

    it('errors with RetrievalUnavailable when the graph is down', async () => {
      const ctx = setup();
      ctx.graph.failure = new Error('ServiceUnavailable');

      const outcome = await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: QUESTION },
        new RecordingSink()
      );

      expect(outcome.error?.code).toBe('RETRIEVAL_UNAVAILABLE');
    });
  });

  describe('ordering', () => {
    it('processes two rapid turns on one session strictly in submission order', async () => {
      const ctx = setup();
      const session = await ctx.sessions.createSession({ familyMemberId: ANA, title: 'Labs' });
      const gate = deferred();
      ctx.llm.enqueue({ kind: 'reply', tokens: ['reply one'], gate: gate.promise }, { kind: 'reply', tokens: ['reply two'] });

      const first = ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: ANA, message: 'first' },
        new RecordingSink()
      );
      const second = ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: ANA, message: 'second' },
        new RecordingSink()
      );

      await vi.waitFor(() => expect(ctx.llm.streamRequests).toHaveLength(1));
      await flush();
      expect(ctx.llm.streamRequests).toHaveLength(1);
      expect(await transcript(ctx, session.id)).toEqual(['user:first']);

      gate.resolve();
      await Promise.all([first, second]);

      expect(await transcript(ctx, session.id)).toEqual([
        'user:first',
        'assistant:reply one',
        'user:second',
        'assistant:reply two',
      ]);
      const secondHistory = ctx.llm.streamRequests[1].messages.slice(1).map((m) => m.content);
      expect(secondHistory).toEqual(['first', 'reply one', 'second']);
    });

    it('keeps submission order when the first session lookup answers last', async () => {
      let store: SlowFirstLookupStore | undefined;
      const ctx = setup({
        sessions: (clock) => {
          store = new SlowFirstLookupStore(clock);
          return store;
        },
      });
      const session = await ctx.sessions.createSession({ familyMemberId: ANA, title: 'Labs' });
      ctx.llm.enqueue({ kind: 'reply', tokens: ['reply one'] }, { kind: 'reply', tokens: ['reply two'] });

      const first = ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: ANA, message: 'first' },
        new RecordingSink()
      );
      const second = ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: ANA, message: 'second' },
        new RecordingSink()
      );
      await flush();
      expect(ctx.llm.streamRequests).toHaveLength(0);

      store?.release();
      await Promise.all([first, second]);

      expect(await transcript(ctx, session.id)).toEqual([
        'user:first',
        'assistant:reply one',
        'user:second',
        'assistant:reply two',
      ]);
    });

    it('rejects a queued turn that fails validation without blocking the next one', async () => {
      const ctx = setup();
      const session = await ctx.sessions.createSession({ familyMemberId: ANA, title: 'Labs' });

      const wrongMember = ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: LEO, message: 'first' },
        new RecordingSink()
      );
      const next = ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: ANA, message: 'second' },
        new RecordingSink()
      );

      await expect(wrongMember).rejects.toThrow('Session belongs to a different family member');
      expect((await next).state).toBe('Finalized');
      expect(await transcript(ctx, session.id)).toEqual(['user:second', 'assistant:OK']);
    });

    it('runs turns of different sessions concurrently', async () => {
      const ctx = setup();
      const gate = deferred();
      ctx.llm.enqueue({ kind: 'reply', tokens: ['slow'], gate: gate.promise }, { kind: 'reply', tokens: ['fast'] });

      const slow = ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: 'one' }, new RecordingSink());
      await vi.waitFor(() => expect(ctx.llm.streamRequests).toHaveLength(1));
      const fast = await ctx.services.orchestrator.submitTurn({ familyMemberId: LEO, message: 'two' }, new RecordingSink());

      expect(fast.state).toBe('Finalized');
      gate.resolve();
      expect((await slow).state).toBe('Finalized');
    });
  });

  describe('disconnect and cancel', () => {
    it('keeps generating after the client goes away and persists the full reply', async () => {
      const ctx = setup();
      ctx.llm.enqueue({ kind: 'reply', tokens: ['Your', ' A1C', ' was 5.8%.'] });
      const sink = new RecordingSink(1);

      const outcome = await ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: QUESTION }, sink);

      expect(sink.types()).toEqual(['session', 'context', 'token']);
      expect(outcome.state).toBe('Finalized');
      expect(await transcript(ctx, outcome.sessionId)).toEqual([`user:${QUESTION}`, 'assistant:Your A1C was 5.8%.']);
    });

    it('stores the partial reply with an interruption marker on cancel', async () => {
      const ctx = setup();
      ctx.llm.enqueue({ kind: 'stall', tokens: ['Your A1C was'] });
      const sink = new RecordingSink();

      const pending = ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: QUESTION }, sink);
      await vi.waitFor(() => expect(sink.ofType('token')).toHaveLength(1));
      const sessionId = sink.ofType('session')[0].sessionId;

      expect(ctx.services.orchestrator.cancel(sessionId)).toBe(true);
      const outcome = await pending;

      expect(outcome.state).toBe('Finalized');
      expect(outcome.assistantMessage?.content).toBe(`Your A1C was${INTERRUPTED_MARKER}`);
      expect(sink.ofType('done')[0]).toMatchObject({ truncated: true, content: 'Your A1C was\n\n[response interrupted]' });
    });

    it('reports false when cancelling a session with nothing in flight', () => {
      const ctx = setup();

      expect(ctx.services.orchestrator.cancel('00000000-0000-4000-8000-000000000000')).toBe(false);
    });
  });

  describe('title generation', () => {
    it('titles a new session in the background after its first reply', async () => {
      const ctx = setup();

      const outcome = await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: QUESTION },
        new RecordingSink()
      );

      await vi.waitFor(async () => {
        expect((await ctx.sessions.getSession(outcome.sessionId))?.title).toBe('Blood Sugar Follow Up');
      });
      expect(ctx.llm.completeRequests[0].model).toBe('test-title-model');
    });

    it('falls back to the first user message when the title model fails', async () => {
      const ctx = setup();
      ctx.llm.titleReply = new Error('model unavailable');

      const outcome = await ctx.services.orchestrator.submitTurn(
        { familyMemberId: ANA, message: QUESTION },
        new RecordingSink()
      );

      expect(outcome.state).toBe('Finalized');
      await vi.waitFor(async () => {
        expect((await ctx.sessions.getSession(outcome.sessionId))?.title).toBe(QUESTION);
      });
    });

    it('does not title a session from a cancelled reply', async () => {
      const ctx = setup();
      ctx.llm.enqueue({ kind: 'stall', tokens: ['Your A1C was'] });
      const sink = new RecordingSink();

      const pending = ctx.services.orchestrator.submitTurn({ familyMemberId: ANA, message: QUESTION }, sink);
      await vi.waitFor(() => expect(sink.ofType('token')).toHaveLength(1));
      ctx.services.orchestrator.cancel(sink.ofType('session')[0].sessionId);
      const outcome = await pending;
      await flush();

      expect(outcome.state).toBe('Finalized');
      expect(ctx.llm.completeRequests).toEqual([]);
      expect((await ctx.sessions.getSession(outcome.sessionId))?.title).toBe('New Chat');
    });

    it('leaves an already titled session alone', async () => {
      const ctx = setup();
      const session = await ctx.sessions.createSession({ familyMemberId: ANA, title: 'Lab questions' });

      await ctx.services.orchestrator.submitTurn(
        { sessionId: session.id, familyMemberId: ANA, message: QUESTION },
        new RecordingSink()
      );
      await flush();

      expect(ctx.llm.completeRequests).toEqual([]);
      expect((await ctx.sessions.getSession(session.id))?.title).toBe('Lab questions');
    });
  });
});

import { describe, expect, it } from 'vitest';
import { KincareClient } from '../../src/client.js';
import { KincareNotFoundError, KincareValidationError } from '../../src/errors.js';
import { FakeChatApi, SESSION_ID, grantWire, sessionWire } from '../fixtures/chatApi.js';

const BASE = 'https://care.example.test';

const session = {
  id: SESSION_ID,
  familyMemberId: 'member-ana',
  title: 'Blood Sugar Follow Up',
  isPinned: true,
  sortOrder: 2,
  createdAt: '2025-01-15T12:00:00.000Z',
  updatedAt: '2025-01-15T12:05:00.000Z',
};

function clientFor(api: FakeChatApi): KincareClient {
  return new KincareClient({ baseUrl: BASE, fetch: api.fetch });
}

describe('sessions', () => {
  it('maps a created session to camelCase', async () => {
    const api = new FakeChatApi().reply('POST', '/chat/sessions', sessionWire, { status: 201 });

    const created = await clientFor(api).createSession({
      familyMemberId: 'member-ana',
      title: 'Blood Sugar Follow Up',
    });

    expect(created).toEqual(session);
    expect(api.last?.body).toEqual({ familyMemberId: 'member-ana', title: 'Blood Sugar Follow Up' });
  });

  it('rejects a blank familyMemberId before calling the API', async () => {
    const api = new FakeChatApi();

    await expect(clientFor(api).createSession({ familyMemberId: '  ' })).rejects.toBeInstanceOf(
      KincareValidationError,
    );
    expect(api.hits).toHaveLength(0);
  });

  it('lists sessions with summary fields and skips unset params', async () => {
    const api = new FakeChatApi().reply(
      'GET',
      '/chat/sessions',
      [{ ...sessionWire, message_count: 4, last_message: 'what was my A1C' }],
      { meta: { total: 1, limit: 50 } },
    );

    const result = await clientFor(api).listSessions({ familyMemberId: 'member-ana' });

    expect(api.last?.params).toEqual({ familyMemberId: 'member-ana' });
    expect(result).toEqual({
      sessions: [{ ...session, messageCount: 4, lastMessage: 'what was my A1C' }],
      total: 1,
    });
  });

  it('patches a session with only the given fields', async () => {
    const api = new FakeChatApi().reply('PATCH', `/chat/sessions/${SESSION_ID}`, sessionWire);

    await clientFor(api).updateSession(SESSION_ID, { isPinned: true });

    expect(api.last?.body).toEqual({ isPinned: true });
  });

  it('refuses an empty patch', async () => {
    const api = new FakeChatApi();

    await expect(clientFor(api).updateSession(SESSION_ID, {})).rejects.toMatchObject({
      code: 'INVALID_ARGS',
      message: 'updateSession requires title, isPinned or sortOrder',
    });
    expect(api.hits).toHaveLength(0);
  });

  it('returns the reorder count and skips the call for no orders', async () => {
    const api = new FakeChatApi().reply('POST', '/chat/sessions/reorder', { updated: 2 });
    const client = clientFor(api);

    expect(await client.reorderSessions([])).toBe(0);
    expect(api.hits).toHaveLength(0);

    const updated = await client.reorderSessions([
      { id: SESSION_ID, sortOrder: 1 },
      { id: '0d6c2a57-7f7e-4b8e-8a5a-4b1f4f0e2c22', sortOrder: 0 },
    ]);

    expect(updated).toBe(2);
    expect(api.last?.body).toEqual({
      orders: [
        { id: SESSION_ID, sortOrder: 1 },
        { id: '0d6c2a57-7f7e-4b8e-8a5a-4b1f4f0e2c22', sortOrder: 0 },
      ],
    });
  });

  it('deletes a session', async () => {
    const api = new FakeChatApi().reply('DELETE', `/chat/sessions/${SESSION_ID}`, { id: SESSION_ID, deleted: true });

    await expect(clientFor(api).deleteSession(SESSION_ID)).resolves.toBeUndefined();
    expect(api.hits.map((hit) => `${hit.method} ${hit.path}`)).toEqual([`DELETE /chat/sessions/${SESSION_ID}`]);
  });

  it('pages messages and maps rag context', async () => {
    const api = new FakeChatApi().reply(
      'GET',
      `/chat/sessions/${SESSION_ID}/messages`,
      [
        {
          id: 'msg-2',
          session_id: SESSION_ID,
          seq: 2,
          role: 'assistant',
          content: 'Your A1C was 5.8% in November 2024.',
          image_ref: null,
          model: 'test-chat-model',
          rag_context: [{ labEventId: 'lab-a1c', personId: 'member-ana', score: 1 }],
          created_at: '2025-01-15T12:00:01.000Z',
        },
      ],
      { meta: { limit: 1, offset: 1, hasMore: true } },
    );

    const page = await clientFor(api).listMessages(SESSION_ID, { limit: 1, offset: 1 });

    expect(api.last?.url).toBe(`${BASE}/v1/chat/sessions/${SESSION_ID}/messages?limit=1&offset=1`);
    expect(page).toEqual({
      messages: [
        {
          id: 'msg-2',
          sessionId: SESSION_ID,
          seq: 2,
          role: 'assistant',
          content: 'Your A1C was 5.8% in November 2024.',
          imageRef: null,
          model: 'test-chat-model',
          ragContext: [{ labEventId: 'lab-a1c', personId: 'member-ana', score: 1 }],
          createdAt: '2025-01-15T12:00:01.000Z',
        },
      ],
      limit: 1,
      offset: 1,
      hasMore: true,
    });
  });

  it('asks the API to title a session', async () => {
    const api = new FakeChatApi().reply('POST', `/chat/sessions/${SESSION_ID}/generate-title`, sessionWire);

    const titled = await clientFor(api).generateTitle(SESSION_ID);

    expect(titled.title).toBe('Blood Sugar Follow Up');
  });
});

describe('graph', () => {
  it('searches history and maps nested records', async () => {
    const api = new FakeChatApi().reply(
      'GET',
      '/graph/search',
      [
        {
          lab_event_id: 'lab-a1c',
          person_id: 'member-ana',
          date: '2024-11-20',
          summary: 'A1C 5.8% Nov 2024',
          score: 1,
          lab_results: [
            { test_name: 'HbA1c', value: '5.8', unit: '%', reference_range: '4.0-5.6', flag: 'H' },
          ],
          conditions: [{ name: 'Prediabetes', icd10_code: 'R73.03', status: 'active', diagnosis_date: null }],
          medications: [],
          appointments: [],
        },
      ],
      { meta: { total: 1, topK: 3 } },
    );

    const result = await clientFor(api).searchHistory({
      query: 'what was my A1C',
      familyMemberId: 'member-ana',
      topK: 3,
      actorId: 'member-leo',
    });

    expect(api.last?.url).toBe(
      `${BASE}/v1/graph/search?query=what+was+my+A1C&familyMemberId=member-ana&topK=3&actorId=member-leo`,
    );
    expect(result).toEqual({
      matches: [
        {
          labEventId: 'lab-a1c',
          personId: 'member-ana',
          date: '2024-11-20',
          summary: 'A1C 5.8% Nov 2024',
          score: 1,
          labResults: [{ testName: 'HbA1c', value: '5.8', unit: '%', referenceRange: '4.0-5.6', flag: 'H' }],
          conditions: [{ name: 'Prediabetes', icd10Code: 'R73.03', status: 'active', diagnosisDate: null }],
          medications: [],
          appointments: [],
        },
      ],
      total: 1,
      topK: 3,
    });
  });

  it('validates query and topK locally', async () => {
    const api = new FakeChatApi();
    const client = clientFor(api);

    await expect(client.searchHistory({ query: ' ', familyMemberId: 'member-ana' })).rejects.toMatchObject({
      message: 'searchHistory requires a non-empty query',
    });
    await expect(
      client.searchHistory({ query: 'a1c', familyMemberId: 'member-ana', topK: 0 }),
    ).rejects.toMatchObject({ message: 'searchHistory topK must be a positive integer' });
    expect(api.hits).toHaveLength(0);
  });

  it('maps medication interactions', async () => {
    const api = new FakeChatApi().reply(
      'GET',
      '/graph/members/member-gran/interactions',
      [{ medication_a: 'Aspirin', medication_b: 'Warfarin', severity: 'major', description: 'Raises bleeding risk' }],
      { meta: { total: 1 } },
    );

    expect(await clientFor(api).getMedicationInteractions('member-gran')).toEqual([
      { medicationA: 'Aspirin', medicationB: 'Warfarin', severity: 'major', description: 'Raises bleeding risk' },
    ]);
  });

  it('maps hereditary risks and forwards the asking member', async () => {
    const api = new FakeChatApi().reply(
      'GET',
      '/graph/members/member-ana/hereditary-risks',
      [
        {
          parent_id: 'member-gran',
          parent_name: 'Gran Ruiz',
          condition: 'Type 2 diabetes',
          inheritance_pattern: 'multifactorial',
          risk_percent: 40,
        },
      ],
      { meta: { total: 1 } },
    );

    const risks = await clientFor(api).getHereditaryRisks({ familyMemberId: 'member-ana', actorId: 'member-leo' });

    expect(api.last?.params).toEqual({ actorId: 'member-leo' });
    expect(risks).toEqual([
      {
        parentId: 'member-gran',
        parentName: 'Gran Ruiz',
        condition: 'Type 2 diabetes',
        inheritancePattern: 'multifactorial',
        riskPercent: 40,
      },
    ]);
  });

  it('refuses a blank member for hereditary risks', async () => {
    const api = new FakeChatApi();

    await expect(clientFor(api).getHereditaryRisks({ familyMemberId: '' })).rejects.toMatchObject({
      code: 'INVALID_ARGS',
      message: 'getHereditaryRisks requires familyMemberId',
    });
    expect(api.hits).toHaveLength(0);
  });

  it('finds similar lab events under an encoded lab event path', async () => {
    const api = new FakeChatApi().reply(
      'GET',
      '/graph/members/member-ana/lab-events/lab%2Fa1c/similar',
      [{ lab_event_id: 'lab-a1c-2023', date: '2023-11-02', summary: 'A1C 5.6% Nov 2023', score: 0.97 }],
      { meta: { total: 1, topK: 2, sourceLabEventId: 'lab/a1c' } },
    );

    const result = await clientFor(api).findSimilarLabEvents({
      familyMemberId: 'member-ana',
      labEventId: 'lab/a1c',
      topK: 2,
    });

    expect(api.last?.params).toEqual({ topK: '2' });
    expect(result).toEqual({
      sourceLabEventId: 'lab/a1c',
      labEvents: [{ labEventId: 'lab-a1c-2023', date: '2023-11-02', summary: 'A1C 5.6% Nov 2023', score: 0.97 }],
      total: 1,
      topK: 2,
    });
  });

  it('surfaces an unembedded source lab event as not found', async () => {
    const api = new FakeChatApi().fail('GET', '/graph/members/member-ana/lab-events/lab-old/similar', 404, {
      code: 'LAB_EVENT_NOT_FOUND',
      message: 'Lab event lab-old not found or not embedded',
    });

    await expect(
      clientFor(api).findSimilarLabEvents({ familyMemberId: 'member-ana', labEventId: 'lab-old' }),
    ).rejects.toBeInstanceOf(KincareNotFoundError);
  });

  it('maps embedding stats', async () => {
    const api = new FakeChatApi().reply('GET', '/graph/embedding-stats', {
      total_lab_events: 4,
      with_embeddings: 3,
      with_summaries: 4,
      missing_embeddings: 1,
      coverage_percent: 75,
      vector_indexes: ['lab_event_embeddings'],
    });

    expect(await clientFor(api).getEmbeddingStats()).toEqual({
      totalLabEvents: 4,
      withEmbeddings: 3,
      withSummaries: 4,
      missingEmbeddings: 1,
      coveragePercent: 75,
      vectorIndexes: ['lab_event_embeddings'],
    });
  });
});

describe('consent', () => {
  it('grants consent and maps the grant', async () => {
    const api = new FakeChatApi().reply('POST', '/consent', grantWire, { status: 201 });

    const grant = await clientFor(api).grantConsent({
      actorId: 'member-leo',
      personId: 'member-ana',
      category: 'sexual_health',
    });

    expect(grant).toEqual({
      id: 'grant-1',
      actorId: 'member-leo',
      personId: 'member-ana',
      category: 'sexual_health',
      grantedAt: '2025-01-15T12:00:00.000Z',
    });
  });

  it('lists grants for an actor', async () => {
    const api = new FakeChatApi().reply('GET', '/consent', [grantWire]);

    const grants = await clientFor(api).listConsent('member-leo');

    expect(api.last?.params).toEqual({ actorId: 'member-leo' });
    expect(grants.map((grant) => grant.id)).toEqual(['grant-1']);
  });

  it('revokes consent with a body and returns the count', async () => {
    const api = new FakeChatApi().reply('DELETE', '/consent', { revoked: 1 });

    const revoked = await clientFor(api).revokeConsent({
      actorId: 'member-leo',
      personId: 'member-ana',
      category: '*',
    });

    expect(revoked).toBe(1);
    expect(api.last?.body).toEqual({ actorId: 'member-leo', personId: 'member-ana', category: '*' });
  });

  it('refuses a grant to oneself', async () => {
    const api = new FakeChatApi();

    await expect(
      clientFor(api).grantConsent({ actorId: 'member-ana', personId: 'member-ana', category: '*' }),
    ).rejects.toBeInstanceOf(KincareValidationError);
    expect(api.hits).toHaveLength(0);
  });
});

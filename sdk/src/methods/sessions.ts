import { KincareValidationError } from '../errors.js';
import type { ChatApiTransport } from '../http.js';
import type {
  ChatMessage,
  ChatRole,
  ChatSession,
  ChatSessionSummary,
  CreateSessionInput,
  ListMessagesInput,
  ListMessagesResult,
  ListSessionsInput,
  ListSessionsResult,
  RagContextEntry,
  SessionOrder,
  UpdateSessionInput,
} from '../types.js';

interface SessionWire {
  id: string;
  family_member_id: string;
  title: string;
  is_pinned: boolean;
  sort_order: number;
  created_at: string;
  updated_at: string;
}

interface SessionSummaryWire extends SessionWire {
  message_count: number;
  last_message: string | null;
}

interface MessageWire {
  id: string;
  session_id: string;
  seq: number;
  role: ChatRole;
  content: string;
  image_ref: string | null;
  model: string | null;
  rag_context: RagContextEntry[] | null;
  created_at: string;
}

interface MessagePageMeta {
  limit: number;
  offset: number;
  hasMore: boolean;
}

function mapSession(wire: SessionWire): ChatSession {
  return {
    id: wire.id,
    familyMemberId: wire.family_member_id,
    title: wire.title,
    isPinned: wire.is_pinned,
    sortOrder: wire.sort_order,
    createdAt: wire.created_at,
    updatedAt: wire.updated_at,
  };
}

function mapSummary(wire: SessionSummaryWire): ChatSessionSummary {
  return {
    ...mapSession(wire),
    messageCount: wire.message_count,
    lastMessage: wire.last_message,
  };
}

function mapMessage(wire: MessageWire): ChatMessage {
  return {
    id: wire.id,
    sessionId: wire.session_id,
    seq: wire.seq,
    role: wire.role,
    content: wire.content,
    imageRef: wire.image_ref,
    model: wire.model,
    ragContext: wire.rag_context,
    createdAt: wire.created_at,
  };
}

function requireId(method: string, id: string): string {
  if (!id || id.trim().length === 0) {
    throw new KincareValidationError(`${method} requires a session id`, {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  return encodeURIComponent(id);
}

export async function createSessionMethod(
  api: ChatApiTransport,
  input: CreateSessionInput,
): Promise<ChatSession> {
  if (!input.familyMemberId || input.familyMemberId.trim().length === 0) {
    throw new KincareValidationError('createSession requires familyMemberId', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }

  const created = await api.data<SessionWire>({
    method: 'POST',
    path: '/chat/sessions',
    body: {
      familyMemberId: input.familyMemberId,
      ...(input.title !== undefined ? { title: input.title } : {}),
    },
  });

  return mapSession(created);
}

export async function listSessionsMethod(
  api: ChatApiTransport,
  input: ListSessionsInput,
): Promise<ListSessionsResult> {
  const { data, meta } = await api.page<SessionSummaryWire[], { total: number }>({
    method: 'GET',
    path: '/chat/sessions',
    params: {
      familyMemberId: input.familyMemberId,
      limit: input.limit,
    },
  });

  return {
    sessions: data.map(mapSummary),
    total: meta.total,
  };
}

export async function getSessionMethod(api: ChatApiTransport, id: string): Promise<ChatSession> {
  return mapSession(
    await api.data<SessionWire>({ method: 'GET', path: `/chat/sessions/${requireId('getSession', id)}` }),
  );
}

export async function updateSessionMethod(
  api: ChatApiTransport,
  id: string,
  input: UpdateSessionInput,
): Promise<ChatSession> {
  const path = `/chat/sessions/${requireId('updateSession', id)}`;
  if (input.title === undefined && input.isPinned === undefined && input.sortOrder === undefined) {
    throw new KincareValidationError('updateSession requires title, isPinned or sortOrder', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }

  return mapSession(await api.data<SessionWire>({ method: 'PATCH', path, body: input }));
}

export async function deleteSessionMethod(api: ChatApiTransport, id: string): Promise<void> {
  await api.data<{ id: string; deleted: boolean }>({
    method: 'DELETE',
    path: `/chat/sessions/${requireId('deleteSession', id)}`,
  });
}

export async function reorderSessionsMethod(
  api: ChatApiTransport,
  orders: SessionOrder[],
): Promise<number> {
  if (orders.length === 0) {
    return 0;
  }

  const { updated } = await api.data<{ updated: number }>({
    method: 'POST',
    path: '/chat/sessions/reorder',
    body: { orders },
  });

  return updated;
}

export async function listMessagesMethod(
  api: ChatApiTransport,
  id: string,
  input: ListMessagesInput,
): Promise<ListMessagesResult> {
  const { data, meta } = await api.page<MessageWire[], MessagePageMeta>({
    method: 'GET',
    path: `/chat/sessions/${requireId('listMessages', id)}/messages`,
    params: {
      limit: input.limit,
      offset: input.offset,
    },
  });

  return { messages: data.map(mapMessage), ...meta };
}

export async function generateTitleMethod(api: ChatApiTransport, id: string): Promise<ChatSession> {
  return mapSession(
    await api.data<SessionWire>({
      method: 'POST',
      path: `/chat/sessions/${requireId('generateTitle', id)}/generate-title`,
    }),
  );
}

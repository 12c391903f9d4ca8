/**
 * Chat Session Routes
 *
 * Routes:
 * - POST   /v1/chat/sessions                      - Create a session
 * - GET    /v1/chat/sessions                      - List sessions (pinned, sort order, recent)
 * - POST   /v1/chat/sessions/reorder              - Bulk sort order update
 * - GET    /v1/chat/sessions/:id                  - Get a session
 * - PATCH  /v1/chat/sessions/:id                  - Rename, pin or reorder a session
 * - DELETE /v1/chat/sessions/:id                  - Delete a session and its messages
 * - GET    /v1/chat/sessions/:id/messages         - Transcript page, oldest first
 * - POST   /v1/chat/sessions/:id/generate-title   - Title the session from its opening messages
 *
 * Chat turns themselves run over the /ws/chat channel.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { SessionNotFoundError } from '@/errors/chat';
import type { ChatMessageRecord, ChatSessionRecord, ChatSessionSummary } from '@/services/sessionStore.service';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';
import { rejectInvalid } from '@/validators/api';
import {
  createSessionSchema,
  listMessagesQuerySchema,
  listSessionsQuerySchema,
  reorderSessionsSchema,
  sessionIdParamSchema,
  updateSessionSchema,
} from '@/validators/chat';

const chat = new Hono<HonoEnv>();

export function serializeSession(session: ChatSessionRecord) {
  return {
    id: session.id,
    family_member_id: session.familyMemberId,
    title: session.title,
    is_pinned: session.isPinned,
    sort_order: session.sortOrder,
    created_at: session.createdAt.toISOString(),
    updated_at: session.updatedAt.toISOString(),
  };
}

function serializeSummary(session: ChatSessionSummary) {
  return {
    ...serializeSession(session),
    message_count: session.messageCount,
    last_message: session.lastMessage,
  };
}

function serializeMessage(message: ChatMessageRecord) {
  return {
    id: message.id,
    session_id: message.sessionId,
    seq: message.seq,
    role: message.role,
    content: message.content,
    image_ref: message.imageRef,
    model: message.model,
    rag_context: message.ragContext,
    created_at: message.createdAt.toISOString(),
  };
}

// =====================================================
// SESSION ENDPOINTS
// =====================================================

chat.post('/sessions', zValidator('json', createSessionSchema, rejectInvalid), async (c) => {
  const { sessions } = c.get('services');
  const body = c.req.valid('json');

  const session = await sessions.createSession(body);
  logger.info('Chat session created', { sessionId: session.id });

  return c.json({ data: serializeSession(session) }, 201);
});

chat.get('/sessions', zValidator('query', listSessionsQuerySchema, rejectInvalid), async (c) => {
  const { sessions } = c.get('services');
  const query = c.req.valid('query');

  const rows = await sessions.listSessions(query);

  return c.json({
    data: rows.map(serializeSummary),
    meta: { total: rows.length, limit: query.limit },
  });
});

/**
 * POST /v1/chat/sessions/reorder
 *
 * Ids that no longer exist are skipped; `updated` counts the rest.
 */
chat.post('/sessions/reorder', zValidator('json', reorderSessionsSchema, rejectInvalid), async (c) => {
  const { sessions } = c.get('services');
  const { orders } = c.req.valid('json');

  const updated = await sessions.reorderSessions(orders);

  return c.json({ data: { updated } });
});

chat.get('/sessions/:id', zValidator('param', sessionIdParamSchema, rejectInvalid), async (c) => {
  const { sessions } = c.get('services');
  const { id } = c.req.valid('param');

  const session = await sessions.getSession(id);
  if (!session) throw new SessionNotFoundError(id);

  return c.json({ data: serializeSession(session) });
});

chat.patch(
  '/sessions/:id',
  zValidator('param', sessionIdParamSchema, rejectInvalid),
  zValidator('json', updateSessionSchema, rejectInvalid),
  async (c) => {
    const { sessions } = c.get('services');
    const { id } = c.req.valid('param');
    const patch = c.req.valid('json');

    const session = await sessions.updateSession(id, patch);
    if (!session) throw new SessionNotFoundError(id);

    return c.json({ data: serializeSession(session) });
  }
);

chat.delete('/sessions/:id', zValidator('param', sessionIdParamSchema, rejectInvalid), async (c) => {
  const { sessions } = c.get('services');
  const { id } = c.req.valid('param');

  const deleted = await sessions.deleteSession(id);
  if (!deleted) throw new SessionNotFoundError(id);
  logger.info('Chat session deleted', { sessionId: id });

  return c.json({ data: { id, deleted: true } });
});

// =====================================================
// MESSAGE ENDPOINTS
// =====================================================

chat.get(
  '/sessions/:id/messages',
  zValidator('param', sessionIdParamSchema, rejectInvalid),
  zValidator('query', listMessagesQuerySchema, rejectInvalid),
  async (c) => {
    const { sessions } = c.get('services');
    const { id } = c.req.valid('param');
    const paging = c.req.valid('query');

    const session = await sessions.getSession(id);
    if (!session) throw new SessionNotFoundError(id);

    const messages = await sessions.listMessages(id, paging);

    return c.json({
      data: messages.map(serializeMessage),
      meta: {
        limit: paging.limit,
        offset: paging.offset,
        hasMore: messages.length === paging.limit,
      },
    });
  }
);

chat.post('/sessions/:id/generate-title', zValidator('param', sessionIdParamSchema, rejectInvalid), async (c) => {
  const { titles } = c.get('services');
  const { id } = c.req.valid('param');

  const session = await titles.generateTitle(id);

  return c.json({ data: serializeSession(session) });
});

export default chat;

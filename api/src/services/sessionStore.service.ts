/**
 * Session Store
 *
 * Chat sessions and their append-only message log.
 *
 * Listing order: pinned first, then sort_order ascending, then most
 * recently updated. Messages within a session are totally ordered by
 * (created_at, seq); seq comes from a database sequence so two messages
 * written in the same instant still have a defined order.
 *
 * Two implementations share the interface: Postgres through Drizzle and an
 * in-process store (SESSION_STORE=memory) for local runs and tests.
 */

import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { chatMessages, chatSessions, type ChatRole, type RagContextEntry } from '@/db/schema';
import { SessionNotFoundError } from '@/errors/chat';

export const DEFAULT_SESSION_TITLE = 'New Chat';
const LAST_MESSAGE_PREVIEW_CHARS = 100;

export type { ChatRole, RagContextEntry };

export interface ChatSessionRecord {
  id: string;
  familyMemberId: string;
  title: string;
  isPinned: boolean;
  sortOrder: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChatSessionSummary extends ChatSessionRecord {
  messageCount: number;
  /** Latest user message, truncated for previews */
  lastMessage: string | null;
}

export interface ChatMessageRecord {
  id: string;
  sessionId: string;
  seq: number;
  role: ChatRole;
  content: string;
  imageRef: string | null;
  model: string | null;
  ragContext: RagContextEntry[] | null;
  createdAt: Date;
}

export interface NewChatMessage {
  sessionId: string;
  role: ChatRole;
  content: string;
  imageRef?: string | null;
  model?: string | null;
  ragContext?: RagContextEntry[] | null;
}

export interface SessionPatch {
  title?: string;
  isPinned?: boolean;
  sortOrder?: number;
}

export interface SessionOrder {
  id: string;
  sortOrder: number;
}

export interface SessionStore {
  createSession(input: { familyMemberId: string; title?: string }): Promise<ChatSessionRecord>;
  getSession(id: string): Promise<ChatSessionRecord | null>;
  listSessions(options: { familyMemberId?: string; limit: number }): Promise<ChatSessionSummary[]>;
  updateSession(id: string, patch: SessionPatch): Promise<ChatSessionRecord | null>;
  /** Returns the number of sessions that existed and were updated */
  reorderSessions(orders: SessionOrder[]): Promise<number>;
  /** Deletes the session and all of its messages */
  deleteSession(id: string): Promise<boolean>;
  /** Appends a message and bumps the session's updated_at */
  appendMessage(message: NewChatMessage): Promise<ChatMessageRecord>;
  listMessages(sessionId: string, options: { limit: number; offset: number }): Promise<ChatMessageRecord[]>;
  /** The last `limit` messages, oldest first */
  recentMessages(sessionId: string, limit: number): Promise<ChatMessageRecord[]>;
}

// ── Ordering ───────────────────────────────────────────────────────────

export function compareSessions(a: ChatSessionRecord, b: ChatSessionRecord): number {
  if (a.isPinned !== b.isPinned) return a.isPinned ? -1 : 1;
  if (a.sortOrder !== b.sortOrder) return a.sortOrder - b.sortOrder;
  const byUpdated = b.updatedAt.getTime() - a.updatedAt.getTime();
  if (byUpdated !== 0) return byUpdated;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function compareMessages(a: ChatMessageRecord, b: ChatMessageRecord): number {
  const byCreated = a.createdAt.getTime() - b.createdAt.getTime();
  if (byCreated !== 0) return byCreated;
  return a.seq - b.seq;
}

export function previewMessage(content: string | null | undefined): string | null {
  if (!content) return null;
  return content.length > LAST_MESSAGE_PREVIEW_CHARS
    ? `${content.slice(0, LAST_MESSAGE_PREVIEW_CHARS)}...`
    : content;
}

// ── Postgres ───────────────────────────────────────────────────────────

export class DrizzleSessionStore implements SessionStore {
  constructor(private readonly db: Database) {}

  async createSession(input: { familyMemberId: string; title?: string }): Promise<ChatSessionRecord> {
    const [row] = await this.db
      .insert(chatSessions)
      .values({ familyMemberId: input.familyMemberId, title: input.title ?? DEFAULT_SESSION_TITLE })
      .returning();
    return row;
  }

  async getSession(id: string): Promise<ChatSessionRecord | null> {
    const rows = await this.db.select().from(chatSessions).where(eq(chatSessions.id, id)).limit(1);
    return rows[0] ?? null;
  }

  async listSessions(options: { familyMemberId?: string; limit: number }): Promise<ChatSessionSummary[]> {
    const sessions = await this.db
      .select()
      .from(chatSessions)
      .where(options.familyMemberId ? eq(chatSessions.familyMemberId, options.familyMemberId) : undefined)
      .orderBy(
        desc(chatSessions.isPinned),
        asc(chatSessions.sortOrder),
        desc(chatSessions.updatedAt),
        asc(chatSessions.id)
      )
      .limit(options.limit);
    if (sessions.length === 0) return [];

    const ids = sessions.map((session) => session.id);
    const [counts, lastUserMessages] = await Promise.all([
      this.db
        .select({ sessionId: chatMessages.sessionId, count: sql<number>`count(*)::int` })
        .from(chatMessages)
        .where(inArray(chatMessages.sessionId, ids))
        .groupBy(chatMessages.sessionId),
      this.db
        .selectDistinctOn([chatMessages.sessionId], {
          sessionId: chatMessages.sessionId,
          content: chatMessages.content,
        })
        .from(chatMessages)
        .where(and(inArray(chatMessages.sessionId, ids), eq(chatMessages.role, 'user')))
        .orderBy(chatMessages.sessionId, desc(chatMessages.createdAt), desc(chatMessages.seq)),
    ]);

    const countBySession = new Map(counts.map((row) => [row.sessionId, row.count]));
    const lastBySession = new Map(lastUserMessages.map((row) => [row.sessionId, row.content]));

    return sessions.map((session) => ({
      ...session,
      messageCount: countBySession.get(session.id) ?? 0,
      lastMessage: previewMessage(lastBySession.get(session.id)),
    }));
  }

  async updateSession(id: string, patch: SessionPatch): Promise<ChatSessionRecord | null> {
    const rows = await this.db
      .update(chatSessions)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(chatSessions.id, id))
      .returning();
    return rows[0] ?? null;
  }

  async reorderSessions(orders: SessionOrder[]): Promise<number> {
    return this.db.transaction(async (tx) => {
      let updated = 0;
      for (const order of orders) {
        const rows = await tx
          .update(chatSessions)
          .set({ sortOrder: order.sortOrder })
          .where(eq(chatSessions.id, order.id))
          .returning({ id: chatSessions.id });
        updated += rows.length;
      }
      return updated;
    });
  }

  async deleteSession(id: string): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      await tx.delete(chatMessages).where(eq(chatMessages.sessionId, id));
      const rows = await tx
        .delete(chatSessions)
        .where(eq(chatSessions.id, id))
        .returning({ id: chatSessions.id });
      return rows.length > 0;
    });
  }

  async appendMessage(message: NewChatMessage): Promise<ChatMessageRecord> {
    return this.db.transaction(async (tx) => {
      const touched = await tx
        .update(chatSessions)
        .set({ updatedAt: new Date() })
        .where(eq(chatSessions.id, message.sessionId))
        .returning({ id: chatSessions.id });
      if (touched.length === 0) {
        throw new SessionNotFoundError(message.sessionId);
      }

      const [row] = await tx
        .insert(chatMessages)
        .values({
          sessionId: message.sessionId,
          role: message.role,
          content: message.content,
          imageRef: message.imageRef ?? null,
          model: message.model ?? null,
          ragContext: message.ragContext ?? null,
        })
        .returning();
      return row;
    });
  }

  async listMessages(sessionId: string, options: { limit: number; offset: number }): Promise<ChatMessageRecord[]> {
    return this.db
      .select()
      .from(chatMessages)
      .where(eq(chatMessages.sessionId, sessionId))
      .orderBy(asc(chatMessages.createdAt), asc(chatMessages.seq))
      .limit(options.limit)
      .offset(options.offset);
  }

  async recentMessages(sessionId: string, limit: number): Promise<ChatMessageRecord[]> {
    if (limit <= 0) return [];
    const rows = await this.db
      .select()
      .from(chatMessages)
      .where(eq(chatMessages.sessionId, sessionId))
      .orderBy(desc(chatMessages.createdAt), desc(chatMessages.seq))
      .limit(limit);
    return rows.reverse();
  }
}

// ── In-process ─────────────────────────────────────────────────────────

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, ChatSessionRecord>();
  private readonly messages = new Map<string, ChatMessageRecord[]>();
  private nextSeq = 1;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createSession(input: { familyMemberId: string; title?: string }): Promise<ChatSessionRecord> {
    const timestamp = this.now();
    const session: ChatSessionRecord = {
      id: randomUUID(),
      familyMemberId: input.familyMemberId,
      title: input.title ?? DEFAULT_SESSION_TITLE,
      isPinned: false,
      sortOrder: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.sessions.set(session.id, session);
    this.messages.set(session.id, []);
    return { ...session };
  }

  async getSession(id: string): Promise<ChatSessionRecord | null> {
    const session = this.sessions.get(id);
    return session ? { ...session } : null;
  }

  async listSessions(options: { familyMemberId?: string; limit: number }): Promise<ChatSessionSummary[]> {
    return [...this.sessions.values()]
      .filter((session) => !options.familyMemberId || session.familyMemberId === options.familyMemberId)
      .sort(compareSessions)
      .slice(0, options.limit)
      .map((session) => {
        const log = this.messages.get(session.id) ?? [];
        const lastUser = [...log].reverse().find((message) => message.role === 'user');
        return {
          ...session,
          messageCount: log.length,
          lastMessage: previewMessage(lastUser?.content),
        };
      });
  }

  async updateSession(id: string, patch: SessionPatch): Promise<ChatSessionRecord | null> {
    const session = this.sessions.get(id);
    if (!session) return null;
    if (patch.title !== undefined) session.title = patch.title;
    if (patch.isPinned !== undefined) session.isPinned = patch.isPinned;
    if (patch.sortOrder !== undefined) session.sortOrder = patch.sortOrder;
    session.updatedAt = this.now();
    return { ...session };
  }

  async reorderSessions(orders: SessionOrder[]): Promise<number> {
    let updated = 0;
    for (const order of orders) {
      const session = this.sessions.get(order.id);
      if (!session) continue;
      session.sortOrder = order.sortOrder;
      updated++;
    }
    return updated;
  }

  async deleteSession(id: string): Promise<boolean> {
    this.messages.delete(id);
    return this.sessions.delete(id);
  }

  async appendMessage(message: NewChatMessage): Promise<ChatMessageRecord> {
    const session = this.sessions.get(message.sessionId);
    const log = this.messages.get(message.sessionId);
    if (!session || !log) {
      throw new SessionNotFoundError(message.sessionId);
    }

    const timestamp = this.now();
    const record: ChatMessageRecord = {
      id: randomUUID(),
      sessionId: message.sessionId,
      seq: this.nextSeq++,
      role: message.role,
      content: message.content,
      imageRef: message.imageRef ?? null,
      model: message.model ?? null,
      ragContext: message.ragContext ?? null,
      createdAt: timestamp,
    };
    log.push(record);
    session.updatedAt = timestamp;
    return { ...record };
  }

  async listMessages(sessionId: string, options: { limit: number; offset: number }): Promise<ChatMessageRecord[]> {
    const log = this.messages.get(sessionId) ?? [];
    return [...log].sort(compareMessages).slice(options.offset, options.offset + options.limit);
  }

  async recentMessages(sessionId: string, limit: number): Promise<ChatMessageRecord[]> {
    if (limit <= 0) return [];
    const log = this.messages.get(sessionId) ?? [];
    return [...log].sort(compareMessages).slice(-limit);
  }
}

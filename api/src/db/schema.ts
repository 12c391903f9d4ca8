/**
 * Relational Schema
 * Drizzle ORM schema for PostgreSQL
 *
 * Chat sessions, their append-only message log, and consent grants.
 * The medical graph itself lives in Neo4j (see db/graph.ts).
 * family_member_id is a weak reference to Person.id in the graph.
 */

import {
  pgTable,
  uuid,
  varchar,
  boolean,
  timestamp,
  integer,
  jsonb,
  text,
  bigserial,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// JSONB Type Definitions for structured fields
export interface RagContextEntry {
  labEventId: string;
  personId: string;
  score: number;
}

export type ChatRole = 'user' | 'assistant' | 'system';

/**
 * Chat sessions, one thread per conversation
 */
export const chatSessions = pgTable(
  'chat_sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    familyMemberId: varchar('family_member_id', { length: 100 }).notNull(),
    title: varchar('title', { length: 255 }).notNull().default('New Chat'),
    isPinned: boolean('is_pinned').notNull().default(false),
    sortOrder: integer('sort_order').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    memberIdx: index('idx_chat_sessions_member').on(table.familyMemberId),
    listingIdx: index('idx_chat_sessions_listing').on(
      table.isPinned,
      table.sortOrder,
      table.updatedAt
    ),
  })
);

/**
 * Chat messages, append-only
 * seq is the tie-breaker for messages created in the same instant
 */
export const chatMessages = pgTable(
  'chat_messages',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => chatSessions.id, { onDelete: 'cascade' }),
    seq: bigserial('seq', { mode: 'number' }).notNull(),
    role: varchar('role', { length: 20 }).notNull().$type<ChatRole>(),
    content: text('content').notNull(),
    imageRef: text('image_ref'),
    model: varchar('model', { length: 100 }),
    ragContext: jsonb('rag_context').$type<RagContextEntry[]>(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    sessionOrderIdx: index('idx_chat_messages_session_order').on(
      table.sessionId,
      table.createdAt,
      table.seq
    ),
    roleCheck: check('chat_messages_role_check', sql`${table.role} IN ('user', 'assistant', 'system')`),
  })
);

/**
 * Consent grants for consent_required data
 * category '*' covers every category of the person
 */
export const consentGrants = pgTable(
  'consent_grants',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    actorId: varchar('actor_id', { length: 100 }).notNull(),
    personId: varchar('person_id', { length: 100 }).notNull(),
    category: varchar('category', { length: 100 }).notNull(),
    grantedAt: timestamp('granted_at', { withTimezone: true }).notNull().defaultNow(),
    revokedAt: timestamp('revoked_at', { withTimezone: true }),
  },
  (table) => ({
    actorIdx: index('idx_consent_grants_actor').on(table.actorId),
  })
);

export type ChatSessionRow = typeof chatSessions.$inferSelect;
export type ChatMessageRow = typeof chatMessages.$inferSelect;
export type ConsentGrantRow = typeof consentGrants.$inferSelect;

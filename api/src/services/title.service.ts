/**
 * Session title generation
 *
 * Asks the LLM for a 3-6 word title from the opening messages of a session.
 * When the LLM is unavailable the title falls back to the first user message.
 */

import { SessionNotFoundError } from '@/errors/chat';
import type { LlmGateway } from '@/services/llm.service';
import {
  DEFAULT_SESSION_TITLE,
  type ChatMessageRecord,
  type ChatSessionRecord,
  type SessionStore,
} from '@/services/sessionStore.service';
import { logger } from '@/utils/logger';

const TITLE_CONTEXT_MESSAGES = 4;
const TITLE_CONTEXT_CHARS = 200;
const MAX_TITLE_CHARS = 100;
const FALLBACK_TITLE_CHARS = 50;

export const TITLE_PROMPT =
  'Generate a short (3-6 word) title for this conversation. Reply with ONLY the title, no quotes or punctuation:';

export function buildTitleContext(messages: ReadonlyArray<Pick<ChatMessageRecord, 'role' | 'content'>>): string {
  return messages
    .slice(0, TITLE_CONTEXT_MESSAGES)
    .map((message) => `${message.role}: ${message.content.slice(0, TITLE_CONTEXT_CHARS)}`)
    .join('\n');
}

/** Trim, strip quotes and cap the length of a model-produced title */
export function cleanTitle(raw: string): string {
  return raw.trim().replace(/^["']+|["']+$/g, '').trim().slice(0, MAX_TITLE_CHARS);
}

export function fallbackTitle(messages: ReadonlyArray<Pick<ChatMessageRecord, 'role' | 'content'>>): string {
  const firstUser = messages.find((message) => message.role === 'user' && message.content.trim().length > 0);
  if (!firstUser) return DEFAULT_SESSION_TITLE;
  const content = firstUser.content.trim();
  return content.length > FALLBACK_TITLE_CHARS ? `${content.slice(0, FALLBACK_TITLE_CHARS)}...` : content;
}

export class TitleGenerator {
  constructor(
    private readonly deps: {
      sessions: SessionStore;
      llm: LlmGateway;
      model: string;
    }
  ) {}

  async generateTitle(sessionId: string): Promise<ChatSessionRecord> {
    const { sessions, llm, model } = this.deps;

    const session = await sessions.getSession(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    const messages = await sessions.listMessages(sessionId, { limit: TITLE_CONTEXT_MESSAGES, offset: 0 });
    if (messages.length === 0) return session;

    let title: string;
    try {
      const completion = await llm.complete({
        model,
        messages: [{ role: 'user', content: `${TITLE_PROMPT}\n\n${buildTitleContext(messages)}` }],
      });
      title = cleanTitle(completion.content) || fallbackTitle(messages);
    } catch (error) {
      logger.warn('Title generation failed, using fallback', {
        sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      title = fallbackTitle(messages);
    }

    const updated = await sessions.updateSession(sessionId, { title });
    if (!updated) throw new SessionNotFoundError(sessionId);
    return updated;
  }
}

/**
 * Prompt builder
 *
 * Message list sent to the LLM for one turn:
 *   1. system: persona and assembled context
 *   2. prior user/assistant messages, oldest first
 *   3. the current user message, with its image when present
 */

import type { LlmMessage } from '@/services/llm.service';
import type { ChatMessageRecord } from '@/services/sessionStore.service';

export interface ChatPromptInput {
  systemContext: string;
  history: ReadonlyArray<Pick<ChatMessageRecord, 'role' | 'content'>>;
  message: string;
  /** Base64 encoded image for vision models */
  image?: string;
}

export function buildChatPrompt(input: ChatPromptInput): LlmMessage[] {
  const messages: LlmMessage[] = [{ role: 'system', content: input.systemContext }];

  for (const entry of input.history) {
    if (entry.role === 'user' || entry.role === 'assistant') {
      messages.push({ role: entry.role, content: entry.content });
    }
  }

  const current: LlmMessage = { role: 'user', content: input.message };
  if (input.image) current.images = [input.image];
  messages.push(current);

  return messages;
}

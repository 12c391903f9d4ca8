/**
 * Chat channel protocol
 *
 * Frames are JSON text messages tagged by `type`.
 *
 *   client → server: chat | cancel
 *   server → client: session | context | token | done | error
 *
 * An `error` frame reports a failed turn or a rejected frame; the socket
 * stays open afterwards.
 */

import { z } from 'zod';
import type { ChatErrorCode } from '@/errors/chat';

const MAX_MESSAGE_CHARS = 8000;

export const chatFrameSchema = z.object({
  type: z.literal('chat'),
  sessionId: z.string().uuid().optional(),
  familyMemberId: z.string().trim().min(1),
  message: z.string().max(MAX_MESSAGE_CHARS).default(''),
  /** Base64 image payload */
  image: z.string().min(1).optional(),
  imageRef: z.string().max(500).optional(),
  actorId: z.string().trim().min(1).optional(),
});

export const cancelFrameSchema = z.object({
  type: z.literal('cancel'),
  sessionId: z.string().uuid(),
});

export const clientFrameSchema = z
  .discriminatedUnion('type', [chatFrameSchema, cancelFrameSchema])
  .superRefine((frame, ctx) => {
    if (frame.type === 'chat' && frame.message.trim().length === 0 && frame.image === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'A message or an image is required',
        path: ['message'],
      });
    }
  });

export type ChatFrame = z.infer<typeof chatFrameSchema>;
export type CancelFrame = z.infer<typeof cancelFrameSchema>;
export type ClientFrame = z.infer<typeof clientFrameSchema>;

export type ChatServerMessage =
  | { type: 'session'; sessionId: string; title: string }
  | { type: 'context'; sessionId: string; labEventIds: string[]; droppedUnits: number }
  | { type: 'token'; sessionId: string; content: string }
  | {
      type: 'done';
      sessionId: string;
      messageId: string;
      content: string;
      model: string;
      truncated: boolean;
    }
  | {
      type: 'error';
      sessionId: string | null;
      code: ChatErrorCode;
      message: string;
      retryable: boolean;
    };

export function assertNever(value: never): never {
  throw new Error(`Unhandled chat frame: ${JSON.stringify(value)}`);
}

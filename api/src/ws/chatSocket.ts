/**
 * Chat WebSocket channel
 *
 * One socket per open chat window at /ws/chat. Each `chat` frame starts a
 * turn; tokens stream back on the same socket. Rejected frames and failed
 * turns are answered with an `error` frame and the socket stays open.
 */

import type { Server } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { ChatError, ChatValidationError, GenerationFailureError, describeError } from '@/errors/chat';
import type { ChatOrchestrator, TurnSink } from '@/services/chat/chatOrchestrator.service';
import { logger } from '@/utils/logger';
import { assertNever, clientFrameSchema, type ChatServerMessage } from '@/ws/protocol';

export const CHAT_SOCKET_PATH = '/ws/chat';

type FrameHandler = Pick<ChatOrchestrator, 'submitTurn' | 'cancel'>;

function toChatError(error: unknown): ChatError {
  return error instanceof ChatError ? error : new GenerationFailureError('Unexpected chat failure', error);
}

function errorFrame(sessionId: string | null, error: ChatError): ChatServerMessage {
  return {
    type: 'error',
    sessionId,
    code: error.code,
    message: error.userMessage,
    retryable: error.retryable,
  };
}

/**
 * Handle one inbound frame. Never rejects: every failure becomes an
 * `error` frame on the sink.
 */
export async function handleClientFrame(raw: string, orchestrator: FrameHandler, sink: TurnSink): Promise<void> {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    sink.send(errorFrame(null, new ChatValidationError('Frames must be JSON')));
    return;
  }

  const parsed = clientFrameSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    sink.send(errorFrame(null, new ChatValidationError(issue ? issue.message : 'Invalid frame', parsed.error.issues)));
    return;
  }

  const frame = parsed.data;
  switch (frame.type) {
    case 'chat': {
      try {
        await orchestrator.submitTurn(
          {
            sessionId: frame.sessionId,
            familyMemberId: frame.familyMemberId,
            message: frame.message,
            image: frame.image,
            imageRef: frame.imageRef,
            actorId: frame.actorId,
          },
          sink
        );
      } catch (error) {
        const chatError = toChatError(error);
        logger.warn('Chat turn rejected', { code: chatError.code, error: describeError(error) });
        if (sink.isAttached()) sink.send(errorFrame(frame.sessionId ?? null, chatError));
      }
      return;
    }
    case 'cancel': {
      const cancelled = orchestrator.cancel(frame.sessionId);
      logger.debug('Cancel requested', { sessionId: frame.sessionId, cancelled });
      return;
    }
    default:
      assertNever(frame);
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

export function createSocketSink(socket: WebSocket): TurnSink {
  return {
    send(message) {
      socket.send(JSON.stringify(message));
    },
    isAttached() {
      return socket.readyState === WebSocket.OPEN;
    },
  };
}

/**
 * Attach the chat channel to the HTTP server. Returns the WebSocketServer
 * so shutdown can close it.
 */
export function attachChatSocket(server: Server, orchestrator: FrameHandler): WebSocketServer {
  const wss = new WebSocketServer({ server, path: CHAT_SOCKET_PATH });

  wss.on('connection', (socket) => {
    const sink = createSocketSink(socket);
    logger.info('Chat socket connected', { clients: wss.clients.size });

    socket.on('message', (data) => {
      void handleClientFrame(rawToString(data), orchestrator, sink);
    });

    socket.on('close', () => {
      logger.info('Chat socket closed', { clients: wss.clients.size });
    });

    socket.on('error', (error) => {
      logger.error('Chat socket error', { error: error.message });
    });
  });

  return wss;
}

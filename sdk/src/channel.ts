/**
 * Client side of the /ws/chat channel
 *
 * The channel owns no socket. Hand it anything with `send(string)` (a
 * browser WebSocket, the `ws` package) and feed incoming text frames to
 * `receive()`.
 */

import { KincareValidationError } from './errors.js';
import { DEFAULT_BASE_URL, isRecord } from './http.js';
import type {
  ChatErrorCode,
  ChatServerMessage,
  ChatServerMessageType,
  SendMessageInput,
} from './types.js';

export const CHAT_SOCKET_PATH = '/ws/chat';

const CHAT_ERROR_CODES: readonly ChatErrorCode[] = [
  'RETRIEVAL_UNAVAILABLE',
  'GENERATION_TIMEOUT',
  'GENERATION_FAILURE',
  'GENERATION_CANCELLED',
  'CONFIGURATION_ERROR',
  'VALIDATION_ERROR',
  'SESSION_NOT_FOUND',
  'LAB_EVENT_NOT_FOUND',
  'SESSION_STORE_UNAVAILABLE',
];

export interface ChatTransport {
  send(data: string): void;
}

export type ChatMessageOf<K extends ChatServerMessageType> = Extract<ChatServerMessage, { type: K }>;

type Listener<K extends ChatServerMessageType> = (message: ChatMessageOf<K>) => void;

type ListenerTable = { [K in ChatServerMessageType]: Array<Listener<K>> };

/**
 * Socket URL for an API origin: http(s) becomes ws(s) and any `/v1`
 * suffix is dropped.
 */
export function chatSocketUrl(baseUrl: string = DEFAULT_BASE_URL): string {
  const url = new URL(baseUrl.replace(/\/+$/, '').replace(/\/v1$/, ''));
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  url.pathname = `${url.pathname.replace(/\/+$/, '')}${CHAT_SOCKET_PATH}`;
  return url.toString();
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

function isChatErrorCode(value: unknown): value is ChatErrorCode {
  return CHAT_ERROR_CODES.some((code) => code === value);
}

/**
 * Decode one server frame. Returns null for anything that is not a
 * well-formed frame of a known type.
 */
export function parseServerMessage(raw: string): ChatServerMessage | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  if (!isRecord(value)) return null;
  const { sessionId, title, labEventIds, droppedUnits, content, messageId, model, truncated, code, message, retryable } =
    value;

  switch (value.type) {
    case 'session':
      return isString(sessionId) && isString(title) ? { type: 'session', sessionId, title } : null;
    case 'context':
      return isString(sessionId) && isStringArray(labEventIds) && typeof droppedUnits === 'number'
        ? { type: 'context', sessionId, labEventIds, droppedUnits }
        : null;
    case 'token':
      return isString(sessionId) && isString(content) ? { type: 'token', sessionId, content } : null;
    case 'done':
      return isString(sessionId) &&
        isString(messageId) &&
        isString(content) &&
        isString(model) &&
        typeof truncated === 'boolean'
        ? { type: 'done', sessionId, messageId, content, model, truncated }
        : null;
    case 'error':
      return (sessionId === null || isString(sessionId)) &&
        isChatErrorCode(code) &&
        isString(message) &&
        typeof retryable === 'boolean'
        ? { type: 'error', sessionId, code, message, retryable }
        : null;
    default:
      return null;
  }
}

function emit<M>(listeners: Array<(message: M) => void>, message: M): void {
  for (const listener of [...listeners]) {
    listener(message);
  }
}

export class ChatChannel {
  private readonly listeners: ListenerTable = {
    session: [],
    context: [],
    token: [],
    done: [],
    error: [],
  };

  constructor(private readonly transport: ChatTransport) {}

  /**
   * Subscribe to one frame type. Returns the unsubscribe function.
   */
  on<K extends ChatServerMessageType>(type: K, listener: Listener<K>): () => void {
    const list: Array<Listener<K>> = this.listeners[type];
    list.push(listener);
    return () => {
      const index = list.indexOf(listener);
      if (index !== -1) list.splice(index, 1);
    };
  }

  /**
   * Feed one text frame from the socket. Returns the decoded message, or
   * null when the frame was not understood.
   */
  receive(raw: string): ChatServerMessage | null {
    const message = parseServerMessage(raw);
    if (!message) return null;

    switch (message.type) {
      case 'session':
        emit(this.listeners.session, message);
        break;
      case 'context':
        emit(this.listeners.context, message);
        break;
      case 'token':
        emit(this.listeners.token, message);
        break;
      case 'done':
        emit(this.listeners.done, message);
        break;
      case 'error':
        emit(this.listeners.error, message);
        break;
    }

    return message;
  }

  sendMessage(input: SendMessageInput): void {
    if (!input.familyMemberId || input.familyMemberId.trim().length === 0) {
      throw new KincareValidationError('sendMessage requires familyMemberId', {
        status: 400,
        code: 'INVALID_ARGS',
      });
    }

    if (input.message.trim().length === 0 && input.image === undefined) {
      throw new KincareValidationError('sendMessage requires a message or an image', {
        status: 400,
        code: 'INVALID_ARGS',
      });
    }

    this.transport.send(JSON.stringify({ type: 'chat', ...input }));
  }

  cancel(sessionId: string): void {
    this.transport.send(JSON.stringify({ type: 'cancel', sessionId }));
  }
}

/**
 * Chat Error Taxonomy
 *
 * Every failure a chat turn or REST call can surface to a client.
 * Collaborator errors (driver text, HTTP bodies) are translated into one of
 * these at the service boundary; the original is kept as `cause` for logs.
 *
 * A privacy denial is not an error: denied units are dropped silently.
 */

export type ChatErrorCode =
  | 'RETRIEVAL_UNAVAILABLE'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_FAILURE'
  | 'GENERATION_CANCELLED'
  | 'CONFIGURATION_ERROR'
  | 'VALIDATION_ERROR'
  | 'SESSION_NOT_FOUND'
  | 'LAB_EVENT_NOT_FOUND'
  | 'SESSION_STORE_UNAVAILABLE';

export type ChatErrorStatus = 400 | 404 | 409 | 500 | 503 | 504;

interface ChatErrorOptions {
  status: ChatErrorStatus;
  retryable: boolean;
  userMessage: string;
  details?: unknown;
  cause?: unknown;
}

export class ChatError extends Error {
  readonly code: ChatErrorCode;
  readonly status: ChatErrorStatus;
  readonly retryable: boolean;
  /** Short, supportive text safe to show in the chat window */
  readonly userMessage: string;
  readonly details?: unknown;

  constructor(code: ChatErrorCode, message: string, options: ChatErrorOptions) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ChatError';
    this.code = code;
    this.status = options.status;
    this.retryable = options.retryable;
    this.userMessage = options.userMessage;
    this.details = options.details;
  }
}

export class RetrievalUnavailableError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super('RETRIEVAL_UNAVAILABLE', message, {
      status: 503,
      retryable: true,
      userMessage: "I couldn't look up your health records just now. Please try again in a moment.",
      cause,
    });
    this.name = 'RetrievalUnavailableError';
  }
}

export class GenerationTimeoutError extends ChatError {
  constructor(timeoutMs: number, cause?: unknown) {
    super('GENERATION_TIMEOUT', `Completion did not finish within ${timeoutMs}ms`, {
      status: 504,
      retryable: true,
      userMessage: 'That took longer than expected. Please try asking again.',
      cause,
    });
    this.name = 'GenerationTimeoutError';
  }
}

export class GenerationFailureError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_FAILURE', message, {
      status: 503,
      retryable: true,
      userMessage: 'Something went wrong while preparing a reply. Please try again.',
      cause,
    });
    this.name = 'GenerationFailureError';
  }
}

export class GenerationCancelledError extends ChatError {
  constructor() {
    super('GENERATION_CANCELLED', 'Completion was cancelled by the client', {
      status: 409,
      retryable: false,
      userMessage: 'Response stopped.',
    });
    this.name = 'GenerationCancelledError';
  }
}

export class ConfigurationError extends ChatError {
  constructor(message: string, details?: unknown) {
    super('CONFIGURATION_ERROR', message, {
      status: 500,
      retryable: false,
      userMessage: 'The assistant is not set up correctly. Please contact whoever runs it.',
      details,
    });
    this.name = 'ConfigurationError';
  }
}

export class ChatValidationError extends ChatError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, {
      status: 400,
      retryable: false,
      userMessage: message,
      details,
    });
    this.name = 'ChatValidationError';
  }
}

export class SessionNotFoundError extends ChatError {
  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Chat session ${sessionId} not found`, {
      status: 404,
      retryable: false,
      userMessage: 'That conversation no longer exists.',
    });
    this.name = 'SessionNotFoundError';
  }
}

export class LabEventNotFoundError extends ChatError {
  constructor(labEventId: string) {
    super('LAB_EVENT_NOT_FOUND', `Lab event ${labEventId} not found or not embedded`, {
      status: 404,
      retryable: false,
      userMessage: 'That lab result could not be found.',
    });
    this.name = 'LabEventNotFoundError';
  }
}

export class SessionStoreUnavailableError extends ChatError {
  constructor(message: string, cause?: unknown) {
    super('SESSION_STORE_UNAVAILABLE', message, {
      status: 503,
      retryable: true,
      userMessage: "I couldn't save this conversation. Please try again shortly.",
      cause,
    });
    this.name = 'SessionStoreUnavailableError';
  }
}

export function isChatError(error: unknown): error is ChatError {
  return error instanceof ChatError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

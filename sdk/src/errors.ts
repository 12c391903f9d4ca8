export interface KincareErrorContext {
  status: number;
  code: string;
  details?: unknown;
  headers?: Record<string, string>;
}

export class KincareError extends Error {
  readonly status: number;
  readonly code: string;
  readonly details?: unknown;
  readonly headers: Record<string, string>;

  constructor(message: string, context: KincareErrorContext) {
    super(message);
    this.name = 'KincareError';
    this.status = context.status;
    this.code = context.code;
    this.details = context.details;
    this.headers = context.headers ?? {};
  }
}

export class KincareValidationError extends KincareError {
  constructor(message: string, context: KincareErrorContext) {
    super(message, context);
    this.name = 'KincareValidationError';
  }
}

export class KincareNotFoundError extends KincareError {
  constructor(message: string, context: KincareErrorContext) {
    super(message, context);
    this.name = 'KincareNotFoundError';
  }
}

/** A dependency of the API (graph, model host, session store) is down; retrying may help */
export class KincareUnavailableError extends KincareError {
  constructor(message: string, context: KincareErrorContext) {
    super(message, context);
    this.name = 'KincareUnavailableError';
  }
}

export class KincareServerError extends KincareError {
  constructor(message: string, context: KincareErrorContext) {
    super(message, context);
    this.name = 'KincareServerError';
  }
}

const NOT_FOUND_CODES: ReadonlySet<string> = new Set(['SESSION_NOT_FOUND', 'LAB_EVENT_NOT_FOUND', 'NOT_FOUND']);

const UNAVAILABLE_CODES: ReadonlySet<string> = new Set([
  'RETRIEVAL_UNAVAILABLE',
  'SESSION_STORE_UNAVAILABLE',
  'GENERATION_TIMEOUT',
  'GENERATION_FAILURE',
]);

/** Pick the error class from the API code, then from the status when the code is not one of ours */
export function createKincareError(message: string, context: KincareErrorContext): KincareError {
  if (context.code === 'VALIDATION_ERROR' || context.status === 400 || context.status === 422) {
    return new KincareValidationError(message, context);
  }

  if (NOT_FOUND_CODES.has(context.code) || context.status === 404) {
    return new KincareNotFoundError(message, context);
  }

  if (UNAVAILABLE_CODES.has(context.code) || context.status === 503 || context.status === 504) {
    return new KincareUnavailableError(message, context);
  }

  if (context.status >= 500) {
    return new KincareServerError(message, context);
  }

  return new KincareError(message, context);
}

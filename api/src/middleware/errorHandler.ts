/**
 * Error Handler
 *
 * Global error handling for the API.
 * Maps chat errors and validation failures onto the JSON error envelope:
 *
 *   { "error": { "code": "...", "message": "...", "details"?: ... } }
 */

import type { Context, ErrorHandler } from 'hono';
import { ZodError } from 'zod';
import { ChatError } from '@/errors/chat';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Only show verbose errors in development and test
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

export const errorHandler: ErrorHandler<HonoEnv> = (error, c) => {
  if (error instanceof ZodError) {
    return c.json<ErrorResponse>(
      {
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.issues,
        },
      },
      400
    );
  }

  if (error instanceof ChatError) {
    if (error.status >= 500) {
      logger.error('Request failed', {
        code: error.code,
        error: error.message,
        cause: error.cause ? String(error.cause) : undefined,
        path: c.req.path,
        method: c.req.method,
      });
    }
    const body: ErrorResponse = {
      error: {
        code: error.code,
        message: isVerboseErrors() ? error.message : error.userMessage,
      },
    };
    if (error.details !== undefined && (error.status < 500 || isVerboseErrors())) {
      body.error.details = error.details;
    }
    return c.json(body, error.status);
  }

  logger.error('Unhandled error', {
    error: String(error),
    stack: error.stack,
    cause: error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json<ErrorResponse>(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: isVerboseErrors() ? error.message : 'An internal error occurred',
      },
    },
    500
  );
};

export function notFoundHandler(c: Context<HonoEnv>) {
  return c.json<ErrorResponse>(
    {
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
    },
    404
  );
}

/**
 * CORS Middleware
 *
 * The chat UI runs on its own origin. Allowed origins come from
 * CORS_ORIGINS; requests without an Origin header pass untouched.
 */

import { cors } from 'hono/cors';

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

export function createCorsMiddleware(allowedOrigins: readonly string[]) {
  const origins = new Set([...DEV_ORIGINS, ...allowedOrigins]);

  return cors({
    origin: (origin) => (origins.has(origin) ? origin : ''),
    allowMethods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
    exposeHeaders: ['Content-Length'],
    maxAge: 86400,
  });
}

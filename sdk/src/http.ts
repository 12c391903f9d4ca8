/**
 * Transport for the chat REST API.
 *
 * Every route answers `{ data, meta? }` on success and
 * `{ error: { code, message, details? } }` on failure. Methods get the
 * unwrapped payload; failures become typed errors keyed on the API code.
 */

import { KincareServerError, KincareUnavailableError, createKincareError } from './errors.js';
import type { KincareClientConfig } from './types.js';

export type ApiMethod = 'GET' | 'POST' | 'PATCH' | 'DELETE';

export interface ApiCall {
  method: ApiMethod;
  /** Path under /v1 with segments already encoded */
  path: string;
  params?: Record<string, string | number | undefined>;
  body?: object;
}

export interface ApiPage<TData, TMeta> {
  data: TData;
  meta: TMeta;
}

export const DEFAULT_BASE_URL = 'http://localhost:3000';
const DEFAULT_TIMEOUT_MS = 30_000;

export class ChatApiTransport {
  readonly baseUrl: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(config: KincareClientConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.headers = config.defaultHeaders ?? {};
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** `data` of a route that answers without `meta` */
  async data<T>(call: ApiCall): Promise<T> {
    const envelope = await this.send(call);
    return envelope.data as T;
  }

  /** `data` and `meta` of a listing route */
  async page<TData, TMeta>(call: ApiCall): Promise<ApiPage<TData, TMeta>> {
    const envelope = await this.send(call);
    if (!isRecord(envelope.meta)) {
      throw invalidResponse(call, 'Expected a meta object from the chat API');
    }
    return { data: envelope.data as TData, meta: envelope.meta as TMeta };
  }

  private async send(call: ApiCall): Promise<Record<string, unknown>> {
    const response = await this.exchange(call);
    const body = parseJson(await response.text());

    if (!response.ok) {
      const { code, message, details } = readErrorEnvelope(response.status, body);
      throw createKincareError(message, {
        status: response.status,
        code,
        details,
        headers: Object.fromEntries(response.headers.entries()),
      });
    }

    if (!isRecord(body) || !('data' in body)) {
      throw invalidResponse(call, 'Expected JSON response from the chat API');
    }
    return body;
  }

  private async exchange(call: ApiCall): Promise<Response> {
    const headers = new Headers(this.headers);
    if (call.body !== undefined && !headers.has('content-type')) {
      headers.set('content-type', 'application/json');
    }

    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      return await this.fetchFn(buildUrl(this.baseUrl, call), {
        method: call.method,
        headers,
        body: call.body !== undefined ? JSON.stringify(call.body) : undefined,
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new KincareUnavailableError(`Request timed out after ${this.timeoutMs}ms`, {
          status: 408,
          code: 'TIMEOUT',
        });
      }
      throw error;
    }
  }
}

export function normalizeBaseUrl(baseUrl?: string): string {
  const raw = (baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  return raw.endsWith('/v1') ? raw : `${raw}/v1`;
}

function buildUrl(baseUrl: string, call: ApiCall): string {
  const url = new URL(`${baseUrl}${call.path}`);
  for (const [key, value] of Object.entries(call.params ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function parseJson(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function invalidResponse(call: ApiCall, message: string): KincareServerError {
  return new KincareServerError(message, {
    status: 502,
    code: 'INVALID_RESPONSE',
    details: { method: call.method, path: call.path },
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readErrorEnvelope(status: number, body: unknown): { code: string; message: string; details?: unknown } {
  const error: Record<string, unknown> = isRecord(body) && isRecord(body.error) ? body.error : {};
  return {
    code: typeof error.code === 'string' ? error.code : `HTTP_${status}`,
    message: typeof error.message === 'string' ? error.message : `Chat API request failed with status ${status}`,
    details: error.details,
  };
}

/**
 * LLM Gateway
 *
 * Chat completions against an Ollama-compatible /api/chat endpoint.
 * Streaming responses arrive as NDJSON, one JSON object per line:
 *
 *   {"model":"...","message":{"role":"assistant","content":"Hel"},"done":false}
 *   {"model":"...","message":{"role":"assistant","content":""},"done":true}
 *
 * Every call runs under LLM_TIMEOUT_MS. Failures come back as
 * GenerationTimeoutError, GenerationCancelledError (caller aborted) or
 * GenerationFailureError; upstream error text is logged, not returned.
 */

import { z } from 'zod';
import {
  ChatError,
  GenerationCancelledError,
  GenerationFailureError,
  GenerationTimeoutError,
} from '@/errors/chat';
import { logger } from '@/utils/logger';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
  /** Base64 encoded images, vision models only */
  images?: string[];
}

export interface ChatCompletionRequest {
  model: string;
  messages: LlmMessage[];
  /** Aborting cancels the completion */
  signal?: AbortSignal;
}

export interface ChatCompletion {
  content: string;
  model: string;
}

export interface LlmGateway {
  streamChat(request: ChatCompletionRequest, onToken: (token: string) => void): Promise<ChatCompletion>;
  complete(request: ChatCompletionRequest): Promise<ChatCompletion>;
}

const chatChunkSchema = z.object({
  model: z.string().optional(),
  message: z.object({ content: z.string().optional() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

export interface OllamaLlmOptions {
  host: string;
  timeoutMs: number;
  fetch?: typeof globalThis.fetch;
}

export class OllamaLlmGateway implements LlmGateway {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof globalThis.fetch;

  constructor(options: OllamaLlmOptions) {
    this.url = new URL('/api/chat', options.host).toString();
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async streamChat(
    request: ChatCompletionRequest,
    onToken: (token: string) => void
  ): Promise<ChatCompletion> {
    return this.withDeadline(request.signal, async (signal) => {
      const response = await this.post(request, true, signal);
      if (!response.body) {
        throw new GenerationFailureError('LLM returned an empty stream');
      }
      return readChatStream(response.body, request.model, onToken);
    });
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletion> {
    return this.withDeadline(request.signal, async (signal) => {
      const response = await this.post(request, false, signal);
      const parsed = chatChunkSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GenerationFailureError('LLM returned an unexpected payload', parsed.error);
      }
      if (parsed.data.error) {
        throw new GenerationFailureError('LLM reported an error', parsed.data.error);
      }
      return {
        content: parsed.data.message?.content ?? '',
        model: parsed.data.model ?? request.model,
      };
    });
  }

  private async post(request: ChatCompletionRequest, stream: boolean, signal: AbortSignal): Promise<Response> {
    const response = await this.fetchFn(this.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ model: request.model, messages: request.messages, stream }),
      signal,
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      logger.warn('LLM request rejected', { status: response.status, detail: detail.slice(0, 200) });
      throw new GenerationFailureError(`LLM request failed with status ${response.status}`);
    }
    return response;
  }

  private async withDeadline<T>(
    external: AbortSignal | undefined,
    work: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const onAbort = () => controller.abort();
    if (external) {
      if (external.aborted) {
        controller.abort();
      } else {
        external.addEventListener('abort', onAbort, { once: true });
      }
    }

    try {
      return await work(controller.signal);
    } catch (error) {
      if (timedOut) throw new GenerationTimeoutError(this.timeoutMs, error);
      if (external?.aborted) throw new GenerationCancelledError();
      if (error instanceof ChatError) throw error;
      logger.warn('LLM request failed', { error: error instanceof Error ? error.message : String(error) });
      throw new GenerationFailureError('LLM request failed', error);
    } finally {
      clearTimeout(timeoutId);
      external?.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Read an NDJSON chat stream, forwarding each non-empty token.
 * Lines may be split across chunks; a trailing partial line is parsed at
 * end of stream.
 */
export async function readChatStream(
  stream: AsyncIterable<Uint8Array>,
  fallbackModel: string,
  onToken: (token: string) => void
): Promise<ChatCompletion> {
  const decoder = new TextDecoder();
  let buffer = '';
  let content = '';
  let model = fallbackModel;

  const handleLine = (rawLine: string) => {
    const line = rawLine.trim();
    if (!line) return;

    let payload: unknown;
    try {
      payload = JSON.parse(line);
    } catch {
      logger.warn('Skipping non-JSON line in LLM stream', { length: line.length });
      return;
    }

    const chunk = chatChunkSchema.safeParse(payload);
    if (!chunk.success) return;
    if (chunk.data.error) {
      throw new GenerationFailureError('LLM reported an error mid-stream', chunk.data.error);
    }
    if (chunk.data.model) model = chunk.data.model;

    const token = chunk.data.message?.content ?? '';
    if (token) {
      content += token;
      onToken(token);
    }
  };

  for await (const bytes of stream) {
    buffer += decoder.decode(bytes, { stream: true });
    const lines = buffer.split('\n');
    buffer = lines.pop() ?? '';
    for (const line of lines) handleLine(line);
  }
  buffer += decoder.decode();
  handleLine(buffer);

  return { content, model };
}

/**
 * Embedding Gateway
 *
 * Text → fixed-dimension vector through an Ollama-compatible /api/embed
 * endpoint. No caching; each call is one HTTP round trip bounded by
 * EMBED_TIMEOUT_MS.
 */

import { z } from 'zod';
import { ChatValidationError, ConfigurationError } from '@/errors/chat';

export interface EmbeddingGateway {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
}

export class EmbeddingRequestError extends Error {
  readonly timedOut: boolean;

  constructor(message: string, options: { timedOut: boolean; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'EmbeddingRequestError';
    this.timedOut = options.timedOut;
  }
}

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).min(1),
});

export interface OllamaEmbeddingOptions {
  host: string;
  model: string;
  dimension: number;
  timeoutMs: number;
  fetch?: typeof globalThis.fetch;
}

export class OllamaEmbeddingGateway implements EmbeddingGateway {
  readonly dimension: number;
  private readonly url: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof globalThis.fetch;

  constructor(options: OllamaEmbeddingOptions) {
    this.url = new URL('/api/embed', options.host).toString();
    this.model = options.model;
    this.dimension = options.dimension;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
  }

  async embed(text: string): Promise<number[]> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.fetchFn(this.url, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ model: this.model, input: text }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new EmbeddingRequestError(`Embedding request failed with status ${response.status}`, {
          timedOut: false,
        });
      }

      const parsed = embedResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new EmbeddingRequestError('Embedding response did not contain a vector', {
          timedOut: false,
          cause: parsed.error,
        });
      }
      return parsed.data.embeddings[0];
    } catch (error) {
      if (error instanceof EmbeddingRequestError) throw error;
      if (timedOut) {
        throw new EmbeddingRequestError(`Embedding request timed out after ${this.timeoutMs}ms`, {
          timedOut: true,
          cause: error,
        });
      }
      throw new EmbeddingRequestError('Embedding service unreachable', { timedOut: false, cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Compute the summary embedding for a LabEvent at ingestion time.
 * A LabEvent without a summary never gets an embedding, and a vector of
 * the wrong dimension is never written.
 */
export async function prepareLabEventEmbedding(
  gateway: EmbeddingGateway,
  summary: string | null | undefined
): Promise<number[]> {
  if (!summary || summary.trim().length === 0) {
    throw new ChatValidationError('Lab event summary is required before it can be embedded');
  }

  const vector = await gateway.embed(summary);
  if (vector.length !== gateway.dimension) {
    throw new ConfigurationError(
      `Embedding model returned ${vector.length} dimensions, expected ${gateway.dimension}`
    );
  }
  return vector;
}

// ABOUTME: OpenAI embedding client using text-embedding-3-small (1536 dimensions).
// ABOUTME: Falls back to per-item requests when a batch request fails; retries are left to the caller.
import OpenAI from 'openai';
import { EmbeddingError, errorMessage } from '../rag/errors.js';
import type { EmbedOptions, EmbedOutcome, EmbeddingClient } from './index.js';

/** The slice of the OpenAI SDK this client calls. */
export interface EmbeddingsApi {
  create(
    body: { model: string; input: string[] },
    options?: { signal?: AbortSignal },
  ): PromiseLike<{ data: Array<{ embedding: number[]; index: number }> }>;
}

export interface OpenAIEmbeddingClientOptions {
  api: EmbeddingsApi;
  model: string;
  dimensions: number;
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly dimensions: number;
  private api: EmbeddingsApi;
  private model: string;

  constructor(options: OpenAIEmbeddingClientOptions) {
    this.api = options.api;
    this.model = options.model;
    this.dimensions = options.dimensions;
  }

  /**
   * Generate one embedding vector.
   * @throws EmbeddingError on empty text, provider failure or wrong vector width
   */
  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    if (!text || text.trim().length === 0) {
      throw new EmbeddingError('Text cannot be empty');
    }

    let response: Awaited<ReturnType<EmbeddingsApi['create']>>;
    try {
      response = await this.api.create({ model: this.model, input: [text] }, { signal: options.signal });
    } catch (error) {
      throw new EmbeddingError(`OpenAI embedding request failed: ${errorMessage(error)}`, { cause: error });
    }

    const item = response.data[0];
    if (!item) {
      throw new EmbeddingError('OpenAI returned no embedding');
    }
    return this.checkDimensions(item.embedding);
  }

  async embedBatch(texts: string[], options: EmbedOptions = {}): Promise<EmbedOutcome[]> {
    if (texts.length === 0) {
      return [];
    }

    const blank = texts.findIndex((text) => text.trim().length === 0);
    if (blank === -1) {
      try {
        const response = await this.api.create({ model: this.model, input: texts }, { signal: options.signal });
        return this.toOutcomes(texts.length, response.data);
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }
        console.warn(
          `[Embeddings] Batch of ${texts.length} failed, falling back to single requests: ${errorMessage(error)}`
        );
      }
    }

    const outcomes: EmbedOutcome[] = [];
    for (const text of texts) {
      try {
        outcomes.push({ ok: true, embedding: await this.embed(text, options) });
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }
        outcomes.push({ ok: false, error: toEmbeddingError(error) });
      }
    }
    return outcomes;
  }

  isRetryable(error: unknown): boolean {
    const cause = error instanceof EmbeddingError && error.cause !== undefined ? error.cause : error;

    if (cause instanceof OpenAI.APIConnectionError) {
      return true;
    }
    if (cause instanceof OpenAI.APIError) {
      return cause.status === undefined || cause.status === 429 || cause.status >= 500;
    }
    return cause instanceof Error && /rate limit|timeout|429|50[234]/i.test(cause.message);
  }

  private toOutcomes(count: number, data: Array<{ embedding: number[]; index: number }>): EmbedOutcome[] {
    const byIndex = new Map(data.map((item) => [item.index, item.embedding]));
    const outcomes: EmbedOutcome[] = [];

    for (let i = 0; i < count; i++) {
      const embedding = byIndex.get(i);
      if (!embedding) {
        outcomes.push({ ok: false, error: new EmbeddingError(`OpenAI returned no embedding for item ${i}`) });
        continue;
      }
      try {
        outcomes.push({ ok: true, embedding: this.checkDimensions(embedding) });
      } catch (error) {
        outcomes.push({ ok: false, error: toEmbeddingError(error) });
      }
    }
    return outcomes;
  }

  private checkDimensions(embedding: number[]): number[] {
    if (embedding.length !== this.dimensions) {
      throw new EmbeddingError(`Expected ${this.dimensions} dimensions, got ${embedding.length}`);
    }
    return embedding;
  }
}

function toEmbeddingError(error: unknown): EmbeddingError {
  return error instanceof EmbeddingError ? error : new EmbeddingError(errorMessage(error), { cause: error });
}

export function createOpenAIEmbeddingClient(options: {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions: number;
}): OpenAIEmbeddingClient {
  const openai = new OpenAI({
    apiKey: options.apiKey,
    baseURL: options.baseURL,
    // Retries are the caller's
    maxRetries: 0,
  });

  return new OpenAIEmbeddingClient({
    api: openai.embeddings,
    model: options.model,
    dimensions: options.dimensions,
  });
}

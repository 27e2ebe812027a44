/**
 * Embedding Service
 *
 * Turns descriptions into vectors for the vector index and the staging
 * store. Backed by the AI SDK `embed` call against any OpenAI-compatible
 * endpoint, with a bounded in-memory cache keyed by text.
 */

import { createOpenAI } from '@ai-sdk/openai';
import { embed, type EmbeddingModel } from 'ai';
import { RetrievalUnavailable } from './errors.js';
import { VectorUtils } from './vector-utils.js';

/**
 * Anything that can embed a description
 */
export interface Embedder {
  embed(text: string): Promise<Float32Array>;
}

export interface EmbeddingServiceConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  /** Cached texts kept; oldest evicted first */
  cacheSize: number;
  /** Per-call timeout */
  timeoutMs: number;
}

export class AiEmbeddingService implements Embedder {
  private config: EmbeddingServiceConfig;
  private model: EmbeddingModel<string>;
  private cache = new Map<string, Float32Array>();

  constructor(config: Partial<EmbeddingServiceConfig> = {}, model?: EmbeddingModel<string>) {
    this.config = {
      apiKey: config.apiKey ?? '',
      baseURL: config.baseURL,
      model: config.model ?? 'text-embedding-3-small',
      cacheSize: config.cacheSize ?? 1000,
      timeoutMs: config.timeoutMs ?? 30_000
    };

    this.model = model ?? createOpenAI({
      apiKey: this.config.apiKey,
      ...(this.config.baseURL ? { baseURL: this.config.baseURL } : {})
    }).embedding(this.config.model);
  }

  async embed(text: string): Promise<Float32Array> {
    const cached = this.cache.get(text);
    if (cached) return cached;

    let values: number[];
    try {
      const result = await embed({
        model: this.model,
        value: text,
        maxRetries: 1,
        abortSignal: AbortSignal.timeout(this.config.timeoutMs)
      });
      values = result.embedding;
    } catch (error) {
      throw new RetrievalUnavailable(
        `Embedding service unavailable: ${error instanceof Error ? error.message : 'Unknown embedding error'}`,
        { cause: error }
      );
    }

    const vector = new Float32Array(values);
    if (!VectorUtils.isValid(vector)) {
      throw new RetrievalUnavailable('Embedding service returned an invalid vector');
    }

    this.remember(text, vector);
    return vector;
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  private remember(text: string, vector: Float32Array): void {
    if (this.config.cacheSize <= 0) return;
    if (this.cache.size >= this.config.cacheSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(text, vector);
  }
}

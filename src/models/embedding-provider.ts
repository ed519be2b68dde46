/**
 * Query embedding through Ollama's /api/embed.
 *
 * The retrieval core only embeds query text; document embeddings are
 * written by the indexer with the same model.
 */

import { createHash } from 'crypto';
import { isRecord, postJson } from '../llm/ollama-http.js';
import { LlmError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('embedding');

/** Cached query embeddings before the oldest is evicted. */
const DEFAULT_CACHE_SIZE = 256;

export interface EmbedOptions {
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  /** Model identifier; vectors from different models are not comparable */
  readonly modelId: string;
  embed(text: string, options?: EmbedOptions): Promise<number[]>;
}

/**
 * SHA-256 cache key for a (model, text) pair.
 */
export function computeContentHash(modelId: string, text: string): string {
  return createHash('sha256').update(modelId).update('\0').update(text).digest('hex');
}

export interface OllamaEmbeddingOptions {
  baseUrl: string;
  model: string;
  /** LRU capacity; 0 disables caching */
  cacheSize?: number;
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly modelId: string;
  private readonly baseUrl: string;
  private readonly cacheSize: number;
  /** Insertion-ordered; re-inserted on hit */
  private readonly cache = new Map<string, number[]>();

  constructor(options: OllamaEmbeddingOptions) {
    this.baseUrl = options.baseUrl;
    this.modelId = options.model;
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
  }

  /**
   * Embed one text.
   *
   * @throws LlmError LLM_UNAVAILABLE | LLM_TIMEOUT | LLM_BAD_RESPONSE
   */
  async embed(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const key = computeContentHash(this.modelId, text);
    const cached = this.cache.get(key);
    if (cached) {
      this.cache.delete(key);
      this.cache.set(key, cached);
      return cached;
    }

    const body = await postJson(
      this.baseUrl,
      '/api/embed',
      { model: this.modelId, input: text },
      options.signal,
    );

    const embedding = extractEmbedding(body);
    if (!embedding) {
      throw new LlmError(`Ollama returned no embedding for model ${this.modelId}`, 'LLM_BAD_RESPONSE');
    }

    this.remember(key, embedding);
    return embedding;
  }

  /** Number of cached embeddings. */
  get cachedCount(): number {
    return this.cache.size;
  }

  private remember(key: string, embedding: number[]): void {
    if (this.cacheSize <= 0) return;
    this.cache.set(key, embedding);
    while (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
      log.debug('Evicted cached embedding');
    }
  }
}

/**
 * First vector of an `/api/embed` response (`{ embeddings: number[][] }`).
 */
export function extractEmbedding(body: unknown): number[] | null {
  if (!isRecord(body) || !Array.isArray(body.embeddings)) return null;
  const first: unknown = body.embeddings[0];
  if (!Array.isArray(first) || first.length === 0) return null;

  const vector: number[] = [];
  for (const value of first) {
    if (typeof value !== 'number') return null;
    vector.push(value);
  }
  return vector;
}

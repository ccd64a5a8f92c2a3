// src/services/providers/embeddings/openai-embedder.ts: OpenAI embeddings with an in-process LRU
import OpenAI from 'openai';
import { LRUCache } from 'lru-cache';
import type { Embedder, Embedding } from '../retrieval-vector-utils';

const EMBEDDING_CACHE_MAX = 2000;
const EMBEDDING_CACHE_TTL_MS = 60 * 60_000;

export interface OpenAIEmbedderOptions {
  apiKey?: string;
  /** Preconfigured client; takes precedence over apiKey. */
  client?: OpenAI;
  model?: string;
  cacheSize?: number;
}

export class OpenAIEmbedder implements Embedder {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly cache: LRUCache<string, Embedding>;

  constructor(options: OpenAIEmbedderOptions = {}) {
    if (options.client == null && !options.apiKey) {
      throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass apiKey.');
    }
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? 'text-embedding-3-small';
    this.cache = new LRUCache<string, Embedding>({
      max: options.cacheSize ?? EMBEDDING_CACHE_MAX,
      ttl: EMBEDDING_CACHE_TTL_MS,
    });
  }

  async embed(text: string, signal?: AbortSignal): Promise<Embedding> {
    const key = `${this.model}:${text}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const res = await this.client.embeddings.create({ model: this.model, input: text }, { signal });
    const vector = res.data[0]?.embedding;
    if (!vector) throw new Error(`Embedding response from ${this.model} had no vector`);
    this.cache.set(key, vector);
    return vector;
  }
}

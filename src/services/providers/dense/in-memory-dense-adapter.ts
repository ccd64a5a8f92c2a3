// src/services/providers/dense/in-memory-dense-adapter.ts: dense route: embedding cosine over the corpus
import type { SearchFilters, SubQuery } from '@/types/core';
import { raceAbort } from '@/stability/deadline';
import type { CandidateSourceAdapter, SourceHit } from '../retrieval-types';
import { cosineSimilarity, type Embedder, type Embedding } from '../retrieval-vector-utils';
import { topHits, type InMemoryCorpus } from '../corpus';

export class InMemoryDenseAdapter implements CandidateSourceAdapter {
  readonly route = 'dense' as const;
  /** Chunk embeddings, computed on first use and shared by every query; never tied to one query's signal. */
  private readonly chunkEmbeddings = new Map<string, Promise<Embedding>>();

  constructor(
    private readonly corpus: InMemoryCorpus,
    private readonly embedder: Embedder,
  ) {}

  private embedChunk(id: string, text: string, signal: AbortSignal): Promise<Embedding> {
    let pending = this.chunkEmbeddings.get(id);
    if (!pending) {
      pending = this.embedder.embed(text);
      // A failed embedding is retried on the next search.
      void pending.catch(() => this.chunkEmbeddings.delete(id));
      this.chunkEmbeddings.set(id, pending);
    }
    return raceAbort(pending, signal);
  }

  async search(
    subQuery: SubQuery,
    topK: number,
    filters: SearchFilters | undefined,
    signal: AbortSignal,
  ): Promise<SourceHit[]> {
    const chunks = this.corpus.filter(filters);
    if (chunks.length === 0) return [];
    const queryEmbedding = await this.embedder.embed(subQuery.text, signal);
    const embeddings = await Promise.all(chunks.map((c) => this.embedChunk(c.id, c.text, signal)));
    return topHits(
      chunks.map((chunk, i) => ({ chunk, score: cosineSimilarity(queryEmbedding, embeddings[i]) })),
      topK,
    );
  }
}

// src/services/providers/corpus.ts: in-memory chunk corpus behind the reference adapters
import type { CandidateMetadata, SearchFilters } from '@/types/core';
import type { SourceHit } from './retrieval-types';

export interface CorpusChunk {
  /** Chunk id, unique within the corpus. */
  id: string;
  documentId: string;
  text: string;
  chunkIndex?: number;
  page?: number;
  title?: string;
  url?: string;
  metadata?: CandidateMetadata;
}

export class InMemoryCorpus {
  private readonly items: readonly CorpusChunk[];

  constructor(chunks: readonly CorpusChunk[]) {
    const ids = new Set<string>();
    for (const c of chunks) {
      if (ids.has(c.id)) throw new Error(`Duplicate chunk id "${c.id}"`);
      ids.add(c.id);
    }
    this.items = [...chunks];
  }

  get size(): number {
    return this.items.length;
  }

  all(): readonly CorpusChunk[] {
    return this.items;
  }

  /** Chunks passing the filters, in corpus order. */
  filter(filters?: SearchFilters): CorpusChunk[] {
    const docIds = filters?.documentIds?.length ? new Set(filters.documentIds) : null;
    const types = filters?.sourceTypes?.length ? new Set(filters.sourceTypes) : null;
    return this.items.filter(
      (c) =>
        (docIds == null || docIds.has(c.documentId)) &&
        (types == null || types.has(c.metadata?.sourceType ?? 'unknown')),
    );
  }
}

export function chunkToHit(chunk: CorpusChunk, rawScore: number): SourceHit {
  return {
    id: chunk.id,
    text: chunk.text,
    sourceRef: {
      documentId: chunk.documentId,
      ...(chunk.chunkIndex != null ? { chunkIndex: chunk.chunkIndex } : {}),
      ...(chunk.page != null ? { page: chunk.page } : {}),
      ...(chunk.title != null ? { title: chunk.title } : {}),
      ...(chunk.url != null ? { url: chunk.url } : {}),
    },
    rawScore,
    ...(chunk.metadata != null ? { metadata: chunk.metadata } : {}),
  };
}

/** Highest score first, corpus order on ties, capped at topK. */
export function topHits(scored: Array<{ chunk: CorpusChunk; score: number }>, topK: number): SourceHit[] {
  return scored
    .filter((s) => s.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, Math.max(0, topK))
    .map((s) => chunkToHit(s.chunk, s.score));
}

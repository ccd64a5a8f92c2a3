// src/services/providers/sparse/in-memory-keyword-adapter.ts: sparse route: BM25 with corpus IDF
import type { SearchFilters, SubQuery } from '@/types/core';
import type { CandidateSourceAdapter, SourceHit } from '../retrieval-types';
import { bm25Idf, bm25Score, contentTokens } from '../retrieval-vector-utils';
import { topHits, type InMemoryCorpus } from '../corpus';

export interface KeywordAdapterOptions {
  k1?: number;
  b?: number;
}

export class InMemoryKeywordAdapter implements CandidateSourceAdapter {
  readonly route = 'sparse' as const;
  private readonly tokens = new Map<string, string[]>();
  private readonly idf = new Map<string, number>();
  private readonly avgDocLength: number;

  constructor(
    private readonly corpus: InMemoryCorpus,
    private readonly options: KeywordAdapterOptions = {},
  ) {
    const documentFrequency = new Map<string, number>();
    let totalLength = 0;
    for (const chunk of corpus.all()) {
      const tokens = contentTokens(chunk.text);
      this.tokens.set(chunk.id, tokens);
      totalLength += tokens.length;
      for (const t of new Set(tokens)) documentFrequency.set(t, (documentFrequency.get(t) ?? 0) + 1);
    }
    for (const [term, df] of documentFrequency) this.idf.set(term, bm25Idf(corpus.size, df));
    this.avgDocLength = corpus.size > 0 ? totalLength / corpus.size : 0;
  }

  async search(subQuery: SubQuery, topK: number, filters: SearchFilters | undefined): Promise<SourceHit[]> {
    const queryTokens = contentTokens(subQuery.text);
    if (queryTokens.length === 0) return [];
    const scored = this.corpus.filter(filters).map((chunk) => ({
      chunk,
      score: bm25Score(queryTokens, this.tokens.get(chunk.id) ?? [], this.avgDocLength, this.idf, {
        k1: this.options.k1,
        b: this.options.b,
      }),
    }));
    return topHits(scored, topK);
  }
}

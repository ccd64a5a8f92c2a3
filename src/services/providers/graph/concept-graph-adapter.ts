// src/services/providers/graph/concept-graph-adapter.ts
// Graph route: concepts named by the sub-query, expanded one hop along prerequisite and related edges.
// Direct concept matches weigh 1, one-hop neighbours 0.5.
import type { SearchFilters, SubQuery } from '@/types/core';
import type { ConceptVocabulary } from '@/services/concept-vocabulary';
import type { CandidateSourceAdapter, SourceHit } from '../retrieval-types';
import { topHits, type InMemoryCorpus } from '../corpus';

const DIRECT_WEIGHT = 1;
const NEIGHBOUR_WEIGHT = 0.5;

export class ConceptGraphAdapter implements CandidateSourceAdapter {
  readonly route = 'graph' as const;
  private readonly chunkConcepts = new Map<string, Set<string>>();

  constructor(
    private readonly corpus: InMemoryCorpus,
    private readonly vocabulary: ConceptVocabulary,
  ) {
    for (const chunk of corpus.all()) {
      const concepts = new Set(vocabulary.match(chunk.text));
      for (const c of chunk.metadata?.concepts ?? []) concepts.add(vocabulary.canonical(c));
      this.chunkConcepts.set(chunk.id, concepts);
    }
  }

  /** Seed concepts with weight 1 and their one-hop neighbours with weight 0.5. */
  expand(text: string): Map<string, number> {
    const weights = new Map<string, number>();
    const seeds = this.vocabulary.match(text);
    for (const seed of seeds) weights.set(seed, DIRECT_WEIGHT);
    for (const seed of seeds) {
      for (const n of [...this.vocabulary.prerequisitesOf(seed), ...this.vocabulary.relatedTo(seed)]) {
        if (!weights.has(n)) weights.set(n, NEIGHBOUR_WEIGHT);
      }
    }
    return weights;
  }

  async search(subQuery: SubQuery, topK: number, filters: SearchFilters | undefined): Promise<SourceHit[]> {
    const weights = this.expand(subQuery.text);
    if (weights.size === 0) return [];
    const seedCount = [...weights.values()].filter((w) => w === DIRECT_WEIGHT).length;
    const scored = this.corpus.filter(filters).map((chunk) => {
      let score = 0;
      for (const c of this.chunkConcepts.get(chunk.id) ?? []) score += weights.get(c) ?? 0;
      return { chunk, score: score / Math.max(1, seedCount) };
    });
    return topHits(scored, topK);
  }
}

// src/services/scorers/relevance-models.ts
// Pointwise query/passage relevance models for the semantic scorer, selected per intent through an
// injected registry (no global lookup).
import type { Intent } from '@/types/core';
import {
  bm25Score,
  clamp01,
  contentTokens,
  cosineSimilarity,
  isStopword,
  termVectorCosine,
  type Embedder,
} from '../providers/retrieval-vector-utils';

export interface RelevanceModel {
  readonly name: string;
  relevance(queryText: string, passage: string, signal?: AbortSignal): number | Promise<number>;
}

export interface RelevanceModelRegistry {
  default: RelevanceModel;
  byIntent?: Partial<Record<Intent, RelevanceModel>>;
}

export function selectRelevanceModel(registry: RelevanceModelRegistry, intent: Intent): RelevanceModel {
  return registry.byIntent?.[intent] ?? registry.default;
}

export interface LexicalModelOptions {
  /** Share of the term-vector cosine in the blend; the rest is saturated BM25. */
  cosineWeight?: number;
  avgDocLength?: number;
}

/** Term-vector cosine blended with a saturated BM25 score; no model, no network. */
export class LexicalRelevanceModel implements RelevanceModel {
  readonly name: string = 'lexical';
  private readonly cosineWeight: number;
  private readonly avgDocLength: number;

  constructor(options: LexicalModelOptions = {}) {
    this.cosineWeight = options.cosineWeight ?? 0.6;
    this.avgDocLength = options.avgDocLength ?? 120;
  }

  protected tokens(text: string): string[] {
    return contentTokens(text);
  }

  relevance(queryText: string, passage: string): number {
    const q = this.tokens(queryText);
    const d = this.tokens(passage);
    if (q.length === 0 || d.length === 0) return 0;
    const cosine = termVectorCosine(q, d);
    const bm25 = bm25Score(q, d, this.avgDocLength, new Map(), { defaultIdf: 1 });
    const saturated = bm25 / (bm25 + q.length);
    return clamp01(this.cosineWeight * cosine + (1 - this.cosineWeight) * saturated);
  }
}

// Symbols first so a Greek variable is its own token rather than part of a word.
const MATH_TOKEN = /[=+\-*/^<>≤≥≠≈∑∏∫√∂∇∞πθλμσ]|[\p{L}\p{N}]+/gu;

/** Lexical model that keeps mathematical symbols as tokens, for formula-heavy material. */
export class MathAwareRelevanceModel extends LexicalRelevanceModel {
  readonly name: string = 'math-lexical';

  protected tokens(text: string): string[] {
    return (text.toLowerCase().match(MATH_TOKEN) ?? []).filter((t) => !isStopword(t));
  }
}

/** Cosine between query and passage embeddings, negatives floored at 0. */
export class EmbeddingRelevanceModel implements RelevanceModel {
  readonly name = 'embedding';

  constructor(private readonly embedder: Embedder) {}

  async relevance(queryText: string, passage: string, signal?: AbortSignal): Promise<number> {
    const [q, d] = await Promise.all([this.embedder.embed(queryText, signal), this.embedder.embed(passage, signal)]);
    return clamp01(cosineSimilarity(q, d));
  }
}

/** Lexical by default, math-aware for mathematical questions. */
export function createDefaultRelevanceRegistry(): RelevanceModelRegistry {
  return {
    default: new LexicalRelevanceModel(),
    byIntent: { mathematical_concept: new MathAwareRelevanceModel() },
  };
}

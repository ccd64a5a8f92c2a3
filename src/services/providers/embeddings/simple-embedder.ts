// src/services/providers/embeddings/simple-embedder.ts
// Deterministic hashing embedder: no model, no network. Used by default and in tests.

import type { Embedder, Embedding } from '../retrieval-vector-utils';
import { contentTokens } from '../retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  private dim: number;

  constructor(dim = 64) {
    this.dim = dim;
  }

  async embed(text: string): Promise<Embedding> {
    const vec: number[] = new Array<number>(this.dim).fill(0);

    for (const token of contentTokens(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dim] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}

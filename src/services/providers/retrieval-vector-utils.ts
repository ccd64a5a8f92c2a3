// src/services/providers/retrieval-vector-utils.ts: shared lexical + vector helpers for retrieval and scoring
import stopwordList from '@/data/stopwords.json';

export type Embedding = number[];

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<Embedding>;
}

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** Lowercased runs of letters and digits in any script. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(Boolean);
}

/** tokenize() without stopwords; what relevance and concept matching compare on. */
export function contentTokens(text: string): string[] {
  return tokenize(text).filter((t) => !STOPWORDS.has(t));
}

export function isStopword(token: string): boolean {
  return STOPWORDS.has(token);
}

/** Term-vector cosine similarity (no model, no network). */
export function termVectorCosine(tokensA: string[], tokensB: string[]): number {
  const vecA = new Map<string, number>();
  const vecB = new Map<string, number>();
  for (const t of tokensA) vecA.set(t, (vecA.get(t) ?? 0) + 1);
  for (const t of tokensB) vecB.set(t, (vecB.get(t) ?? 0) + 1);
  let dot = 0;
  let na = 0;
  let nb = 0;
  const allTerms = new Set([...vecA.keys(), ...vecB.keys()]);
  for (const t of allTerms) {
    const a = vecA.get(t) ?? 0;
    const b = vecB.get(t) ?? 0;
    dot += a * b;
    na += a * a;
    nb += b * b;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

/** Jaccard similarity on token sets. */
export function jaccardTokens(tokensA: string[], tokensB: string[]): number {
  const setA = new Set(tokensA);
  const setB = new Set(tokensB);
  let intersection = 0;
  for (const t of setA) if (setB.has(t)) intersection++;
  const union = setA.size + setB.size - intersection;
  return union === 0 ? 0 : intersection / union;
}

/** Okapi BM25 inverse document frequency (always positive). */
export function bm25Idf(documentCount: number, documentFrequency: number): number {
  return Math.log(1 + (documentCount - documentFrequency + 0.5) / (documentFrequency + 0.5));
}

/**
 * BM25 score of one document. `idf` maps a term to its inverse document frequency;
 * terms missing from the map get `defaultIdf`.
 */
export function bm25Score(
  queryTokens: string[],
  docTokens: string[],
  avgDocLength: number,
  idf: ReadonlyMap<string, number>,
  options: { k1?: number; b?: number; defaultIdf?: number } = {},
): number {
  const { k1 = 1.5, b = 0.75, defaultIdf = 0 } = options;
  if (docTokens.length === 0 || queryTokens.length === 0) return 0;

  const docLength = docTokens.length;
  const termFreq = new Map<string, number>();
  for (const t of docTokens) termFreq.set(t, (termFreq.get(t) ?? 0) + 1);

  let score = 0;
  for (const qt of new Set(queryTokens)) {
    const tf = termFreq.get(qt) ?? 0;
    if (tf === 0) continue;
    const numerator = tf * (k1 + 1);
    const denominator = tf + k1 * (1 - b + (b * docLength) / Math.max(avgDocLength, 1));
    score += (idf.get(qt) ?? defaultIdf) * (numerator / denominator);
  }
  return score;
}

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

// src/services/eval-retrieval.ts
// Standard retrieval metrics: MRR, Recall@K, NDCG@K (MS MARCO / BEIR style), plus context
// precision / recall of a compressed context against ground-truth documents.
import type { CompressedContext } from '@/types/core';

export interface RetrievalEvalSample {
  queryId?: string;
  query?: string;
  /** Ground-truth relevant document IDs. */
  relevantIds: string[];
  /** Retrieved list in rank order (top first). */
  retrieved: { id: string; score?: number }[];
}

/** Reciprocal rank of the first relevant id. */
export function computeMRR(relevantIds: Set<string>, retrieved: { id: string }[]): number {
  for (let i = 0; i < retrieved.length; i++) {
    if (relevantIds.has(retrieved[i].id)) return 1 / (i + 1);
  }
  return 0;
}

/** Recall@K: fraction of relevant docs found in top K. */
export function computeRecallAtK(relevantIds: Set<string>, retrieved: { id: string }[], k: number): number {
  if (relevantIds.size === 0) return 0;
  const found = new Set<string>();
  for (const r of retrieved.slice(0, k)) {
    if (relevantIds.has(r.id)) found.add(r.id);
  }
  return found.size / relevantIds.size;
}

/** NDCG@K with binary relevance. */
export function computeNDCGAtK(relevantIds: Set<string>, retrieved: { id: string }[], k: number): number {
  const topK = retrieved.slice(0, k);
  let dcg = 0;
  for (let i = 0; i < topK.length; i++) {
    const rel = relevantIds.has(topK[i].id) ? 1 : 0;
    dcg += rel / Math.log2(i + 2);
  }
  const idealRelevant = Math.min(relevantIds.size, k);
  let idcg = 0;
  for (let i = 0; i < idealRelevant; i++) {
    idcg += 1 / Math.log2(i + 2);
  }
  if (idcg === 0) return 0;
  return dcg / idcg;
}

export interface RetrievalEvalResult {
  mrr: number;
  recallAtK: number;
  ndcgAtK: number;
  sampleCount: number;
  k: number;
}

const DEFAULT_K = 10;

/** Averaged MRR, Recall@K, NDCG@K over samples. */
export function runRetrievalEval(
  samples: RetrievalEvalSample[],
  options?: { k?: number },
): RetrievalEvalResult {
  const k = options?.k ?? DEFAULT_K;
  if (samples.length === 0) {
    return { mrr: 0, recallAtK: 0, ndcgAtK: 0, sampleCount: 0, k };
  }
  let sumMrr = 0;
  let sumRecall = 0;
  let sumNdcg = 0;
  for (const s of samples) {
    const relSet = new Set(s.relevantIds);
    sumMrr += computeMRR(relSet, s.retrieved);
    sumRecall += computeRecallAtK(relSet, s.retrieved, k);
    sumNdcg += computeNDCGAtK(relSet, s.retrieved, k);
  }
  const n = samples.length;
  return {
    mrr: sumMrr / n,
    recallAtK: sumRecall / n,
    ndcgAtK: sumNdcg / n,
    sampleCount: n,
    k,
  };
}

/** Share of context entries whose document is relevant. */
export function contextPrecision(context: CompressedContext, relevantIds: Set<string>): number {
  if (context.entries.length === 0) return 0;
  const hits = context.entries.filter((e) => relevantIds.has(e.candidate.sourceRef.documentId)).length;
  return hits / context.entries.length;
}

/** Share of relevant documents represented somewhere in the context. */
export function contextRecall(context: CompressedContext, relevantIds: Set<string>): number {
  if (relevantIds.size === 0) return 0;
  const present = new Set(context.entries.map((e) => e.candidate.sourceRef.documentId));
  let hit = 0;
  for (const id of relevantIds) if (present.has(id)) hit++;
  return hit / relevantIds.size;
}

export interface ContextEvalSample {
  queryId?: string;
  relevantIds: string[];
  context: CompressedContext;
}

export interface ContextEvalResult {
  contextPrecision: number;
  contextRecall: number;
  avgTokens: number;
  sampleCount: number;
}

/** Averaged context precision / recall / token usage over samples. */
export function evaluateContext(samples: ContextEvalSample[]): ContextEvalResult {
  if (samples.length === 0) {
    return { contextPrecision: 0, contextRecall: 0, avgTokens: 0, sampleCount: 0 };
  }
  let precision = 0;
  let recall = 0;
  let tokens = 0;
  for (const s of samples) {
    const relSet = new Set(s.relevantIds);
    precision += contextPrecision(s.context, relSet);
    recall += contextRecall(s.context, relSet);
    tokens += s.context.totalTokens;
  }
  const n = samples.length;
  return {
    contextPrecision: precision / n,
    contextRecall: recall / n,
    avgTokens: tokens / n,
    sampleCount: n,
  };
}

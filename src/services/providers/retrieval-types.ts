// Shared retrieval types for the hybrid search layer
import type { Candidate, CandidateMetadata, Route, SearchFilters, SourceRef, SubQuery } from '@/types/core';

/** One hit as an adapter reports it; the router turns it into a Candidate. */
export interface SourceHit {
  /** Precomputed content id; recomputed by the router when absent. */
  contentId?: string;
  /** The adapter's own id for the span. */
  id?: string;
  text: string;
  sourceRef: SourceRef;
  rawScore: number;
  metadata?: CandidateMetadata;
}

/** Read-only search capability shared by every retrieval strategy. */
export interface CandidateSourceAdapter {
  readonly route: Route;
  search(
    subQuery: SubQuery,
    topK: number,
    filters: SearchFilters | undefined,
    signal: AbortSignal,
  ): Promise<SourceHit[]>;
}

export type RetrievalAdapters = Readonly<Record<Route, CandidateSourceAdapter>>;

/** Native-score-ordered candidates from one (sub-query, route) call. */
export interface RankedList {
  readonly subQueryId: string;
  readonly route: Route;
  readonly candidates: readonly Candidate[];
}

/** Default per-list cap. */
export const DEFAULT_TOP_K = 100;

// Shared builders and in-process fakes for the test suites.
import type {
  Candidate,
  CandidateMetadata,
  FusedCandidate,
  Query,
  Route,
  ScoredCandidate,
  SearchFilters,
  SubQuery,
} from '@/types/core';
import { computeContentId } from '@/services/dedup-utils';
import type { CandidateSourceAdapter, RankedList, SourceHit } from '@/services/providers/retrieval-types';
import type { TokenCounter } from '@/services/context-compressor';
import type { EngineLogger } from '@/services/logger';

export function makeQuery(overrides: Partial<Query> = {}): Query {
  return {
    id: 'q1',
    text: 'Explain gradient descent',
    intent: 'concept_explanation',
    intentSource: 'classified',
    concepts: ['gradient descent'],
    difficulty: 'intermediate',
    ...overrides,
  };
}

export function makeSubQuery(text: string, id = 'q1:sq0'): SubQuery {
  return { id, text, parentId: 'q1', dependsOn: [], kind: 'original' };
}

export function makeCandidate(
  text: string,
  documentId: string,
  route: Route,
  rawScore: number,
  extra: { nativeId?: string; metadata?: CandidateMetadata; page?: number; chunkIndex?: number } = {},
): Candidate {
  return {
    contentId: computeContentId(text, documentId),
    text,
    sourceRef: {
      documentId,
      ...(extra.page != null ? { page: extra.page } : {}),
      ...(extra.chunkIndex != null ? { chunkIndex: extra.chunkIndex } : {}),
    },
    route,
    rawScore,
    ...(extra.nativeId != null ? { nativeId: extra.nativeId } : {}),
    ...(extra.metadata != null ? { metadata: extra.metadata } : {}),
  };
}

export function makeList(route: Route, candidates: Candidate[], subQueryId = 'q1:sq0'): RankedList {
  return { subQueryId, route, candidates };
}

export function makeFused(candidate: Candidate, fusedScore = 0.01, firstSeenRank = 1): FusedCandidate {
  return {
    ...candidate,
    fusedScore,
    routes: [candidate.route],
    subQueryIds: ['q1:sq0'],
    firstSeenRank,
    occurrences: 1,
  };
}

export function makeScored(
  text: string,
  documentId: string,
  compositeScore: number,
  metadata?: CandidateMetadata,
  page?: number,
): ScoredCandidate {
  const base = makeCandidate(text, documentId, 'dense', compositeScore, { metadata, page });
  return {
    ...makeFused(base),
    breakdown: {},
    compositeScore,
    failedScorers: [],
    partiallyScored: false,
  };
}

/** One token per whitespace-separated word. */
export const wordCounter: TokenCounter = {
  count: (text: string) => text.split(/\s+/).filter(Boolean).length,
};

export function hit(text: string, documentId: string, rawScore: number, metadata?: CandidateMetadata): SourceHit {
  return { id: `${documentId}#${rawScore}`, text, sourceRef: { documentId }, rawScore, ...(metadata ? { metadata } : {}) };
}

type SearchFn = (
  subQuery: SubQuery,
  topK: number,
  filters: SearchFilters | undefined,
  signal: AbortSignal,
) => Promise<SourceHit[]>;

export function fakeAdapter(route: Route, search: SearchFn): CandidateSourceAdapter {
  return { route, search };
}

export function staticAdapter(route: Route, hits: SourceHit[]): CandidateSourceAdapter {
  return fakeAdapter(route, async () => hits);
}

/** Never resolves on its own; rejects once the call's signal aborts. */
export function hangingAdapter(route: Route): CandidateSourceAdapter {
  return fakeAdapter(
    route,
    (_sq, _k, _f, signal) =>
      new Promise<SourceHit[]>((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
      }),
  );
}

export interface RecordingLogger extends EngineLogger {
  entries: Array<{ level: string; args: unknown[] }>;
}

export function recordingLogger(): RecordingLogger {
  const entries: Array<{ level: string; args: unknown[] }> = [];
  const push = (level: string) => (...args: unknown[]) => {
    entries.push({ level, args });
  };
  return { entries, debug: push('debug'), info: push('info'), warn: push('warn'), error: push('error') };
}

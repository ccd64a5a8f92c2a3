// src/services/fusion.ts: weighted Reciprocal Rank Fusion over per-(sub-query, route) lists
import { ROUTES, type Candidate, type Difficulty, type FusedCandidate, type Route } from '@/types/core';
import { DEFAULT_ROUTE_WEIGHTS, type RouteWeights } from '@/config/retrieval-config';
import type { RankedList } from './providers/retrieval-types';
import { logger as defaultLogger, type EngineLogger } from './logger';

export const DEFAULT_RRF_K = 60;

export type FusionResult =
  | {
      status: 'ok';
      candidates: FusedCandidate[];
      /** Occurrences seen across all lists before dedup. */
      occurrenceCount: number;
    }
  | { status: 'empty'; reason: 'EmptyFusionResult' };

export interface FuseOptions {
  rrfK?: number;
  routeWeights?: RouteWeights;
  /** Candidates tagged with this difficulty get the difficulty-aware bonus. */
  queryDifficulty?: Difficulty;
  logger?: EngineLogger;
}

interface Occurrence {
  candidate: Candidate;
  contribution: number;
  rank: number;
  subQueryId: string;
}

interface Accumulator {
  occurrences: Occurrence[];
  routes: Set<Route>;
  subQueryIds: Set<string>;
  firstSeenRank: number;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Largest contribution first; then route order, native score, native id and source ref. */
function compareOccurrences(a: Occurrence, b: Occurrence): number {
  return (
    b.contribution - a.contribution ||
    ROUTES.indexOf(a.candidate.route) - ROUTES.indexOf(b.candidate.route) ||
    b.candidate.rawScore - a.candidate.rawScore ||
    compareStrings(a.candidate.nativeId ?? '￿', b.candidate.nativeId ?? '￿') ||
    compareStrings(JSON.stringify(a.candidate.sourceRef), JSON.stringify(b.candidate.sourceRef)) ||
    compareStrings(a.subQueryId, b.subQueryId)
  );
}

/** Summed smallest first so the total does not depend on list order. */
function stableSum(values: number[]): number {
  return [...values].sort((a, b) => a - b).reduce((sum, v) => sum + v, 0);
}

export function compareFused(a: FusedCandidate, b: FusedCandidate): number {
  return (
    b.fusedScore - a.fusedScore ||
    a.firstSeenRank - b.firstSeenRank ||
    compareStrings(a.sourceRef.documentId, b.sourceRef.documentId) ||
    compareStrings(a.contentId, b.contentId)
  );
}

/**
 * score(c) = sum over occurrences of w_route / (rrfK + rank), plus w_difficulty / (rrfK + firstSeenRank)
 * once when the candidate's difficulty matches the query's. Occurrences in several routes or
 * sub-queries add up. Candidates are deduplicated by content id.
 */
export function fuseRankedLists(lists: readonly RankedList[], options: FuseOptions = {}): FusionResult {
  const rrfK = options.rrfK ?? DEFAULT_RRF_K;
  const weights = options.routeWeights ?? DEFAULT_ROUTE_WEIGHTS;
  const log = options.logger ?? defaultLogger;

  const byContent = new Map<string, Accumulator>();
  let occurrenceCount = 0;

  for (const list of lists) {
    const weight = weights[list.route];
    list.candidates.forEach((candidate, index) => {
      const rank = index + 1;
      occurrenceCount++;
      let acc = byContent.get(candidate.contentId);
      if (!acc) {
        acc = { occurrences: [], routes: new Set(), subQueryIds: new Set(), firstSeenRank: rank };
        byContent.set(candidate.contentId, acc);
      }
      acc.occurrences.push({ candidate, contribution: weight / (rrfK + rank), rank, subQueryId: list.subQueryId });
      acc.routes.add(candidate.route);
      acc.subQueryIds.add(list.subQueryId);
      acc.firstSeenRank = Math.min(acc.firstSeenRank, rank);
    });
  }

  if (byContent.size === 0) {
    log.info('fusion:empty', { lists: lists.length });
    return { status: 'empty', reason: 'EmptyFusionResult' };
  }

  const fused: FusedCandidate[] = [];
  for (const acc of byContent.values()) {
    const representative = [...acc.occurrences].sort(compareOccurrences)[0].candidate;
    const contributions = acc.occurrences.map((o) => o.contribution);
    if (options.queryDifficulty != null && representative.metadata?.difficulty === options.queryDifficulty) {
      contributions.push(weights.difficulty / (rrfK + acc.firstSeenRank));
    }
    fused.push(
      Object.freeze({
        contentId: representative.contentId,
        text: representative.text,
        sourceRef: representative.sourceRef,
        route: representative.route,
        rawScore: representative.rawScore,
        ...(representative.nativeId != null ? { nativeId: representative.nativeId } : {}),
        ...(representative.metadata != null ? { metadata: representative.metadata } : {}),
        fusedScore: stableSum(contributions),
        routes: ROUTES.filter((r) => acc.routes.has(r)),
        subQueryIds: [...acc.subQueryIds].sort(compareStrings),
        firstSeenRank: acc.firstSeenRank,
        occurrences: acc.occurrences.length,
      }),
    );
  }

  fused.sort(compareFused);
  log.debug('fusion:done', { lists: lists.length, occurrences: occurrenceCount, unique: fused.length });
  return { status: 'ok', candidates: fused, occurrenceCount };
}

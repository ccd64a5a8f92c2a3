// src/services/scorers/authority-scorer.ts
import type { FusedCandidate, Query, ScoreName, SourceType } from '@/types/core';
import { clamp01 } from '../providers/retrieval-vector-utils';
import type { ScoringFunction } from './types';

export const SOURCE_TYPE_AUTHORITY: Readonly<Record<SourceType, number>> = {
  textbook: 0.9,
  paper: 0.85,
  lecture: 0.75,
  documentation: 0.7,
  notes: 0.5,
  web: 0.4,
  unknown: 0.3,
};

/** 1000 citations saturate the citation component. */
export function citationScore(citationCount: number): number {
  if (!Number.isFinite(citationCount) || citationCount <= 0) return 0;
  return Math.min(1, Math.log10(1 + citationCount) / 3);
}

/** Source-type weight, blended 70/30 with a log-scaled citation count when one is known. */
export class AuthorityScorer implements ScoringFunction {
  readonly name: ScoreName = 'authority';

  constructor(private readonly sourceWeights: Readonly<Record<SourceType, number>> = SOURCE_TYPE_AUTHORITY) {}

  score(_query: Query, candidate: FusedCandidate): number {
    const typeWeight = this.sourceWeights[candidate.metadata?.sourceType ?? 'unknown'];
    const citations = candidate.metadata?.citationCount;
    if (citations == null) return clamp01(typeWeight);
    return clamp01(0.7 * typeWeight + 0.3 * citationScore(citations));
  }
}

// src/services/scorers/types.ts: scoring function contract for the rerank engine
import type { FusedCandidate, PedagogicalSubScores, Query, ScoreName } from '@/types/core';

/** A bare score, or a score with the pedagogical breakdown behind it. */
export type ScoreOutput = number | { value: number; pedagogicalDetail?: PedagogicalSubScores };

/**
 * One of the five rerank signals. `score` returns a value in [0,1] and may throw
 * ScoringUnavailableError; any thrown error marks this scorer failed for this candidate only.
 */
export interface ScoringFunction {
  readonly name: ScoreName;
  score(query: Query, candidate: FusedCandidate, signal?: AbortSignal): ScoreOutput | Promise<ScoreOutput>;
}

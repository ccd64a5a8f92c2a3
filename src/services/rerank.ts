// src/services/rerank.ts
// Ensemble rerank: five scoring functions combined with fixed composite weights. A scorer that fails
// for one candidate has its weight redistributed over the others for that candidate only.
import type { FusedCandidate, PedagogicalSubScores, Query, ScoreBreakdown, ScoreName, ScoredCandidate } from '@/types/core';
import { DEFAULT_COMPOSITE_WEIGHTS, type CompositeWeights } from '@/config/retrieval-config';
import { raceAbort } from '@/stability/deadline';
import { ConfigurationError, ScoringUnavailableError, errorMessage } from './errors';
import { clamp01 } from './providers/retrieval-vector-utils';
import type { ScoreOutput, ScoringFunction } from './scorers/types';
import { logger as defaultLogger, type EngineLogger } from './logger';

const DEFAULT_CONCURRENCY = 8;

export interface RerankEngineOptions {
  scorers: readonly ScoringFunction[];
  compositeWeights?: CompositeWeights;
  /** Candidates scored at once. */
  concurrency?: number;
  logger?: EngineLogger;
}

export interface RerankOptions {
  signal?: AbortSignal;
  /** Score only the first `limit` fused candidates. */
  limit?: number;
}

export interface RerankResult {
  candidates: ScoredCandidate[];
  partiallyScoredCount: number;
  /** True when the signal aborted before every candidate was scored. */
  interrupted: boolean;
}

type ScorerOutcome =
  | { name: ScoreName; ok: true; value: number; pedagogicalDetail?: PedagogicalSubScores }
  | { name: ScoreName; ok: false; error: string };

function normalizeOutput(name: ScoreName, output: ScoreOutput): Extract<ScorerOutcome, { ok: true }> {
  const value = typeof output === 'number' ? output : output.value;
  if (!Number.isFinite(value)) {
    throw new ScoringUnavailableError(name, `${name} scorer returned a non-numeric score`);
  }
  const pedagogicalDetail = typeof output === 'number' ? undefined : output.pedagogicalDetail;
  return { name, ok: true, value: clamp01(value), ...(pedagogicalDetail ? { pedagogicalDetail } : {}) };
}

/**
 * Weighted mean over the scorers that succeeded, rescaled to the configured total weight, which is
 * the failed scorers' weight shared out proportionally. Zero when nothing usable is left.
 */
export function compositeScore(
  breakdown: ScoreBreakdown,
  weights: CompositeWeights,
  configured: readonly ScoreName[],
  failed: readonly ScoreName[],
): number {
  let totalWeight = 0;
  let remainingWeight = 0;
  let weighted = 0;
  for (const name of configured) {
    totalWeight += weights[name];
    const value = breakdown[name];
    if (failed.includes(name) || value === undefined) continue;
    remainingWeight += weights[name];
    weighted += weights[name] * value;
  }
  if (remainingWeight <= 0) return 0;
  return failed.length > 0 ? (weighted * totalWeight) / remainingWeight : weighted;
}

export class RerankEngine {
  private readonly scorers: readonly ScoringFunction[];
  private readonly weights: CompositeWeights;
  private readonly concurrency: number;
  private readonly log: EngineLogger;

  constructor(options: RerankEngineOptions) {
    const names = options.scorers.map((s) => s.name);
    const duplicate = names.find((n, i) => names.indexOf(n) !== i);
    if (duplicate) {
      throw new ConfigurationError(`Duplicate scorer "${duplicate}"`, [
        { path: 'scorers', message: `Scorer "${duplicate}" registered twice` },
      ]);
    }
    this.scorers = options.scorers;
    this.weights = options.compositeWeights ?? DEFAULT_COMPOSITE_WEIGHTS;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.log = options.logger ?? defaultLogger;
  }

  private async runScorer(
    scorer: ScoringFunction,
    query: Query,
    candidate: FusedCandidate,
    signal?: AbortSignal,
  ): Promise<ScorerOutcome> {
    if (signal?.aborted) return { name: scorer.name, ok: false, error: 'Cancelled before scoring' };
    try {
      return normalizeOutput(scorer.name, await raceAbort(Promise.resolve(scorer.score(query, candidate, signal)), signal));
    } catch (err) {
      const error = errorMessage(err);
      if (signal?.aborted) {
        this.log.debug('rerank:scorer_cancelled', { scorer: scorer.name, contentId: candidate.contentId });
        return { name: scorer.name, ok: false, error };
      }
      this.log.warn('rerank:scorer_failed', { scorer: scorer.name, contentId: candidate.contentId, error });
      return { name: scorer.name, ok: false, error };
    }
  }

  private async scoreCandidate(query: Query, candidate: FusedCandidate, signal?: AbortSignal): Promise<ScoredCandidate> {
    const outcomes = await Promise.all(this.scorers.map((s) => this.runScorer(s, query, candidate, signal)));
    const breakdown: ScoreBreakdown = {};
    const failedScorers: ScoreName[] = [];
    let pedagogicalDetail: PedagogicalSubScores | undefined;
    for (const outcome of outcomes) {
      if (outcome.ok) {
        breakdown[outcome.name] = outcome.value;
        if (outcome.pedagogicalDetail) pedagogicalDetail = outcome.pedagogicalDetail;
      } else {
        failedScorers.push(outcome.name);
      }
    }
    const configured = this.scorers.map((s) => s.name);
    return Object.freeze({
      ...candidate,
      breakdown,
      ...(pedagogicalDetail ? { pedagogicalDetail } : {}),
      compositeScore: compositeScore(breakdown, this.weights, configured, failedScorers),
      failedScorers,
      partiallyScored: failedScorers.length > 0,
    });
  }

  /** Output sorted by composite score; ties keep fused order. Never throws because of one candidate. */
  async rerank(query: Query, candidates: readonly FusedCandidate[], options: RerankOptions = {}): Promise<RerankResult> {
    const { signal } = options;
    const pool = options.limit != null ? candidates.slice(0, Math.max(0, options.limit)) : [...candidates];
    const scored: ScoredCandidate[] = [];
    let interrupted = false;

    for (let i = 0; i < pool.length; i += this.concurrency) {
      if (signal?.aborted) interrupted = true;
      const batch = pool.slice(i, i + this.concurrency);
      scored.push(...(await Promise.all(batch.map((c) => this.scoreCandidate(query, c, signal)))));
    }
    // An abort during the last batch still cuts scorers short.
    if (signal?.aborted && pool.length > 0) interrupted = true;

    scored.sort((a, b) => b.compositeScore - a.compositeScore);
    const partiallyScoredCount = scored.filter((c) => c.partiallyScored).length;
    this.log.info('rerank:done', {
      queryId: query.id,
      candidates: scored.length,
      partiallyScored: partiallyScoredCount,
      interrupted,
    });
    return { candidates: scored, partiallyScoredCount, interrupted };
  }
}

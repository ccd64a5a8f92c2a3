// src/services/orchestrator.ts: retrieveAndCompress: analyze → decompose → retrieve → fuse → rerank → compress
import type {
  CompressedContext,
  Intent,
  Query,
  QualityReport,
  SearchFilters,
  SubQuery,
} from '@/types/core';
import {
  routeWeightsFor,
  withOverrides,
  type RetrievalConfig,
  type RetrievalConfigOverrides,
  type RouteWeights,
} from '@/config/retrieval-config';
import { createQueryDeadline } from '@/stability/deadline';
import type { RetrievalAdapters } from './providers/retrieval-types';
import type { RetrievalCache } from './cache';
import type { ConceptVocabulary } from './concept-vocabulary';
import type { ScoringFunction } from './scorers/types';
import { analyzeQuery } from './query-understanding';
import { decomposeQuery } from './query-decomposition';
import { routeAndRetrieve } from './retrieval-router';
import { fuseRankedLists } from './fusion';
import { RerankEngine } from './rerank';
import { compressContext, type TokenCounter } from './context-compressor';
import { createTrace, addSpan, finishTrace, type QueryProcessingTrace } from './query-processing-trace';
import { logger as defaultLogger, type EngineLogger } from './logger';

export interface OrchestratorDeps {
  adapters: RetrievalAdapters;
  /** Validated base configuration; per-call options are merged over it. */
  config: RetrievalConfig;
  scorers: readonly ScoringFunction[];
  vocabulary?: ConceptVocabulary;
  tokenCounter?: TokenCounter;
  cache?: RetrievalCache | null;
  logger?: EngineLogger;
}

export interface RetrieveAndCompressOptions {
  topK?: number;
  tokenBudget?: number;
  /** Replaces the intent's route weights for this call. */
  routeWeights?: Partial<RouteWeights>;
  intentOverride?: Intent;
  filters?: SearchFilters;
  signal?: AbortSignal;
  /** Any other configuration for this call only (timeouts, thresholds, weight tables). */
  overrides?: RetrievalConfigOverrides;
  queryId?: string;
}

interface OutcomeBase {
  query: Query;
  subQueries: SubQuery[];
  quality: QualityReport;
  trace: QueryProcessingTrace;
}

export type RetrievalOutcome =
  | (OutcomeBase & { status: 'ok'; context: CompressedContext })
  | (OutcomeBase & { status: 'no_results'; reason: 'EmptyFusionResult' | 'NothingFitsBudget' });

/**
 * Core query interface. Only InvalidQueryError and ConfigurationError escape; adapter and scorer
 * failures come back as quality metadata, and an empty candidate set as `no_results`.
 */
export async function retrieveAndCompress(
  queryText: string,
  deps: OrchestratorDeps,
  options: RetrieveAndCompressOptions = {},
): Promise<RetrievalOutcome> {
  const log = deps.logger ?? defaultLogger;

  // Validated before anything touches an adapter.
  const config = withOverrides(deps.config, {
    ...options.overrides,
    ...(options.topK !== undefined ? { topK: options.topK } : {}),
    ...(options.tokenBudget !== undefined ? { tokenBudget: options.tokenBudget } : {}),
    ...(options.routeWeights !== undefined ? { routeWeights: options.routeWeights } : {}),
  });

  const trace = createTrace({ originalQuery: queryText });
  let t0 = Date.now();
  const query = analyzeQuery(queryText, {
    intentOverride: options.intentOverride,
    vocabulary: deps.vocabulary,
    id: options.queryId,
  });
  addSpan(trace, 'analyze', t0, {
    metadata: { intent: query.intent, intentSource: query.intentSource, concepts: query.concepts, difficulty: query.difficulty },
  });

  t0 = Date.now();
  const subQueries = decomposeQuery(query, { vocabulary: deps.vocabulary });
  addSpan(trace, 'decompose', t0, { metadata: { count: subQueries.length, kinds: subQueries.map((s) => s.kind) } });

  const deadline = createQueryDeadline(config.queryTimeoutMs, options.signal);
  try {
    t0 = Date.now();
    const { lists, degraded } = await routeAndRetrieve(
      subQueries,
      { adapters: deps.adapters, cache: deps.cache, logger: log },
      {
        topK: config.topK,
        filters: options.filters,
        perRouteTimeoutMs: config.perRouteTimeoutMs,
        signal: deadline.signal,
      },
    );
    addSpan(trace, 'retrieve', t0, { metadata: { lists: lists.length, degraded: degraded.length } });

    const quality = (partiallyScoredCount: number): QualityReport => ({
      degraded: degraded.length > 0 || deadline.timedOut(),
      degradedRoutes: degraded,
      partiallyScoredCount,
      timedOut: deadline.timedOut(),
    });

    t0 = Date.now();
    const routeWeights = options.routeWeights !== undefined ? config.routeWeights : routeWeightsFor(config, query.intent);
    const fusion = fuseRankedLists(lists, {
      rrfK: config.rrfK,
      routeWeights,
      queryDifficulty: query.difficulty,
      logger: log,
    });
    addSpan(trace, 'fuse', t0, {
      metadata: fusion.status === 'ok' ? { unique: fusion.candidates.length, occurrences: fusion.occurrenceCount } : { empty: true },
    });

    if (fusion.status === 'empty') {
      finishTrace(trace);
      log.info('orchestrator:no_results', { queryId: query.id, reason: fusion.reason, degraded: degraded.length });
      return { status: 'no_results', reason: 'EmptyFusionResult', query, subQueries, quality: quality(0), trace };
    }

    t0 = Date.now();
    const engine = new RerankEngine({
      scorers: deps.scorers,
      compositeWeights: config.compositeWeights,
      concurrency: config.rerankConcurrency,
      logger: log,
    });
    const reranked = await engine.rerank(query, fusion.candidates, { signal: deadline.signal, limit: config.topK });
    addSpan(trace, 'rerank', t0, {
      metadata: { scored: reranked.candidates.length, partiallyScored: reranked.partiallyScoredCount, interrupted: reranked.interrupted },
    });

    t0 = Date.now();
    const context = compressContext(reranked.candidates, {
      tokenBudget: config.tokenBudget,
      dedupSimilarityThreshold: config.dedupSimilarityThreshold,
      tokenCounter: deps.tokenCounter,
      vocabulary: deps.vocabulary,
      logger: log,
    });
    addSpan(trace, 'compress', t0, {
      metadata: { entries: context.entries.length, totalTokens: context.totalTokens, ordering: context.ordering },
    });
    finishTrace(trace);

    const report = quality(reranked.partiallyScoredCount);
    if (context.entries.length === 0) {
      log.info('orchestrator:no_results', { queryId: query.id, reason: 'NothingFitsBudget' });
      return { status: 'no_results', reason: 'NothingFitsBudget', query, subQueries, quality: report, trace };
    }

    log.info('orchestrator:done', {
      queryId: query.id,
      intent: query.intent,
      entries: context.entries.length,
      totalTokens: context.totalTokens,
      degraded: report.degraded,
      partiallyScored: report.partiallyScoredCount,
      durationMs: trace.durationMs,
    });
    return { status: 'ok', query, subQueries, context, quality: report, trace };
  } finally {
    deadline.dispose();
  }
}

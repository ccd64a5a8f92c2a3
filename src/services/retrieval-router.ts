// src/services/retrieval-router.ts
// Central retrieval router: every sub-query goes to every route (dense, sparse, graph) in parallel.
// Each call runs under its own deadline; a failed or slow route yields an empty list plus a degraded
// record instead of failing the query. The router never ranks across routes; fusion does that.
import crypto from 'crypto';
import { z } from 'zod';
import {
  ROUTES,
  type Candidate,
  type DegradeReason,
  type DegradedRoute,
  type Route,
  type SearchFilters,
  type SubQuery,
} from '@/types/core';
import { withDeadline } from '@/stability/deadline';
import type { CandidateSourceAdapter, RankedList, RetrievalAdapters, SourceHit } from './providers/retrieval-types';
import { DEFAULT_TOP_K } from './providers/retrieval-types';
import type { RetrievalCache } from './cache';
import { computeContentId } from './dedup-utils';
import { AdapterError, AdapterTimeoutError, DeadlineExceededError, RetrievalEngineError, errorMessage } from './errors';
import { logger as defaultLogger, type EngineLogger } from './logger';

export interface RetrievalRouterDeps {
  adapters: RetrievalAdapters;
  /** Optional cache-aside for per-route lists. */
  cache?: RetrievalCache | null;
  logger?: EngineLogger;
}

export interface RouteAndRetrieveOptions {
  topK?: number;
  filters?: SearchFilters;
  perRouteTimeoutMs?: number;
  /** Query-level signal; aborting it cancels every in-flight adapter call. */
  signal?: AbortSignal;
  cacheTtlSeconds?: number;
}

export interface RouteAndRetrieveResult {
  /** One list per (sub-query, route), sub-query order then canonical route order. */
  lists: RankedList[];
  degraded: DegradedRoute[];
}

const DEFAULT_ROUTE_TIMEOUT_MS = 3000;
const CACHE_TTL_SECONDS = 30 * 60;

/** Deterministic key by (route, sub-query, topK, filters); no raw query text in the key. */
export function retrievalCacheKey(
  route: Route,
  subQueryText: string,
  topK: number,
  filters?: SearchFilters,
): string {
  const filterPart = filters
    ? JSON.stringify({
        documentIds: [...(filters.documentIds ?? [])].sort(),
        sourceTypes: [...(filters.sourceTypes ?? [])].sort(),
      })
    : '';
  const digest = crypto
    .createHash('sha256')
    .update(`${subQueryText.trim().toLowerCase()}\u0000${topK}\u0000${filterPart}`)
    .digest('hex')
    .slice(0, 32);
  return `retrieval:${route}:${digest}`;
}

/**
 * Hits to Candidates: drops hits without a documentId or text, computes the content id,
 * sorts by native score (stable) and caps at topK.
 */
export function hitsToCandidates(
  hits: readonly SourceHit[],
  route: Route,
  topK: number,
  log: EngineLogger = defaultLogger,
): Candidate[] {
  let dropped = 0;
  const candidates: Candidate[] = [];
  for (const hit of hits) {
    const documentId = hit.sourceRef?.documentId?.trim();
    const text = typeof hit.text === 'string' ? hit.text : '';
    if (!documentId || !text.trim()) {
      dropped++;
      continue;
    }
    const nativeId = hit.id ?? hit.contentId;
    candidates.push(
      Object.freeze({
        contentId: computeContentId(text, documentId),
        text,
        sourceRef: { ...hit.sourceRef, documentId },
        route,
        rawScore: Number.isFinite(hit.rawScore) ? hit.rawScore : 0,
        ...(nativeId != null ? { nativeId } : {}),
        ...(hit.metadata != null ? { metadata: hit.metadata } : {}),
      }),
    );
  }
  if (dropped > 0) {
    log.warn('retrieval-router:dropped_hits', { route, dropped, reason: 'missing documentId or text' });
  }
  candidates.sort((a, b) => b.rawScore - a.rawScore);
  return candidates.slice(0, Math.max(0, topK));
}

function degradeReason(err: unknown, signal: AbortSignal | undefined): DegradeReason {
  if (err instanceof AdapterTimeoutError) return 'timeout';
  if (err instanceof DeadlineExceededError) return err.cancelled ? 'cancelled' : 'timeout';
  if (signal?.aborted) return 'cancelled';
  return 'error';
}

const cachedCandidateSchema = z.object({
  contentId: z.string().min(1),
  text: z.string().min(1),
  sourceRef: z.object({
    documentId: z.string().min(1),
    chunkIndex: z.number().optional(),
    offset: z.number().optional(),
    page: z.number().optional(),
    title: z.string().optional(),
    url: z.string().optional(),
  }),
  route: z.enum(['dense', 'sparse', 'graph']),
  rawScore: z.number().finite(),
  nativeId: z.string().optional(),
  metadata: z
    .object({
      concepts: z.array(z.string()).optional(),
      prerequisites: z.array(z.string()).optional(),
      sourceType: z.enum(['textbook', 'paper', 'lecture', 'documentation', 'notes', 'web', 'unknown']).optional(),
      citationCount: z.number().optional(),
      difficulty: z.enum(['beginner', 'intermediate', 'advanced']).optional(),
      perspective: z.string().optional(),
      chunkType: z.enum(['text', 'table', 'image']).optional(),
    })
    .optional(),
});

const cachedListSchema = z.array(cachedCandidateSchema);

/**
 * Cache-aside read. An entry that fails the candidate schema, belongs to another route or carries
 * a content id that no longer matches its text counts as a miss.
 */
async function readCache(
  cache: RetrievalCache,
  key: string,
  route: Route,
  log: EngineLogger,
): Promise<Candidate[] | null> {
  let raw: unknown;
  try {
    raw = await cache.get(key);
  } catch (err) {
    log.warn('retrieval-router:cache_get_failed', { key, error: errorMessage(err) });
    return null;
  }
  if (raw == null) return null;

  const parsed = cachedListSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn('retrieval-router:cache_invalid', {
      key,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return null;
  }
  const stale = parsed.data.find(
    (c) => c.route !== route || c.contentId !== computeContentId(c.text, c.sourceRef.documentId),
  );
  if (stale) {
    log.warn('retrieval-router:cache_invalid', { key, issues: [`stale entry ${stale.contentId}`] });
    return null;
  }
  return parsed.data.map((c) => Object.freeze(c));
}

async function writeCache(
  cache: RetrievalCache,
  key: string,
  value: Candidate[],
  ttlSeconds: number,
  log: EngineLogger,
): Promise<void> {
  try {
    await cache.set(key, value, ttlSeconds);
  } catch (err) {
    log.warn('retrieval-router:cache_set_failed', { key, error: errorMessage(err) });
  }
}

type RunOneResult = { list: RankedList; degraded?: DegradedRoute };

async function runOne(
  subQuery: SubQuery,
  adapter: CandidateSourceAdapter,
  route: Route,
  deps: RetrievalRouterDeps,
  options: Required<Pick<RouteAndRetrieveOptions, 'topK' | 'perRouteTimeoutMs' | 'cacheTtlSeconds'>> &
    Pick<RouteAndRetrieveOptions, 'filters' | 'signal'>,
): Promise<RunOneResult> {
  const log = deps.logger ?? defaultLogger;
  const { topK, filters, perRouteTimeoutMs, signal, cacheTtlSeconds } = options;
  const cacheKey = retrievalCacheKey(route, subQuery.text, topK, filters);

  if (deps.cache) {
    const cached = await readCache(deps.cache, cacheKey, route, log);
    if (cached != null) {
      log.debug('retrieval-router:cache_hit', { route, subQueryId: subQuery.id, count: cached.length });
      return { list: { subQueryId: subQuery.id, route, candidates: cached } };
    }
  }

  const started = Date.now();
  try {
    const hits = await withDeadline((s) => adapter.search(subQuery, topK, filters, s), perRouteTimeoutMs, {
      parentSignal: signal,
      onTimeout: () => new AdapterTimeoutError(route, perRouteTimeoutMs),
    });
    const candidates = hitsToCandidates(hits, route, topK, log);
    log.debug('retrieval-router:route_done', {
      route,
      subQueryId: subQuery.id,
      count: candidates.length,
      latencyMs: Date.now() - started,
    });
    if (deps.cache) await writeCache(deps.cache, cacheKey, candidates, cacheTtlSeconds, log);
    return { list: { subQueryId: subQuery.id, route, candidates } };
  } catch (err) {
    const reason = degradeReason(err, signal);
    const failure = err instanceof RetrievalEngineError ? err : new AdapterError(route, errorMessage(err));
    const message = failure.message;
    log.warn(reason === 'timeout' ? 'retrieval-router:adapter_timeout' : 'retrieval-router:adapter_failed', {
      route,
      subQueryId: subQuery.id,
      reason,
      code: failure.code,
      error: message,
      latencyMs: Date.now() - started,
    });
    return {
      list: { subQueryId: subQuery.id, route, candidates: [] },
      degraded: { route, subQueryId: subQuery.id, reason, message },
    };
  }
}

export async function routeAndRetrieve(
  subQueries: readonly SubQuery[],
  deps: RetrievalRouterDeps,
  options: RouteAndRetrieveOptions = {},
): Promise<RouteAndRetrieveResult> {
  const settings = {
    topK: options.topK ?? DEFAULT_TOP_K,
    perRouteTimeoutMs: options.perRouteTimeoutMs ?? DEFAULT_ROUTE_TIMEOUT_MS,
    cacheTtlSeconds: options.cacheTtlSeconds ?? CACHE_TTL_SECONDS,
    filters: options.filters,
    signal: options.signal,
  };

  const tasks: Array<Promise<RunOneResult>> = [];
  for (const subQuery of subQueries) {
    if (!subQuery.text.trim()) continue;
    for (const route of ROUTES) {
      tasks.push(runOne(subQuery, deps.adapters[route], route, deps, settings));
    }
  }

  const results = await Promise.all(tasks);
  const lists = results.map((r) => r.list);
  const degraded = results.flatMap((r) => (r.degraded ? [r.degraded] : []));

  (deps.logger ?? defaultLogger).info('retrieval-router:done', {
    subQueries: subQueries.length,
    lists: lists.length,
    candidates: lists.reduce((n, l) => n + l.candidates.length, 0),
    degraded: degraded.length,
  });
  return { lists, degraded };
}

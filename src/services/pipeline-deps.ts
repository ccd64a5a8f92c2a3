// src/services/pipeline-deps.ts: default wiring of config, scorers, relevance models and cache
import { resolveRetrievalConfig, type RetrievalConfig, type RetrievalConfigOverrides } from '@/config/retrieval-config';
import { getOpenAIApiKey, getRedisUrl, loadEnv } from '@/config/env';
import type { OrchestratorDeps } from './orchestrator';
import type { RetrievalAdapters } from './providers/retrieval-types';
import type { Embedder } from './providers/retrieval-vector-utils';
import { InMemoryCorpus, type CorpusChunk } from './providers/corpus';
import { InMemoryDenseAdapter } from './providers/dense/in-memory-dense-adapter';
import { InMemoryKeywordAdapter } from './providers/sparse/in-memory-keyword-adapter';
import { ConceptGraphAdapter } from './providers/graph/concept-graph-adapter';
import { SimpleEmbedder } from './providers/embeddings/simple-embedder';
import { OpenAIEmbedder } from './providers/embeddings/openai-embedder';
import { connectRetrievalCache, type RetrievalCache } from './cache';
import { getDefaultVocabulary, type ConceptVocabulary } from './concept-vocabulary';
import { createDefaultScorers } from './scorers';
import {
  EmbeddingRelevanceModel,
  MathAwareRelevanceModel,
  createDefaultRelevanceRegistry,
  type RelevanceModelRegistry,
} from './scorers/relevance-models';
import { LlmRelevanceModel } from './scorers/llm-relevance-model';
import { SimpleModelRouter } from './model-router';
import { ProviderLlmClient } from './llm-client';
import type { ScoringFunction } from './scorers/types';
import type { TokenCounter } from './context-compressor';
import { logger, type EngineLogger } from './logger';

export type SemanticModelChoice = 'lexical' | 'embedding' | 'llm';

export interface CreateRetrievalDepsOptions {
  adapters: RetrievalAdapters;
  overrides?: RetrievalConfigOverrides;
  env?: NodeJS.ProcessEnv;
  vocabulary?: ConceptVocabulary;
  /** Replaces the default five scorers. */
  scorers?: readonly ScoringFunction[];
  /** Which relevance model backs general questions; 'llm' needs OPENAI_API_KEY. */
  semanticModel?: SemanticModelChoice;
  embedder?: Embedder;
  cache?: RetrievalCache | null;
  tokenCounter?: TokenCounter;
  logger?: EngineLogger;
}

export function buildRelevanceRegistry(choice: SemanticModelChoice, embedder: Embedder | undefined, log: EngineLogger): RelevanceModelRegistry {
  if (choice === 'embedding' && embedder) {
    return { default: new EmbeddingRelevanceModel(embedder), byIntent: { mathematical_concept: new MathAwareRelevanceModel() } };
  }
  if (choice === 'llm') {
    const apiKey = getOpenAIApiKey();
    if (apiKey) {
      return {
        default: new LlmRelevanceModel(new SimpleModelRouter(new ProviderLlmClient(apiKey))),
        byIntent: { mathematical_concept: new MathAwareRelevanceModel() },
      };
    }
    log.warn('pipeline-deps:llm_relevance_unavailable', { reason: 'OPENAI_API_KEY not set', fallback: 'lexical' });
  }
  return createDefaultRelevanceRegistry();
}

/** Config from defaults, environment and overrides; throws ConfigurationError when invalid. */
export function createRetrievalDeps(options: CreateRetrievalDepsOptions): OrchestratorDeps {
  const log = options.logger ?? logger;
  const config: RetrievalConfig = resolveRetrievalConfig(options.overrides, options.env);
  const vocabulary = options.vocabulary ?? getDefaultVocabulary();
  const relevanceModels = buildRelevanceRegistry(options.semanticModel ?? 'lexical', options.embedder, log);
  return {
    adapters: options.adapters,
    config,
    scorers: options.scorers ?? createDefaultScorers({ config, vocabulary, relevanceModels }),
    vocabulary,
    tokenCounter: options.tokenCounter,
    cache: options.cache ?? null,
    logger: log,
  };
}

/** The three reference adapters over one in-memory corpus. */
export function createInMemoryAdapters(
  chunks: readonly CorpusChunk[],
  options: { embedder?: Embedder; vocabulary?: ConceptVocabulary } = {},
): RetrievalAdapters {
  const corpus = new InMemoryCorpus(chunks);
  return {
    dense: new InMemoryDenseAdapter(corpus, options.embedder ?? new SimpleEmbedder(64)),
    sparse: new InMemoryKeywordAdapter(corpus),
    graph: new ConceptGraphAdapter(corpus, options.vocabulary ?? getDefaultVocabulary()),
  };
}

/**
 * Environment-driven wiring: loads .env, uses OpenAI embeddings when OPENAI_API_KEY is set and
 * connects the Redis cache when REDIS_URL is set.
 */
export async function createDefaultRetrievalDeps(
  chunks: readonly CorpusChunk[],
  overrides?: RetrievalConfigOverrides,
): Promise<OrchestratorDeps> {
  loadEnv();
  const apiKey = getOpenAIApiKey();
  const embedder: Embedder = apiKey ? new OpenAIEmbedder({ apiKey }) : new SimpleEmbedder(64);
  const cache = await connectRetrievalCache(getRedisUrl());
  return createRetrievalDeps({
    adapters: createInMemoryAdapters(chunks, { embedder }),
    overrides,
    embedder,
    semanticModel: apiKey ? 'embedding' : 'lexical',
    cache,
  });
}

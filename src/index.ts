// src/index.ts: public surface of the retrieval engine
export * from '@/types/core';
export * from '@/services/errors';
export { logger, type EngineLogger } from '@/services/logger';
export {
  DEFAULT_COMPOSITE_WEIGHTS,
  DEFAULT_INTENT_WEIGHT_TABLE,
  DEFAULT_RETRIEVAL_CONFIG,
  DEFAULT_ROUTE_WEIGHTS,
  resolveRetrievalConfig,
  validateRetrievalConfig,
  withOverrides,
  type CompositeWeights,
  type IntentWeightTable,
  type PedagogicalWeights,
  type RetrievalConfig,
  type RetrievalConfigOverrides,
  type RouteWeights,
} from '@/config/retrieval-config';
export { ConceptVocabulary, getDefaultVocabulary, type ConceptEntry } from '@/services/concept-vocabulary';
export { analyzeQuery, classifyIntent, type AnalyzeQueryOptions } from '@/services/query-understanding';
export { decomposeQuery, type DecomposeOptions } from '@/services/query-decomposition';
export { routeAndRetrieve, type RetrievalRouterDeps, type RouteAndRetrieveResult } from '@/services/retrieval-router';
export { fuseRankedLists, type FusionResult, type FuseOptions } from '@/services/fusion';
export { RerankEngine, type RerankResult, type RerankEngineOptions } from '@/services/rerank';
export * from '@/services/scorers';
export {
  compressContext,
  formatContextForPrompt,
  listSources,
  TiktokenCounter,
  type TokenCounter,
  type CompressOptions,
} from '@/services/context-compressor';
export {
  retrieveAndCompress,
  type OrchestratorDeps,
  type RetrievalOutcome,
  type RetrieveAndCompressOptions,
} from '@/services/orchestrator';
export { evaluateContext, runRetrievalEval } from '@/services/eval-retrieval';
export type { CandidateSourceAdapter, RankedList, RetrievalAdapters, SourceHit } from '@/services/providers/retrieval-types';
export { InMemoryCorpus, type CorpusChunk } from '@/services/providers/corpus';
export { SimpleEmbedder } from '@/services/providers/embeddings/simple-embedder';
export { OpenAIEmbedder } from '@/services/providers/embeddings/openai-embedder';
export { RedisRetrievalCache, connectRetrievalCache, type RetrievalCache } from '@/services/cache';
export {
  createDefaultRetrievalDeps,
  createInMemoryAdapters,
  createRetrievalDeps,
} from '@/services/pipeline-deps';

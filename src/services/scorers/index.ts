// src/services/scorers/index.ts
import type { RetrievalConfig } from '@/config/retrieval-config';
import type { ConceptVocabulary } from '../concept-vocabulary';
import { AuthorityScorer } from './authority-scorer';
import { ClarityScorer } from './clarity-scorer';
import { ConceptAlignmentScorer } from './concept-alignment-scorer';
import { PedagogicalScorer } from './pedagogical-scorer';
import { createDefaultRelevanceRegistry, type RelevanceModelRegistry } from './relevance-models';
import { SemanticScorer } from './semantic-scorer';
import type { ScoringFunction } from './types';

export * from './types';
export * from './relevance-models';
export { LlmRelevanceModel } from './llm-relevance-model';
export { SemanticScorer } from './semantic-scorer';
export { PedagogicalScorer } from './pedagogical-scorer';
export { ConceptAlignmentScorer, NEUTRAL_CONCEPT_SCORE } from './concept-alignment-scorer';
export { ClarityScorer } from './clarity-scorer';
export { AuthorityScorer, SOURCE_TYPE_AUTHORITY } from './authority-scorer';

export interface DefaultScorerOptions {
  config: Pick<RetrievalConfig, 'intentWeightTable'>;
  vocabulary?: ConceptVocabulary;
  relevanceModels?: RelevanceModelRegistry;
}

/** The five rerank signals in composite order. */
export function createDefaultScorers(options: DefaultScorerOptions): ScoringFunction[] {
  return [
    new SemanticScorer(options.relevanceModels ?? createDefaultRelevanceRegistry()),
    new PedagogicalScorer({ intentWeightTable: options.config.intentWeightTable, vocabulary: options.vocabulary }),
    new ConceptAlignmentScorer(options.vocabulary),
    new ClarityScorer(),
    new AuthorityScorer(),
  ];
}

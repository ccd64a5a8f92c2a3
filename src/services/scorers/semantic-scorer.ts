// src/services/scorers/semantic-scorer.ts
import type { FusedCandidate, Query, ScoreName } from '@/types/core';
import { clamp01 } from '../providers/retrieval-vector-utils';
import { ScoringUnavailableError, errorMessage } from '../errors';
import { selectRelevanceModel, type RelevanceModelRegistry } from './relevance-models';
import type { ScoringFunction } from './types';

/** Query/passage relevance from the model the registry assigns to the query's intent. */
export class SemanticScorer implements ScoringFunction {
  readonly name: ScoreName = 'semantic';

  constructor(private readonly registry: RelevanceModelRegistry) {}

  async score(query: Query, candidate: FusedCandidate, signal?: AbortSignal): Promise<number> {
    const model = selectRelevanceModel(this.registry, query.intent);
    const passage = candidate.sourceRef.title ? `${candidate.sourceRef.title}\n${candidate.text}` : candidate.text;
    let value: number;
    try {
      value = await model.relevance(query.text, passage, signal);
    } catch (err) {
      if (err instanceof ScoringUnavailableError) throw err;
      throw new ScoringUnavailableError('semantic', `${model.name} relevance model failed: ${errorMessage(err)}`);
    }
    if (!Number.isFinite(value)) {
      throw new ScoringUnavailableError('semantic', `${model.name} returned a non-numeric score`);
    }
    return clamp01(value);
  }
}

// src/services/scorers/concept-alignment-scorer.ts
import type { FusedCandidate, Query, ScoreName } from '@/types/core';
import { getDefaultVocabulary, type ConceptVocabulary } from '../concept-vocabulary';
import { candidateConcepts, coverage, queryPrerequisites } from './candidate-concepts';
import type { ScoringFunction } from './types';

/** Returned when the query names no concepts: nothing to align against. */
export const NEUTRAL_CONCEPT_SCORE = 0.5;
const PREREQUISITE_SHARE = 0.2;

/**
 * Share of the query's concepts the candidate covers. When the query concepts have prerequisites,
 * covering those accounts for a fifth of the score.
 */
export class ConceptAlignmentScorer implements ScoringFunction {
  readonly name: ScoreName = 'concept';
  private readonly vocabulary: ConceptVocabulary;

  constructor(vocabulary?: ConceptVocabulary) {
    this.vocabulary = vocabulary ?? getDefaultVocabulary();
  }

  score(query: Query, candidate: FusedCandidate): number {
    const wanted = new Set(query.concepts.map((c) => this.vocabulary.canonical(c)));
    if (wanted.size === 0) return NEUTRAL_CONCEPT_SCORE;

    const have = candidateConcepts(candidate, this.vocabulary);
    const overlap = coverage(wanted, have);
    const prerequisites = queryPrerequisites(query, this.vocabulary);
    if (prerequisites.size === 0) return overlap;
    return (1 - PREREQUISITE_SHARE) * overlap + PREREQUISITE_SHARE * coverage(prerequisites, have);
  }
}

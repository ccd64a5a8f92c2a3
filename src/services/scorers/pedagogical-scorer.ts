// src/services/scorers/pedagogical-scorer.ts
// Six teaching-quality sub-scores combined with intent-dependent weights: explanation intents lean
// on clarity, problem solving on examples, prerequisite analysis on prerequisite alignment.
import type { Difficulty, FusedCandidate, PedagogicalSubScores, Query, ScoreName } from '@/types/core';
import { pedagogicalWeightsFor, type RetrievalConfig } from '@/config/retrieval-config';
import { compareLevels, getDefaultVocabulary, type ConceptVocabulary } from '../concept-vocabulary';
import { estimateDifficulty } from '../query-understanding';
import { clamp01 } from '../providers/retrieval-vector-utils';
import { candidateConcepts, coverage, queryPrerequisites } from './candidate-concepts';
import {
  definitionCueCount,
  exampleCueCount,
  hasWorkedArithmetic,
  listItemCount,
  saturate,
  sentences,
  transitionCueCount,
  visualCueCount,
} from './text-cues';
import type { ScoringFunction } from './types';

const SUB_SCORE_KEYS: readonly (keyof PedagogicalSubScores)[] = [
  'conceptClarity',
  'exampleRichness',
  'prerequisiteAlignment',
  'difficultyAppropriateness',
  'explanationStructure',
  'visualAids',
];

export interface PedagogicalScorerOptions {
  intentWeightTable: RetrievalConfig['intentWeightTable'];
  vocabulary?: ConceptVocabulary;
}

export class PedagogicalScorer implements ScoringFunction {
  readonly name: ScoreName = 'pedagogical';
  private readonly vocabulary: ConceptVocabulary;

  constructor(private readonly options: PedagogicalScorerOptions) {
    this.vocabulary = options.vocabulary ?? getDefaultVocabulary();
  }

  subScores(query: Query, candidate: FusedCandidate): PedagogicalSubScores {
    const text = candidate.text;
    const concepts = candidateConcepts(candidate, this.vocabulary);
    const queryConcepts = new Set(query.concepts.map((c) => this.vocabulary.canonical(c)));
    const prerequisites = queryPrerequisites(query, this.vocabulary);

    const mention = queryConcepts.size === 0 ? 0.5 : coverage(queryConcepts, concepts);
    const conceptClarity = clamp01(0.5 * saturate(definitionCueCount(text), 2) + 0.5 * mention);

    const exampleRichness = clamp01(
      0.75 * saturate(exampleCueCount(text), 3) + (hasWorkedArithmetic(text) ? 0.25 : 0),
    );

    const prerequisiteAlignment = prerequisites.size === 0 ? 0.5 : coverage(prerequisites, concepts);

    const level: Difficulty =
      candidate.metadata?.difficulty ?? estimateDifficulty(text, [...concepts], this.vocabulary);
    const gap = Math.abs(compareLevels(level, query.difficulty));
    const difficultyAppropriateness = 1 - gap / 2;

    const explanationStructure = clamp01(
      0.5 * saturate(transitionCueCount(text), 3) +
        0.3 * saturate(listItemCount(text), 3) +
        (sentences(text).length >= 2 ? 0.2 : 0),
    );

    const chunkType = candidate.metadata?.chunkType;
    const visualAids =
      chunkType === 'image' || chunkType === 'table' ? 1 : 0.8 * saturate(visualCueCount(text), 2);

    return {
      conceptClarity,
      exampleRichness,
      prerequisiteAlignment,
      difficultyAppropriateness,
      explanationStructure,
      visualAids,
    };
  }

  score(query: Query, candidate: FusedCandidate): { value: number; pedagogicalDetail: PedagogicalSubScores } {
    const detail = this.subScores(query, candidate);
    const weights = pedagogicalWeightsFor({ intentWeightTable: this.options.intentWeightTable }, query.intent);
    let total = 0;
    let weighted = 0;
    for (const key of SUB_SCORE_KEYS) {
      total += weights[key];
      weighted += weights[key] * detail[key];
    }
    return { value: total > 0 ? clamp01(weighted / total) : 0, pedagogicalDetail: detail };
  }
}

// src/services/scorers/clarity-scorer.ts
import type { FusedCandidate, Query, ScoreName } from '@/types/core';
import { clamp01, tokenize } from '../providers/retrieval-vector-utils';
import { definitionCueCount, sentences, transitionCueCount } from './text-cues';
import type { ScoringFunction } from './types';

const IDEAL_MIN_SENTENCE_WORDS = 8;
const IDEAL_MAX_SENTENCE_WORDS = 25;
const JARGON_WORD_LENGTH = 13;

/** 1 inside the ideal band, linear fall-off on either side. */
export function sentenceLengthScore(avgWords: number): number {
  if (avgWords <= 0) return 0;
  if (avgWords < IDEAL_MIN_SENTENCE_WORDS) return avgWords / IDEAL_MIN_SENTENCE_WORDS;
  if (avgWords <= IDEAL_MAX_SENTENCE_WORDS) return 1;
  return Math.max(0, 1 - (avgWords - IDEAL_MAX_SENTENCE_WORDS) / IDEAL_MAX_SENTENCE_WORDS);
}

/**
 * Readability independent of which concepts the text covers: sentence length (50%),
 * share of very long words (30%), presence of definition or transition markers (20%).
 */
export class ClarityScorer implements ScoringFunction {
  readonly name: ScoreName = 'clarity';

  score(_query: Query, candidate: FusedCandidate): number {
    const text = candidate.text;
    const words = tokenize(text);
    if (words.length === 0) return 0;

    const sentenceCount = Math.max(1, sentences(text).length);
    const lengthScore = sentenceLengthScore(words.length / sentenceCount);
    const jargonShare = words.filter((w) => w.length >= JARGON_WORD_LENGTH).length / words.length;
    const markers = definitionCueCount(text) + transitionCueCount(text) > 0 ? 1 : 0;

    return clamp01(0.5 * lengthScore + 0.3 * (1 - Math.min(jargonShare * 4, 1)) + 0.2 * markers);
  }
}

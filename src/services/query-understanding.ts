// src/services/query-understanding.ts
// Rule-based query analysis: intent (first matching rule wins), concepts (vocabulary + quoted phrases),
// coarse difficulty. No LLM on this path; the result is a frozen Query.
import crypto from 'crypto';
import type { Difficulty, Intent, Query } from '@/types/core';
import { InvalidQueryError } from './errors';
import { getDefaultVocabulary, type ConceptVocabulary } from './concept-vocabulary';
import { tokenize } from './providers/retrieval-vector-utils';
import { logger } from './logger';

interface IntentRule {
  intent: Intent;
  pattern: RegExp;
}

/** Ordered: the first rule whose pattern matches decides the intent. */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'prerequisite_analysis',
    pattern:
      /\b(prerequisites?|pre-requisites?|before (learning|studying|i learn|tackling)|need to know|should i know|required (knowledge|background)|foundations? (for|of)|what do i need)\b/,
  },
  {
    intent: 'comparative_learning',
    pattern: /\b(differences? between|compare|compared|comparison|versus|vs|contrast|similarities|better than)\b/,
  },
  {
    intent: 'mathematical_concept',
    pattern: /\b(prove|proof|derive|derivation|formula|equation|theorem|lemma|calculus|integral|eigen\w*)\b|[=∑∫√∂]/,
  },
  {
    intent: 'problem_solving',
    pattern: /\b(solve|solving|how do i|how can i|how to|fix|debug|step by step|exercise|homework|implement)\b/,
  },
  {
    intent: 'application_understanding',
    pattern: /\b(used for|use cases?|applications? of|applied|in practice|real[- ]world|where is \w+( \w+)? used)\b/,
  },
  {
    intent: 'concept_explanation',
    pattern: /\b(what is|what are|what's|explain|define|definition|meaning of|describe|intuition|understand)\b/,
  },
];

const BEGINNER_CUES = /\b(beginners?|simple|simply|basics?|eli5|intro|introduction|new to|layman'?s?|for dummies)\b/;
const ADVANCED_CUES =
  /\b(rigorous(ly)?|formal(ly)?|proof|prove|derive|derivation|convergence|asymptotic|theoretical|advanced|in depth|in-depth|graduate)\b/;
const LONG_WORD_LENGTH = 10;

export function classifyIntent(text: string): Intent {
  const lower = text.toLowerCase();
  for (const rule of INTENT_RULES) {
    if (rule.pattern.test(lower)) return rule.intent;
  }
  return 'general';
}

/** Quoted spans ("..." or “...”) are taken as concepts even when the vocabulary lacks them. */
function quotedPhrases(text: string): string[] {
  const out: string[] = [];
  for (const m of text.matchAll(/["“]([^"”]+)["”]/g)) {
    const phrase = tokenize(m[1]).join(' ');
    if (phrase) out.push(phrase);
  }
  return out;
}

export function extractConcepts(text: string, vocabulary: ConceptVocabulary): string[] {
  const found = new Set(vocabulary.match(text));
  for (const phrase of quotedPhrases(text)) found.add(vocabulary.canonical(phrase));
  return [...found].sort();
}

/**
 * Coarse difficulty from vocabulary complexity: advanced cue words (+2), the hardest matched concept
 * (advanced +2, intermediate +1) and a high share of long words (+1). Explicit beginner cues win.
 */
export function estimateDifficulty(
  text: string,
  concepts: readonly string[],
  vocabulary: ConceptVocabulary,
): Difficulty {
  const lower = text.toLowerCase();
  if (BEGINNER_CUES.test(lower)) return 'beginner';

  let points = 0;
  if (ADVANCED_CUES.test(lower)) points += 2;

  let hardest = 0;
  for (const c of concepts) {
    const level = vocabulary.levelOf(c);
    if (level === 'advanced') hardest = Math.max(hardest, 2);
    else if (level === 'intermediate') hardest = Math.max(hardest, 1);
  }
  points += hardest;

  const words = tokenize(text);
  const longWords = words.filter((w) => w.length >= LONG_WORD_LENGTH).length;
  if (words.length > 0 && longWords / words.length >= 0.25) points += 1;

  if (points >= 3) return 'advanced';
  if (points >= 1) return 'intermediate';
  return 'beginner';
}

export interface AnalyzeQueryOptions {
  intentOverride?: Intent;
  vocabulary?: ConceptVocabulary;
  /** Fixed id (tests, replay); a random UUID otherwise. */
  id?: string;
}

export function analyzeQuery(text: string, options: AnalyzeQueryOptions = {}): Query {
  const trimmed = typeof text === 'string' ? text.trim() : '';
  if (!trimmed) throw new InvalidQueryError('Query text is empty');
  if (tokenize(trimmed).length === 0) throw new InvalidQueryError('Query text contains no words');

  const vocabulary = options.vocabulary ?? getDefaultVocabulary();
  const classified = classifyIntent(trimmed);
  const intent = options.intentOverride ?? classified;
  const concepts = extractConcepts(trimmed, vocabulary);
  const difficulty = estimateDifficulty(trimmed, concepts, vocabulary);

  const query: Query = {
    id: options.id ?? crypto.randomUUID(),
    text: trimmed,
    intent,
    intentSource: options.intentOverride != null ? 'override' : 'classified',
    concepts: Object.freeze(concepts),
    difficulty,
  };
  Object.freeze(query);

  logger.debug('query-understanding:analyzed', {
    queryId: query.id,
    intent,
    classified,
    concepts,
    difficulty,
  });
  return query;
}

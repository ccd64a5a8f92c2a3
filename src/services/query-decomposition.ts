// src/services/query-decomposition.ts
// Query decomposition: split a query into sub-queries for parallel retrieval.
// Rule-based: comparison sides, prerequisite concepts, or independent clauses. dependsOn is an ordering
// hint only; retrieval never waits on it.
import type { Query, SubQuery, SubQueryKind } from '@/types/core';
import { getDefaultVocabulary, type ConceptVocabulary } from './concept-vocabulary';
import { INTENT_RULES } from './query-understanding';
import { tokenize } from './providers/retrieval-vector-utils';
import { logger } from './logger';

const MAX_SUB_QUERIES = 6;
const MIN_JOINED_CLAUSE_WORDS = 3;

const COMPARISON_PATTERNS: readonly RegExp[] = [
  /\bdifferences? between (.+?) and (.+?)[?.!]*$/i,
  /\bcompare (.+?) (?:and|with|to|against) (.+?)[?.!]*$/i,
  /^(.+?)\s+(?:vs\.?|versus)\s+(.+?)[?.!]*$/i,
];

const PREREQUISITE_CUE =
  INTENT_RULES.find((r) => r.intent === 'prerequisite_analysis')?.pattern ?? /\bprerequisites?\b/;

export interface DecomposeOptions {
  vocabulary?: ConceptVocabulary;
  maxSubQueries?: number;
}

interface Draft {
  text: string;
  kind: SubQueryKind;
}

function cleanSide(side: string): string {
  return side
    .trim()
    .replace(/^(the|a|an)\s+/i, '')
    .replace(/[?.!,;:]+$/, '')
    .trim();
}

function comparisonSides(text: string): [string, string] | null {
  for (const pattern of COMPARISON_PATTERNS) {
    const m = text.match(pattern);
    if (!m) continue;
    const a = cleanSide(m[1]);
    const b = cleanSide(m[2]);
    if (tokenize(a).length > 0 && tokenize(b).length > 0 && a.toLowerCase() !== b.toLowerCase()) {
      return [a, b];
    }
  }
  return null;
}

function prerequisiteTerms(query: Query, vocabulary: ConceptVocabulary): string[] {
  if (!PREREQUISITE_CUE.test(query.text.toLowerCase())) return [];
  const out: string[] = [];
  for (const concept of query.concepts) {
    for (const prereq of vocabulary.prerequisitesOf(concept)) {
      if (!out.includes(prereq) && !query.concepts.includes(prereq)) out.push(prereq);
    }
  }
  return out;
}

/**
 * Independent clauses: several questions, `;`-separated parts, or "... and how/why/what/when ..."
 * joins where both sides carry at least three words.
 */
export function splitClauses(text: string): string[] {
  const parts = text
    .split(/(?<=\?)\s+|;\s*/)
    .map((p) => p.trim())
    .filter((p) => tokenize(p).length > 0);

  const clauses: string[] = [];
  for (const part of parts) {
    const joined = part.split(/\s+and\s+(?=(?:how|why|what|when)\b)/i);
    const allLongEnough = joined.every((c) => tokenize(c).length >= MIN_JOINED_CLAUSE_WORDS);
    if (joined.length > 1 && allLongEnough) clauses.push(...joined.map((c) => c.trim()));
    else clauses.push(part);
  }
  return clauses;
}

function finalize(query: Query, drafts: Draft[], originalDependsOnOthers: boolean): SubQuery[] {
  const seen = new Set<string>();
  const unique = drafts.filter((d) => {
    const key = d.text.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  const subQueries: SubQuery[] = unique.map((d, i) => ({
    id: `${query.id}:sq${i}`,
    text: d.text,
    parentId: query.id,
    dependsOn: [],
    kind: d.kind,
  }));

  if (originalDependsOnOthers) {
    const helperIds = subQueries.filter((s) => s.kind !== 'original').map((s) => s.id);
    return subQueries.map((s) => Object.freeze(s.kind === 'original' ? { ...s, dependsOn: helperIds } : s));
  }
  return subQueries.map((s) => Object.freeze(s));
}

/** Never returns an empty list: the original query is the fallback sub-query. */
export function decomposeQuery(query: Query, options: DecomposeOptions = {}): SubQuery[] {
  const vocabulary = options.vocabulary ?? getDefaultVocabulary();
  const max = Math.max(1, options.maxSubQueries ?? MAX_SUB_QUERIES);
  const original: Draft = { text: query.text, kind: 'original' };

  const sides = comparisonSides(query.text);
  if (sides && max >= 3) {
    const out = finalize(
      query,
      [
        { text: sides[0], kind: 'comparison_side' },
        { text: sides[1], kind: 'comparison_side' },
        original,
      ],
      true,
    );
    logger.debug('query-decomposition:comparison', { queryId: query.id, sides });
    return out;
  }

  const prereqs = prerequisiteTerms(query, vocabulary).slice(0, max - 1);
  if (prereqs.length > 0) {
    const drafts: Draft[] = prereqs.map((p) => ({ text: p, kind: 'prerequisite' }));
    logger.debug('query-decomposition:prerequisites', { queryId: query.id, prereqs });
    return finalize(query, [...drafts, original], true);
  }

  const clauses = splitClauses(query.text);
  if (clauses.length > 1) {
    logger.debug('query-decomposition:clauses', { queryId: query.id, count: clauses.length });
    return finalize(
      query,
      clauses.slice(0, max).map((c) => ({ text: c, kind: 'clause' })),
      false,
    );
  }

  return finalize(query, [original], false);
}

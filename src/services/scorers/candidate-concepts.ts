// src/services/scorers/candidate-concepts.ts
import type { Candidate, Query } from '@/types/core';
import type { ConceptVocabulary } from '../concept-vocabulary';

/** Declared metadata concepts plus vocabulary terms found in the text, canonicalized. */
export function candidateConcepts(candidate: Candidate, vocabulary: ConceptVocabulary): Set<string> {
  const out = new Set(vocabulary.match(candidate.text));
  for (const c of candidate.metadata?.concepts ?? []) {
    const canonical = vocabulary.canonical(c);
    if (canonical) out.add(canonical);
  }
  return out;
}

/** Prerequisites of the query's concepts that the query does not already name. */
export function queryPrerequisites(query: Query, vocabulary: ConceptVocabulary): Set<string> {
  const own = new Set(query.concepts.map((c) => vocabulary.canonical(c)));
  const out = new Set<string>();
  for (const c of own) {
    for (const p of vocabulary.prerequisitesOf(c)) if (!own.has(p)) out.add(p);
  }
  return out;
}

export function coverage(wanted: ReadonlySet<string>, have: ReadonlySet<string>): number {
  if (wanted.size === 0) return 0;
  let hit = 0;
  for (const w of wanted) if (have.has(w)) hit++;
  return hit / wanted.size;
}

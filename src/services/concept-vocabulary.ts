// src/services/concept-vocabulary.ts: domain concept terms with aliases, prerequisites and level
import { z } from 'zod';
import type { Difficulty } from '@/types/core';
import { ConfigurationError } from './errors';
import { tokenize } from './providers/retrieval-vector-utils';
import vocabularyData from '@/data/concept-vocabulary.json';

const conceptEntrySchema = z.object({
  term: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  prerequisites: z.array(z.string().min(1)).default([]),
  related: z.array(z.string().min(1)).default([]),
  level: z.enum(['beginner', 'intermediate', 'advanced']),
});

const conceptVocabularySchema = z.object({ terms: z.array(conceptEntrySchema) });

export type ConceptEntry = z.infer<typeof conceptEntrySchema>;

/** Lower-case, punctuation-free form; the key every lookup goes through. */
export function normalizeConcept(phrase: string): string {
  return tokenize(phrase).join(' ');
}

const LEVEL_RANK: Record<Difficulty, number> = { beginner: 0, intermediate: 1, advanced: 2 };

export class ConceptVocabulary {
  private readonly byKey = new Map<string, ConceptEntry>();
  /** Every matchable phrase (terms and aliases), longest first. */
  private readonly phrases: Array<{ phrase: string; term: string }> = [];

  constructor(entries: readonly ConceptEntry[]) {
    for (const raw of entries) {
      const entry: ConceptEntry = {
        ...raw,
        term: normalizeConcept(raw.term),
        prerequisites: raw.prerequisites.map(normalizeConcept),
        related: raw.related.map(normalizeConcept),
      };
      for (const phrase of [entry.term, ...raw.aliases.map(normalizeConcept)]) {
        if (!phrase || this.byKey.has(phrase)) continue;
        this.byKey.set(phrase, entry);
        this.phrases.push({ phrase, term: entry.term });
      }
    }
    this.phrases.sort(
      (a, b) =>
        b.phrase.split(' ').length - a.phrase.split(' ').length ||
        b.phrase.length - a.phrase.length ||
        a.phrase.localeCompare(b.phrase),
    );
  }

  /** Parses and validates raw vocabulary JSON. */
  static fromJson(data: unknown): ConceptVocabulary {
    const result = conceptVocabularySchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      }));
      throw new ConfigurationError('Invalid concept vocabulary', issues);
    }
    return new ConceptVocabulary(result.data.terms);
  }

  get size(): number {
    return new Set(this.byKey.values()).size;
  }

  /** Resolves a term or alias to its entry. */
  lookup(phrase: string): ConceptEntry | undefined {
    return this.byKey.get(normalizeConcept(phrase));
  }

  /** Canonical term for a phrase, or the normalized phrase itself when unknown. */
  canonical(phrase: string): string {
    const key = normalizeConcept(phrase);
    return this.byKey.get(key)?.term ?? key;
  }

  prerequisitesOf(phrase: string): readonly string[] {
    return this.lookup(phrase)?.prerequisites ?? [];
  }

  relatedTo(phrase: string): readonly string[] {
    return this.lookup(phrase)?.related ?? [];
  }

  levelOf(phrase: string): Difficulty | undefined {
    return this.lookup(phrase)?.level;
  }

  /**
   * Longest-first phrase match. A matched span is masked so shorter phrases inside it
   * ("gradient" inside "gradient descent") do not match again.
   */
  match(text: string): string[] {
    let working = ` ${normalizeConcept(text)} `;
    const found = new Set<string>();
    for (const { phrase, term } of this.phrases) {
      const needle = ` ${phrase} `;
      if (!working.includes(needle)) continue;
      found.add(term);
      while (working.includes(needle)) working = working.replace(needle, ' _ ');
    }
    return [...found].sort();
  }
}

export function compareLevels(a: Difficulty, b: Difficulty): number {
  return LEVEL_RANK[a] - LEVEL_RANK[b];
}

let defaultVocabulary: ConceptVocabulary | null = null;

/** The bundled vocabulary from src/data/concept-vocabulary.json, parsed once. */
export function getDefaultVocabulary(): ConceptVocabulary {
  if (defaultVocabulary == null) defaultVocabulary = ConceptVocabulary.fromJson(vocabularyData);
  return defaultVocabulary;
}

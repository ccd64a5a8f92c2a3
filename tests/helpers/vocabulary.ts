import { ConceptVocabulary } from '@/services/concept-vocabulary';

/** Four-term vocabulary small enough to trace by hand. */
export function smallVocabulary(): ConceptVocabulary {
  return new ConceptVocabulary([
    {
      term: 'gradient descent',
      aliases: [],
      prerequisites: ['derivative', 'loss function'],
      related: [],
      level: 'intermediate',
    },
    { term: 'derivative', aliases: ['derivatives'], prerequisites: [], related: [], level: 'beginner' },
    { term: 'loss function', aliases: [], prerequisites: [], related: [], level: 'beginner' },
    { term: 'matrix', aliases: ['matrices'], prerequisites: [], related: [], level: 'beginner' },
  ]);
}

import { describe, it, expect } from 'vitest';
import {
  compressContext,
  formatContextForPrompt,
  listSources,
  prerequisiteOrder,
  type CompressOptions,
} from '@/services/context-compressor';
import { ConfigurationError } from '@/services/errors';
import type { ScoredCandidate } from '@/types/core';
import { makeScored, recordingLogger, wordCounter } from '../helpers/fixtures';
import { smallVocabulary } from '../helpers/vocabulary';

function compress(candidates: ScoredCandidate[], options: CompressOptions = {}) {
  return compressContext(candidates, {
    tokenCounter: wordCounter,
    vocabulary: smallVocabulary(),
    logger: recordingLogger(),
    ...options,
  });
}

const docs = (context: ReturnType<typeof compress>) => context.entries.map((e) => e.candidate.sourceRef.documentId);

describe('compressContext', () => {
  it('skips a candidate that does not fit and keeps packing smaller ones', () => {
    const context = compress(
      [
        makeScored('one two three four five', 'A', 0.9),
        makeScored('alpha beta gamma delta epsilon zeta eta theta', 'B', 0.8),
        makeScored('red green blue', 'C', 0.7),
      ],
      { tokenBudget: 10 },
    );
    expect(docs(context)).toEqual(['A', 'C']);
    expect(context.totalTokens).toBe(8);
    expect(context.droppedOverBudget).toBe(1);
    expect(context.droppedCount).toBe(1);
    expect(context.considered).toBe(3);
    expect(context.entries.map((e) => e.tokens)).toEqual([5, 3]);
  });

  it('never truncates a passage to make it fit', () => {
    const context = compress([makeScored('a passage of exactly six words', 'A', 0.9)], { tokenBudget: 4 });
    expect(context.entries).toEqual([]);
    expect(context.totalTokens).toBe(0);
    expect(context.droppedOverBudget).toBe(1);
  });

  it('admits in composite order whatever the input order', () => {
    const context = compress([makeScored('low scored text', 'L', 0.1), makeScored('high scored passage', 'H', 0.9)]);
    expect(docs(context)).toEqual(['H', 'L']);
    expect(context.entries.map((e) => e.citation)).toEqual([1, 2]);
  });

  it('drops a near-duplicate of an admitted entry', () => {
    const context = compress([
      makeScored('Gradient descent moves against the gradient of the loss.', 'A', 0.9),
      makeScored('gradient  descent moves against the GRADIENT of the loss', 'B', 0.8),
    ]);
    expect(docs(context)).toEqual(['A']);
    expect(context.droppedAsDuplicate).toBe(1);
  });

  it('keeps a near-duplicate carrying a different perspective', () => {
    const text = 'A larger learning rate always converges faster.';
    const context = compress([
      makeScored(text, 'A', 0.9),
      makeScored(text, 'B', 0.8, { perspective: 'contradicting' }),
    ]);
    expect(docs(context)).toEqual(['A', 'B']);
    expect(context.droppedAsDuplicate).toBe(0);
  });

  it('puts prerequisites first', () => {
    const context = compress([
      makeScored('How gradient descent works', 'GD', 0.9, { concepts: ['gradient descent'], prerequisites: ['derivative'] }),
      makeScored('What a slope means', 'DER', 0.5, { concepts: ['derivatives'] }),
    ]);
    expect(context.ordering).toBe('prerequisite');
    expect(docs(context)).toEqual(['DER', 'GD']);
    expect(context.entries.map((e) => e.citation)).toEqual([1, 2]);
  });

  it('keeps score order when prerequisites form a cycle', () => {
    const context = compress([
      makeScored('first passage here', 'X', 0.9, { concepts: ['gradient descent'], prerequisites: ['derivative'] }),
      makeScored('second passage there', 'Y', 0.5, { concepts: ['derivative'], prerequisites: ['gradient descent'] }),
    ]);
    expect(context.ordering).toBe('score');
    expect(docs(context)).toEqual(['X', 'Y']);
  });

  it('can leave the order by score', () => {
    const context = compress(
      [
        makeScored('How gradient descent works', 'GD', 0.9, { prerequisites: ['derivative'] }),
        makeScored('What a slope means', 'DER', 0.5, { concepts: ['derivative'] }),
      ],
      { reorderByPrerequisites: false },
    );
    expect(context.ordering).toBe('score');
    expect(docs(context)).toEqual(['GD', 'DER']);
  });

  it('returns a frozen result', () => {
    const context = compress([makeScored('some text', 'A', 0.5)]);
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.entries)).toBe(true);
  });

  it('rejects invalid budgets and thresholds', () => {
    expect(() => compress([], { tokenBudget: 0 })).toThrow(ConfigurationError);
    expect(() => compress([], { tokenBudget: 10.5 })).toThrow(ConfigurationError);
    expect(() => compress([], { dedupSimilarityThreshold: 1.5 })).toThrow(ConfigurationError);
  });
});

describe('prerequisiteOrder', () => {
  it('returns null when no entry depends on another', () => {
    expect(prerequisiteOrder([makeScored('a', 'A', 1), makeScored('b', 'B', 0.5)], smallVocabulary())).toBeNull();
  });

  it('keeps the higher scored entry first among ready ones', () => {
    const items = [
      makeScored('a', 'A', 0.9, { prerequisites: ['matrix'] }),
      makeScored('b', 'B', 0.8),
      makeScored('c', 'C', 0.7, { concepts: ['matrices'] }),
    ];
    expect(prerequisiteOrder(items, smallVocabulary())).toEqual([1, 2, 0]);
  });
});

describe('formatContextForPrompt', () => {
  it('renders one cited block per entry', () => {
    const context = compress([makeScored('Alpha text.', 'doc-a', 0.9, undefined, 3), makeScored('Beta text.', 'doc-b', 0.5)]);
    expect(formatContextForPrompt(context)).toBe(
      '[Source: doc-a, Page 3, Chunk 1]: Alpha text.\n\n[Source: doc-b, Page N/A, Chunk 2]: Beta text.',
    );
  });
});

describe('listSources', () => {
  it('lists each document once in context order', () => {
    const context = compress([
      makeScored('first chunk words', 'doc-a', 0.9),
      makeScored('second chunk here', 'doc-b', 0.8),
      makeScored('third part text', 'doc-a', 0.7),
    ]);
    expect(listSources(context)).toEqual(['doc-a', 'doc-b']);
  });
});

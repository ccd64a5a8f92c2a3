import { describe, it, expect } from 'vitest';
import { ClarityScorer, sentenceLengthScore } from '@/services/scorers/clarity-scorer';
import { makeCandidate, makeFused, makeQuery } from '../../helpers/fixtures';

function score(text: string): number {
  return new ClarityScorer().score(makeQuery(), makeFused(makeCandidate(text, 'd', 'dense', 1)));
}

describe('sentenceLengthScore', () => {
  it.each([
    [0, 0],
    [4, 0.5],
    [8, 1],
    [25, 1],
    [37.5, 0.5],
    [60, 0],
  ])('scores an average of %d words as %d', (words, expected) => {
    expect(sentenceLengthScore(words)).toBeCloseTo(expected, 12);
  });
});

describe('ClarityScorer', () => {
  it('gives full marks to a mid-length sentence with a definition marker', () => {
    expect(score('Gradient descent is defined as an iterative method that updates parameters step by step.')).toBe(1);
  });

  it('penalizes a lone jargon word', () => {
    // one word, 15 letters: length 1/8, jargon share 1, no markers
    expect(score('Backpropagation.')).toBeCloseTo(0.0625, 12);
  });

  it('is zero for text without words', () => {
    expect(score('')).toBe(0);
    expect(score('... ---')).toBe(0);
  });
});

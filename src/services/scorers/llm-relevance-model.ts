// src/services/scorers/llm-relevance-model.ts: pointwise LLM relevance judge (cross-encoder stand-in)
import { z } from 'zod';
import type { SimpleModelRouter } from '../model-router';
import { safeParseJson } from '../safe-parse-json';
import { ScoringUnavailableError } from '../errors';
import type { RelevanceModel } from './relevance-models';

const MAX_PASSAGE_CHARS = 2000;

const judgementSchema = z.object({ score: z.coerce.number().min(0).max(10) });

export function buildRelevancePrompt(queryText: string, passage: string): string {
  return [
    'Rate how well the passage answers or explains the question for a student.',
    'Scale: 0 = unrelated, 10 = directly and completely relevant.',
    'Return JSON only: {"score": <0-10>}',
    '',
    `Question: ${queryText}`,
    `Passage: ${passage.slice(0, MAX_PASSAGE_CHARS)}`,
  ].join('\n');
}

export class LlmRelevanceModel implements RelevanceModel {
  readonly name = 'llm';

  constructor(private readonly router: SimpleModelRouter) {}

  async relevance(queryText: string, passage: string, signal?: AbortSignal): Promise<number> {
    const raw = await this.router.judgeRelevance(buildRelevancePrompt(queryText, passage), signal);
    const parsed = judgementSchema.safeParse(safeParseJson(raw, 'llm-relevance'));
    if (!parsed.success) {
      throw new ScoringUnavailableError('semantic', 'LLM relevance judgement was not a 0-10 score');
    }
    return parsed.data.score / 10;
  }
}

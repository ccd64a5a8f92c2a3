// src/services/context-compressor.ts
// Budget packing over the reranked list: near-duplicates of an admitted entry are skipped unless
// they carry a different perspective, a candidate that does not fit is skipped whole (never
// truncated), and the admitted set is optionally reordered prerequisites-first.
import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { CompressedContext, ContextEntry, ScoredCandidate } from '@/types/core';
import { getDefaultVocabulary, type ConceptVocabulary } from './concept-vocabulary';
import { textSimilarity } from './dedup-utils';
import { ConfigurationError, type ConfigIssue } from './errors';
import { logger as defaultLogger, type EngineLogger } from './logger';

export interface TokenCounter {
  count(text: string): number;
}

/** cl100k_base, the encoding of the OpenAI chat models downstream. */
export class TiktokenCounter implements TokenCounter {
  private encoder: Tiktoken | null = null;

  count(text: string): number {
    if (this.encoder == null) this.encoder = getEncoding('cl100k_base');
    return this.encoder.encode(text).length;
  }
}

let defaultCounter: TokenCounter | null = null;

export function getDefaultTokenCounter(): TokenCounter {
  if (defaultCounter == null) defaultCounter = new TiktokenCounter();
  return defaultCounter;
}

export const DEFAULT_TOKEN_BUDGET = 8000;
export const DEFAULT_DEDUP_THRESHOLD = 0.85;

export interface CompressOptions {
  tokenBudget?: number;
  dedupSimilarityThreshold?: number;
  tokenCounter?: TokenCounter;
  reorderByPrerequisites?: boolean;
  /** Resolves concept aliases when matching prerequisites to concepts. */
  vocabulary?: ConceptVocabulary;
  logger?: EngineLogger;
}

interface Admitted {
  candidate: ScoredCandidate;
  tokens: number;
}

function differentPerspective(a: ScoredCandidate, b: ScoredCandidate): boolean {
  return (a.metadata?.perspective ?? null) !== (b.metadata?.perspective ?? null);
}

/**
 * Stable topological order: j comes before i when i lists a prerequisite that j covers as a
 * concept. Among ready nodes the higher-scored (earlier) wins; on a cycle the remaining nodes keep
 * score order. Returns null when the admitted set has no prerequisite relations among itself.
 */
export function prerequisiteOrder(
  items: readonly ScoredCandidate[],
  vocabulary: ConceptVocabulary,
): number[] | null {
  const concepts = items.map((c) => new Set((c.metadata?.concepts ?? []).map((x) => vocabulary.canonical(x))));
  const prerequisites = items.map((c) => (c.metadata?.prerequisites ?? []).map((x) => vocabulary.canonical(x)));

  const successors: number[][] = items.map(() => []);
  const inDegree = items.map(() => 0);
  let edges = 0;
  for (let i = 0; i < items.length; i++) {
    for (let j = 0; j < items.length; j++) {
      if (i === j) continue;
      if (prerequisites[i].some((p) => concepts[j].has(p))) {
        successors[j].push(i);
        inDegree[i]++;
        edges++;
      }
    }
  }
  if (edges === 0) return null;

  const order: number[] = [];
  const placed = new Set<number>();
  while (order.length < items.length) {
    let next = -1;
    for (let i = 0; i < items.length; i++) {
      if (!placed.has(i) && inDegree[i] === 0) {
        next = i;
        break;
      }
    }
    if (next === -1) {
      for (let i = 0; i < items.length; i++) if (!placed.has(i)) order.push(i);
      break;
    }
    placed.add(next);
    order.push(next);
    for (const s of successors[next]) inDegree[s]--;
  }
  return order;
}

function validateOptions(tokenBudget: number, threshold: number): void {
  const issues: ConfigIssue[] = [];
  if (!Number.isInteger(tokenBudget) || tokenBudget <= 0) {
    issues.push({ path: 'tokenBudget', message: 'tokenBudget must be a positive integer' });
  }
  if (!(threshold > 0 && threshold <= 1)) {
    issues.push({ path: 'dedupSimilarityThreshold', message: 'dedupSimilarityThreshold must be in (0, 1]' });
  }
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid compression options: ${issues.map((i) => i.message).join('; ')}`, issues);
  }
}

export function compressContext(
  candidates: readonly ScoredCandidate[],
  options: CompressOptions = {},
): CompressedContext {
  const tokenBudget = options.tokenBudget ?? DEFAULT_TOKEN_BUDGET;
  const threshold = options.dedupSimilarityThreshold ?? DEFAULT_DEDUP_THRESHOLD;
  validateOptions(tokenBudget, threshold);
  const counter = options.tokenCounter ?? getDefaultTokenCounter();
  const log = options.logger ?? defaultLogger;

  const ranked = [...candidates].sort((a, b) => b.compositeScore - a.compositeScore);
  const admitted: Admitted[] = [];
  let used = 0;
  let droppedAsDuplicate = 0;
  let droppedOverBudget = 0;

  for (const candidate of ranked) {
    const duplicateOf = admitted.find(
      (a) =>
        !differentPerspective(a.candidate, candidate) &&
        textSimilarity(a.candidate.text, candidate.text) >= threshold,
    );
    if (duplicateOf) {
      droppedAsDuplicate++;
      continue;
    }
    const tokens = counter.count(candidate.text);
    if (used + tokens > tokenBudget) {
      droppedOverBudget++;
      continue;
    }
    admitted.push({ candidate, tokens });
    used += tokens;
  }

  let ordered = admitted;
  let ordering: CompressedContext['ordering'] = 'score';
  if (options.reorderByPrerequisites ?? true) {
    const order = prerequisiteOrder(
      admitted.map((a) => a.candidate),
      options.vocabulary ?? getDefaultVocabulary(),
    );
    if (order && order.some((idx, pos) => idx !== pos)) {
      ordered = order.map((idx) => admitted[idx]);
      ordering = 'prerequisite';
    }
  }

  const entries: ContextEntry[] = ordered.map((a, i) =>
    Object.freeze({ candidate: a.candidate, tokens: a.tokens, citation: i + 1 }),
  );

  const context: CompressedContext = {
    entries: Object.freeze(entries),
    totalTokens: used,
    tokenBudget,
    ordering,
    considered: candidates.length,
    droppedCount: droppedAsDuplicate + droppedOverBudget,
    droppedAsDuplicate,
    droppedOverBudget,
  };
  log.info('context-compressor:done', {
    admitted: entries.length,
    totalTokens: used,
    tokenBudget,
    ordering,
    droppedAsDuplicate,
    droppedOverBudget,
  });
  return Object.freeze(context);
}

/** `[Source: <document>, Page <p>, Chunk <n>]: <text>` blocks, one per entry, in context order. */
export function formatContextForPrompt(context: CompressedContext): string {
  return context.entries
    .map((e) => {
      const ref = e.candidate.sourceRef;
      return `[Source: ${ref.documentId}, Page ${ref.page ?? 'N/A'}, Chunk ${e.citation}]: ${e.candidate.text}`;
    })
    .join('\n\n');
}

/** Unique document ids in context order. */
export function listSources(context: CompressedContext): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const e of context.entries) {
    const id = e.candidate.sourceRef.documentId;
    if (!seen.has(id)) {
      seen.add(id);
      out.push(id);
    }
  }
  return out;
}

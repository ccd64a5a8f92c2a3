// src/types/core.ts
export type Intent =
  | 'concept_explanation'
  | 'prerequisite_analysis'
  | 'problem_solving'
  | 'comparative_learning'
  | 'application_understanding'
  | 'mathematical_concept'
  | 'general';

export type Difficulty = 'beginner' | 'intermediate' | 'advanced';

/** One retrieval strategy. Order here is the canonical route order used for tie-breaks. */
export type Route = 'dense' | 'sparse' | 'graph';

export const ROUTES: readonly Route[] = ['dense', 'sparse', 'graph'];

export interface Query {
  readonly id: string;
  readonly text: string;
  readonly intent: Intent;
  /** 'override' when the caller forced the intent instead of the classifier. */
  readonly intentSource: 'classified' | 'override';
  readonly concepts: readonly string[];
  readonly difficulty: Difficulty;
}

export type SubQueryKind = 'original' | 'clause' | 'comparison_side' | 'prerequisite';

export interface SubQuery {
  readonly id: string;
  readonly text: string;
  readonly parentId: string;
  /** Ordering hint only; retrieval never waits on these. */
  readonly dependsOn: readonly string[];
  readonly kind: SubQueryKind;
}

export type SourceType =
  | 'textbook'
  | 'paper'
  | 'lecture'
  | 'documentation'
  | 'notes'
  | 'web'
  | 'unknown';

/** Where a span came from; documentId is what citations resolve against. */
export interface SourceRef {
  readonly documentId: string;
  readonly chunkIndex?: number;
  readonly offset?: number;
  readonly page?: number;
  readonly title?: string;
  readonly url?: string;
}

export interface CandidateMetadata {
  readonly concepts?: readonly string[];
  readonly prerequisites?: readonly string[];
  readonly sourceType?: SourceType;
  readonly citationCount?: number;
  readonly difficulty?: Difficulty;
  /** Tag for a distinct viewpoint (e.g. a contradicting claim); near-duplicates with different tags are both kept. */
  readonly perspective?: string;
  readonly chunkType?: 'text' | 'table' | 'image';
}

export interface Candidate {
  /** sha256 of canonicalized text + documentId. */
  readonly contentId: string;
  readonly text: string;
  readonly sourceRef: SourceRef;
  readonly route: Route;
  readonly rawScore: number;
  /** The adapter's own id for this span, when it has one. */
  readonly nativeId?: string;
  readonly metadata?: CandidateMetadata;
}

export interface FusedCandidate extends Candidate {
  readonly fusedScore: number;
  readonly routes: readonly Route[];
  readonly subQueryIds: readonly string[];
  /** Best (lowest) 1-indexed rank across every list the candidate appeared in. */
  readonly firstSeenRank: number;
  readonly occurrences: number;
}

export type ScoreName = 'semantic' | 'pedagogical' | 'concept' | 'clarity' | 'authority';

export type ScoreBreakdown = Partial<Record<ScoreName, number>>;

export interface PedagogicalSubScores {
  conceptClarity: number;
  exampleRichness: number;
  prerequisiteAlignment: number;
  difficultyAppropriateness: number;
  explanationStructure: number;
  visualAids: number;
}

export interface ScoredCandidate extends FusedCandidate {
  readonly breakdown: ScoreBreakdown;
  readonly pedagogicalDetail?: PedagogicalSubScores;
  readonly compositeScore: number;
  readonly failedScorers: readonly ScoreName[];
  readonly partiallyScored: boolean;
}

export interface ContextEntry {
  readonly candidate: ScoredCandidate;
  readonly tokens: number;
  /** 1-based position used for citations in the rendered prompt context. */
  readonly citation: number;
}

export interface CompressedContext {
  readonly entries: readonly ContextEntry[];
  readonly totalTokens: number;
  readonly tokenBudget: number;
  /** 'prerequisite' means entries were reordered prerequisites-first instead of by score. */
  readonly ordering: 'score' | 'prerequisite';
  readonly considered: number;
  readonly droppedCount: number;
  readonly droppedAsDuplicate: number;
  readonly droppedOverBudget: number;
}

export interface SearchFilters {
  documentIds?: string[];
  sourceTypes?: SourceType[];
}

export type DegradeReason = 'timeout' | 'error' | 'cancelled';

export interface DegradedRoute {
  route: Route;
  subQueryId: string;
  reason: DegradeReason;
  message: string;
}

export interface QualityReport {
  degraded: boolean;
  degradedRoutes: DegradedRoute[];
  partiallyScoredCount: number;
  /** True when the query-level deadline fired before the pipeline finished. */
  timedOut: boolean;
}

/**
 * Retrieval configuration: weight tables, budgets and timeouts.
 * Validated with zod; every table is passed explicitly through the pipeline.
 */
import { z } from 'zod';
import type { Intent } from '@/types/core';
import { ConfigurationError } from '@/services/errors';

const weight = z.number().finite().min(0, 'Weights cannot be negative');

export const routeWeightsSchema = z
  .object({
    dense: weight,
    sparse: weight,
    graph: weight,
    difficulty: weight,
  })
  .refine((w) => w.dense + w.sparse + w.graph > 0, {
    message: 'At least one retrieval route needs a positive weight',
  });

export type RouteWeights = z.infer<typeof routeWeightsSchema>;

export const pedagogicalWeightsSchema = z
  .object({
    conceptClarity: weight,
    exampleRichness: weight,
    prerequisiteAlignment: weight,
    difficultyAppropriateness: weight,
    explanationStructure: weight,
    visualAids: weight,
  })
  .refine((w) => Object.values(w).some((v) => v > 0), {
    message: 'Pedagogical weights need at least one positive entry',
  });

export type PedagogicalWeights = z.infer<typeof pedagogicalWeightsSchema>;

export const compositeWeightsSchema = z
  .object({
    semantic: weight,
    pedagogical: weight,
    concept: weight,
    clarity: weight,
    authority: weight,
  })
  .refine((w) => Object.values(w).some((v) => v > 0), {
    message: 'Composite weights need at least one positive entry',
  });

export type CompositeWeights = z.infer<typeof compositeWeightsSchema>;

const intentRouteWeightsSchema = z
  .object({
    concept_explanation: routeWeightsSchema,
    prerequisite_analysis: routeWeightsSchema,
    problem_solving: routeWeightsSchema,
    comparative_learning: routeWeightsSchema,
    application_understanding: routeWeightsSchema,
    mathematical_concept: routeWeightsSchema,
    general: routeWeightsSchema,
  })
  .partial();

const intentWeightTableSchema = z.object({
  concept_explanation: pedagogicalWeightsSchema,
  prerequisite_analysis: pedagogicalWeightsSchema,
  problem_solving: pedagogicalWeightsSchema,
  comparative_learning: pedagogicalWeightsSchema,
  application_understanding: pedagogicalWeightsSchema,
  mathematical_concept: pedagogicalWeightsSchema,
  general: pedagogicalWeightsSchema,
});

export type IntentWeightTable = z.infer<typeof intentWeightTableSchema>;

export const DEFAULT_ROUTE_WEIGHTS: RouteWeights = {
  dense: 0.4,
  sparse: 0.25,
  graph: 0.25,
  difficulty: 0.1,
};

export const DEFAULT_COMPOSITE_WEIGHTS: CompositeWeights = {
  semantic: 0.35,
  pedagogical: 0.3,
  concept: 0.2,
  clarity: 0.1,
  authority: 0.05,
};

/** Explanation intents lean on clarity, problem solving on examples, prerequisite analysis on prerequisite alignment. */
export const DEFAULT_INTENT_WEIGHT_TABLE: IntentWeightTable = {
  concept_explanation: {
    conceptClarity: 0.3,
    exampleRichness: 0.15,
    prerequisiteAlignment: 0.1,
    difficultyAppropriateness: 0.15,
    explanationStructure: 0.2,
    visualAids: 0.1,
  },
  prerequisite_analysis: {
    conceptClarity: 0.15,
    exampleRichness: 0.1,
    prerequisiteAlignment: 0.35,
    difficultyAppropriateness: 0.15,
    explanationStructure: 0.15,
    visualAids: 0.1,
  },
  problem_solving: {
    conceptClarity: 0.15,
    exampleRichness: 0.35,
    prerequisiteAlignment: 0.1,
    difficultyAppropriateness: 0.15,
    explanationStructure: 0.15,
    visualAids: 0.1,
  },
  comparative_learning: {
    conceptClarity: 0.25,
    exampleRichness: 0.15,
    prerequisiteAlignment: 0.1,
    difficultyAppropriateness: 0.1,
    explanationStructure: 0.3,
    visualAids: 0.1,
  },
  application_understanding: {
    conceptClarity: 0.15,
    exampleRichness: 0.3,
    prerequisiteAlignment: 0.1,
    difficultyAppropriateness: 0.15,
    explanationStructure: 0.15,
    visualAids: 0.15,
  },
  mathematical_concept: {
    conceptClarity: 0.25,
    exampleRichness: 0.25,
    prerequisiteAlignment: 0.15,
    difficultyAppropriateness: 0.15,
    explanationStructure: 0.1,
    visualAids: 0.1,
  },
  general: {
    conceptClarity: 0.2,
    exampleRichness: 0.2,
    prerequisiteAlignment: 0.15,
    difficultyAppropriateness: 0.15,
    explanationStructure: 0.15,
    visualAids: 0.15,
  },
};

export const retrievalConfigSchema = z.object({
  topK: z.number().int().positive('topK must be positive'),
  tokenBudget: z.number().int().positive('tokenBudget must be positive'),
  rrfK: z.number().finite().positive('rrfK must be positive'),
  dedupSimilarityThreshold: z
    .number()
    .gt(0, 'dedupSimilarityThreshold must be above 0')
    .max(1, 'dedupSimilarityThreshold cannot exceed 1'),
  perRouteTimeoutMs: z.number().int().positive('perRouteTimeoutMs must be positive'),
  queryTimeoutMs: z.number().int().positive('queryTimeoutMs must be positive'),
  rerankConcurrency: z.number().int().positive('rerankConcurrency must be positive'),
  routeWeights: routeWeightsSchema,
  intentRouteWeights: intentRouteWeightsSchema,
  compositeWeights: compositeWeightsSchema,
  intentWeightTable: intentWeightTableSchema,
});

export type RetrievalConfig = z.infer<typeof retrievalConfigSchema>;

export const DEFAULT_RETRIEVAL_CONFIG: RetrievalConfig = {
  topK: 100,
  tokenBudget: 8000,
  rrfK: 60,
  dedupSimilarityThreshold: 0.85,
  perRouteTimeoutMs: 3000,
  queryTimeoutMs: 15000,
  rerankConcurrency: 8,
  routeWeights: DEFAULT_ROUTE_WEIGHTS,
  intentRouteWeights: {},
  compositeWeights: DEFAULT_COMPOSITE_WEIGHTS,
  intentWeightTable: DEFAULT_INTENT_WEIGHT_TABLE,
};

/** Caller-facing overrides: every field optional, nested tables merged over the defaults. */
export interface RetrievalConfigOverrides {
  topK?: number;
  tokenBudget?: number;
  rrfK?: number;
  dedupSimilarityThreshold?: number;
  perRouteTimeoutMs?: number;
  queryTimeoutMs?: number;
  rerankConcurrency?: number;
  routeWeights?: Partial<RouteWeights>;
  intentRouteWeights?: Partial<Record<Intent, RouteWeights>>;
  compositeWeights?: Partial<CompositeWeights>;
  intentWeightTable?: Partial<Record<Intent, PedagogicalWeights>>;
}

const ENV_KEYS = {
  topK: 'RETRIEVAL_TOP_K',
  tokenBudget: 'RETRIEVAL_TOKEN_BUDGET',
  rrfK: 'RETRIEVAL_RRF_K',
  dedupSimilarityThreshold: 'RETRIEVAL_DEDUP_THRESHOLD',
  perRouteTimeoutMs: 'RETRIEVAL_ROUTE_TIMEOUT_MS',
  queryTimeoutMs: 'RETRIEVAL_QUERY_TIMEOUT_MS',
  rerankConcurrency: 'RETRIEVAL_RERANK_CONCURRENCY',
} as const;

type NumericConfigKey = keyof typeof ENV_KEYS;

const NUMERIC_KEYS: readonly NumericConfigKey[] = [
  'topK',
  'tokenBudget',
  'rrfK',
  'dedupSimilarityThreshold',
  'perRouteTimeoutMs',
  'queryTimeoutMs',
  'rerankConcurrency',
];

/** Numeric overrides from the environment. Unparseable values are kept as NaN so validation reports them. */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): RetrievalConfigOverrides {
  const out: RetrievalConfigOverrides = {};
  for (const key of NUMERIC_KEYS) {
    const raw = env[ENV_KEYS[key]];
    if (raw == null || raw.trim() === '') continue;
    out[key] = Number(raw);
  }
  return out;
}

function mergeOverrides(
  base: RetrievalConfig,
  ...layers: RetrievalConfigOverrides[]
): RetrievalConfig {
  let merged = base;
  for (const layer of layers) {
    const scalars: Partial<Record<NumericConfigKey, number>> = {};
    for (const key of NUMERIC_KEYS) {
      const value = layer[key];
      if (value !== undefined) scalars[key] = value;
    }
    merged = {
      ...merged,
      ...scalars,
      routeWeights: { ...merged.routeWeights, ...layer.routeWeights },
      intentRouteWeights: { ...merged.intentRouteWeights, ...layer.intentRouteWeights },
      compositeWeights: { ...merged.compositeWeights, ...layer.compositeWeights },
      intentWeightTable: { ...merged.intentWeightTable, ...layer.intentWeightTable },
    };
  }
  return merged;
}

/**
 * Validates a config value. Throws ConfigurationError listing every issue.
 */
export function validateRetrievalConfig(candidate: unknown): RetrievalConfig {
  const result = retrievalConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.errors.map((e) => ({
      path: e.path.join('.') || 'root',
      message: e.message,
    }));
    throw new ConfigurationError(
      `Invalid retrieval configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      issues,
    );
  }
  return result.data;
}

/** Defaults, then environment, then explicit overrides. */
export function resolveRetrievalConfig(
  overrides: RetrievalConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): RetrievalConfig {
  return validateRetrievalConfig(
    mergeOverrides(DEFAULT_RETRIEVAL_CONFIG, readEnvOverrides(env), overrides),
  );
}

/** Applies per-call overrides to an already validated config. */
export function withOverrides(
  config: RetrievalConfig,
  overrides: RetrievalConfigOverrides,
): RetrievalConfig {
  return validateRetrievalConfig(mergeOverrides(config, overrides));
}

export function routeWeightsFor(
  config: Pick<RetrievalConfig, 'routeWeights' | 'intentRouteWeights'>,
  intent: Intent,
): RouteWeights {
  return config.intentRouteWeights[intent] ?? config.routeWeights;
}

export function pedagogicalWeightsFor(
  config: Pick<RetrievalConfig, 'intentWeightTable'>,
  intent: Intent,
): PedagogicalWeights {
  return config.intentWeightTable[intent];
}

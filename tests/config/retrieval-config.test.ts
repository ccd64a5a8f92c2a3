import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RETRIEVAL_CONFIG,
  readEnvOverrides,
  resolveRetrievalConfig,
  routeWeightsFor,
  pedagogicalWeightsFor,
  validateRetrievalConfig,
  withOverrides,
} from '@/config/retrieval-config';
import { ConfigurationError } from '@/services/errors';

describe('retrieval config', () => {
  it('resolves the documented defaults with an empty environment', () => {
    const config = resolveRetrievalConfig({}, {});
    expect(config.topK).toBe(100);
    expect(config.tokenBudget).toBe(8000);
    expect(config.rrfK).toBe(60);
    expect(config.dedupSimilarityThreshold).toBe(0.85);
    expect(config.routeWeights).toEqual({ dense: 0.4, sparse: 0.25, graph: 0.25, difficulty: 0.1 });
    expect(config.compositeWeights).toEqual({
      semantic: 0.35,
      pedagogical: 0.3,
      concept: 0.2,
      clarity: 0.1,
      authority: 0.05,
    });
  });

  it('layers environment values under explicit overrides', () => {
    const env = { RETRIEVAL_TOP_K: '25', RETRIEVAL_TOKEN_BUDGET: '500' };
    const config = resolveRetrievalConfig({ tokenBudget: 300 }, env);
    expect(config.topK).toBe(25);
    expect(config.tokenBudget).toBe(300);
  });

  it('ignores blank environment values', () => {
    expect(readEnvOverrides({ RETRIEVAL_RRF_K: '  ' })).toEqual({});
  });

  it('reports a non-numeric environment value as a configuration error', () => {
    expect(() => resolveRetrievalConfig({}, { RETRIEVAL_RRF_K: 'sixty' })).toThrow(ConfigurationError);
  });

  it('rejects a zero token budget with the offending path', () => {
    try {
      withOverrides(DEFAULT_RETRIEVAL_CONFIG, { tokenBudget: 0 });
      expect.unreachable('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      const issues = err instanceof ConfigurationError ? err.issues : [];
      expect(issues.map((i) => i.path)).toEqual(['tokenBudget']);
      expect(err instanceof ConfigurationError && err.code).toBe('INVALID_CONFIGURATION');
    }
  });

  it('rejects route weights that are all zero', () => {
    expect(() =>
      withOverrides(DEFAULT_RETRIEVAL_CONFIG, { routeWeights: { dense: 0, sparse: 0, graph: 0 } }),
    ).toThrow(/At least one retrieval route/);
  });

  it('rejects a dedup threshold above 1 and negative weights', () => {
    expect(() => withOverrides(DEFAULT_RETRIEVAL_CONFIG, { dedupSimilarityThreshold: 1.5 })).toThrow(ConfigurationError);
    expect(() => withOverrides(DEFAULT_RETRIEVAL_CONFIG, { compositeWeights: { clarity: -0.1 } })).toThrow(
      ConfigurationError,
    );
  });

  it('merges partial route weights over the base table', () => {
    const config = withOverrides(DEFAULT_RETRIEVAL_CONFIG, { routeWeights: { graph: 0.5 } });
    expect(config.routeWeights).toEqual({ dense: 0.4, sparse: 0.25, graph: 0.5, difficulty: 0.1 });
  });

  it('uses per-intent route weights when configured', () => {
    const perIntent = { dense: 0.2, sparse: 0.2, graph: 0.6, difficulty: 0 };
    const config = withOverrides(DEFAULT_RETRIEVAL_CONFIG, {
      intentRouteWeights: { prerequisite_analysis: perIntent },
    });
    expect(routeWeightsFor(config, 'prerequisite_analysis')).toEqual(perIntent);
    expect(routeWeightsFor(config, 'general')).toEqual(DEFAULT_RETRIEVAL_CONFIG.routeWeights);
  });

  it('favours clarity for explanations and examples for problem solving', () => {
    const explain = pedagogicalWeightsFor(DEFAULT_RETRIEVAL_CONFIG, 'concept_explanation');
    const solve = pedagogicalWeightsFor(DEFAULT_RETRIEVAL_CONFIG, 'problem_solving');
    expect(explain.conceptClarity).toBeGreaterThan(explain.exampleRichness);
    expect(solve.exampleRichness).toBeGreaterThan(solve.conceptClarity);
  });

  it('validates unknown input shapes', () => {
    expect(() => validateRetrievalConfig({ topK: 10 })).toThrow(ConfigurationError);
    expect(validateRetrievalConfig(DEFAULT_RETRIEVAL_CONFIG)).toEqual(DEFAULT_RETRIEVAL_CONFIG);
  });
});

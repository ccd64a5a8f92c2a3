import { afterEach, describe, it, expect, vi } from 'vitest';
import Redis from 'ioredis';
import {
  buildRelevanceRegistry,
  createInMemoryAdapters,
  createRetrievalDeps,
} from '@/services/pipeline-deps';
import { DEFAULT_RETRIEVAL_CONFIG } from '@/config/retrieval-config';
import { ConfigurationError } from '@/services/errors';
import { retrieveAndCompress } from '@/services/orchestrator';
import { listSources } from '@/services/context-compressor';
import { RedisRetrievalCache, connectRetrievalCache } from '@/services/cache';
import { SimpleEmbedder } from '@/services/providers/embeddings/simple-embedder';
import type { CorpusChunk } from '@/services/providers/corpus';
import { recordingLogger, wordCounter } from '../helpers/fixtures';

const CHUNKS: CorpusChunk[] = [
  { id: 'c1', documentId: 'calc', text: 'The derivative measures how a function changes.' },
  { id: 'c2', documentId: 'ml', text: 'Gradient descent follows the negative gradient of the loss function.' },
  { id: 'c3', documentId: 'ds', text: 'A hash table maps keys to buckets.' },
];

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('createRetrievalDeps', () => {
  it('wires the default config and the five scorers in composite order', () => {
    const deps = createRetrievalDeps({ adapters: createInMemoryAdapters(CHUNKS), env: {}, logger: recordingLogger() });
    expect(deps.config).toEqual(DEFAULT_RETRIEVAL_CONFIG);
    expect(deps.scorers.map((s) => s.name)).toEqual(['semantic', 'pedagogical', 'concept', 'clarity', 'authority']);
    expect(deps.cache).toBeNull();
  });

  it('rejects an invalid environment', () => {
    expect(() =>
      createRetrievalDeps({ adapters: createInMemoryAdapters(CHUNKS), env: { RETRIEVAL_TOKEN_BUDGET: '0' } }),
    ).toThrow(ConfigurationError);
  });

  it('answers a query end to end over the in-memory corpus', async () => {
    const deps = createRetrievalDeps({
      adapters: createInMemoryAdapters(CHUNKS),
      env: {},
      tokenCounter: wordCounter,
      logger: recordingLogger(),
    });
    const outcome = await retrieveAndCompress('Explain gradient descent', deps);
    expect(outcome.status).toBe('ok');
    if (outcome.status !== 'ok') return;
    expect(listSources(outcome.context)).toContain('ml');
    expect(outcome.quality.degraded).toBe(false);
  });
});

describe('buildRelevanceRegistry', () => {
  it('uses embeddings for general questions when asked', () => {
    const registry = buildRelevanceRegistry('embedding', new SimpleEmbedder(), recordingLogger());
    expect(registry.default.name).toBe('embedding');
    expect(registry.byIntent?.mathematical_concept?.name).toBe('math-lexical');
  });

  it('falls back to lexical when the LLM model has no key', () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const log = recordingLogger();
    const registry = buildRelevanceRegistry('llm', undefined, log);
    expect(registry.default.name).toBe('lexical');
    expect(log.entries).toContainEqual({
      level: 'warn',
      args: ['pipeline-deps:llm_relevance_unavailable', { reason: 'OPENAI_API_KEY not set', fallback: 'lexical' }],
    });
  });
});

describe('retrieval cache', () => {
  it('is skipped without a Redis URL', async () => {
    const log = recordingLogger();
    expect(await connectRetrievalCache(undefined, log)).toBeNull();
    expect(log.entries).toContainEqual({ level: 'info', args: ['redis:skipped', { reason: 'REDIS_URL not set' }] });
  });

  it('misses quietly while the client is not ready', async () => {
    const client = new Redis({ lazyConnect: true });
    const cache = new RedisRetrievalCache(client, recordingLogger());
    expect(await cache.get('retrieval:dense:abc')).toBeNull();
    await expect(cache.set('retrieval:dense:abc', [1], 60)).resolves.toBeUndefined();
  });
});

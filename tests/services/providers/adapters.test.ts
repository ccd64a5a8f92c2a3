import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import { InMemoryCorpus, type CorpusChunk } from '@/services/providers/corpus';
import { InMemoryKeywordAdapter } from '@/services/providers/sparse/in-memory-keyword-adapter';
import { InMemoryDenseAdapter } from '@/services/providers/dense/in-memory-dense-adapter';
import { ConceptGraphAdapter } from '@/services/providers/graph/concept-graph-adapter';
import { SimpleEmbedder } from '@/services/providers/embeddings/simple-embedder';
import { OpenAIEmbedder } from '@/services/providers/embeddings/openai-embedder';
import type { Embedding } from '@/services/providers/retrieval-vector-utils';
import { DeadlineExceededError } from '@/services/errors';
import { makeSubQuery } from '../../helpers/fixtures';
import { smallVocabulary } from '../../helpers/vocabulary';

const CHUNKS: CorpusChunk[] = [
  {
    id: 'c1',
    documentId: 'calc',
    text: 'The derivative measures how a function changes.',
    page: 12,
    metadata: { sourceType: 'textbook' },
  },
  {
    id: 'c2',
    documentId: 'ml',
    text: 'Gradient descent follows the negative gradient of the loss function.',
    metadata: { sourceType: 'web' },
  },
  { id: 'c3', documentId: 'ds', text: 'A hash table maps keys to buckets.' },
];

const signal = new AbortController().signal;

describe('InMemoryCorpus', () => {
  it('rejects duplicate chunk ids', () => {
    expect(() => new InMemoryCorpus([CHUNKS[0], CHUNKS[0]])).toThrow('Duplicate chunk id "c1"');
  });

  it('filters by document and source type', () => {
    const corpus = new InMemoryCorpus(CHUNKS);
    expect(corpus.filter({ documentIds: ['ml', 'ds'] }).map((c) => c.id)).toEqual(['c2', 'c3']);
    expect(corpus.filter({ sourceTypes: ['unknown'] }).map((c) => c.id)).toEqual(['c3']);
    expect(corpus.filter({}).map((c) => c.id)).toEqual(['c1', 'c2', 'c3']);
  });
});

describe('InMemoryKeywordAdapter', () => {
  const adapter = new InMemoryKeywordAdapter(new InMemoryCorpus(CHUNKS));

  it('returns only chunks sharing query terms', async () => {
    const hits = await adapter.search(makeSubQuery('gradient descent'), 10, undefined);
    expect(hits.map((h) => h.id)).toEqual(['c2']);
    expect(hits[0].rawScore).toBeGreaterThan(0);
    expect(hits[0].sourceRef).toEqual({ documentId: 'ml' });
  });

  it('applies filters', async () => {
    expect(await adapter.search(makeSubQuery('gradient descent'), 10, { sourceTypes: ['textbook'] })).toEqual([]);
  });

  it('returns nothing for a query of stopwords', async () => {
    expect(await adapter.search(makeSubQuery('the of and'), 10, undefined)).toEqual([]);
  });
});

describe('ConceptGraphAdapter', () => {
  const adapter = new ConceptGraphAdapter(new InMemoryCorpus(CHUNKS), smallVocabulary());

  it('expands seeds one hop along prerequisites', () => {
    expect(adapter.expand('gradient descent')).toEqual(
      new Map([
        ['gradient descent', 1],
        ['derivative', 0.5],
        ['loss function', 0.5],
      ]),
    );
  });

  it('scores chunks by the concepts they cover', async () => {
    const hits = await adapter.search(makeSubQuery('gradient descent'), 10, undefined);
    expect(hits.map((h) => [h.id, h.rawScore])).toEqual([
      ['c2', 1.5],
      ['c1', 0.5],
    ]);
    expect(hits[1].sourceRef).toEqual({ documentId: 'calc', page: 12 });
  });

  it('returns nothing when the query names no known concept', async () => {
    expect(await adapter.search(makeSubQuery('tell me a story'), 10, undefined)).toEqual([]);
  });
});

describe('InMemoryDenseAdapter', () => {
  function keywordEmbedder() {
    return {
      embed: vi.fn(async (text: string): Promise<Embedding> => [
        text.toLowerCase().includes('hash') ? 1 : 0,
        text.toLowerCase().includes('gradient') ? 1 : 0,
      ]),
    };
  }

  it('ranks chunks by embedding cosine and embeds each chunk once', async () => {
    const embedder = keywordEmbedder();
    const adapter = new InMemoryDenseAdapter(new InMemoryCorpus(CHUNKS), embedder);
    const hits = await adapter.search(makeSubQuery('hash table'), 10, undefined, signal);
    expect(hits.map((h) => [h.id, h.rawScore])).toEqual([['c3', 1]]);
    await adapter.search(makeSubQuery('gradient'), 10, undefined, signal);
    expect(embedder.embed).toHaveBeenCalledTimes(5);
  });

  it('retries a chunk whose embedding failed', async () => {
    let failures = 1;
    const embedder = {
      embed: vi.fn(async (text: string): Promise<Embedding> => {
        if (text.includes('derivative') && failures-- > 0) throw new Error('rate limited');
        return [1, 0];
      }),
    };
    const adapter = new InMemoryDenseAdapter(new InMemoryCorpus(CHUNKS), embedder);
    await expect(adapter.search(makeSubQuery('anything'), 10, undefined, signal)).rejects.toThrow('rate limited');
    const hits = await adapter.search(makeSubQuery('anything'), 10, undefined, signal);
    expect(hits.map((h) => h.id)).toEqual(['c1', 'c2', 'c3']);
  });

  it('keeps one search cancellation from failing another waiting on the same chunks', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const embedder = {
      embed: vi.fn(async (text: string, s?: AbortSignal): Promise<Embedding> => {
        if (text !== 'gradient') await gate;
        if (s?.aborted) throw new Error('aborted');
        return [0, text.toLowerCase().includes('gradient') ? 1 : 0];
      }),
    };
    const adapter = new InMemoryDenseAdapter(new InMemoryCorpus(CHUNKS), embedder);
    const first = new AbortController();
    const second = new AbortController();
    const cancelled = adapter.search(makeSubQuery('gradient'), 10, undefined, first.signal);
    const kept = adapter.search(makeSubQuery('gradient'), 10, undefined, second.signal);
    first.abort();
    release();
    await expect(cancelled).rejects.toBeInstanceOf(DeadlineExceededError);
    const hits = await kept;
    expect(hits.map((h) => [h.id, h.rawScore])).toEqual([['c2', 1]]);
    expect(embedder.embed).toHaveBeenCalledTimes(5);
  });
});

describe('SimpleEmbedder', () => {
  it('produces unit vectors of the requested size', async () => {
    const vec = await new SimpleEmbedder(16).embed('gradient descent');
    expect(vec).toHaveLength(16);
    expect(Math.sqrt(vec.reduce((s, x) => s + x * x, 0))).toBeCloseTo(1, 12);
  });

  it('returns a zero vector for text without content words', async () => {
    expect(await new SimpleEmbedder(4).embed('the')).toEqual([0, 0, 0, 0]);
  });
});

describe('OpenAIEmbedder', () => {
  it('requires an api key or a client', () => {
    expect(() => new OpenAIEmbedder({})).toThrow('Missing OPENAI_API_KEY');
  });

  it('caches embeddings per model and text', async () => {
    const client = new OpenAI({ apiKey: 'test-secret' });
    const create = vi.spyOn(client.embeddings, 'create').mockResolvedValue({
      object: 'list',
      model: 'text-embedding-3-small',
      data: [{ object: 'embedding', index: 0, embedding: [0.1, 0.2] }],
      usage: { prompt_tokens: 2, total_tokens: 2 },
    });
    const embedder = new OpenAIEmbedder({ client });
    expect(await embedder.embed('gradient descent')).toEqual([0.1, 0.2]);
    expect(await embedder.embed('gradient descent')).toEqual([0.1, 0.2]);
    expect(create).toHaveBeenCalledTimes(1);
  });
});

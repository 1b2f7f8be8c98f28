/**
 * Chunk Preparation and Embedding Retrieval Tests
 */

import {
  MAX_CHUNK_CHARS,
  UpstreamUnavailableError,
  cosineSimilarity,
  embedAll,
  findRelevantChunks,
  prepareChunks,
  rankBySimilarity,
  selectTopMatches,
  type EmbeddingProvider,
} from '@risklens/shared';
import { FailingEmbeddingProvider, KeywordEmbeddingProvider, loadParsedDocument } from './helpers';

describe('cosineSimilarity', () => {
  it('should be 1 for parallel vectors and 0 for orthogonal ones', () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should be 0 when either vector has zero norm', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });

  it('should score a 45 degree angle at about 0.707', () => {
    expect(cosineSimilarity([1, 1], [1, 0])).toBeCloseTo(0.7071, 4);
  });
});

describe('Ranking', () => {
  const candidates = [
    { name: 'a', vector: [0, 1] },
    { name: 'b', vector: [1, 0] },
    { name: 'c', vector: [1, 0] },
    { name: 'd', vector: [1, 1] },
  ];

  it('should order by score and keep input order on ties', () => {
    const ranked = rankBySimilarity([1, 0], candidates, (c) => c.vector);
    expect(ranked.map((r) => r.item.name)).toEqual(['b', 'c', 'd', 'a']);
  });

  it('should cut to topK before applying the threshold', () => {
    const ranked = rankBySimilarity([1, 0], candidates, (c) => c.vector);
    expect(selectTopMatches(ranked, 2, 0.5).map((r) => r.item.name)).toEqual(['b', 'c']);
    expect(selectTopMatches(ranked, 4, 0.5).map((r) => r.item.name)).toEqual(['b', 'c', 'd']);
    expect(selectTopMatches(ranked, 0, 0)).toEqual([]);
  });
});

describe('prepareChunks', () => {
  it('should emit table chunks before text chunks with provenance labels', () => {
    const chunks = prepareChunks(loadParsedDocument('crif_report'));
    expect(chunks.map((c) => c.source)).toEqual([
      'Table 1',
      'Table 2',
      'Table 3',
      'Text Chunk 1',
      'Text Chunk 2',
      'Text Chunk 3',
      'Text Chunk 4',
    ]);
    expect(chunks[0].content).toBe('Requested Service | Score\nCRIF HM SCORE | 742');
  });

  it('should truncate long sections', () => {
    const chunks = prepareChunks({
      tables: [],
      chunks: [{ header: 'Long', text: 'x'.repeat(MAX_CHUNK_CHARS + 500), page: 1 }],
    });
    expect(chunks[0].content).toHaveLength(MAX_CHUNK_CHARS);
    expect(chunks[0].type === 'text' && chunks[0].data.text.length).toBe(MAX_CHUNK_CHARS + 500);
  });
});

describe('findRelevantChunks', () => {
  it('should return the best matching chunks above the threshold', async () => {
    const provider = new KeywordEmbeddingProvider();
    const chunks = prepareChunks(loadParsedDocument('crif_report'));

    const matches = await findRelevantChunks('CIBIL Score: Credit bureau score', chunks, provider, {
      topK: 3,
      threshold: 0.5,
    });

    expect(matches).toHaveLength(1);
    expect(matches[0].chunk.source).toBe('Table 1');
    expect(matches[0].score).toBeCloseTo(1, 10);
  });

  it('should rank a summary table above account sections for a DPD query', async () => {
    const provider = new KeywordEmbeddingProvider();
    const chunks = prepareChunks(loadParsedDocument('crif_report'));

    const matches = await findRelevantChunks('30+ DPD: Count of accounts with 30+ days past due', chunks, provider, {
      topK: 3,
      threshold: 0.4,
    });

    expect(matches.map((m) => m.chunk.source)).toEqual(['Table 2', 'Text Chunk 2', 'Text Chunk 3']);
    expect(matches[0].score).toBeCloseTo(0.7071, 4);
  });

  it('should embed chunks once and reuse stored vectors', async () => {
    const provider = new KeywordEmbeddingProvider();
    const chunks = prepareChunks(loadParsedDocument('crif_report'));
    const options = { topK: 3, threshold: 0.5 };

    await findRelevantChunks('first query score', chunks, provider, options);
    await findRelevantChunks('second query accounts', chunks, provider, options);

    expect(provider.batches.map((batch) => batch.length)).toEqual([1, 7, 1]);
    expect(chunks.every((chunk) => chunk.embedding !== undefined)).toBe(true);
  });

  it('should not call the provider when there are no chunks', async () => {
    const provider = new KeywordEmbeddingProvider();
    await expect(findRelevantChunks('anything', [], provider)).resolves.toEqual([]);
    expect(provider.batches).toHaveLength(0);
  });

  it('should propagate embedding failures', async () => {
    const chunks = prepareChunks(loadParsedDocument('crif_report'));
    await expect(findRelevantChunks('score', chunks, new FailingEmbeddingProvider())).rejects.toBeInstanceOf(
      UpstreamUnavailableError
    );
  });
});

describe('embedAll', () => {
  it('should reject a provider that returns the wrong number of vectors', async () => {
    const short: EmbeddingProvider = {
      model: 'short',
      embed: async () => [[1, 0]],
    };
    await expect(embedAll(short, ['a', 'b'])).rejects.toThrow('expected 2 vectors, received 1');
  });
});

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

import type { Pinecone } from '@pinecone-database/pinecone';
import { RetrievalService } from '../../src/services/retrieval.service';

function match(id: string, score: number, intent = 'pricing') {
  return { id, score, metadata: { query: `query ${id}`, response: `response ${id}`, intent } };
}

describe('RetrievalService', () => {
  const mockQuery = jest.fn();
  const mockIndex = jest.fn().mockReturnValue({ query: mockQuery });
  const pinecone = { index: mockIndex } as unknown as Pinecone;
  const embedder = { embed: jest.fn().mockResolvedValue([0.1, 0.2, 0.3]) };
  const indexNames = { conversations: 'test-conversations', pricing: 'test-pricing' };

  beforeEach(() => {
    mockQuery.mockReset();
    mockIndex.mockClear();
  });

  it('should return nothing without a client', async () => {
    const service = new RetrievalService(null, embedder, indexNames);

    expect(await service.retrieveSimilar('πόσο κάνει')).toEqual([]);
  });

  it('should keep matches above the similarity threshold', async () => {
    mockQuery.mockResolvedValue({ matches: [match('a', 0.9), match('b', 0.8), match('c', 0.7)] });
    const service = new RetrievalService(pinecone, embedder, indexNames);

    const examples = await service.retrieveSimilar('πόσο κάνει', { intent: 'pricing' });

    expect(examples).toEqual([
      { query: 'query a', response: 'response a', similarity: 0.9, intent: 'pricing' },
      { query: 'query b', response: 'response b', similarity: 0.8, intent: 'pricing' },
    ]);
    expect(mockIndex).toHaveBeenCalledWith('test-conversations');
    expect(mockQuery).toHaveBeenCalledTimes(1);
    expect(mockQuery).toHaveBeenCalledWith({
      vector: [0.1, 0.2, 0.3],
      topK: 3,
      includeMetadata: true,
      filter: { intent: { $eq: 'pricing' } },
    });
  });

  it('should widen to an unfiltered query when the intent has too few matches', async () => {
    mockQuery
      .mockResolvedValueOnce({ matches: [match('a', 0.9)] })
      .mockResolvedValueOnce({ matches: [match('a', 0.9), match('d', 0.85, 'other'), match('e', 0.8, 'other')] });
    const service = new RetrievalService(pinecone, embedder, indexNames);

    const examples = await service.retrieveSimilar('πόσο κάνει', { intent: 'pricing' });

    expect(examples.map((e) => e.query)).toEqual(['query a', 'query d', 'query e']);
    expect(mockQuery).toHaveBeenLastCalledWith({ vector: [0.1, 0.2, 0.3], topK: 3, includeMetadata: true, filter: undefined });
  });

  it('should degrade to no examples on failure', async () => {
    mockQuery.mockRejectedValue(new Error('index not found'));
    const service = new RetrievalService(pinecone, embedder, indexNames);

    expect(await service.retrieveSimilar('πόσο κάνει', { index: 'pricing' })).toEqual([]);
  });
});

import { Test } from '@nestjs/testing';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { GRAPH_STORE } from '../stores/neo4j-graph.store';
import {
  QdrantStoreService,
  type StoredChunk,
} from '../stores/qdrant-store.service';
import { HybridRetrieverService } from './hybrid-retriever.service';

function stored(chunkId: string, content: string): StoredChunk {
  return {
    chunkId,
    url: `https://example.com/${chunkId}`,
    title: chunkId.toUpperCase(),
    section: 'Docs',
    content,
    chunkIndex: 0,
    crawledAt: '2024-01-01T00:00:00.000Z',
    score: 0,
  };
}

describe('HybridRetrieverService', () => {
  const a = stored('a', 'cache ttl defaults');
  const b = stored('b', 'installing the service');
  const c = stored('c', 'cache eviction');

  let qdrantStore: {
    searchDense: jest.Mock;
    searchText: jest.Mock;
    getChunks: jest.Mock;
  };
  let graphStore: { relatedChunks: jest.Mock };
  let retriever: HybridRetrieverService;

  beforeEach(async () => {
    qdrantStore = {
      searchDense: jest.fn().mockResolvedValue([a, b]),
      searchText: jest.fn().mockResolvedValue([b, c, a]),
      getChunks: jest.fn().mockResolvedValue([c]),
    };
    graphStore = {
      relatedChunks: jest
        .fn()
        .mockResolvedValue([{ chunkId: 'c', weight: 2 }]),
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        HybridRetrieverService,
        { provide: QdrantStoreService, useValue: qdrantStore },
        {
          provide: EmbeddingProviderFactory,
          useValue: {
            getEmbeddingModel: () => ({
              embedQuery: async (): Promise<number[]> => [1, 0],
            }),
          },
        },
        { provide: GRAPH_STORE, useValue: graphStore },
      ],
    }).compile();

    retriever = moduleRef.get(HybridRetrieverService);
  });

  it('fuses vector, graph and lexical lists by weight', async () => {
    const hits = await retriever.retrieve({
      query: 'cache ttl',
      weights: { vector: 0.6, graph: 0.3, lexical: 0.1 },
      topK: 3,
      collection: 'docs',
    });

    expect(hits.map((hit) => hit.chunkId)).toEqual(['a', 'b', 'c']);
    expect(hits[0].sources).toEqual(['vector', 'lexical']);
    expect(hits[0].score).toBeCloseTo(0.6 / 61 + 0.1 / 61, 12);
    expect(hits[2].sources).toEqual(['graph', 'lexical']);
    expect(graphStore.relatedChunks).toHaveBeenCalledWith(['a', 'b'], 6);
    expect(qdrantStore.searchText).toHaveBeenCalledWith(
      'docs',
      ['cache', 'ttl'],
      30,
    );
  });

  it('never queries a source whose weight is zero', async () => {
    const hits = await retriever.retrieve({
      query: 'cache ttl',
      weights: { vector: 0.857, graph: 0, lexical: 0.143 },
      topK: 5,
      collection: 'docs',
    });

    expect(graphStore.relatedChunks).not.toHaveBeenCalled();
    expect(hits.every((hit) => !hit.sources.includes('graph'))).toBe(true);
  });

  it('degrades to vector results when lexical search fails', async () => {
    qdrantStore.searchText.mockRejectedValue(new Error('index missing'));

    const hits = await retriever.retrieve({
      query: 'cache ttl',
      weights: { vector: 0.9, graph: 0, lexical: 0.1 },
      topK: 5,
      collection: 'docs',
    });

    expect(hits.map((hit) => hit.chunkId)).toEqual(['a', 'b']);
  });

  it('propagates vector search failures', async () => {
    qdrantStore.searchDense.mockRejectedValue(new Error('qdrant down'));

    await expect(
      retriever.retrieve({
        query: 'cache ttl',
        weights: { vector: 1, graph: 0, lexical: 0 },
        topK: 5,
        collection: 'docs',
      }),
    ).rejects.toThrow('qdrant down');
  });
});

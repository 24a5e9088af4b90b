import { queryTerms, rankByTerms, termScore } from './lexical-ranking';
import { RRF_K, weightedReciprocalRankFusion } from './weighted-fusion';

function chunk(chunkId: string, content = chunkId) {
  return { chunkId, url: 'https://example.com/', title: 'Example', content };
}

describe('weightedReciprocalRankFusion', () => {
  it('adds weighted reciprocal ranks across sources', () => {
    const fused = weightedReciprocalRankFusion(
      [
        { source: 'vector', weight: 0.6, results: [chunk('a'), chunk('b')] },
        { source: 'lexical', weight: 0.4, results: [chunk('b'), chunk('c')] },
      ],
      10,
    );

    expect(fused.map((entry) => entry.chunk.chunkId)).toEqual(['b', 'a', 'c']);
    expect(fused[0].score).toBeCloseTo(0.6 / (RRF_K + 2) + 0.4 / (RRF_K + 1), 12);
    expect(fused[0].sources).toEqual(['vector', 'lexical']);
    expect(fused[1].score).toBeCloseTo(0.6 / (RRF_K + 1), 12);
    expect(fused[2].sources).toEqual(['lexical']);
  });

  it('skips zero-weight sources entirely', () => {
    const fused = weightedReciprocalRankFusion(
      [
        { source: 'vector', weight: 1, results: [chunk('a')] },
        { source: 'graph', weight: 0, results: [chunk('g')] },
      ],
      10,
    );

    expect(fused.map((entry) => entry.chunk.chunkId)).toEqual(['a']);
  });

  it('truncates to topK', () => {
    const fused = weightedReciprocalRankFusion(
      [
        {
          source: 'vector',
          weight: 1,
          results: [chunk('a'), chunk('b'), chunk('c')],
        },
      ],
      2,
    );
    expect(fused).toHaveLength(2);
  });
});

describe('lexical ranking', () => {
  it('extracts distinct lowercase terms of three or more characters', () => {
    expect(queryTerms('How do I Configure the cache? cache!')).toEqual([
      'how',
      'configure',
      'the',
      'cache',
    ]);
  });

  it('ranks by term coverage and drops non-matching chunks', () => {
    const terms = ['cache', 'ttl'];
    const ranked = rankByTerms(
      [
        chunk('none', 'nothing relevant here'),
        chunk('one', 'cache settings'),
        chunk('both', 'cache ttl is one hour'),
      ],
      terms,
    );

    expect(ranked.map((entry) => entry.chunkId)).toEqual(['both', 'one']);
    expect(termScore('cache cache', ['cache'])).toBeCloseTo(1 + Math.log(2), 12);
  });
});

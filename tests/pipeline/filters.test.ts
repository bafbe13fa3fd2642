import { describe, it, expect } from 'vitest';
import {
  POLICY_FLAGS,
  PolicyFilter,
  SimilarityClusterFilter,
  SourceDiversityFilter,
  TitleIdentityFilter,
  UrlIdentityFilter,
  absorbInto,
  pickRepresentative,
} from '../../src/pipeline/filters.js';
import { SimilarityGraph } from '../../src/pipeline/similarity.js';
import { createCompleteScores, createMockCandidate, createMockQuery } from './types.test.js';

const policy = new PolicyFilter({ minIntegrity: 0.5, minCredibility: 0.6, maxSpam: 0.7 });

function memberIndexes(c: { cluster: { members: { arrivalIndex: number }[] } }): number[] {
  return c.cluster.members.map((m) => m.arrivalIndex);
}

describe('UrlIdentityFilter', () => {
  const filter = new UrlIdentityFilter();

  it('should keep the first-seen article per normalized URL', async () => {
    const candidates = [
      createMockCandidate({ id: 'first', url: 'https://News.Example.com/a/?utm_source=feed#top', title: 'one' }, 0),
      createMockCandidate({ id: 'second', url: 'https://news.example.com/a', title: 'two' }, 1),
      createMockCandidate({ id: 'third', url: 'https://news.example.com/b', title: 'three' }, 2),
    ];

    const result = await filter.filter(createMockQuery(), candidates);

    expect(result.kept.map((c) => c.article.id)).toEqual(['first', 'third']);
    expect(result.removed.map((c) => c.article.id)).toEqual(['second']);
    expect(result.kept[0].cluster).toEqual({
      representativeId: 'first',
      members: [
        { articleId: 'first', arrivalIndex: 0 },
        { articleId: 'second', arrivalIndex: 1 },
      ],
    });
  });

  it('should never group articles without a URL', async () => {
    const candidates = [
      createMockCandidate({ id: 'a', url: '' }, 0),
      createMockCandidate({ id: 'b', url: '   ' }, 1),
    ];

    const result = await filter.filter(createMockQuery(), candidates);
    expect(result.kept).toHaveLength(2);
    expect(result.removed).toHaveLength(0);
  });
});

describe('TitleIdentityFilter', () => {
  const filter = new TitleIdentityFilter();

  it('should collapse titles differing only in case and whitespace', async () => {
    const candidates = [
      createMockCandidate({ id: 'a', title: 'Budget Passes Final Vote', url: 'https://a.example.com/1' }, 0),
      createMockCandidate({ id: 'b', title: '  budget   passes final VOTE ', url: 'https://b.example.com/2' }, 1),
    ];

    const result = await filter.filter(createMockQuery(), candidates);
    expect(result.kept.map((c) => c.article.id)).toEqual(['a']);
    expect(memberIndexes(result.kept[0])).toEqual([0, 1]);
  });

  it('should never group empty titles', async () => {
    const candidates = [
      createMockCandidate({ id: 'a', title: '' }, 0),
      createMockCandidate({ id: 'b', title: '  ' }, 1),
    ];

    const result = await filter.filter(createMockQuery(), candidates);
    expect(result.kept).toHaveLength(2);
  });
});

describe('pickRepresentative', () => {
  it('should prefer the longest body', () => {
    const members = [
      createMockCandidate({ id: 'short', body: 'abc' }, 0),
      createMockCandidate({ id: 'long', body: 'abcdef' }, 1),
    ];
    expect(pickRepresentative(members).article.id).toBe('long');
  });

  it('should break ties by earliest arrival', () => {
    const members = [
      createMockCandidate({ id: 'early', body: 'same' }, 0),
      createMockCandidate({ id: 'late', body: 'four' }, 1),
    ];
    expect(pickRepresentative(members).article.id).toBe('early');
  });
});

describe('absorbInto', () => {
  it('should merge member lists in arrival order', () => {
    const survivor = createMockCandidate({ id: 'b' }, 2, {
      cluster: {
        representativeId: 'b',
        members: [
          { articleId: 'b', arrivalIndex: 2 },
          { articleId: 'e', arrivalIndex: 5 },
        ],
      },
    });
    const absorbed = createMockCandidate({ id: 'a' }, 0);

    expect(memberIndexes(absorbInto(survivor, [absorbed]))).toEqual([0, 2, 5]);
    expect(absorbInto(survivor, [absorbed]).cluster.representativeId).toBe('b');
  });
});

describe('SimilarityClusterFilter', () => {
  it('should cluster transitively and pick the longest body as representative', async () => {
    const candidates = [
      createMockCandidate(
        { id: 'A', title: 'storm hits coastal city power outage thousands', body: 'short body', url: 'https://x.example.com/a' },
        0,
      ),
      createMockCandidate(
        {
          id: 'B',
          title: 'storm coastal city power outage thousands repairs crews',
          body: 'the longest body of the three storm reports',
          url: 'https://x.example.com/b',
        },
        1,
      ),
      createMockCandidate(
        { id: 'C', title: 'storm coastal city power repairs crews continue', body: 'medium length body', url: 'https://x.example.com/c' },
        2,
      ),
      createMockCandidate(
        { id: 'D', title: 'central bank holds interest rates steady', url: 'https://x.example.com/d' },
        3,
      ),
    ];

    const result = await new SimilarityClusterFilter(new SimilarityGraph(), 0.6).filter(createMockQuery(), candidates);

    expect(result.kept.map((c) => c.article.id)).toEqual(['B', 'D']);
    expect(result.kept[0].cluster.representativeId).toBe('B');
    expect(result.kept[0].cluster.members.map((m) => m.articleId)).toEqual(['A', 'B', 'C']);
    expect(result.removed.map((c) => c.article.id)).toEqual(['A', 'C']);
  });

  it('should return an empty result for empty input', async () => {
    const result = await new SimilarityClusterFilter(new SimilarityGraph()).filter(createMockQuery(), []);
    expect(result).toEqual({ kept: [], removed: [] });
  });
});

describe('PolicyFilter', () => {
  it('should exclude low integrity and flag it', async () => {
    const c = createMockCandidate({ id: 'weak' }, 0, { scores: createCompleteScores({ integrity: 0.49 }) });
    const result = await policy.filter(createMockQuery(), [c]);

    expect(result.kept).toHaveLength(0);
    expect(result.removed[0].policyFlags).toEqual([POLICY_FLAGS.lowIntegrity]);
  });

  it('should exclude spam above the ceiling', async () => {
    const c = createMockCandidate({ id: 'spam' }, 0, { scores: createCompleteScores({ spam: 0.8 }) });
    const result = await policy.filter(createMockQuery(), [c]);

    expect(result.removed[0].policyFlags).toEqual([POLICY_FLAGS.spamDetected]);
  });

  it('should keep low credibility articles but flag them', async () => {
    const c = createMockCandidate({ id: 'dubious' }, 0, { scores: createCompleteScores({ credibility: 0.4 }) });
    const result = await policy.filter(createMockQuery(), [c]);

    expect(result.kept[0].policyFlags).toEqual([POLICY_FLAGS.suspiciousCredibility]);
    expect(result.removed).toHaveLength(0);
  });

  it('should keep articles exactly at the thresholds', async () => {
    const c = createMockCandidate({ id: 'edge' }, 0, {
      scores: createCompleteScores({ integrity: 0.5, spam: 0.7, credibility: 0.6 }),
    });
    const result = await policy.filter(createMockQuery(), [c]);

    expect(result.kept[0].policyFlags).toEqual([]);
  });

  it('should refuse candidates with an incomplete score vector', async () => {
    const c = createMockCandidate({ id: 'unscored' }, 0);
    await expect(policy.filter(createMockQuery(), [c])).rejects.toThrow('Incomplete score vector for article unscored');
  });
});

describe('SourceDiversityFilter', () => {
  const filter = new SourceDiversityFilter();
  const sources = ['s1', 's1', 's2', 's1', 's1'];
  const candidates = sources.map((sourceId, i) => createMockCandidate({ id: `a${i}`, sourceId }, i));

  it('should cap each source in a single order-preserving pass', async () => {
    const result = await filter.filter(createMockQuery({ diversityCap: 2 }), candidates);

    expect(result.kept.map((c) => c.article.id)).toEqual(['a0', 'a1', 'a2']);
    expect(result.removed.map((c) => c.article.id)).toEqual(['a3', 'a4']);
  });

  it('should remove everything with a cap of zero', async () => {
    const result = await filter.filter(createMockQuery({ diversityCap: 0 }), candidates);
    expect(result.kept).toEqual([]);
  });
});

import { describe, it, expect } from 'vitest';
import { PipelineStage, SOURCE_TIERS, TIER_TRUST } from '../../src/pipeline/types.js';
import type {
  ArticleCandidate,
  NormalizedArticle,
  RankingQuery,
  ScoreVector,
  SourceTrust,
  SourceTrustLookup,
} from '../../src/pipeline/types.js';
import { createCandidate } from '../../src/pipeline/sources.js';

describe('Pipeline Types', () => {
  describe('PipelineStage enum', () => {
    it('should define all pipeline stages', () => {
      expect(PipelineStage.Source).toBe('Source');
      expect(PipelineStage.Hydrator).toBe('Hydrator');
      expect(PipelineStage.Filter).toBe('Filter');
      expect(PipelineStage.Scorer).toBe('Scorer');
      expect(PipelineStage.PolicyFilter).toBe('PolicyFilter');
      expect(PipelineStage.Selector).toBe('Selector');
      expect(PipelineStage.PostSelectionFilter).toBe('PostSelectionFilter');
      expect(PipelineStage.SideEffect).toBe('SideEffect');
    });

    it('should have 8 pipeline stages', () => {
      expect(Object.keys(PipelineStage)).toHaveLength(8);
    });
  });

  describe('TIER_TRUST', () => {
    it('should have a trust value for every tier', () => {
      for (const tier of SOURCE_TIERS) {
        expect(typeof TIER_TRUST[tier]).toBe('number');
      }
    });

    it('should decrease from whitelist to blacklist', () => {
      const values = SOURCE_TIERS.map((tier) => TIER_TRUST[tier]);
      expect(values).toEqual([0.95, 0.85, 0.65, 0.4, 0]);
    });
  });
});

// --- Test helpers for use in other test files ---

export const TEST_NOW = Date.parse('2026-01-15T12:00:00Z');

export function createMockArticle(overrides: Partial<NormalizedArticle> = {}): NormalizedArticle {
  return {
    id: 'article_1',
    sourceId: 'daily_herald',
    sourceName: 'Daily Herald',
    title: 'city council approves new transit budget',
    body: 'The city council approved the transit budget on Tuesday after a long debate.',
    publishedAt: '2026-01-15T06:00:00Z',
    url: 'https://news.example.com/transit-budget',
    engagement: null,
    category: 'politics',
    tags: [],
    ...overrides,
  };
}

export function createMockQuery(overrides: Partial<RankingQuery> = {}): RankingQuery {
  return {
    requestId: 'test_req_123',
    articles: [],
    preset: 'quality',
    weights: { popularity: 0.15, relevance: 0.3, quality: 0.4, credibility: 0.15 },
    limit: 20,
    offset: 0,
    diversityCap: 3,
    relevance: {},
    now: TEST_NOW,
    ...overrides,
  };
}

export function createMockCandidate(
  article: Partial<NormalizedArticle> = {},
  arrivalIndex = 0,
  overrides: Partial<ArticleCandidate> = {},
): ArticleCandidate {
  return { ...createCandidate(createMockArticle(article), arrivalIndex), ...overrides };
}

/** A fully populated score vector; override single fields per test. */
export function createCompleteScores(overrides: ScoreVector = {}): ScoreVector {
  return {
    integrity: 0.9,
    titleBodyConsistency: 1,
    contamination: 0,
    spam: 0,
    integrityFlags: [],
    credibility: 0.85,
    sourceTrust: 0.85,
    corroborationCount: 0,
    credibilityFlags: [],
    quality: 0.5,
    evidence: 0.5,
    sensationalismPenalty: 0,
    qualityFlags: [],
    popularity: 0.5,
    trendingVelocity: 0,
    popularityBasis: 'freshness',
    ...overrides,
  };
}

export function createTrustLookup(entries: SourceTrust[]): SourceTrustLookup {
  const bySource = new Map(entries.map((e) => [e.sourceId, e]));
  return { getTrust: (sourceId) => bySource.get(sourceId) };
}

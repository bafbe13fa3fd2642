/**
 * Candidate scorers. Each one writes a disjoint group of score fields, so the
 * pipeline can run them concurrently and merge the results:
 *
 *   IntegrityScorer   -> integrity, titleBodyConsistency, contamination, spam
 *   CredibilityScorer -> credibility, sourceTrust, corroborationCount
 *   QualityScorer     -> quality, evidence, sensationalismPenalty
 *   PopularityScorer  -> popularity, trendingVelocity
 */

import type { Scorer } from './interfaces.js';
import type { ArticleCandidate, PopularityWeights, RankingQuery } from './types.js';
import { assessIntegrity } from './integrity.js';
import { scoreCredibility, scoreQuality } from './credibility.js';
import { DEFAULT_POPULARITY_WEIGHTS, engagementMaxima, scorePopularity } from './popularity.js';
import { SimilarityGraph } from './similarity.js';

/** Join per-scorer outputs; later scorers never overwrite earlier fields. */
export function mergeScoreVectors(base: ArticleCandidate, scored: ArticleCandidate[]): ArticleCandidate {
  const scores = { ...base.scores };
  for (const candidate of scored) {
    for (const [field, value] of Object.entries(candidate.scores)) {
      if (!(field in scores)) Object.assign(scores, { [field]: value });
    }
  }
  return { ...base, scores };
}

export class IntegrityScorer implements Scorer<RankingQuery, ArticleCandidate> {
  name = 'IntegrityScorer';

  enable(): boolean {
    return true;
  }

  async score(_query: RankingQuery, candidates: ArticleCandidate[]): Promise<ArticleCandidate[]> {
    return candidates.map((c) => ({
      ...c,
      scores: { ...c.scores, ...assessIntegrity(c.article) },
    }));
  }
}

/**
 * Tier trust plus corroboration from other sources in the batch. Shares the
 * similarity graph built during clustering.
 */
export class CredibilityScorer implements Scorer<RankingQuery, ArticleCandidate> {
  name = 'CredibilityScorer';
  private graph: SimilarityGraph;
  private corroborationThreshold: number;

  constructor(graph: SimilarityGraph, corroborationThreshold = 0.5) {
    this.graph = graph;
    this.corroborationThreshold = corroborationThreshold;
  }

  enable(): boolean {
    return true;
  }

  async score(_query: RankingQuery, candidates: ArticleCandidate[]): Promise<ArticleCandidate[]> {
    return candidates.map((c) => ({
      ...c,
      scores: {
        ...c.scores,
        ...scoreCredibility(c, candidates, this.graph, this.corroborationThreshold),
      },
    }));
  }
}

export class QualityScorer implements Scorer<RankingQuery, ArticleCandidate> {
  name = 'QualityScorer';

  enable(): boolean {
    return true;
  }

  async score(_query: RankingQuery, candidates: ArticleCandidate[]): Promise<ArticleCandidate[]> {
    return candidates.map((c) => ({
      ...c,
      scores: { ...c.scores, ...scoreQuality(c.article) },
    }));
  }
}

export class PopularityScorer implements Scorer<RankingQuery, ArticleCandidate> {
  name = 'PopularityScorer';
  private halfLifeHours: number;
  private weights: PopularityWeights;

  constructor(halfLifeHours = 24, weights: PopularityWeights = DEFAULT_POPULARITY_WEIGHTS) {
    this.halfLifeHours = halfLifeHours;
    this.weights = weights;
  }

  enable(): boolean {
    return true;
  }

  async score(query: RankingQuery, candidates: ArticleCandidate[]): Promise<ArticleCandidate[]> {
    const maxima = engagementMaxima(candidates.map((c) => c.article));
    const options = { halfLifeHours: this.halfLifeHours, weights: this.weights, now: query.now };

    return candidates.map((c) => ({
      ...c,
      scores: { ...c.scores, ...scorePopularity(c.article, maxima, options) },
    }));
  }
}

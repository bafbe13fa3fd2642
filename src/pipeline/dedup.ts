/**
 * Standalone deduplication: stages A-C without scoring or ranking.
 * Running it again on its own representatives changes nothing.
 */

import type { Filter } from './interfaces.js';
import type { ArticleCandidate, DedupCluster, NormalizedArticle } from './types.js';
import { SimilarityClusterFilter, TitleIdentityFilter, UrlIdentityFilter } from './filters.js';
import { SimilarityGraph } from './similarity.js';
import { createCandidate } from './sources.js';

export interface DedupOptions {
  similarityThreshold?: number;
}

export interface DedupResult {
  representatives: NormalizedArticle[];
  clusters: DedupCluster[];
}

export async function deduplicate(
  articles: readonly NormalizedArticle[],
  options: DedupOptions = {},
): Promise<DedupResult> {
  const stages: Filter<undefined, ArticleCandidate>[] = [
    new UrlIdentityFilter<undefined>(),
    new TitleIdentityFilter<undefined>(),
    new SimilarityClusterFilter<undefined>(new SimilarityGraph(), options.similarityThreshold ?? 0.6),
  ];

  let candidates = articles.map(createCandidate);
  for (const stage of stages) {
    candidates = (await stage.filter(undefined, candidates)).kept;
  }

  return {
    representatives: candidates.map((c) => c.article),
    clusters: candidates.map((c) => c.cluster),
  };
}

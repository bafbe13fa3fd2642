/**
 * Ranking pipeline. Assembles the concrete components on the candidate
 * pipeline framework:
 *
 *   1. Source:        BatchSource (caller's articles, arrival order)
 *   2. Hydrators:     SourceTrustHydrator, RelevanceHydrator
 *   3. Filters:       UrlIdentityFilter -> TitleIdentityFilter -> SimilarityClusterFilter
 *   4. Scorers:       IntegrityScorer, CredibilityScorer, QualityScorer, PopularityScorer
 *   5. Policy:        PolicyFilter
 *   6. Selection:     PresetSelector
 *   7. Post-select:   SourceDiversityFilter
 *   8. Side effects:  MetricsLogSideEffect
 *
 * Clustering and credibility share one SimilarityGraph, so a pipeline
 * instance serves a single invocation.
 */

import { CandidatePipeline } from './candidate-pipeline.js';
import type { ArticleCandidate, RankingQuery, SourceTrustLookup } from './types.js';
import { BatchSource } from './sources.js';
import { RelevanceHydrator, SourceTrustHydrator } from './hydrators.js';
import {
  PolicyFilter,
  SimilarityClusterFilter,
  SourceDiversityFilter,
  TitleIdentityFilter,
  UrlIdentityFilter,
} from './filters.js';
import {
  CredibilityScorer,
  IntegrityScorer,
  PopularityScorer,
  QualityScorer,
  mergeScoreVectors,
} from './scorers.js';
import { PresetSelector } from './selector.js';
import { MetricsLogSideEffect } from './side-effects.js';
import { SimilarityGraph } from './similarity.js';
import type { EngineConfig } from '../config/engine.js';

export function createRankingPipeline(
  config: EngineConfig,
  lookup: SourceTrustLookup,
): CandidatePipeline<RankingQuery, ArticleCandidate> {
  const graph = new SimilarityGraph();

  return new CandidatePipeline<RankingQuery, ArticleCandidate>({
    name: 'NewsRankingPipeline',

    sources: [new BatchSource()],

    hydrators: [new SourceTrustHydrator(lookup), new RelevanceHydrator()],

    filters: [
      new UrlIdentityFilter(),
      new TitleIdentityFilter(),
      new SimilarityClusterFilter(graph, config.similarityThreshold),
    ],

    scorers: [
      new IntegrityScorer(),
      new CredibilityScorer(graph, config.corroborationThreshold),
      new QualityScorer(),
      new PopularityScorer(config.freshnessHalfLifeHours, config.popularityWeights),
    ],
    mergeScored: mergeScoreVectors,

    policyFilters: [new PolicyFilter(config.policy)],

    selector: new PresetSelector(),

    postSelectionFilters: [new SourceDiversityFilter()],

    sideEffects: [new MetricsLogSideEffect()],
  });
}

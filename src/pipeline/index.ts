/**
 * Pipeline module: deduplication and multi-dimensional ranking of news
 * articles on a staged candidate pipeline.
 */

// Core pipeline framework
export { CandidatePipeline } from './candidate-pipeline.js';
export type { CandidatePipelineConfig, PipelineQuery } from './candidate-pipeline.js';

export type { Source, Hydrator, Filter, Scorer, Selector, SideEffect } from './interfaces.js';

// Types
export { PipelineStage, SOURCE_TIERS, TIER_TRUST } from './types.js';
export type {
  ArticleCandidate,
  CompleteScoreVector,
  DedupCluster,
  FilterResult,
  NormalizedArticle,
  PipelineMetrics,
  PipelineResult,
  PresetWeights,
  RankedArticle,
  RankingQuery,
  ScoreVector,
  SourceTier,
  SourceTrust,
  SourceTrustLookup,
} from './types.js';

// Scoring functions
export { assessIntegrity } from './integrity.js';
export { scoreCredibility, scoreQuality } from './credibility.js';
export { scorePopularity } from './popularity.js';
export { deduplicate } from './dedup.js';
export type { DedupOptions, DedupResult } from './dedup.js';

// Concrete components
export { BatchSource } from './sources.js';
export { SourceTrustHydrator, RelevanceHydrator } from './hydrators.js';
export {
  UrlIdentityFilter,
  TitleIdentityFilter,
  SimilarityClusterFilter,
  PolicyFilter,
  SourceDiversityFilter,
} from './filters.js';
export { IntegrityScorer, CredibilityScorer, QualityScorer, PopularityScorer } from './scorers.js';
export { PresetSelector } from './selector.js';
export { MetricsLogSideEffect } from './side-effects.js';

export { createRankingPipeline } from './ranking-pipeline.js';

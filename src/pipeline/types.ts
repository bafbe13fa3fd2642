/**
 * Core types for the ranking pipeline.
 *
 * Articles enter as immutable `NormalizedArticle` records, travel through the
 * stages wrapped in an `ArticleCandidate`, and leave as `RankedArticle`.
 */

/**
 * Pipeline stages in execution order:
 * Source -> Hydrator -> Filter -> Scorer -> PolicyFilter -> Selector -> PostSelectionFilter
 */
export enum PipelineStage {
  Source = 'Source',
  Hydrator = 'Hydrator',
  Filter = 'Filter',
  Scorer = 'Scorer',
  PolicyFilter = 'PolicyFilter',
  Selector = 'Selector',
  PostSelectionFilter = 'PostSelectionFilter',
  SideEffect = 'SideEffect',
}

export const SOURCE_TIERS = ['whitelist', 'tier1', 'tier2', 'tier3', 'blacklist'] as const;

export type SourceTier = (typeof SOURCE_TIERS)[number];

/** Trust contributed by a source's tier, before corroboration. */
export const TIER_TRUST: Record<SourceTier, number> = {
  whitelist: 0.95,
  tier1: 0.85,
  tier2: 0.65,
  tier3: 0.4,
  blacklist: 0.0,
};

export interface EngagementCounters {
  views?: number | null;
  shares?: number | null;
  comments?: number | null;
}

/** Article as produced by the external normalizer. Never mutated. */
export interface NormalizedArticle {
  readonly id: string;
  readonly sourceId: string;
  readonly sourceName?: string | null;
  readonly title: string;
  readonly body: string;
  readonly publishedAt?: string | null;
  readonly url: string;
  readonly engagement?: Readonly<EngagementCounters> | null;
  readonly category?: string | null;
  readonly tags: readonly string[];
}

export interface SourceTrust {
  sourceId: string;
  tier: SourceTier;
  /** Registry base credibility on a 0-100 scale. */
  baseTrust: number;
}

/** Narrow read interface onto the external source registry. */
export interface SourceTrustLookup {
  getTrust(sourceId: string): SourceTrust | undefined;
}

export interface ClusterMember {
  articleId: string;
  arrivalIndex: number;
}

/** Articles judged duplicates of one another; members are in arrival order. */
export interface DedupCluster {
  representativeId: string;
  members: ClusterMember[];
}

export interface IntegrityScores {
  integrity: number;
  titleBodyConsistency: number;
  contamination: number;
  spam: number;
  integrityFlags: string[];
}

export interface CredibilityScores {
  credibility: number;
  sourceTrust: number;
  corroborationCount: number;
  credibilityFlags: string[];
}

export interface QualityScores {
  quality: number;
  evidence: number;
  sensationalismPenalty: number;
  qualityFlags: string[];
}

export type PopularityBasis = 'engagement' | 'freshness' | 'default';

export interface PopularityScores {
  popularity: number;
  trendingVelocity: number;
  popularityBasis: PopularityBasis;
}

/** Score fields as they accumulate stage by stage. */
export type ScoreVector = Partial<IntegrityScores & CredibilityScores & QualityScores & PopularityScores>;

/** Every scoring stage has contributed, plus the relevance used at ranking time. */
export type CompleteScoreVector = IntegrityScores &
  CredibilityScores &
  QualityScores &
  PopularityScores & { relevance: number };

/** A candidate article flowing through the pipeline. */
export interface ArticleCandidate {
  article: NormalizedArticle;
  arrivalIndex: number;
  normalizedUrl: string;
  cluster: DedupCluster;
  trust: SourceTrust | null;
  scores: ScoreVector;
  relevance: number | null;
  finalScore: number;
  policyFlags: string[];
}

export interface PresetWeights {
  popularity: number;
  relevance: number;
  quality: number;
  credibility: number;
}

export interface PopularityWeights {
  views: number;
  shares: number;
  comments: number;
}

export interface PolicyThresholds {
  minIntegrity: number;
  minCredibility: number;
  maxSpam: number;
}

/** Query context for one ranking invocation. */
export interface RankingQuery {
  requestId: string;
  articles: readonly NormalizedArticle[];
  preset: string;
  weights: PresetWeights;
  limit: number;
  offset: number;
  diversityCap: number;
  /** Caller-supplied relevance per article id, in [0, 1]. */
  relevance: Readonly<Record<string, number>>;
  /** Reference time (epoch ms) for freshness and velocity. */
  now: number;
}

export interface RankedArticle {
  article: NormalizedArticle;
  cluster: DedupCluster;
  scores: CompleteScoreVector;
  finalScore: number;
  rankPosition: number;
  policyFlags: string[];
}

/** Result of a filter stage: kept and removed candidate sets. */
export interface FilterResult<C> {
  kept: C[];
  removed: C[];
}

/** Output returned by the pipeline after all stages execute. */
export interface PipelineResult<Q, C> {
  query: Q;
  retrievedCandidates: C[];
  filteredCandidates: C[];
  /** Removed candidates keyed by the filter stage that removed them. */
  removedByStage: Partial<Record<PipelineStage, C[]>>;
  /** Candidates as they left the scoring stage. */
  scoredCandidates: C[];
  selectedCandidates: C[];
  pipelineMetrics: PipelineMetrics;
}

/** Timing and count metrics for observability. */
export interface PipelineMetrics {
  totalMs: number;
  stageMetrics: Record<string, { durationMs: number; candidateCount: number }>;
}

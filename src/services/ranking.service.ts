import { createRankingPipeline } from '../pipeline/ranking-pipeline.js';
import { requireCompleteScores } from '../pipeline/score-vector.js';
import { PipelineStage } from '../pipeline/types.js';
import type {
  ArticleCandidate,
  DedupCluster,
  NormalizedArticle,
  PipelineMetrics,
  RankedArticle,
  RankingQuery,
  SourceTrustLookup,
} from '../pipeline/types.js';
import type { EngineConfig } from '../config/engine.js';
import { AppError } from '../middleware/errorHandler.js';
import { logger } from '../utils/logger.js';
import { generateRequestId } from '../utils/helpers.js';

export interface RankingRequest {
  articles: readonly NormalizedArticle[];
  preset?: string;
  limit?: number;
  offset?: number;
  diversityCap?: number;
  /** Relevance per article id, in [0, 1]. Missing ids fall back to quality. */
  relevance?: Readonly<Record<string, number>>;
  /** Reference time (ISO-8601 or epoch ms); defaults to the invocation start. */
  now?: string | number;
  requestId?: string;
}

export type ExclusionReason = 'policy' | 'diversity';

export interface ExcludedArticle {
  articleId: string;
  sourceId: string;
  reason: ExclusionReason;
  policyFlags: string[];
}

export interface RankingMetrics extends PipelineMetrics {
  inputCount: number;
  clusterCount: number;
  duplicateCount: number;
  rankedCount: number;
}

export interface RankingResult {
  requestId: string;
  preset: string;
  ranked: RankedArticle[];
  clusters: DedupCluster[];
  excluded: ExcludedArticle[];
  metrics: RankingMetrics;
}

function nonNegativeInteger(value: number, field: string): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new AppError(400, 'INVALID_CONFIG', `${field} must be a non-negative integer`, { field, value });
  }
  return value;
}

function resolveNow(now: string | number | undefined): number {
  if (now === undefined) return Date.now();
  const ms = typeof now === 'number' ? now : Date.parse(now);
  if (!Number.isFinite(ms)) {
    throw new AppError(400, 'INVALID_CONFIG', 'now must be a valid timestamp', { field: 'now', value: now });
  }
  return ms;
}

function toExcluded(candidates: ArticleCandidate[] | undefined, reason: ExclusionReason): ExcludedArticle[] {
  return (candidates ?? []).map((c) => ({
    articleId: c.article.id,
    sourceId: c.article.sourceId,
    reason,
    policyFlags: c.policyFlags,
  }));
}

/**
 * Deduplicates, scores, filters and ranks one batch of articles.
 *
 * Request parameters are validated before any processing: a bad limit,
 * offset, cap or reference time raises INVALID_CONFIG and an unknown preset
 * raises UNKNOWN_PRESET.
 */
export class RankingEngine {
  private config: EngineConfig;
  private lookup: SourceTrustLookup;

  constructor(config: EngineConfig, lookup: SourceTrustLookup) {
    this.config = config;
    this.lookup = lookup;
  }

  get presets(): EngineConfig['presets'] {
    return this.config.presets;
  }

  async rank(request: RankingRequest): Promise<RankingResult> {
    const query = this.buildQuery(request);
    const pipeline = createRankingPipeline(this.config, this.lookup);
    const result = await pipeline.execute(query);

    const ranked: RankedArticle[] = result.selectedCandidates.map((c, i) => ({
      article: c.article,
      cluster: c.cluster,
      scores: requireCompleteScores(c),
      finalScore: c.finalScore,
      rankPosition: query.offset + i + 1,
      policyFlags: c.policyFlags,
    }));

    const clusters = result.scoredCandidates.map((c) => c.cluster);
    const excluded = [
      ...toExcluded(result.removedByStage[PipelineStage.PolicyFilter], 'policy'),
      ...toExcluded(result.removedByStage[PipelineStage.PostSelectionFilter], 'diversity'),
    ];

    logger.debug(
      { requestId: query.requestId, ranked: ranked.length, excluded: excluded.length },
      'Ranking complete',
    );

    return {
      requestId: query.requestId,
      preset: query.preset,
      ranked,
      clusters,
      excluded,
      metrics: {
        ...result.pipelineMetrics,
        inputCount: request.articles.length,
        clusterCount: clusters.length,
        duplicateCount: result.removedByStage[PipelineStage.Filter]?.length ?? 0,
        rankedCount: ranked.length,
      },
    };
  }

  private buildQuery(request: RankingRequest): RankingQuery {
    const limit = nonNegativeInteger(request.limit ?? this.config.defaultLimit, 'limit');
    const offset = nonNegativeInteger(request.offset ?? 0, 'offset');
    const diversityCap = nonNegativeInteger(request.diversityCap ?? this.config.diversityCap, 'diversityCap');

    const preset = request.preset ?? this.config.defaultPreset;
    if (!Object.hasOwn(this.config.presets, preset)) {
      throw new AppError(400, 'UNKNOWN_PRESET', `Unknown ranking preset: ${preset}`, {
        preset,
        available: Object.keys(this.config.presets),
      });
    }

    return {
      requestId: request.requestId ?? generateRequestId(),
      articles: request.articles,
      preset,
      weights: this.config.presets[preset],
      limit,
      offset,
      diversityCap,
      relevance: request.relevance ?? {},
      now: resolveNow(request.now),
    };
  }
}

import type { ArticleCandidate, CompleteScoreVector, ScoreVector } from './types.js';

/**
 * The score vector once integrity, credibility, quality and popularity have
 * all been written, with relevance resolved (caller-supplied, else quality).
 * Returns null while any stage is still missing.
 */
export function completeScores(candidate: ArticleCandidate): CompleteScoreVector | null {
  const s: ScoreVector = candidate.scores;
  if (
    s.integrity === undefined ||
    s.titleBodyConsistency === undefined ||
    s.contamination === undefined ||
    s.spam === undefined ||
    s.integrityFlags === undefined ||
    s.credibility === undefined ||
    s.sourceTrust === undefined ||
    s.corroborationCount === undefined ||
    s.credibilityFlags === undefined ||
    s.quality === undefined ||
    s.evidence === undefined ||
    s.sensationalismPenalty === undefined ||
    s.qualityFlags === undefined ||
    s.popularity === undefined ||
    s.trendingVelocity === undefined ||
    s.popularityBasis === undefined
  ) {
    return null;
  }

  return {
    integrity: s.integrity,
    titleBodyConsistency: s.titleBodyConsistency,
    contamination: s.contamination,
    spam: s.spam,
    integrityFlags: s.integrityFlags,
    credibility: s.credibility,
    sourceTrust: s.sourceTrust,
    corroborationCount: s.corroborationCount,
    credibilityFlags: s.credibilityFlags,
    quality: s.quality,
    evidence: s.evidence,
    sensationalismPenalty: s.sensationalismPenalty,
    qualityFlags: s.qualityFlags,
    popularity: s.popularity,
    trendingVelocity: s.trendingVelocity,
    popularityBasis: s.popularityBasis,
    relevance: candidate.relevance ?? s.quality,
  };
}

export function requireCompleteScores(candidate: ArticleCandidate): CompleteScoreVector {
  const scores = completeScores(candidate);
  if (!scores) {
    throw new Error(`Incomplete score vector for article ${candidate.article.id}`);
  }
  return scores;
}

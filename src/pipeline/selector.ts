/**
 * Preset selector: combines the score vector into a 0-100 final score and
 * orders candidates deterministically.
 */

import type { Selector } from './interfaces.js';
import type { ArticleCandidate, CompleteScoreVector, PresetWeights, RankingQuery } from './types.js';
import { requireCompleteScores } from './score-vector.js';
import { clamp, roundTo } from '../utils/helpers.js';

/** 100 · Σ score·weight, clamped to [0, 100] and rounded to one decimal. */
export function combineScores(scores: CompleteScoreVector, weights: PresetWeights): number {
  const raw =
    scores.popularity * weights.popularity +
    scores.relevance * weights.relevance +
    scores.quality * weights.quality +
    scores.credibility * weights.credibility;
  return roundTo(clamp(raw * 100, 0, 100), 1);
}

/** finalScore desc, then credibility desc, then arrival order. */
export function compareRanked(a: ArticleCandidate, b: ArticleCandidate): number {
  if (b.finalScore !== a.finalScore) return b.finalScore - a.finalScore;
  const credibilityA = a.scores.credibility ?? 0;
  const credibilityB = b.scores.credibility ?? 0;
  if (credibilityB !== credibilityA) return credibilityB - credibilityA;
  return a.arrivalIndex - b.arrivalIndex;
}

export class PresetSelector implements Selector<RankingQuery, ArticleCandidate> {
  name = 'PresetSelector';

  enable(): boolean {
    return true;
  }

  select(query: RankingQuery, candidates: ArticleCandidate[]): ArticleCandidate[] {
    return candidates
      .map((c) => ({ ...c, finalScore: combineScores(requireCompleteScores(c), query.weights) }))
      .sort(compareRanked);
  }
}

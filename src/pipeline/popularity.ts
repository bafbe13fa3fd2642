/**
 * Popularity and trending velocity.
 *
 * Engagement is normalized against the batch maxima; articles without a
 * positive engagement counter fall back to an exponential freshness decay.
 */

import type { NormalizedArticle, PopularityScores, PopularityWeights } from './types.js';
import { clamp, hoursBetween, parseTimestamp } from '../utils/helpers.js';

export const DEFAULT_POPULARITY_WEIGHTS: PopularityWeights = { views: 0.4, shares: 0.35, comments: 0.25 };
export const UNKNOWN_FRESHNESS = 0.3;
/** Engagement units per hour that map to a velocity of 1.0. */
export const VELOCITY_SCALE = 10_000;
const MIN_HOURS = 1e-6;

export interface EngagementMaxima {
  views: number;
  shares: number;
  comments: number;
}

export interface PopularityOptions {
  halfLifeHours: number;
  weights: PopularityWeights;
  now: number;
}

function counter(value: number | null | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0;
}

/** True when at least one counter is positive; all-zero counters count as missing. */
export function hasEngagement(article: NormalizedArticle): boolean {
  const e = article.engagement;
  if (!e) return false;
  return counter(e.views) > 0 || counter(e.shares) > 0 || counter(e.comments) > 0;
}

export function engagementMaxima(articles: readonly NormalizedArticle[]): EngagementMaxima {
  const maxima: EngagementMaxima = { views: 0, shares: 0, comments: 0 };
  for (const article of articles) {
    maxima.views = Math.max(maxima.views, counter(article.engagement?.views));
    maxima.shares = Math.max(maxima.shares, counter(article.engagement?.shares));
    maxima.comments = Math.max(maxima.comments, counter(article.engagement?.comments));
  }
  return maxima;
}

function ratio(value: number, max: number): number {
  return max > 0 ? value / max : 0;
}

export function engagementScore(
  article: NormalizedArticle,
  maxima: EngagementMaxima,
  weights: PopularityWeights,
): number {
  const e = article.engagement;
  return clamp(
    weights.views * ratio(counter(e?.views), maxima.views) +
      weights.shares * ratio(counter(e?.shares), maxima.shares) +
      weights.comments * ratio(counter(e?.comments), maxima.comments),
  );
}

/** 0.5^(hours / halfLife); articles dated in the future count as brand new. */
export function freshnessScore(publishedAt: string | null | undefined, now: number, halfLifeHours: number): number {
  const published = parseTimestamp(publishedAt);
  if (published === null) return UNKNOWN_FRESHNESS;
  const hours = Math.max(0, hoursBetween(published, now));
  return clamp(0.5 ** (hours / halfLifeHours));
}

export function trendingVelocity(article: NormalizedArticle, now: number): number {
  const published = parseTimestamp(article.publishedAt);
  if (published === null) return 0;

  const e = article.engagement;
  const units = counter(e?.views) + 3 * counter(e?.shares) + 2 * counter(e?.comments);
  const hours = Math.max(hoursBetween(published, now), MIN_HOURS);
  return clamp(units / hours / VELOCITY_SCALE);
}

export function scorePopularity(
  article: NormalizedArticle,
  maxima: EngagementMaxima,
  options: PopularityOptions,
): PopularityScores {
  const velocity = trendingVelocity(article, options.now);

  if (hasEngagement(article)) {
    return {
      popularity: engagementScore(article, maxima, options.weights),
      trendingVelocity: velocity,
      popularityBasis: 'engagement',
    };
  }

  const published = parseTimestamp(article.publishedAt);
  return {
    popularity: freshnessScore(article.publishedAt, options.now, options.halfLifeHours),
    trendingVelocity: velocity,
    popularityBasis: published === null ? 'default' : 'freshness',
  };
}

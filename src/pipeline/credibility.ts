/**
 * Credibility and quality scoring.
 *
 *   credibility = clamp(tier trust + corroboration bonus)
 *   quality     = clamp(evidence − sensationalism penalty)
 *
 * Corroboration needs the whole deduplicated batch: it counts representatives
 * from other sources whose titles are lexically close to this one.
 */

import type {
  ArticleCandidate,
  CredibilityScores,
  NormalizedArticle,
  QualityScores,
  SourceTrust,
} from './types.js';
import { TIER_TRUST } from './types.js';
import {
  EMPHASIS_CAP,
  EMPHASIS_RULES,
  EVIDENCE_RULES,
  LENGTH_BONUS_CAP,
  LENGTH_BONUS_CHARS,
  SENSATIONAL_WORDS,
  SENSATIONAL_WORD_CAP,
  SENSATIONAL_WORD_PENALTY,
} from './rules.js';
import { SimilarityGraph } from './similarity.js';
import { toSimilarityNode } from './filters.js';
import { clamp } from '../utils/helpers.js';

/** Titles shorter than this never corroborate (or get corroborated). */
export const MIN_CORROBORATION_TOKENS = 3;

export function sourceTrustScore(trust: SourceTrust | null): { score: number; flags: string[] } {
  if (!trust) return { score: TIER_TRUST.tier3, flags: ['unknown_source'] };
  return { score: TIER_TRUST[trust.tier], flags: [] };
}

export function corroborationBonus(count: number): number {
  if (count >= 3) return 0.15;
  if (count >= 1) return 0.05;
  return 0;
}

/**
 * Number of other-source representatives whose title Jaccard with `target`
 * is at or above `threshold`. Self and same-source articles are skipped.
 */
export function countCorroborations(
  target: ArticleCandidate,
  batch: readonly ArticleCandidate[],
  graph: SimilarityGraph,
  threshold: number,
): number {
  const targetNode = toSimilarityNode(target);
  if (graph.tokenCount(targetNode) < MIN_CORROBORATION_TOKENS) return 0;

  let count = 0;
  for (const other of batch) {
    if (other.arrivalIndex === target.arrivalIndex) continue;
    if (other.article.sourceId === target.article.sourceId) continue;
    const otherNode = toSimilarityNode(other);
    if (graph.tokenCount(otherNode) < MIN_CORROBORATION_TOKENS) continue;
    if (graph.similarity(targetNode, otherNode) >= threshold) count++;
  }
  return count;
}

export function scoreCredibility(
  candidate: ArticleCandidate,
  batch: readonly ArticleCandidate[],
  graph: SimilarityGraph,
  threshold: number,
): CredibilityScores {
  const trust = sourceTrustScore(candidate.trust);
  const corroborationCount = countCorroborations(candidate, batch, graph, threshold);
  const flags = [...trust.flags];
  if (candidate.trust?.tier === 'blacklist') flags.push('blacklisted_source');

  return {
    credibility: clamp(trust.score + corroborationBonus(corroborationCount)),
    sourceTrust: trust.score,
    corroborationCount,
    credibilityFlags: flags,
  };
}

export function evidenceScore(body: string): { score: number; flags: string[] } {
  if (!body.trim()) return { score: 0, flags: ['empty_body'] };

  const flags = EVIDENCE_RULES.filter((rule) => rule.pattern.test(body)).map((rule) => rule.name);
  const lengthBonus = Math.min(LENGTH_BONUS_CAP, body.length / LENGTH_BONUS_CHARS);
  return { score: clamp(flags.length / EVIDENCE_RULES.length + lengthBonus), flags };
}

export function sensationalismPenalty(title: string): { penalty: number; flags: string[] } {
  const lower = title.toLowerCase();
  const words = SENSATIONAL_WORDS.filter((w) => lower.includes(w));
  const emphasis = EMPHASIS_RULES.map((rule) => ({
    rule,
    occurrences: [...title.matchAll(rule.pattern)].length,
  })).filter((e) => e.occurrences > 0);

  const wordPenalty = Math.min(SENSATIONAL_WORD_CAP, words.length * SENSATIONAL_WORD_PENALTY);
  const emphasisPenalty = Math.min(
    EMPHASIS_CAP,
    emphasis.reduce((sum, e) => sum + e.occurrences * e.rule.weight, 0),
  );

  return {
    penalty: wordPenalty + emphasisPenalty,
    flags: [...words.map((w) => `sensational_word:${w}`), ...emphasis.map((e) => e.rule.name)],
  };
}

export function scoreQuality(article: NormalizedArticle): QualityScores {
  const evidence = evidenceScore(article.body);
  const sensational = sensationalismPenalty(article.title);

  return {
    quality: clamp(evidence.score - sensational.penalty),
    evidence: evidence.score,
    sensationalismPenalty: sensational.penalty,
    qualityFlags: [...evidence.flags, ...sensational.flags],
  };
}

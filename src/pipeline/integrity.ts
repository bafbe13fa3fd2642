/**
 * Integrity assessment: per-article, rule-based.
 *
 *   integrity = 0.40 · consistency + 0.30 · (1 − contamination) + 0.30 · (1 − spam)
 *
 * Consistency checks that the salient title terms are covered by the body and
 * spread across it; contamination looks for unrelated adjacent paragraphs;
 * spam sums the penalties of the detectors in SPAM_DETECTORS.
 */

import type { IntegrityScores, NormalizedArticle } from './types.js';
import { SPAM_DETECTORS, STOPWORDS } from './rules.js';
import type { TextContext } from './rules.js';
import { jaccard } from './similarity.js';
import { clamp } from '../utils/helpers.js';

export const INTEGRITY_WEIGHTS = {
  consistency: 0.4,
  contamination: 0.3,
  spam: 0.3,
} as const;

const DISPERSION_PARAGRAPHS = 5;
const CONTAMINATION_PARAGRAPHS = 10;

export interface FlaggedScore {
  score: number;
  flags: string[];
}

function paragraphs(body: string): string[] {
  return body
    .split('\n')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/** Capitalized Latin words, Hangul runs and quoted phrases from the title. */
export function salientTerms(title: string): string[] {
  const terms = new Set<string>();
  for (const m of title.matchAll(/[가-힣]{2,}/g)) terms.add(m[0]);
  for (const m of title.matchAll(/\b[A-Z][a-zA-Z]+\b/g)) terms.add(m[0]);
  for (const m of title.matchAll(/["“‘]([^"”’]{2,})["”’]/g)) terms.add(m[1]);
  return [...terms];
}

export function titleBodyConsistency(title: string, body: string): number {
  const terms = salientTerms(title);
  if (terms.length === 0) return 1;

  const bodyLower = body.toLowerCase();
  const covered = terms.filter((t) => bodyLower.includes(t.toLowerCase())).length;
  const coverage = covered / terms.length;

  const titleWords = new Set(
    title
      .toLowerCase()
      .split(/\s+/)
      .filter((w) => w.length > 2),
  );
  const paras = paragraphs(body).slice(0, DISPERSION_PARAGRAPHS);
  if (paras.length === 0 || titleWords.size === 0) return coverage;

  const distribution = paras.map((para) => {
    const lower = para.toLowerCase();
    let count = 0;
    for (const word of titleWords) {
      if (lower.includes(word)) count++;
    }
    return count;
  });

  const total = distribution.reduce((a, b) => a + b, 0);
  if (total === 0) return coverage * 0.5;

  const maxShare = Math.max(...distribution) / total;
  return Math.min(1, coverage * (1 - maxShare * 0.2));
}

export function paragraphKeywords(paragraph: string): Set<string> {
  return new Set(
    paragraph
      .toLowerCase()
      .split(/\s+/)
      .filter((w) => w.length > 2 && !STOPWORDS.has(w)),
  );
}

export function topicContamination(body: string): FlaggedScore {
  const paras = paragraphs(body).slice(0, CONTAMINATION_PARAGRAPHS);
  if (paras.length < 2) return { score: 0, flags: [] };

  const keywordSets = paras.map(paragraphKeywords);
  const similarities: number[] = [];
  for (let i = 0; i < keywordSets.length - 1; i++) {
    const a = keywordSets[i];
    const b = keywordSets[i + 1];
    if (a.size === 0 && b.size === 0) continue;
    similarities.push(jaccard(a, b));
  }
  if (similarities.length === 0) return { score: 0, flags: [] };

  const mean = similarities.reduce((a, b) => a + b, 0) / similarities.length;
  const lowPairs = similarities.filter((s) => s < 0.2).length;

  if (mean < 0.3) return { score: 0.7, flags: ['unrelated_topics'] };
  if (lowPairs > similarities.length * 0.5) return { score: 0.5, flags: ['inconsistent_topics'] };
  return { score: 0, flags: [] };
}

export function spamScore(article: NormalizedArticle): FlaggedScore {
  const ctx: TextContext = {
    title: article.title,
    body: article.body,
    text: `${article.body} ${article.title}`.toLowerCase(),
  };

  let score = 0;
  const flags: string[] = [];
  for (const detector of SPAM_DETECTORS) {
    if (detector.detect(ctx)) {
      score += detector.weight;
      flags.push(detector.name);
    }
  }
  return { score: Math.min(1, score), flags };
}

export function assessIntegrity(article: NormalizedArticle): IntegrityScores {
  const flags: string[] = [];
  if (!article.url.trim()) flags.push('missing_url');

  const emptyTitle = !article.title.trim();
  const emptyBody = !article.body.trim();
  if (emptyTitle || emptyBody) {
    if (emptyTitle) flags.push('empty_title');
    if (emptyBody) flags.push('empty_body');
    return {
      integrity: 0,
      titleBodyConsistency: 0,
      contamination: 1,
      spam: 1,
      integrityFlags: flags,
    };
  }

  const consistency = titleBodyConsistency(article.title, article.body);
  const contamination = topicContamination(article.body);
  const spam = spamScore(article);

  const integrity = clamp(
    consistency * INTEGRITY_WEIGHTS.consistency +
      (1 - contamination.score) * INTEGRITY_WEIGHTS.contamination +
      (1 - spam.score) * INTEGRITY_WEIGHTS.spam,
  );

  return {
    integrity,
    titleBodyConsistency: consistency,
    contamination: contamination.score,
    spam: spam.score,
    integrityFlags: [...flags, ...contamination.flags, ...spam.flags],
  };
}

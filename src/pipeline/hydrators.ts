/**
 * Candidate hydrators: attach lookup data after sourcing.
 */

import type { Hydrator } from './interfaces.js';
import type { ArticleCandidate, RankingQuery, SourceTrustLookup } from './types.js';
import { logger } from '../utils/logger.js';
import { clamp } from '../utils/helpers.js';

/**
 * SourceTrustHydrator: resolves each article's source through the trust
 * lookup. Unknown sources stay `null` and are scored as tier3 downstream.
 */
export class SourceTrustHydrator implements Hydrator<RankingQuery, ArticleCandidate> {
  name = 'SourceTrustHydrator';
  private lookup: SourceTrustLookup;

  constructor(lookup: SourceTrustLookup) {
    this.lookup = lookup;
  }

  enable(): boolean {
    return true;
  }

  async hydrate(query: RankingQuery, candidates: ArticleCandidate[]): Promise<ArticleCandidate[]> {
    const unknown = new Set<string>();
    const hydrated = candidates.map((c) => {
      const trust = this.lookup.getTrust(c.article.sourceId) ?? null;
      if (!trust) unknown.add(c.article.sourceId);
      return { ...c, trust };
    });

    if (unknown.size > 0) {
      logger.debug({ requestId: query.requestId, sources: [...unknown] }, 'Unknown sources in batch');
    }
    return hydrated;
  }
}

/** RelevanceHydrator: copies caller-supplied relevance onto candidates. */
export class RelevanceHydrator implements Hydrator<RankingQuery, ArticleCandidate> {
  name = 'RelevanceHydrator';

  enable(query: RankingQuery): boolean {
    return Object.keys(query.relevance).length > 0;
  }

  async hydrate(query: RankingQuery, candidates: ArticleCandidate[]): Promise<ArticleCandidate[]> {
    return candidates.map((c) => {
      if (!Object.hasOwn(query.relevance, c.article.id)) return c;
      return { ...c, relevance: clamp(query.relevance[c.article.id]) };
    });
  }
}

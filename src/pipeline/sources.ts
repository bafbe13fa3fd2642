/**
 * Candidate sources. The engine ranks a caller-supplied batch, so the only
 * source wraps `query.articles` in arrival order.
 */

import type { Source } from './interfaces.js';
import type { ArticleCandidate, NormalizedArticle, RankingQuery } from './types.js';
import { normalizeUrl } from '../utils/helpers.js';

export function createCandidate(article: NormalizedArticle, arrivalIndex: number): ArticleCandidate {
  return {
    article,
    arrivalIndex,
    normalizedUrl: normalizeUrl(article.url),
    cluster: {
      representativeId: article.id,
      members: [{ articleId: article.id, arrivalIndex }],
    },
    trust: null,
    scores: {},
    relevance: null,
    finalScore: 0,
    policyFlags: [],
  };
}

export class BatchSource implements Source<RankingQuery, ArticleCandidate> {
  name = 'BatchSource';

  enable(query: RankingQuery): boolean {
    return query.articles.length > 0;
  }

  async getCandidates(query: RankingQuery): Promise<ArticleCandidate[]> {
    return query.articles.map(createCandidate);
  }
}

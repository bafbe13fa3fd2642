/**
 * Pipeline side effects: run after selection without blocking the result.
 */

import type { SideEffect } from './interfaces.js';
import type { ArticleCandidate, RankingQuery } from './types.js';
import { logger } from '../utils/logger.js';

/**
 * MetricsLogSideEffect: logs a summary of the ranked page.
 */
export class MetricsLogSideEffect implements SideEffect<RankingQuery, ArticleCandidate> {
  name = 'MetricsLogSideEffect';

  enable(): boolean {
    return true;
  }

  async run(query: RankingQuery, selectedCandidates: ArticleCandidate[]): Promise<void> {
    const sourceBreakdown: Record<string, number> = {};
    for (const c of selectedCandidates) {
      sourceBreakdown[c.article.sourceId] = (sourceBreakdown[c.article.sourceId] || 0) + 1;
    }

    logger.info(
      {
        requestId: query.requestId,
        preset: query.preset,
        inputCount: query.articles.length,
        totalSelected: selectedCandidates.length,
        sourceBreakdown,
        avgScore:
          selectedCandidates.length > 0
            ? selectedCandidates.reduce((sum, c) => sum + c.finalScore, 0) / selectedCandidates.length
            : 0,
      },
      'Pipeline: ranking metrics',
    );
  }
}

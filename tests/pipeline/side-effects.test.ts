import { describe, it, expect, vi, afterEach } from 'vitest';
import { MetricsLogSideEffect } from '../../src/pipeline/side-effects.js';
import { logger } from '../../src/utils/logger.js';
import { createMockArticle, createMockCandidate, createMockQuery } from './types.test.js';

describe('MetricsLogSideEffect', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should log a per-source breakdown of the ranked page', async () => {
    const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    const query = createMockQuery({ articles: [createMockArticle(), createMockArticle(), createMockArticle()] });
    const selected = [
      createMockCandidate({ id: 'a', sourceId: 'wire' }, 0, { finalScore: 80 }),
      createMockCandidate({ id: 'b', sourceId: 'wire' }, 1, { finalScore: 60 }),
      createMockCandidate({ id: 'c', sourceId: 'herald' }, 2, { finalScore: 40 }),
    ];

    await new MetricsLogSideEffect().run(query, selected);

    expect(info).toHaveBeenCalledWith(
      {
        requestId: 'test_req_123',
        preset: 'quality',
        inputCount: 3,
        totalSelected: 3,
        sourceBreakdown: { wire: 2, herald: 1 },
        avgScore: 60,
      },
      'Pipeline: ranking metrics',
    );
  });

  it('should report a zero average for an empty page', async () => {
    const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    await new MetricsLogSideEffect().run(createMockQuery(), []);

    expect(info).toHaveBeenCalledWith(expect.objectContaining({ totalSelected: 0, avgScore: 0 }), 'Pipeline: ranking metrics');
  });
});

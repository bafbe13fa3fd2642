import { describe, it, expect, vi, afterEach } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/app.js';
import { createEngineConfig } from '../../src/config/engine.js';
import { summarizeRankBody } from '../../src/middleware/requestLogger.js';
import { RankingEngine } from '../../src/services/ranking.service.js';
import { logger } from '../../src/utils/logger.js';
import { createMockArticle, createTrustLookup } from '../pipeline/types.test.js';

const app = createApp({
  engine: new RankingEngine(
    createEngineConfig(),
    createTrustLookup([{ sourceId: 'daily_herald', tier: 'tier1', baseTrust: 85 }]),
  ),
});

// the finish listener runs after the response is flushed
const flushPromises = () => new Promise((resolve) => setImmediate(resolve));

describe('summarizeRankBody', () => {
  it('should read the preset and batch size', () => {
    expect(summarizeRankBody({ articles: [{}, {}], preset: 'latest' })).toEqual({ preset: 'latest', articleCount: 2 });
    expect(summarizeRankBody({ articles: [] })).toEqual({ preset: null, articleCount: 0 });
  });

  it('should ignore bodies that are not ranking requests', () => {
    expect(summarizeRankBody(undefined)).toBeUndefined();
    expect(summarizeRankBody('articles')).toBeUndefined();
    expect(summarizeRankBody({ articles: 'none' })).toBeUndefined();
  });
});

describe('requestLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should echo the caller request id and pass it to the engine', async () => {
    const res = await request(app)
      .post('/api/rank')
      .set('X-Request-ID', 'req-log-1')
      .send({ articles: [createMockArticle()], now: '2026-01-15T12:00:00Z' });

    expect(res.headers['x-request-id']).toBe('req-log-1');
    expect(res.body.data.requestId).toBe('req-log-1');
  });

  it('should generate a request id when none is sent', async () => {
    const res = await request(app)
      .post('/api/rank')
      .send({ articles: [createMockArticle()], now: '2026-01-15T12:00:00Z' });

    expect(res.headers['x-request-id']).toMatch(/^rank_[0-9a-f-]{36}$/);
    expect(res.body.data.requestId).toBe(res.headers['x-request-id']);
  });

  it('should log the preset and batch size of a ranking call', async () => {
    const info = vi.spyOn(logger, 'info').mockImplementation(() => undefined);

    await request(app)
      .post('/api/rank')
      .set('X-Request-ID', 'req-log-2')
      .send({ articles: [createMockArticle()], preset: 'trending', now: '2026-01-15T12:00:00Z' });
    await flushPromises();

    expect(info).toHaveBeenCalledWith(
      expect.objectContaining({
        requestId: 'req-log-2',
        method: 'POST',
        path: '/api/rank',
        statusCode: 200,
        rank: { preset: 'trending', articleCount: 1 },
      }),
      'POST /api/rank 200',
    );
  });

  it('should log client errors at warn', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);

    await request(app).post('/api/rank').set('X-Request-ID', 'req-log-3').send({ preset: 'quality' });
    await flushPromises();

    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-log-3', path: '/api/rank', statusCode: 400 }),
      'POST /api/rank 400',
    );
  });
});

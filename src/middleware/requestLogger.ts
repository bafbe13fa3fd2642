import type { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger.js';
import { generateRequestId } from '../utils/helpers.js';

export interface RankRequestSummary {
  preset: string | null;
  articleCount: number;
}

/** Preset and batch size of a ranking body; undefined for anything else. */
export function summarizeRankBody(body: unknown): RankRequestSummary | undefined {
  if (typeof body !== 'object' || body === null) return undefined;
  if (!('articles' in body) || !Array.isArray(body.articles)) return undefined;
  const preset = 'preset' in body && typeof body.preset === 'string' ? body.preset : null;
  return { preset, articleCount: body.articles.length };
}

/**
 * Assigns the request id (caller's X-Request-ID, else a generated one),
 * echoes it on the response, and logs one line per finished request.
 * Ranking calls also log their preset and batch size.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();
  const requestId = req.header('x-request-id') || generateRequestId();
  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  // routers rewrite req.url, so capture the full path before they run
  const { method } = req;
  const path = req.path;
  const rank = method === 'POST' ? summarizeRankBody(req.body) : undefined;

  res.on('finish', () => {
    const { statusCode } = res;
    const durationMs = Date.now() - startedAt;
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';

    logger[level](
      { requestId, method, path, statusCode, durationMs, ...(rank ? { rank } : {}) },
      `${method} ${path} ${statusCode}`,
    );
  });

  next();
}

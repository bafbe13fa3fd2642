import express from 'express';
import type { Express } from 'express';
import { createRankingRouter } from './routes/ranking.routes.js';
import { requestLogger } from './middleware/requestLogger.js';
import { errorHandler } from './middleware/errorHandler.js';
import type { RankingEngine } from './services/ranking.service.js';

export interface AppDependencies {
  engine: RankingEngine;
}

export function createApp({ engine }: AppDependencies): Express {
  const app = express();

  app.use(express.json({ limit: '5mb' }));
  app.use(requestLogger);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/rank', createRankingRouter(engine));

  app.use(errorHandler);
  return app;
}

import { Router } from 'express';
import { createRankingController } from '../controllers/ranking.controller.js';
import { validateBody, schemas } from '../middleware/validation.js';
import { asyncHandler } from '../utils/asyncHandler.js';
import type { RankingEngine } from '../services/ranking.service.js';

export function createRankingRouter(engine: RankingEngine): Router {
  const router = Router();
  const rankingController = createRankingController(engine);

  // Ranking
  router.post('/', validateBody(schemas.rank), asyncHandler(rankingController.rank));

  // Presets
  router.get('/presets', asyncHandler(rankingController.listPresets));

  return router;
}

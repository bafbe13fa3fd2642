import { Request, Response } from 'express';
import type { RankingEngine } from '../services/ranking.service.js';
import type { RankRequestBody } from '../middleware/validation.js';

export function createRankingController(engine: RankingEngine) {
  return {
    /**
     * Rank one batch of normalized articles. The body has already passed
     * `validateBody(schemas.rank)`.
     */
    async rank(req: Request, res: Response) {
      const body: RankRequestBody = req.body;
      const result = await engine.rank({
        ...body,
        requestId: req.header('x-request-id') || undefined,
      });
      res.json({ success: true, data: result });
    },

    async listPresets(_req: Request, res: Response) {
      res.json({ success: true, data: { presets: engine.presets } });
    },
  };
}

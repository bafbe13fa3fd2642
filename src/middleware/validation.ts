import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { AppError } from './errorHandler.js';

const engagementSchema = z.object({
  views: z.number().nonnegative().nullable().optional(),
  shares: z.number().nonnegative().nullable().optional(),
  comments: z.number().nonnegative().nullable().optional(),
});

export const articleSchema = z.object({
  id: z.string().min(1, 'Article id is required'),
  sourceId: z.string().min(1, 'Article sourceId is required'),
  sourceName: z.string().nullable().optional(),
  title: z.string(),
  body: z.string(),
  publishedAt: z.string().nullable().optional(),
  url: z.string(),
  engagement: engagementSchema.nullable().optional(),
  category: z.string().nullable().optional(),
  tags: z.array(z.string()).default([]),
});

export const schemas = {
  rank: z.object({
    articles: z.array(articleSchema),
    preset: z.string().min(1).optional(),
    limit: z.number().int().nonnegative().max(500).optional(),
    offset: z.number().int().nonnegative().optional(),
    diversityCap: z.number().int().nonnegative().optional(),
    relevance: z.record(z.string(), z.number().min(0).max(1)).optional(),
    now: z.union([z.string().datetime({ offset: true }), z.number().int().nonnegative()]).optional(),
  }),
};

export type RankRequestBody = z.infer<typeof schemas.rank>;

/**
 * Replace `req.body` with the parsed value, or fail with VALIDATION_ERROR
 * listing each offending field.
 */
export function validateBody(schema: z.ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      const details = result.error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
      }));
      next(new AppError(400, 'VALIDATION_ERROR', 'Invalid request body', details));
      return;
    }
    req.body = result.data;
    next();
  };
}

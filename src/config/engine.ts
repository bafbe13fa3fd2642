import { z } from 'zod';
import { env } from './env.js';
import { AppError } from '../middleware/errorHandler.js';
import { DEFAULT_POPULARITY_WEIGHTS } from '../pipeline/popularity.js';
import type { PolicyThresholds, PopularityWeights, PresetWeights } from '../pipeline/types.js';

/** Weights per ranking preset: popularity / relevance / quality / credibility. */
export const RANKING_PRESETS: Record<string, PresetWeights> = {
  quality: { popularity: 0.15, relevance: 0.3, quality: 0.4, credibility: 0.15 },
  trending: { popularity: 0.5, relevance: 0.1, quality: 0.2, credibility: 0.2 },
  credible: { popularity: 0.1, relevance: 0.2, quality: 0.2, credibility: 0.5 },
  latest: { popularity: 0.1, relevance: 0.2, quality: 0.3, credibility: 0.4 },
};

export const DEFAULT_POLICY: PolicyThresholds = {
  minIntegrity: 0.5,
  minCredibility: 0.6,
  maxSpam: 0.7,
};

const PRESET_SUM_TOLERANCE = 0.01;

const unitInterval = z.number().min(0).max(1);

export const presetWeightsSchema = z
  .object({
    popularity: unitInterval,
    relevance: unitInterval,
    quality: unitInterval,
    credibility: unitInterval,
  })
  .strict()
  .refine(
    (w) => Math.abs(w.popularity + w.relevance + w.quality + w.credibility - 1) <= PRESET_SUM_TOLERANCE,
    { message: 'preset weights must sum to 1.0' },
  );

export const engineConfigSchema = z.object({
  similarityThreshold: unitInterval,
  corroborationThreshold: unitInterval,
  freshnessHalfLifeHours: z.number().positive(),
  diversityCap: z.number().int().nonnegative(),
  defaultLimit: z.number().int().nonnegative(),
  defaultPreset: z.string().min(1),
  popularityWeights: z.object({
    views: unitInterval,
    shares: unitInterval,
    comments: unitInterval,
  }),
  policy: z.object({
    minIntegrity: unitInterval,
    minCredibility: unitInterval,
    maxSpam: unitInterval,
  }),
  presets: z.record(z.string(), presetWeightsSchema),
}).refine((config) => Object.hasOwn(config.presets, config.defaultPreset), {
  message: 'defaultPreset must name a configured preset',
  path: ['defaultPreset'],
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export type EngineConfigOverrides = Partial<Omit<EngineConfig, 'policy' | 'popularityWeights'>> & {
  policy?: Partial<PolicyThresholds>;
  popularityWeights?: Partial<PopularityWeights>;
};

export function defaultEngineConfig(): EngineConfig {
  return {
    similarityThreshold: env.DEDUP_SIMILARITY_THRESHOLD,
    corroborationThreshold: env.CORROBORATION_THRESHOLD,
    freshnessHalfLifeHours: env.FRESHNESS_HALF_LIFE_HOURS,
    diversityCap: env.DIVERSITY_CAP,
    defaultLimit: env.DEFAULT_RESULT_LIMIT,
    defaultPreset: 'quality',
    popularityWeights: { ...DEFAULT_POPULARITY_WEIGHTS },
    policy: { ...DEFAULT_POLICY },
    presets: { ...RANKING_PRESETS },
  };
}

/**
 * Defaults from the environment, overlaid with `overrides`, then validated.
 * Throws AppError(400, 'INVALID_CONFIG') listing every offending field.
 */
export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const defaults = defaultEngineConfig();
  const candidate = {
    ...defaults,
    ...overrides,
    policy: { ...defaults.policy, ...overrides.policy },
    popularityWeights: { ...defaults.popularityWeights, ...overrides.popularityWeights },
  };

  const result = engineConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new AppError(400, 'INVALID_CONFIG', 'Invalid engine configuration', issues);
  }
  return result.data;
}

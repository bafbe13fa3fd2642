import { describe, it, expect } from 'vitest';
import {
  RANKING_PRESETS,
  createEngineConfig,
  presetWeightsSchema,
} from '../../src/config/engine.js';
import type { EngineConfigOverrides } from '../../src/config/engine.js';
import { AppError } from '../../src/middleware/errorHandler.js';
import { DEFAULT_POPULARITY_WEIGHTS } from '../../src/pipeline/popularity.js';

function configError(overrides: EngineConfigOverrides): AppError {
  try {
    createEngineConfig(overrides);
  } catch (error) {
    if (error instanceof AppError) return error;
    throw error;
  }
  throw new Error('expected createEngineConfig to throw');
}

describe('engine configuration', () => {
  it('should build the defaults', () => {
    const config = createEngineConfig();

    expect(config.similarityThreshold).toBe(0.6);
    expect(config.corroborationThreshold).toBe(0.5);
    expect(config.freshnessHalfLifeHours).toBe(24);
    expect(config.diversityCap).toBe(3);
    expect(config.defaultLimit).toBe(20);
    expect(config.defaultPreset).toBe('quality');
    expect(config.policy).toEqual({ minIntegrity: 0.5, minCredibility: 0.6, maxSpam: 0.7 });
    expect(config.popularityWeights).toEqual(DEFAULT_POPULARITY_WEIGHTS);
    expect(config.popularityWeights).not.toBe(DEFAULT_POPULARITY_WEIGHTS);
    expect(Object.keys(config.presets)).toEqual(['quality', 'trending', 'credible', 'latest']);
  });

  it('should ship presets that each sum to 1', () => {
    for (const weights of Object.values(RANKING_PRESETS)) {
      expect(presetWeightsSchema.safeParse(weights).success).toBe(true);
    }
  });

  it('should merge partial policy overrides', () => {
    const config = createEngineConfig({ policy: { maxSpam: 0.9 } });
    expect(config.policy).toEqual({ minIntegrity: 0.5, minCredibility: 0.6, maxSpam: 0.9 });
  });

  it('should reject a threshold outside [0, 1]', () => {
    const error = configError({ similarityThreshold: 1.5 });

    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.details).toEqual([
      { path: 'similarityThreshold', message: 'Number must be less than or equal to 1' },
    ]);
  });

  it('should reject preset weights that do not sum to 1', () => {
    const error = configError({
      presets: { lopsided: { popularity: 0.5, relevance: 0.5, quality: 0.5, credibility: 0 } },
      defaultPreset: 'lopsided',
    });

    expect(error.details).toEqual([{ path: 'presets.lopsided', message: 'preset weights must sum to 1.0' }]);
  });

  it('should accept a sum within the tolerance', () => {
    const config = createEngineConfig({
      presets: { near: { popularity: 0.25, relevance: 0.25, quality: 0.25, credibility: 0.255 } },
      defaultPreset: 'near',
    });
    expect(config.defaultPreset).toBe('near');
  });

  it('should reject a default preset that is not configured', () => {
    const error = configError({ defaultPreset: 'viral' });
    expect(error.details).toEqual([
      { path: 'defaultPreset', message: 'defaultPreset must name a configured preset' },
    ]);
  });

  it('should reject a non-positive half-life and a fractional cap', () => {
    const error = configError({ freshnessHalfLifeHours: 0, diversityCap: 1.5 });
    expect(error.details).toEqual([
      { path: 'freshnessHalfLifeHours', message: 'Number must be greater than 0' },
      { path: 'diversityCap', message: 'Expected integer, received float' },
    ]);
  });
});

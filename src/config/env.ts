import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Source registry file (JSON), resolved against the working directory
  SOURCES_FILE: z.string().min(1).default('config/sources.json'),
  MAX_CONSECUTIVE_FAILURES: z.coerce.number().int().positive().default(5),

  // Engine defaults; range checks happen in config/engine.ts
  DEDUP_SIMILARITY_THRESHOLD: z.coerce.number().default(0.6),
  CORROBORATION_THRESHOLD: z.coerce.number().default(0.5),
  FRESHNESS_HALF_LIFE_HOURS: z.coerce.number().default(24),
  DIVERSITY_CAP: z.coerce.number().int().default(3),
  DEFAULT_RESULT_LIMIT: z.coerce.number().int().default(20),
});

export type Env = z.infer<typeof envSchema>;

function parseEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}

export const env = parseEnv();

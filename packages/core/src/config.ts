/**
 * Engine configuration from the environment.
 * Loads .env.local and .env (dotenv) the same way the scripts do, then validates.
 */

import { config as loadDotenv } from 'dotenv';
import path from 'node:path';
import { z } from 'zod';

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const engineEnvSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  TAILOR_KEYWORD_LIMIT: intFromEnv(20),
  TAILOR_MIN_TOKEN_LENGTH: intFromEnv(3),
  TAILOR_MAX_BULLETS: intFromEnv(6),
  TAILOR_MAX_SKILLS: intFromEnv(18),
  TAILOR_MIN_POSITIONS: intFromEnv(2),
});

export interface EngineConfig {
  logLevel: z.infer<typeof engineEnvSchema>['LOG_LEVEL'];
  keywordLimit: number;
  minTokenLength: number;
  maxBullets: number;
  maxSkills: number;
  minPositions: number;
}

/** Build a config from an env record. Throws a ZodError on invalid values. */
export function loadEngineConfig(env: Record<string, string | undefined>): EngineConfig {
  const parsed = engineEnvSchema.parse(env);
  return {
    logLevel: parsed.LOG_LEVEL,
    keywordLimit: parsed.TAILOR_KEYWORD_LIMIT,
    minTokenLength: parsed.TAILOR_MIN_TOKEN_LENGTH,
    maxBullets: parsed.TAILOR_MAX_BULLETS,
    maxSkills: parsed.TAILOR_MAX_SKILLS,
    minPositions: parsed.TAILOR_MIN_POSITIONS,
  };
}

let cached: EngineConfig | null = null;

export function getEngineConfig(): EngineConfig {
  if (!cached) {
    loadDotenv({ path: path.resolve(process.cwd(), '.env.local') });
    loadDotenv();
    cached = loadEngineConfig(process.env);
  }
  return cached;
}

/** Drop the cached config so the next read sees the current environment. */
export function resetEngineConfig(): void {
  cached = null;
}

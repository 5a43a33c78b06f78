import { z } from 'zod';
import { DEFAULT_DB_PATH, DEFAULT_MAX_SCENARIOS_PER_USER, DEFAULT_PRECISION } from '@loancalc/engine';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOANCALC_DB_PATH: z.string().min(1).default(DEFAULT_DB_PATH),
  LOANCALC_API_KEY: z.string().optional().transform((v) => v || undefined),
  LOANCALC_MAX_SCENARIOS: z.coerce.number().int().default(DEFAULT_MAX_SCENARIOS_PER_USER),
  LOANCALC_PRECISION: z.coerce.number().int().min(10).max(1000).default(DEFAULT_PRECISION),
});

export interface ApiConfig {
  port: number;
  dbPath: string;
  /** Bearer key required on /api/v1; auth is off when unset. */
  apiKey?: string;
  maxScenariosPerUser: number;
  precision: number;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ApiConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid environment: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    dbPath: vars.LOANCALC_DB_PATH,
    apiKey: vars.LOANCALC_API_KEY,
    maxScenariosPerUser: vars.LOANCALC_MAX_SCENARIOS,
    precision: vars.LOANCALC_PRECISION,
  };
}

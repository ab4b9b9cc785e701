/**
 * ENVIRONMENT CONFIG
 * ==================
 *
 * Parsed once at import time. Tests use parseEnv() with their own source.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const intFromEnv = (def: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(def);

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: intFromEnv(8001, 1, 65535),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  PRICE_PROVIDER_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  NEWS_PROVIDER_BASE_URL: z.string().url().default('https://query2.finance.yahoo.com'),
  PROVIDER_TIMEOUT_MS: intFromEnv(15000, 100, 120000),

  NARRATIVE_PROVIDER: z.enum(['openai', 'gemini']).default('openai'),
  NARRATIVE_TIMEOUT_MS: intFromEnv(30000, 100, 300000),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  GEMINI_API_KEY: z.string().default(''),
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),

  FORECAST_MODEL: z.enum(['boosted-trees', 'linear']).default('boosted-trees'),
  FORECAST_MODE: z.enum(['repeat-last-lag', 'iterative']).default('repeat-last-lag'),
  SESSION_CAPACITY: intFromEnv(50, 1, 10000),
});

export type Env = Readonly<z.infer<typeof EnvSchema>>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid environment configuration: ${keys}`);
  }
  return Object.freeze(parsed.data);
}

export const env: Env = parseEnv(process.env);

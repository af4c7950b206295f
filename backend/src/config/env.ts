/**
 * Process configuration
 * =====================
 *
 * Read once at startup from the environment (and `.env` when present).
 * Nothing on the request path touches process.env.
 */

import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().min(1).default('*'),

  DEFAULT_EXCHANGE: z.string().trim().min(1).default('okx'),
  OKX_BASE: z.string().url().default('https://www.okx.com'),
  BINANCE_BASE: z.string().url().default('https://fapi.binance.com'),
  BYBIT_BASE: z.string().url().default('https://api.bybit.com'),

  CACHE_TTL_SECONDS: z.coerce.number().positive().default(8),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(12_000),
  EGRESS_PROXY_URL: z.string().url().optional(),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validate an environment-like record. Throws with every offending variable listed.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  // Empty strings count as unset so `FOO=` in .env falls back to the default
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return Object.freeze(parsed.data);
}

export const env: Env = loadEnv();

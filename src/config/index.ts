import { z } from 'zod';
import type { EnvConfig } from '../types';

/**
 * Environment configuration
 *
 * Every setting is read once from process.env and validated with zod.
 * An invalid value stops the process before anything is served or scored.
 */

const csvList = z
  .string()
  .default('*')
  .transform((value) =>
    value
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0)
  );

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().default('/api/v1'),
  CORS_ORIGIN: csvList,
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  RUN_RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(20),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Reconciliation data and model locations
  DATA_DIR: z.string().default('./data'),
  MODEL_PATH: z.string().default('./reports/model.json'),
  REPORTS_DIR: z.string().default('./reports'),

  // Decision and training knobs
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.75),
  SPLIT_SEED: z.coerce.number().int().default(42),
  SYNTHETIC_SEED: z.coerce.number().int().default(1337),
  TEST_SIZE: z.coerce.number().gt(0).lt(1).default(0.2),
  SYNTHETIC_CORRUPTION: flag('false'),

  // Redis (OPTIONAL - reconciliation works without Redis)
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_ENABLED: flag('true'),
  RUN_STATE_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),

  // Dispute email signature
  AP_CONTACT_EMAIL: z.string().email().default('accounts-payable@example.com'),
  AP_CONTACT_PHONE: z.string().default('(555) 010-0000'),
  COMPANY_NAME: z.string().default('Accounts Payable'),
});

const loadEnv = (): EnvConfig => {
  const parsed = envSchema.safeParse(process.env);

  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parsed.data;
};

export const env: EnvConfig = loadEnv();

export default env;

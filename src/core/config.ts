/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * I funnel every setting the transform run needs (warehouse URL, staging bucket,
 * dev row cap, etc.) through this file so there’s one place to look and one place
 * to validate. Every other module imports `config` (or receives a slice of it
 * through the container) instead of reading process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "5000" → 5000) at startup. If anything is missing or invalid, the process
 * exits immediately with the list of issues. The result is a nested `config`
 * object exported with `as const`.
 *
 * Booleans go through `z.stringbool()` so DB_SSL=false really means false.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  /** Full PostgreSQL connection URL of the warehouse. */
  DATABASE_URL: z.string().min(1).default('postgres://warehouse_user:@localhost:5432/warehouse'),
  DB_SSL: z.stringbool().default(false),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(0),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(4),

  WAREHOUSE_SCHEMA: z.string().min(1).default('public'),
  WAREHOUSE_TABLE: z.string().min(1).default('health_life_expectancy'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  /** S3-compatible staging store (MinIO locally). */
  S3_ENDPOINT: z.url().default('http://localhost:9000'),
  S3_REGION: z.string().min(1).default('us-east-1'),
  S3_ACCESS_KEY_ID: z.string().min(1).optional(),
  S3_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  S3_FORCE_PATH_STYLE: z.stringbool().default(true),

  STAGING_BUCKET: z.string().min(1).default('raw-health-data'),
  STAGING_PREFIX: z.string().min(1).default('who_life_expectancy'),

  /** Dev knob: keep only the first N rows after the both-sexes filter. */
  MAX_ROWS: z.coerce.number().int().positive().optional(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  database: {
    url: env.DATABASE_URL,
    ssl: env.DB_SSL,
    pool: {
      min: env.DB_POOL_MIN,
      max: env.DB_POOL_MAX,
    },
  },

  warehouse: {
    schema: env.WAREHOUSE_SCHEMA,
    table: env.WAREHOUSE_TABLE,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  staging: {
    endpoint: env.S3_ENDPOINT,
    region: env.S3_REGION,
    accessKeyId: env.S3_ACCESS_KEY_ID,
    secretAccessKey: env.S3_SECRET_ACCESS_KEY,
    forcePathStyle: env.S3_FORCE_PATH_STYLE,
    bucket: env.STAGING_BUCKET,
  },

  transform: {
    datasetPrefix: env.STAGING_PREFIX,
    maxRows: env.MAX_ROWS,
  },
} as const;

export type AppConfig = typeof config;

/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting the demo reads goes through this file; other modules import
 * `config` instead of touching process.env.
 *
 * Flow: dotenv loads .env into process.env, then a Zod schema coerces and
 * defaults each key (e.g. "700" → 700). Every key has a default, so the demo
 * runs with no environment at all. Anything present but invalid stops the
 * process before the store is opened.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** SQLite file for the store. `:memory:` keeps it for the life of the process. */
  DATABASE_FILENAME: z.string().min(1).default(':memory:'),
  DB_ACQUIRE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  /** Menu item price (in cents) the demo query filters on. */
  DEMO_PRICE_FILTER: z.coerce.number().int().nonnegative().default(7_00),

  SQL_HIGHLIGHT: z
    .enum(['true', 'false', '1', '0'])
    .default('true')
    .transform((v) => v === 'true' || v === '1'),
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
  isTest: env.NODE_ENV === 'test',

  database: {
    filename: env.DATABASE_FILENAME,
    acquireTimeoutMs: env.DB_ACQUIRE_TIMEOUT_MS,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  demo: {
    priceFilter: env.DEMO_PRICE_FILTER,
  },

  output: {
    highlightSql: env.SQL_HIGHLIGHT,
  },
} as const;

export type AppConfig = typeof config;

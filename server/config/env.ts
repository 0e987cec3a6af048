/**
 * Environment configuration.
 *
 * Loads `.env` through dotenv, then validates every variable the API reads
 * with Zod so the rest of the server gets typed values with defaults applied.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_API_PORT, DEFAULT_DB_PORT, DEFAULT_DUE_DAYS, DEFAULT_TAX_RATE } from '../../shared/constants';

dotenv.config();

const DEV_JWT_SECRET = 'dev-secret-change-in-production';

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

    // Server
    API_PORT: z.coerce.number().int().positive().default(DEFAULT_API_PORT),
    API_HOST: z.string().default('0.0.0.0'),

    // PostgreSQL
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(DEFAULT_DB_PORT),
    DB_NAME: z.string().min(1).default('print_shop_erp'),
    DB_USER: z.string().default('postgres'),
    DB_PASSWORD: z.string().default(''),
    DB_POOL_MIN: z.coerce.number().int().nonnegative().default(2),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),

    // Auth
    JWT_SECRET: z.string().min(1).default(DEV_JWT_SECRET),
    // Token lifetime in seconds
    JWT_EXPIRES_IN: z.coerce.number().int().positive().default(86400),

    // Business defaults
    DEFAULT_TAX_RATE: z.coerce.number().min(0).max(1).default(DEFAULT_TAX_RATE),
    DEFAULT_DUE_DAYS: z.coerce.number().int().nonnegative().default(DEFAULT_DUE_DAYS),
    CONCURRENCY_MAX_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.JWT_SECRET === DEV_JWT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET'],
        message: 'JWT_SECRET must be set in production',
      });
    }
  });

export type Config = z.infer<typeof envSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const problems = result.error.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${problems}`);
  }
  return result.data;
}

export const config = loadConfig();

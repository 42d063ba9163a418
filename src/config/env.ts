// Environment validation using Zod
import 'dotenv/config';
import { z } from 'zod';
import {
  DEFAULT_AROUNDS,
  DEFAULT_ELASTIC_UNIT,
  DEFAULT_EXTREMES,
  DEFAULT_PER_PAGE,
  MAX_AROUNDS,
  MAX_ELASTIC_UNIT,
  MAX_EXTREMES,
  MAX_PER_PAGE,
  PAGE_LABEL,
} from './pagination.js';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Swagger/metadata
  SWAGGER_TITLE: z.string().default('Page Markers API'),
  SWAGGER_VERSION: z.string().default('0.1.0'),

  // HTTP hardening
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000,http://127.0.0.1:3000')
    .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean)),

  // Service-level pagination defaults
  PAGINATION_PAGE_LABEL: z.string().min(1).default(PAGE_LABEL),
  PAGINATION_PER_PAGE: z.coerce.number().int().positive().max(MAX_PER_PAGE).default(DEFAULT_PER_PAGE),
  PAGINATION_EXTREMES: z.coerce.number().int().min(0).max(MAX_EXTREMES).default(DEFAULT_EXTREMES),
  PAGINATION_AROUNDS: z.coerce.number().int().min(0).max(MAX_AROUNDS).default(DEFAULT_AROUNDS),
  PAGINATION_ELASTIC_UNIT: z.coerce.number().int().positive().max(MAX_ELASTIC_UNIT).default(DEFAULT_ELASTIC_UNIT),
});

export function parseEnv(source: NodeJS.ProcessEnv) {
  return EnvSchema.safeParse(source);
}

const parsed = parseEnv(process.env);
if (!parsed.success) {
  // Fail fast; the logger depends on this module so report on stderr.
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', parsed.error.flatten());
  throw new Error('ENV validation failed');
}

export const config = {
  ...parsed.data,
};

export type AppConfig = typeof config;

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

loadDotenv();

/**
 * Comma-separated list, e.g. "http://a.test,http://b.test"
 */
const commaList = z
  .string()
  .default('*')
  .transform((value) =>
    value
      .split(',')
      .map((part) => part.trim())
      .filter(Boolean)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: commaList,
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(300),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Redis (OPTIONAL - only used when MAPPING_STORE=redis)
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),

  // Catalog provider
  CATALOG_FILE: z.string().default('data/catalog.json'),
  CATALOG_URL: z.string().url().optional(),
  CATALOG_API_KEY: z.string().optional(),
  CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CATALOG_TTL_MS: z.coerce.number().int().nonnegative().default(5 * 60 * 1000),

  // Learned mappings
  MAPPING_STORE: z.enum(['file', 'redis', 'memory']).default('file'),
  MAPPINGS_FILE: z.string().default('data/product_mappings.json'),

  // Documents and search
  MAX_UPLOAD_MB: z.coerce.number().positive().default(20),
  SEARCH_LIMIT: z.coerce.number().int().positive().default(10),
  SEARCH_MIN_SCORE: z.coerce.number().int().min(0).max(100).default(38),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parses process.env, failing fast on invalid configuration
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const problems = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return result.data;
}

export const env: EnvConfig = loadEnv();

export default env;

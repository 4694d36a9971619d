import { z } from 'zod';
import { LanguageCodeSchema } from './schemas';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

/**
 * Environment variables. Everything is optional; numbers are coerced from
 * their string form.
 */
const EnvSchema = z.object({
  PORT: positiveInt(3001),
  HOST: z.string().min(1).default('0.0.0.0'),
  DEBUG: z.string().optional(),
  FEED_LANGUAGE: LanguageCodeSchema.default('en'),
  FEED_TOPICS: z.string().default('all_topics').describe('Comma-separated topic keys or labels'),
  FEED_STRATEGY: z.enum(['category', 'search']).default('category'),
  FEED_BATCH_SIZE: positiveInt(10),
  FEED_REFILL_BATCH_SIZE: positiveInt(15),
  FEED_BUFFER_THRESHOLD: nonNegativeInt(20),
  FEED_PROMOTE_SLICE: positiveInt(5),
  FEED_ASSET_DELAY_MS: nonNegativeInt(100),
  SEEN_TTL_HOURS: z.coerce.number().positive().default(24),
  ITEM_CACHE_CAPACITY: positiveInt(100),
  ASSET_CACHE_CAPACITY: positiveInt(50),
  ASSET_CACHE_BYTES: positiveInt(50 * 1024 * 1024),
  ASSET_MAX_DIMENSION: positiveInt(800),
  ASSET_DENSITY: z.coerce.number().positive().default(2),
  RETRY_BASE_DELAY_MS: nonNegativeInt(2000),
  RETRY_MAX_ATTEMPTS: positiveInt(3),
  HTTP_TIMEOUT_MS: positiveInt(8000),
  ASSET_TIMEOUT_MS: positiveInt(20000),
  MEMORY_HEAP_LIMIT_MB: positiveInt(512),
  USER_AGENT: z.string().min(1).default('feed-pipeline/1.0'),
  NODE_ENV: z.string().optional(),
  FRONTEND_URL: z.string().optional(),
});

export interface AppConfig {
  port: number;
  host: string;
  debug: boolean;
  nodeEnv: string;
  frontendUrl?: string;
  feed: {
    languageCode: string;
    topics: string[];
    strategy: 'category' | 'search';
    batchSize: number;
    refillBatchSize: number;
    bufferThreshold: number;
    promoteSlice: number;
    assetDelayMs: number;
    seenTtlMs: number;
  };
  itemCache: { capacity: number };
  assetCache: {
    capacity: number;
    byteBudget: number;
    maxDimension: number;
    density: number;
    timeoutMs: number;
  };
  retry: { baseDelayMs: number; maxAttempts: number };
  http: { timeoutMs: number; userAgent: string };
  memory: { heapLimitBytes: number };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse configuration from the environment. Throws a ConfigError listing
 * every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    debug: e.DEBUG === 'true' || e.DEBUG === '1',
    nodeEnv: e.NODE_ENV ?? 'development',
    frontendUrl: e.FRONTEND_URL,
    feed: {
      languageCode: e.FEED_LANGUAGE,
      topics: e.FEED_TOPICS.split(',').map(topic => topic.trim()).filter(topic => topic.length > 0),
      strategy: e.FEED_STRATEGY,
      batchSize: e.FEED_BATCH_SIZE,
      refillBatchSize: e.FEED_REFILL_BATCH_SIZE,
      bufferThreshold: e.FEED_BUFFER_THRESHOLD,
      promoteSlice: e.FEED_PROMOTE_SLICE,
      assetDelayMs: e.FEED_ASSET_DELAY_MS,
      seenTtlMs: e.SEEN_TTL_HOURS * 60 * 60 * 1000,
    },
    itemCache: { capacity: e.ITEM_CACHE_CAPACITY },
    assetCache: {
      capacity: e.ASSET_CACHE_CAPACITY,
      byteBudget: e.ASSET_CACHE_BYTES,
      maxDimension: e.ASSET_MAX_DIMENSION,
      density: e.ASSET_DENSITY,
      timeoutMs: e.ASSET_TIMEOUT_MS,
    },
    retry: { baseDelayMs: e.RETRY_BASE_DELAY_MS, maxAttempts: e.RETRY_MAX_ATTEMPTS },
    http: { timeoutMs: e.HTTP_TIMEOUT_MS, userAgent: e.USER_AGENT },
    memory: { heapLimitBytes: e.MEMORY_HEAP_LIMIT_MB * 1024 * 1024 },
  };
}

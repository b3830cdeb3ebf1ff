// utils/config.ts
import dotenv from 'dotenv';
import { z } from 'zod';
import type { ConnectionOptions } from 'bullmq';
import { URL } from 'url';
import logger from './logger';

dotenv.config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z.enum(['true', 'false']).default(fallback).transform((value) => value === 'true');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// Define the schema for our environment variables
const envSchema = z.object({
  PORT: z.string().transform(Number).default('3001'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Database
  MONGODB_URI: z.string().url().default('mongodb://localhost:27017/weather_service'),
  MONGO_POOL_SIZE: z.string().transform(Number).default('10'),

  // Redis - Primary (Cache/Rate Limits). Unset means in-process memory store.
  REDIS_URL: z.string().optional(),
  // Redis - Queue (Background Jobs) - Optional, falls back to REDIS_URL
  REDIS_QUEUE_URL: z.string().optional(),
  // Who runs maintenance jobs. Defaults to 'queue' only when REDIS_QUEUE_URL is set.
  JOB_RUNNER: z.enum(['inline', 'queue']).optional(),

  // Worker Configuration
  WORKER_CONCURRENCY: positiveInt(1),

  // Weather Provider
  WEATHER_PROVIDER: z.enum(['openweathermap', 'mock']).default('openweathermap'),
  OPENWEATHER_API_KEY: z.string().default(''),
  OPENWEATHER_BASE_URL: z.string().url().default('https://api.openweathermap.org/data/2.5'),
  WEATHER_PROVIDER_TIMEOUT_MS: positiveInt(10000),

  // Cache
  CACHE_TTL_SECONDS: positiveInt(600),

  // Rate Limiting (fixed window)
  RATE_LIMIT_REQUESTS: positiveInt(5),
  RATE_LIMIT_WINDOW: positiveInt(60), // seconds
  RATE_LIMIT_EXEMPT_PATHS: z.string().default('/health,/ping,/metrics'),

  // History Retention
  HISTORY_MAX_PER_CITY: positiveInt(10),
  HISTORY_INLINE_PRUNE: booleanFlag('true'),
  HISTORY_RETENTION_DAYS: positiveInt(30),
  CLEANUP_INTERVAL_SECONDS: positiveInt(60),

  // HTTP
  CORS_ORIGINS: z.string().default(''),
  TRUST_PROXY_LVL: z.string().transform(Number).default('1'),
});

export type Env = z.infer<typeof envSchema>;

// Parse and validate
const parseConfig = (): Env => {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    logger.error('❌ Invalid Environment Configuration:');
    result.error.issues.forEach((issue) => {
      logger.error(`   -> ${issue.path.join('.')}: ${issue.message}`);
    });
    process.exit(1);
  }
  return result.data;
};

const env = parseConfig();

const splitList = (value: string): string[] =>
  value.split(',').map((s) => s.trim()).filter(Boolean);

// --- BULLMQ CONFIG (QUEUE) ---
const getBullMQConfig = (): ConnectionOptions | undefined => {
  const targetUrl = env.REDIS_QUEUE_URL || env.REDIS_URL;

  if (!targetUrl) return undefined;
  try {
    const parsed = new URL(targetUrl);
    const db = parsed.pathname.length > 1 ? Number(parsed.pathname.slice(1)) : undefined;
    return {
      host: parsed.hostname,
      port: Number(parsed.port || 6379),
      username: parsed.username || undefined,
      password: parsed.password || undefined,
      db: Number.isNaN(db) ? undefined : db,
      tls: targetUrl.startsWith('rediss:') ? { rejectUnauthorized: false } : undefined,
      // Required by BullMQ workers (blocking commands)
      maxRetriesPerRequest: null,
    };
  } catch (e) {
    logger.error('❌ Failed to parse Redis URL for BullMQ');
    return undefined;
  }
};

// --- JOB RUNNER ---
// 'inline': the API process runs the timers. 'queue': the worker process owns scheduling.
const resolveJobRunner = (connection: ConnectionOptions | undefined): 'inline' | 'queue' => {
  const requested = env.JOB_RUNNER ?? (env.REDIS_QUEUE_URL ? 'queue' : 'inline');
  if (requested === 'queue' && !connection) {
    logger.warn('⚠️ JOB_RUNNER=queue needs REDIS_QUEUE_URL or REDIS_URL. Running jobs in-process.');
    return 'inline';
  }
  return requested;
};

const bullMQConnection = getBullMQConfig();

const config = {
  port: env.PORT,
  env: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  mongoUri: env.MONGODB_URI,
  mongoPoolSize: env.MONGO_POOL_SIZE,
  redisUrl: env.REDIS_URL,
  bullMQConnection,
  corsOrigins: splitList(env.CORS_ORIGINS),
  trustProxyLevel: env.TRUST_PROXY_LVL,

  worker: {
    concurrency: env.WORKER_CONCURRENCY,
  },

  jobs: {
    runner: resolveJobRunner(bullMQConnection),
  },

  weather: {
    provider: env.WEATHER_PROVIDER,
    apiKey: env.OPENWEATHER_API_KEY.trim(),
    baseUrl: env.OPENWEATHER_BASE_URL,
    timeoutMs: env.WEATHER_PROVIDER_TIMEOUT_MS,
  },

  cache: {
    ttlSeconds: env.CACHE_TTL_SECONDS,
  },

  rateLimit: {
    limit: env.RATE_LIMIT_REQUESTS,
    windowSeconds: env.RATE_LIMIT_WINDOW,
    exemptPaths: splitList(env.RATE_LIMIT_EXEMPT_PATHS),
  },

  history: {
    maxPerCity: env.HISTORY_MAX_PER_CITY,
    inlinePrune: env.HISTORY_INLINE_PRUNE,
    retentionDays: env.HISTORY_RETENTION_DAYS,
    cleanupIntervalSeconds: env.CLEANUP_INTERVAL_SECONDS,
  },
};

export type AppConfig = typeof config;

logger.info('✅ Configuration Validated & Loaded');

export default config;

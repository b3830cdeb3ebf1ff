// utils/constants.ts

export const ONE_MINUTE = 60 * 1000;
export const FIVE_MINUTES = 5 * ONE_MINUTE;
export const THIRTY_MINUTES = 30 * ONE_MINUTE;
export const ONE_HOUR = 60 * ONE_MINUTE;
export const ONE_DAY = 24 * ONE_HOUR;

// --- CENTRAL CONFIGURATION ---
export const CONSTANTS = {
  // History
  HISTORY: {
    DEFAULT_LIMIT: 10,
    MAX_LIMIT: 50,
    STATS_WINDOW_MS: ONE_DAY,
    TOP_CITIES: 10,
  },

  // City input
  CITY: {
    MAX_LENGTH: 100,
  },

  // Queue Configuration (Centralized)
  QUEUE: {
    NAME: 'weather-maintenance-queue',
  },

  // Job names (shared by the scheduler registry and the BullMQ worker)
  JOBS: {
    CLEANUP_HISTORY: 'cleanup-weather-history',
    CLEANUP_OLD_DATA: 'cleanup-old-weather-data',
    GENERATE_STATS: 'generate-weather-stats',
    CLEANUP_EXPIRED_CACHE: 'cleanup-expired-cache',
  },

  // Redis Keys (Prevent typos)
  REDIS_KEYS: {
    WEATHER_CACHE: 'weather_cache',
    RATE_LIMIT: 'ratelimit',
  },
} as const;

// utils/serviceContainer.ts
import mongoose from 'mongoose';
import logger from './logger';
import type { AppConfig } from './config';
import { MemoryKeyValueStore } from './memoryStore';
import { createRedisConnection, RedisConnection, RedisKeyValueStore } from './redisClient';
import { DbLoader } from './dbLoader';
import { HealthCheck, IKeyValueStore } from '../types';
import { createWeatherProvider } from '../services/weather';
import { MongoHistoryStore } from '../services/history/MongoHistoryStore';
import HistoryService from '../services/historyService';
import WeatherService from '../services/weatherService';
import RateLimiter from '../services/rateLimitService';

export interface ServiceContainer {
    redis: RedisConnection | null;
    store: IKeyValueStore;
    dbLoader: DbLoader;
    historyService: HistoryService;
    weatherService: WeatherService;
    rateLimiter: RateLimiter;
    healthChecks: Record<string, HealthCheck>;
}

/**
 * Composition root shared by the API server and the worker.
 * Nothing connects here; call dbLoader.connect() before serving.
 */
export const buildServices = (config: AppConfig): ServiceContainer => {
    const redis = config.redisUrl ? createRedisConnection(config.redisUrl) : null;

    let store: IKeyValueStore;
    if (redis) {
        store = new RedisKeyValueStore(redis);
    } else {
        logger.warn('⚠️ REDIS_URL not set. Using in-process memory store (cache and rate limits are per process).');
        store = new MemoryKeyValueStore();
    }

    const historyService = new HistoryService(new MongoHistoryStore(), {
        maxPerCity: config.history.maxPerCity,
        inlinePrune: config.history.inlinePrune,
    });

    const weatherService = new WeatherService({
        provider: createWeatherProvider(config.weather),
        store,
        history: historyService,
        ttlSeconds: config.cache.ttlSeconds,
    });

    const rateLimiter = new RateLimiter(store, {
        limit: config.rateLimit.limit,
        windowSeconds: config.rateLimit.windowSeconds,
    });

    const dbLoader = new DbLoader({
        mongoUri: config.mongoUri,
        mongoPoolSize: config.mongoPoolSize,
        redis,
    });

    const healthChecks: Record<string, HealthCheck> = {
        mongo: async () => mongoose.connection.readyState === 1,
        [store.kind]: () => store.ping(),
    };

    return { redis, store, dbLoader, historyService, weatherService, rateLimiter, healthChecks };
};

export default buildServices;

// services/weatherService.ts
import { z } from 'zod';
import HistoryService from './historyService';
import { IWeatherProvider } from './weather/IWeatherProvider';
import { IKeyValueStore, IWeatherData, IWeatherLookup } from '../types';
import { ValidationError } from '../utils/AppError';
import { errorMessage, normalizeCity, weatherCacheKey } from '../utils/helpers';
import logger from '../utils/logger';
import metrics from '../utils/metrics';

const CachedWeatherSchema = z.object({
    city: z.string(),
    country: z.string().optional(),
    temperature: z.number(),
    description: z.string(),
    humidity: z.number().optional(),
    pressure: z.number().optional(),
    windSpeed: z.number().optional(),
    provider: z.string(),
    fetchedAt: z.string().datetime(),
});

export interface WeatherServiceOptions {
    provider: IWeatherProvider;
    store: IKeyValueStore;
    history: HistoryService;
    ttlSeconds: number;
    now?: () => Date;
}

/**
 * Cache-aside lookup: cache first, provider on miss, history on every success.
 */
class WeatherService {
    private readonly now: () => Date;

    constructor(private readonly options: WeatherServiceOptions) {
        this.now = options.now ?? (() => new Date());
    }

    async getWeather(rawCity: string, clientIp: string): Promise<IWeatherLookup> {
        const city = normalizeCity(rawCity);
        if (!city) {
            throw new ValidationError('City is required', [{ field: 'city', message: 'City is required' }]);
        }

        const key = weatherCacheKey(city);
        const endTimer = metrics.lookupDuration.startTimer();
        logger.info(`🌍 Getting weather for ${city} from IP ${clientIp}`);

        // 1. Try Cache First
        const cachedWeather = await this.readCache(key);
        if (cachedWeather) {
            metrics.cacheHits.inc();
            metrics.weatherRequests.inc({ cached: 'true' });
            endTimer({ cached: 'true' });
            await this.recordHistory(city, clientIp, cachedWeather, true);
            return { weather: cachedWeather, cached: true };
        }

        // 2. Miss: fetch upstream. Failures propagate and nothing is cached.
        metrics.cacheMisses.inc();
        const weather = await this.options.provider.fetchWeather(city);
        metrics.weatherRequests.inc({ cached: 'false' });
        endTimer({ cached: 'false' });

        await this.writeCache(key, weather);
        await this.recordHistory(city, clientIp, weather, false);
        return { weather, cached: false };
    }

    async invalidateCache(rawCity: string): Promise<boolean> {
        const city = normalizeCity(rawCity);
        if (!city) {
            throw new ValidationError('City is required', [{ field: 'city', message: 'City is required' }]);
        }

        const removed = await this.options.store.del(weatherCacheKey(city));
        logger.info(`🗑️ Cache invalidated for ${city} (entry existed: ${removed})`);
        return removed;
    }

    private async readCache(key: string): Promise<IWeatherData | null> {
        let raw: string | null;
        try {
            raw = await this.options.store.get(key);
        } catch (error) {
            logger.warn(`⚠️ Cache read failed for ${key}, fetching upstream: ${errorMessage(error)}`);
            return null;
        }
        if (!raw) return null;

        let payload: unknown;
        try {
            payload = JSON.parse(raw);
        } catch (error) {
            logger.warn(`⚠️ Discarding unreadable cache entry ${key}: ${errorMessage(error)}`);
            return null;
        }

        const parsed = CachedWeatherSchema.safeParse(payload);
        if (!parsed.success) {
            logger.warn(`⚠️ Discarding malformed cache entry ${key}`);
            return null;
        }

        // Entries written under a longer TTL are not served past the current one
        const ageMs = this.now().getTime() - Date.parse(parsed.data.fetchedAt);
        if (ageMs > this.options.ttlSeconds * 1000) {
            return null;
        }

        return parsed.data;
    }

    private async writeCache(key: string, weather: IWeatherData): Promise<void> {
        try {
            await this.options.store.set(key, JSON.stringify(weather), this.options.ttlSeconds);
            logger.debug(`💾 Cached weather data for ${key} with TTL ${this.options.ttlSeconds}s`);
        } catch (error) {
            logger.warn(`⚠️ Cache write failed for ${key}: ${errorMessage(error)}`);
        }
    }

    private async recordHistory(city: string, clientIp: string, weather: IWeatherData, cached: boolean): Promise<void> {
        try {
            await this.options.history.record(city, clientIp, weather, cached);
        } catch (error) {
            // The lookup already succeeded; a history write failure does not fail the request
            logger.error(`❌ Error saving weather query to history for ${city}: ${errorMessage(error)}`);
        }
    }
}

export default WeatherService;

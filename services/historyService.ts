// services/historyService.ts
import { IHistoryStore } from './history/IHistoryStore';
import { IHistoryStats, IPruneResult, IWeatherData, IWeatherQueryRecord } from '../types';
import { CONSTANTS, ONE_DAY } from '../utils/constants';
import { errorMessage, normalizeCity } from '../utils/helpers';
import logger from '../utils/logger';
import metrics from '../utils/metrics';

export interface HistoryOptions {
    maxPerCity: number;
    inlinePrune: boolean;
    now?: () => Date;
}

/**
 * Owns the WeatherQuery rows: appends one per lookup and enforces the per-city cap.
 * The periodic sweep (pruneToLimit) is authoritative; inline pruning only keeps
 * the overshoot between sweeps small.
 */
class HistoryService {
    private readonly now: () => Date;

    constructor(private readonly store: IHistoryStore, private readonly options: HistoryOptions) {
        this.now = options.now ?? (() => new Date());
    }

    // 1. Append a query record
    async record(city: string, clientIp: string, weather: IWeatherData, cached: boolean): Promise<void> {
        await this.store.insert({
            city,
            clientIp,
            temperature: weather.temperature,
            description: weather.description,
            country: weather.country,
            humidity: weather.humidity,
            pressure: weather.pressure,
            windSpeed: weather.windSpeed,
            cached,
            createdAt: this.now(),
        });
        logger.debug(`📝 Recorded weather query for ${city} from ${clientIp} (cached: ${cached})`);

        if (this.options.inlinePrune) {
            const deleted = await this.store.pruneCity(city, this.options.maxPerCity);
            if (deleted > 0) metrics.historyPruned.inc({ reason: 'inline' }, deleted);
        }
    }

    // 2. Most recent queries for a city, newest first
    async getHistory(city: string, limit: number = CONSTANTS.HISTORY.DEFAULT_LIMIT): Promise<IWeatherQueryRecord[]> {
        const capped = Math.min(Math.max(1, Math.floor(limit)), CONSTANTS.HISTORY.MAX_LIMIT);
        return this.store.findRecent(normalizeCity(city), capped);
    }

    // 3. Retention sweep across every city
    async pruneToLimit(maxPerCity: number = this.options.maxPerCity): Promise<IPruneResult> {
        const cities = await this.store.distinctCities();
        const failedCities: string[] = [];
        let deleted = 0;

        for (const city of cities) {
            try {
                const removed = await this.store.pruneCity(city, maxPerCity);
                if (removed > 0) {
                    logger.info(`🧹 Deleted ${removed} old queries for city: ${city}`);
                    deleted += removed;
                }
            } catch (error) {
                // One city's failure must not block the others
                failedCities.push(city);
                logger.error(`❌ History prune failed for ${city}: ${errorMessage(error)}`);
            }
        }

        if (deleted > 0) metrics.historyPruned.inc({ reason: 'sweep' }, deleted);
        logger.info(`✨ History cleanup completed. Cities: ${cities.length}, Deleted: ${deleted}, Failed: ${failedCities.length}`);
        return { deleted, cities: cities.length, failedCities };
    }

    // 4. Age-based retention
    async pruneOlderThan(days: number): Promise<number> {
        const cutoff = new Date(this.now().getTime() - days * ONE_DAY);
        const deleted = await this.store.deleteOlderThan(cutoff);
        if (deleted > 0) metrics.historyPruned.inc({ reason: 'age' }, deleted);
        logger.info(`🧹 Cleaned up ${deleted} queries older than ${days} days`);
        return deleted;
    }

    // 5. Usage summary
    async getStats(windowMs: number = CONSTANTS.HISTORY.STATS_WINDOW_MS): Promise<IHistoryStats> {
        const since = new Date(this.now().getTime() - windowMs);
        return this.store.summarize(since, CONSTANTS.HISTORY.TOP_CITIES);
    }
}

export default HistoryService;

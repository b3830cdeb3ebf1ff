// jobs/jobHandlers.ts
import logger from '../utils/logger';
import metrics from '../utils/metrics';
import { CONSTANTS, FIVE_MINUTES, ONE_HOUR, THIRTY_MINUTES } from '../utils/constants';
import { MemoryKeyValueStore } from '../utils/memoryStore';
import HistoryService from '../services/historyService';
import { IKeyValueStore } from '../types';
import { JobScheduler } from './scheduler';

export interface JobDependencies {
    historyService: HistoryService;
    store: IKeyValueStore;
    history: {
        maxPerCity: number;
        retentionDays: number;
        cleanupIntervalSeconds: number;
    };
}

/**
 * Handler: Per-city history cap
 * Keeps only the newest `maxPerCity` queries for every city.
 */
export const handleCleanupHistory = (deps: JobDependencies) => async () =>
    deps.historyService.pruneToLimit(deps.history.maxPerCity);

/**
 * Handler: Age-based retention
 */
export const handleCleanupOldData = (deps: JobDependencies) => async () => {
    const deleted = await deps.historyService.pruneOlderThan(deps.history.retentionDays);
    return { deleted };
};

/**
 * Handler: Usage statistics
 * Refreshes the 24h gauges exposed on /metrics.
 */
export const handleGenerateStats = (deps: JobDependencies) => async () => {
    const stats = await deps.historyService.getStats(CONSTANTS.HISTORY.STATS_WINDOW_MS);
    metrics.queries24h.set(stats.queriesSince);
    metrics.uniqueCities24h.set(stats.uniqueCities);
    logger.info(`📊 Weather stats: ${stats.queriesSince} queries, ${stats.uniqueCities} cities in the last 24h`);
    return stats;
};

/**
 * Handler: Expired cache entries
 * Redis expires keys on its own; only the in-process store needs sweeping.
 */
export const handleCleanupExpiredCache = (store: MemoryKeyValueStore) => async () => {
    const purged = store.purgeExpired();
    if (purged > 0) logger.info(`🧹 Purged ${purged} expired cache entries`);
    return { purged };
};

export const registerJobHandlers = (scheduler: JobScheduler, deps: JobDependencies): JobScheduler => {
    scheduler
        .register(CONSTANTS.JOBS.CLEANUP_HISTORY, deps.history.cleanupIntervalSeconds * 1000, handleCleanupHistory(deps))
        .register(CONSTANTS.JOBS.CLEANUP_OLD_DATA, ONE_HOUR, handleCleanupOldData(deps))
        .register(CONSTANTS.JOBS.GENERATE_STATS, FIVE_MINUTES, handleGenerateStats(deps));

    if (deps.store instanceof MemoryKeyValueStore) {
        scheduler.register(CONSTANTS.JOBS.CLEANUP_EXPIRED_CACHE, THIRTY_MINUTES, handleCleanupExpiredCache(deps.store));
    }

    return scheduler;
};

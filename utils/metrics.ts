// utils/metrics.ts
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

// Dedicated registry so tests and the /metrics route see only this service's series
export const registry = new Registry();

collectDefaultMetrics({ register: registry, prefix: 'weather_service_' });

export const metrics = {
    weatherRequests: new Counter({
        name: 'weather_service_requests_total',
        help: 'Total number of weather lookups',
        labelNames: ['cached'] as const,
        registers: [registry],
    }),
    cacheHits: new Counter({
        name: 'weather_service_cache_hits_total',
        help: 'Total number of cache hits',
        registers: [registry],
    }),
    cacheMisses: new Counter({
        name: 'weather_service_cache_misses_total',
        help: 'Total number of cache misses',
        registers: [registry],
    }),
    lookupDuration: new Histogram({
        name: 'weather_service_request_duration_seconds',
        help: 'Duration of weather lookups',
        labelNames: ['cached'] as const,
        registers: [registry],
    }),
    providerRequests: new Counter({
        name: 'weather_service_external_api_requests_total',
        help: 'Total number of external API requests',
        labelNames: ['provider', 'status'] as const,
        registers: [registry],
    }),
    providerDuration: new Histogram({
        name: 'weather_service_external_api_duration_seconds',
        help: 'Duration of external API requests',
        labelNames: ['provider'] as const,
        registers: [registry],
    }),
    rateLimitBlocked: new Counter({
        name: 'weather_service_rate_limit_blocked_total',
        help: 'Total number of requests blocked by rate limiting',
        registers: [registry],
    }),
    historyPruned: new Counter({
        name: 'weather_service_history_pruned_total',
        help: 'Total number of history rows deleted by retention',
        labelNames: ['reason'] as const,
        registers: [registry],
    }),
    queries24h: new Gauge({
        name: 'weather_service_queries_24h',
        help: 'Weather queries recorded in the last 24 hours',
        registers: [registry],
    }),
    uniqueCities24h: new Gauge({
        name: 'weather_service_unique_cities_24h',
        help: 'Distinct cities queried in the last 24 hours',
        registers: [registry],
    }),
};

export default metrics;

import request from 'supertest';
import { Express } from 'express';
import { createApp } from './app';
import HistoryService from './services/historyService';
import WeatherService from './services/weatherService';
import RateLimiter from './services/rateLimitService';
import { MemoryKeyValueStore } from './utils/memoryStore';
import { UpstreamError } from './utils/AppError';
import { MockWeatherProvider } from './services/weather/MockWeatherProvider';
import { IWeatherProvider } from './services/weather/IWeatherProvider';
import { HealthCheck } from './types';
import { FakeClock, InMemoryHistoryStore, StubProvider } from './test/fakes';

interface Harness {
  app: Express;
  clock: FakeClock;
  store: MemoryKeyValueStore;
  historyStore: InMemoryHistoryStore;
  provider: StubProvider;
}

interface HarnessOverrides {
  limit?: number;
  healthChecks?: Record<string, HealthCheck>;
  weatherProvider?: (now: () => Date) => IWeatherProvider;
}

const buildHarness = (overrides: HarnessOverrides = {}): Harness => {
  const clock = new FakeClock();
  const store = new MemoryKeyValueStore(clock.now);
  const historyStore = new InMemoryHistoryStore();
  const provider = new StubProvider(clock.date);
  const historyService = new HistoryService(historyStore, { maxPerCity: 10, inlinePrune: true, now: clock.date });
  const weatherService = new WeatherService({
    provider: overrides.weatherProvider?.(clock.date) ?? provider,
    store,
    history: historyService,
    ttlSeconds: 600,
    now: clock.date,
  });
  const rateLimiter = new RateLimiter(store, { limit: overrides.limit ?? 5, windowSeconds: 60 });

  const app = createApp({
    weatherService,
    historyService,
    rateLimiter,
    healthChecks: overrides.healthChecks ?? { mongo: async () => true, memory: () => store.ping() },
    now: clock.date,
  }, {
    trustProxy: 1,
    corsOrigins: [],
    exemptPaths: ['/health', '/ping', '/metrics'],
  });

  return { app, clock, store, historyStore, provider };
};

describe('Weather API', () => {
  let h: Harness;

  beforeEach(() => {
    h = buildHarness();
  });

  it('walks the São Paulo scenario with the mock provider', async () => {
    h = buildHarness({ weatherProvider: (now) => new MockWeatherProvider(now) });
    const lookup = (city: string) => request(h.app).get('/weather').query({ city }).set('X-Forwarded-For', '10.0.0.7');

    const first = await lookup('São Paulo').expect(200);
    expect(first.body).toMatchObject({ city: 'São Paulo', cached: false, temperature: 25, description: 'Sunny' });

    const second = await lookup('São Paulo').expect(200);
    expect(second.body).toEqual({ ...first.body, cached: true });

    const missing = await lookup('NonExistentCity123').expect(404);
    expect(missing.body).toEqual({ status: 'fail', code: 'CITY_NOT_FOUND', message: "City 'Nonexistentcity123' not found" });

    await lookup('São Paulo').expect(200);
    await lookup('São Paulo').expect(200);
    await lookup('São Paulo').expect(429);
  });

  describe('GET /weather', () => {
    it('returns an uncached lookup, then the same payload from cache', async () => {
      const first = await request(h.app)
        .get('/weather')
        .query({ city: 'São Paulo' })
        .set('X-Forwarded-For', '10.0.0.1')
        .expect(200);

      expect(first.body).toEqual({
        city: 'São Paulo',
        country: 'BR',
        temperature: 25,
        description: 'Clear Sky',
        humidity: 60,
        pressure: 1013,
        windSpeed: 5.5,
        provider: 'stub',
        fetchedAt: '2024-01-01T12:00:00.000Z',
        cached: false,
        timestamp: '2024-01-01T12:00:00.000Z',
      });

      const second = await request(h.app)
        .get('/weather')
        .query({ city: '  são paulo ' })
        .set('X-Forwarded-For', '10.0.0.1')
        .expect(200);

      expect(second.body).toEqual({ ...first.body, cached: true });
      expect(h.provider.calls).toEqual(['São Paulo']);
      expect(h.historyStore.rows.map((row) => row.cached)).toEqual([false, true]);
    });

    it('is also served under /api/v1', async () => {
      const res = await request(h.app).get('/api/v1/weather?city=Lima').expect(200);

      expect(res.body.city).toBe('Lima');
    });

    it('returns 404 for an unknown city', async () => {
      h.provider.unknown.add('Atlantis');

      const res = await request(h.app).get('/weather?city=atlantis').expect(404);

      expect(res.body).toEqual({ status: 'fail', code: 'CITY_NOT_FOUND', message: "City 'Atlantis' not found" });
      expect(h.historyStore.rows).toHaveLength(0);
    });

    it('returns 400 without a city', async () => {
      const res = await request(h.app).get('/weather').expect(400);

      expect(res.body).toEqual({
        status: 'fail',
        code: 'VALIDATION_ERROR',
        message: 'Invalid input data',
        details: [{ field: 'city', message: 'City is required' }],
      });
    });

    it('returns 400 for a blank city', async () => {
      const res = await request(h.app).get('/weather?city=%20%20').expect(400);

      expect(res.body.details).toEqual([{ field: 'city', message: 'City is required' }]);
    });

    it('returns 503 when the provider is unreachable', async () => {
      h.provider.failWith = new UpstreamError('Weather provider unavailable', true);

      const res = await request(h.app).get('/weather?city=Lima').expect(503);

      expect(res.body).toEqual({ status: 'error', code: 'UPSTREAM_UNAVAILABLE', message: 'Weather provider unavailable' });
    });
  });

  describe('rate limiting', () => {
    it('blocks the sixth request in a window and allows the next window', async () => {
      for (let i = 0; i < 5; i++) {
        await request(h.app).get('/weather?city=Lima').set('X-Forwarded-For', '10.0.0.2').expect(200);
      }

      const blocked = await request(h.app).get('/weather?city=Lima').set('X-Forwarded-For', '10.0.0.2').expect(429);

      expect(blocked.headers['retry-after']).toBe('60');
      expect(blocked.headers['ratelimit-remaining']).toBe('0');
      expect(blocked.body).toEqual({
        status: 'fail',
        code: 'RATE_LIMITED',
        message: 'Too many requests, please try again later.',
        retryAfter: 60,
      });
      expect(h.historyStore.rows).toHaveLength(5);

      // Other clients are unaffected
      await request(h.app).get('/weather?city=Lima').set('X-Forwarded-For', '10.0.0.3').expect(200);

      h.clock.advance(60_000);
      await request(h.app).get('/weather?city=Lima').set('X-Forwarded-For', '10.0.0.2').expect(200);
    });

    it('sends RateLimit headers on allowed requests', async () => {
      const res = await request(h.app).get('/weather?city=Lima').set('X-Forwarded-For', '10.0.0.4').expect(200);

      expect(res.headers['ratelimit-limit']).toBe('5');
      expect(res.headers['ratelimit-remaining']).toBe('4');
      expect(res.headers['ratelimit-reset']).toBe('60');
    });

    it('exempts health, ping and metrics', async () => {
      h = buildHarness({ limit: 1 });
      await request(h.app).get('/weather?city=Lima').set('X-Forwarded-For', '10.0.0.5').expect(200);

      for (let i = 0; i < 3; i++) {
        await request(h.app).get('/health').set('X-Forwarded-For', '10.0.0.5').expect(200);
        await request(h.app).get('/ping').set('X-Forwarded-For', '10.0.0.5').expect(200);
        await request(h.app).get('/metrics').set('X-Forwarded-For', '10.0.0.5').expect(200);
      }

      await request(h.app).get('/weather?city=Lima').set('X-Forwarded-For', '10.0.0.5').expect(429);
    });

    it('answers 500 when the limiter store fails', async () => {
      jest.spyOn(h.store, 'hitWindow').mockRejectedValue(new Error('store down'));

      const res = await request(h.app).get('/weather?city=Lima').expect(500);

      expect(res.body).toEqual({ status: 'error', code: 'INTERNAL_ERROR', message: 'Internal Server Error' });
      expect(h.provider.calls).toHaveLength(0);
    });
  });

  describe('GET /weather/history', () => {
    it('returns the newest queries first without client IPs', async () => {
      for (let i = 0; i < 3; i++) {
        await request(h.app).get('/weather?city=Paris').set('X-Forwarded-For', '10.0.0.6').expect(200);
        h.clock.advance(1_000);
      }

      const res = await request(h.app).get('/weather/history?city=paris&limit=2').expect(200);

      expect(res.body.city).toBe('Paris');
      expect(res.body.total).toBe(2);
      expect(res.body.limit).toBe(2);
      expect(res.body.queries.map((q: { createdAt: string }) => q.createdAt)).toEqual([
        '2024-01-01T12:00:02.000Z',
        '2024-01-01T12:00:01.000Z',
      ]);
      expect(res.body.queries[0]).not.toHaveProperty('clientIp');
      expect(res.body.queries[0]).toMatchObject({ city: 'Paris', temperature: 25, cached: true });
    });

    it('falls back to the default limit for invalid values', async () => {
      const res = await request(h.app).get('/weather/history?city=Paris&limit=abc').expect(200);

      expect(res.body).toEqual({ city: 'Paris', queries: [], total: 0, limit: 10 });
    });
  });

  describe('DELETE /weather/cache', () => {
    it('drops the cached entry so the next lookup fetches again', async () => {
      await request(h.app).get('/weather?city=Oslo').expect(200);

      await request(h.app).delete('/weather/cache?city=oslo').expect(204);

      const res = await request(h.app).get('/weather?city=Oslo').expect(200);
      expect(res.body.cached).toBe(false);
      expect(h.provider.calls).toEqual(['Oslo', 'Oslo']);
    });

    it('ignores a malformed JSON body', async () => {
      await request(h.app)
        .delete('/weather/cache?city=Oslo')
        .set('Content-Type', 'application/json')
        .send('{bad')
        .expect(204);
    });
  });

  describe('system routes', () => {
    it('reports healthy dependencies', async () => {
      const res = await request(h.app).get('/health').expect(200);

      expect(res.body).toEqual({ status: 'OK', checks: { mongo: 'UP', memory: 'UP' } });
    });

    it('reports a degraded service with 503', async () => {
      h = buildHarness({
        healthChecks: {
          mongo: async () => false,
          memory: async () => { throw new Error('unreachable'); },
        },
      });

      const res = await request(h.app).get('/health').expect(503);

      expect(res.body).toEqual({ status: 'DEGRADED', checks: { mongo: 'DOWN', memory: 'DOWN' } });
    });

    it('exposes Prometheus metrics', async () => {
      await request(h.app).get('/weather?city=Lima').expect(200);

      const res = await request(h.app).get('/metrics').expect(200);

      expect(res.headers['content-type']).toMatch(/^text\/plain/);
      expect(res.text).toMatch(/^weather_service_requests_total\{cached="false"\} [1-9]\d*$/m);
      expect(res.text).toContain('# TYPE weather_service_rate_limit_blocked_total counter');
    });

    it('answers ping with OK', async () => {
      const res = await request(h.app).get('/ping').expect(200);

      expect(res.text).toBe('OK');
    });

    it('returns a JSON 404 for unknown routes', async () => {
      const res = await request(h.app).get('/nope').expect(404);

      expect(res.body).toEqual({ status: 'fail', code: 'ROUTE_NOT_FOUND', message: 'API Endpoint Not Found', path: '/nope' });
    });
  });
});

import type { AppConfig } from './config';

const ORIGINAL_ENV = process.env;
const MANAGED_KEYS = ['REDIS_URL', 'REDIS_QUEUE_URL', 'JOB_RUNNER', 'RATE_LIMIT_REQUESTS', 'CACHE_TTL_SECONDS'];

const loadConfig = (overrides: Record<string, string> = {}): AppConfig => {
  const env: NodeJS.ProcessEnv = { ...ORIGINAL_ENV };
  MANAGED_KEYS.forEach((key) => delete env[key]);
  process.env = { ...env, ...overrides };

  let loaded: AppConfig | undefined;
  jest.isolateModules(() => {
    loaded = require('./config').default;
  });
  if (!loaded) throw new Error('config did not load');
  return loaded;
};

describe('config', () => {
  let exit: jest.SpyInstance;

  beforeEach(() => {
    exit = jest.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    exit.mockRestore();
    process.env = ORIGINAL_ENV;
  });

  it('applies the defaults', () => {
    const config = loadConfig();

    expect(config.rateLimit.limit).toBe(5);
    expect(config.rateLimit.windowSeconds).toBe(60);
    expect(config.cache.ttlSeconds).toBe(600);
    expect(config.bullMQConnection).toBeUndefined();
    expect(config.jobs.runner).toBe('inline');
  });

  it('parses numeric settings', () => {
    const config = loadConfig({ RATE_LIMIT_REQUESTS: '7', CACHE_TTL_SECONDS: '120' });

    expect(config.rateLimit.limit).toBe(7);
    expect(config.cache.ttlSeconds).toBe(120);
  });

  it.each(['five', '0', '-3', '2.5'])('exits on RATE_LIMIT_REQUESTS=%s', (value) => {
    expect(() => loadConfig({ RATE_LIMIT_REQUESTS: value })).toThrow('process.exit called');
    expect(exit).toHaveBeenCalledWith(1);
  });

  it('keeps jobs in-process when only the cache Redis is configured', () => {
    const config = loadConfig({ REDIS_URL: 'redis://localhost:6379/0' });

    expect(config.bullMQConnection).toMatchObject({ host: 'localhost', port: 6379, db: 0 });
    expect(config.jobs.runner).toBe('inline');
  });

  it('hands jobs to the worker when a queue Redis is configured', () => {
    const config = loadConfig({ REDIS_QUEUE_URL: 'redis://localhost:6380/1' });

    expect(config.bullMQConnection).toMatchObject({ host: 'localhost', port: 6380, db: 1 });
    expect(config.jobs.runner).toBe('queue');
  });

  it('honours an explicit JOB_RUNNER', () => {
    expect(loadConfig({ REDIS_QUEUE_URL: 'redis://localhost:6380/1', JOB_RUNNER: 'inline' }).jobs.runner).toBe('inline');
    expect(loadConfig({ REDIS_URL: 'redis://localhost:6379/0', JOB_RUNNER: 'queue' }).jobs.runner).toBe('queue');
  });

  it('runs jobs in-process when queue mode has no Redis to use', () => {
    expect(loadConfig({ JOB_RUNNER: 'queue' }).jobs.runner).toBe('inline');
  });
});

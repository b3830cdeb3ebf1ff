// utils/redisClient.ts
import { createClient } from 'redis';
import logger from './logger';
import { IKeyValueStore, IWindowHit } from '../types';

export type RedisConnection = ReturnType<typeof createClient>;

/**
 * Creates (but does not connect) a Redis client.
 * The handle is owned by DbLoader, which opens it at startup and closes it on shutdown.
 */
export const createRedisConnection = (url: string): RedisConnection => {
    const client = createClient({
        url,
        socket: {
            reconnectStrategy: (retries: number) => {
                if (retries > 20) {
                    logger.error('❌ Redis: Max Retries Reached. Waiting 5s...');
                    return 5000;
                }
                return Math.min(retries * 100, 3000);
            },
            connectTimeout: 15000,
            keepAlive: 15000,
        },
    });

    let isHealthy = false;

    client.on('error', (err: Error) => {
        isHealthy = false;
        if (!err.message.includes('ECONNREFUSED') && !err.message.includes('Socket closed')) {
            logger.warn(`Redis Client Warning: ${err.message}`);
        }
    });

    client.on('ready', () => {
        if (!isHealthy) logger.info('✅ Redis Client Ready & Connected');
        isHealthy = true;
    });

    client.on('end', () => {
        isHealthy = false;
        logger.warn('Redis Client Disconnected');
    });

    return client;
};

// KEYS[1] = window key, ARGV[1] = limit, ARGV[2] = window in ms
// Returns { count, allowed (0|1), pttl }
const FIXED_WINDOW_SCRIPT = `
local current = tonumber(redis.call('GET', KEYS[1]) or '0')
local limit = tonumber(ARGV[1])
if current >= limit then
  return { current, 0, redis.call('PTTL', KEYS[1]) }
end
current = redis.call('INCR', KEYS[1])
local ttl = redis.call('PTTL', KEYS[1])
if ttl < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[2])
  ttl = tonumber(ARGV[2])
end
return { current, 1, ttl }
`;

const parseWindowReply = (reply: unknown, windowMs: number): IWindowHit => {
    if (!Array.isArray(reply) || reply.length !== 3) {
        throw new Error(`Unexpected rate window reply: ${JSON.stringify(reply)}`);
    }
    const [count, allowed, ttl] = reply.map(Number);
    if ([count, allowed, ttl].some((n) => Number.isNaN(n))) {
        throw new Error(`Unexpected rate window reply: ${JSON.stringify(reply)}`);
    }
    return {
        count,
        allowed: allowed === 1,
        resetInMs: ttl > 0 ? ttl : windowMs,
    };
};

export class RedisKeyValueStore implements IKeyValueStore {
    public readonly kind = 'redis' as const;

    constructor(private readonly client: RedisConnection) {}

    async get(key: string): Promise<string | null> {
        return this.client.get(key);
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        await this.client.set(key, value, { EX: ttlSeconds });
    }

    async del(key: string): Promise<boolean> {
        const removed = await this.client.del(key);
        return removed > 0;
    }

    async hitWindow(key: string, limit: number, windowSeconds: number): Promise<IWindowHit> {
        const windowMs = windowSeconds * 1000;
        const reply: unknown = await this.client.eval(FIXED_WINDOW_SCRIPT, {
            keys: [key],
            arguments: [String(limit), String(windowMs)],
        });
        return parseWindowReply(reply, windowMs);
    }

    async ping(): Promise<boolean> {
        if (!this.client.isReady) return false;
        try {
            return (await this.client.ping()) === 'PONG';
        } catch (e) {
            logger.warn(`Redis ping failed: ${e instanceof Error ? e.message : String(e)}`);
            return false;
        }
    }
}

export default RedisKeyValueStore;

// services/rateLimitService.ts
import { IKeyValueStore } from '../types';
import { CONSTANTS } from '../utils/constants';

export interface RateLimitOptions {
    limit: number;
    windowSeconds: number;
}

export type RateLimitDecision =
    | { allowed: true; limit: number; remaining: number; resetInSeconds: number }
    | { allowed: false; limit: number; remaining: 0; resetInSeconds: number; retryAfterSeconds: number };

/**
 * Fixed-window limiter keyed by client IP (`ratelimit:{ip}`).
 * The check and the increment are one atomic store operation.
 */
class RateLimiter {
    constructor(private readonly store: IKeyValueStore, private readonly options: RateLimitOptions) {}

    get limit(): number {
        return this.options.limit;
    }

    async checkAndIncrement(clientIp: string): Promise<RateLimitDecision> {
        const { limit, windowSeconds } = this.options;
        const hit = await this.store.hitWindow(`${CONSTANTS.REDIS_KEYS.RATE_LIMIT}:${clientIp}`, limit, windowSeconds);
        const resetInSeconds = Math.max(1, Math.ceil(hit.resetInMs / 1000));

        if (!hit.allowed) {
            return { allowed: false, limit, remaining: 0, resetInSeconds, retryAfterSeconds: resetInSeconds };
        }
        return { allowed: true, limit, remaining: Math.max(0, limit - hit.count), resetInSeconds };
    }
}

export default RateLimiter;

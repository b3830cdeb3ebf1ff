// utils/memoryStore.ts
import { Clock, IKeyValueStore, IWindowHit } from '../types';

interface MemoryEntry {
    value: string;
    expiresAt: number;
}

/**
 * Single-process stand-in for Redis.
 * Used when REDIS_URL is not configured, and by the test suite with a controllable clock.
 * Expired keys are dropped on read; purgeExpired() reclaims the rest.
 */
export class MemoryKeyValueStore implements IKeyValueStore {
    public readonly kind = 'memory' as const;
    private readonly entries = new Map<string, MemoryEntry>();

    constructor(private readonly now: Clock = Date.now) {}

    private live(key: string): MemoryEntry | undefined {
        const entry = this.entries.get(key);
        if (!entry) return undefined;
        if (entry.expiresAt <= this.now()) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    async get(key: string): Promise<string | null> {
        return this.live(key)?.value ?? null;
    }

    async set(key: string, value: string, ttlSeconds: number): Promise<void> {
        this.entries.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    }

    async del(key: string): Promise<boolean> {
        const existed = this.live(key) !== undefined;
        this.entries.delete(key);
        return existed;
    }

    // No await between read and write, so this runs as one step on the event loop.
    async hitWindow(key: string, limit: number, windowSeconds: number): Promise<IWindowHit> {
        const now = this.now();
        const entry = this.live(key);

        if (!entry) {
            const expiresAt = now + windowSeconds * 1000;
            this.entries.set(key, { value: '1', expiresAt });
            return { count: 1, allowed: limit >= 1, resetInMs: expiresAt - now };
        }

        const current = Number(entry.value);
        if (current >= limit) {
            return { count: current, allowed: false, resetInMs: entry.expiresAt - now };
        }

        entry.value = String(current + 1);
        return { count: current + 1, allowed: true, resetInMs: entry.expiresAt - now };
    }

    async ping(): Promise<boolean> {
        return true;
    }

    purgeExpired(): number {
        const now = this.now();
        let purged = 0;
        for (const [key, entry] of this.entries) {
            if (entry.expiresAt <= now) {
                this.entries.delete(key);
                purged++;
            }
        }
        return purged;
    }

    get size(): number {
        return this.entries.size;
    }
}

export default MemoryKeyValueStore;

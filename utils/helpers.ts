// utils/helpers.ts
import { Request } from 'express';
import { CONSTANTS } from './constants';

// 1. Pause execution for X milliseconds
export const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

// 2. Title-case words, capitalizing after start, space, hyphen or apostrophe ("Saint-Étienne", "L'Aquila")
export const titleCase = (text: string): string =>
    text
        .toLocaleLowerCase()
        .replace(/(^|[\s\-'’])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toLocaleUpperCase());

// 3. Canonical display form of a city name: "  são   PAULO " -> "São Paulo"
export const normalizeCity = (raw: string): string =>
    titleCase(raw.normalize('NFC').replace(/\s+/g, ' ').trim());

// 4. Cache key for a normalized city
export const weatherCacheKey = (city: string): string =>
    `${CONSTANTS.REDIS_KEYS.WEATHER_CACHE}:${city.toLocaleLowerCase()}`;

// 5. Client IP as resolved by Express ('trust proxy' decides how X-Forwarded-For is read)
export const getClientIp = (req: Request): string => req.ip || req.socket.remoteAddress || 'unknown-ip';

// 6. Error message extraction for logs
export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

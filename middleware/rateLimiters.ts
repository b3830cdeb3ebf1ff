// middleware/rateLimiters.ts
import { Request, Response, NextFunction, RequestHandler } from 'express';
import RateLimiter from '../services/rateLimitService';
import { RateLimitedError } from '../utils/AppError';
import { getClientIp } from '../utils/helpers';
import logger from '../utils/logger';
import metrics from '../utils/metrics';

export interface RateLimitMiddlewareOptions {
    exemptPaths: string[];
}

const isExempt = (path: string, exemptPaths: string[]): boolean =>
    exemptPaths.some((exempt) => path === exempt || path === `${exempt}/`);

/**
 * Per-IP gate in front of every route except the exempt ones (health, metrics).
 * Sends the standard RateLimit-* headers; a blocked request never reaches a controller,
 * so no history is written for it.
 */
export const createApiLimiter = (limiter: RateLimiter, options: RateLimitMiddlewareOptions): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction) => {
        if (isExempt(req.path, options.exemptPaths)) {
            return next();
        }

        try {
            const clientIp = getClientIp(req);
            const decision = await limiter.checkAndIncrement(clientIp);

            res.setHeader('RateLimit-Limit', String(decision.limit));
            res.setHeader('RateLimit-Remaining', String(decision.remaining));
            res.setHeader('RateLimit-Reset', String(decision.resetInSeconds));

            if (!decision.allowed) {
                metrics.rateLimitBlocked.inc();
                logger.warn(`Rate Limit Exceeded: ${clientIp}`);
                return next(new RateLimitedError(decision.retryAfterSeconds));
            }

            return next();
        } catch (error) {
            return next(error);
        }
    };

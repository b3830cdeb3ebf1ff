// app.ts
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import mongoSanitize from 'express-mongo-sanitize';
import hpp from 'hpp';
import { Registry } from 'prom-client';

import logger from './utils/logger';
import { registry as defaultRegistry } from './utils/metrics';
import { HealthCheck } from './types';
import WeatherService from './services/weatherService';
import HistoryService from './services/historyService';
import RateLimiter from './services/rateLimitService';
import { createWeatherController } from './controllers/weatherController';
import { createSystemController } from './controllers/systemController';
import { createApiLimiter } from './middleware/rateLimiters';
import { errorHandler } from './middleware/errorMiddleware';
import { createApiRouter, createSystemRouter } from './routes';

export interface AppDependencies {
    weatherService: WeatherService;
    historyService: HistoryService;
    rateLimiter: RateLimiter;
    healthChecks: Record<string, HealthCheck>;
    registry?: Registry;
    now?: () => Date;
}

export interface AppOptions {
    trustProxy: number;
    corsOrigins: string[];
    exemptPaths: string[];
}

/**
 * Builds the Express app from explicitly constructed services.
 * server.ts wires the real connections; tests pass in-process stand-ins.
 */
export const createApp = (deps: AppDependencies, options: AppOptions): Express => {
    const app = express();

    // --- 1. Trust Proxy ---
    // Must be set BEFORE rate limiters or logging that relies on IPs
    app.set('trust proxy', options.trustProxy);

    // --- 2. Request Logging ---
    app.use((req: Request, res: Response, next: NextFunction) => {
        if (!options.exemptPaths.includes(req.path)) {
            logger.http(`${req.method} ${req.url}`);
        }
        next();
    });

    // --- 3. Security Middleware ---
    app.disable('x-powered-by');
    app.use(helmet());
    app.use(compression());
    app.use(mongoSanitize());
    app.use(hpp());

    // --- 4. CORS Configuration ---
    app.use(cors({
        origin: options.corsOrigins.length > 0 ? options.corsOrigins : false,
        methods: ['GET', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
    }));

    // --- 5. Global Rate Limiter (health & metrics exempt) ---
    app.use(createApiLimiter(deps.rateLimiter, { exemptPaths: options.exemptPaths }));

    // --- 6. Mount Routes ---
    const system = createSystemController({
        healthChecks: deps.healthChecks,
        registry: deps.registry ?? defaultRegistry,
    });
    const weather = createWeatherController({
        weatherService: deps.weatherService,
        historyService: deps.historyService,
        now: deps.now,
    });
    const apiRouter = createApiRouter(weather);

    app.use('/', createSystemRouter(system));
    app.use('/api/v1', apiRouter);
    app.use('/', apiRouter);

    // --- 7. Error Handling ---
    app.use(errorHandler);

    return app;
};

export default createApp;

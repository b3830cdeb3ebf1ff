// controllers/systemController.ts
import { Request, Response } from 'express';
import { Registry } from 'prom-client';
import { HealthCheck } from '../types';
import asyncHandler from '../utils/asyncHandler';
import { errorMessage } from '../utils/helpers';
import logger from '../utils/logger';

export interface SystemControllerDeps {
  healthChecks: Record<string, HealthCheck>;
  registry: Registry;
}

export const createSystemController = ({ healthChecks, registry }: SystemControllerDeps) => ({
  home: (req: Request, res: Response) => {
    res.status(200).json({
      message: 'Weather Service API',
      version: '1.0.0',
      health: '/health',
      metrics: '/metrics',
      endpoints: ['/weather?city=', '/weather/history?city=&limit=', '/weather/cache?city='],
    });
  },

  ping: (req: Request, res: Response) => {
    res.status(200).send('OK');
  },

  health: asyncHandler(async (req: Request, res: Response) => {
    const entries = await Promise.all(
      Object.entries(healthChecks).map(async ([name, check]): Promise<[string, 'UP' | 'DOWN']> => {
        try {
          return [name, (await check()) ? 'UP' : 'DOWN'];
        } catch (error) {
          logger.warn(`Health check ${name} failed: ${errorMessage(error)}`);
          return [name, 'DOWN'];
        }
      })
    );

    const checks = Object.fromEntries(entries);
    const healthy = entries.every(([, state]) => state === 'UP');

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'OK' : 'DEGRADED',
      checks,
    });
  }),

  metrics: asyncHandler(async (req: Request, res: Response) => {
    res.setHeader('Content-Type', registry.contentType);
    res.status(200).send(await registry.metrics());
  }),
});

export type SystemController = ReturnType<typeof createSystemController>;

// controllers/weatherController.ts
import { Request, Response } from 'express';
import WeatherService from '../services/weatherService';
import HistoryService from '../services/historyService';
import asyncHandler from '../utils/asyncHandler';
import { getClientIp, normalizeCity } from '../utils/helpers';
import { parseRequest } from '../middleware/validate';
import { cacheQuerySchema, historyQuerySchema, weatherQuerySchema } from '../utils/validationSchemas';

export interface WeatherControllerDeps {
  weatherService: WeatherService;
  historyService: HistoryService;
  now?: () => Date;
}

export const createWeatherController = ({ weatherService, historyService, now = () => new Date() }: WeatherControllerDeps) => ({
  // GET /weather?city=
  getWeather: asyncHandler(async (req: Request, res: Response) => {
    const { city } = parseRequest(weatherQuerySchema, req);

    const { weather, cached } = await weatherService.getWeather(city, getClientIp(req));

    res.status(200).json({
      ...weather,
      cached,
      timestamp: now().toISOString(),
    });
  }),

  // GET /weather/history?city=&limit=
  getHistory: asyncHandler(async (req: Request, res: Response) => {
    const { city, limit } = parseRequest(historyQuerySchema, req);

    const records = await historyService.getHistory(city, limit);

    res.status(200).json({
      city: normalizeCity(city),
      // Client IPs stay server-side
      queries: records.map(({ clientIp: _clientIp, ...entry }) => ({
        ...entry,
        createdAt: entry.createdAt.toISOString(),
      })),
      total: records.length,
      limit,
    });
  }),

  // DELETE /weather/cache?city=
  invalidateCache: asyncHandler(async (req: Request, res: Response) => {
    const { city } = parseRequest(cacheQuerySchema, req);

    await weatherService.invalidateCache(city);

    res.status(204).end();
  }),
});

export type WeatherController = ReturnType<typeof createWeatherController>;

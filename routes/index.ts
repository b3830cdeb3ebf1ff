// routes/index.ts
import express from 'express';
import { WeatherController } from '../controllers/weatherController';
import { SystemController } from '../controllers/systemController';
import { createWeatherRouter } from './weatherRoutes';

export const createSystemRouter = (system: SystemController) => {
  const router = express.Router();

  router.get('/', system.home);
  router.get('/ping', system.ping);
  router.get('/health', system.health);
  router.get('/metrics', system.metrics);

  return router;
};

export const createApiRouter = (weather: WeatherController) => {
  const router = express.Router();

  router.use('/weather', createWeatherRouter(weather));

  // --- API 404 Handler ---
  // Catches any request that didn't match the routes above
  router.use('*', (req, res) => {
    res.status(404).json({
      status: 'fail',
      code: 'ROUTE_NOT_FOUND',
      message: 'API Endpoint Not Found',
      path: req.originalUrl,
    });
  });

  return router;
};

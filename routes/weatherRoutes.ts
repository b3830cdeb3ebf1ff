// routes/weatherRoutes.ts
import express from 'express';
import { WeatherController } from '../controllers/weatherController';

export const createWeatherRouter = (controller: WeatherController) => {
  const router = express.Router();

  router.get('/', controller.getWeather);
  router.get('/history', controller.getHistory);
  router.delete('/cache', controller.invalidateCache);

  return router;
};

export default createWeatherRouter;

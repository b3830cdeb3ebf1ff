import { IWeatherProvider } from './IWeatherProvider';
import { MockWeatherProvider } from './MockWeatherProvider';
import { OpenWeatherMapProvider } from './OpenWeatherMapProvider';
import { createApiClient } from '../../utils/apiClient';
import type { AppConfig } from '../../utils/config';
import logger from '../../utils/logger';

export type { IWeatherProvider } from './IWeatherProvider';
export { MockWeatherProvider } from './MockWeatherProvider';
export { OpenWeatherMapProvider } from './OpenWeatherMapProvider';

/**
 * Picks the configured provider. Without an API key the mock provider is used,
 * so a fresh checkout runs without credentials.
 */
export const createWeatherProvider = (weather: AppConfig['weather']): IWeatherProvider => {
    if (weather.provider === 'mock') {
        return new MockWeatherProvider();
    }

    if (!weather.apiKey) {
        logger.warn('⚠️ OPENWEATHER_API_KEY not set. Falling back to the mock weather provider.');
        return new MockWeatherProvider();
    }

    return new OpenWeatherMapProvider({
        apiKey: weather.apiKey,
        baseUrl: weather.baseUrl,
        client: createApiClient(weather.timeoutMs),
    });
};

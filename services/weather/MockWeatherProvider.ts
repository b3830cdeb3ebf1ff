import { IWeatherProvider } from './IWeatherProvider';
import { IWeatherData } from '../../types';
import { NotFoundError, UpstreamError } from '../../utils/AppError';
import logger from '../../utils/logger';

/**
 * Deterministic provider for development and tests (selected when no API key is configured).
 * "error"/"fail" simulate an outage; "notfound", names starting with "nonexistent",
 * and names containing digits simulate an unknown city.
 */
export class MockWeatherProvider implements IWeatherProvider {
    name = 'mock';

    constructor(private readonly now: () => Date = () => new Date()) {}

    async fetchWeather(city: string): Promise<IWeatherData> {
        logger.info(`🧪 Returning mock weather data for ${city}`);
        const lowered = city.toLowerCase();

        if (lowered === 'error' || lowered === 'fail') {
            throw new UpstreamError('Weather provider unavailable', true);
        }
        if (lowered === 'notfound' || lowered.startsWith('nonexistent') || /\d/.test(lowered)) {
            throw new NotFoundError(`City '${city}' not found`);
        }

        return {
            city,
            country: 'BR',
            temperature: 25.0,
            description: 'Sunny',
            humidity: 60,
            pressure: 1013.25,
            windSpeed: 5.5,
            provider: this.name,
            fetchedAt: this.now().toISOString(),
        };
    }
}

export default MockWeatherProvider;

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { IWeatherProvider } from './IWeatherProvider';
import { IWeatherData } from '../../types';
import { NotFoundError, UpstreamError } from '../../utils/AppError';
import { titleCase } from '../../utils/helpers';
import logger from '../../utils/logger';
import metrics from '../../utils/metrics';

// Only the fields we consume from /data/2.5/weather
const OpenWeatherResponseSchema = z.object({
    name: z.string().min(1),
    sys: z.object({ country: z.string().optional() }).optional(),
    main: z.object({
        temp: z.number(),
        humidity: z.number().optional(),
        pressure: z.number().optional(),
    }),
    weather: z.array(z.object({ description: z.string() })).min(1),
    wind: z.object({ speed: z.number().optional() }).optional(),
});

export interface OpenWeatherMapOptions {
    apiKey: string;
    baseUrl: string;
    client: AxiosInstance;
    now?: () => Date;
}

export class OpenWeatherMapProvider implements IWeatherProvider {
    name = 'openweathermap';

    constructor(private readonly options: OpenWeatherMapOptions) {}

    async fetchWeather(city: string): Promise<IWeatherData> {
        const endTimer = metrics.providerDuration.startTimer({ provider: this.name });
        try {
            logger.info(`🌦️ Fetching weather for ${city} from OpenWeatherMap`);
            const response = await this.request(city);
            return this.normalize(response.data);
        } finally {
            endTimer();
        }
    }

    private async request(city: string): Promise<AxiosResponse<unknown>> {
        const { apiKey, baseUrl, client } = this.options;
        try {
            const response = await client.get<unknown>(`${baseUrl}/weather`, {
                params: { q: city, appid: apiKey, units: 'metric', lang: 'en' },
            });
            metrics.providerRequests.inc({ provider: this.name, status: 'success' });
            return response;
        } catch (error) {
            if (!axios.isAxiosError(error)) throw error;

            const status = error.response?.status;
            if (status === 404) {
                metrics.providerRequests.inc({ provider: this.name, status: 'not_found' });
                throw new NotFoundError(`City '${city}' not found`);
            }
            if (status === 401 || status === 403) {
                metrics.providerRequests.inc({ provider: this.name, status: 'unauthorized' });
                logger.error(`❌ OpenWeatherMap Auth Failed (${status}). Check API Key.`);
                throw new UpstreamError('Weather provider rejected the API key');
            }
            if (status !== undefined) {
                metrics.providerRequests.inc({ provider: this.name, status: 'error' });
                logger.error(`❌ OpenWeatherMap API error: ${status} - ${error.message}`);
                throw new UpstreamError(`Weather provider error: ${status}`);
            }

            // No response at all: timeout, DNS, connection refused
            metrics.providerRequests.inc({ provider: this.name, status: 'unreachable' });
            logger.error(`❌ OpenWeatherMap unreachable: ${error.code ?? 'UNKNOWN'} - ${error.message}`);
            throw new UpstreamError('Weather provider unavailable', true);
        }
    }

    private normalize(data: unknown): IWeatherData {
        const result = OpenWeatherResponseSchema.safeParse(data);

        if (!result.success) {
            logger.error(`[OpenWeatherMap] Schema Mismatch: ${JSON.stringify(result.error.format())}`);
            throw new UpstreamError('Weather provider returned an unexpected response');
        }

        const body = result.data;
        const now = this.options.now ?? (() => new Date());
        return {
            city: body.name,
            country: body.sys?.country,
            temperature: Math.round(body.main.temp * 10) / 10,
            description: titleCase(body.weather[0].description),
            humidity: body.main.humidity,
            pressure: body.main.pressure,
            windSpeed: body.wind?.speed ?? 0,
            provider: this.name,
            fetchedAt: now().toISOString(),
        };
    }
}

export default OpenWeatherMapProvider;

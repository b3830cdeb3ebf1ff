import { IWeatherData } from '../../types';

export interface IWeatherProvider {
    name: string;
    /**
     * Rejects with NotFoundError for an unknown city and UpstreamError for
     * anything else that prevents a usable answer.
     */
    fetchWeather(city: string): Promise<IWeatherData>;
}

// utils/apiClient.ts
import axios, { AxiosInstance } from 'axios';
import logger from './logger';

export const createApiClient = (timeoutMs: number): AxiosInstance => {
    const client = axios.create({
        timeout: timeoutMs,
        headers: {
            'User-Agent': 'WeatherLookupService/1.0',
            'Accept': 'application/json'
        }
    });

    client.interceptors.response.use(
        (response) => response,
        (error: unknown) => {
            if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
                logger.warn(`⚠️ Request timed out: ${error.config?.url}`);
            }
            return Promise.reject(error);
        }
    );

    return client;
};

export default createApiClient;

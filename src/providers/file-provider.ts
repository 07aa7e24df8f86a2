/**
 * File Weather Provider
 *
 * Reads realtime conditions and the forecast from a JSON file kept up to
 * date by another process: `{ attribution?, realtime, forecast[] }`.
 */

import * as fs from 'node:fs';
import { safeValidateData, WeatherFileSchema, type WeatherFile } from '../config/config-schemas';
import { isRetryableError, retryWithBackoff, type RetryOptions } from '../utils/retry';
import { WeatherProviderError, type WeatherData, type WeatherProvider } from './weather-provider';

const DEFAULT_ATTRIBUTION = 'Local weather file';

export interface FileWeatherProviderOptions {
    retry?: RetryOptions;
}

export class FileWeatherProvider implements WeatherProvider {
    readonly type = 'file';
    private lastAttribution: string | undefined;

    constructor(
        readonly filePath: string,
        private readonly options: FileWeatherProviderOptions = {},
    ) {}

    get attribution(): string {
        return this.lastAttribution ?? DEFAULT_ATTRIBUTION;
    }

    async realtime(): Promise<WeatherData> {
        const weather = await this.load();
        return weather.realtime;
    }

    async forecast(): Promise<WeatherData[]> {
        const weather = await this.load();
        return [...weather.forecast].sort((a, b) => a.dateTime.getTime() - b.dateTime.getTime());
    }

    private async load(): Promise<WeatherFile> {
        let data: unknown;
        try {
            data = await retryWithBackoff(async () => {
                const text = await fs.promises.readFile(this.filePath, 'utf8');
                const parsed: unknown = JSON.parse(text);
                return parsed;
            }, {
                maxRetries: 3,
                initialDelay: 200,
                maxDelay: 2000,
                shouldRetry: isRetryableError,
                ...this.options.retry,
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            const reason = error instanceof SyntaxError ? 'invalid_data' : 'unavailable';
            throw new WeatherProviderError(reason, `Weather file ${this.filePath}: ${message}`);
        }

        const result = safeValidateData(WeatherFileSchema, data);
        if (!result.success) {
            throw new WeatherProviderError(
                'invalid_data',
                `Weather file ${this.filePath}: ${result.error}`,
            );
        }

        this.lastAttribution = result.data.attribution;
        return result.data;
    }
}

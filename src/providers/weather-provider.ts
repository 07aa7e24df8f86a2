/**
 * Weather Provider
 *
 * Outdoor realtime conditions and hourly forecast from an external source.
 * All values are °C, percent relative humidity and km/h.
 */

import { ComfortAdvisorError } from '../engine/errors';
import type { ForecastSample } from '../engine/types';

export enum PollenIndex {
    NONE = 0,
    VERY_LOW = 1,
    LOW = 2,
    MEDIUM = 3,
    HIGH = 4,
    VERY_HIGH = 5,
}

export interface WeatherData {
    dateTime: Date;
    temperature: number;
    humidity: number;
    /** PollenIndex scale */
    pollen?: number;
}

export interface WeatherProvider {
    readonly type: string;
    readonly attribution: string;
    realtime(): Promise<WeatherData>;
    forecast(): Promise<WeatherData[]>;
}

export type WeatherProviderFailure = 'invalid_config' | 'unavailable' | 'invalid_data';

export class WeatherProviderError extends ComfortAdvisorError {
    readonly code = 'weather_provider';

    constructor(
        readonly reason: WeatherProviderFailure,
        message: string,
    ) {
        super(message);
    }
}

export function toForecastSample(data: WeatherData): ForecastSample {
    return {
        dateTime: data.dateTime,
        temperature: data.temperature,
        humidity: data.humidity,
        pollenLevel: data.pollen ?? null,
    };
}

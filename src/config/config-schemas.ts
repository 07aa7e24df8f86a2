/**
 * Zod validation schemas for plugin configuration and data files
 * Provides runtime type validation and better error handling
 */

import { z } from 'zod';
import {
    DEFAULT_FORECAST_HORIZON_HOURS,
    DEFAULT_POLL_INTERVAL_SECONDS,
    MAX_FORECAST_HORIZON_HOURS,
    MAX_POLL_INTERVAL_SECONDS,
    MIN_FORECAST_HORIZON_HOURS,
    MIN_POLL_INTERVAL_SECONDS,
} from '../constants';
import { PollenIndex } from '../providers/weather-provider';
import { SensorType } from '../types/sensor-types';

export const WEATHER_PROVIDER_IDS = ['none', 'fake', 'file'] as const;
export type WeatherProviderId = typeof WEATHER_PROVIDER_IDS[number];

const SensorIdSchema = z.string().trim().min(1);

// Device Schema
export const DeviceConfigSchema = z.object({
    name: z.string().trim().min(1),
    weatherProvider: z.enum(WEATHER_PROVIDER_IDS).default('none'),
    forecastFile: z.string().trim().min(1).optional(),
    indoorTemperatureSensor: SensorIdSchema,
    indoorHumiditySensor: SensorIdSchema,
    outdoorTemperatureSensor: SensorIdSchema,
    outdoorHumiditySensor: SensorIdSchema,
    simmerIndexMin: z.number().finite().optional(),
    simmerIndexMax: z.number().finite().optional(),
    dewPointMax: z.number().finite().optional(),
    humidityMax: z.number().min(0).max(100).optional(),
    pollenMax: z.number().min(0).optional(),
    enabledSensors: z.array(z.nativeEnum(SensorType)).optional(),
    pollEnabled: z.boolean().default(false),
    pollInterval: z.number().int().min(MIN_POLL_INTERVAL_SECONDS).max(MAX_POLL_INTERVAL_SECONDS)
        .default(DEFAULT_POLL_INTERVAL_SECONDS),
    forecastHorizonHours: z.number().int().min(MIN_FORECAST_HORIZON_HOURS).max(MAX_FORECAST_HORIZON_HOURS)
        .default(DEFAULT_FORECAST_HORIZON_HOURS),
    useCustomIconPack: z.boolean().default(false),
}).refine(
    (data) => data.weatherProvider !== 'file' || data.forecastFile !== undefined,
    {
        message: 'forecastFile is required when weatherProvider is "file"',
        path: ['forecastFile'],
    },
);

export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;

// Platform Schema, devices are validated one by one
export const PlatformConfigSchema = z.object({
    platform: z.string(),
    name: z.string().optional(),
    temperatureUnit: z.enum(['C', 'F']).default('C'),
    readingsFile: z.string().trim().min(1).optional(),
    devices: z.array(z.unknown()).default([]),
}).passthrough(); // Homebridge adds its own keys

// Readings File Schema
export const SensorReadingSchema = z.object({
    state: z.union([z.number(), z.string(), z.null()]),
    unit: z.string().optional(),
    lastUpdated: z.string().datetime({ offset: true }).optional(),
});

export const ReadingsFileSchema = z.record(SensorReadingSchema);

export type SensorReading = z.infer<typeof SensorReadingSchema>;
export type ReadingsFile = z.infer<typeof ReadingsFileSchema>;

// Weather File Schema (°C, %)
export const WeatherDataSchema = z.object({
    dateTime: z.coerce.date(),
    temperature: z.number().finite(),
    humidity: z.number().finite().min(0).max(100),
    pollen: z.number().int().min(PollenIndex.NONE).max(PollenIndex.VERY_HIGH).optional(),
});

export const WeatherFileSchema = z.object({
    attribution: z.string().optional(),
    realtime: WeatherDataSchema,
    forecast: z.array(WeatherDataSchema).default([]),
});

export type WeatherFile = z.infer<typeof WeatherFileSchema>;

// Helper function to validate and parse data
export function validateData<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, context?: string): T {
    try {
        return schema.parse(data);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const errorMessages = error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
            throw new Error(`Validation failed${context ? ` for ${context}` : ''}: ${errorMessages}`);
        }
        throw error;
    }
}

// Helper function to safely validate without throwing
export function safeValidateData<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
): { success: true; data: T } | { success: false; error: string } {
    const result = schema.safeParse(data);
    if (result.success) {
        return { success: true, data: result.data };
    }
    const errorMessages = result.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
    return { success: false, error: errorMessages };
}

/**
 * Fake Weather Provider
 *
 * Replays a bundled hourly fixture starting at the current hour, for
 * trying the plugin without a weather service.
 */

import { z } from 'zod';
import { ONE_HOUR_MS } from '../constants';
import { validateData } from '../config/config-schemas';
import { fahrenheitToCelsius } from '../utils/units';
import fixture from './fake-forecast.json';
import { PollenIndex, type WeatherData, type WeatherProvider } from './weather-provider';

const FakeConditionsSchema = z.object({
    temperature: z.number(),
    humidity: z.number(),
    pollen: z.nativeEnum(PollenIndex),
});

const FakeFixtureSchema = z.object({
    attribution: z.string(),
    realtime: FakeConditionsSchema,
    forecast: z.array(FakeConditionsSchema.extend({ offsetHours: z.number().int().min(0) })),
});

type FakeConditions = z.infer<typeof FakeConditionsSchema>;

const FIXTURE = validateData(FakeFixtureSchema, fixture, 'fake weather fixture');

export class FakeWeatherProvider implements WeatherProvider {
    readonly type = 'fake';
    readonly attribution = FIXTURE.attribution;

    constructor(private readonly clock: () => Date = () => new Date()) {}

    async realtime(): Promise<WeatherData> {
        const now = new Date(this.clock().getTime());
        now.setUTCMilliseconds(0);
        return this.toWeatherData(now, FIXTURE.realtime);
    }

    async forecast(): Promise<WeatherData[]> {
        const start = new Date(this.clock().getTime());
        start.setUTCMinutes(0, 0, 0);
        return FIXTURE.forecast.map(sample =>
            this.toWeatherData(new Date(start.getTime() + sample.offsetHours * ONE_HOUR_MS), sample));
    }

    private toWeatherData(dateTime: Date, conditions: FakeConditions): WeatherData {
        return {
            dateTime,
            temperature: fahrenheitToCelsius(conditions.temperature),
            humidity: conditions.humidity,
            pollen: conditions.pollen,
        };
    }
}

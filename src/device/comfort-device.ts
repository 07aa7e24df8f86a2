/**
 * Comfort Device
 *
 * Holds the latest readings for one configured location pair and turns them
 * into metrics, a window recommendation and a forecast summary.
 */

import {EventEmitter} from 'node:events';
import type {NormalizedDeviceConfig} from '../config/config-manager';
import type {ReadingsFile} from '../config/config-schemas';
import {
    ComfortAdvisorError,
    InvalidMeasurementError,
    MissingInputError,
    computeMetrics,
    recommend,
    requireMeasurement,
    summarizeForecast,
    validateThresholds,
    type DerivedMetrics,
    type ForecastSample,
    type ForecastSummary,
    type PartialMeasurement,
    type Recommendation,
} from '../engine';
import {toForecastSample, type WeatherData} from '../providers/weather-provider';
import {readHumidity, readTemperature} from '../sources/sensor-state';
import type {TemperatureUnit} from '../utils/units';

export type UnavailableReason = 'invalid_measurement' | 'missing_input';

export type Outcome<T> =
    | { status: 'available'; value: T }
    | { status: 'unavailable'; reason: UnavailableReason; error: ComfortAdvisorError };

export interface DeviceState {
    indoor: PartialMeasurement;
    outdoor: PartialMeasurement;
    indoorMetrics: Outcome<DerivedMetrics>;
    recommendation: Outcome<Recommendation>;
    forecastSummary: Outcome<ForecastSummary>;
    evaluatedAt: Date;
}

export interface WeatherUpdate {
    realtime?: WeatherData;
    forecast?: WeatherData[];
}

/**
 * Run an engine call, turning measurement failures into an unavailable outcome.
 * Other errors propagate.
 */
export function toOutcome<T>(compute: () => T): Outcome<T> {
    try {
        return {status: 'available', value: compute()};
    } catch (error) {
        if (error instanceof InvalidMeasurementError || error instanceof MissingInputError) {
            return {status: 'unavailable', reason: error.code, error};
        }
        throw error;
    }
}

export function mapOutcome<T, U>(outcome: Outcome<T>, map: (value: T) => U): Outcome<U> {
    return outcome.status === 'available' ? {status: 'available', value: map(outcome.value)} : outcome;
}

export class ComfortDevice extends EventEmitter {
    private indoor: PartialMeasurement = {temperature: null, humidity: null};
    private outdoor: PartialMeasurement = {temperature: null, humidity: null};
    private realtime: WeatherData | null = null;
    private forecast: WeatherData[] | null = null;
    private state: DeviceState | null = null;

    /**
     * @throws ConfigurationError when the thresholds are inconsistent
     */
    constructor(readonly config: NormalizedDeviceConfig) {
        super();
        validateThresholds(config.thresholds);
    }

    get name(): string {
        return this.config.name;
    }

    /**
     * Take the configured sensors' states from a readings snapshot.
     * Sensors absent from the snapshot become unavailable.
     */
    updateReadings(readings: ReadingsFile, defaultUnit: TemperatureUnit): void {
        const {sensors} = this.config;
        this.indoor = {
            temperature: readTemperature(readings[sensors.indoorTemperature], defaultUnit),
            humidity: readHumidity(readings[sensors.indoorHumidity]),
        };
        this.outdoor = {
            temperature: readTemperature(readings[sensors.outdoorTemperature], defaultUnit),
            humidity: readHumidity(readings[sensors.outdoorHumidity]),
        };
    }

    updateWeather(update: WeatherUpdate): void {
        if (update.realtime) {
            this.realtime = update.realtime;
        }
        if (update.forecast) {
            this.forecast = update.forecast;
        }
    }

    getState(): DeviceState | null {
        return this.state;
    }

    evaluate(now: Date = new Date()): DeviceState {
        const outdoor: PartialMeasurement = {...this.outdoor, pollenLevel: this.realtime?.pollen ?? null};
        const {thresholds, forecastHorizonHours} = this.config;
        const forecast = this.forecast;

        const state: DeviceState = {
            indoor: this.indoor,
            outdoor,
            indoorMetrics: toOutcome(() => computeMetrics(requireMeasurement(this.indoor, 'indoor'), 'indoor')),
            recommendation: toOutcome(() => recommend(
                requireMeasurement(this.indoor, 'indoor'),
                requireMeasurement(outdoor, 'outdoor'),
                thresholds,
                forecast ? {forecast: forecastSamples(forecast), now, horizonHours: forecastHorizonHours} : {now},
            )),
            forecastSummary: toOutcome(() => {
                if (!forecast) {
                    throw new MissingInputError('forecast', ['temperature', 'humidity']);
                }
                return summarizeForecast(requireMeasurement(outdoor, 'outdoor'), thresholds, forecastSamples(forecast), {now});
            }),
            evaluatedAt: now,
        };

        this.state = state;
        this.emit('updated', state);
        return state;
    }

    onUpdated(listener: (state: DeviceState) => void): this {
        return this.on('updated', listener);
    }
}

function* forecastSamples(forecast: readonly WeatherData[]): Generator<ForecastSample> {
    for (const data of forecast) {
        yield toForecastSample(data);
    }
}

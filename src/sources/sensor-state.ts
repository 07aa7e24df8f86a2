/**
 * Sensor State Parsing
 *
 * Host sensors report strings or numbers; anything that is not a finite
 * number becomes null, the unavailable sentinel.
 */

import type { SensorReading } from '../config/config-schemas';
import { parseTemperatureUnit, toCelsius, type TemperatureUnit } from '../utils/units';

export const UNAVAILABLE_STATES: ReadonlySet<string> = new Set(['unavailable', 'unknown', 'none', '']);

export function parseSensorState(state: SensorReading['state'] | undefined): number | null {
    if (state === undefined || state === null) {
        return null;
    }

    if (typeof state === 'number') {
        return Number.isFinite(state) ? state : null;
    }

    const trimmed = state.trim();
    if (UNAVAILABLE_STATES.has(trimmed.toLowerCase())) {
        return null;
    }

    const value = Number(trimmed);
    return Number.isFinite(value) ? value : null;
}

/**
 * Temperature in °C, using the reading's own unit when it names one.
 */
export function readTemperature(reading: SensorReading | undefined, defaultUnit: TemperatureUnit): number | null {
    const value = parseSensorState(reading?.state);
    if (value === null) {
        return null;
    }
    return toCelsius(value, parseTemperatureUnit(reading?.unit) ?? defaultUnit);
}

export function readHumidity(reading: SensorReading | undefined): number | null {
    return parseSensorState(reading?.state);
}

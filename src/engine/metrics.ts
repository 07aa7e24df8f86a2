/**
 * Metric Computation
 *
 * Validates a measurement and derives every comfort metric from it.
 */

import {
    MAX_HUMIDITY,
    MAX_TEMPERATURE_C,
    MIN_HUMIDITY,
    MIN_TEMPERATURE_C,
} from '../constants';
import { classifyFrostRisk, classifySimmerZone, classifyThermalPerception } from './categories';
import { InvalidMeasurementError, MissingInputError, type MeasurementField } from './errors';
import {
    computeAbsoluteHumidity,
    computeDewPoint,
    computeFrostPoint,
    computeHeatIndex,
    computeSimmerIndex,
} from './formulas';
import { FROST_RISK_LEVELS, type DerivedMetrics, type Measurement, type MeasurementLocation } from './types';

/**
 * Throw InvalidMeasurementError when a field is outside its physical range.
 */
export function validateMeasurement(measurement: Measurement, location?: MeasurementLocation): void {
    const { temperature, humidity, pollenLevel } = measurement;

    if (!Number.isFinite(temperature) || temperature < MIN_TEMPERATURE_C || temperature > MAX_TEMPERATURE_C) {
        throw new InvalidMeasurementError('temperature', temperature, location);
    }

    if (!Number.isFinite(humidity) || humidity < MIN_HUMIDITY || humidity > MAX_HUMIDITY) {
        throw new InvalidMeasurementError('humidity', humidity, location);
    }

    if (pollenLevel !== undefined && pollenLevel !== null && (!Number.isFinite(pollenLevel) || pollenLevel < 0)) {
        throw new InvalidMeasurementError('pollenLevel', pollenLevel, location);
    }
}

export function computeMetrics(measurement: Measurement, location?: MeasurementLocation): DerivedMetrics {
    validateMeasurement(measurement, location);

    const { temperature, humidity } = measurement;
    const dewPoint = computeDewPoint(temperature, humidity);
    const frostPoint = computeFrostPoint(temperature, humidity);
    const simmerIndex = computeSimmerIndex(temperature, humidity);
    const absoluteHumidity = computeAbsoluteHumidity(temperature, humidity);
    const frostRisk = classifyFrostRisk({ temperature, frostPoint, absoluteHumidity });

    return {
        dewPoint,
        frostPoint,
        heatIndex: computeHeatIndex(temperature, humidity),
        simmerIndex,
        absoluteHumidity,
        thermalPerception: classifyThermalPerception(dewPoint),
        simmerZone: classifySimmerZone(simmerIndex),
        frostRisk,
        frostRiskLevel: FROST_RISK_LEVELS[frostRisk],
    };
}

export interface PartialMeasurement {
    readonly temperature: number | null;
    readonly humidity: number | null;
    readonly pollenLevel?: number | null;
}

/**
 * Build a measurement from host readings that may not have arrived yet.
 */
export function requireMeasurement(partial: PartialMeasurement, location: MeasurementLocation): Measurement {
    const missing: MeasurementField[] = [];
    if (partial.temperature === null) {
        missing.push('temperature');
    }
    if (partial.humidity === null) {
        missing.push('humidity');
    }
    if (partial.temperature === null || partial.humidity === null) {
        throw new MissingInputError(location, missing);
    }

    return {
        temperature: partial.temperature,
        humidity: partial.humidity,
        pollenLevel: partial.pollenLevel ?? null,
    };
}

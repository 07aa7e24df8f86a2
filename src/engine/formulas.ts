/**
 * Comfort Formulas
 *
 * Closed-form meteorological approximations. Inputs and outputs are °C and
 * percent relative humidity; callers validate the measurement first.
 */

import {
    HEAT_INDEX_MIN_HUMIDITY,
    HEAT_INDEX_MIN_TEMPERATURE_C,
    MIN_LOG_HUMIDITY,
    SIMMER_INDEX_MIN_TEMPERATURE_C,
} from '../constants';
import { celsiusToFahrenheit, fahrenheitToCelsius } from '../utils/units';

const KELVIN_OFFSET = 273.15;

export interface MagnusConstants {
    readonly a: number;
    readonly b: number;
}

/** Magnus coefficients over liquid water, used at or above 0 °C */
export const MAGNUS_OVER_WATER: MagnusConstants = { a: 17.62, b: 243.12 };

/** Magnus coefficients over ice, used below 0 °C */
export const MAGNUS_OVER_ICE: MagnusConstants = { a: 22.46, b: 272.62 };

export function magnusConstantsFor(temperature: number): MagnusConstants {
    return temperature >= 0 ? MAGNUS_OVER_WATER : MAGNUS_OVER_ICE;
}

/**
 * Dew point via the Magnus approximation.
 *
 * Saturated air has its dew point at the air temperature, and the result is
 * never above the air temperature.
 */
export function computeDewPoint(temperature: number, humidity: number): number {
    if (humidity >= 100) {
        return temperature;
    }

    const { a, b } = magnusConstantsFor(temperature);
    const gamma = Math.log(Math.max(humidity, MIN_LOG_HUMIDITY) / 100) + (a * temperature) / (b + temperature);
    const dewPoint = (b * gamma) / (a - gamma);

    return Math.min(dewPoint, temperature);
}

/**
 * Frost point from temperature and dew point.
 * <https://pon.fr/dzvents-alerte-givre-et-calcul-humidite-absolue/>
 */
export function computeFrostPoint(temperature: number, humidity: number): number {
    const dewPointK = computeDewPoint(temperature, humidity) + KELVIN_OFFSET;
    const temperatureK = temperature + KELVIN_OFFSET;

    return dewPointK
        + 2671.02 / ((2954.61 / temperatureK) + 2.193665 * Math.log(temperatureK) - 13.3448)
        - temperatureK
        - KELVIN_OFFSET;
}

/**
 * Heat index, Rothfusz regression.
 * <https://www.wpc.ncep.noaa.gov/html/heatindex_equation.shtml>
 *
 * Outside its validated range the heat index is the air temperature.
 */
export function computeHeatIndex(temperature: number, humidity: number): number {
    if (temperature < HEAT_INDEX_MIN_TEMPERATURE_C || humidity < HEAT_INDEX_MIN_HUMIDITY) {
        return temperature;
    }

    const t = celsiusToFahrenheit(temperature);
    const rh = humidity;

    let heatIndex = -42.379
        + 2.04901523 * t
        + 10.14333127 * rh
        - 0.22475541 * t * rh
        - 0.00683783 * t * t
        - 0.05481717 * rh * rh
        + 0.00122874 * t * t * rh
        + 0.00085282 * t * rh * rh
        - 0.00000199 * t * t * rh * rh;

    if (rh > 85 && t <= 87) {
        heatIndex += ((rh - 85) / 10) * ((87 - t) / 5);
    }

    return fahrenheitToCelsius(heatIndex);
}

/**
 * Summer simmer index.
 * <https://www.vcalc.com/wiki/rklarsen/Summer+Simmer+Index>
 */
export function computeSimmerIndex(temperature: number, humidity: number): number {
    if (temperature < SIMMER_INDEX_MIN_TEMPERATURE_C) {
        return temperature;
    }

    const t = celsiusToFahrenheit(temperature);
    const simmerIndex = 1.98 * (t - (0.55 - 0.0055 * humidity) * (t - 58)) - 56.83;

    return fahrenheitToCelsius(simmerIndex);
}

/**
 * Saturation vapor pressure over water (hPa).
 */
export function computeSaturationVaporPressure(temperature: number): number {
    return 6.112 * Math.exp((17.67 * temperature) / (243.5 + temperature));
}

/**
 * Absolute humidity in grams of water vapor per cubic meter.
 * <https://carnotcycle.wordpress.com/2012/08/04/how-to-convert-relative-humidity-to-absolute-humidity/>
 */
export function computeAbsoluteHumidity(temperature: number, humidity: number): number {
    return (computeSaturationVaporPressure(temperature) * humidity * 2.1674) / (temperature + KELVIN_OFFSET);
}

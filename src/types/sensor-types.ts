/**
 * Output Sensor Types
 *
 * Every value a comfort device can publish to HomeKit.
 */

export enum SensorType {
    OPEN_WINDOWS = 'open_windows',
    ABSOLUTE_HUMIDITY = 'absolute_humidity',
    DEW_POINT = 'dew_point',
    FROST_POINT = 'frost_point',
    FROST_RISK = 'frost_risk',
    HEAT_INDEX = 'heat_index',
    SIMMER_INDEX = 'simmer_index',
    SIMMER_ZONE = 'simmer_zone',
    THERMAL_PERCEPTION = 'thermal_perception',
    HIGH_SIMMER_INDEX = 'high_simmer_index',
    LOW_SIMMER_INDEX = 'low_simmer_index',
}

export const ALL_SENSOR_TYPES: readonly SensorType[] = Object.freeze(Object.values(SensorType));

/** Sensors whose values come from the weather forecast */
export const FORECAST_SENSOR_TYPES: ReadonlySet<SensorType> = new Set([
    SensorType.HIGH_SIMMER_INDEX,
    SensorType.LOW_SIMMER_INDEX,
]);

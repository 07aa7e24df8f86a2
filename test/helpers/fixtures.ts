/**
 * Shared test fixtures
 */

import type { NormalizedDeviceConfig } from '../../src/config/config-manager';
import type { ReadingsFile } from '../../src/config/config-schemas';
import { ALL_SENSOR_TYPES } from '../../src/types/sensor-types';
import { fahrenheitToCelsius } from '../../src/utils/units';

export const SENSOR_IDS = {
  indoorTemperature: 'sensor.indoor_temperature',
  indoorHumidity: 'sensor.indoor_humidity',
  outdoorTemperature: 'sensor.outdoor_temperature',
  outdoorHumidity: 'sensor.outdoor_humidity',
};

export function createDeviceConfig(overrides: Partial<NormalizedDeviceConfig> = {}): NormalizedDeviceConfig {
  return {
    name: 'Living Room',
    weatherProvider: 'none',
    sensors: SENSOR_IDS,
    thresholds: {
      simmerIndexMin: fahrenheitToCelsius(70),
      simmerIndexMax: fahrenheitToCelsius(85),
      dewPointMax: fahrenheitToCelsius(60),
      humidityMax: 95,
      pollenMax: 2,
    },
    enabledSensors: new Set(ALL_SENSOR_TYPES),
    pollEnabled: false,
    pollIntervalMs: 30_000,
    forecastHorizonHours: 3,
    useCustomIconPack: false,
    ...overrides,
  };
}

/**
 * Readings for a hot, humid room (simmer index 40.2 °C) and pleasant outdoor air (25.3 °C)
 */
export function createReadings(overrides: Partial<Record<keyof typeof SENSOR_IDS, string | number | null>> = {}): ReadingsFile {
  const states = {
    indoorTemperature: 30,
    indoorHumidity: 70,
    outdoorTemperature: 22,
    outdoorHumidity: 50,
    ...overrides,
  };
  return {
    [SENSOR_IDS.indoorTemperature]: { state: states.indoorTemperature, unit: '°C' },
    [SENSOR_IDS.indoorHumidity]: { state: states.indoorHumidity, unit: '%' },
    [SENSOR_IDS.outdoorTemperature]: { state: states.outdoorTemperature, unit: '°C' },
    [SENSOR_IDS.outdoorHumidity]: { state: states.outdoorHumidity, unit: '%' },
  };
}

/**
 * Configuration Manager
 *
 * Centralizes configuration management with validation,
 * defaults, and type-safe access to config values.
 */

import * as path from 'node:path';
import type { PlatformConfig } from 'homebridge';
import {
  DEFAULT_DEW_POINT_MAX_F,
  DEFAULT_HUMIDITY_MAX,
  DEFAULT_POLLEN_MAX,
  DEFAULT_SIMMER_INDEX_MAX_F,
  DEFAULT_SIMMER_INDEX_MIN_F,
  ONE_SECOND_MS,
} from '../constants';
import { findThresholdIssues } from '../engine/thresholds';
import type { ComfortThresholds } from '../engine/types';
import { ALL_SENSOR_TYPES, FORECAST_SENSOR_TYPES, type SensorType } from '../types/sensor-types';
import { fahrenheitToCelsius, toCelsius, type TemperatureUnit } from '../utils/units';
import {
  DeviceConfigSchema,
  PlatformConfigSchema,
  safeValidateData,
  type DeviceConfig,
  type WeatherProviderId,
} from './config-schemas';

export const DEFAULT_DEVICE_NAME = 'Comfort Advisor';
export const DEFAULT_READINGS_FILE = 'comfort-advisor-readings.json';

export interface SensorIds {
    indoorTemperature: string;
    indoorHumidity: string;
    outdoorTemperature: string;
    outdoorHumidity: string;
}

export interface NormalizedDeviceConfig {
    name: string;
    weatherProvider: WeatherProviderId;
    /** Absolute path, set for the file provider */
    forecastFile?: string;
    sensors: SensorIds;
    /** Temperatures in °C */
    thresholds: ComfortThresholds;
    enabledSensors: ReadonlySet<SensorType>;
    pollEnabled: boolean;
    pollIntervalMs: number;
    forecastHorizonHours: number;
    useCustomIconPack: boolean;
}

export interface NormalizedConfig {
    name: string;
    temperatureUnit: TemperatureUnit;
    readingsFile: string;
    devices: NormalizedDeviceConfig[];
}

export interface ConfigValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

export class ConfigManager {
  private readonly config: PlatformConfig;
  private readonly storagePath: string;
  private normalized: NormalizedConfig | null = null;

  constructor(config: PlatformConfig, storagePath: string) {
    this.config = config;
    this.storagePath = storagePath;
  }

  /**
     * Get the normalized configuration with defaults applied
     */
  getNormalized(): NormalizedConfig {
    if (!this.normalized) {
      this.normalized = this.normalize();
    }
    return this.normalized;
  }

  getName(): string {
    return typeof this.config.name === 'string' && this.config.name.length > 0 ? this.config.name : DEFAULT_DEVICE_NAME;
  }

  /**
     * Unit used for configured thresholds and for readings without a unit
     */
  getTemperatureUnit(): TemperatureUnit {
    return this.config.temperatureUnit === 'F' ? 'F' : 'C';
  }

  /**
     * Get the readings file path, relative paths resolve against the Homebridge storage path
     */
  getReadingsFilePath(): string {
    const configured = typeof this.config.readingsFile === 'string' && this.config.readingsFile.trim().length > 0
      ? this.config.readingsFile.trim()
      : DEFAULT_READINGS_FILE;
    return this.resolvePath(configured);
  }

  /**
     * Get raw device entries as configured
     */
  getRawDevices(): unknown[] {
    return Array.isArray(this.config.devices) ? this.config.devices : [];
  }

  /**
     * Parse every device entry, dropping the ones that fail validation
     */
  getDevices(): NormalizedDeviceConfig[] {
    const devices: NormalizedDeviceConfig[] = [];
    for (const raw of this.getRawDevices()) {
      const result = safeValidateData(DeviceConfigSchema, raw);
      if (result.success) {
        devices.push(this.normalizeDevice(result.data));
      }
    }
    return devices;
  }

  /**
     * Convert configured thresholds to °C, filling in defaults
     */
  getThresholds(device: DeviceConfig): ComfortThresholds {
    const unit = this.getTemperatureUnit();
    const temperature = (value: number | undefined, defaultF: number): number =>
      value === undefined ? fahrenheitToCelsius(defaultF) : toCelsius(value, unit);

    return {
      simmerIndexMin: temperature(device.simmerIndexMin, DEFAULT_SIMMER_INDEX_MIN_F),
      simmerIndexMax: temperature(device.simmerIndexMax, DEFAULT_SIMMER_INDEX_MAX_F),
      dewPointMax: temperature(device.dewPointMax, DEFAULT_DEW_POINT_MAX_F),
      humidityMax: device.humidityMax ?? DEFAULT_HUMIDITY_MAX,
      pollenMax: device.pollenMax ?? DEFAULT_POLLEN_MAX,
    };
  }

  /**
     * Validate configuration using Zod schemas
     */
  validateWithZod(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    const platform = safeValidateData(PlatformConfigSchema, this.config);
    if (!platform.success) {
      errors.push(platform.error);
    }

    this.getRawDevices().forEach((raw, index) => {
      const result = safeValidateData(DeviceConfigSchema, raw);
      if (!result.success) {
        errors.push(`Device ${this.describeRawDevice(raw, index)}: ${result.error}`);
      }
    });

    return { valid: errors.length === 0, errors };
  }

  /**
     * Validate configuration
     */
  validate(): ConfigValidationResult {
    const { errors } = this.validateWithZod();
    const warnings: string[] = [];
    const devices = this.getDevices();

    if (this.getRawDevices().length === 0) {
      warnings.push('No devices configured. Add a device to publish comfort sensors.');
    }

    // Validate device names
    const seen = new Set<string>();
    for (const device of devices) {
      const key = device.name.toLowerCase();
      if (seen.has(key)) {
        errors.push(`Duplicate device name: ${device.name}`);
      }
      seen.add(key);
    }

    // Validate thresholds
    for (const device of devices) {
      for (const issue of findThresholdIssues(device.thresholds)) {
        errors.push(`Device ${device.name}: ${issue}`);
      }

      if (device.weatherProvider === 'none') {
        const forecastSensors = [...device.enabledSensors].filter(type => FORECAST_SENSOR_TYPES.has(type));
        if (forecastSensors.length > 0) {
          warnings.push(`Device ${device.name}: ${forecastSensors.join(', ')} need a weather provider and will stay unavailable`);
        }
      }

      if (device.pollEnabled && device.pollIntervalMs < 5 * ONE_SECOND_MS) {
        warnings.push(`Device ${device.name}: poll interval ${device.pollIntervalMs / ONE_SECOND_MS}s re-reads the readings file very often`);
      }
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
     * Normalize the configuration with all defaults applied
     */
  private normalize(): NormalizedConfig {
    return {
      name: this.getName(),
      temperatureUnit: this.getTemperatureUnit(),
      readingsFile: this.getReadingsFilePath(),
      devices: this.getDevices(),
    };
  }

  private normalizeDevice(device: DeviceConfig): NormalizedDeviceConfig {
    return {
      name: device.name,
      weatherProvider: device.weatherProvider,
      ...(device.forecastFile ? { forecastFile: this.resolvePath(device.forecastFile) } : {}),
      sensors: {
        indoorTemperature: device.indoorTemperatureSensor,
        indoorHumidity: device.indoorHumiditySensor,
        outdoorTemperature: device.outdoorTemperatureSensor,
        outdoorHumidity: device.outdoorHumiditySensor,
      },
      thresholds: this.getThresholds(device),
      enabledSensors: new Set(device.enabledSensors ?? ALL_SENSOR_TYPES),
      pollEnabled: device.pollEnabled,
      pollIntervalMs: device.pollInterval * ONE_SECOND_MS,
      forecastHorizonHours: device.forecastHorizonHours,
      useCustomIconPack: device.useCustomIconPack,
    };
  }

  private resolvePath(file: string): string {
    return path.isAbsolute(file) ? file : path.join(this.storagePath, file);
  }

  private describeRawDevice(raw: unknown, index: number): string {
    if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
      return `"${raw.name}"`;
    }
    return `#${index + 1}`;
  }
}

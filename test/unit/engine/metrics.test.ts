/**
 * Metric Computation Tests
 */

import { InvalidMeasurementError, MissingInputError } from '../../../src/engine/errors';
import { computeMetrics, requireMeasurement, validateMeasurement } from '../../../src/engine/metrics';
import { FrostRisk, SimmerZone, ThermalPerception } from '../../../src/engine/types';

describe('computeMetrics', () => {
  it('should derive every metric from one measurement', () => {
    const metrics = computeMetrics({ temperature: 30, humidity: 70 });

    expect(metrics.dewPoint).toBeCloseTo(23.9272, 3);
    expect(metrics.frostPoint).toBeCloseTo(19.6605, 3);
    expect(metrics.heatIndex).toBeCloseTo(35.038, 3);
    expect(metrics.simmerIndex).toBeCloseTo(40.168, 3);
    expect(metrics.absoluteHumidity).toBeCloseTo(21.2479, 3);
    expect(metrics.thermalPerception).toBe(ThermalPerception.QUITE_UNCOMFORTABLE);
    expect(metrics.simmerZone).toBe(SimmerZone.EXTREMELY_WARM);
    expect(metrics.frostRisk).toBe(FrostRisk.NO_RISK);
    expect(metrics.frostRiskLevel).toBe(0);
  });

  it('should classify frost risk from computed values', () => {
    const metrics = computeMetrics({ temperature: 1, humidity: 90 });

    expect(metrics.frostRisk).toBe(FrostRisk.HIGH);
    expect(metrics.frostRiskLevel).toBe(3);
  });

  it('should report probable frost above freezing', () => {
    expect(computeMetrics({ temperature: 2, humidity: 60 }).frostRisk).toBe(FrostRisk.PROBABLE);
  });

  it('should accept boundary values', () => {
    expect(() => computeMetrics({ temperature: -100, humidity: 0 })).not.toThrow();
    expect(() => computeMetrics({ temperature: 100, humidity: 100 })).not.toThrow();
  });

  it('should be deterministic', () => {
    expect(computeMetrics({ temperature: 22, humidity: 50 })).toEqual(computeMetrics({ temperature: 22, humidity: 50 }));
  });
});

describe('validateMeasurement', () => {
  it('should reject temperatures out of range', () => {
    expect(() => validateMeasurement({ temperature: 150, humidity: 50 })).toThrow(InvalidMeasurementError);
  });

  it('should name the invalid field and location', () => {
    try {
      validateMeasurement({ temperature: 20, humidity: 120 }, 'outdoor');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidMeasurementError);
      const invalid = error as InvalidMeasurementError;
      expect(invalid.field).toBe('humidity');
      expect(invalid.value).toBe(120);
      expect(invalid.location).toBe('outdoor');
      expect(invalid.code).toBe('invalid_measurement');
      expect(invalid.message).toBe('Invalid measurement: outdoor humidity 120 is out of range');
    }
  });

  it('should reject non-finite numbers', () => {
    expect(() => validateMeasurement({ temperature: Number.NaN, humidity: 50 })).toThrow(InvalidMeasurementError);
    expect(() => validateMeasurement({ temperature: 20, humidity: Infinity })).toThrow(InvalidMeasurementError);
  });

  it('should reject negative pollen', () => {
    expect(() => validateMeasurement({ temperature: 20, humidity: 50, pollenLevel: -1 })).toThrow(InvalidMeasurementError);
  });

  it('should accept absent pollen', () => {
    expect(() => validateMeasurement({ temperature: 20, humidity: 50, pollenLevel: null })).not.toThrow();
  });
});

describe('requireMeasurement', () => {
  it('should build a measurement from complete readings', () => {
    expect(requireMeasurement({ temperature: 21, humidity: 40 }, 'indoor')).toEqual({
      temperature: 21,
      humidity: 40,
      pollenLevel: null,
    });
  });

  it('should list every missing field', () => {
    try {
      requireMeasurement({ temperature: null, humidity: null }, 'outdoor');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingInputError);
      const missing = error as MissingInputError;
      expect(missing.fields).toEqual(['temperature', 'humidity']);
      expect(missing.location).toBe('outdoor');
      expect(missing.code).toBe('missing_input');
    }
  });
});

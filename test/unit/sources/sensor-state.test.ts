/**
 * Sensor State Parsing Tests
 */

import { parseSensorState, readHumidity, readTemperature } from '../../../src/sources/sensor-state';

describe('parseSensorState', () => {
  it('should pass finite numbers through', () => {
    expect(parseSensorState(21.5)).toBe(21.5);
    expect(parseSensorState(-3)).toBe(-3);
  });

  it('should parse numeric strings', () => {
    expect(parseSensorState('21.5')).toBe(21.5);
    expect(parseSensorState(' 48 ')).toBe(48);
  });

  it.each(['unavailable', 'Unknown', 'none', '', '   ', 'warm'])('should treat "%s" as unavailable', (state) => {
    expect(parseSensorState(state)).toBeNull();
  });

  it('should treat null, undefined and non-finite numbers as unavailable', () => {
    expect(parseSensorState(null)).toBeNull();
    expect(parseSensorState(undefined)).toBeNull();
    expect(parseSensorState(Number.NaN)).toBeNull();
    expect(parseSensorState(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe('readTemperature', () => {
  it('should use the unit carried by the reading', () => {
    expect(readTemperature({ state: '77', unit: '°F' }, 'C')).toBeCloseTo(25, 10);
    expect(readTemperature({ state: 25, unit: '°C' }, 'F')).toBe(25);
  });

  it('should fall back to the default unit', () => {
    expect(readTemperature({ state: 50 }, 'F')).toBeCloseTo(10, 10);
    expect(readTemperature({ state: 50, unit: 'lx' }, 'C')).toBe(50);
  });

  it('should return null for missing or unavailable readings', () => {
    expect(readTemperature(undefined, 'C')).toBeNull();
    expect(readTemperature({ state: 'unavailable', unit: '°C' }, 'C')).toBeNull();
  });
});

describe('readHumidity', () => {
  it('should read the state as percent', () => {
    expect(readHumidity({ state: '55', unit: '%' })).toBe(55);
    expect(readHumidity({ state: null })).toBeNull();
  });
});

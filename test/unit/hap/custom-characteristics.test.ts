/**
 * Custom Characteristic Tests
 */

import { HomebridgeAPI } from 'homebridge/lib/api.js';
import {
  ABSOLUTE_HUMIDITY_UUID,
  COMFORT_LEVEL_UUID,
  createCustomCharacteristics,
} from '../../../src/hap/custom-characteristics';

const { hap } = new HomebridgeAPI();
const characteristics = createCustomCharacteristics(hap);

describe('createCustomCharacteristics', () => {
  it('should define read-only string characteristics for labels', () => {
    const comfortLevel = new characteristics.ComfortLevel();

    expect(characteristics.ComfortLevel.UUID).toBe(COMFORT_LEVEL_UUID);
    expect(comfortLevel.displayName).toBe('Comfort Level');
    expect(comfortLevel.props.format).toBe('string');
    expect(comfortLevel.props.perms).toEqual(['pr', 'ev']);
    expect(new characteristics.RecommendationReason().props.format).toBe('string');
    expect(new characteristics.NextChangeTime().props.format).toBe('string');
  });

  it('should define absolute humidity as a float in g/m³', () => {
    const absoluteHumidity = new characteristics.AbsoluteHumidity();

    expect(characteristics.AbsoluteHumidity.UUID).toBe(ABSOLUTE_HUMIDITY_UUID);
    expect(absoluteHumidity.props).toMatchObject({
      format: 'float',
      unit: 'g/m³',
      minValue: 0,
      maxValue: 700,
      minStep: 0.01,
      perms: ['pr', 'ev'],
    });
  });
});

/**
 * Display Label Tests
 */

import { FrostRisk, RecommendationReason, SimmerZone, ThermalPerception } from '../../../src/engine/types';
import { ALL_SENSOR_TYPES, SensorType } from '../../../src/types/sensor-types';
import { getCategoryLabel, getReasonLabel, getSensorName, getStateLabel } from '../../../src/utils/labels';

describe('labels', () => {
  it('should name every sensor type', () => {
    expect(getSensorName(SensorType.OPEN_WINDOWS)).toBe('Open Windows');
    expect(getSensorName(SensorType.HIGH_SIMMER_INDEX)).toBe('High Simmer Index');
    for (const type of ALL_SENSOR_TYPES) {
      expect(getSensorName(type)).not.toBe(type);
    }
  });

  it('should label every recommendation reason', () => {
    expect(getReasonLabel(RecommendationReason.DETERIORATING_FORECAST)).toBe('Outdoor conditions will soon worsen');
    for (const reason of Object.values(RecommendationReason)) {
      expect(getReasonLabel(reason)).not.toBe(reason);
    }
  });

  it('should label categories with and without icons', () => {
    expect(getCategoryLabel('simmer_zone', SimmerZone.COMFORTABLE)).toBe('Comfortable');
    expect(getCategoryLabel('simmer_zone', SimmerZone.COMFORTABLE, true)).toBe('🙂 Comfortable');
    expect(getCategoryLabel('frost_risk', FrostRisk.HIGH, true)).toBe('❄️ High probability');
    expect(getCategoryLabel('thermal_perception', ThermalPerception.DRY)).toBe('A bit dry for some');
  });

  it('should cover every category value', () => {
    const tables = [
      ['thermal_perception', Object.values(ThermalPerception)],
      ['simmer_zone', Object.values(SimmerZone)],
      ['frost_risk', Object.values(FrostRisk)],
    ] as const;

    for (const [kind, values] of tables) {
      for (const value of values) {
        expect(getCategoryLabel(kind, value)).not.toBe(value);
      }
    }
  });

  it('should label sensor states', () => {
    expect(getStateLabel('unavailable')).toBe('Unavailable');
    expect(getStateLabel('no_change')).toBe('No change expected');
  });
});

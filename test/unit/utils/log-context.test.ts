/**
 * StructuredLogger Tests
 */

import type { Mock } from 'vitest';
import type { Logger } from 'homebridge';
import { logRecommendation } from '../../../src/accessories/comfort-accessory';
import { ComfortDevice } from '../../../src/device/comfort-device';
import { formatLogMessage, LogCategory, StructuredLogger } from '../../../src/utils/log-context';
import { createDeviceConfig, createReadings } from '../../helpers/fixtures';
import { createMockLogger } from '../../helpers/test-isolation';

describe('formatLogMessage', () => {
  it('should prefix every context field in a fixed order', () => {
    const line = formatLogMessage('Forecast with 48 samples', {
      sensor: 'high_simmer_index',
      operation: 'forecast',
      provider: 'fake',
      deviceName: 'Living Room',
      category: LogCategory.WEATHER,
    });

    expect(line).toBe('[Weather] [Living Room] [Provider:fake] (forecast) [Sensor:high_simmer_index] Forecast with 48 samples');
  });

  it('should append metadata as JSON', () => {
    expect(formatLogMessage('Read readings', { category: LogCategory.READINGS, metadata: { sensors: 4 } }))
      .toBe('[Readings] Read readings {"sensors":4}');
  });

  it('should leave a message without context untouched', () => {
    expect(formatLogMessage('Ready')).toBe('Ready');
    expect(formatLogMessage('Ready', { deviceName: '', metadata: {} })).toBe('Ready');
  });
});

describe('StructuredLogger', () => {
  let log: Logger;
  let logger: StructuredLogger;

  beforeEach(() => {
    log = createMockLogger();
    logger = new StructuredLogger(log);
  });

  it('should route each level to the Homebridge logger', () => {
    logger.debug('a', { category: LogCategory.SENSOR });
    logger.info('b', { category: LogCategory.PLATFORM });
    logger.warn('c', { category: LogCategory.CONFIG });
    logger.error('d', { category: LogCategory.READINGS });

    expect(log.debug).toHaveBeenCalledWith('[Sensor] a');
    expect(log.info).toHaveBeenCalledWith('[Platform] b');
    expect(log.warn).toHaveBeenCalledWith('[Config] c');
    expect(log.error).toHaveBeenCalledWith('[Readings] d');
  });

  it('should merge child context over the parent context', () => {
    const device = logger.child({ category: LogCategory.ACCESSORY, deviceName: 'Living Room', metadata: { unit: 'C' } });
    const sensor = device.child({ category: LogCategory.SENSOR, sensor: 'dew_point', metadata: { precision: 2 } });

    sensor.info('Add service', { operation: 'setup' });

    expect(log.info).toHaveBeenCalledWith('[Sensor] [Living Room] (setup) [Sensor:dew_point] Add service {"unit":"C","precision":2}');
  });

  describe('transition', () => {
    it('should log only when the value changes', () => {
      const device = logger.child({ deviceName: 'Living Room' });

      expect(device.transition('recommendation', 'outdoor_more_comfortable', 'Open')).toBe(true);
      expect(device.transition('recommendation', 'outdoor_more_comfortable', 'Open')).toBe(false);
      expect(device.transition('recommendation', 'indoor_already_comfortable', 'Close')).toBe(true);

      expect((log.info as Mock).mock.calls).toEqual([['[Living Room] Open'], ['[Living Room] Close']]);
    });

    it('should track values per device and sensor', () => {
      const livingRoom = logger.child({ deviceName: 'Living Room' });
      const bedroom = logger.child({ deviceName: 'Bedroom' });

      livingRoom.transition('status', 'available', 'Available', 'debug');
      bedroom.transition('status', 'available', 'Available', 'debug');
      livingRoom.child({ sensor: 'dew_point' }).transition('status', 'available', 'Available', 'debug');

      expect(log.debug).toHaveBeenCalledTimes(3);
    });

    it('should share state between loggers built for the same scope', () => {
      logger.child({ deviceName: 'Living Room' }).transition('recommendation', 'missing_input', 'Unavailable');
      logger.child({ deviceName: 'Living Room' }).transition('recommendation', 'missing_input', 'Unavailable');

      expect(log.info).toHaveBeenCalledTimes(1);
    });
  });
});

describe('logRecommendation', () => {
  const now = new Date('2026-07-01T12:00:00Z');

  it('should report the advice once per change', () => {
    const log = createMockLogger();
    const logger = new StructuredLogger(log).child({ category: LogCategory.ACCESSORY, deviceName: 'Living Room' });
    const device = new ComfortDevice(createDeviceConfig());

    logRecommendation(logger, device.evaluate(now));
    device.updateReadings(createReadings(), 'C');
    logRecommendation(logger, device.evaluate(now));
    logRecommendation(logger, device.evaluate(now));

    expect((log.info as Mock).mock.calls).toEqual([
      ['[Accessory] [Living Room] Recommendation unavailable: Missing input: indoor temperature, humidity not available'],
      ['[Accessory] [Living Room] Open the windows: Outdoors is more comfortable'],
    ]);
  });
});

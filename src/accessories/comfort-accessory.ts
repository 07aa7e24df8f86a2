import type { PlatformAccessory } from 'homebridge';
import type { ComfortDevice, DeviceState } from '../device/comfort-device';
import type { ComfortAccessoryContext, ComfortAdvisorPlatform } from '../platform';
import { SensorManager } from '../sensors';
import { getReasonLabel } from '../utils/labels';
import { LogCategory, type StructuredLogger } from '../utils/log-context';

export const MANUFACTURER = 'Comfort Advisor';
export const MODEL = 'Comfort Sensor';

export class ComfortAccessory {
  readonly platform: ComfortAdvisorPlatform;
  readonly accessory: PlatformAccessory<ComfortAccessoryContext>;
  readonly device: ComfortDevice;
  readonly sensors: SensorManager;

  constructor(
    platform: ComfortAdvisorPlatform,
    accessory: PlatformAccessory<ComfortAccessoryContext>,
    device: ComfortDevice,
  ) {
    this.platform = platform;
    this.accessory = accessory;
    this.device = device;

    const { Service, Characteristic } = this.platform.api.hap;
    const log = this.platform.logger.child({ category: LogCategory.ACCESSORY, deviceName: device.name });

    this.accessory.getService(Service.AccessoryInformation)
      ?.setCharacteristic(Characteristic.Manufacturer, MANUFACTURER)
      .setCharacteristic(Characteristic.Model, MODEL)
      .setCharacteristic(Characteristic.SerialNumber, this.accessory.UUID);

    this.sensors = new SensorManager({
      hap: this.platform.api.hap,
      accessory,
      characteristics: this.platform.characteristics,
      log,
      useCustomIconPack: device.config.useCustomIconPack,
    });
    this.sensors.setupSensors(device.config.enabledSensors);

    log.info(`Publishing ${this.sensors.getActiveSensors().map(sensor => sensor.sensorType).join(', ') || 'no sensors'}`);

    const updateListener = (state: DeviceState) => {
      this.sensors.update(state);
      logRecommendation(log, state);
      log.debug(`Updated sensors, evaluated at ${state.evaluatedAt.toISOString()}`, { operation: 'update' });
    };
    this.device.onUpdated(updateListener);
    this.platform.registerDeviceListener(this.accessory, () => this.device.removeListener('updated', updateListener));

    const state = this.device.getState();
    if (state) {
      this.sensors.update(state);
    }
  }
}

/**
 * Report the window advice whenever it changes.
 */
export function logRecommendation(log: StructuredLogger, state: DeviceState): void {
  const { recommendation } = state;
  if (recommendation.status === 'available') {
    const { openWindows, reason } = recommendation.value;
    log.transition('recommendation', reason, `${openWindows ? 'Open' : 'Close'} the windows: ${getReasonLabel(reason)}`);
  } else {
    log.transition('recommendation', recommendation.reason, `Recommendation unavailable: ${recommendation.error.message}`);
  }
}

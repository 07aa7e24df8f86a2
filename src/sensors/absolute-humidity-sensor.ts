/**
 * Absolute Humidity Sensor
 *
 * HomeKit has no absolute humidity service. The indoor relative humidity is
 * shown on a HumiditySensor with the absolute value (g/m³) as a custom characteristic.
 */

import type {Service, WithUUID} from 'homebridge';
import {METRIC_PRECISION} from '../constants';
import type {DeviceState} from '../device/comfort-device';
import {SensorType} from '../types/sensor-types';
import {roundTo} from '../utils/units';
import {BaseSensor, type SensorContext} from './base-sensor';

export class AbsoluteHumiditySensor extends BaseSensor {
    constructor(context: SensorContext) {
        super(context, SensorType.ABSOLUTE_HUMIDITY);
    }

    protected get serviceType(): WithUUID<typeof Service> {
        return this.hap.Service.HumiditySensor;
    }

    protected configureService(service: Service): void {
        this.getOrAddCharacteristic(service, this.characteristics.AbsoluteHumidity);
    }

    update(state: DeviceState): void {
        this.publish(state.indoorMetrics, (service, metrics) => {
            service.updateCharacteristic(this.characteristics.AbsoluteHumidity, roundTo(metrics.absoluteHumidity, METRIC_PRECISION));
            if (state.indoor.humidity !== null) {
                service.updateCharacteristic(this.hap.Characteristic.CurrentRelativeHumidity, state.indoor.humidity);
            }
        });
    }
}

/**
 * Open Windows Sensor
 *
 * Publishes the window recommendation as a ContactSensor: an open contact
 * means opening the windows is recommended. The reason and the next expected
 * change are exposed as custom string characteristics.
 */

import type {Service, WithUUID} from 'homebridge';
import type {DeviceState} from '../device/comfort-device';
import type {ForecastSummary} from '../engine/types';
import {SensorType} from '../types/sensor-types';
import {getReasonLabel, getStateLabel} from '../utils/labels';
import {BaseSensor, type SensorContext} from './base-sensor';

export function formatNextChange(summary: ForecastSummary): string {
    return summary.nextChangeTime ? summary.nextChangeTime.toISOString() : getStateLabel('no_change');
}

export class OpenWindowsSensor extends BaseSensor {
    constructor(context: SensorContext) {
        super(context, SensorType.OPEN_WINDOWS);
    }

    protected get serviceType(): WithUUID<typeof Service> {
        return this.hap.Service.ContactSensor;
    }

    protected configureService(service: Service): void {
        this.getOrAddCharacteristic(service, this.characteristics.RecommendationReason);
        this.getOrAddCharacteristic(service, this.characteristics.NextChangeTime);
    }

    update(state: DeviceState): void {
        const {ContactSensorState} = this.hap.Characteristic;

        this.publish(state.recommendation, (service, recommendation) => {
            service.updateCharacteristic(
                ContactSensorState,
                recommendation.openWindows ? ContactSensorState.CONTACT_NOT_DETECTED : ContactSensorState.CONTACT_DETECTED,
            );
            service.updateCharacteristic(this.characteristics.RecommendationReason, getReasonLabel(recommendation.reason));
        });

        // Forecast availability does not change the fault state
        const nextChange = state.forecastSummary.status === 'available'
            ? formatNextChange(state.forecastSummary.value)
            : getStateLabel('unavailable');
        this.service?.updateCharacteristic(this.characteristics.NextChangeTime, nextChange);
    }
}

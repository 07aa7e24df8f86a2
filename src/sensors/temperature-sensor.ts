/**
 * Temperature Sensor
 *
 * Publishes a temperature-like metric (dew point, frost point, heat index,
 * simmer index or a forecast extreme) as a HomeKit TemperatureSensor.
 */

import type {Service, WithUUID} from 'homebridge';
import {METRIC_PRECISION} from '../constants';
import {mapOutcome, type DeviceState, type Outcome} from '../device/comfort-device';
import {SensorType} from '../types/sensor-types';
import {roundTo} from '../utils/units';
import {BaseSensor, type SensorContext} from './base-sensor';

export const TEMPERATURE_MIN_VALUE = -150;
export const TEMPERATURE_MAX_VALUE = 200;

export type TemperatureSensorType =
    | SensorType.DEW_POINT
    | SensorType.FROST_POINT
    | SensorType.HEAT_INDEX
    | SensorType.SIMMER_INDEX
    | SensorType.HIGH_SIMMER_INDEX
    | SensorType.LOW_SIMMER_INDEX;

type TemperaturePicker = (state: DeviceState) => Outcome<number>;

const TEMPERATURE_PICKERS: Readonly<Record<TemperatureSensorType, TemperaturePicker>> = {
    [SensorType.DEW_POINT]: state => mapOutcome(state.indoorMetrics, metrics => metrics.dewPoint),
    [SensorType.FROST_POINT]: state => mapOutcome(state.indoorMetrics, metrics => metrics.frostPoint),
    [SensorType.HEAT_INDEX]: state => mapOutcome(state.indoorMetrics, metrics => metrics.heatIndex),
    [SensorType.SIMMER_INDEX]: state => mapOutcome(state.indoorMetrics, metrics => metrics.simmerIndex),
    [SensorType.HIGH_SIMMER_INDEX]: state => mapOutcome(state.forecastSummary, summary => summary.highSimmerIndex),
    [SensorType.LOW_SIMMER_INDEX]: state => mapOutcome(state.forecastSummary, summary => summary.lowSimmerIndex),
};

export class TemperatureSensor extends BaseSensor {
    private readonly pick: TemperaturePicker;

    constructor(context: SensorContext, sensorType: TemperatureSensorType) {
        super(context, sensorType);
        this.pick = TEMPERATURE_PICKERS[sensorType];
    }

    protected get serviceType(): WithUUID<typeof Service> {
        return this.hap.Service.TemperatureSensor;
    }

    protected configureService(service: Service): void {
        // Heat and simmer indices leave HomeKit's default 0..100 range
        service.getCharacteristic(this.hap.Characteristic.CurrentTemperature).setProps({
            minValue: TEMPERATURE_MIN_VALUE,
            maxValue: TEMPERATURE_MAX_VALUE,
            minStep: 0.01,
        });
    }

    update(state: DeviceState): void {
        this.publish(this.pick(state), (service, value) => {
            service.updateCharacteristic(this.hap.Characteristic.CurrentTemperature, roundTo(value, METRIC_PRECISION));
        });
    }
}

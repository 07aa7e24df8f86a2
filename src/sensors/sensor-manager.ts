/**
 * Sensor Manager
 *
 * Orchestrates the output sensors of a comfort accessory.
 * Creates every sensor, sets up the enabled ones and fans out device updates.
 */

import type {DeviceState} from '../device/comfort-device';
import {SensorType} from '../types/sensor-types';
import {AbsoluteHumiditySensor} from './absolute-humidity-sensor';
import type {BaseSensor, SensorContext} from './base-sensor';
import {CategorySensor} from './category-sensor';
import {OpenWindowsSensor} from './open-windows-sensor';
import {TemperatureSensor} from './temperature-sensor';

type SensorFactory = (context: SensorContext) => BaseSensor;

/**
 * Every output sensor, in the order services are added
 */
const SENSOR_FACTORIES: Readonly<Record<SensorType, SensorFactory>> = {
    [SensorType.OPEN_WINDOWS]: context => new OpenWindowsSensor(context),
    [SensorType.ABSOLUTE_HUMIDITY]: context => new AbsoluteHumiditySensor(context),
    [SensorType.DEW_POINT]: context => new TemperatureSensor(context, SensorType.DEW_POINT),
    [SensorType.FROST_POINT]: context => new TemperatureSensor(context, SensorType.FROST_POINT),
    [SensorType.FROST_RISK]: context => new CategorySensor(context, SensorType.FROST_RISK),
    [SensorType.HEAT_INDEX]: context => new TemperatureSensor(context, SensorType.HEAT_INDEX),
    [SensorType.SIMMER_INDEX]: context => new TemperatureSensor(context, SensorType.SIMMER_INDEX),
    [SensorType.SIMMER_ZONE]: context => new CategorySensor(context, SensorType.SIMMER_ZONE),
    [SensorType.THERMAL_PERCEPTION]: context => new CategorySensor(context, SensorType.THERMAL_PERCEPTION),
    [SensorType.HIGH_SIMMER_INDEX]: context => new TemperatureSensor(context, SensorType.HIGH_SIMMER_INDEX),
    [SensorType.LOW_SIMMER_INDEX]: context => new TemperatureSensor(context, SensorType.LOW_SIMMER_INDEX),
};

export class SensorManager {
    private readonly sensors: BaseSensor[];

    constructor(context: SensorContext) {
        this.sensors = Object.values(SENSOR_FACTORIES).map(create => create(context));
    }

    /**
     * Set up all sensors. Disabled sensors remove their service from a cached accessory.
     */
    setupSensors(enabled: ReadonlySet<SensorType>): void {
        for (const sensor of this.sensors) {
            sensor.setup(enabled.has(sensor.sensorType));
        }
    }

    /**
     * Push a device evaluation to every active sensor.
     */
    update(state: DeviceState): void {
        for (const sensor of this.getActiveSensors()) {
            sensor.update(state);
        }
    }

    getSensor(type: SensorType): BaseSensor | undefined {
        return this.sensors.find(sensor => sensor.sensorType === type);
    }

    getActiveSensors(): BaseSensor[] {
        return this.sensors.filter(sensor => sensor.isActive);
    }

    getAllSensors(): BaseSensor[] {
        return [...this.sensors];
    }
}

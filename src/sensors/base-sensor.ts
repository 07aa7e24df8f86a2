/**
 * Base Sensor
 *
 * Abstract base class for the HomeKit services a comfort accessory publishes.
 * Each sensor owns one service, identified by its sensor type as subtype.
 */

import type {Characteristic, HAP, PlatformAccessory, Service, WithUUID} from 'homebridge';
import type {DeviceState, Outcome} from '../device/comfort-device';
import type {CustomCharacteristic, CustomCharacteristics} from '../hap/custom-characteristics';
import type {ComfortAccessoryContext} from '../platform';
import type {SensorType} from '../types/sensor-types';
import {getSensorName} from '../utils/labels';
import {LogCategory, type StructuredLogger} from '../utils/log-context';

export interface SensorContext {
    hap: HAP;
    accessory: PlatformAccessory<ComfortAccessoryContext>;
    characteristics: CustomCharacteristics;
    log: StructuredLogger;
    useCustomIconPack: boolean;
}

export abstract class BaseSensor {
    protected readonly hap: HAP;
    protected readonly accessory: PlatformAccessory<ComfortAccessoryContext>;
    protected readonly characteristics: CustomCharacteristics;
    protected readonly log: StructuredLogger;
    protected readonly useCustomIconPack: boolean;

    protected service?: Service;

    constructor(context: SensorContext, readonly sensorType: SensorType) {
        this.hap = context.hap;
        this.accessory = context.accessory;
        this.characteristics = context.characteristics;
        this.useCustomIconPack = context.useCustomIconPack;
        this.log = context.log.child({category: LogCategory.SENSOR, sensor: sensorType});
    }

    /**
     * The display name for this sensor's service.
     */
    get sensorName(): string {
        return getSensorName(this.sensorType);
    }

    get isActive(): boolean {
        return this.service !== undefined;
    }

    getService(): Service | undefined {
        return this.service;
    }

    /**
     * The HomeKit service type this sensor is published as.
     */
    protected abstract get serviceType(): WithUUID<typeof Service>;

    /**
     * Push the values of a new evaluation to the service.
     */
    abstract update(state: DeviceState): void;

    /**
     * Hook for characteristics and props beyond the service defaults.
     */
    protected configureService(_service: Service): void {}

    /**
     * Set up the sensor. Creates or removes its service based on configuration.
     */
    setup(enabled: boolean): void {
        if (enabled) {
            this.log.debug('Add service', {operation: 'setup'});
            this.service = this.createOrUpdateService();
        } else {
            this.removeServiceIfExists();
        }
    }

    protected createOrUpdateService(): Service {
        const {Characteristic} = this.hap;
        const service = this.accessory.getServiceById(this.serviceType, this.sensorType) ??
            this.accessory.addService(this.serviceType, this.sensorName, this.sensorType);

        service.setCharacteristic(Characteristic.Name, this.sensorName);
        service.addOptionalCharacteristic(Characteristic.ConfiguredName);
        service.setCharacteristic(Characteristic.ConfiguredName, this.sensorName);

        this.configureService(service);
        return service;
    }

    protected removeServiceIfExists(): void {
        const existingService = this.accessory.getServiceById(this.serviceType, this.sensorType);
        if (existingService) {
            this.log.debug('Remove disabled service', {operation: 'setup'});
            this.accessory.removeService(existingService);
        }
        this.service = undefined;
    }

    /**
     * Apply an available value, or flag the service as faulted and keep the last value.
     */
    protected publish<T>(outcome: Outcome<T>, apply: (service: Service, value: T) => void): void {
        const service = this.service;
        if (!service) {
            return;
        }

        const {Characteristic} = this.hap;
        if (outcome.status === 'available') {
            apply(service, outcome.value);
            this.log.transition('status', 'available', 'Available', 'debug');
            service.updateCharacteristic(Characteristic.StatusActive, true);
            service.updateCharacteristic(Characteristic.StatusFault, Characteristic.StatusFault.NO_FAULT);
        } else {
            this.log.transition('status', outcome.reason, `Unavailable: ${outcome.error.message}`, 'debug');
            service.updateCharacteristic(Characteristic.StatusActive, false);
            service.updateCharacteristic(Characteristic.StatusFault, Characteristic.StatusFault.GENERAL_FAULT);
        }
    }

    protected getOrAddCharacteristic(service: Service, characteristic: CustomCharacteristic): Characteristic {
        return service.characteristics.find(existing => existing.UUID === characteristic.UUID) ??
            service.addCharacteristic(characteristic);
    }
}

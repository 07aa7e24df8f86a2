/**
 * Category Sensor
 *
 * Publishes a comfort category as an AirQualitySensor. The air quality level
 * follows the category's severity; the translated label goes to a custom
 * Comfort Level characteristic.
 */

import type {Service, WithUUID} from 'homebridge';
import {mapOutcome, type DeviceState, type Outcome} from '../device/comfort-device';
import {FrostRisk, SimmerZone, ThermalPerception} from '../engine/types';
import {SensorType} from '../types/sensor-types';
import {getCategoryLabel, type CategoryKind, type CategoryValue} from '../utils/labels';
import {BaseSensor, type SensorContext} from './base-sensor';

export type CategorySensorType = SensorType.THERMAL_PERCEPTION | SensorType.SIMMER_ZONE | SensorType.FROST_RISK;

/** HomeKit AirQuality levels, 1 = excellent to 5 = poor */
export type AirQualityLevel = 1 | 2 | 3 | 4 | 5;

export const THERMAL_PERCEPTION_SEVERITY: Readonly<Record<ThermalPerception, AirQualityLevel>> = {
    [ThermalPerception.DRY]: 2,
    [ThermalPerception.VERY_COMFORTABLE]: 1,
    [ThermalPerception.COMFORTABLE]: 1,
    [ThermalPerception.OK_BUT_HUMID]: 2,
    [ThermalPerception.SOMEWHAT_UNCOMFORTABLE]: 3,
    [ThermalPerception.QUITE_UNCOMFORTABLE]: 4,
    [ThermalPerception.EXTREMELY_UNCOMFORTABLE]: 5,
    [ThermalPerception.SEVERELY_HIGH]: 5,
};

export const SIMMER_ZONE_SEVERITY: Readonly<Record<SimmerZone, AirQualityLevel>> = {
    [SimmerZone.COOL]: 2,
    [SimmerZone.SLIGHTLY_COOL]: 1,
    [SimmerZone.COMFORTABLE]: 1,
    [SimmerZone.SLIGHTLY_WARM]: 2,
    [SimmerZone.INCREASING_DISCOMFORT]: 3,
    [SimmerZone.EXTREMELY_WARM]: 4,
    [SimmerZone.DANGER_OF_HEATSTROKE]: 5,
    [SimmerZone.EXTREME_DANGER_OF_HEATSTROKE]: 5,
    [SimmerZone.CIRCULATORY_COLLAPSE_IMMINENT]: 5,
};

export const FROST_RISK_SEVERITY: Readonly<Record<FrostRisk, AirQualityLevel>> = {
    [FrostRisk.NO_RISK]: 1,
    [FrostRisk.UNLIKELY]: 2,
    [FrostRisk.PROBABLE]: 4,
    [FrostRisk.HIGH]: 5,
};

interface CategoryReading {
    value: CategoryValue;
    severity: AirQualityLevel;
}

interface CategoryDefinition {
    kind: CategoryKind;
    pick: (state: DeviceState) => Outcome<CategoryReading>;
}

const CATEGORY_DEFINITIONS: Readonly<Record<CategorySensorType, CategoryDefinition>> = {
    [SensorType.THERMAL_PERCEPTION]: {
        kind: 'thermal_perception',
        pick: state => mapOutcome(state.indoorMetrics, ({thermalPerception}) => ({
            value: thermalPerception,
            severity: THERMAL_PERCEPTION_SEVERITY[thermalPerception],
        })),
    },
    [SensorType.SIMMER_ZONE]: {
        kind: 'simmer_zone',
        pick: state => mapOutcome(state.indoorMetrics, ({simmerZone}) => ({
            value: simmerZone,
            severity: SIMMER_ZONE_SEVERITY[simmerZone],
        })),
    },
    [SensorType.FROST_RISK]: {
        kind: 'frost_risk',
        pick: state => mapOutcome(state.indoorMetrics, ({frostRisk}) => ({
            value: frostRisk,
            severity: FROST_RISK_SEVERITY[frostRisk],
        })),
    },
};

export class CategorySensor extends BaseSensor {
    private readonly definition: CategoryDefinition;

    constructor(context: SensorContext, sensorType: CategorySensorType) {
        super(context, sensorType);
        this.definition = CATEGORY_DEFINITIONS[sensorType];
    }

    protected get serviceType(): WithUUID<typeof Service> {
        return this.hap.Service.AirQualitySensor;
    }

    protected configureService(service: Service): void {
        this.getOrAddCharacteristic(service, this.characteristics.ComfortLevel);
    }

    update(state: DeviceState): void {
        this.publish(this.definition.pick(state), (service, {value, severity}) => {
            const label = getCategoryLabel(this.definition.kind, value, this.useCustomIconPack);
            service.updateCharacteristic(this.hap.Characteristic.AirQuality, severity);
            service.updateCharacteristic(this.characteristics.ComfortLevel, label);
        });
    }
}

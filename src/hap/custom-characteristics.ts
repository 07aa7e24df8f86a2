/**
 * Custom Characteristics
 *
 * HomeKit has no characteristics for comfort labels or absolute humidity.
 * These are shown by third-party HomeKit apps such as Eve or Controller.
 */

import type { Characteristic, HAP, WithUUID } from 'homebridge';

export type CustomCharacteristic = WithUUID<new () => Characteristic>;

export interface CustomCharacteristics {
    ComfortLevel: CustomCharacteristic;
    RecommendationReason: CustomCharacteristic;
    NextChangeTime: CustomCharacteristic;
    AbsoluteHumidity: CustomCharacteristic;
}

export const COMFORT_LEVEL_UUID = 'BC806FDA-A995-4D9E-B8E9-2BB4A6F75A9E';
export const RECOMMENDATION_REASON_UUID = '3443919D-0939-4C06-8A73-EB137E9A7CD4';
export const NEXT_CHANGE_TIME_UUID = '29F95A80-7516-4532-AFA3-E252D771F411';
export const ABSOLUTE_HUMIDITY_UUID = '06FC5565-E7C2-45EB-90CB-6320CE8DBDFA';

export function createCustomCharacteristics(hap: HAP): CustomCharacteristics {
    const { Formats, Perms } = hap;
    const readNotify = [Perms.PAIRED_READ, Perms.NOTIFY];

    class ComfortLevel extends hap.Characteristic {
        static readonly UUID = COMFORT_LEVEL_UUID;

        constructor() {
            super('Comfort Level', ComfortLevel.UUID, { format: Formats.STRING, perms: readNotify });
            this.value = this.getDefaultValue();
        }
    }

    class RecommendationReason extends hap.Characteristic {
        static readonly UUID = RECOMMENDATION_REASON_UUID;

        constructor() {
            super('Recommendation', RecommendationReason.UUID, { format: Formats.STRING, perms: readNotify });
            this.value = this.getDefaultValue();
        }
    }

    class NextChangeTime extends hap.Characteristic {
        static readonly UUID = NEXT_CHANGE_TIME_UUID;

        constructor() {
            super('Next Change', NextChangeTime.UUID, { format: Formats.STRING, perms: readNotify });
            this.value = this.getDefaultValue();
        }
    }

    class AbsoluteHumidity extends hap.Characteristic {
        static readonly UUID = ABSOLUTE_HUMIDITY_UUID;

        constructor() {
            super('Absolute Humidity', AbsoluteHumidity.UUID, {
                format: Formats.FLOAT,
                unit: 'g/m³',
                minValue: 0,
                maxValue: 700,
                minStep: 0.01,
                perms: readNotify,
            });
            this.value = this.getDefaultValue();
        }
    }

    return { ComfortLevel, RecommendationReason, NextChangeTime, AbsoluteHumidity };
}

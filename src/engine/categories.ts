/**
 * Comfort Categories
 *
 * Ordinal labels derived from numeric metrics. Each table is an ordered list
 * of exclusive upper bounds; a value belongs to the first interval it is below.
 */

import { FROST_ABSOLUTE_HUMIDITY_THRESHOLD } from '../constants';
import { FrostRisk, SimmerZone, ThermalPerception } from './types';

export interface Breakpoint<L> {
    readonly upperBound: number;
    readonly label: L;
}

export type BreakpointTable<L> = readonly Breakpoint<L>[];

/** Thermal perception by dew point (°C) */
export const THERMAL_PERCEPTION_TABLE: BreakpointTable<ThermalPerception> = Object.freeze([
    { upperBound: 10, label: ThermalPerception.DRY },
    { upperBound: 13, label: ThermalPerception.VERY_COMFORTABLE },
    { upperBound: 16, label: ThermalPerception.COMFORTABLE },
    { upperBound: 18, label: ThermalPerception.OK_BUT_HUMID },
    { upperBound: 21, label: ThermalPerception.SOMEWHAT_UNCOMFORTABLE },
    { upperBound: 24, label: ThermalPerception.QUITE_UNCOMFORTABLE },
    { upperBound: 26, label: ThermalPerception.EXTREMELY_UNCOMFORTABLE },
    { upperBound: Infinity, label: ThermalPerception.SEVERELY_HIGH },
]);

/** Simmer zone by simmer index (°C) */
export const SIMMER_ZONE_TABLE: BreakpointTable<SimmerZone> = Object.freeze([
    { upperBound: 21.1, label: SimmerZone.COOL },
    { upperBound: 25.0, label: SimmerZone.SLIGHTLY_COOL },
    { upperBound: 28.3, label: SimmerZone.COMFORTABLE },
    { upperBound: 32.8, label: SimmerZone.SLIGHTLY_WARM },
    { upperBound: 38.8, label: SimmerZone.INCREASING_DISCOMFORT },
    { upperBound: 44.4, label: SimmerZone.EXTREMELY_WARM },
    { upperBound: 51.7, label: SimmerZone.DANGER_OF_HEATSTROKE },
    { upperBound: 65.6, label: SimmerZone.EXTREME_DANGER_OF_HEATSTROKE },
    { upperBound: Infinity, label: SimmerZone.CIRCULATORY_COLLAPSE_IMMINENT },
]);

/**
 * Find the label of the interval containing value.
 */
export function classify<L>(value: number, table: BreakpointTable<L>): L {
    for (const breakpoint of table) {
        if (value < breakpoint.upperBound) {
            return breakpoint.label;
        }
    }
    // Tables end with an unbounded interval; only NaN falls through.
    throw new RangeError(`Value ${value} does not fall into any interval`);
}

export function classifyThermalPerception(dewPoint: number): ThermalPerception {
    return classify(dewPoint, THERMAL_PERCEPTION_TABLE);
}

export function classifySimmerZone(simmerIndex: number): SimmerZone {
    return classify(simmerIndex, SIMMER_ZONE_TABLE);
}

export interface FrostInputs {
    readonly temperature: number;
    readonly frostPoint: number;
    readonly absoluteHumidity: number;
}

interface FrostRule {
    readonly applies: (inputs: FrostInputs) => boolean;
    readonly risk: (inputs: FrostInputs) => FrostRisk;
}

const FROST_RULES: readonly FrostRule[] = Object.freeze([
    {
        applies: ({ temperature, frostPoint }) => temperature <= 1 && frostPoint <= 0,
        risk: ({ absoluteHumidity }) => absoluteHumidity <= FROST_ABSOLUTE_HUMIDITY_THRESHOLD
            ? FrostRisk.UNLIKELY
            : FrostRisk.HIGH,
    },
    {
        applies: ({ temperature, frostPoint, absoluteHumidity }) =>
            temperature <= 4 && frostPoint <= 0.5 && absoluteHumidity > FROST_ABSOLUTE_HUMIDITY_THRESHOLD,
        risk: () => FrostRisk.PROBABLE,
    },
]);

/**
 * Risk of frost forming on surfaces, first matching rule wins.
 */
export function classifyFrostRisk(inputs: FrostInputs): FrostRisk {
    const rule = FROST_RULES.find(candidate => candidate.applies(inputs));
    return rule ? rule.risk(inputs) : FrostRisk.NO_RISK;
}

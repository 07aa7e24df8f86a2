/**
 * Comfort Engine Types
 *
 * Value types consumed and produced by the comfort engine.
 * All temperatures are degrees Celsius, all humidities percent relative humidity.
 */

/**
 * A single reading for one location (indoor or outdoor).
 */
export interface Measurement {
    readonly temperature: number;
    readonly humidity: number;
    /** Provider-defined pollen scale, absent when the source has no pollen data */
    readonly pollenLevel?: number | null;
}

/**
 * A forecast point for the outdoor location.
 */
export interface ForecastSample extends Measurement {
    readonly dateTime: Date;
}

export interface ComfortThresholds {
    readonly simmerIndexMin: number;
    readonly simmerIndexMax: number;
    readonly dewPointMax: number;
    readonly humidityMax: number;
    readonly pollenMax?: number | null;
}

export enum ThermalPerception {
    DRY = 'dry',
    VERY_COMFORTABLE = 'very_comfortable',
    COMFORTABLE = 'comfortable',
    OK_BUT_HUMID = 'ok_but_humid',
    SOMEWHAT_UNCOMFORTABLE = 'somewhat_uncomfortable',
    QUITE_UNCOMFORTABLE = 'quite_uncomfortable',
    EXTREMELY_UNCOMFORTABLE = 'extremely_uncomfortable',
    SEVERELY_HIGH = 'severely_high',
}

export enum SimmerZone {
    COOL = 'cool',
    SLIGHTLY_COOL = 'slightly_cool',
    COMFORTABLE = 'comfortable',
    SLIGHTLY_WARM = 'slightly_warm',
    INCREASING_DISCOMFORT = 'increasing_discomfort',
    EXTREMELY_WARM = 'extremely_warm',
    DANGER_OF_HEATSTROKE = 'danger_of_heatstroke',
    EXTREME_DANGER_OF_HEATSTROKE = 'extreme_danger_of_heatstroke',
    CIRCULATORY_COLLAPSE_IMMINENT = 'circulatory_collapse_imminent',
}

export enum FrostRisk {
    NO_RISK = 'no_risk',
    UNLIKELY = 'unlikely',
    PROBABLE = 'probable',
    HIGH = 'high',
}

/** Ordinal position of each frost risk label */
export const FROST_RISK_LEVELS: Readonly<Record<FrostRisk, number>> = {
    [FrostRisk.NO_RISK]: 0,
    [FrostRisk.UNLIKELY]: 1,
    [FrostRisk.PROBABLE]: 2,
    [FrostRisk.HIGH]: 3,
};

export interface DerivedMetrics {
    readonly dewPoint: number;
    readonly frostPoint: number;
    readonly heatIndex: number;
    readonly simmerIndex: number;
    /** g/m³ */
    readonly absoluteHumidity: number;
    readonly thermalPerception: ThermalPerception;
    readonly simmerZone: SimmerZone;
    readonly frostRisk: FrostRisk;
    readonly frostRiskLevel: number;
}

export enum RecommendationReason {
    OUTDOOR_TEMPERATURE_UNCOMFORTABLE = 'outdoor_temperature_uncomfortable',
    OUTDOOR_DEW_POINT_TOO_HIGH = 'outdoor_dew_point_too_high',
    OUTDOOR_HUMIDITY_TOO_HIGH = 'outdoor_humidity_too_high',
    OUTDOOR_POLLEN_TOO_HIGH = 'outdoor_pollen_too_high',
    INDOOR_ALREADY_COMFORTABLE = 'indoor_already_comfortable',
    DETERIORATING_FORECAST = 'deteriorating_forecast',
    OUTDOOR_MORE_COMFORTABLE = 'outdoor_more_comfortable',
}

export interface Recommendation {
    readonly openWindows: boolean;
    readonly reason: RecommendationReason;
    readonly indoor: DerivedMetrics;
    readonly outdoor: DerivedMetrics;
    /** The forecast point that suppressed the recommendation, if any */
    readonly failingSample?: ForecastSample;
}

export interface ForecastSummary {
    readonly lowSimmerIndex: number;
    readonly highSimmerIndex: number;
    /** First forecast time at which outdoor comfort flips, null when it holds */
    readonly nextChangeTime: Date | null;
}

export type MeasurementLocation = 'indoor' | 'outdoor' | 'forecast';

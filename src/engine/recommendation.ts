/**
 * Window Recommendation
 *
 * Decides whether opening the windows improves indoor comfort. Outdoor checks
 * run first, then the indoor check, then the forecast look-ahead.
 */

import { DEFAULT_FORECAST_HORIZON_HOURS, ONE_HOUR_MS } from '../constants';
import { computeMetrics } from './metrics';
import {
    RecommendationReason,
    type ComfortThresholds,
    type DerivedMetrics,
    type ForecastSample,
    type Measurement,
    type Recommendation,
} from './types';

interface OutdoorRule {
    readonly reason: RecommendationReason;
    readonly violated: (measurement: Measurement, metrics: DerivedMetrics, thresholds: ComfortThresholds) => boolean;
}

export function isWithinSimmerBand(simmerIndex: number, thresholds: ComfortThresholds): boolean {
    return simmerIndex >= thresholds.simmerIndexMin && simmerIndex <= thresholds.simmerIndexMax;
}

const OUTDOOR_RULES: readonly OutdoorRule[] = Object.freeze([
    {
        reason: RecommendationReason.OUTDOOR_TEMPERATURE_UNCOMFORTABLE,
        violated: (_measurement, metrics, thresholds) => !isWithinSimmerBand(metrics.simmerIndex, thresholds),
    },
    {
        reason: RecommendationReason.OUTDOOR_DEW_POINT_TOO_HIGH,
        violated: (_measurement, metrics, thresholds) => metrics.dewPoint > thresholds.dewPointMax,
    },
    {
        reason: RecommendationReason.OUTDOOR_HUMIDITY_TOO_HIGH,
        violated: (measurement, _metrics, thresholds) => measurement.humidity > thresholds.humidityMax,
    },
    {
        reason: RecommendationReason.OUTDOOR_POLLEN_TOO_HIGH,
        violated: (measurement, _metrics, thresholds) =>
            measurement.pollenLevel !== undefined
            && measurement.pollenLevel !== null
            && thresholds.pollenMax !== undefined
            && thresholds.pollenMax !== null
            && measurement.pollenLevel > thresholds.pollenMax,
    },
]);

/**
 * First outdoor check the measurement fails, or null when outdoor air is acceptable.
 */
export function findOutdoorViolation(
    measurement: Measurement,
    metrics: DerivedMetrics,
    thresholds: ComfortThresholds,
): RecommendationReason | null {
    const rule = OUTDOOR_RULES.find(candidate => candidate.violated(measurement, metrics, thresholds));
    return rule ? rule.reason : null;
}

export function isOutdoorAcceptable(measurement: Measurement, thresholds: ComfortThresholds): boolean {
    return findOutdoorViolation(measurement, computeMetrics(measurement, 'forecast'), thresholds) === null;
}

export interface RecommendOptions {
    /** Ordered by time; consumed lazily and abandoned past the horizon */
    readonly forecast?: Iterable<ForecastSample>;
    readonly now?: Date;
    readonly horizonHours?: number;
}

function findDeterioration(
    forecast: Iterable<ForecastSample>,
    thresholds: ComfortThresholds,
    now: Date,
    horizonHours: number,
): ForecastSample | undefined {
    const start = now.getTime();
    const end = start + horizonHours * ONE_HOUR_MS;

    for (const sample of forecast) {
        const time = sample.dateTime.getTime();
        if (time > end) {
            break;
        }
        if (time < start) {
            continue;
        }
        if (!isOutdoorAcceptable(sample, thresholds)) {
            return sample;
        }
    }
    return undefined;
}

export function recommend(
    indoor: Measurement,
    outdoor: Measurement,
    thresholds: ComfortThresholds,
    options: RecommendOptions = {},
): Recommendation {
    const indoorMetrics = computeMetrics(indoor, 'indoor');
    const outdoorMetrics = computeMetrics(outdoor, 'outdoor');
    const verdict = (openWindows: boolean, reason: RecommendationReason, failingSample?: ForecastSample): Recommendation => ({
        openWindows,
        reason,
        indoor: indoorMetrics,
        outdoor: outdoorMetrics,
        ...(failingSample ? { failingSample } : {}),
    });

    const violation = findOutdoorViolation(outdoor, outdoorMetrics, thresholds);
    if (violation) {
        return verdict(false, violation);
    }

    if (isWithinSimmerBand(indoorMetrics.simmerIndex, thresholds)) {
        return verdict(false, RecommendationReason.INDOOR_ALREADY_COMFORTABLE);
    }

    if (options.forecast) {
        const failingSample = findDeterioration(
            options.forecast,
            thresholds,
            options.now ?? new Date(),
            options.horizonHours ?? DEFAULT_FORECAST_HORIZON_HOURS,
        );
        if (failingSample) {
            return verdict(false, RecommendationReason.DETERIORATING_FORECAST, failingSample);
        }
    }

    return verdict(true, RecommendationReason.OUTDOOR_MORE_COMFORTABLE);
}

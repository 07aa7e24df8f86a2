/**
 * Forecast Summary
 */

import { FORECAST_SUMMARY_WINDOW_HOURS, ONE_HOUR_MS } from '../constants';
import { computeMetrics } from './metrics';
import { findOutdoorViolation } from './recommendation';
import type { ComfortThresholds, ForecastSample, ForecastSummary, Measurement } from './types';

export interface SummarizeOptions {
    readonly now?: Date;
}

/**
 * Simmer index range over the next day and the first time outdoor
 * acceptability differs from the current one.
 */
export function summarizeForecast(
    outdoor: Measurement,
    thresholds: ComfortThresholds,
    forecast: Iterable<ForecastSample>,
    options: SummarizeOptions = {},
): ForecastSummary {
    const outdoorMetrics = computeMetrics(outdoor, 'outdoor');
    const acceptableNow = findOutdoorViolation(outdoor, outdoorMetrics, thresholds) === null;

    const start = (options.now ?? new Date()).getTime();
    const windowEnd = start + FORECAST_SUMMARY_WINDOW_HOURS * ONE_HOUR_MS;

    let lowSimmerIndex = outdoorMetrics.simmerIndex;
    let highSimmerIndex = outdoorMetrics.simmerIndex;
    let nextChangeTime: Date | null = null;

    for (const sample of forecast) {
        const time = sample.dateTime.getTime();
        if (time < start) {
            continue;
        }

        const metrics = computeMetrics(sample, 'forecast');

        if (time <= windowEnd) {
            lowSimmerIndex = Math.min(lowSimmerIndex, metrics.simmerIndex);
            highSimmerIndex = Math.max(highSimmerIndex, metrics.simmerIndex);
        }

        if (nextChangeTime === null) {
            const acceptable = findOutdoorViolation(sample, metrics, thresholds) === null;
            if (acceptable !== acceptableNow) {
                nextChangeTime = sample.dateTime;
            }
        }

        if (nextChangeTime !== null && time > windowEnd) {
            break;
        }
    }

    return { lowSimmerIndex, highSimmerIndex, nextChangeTime };
}

/**
 * Comfort Thresholds
 */

import { ConfigurationError } from './errors';
import type { ComfortThresholds } from './types';

/**
 * Collect every invariant the thresholds break.
 */
export function findThresholdIssues(thresholds: ComfortThresholds): string[] {
    const issues: string[] = [];
    const { simmerIndexMin, simmerIndexMax, dewPointMax, humidityMax, pollenMax } = thresholds;

    if (!Number.isFinite(simmerIndexMin) || !Number.isFinite(simmerIndexMax)) {
        issues.push('simmer index bounds must be finite numbers');
    } else if (simmerIndexMin >= simmerIndexMax) {
        issues.push(`simmerIndexMin (${simmerIndexMin}) must be below simmerIndexMax (${simmerIndexMax})`);
    }

    if (!Number.isFinite(dewPointMax)) {
        issues.push('dewPointMax must be a finite number');
    }

    if (!Number.isFinite(humidityMax) || humidityMax < 0 || humidityMax > 100) {
        issues.push(`humidityMax (${humidityMax}) must be between 0 and 100`);
    }

    if (pollenMax !== undefined && pollenMax !== null && (!Number.isFinite(pollenMax) || pollenMax < 0)) {
        issues.push(`pollenMax (${pollenMax}) must be a non-negative number`);
    }

    return issues;
}

export function validateThresholds(thresholds: ComfortThresholds): void {
    const issues = findThresholdIssues(thresholds);
    if (issues.length > 0) {
        throw new ConfigurationError('invalid comfort thresholds', issues);
    }
}

/**
 * Comfort Engine Errors
 *
 * Failures are signalled, never replaced by default values, so the host
 * can mark the affected sensors unavailable.
 */

import type { MeasurementLocation } from './types';

export abstract class ComfortAdvisorError extends Error {
    abstract readonly code: string;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export type MeasurementField = 'temperature' | 'humidity' | 'pollenLevel';

/**
 * A reading outside its physical range or not a finite number.
 */
export class InvalidMeasurementError extends ComfortAdvisorError {
    readonly code = 'invalid_measurement';

    constructor(
        readonly field: MeasurementField,
        readonly value: number,
        readonly location?: MeasurementLocation,
    ) {
        super(`Invalid measurement: ${location ? `${location} ` : ''}${field} ${value} is out of range`);
    }
}

/**
 * A required reading has not been received yet.
 */
export class MissingInputError extends ComfortAdvisorError {
    readonly code = 'missing_input';

    constructor(
        readonly location: MeasurementLocation,
        readonly fields: MeasurementField[],
    ) {
        super(`Missing input: ${location} ${fields.join(', ')} not available`);
    }
}

/**
 * Thresholds or other configuration that violate their invariants.
 */
export class ConfigurationError extends ComfortAdvisorError {
    readonly code = 'configuration';

    constructor(
        message: string,
        readonly issues: string[] = [],
    ) {
        super(issues.length > 0 ? `Configuration error: ${message}: ${issues.join('; ')}` : `Configuration error: ${message}`);
    }
}

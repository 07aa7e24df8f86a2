/**
 * Error Handler
 *
 * Classifies failures from the readings file, weather providers and
 * configuration, and logs them at a matching level. A failure that repeats
 * for the same operation and device is logged once, then only at debug level
 * until `recover()` reports that the operation works again.
 */

import type {Logger} from 'homebridge';
import {ComfortAdvisorError} from '../engine/errors';
import {isRetryableError} from './retry';

export enum ErrorSeverity {
    INFO = 'INFO',
    WARNING = 'WARNING',
    ERROR = 'ERROR',
    FATAL = 'FATAL',
}

export enum ErrorCategory {
    CONFIGURATION = 'CONFIGURATION',
    MEASUREMENT = 'MEASUREMENT',
    READINGS = 'READINGS',
    WEATHER = 'WEATHER',
    FILE_SYSTEM = 'FILE_SYSTEM',
    VALIDATION = 'VALIDATION',
    UNKNOWN = 'UNKNOWN',
}

export interface ErrorContext {
    category: ErrorCategory;
    severity: ErrorSeverity;
    operation?: string;
    deviceName?: string;
    retryable?: boolean;
}

export interface HandledError {
    message: string;
    error: Error;
    context: ErrorContext;
    /** Consecutive occurrences of this failure, 1 the first time */
    occurrences: number;
}

const CATEGORY_BY_CODE: Readonly<Record<string, ErrorCategory>> = {
    configuration: ErrorCategory.CONFIGURATION,
    invalid_measurement: ErrorCategory.MEASUREMENT,
    missing_input: ErrorCategory.MEASUREMENT,
    readings_file: ErrorCategory.READINGS,
    weather_provider: ErrorCategory.WEATHER,
};

const TRANSIENT_CATEGORIES = new Set([ErrorCategory.READINGS, ErrorCategory.WEATHER, ErrorCategory.FILE_SYSTEM]);

interface ActiveFailure {
    message: string;
    occurrences: number;
}

export class ErrorHandler {
    private readonly active = new Map<string, ActiveFailure>();

    constructor(
        private readonly logger: Logger,
        private readonly contextPrefix: string = '',
    ) {}

    handle(error: Error, context: Partial<ErrorContext> = {}): HandledError {
        const category = context.category ?? this.categorize(error);
        const handled: HandledError = {
            message: error.message,
            error,
            context: {
                ...context,
                category,
                severity: context.severity ?? this.determineSeverity(error, category),
                retryable: context.retryable ?? this.isRetryable(error),
            },
            occurrences: 1,
        };

        const key = failureKey(context.operation, context.deviceName);
        const previous = this.active.get(key);
        if (previous?.message === error.message) {
            handled.occurrences = previous.occurrences + 1;
            this.logger.debug(`${this.format(handled)} (${handled.occurrences} times in a row)`);
        } else {
            this.log(handled);
        }
        this.active.set(key, {message: error.message, occurrences: handled.occurrences});

        return handled;
    }

    /**
     * Mark an operation as working again. Returns whether it had been failing.
     */
    recover(operation: string, deviceName?: string): boolean {
        const key = failureKey(operation, deviceName);
        const failure = this.active.get(key);
        if (!failure) {
            return false;
        }

        this.active.delete(key);
        const device = deviceName ? ` [${deviceName}]` : '';
        this.logger.info(`${this.prefix()}${operation}${device}: recovered after ${failure.occurrences} failed attempt(s)`);
        return true;
    }

    isFailing(operation: string, deviceName?: string): boolean {
        return this.active.has(failureKey(operation, deviceName));
    }

    isRetryable(error: Error): boolean {
        if (isRetryableError(error)) {
            return true;
        }

        const message = error.message.toLowerCase();
        return message.includes('ebusy') || message.includes('eagain');
    }

    categorize(error: Error): ErrorCategory {
        if (error instanceof ComfortAdvisorError) {
            return CATEGORY_BY_CODE[error.code] ?? ErrorCategory.UNKNOWN;
        }

        const message = error.message.toLowerCase();
        if (['enoent', 'eacces', 'ebusy'].some(code => message.includes(code))) {
            return ErrorCategory.FILE_SYSTEM;
        }
        if (message.includes('validation') || message.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        if (message.includes('config')) {
            return ErrorCategory.CONFIGURATION;
        }
        return ErrorCategory.UNKNOWN;
    }

    determineSeverity(error: Error, category: ErrorCategory): ErrorSeverity {
        if (category === ErrorCategory.CONFIGURATION) {
            return ErrorSeverity.FATAL;
        }

        // Sensors report missing or odd values while they start up
        if (category === ErrorCategory.MEASUREMENT) {
            return ErrorSeverity.WARNING;
        }

        if (TRANSIENT_CATEGORIES.has(category) && this.isRetryable(error)) {
            return ErrorSeverity.WARNING;
        }

        return ErrorSeverity.ERROR;
    }

    private log(handled: HandledError): void {
        const line = this.format(handled);
        switch (handled.context.severity) {
            case ErrorSeverity.FATAL:
                this.logger.error(line);
                if (handled.error.stack) {
                    this.logger.debug(handled.error.stack);
                }
                break;
            case ErrorSeverity.ERROR:
                this.logger.error(line);
                break;
            case ErrorSeverity.WARNING:
                this.logger.warn(line);
                break;
            case ErrorSeverity.INFO:
                this.logger.info(line);
                break;
        }
    }

    private format({message, context}: HandledError): string {
        const operation = context.operation ? ` (${context.operation})` : '';
        const device = context.deviceName ? ` [${context.deviceName}]` : '';
        return `${this.prefix()}${context.category}${operation}${device}: ${message}`;
    }

    private prefix(): string {
        return this.contextPrefix ? `[${this.contextPrefix}] ` : '';
    }
}

function failureKey(operation = '', deviceName = ''): string {
    return `${operation}\u0000${deviceName}`;
}

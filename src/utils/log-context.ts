/**
 * Contextual Logging
 *
 * Wraps the Homebridge logger and prefixes every line with its category, device,
 * provider, operation and sensor. `transition()` logs a keyed value only when it
 * changes, so a recommendation or a sensor fault is reported once per change
 * rather than on every evaluation.
 */

import type {Logger} from 'homebridge';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export enum LogCategory {
    PLATFORM = 'Platform',
    CONFIG = 'Config',
    READINGS = 'Readings',
    WEATHER = 'Weather',
    ACCESSORY = 'Accessory',
    SENSOR = 'Sensor',
}

export interface LogContext {
    category?: LogCategory;
    deviceName?: string;
    provider?: string;
    operation?: string;
    sensor?: string;
    metadata?: Record<string, unknown>;
}

const PREFIXES: ReadonlyArray<[keyof LogContext, (value: string) => string]> = [
    ['category', value => `[${value}]`],
    ['deviceName', value => `[${value}]`],
    ['provider', value => `[Provider:${value}]`],
    ['operation', value => `(${value})`],
    ['sensor', value => `[Sensor:${value}]`],
];

export function formatLogMessage(message: string, context: LogContext = {}): string {
    const prefix = PREFIXES
        .map(([field, render]) => {
            const value = context[field];
            return typeof value === 'string' && value.length > 0 ? render(value) : undefined;
        })
        .filter((part): part is string => part !== undefined)
        .join(' ');

    const metadata = context.metadata && Object.keys(context.metadata).length > 0
        ? ` ${JSON.stringify(context.metadata)}`
        : '';

    return `${prefix ? `${prefix} ` : ''}${message}${metadata}`;
}

export class StructuredLogger {
    constructor(
        private readonly logger: Logger,
        private readonly context: LogContext = {},
        private readonly lastValues = new Map<string, string>(),
    ) {}

    debug(message: string, context?: LogContext): void {
        this.write('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.write('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.write('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.write('error', message, context);
    }

    /**
     * Logger with extra context. Children share the transition state of their parent.
     */
    child(context: LogContext): StructuredLogger {
        return new StructuredLogger(this.logger, this.merge(context), this.lastValues);
    }

    /**
     * Log `message` if `value` differs from the last value seen for `key` in this
     * logger's device and sensor scope. Returns whether a line was written.
     */
    transition(key: string, value: string, message: string, level: LogLevel = 'info'): boolean {
        const scopedKey = [this.context.deviceName, this.context.sensor, key]
            .filter((part): part is string => part !== undefined)
            .join('/');
        if (this.lastValues.get(scopedKey) === value) {
            return false;
        }

        this.lastValues.set(scopedKey, value);
        this.write(level, message);
        return true;
    }

    private write(level: LogLevel, message: string, context?: LogContext): void {
        this.logger[level](formatLogMessage(message, this.merge(context)));
    }

    private merge(context?: LogContext): LogContext {
        return {
            ...this.context,
            ...context,
            metadata: {...this.context.metadata, ...context?.metadata},
        };
    }
}

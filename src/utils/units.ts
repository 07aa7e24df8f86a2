/**
 * Unit Conversion
 *
 * Readings and thresholds are normalized to °C at the boundary.
 */

export type TemperatureUnit = 'C' | 'F';

export function celsiusToFahrenheit(celsius: number): number {
    return celsius * 9 / 5 + 32;
}

export function fahrenheitToCelsius(fahrenheit: number): number {
    return (fahrenheit - 32) * 5 / 9;
}

/**
 * Convert a temperature in the given unit to °C
 */
export function toCelsius(value: number, unit: TemperatureUnit): number {
    return unit === 'F' ? fahrenheitToCelsius(value) : value;
}

/**
 * Map a unit-of-measurement string to a temperature unit.
 * Returns null for strings that are not temperature units.
 */
export function parseTemperatureUnit(unit: string | undefined): TemperatureUnit | null {
    switch (unit?.trim()) {
        case '°C':
        case 'C':
        case 'celsius':
            return 'C';
        case '°F':
        case 'F':
        case 'fahrenheit':
            return 'F';
        default:
            return null;
    }
}

export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}

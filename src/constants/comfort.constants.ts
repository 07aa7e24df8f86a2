/**
 * Comfort Constants
 *
 * Formula floors, validation ranges and configuration defaults.
 * Engine values are degrees Celsius and percent relative humidity.
 */

// =============================================================================
// Measurement Ranges
// =============================================================================

/** Lowest temperature accepted by the engine (°C) */
export const MIN_TEMPERATURE_C = -100;

/** Highest temperature accepted by the engine (°C) */
export const MAX_TEMPERATURE_C = 100;

export const MIN_HUMIDITY = 0;
export const MAX_HUMIDITY = 100;

/** Relative humidity used in place of zero before taking a logarithm (%) */
export const MIN_LOG_HUMIDITY = 1e-6;

// =============================================================================
// Formula Floors
// =============================================================================

/** Heat index regression is applied from this temperature (°C, 80 °F) */
export const HEAT_INDEX_MIN_TEMPERATURE_C = 26.7;

/** Heat index regression is applied from this relative humidity (%) */
export const HEAT_INDEX_MIN_HUMIDITY = 40;

/** Simmer index regression is applied from this temperature (°C, 70 °F) */
export const SIMMER_INDEX_MIN_TEMPERATURE_C = 21.1;

/** Absolute humidity at or below which frost is unlikely (g/m³) */
export const FROST_ABSOLUTE_HUMIDITY_THRESHOLD = 2.8;

// =============================================================================
// Configuration Defaults (°F)
// =============================================================================

export const DEFAULT_SIMMER_INDEX_MIN_F = 70;
export const DEFAULT_SIMMER_INDEX_MAX_F = 85;
export const DEFAULT_DEW_POINT_MAX_F = 60;
export const DEFAULT_HUMIDITY_MAX = 95;
export const DEFAULT_POLLEN_MAX = 2;

/** Default forecast look-ahead for suppressing a recommendation (hours) */
export const DEFAULT_FORECAST_HORIZON_HOURS = 3;
export const MIN_FORECAST_HORIZON_HOURS = 1;
export const MAX_FORECAST_HORIZON_HOURS = 24;

/** Window over which the forecast simmer index range is reported (hours) */
export const FORECAST_SUMMARY_WINDOW_HOURS = 24;

/** Decimal places kept when publishing metrics */
export const METRIC_PRECISION = 2;

/**
 * Time Constants
 *
 * All time-related constants for consistency across the application.
 */

export const ONE_SECOND_MS = 1000;
export const ONE_MINUTE_MS = ONE_SECOND_MS * 60;
export const ONE_HOUR_MS = ONE_MINUTE_MS * 60;

/** Default poll interval in seconds when polling is enabled */
export const DEFAULT_POLL_INTERVAL_SECONDS = 30;

/** Allowed poll interval range in seconds */
export const MIN_POLL_INTERVAL_SECONDS = 1;
export const MAX_POLL_INTERVAL_SECONDS = 300;

/** Refresh interval for realtime weather data */
export const REALTIME_REFRESH_INTERVAL_MS = ONE_MINUTE_MS * 15;

/** Refresh interval for hourly forecasts */
export const FORECAST_REFRESH_INTERVAL_MS = ONE_HOUR_MS;

/** Delay used to coalesce bursts of readings file change events */
export const READINGS_WATCH_DEBOUNCE_MS = 250;

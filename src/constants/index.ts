/**
 * Constants Index
 *
 * Re-exports all constants from domain-specific files.
 */

// Time constants
export * from './time.constants';

// Comfort constants
export * from './comfort.constants';

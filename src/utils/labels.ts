/**
 * Display Labels
 *
 * Human readable names for sensors, categories and recommendation reasons.
 */

import { z } from 'zod';
import type { FrostRisk, RecommendationReason, SimmerZone, ThermalPerception } from '../engine/types';
import type { SensorType } from '../types/sensor-types';
import { validateData } from '../config/config-schemas';
import en from '../i18n/en.json';

export type CategoryKind = 'thermal_perception' | 'simmer_zone' | 'frost_risk';
export type CategoryValue = ThermalPerception | SimmerZone | FrostRisk;

const CategoryTableSchema = z.record(z.object({ label: z.string(), icon: z.string() }));

const TranslationsSchema = z.object({
    sensors: z.record(z.string()),
    thermal_perception: CategoryTableSchema,
    simmer_zone: CategoryTableSchema,
    frost_risk: CategoryTableSchema,
    reasons: z.record(z.string()),
    states: z.object({ unavailable: z.string(), no_change: z.string() }),
});

const translations = validateData(TranslationsSchema, en, 'translations');

export function getSensorName(type: SensorType): string {
    return translations.sensors[type] ?? type;
}

export function getReasonLabel(reason: RecommendationReason): string {
    return translations.reasons[reason] ?? reason;
}

export function getStateLabel(state: 'unavailable' | 'no_change'): string {
    return translations.states[state];
}

/**
 * Label for a category value, optionally prefixed with its icon glyph
 */
export function getCategoryLabel(kind: CategoryKind, value: CategoryValue, withIcon = false): string {
    const entry = translations[kind][value];
    if (!entry) {
        return value;
    }
    return withIcon ? `${entry.icon} ${entry.label}` : entry.label;
}

import { isRecord } from '../utils/metadata.js';

/**
 * Descriptive key → value mapping attached to a digitized table.
 */
export type Metadata = Record<string, unknown>;

/**
 * Deep-merge two metadata trees. Nested mappings merge key by key; on any
 * other collision the value from `override` wins. Inputs are not modified.
 */
export function mergeMetadata(base: Metadata, override: Metadata): Metadata {
    const merged: Metadata = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const existing = merged[key];
        merged[key] = isRecord(existing) && isRecord(value) ? mergeMetadata(existing, value) : value;
    }
    return merged;
}

/**
 * Recursively freeze a metadata tree (objects and arrays).
 */
export function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

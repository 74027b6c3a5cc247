import { writeFileSync } from 'node:fs';
import { getLogger } from '../utils/logger.js';

/** Calendar dates as `YYYY-MM-DD`, instants in full ISO 8601. */
function formatDate(date: Date): string | null {
    if (Number.isNaN(date.getTime())) return null;
    const iso = date.toISOString();
    return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso;
}

// JSON.stringify hands the replacer the result of Date#toJSON, so the
// original value is read from the holder.
function replaceDates(this: unknown, key: string, value: unknown): unknown {
    const original: unknown = typeof this === 'object' && this !== null ? Reflect.get(this, key) : undefined;
    return original instanceof Date ? formatDate(original) : value;
}

/**
 * Serialize metadata or a package descriptor as indented JSON. YAML dates
 * without a time of day are written back as plain dates.
 */
export function toJson(value: unknown): string {
    return JSON.stringify(value, replaceDates, 2) + '\n';
}

export function writeJson(outputPath: string, value: unknown): void {
    writeFileSync(outputPath, toJson(value), 'utf-8');
    getLogger('export').info({ outputPath }, 'JSON written');
}

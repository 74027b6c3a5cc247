import type { TableView } from '../table/data-table.js';
import { isRecord } from '../utils/metadata.js';

export interface PackageField {
    name: string;
    type: 'number';
    unit?: string;
}

export interface DataResource {
    name: string;
    path: string;
    profile: 'tabular-data-resource';
    format: 'csv';
    mediatype: 'text/csv';
    encoding: 'utf-8';
    schema: { fields: PackageField[] };
    metadata: Readonly<Record<string, unknown>>;
}

export interface DataPackage {
    name: string;
    resources: [DataResource];
}

/**
 * Lowercase name restricted to `[a-z0-9._-]`, as data-package names require.
 */
export function packageName(name: string): string {
    const cleaned = name
        .toLowerCase()
        .replace(/[^a-z0-9._-]+/g, '-')
        .replace(/^-+|-+$/g, '');
    return cleaned === '' ? 'data' : cleaned;
}

/** Units per column from `figure description.fields`, when present. */
function fieldUnits(metadata: Readonly<Record<string, unknown>>): Map<string, string> {
    const units = new Map<string, string>();
    const description = metadata['figure description'];
    const fields = isRecord(description) ? description['fields'] : undefined;
    if (!Array.isArray(fields)) return units;

    for (const field of fields) {
        if (isRecord(field) && typeof field['name'] === 'string' && typeof field['unit'] === 'string') {
            units.set(field['name'], field['unit']);
        }
    }
    return units;
}

/**
 * Describe a CSV file as a data package with a single tabular resource.
 * Every column becomes a number field; units come from the metadata.
 */
export function buildDataPackage(
    name: string,
    csvName: string,
    table: TableView,
    metadata: Readonly<Record<string, unknown>> = {}
): DataPackage {
    const resourceName = packageName(name);
    const units = fieldUnits(metadata);

    const fields: PackageField[] = table.columns.map((column) => {
        const unit = units.get(column);
        return unit === undefined ? { name: column, type: 'number' } : { name: column, type: 'number', unit };
    });

    return {
        name: resourceName,
        resources: [
            {
                name: resourceName,
                path: csvName,
                profile: 'tabular-data-resource',
                format: 'csv',
                mediatype: 'text/csv',
                encoding: 'utf-8',
                schema: { fields },
                metadata,
            },
        ],
    };
}

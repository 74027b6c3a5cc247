import { cosmiconfig } from 'cosmiconfig';
import { getLogger } from './logger.js';

/**
 * Load a caller-supplied metadata file (YAML or JSON, chosen by extension)
 * through cosmiconfig's loaders. The file must hold a mapping.
 */
export async function loadMetadata(filePath: string): Promise<Record<string, unknown>> {
    const explorer = cosmiconfig('vecplot-metadata', { cache: false });
    const result = await explorer.load(filePath);

    if (!result || result.isEmpty) {
        getLogger('config').debug({ path: filePath }, 'Metadata file is empty');
        return {};
    }

    const content: unknown = result.config;
    if (!isRecord(content)) {
        throw new Error(`Metadata file ${filePath} must contain a mapping at the top level`);
    }

    getLogger('config').debug({ path: result.filepath, keys: Object.keys(content) }, 'Loaded metadata');
    return content;
}

/** Plain object check; arrays, dates and class instances are not records. */
export function isRecord(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const prototype: unknown = Object.getPrototypeOf(value);
    return prototype === Object.prototype || prototype === null;
}

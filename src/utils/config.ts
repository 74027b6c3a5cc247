import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type VecplotConfig } from '../types/index.js';
import { getLogger } from './logger.js';
import { isRecord } from './metadata.js';

/**
 * Load configuration from vecplot.config.json using cosmiconfig.
 * Returns null when there is none, leaving the defaults in place.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<VecplotConfig> | null> {
    const explorer = cosmiconfig('vecplot', {
        searchPlaces: ['vecplot.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger('config').debug({ path: result.filepath }, 'Loaded config file');
            return pickConfig(result.config);
        }
    } catch (error) {
        getLogger('config').warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Keep only the recognized, correctly typed keys of a parsed config file.
 */
export function pickConfig(raw: unknown): Partial<VecplotConfig> {
    const config: Partial<VecplotConfig> = {};
    if (!isRecord(raw)) return config;

    for (const key of ['chordTolerance', 'labelTolerance', 'residualTolerance', 'samplingInterval'] as const) {
        const value = raw[key];
        if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
            config[key] = value;
        }
    }
    const { curve, outdir, jsonLogs, logLevel: level } = raw;
    if (typeof curve === 'string') config.curve = curve;
    if (typeof outdir === 'string') config.outdir = outdir;
    if (typeof jsonLogs === 'boolean') config.jsonLogs = jsonLogs;
    if (level === 'error' || level === 'warn' || level === 'info' || level === 'debug') {
        config.logLevel = level;
    }
    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<VecplotConfig>,
    searchFrom?: string
): Promise<VecplotConfig> {
    const fileConfig = await loadConfigFile(searchFrom);

    // Flags the user did not pass arrive as undefined and must not mask the file
    return {
        chordTolerance: cliFlags.chordTolerance ?? fileConfig?.chordTolerance ?? DEFAULT_CONFIG.chordTolerance,
        labelTolerance: cliFlags.labelTolerance ?? fileConfig?.labelTolerance ?? DEFAULT_CONFIG.labelTolerance,
        residualTolerance:
            cliFlags.residualTolerance ?? fileConfig?.residualTolerance ?? DEFAULT_CONFIG.residualTolerance,
        curve: cliFlags.curve ?? fileConfig?.curve,
        samplingInterval: cliFlags.samplingInterval ?? fileConfig?.samplingInterval,
        outdir: cliFlags.outdir ?? fileConfig?.outdir,
        logLevel: cliFlags.logLevel ?? fileConfig?.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? fileConfig?.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
    };
}

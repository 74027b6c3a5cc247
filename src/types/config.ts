/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Numeric tolerances of the digitization pipeline.
 */
export interface DigitizeTolerances {
    /** Maximum chord error (px) when flattening Bézier and arc segments */
    chordTolerance: number;

    /** Maximum distance (px) between a label and the anchor it is associated with */
    labelTolerance: number;

    /** Maximum least-squares residual, relative to the calibrated value span */
    residualTolerance: number;
}

/**
 * Full configuration merged from CLI flags and config file.
 */
export interface VecplotConfig extends DigitizeTolerances {
    // Selection
    curve?: string;
    samplingInterval?: number;

    // Output
    outdir?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: VecplotConfig = {
    chordTolerance: 0.1,
    labelTolerance: 40,
    residualTolerance: 0.01,
    logLevel: 'info',
    jsonLogs: false,
};

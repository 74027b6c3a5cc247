import { readFileSync, mkdirSync } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { getLogger } from '../utils/logger.js';
import { loadMetadata } from '../utils/metadata.js';
import { digitize, type DigitizeResult } from '../pipeline/digitize.js';
import { resample } from '../sampling/resample.js';
import { conversionFactor } from '../units/units.js';
import { toCVTable } from '../electrochemistry/cv.js';
import { writeCsv } from '../exporters/csv.js';
import { writeJson } from '../exporters/json.js';
import { buildDataPackage } from '../exporters/package.js';
import { writePlot } from '../viewer/svg-plot.js';
import type { VecplotConfig } from '../types/index.js';

export interface CvCommandOptions {
    /** YAML or JSON file merged over the figure description */
    metadata?: string;
    /** Write a data-package descriptor instead of the bare metadata */
    package?: boolean;
}

export interface CommandOutput {
    csvPath?: string;
    jsonPath?: string;
    plotPath?: string;
}

export function runDigitize(svgPath: string, config: VecplotConfig, samplingInterval?: number): DigitizeResult {
    const result = digitize(readFileSync(svgPath), {
        chordTolerance: config.chordTolerance,
        labelTolerance: config.labelTolerance,
        residualTolerance: config.residualTolerance,
        curve: config.curve,
        samplingInterval,
    });
    getLogger('cli').info(
        { svg: svgPath, curve: result.curve.name, rows: result.table.length, axes: result.axes },
        'Digitized'
    );
    return result;
}

/** `<outdir>/<name of the svg without extension>` */
export function outputStem(svgPath: string, outdir?: string): string {
    const directory = outdir ?? dirname(svgPath);
    mkdirSync(directory, { recursive: true });
    return join(directory, basename(svgPath, extname(svgPath)));
}

/**
 * Digitize the figure's curve into `<stem>.csv`, resampled on the x axis
 * when `samplingInterval` is set.
 */
export function digitizeCommand(svgPath: string, config: VecplotConfig): CommandOutput {
    const result = runDigitize(svgPath, config, config.samplingInterval);
    const csvPath = `${outputStem(svgPath, config.outdir)}.csv`;
    writeCsv(csvPath, result.table);
    return { csvPath };
}

/**
 * Digitize a cyclic voltammogram into `<stem>.csv` (t, U and I or j in SI
 * units) and `<stem>.json`.
 *
 * `samplingInterval` is in volts and is converted to the figure's potential
 * unit before resampling.
 */
export async function cvCommand(
    svgPath: string,
    config: VecplotConfig,
    options: CvCommandOptions = {}
): Promise<CommandOutput> {
    const metadata = options.metadata === undefined ? {} : await loadMetadata(options.metadata);

    const result = runDigitize(svgPath, config);
    const table =
        config.samplingInterval === undefined
            ? result.table
            : resample(result.table, config.samplingInterval * conversionFactor('V', result.axes.x.unit));

    const cv = toCVTable({ table, axes: result.axes, facts: result.classification.facts }, metadata);

    const stem = outputStem(svgPath, config.outdir);
    const csvPath = `${stem}.csv`;
    const jsonPath = `${stem}.json`;
    writeCsv(csvPath, cv.table);
    writeJson(
        jsonPath,
        options.package ? buildDataPackage(basename(stem), basename(csvPath), cv.table, cv.metadata) : cv.metadata
    );
    return { csvPath, jsonPath };
}

/**
 * Render the digitized curve as `<stem>.plot.svg`, or at `out`.
 */
export function plotCommand(svgPath: string, config: VecplotConfig, out?: string): CommandOutput {
    const result = runDigitize(svgPath, config, config.samplingInterval);
    const { x, y } = result.axes;

    const plotPath = out ?? `${outputStem(svgPath, config.outdir)}.plot.svg`;
    writePlot(plotPath, result.table, {
        x: 'x',
        y: 'y',
        xLabel: x.unit === '' ? 'x' : `x / ${x.unit}`,
        yLabel: y.unit === '' ? 'y' : `y / ${y.unit}`,
        title: result.curve.name || basename(svgPath),
    });
    return { plotPath };
}

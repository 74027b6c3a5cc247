import { dirname } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { isDigitizerError } from '../utils/errors.js';
import { cvCommand, digitizeCommand, plotCommand } from './commands.js';
import type { LogLevel, VecplotConfig } from '../types/index.js';

const VERSION = '0.1.0';

interface SharedFlags {
    logLevel?: LogLevel;
    jsonLogs?: boolean;
    chordTolerance?: number;
    labelTolerance?: number;
    curve?: string;
}

interface OutputFlags extends SharedFlags {
    outdir?: string;
    samplingInterval?: number;
}

interface CvFlags extends OutputFlags {
    metadata?: string;
    package?: boolean;
}

interface PlotFlags extends SharedFlags {
    out?: string;
    samplingInterval?: number;
}

function parsePositive(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive number.');
    }
    return parsed;
}

function parseLogLevel(value: string): LogLevel {
    if (value === 'error' || value === 'warn' || value === 'info' || value === 'debug') return value;
    throw new InvalidArgumentError('Expected one of: error, warn, info, debug.');
}

function withSharedOptions(command: Command): Command {
    return command
        .option('--curve <name>', 'Curve to digitize when the figure has several')
        .option('--chord-tolerance <px>', 'Maximum chord error when flattening curves', parsePositive)
        .option('--label-tolerance <px>', 'Maximum label-to-marker distance', parsePositive)
        .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLogLevel)
        .option('--json-logs', 'Output JSON logs');
}

/**
 * Resolve configuration for a command and configure the logger.
 */
async function setup(flags: OutputFlags, svgPath: string): Promise<VecplotConfig> {
    const cliConfig: Partial<VecplotConfig> = {
        chordTolerance: flags.chordTolerance,
        labelTolerance: flags.labelTolerance,
        curve: flags.curve,
        samplingInterval: flags.samplingInterval,
        outdir: flags.outdir,
        logLevel: flags.logLevel,
        jsonLogs: flags.jsonLogs,
    };

    const config = await resolveConfig(cliConfig, dirname(svgPath));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

/**
 * Run a command body, reporting failures as structured log records.
 */
async function guarded(action: () => Promise<void>): Promise<void> {
    try {
        await action();
    } catch (error) {
        const logger = getLogger('cli');
        if (isDigitizerError(error)) {
            logger.error({ kind: error.kind, message: error.message, details: error.details }, 'Digitization failed');
        } else {
            logger.error({ err: error }, 'Command failed');
        }
        process.exitCode = 1;
    }
}

const program = new Command();

program
    .name('vecplot')
    .description('Recover numeric data from annotated vector plots (SVG).')
    .version(VERSION);

// ─── DIGITIZE command ─────────────────────────────────────

withSharedOptions(
    program
        .command('digitize')
        .description('Digitize a curve into CSV')
        .argument('<svg>', 'Annotated SVG file')
        .option('--sampling-interval <step>', 'Resample onto a regular grid (x axis units)', parsePositive)
        .option('-o, --outdir <dir>', 'Output directory (default: beside the SVG)')
).action((svgPath: string, flags: OutputFlags) =>
    guarded(async () => {
        const config = await setup(flags, svgPath);
        digitizeCommand(svgPath, config);
    })
);

// ─── CV command ───────────────────────────────────────────

withSharedOptions(
    program
        .command('cv')
        .description('Digitize a cyclic voltammogram into SI units with metadata')
        .argument('<svg>', 'Annotated SVG file')
        .option('-m, --metadata <file>', 'YAML or JSON metadata merged over the figure description')
        .option('--sampling-interval <volts>', 'Resample onto a regular potential grid (V)', parsePositive)
        .option('--package', 'Write a data-package descriptor instead of plain metadata')
        .option('-o, --outdir <dir>', 'Output directory (default: beside the SVG)')
).action((svgPath: string, flags: CvFlags) =>
    guarded(async () => {
        const config = await setup(flags, svgPath);
        await cvCommand(svgPath, config, { metadata: flags.metadata, package: flags.package });
    })
);

// ─── PLOT command ─────────────────────────────────────────

withSharedOptions(
    program
        .command('plot')
        .description('Render the digitized curve as an SVG line plot')
        .argument('<svg>', 'Annotated SVG file')
        .option('--sampling-interval <step>', 'Resample onto a regular grid (x axis units)', parsePositive)
        .option('-o, --out <path>', 'Output SVG path (default: <name>.plot.svg beside the input)')
).action((svgPath: string, flags: PlotFlags) =>
    guarded(async () => {
        const config = await setup(flags, svgPath);
        plotCommand(svgPath, config, flags.out);
    })
);

await program.parseAsync();

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { cvCommand, digitizeCommand, plotCommand } from '../cli/commands.js';
import { DEFAULT_CONFIG, type VecplotConfig } from '../types/index.js';
import { standardFigure } from './helpers/svg.js';

function csvColumn(csv: string, index: number): number[] {
    return csv
        .trimEnd()
        .split('\n')
        .slice(1)
        .map((line) => Number(line.split(',')[index]));
}

describe('CLI commands', () => {
    let dir: string;
    let svgPath: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'vecplot-cli-'));
        svgPath = join(dir, 'figure.svg');
        writeFileSync(svgPath, standardFigure('<text x="150" y="10">scan rate: 50 mV/s</text>'), 'utf-8');
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    function config(overrides: Partial<VecplotConfig> = {}): VecplotConfig {
        return { ...DEFAULT_CONFIG, logLevel: 'error', jsonLogs: true, ...overrides };
    }

    describe('digitize', () => {
        it('should write the CSV beside the SVG', () => {
            const { csvPath } = digitizeCommand(svgPath, config({ samplingInterval: 25 }));
            expect(csvPath).toBe(join(dir, 'figure.csv'));

            const csv = readFileSync(join(dir, 'figure.csv'), 'utf-8');
            expect(csv.split('\n')[0]).toBe('x,y');
            const xs = csvColumn(csv, 0);
            expect(xs).toHaveLength(5);
            [0, 25, 50, 75, 100].forEach((value, i) => expect(xs[i]).toBeCloseTo(value, 9));
        });
    });

    describe('cv', () => {
        it('should convert the sampling interval from volts to the axis unit', async () => {
            const outdir = join(dir, 'out');
            const { csvPath } = await cvCommand(svgPath, config({ samplingInterval: 0.025, outdir }));
            expect(csvPath).toBe(join(outdir, 'figure.csv'));

            const csv = readFileSync(join(outdir, 'figure.csv'), 'utf-8');
            expect(csv.split('\n')[0]).toBe('t,U,I');
            const potentials = csvColumn(csv, 1);
            expect(potentials).toHaveLength(5);
            [0, 0.025, 0.05, 0.075, 0.1].forEach((value, i) => expect(potentials[i]).toBeCloseTo(value, 12));
        });

        it('should write the merged metadata with plain calendar dates', async () => {
            const metadataPath = join(dir, 'meta.yaml');
            writeFileSync(metadataPath, 'curation:\n  process:\n    - role: curator\n      date: 2021-07-09\n', 'utf-8');

            const { jsonPath } = await cvCommand(svgPath, config(), { metadata: metadataPath });
            expect(jsonPath).toBe(join(dir, 'figure.json'));

            const written: unknown = JSON.parse(readFileSync(join(dir, 'figure.json'), 'utf-8'));
            expect(written).toMatchObject({
                curation: { process: [{ role: 'curator', date: '2021-07-09' }] },
                'figure description': { 'measurement type': 'CV', 'scan rate': { value: 50, unit: 'mV/s' } },
            });
        });

        it('should write a data-package descriptor with --package', async () => {
            await cvCommand(svgPath, config(), { package: true });

            const written: unknown = JSON.parse(readFileSync(join(dir, 'figure.json'), 'utf-8'));
            expect(written).toMatchObject({
                name: 'figure',
                resources: [
                    {
                        name: 'figure',
                        path: 'figure.csv',
                        schema: {
                            fields: [
                                { name: 't', type: 'number', unit: 's' },
                                { name: 'U', type: 'number', unit: 'V' },
                                { name: 'I', type: 'number', unit: 'A' },
                            ],
                        },
                        metadata: { 'figure description': { 'measurement type': 'CV' } },
                    },
                ],
            });
        });
    });

    describe('plot', () => {
        it('should resample before plotting', () => {
            const out = join(dir, 'plot.svg');
            const { plotPath } = plotCommand(svgPath, config({ samplingInterval: 25 }), out);
            expect(plotPath).toBe(out);

            const svg = readFileSync(out, 'utf-8');
            expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg"')).toBe(true);
            const polyline = /<polyline[^>]* points="([^"]*)"/.exec(svg);
            expect(polyline?.[1]?.split(' ')).toHaveLength(5);
        });
    });
});

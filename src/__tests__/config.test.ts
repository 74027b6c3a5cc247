import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { pickConfig, resolveConfig } from '../utils/config.js';
import { isRecord, loadMetadata } from '../utils/metadata.js';
import { getLogger, initLogger } from '../utils/logger.js';
import { DEFAULT_CONFIG, AXES } from '../types/index.js';
import { DigitizerError, isDigitizerError } from '../utils/errors.js';

describe('Logger', () => {
    afterEach(() => {
        initLogger({ level: 'error', jsonLogs: true });
    });

    it('should bind the stage on child loggers and reuse them', () => {
        const parse = getLogger('parse');
        expect(parse.bindings()).toMatchObject({ name: 'vecplot', stage: 'parse' });
        expect(getLogger('parse')).toBe(parse);
        expect(getLogger('classify')).not.toBe(parse);
    });

    it('should hand out new loggers after reconfiguration', () => {
        const before = getLogger('cv');
        const root = initLogger({ level: 'warn', jsonLogs: true });
        expect(root.level).toBe('warn');
        expect(getLogger()).toBe(root);
        expect(getLogger('cv')).not.toBe(before);
        expect(getLogger('cv').level).toBe('warn');
    });
});

describe('isRecord', () => {
    it('should accept plain objects only', () => {
        expect(isRecord({ a: 1 })).toBe(true);
        expect(isRecord(Object.create(null))).toBe(true);
        expect(isRecord([])).toBe(false);
        expect(isRecord(new Date('2021-07-09'))).toBe(false);
        expect(isRecord(null)).toBe(false);
    });
});

describe('Types', () => {
    it('should default to sub-pixel chord tolerance', () => {
        expect(DEFAULT_CONFIG.chordTolerance).toBe(0.1);
    });

    it('should default to a 40px label tolerance', () => {
        expect(DEFAULT_CONFIG.labelTolerance).toBe(40);
    });

    it('should default to a 1% residual tolerance', () => {
        expect(DEFAULT_CONFIG.residualTolerance).toBe(0.01);
    });

    it('should log at info level in human-readable form by default', () => {
        expect(DEFAULT_CONFIG.logLevel).toBe('info');
        expect(DEFAULT_CONFIG.jsonLogs).toBe(false);
    });

    it('should list both axes', () => {
        expect(AXES).toEqual(['x', 'y']);
    });

    it('should tell digitizer errors apart by kind', () => {
        const error = new DigitizerError('MissingCurve', 'none', { available: [] });
        expect(error.name).toBe('DigitizerError');
        expect(error).toBeInstanceOf(Error);
        expect(isDigitizerError(error)).toBe(true);
        expect(isDigitizerError(error, 'MissingCurve')).toBe(true);
        expect(isDigitizerError(error, 'AmbiguousCurve')).toBe(false);
        expect(isDigitizerError(new Error('plain'))).toBe(false);
    });
});

describe('Configuration', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'vecplot-config-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should keep only recognised, well-typed keys', () => {
        expect(
            pickConfig({
                chordTolerance: 0.5,
                labelTolerance: -1,
                residualTolerance: '0.1',
                curve: 'a',
                logLevel: 'verbose',
                jsonLogs: true,
                unknown: 1,
            })
        ).toEqual({ chordTolerance: 0.5, curve: 'a', jsonLogs: true });
        expect(pickConfig('chordTolerance')).toEqual({});
    });

    it('should use defaults without a config file', async () => {
        const config = await resolveConfig({}, dir);
        expect(config).toEqual(DEFAULT_CONFIG);
    });

    it('should let CLI flags override the config file', async () => {
        writeFileSync(
            join(dir, 'vecplot.config.json'),
            JSON.stringify({ chordTolerance: 0.5, labelTolerance: 20, logLevel: 'debug', outdir: 'out' })
        );

        const config = await resolveConfig({ labelTolerance: 10, logLevel: undefined }, dir);
        expect(config).toEqual({
            chordTolerance: 0.5,
            labelTolerance: 10,
            residualTolerance: 0.01,
            outdir: 'out',
            logLevel: 'debug',
            jsonLogs: false,
        });
    });
});

describe('loadMetadata', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'vecplot-metadata-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should read YAML metadata', async () => {
        const metadata = await loadMetadata(fileURLToPath(new URL('./fixtures/metadata.yaml', import.meta.url)));
        expect(metadata).toEqual({
            source: { citation: 'placeholder2024' },
            'figure description': {
                'scan rate': { value: 50, unit: 'mV / s' },
                comment: 'overridden by the metadata file',
            },
        });
    });

    it('should read JSON metadata', async () => {
        const path = join(dir, 'meta.json');
        writeFileSync(path, '{"figure description": {"scan rate": "20 mV/s"}}');
        expect(await loadMetadata(path)).toEqual({ 'figure description': { 'scan rate': '20 mV/s' } });
    });

    it('should treat an empty file as no metadata', async () => {
        const path = join(dir, 'empty.yaml');
        writeFileSync(path, '');
        expect(await loadMetadata(path)).toEqual({});
    });

    it('should reject content that is not a mapping', async () => {
        const path = join(dir, 'list.json');
        writeFileSync(path, '[1, 2]');
        await expect(loadMetadata(path)).rejects.toThrow(/mapping/);
    });
});

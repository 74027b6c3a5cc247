import type { Axis, AxisDescriptor, FigureFacts, Quantity } from '../types/index.js';
import type { DigitizeResult } from '../pipeline/digitize.js';
import type { XYColumn } from '../sampling/curve.js';
import { DataTable } from '../table/data-table.js';
import { parseMeasurement } from '../plot/labels.js';
import { parseUnit, toSI, tryParseUnit, type ParsedUnit } from '../units/units.js';
import { DigitizerError } from '../utils/errors.js';
import { isRecord } from '../utils/metadata.js';
import { getLogger } from '../utils/logger.js';
import { deepFreeze, mergeMetadata, type Metadata } from './metadata.js';

export type CurrentColumn = 'I' | 'j';

/**
 * A cyclic voltammogram in SI units: time (s), potential (V) and either
 * current (A) or current density (A/m²).
 */
export type CVResult =
    | { current: 'I'; table: DataTable<'t' | 'U' | 'I'>; metadata: Readonly<Metadata> }
    | { current: 'j'; table: DataTable<'t' | 'U' | 'j'>; metadata: Readonly<Metadata> };

export interface CVInput {
    table: DataTable<XYColumn>;
    axes: Record<Axis, AxisDescriptor>;
    /** Facts read from the figure itself (scan rate, comment, …) */
    facts?: FigureFacts;
}

const FIGURE_DESCRIPTION = 'figure description';

/**
 * The x axis of a voltammogram must be a potential.
 */
export function potentialUnit(unit: string): ParsedUnit {
    const parsed = parseUnit(unit);
    if (parsed.kind !== 'potential') {
        throw new DigitizerError('UnsupportedUnit', `x axis unit "${unit}" is not a potential`, {
            unit,
            kind: parsed.kind,
        });
    }
    return parsed;
}

/**
 * The y axis must be a current or a current density; anything else
 * leaves its meaning open.
 */
export function currentUnit(unit: string): ParsedUnit {
    if (unit.trim() === '') {
        throw new DigitizerError('AmbiguousCurrentAxis', 'y axis has no unit; cannot tell current from current density');
    }
    const parsed = tryParseUnit(unit);
    if (!parsed) {
        throw new DigitizerError('UnsupportedUnit', `Unsupported unit "${unit}"`, { unit });
    }
    if (parsed.kind !== 'current' && parsed.kind !== 'currentDensity') {
        throw new DigitizerError(
            'AmbiguousCurrentAxis',
            `y axis unit "${unit}" is neither a current nor a current density`,
            { unit, kind: parsed.kind }
        );
    }
    return parsed;
}

/**
 * Scan rate from caller metadata (`figure description.scan rate` as
 * `{ value, unit }` or "50 mV/s") or else from the figure's own label.
 */
export function resolveScanRate(metadata: Metadata, facts: FigureFacts = {}): Quantity {
    const description = metadata[FIGURE_DESCRIPTION];
    const declared = isRecord(description) ? description['scan rate'] : undefined;

    let rate: Quantity | undefined = facts.scanRate;
    if (typeof declared === 'string') {
        const measurement = parseMeasurement(declared);
        if (!measurement) {
            throw new DigitizerError('MissingScanRate', `Cannot read scan rate "${declared}"`, { scanRate: declared });
        }
        rate = measurement;
    } else if (isRecord(declared)) {
        const { value, unit } = declared;
        if (typeof value !== 'number' || typeof unit !== 'string') {
            throw new DigitizerError('MissingScanRate', 'Scan rate metadata needs a numeric value and a unit', {
                scanRate: declared,
            });
        }
        rate = { value, unit };
    } else if (declared !== undefined) {
        throw new DigitizerError('MissingScanRate', 'Scan rate metadata needs a numeric value and a unit', {
            scanRate: declared,
        });
    }

    if (!rate) {
        throw new DigitizerError(
            'MissingScanRate',
            'No scan rate: add a "scan rate: <value> <unit>" label or declare it in the metadata'
        );
    }
    if (!(rate.value > 0) || !Number.isFinite(rate.value)) {
        throw new DigitizerError('MissingScanRate', `Scan rate must be positive, got ${rate.value}`, {
            scanRate: rate,
        });
    }
    return rate;
}

/**
 * Time axis from cumulative swept potential: t₀ = 0,
 * tᵢ = tᵢ₋₁ + |Uᵢ − Uᵢ₋₁| / rate. Non-decreasing for any potential trace.
 */
export function deriveTime(potentials: readonly number[], rate: number): number[] {
    const times: number[] = [];
    let elapsed = 0;
    potentials.forEach((potential, i) => {
        if (i > 0) elapsed += Math.abs(potential - (potentials[i - 1] ?? potential)) / rate;
        times.push(elapsed);
    });
    return times;
}

/**
 * Re-express a generic (x, y) table as a voltammogram in SI units.
 *
 * A copy of the caller metadata is merged over the figure-derived
 * description (caller values win) and the result is frozen.
 */
export function toCVTable(input: CVInput, metadata: Metadata = {}): CVResult {
    const { table, axes, facts = {} } = input;

    const potential = potentialUnit(axes.x.unit);
    const current = currentUnit(axes.y.unit);
    const rate = resolveScanRate(metadata, facts);
    const rateUnit = parseUnit(rate.unit);
    if (rateUnit.kind !== 'scanRate') {
        throw new DigitizerError('UnsupportedUnit', `Scan rate unit "${rate.unit}" is not a potential per time`, {
            unit: rate.unit,
            kind: rateUnit.kind,
        });
    }
    const rateSI = toSI(rate.value, rateUnit);

    const U = table.column('x').map((value) => toSI(value, potential));
    const y = table.column('y').map((value) => toSI(value, current));
    const t = deriveTime(U, rateSI);

    const currentColumn: CurrentColumn = current.kind === 'current' ? 'I' : 'j';
    const figureMetadata: Metadata = {
        [FIGURE_DESCRIPTION]: describeFigure({ axes, facts, rate, potential, current, currentColumn }),
    };
    const merged = deepFreeze(mergeMetadata(figureMetadata, structuredClone(metadata)));

    getLogger('cv').debug(
        { rows: table.length, current: currentColumn, scanRate: rateSI, duration: t[t.length - 1] ?? 0 },
        'Mapped curve to voltammogram'
    );

    if (currentColumn === 'I') {
        return {
            current: 'I',
            table: DataTable.from(['t', 'U', 'I'], U.map((u, i) => ({ t: t[i] ?? 0, U: u, I: y[i] ?? 0 }))),
            metadata: merged,
        };
    }
    return {
        current: 'j',
        table: DataTable.from(['t', 'U', 'j'], U.map((u, i) => ({ t: t[i] ?? 0, U: u, j: y[i] ?? 0 }))),
        metadata: merged,
    };
}

/**
 * Map a digitization result to a voltammogram, using the figure's own facts.
 */
export function toCV(result: DigitizeResult, metadata: Metadata = {}): CVResult {
    return toCVTable(
        { table: result.table, axes: result.axes, facts: result.classification.facts },
        metadata
    );
}

function describeFigure(context: {
    axes: Record<Axis, AxisDescriptor>;
    facts: FigureFacts;
    rate: Quantity;
    potential: ParsedUnit;
    current: ParsedUnit;
    currentColumn: CurrentColumn;
}): Metadata {
    const { axes, facts, rate, potential, current, currentColumn } = context;

    const description: Metadata = {
        version: 1,
        type: 'digitized',
        'measurement type': 'CV',
        'scan rate': { value: rate.value, unit: rate.unit },
        'potential scale': { unit: potential.text, ...(potential.reference ? { reference: potential.reference } : {}) },
        'current scale': { unit: current.text },
        'axis scales': { x: axes.x.scale, y: axes.y.scale },
        fields: [
            { name: 't', unit: 's' },
            {
                name: 'U',
                unit: 'V',
                ...(potential.reference ? { reference: potential.reference } : {}),
            },
            { name: currentColumn, unit: current.siSymbol },
        ],
    };

    if (facts.comment !== undefined) description['comment'] = facts.comment;
    if (facts.figure !== undefined) description['figure'] = facts.figure;
    if (facts.tags !== undefined) description['tags'] = [...facts.tags];
    if (facts.linked !== undefined) description['linked'] = facts.linked;

    return description;
}

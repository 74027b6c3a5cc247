import type { Axis, AxisScale } from '../types/index.js';

/**
 * A recognized plot label, decoded from a text element of the form `key: payload`.
 */
export type PlotLabel =
    | { type: 'point'; axis: Axis; index: number | null; value: number; unit: string }
    | { type: 'scaleBar'; axis: Axis; value: number; unit: string }
    | { type: 'scaleFactor'; axis: Axis; value: number }
    | { type: 'scale'; axis: Axis; scale: AxisScale }
    | { type: 'curve'; name: string }
    | { type: 'scanRate'; value: number; unit: string }
    | { type: 'fact'; key: 'comment' | 'figure' | 'linked'; text: string }
    | { type: 'tags'; tags: string[] };

/**
 * Outcome of parsing one text. Texts without a known key are `ignored`:
 * they are figure decoration (axis titles, legends, tick numbers).
 */
export type LabelResult =
    | { status: 'parsed'; label: PlotLabel }
    | { status: 'ignored' }
    | { status: 'failed'; key: string; reason: string };

/**
 * A number with optional sign, decimals, exponent, and an optional
 * `×10^n` multiplier, followed by the unit text.
 */
const NUMBER_RE =
    /^([+\-−]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+\-−]?\d+)?)(?:\s*[x×·*]\s*10\^?\s*([+\-−]?\d+))?\s*(.*)$/;

const KEY_RE = /^\s*([^:]+?)\s*:\s*(.*)$/s;

const SCALE_NAMES: Record<string, AxisScale> = {
    lin: 'linear',
    linear: 'linear',
    log: 'log',
    logarithmic: 'log',
};

export interface Measurement {
    value: number;
    unit: string;
}

/**
 * Parse "<number> <unit>" where the unit may be empty.
 * Returns null when the text does not start with a number.
 */
export function parseMeasurement(text: string): Measurement | null {
    const match = NUMBER_RE.exec(text.trim());
    if (!match) return null;

    const [, mantissa = '', exponent, unit = ''] = match;
    let value = Number(mantissa.replace(/−/g, '-'));
    if (exponent !== undefined) {
        value *= 10 ** Number(exponent.replace(/−/g, '-'));
    }
    if (!Number.isFinite(value)) return null;

    return { value, unit: unit.trim() };
}

/**
 * Parse the content of a text element into a plot label.
 */
export function parseLabel(content: string): LabelResult {
    const match = KEY_RE.exec(content);
    if (!match) return { status: 'ignored' };

    const [, rawKey = '', rawPayload = ''] = match;
    const key = rawKey.toLowerCase().replace(/\s+/g, ' ');
    const payload = rawPayload.trim();

    const point = /^([xy])(\d*)$/.exec(key);
    if (point) {
        const axis = point[1] === 'x' ? 'x' : 'y';
        const measurement = parseMeasurement(payload);
        if (!measurement) return failed(key, `no numeric value in "${payload}"`);
        const index = point[2] ? Number(point[2]) : null;
        return parsed({ type: 'point', axis, index, ...measurement });
    }

    const special = /^([xy])(sb|sf|_?scale)$/.exec(key);
    if (special) {
        const axis = special[1] === 'x' ? 'x' : 'y';
        const role = special[2] ?? '';

        if (role === 'sb') {
            const measurement = parseMeasurement(payload);
            if (!measurement) return failed(key, `no numeric value in "${payload}"`);
            if (measurement.value === 0) return failed(key, 'scale bar value must be non-zero');
            return parsed({ type: 'scaleBar', axis, ...measurement });
        }

        if (role === 'sf') {
            const measurement = parseMeasurement(payload);
            if (!measurement) return failed(key, `no numeric value in "${payload}"`);
            if (measurement.value === 0) return failed(key, 'scaling factor must be non-zero');
            return parsed({ type: 'scaleFactor', axis, value: measurement.value });
        }

        const scale = SCALE_NAMES[payload.toLowerCase()];
        if (!scale) return failed(key, `unknown axis scale "${payload}", expected linear or log`);
        return parsed({ type: 'scale', axis, scale });
    }

    switch (key) {
        case 'curve':
            return parsed({ type: 'curve', name: payload });
        case 'scan rate':
        case 'scanrate': {
            const measurement = parseMeasurement(payload);
            if (!measurement) return failed(key, `no numeric value in "${payload}"`);
            return parsed({ type: 'scanRate', ...measurement });
        }
        case 'comment':
            return parsed({ type: 'fact', key: 'comment', text: payload });
        case 'figure':
            return parsed({ type: 'fact', key: 'figure', text: payload });
        case 'linked':
            return parsed({ type: 'fact', key: 'linked', text: payload });
        case 'tags':
            return parsed({
                type: 'tags',
                tags: payload.split(',').map((tag) => tag.trim()).filter(Boolean),
            });
        default:
            return { status: 'ignored' };
    }
}

function parsed(label: PlotLabel): LabelResult {
    return { status: 'parsed', label };
}

function failed(key: string, reason: string): LabelResult {
    return { status: 'failed', key, reason };
}

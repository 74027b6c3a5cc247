import { DigitizerError } from '../utils/errors.js';

/**
 * Physical quantities the electrochemistry mapper understands.
 */
export type QuantityKind = 'potential' | 'current' | 'currentDensity' | 'time' | 'scanRate';

type BaseSymbol = 'V' | 'A' | 's' | 'm';
type Dimensions = Record<BaseSymbol, number>;

const BASES: readonly BaseSymbol[] = ['V', 'A', 's', 'm'];

/** SI prefixes. `u`, `µ` and `μ` all mean micro. */
const PREFIXES: Readonly<Record<string, number>> = {
    p: 1e-12,
    n: 1e-9,
    u: 1e-6,
    m: 1e-3,
    c: 1e-2,
    d: 1e-1,
    k: 1e3,
    M: 1e6,
    G: 1e9,
};

/** Unit symbols with their base dimension and factor to SI. */
const SYMBOLS: Readonly<Record<string, { base: BaseSymbol; factor: number }>> = {
    V: { base: 'V', factor: 1 },
    A: { base: 'A', factor: 1 },
    s: { base: 's', factor: 1 },
    min: { base: 's', factor: 60 },
    h: { base: 's', factor: 3600 },
    m: { base: 'm', factor: 1 },
};

/** SI form of every supported kind. */
const KINDS: ReadonlyArray<{ kind: QuantityKind; dimensions: Partial<Dimensions>; symbol: string }> = [
    { kind: 'potential', dimensions: { V: 1 }, symbol: 'V' },
    { kind: 'current', dimensions: { A: 1 }, symbol: 'A' },
    { kind: 'currentDensity', dimensions: { A: 1, m: -2 }, symbol: 'A / m2' },
    { kind: 'time', dimensions: { s: 1 }, symbol: 's' },
    { kind: 'scanRate', dimensions: { V: 1, s: -1 }, symbol: 'V / s' },
];

const SUPERSCRIPTS: Readonly<Record<string, string>> = {
    '⁻': '-',
    '⁰': '0',
    '¹': '1',
    '²': '2',
    '³': '3',
    '⁴': '4',
};

export interface ParsedUnit {
    /** Unit as written, without the reference suffix */
    text: string;
    kind: QuantityKind;
    /** Multiply a value in this unit by `factor` to get SI */
    factor: number;
    /** SI symbol of the kind, e.g. `A / m2` */
    siSymbol: string;
    /** Reference electrode from a `vs. REF` suffix */
    reference: string | null;
}

/**
 * Split "V vs. RHE" into the unit and its reference.
 */
export function splitReference(text: string): { unit: string; reference: string | null } {
    const match = /^(.*?)\s*\bvs\.?\s*(\S.*)$/i.exec(text.trim());
    if (!match) return { unit: text.trim(), reference: null };
    return { unit: (match[1] ?? '').trim(), reference: (match[2] ?? '').trim() };
}

function normalize(unit: string): string {
    let out = unit.replace(/[µμ]/g, 'u').replace(/−/g, '-').replace(/\^/g, '').replace(/[·*]/g, ' ');
    for (const [sup, plain] of Object.entries(SUPERSCRIPTS)) out = out.split(sup).join(plain);
    return out.trim();
}

function resolveSymbol(symbol: string): { base: BaseSymbol; factor: number } | null {
    const exact = SYMBOLS[symbol];
    if (exact) return exact;

    const prefix = PREFIXES[symbol.charAt(0)];
    const rest = SYMBOLS[symbol.slice(1)];
    if (prefix === undefined || !rest) return null;
    return { base: rest.base, factor: prefix * rest.factor };
}

/**
 * Parse a unit expression such as `mV`, `mA / cm2`, `uA cm-2`, `mV s-1`
 * or `V vs. RHE`. Returns null when the expression is empty, unknown, or
 * describes a quantity outside the supported kinds.
 */
export function tryParseUnit(text: string): ParsedUnit | null {
    const { unit, reference } = splitReference(text);
    const normalized = normalize(unit);
    if (normalized === '') return null;

    const dimensions: Dimensions = { V: 0, A: 0, s: 0, m: 0 };
    let factor = 1;

    const segments = normalized.split('/');
    for (const [position, segment] of segments.entries()) {
        const tokens = segment.trim().split(/\s+/).filter(Boolean);
        if (tokens.length === 0) return null;

        for (const token of tokens) {
            const match = /^([a-zA-Z]+)(-?\d+)?$/.exec(token);
            if (!match) return null;
            const resolved = resolveSymbol(match[1] ?? '');
            if (!resolved) return null;

            const exponent = Number(match[2] ?? 1) * (position === 0 ? 1 : -1);
            dimensions[resolved.base] += exponent;
            factor *= resolved.factor ** exponent;
        }
    }

    const match = KINDS.find(({ dimensions: expected }) =>
        BASES.every((base) => dimensions[base] === (expected[base] ?? 0))
    );
    if (!match) return null;

    return { text: unit, kind: match.kind, factor, siSymbol: match.symbol, reference };
}

/**
 * Like `tryParseUnit`, failing with `UnsupportedUnit`.
 */
export function parseUnit(text: string): ParsedUnit {
    const parsed = tryParseUnit(text);
    if (!parsed) {
        throw new DigitizerError('UnsupportedUnit', `Unsupported unit "${text}"`, { unit: text });
    }
    return parsed;
}

/**
 * Convert a value to SI. Converting with an SI unit is the identity.
 */
export function toSI(value: number, unit: string | ParsedUnit): number {
    const parsed = typeof unit === 'string' ? parseUnit(unit) : unit;
    return parsed.factor === 1 ? value : value * parsed.factor;
}

/**
 * Factor between two units of the same kind (`value_in_to = value_in_from * factor`).
 */
export function conversionFactor(from: string, to: string): number {
    const source = parseUnit(from);
    const target = parseUnit(to);
    if (source.kind !== target.kind) {
        throw new DigitizerError('UnsupportedUnit', `Cannot convert ${from} (${source.kind}) to ${to} (${target.kind})`, {
            from,
            to,
        });
    }
    return source.factor / target.factor;
}

import type { Matrix, Point } from '../types/index.js';

export const IDENTITY: Matrix = { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };

/**
 * Compose two matrices: the result applies `inner` first, then `outer`.
 */
export function multiply(outer: Matrix, inner: Matrix): Matrix {
    return {
        a: outer.a * inner.a + outer.c * inner.b,
        b: outer.b * inner.a + outer.d * inner.b,
        c: outer.a * inner.c + outer.c * inner.d,
        d: outer.b * inner.c + outer.d * inner.d,
        e: outer.a * inner.e + outer.c * inner.f + outer.e,
        f: outer.b * inner.e + outer.d * inner.f + outer.f,
    };
}

export function applyMatrix(m: Matrix, p: Point): Point {
    return {
        x: m.a * p.x + m.c * p.y + m.e,
        y: m.b * p.x + m.d * p.y + m.f,
    };
}

/**
 * Geometric mean scale of a matrix (sqrt of |det|), used to carry
 * document-space tolerances into local coordinates.
 */
export function matrixScale(m: Matrix): number {
    return Math.sqrt(Math.abs(m.a * m.d - m.b * m.c));
}

const TRANSFORM_RE = /(matrix|translate|scale|rotate|skewX|skewY)\s*\(([^)]*)\)/g;

/**
 * Parse an SVG `transform` attribute into a single matrix.
 * Supports matrix, translate, scale, rotate (with optional center), skewX, skewY.
 * Returns null when the attribute contains anything else.
 */
export function parseTransform(value: string | null | undefined): Matrix | null {
    if (!value || !value.trim()) return IDENTITY;

    let result = IDENTITY;
    let consumed = '';
    for (const match of value.matchAll(TRANSFORM_RE)) {
        const [whole, kind, argText] = match;
        consumed += whole;
        const args = (argText ?? '').trim().split(/[\s,]+/).filter(Boolean).map(Number);
        if (args.some((n) => !Number.isFinite(n))) return null;

        const step = transformStep(kind ?? '', args);
        if (!step) return null;
        result = multiply(result, step);
    }

    // Anything other than separators left over means an unsupported or broken list
    const rest = value.replace(TRANSFORM_RE, '').replace(/[\s,]/g, '');
    if (rest.length > 0 || consumed.length === 0) return null;
    return result;
}

function transformStep(kind: string, args: number[]): Matrix | null {
    const [p0 = 0, p1, p2] = args;
    switch (kind) {
        case 'matrix': {
            if (args.length !== 6) return null;
            const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = args;
            return { a, b, c, d, e, f };
        }
        case 'translate':
            if (args.length < 1 || args.length > 2) return null;
            return { ...IDENTITY, e: p0, f: p1 ?? 0 };
        case 'scale':
            if (args.length < 1 || args.length > 2) return null;
            return { ...IDENTITY, a: p0, d: p1 ?? p0 };
        case 'rotate': {
            if (args.length !== 1 && args.length !== 3) return null;
            const rad = (p0 * Math.PI) / 180;
            const cos = Math.cos(rad);
            const sin = Math.sin(rad);
            const rotation: Matrix = { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
            if (p1 === undefined || p2 === undefined) return rotation;
            // rotate(θ, cx, cy) = translate(cx, cy) rotate(θ) translate(-cx, -cy)
            return multiply(
                multiply({ ...IDENTITY, e: p1, f: p2 }, rotation),
                { ...IDENTITY, e: -p1, f: -p2 }
            );
        }
        case 'skewX':
            if (args.length !== 1) return null;
            return { ...IDENTITY, c: Math.tan((p0 * Math.PI) / 180) };
        case 'skewY':
            if (args.length !== 1) return null;
            return { ...IDENTITY, b: Math.tan((p0 * Math.PI) / 180) };
        default:
            return null;
    }
}

export function distance(p: Point, q: Point): number {
    return Math.hypot(p.x - q.x, p.y - q.y);
}

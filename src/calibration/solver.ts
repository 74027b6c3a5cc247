import type { AffineMap, Axis, AxisCalibration, Point, Transform } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { DigitizerError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/** Two pixel coordinates closer than this are treated as coincident. */
const PIXEL_EPSILON = 1e-9;

export interface SolveOptions {
    /** Maximum residual relative to the value span for over-determined fits */
    residualTolerance?: number;
}

/**
 * Solve the pixel → data mapping of one axis.
 *
 * Two points give the exact line through both; more points are fitted by
 * ordinary least squares and rejected when the largest residual exceeds
 * `residualTolerance` times the span of the values. Log axes are solved on
 * ln(value).
 */
export function solveAxis(calibration: AxisCalibration, options: SolveOptions = {}): AffineMap {
    const { axis, scale, points } = calibration;
    const tolerance = options.residualTolerance ?? DEFAULT_CONFIG.residualTolerance;

    if (points.length < 2) {
        throw new DigitizerError(
            'InsufficientCalibration',
            `The ${axis} axis needs at least 2 reference points, found ${points.length}`,
            { axis, points: points.length }
        );
    }

    const pixels = points.map((p) => p.pixel[axis]);
    const values = points.map((p) => {
        if (scale === 'linear') return p.value;
        if (!(p.value > 0)) {
            throw new DigitizerError(
                'InconsistentCalibration',
                `Logarithmic ${axis} axis requires positive reference values, got ${p.value}`,
                { axis, value: p.value }
            );
        }
        return Math.log(p.value);
    });

    const sorted = [...pixels].sort((a, b) => a - b);
    for (let i = 1; i < sorted.length; i++) {
        const gap = (sorted[i] ?? 0) - (sorted[i - 1] ?? 0);
        if (gap < PIXEL_EPSILON) {
            throw new DigitizerError(
                'DegenerateCalibration',
                `Two reference points on the ${axis} axis share the pixel coordinate ${sorted[i]}`,
                { axis, pixels }
            );
        }
    }

    const { slope, intercept } = pixels.length === 2 ? exactLine(pixels, values) : leastSquares(pixels, values);
    if (!Number.isFinite(slope) || !Number.isFinite(intercept)) {
        throw new DigitizerError('DegenerateCalibration', `Calibration of the ${axis} axis is not finite`, {
            axis,
            pixels,
        });
    }

    let residual = 0;
    if (pixels.length > 2) {
        residual = Math.max(...pixels.map((p, i) => Math.abs(slope * p + intercept - (values[i] ?? 0))));
        const span = Math.max(...values) - Math.min(...values);
        if (residual > tolerance * span) {
            throw new DigitizerError(
                'InconsistentCalibration',
                `Reference points on the ${axis} axis disagree (residual ${residual} exceeds ${tolerance} of span ${span})`,
                { axis, residual, span, tolerance }
            );
        }
    }

    getLogger('calibrate').debug(
        { axis, scale, slope, intercept, residual, points: points.length },
        'Solved axis calibration'
    );
    return { axis, scale, slope, intercept, residual };
}

function exactLine(pixels: number[], values: number[]): { slope: number; intercept: number } {
    const [p1 = 0, p2 = 0] = pixels;
    const [v1 = 0, v2 = 0] = values;
    const slope = (v2 - v1) / (p2 - p1);
    return { slope, intercept: v1 - slope * p1 };
}

function leastSquares(pixels: number[], values: number[]): { slope: number; intercept: number } {
    const n = pixels.length;
    const meanP = pixels.reduce((a, b) => a + b, 0) / n;
    const meanV = values.reduce((a, b) => a + b, 0) / n;

    let sxx = 0;
    let sxy = 0;
    for (let i = 0; i < n; i++) {
        const dp = (pixels[i] ?? 0) - meanP;
        sxx += dp * dp;
        sxy += dp * ((values[i] ?? 0) - meanV);
    }

    const slope = sxy / sxx;
    return { slope, intercept: meanV - slope * meanP };
}

/**
 * Solve both axes independently; no rotation or coupling is assumed.
 */
export function solveTransform(calibrations: Record<Axis, AxisCalibration>, options: SolveOptions = {}): Transform {
    return {
        x: solveAxis(calibrations.x, options),
        y: solveAxis(calibrations.y, options),
    };
}

export function applyAxis(map: AffineMap, pixel: number): number {
    const linear = map.slope * pixel + map.intercept;
    return map.scale === 'log' ? Math.exp(linear) : linear;
}

/**
 * Inverse mapping, data value → pixel. Returns NaN for non-positive
 * values on log axes.
 */
export function invertAxis(map: AffineMap, value: number): number {
    if (map.scale === 'log') {
        return value > 0 ? (Math.log(value) - map.intercept) / map.slope : Number.NaN;
    }
    return (value - map.intercept) / map.slope;
}

export function applyTransform(transform: Transform, pixel: Point): Point {
    return { x: applyAxis(transform.x, pixel.x), y: applyAxis(transform.y, pixel.y) };
}

import type { Point } from '../types/index.js';

const MAX_DEPTH = 16;

/**
 * Distance from `p` to the segment a–b.
 */
export function segmentDistance(p: Point, a: Point, b: Point): number {
    const dx = b.x - a.x;
    const dy = b.y - a.y;
    const lengthSq = dx * dx + dy * dy;
    if (lengthSq === 0) return Math.hypot(p.x - a.x, p.y - a.y);

    const t = Math.max(0, Math.min(1, ((p.x - a.x) * dx + (p.y - a.y) * dy) / lengthSq));
    return Math.hypot(p.x - (a.x + t * dx), p.y - (a.y + t * dy));
}

function midpoint(p: Point, q: Point): Point {
    return { x: (p.x + q.x) / 2, y: (p.y + q.y) / 2 };
}

/**
 * Flatten a cubic Bézier into points (excluding the start point).
 *
 * Subdivides at t = ½ until both control points lie within `tolerance`
 * of the chord. The curve stays inside its control polygon, so this bounds
 * the chord error by `tolerance`.
 */
export function flattenCubic(p0: Point, p1: Point, p2: Point, p3: Point, tolerance: number): Point[] {
    const out: Point[] = [];
    subdivideCubic(p0, p1, p2, p3, tolerance, 0, out);
    return out;
}

function subdivideCubic(
    p0: Point,
    p1: Point,
    p2: Point,
    p3: Point,
    tolerance: number,
    depth: number,
    out: Point[]
): void {
    const flat = Math.max(segmentDistance(p1, p0, p3), segmentDistance(p2, p0, p3)) <= tolerance;
    if (flat || depth >= MAX_DEPTH) {
        out.push(p3);
        return;
    }

    // de Casteljau split
    const p01 = midpoint(p0, p1);
    const p12 = midpoint(p1, p2);
    const p23 = midpoint(p2, p3);
    const p012 = midpoint(p01, p12);
    const p123 = midpoint(p12, p23);
    const mid = midpoint(p012, p123);

    subdivideCubic(p0, p01, p012, mid, tolerance, depth + 1, out);
    subdivideCubic(mid, p123, p23, p3, tolerance, depth + 1, out);
}

/**
 * Flatten a quadratic Bézier by degree elevation to a cubic.
 */
export function flattenQuadratic(p0: Point, p1: Point, p2: Point, tolerance: number): Point[] {
    const c1 = { x: p0.x + (2 / 3) * (p1.x - p0.x), y: p0.y + (2 / 3) * (p1.y - p0.y) };
    const c2 = { x: p2.x + (2 / 3) * (p1.x - p2.x), y: p2.y + (2 / 3) * (p1.y - p2.y) };
    return flattenCubic(p0, c1, c2, p2, tolerance);
}

export interface ArcParams {
    rx: number;
    ry: number;
    /** x-axis rotation in degrees */
    rotation: number;
    largeArc: boolean;
    sweep: boolean;
}

/**
 * Flatten an SVG elliptical arc (endpoint parameterization) into points,
 * excluding the start point. The angular step keeps the sagitta of every
 * chord within `tolerance`.
 */
export function flattenArc(p0: Point, arc: ArcParams, p: Point, tolerance: number): Point[] {
    let rx = Math.abs(arc.rx);
    let ry = Math.abs(arc.ry);
    if (rx === 0 || ry === 0 || (p0.x === p.x && p0.y === p.y)) {
        return p0.x === p.x && p0.y === p.y ? [] : [p];
    }

    const phi = (arc.rotation * Math.PI) / 180;
    const cosPhi = Math.cos(phi);
    const sinPhi = Math.sin(phi);

    // Step 1: compute (x1', y1')
    const dx2 = (p0.x - p.x) / 2;
    const dy2 = (p0.y - p.y) / 2;
    const x1 = cosPhi * dx2 + sinPhi * dy2;
    const y1 = -sinPhi * dx2 + cosPhi * dy2;

    // Radii correction
    const lambda = (x1 * x1) / (rx * rx) + (y1 * y1) / (ry * ry);
    if (lambda > 1) {
        const s = Math.sqrt(lambda);
        rx *= s;
        ry *= s;
    }

    // Step 2: compute (cx', cy')
    const num = rx * rx * ry * ry - rx * rx * y1 * y1 - ry * ry * x1 * x1;
    const den = rx * rx * y1 * y1 + ry * ry * x1 * x1;
    const sign = arc.largeArc === arc.sweep ? -1 : 1;
    const coef = sign * Math.sqrt(Math.max(0, num / den));
    const cxp = (coef * rx * y1) / ry;
    const cyp = (-coef * ry * x1) / rx;

    // Step 3: center
    const cx = cosPhi * cxp - sinPhi * cyp + (p0.x + p.x) / 2;
    const cy = sinPhi * cxp + cosPhi * cyp + (p0.y + p.y) / 2;

    // Step 4: angles
    const theta1 = vectorAngle(1, 0, (x1 - cxp) / rx, (y1 - cyp) / ry);
    let delta = vectorAngle((x1 - cxp) / rx, (y1 - cyp) / ry, (-x1 - cxp) / rx, (-y1 - cyp) / ry);
    if (!arc.sweep && delta > 0) delta -= 2 * Math.PI;
    if (arc.sweep && delta < 0) delta += 2 * Math.PI;

    const radius = Math.max(rx, ry);
    const maxStep = tolerance >= radius ? Math.PI / 2 : 2 * Math.acos(1 - tolerance / radius);
    const steps = Math.max(1, Math.ceil(Math.abs(delta) / Math.min(maxStep, Math.PI / 2)));

    const out: Point[] = [];
    for (let i = 1; i < steps; i++) {
        const theta = theta1 + (delta * i) / steps;
        const ex = rx * Math.cos(theta);
        const ey = ry * Math.sin(theta);
        out.push({
            x: cosPhi * ex - sinPhi * ey + cx,
            y: sinPhi * ex + cosPhi * ey + cy,
        });
    }
    // End exactly on the declared endpoint
    out.push(p);
    return out;
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
    return Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy);
}

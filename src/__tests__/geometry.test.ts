import { describe, it, expect } from 'vitest';
import { IDENTITY, applyMatrix, matrixScale, multiply, parseTransform } from '../geometry/matrix.js';
import { flattenArc, flattenCubic, flattenQuadratic, segmentDistance } from '../geometry/flatten.js';
import { SpatialIndex } from '../geometry/spatial-index.js';

describe('Matrix', () => {
    it('should treat a missing transform as identity', () => {
        expect(parseTransform(null)).toEqual(IDENTITY);
        expect(parseTransform('  ')).toEqual(IDENTITY);
    });

    it('should parse translate and scale', () => {
        expect(parseTransform('translate(10,20)')).toEqual({ ...IDENTITY, e: 10, f: 20 });
        expect(parseTransform('translate(7)')).toEqual({ ...IDENTITY, e: 7 });
        expect(parseTransform('scale(2)')).toEqual({ ...IDENTITY, a: 2, d: 2 });
        expect(parseTransform('scale(2, 3)')).toEqual({ ...IDENTITY, a: 2, d: 3 });
    });

    it('should parse matrix()', () => {
        expect(parseTransform('matrix(1 0 0 1 5 6)')).toEqual({ a: 1, b: 0, c: 0, d: 1, e: 5, f: 6 });
    });

    it('should apply a transform list right to left', () => {
        const matrix = parseTransform('translate(10) scale(2)');
        if (!matrix) throw new Error('transform not parsed');
        expect(applyMatrix(matrix, { x: 1, y: 1 })).toEqual({ x: 12, y: 2 });
    });

    it('should rotate around a center', () => {
        const matrix = parseTransform('rotate(90, 10, 10)');
        if (!matrix) throw new Error('transform not parsed');
        const point = applyMatrix(matrix, { x: 20, y: 10 });
        expect(point.x).toBeCloseTo(10, 12);
        expect(point.y).toBeCloseTo(20, 12);
    });

    it('should skew', () => {
        const matrix = parseTransform('skewX(45)');
        if (!matrix) throw new Error('transform not parsed');
        expect(applyMatrix(matrix, { x: 0, y: 2 }).x).toBeCloseTo(2, 12);
    });

    it('should reject unsupported or broken lists', () => {
        expect(parseTransform('perspective(1)')).toBeNull();
        expect(parseTransform('translate(1,2,3)')).toBeNull();
        expect(parseTransform('rotate(a)')).toBeNull();
        expect(parseTransform('scale(2) junk')).toBeNull();
    });

    it('should compose with multiply applying the inner matrix first', () => {
        const composed = multiply({ ...IDENTITY, e: 1 }, { ...IDENTITY, a: 3, d: 3 });
        expect(applyMatrix(composed, { x: 1, y: 1 })).toEqual({ x: 4, y: 3 });
    });

    it('should report the area scale of a matrix', () => {
        expect(matrixScale({ ...IDENTITY, a: 2, d: 8 })).toBe(4);
    });
});

describe('Flattening', () => {
    it('should measure distance to a segment', () => {
        expect(segmentDistance({ x: 5, y: 3 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(3);
        expect(segmentDistance({ x: -4, y: 3 }, { x: 0, y: 0 }, { x: 10, y: 0 })).toBe(5);
        expect(segmentDistance({ x: 3, y: 4 }, { x: 0, y: 0 }, { x: 0, y: 0 })).toBe(5);
    });

    it('should emit only the end point of a flat cubic', () => {
        expect(flattenCubic({ x: 0, y: 0 }, { x: 3, y: 0 }, { x: 6, y: 0 }, { x: 9, y: 0 }, 0.1)).toEqual([
            { x: 9, y: 0 },
        ]);
    });

    it('should subdivide a curved cubic until it is within tolerance', () => {
        const p0 = { x: 0, y: 0 };
        const p1 = { x: 0, y: 100 };
        const p2 = { x: 100, y: 100 };
        const p3 = { x: 100, y: 0 };
        const points = flattenCubic(p0, p1, p2, p3, 0.5);

        expect(points.length).toBeGreaterThan(8);
        expect(points[points.length - 1]).toEqual(p3);
        // Symmetric curve: its apex (t = ½) is always a subdivision point
        expect(points).toContainEqual({ x: 50, y: 75 });
    });

    it('should flatten quadratics through their end point', () => {
        const points = flattenQuadratic({ x: 0, y: 0 }, { x: 50, y: 100 }, { x: 100, y: 0 }, 0.5);
        expect(points[points.length - 1]).toEqual({ x: 100, y: 0 });
        expect(points.some((p) => Math.abs(p.x - 50) < 1e-9 && Math.abs(p.y - 50) < 1e-9)).toBe(true);
    });

    it('should treat a zero-radius arc as a straight line', () => {
        const arc = { rx: 0, ry: 5, rotation: 0, largeArc: false, sweep: true };
        expect(flattenArc({ x: 0, y: 0 }, arc, { x: 10, y: 0 }, 0.1)).toEqual([{ x: 10, y: 0 }]);
    });

    it('should scale up radii too small to reach the end point', () => {
        const arc = { rx: 1, ry: 1, rotation: 0, largeArc: false, sweep: true };
        const points = flattenArc({ x: 0, y: 0 }, arc, { x: 10, y: 0 }, 0.1);
        for (const point of points) {
            expect(Math.hypot(point.x - 5, point.y)).toBeCloseTo(5, 9);
        }
        expect(points[points.length - 1]).toEqual({ x: 10, y: 0 });
    });
});

describe('SpatialIndex', () => {
    function index(): SpatialIndex<string> {
        const spatial = new SpatialIndex<string>(10);
        spatial.insert({ point: { x: 0, y: 0 }, owner: 1, value: 'a' });
        spatial.insert({ point: { x: 4, y: 0 }, owner: 1, value: 'a-end' });
        spatial.insert({ point: { x: 20, y: 0 }, owner: 2, value: 'b' });
        return spatial;
    }

    it('should count inserted entries', () => {
        expect(index().size).toBe(3);
    });

    it('should list entries within a radius, closest first', () => {
        expect(index().within({ x: 5, y: 0 }, 20).map((entry) => entry.value)).toEqual(['a-end', 'a', 'b']);
    });

    it('should find the nearest owner', () => {
        const result = index().nearest({ x: 15, y: 0 }, 8);
        expect(result).toMatchObject({ kind: 'match', distance: 5, entry: { owner: 2 } });
    });

    it('should count several anchors of one owner once', () => {
        const spatial = new SpatialIndex<null>(10);
        spatial.insert({ point: { x: 0, y: 3 }, owner: 7, value: null });
        spatial.insert({ point: { x: 0, y: -3 }, owner: 7, value: null });
        expect(spatial.nearest({ x: 0, y: 0 }, 5).kind).toBe('match');
    });

    it('should report a tie between different owners', () => {
        const result = index().nearest({ x: 12, y: 0 }, 10);
        expect(result).toMatchObject({ kind: 'tie', distance: 8 });
        if (result.kind !== 'tie') return;
        expect(result.entries.map((entry) => entry.owner).sort()).toEqual([1, 2]);
    });

    it('should report nothing outside the radius', () => {
        expect(index().nearest({ x: 50, y: 50 }, 10)).toEqual({ kind: 'none' });
    });

    it('should honour the accept filter', () => {
        const result = index().nearest({ x: 12, y: 0 }, 10, (entry) => entry.owner === 1);
        expect(result).toMatchObject({ kind: 'match', entry: { owner: 1 } });
    });

    it('should reject a non-positive cell size', () => {
        expect(() => new SpatialIndex(0)).toThrow(RangeError);
    });
});

import { makeAbsolute, parseSVG, type CommandMadeAbsolute } from 'svg-path-parser';
import type { Matrix, Point } from '../types/index.js';
import { applyMatrix, matrixScale } from '../geometry/matrix.js';
import { flattenArc, flattenCubic, flattenQuadratic } from '../geometry/flatten.js';

/**
 * Parse SVG path data with svg-path-parser into absolute commands. Throws
 * the parser's SyntaxError for malformed data.
 */
export function parsePathData(d: string): CommandMadeAbsolute[] {
    return makeAbsolute(parseSVG(d));
}

function reflect(control: Point | null, around: Point): Point {
    return control ? { x: 2 * around.x - control.x, y: 2 * around.y - control.y } : around;
}

/**
 * Resolve path data into absolute document-space points, one array per
 * subpath, in drawing order.
 *
 * Smooth curve controls are reflected, Béziers are flattened after transforming
 * their control points (so `chordTolerance` is in document units), and arcs
 * are flattened in local space with the tolerance scaled by `matrix`.
 * Consecutive duplicate points are dropped.
 */
export function flattenPathData(d: string, matrix: Matrix, chordTolerance: number): Point[][] {
    const commands = parsePathData(d);
    const subpaths: Point[][] = [];
    let active: Point[] | null = null;

    let current: Point = { x: 0, y: 0 };
    let start: Point = current;
    let cubicControl: Point | null = null;
    let quadControl: Point | null = null;

    const toDoc = (p: Point): Point => applyMatrix(matrix, p);
    const localTolerance = chordTolerance / (matrixScale(matrix) || 1);

    const push = (docPoints: Point[]): void => {
        if (!active) {
            active = [toDoc(current)];
            subpaths.push(active);
        }
        for (const p of docPoints) {
            const last = active[active.length - 1];
            if (last && last.x === p.x && last.y === p.y) continue;
            active.push(p);
        }
    };

    for (const cmd of commands) {
        let nextCubic: Point | null = null;
        let nextQuad: Point | null = null;

        switch (cmd.code) {
            case 'M': {
                current = { x: cmd.x, y: cmd.y };
                start = current;
                active = [toDoc(current)];
                subpaths.push(active);
                break;
            }
            case 'L': {
                current = { x: cmd.x, y: cmd.y };
                push([toDoc(current)]);
                break;
            }
            case 'H': {
                current = { x: cmd.x, y: current.y };
                push([toDoc(current)]);
                break;
            }
            case 'V': {
                current = { x: current.x, y: cmd.y };
                push([toDoc(current)]);
                break;
            }
            case 'C': {
                const c1 = { x: cmd.x1, y: cmd.y1 };
                const c2 = { x: cmd.x2, y: cmd.y2 };
                const end = { x: cmd.x, y: cmd.y };
                push(flattenCubic(toDoc(current), toDoc(c1), toDoc(c2), toDoc(end), chordTolerance));
                nextCubic = c2;
                current = end;
                break;
            }
            case 'S': {
                const c1 = reflect(cubicControl, current);
                const c2 = { x: cmd.x2, y: cmd.y2 };
                const end = { x: cmd.x, y: cmd.y };
                push(flattenCubic(toDoc(current), toDoc(c1), toDoc(c2), toDoc(end), chordTolerance));
                nextCubic = c2;
                current = end;
                break;
            }
            case 'Q': {
                const control = { x: cmd.x1, y: cmd.y1 };
                const end = { x: cmd.x, y: cmd.y };
                push(flattenQuadratic(toDoc(current), toDoc(control), toDoc(end), chordTolerance));
                nextQuad = control;
                current = end;
                break;
            }
            case 'T': {
                const control = reflect(quadControl, current);
                const end = { x: cmd.x, y: cmd.y };
                push(flattenQuadratic(toDoc(current), toDoc(control), toDoc(end), chordTolerance));
                nextQuad = control;
                current = end;
                break;
            }
            case 'A': {
                const end = { x: cmd.x, y: cmd.y };
                const local = flattenArc(
                    current,
                    { rx: cmd.rx, ry: cmd.ry, rotation: cmd.xAxisRotation, largeArc: cmd.largeArc, sweep: cmd.sweep },
                    end,
                    localTolerance
                );
                push(local.map(toDoc));
                current = end;
                break;
            }
            case 'Z': {
                push([toDoc(start)]);
                current = start;
                active = null;
                break;
            }
        }

        cubicControl = nextCubic;
        quadControl = nextQuad;
    }

    return subpaths;
}

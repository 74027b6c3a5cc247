/**
 * A point in document (pixel) space or in data space.
 */
export interface Point {
    x: number;
    y: number;
}

/** Logical plot axis. */
export type Axis = 'x' | 'y';

export const AXES: readonly Axis[] = ['x', 'y'];

/**
 * 2D affine matrix in SVG order: [a c e; b d f; 0 0 1].
 */
export interface Matrix {
    a: number;
    b: number;
    c: number;
    d: number;
    e: number;
    f: number;
}

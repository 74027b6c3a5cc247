import type { Axis, Point } from './geometry.js';

/** Scale type of a calibrated axis. */
export type AxisScale = 'linear' | 'log';

/**
 * Calibration anchor: a pixel position whose data value is known from a label.
 */
export interface LabeledPoint {
    axis: Axis;
    /** Label index (`x1` → 1); synthetic scale-bar points get the next free index */
    index: number;
    value: number;
    /** Unit suffix as written in the label, '' when dimensionless */
    unit: string;
    pixel: Point;
    /** uid of the label text, null for synthetic points */
    textUid: number | null;
    /** uid of the marker or path the label was associated with */
    anchorUid: number;
}

/**
 * A scale bar: a marker path whose extent along one axis spans `value`.
 */
export interface ScaleBar {
    axis: Axis;
    value: number;
    unit: string;
    /** Extent of the marker along the axis, in pixels */
    length: number;
    textUid: number;
    anchorUid: number;
}

export interface AxisCalibration {
    axis: Axis;
    scale: AxisScale;
    unit: string;
    points: readonly LabeledPoint[];
}

/**
 * Solved pixel → data mapping for one axis.
 * Linear: value = slope·pixel + intercept.
 * Log: value = exp(slope·pixel + intercept).
 */
export interface AffineMap {
    axis: Axis;
    scale: AxisScale;
    slope: number;
    intercept: number;
    /** Largest absolute fit residual (in log space for log axes); 0 for exact solutions */
    residual: number;
}

export interface Transform {
    x: AffineMap;
    y: AffineMap;
}

/**
 * A data curve candidate: pixel-space samples of one path in drawing order.
 */
export interface Curve {
    /** Name from the `curve:` label or the identifier suffix, '' when unnamed */
    name: string;
    pathUid: number;
    points: readonly Point[];
}

/** Quantity with unit as written in a figure, e.g. a scan rate. */
export interface Quantity {
    value: number;
    unit: string;
}

/**
 * Descriptive facts read from the figure's own labels.
 */
export interface FigureFacts {
    scanRate?: Quantity;
    comment?: string;
    figure?: string;
    tags?: string[];
    linked?: string;
}

/**
 * Everything the classifier recognized in a document.
 */
export interface Classification {
    axisPoints: Record<Axis, LabeledPoint[]>;
    scaleBars: Partial<Record<Axis, ScaleBar>>;
    scaleFactors: Partial<Record<Axis, number>>;
    scales: Record<Axis, AxisScale>;
    curves: Curve[];
    facts: FigureFacts;
}

/**
 * Unit and scale of an output axis in its native calibrated units.
 */
export interface AxisDescriptor {
    unit: string;
    scale: AxisScale;
}

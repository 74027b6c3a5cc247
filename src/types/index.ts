/**
 * Barrel export for all shared types.
 */
export { AXES } from './geometry.js';
export type { Point, Axis, Matrix } from './geometry.js';
export type {
    ElementKind,
    PathElement,
    TextElement,
    GroupElement,
    MarkerElement,
    PlotElement,
    ElementByKind,
    FindCriteria,
    PlotDocument,
} from './document.js';
export type {
    AxisScale,
    LabeledPoint,
    ScaleBar,
    AxisCalibration,
    AffineMap,
    Transform,
    Curve,
    Quantity,
    FigureFacts,
    Classification,
    AxisDescriptor,
} from './plot.js';
export { DEFAULT_CONFIG } from './config.js';
export type { LogLevel, DigitizeTolerances, VecplotConfig } from './config.js';

import type {
    Axis,
    AxisCalibration,
    AxisDescriptor,
    Classification,
    Curve,
    DigitizeTolerances,
    PlotDocument,
    Transform,
} from '../types/index.js';
import { parseDocument } from '../svg/document.js';
import { classify } from '../plot/classifier.js';
import { buildCalibrations } from '../calibration/axis-calibration.js';
import { solveTransform } from '../calibration/solver.js';
import { extract, selectCurve, type XYColumn } from '../sampling/curve.js';
import { resample } from '../sampling/resample.js';
import type { DataTable } from '../table/data-table.js';
import { getLogger } from '../utils/logger.js';

export interface DigitizeOptions extends Partial<DigitizeTolerances> {
    /** Name of the curve to digitize; required when the figure has several */
    curve?: string;
    /** Resample onto a regular x grid with this spacing (native x units) */
    samplingInterval?: number;
}

/**
 * Output of one digitization run together with the artifacts it was
 * derived from.
 */
export interface DigitizeResult {
    document: PlotDocument;
    classification: Classification;
    calibrations: Record<Axis, AxisCalibration>;
    transform: Transform;
    curve: Curve;
    table: DataTable<XYColumn>;
    axes: Record<Axis, AxisDescriptor>;
}

/**
 * Digitize an already parsed document.
 */
export function digitizeDocument(document: PlotDocument, options: DigitizeOptions = {}): DigitizeResult {
    const classification = classify(document, { labelTolerance: options.labelTolerance });
    const calibrations = buildCalibrations(classification);
    const transform = solveTransform(calibrations, { residualTolerance: options.residualTolerance });
    const curve = selectCurve(classification.curves, options.curve);

    let table = extract(curve, transform, { scaleFactors: classification.scaleFactors });
    if (options.samplingInterval !== undefined) {
        table = resample(table, options.samplingInterval);
    }

    getLogger('digitize').debug(
        { curve: curve.name, samples: curve.points.length, rows: table.length },
        'Digitized curve'
    );

    return {
        document,
        classification,
        calibrations,
        transform,
        curve,
        table,
        axes: {
            x: { unit: calibrations.x.unit, scale: calibrations.x.scale },
            y: { unit: calibrations.y.unit, scale: calibrations.y.scale },
        },
    };
}

/**
 * Run the full pipeline: SVG bytes → document → plot elements →
 * calibration → transform → data table.
 */
export function digitize(source: string | Uint8Array, options: DigitizeOptions = {}): DigitizeResult {
    const document = parseDocument(source, { chordTolerance: options.chordTolerance });
    return digitizeDocument(document, options);
}

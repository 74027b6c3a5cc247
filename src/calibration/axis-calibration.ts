import type { Axis, AxisCalibration, Classification, LabeledPoint } from '../types/index.js';
import { DigitizerError } from '../utils/errors.js';

/**
 * Assemble the calibration of one axis from the classifier's reference
 * points and optional scale bar.
 *
 * Points without a unit inherit the axis unit; two different units on one
 * axis are inconsistent. A scale bar contributes one synthetic point offset
 * from the axis's first point (x grows rightwards, y grows upwards).
 */
export function buildAxisCalibration(classification: Classification, axis: Axis): AxisCalibration {
    const scale = classification.scales[axis];
    const labeled = classification.axisPoints[axis];
    const bar = classification.scaleBars[axis];

    const units = new Set(labeled.map((p) => p.unit).filter((unit) => unit !== ''));
    if (bar && bar.unit !== '') units.add(bar.unit);
    if (units.size > 1) {
        throw new DigitizerError(
            'InconsistentCalibration',
            `Reference labels on the ${axis} axis use different units: ${[...units].join(', ')}`,
            { axis, units: [...units] }
        );
    }
    const unit = [...units][0] ?? '';

    const points: LabeledPoint[] = labeled.map((p) => ({ ...p, unit }));

    if (bar) {
        const origin = points[0];
        if (!origin) {
            throw new DigitizerError(
                'InsufficientCalibration',
                `Scale bar on the ${axis} axis needs at least one reference point`,
                { axis, points: 0 }
            );
        }
        if (scale === 'log') {
            throw new DigitizerError(
                'InconsistentCalibration',
                `Scale bars are only supported on linear axes (the ${axis} axis is logarithmic)`,
                { axis }
            );
        }
        points.push({
            axis,
            index: Math.max(...points.map((p) => p.index)) + 1,
            value: origin.value + bar.value,
            unit,
            pixel:
                axis === 'x'
                    ? { x: origin.pixel.x + bar.length, y: origin.pixel.y }
                    : { x: origin.pixel.x, y: origin.pixel.y - bar.length },
            textUid: bar.textUid,
            anchorUid: bar.anchorUid,
        });
    }

    if (points.length < 2) {
        throw new DigitizerError(
            'InsufficientCalibration',
            `The ${axis} axis needs at least 2 reference points, found ${points.length}`,
            { axis, points: points.length }
        );
    }

    return { axis, scale, unit, points };
}

/**
 * Calibrations of both axes. Fails before any curve is sampled.
 */
export function buildCalibrations(classification: Classification): Record<Axis, AxisCalibration> {
    return {
        x: buildAxisCalibration(classification, 'x'),
        y: buildAxisCalibration(classification, 'y'),
    };
}

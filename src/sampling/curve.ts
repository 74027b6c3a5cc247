import type { Axis, Curve, Transform } from '../types/index.js';
import { applyTransform } from '../calibration/solver.js';
import { DataTable } from '../table/data-table.js';
import { DigitizerError } from '../utils/errors.js';

export type XYColumn = 'x' | 'y';

/**
 * Pick the data curve to digitize.
 *
 * With a name, the candidate carrying that name; without one, the only
 * candidate. Several candidates and no name is an error rather than a guess.
 */
export function selectCurve(candidates: readonly Curve[], name?: string): Curve {
    if (candidates.length === 0) {
        throw new DigitizerError('MissingCurve', 'No data curve found (label a path with "curve: <name>")');
    }

    if (name !== undefined) {
        const matching = candidates.filter((curve) => curve.name === name);
        const [match] = matching;
        if (!match) {
            throw new DigitizerError('MissingCurve', `No curve named "${name}"`, {
                available: candidates.map((curve) => curve.name),
            });
        }
        if (matching.length > 1) {
            throw new DigitizerError('AmbiguousCurve', `${matching.length} curves are named "${name}"`, {
                paths: matching.map((curve) => curve.pathUid),
            });
        }
        return match;
    }

    const [only] = candidates;
    if (candidates.length > 1 || !only) {
        throw new DigitizerError(
            'AmbiguousCurve',
            `Found ${candidates.length} curves, choose one of: ${candidates.map((c) => JSON.stringify(c.name)).join(', ')}`,
            { available: candidates.map((curve) => curve.name) }
        );
    }
    return only;
}

export interface ExtractOptions {
    /** Figure scaling factors; data values are divided by them */
    scaleFactors?: Partial<Record<Axis, number>>;
}

/**
 * Map every sample of a curve to data space, in path order.
 * One row per sample; no resampling.
 */
export function extract(curve: Curve, transform: Transform, options: ExtractOptions = {}): DataTable<XYColumn> {
    const xFactor = options.scaleFactors?.x ?? 1;
    const yFactor = options.scaleFactors?.y ?? 1;

    const table = new DataTable<XYColumn>(['x', 'y']);
    for (const pixel of curve.points) {
        const point = applyTransform(transform, pixel);
        table.append({ x: point.x / xFactor, y: point.y / yFactor });
    }
    return table.freeze();
}

import { DataTable, type Row } from '../table/data-table.js';
import type { XYColumn } from './curve.js';

/** x values closer than this fraction of the interval count as equal. */
const GRID_EPSILON = 1e-9;

/**
 * Resample a traced curve onto a regular x grid.
 *
 * Keeps the first row, then walks every segment in traversal order and
 * emits a linearly interpolated row wherever x crosses a multiple of
 * `interval`, and finally keeps the last row. Forward and reverse sweeps
 * both produce their own grid rows, so order still follows the trace.
 */
export function resample(table: DataTable<XYColumn>, interval: number): DataTable<XYColumn> {
    if (!(interval > 0) || !Number.isFinite(interval)) {
        throw new RangeError(`Sampling interval must be a positive number, got ${interval}`);
    }

    const rows = table.rows;
    const out = new DataTable<XYColumn>(['x', 'y']);
    const first = rows[0];
    if (!first) return out.freeze();
    out.append(first);

    const tolerance = GRID_EPSILON * interval;
    let previous: Row<XYColumn> = first;
    for (let i = 1; i < rows.length; i++) {
        const current = rows[i];
        if (!current) continue;

        for (const x of gridCrossings(previous.x, current.x, interval, tolerance)) {
            if (Math.abs(x - current.x) <= tolerance) {
                out.append({ x, y: current.y });
                continue;
            }
            const t = (x - previous.x) / (current.x - previous.x);
            out.append({ x, y: previous.y + t * (current.y - previous.y) });
        }
        previous = current;
    }

    const last = out.rows[out.length - 1];
    if (last && (Math.abs(last.x - previous.x) > tolerance || last.y !== previous.y)) {
        out.append(previous);
    }

    return out.freeze();
}

/** `k * interval` without the binary rounding noise of the product. */
function gridValue(k: number, interval: number): number {
    return Number((k * interval).toPrecision(12));
}

/**
 * Grid values in (from, to], in travel direction. A grid value within
 * `tolerance` of `from` belongs to the previous segment.
 */
function gridCrossings(from: number, to: number, interval: number, tolerance: number): number[] {
    const out: number[] = [];
    if (to > from) {
        for (let k = Math.floor(from / interval) - 1; ; k++) {
            const value = gridValue(k, interval);
            if (value > to + tolerance) break;
            if (value > from + tolerance) out.push(value);
        }
    } else if (to < from) {
        for (let k = Math.ceil(from / interval) + 1; ; k--) {
            const value = gridValue(k, interval);
            if (value < to - tolerance) break;
            if (value < from - tolerance) out.push(value);
        }
    }
    return out;
}

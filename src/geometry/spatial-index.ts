import type { Point } from '../types/index.js';
import { distance } from './matrix.js';

/**
 * A point registered in the index, owned by a document element.
 */
export interface IndexEntry<T> {
    point: Point;
    /** uid of the element this anchor belongs to */
    owner: number;
    value: T;
}

export type NearestResult<T> =
    | { kind: 'match'; entry: IndexEntry<T>; distance: number }
    | { kind: 'none' }
    | { kind: 'tie'; entries: IndexEntry<T>[]; distance: number };

/**
 * Uniform-grid spatial index for anchor lookups.
 *
 * `nearest()` answers "which element has an anchor closest to this point,
 * within `radius`". Several anchors of the same owner count once (its
 * closest one). Two different owners at exactly the same closest distance
 * are reported as a tie; the caller decides, the index never picks.
 */
export class SpatialIndex<T> {
    private readonly cells = new Map<string, IndexEntry<T>[]>();
    private count = 0;

    constructor(private readonly cellSize: number) {
        if (!(cellSize > 0) || !Number.isFinite(cellSize)) {
            throw new RangeError(`Spatial index cell size must be a positive number, got ${cellSize}`);
        }
    }

    get size(): number {
        return this.count;
    }

    insert(entry: IndexEntry<T>): void {
        const key = this.key(this.cell(entry.point.x), this.cell(entry.point.y));
        const bucket = this.cells.get(key);
        if (bucket) {
            bucket.push(entry);
        } else {
            this.cells.set(key, [entry]);
        }
        this.count++;
    }

    /**
     * All entries within `radius` of `point`, closest first.
     * Equal distances keep grid scan order.
     */
    within(point: Point, radius: number, accept?: (entry: IndexEntry<T>) => boolean): IndexEntry<T>[] {
        const hits: Array<{ entry: IndexEntry<T>; distance: number; order: number }> = [];
        const minX = this.cell(point.x - radius);
        const maxX = this.cell(point.x + radius);
        const minY = this.cell(point.y - radius);
        const maxY = this.cell(point.y + radius);

        for (let cx = minX; cx <= maxX; cx++) {
            for (let cy = minY; cy <= maxY; cy++) {
                const bucket = this.cells.get(this.key(cx, cy));
                if (!bucket) continue;
                for (const entry of bucket) {
                    if (accept && !accept(entry)) continue;
                    const d = distance(point, entry.point);
                    if (d <= radius) hits.push({ entry, distance: d, order: hits.length });
                }
            }
        }

        hits.sort((a, b) => a.distance - b.distance || a.order - b.order);
        return hits.map((hit) => hit.entry);
    }

    nearest(point: Point, radius: number, accept?: (entry: IndexEntry<T>) => boolean): NearestResult<T> {
        const best = new Map<number, { entry: IndexEntry<T>; distance: number }>();
        for (const entry of this.within(point, radius, accept)) {
            if (best.has(entry.owner)) continue;
            best.set(entry.owner, { entry, distance: distance(point, entry.point) });
        }

        const ranked = [...best.values()];
        const first = ranked[0];
        if (!first) return { kind: 'none' };

        const tied = ranked.filter((candidate) => candidate.distance === first.distance);
        if (tied.length > 1) {
            return { kind: 'tie', entries: tied.map((candidate) => candidate.entry), distance: first.distance };
        }
        return { kind: 'match', entry: first.entry, distance: first.distance };
    }

    private cell(coordinate: number): number {
        return Math.floor(coordinate / this.cellSize);
    }

    private key(cx: number, cy: number): string {
        return `${cx}:${cy}`;
    }
}

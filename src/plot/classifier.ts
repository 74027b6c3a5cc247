import type {
    Axis,
    Classification,
    Curve,
    FigureFacts,
    LabeledPoint,
    MarkerElement,
    PathElement,
    PlotDocument,
    Point,
    ScaleBar,
    TextElement,
} from '../types/index.js';
import { AXES, DEFAULT_CONFIG } from '../types/index.js';
import { distance } from '../geometry/matrix.js';
import { SpatialIndex, type IndexEntry } from '../geometry/spatial-index.js';
import { DigitizerError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { parseLabel, type PlotLabel } from './labels.js';

/** Paths whose id or Inkscape label starts with this prefix are data curves. */
const CURVE_ID_RE = /^curve(?:[\s:_-]+(.*))?$/i;

export interface ClassifyOptions {
    /** Maximum label-to-anchor distance in document px */
    labelTolerance?: number;
}

interface ParsedText {
    text: TextElement;
    label: PlotLabel;
}

/** Element a reference label can point at. */
type Anchor = PathElement | MarkerElement;

type AnchorLabel = ParsedText & { label: Extract<PlotLabel, { type: 'point' | 'scaleBar' }> };

function isAnchorLabel(entry: ParsedText): entry is AnchorLabel {
    return entry.label.type === 'point' || entry.label.type === 'scaleBar';
}

/**
 * Scan a document for plot conventions: axis reference points, scale bars,
 * scaling factors, axis scales, data curves and descriptive facts.
 *
 * Labels are tied to anchors through explicit nearest-neighbour queries:
 * the closest anchor within `labelTolerance` wins, no anchor or an exact
 * tie between two elements is an `UnassociatedLabel` error.
 */
export function classify(document: PlotDocument, options: ClassifyOptions = {}): Classification {
    const tolerance = options.labelTolerance ?? DEFAULT_CONFIG.labelTolerance;
    if (!(tolerance > 0)) {
        throw new RangeError(`labelTolerance must be positive, got ${tolerance}`);
    }

    const labels = readLabels(document);

    // Curves named by identifier convention never serve as markers
    const curves: Curve[] = [];
    const curveIds = new Set<number>();
    for (const path of document.find({ kind: 'path' })) {
        const match = CURVE_ID_RE.exec(path.id ?? '') ?? CURVE_ID_RE.exec(path.label ?? '');
        if (!match || path.points.length === 0) continue;
        curves.push({ name: (match[1] ?? '').trim(), pathUid: path.uid, points: path.points });
        curveIds.add(path.uid);
    }

    const consumed = new Set<number>();
    const markerIndex = new SpatialIndex<null>(tolerance);
    for (const element of document.elements) {
        if (element.kind === 'marker') {
            markerIndex.insert({ point: element.center, owner: element.uid, value: null });
        } else if (element.kind === 'path' && !curveIds.has(element.uid)) {
            const first = element.points[0];
            const last = element.points[element.points.length - 1];
            if (first) markerIndex.insert({ point: first, owner: element.uid, value: null });
            if (last && last !== first) markerIndex.insert({ point: last, owner: element.uid, value: null });
        }
    }

    const axisPoints: Record<Axis, LabeledPoint[]> = { x: [], y: [] };
    const scaleBars: Partial<Record<Axis, ScaleBar>> = {};

    for (const entry of labels.filter(isAnchorLabel)) {
        const { text, label } = entry;
        const anchor = associate(document, markerIndex, text, tolerance, consumed, curveIds);

        if (label.type === 'point') {
            axisPoints[label.axis].push({
                axis: label.axis,
                index: label.index ?? Number.POSITIVE_INFINITY,
                value: label.value,
                unit: normalizeUnit(label.unit),
                pixel: markedPoint(anchor, text),
                textUid: text.uid,
                anchorUid: anchor.uid,
            });
        } else {
            if (scaleBars[label.axis]) {
                throw labelError(text, `duplicate scale bar for the ${label.axis} axis`);
            }
            if (anchor.kind !== 'path') {
                throw new DigitizerError('UnassociatedLabel', `Scale bar "${text.content}" must label a path`, {
                    text: text.content,
                    anchor: anchor.uid,
                });
            }
            const coordinates = anchor.points.map((p) => p[label.axis]);
            scaleBars[label.axis] = {
                axis: label.axis,
                value: label.value,
                unit: normalizeUnit(label.unit),
                length: Math.max(...coordinates) - Math.min(...coordinates),
                textUid: text.uid,
                anchorUid: anchor.uid,
            };
        }
    }

    // Labeled curves: nearest vertex of any path not used as a marker
    const curveIndex = new SpatialIndex<null>(tolerance);
    for (const path of document.find({ kind: 'path' })) {
        if (consumed.has(path.uid) || curveIds.has(path.uid)) continue;
        for (const point of path.points) {
            curveIndex.insert({ point, owner: path.uid, value: null });
        }
    }
    for (const { text, label } of labels) {
        if (label.type !== 'curve') continue;
        const anchor = associate(document, curveIndex, text, tolerance, consumed, curveIds);
        if (anchor.kind !== 'path') {
            throw new DigitizerError('UnassociatedLabel', `Curve label "${text.content}" must label a path`, {
                text: text.content,
            });
        }
        curves.push({ name: label.name, pathUid: anchor.uid, points: anchor.points });
    }
    curves.sort((a, b) => a.pathUid - b.pathUid);

    for (const axis of AXES) {
        // Numbered labels first (x1, x2, …), then unnumbered ones in document order
        axisPoints[axis].sort((a, b) => (a.index === b.index ? 0 : a.index < b.index ? -1 : 1));
        let next = 1;
        for (const point of axisPoints[axis]) {
            if (Number.isFinite(point.index)) {
                next = Math.max(next, point.index + 1);
            } else {
                point.index = next++;
            }
        }
    }

    const classification: Classification = {
        axisPoints,
        scaleBars,
        scaleFactors: {},
        scales: { x: 'linear', y: 'linear' },
        curves,
        facts: {},
    };
    applyTextLabels(classification, labels);

    getLogger('classify').debug(
        {
            xPoints: axisPoints.x.length,
            yPoints: axisPoints.y.length,
            scaleBars: Object.keys(scaleBars),
            curves: curves.map((c) => c.name),
        },
        'Classified plot elements'
    );

    return classification;
}

function readLabels(document: PlotDocument): ParsedText[] {
    const out: ParsedText[] = [];
    for (const text of document.find({ kind: 'text' })) {
        const result = parseLabel(text.content);
        if (result.status === 'failed') {
            throw new DigitizerError('UnparsableLabel', `Cannot parse label "${text.content}": ${result.reason}`, {
                text: text.content,
                key: result.key,
                uid: text.uid,
            });
        }
        if (result.status === 'parsed') out.push({ text, label: result.label });
    }
    return out;
}

/**
 * Find the element a label points at. When the label sits in a group that
 * holds drawable candidates, only that group's anchors are considered.
 */
function associate(
    document: PlotDocument,
    index: SpatialIndex<null>,
    text: TextElement,
    tolerance: number,
    consumed: Set<number>,
    curveIds: Set<number>
): Anchor {
    let accept: ((entry: IndexEntry<null>) => boolean) | undefined;

    if (text.parent !== null && text.parent !== document.root.uid) {
        const scope = new Set<number>();
        for (const element of document.find({ within: text.parent })) {
            if ((element.kind === 'path' && !curveIds.has(element.uid)) || element.kind === 'marker') {
                scope.add(element.uid);
            }
        }
        if (scope.size > 0) accept = (entry) => scope.has(entry.owner);
    }

    const result = index.nearest(text.position, tolerance, accept);
    if (result.kind === 'none') {
        throw new DigitizerError(
            'UnassociatedLabel',
            `No marker within ${tolerance}px of label "${text.content}"`,
            { text: text.content, position: text.position, tolerance }
        );
    }
    if (result.kind === 'tie') {
        throw new DigitizerError(
            'UnassociatedLabel',
            `Label "${text.content}" is equally close to ${result.entries.length} elements`,
            { text: text.content, candidates: result.entries.map((e) => e.owner), distance: result.distance }
        );
    }

    const owner = result.entry.owner;
    if (consumed.has(owner)) {
        throw new DigitizerError(
            'UnassociatedLabel',
            `Label "${text.content}" points at an element already claimed by another label`,
            { text: text.content, anchor: owner }
        );
    }

    const element = document.get(owner);
    if (!element || (element.kind !== 'path' && element.kind !== 'marker')) {
        throw new DigitizerError('UnassociatedLabel', `Label "${text.content}" has no drawable anchor`, {
            text: text.content,
        });
    }

    consumed.add(owner);
    return element;
}

/**
 * The position a reference label marks: a marker's center, or the end of
 * the leader path farther from the label.
 */
function markedPoint(anchor: Anchor, text: TextElement): Point {
    if (anchor.kind === 'marker') return anchor.center;

    const first = anchor.points[0];
    const last = anchor.points[anchor.points.length - 1];
    if (!first || !last) {
        throw new DigitizerError('UnassociatedLabel', `Label "${text.content}" points at an empty path`);
    }
    if (first.x === last.x && first.y === last.y) return first;

    const toFirst = distance(text.position, first);
    const toLast = distance(text.position, last);
    if (toFirst === toLast) {
        throw new DigitizerError(
            'UnassociatedLabel',
            `Label "${text.content}" is equidistant from both ends of its marker`,
            { text: text.content, anchor: anchor.uid }
        );
    }
    return toFirst > toLast ? first : last;
}

function applyTextLabels(classification: Classification, labels: ParsedText[]): void {
    const facts: FigureFacts = classification.facts;
    const comments: string[] = [];
    const scalesSeen = new Set<Axis>();

    for (const { text, label } of labels) {
        switch (label.type) {
            case 'scaleFactor':
                if (classification.scaleFactors[label.axis] !== undefined) {
                    throw labelError(text, `duplicate scaling factor for the ${label.axis} axis`);
                }
                classification.scaleFactors[label.axis] = label.value;
                break;
            case 'scale':
                if (scalesSeen.has(label.axis)) {
                    throw labelError(text, `duplicate scale for the ${label.axis} axis`);
                }
                scalesSeen.add(label.axis);
                classification.scales[label.axis] = label.scale;
                break;
            case 'scanRate':
                if (facts.scanRate) throw labelError(text, 'duplicate scan rate');
                facts.scanRate = { value: label.value, unit: normalizeUnit(label.unit) };
                break;
            case 'fact':
                if (label.key === 'comment') comments.push(label.text);
                else facts[label.key] = label.text;
                break;
            case 'tags':
                facts.tags = [...(facts.tags ?? []), ...label.tags];
                break;
            default:
                break;
        }
    }

    if (comments.length > 0) facts.comment = comments.join('\n');
}

function labelError(text: TextElement, reason: string): DigitizerError {
    return new DigitizerError('UnparsableLabel', `Cannot use label "${text.content}": ${reason}`, {
        text: text.content,
        uid: text.uid,
    });
}

/**
 * Collapse whitespace in a unit as written in a label.
 */
export function normalizeUnit(unit: string): string {
    return unit.replace(/\s+/g, ' ').trim();
}

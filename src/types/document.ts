import type { Point } from './geometry.js';

/**
 * Element kinds exposed by the SVG document model.
 * `<line>`, `<polyline>` and `<polygon>` are normalized into paths;
 * `<circle>` and `<ellipse>` become markers.
 */
export type ElementKind = 'path' | 'text' | 'group' | 'marker';

interface ElementBase {
    /** Document-order index, unique within a document */
    uid: number;

    /** Original tag name (local name, without namespace prefix) */
    tag: string;

    /** Value of the `id` attribute */
    id: string | null;

    /** Value of the `inkscape:label` attribute */
    label: string | null;

    /** uid of the enclosing group, null for the root */
    parent: number | null;

    /** Presentation attributes and inline `style` declarations */
    style: Readonly<Record<string, string>>;
}

export interface PathElement extends ElementBase {
    kind: 'path';
    /** Flattened absolute points in drawing order, across all subpaths */
    points: readonly Point[];
    /** The same points split at every move-to */
    subpaths: readonly (readonly Point[])[];
}

export interface TextElement extends ElementBase {
    kind: 'text';
    /** Text content with whitespace collapsed, including nested tspans */
    content: string;
    /** Text anchor position in document coordinates */
    position: Point;
}

export interface GroupElement extends ElementBase {
    kind: 'group';
    children: readonly number[];
}

export interface MarkerElement extends ElementBase {
    kind: 'marker';
    center: Point;
}

export type PlotElement = PathElement | TextElement | GroupElement | MarkerElement;

/**
 * Maps each element kind to its element type.
 */
export interface ElementByKind {
    path: PathElement;
    text: TextElement;
    group: GroupElement;
    marker: MarkerElement;
}

/**
 * Selection criteria for `PlotDocument.find()`. All given criteria must match.
 */
export interface FindCriteria<K extends ElementKind = ElementKind> {
    kind?: K;
    /** Matched against the `id` attribute or the Inkscape label */
    id?: string | RegExp;
    /** Spatial proximity (texts by position, markers by center, paths by any vertex) */
    near?: { point: Point; radius: number };
    /** Restrict to descendants of this group */
    within?: number;
}

/**
 * Parsed SVG document. Immutable once parsed.
 */
export interface PlotDocument {
    readonly root: GroupElement;
    readonly elements: readonly PlotElement[];
    /** Document width and height as declared (viewBox preferred) */
    readonly size: { width: number; height: number } | null;
    get(uid: number): PlotElement | undefined;
    find<K extends ElementKind = ElementKind>(criteria?: FindCriteria<K>): Iterable<ElementByKind[K]>;
}

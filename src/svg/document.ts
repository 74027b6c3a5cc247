import { DOMParser } from '@xmldom/xmldom';
import type {
    ElementByKind,
    ElementKind,
    FindCriteria,
    GroupElement,
    Matrix,
    PlotDocument,
    PlotElement,
    Point,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { IDENTITY, applyMatrix, distance, multiply, parseTransform } from '../geometry/matrix.js';
import { DigitizerError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { flattenPathData } from './path.js';

/**
 * Containers whose content is never drawn directly.
 */
const NON_DRAWABLE = new Set([
    'defs',
    'clipPath',
    'mask',
    'pattern',
    'symbol',
    'marker',
    'metadata',
    'style',
    'script',
    'title',
    'desc',
    'linearGradient',
    'radialGradient',
    'filter',
    'namedview',
]);

const GROUP_TAGS = new Set(['svg', 'g', 'a', 'switch']);

const PRESENTATION_ATTRIBUTES = [
    'fill',
    'stroke',
    'stroke-width',
    'stroke-dasharray',
    'opacity',
    'display',
    'visibility',
    'marker-start',
    'marker-mid',
    'marker-end',
] as const;

export interface ParseOptions {
    /** Maximum chord error (document px) when flattening curves */
    chordTolerance?: number;
}

function isElement(node: Node): node is Element {
    return node.nodeType === 1;
}

function childElements(element: Element): Element[] {
    const out: Element[] = [];
    const nodes = element.childNodes;
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes.item(i);
        if (node && isElement(node)) out.push(node);
    }
    return out;
}

/**
 * Character data before or after the root element. The DOM parser drops
 * such text silently, so it is looked for in the source.
 */
function strayText(text: string): string | null {
    const head = text.replace(/^\uFEFF/, '').trimStart();
    if (head && !head.startsWith('<')) return head.slice(0, 40);

    let tail = text.trimEnd();
    while (tail.endsWith('-->') || tail.endsWith('?>')) {
        const open = tail.endsWith('-->') ? tail.lastIndexOf('<!--') : tail.lastIndexOf('<?');
        if (open < 0) break;
        tail = tail.slice(0, open).trimEnd();
    }
    if (tail && !tail.endsWith('>')) {
        return tail.slice(tail.lastIndexOf('>') + 1).trim().slice(0, 40);
    }
    return null;
}

function localName(element: Element): string {
    const name = element.localName || element.tagName;
    const colon = name.indexOf(':');
    return colon >= 0 ? name.slice(colon + 1) : name;
}

function attr(element: Element, name: string): string | null {
    return element.hasAttribute(name) ? element.getAttribute(name) : null;
}

/**
 * First number of a length or length-list attribute ("12px", "10 20 30").
 */
function numberAttr(element: Element, name: string, fallback = 0): number {
    const raw = attr(element, name);
    if (raw === null) return fallback;
    const value = parseFloat(raw.trim().split(/[\s,]+/)[0] ?? '');
    return Number.isFinite(value) ? value : fallback;
}

function parseStyle(element: Element): Record<string, string> {
    const style: Record<string, string> = {};
    for (const name of PRESENTATION_ATTRIBUTES) {
        const value = attr(element, name);
        if (value !== null) style[name] = value;
    }
    const inline = attr(element, 'style');
    if (inline) {
        for (const declaration of inline.split(';')) {
            const colon = declaration.indexOf(':');
            if (colon <= 0) continue;
            style[declaration.slice(0, colon).trim()] = declaration.slice(colon + 1).trim();
        }
    }
    return style;
}

/**
 * Text content with nested tspans separated by a space, whitespace collapsed.
 */
function collectText(element: Element): string {
    const parts: string[] = [];
    const nodes = element.childNodes;
    for (let i = 0; i < nodes.length; i++) {
        const node = nodes.item(i);
        if (!node) continue;
        if (node.nodeType === 3 || node.nodeType === 4) {
            parts.push(node.nodeValue ?? '');
        } else if (isElement(node) && localName(node) === 'tspan') {
            parts.push(' ', collectText(node), ' ');
        }
    }
    return parts.join('').replace(/\s+/g, ' ').trim();
}

/**
 * Anchor of a text element: its own x/y, or those of its first positioned tspan.
 */
function textAnchor(element: Element): Point {
    if (element.hasAttribute('x') || element.hasAttribute('y')) {
        return { x: numberAttr(element, 'x'), y: numberAttr(element, 'y') };
    }
    for (const child of childElements(element)) {
        if (localName(child) === 'tspan' && (child.hasAttribute('x') || child.hasAttribute('y'))) {
            return { x: numberAttr(child, 'x'), y: numberAttr(child, 'y') };
        }
    }
    return { x: 0, y: 0 };
}

function parsePointList(raw: string | null): Point[] | null {
    if (raw === null) return [];
    const numbers = raw.trim().split(/[\s,]+/).filter(Boolean).map(Number);
    if (numbers.length % 2 !== 0 || numbers.some((n) => !Number.isFinite(n))) return null;

    const points: Point[] = [];
    for (let i = 0; i + 1 < numbers.length; i += 2) {
        points.push({ x: numbers[i] ?? 0, y: numbers[i + 1] ?? 0 });
    }
    return points;
}

function decode(source: string | Uint8Array): string {
    if (typeof source === 'string') return source;
    try {
        return new TextDecoder('utf-8', { fatal: true }).decode(source);
    } catch (error) {
        throw new DigitizerError('MalformedDocument', 'Input is not valid UTF-8 text', undefined, { cause: error });
    }
}

/**
 * Parse an SVG document into typed plot elements.
 *
 * Throws `MalformedDocument` when the markup is not well-formed, the root
 * is not `<svg>`, or a transform, points list or path data cannot be read.
 * No partially parsed document is ever returned.
 */
export function parseDocument(source: string | Uint8Array, options: ParseOptions = {}): PlotDocument {
    const chordTolerance = options.chordTolerance ?? DEFAULT_CONFIG.chordTolerance;
    if (!(chordTolerance > 0)) {
        throw new RangeError(`chordTolerance must be positive, got ${chordTolerance}`);
    }

    const text = decode(source);
    const problems: string[] = [];
    let xml: Document;
    try {
        const parser = new DOMParser({
            errorHandler: (level: string, message: unknown) => {
                problems.push(`${level}: ${String(message)}`);
            },
        });
        xml = parser.parseFromString(text, 'image/svg+xml');
    } catch (error) {
        throw new DigitizerError('MalformedDocument', 'Input is not well-formed XML', { problems }, { cause: error });
    }

    if (problems.length > 0) {
        throw new DigitizerError('MalformedDocument', `Input is not well-formed XML: ${problems[0]}`, { problems });
    }

    const svg = xml.documentElement;
    if (!svg || localName(svg) !== 'svg') {
        throw new DigitizerError('MalformedDocument', 'Document root is not an <svg> element', {
            root: svg ? svg.tagName : null,
        });
    }

    const stray = strayText(text);
    if (stray !== null) {
        throw new DigitizerError('MalformedDocument', 'Input has text outside the root element', {
            text: stray,
        });
    }

    const elements: PlotElement[] = [];

    const fail = (element: Element, what: string, cause?: unknown): never => {
        throw new DigitizerError(
            'MalformedDocument',
            `Invalid ${what} on <${localName(element)}>${element.getAttribute('id') ? ` #${element.getAttribute('id')}` : ''}`,
            { tag: localName(element), id: attr(element, 'id') },
            { cause }
        );
    };

    const visit = (element: Element, parent: GroupElement | null, parentMatrix: Matrix): void => {
        const tag = localName(element);
        if (NON_DRAWABLE.has(tag)) return;

        const local = parseTransform(attr(element, 'transform'));
        if (!local) fail(element, 'transform');
        const matrix = multiply(parentMatrix, local ?? IDENTITY);

        const base = {
            uid: elements.length,
            tag,
            id: attr(element, 'id'),
            label: attr(element, 'inkscape:label'),
            parent: parent ? parent.uid : null,
            style: parseStyle(element),
        };

        let created: PlotElement | null = null;

        if (GROUP_TAGS.has(tag)) {
            const group: GroupElement = { ...base, kind: 'group', children: [] };
            elements.push(group);
            const children: number[] = [];
            for (const child of childElements(element)) {
                const before = elements.length;
                visit(child, group, matrix);
                if (elements.length > before) children.push(before);
            }
            elements[group.uid] = Object.freeze({ ...group, children: Object.freeze(children) });
            return;
        }

        switch (tag) {
            case 'path': {
                const d = attr(element, 'd');
                if (!d || !d.trim()) return;
                let subpaths: Point[][] = [];
                try {
                    subpaths = flattenPathData(d, matrix, chordTolerance);
                } catch (error) {
                    if (error instanceof DigitizerError) throw error;
                    fail(element, 'path data', error);
                }
                created = { ...base, kind: 'path', subpaths, points: subpaths.flat() };
                break;
            }
            case 'line': {
                const ends = [
                    { x: numberAttr(element, 'x1'), y: numberAttr(element, 'y1') },
                    { x: numberAttr(element, 'x2'), y: numberAttr(element, 'y2') },
                ].map((p) => applyMatrix(matrix, p));
                created = { ...base, kind: 'path', subpaths: [ends], points: ends };
                break;
            }
            case 'polyline':
            case 'polygon': {
                const list = parsePointList(attr(element, 'points'));
                if (!list) return fail(element, 'points list');
                const points = list.map((p) => applyMatrix(matrix, p));
                const first = points[0];
                if (tag === 'polygon' && first && points.length > 1) points.push(first);
                created = { ...base, kind: 'path', subpaths: [points], points };
                break;
            }
            case 'circle':
            case 'ellipse': {
                const center = applyMatrix(matrix, { x: numberAttr(element, 'cx'), y: numberAttr(element, 'cy') });
                created = { ...base, kind: 'marker', center };
                break;
            }
            case 'text': {
                const position = applyMatrix(matrix, textAnchor(element));
                created = { ...base, kind: 'text', content: collectText(element), position };
                break;
            }
            default:
                return;
        }

        if (created) elements.push(Object.freeze(created));
    };

    visit(svg, null, IDENTITY);

    const root = elements[0];
    if (!root || root.kind !== 'group') {
        throw new DigitizerError('MalformedDocument', 'Document root could not be read');
    }

    getLogger('parse').debug(
        {
            elements: elements.length,
            paths: elements.filter((e) => e.kind === 'path').length,
            texts: elements.filter((e) => e.kind === 'text').length,
        },
        'Parsed SVG document'
    );

    return createDocument(root, Object.freeze(elements), documentSize(svg));
}

function documentSize(svg: Element): { width: number; height: number } | null {
    const viewBox = parsePointList(attr(svg, 'viewBox'));
    if (viewBox && viewBox.length === 2 && viewBox[1]) {
        return { width: viewBox[1].x, height: viewBox[1].y };
    }
    const width = numberAttr(svg, 'width', NaN);
    const height = numberAttr(svg, 'height', NaN);
    return Number.isFinite(width) && Number.isFinite(height) ? { width, height } : null;
}

function matches<K extends ElementKind>(
    element: PlotElement,
    criteria: FindCriteria<K>,
    isWithin: (uid: number, group: number) => boolean
): element is ElementByKind[K] {
    if (criteria.kind !== undefined && element.kind !== criteria.kind) return false;

    if (criteria.id !== undefined) {
        const pattern = criteria.id;
        const test = (value: string | null): boolean =>
            value !== null && (typeof pattern === 'string' ? value === pattern : pattern.test(value));
        if (!test(element.id) && !test(element.label)) return false;
    }

    if (criteria.within !== undefined && !isWithin(element.uid, criteria.within)) return false;

    if (criteria.near) {
        const { point, radius } = criteria.near;
        switch (element.kind) {
            case 'text':
                return distance(element.position, point) <= radius;
            case 'marker':
                return distance(element.center, point) <= radius;
            case 'path':
                return element.points.some((p) => distance(p, point) <= radius);
            case 'group':
                return false;
        }
    }

    return true;
}

function createDocument(
    root: GroupElement,
    elements: readonly PlotElement[],
    size: { width: number; height: number } | null
): PlotDocument {
    const get = (uid: number): PlotElement | undefined => elements[uid];

    const isWithin = (uid: number, group: number): boolean => {
        let parent = get(uid)?.parent ?? null;
        while (parent !== null) {
            if (parent === group) return true;
            parent = get(parent)?.parent ?? null;
        }
        return false;
    };

    function* find<K extends ElementKind = ElementKind>(
        criteria: FindCriteria<K> = {}
    ): Generator<ElementByKind[K]> {
        for (const element of elements) {
            if (matches(element, criteria, isWithin)) yield element;
        }
    }

    return Object.freeze({ root, elements, size, get, find });
}

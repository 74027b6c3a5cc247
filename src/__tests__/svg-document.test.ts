import { describe, it, expect } from 'vitest';
import { parseDocument } from '../svg/document.js';
import { isDigitizerError } from '../utils/errors.js';
import type { PlotElement } from '../types/index.js';
import { svgDocument } from './helpers/svg.js';

function onlyElement(source: string, id: string): PlotElement {
    const [element, ...rest] = parseDocument(source).find({ id });
    if (!element || rest.length > 0) throw new Error(`expected exactly one element #${id}`);
    return element;
}

function expectMalformed(source: string | Uint8Array): void {
    let caught: unknown;
    try {
        parseDocument(source);
    } catch (error) {
        caught = error;
    }
    expect(isDigitizerError(caught, 'MalformedDocument')).toBe(true);
}

describe('parseDocument', () => {
    describe('elements', () => {
        it('should read the root as a group with uid 0', () => {
            const document = parseDocument(svgDocument('<path d="M 0 0 L 1 1"/>'));
            expect(document.root.uid).toBe(0);
            expect(document.root.kind).toBe('group');
            expect(document.root.children).toEqual([1]);
        });

        it('should flatten absolute and relative path commands', () => {
            const path = onlyElement(svgDocument('<path id="p" d="m 10 10 l 5 0 h 5 v 5 z"/>'), 'p');
            expect(path.kind).toBe('path');
            if (path.kind !== 'path') return;
            expect(path.points).toEqual([
                { x: 10, y: 10 },
                { x: 15, y: 10 },
                { x: 20, y: 10 },
                { x: 20, y: 15 },
                { x: 10, y: 10 },
            ]);
        });

        it('should split subpaths at move-to commands', () => {
            const path = onlyElement(svgDocument('<path id="p" d="M 0 0 L 1 0 M 5 5 L 6 5"/>'), 'p');
            if (path.kind !== 'path') throw new Error('not a path');
            expect(path.subpaths).toEqual([
                [{ x: 0, y: 0 }, { x: 1, y: 0 }],
                [{ x: 5, y: 5 }, { x: 6, y: 5 }],
            ]);
            expect(path.points).toHaveLength(4);
        });

        it('should keep a straight cubic as a single segment', () => {
            const path = onlyElement(svgDocument('<path id="p" d="M 0 0 C 0 0 10 0 10 0"/>'), 'p');
            if (path.kind !== 'path') throw new Error('not a path');
            expect(path.points).toEqual([{ x: 0, y: 0 }, { x: 10, y: 0 }]);
        });

        it('should reflect the previous control point of a smooth cubic', () => {
            const path = onlyElement(svgDocument('<path id="p" d="M 0 0 C 0 10 10 10 10 0 s 10 -10 10 0"/>'), 'p');
            if (path.kind !== 'path') throw new Error('not a path');
            expect(path.points).toContainEqual({ x: 5, y: 7.5 });
            expect(path.points).toContainEqual({ x: 15, y: -7.5 });
            expect(path.points[path.points.length - 1]).toEqual({ x: 20, y: 0 });
        });

        it('should reflect the previous control point of a smooth quadratic', () => {
            const path = onlyElement(svgDocument('<path id="p" d="M 0 0 Q 5 10 10 0 t 10 0"/>'), 'p');
            if (path.kind !== 'path') throw new Error('not a path');
            const near = (x: number, y: number): boolean =>
                path.points.some((point) => Math.abs(point.x - x) < 1e-9 && Math.abs(point.y - y) < 1e-9);
            expect(near(5, 5)).toBe(true);
            expect(near(15, -5)).toBe(true);
        });

        it('should flatten arcs within the chord tolerance', () => {
            const path = onlyElement(svgDocument('<path id="arc" d="M 0 0 A 10 10 0 0 1 20 0"/>'), 'arc');
            if (path.kind !== 'path') throw new Error('not a path');
            expect(path.points).toHaveLength(13);
            for (const point of path.points) {
                expect(Math.hypot(point.x - 10, point.y)).toBeCloseTo(10, 9);
            }
            expect(path.points[12]).toEqual({ x: 20, y: 0 });
        });

        it('should normalise line, polyline and polygon into paths', () => {
            const source = svgDocument(
                '<line id="l" x1="1" y1="2" x2="3" y2="4"/>' +
                    '<polyline id="pl" points="0,0 5,0 5,5"/>' +
                    '<polygon id="pg" points="0 0 4 0 4 4"/>'
            );
            const line = onlyElement(source, 'l');
            const polyline = onlyElement(source, 'pl');
            const polygon = onlyElement(source, 'pg');
            if (line.kind !== 'path' || polyline.kind !== 'path' || polygon.kind !== 'path') {
                throw new Error('expected paths');
            }
            expect(line.points).toEqual([{ x: 1, y: 2 }, { x: 3, y: 4 }]);
            expect(polyline.points).toHaveLength(3);
            expect(polygon.points).toEqual([
                { x: 0, y: 0 },
                { x: 4, y: 0 },
                { x: 4, y: 4 },
                { x: 0, y: 0 },
            ]);
        });

        it('should join tspans and collapse whitespace in text', () => {
            const text = onlyElement(
                svgDocument('<text id="t" x="5" y="6">x1:   <tspan>0</tspan>\n mV</text>'),
                't'
            );
            if (text.kind !== 'text') throw new Error('not a text');
            expect(text.content).toBe('x1: 0 mV');
            expect(text.position).toEqual({ x: 5, y: 6 });
        });

        it('should position text at its first positioned tspan', () => {
            const text = onlyElement(svgDocument('<text id="t"><tspan x="7" y="8">comment: hi</tspan></text>'), 't');
            if (text.kind !== 'text') throw new Error('not a text');
            expect(text.position).toEqual({ x: 7, y: 8 });
        });

        it('should read circles as markers', () => {
            const marker = onlyElement(svgDocument('<circle id="c" cx="3" cy="4" r="1"/>'), 'c');
            expect(marker).toMatchObject({ kind: 'marker', center: { x: 3, y: 4 } });
        });

        it('should read presentation attributes and inline style', () => {
            const path = onlyElement(
                svgDocument('<path id="p" d="M 0 0 L 1 1" stroke="red" style="stroke-width: 2; fill:none"/>'),
                'p'
            );
            expect(path.style).toEqual({ stroke: 'red', 'stroke-width': '2', fill: 'none' });
        });

        it('should read Inkscape labels', () => {
            const path = onlyElement(svgDocument('<path id="p" inkscape:label="curve: blue" d="M 0 0 L 1 1"/>'), 'p');
            expect(path.label).toBe('curve: blue');
        });

        it('should skip non-drawable containers', () => {
            const document = parseDocument(
                svgDocument('<defs><path id="hidden" d="M 0 0 L 1 1"/></defs><path id="shown" d="M 0 0 L 1 1"/>')
            );
            expect([...document.find({ id: 'hidden' })]).toHaveLength(0);
            expect([...document.find({ id: 'shown' })]).toHaveLength(1);
        });

        it('should freeze parsed elements', () => {
            const document = parseDocument(svgDocument('<g><path d="M 0 0 L 1 1"/></g>'));
            expect(Object.isFrozen(document.elements)).toBe(true);
            for (const element of document.elements) {
                expect(Object.isFrozen(element)).toBe(true);
            }
        });
    });

    describe('transforms', () => {
        it('should compose group and element transforms', () => {
            const marker = onlyElement(
                svgDocument('<g transform="translate(10,20)"><circle id="c" cx="1" cy="2" r="1" transform="scale(2)"/></g>'),
                'c'
            );
            if (marker.kind !== 'marker') throw new Error('not a marker');
            expect(marker.center).toEqual({ x: 12, y: 24 });
        });

        it('should transform path points into document space', () => {
            const path = onlyElement(svgDocument('<path id="p" transform="translate(5 5)" d="M 0 0 L 10 0"/>'), 'p');
            if (path.kind !== 'path') throw new Error('not a path');
            expect(path.points).toEqual([{ x: 5, y: 5 }, { x: 15, y: 5 }]);
        });
    });

    describe('size', () => {
        it('should take the size from the viewBox', () => {
            expect(parseDocument(svgDocument('', 'viewBox="0 0 300 150" width="10" height="10"')).size).toEqual({
                width: 300,
                height: 150,
            });
        });

        it('should fall back to width and height', () => {
            expect(parseDocument(svgDocument('', 'width="40px" height="30"')).size).toEqual({ width: 40, height: 30 });
        });

        it('should be null without either', () => {
            expect(parseDocument(svgDocument('', '')).size).toBeNull();
        });
    });

    describe('find', () => {
        const source = svgDocument(
            '<g id="group"><path id="a" d="M 0 0 L 10 0"/><text id="label-a" x="12" y="0">x1: 0</text></g>' +
                '<path id="b" d="M 100 100 L 110 100"/>'
        );

        it('should filter by kind', () => {
            const document = parseDocument(source);
            expect([...document.find({ kind: 'path' })].map((e) => e.id)).toEqual(['a', 'b']);
        });

        it('should match ids with a regular expression', () => {
            const document = parseDocument(source);
            expect([...document.find({ id: /^label/ })].map((e) => e.id)).toEqual(['label-a']);
        });

        it('should find elements near a point', () => {
            const document = parseDocument(source);
            const near = [...document.find({ near: { point: { x: 101, y: 101 }, radius: 2 } })];
            expect(near.map((e) => e.id)).toEqual(['b']);
        });

        it('should find descendants of a group', () => {
            const document = parseDocument(source);
            const [group] = document.find({ id: 'group' });
            if (!group) throw new Error('group not found');
            expect([...document.find({ within: group.uid })].map((e) => e.id)).toEqual(['a', 'label-a']);
        });

        it('should be lazy', () => {
            const document = parseDocument(source);
            const iterator = document.find({ kind: 'path' })[Symbol.iterator]();
            const first = iterator.next();
            expect(first.done).toBe(false);
            expect(first.value).toMatchObject({ id: 'a' });
        });
    });

    describe('malformed input', () => {
        it('should reject markup that is not well-formed', () => {
            expectMalformed('<svg xmlns="http://www.w3.org/2000/svg"><g></svg>');
        });

        it('should reject text after the root element', () => {
            expectMalformed('<svg xmlns="http://www.w3.org/2000/svg"></svg>garbage');
            expect(parseDocument('<svg xmlns="http://www.w3.org/2000/svg"></svg>\n').elements).toHaveLength(1);
        });

        it('should reject a root other than svg', () => {
            expectMalformed('<html><body/></html>');
        });

        it('should reject bytes that are not UTF-8', () => {
            expectMalformed(new Uint8Array([0x3c, 0x73, 0xff, 0xfe]));
        });

        it('should reject unsupported transforms', () => {
            expectMalformed(svgDocument('<g transform="perspective(2)"><path d="M 0 0 L 1 1"/></g>'));
        });

        it('should reject broken path data', () => {
            expectMalformed(svgDocument('<path d="M 10 L 20 20"/>'));
        });

        it('should reject an odd points list', () => {
            expectMalformed(svgDocument('<polyline points="0 0 1"/>'));
        });
    });
});

import { writeFileSync } from 'node:fs';
import type { TableView } from '../table/data-table.js';
import { getLogger } from '../utils/logger.js';

export interface PlotOptions {
    /** Column on the horizontal axis */
    x: string;
    /** Column on the vertical axis */
    y: string;
    /** Axis captions; default to the column names */
    xLabel?: string;
    yLabel?: string;
    title?: string;
    width?: number;
    height?: number;
}

const MARGIN = { top: 40, right: 20, bottom: 50, left: 70 };
const TICK_COUNT = 5;

interface Domain {
    min: number;
    max: number;
}

function escapeXml(text: string): string {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/** Round away floating-point noise for display. */
function formatNumber(value: number): string {
    return String(Number(value.toPrecision(12)));
}

function coordinate(value: number): string {
    return String(Number(value.toFixed(2)));
}

function domainOf(values: readonly number[]): Domain {
    const finite = values.filter(Number.isFinite);
    if (finite.length === 0) return { min: 0, max: 1 };
    const min = Math.min(...finite);
    const max = Math.max(...finite);
    if (min === max) {
        const pad = min === 0 ? 1 : Math.abs(min) / 2;
        return { min: min - pad, max: max + pad };
    }
    return { min, max };
}

/**
 * Tick values at 1, 2 or 5 × 10ⁿ steps inside the domain.
 */
export function niceTicks(domain: Domain, count = TICK_COUNT): number[] {
    const rough = (domain.max - domain.min) / count;
    const magnitude = 10 ** Math.floor(Math.log10(rough));
    const residual = rough / magnitude;
    const step = (residual >= 5 ? 10 : residual >= 2 ? 5 : residual >= 1 ? 2 : 1) * magnitude;

    const ticks: number[] = [];
    const epsilon = step * 1e-9;
    for (let tick = Math.ceil(domain.min / step) * step; tick <= domain.max + epsilon; tick += step) {
        ticks.push(Number(tick.toPrecision(12)));
    }
    return ticks;
}

/**
 * Render one column against another as a self-contained SVG line plot
 * with a frame, ticks and axis labels.
 */
export function renderPlot(table: TableView, options: PlotOptions): string {
    for (const column of [options.x, options.y]) {
        if (!table.columns.includes(column)) {
            throw new RangeError(`Unknown column "${column}"; table has [${table.columns.join(', ')}]`);
        }
    }

    const width = options.width ?? 640;
    const height = options.height ?? 480;
    const plotWidth = width - MARGIN.left - MARGIN.right;
    const plotHeight = height - MARGIN.top - MARGIN.bottom;

    const xs = table.rows.map((row) => row[options.x] ?? Number.NaN);
    const ys = table.rows.map((row) => row[options.y] ?? Number.NaN);
    const xDomain = domainOf(xs);
    const yDomain = domainOf(ys);

    const px = (value: number) => MARGIN.left + ((value - xDomain.min) / (xDomain.max - xDomain.min)) * plotWidth;
    const py = (value: number) =>
        MARGIN.top + plotHeight - ((value - yDomain.min) / (yDomain.max - yDomain.min)) * plotHeight;

    const bottom = MARGIN.top + plotHeight;
    const right = MARGIN.left + plotWidth;
    const parts: string[] = [
        `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
        `<rect x="0" y="0" width="${width}" height="${height}" fill="white"/>`,
        `<rect x="${MARGIN.left}" y="${MARGIN.top}" width="${plotWidth}" height="${plotHeight}" fill="none" stroke="black"/>`,
    ];

    for (const tick of niceTicks(xDomain)) {
        const x = coordinate(px(tick));
        parts.push(`<line x1="${x}" y1="${bottom}" x2="${x}" y2="${bottom + 5}" stroke="black"/>`);
        parts.push(`<text x="${x}" y="${bottom + 18}" text-anchor="middle" font-size="11">${formatNumber(tick)}</text>`);
    }
    for (const tick of niceTicks(yDomain)) {
        const y = coordinate(py(tick));
        parts.push(`<line x1="${MARGIN.left - 5}" y1="${y}" x2="${MARGIN.left}" y2="${y}" stroke="black"/>`);
        parts.push(
            `<text x="${MARGIN.left - 8}" y="${y}" text-anchor="end" dominant-baseline="middle" font-size="11">${formatNumber(tick)}</text>`
        );
    }

    parts.push(
        `<text x="${coordinate((MARGIN.left + right) / 2)}" y="${height - 10}" text-anchor="middle" font-size="13">${escapeXml(options.xLabel ?? options.x)}</text>`,
        `<text x="16" y="${coordinate((MARGIN.top + bottom) / 2)}" text-anchor="middle" font-size="13" transform="rotate(-90 16 ${coordinate((MARGIN.top + bottom) / 2)})">${escapeXml(options.yLabel ?? options.y)}</text>`
    );
    if (options.title) {
        parts.push(
            `<text x="${coordinate(width / 2)}" y="24" text-anchor="middle" font-size="15">${escapeXml(options.title)}</text>`
        );
    }

    const points = table.rows
        .map((_, i) => [xs[i] ?? Number.NaN, ys[i] ?? Number.NaN] as const)
        .filter(([x, y]) => Number.isFinite(x) && Number.isFinite(y))
        .map(([x, y]) => `${coordinate(px(x))},${coordinate(py(y))}`);
    if (points.length > 0) {
        parts.push(`<polyline points="${points.join(' ')}" fill="none" stroke="#1f77b4" stroke-width="1.5"/>`);
    }

    parts.push('</svg>');
    return parts.join('\n') + '\n';
}

export function writePlot(outputPath: string, table: TableView, options: PlotOptions): void {
    writeFileSync(outputPath, renderPlot(table, options), 'utf-8');
    getLogger('export').info(
        { outputPath, rows: table.rows.length, x: options.x, y: options.y },
        'Plot written'
    );
}

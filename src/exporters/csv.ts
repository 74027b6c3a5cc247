import { writeFileSync } from 'node:fs';
import type { TableView } from '../table/data-table.js';
import { getLogger } from '../utils/logger.js';

function escapeField(field: string): string {
    return /[",\n\r]/.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

/**
 * Serialize a table as CSV: a header in column order, then one line per row.
 * Numbers use the shortest representation that reads back to the same value.
 */
export function toCsv(table: TableView): string {
    let csv = table.columns.map(escapeField).join(',') + '\n';
    for (const row of table.rows) {
        csv += table.columns.map((column) => String(row[column])).join(',') + '\n';
    }
    return csv;
}

export function writeCsv(outputPath: string, table: TableView): void {
    writeFileSync(outputPath, toCsv(table), 'utf-8');
    getLogger('export').info({ outputPath, rows: table.rows.length, columns: table.columns }, 'CSV written');
}

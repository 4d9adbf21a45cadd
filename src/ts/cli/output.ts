/**
 * Plain-text rendering of tables for the terminal.
 */

export type OutputFormat = 'table' | 'json' | 'csv';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'csv'];

export interface TableColumn<T> {
    readonly header: string;
    readonly value: (row: T) => string;
    readonly align?: 'left' | 'right';
}

const MAX_CELL_WIDTH = 48;

function padCell(value: string, width: number, align: 'left' | 'right'): string {
    const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
    return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format rows as a fixed-width table. Cells longer than the column width are
 * cut and marked with `~`.
 */
export function formatTable<T>(rows: readonly T[], columns: readonly TableColumn<T>[]): string {
    if (rows.length === 0) {
        return 'No rows.';
    }

    const cells = rows.map((row) => columns.map((col) => col.value(row).replace(/\s*\n\s*/g, ' ')));
    const widths = columns.map((col, i) =>
        Math.min(MAX_CELL_WIDTH, cells.reduce((width, r) => Math.max(width, r[i].length), col.header.length)),
    );

    const headerRow = columns.map((col, i) => padCell(col.header, widths[i], col.align ?? 'left')).join(' | ');
    const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
    const dataRows = cells.map((r) =>
        r.map((cell, i) => padCell(cell, widths[i], columns[i].align ?? 'left')).join(' | '),
    );

    return [headerRow, separator, ...dataRows].map((line) => line.trimEnd()).join('\n');
}

export function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some((format) => format === value);
}

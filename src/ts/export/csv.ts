import { InvalidFilterError } from '../errors.js';
import { type AttributeRow, type AttributeTable, type CellValue, hasColumn } from '../table/attribute-table.js';

function formatCell(value: CellValue): string {
    if (value === null) return '';
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

function escapeCsv(value: string): string {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

/**
 * Write rows as CSV with a header line. Without `columns` every table column
 * is written, in schema order.
 *
 * @throws InvalidFilterError when a requested column is not in the table
 */
export function toCsv(table: AttributeTable, rows: readonly AttributeRow[], columns?: readonly string[]): string {
    const names = columns ?? table.columns.map((c) => c.name);
    for (const name of names) {
        if (!hasColumn(table, name)) throw new InvalidFilterError(`Unknown column "${name}"`, name);
    }
    const lines = [names.map(escapeCsv).join(',')];
    for (const row of rows) {
        lines.push(names.map((name) => escapeCsv(formatCell(row.values[name] ?? null))).join(','));
    }
    return lines.join('\n') + '\n';
}

import type { ColumnMeta } from './column-meta.js';

/** JSON property value as found in the feature; `null` marks a missing key. */
export type CellValue = string | number | boolean | null | readonly unknown[] | Readonly<Record<string, unknown>>;

export interface CellIssue {
    column: string;
    reason: string;
}

export interface AttributeRow {
    /** Index of this row in the table. */
    position: number;
    /** Index of the originating feature in the raw `features` array. */
    featureIndex: number;
    values: Readonly<Record<string, CellValue>>;
    /** Cells that were degraded to null because their computation failed. */
    issues: readonly CellIssue[];
}

export interface AttributeTable {
    columns: readonly ColumnMeta[];
    rows: readonly AttributeRow[];
    /** `indexMap[position]` is the raw feature index of the row at `position`. */
    indexMap: readonly number[];
    /** Length of the raw `features` array the table was built from. */
    featureCount: number;
}

export function hasColumn(table: AttributeTable, column: string): boolean {
    return table.columns.some((c) => c.name === column);
}

export function columnValues(table: AttributeTable, column: string): CellValue[] {
    return table.rows.map((row) => row.values[column] ?? null);
}

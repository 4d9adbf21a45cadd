import type { FilteredResult } from './filter/filter-spec.js';
import { type AttributeTable, type CellValue, columnValues } from './table/attribute-table.js';
import { type ColumnOrigin, propertyColumns } from './table/column-meta.js';
import { valueKey } from './utils.js';

export type ValueType = 'numeric' | 'boolean' | 'text' | 'object' | 'mixed' | 'empty';

export interface ColumnStats {
    name: string;
    origin: ColumnOrigin;
    type: ValueType;
    /** Distinct non-null values. */
    unique: number;
    /** Null cells, including keys absent from a feature. */
    missing: number;
}

export interface TableSummary {
    totalFeatures: number;
    filteredFeatures: number;
    /** Features left out of the table for lack of a geometry. */
    skippedFeatures: number;
    propertyCount: number;
    columns: ColumnStats[];
}

function typeOf(value: CellValue): ValueType {
    switch (typeof value) {
        case 'number':
            return 'numeric';
        case 'boolean':
            return 'boolean';
        case 'string':
            return 'text';
        default:
            return 'object';
    }
}

function valueType(values: CellValue[]): ValueType {
    const types = new Set(values.map(typeOf));
    if (types.size === 0) return 'empty';
    if (types.size > 1) return 'mixed';
    const [type] = types;
    return type;
}

export function columnStats(table: AttributeTable): ColumnStats[] {
    return table.columns.map(({ name, origin }) => {
        const values = columnValues(table, name);
        const present = values.filter((v) => v !== null);
        return {
            name,
            origin,
            type: valueType(present),
            unique: new Set(present.map(valueKey)).size,
            missing: values.length - present.length,
        };
    });
}

/** Metrics shown beside the table. Without a filter result every row counts as filtered in. */
export function summarize(table: AttributeTable, filtered?: FilteredResult): TableSummary {
    return {
        totalFeatures: table.rows.length,
        filteredFeatures: filtered ? filtered.rows.length : table.rows.length,
        skippedFeatures: table.featureCount - table.rows.length,
        propertyCount: propertyColumns(table.columns).length,
        columns: columnStats(table),
    };
}

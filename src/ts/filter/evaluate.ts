import { InvalidFilterError } from '../errors.js';
import { type AttributeRow, type AttributeTable, type CellValue, hasColumn } from '../table/attribute-table.js';
import { parseDecimal, valueKey } from '../utils.js';
import type { FilteredResult, FilterSpec, FilterSpecs } from './filter-spec.js';

type RowPredicate = (row: AttributeRow) => boolean;

function compile(column: string, spec: FilterSpec): RowPredicate | undefined {
    const cell = (row: AttributeRow): CellValue => row.values[column] ?? null;
    switch (spec.kind) {
        case 'range': {
            const { min, max } = spec;
            return (row) => {
                const num = parseDecimal(cell(row));
                return num !== undefined && num >= min && num <= max;
            };
        }
        case 'set': {
            if (spec.values.length === 0) return;
            const allowed = new Set(spec.values.map(valueKey));
            return (row) => allowed.has(valueKey(cell(row)));
        }
    }
}

/**
 * Reject specs no row could satisfy by construction.
 *
 * @throws InvalidFilterError for a range whose min is not at most its max
 */
export function checkSpec(column: string, spec: FilterSpec): void {
    if (spec.kind === 'range' && !(spec.min <= spec.max)) {
        throw new InvalidFilterError(`Empty range [${spec.min}, ${spec.max}] on "${column}"`, column);
    }
}

/**
 * Select the rows matching every spec. Numeric ranges are inclusive and never
 * match cells that do not parse as numbers; empty categorical selections
 * match everything. Rows keep their table order.
 *
 * @throws InvalidFilterError when a spec names a column the table lacks
 */
export function evaluate(table: AttributeTable, specs: FilterSpecs): FilteredResult {
    const predicates: RowPredicate[] = [];
    for (const [column, spec] of Object.entries(specs)) {
        if (!hasColumn(table, column)) throw new InvalidFilterError(`Unknown column "${column}"`, column);
        checkSpec(column, spec);
        const predicate = compile(column, spec);
        if (predicate) predicates.push(predicate);
    }

    const rows = table.rows.filter((row) => predicates.every((p) => p(row)));
    return { rows, positions: rows.map((row) => row.position) };
}


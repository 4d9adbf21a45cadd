import { DEGENERATE_RANGE_WIDENING, MAX_CATEGORICAL_VALUES, RANGE_DECIMALS } from '../constants.js';
import { InvalidFilterError } from '../errors.js';
import { type AttributeTable, type CellValue, columnValues, hasColumn } from '../table/attribute-table.js';
import { parseDecimal, roundTowards, valueKey } from '../utils.js';
import type { FilterKind, FilterSpec, FilterSpecs } from './filter-spec.js';

export interface FilterOptions {
    /** Categorical columns with more distinct values are not exposed. */
    maxCategoricalValues?: number;
    /** Decimal places numeric bounds are rounded to. */
    rangeDecimals?: number;
    /** Added to the max of a range whose bounds coincide. */
    degenerateRangeWidening?: number;
}

function distinctValues(values: CellValue[]): CellValue[] {
    const seen = new Set<string>();
    const distinct: CellValue[] = [];
    for (const value of values) {
        const key = valueKey(value);
        if (seen.has(key)) continue;
        seen.add(key);
        distinct.push(value);
    }
    return distinct;
}

/**
 * Infer whether a column filters as a numeric range or a categorical set.
 *
 * A column is numeric when every non-null cell parses as a finite decimal.
 * Range bounds are rounded outwards to `rangeDecimals`, and a degenerate range
 * has its max widened, so callers must not rely on the max being an observed
 * value.
 */
export function inferKind(table: AttributeTable, column: string, options: FilterOptions = {}): FilterKind {
    if (!hasColumn(table, column)) throw new InvalidFilterError(`Unknown column "${column}"`, column);
    const maxCategoricalValues = options.maxCategoricalValues ?? MAX_CATEGORICAL_VALUES;
    const decimals = options.rangeDecimals ?? RANGE_DECIMALS;
    const widening = options.degenerateRangeWidening ?? DEGENERATE_RANGE_WIDENING;

    const values = columnValues(table, column).filter((v) => v !== null);
    const numbers = values.map(parseDecimal);

    if (values.length > 0 && numbers.every((n) => n !== undefined)) {
        const parsed = numbers.filter((n): n is number => n !== undefined);
        const min = roundTowards(parsed.reduce((a, b) => Math.min(a, b)), decimals, 'down');
        let max = roundTowards(parsed.reduce((a, b) => Math.max(a, b)), decimals, 'up');
        if (min === max) max += widening;
        return { kind: 'range', min, max };
    }

    const domain = distinctValues(values);
    return {
        kind: 'set',
        values: domain,
        exposed: domain.length > 0 && domain.length <= maxCategoricalValues,
    };
}

/** Filter kinds of every column, in schema order. */
export function inferKinds(table: AttributeTable, options?: FilterOptions): Map<string, FilterKind> {
    return new Map(table.columns.map(({ name }) => [name, inferKind(table, name, options)]));
}

/**
 * The specs a fresh set of selectors starts from: full ranges for numeric
 * columns and empty selections for exposed categorical ones. Evaluating them
 * keeps every row.
 */
export function defaultSpecs(kinds: ReadonlyMap<string, FilterKind>): FilterSpecs {
    const entries: Array<[string, FilterSpec]> = [];
    for (const [column, kind] of kinds) {
        if (kind.kind === 'range') entries.push([column, { kind: 'range', min: kind.min, max: kind.max }]);
        else if (kind.exposed) entries.push([column, { kind: 'set', values: [] }]);
    }
    return Object.fromEntries(entries);
}

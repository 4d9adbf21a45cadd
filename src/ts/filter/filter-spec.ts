import type { AttributeRow, CellValue } from '../table/attribute-table.js';

/** Inclusive numeric bounds. */
export interface NumericRange {
    kind: 'range';
    min: number;
    max: number;
}

/** Allowed values; an empty selection places no constraint. */
export interface CategoricalSet {
    kind: 'set';
    values: readonly CellValue[];
}

export type FilterSpec = NumericRange | CategoricalSet;

/** Specs keyed by column. A column without a spec is unconstrained. */
export type FilterSpecs = Readonly<Record<string, FilterSpec>>;

/** Filter kind inferred for a column, with the domain a selector would offer. */
export type FilterKind = NumericRange | (CategoricalSet & { exposed: boolean });

export interface FilteredResult {
    rows: readonly AttributeRow[];
    /** Table positions of `rows`, ascending. */
    positions: readonly number[];
}

export function range(min: number, max: number): NumericRange {
    return { kind: 'range', min, max };
}

export function set(...values: CellValue[]): CategoricalSet {
    return { kind: 'set', values };
}

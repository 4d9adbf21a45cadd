import { InvalidFilterError } from '../errors.js';
import type { FilterKind, FilterSpec } from '../filter/filter-spec.js';
import Logger from '../logger.js';
import type { CellValue } from '../table/attribute-table.js';
import { parseDecimal, valueKey } from '../utils.js';

/** A `--filter` argument before it is matched against the column it names. */
export type FilterExpression =
    | { column: string; kind: 'range'; min: number; max: number }
    | { column: string; kind: 'set'; values: string[] };

/**
 * Parse `column=min..max` into a range and `column=a,b,c` into a set.
 * `column=` selects nothing, which leaves the column unconstrained.
 */
export function parseFilterExpression(text: string): FilterExpression {
    const eq = text.indexOf('=');
    if (eq <= 0) throw new InvalidFilterError(`Invalid filter "${text}", expected column=min..max or column=a,b`);
    const column = text.slice(0, eq);
    const body = text.slice(eq + 1);

    const dots = body.indexOf('..');
    if (dots >= 0) {
        const min = parseDecimal(body.slice(0, dots));
        const max = parseDecimal(body.slice(dots + 2));
        if (min !== undefined && max !== undefined) return { column, kind: 'range', min, max };
    }

    const values = body.length === 0 ? [] : body.split(',');
    return { column, kind: 'set', values };
}

function formatValue(value: CellValue): string {
    return typeof value === 'object' && value !== null ? JSON.stringify(value) : String(value);
}

/**
 * Resolve typed text to the observed cells it names. On numeric columns a
 * value matches every cell of equal magnitude, so `12` selects both `12` and
 * `"12"`; elsewhere it matches cells by their rendering. Text naming no cell
 * is kept as is and selects nothing.
 */
function resolveValues(inputs: readonly string[], observed: readonly CellValue[], numeric: boolean): CellValue[] {
    const seen = new Set<string>();
    const resolved: CellValue[] = [];
    const add = (value: CellValue) => {
        const key = valueKey(value);
        if (seen.has(key)) return;
        seen.add(key);
        resolved.push(value);
    };
    for (const input of inputs) {
        const target = numeric ? parseDecimal(input) : undefined;
        const matches = observed.filter((value) =>
            target === undefined ? formatValue(value) === input : parseDecimal(value) === target,
        );
        if (matches.length === 0) add(input);
        matches.forEach(add);
    }
    return resolved;
}

/**
 * Turn an expression into a spec for the column's inferred kind. Set values
 * are typed text, so they are resolved against the column's `observed` cells.
 * Returns undefined for columns too diverse to expose a selector.
 */
export function toFilterSpec(
    expression: FilterExpression,
    kind: FilterKind | undefined,
    observed: readonly CellValue[] = [],
): FilterSpec | undefined {
    const { column } = expression;
    if (!kind) throw new InvalidFilterError(`Unknown column "${column}"`, column);

    if (expression.kind === 'range') {
        return { kind: 'range', min: expression.min, max: expression.max };
    }
    if (kind.kind === 'set' && !kind.exposed) {
        Logger.warn(`column "${column}" has ${kind.values.length} distinct values; filter ignored`);
        return;
    }
    const domain = kind.kind === 'set' ? [...kind.values, ...observed] : observed;
    return { kind: 'set', values: resolveValues(expression.values, domain, kind.kind === 'range') };
}

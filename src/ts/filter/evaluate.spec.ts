import { describe, expect, it } from 'vitest';
import { InvalidFilterError } from '../errors.js';
import { readFixture, tableOf } from '../testing/fixtures.js';
import { buildTable } from '../table/builder.js';
import { evaluate } from './evaluate.js';
import { range, set } from './filter-spec.js';

describe('filter evaluation', () => {
    const mixed = tableOf([{ v: 1 }, { v: 2 }, { v: 3 }, { v: '4' }, { v: 'x' }, { v: null }]);

    it('ranges are inclusive and skip non-numeric cells', () => {
        expect(evaluate(mixed, { v: range(2, 4) }).positions).toEqual([1, 2, 3]);
        expect(evaluate(mixed, { v: range(-10, 10) }).positions).toEqual([0, 1, 2, 3]);
    });

    it('a single-point range matches equal values', () => {
        expect(evaluate(mixed, { v: range(4, 4) }).positions).toEqual([3]);
    });

    it('an empty selection places no constraint', () => {
        expect(evaluate(mixed, { v: set() }).positions).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it('no specs keep every row', () => {
        const result = evaluate(mixed, {});
        expect(result.rows).toEqual(mixed.rows);
        expect(result.positions).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it('set membership keeps value types apart', () => {
        const table = tableOf([{ v: 1 }, { v: '1' }, { v: true }, { v: 'true' }]);
        expect(evaluate(table, { v: set(1) }).positions).toEqual([0]);
        expect(evaluate(table, { v: set('1') }).positions).toEqual([1]);
        expect(evaluate(table, { v: set('true') }).positions).toEqual([3]);
    });

    it('set membership compares structured values by content', () => {
        const table = tableOf([{ v: { k: 1 } }, { v: { k: 2 } }, { v: [1, 2] }]);
        expect(evaluate(table, { v: set({ k: 1 }, [1, 2]) }).positions).toEqual([0, 2]);
    });

    it('sets can select missing values', () => {
        expect(evaluate(mixed, { v: set(null, 'x') }).positions).toEqual([4, 5]);
    });

    it('specs combine by conjunction', () => {
        const table = buildTable(readFixture('parcels.geojson'));
        expect(evaluate(table, { area: range(8, 30) }).positions).toEqual([0, 1]);
        expect(evaluate(table, { zone: set('B') }).positions).toEqual([1, 3]);
        expect(evaluate(table, { area: range(8, 30), zone: set('B') }).positions).toEqual([1]);
        expect(evaluate(table, { area: range(8, 30), zone: set('B') }).rows[0].values.name).toBe('Bravo');
    });

    it('filters on computed columns', () => {
        const table = buildTable(readFixture('parcels.geojson'));
        expect(evaluate(table, { is_ccw: set(true) }).positions).toEqual([1]);
        expect(evaluate(table, { has_excess_precision: set(true) }).positions).toEqual([3]);
    });

    it('is deterministic and returns rows in table order', () => {
        const first = evaluate(mixed, { v: range(1, 3) });
        const second = evaluate(mixed, { v: range(1, 3) });
        expect(second).toEqual(first);
        expect(first.rows.map((row) => row.position)).toEqual(first.positions);
    });

    it('narrowing a range never adds rows', () => {
        const wide = evaluate(mixed, { v: range(0, 10) }).positions;
        const narrow = evaluate(mixed, { v: range(2, 3) }).positions;
        expect(narrow.every((p) => wide.includes(p))).toBe(true);
    });

    it('rejects unknown columns and empty ranges', () => {
        expect(() => evaluate(mixed, { w: range(0, 1) })).toThrow(InvalidFilterError);
        expect(() => evaluate(mixed, { v: range(3, 1) })).toThrow('Empty range [3, 1] on "v"');
        expect(() => evaluate(mixed, { v: range(Number.NaN, 1) })).toThrow(InvalidFilterError);
    });
});

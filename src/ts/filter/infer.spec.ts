import { describe, expect, it } from 'vitest';
import { InvalidFilterError } from '../errors.js';
import { readFixture, tableOf } from '../testing/fixtures.js';
import { buildTable } from '../table/builder.js';
import { evaluate } from './evaluate.js';
import { defaultSpecs, inferKind, inferKinds } from './infer.js';

describe('filter kind inference', () => {
    it('numeric columns get outward-rounded ranges', () => {
        const table = tableOf([{ v: 1.234 }, { v: '5.678' }, { v: null }]);
        expect(inferKind(table, 'v')).toEqual({ kind: 'range', min: 1.23, max: 5.68 });
    });

    it('a range whose bounds coincide is widened', () => {
        const table = tableOf([{ v: 3 }, { v: 3 }]);
        expect(inferKind(table, 'v')).toEqual({ kind: 'range', min: 3, max: 4 });
        expect(inferKind(table, 'v', { degenerateRangeWidening: 0.5 })).toEqual({ kind: 'range', min: 3, max: 3.5 });
    });

    it('the rounding precision is configurable', () => {
        const table = tableOf([{ v: 1.234 }, { v: 5.678 }]);
        expect(inferKind(table, 'v', { rangeDecimals: 0 })).toEqual({ kind: 'range', min: 1, max: 6 });
    });

    it('a single non-numeric cell makes the column categorical', () => {
        const table = tableOf([{ v: 1 }, { v: 'x' }, { v: 1 }]);
        expect(inferKind(table, 'v')).toEqual({ kind: 'set', values: [1, 'x'], exposed: true });
    });

    it('booleans are categorical', () => {
        const table = tableOf([{ ok: true }, { ok: false }, { ok: true }]);
        expect(inferKind(table, 'ok')).toEqual({ kind: 'set', values: [true, false], exposed: true });
    });

    it('columns without values expose no selector', () => {
        const table = tableOf([{ v: null }, {}]);
        expect(inferKind(table, 'v')).toEqual({ kind: 'set', values: [], exposed: false });
    });

    it('columns with too many distinct values expose no selector', () => {
        const table = tableOf([{ v: 'a' }, { v: 'b' }, { v: 'c' }]);
        expect(inferKind(table, 'v', { maxCategoricalValues: 2 })).toEqual({
            kind: 'set',
            values: ['a', 'b', 'c'],
            exposed: false,
        });
        expect(inferKind(table, 'v', { maxCategoricalValues: 3 }).kind).toBe('set');
    });

    it('rejects unknown columns', () => {
        expect(() => inferKind(tableOf([{ v: 1 }]), 'w')).toThrow(InvalidFilterError);
    });

    it('infers every column of the parcels in schema order', () => {
        const kinds = inferKinds(buildTable(readFixture('parcels.geojson')));
        expect(Array.from(kinds.keys())).toEqual([
            'name',
            'area',
            'zone',
            'owner',
            'geometry_wkt',
            'is_ccw',
            'has_excess_precision',
        ]);
        expect(kinds.get('area')).toEqual({ kind: 'range', min: 7, max: 40 });
        expect(kinds.get('zone')).toEqual({ kind: 'set', values: ['A', 'B'], exposed: true });
        expect(kinds.get('owner')).toEqual({ kind: 'set', values: ['Kim'], exposed: true });
        expect(kinds.get('is_ccw')).toEqual({ kind: 'set', values: [false, true], exposed: true });
    });

    it('default specs keep every row', () => {
        const table = buildTable(readFixture('parcels.geojson'));
        const specs = defaultSpecs(inferKinds(table));
        expect(specs.area).toEqual({ kind: 'range', min: 7, max: 40 });
        expect(specs.zone).toEqual({ kind: 'set', values: [] });
        expect(evaluate(table, specs).positions).toEqual([0, 1, 2, 3]);
    });

    it('default specs skip columns without a selector', () => {
        const table = tableOf([{ v: 'a' }, { v: 'b' }]);
        const specs = defaultSpecs(inferKinds(table, { maxCategoricalValues: 1 }));
        expect(specs.v).toBeUndefined();
    });
});

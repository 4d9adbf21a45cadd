import { describe, expect, it } from 'vitest';
import { fractionDigits, isRecord, parseDecimal, roundTowards, toPlainDecimal, valueKey } from './utils.js';

describe('utils', () => {
    describe('toPlainDecimal', () => {
        it('keeps positional renderings', () => {
            expect(toPlainDecimal(12.5)).toBe('12.5');
            expect(toPlainDecimal(-0.25)).toBe('-0.25');
            expect(toPlainDecimal(3)).toBe('3');
        });

        it('expands small exponents', () => {
            expect(toPlainDecimal(1.5e-7)).toBe('0.00000015');
            expect(toPlainDecimal(-2.5e-8)).toBe('-0.000000025');
        });

        it('expands large exponents', () => {
            expect(toPlainDecimal(1e21)).toBe('1000000000000000000000');
        });
    });

    describe('fractionDigits', () => {
        it('counts digits after the point', () => {
            expect(fractionDigits(0.123456)).toBe(6);
            expect(fractionDigits(-45.1234567)).toBe(7);
            expect(fractionDigits(10)).toBe(0);
            expect(fractionDigits(1.5e-7)).toBe(8);
        });
    });

    describe('parseDecimal', () => {
        it('accepts numbers and numeric strings', () => {
            expect(parseDecimal(4)).toBe(4);
            expect(parseDecimal('12.5')).toBe(12.5);
            expect(parseDecimal(' 3 ')).toBe(3);
            expect(parseDecimal('1e3')).toBe(1000);
            expect(parseDecimal('-.5')).toBe(-0.5);
        });

        it('rejects everything else', () => {
            expect(parseDecimal('abc')).toBeUndefined();
            expect(parseDecimal('')).toBeUndefined();
            expect(parseDecimal('0x10')).toBeUndefined();
            expect(parseDecimal('Infinity')).toBeUndefined();
            expect(parseDecimal(Number.NaN)).toBeUndefined();
            expect(parseDecimal(true)).toBeUndefined();
            expect(parseDecimal(null)).toBeUndefined();
        });
    });

    describe('roundTowards', () => {
        it('never rounds past the value', () => {
            expect(roundTowards(1.236, 2, 'down')).toBe(1.23);
            expect(roundTowards(1.234, 2, 'up')).toBe(1.24);
            expect(roundTowards(1.234, 2, 'down')).toBe(1.23);
            expect(roundTowards(1.236, 2, 'up')).toBe(1.24);
            expect(roundTowards(7, 2, 'down')).toBe(7);
        });
    });

    it('valueKey keeps types apart', () => {
        expect(valueKey(1)).not.toBe(valueKey('1'));
        expect(valueKey(true)).toBe('boolean:true');
        expect(valueKey(null)).toBe('null');
        expect(valueKey({ a: 1 })).toBe(valueKey({ a: 1 }));
    });

    it('isRecord', () => {
        expect(isRecord({})).toBe(true);
        expect(isRecord([])).toBe(false);
        expect(isRecord(null)).toBe(false);
        expect(isRecord('x')).toBe(false);
    });
});

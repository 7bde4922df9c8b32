/**
 * FixedDecimal: truncation after every multiply/divide, exact parsing and printing.
 */
import { describe, it, expect } from 'vitest';
import { FixedDecimal } from '../src/coder/decimal.js';

describe('FixedDecimal', () => {
    it('builds truncated ratios', () => {
        expect(FixedDecimal.fromRatio(3, 4, 4).toString()).toBe('0.75');
        expect(FixedDecimal.fromRatio(1, 3, 5).toString()).toBe('0.33333');
        expect(FixedDecimal.fromRatio(2, 3, 5).toString()).toBe('0.66666');
    });

    it('truncates products to the precision', () => {
        const a = FixedDecimal.parse('0.33333', 5);
        const b = FixedDecimal.parse('0.3', 5);
        expect(a.mul(b).toString()).toBe('0.09999');
    });

    it('truncates quotients to the precision', () => {
        const one = FixedDecimal.one(3);
        const three = FixedDecimal.parse('3', 3);
        expect(one.div(three).toString()).toBe('0.333');
        expect(() => one.div(FixedDecimal.zero(3))).toThrow(RangeError);
    });

    it('adds, subtracts and halves exactly', () => {
        const a = FixedDecimal.parse('0.25', 4);
        const b = FixedDecimal.parse('0.125', 4);
        expect(a.add(b).toString()).toBe('0.375');
        expect(a.sub(b).toString()).toBe('0.125');
        expect(FixedDecimal.parse('0.001', 3).half().toString()).toBe('0');
        expect(FixedDecimal.parse('0.75', 3).half().toString()).toBe('0.375');
    });

    it('prints integers without a fractional part', () => {
        expect(FixedDecimal.one(8).toString()).toBe('1');
        expect(FixedDecimal.zero(8).toString()).toBe('0');
    });

    it('compares values', () => {
        const lo = FixedDecimal.parse('0.1', 2);
        const hi = FixedDecimal.parse('0.11', 2);
        expect(lo.lt(hi)).toBe(true);
        expect(hi.lt(lo)).toBe(false);
        expect(lo.lte(FixedDecimal.parse('0.10', 2))).toBe(true);
        expect(lo.compare(hi)).toBe(-1);
        expect(lo.equals(FixedDecimal.parse('0.1', 2))).toBe(true);
    });

    it('rejects malformed or over-precise text', () => {
        expect(() => FixedDecimal.parse('0.1234', 3)).toThrow(RangeError);
        expect(() => FixedDecimal.parse('abc', 3)).toThrow(RangeError);
        expect(() => FixedDecimal.parse('-0.5', 3)).toThrow(RangeError);
        expect(() => FixedDecimal.parse('.5', 3)).toThrow(RangeError);
        expect(() => FixedDecimal.parse('0.', 3)).toThrow(RangeError);
    });

    it('refuses to mix precisions', () => {
        expect(() => FixedDecimal.one(2).add(FixedDecimal.one(3))).toThrow(RangeError);
    });
});

import { describe, it, expect } from 'vitest';
import { amountsMatch, countDecimals, toDecimalAmount } from '../../src/utils/amount.js';

describe('Amount helpers', () => {
    it('should convert raw token units using the decimals field', () => {
        expect(toDecimalAmount(12_340_000n, 6)).toBe(12.34);
        expect(toDecimalAmount(1n, 6)).toBe(0.000001);
        expect(toDecimalAmount(5n, 0)).toBe(5);
    });

    it('should match amounts within the rounding tolerance only', () => {
        expect(amountsMatch(12.34, 12.34)).toBe(true);
        expect(amountsMatch(0.1 + 0.2, 0.3)).toBe(true);
        expect(amountsMatch(12.35, 12.34)).toBe(false);
        expect(amountsMatch(12.34001, 12.34)).toBe(false);
    });

    it('should count decimal places including exponent notation', () => {
        expect(countDecimals(12)).toBe(0);
        expect(countDecimals(12.34)).toBe(2);
        expect(countDecimals(0.000001)).toBe(6);
        expect(countDecimals(0.0000001)).toBe(7);
        expect(countDecimals(Number.NaN)).toBe(Infinity);
    });
});

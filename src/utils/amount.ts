/** Absolute tolerance absorbing rounding from the integer-to-decimal division. Not a business allowance. */
export const AMOUNT_TOLERANCE = 1e-6;

export const USDT_DECIMALS = 6;

export function toDecimalAmount(rawAmount: bigint, decimals: number): number {
    return Number(rawAmount) / 10 ** decimals;
}

export function amountsMatch(received: number, expected: number): boolean {
    return Math.abs(received - expected) < AMOUNT_TOLERANCE;
}

export function countDecimals(value: number): number {
    if (!Number.isFinite(value)) return Infinity;
    const text = value.toString();
    if (text.includes('e-')) {
        const [mantissa, exponent] = text.split('e-');
        const fraction = mantissa.split('.')[1] ?? '';
        return fraction.length + parseInt(exponent, 10);
    }
    return text.split('.')[1]?.length ?? 0;
}

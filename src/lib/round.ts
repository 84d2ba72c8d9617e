/**
 * Commercial (half-up) rounding to 2 decimals. The epsilon nudge keeps
 * values such as 1.005 from rounding down because of binary representation.
 */
export function round2(value: number): number {
    if (!Number.isFinite(value)) {
        return value;
    }
    const scaled = (Math.abs(value) + Number.EPSILON) * 100;
    const result = Math.round(scaled) / 100;
    return value < 0 ? -result : result;
}

export function round1(value: number): number {
    if (!Number.isFinite(value)) {
        return value;
    }
    const result = Math.round((Math.abs(value) + Number.EPSILON) * 10) / 10;
    return value < 0 ? -result : result;
}

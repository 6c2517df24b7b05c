/**
 * Exact decimal arithmetic over wire amount strings. A value is held as an
 * integer of minor units at a given scale.
 */

export interface ScaledDecimal {
    units: bigint;
    scale: number;
}

const DECIMAL = /^([+-]?)(\d*)(?:\.(\d*))?$/;

export function parseDecimal(value: string): ScaledDecimal | undefined {
    const match = DECIMAL.exec(value.trim());
    if (!match) {
        return undefined;
    }
    const [, sign, whole, fraction = ''] = match;
    if (whole.length === 0 && fraction.length === 0) {
        return undefined;
    }
    const units = BigInt(`${whole || '0'}${fraction}`);
    return { units: sign === '-' ? -units : units, scale: fraction.length };
}

function rescale(value: ScaledDecimal, scale: number): bigint {
    return value.units * 10n ** BigInt(scale - value.scale);
}

/** Both operands at their common scale */
export function align(a: ScaledDecimal, b: ScaledDecimal): [bigint, bigint] {
    const scale = Math.max(a.scale, b.scale);
    return [rescale(a, scale), rescale(b, scale)];
}

export function decimalEquals(a: ScaledDecimal, b: ScaledDecimal): boolean {
    const [left, right] = align(a, b);
    return left === right;
}

/** |a - b| <= max(a, b) * percent / 100 */
export function withinPercent(a: ScaledDecimal, b: ScaledDecimal, percent: bigint): boolean {
    const [left, right] = align(a, b);
    const difference = left > right ? left - right : right - left;
    const larger = left > right ? left : right;
    return difference * 100n <= larger * percent;
}

import { SIN_TABLE, SIN_TABLE_SIZE } from './sin-table';

// 1 / 2π
export const INV_TWO_PI = 0.159154943092;

const MAX_INDEX = SIN_TABLE_SIZE;

/**
 * Fast approximation of Math.sin(x) for x in radians.
 *
 * Looks up four neighbouring samples of a 256-point sine table and blends
 * them with cubic interpolation. Max error against Math.sin stays below
 * 1e-6 for moderate |x|; for very large |x| the error grows with the
 * precision lost in x * INV_TWO_PI. NaN and ±Infinity yield NaN.
 */
export function fastSin(x: number): number {
    // Scale so one period maps to [0, 1)
    let inPeriod = x * INV_TWO_PI;

    // Floor toward -infinity for negative input
    let n = Math.trunc(inPeriod);
    if (x < 0) {
        n = n - 1;
    }

    // Can land on exactly 1 when x is a tiny negative number
    inPeriod = inPeriod - n;

    const pos = SIN_TABLE_SIZE * inPeriod;
    let index = Math.trunc(pos);
    const fract = pos - index;

    if (index < 0) {
        index = 0;
    } else if (index > MAX_INDEX) {
        index = MAX_INDEX;
    }

    const a = SIN_TABLE[index];
    const b = SIN_TABLE[index + 1];
    const c = SIN_TABLE[index + 2];
    const d = SIN_TABLE[index + 3];

    // Cubic weights for the window [a, b, c, d], evaluated between b and c
    const fractSq = fract * fract;
    const fractBy2 = fract * 0.5;
    const fractBy6 = fract * 0.166666667;
    const fractBy3 = fract * 0.3333333333333;
    const fractSqBy2 = fractSq * 0.5;
    const fractBy2xFractSq = fractBy2 * fractSq;
    const fractBy6xFractSq = fractBy6 * fractSq;

    const wa = fractSqBy2 - fractBy3 - fractBy6xFractSq;
    const wb = fractBy2xFractSq - fractSq + (1.0 - fractBy2);
    const wc = fractSqBy2 + fract - fractBy2xFractSq;
    const wd = fractBy6xFractSq - fractBy6;

    return (a * wa + b * wb) + (c * wc + d * wd);
}

import { describe, expect, it } from 'vitest';
import { fastSin, INV_TWO_PI } from '../src/audio/dsp/fast-sine';
import * as tableSine from '../src/index';

const TWO_PI = 2 * Math.PI;

// Evenly spaced points over [from, to], both ends included
function sweep(from: number, to: number, steps: number): number[] {
  const points: number[] = [];
  for (let i = 0; i <= steps; i++) {
    points.push(from + ((to - from) * i) / steps);
  }
  return points;
}

describe('fastSin known values', () => {
  it.each([
    ['0', 0, 0],
    ['π/2', Math.PI / 2, 1],
    ['π', Math.PI, 0],
    ['3π/2', (3 * Math.PI) / 2, -1],
    ['-π/2', -Math.PI / 2, -1],
  ])('sin(%s) ≈ %d', (_label, x, expected) => {
    expect(fastSin(x)).toBeCloseTo(expected, 4);
  });

  it('returns exactly 0 for 0 and -0', () => {
    expect(fastSin(0)).toBe(0);
    expect(fastSin(-0)).toBe(0);
  });

  it('holds the reciprocal of 2π', () => {
    expect(INV_TWO_PI).toBeCloseTo(1 / TWO_PI, 10);
  });
});

describe('fastSin accuracy', () => {
  const points = sweep(-2 * TWO_PI, 2 * TWO_PI, 100000);

  it('stays within 1e-6 of Math.sin over four periods', () => {
    let maxError = 0;
    for (const x of points) {
      maxError = Math.max(maxError, Math.abs(fastSin(x) - Math.sin(x)));
    }
    expect(maxError).toBeLessThan(1e-6);
  });

  it('never overshoots the unit range by more than interpolation noise', () => {
    let peak = 0;
    for (const x of points) {
      peak = Math.max(peak, Math.abs(fastSin(x)));
    }
    expect(peak).toBeLessThanOrEqual(1 + 1e-6);
    expect(peak).toBeGreaterThan(0.9999);
  });

  it('tracks Math.sin for a moderately large argument', () => {
    expect(Math.abs(fastSin(10000) - Math.sin(10000))).toBeLessThan(1e-6);
  });
});

describe('fastSin periodicity and symmetry', () => {
  const samples = sweep(0, 7, 70);

  it('repeats every 2π', () => {
    for (const x of samples) {
      const base = fastSin(x);
      for (let k = -50; k <= 50; k += 5) {
        expect(Math.abs(fastSin(x + TWO_PI * k) - base)).toBeLessThan(1e-6);
      }
    }
  });

  it('is an odd function', () => {
    for (const x of sweep(0, 68.5, 5000)) {
      expect(Math.abs(fastSin(-x) + fastSin(x))).toBeLessThan(1e-8);
    }
  });
});

describe('fastSin continuity', () => {
  const epsilon = 1e-9;

  it.each([
    ['0', 0],
    ['2π', TWO_PI],
    ['-2π', -TWO_PI],
  ])('has no jump at %s', (_label, x) => {
    expect(Math.abs(fastSin(x - epsilon) - fastSin(x + epsilon))).toBeLessThan(1e-5);
  });

  it('has no jump at any table node', () => {
    for (let k = 0; k <= 256; k++) {
      const x = (TWO_PI * k) / 256;
      expect(Math.abs(fastSin(x - epsilon) - fastSin(x + epsilon))).toBeLessThan(1e-5);
    }
  });
});

describe('fastSin negative period folding', () => {
  it('folds large negative input onto the right phase', () => {
    expect(fastSin(-100.25 * TWO_PI)).toBeCloseTo(-1, 4);

    const x = -100.5 * TWO_PI + 0.3;
    expect(Math.abs(fastSin(x) - Math.sin(x))).toBeLessThan(1e-4);
  });

  it('reads the last guard sample when a tiny negative input folds to a full period', () => {
    const value = fastSin(-1e-20);
    expect(Number.isNaN(value)).toBe(false);
    expect(Math.abs(value)).toBeLessThan(1e-12);
  });
});

describe('fastSin non-finite input', () => {
  it.each([NaN, Infinity, -Infinity])('propagates NaN for %s', (x) => {
    expect(fastSin(x)).toBeNaN();
  });
});

describe('package entry point', () => {
  it('exposes the evaluator and its constants but not the table', () => {
    expect(tableSine.fastSin).toBe(fastSin);
    expect(tableSine.INV_TWO_PI).toBe(INV_TWO_PI);
    expect(tableSine.SIN_TABLE_SIZE).toBe(256);
    expect('SIN_TABLE' in tableSine).toBe(false);
  });
});

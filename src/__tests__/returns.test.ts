/**
 * Tests fuer Rendite-Berechnung der Outcomes
 */

import { describe, it, expect } from 'vitest';
import { calculateReturnPct, directionOf } from '../evaluation/returns.js';

describe('calculateReturnPct', () => {
  it('returns 5.0 for 100 -> 105', () => {
    expect(calculateReturnPct(100, 105)).toBe(5);
  });

  it('returns -5.0 for 100 -> 95', () => {
    expect(calculateReturnPct(100, 95)).toBe(-5);
  });

  it('returns 0.0 for a flat price', () => {
    expect(calculateReturnPct(100, 100)).toBe(0);
  });

  it('computes the QBE example return', () => {
    expect(calculateReturnPct(100, 102.76)).toBeCloseTo(2.76, 10);
  });

  it('rejects non-positive prices', () => {
    expect(() => calculateReturnPct(0, 100)).toThrow(/Ungültige Preise/);
    expect(() => calculateReturnPct(100, -1)).toThrow(/Ungültige Preise/);
  });
});

describe('directionOf', () => {
  it('maps the sign of the return', () => {
    expect(directionOf(5)).toBe(1);
    expect(directionOf(-5)).toBe(-1);
    expect(directionOf(0)).toBe(0);
  });

  it('treats negative zero as flat', () => {
    expect(directionOf(-0)).toBe(0);
  });
});

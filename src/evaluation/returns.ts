import type { RealizedDirection } from '../types/index.js';

/**
 * Realisierte Rendite in Prozent
 * 100 → 105 = 5.0, 100 → 95 = -5.0
 */
export function calculateReturnPct(entryPrice: number, exitPrice: number): number {
  if (!(entryPrice > 0) || !(exitPrice > 0)) {
    throw new Error(`Ungültige Preise: entry=${entryPrice}, exit=${exitPrice}`);
  }
  return ((exitPrice - entryPrice) * 100) / entryPrice;
}

export function directionOf(returnPct: number): RealizedDirection {
  if (returnPct > 0) return 1;
  if (returnPct < 0) return -1;
  return 0;
}

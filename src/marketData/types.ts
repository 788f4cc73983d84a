import { MarketDataUnavailableError } from '../errors.js';

/**
 * Ein Kurs, der zum Zeitpunkt `timestamp` bereits bekannt war.
 * Quellen mit Kerzen liefern Open zum Beginn und Close zum Ende der Kerze.
 */
export interface PriceBar {
  timestamp: Date;
  price: number;
  /** Raster der Quelle; weitet die Toleranz bei groben Kerzen (z.B. 1d) */
  intervalMs?: number;
}

/**
 * Quelle für historische Kurse.
 * Liefert Bars aufsteigend sortiert; leeres Array = keine Daten im Zeitraum.
 */
export interface MarketDataProvider {
  readonly name: string;
  getPrices(symbol: string, from: Date, to: Date, signal?: AbortSignal): Promise<PriceBar[]>;
}

/**
 * Letzter Bar mit timestamp <= `at`, höchstens `toleranceMs` älter
 * (bzw. ein Intervall der Quelle, falls das größer ist).
 * Es wird nie ein Bar nach `at` verwendet.
 *
 * @throws MarketDataUnavailableError wenn kein Bar innerhalb der Toleranz liegt
 */
export function priceAt(bars: PriceBar[], symbol: string, at: Date, toleranceMs: number): PriceBar {
  const atMs = at.getTime();
  let best: PriceBar | null = null;

  for (const bar of bars) {
    const ts = bar.timestamp.getTime();
    if (ts > atMs) continue;
    if (!best || ts > best.timestamp.getTime()) {
      best = bar;
    }
  }

  const tolerance = Math.max(toleranceMs, best?.intervalMs ?? 0);
  if (!best || atMs - best.timestamp.getTime() > tolerance) {
    throw new MarketDataUnavailableError(
      symbol,
      at,
      `Kein Kurs für ${symbol} innerhalb von ${Math.round(tolerance / 60000)} min vor ${at.toISOString()}`
    );
  }
  if (!(best.price > 0)) {
    throw new MarketDataUnavailableError(symbol, at, `Ungültiger Kurs ${best.price} für ${symbol}`);
  }

  return best;
}

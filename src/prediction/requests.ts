/**
 * Feature-Dateien für `npm run predict` einlesen
 *
 * Fehlt collectedAt, gilt der Einlesezeitpunkt: die Werte sind dann "jetzt" bekannt.
 * Ein explizites collectedAt bleibt unverändert und wird von Engine und Ledger geprüft.
 */

import { z } from 'zod';
import type { PredictionRequest } from './engine.js';

export const featureFileSchema = z.array(z.object({
  symbol: z.string().min(1),
  collectedAt: z.string().datetime().optional(),
  schemaVersion: z.string().min(1),
  values: z.record(z.number()),
  observedAt: z.record(z.string().datetime()).optional(),
}));

/**
 * @throws ZodError wenn die Datei nicht dem Format entspricht
 */
export function parseFeatureFile(raw: unknown, readAt: Date): PredictionRequest[] {
  const parsed = featureFileSchema.parse(raw);

  return parsed.map((v) => {
    const observedAt: Record<string, Date> = {};
    for (const [name, iso] of Object.entries(v.observedAt ?? {})) {
      observedAt[name] = new Date(iso);
    }
    const symbol = v.symbol.toUpperCase();
    return {
      symbol,
      features: {
        symbol,
        collectedAt: v.collectedAt ? new Date(v.collectedAt) : new Date(readAt.getTime()),
        schemaVersion: v.schemaVersion,
        values: v.values,
        observedAt,
      },
    };
  });
}

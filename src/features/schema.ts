/**
 * Feature-Schema
 * Jedes ModelBundle ist an genau das Schema gebunden, mit dem es trainiert wurde.
 * Inferenz mit abweichendem Feature-Set wird abgelehnt (kein stiller Schema-Drift).
 */

import { z } from 'zod';
import { FeatureSchemaError } from '../errors.js';
import type { FeatureSnapshot, FeatureVector } from '../types/index.js';

export interface FeatureSchema {
  version: string;
  names: string[];
}

export const featureSchemaSchema = z.object({
  version: z.string().min(1),
  names: z.array(z.string().min(1)).min(1),
});

export const featureSnapshotSchema = z.object({
  schemaVersion: z.string(),
  collectedAt: z.string().datetime(),
  values: z.record(z.number()),
  observedAt: z.record(z.string().datetime()).default({}),
});

// Feature-Set der Sentiment-/Technik-Collector (Reihenfolge = Modell-Input)
export const DEFAULT_FEATURE_SCHEMA: FeatureSchema = {
  version: 'v1',
  names: [
    'sentiment_score',
    'confidence',
    'news_count',
    'reddit_sentiment',
    'rsi',
    'macd_line',
    'macd_signal',
    'macd_histogram',
    'price_vs_sma20',
    'price_vs_sma50',
    'price_vs_sma200',
    'bollinger_width',
    'volume_ratio',
    'atr_14',
    'volatility_20d',
    'index_change',
    'vix_level',
    'market_hours',
    'monday_effect',
    'friday_effect',
  ],
};

/**
 * Baut ein zod-Schema, das exakt die Feature-Namen des Bundles zulässt
 */
function buildValuesSchema(schema: FeatureSchema) {
  const shape: Record<string, z.ZodNumber> = {};
  for (const name of schema.names) {
    shape[name] = z.number().finite();
  }
  return z.object(shape).strict();
}

/**
 * Prüft einen Feature-Vektor gegen das Schema und liefert die Werte in Modell-Reihenfolge
 * @throws FeatureSchemaError bei Versions- oder Feature-Abweichung
 */
export function validateFeatureVector(vector: FeatureVector, schema: FeatureSchema): number[] {
  if (vector.schemaVersion !== schema.version) {
    throw new FeatureSchemaError(
      `Feature-Schema ${vector.schemaVersion} passt nicht zum Modell-Schema ${schema.version}`,
      [`schemaVersion: erwartet ${schema.version}, erhalten ${vector.schemaVersion}`]
    );
  }

  if (Number.isNaN(vector.collectedAt.getTime())) {
    throw new FeatureSchemaError('collectedAt ist kein gültiger Zeitpunkt', ['collectedAt']);
  }

  const parsed = buildValuesSchema(schema).safeParse(vector.values);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      if (issue.code === 'unrecognized_keys') {
        return `unbekannte Features: ${issue.keys.join(', ')}`;
      }
      return `${issue.path.join('.') || 'values'}: ${issue.message}`;
    });
    throw new FeatureSchemaError(`Feature-Vektor für ${vector.symbol} passt nicht zum Schema ${schema.version}`, issues);
  }

  const unknownObserved = Object.keys(vector.observedAt ?? {}).filter((name) => !schema.names.includes(name));
  if (unknownObserved.length > 0) {
    throw new FeatureSchemaError('observedAt enthält unbekannte Features', unknownObserved);
  }

  return toFeatureArray(parsed.data, schema);
}

/**
 * Werte in Schema-Reihenfolge (fehlende Werte → Fehler, nicht 0)
 */
export function toFeatureArray(values: Record<string, number>, schema: FeatureSchema): number[] {
  return schema.names.map((name) => {
    const value = values[name];
    if (value === undefined || !Number.isFinite(value)) {
      throw new FeatureSchemaError(`Feature ${name} fehlt oder ist nicht endlich`, [name]);
    }
    return value;
  });
}

export function sameSchema(a: FeatureSchema, b: FeatureSchema): boolean {
  return a.version === b.version && a.names.length === b.names.length && a.names.every((n, i) => b.names[i] === n);
}

/**
 * Verbatim-Snapshot für die Ledger-Zeile
 */
export function toSnapshot(vector: FeatureVector): FeatureSnapshot {
  const observedAt: Record<string, string> = {};
  for (const [name, at] of Object.entries(vector.observedAt ?? {})) {
    observedAt[name] = at.toISOString();
  }

  return {
    schemaVersion: vector.schemaVersion,
    collectedAt: vector.collectedAt.toISOString(),
    values: { ...vector.values },
    observedAt,
  };
}

/**
 * Späteste Zeitmarke im Snapshot (collectedAt oder ein observedAt)
 */
export function latestSnapshotTime(snapshot: FeatureSnapshot): { at: Date; source: string } {
  let latest = { at: new Date(snapshot.collectedAt), source: 'collectedAt' };
  for (const [name, iso] of Object.entries(snapshot.observedAt)) {
    const at = new Date(iso);
    if (at.getTime() > latest.at.getTime()) {
      latest = { at, source: name };
    }
  }
  return latest;
}

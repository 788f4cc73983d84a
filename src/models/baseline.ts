/**
 * Regelbasiertes Baseline-Bundle
 * Aktiv, solange noch kein trainiertes Bundle existiert (Cold Start).
 */

import { v4 as uuidv4 } from 'uuid';
import { DEFAULT_FEATURE_SCHEMA, type FeatureSchema } from '../features/schema.js';
import type { PredictedAction } from '../types/index.js';
import type { BaselineRules, ModelBundle } from './types.js';

export const DEFAULT_BASELINE_RULES: BaselineRules = {
  rsiOversold: 30,
  rsiOverbought: 70,
  smaBand: 2,
  sentimentBand: 0.1,
  volumeSpike: 2,
  maxConfidence: 0.8,
  defaultMagnitude: 0.1,
};

export interface BaselineSignals {
  bullish: number;
  bearish: number;
}

/**
 * Zählt bullishe und bearishe Signale. Fehlende Features zählen neutral.
 */
export function countSignals(values: Record<string, number>, rules: BaselineRules): BaselineSignals {
  const rsi = values.rsi ?? 50;
  const macdHistogram = values.macd_histogram ?? 0;
  const priceVsSma20 = values.price_vs_sma20 ?? 0;
  const sentiment = values.sentiment_score ?? 0;
  const volumeRatio = values.volume_ratio ?? 1;

  let bullish = 0;
  let bearish = 0;

  if (rsi < rules.rsiOversold) bullish += 1;
  else if (rsi > rules.rsiOverbought) bearish += 1;

  if (macdHistogram > 0) bullish += 1;
  else if (macdHistogram < 0) bearish += 1;

  if (priceVsSma20 > rules.smaBand) bullish += 1;
  else if (priceVsSma20 < -rules.smaBand) bearish += 1;

  if (sentiment > rules.sentimentBand) bullish += 1;
  else if (sentiment < -rules.sentimentBand) bearish += 1;

  // Volumen-Spike verstärkt nur die bullishe Seite
  if (volumeRatio > rules.volumeSpike) bullish += 0.5;

  return { bullish, bearish };
}

export function baselineAction(signals: BaselineSignals, rules: BaselineRules): { action: PredictedAction; confidence: number } {
  const total = signals.bullish + signals.bearish;
  const confidence = total > 0 ? Math.min(rules.maxConfidence, total / 4) : 0.5;

  if (signals.bullish > signals.bearish + 1) return { action: 'BUY', confidence };
  if (signals.bearish > signals.bullish + 1) return { action: 'SELL', confidence };
  return { action: 'HOLD', confidence };
}

export function buildBaselineBundle(
  createdAt: Date,
  schema: FeatureSchema = DEFAULT_FEATURE_SCHEMA,
  rules: BaselineRules = DEFAULT_BASELINE_RULES
): ModelBundle {
  return {
    modelVersion: `baseline-${createdAt.getTime()}-${uuidv4().slice(0, 8)}`,
    featureSchema: schema,
    estimators: { kind: 'baseline', rules },
    trainedFrom: null,
    trainedTo: null,
    trainingRows: 0,
    holdout: null,
    createdAt,
  };
}

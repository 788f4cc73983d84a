/**
 * Holdout-Metriken eines ModelHandles
 * Simulierte Trading-Rendite: BUY-Signale erhalten die Rendite, SELL-Signale die negative Rendite.
 */

import * as ss from 'simple-statistics';
import { reconcileDirection } from '../prediction/engine.js';
import { toFeatureArray } from '../features/schema.js';
import { labelFor } from './labels.js';
import type { ModelHandle } from '../models/handle.js';
import type { HoldoutMetrics } from '../models/types.js';
import type { LabelPolicy, TrainingPair } from '../types/index.js';

export function evaluateHoldout(
  handle: ModelHandle,
  pairs: TrainingPair[],
  policy: LabelPolicy,
  abstainBelow: number
): HoldoutMetrics {
  let actionHits = 0;
  let directionCalls = 0;
  let directionHits = 0;
  let trades = 0;
  let wins = 0;
  let simulatedReturnPct = 0;
  const absErrors: number[] = [];

  for (const pair of pairs) {
    const features = toFeatureArray(pair.prediction.featureSnapshot.values, handle.featureSchema);
    const raw = handle.predict(features);
    const actual = pair.outcome.actualReturnPct;

    if (raw.action === labelFor(pair, policy)) actionHits++;

    const direction = reconcileDirection(raw, abstainBelow);
    if (direction !== null && pair.outcome.actualDirection !== 0) {
      directionCalls++;
      if (direction === pair.outcome.actualDirection) directionHits++;
    }

    absErrors.push(Math.abs(raw.magnitude - actual));

    const side = raw.action === 'BUY' || raw.action === 'STRONG_BUY' ? 1
      : raw.action === 'SELL' || raw.action === 'STRONG_SELL' ? -1
      : 0;
    if (side !== 0) {
      trades++;
      const pnl = side * actual;
      simulatedReturnPct += pnl;
      if (pnl > 0) wins++;
    }
  }

  const samples = pairs.length;
  return {
    samples,
    actionAccuracy: samples > 0 ? actionHits / samples : 0,
    directionAccuracy: directionCalls > 0 ? directionHits / directionCalls : 0,
    directionCoverage: samples > 0 ? directionCalls / samples : 0,
    magnitudeMae: absErrors.length > 0 ? ss.mean(absErrors) : 0,
    simulatedReturnPct,
    simulatedTrades: trades,
    winRate: trades > 0 ? wins / trades : 0,
  };
}

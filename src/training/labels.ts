import type { LabelPolicy, PredictedAction, TrainingPair } from '../types/index.js';

/**
 * Trainings-Label aus der realisierten Rendite.
 * STRONG_* nur, wenn die ursprüngliche Prediction confident genug war.
 */
export function labelFor(pair: TrainingPair, policy: LabelPolicy): PredictedAction {
  const r = pair.outcome.actualReturnPct;
  const eligible = pair.prediction.actionConfidence >= policy.minConfidence;

  if (r > policy.strongThreshold && eligible) return 'STRONG_BUY';
  if (r > policy.buyThreshold) return 'BUY';
  if (r < -policy.strongThreshold && eligible) return 'STRONG_SELL';
  if (r < -policy.buyThreshold) return 'SELL';
  return 'HOLD';
}

export function countLabels(labels: string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const label of labels) {
    counts[label] = (counts[label] ?? 0) + 1;
  }
  return counts;
}

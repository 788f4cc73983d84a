/**
 * Trainings- und Holdout-Datensatz
 * Die Trennung erfolgt ausschließlich über prediction_timestamp relativ zum Cutoff.
 */

import { toFeatureArray, type FeatureSchema } from '../features/schema.js';
import type { TrainingPair } from '../types/index.js';

export interface PartitionedPairs {
  training: TrainingPair[];
  holdout: TrainingPair[];
}

/**
 * training: prediction_timestamp < cutoff
 * holdout:  cutoff <= prediction_timestamp < now
 */
export function partitionByCutoff(pairs: TrainingPair[], cutoff: Date, now: Date): PartitionedPairs {
  const cutoffMs = cutoff.getTime();
  const nowMs = now.getTime();
  const training: TrainingPair[] = [];
  const holdout: TrainingPair[] = [];

  for (const pair of pairs) {
    const ts = pair.prediction.predictionTimestamp.getTime();
    if (ts < cutoffMs) {
      training.push(pair);
    } else if (ts < nowMs) {
      holdout.push(pair);
    }
  }

  return { training, holdout };
}

export function matchesSchema(pair: TrainingPair, schema: FeatureSchema): boolean {
  const snapshot = pair.prediction.featureSnapshot;
  if (snapshot.schemaVersion !== schema.version) return false;

  const keys = Object.keys(snapshot.values);
  return keys.length === schema.names.length && schema.names.every((name) => name in snapshot.values);
}

/**
 * Schema aus der jüngsten Zeile, wenn noch kein Bundle aktiv ist
 */
export function inferSchema(pairs: TrainingPair[]): FeatureSchema | null {
  const latest = pairs[pairs.length - 1];
  if (!latest) return null;

  const snapshot = latest.prediction.featureSnapshot;
  return { version: snapshot.schemaVersion, names: Object.keys(snapshot.values) };
}

export function toMatrix(pairs: TrainingPair[], schema: FeatureSchema): number[][] {
  return pairs.map((pair) => toFeatureArray(pair.prediction.featureSnapshot.values, schema));
}

export function timeRange(pairs: TrainingPair[]): { from: Date | null; to: Date | null } {
  if (pairs.length === 0) return { from: null, to: null };

  let from = pairs[0].prediction.predictionTimestamp;
  let to = from;
  for (const pair of pairs) {
    const ts = pair.prediction.predictionTimestamp;
    if (ts < from) from = ts;
    if (ts > to) to = ts;
  }
  return { from, to };
}

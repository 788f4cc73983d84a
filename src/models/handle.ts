/**
 * ModelHandle: unveränderliche, ausführbare Sicht auf ein ModelBundle.
 * Die Engine hält während einer Vorhersage genau einen Handle.
 */

import { PREDICTED_ACTIONS, type Direction, type PredictedAction } from '../types/index.js';
import type { FeatureSchema } from '../features/schema.js';
import { predictNaiveBayes, predictRidge, transform } from './estimators.js';
import { baselineAction, countSignals } from './baseline.js';
import type { BaselineEstimators, ModelBundle, TrainedEstimators } from './types.js';

export interface RawPrediction {
  action: PredictedAction;
  actionConfidence: number;
  direction: Direction | null;
  directionProbability: number;
  magnitude: number;
}

export interface ModelHandle {
  readonly modelVersion: string;
  readonly kind: 'trained' | 'baseline';
  readonly featureSchema: FeatureSchema;
  /** Features in Schema-Reihenfolge */
  predict(features: number[]): RawPrediction;
}

function isPredictedAction(label: string): label is PredictedAction {
  return PREDICTED_ACTIONS.some((action) => action === label);
}

function toDirection(label: string): Direction | null {
  if (label === '1') return 1;
  if (label === '-1') return -1;
  return null;
}

function trainedPredictor(estimators: TrainedEstimators, modelVersion: string) {
  return (features: number[]): RawPrediction => {
    const scaled = transform(estimators.scaler, features);

    const action = predictNaiveBayes(estimators.action, scaled);
    if (!isPredictedAction(action.label)) {
      throw new Error(`Bundle ${modelVersion} liefert unbekannte Action ${action.label}`);
    }

    const direction = predictNaiveBayes(estimators.direction, scaled);

    return {
      action: action.label,
      actionConfidence: action.probability,
      direction: toDirection(direction.label),
      directionProbability: direction.probability,
      magnitude: predictRidge(estimators.magnitude, scaled),
    };
  };
}

function baselinePredictor(estimators: BaselineEstimators, schema: FeatureSchema) {
  return (features: number[]): RawPrediction => {
    const values: Record<string, number> = {};
    schema.names.forEach((name, i) => {
      values[name] = features[i];
    });

    const signals = countSignals(values, estimators.rules);
    const { action, confidence } = baselineAction(signals, estimators.rules);
    const diff = signals.bullish - signals.bearish;
    const direction: Direction | null = diff > 0 ? 1 : diff < 0 ? -1 : null;

    return {
      action,
      actionConfidence: confidence,
      direction,
      directionProbability: Math.min(estimators.rules.maxConfidence, 0.5 + 0.1 * Math.abs(diff)),
      magnitude: direction === null ? 0 : estimators.rules.defaultMagnitude * direction,
    };
  };
}

export function createModelHandle(bundle: ModelBundle): ModelHandle {
  // Kopie: spätere Änderungen am Bundle-Objekt erreichen den Handle nicht
  const schema: FeatureSchema = Object.freeze({
    version: bundle.featureSchema.version,
    names: [...bundle.featureSchema.names],
  });

  const estimators = bundle.estimators;
  const predict = estimators.kind === 'trained'
    ? trainedPredictor(estimators, bundle.modelVersion)
    : baselinePredictor(estimators, schema);

  return Object.freeze({
    modelVersion: bundle.modelVersion,
    kind: estimators.kind,
    featureSchema: schema,
    predict: (features: number[]): RawPrediction => {
      if (features.length !== schema.names.length) {
        throw new Error(`Bundle ${bundle.modelVersion} erwartet ${schema.names.length} Features, erhalten ${features.length}`);
      }
      return predict(features);
    },
  });
}

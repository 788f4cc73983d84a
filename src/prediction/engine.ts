/**
 * Prediction Engine
 * Feature-Vektor rein, unveränderliche Prediction raus.
 * Nutzt pro Aufruf genau einen ModelHandle, es werden nie Schätzer verschiedener Versionen gemischt.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger.js';
import { toSnapshot, validateFeatureVector } from '../features/schema.js';
import { timeBucketOf } from '../pipeline/settings.js';
import {
  DuplicatePredictionError,
  FeatureSchemaError,
  TemporalIntegrityViolation,
  errorMessage,
  isPipelineError,
} from '../errors.js';
import type { ModelRegistry } from '../models/registry.js';
import type { RawPrediction } from '../models/handle.js';
import type { PredictionRepository } from '../storage/repositories/predictions.js';
import type { Clock } from '../runtime/clock.js';
import type { Direction, FeatureVector, PipelineSettings, Prediction } from '../types/index.js';

export interface PredictionRequest {
  symbol: string;
  features: FeatureVector;
}

export interface PredictionBatchReport {
  requested: number;
  created: Prediction[];
  duplicates: Array<{ symbol: string; timeBucket: string; existingPredictionId: string | null }>;
  schemaErrors: Array<{ symbol: string; message: string; issues: string[] }>;
  failures: Array<{ symbol: string; code: string; message: string }>;
}

export interface PredictionEngineDeps {
  registry: ModelRegistry;
  predictions: PredictionRepository;
  settings: PipelineSettings;
  clock: Clock;
}

/**
 * Richtung, die zur Action passt. BUY mit fallender Richtung (oder umgekehrt)
 * wird zur Enthaltung statt zu einem widersprüchlichen Datensatz.
 */
export function reconcileDirection(raw: RawPrediction, abstainBelow: number): Direction | null {
  if (raw.direction === null || raw.directionProbability < abstainBelow) {
    return null;
  }

  const bullish = raw.action === 'BUY' || raw.action === 'STRONG_BUY';
  const bearish = raw.action === 'SELL' || raw.action === 'STRONG_SELL';

  if ((bullish && raw.direction === -1) || (bearish && raw.direction === 1)) {
    return null;
  }
  return raw.direction;
}

export class PredictionEngine {
  constructor(private readonly deps: PredictionEngineDeps) {}

  /**
   * Erstellt und speichert eine Prediction
   *
   * @throws NoPromotedModelError ohne aktives Bundle
   * @throws FeatureSchemaError bei Schema-Abweichung (nichts wird geschrieben)
   * @throws TemporalIntegrityViolation bei Feature-Zeitstempeln nach collectedAt, collectedAt in der Zukunft oder Backdating
   * @throws DuplicatePredictionError wenn der Bucket schon belegt ist
   */
  predict(symbol: string, vector: FeatureVector): Prediction {
    const { registry, predictions, settings, clock } = this.deps;

    // Handle einmal lesen: eine parallele Promotion wirkt erst beim nächsten Aufruf
    const handle = registry.current();

    if (vector.symbol !== symbol) {
      throw new FeatureSchemaError(`Feature-Vektor gehört zu ${vector.symbol}, nicht zu ${symbol}`, ['symbol']);
    }

    const features = validateFeatureVector(vector, handle.featureSchema);
    this.assertNoLookahead(symbol, vector);

    const now = clock.now();
    // Auch innerhalb der Backdating-Toleranz: das Audit würde sie als future_timestamp blockieren
    if (vector.collectedAt.getTime() > now.getTime()) {
      throw new TemporalIntegrityViolation(
        `collectedAt ${vector.collectedAt.toISOString()} für ${symbol} liegt in der Zukunft`,
        [{
          category: 'future_timestamp',
          severity: 'critical',
          message: 'collectedAt nach jetzt',
          details: { collectedAt: vector.collectedAt.toISOString(), now: now.toISOString() },
        }]
      );
    }

    const raw = handle.predict(features);
    const predictionTimestamp = vector.collectedAt;

    const prediction: Prediction = {
      predictionId: uuidv4(),
      symbol,
      predictionTimestamp,
      timeBucket: timeBucketOf(predictionTimestamp, settings.bucketMs),
      predictedAction: raw.action,
      actionConfidence: clamp01(raw.actionConfidence),
      predictedDirection: reconcileDirection(raw, settings.directionAbstainBelow),
      predictedMagnitude: raw.magnitude,
      featureSnapshot: toSnapshot(vector),
      modelVersion: handle.modelVersion,
      createdAt: now,
    };

    predictions.append(prediction);

    logger.info(
      `[ENGINE] ${symbol}: ${prediction.predictedAction} ` +
        `(Confidence: ${(prediction.actionConfidence * 100).toFixed(1)}%, ` +
        `Richtung: ${prediction.predictedDirection ?? 'keine'}, Modell: ${prediction.modelVersion})`
    );

    return prediction;
  }

  /**
   * Mehrere Predictions; Fehler einzelner Symbole brechen den Batch nicht ab.
   * Integritätsverletzungen werden als Failure gemeldet, nicht verschluckt.
   */
  predictMany(requests: PredictionRequest[]): PredictionBatchReport {
    const report: PredictionBatchReport = {
      requested: requests.length,
      created: [],
      duplicates: [],
      schemaErrors: [],
      failures: [],
    };

    for (const request of requests) {
      try {
        report.created.push(this.predict(request.symbol, request.features));
      } catch (err) {
        if (err instanceof DuplicatePredictionError) {
          report.duplicates.push({
            symbol: err.symbol,
            timeBucket: err.timeBucket,
            existingPredictionId: err.existingPredictionId,
          });
        } else if (err instanceof FeatureSchemaError) {
          report.schemaErrors.push({ symbol: request.symbol, message: err.message, issues: err.issues });
        } else if (isPipelineError(err)) {
          report.failures.push({ symbol: request.symbol, code: err.code, message: err.message });
        } else {
          report.failures.push({ symbol: request.symbol, code: 'UNEXPECTED', message: errorMessage(err) });
        }
      }
    }

    logger.info(
      `[ENGINE] Batch: ${report.created.length}/${report.requested} erstellt, ` +
        `${report.duplicates.length} Duplikate, ${report.schemaErrors.length} Schema-Fehler, ` +
        `${report.failures.length} Fehler`
    );

    return report;
  }

  private assertNoLookahead(symbol: string, vector: FeatureVector): void {
    const collectedMs = vector.collectedAt.getTime();

    for (const [name, observedAt] of Object.entries(vector.observedAt ?? {})) {
      if (observedAt.getTime() > collectedMs) {
        throw new TemporalIntegrityViolation(
          `Feature ${name} für ${symbol} wurde nach collectedAt beobachtet`,
          [{
            category: 'leakage',
            severity: 'critical',
            message: `Feature ${name} beobachtet um ${observedAt.toISOString()}, collectedAt ${vector.collectedAt.toISOString()}`,
            details: { feature: name, observedAt: observedAt.toISOString(), collectedAt: vector.collectedAt.toISOString() },
          }]
        );
      }
    }
  }
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

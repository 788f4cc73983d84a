/**
 * Repository für den Prediction-Ledger
 * Append-only: es gibt keinen UPDATE- oder DELETE-Pfad. Korrekturen sind neue Predictions.
 */

import { z } from 'zod';
import type { SqliteDatabase } from '../db.js';
import { isUniqueViolation } from '../db.js';
import { featureSnapshotSchema } from '../../features/schema.js';
import {
  DuplicatePredictionError,
  ImmutableRecordError,
  InvalidStatusTransitionError,
  TemporalIntegrityViolation,
} from '../../errors.js';
import {
  PREDICTED_ACTIONS,
  PREDICTION_STATUSES,
  TERMINAL_STATUSES,
  type Prediction,
  type PredictionStatus,
  type TimeWindow,
} from '../../types/index.js';

const predictionRowSchema = z.object({
  prediction_id: z.string(),
  symbol: z.string(),
  prediction_timestamp: z.string(),
  time_bucket: z.string(),
  predicted_action: z.enum(PREDICTED_ACTIONS),
  action_confidence: z.number(),
  predicted_direction: z.union([z.literal(1), z.literal(-1), z.null()]),
  predicted_magnitude: z.number(),
  feature_snapshot: z.string(),
  model_version: z.string(),
  created_at: z.string(),
});

const statusRowSchema = z.object({
  status: z.enum(PREDICTION_STATUSES),
});

const timestampRowSchema = z.object({
  latest: z.string().nullable(),
});

const statusCountRowSchema = z.object({
  status: z.enum(PREDICTION_STATUSES),
  count: z.number().int(),
});

/**
 * Konvertiert Datenbank-Row zu Prediction
 */
export function rowToPrediction(row: unknown): Prediction {
  const r = predictionRowSchema.parse(row);
  return {
    predictionId: r.prediction_id,
    symbol: r.symbol,
    predictionTimestamp: new Date(r.prediction_timestamp),
    timeBucket: r.time_bucket,
    predictedAction: r.predicted_action,
    actionConfidence: r.action_confidence,
    predictedDirection: r.predicted_direction,
    predictedMagnitude: r.predicted_magnitude,
    featureSnapshot: featureSnapshotSchema.parse(JSON.parse(r.feature_snapshot)),
    modelVersion: r.model_version,
    createdAt: new Date(r.created_at),
  };
}

// Subquery: aktueller Status = letzter Statuswechsel
const CURRENT_STATUS_SQL = `
  (SELECT s.status FROM prediction_status s
   WHERE s.prediction_id = p.prediction_id
   ORDER BY s.id DESC LIMIT 1)
`;

export interface PredictionRepositoryOptions {
  creationToleranceMs: number;
}

export class PredictionRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly options: PredictionRepositoryOptions
  ) {}

  /**
   * Hängt eine Prediction an den Ledger an und setzt den Status PENDING (atomar).
   * Eindeutigkeit pro (symbol, time_bucket) wird von SQLite erzwungen, nicht per Lock.
   *
   * @throws TemporalIntegrityViolation wenn created_at zu weit von prediction_timestamp abweicht
   * @throws DuplicatePredictionError wenn der Bucket schon belegt ist
   * @throws ImmutableRecordError wenn die prediction_id bereits existiert
   */
  append(prediction: Prediction): void {
    const gapMs = Math.abs(prediction.createdAt.getTime() - prediction.predictionTimestamp.getTime());
    if (gapMs > this.options.creationToleranceMs) {
      throw new TemporalIntegrityViolation(
        `Prediction ${prediction.predictionId}: created_at weicht ${gapMs}ms von prediction_timestamp ab`,
        [{
          category: 'creation_gap',
          severity: 'critical',
          predictionId: prediction.predictionId,
          message: 'created_at außerhalb der Toleranz (Backdating)',
          details: { gapMs, toleranceMs: this.options.creationToleranceMs },
        }]
      );
    }

    const insert = this.db.transaction((p: Prediction) => {
      this.db.prepare(`
        INSERT INTO predictions (
          prediction_id, symbol, prediction_timestamp, time_bucket,
          predicted_action, action_confidence, predicted_direction,
          predicted_magnitude, feature_snapshot, model_version, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        p.predictionId,
        p.symbol,
        p.predictionTimestamp.toISOString(),
        p.timeBucket,
        p.predictedAction,
        p.actionConfidence,
        p.predictedDirection,
        p.predictedMagnitude,
        JSON.stringify(p.featureSnapshot),
        p.modelVersion,
        p.createdAt.toISOString()
      );

      this.db.prepare(`
        INSERT INTO prediction_status (prediction_id, status, reason, changed_at)
        VALUES (?, 'PENDING', 'created', ?)
      `).run(p.predictionId, p.createdAt.toISOString());
    });

    try {
      insert(prediction);
    } catch (err) {
      if (!isUniqueViolation(err)) {
        throw err;
      }

      if (this.getById(prediction.predictionId)) {
        throw new ImmutableRecordError('Prediction', prediction.predictionId);
      }

      const existing = this.findByBucket(prediction.symbol, prediction.timeBucket);
      throw new DuplicatePredictionError(prediction.symbol, prediction.timeBucket, existing?.predictionId ?? null);
    }
  }

  getById(predictionId: string): Prediction | null {
    const row = this.db.prepare(`SELECT * FROM predictions WHERE prediction_id = ?`).get(predictionId);
    return row ? rowToPrediction(row) : null;
  }

  findByBucket(symbol: string, timeBucket: string): Prediction | null {
    const row = this.db
      .prepare(`SELECT * FROM predictions WHERE symbol = ? AND time_bucket = ?`)
      .get(symbol, timeBucket);
    return row ? rowToPrediction(row) : null;
  }

  /**
   * Alle Predictions im Zeitfenster (prediction_timestamp), älteste zuerst
   */
  listInWindow(window: TimeWindow = {}): Prediction[] {
    const rows = this.db.prepare(`
      SELECT * FROM predictions
      WHERE prediction_timestamp >= ? AND prediction_timestamp < ?
      ORDER BY prediction_timestamp ASC, prediction_id ASC
    `).all(windowFrom(window), windowTo(window));

    return rows.map(rowToPrediction);
  }

  /**
   * PENDING Predictions, deren prediction_timestamp <= `olderThan` liegt
   */
  listPending(olderThan: Date): Prediction[] {
    const rows = this.db.prepare(`
      SELECT p.* FROM predictions p
      WHERE p.prediction_timestamp <= ?
        AND ${CURRENT_STATUS_SQL} = 'PENDING'
      ORDER BY p.prediction_timestamp ASC
    `).all(olderThan.toISOString());

    return rows.map(rowToPrediction);
  }

  listBySymbol(symbol: string, limit: number = 50): Prediction[] {
    const rows = this.db.prepare(`
      SELECT * FROM predictions
      WHERE symbol = ?
      ORDER BY prediction_timestamp DESC
      LIMIT ?
    `).all(symbol, limit);

    return rows.map(rowToPrediction);
  }

  listRecent(limit: number = 50): Prediction[] {
    const rows = this.db.prepare(`
      SELECT * FROM predictions
      ORDER BY prediction_timestamp DESC
      LIMIT ?
    `).all(limit);

    return rows.map(rowToPrediction);
  }

  getStatus(predictionId: string): PredictionStatus | null {
    const row = this.db.prepare(`
      SELECT status FROM prediction_status
      WHERE prediction_id = ?
      ORDER BY id DESC LIMIT 1
    `).get(predictionId);

    return row ? statusRowSchema.parse(row).status : null;
  }

  /**
   * Statuswechsel PENDING → EVALUATED | EXPIRED.
   * Gibt false zurück, wenn der Zielstatus bereits gesetzt ist (idempotent).
   *
   * @throws InvalidStatusTransitionError aus einem terminalen Status heraus
   */
  transition(predictionId: string, to: PredictionStatus, reason: string, at: Date): boolean {
    const apply = this.db.transaction((): boolean => {
      const current = this.getStatus(predictionId);

      if (current === to) {
        return false;
      }
      if (current === null || TERMINAL_STATUSES.includes(current) || to === 'PENDING') {
        throw new InvalidStatusTransitionError(predictionId, current, to);
      }

      const info = this.db.prepare(`
        INSERT INTO prediction_status (prediction_id, status, reason, changed_at)
        VALUES (?, ?, ?, ?)
        ON CONFLICT DO NOTHING
      `).run(predictionId, to, reason, at.toISOString());

      if (info.changes > 0) {
        return true;
      }

      // Ein paralleler Evaluator hat bereits einen terminalen Status geschrieben
      const after = this.getStatus(predictionId);
      if (after === to) {
        return false;
      }
      throw new InvalidStatusTransitionError(predictionId, after, to);
    });

    return apply();
  }

  latestPredictionTimestamp(): Date | null {
    const row = timestampRowSchema.parse(
      this.db.prepare(`SELECT MAX(prediction_timestamp) AS latest FROM predictions`).get()
    );
    return row.latest ? new Date(row.latest) : null;
  }

  countByStatus(): Record<PredictionStatus, number> {
    const counts: Record<PredictionStatus, number> = { PENDING: 0, EVALUATED: 0, EXPIRED: 0 };

    const rows = this.db.prepare(`
      SELECT ${CURRENT_STATUS_SQL} AS status, COUNT(*) AS count
      FROM predictions p
      GROUP BY 1
    `).all();

    for (const row of rows) {
      const r = statusCountRowSchema.parse(row);
      counts[r.status] = r.count;
    }

    return counts;
  }
}

const MIN_ISO = new Date(0).toISOString();
const MAX_ISO = '9999-12-31T23:59:59.999Z';

export function windowFrom(window: TimeWindow): string {
  return window.from ? window.from.toISOString() : MIN_ISO;
}

export function windowTo(window: TimeWindow): string {
  return window.to ? window.to.toISOString() : MAX_ISO;
}

/**
 * Repository für outcomes Tabelle
 * Outcomes referenzieren genau eine Prediction und werden nie verändert.
 */

import { z } from 'zod';
import type { SqliteDatabase } from '../db.js';
import { rowToPrediction, windowFrom, windowTo } from './predictions.js';
import { TemporalIntegrityViolation, type IntegrityViolation } from '../../errors.js';
import type { Outcome, TimeWindow, TrainingPair } from '../../types/index.js';

const outcomeRowSchema = z.object({
  outcome_id: z.string(),
  prediction_id: z.string(),
  horizon: z.string(),
  actual_return_pct: z.number(),
  actual_direction: z.union([z.literal(1), z.literal(0), z.literal(-1)]),
  entry_price: z.number(),
  exit_price: z.number(),
  entry_timestamp: z.string(),
  exit_timestamp: z.string(),
  evaluation_timestamp: z.string(),
});

const predictionTimestampRowSchema = z.object({
  prediction_timestamp: z.string(),
});

/**
 * Konvertiert Datenbank-Row zu Outcome
 */
export function rowToOutcome(row: unknown): Outcome {
  const r = outcomeRowSchema.parse(row);
  return {
    outcomeId: r.outcome_id,
    predictionId: r.prediction_id,
    horizon: r.horizon,
    actualReturnPct: r.actual_return_pct,
    actualDirection: r.actual_direction,
    entryPrice: r.entry_price,
    exitPrice: r.exit_price,
    entryTimestamp: new Date(r.entry_timestamp),
    exitTimestamp: new Date(r.exit_timestamp),
    evaluationTimestamp: new Date(r.evaluation_timestamp),
  };
}

export type OutcomeInsertResult = 'inserted' | 'exists';

export interface OutcomeRepositoryOptions {
  minEvalDelayMs: number;
}

export class OutcomeRepository {
  constructor(
    private readonly db: SqliteDatabase,
    private readonly options: OutcomeRepositoryOptions
  ) {}

  /**
   * Schreibt ein Outcome (insert-or-skip pro Prediction und Horizont).
   * Ein bereits vorhandenes Outcome ist kein Fehler, sondern 'exists'.
   *
   * @throws TemporalIntegrityViolation bei fehlender Prediction, zu früher Evaluation
   *         oder Exit-Zeitpunkt außerhalb von (prediction_timestamp, evaluation_timestamp]
   */
  insert(outcome: Outcome): OutcomeInsertResult {
    const write = this.db.transaction((o: Outcome): OutcomeInsertResult => {
      const row = this.db
        .prepare(`SELECT prediction_timestamp FROM predictions WHERE prediction_id = ?`)
        .get(o.predictionId);

      if (!row) {
        throw new TemporalIntegrityViolation(`Outcome ${o.outcomeId} referenziert unbekannte Prediction ${o.predictionId}`, [{
          category: 'referential',
          severity: 'high',
          outcomeId: o.outcomeId,
          predictionId: o.predictionId,
          message: 'Outcome ohne Prediction',
        }]);
      }

      const predictionTimestamp = new Date(predictionTimestampRowSchema.parse(row).prediction_timestamp);
      const violations = checkOutcomeTiming(o, predictionTimestamp, this.options.minEvalDelayMs);
      if (violations.length > 0) {
        throw new TemporalIntegrityViolation(
          `Outcome ${o.outcomeId} verletzt die zeitliche Ordnung: ${violations.map((v) => v.message).join('; ')}`,
          violations
        );
      }

      const info = this.db.prepare(`
        INSERT INTO outcomes (
          outcome_id, prediction_id, horizon, actual_return_pct, actual_direction,
          entry_price, exit_price, entry_timestamp, exit_timestamp, evaluation_timestamp
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(prediction_id, horizon) DO NOTHING
      `).run(
        o.outcomeId,
        o.predictionId,
        o.horizon,
        o.actualReturnPct,
        o.actualDirection,
        o.entryPrice,
        o.exitPrice,
        o.entryTimestamp.toISOString(),
        o.exitTimestamp.toISOString(),
        o.evaluationTimestamp.toISOString()
      );

      return info.changes > 0 ? 'inserted' : 'exists';
    });

    return write(outcome);
  }

  getById(outcomeId: string): Outcome | null {
    const row = this.db.prepare(`SELECT * FROM outcomes WHERE outcome_id = ?`).get(outcomeId);
    return row ? rowToOutcome(row) : null;
  }

  listByPrediction(predictionId: string): Outcome[] {
    const rows = this.db.prepare(`
      SELECT * FROM outcomes
      WHERE prediction_id = ?
      ORDER BY exit_timestamp ASC
    `).all(predictionId);

    return rows.map(rowToOutcome);
  }

  /**
   * Outcomes, deren Prediction im Zeitfenster liegt
   */
  listForPredictionWindow(window: TimeWindow = {}): Outcome[] {
    const rows = this.db.prepare(`
      SELECT o.* FROM outcomes o
      JOIN predictions p ON p.prediction_id = o.prediction_id
      WHERE p.prediction_timestamp >= ? AND p.prediction_timestamp < ?
      ORDER BY p.prediction_timestamp ASC, o.horizon ASC
    `).all(windowFrom(window), windowTo(window));

    return rows.map(rowToOutcome);
  }

  /**
   * Outcomes ohne existierende Prediction (nur möglich, wenn foreign_keys umgangen wurden)
   */
  listOrphans(): Outcome[] {
    const rows = this.db.prepare(`
      SELECT o.* FROM outcomes o
      LEFT JOIN predictions p ON p.prediction_id = o.prediction_id
      WHERE p.prediction_id IS NULL
      ORDER BY o.evaluation_timestamp ASC
    `).all();

    return rows.map(rowToOutcome);
  }

  /**
   * (Prediction, Outcome)-Paare für Training und Holdout:
   * nur EVALUATED Predictions, nur der angegebene Horizont, prediction_timestamp < before
   */
  listEvaluatedPairs(horizon: string, before: Date): TrainingPair[] {
    const rows = this.db.prepare(`
      SELECT
        p.*,
        o.outcome_id, o.horizon, o.actual_return_pct, o.actual_direction,
        o.entry_price, o.exit_price, o.entry_timestamp, o.exit_timestamp, o.evaluation_timestamp
      FROM predictions p
      JOIN outcomes o ON o.prediction_id = p.prediction_id
      WHERE o.horizon = ?
        AND p.prediction_timestamp < ?
        AND (SELECT s.status FROM prediction_status s
             WHERE s.prediction_id = p.prediction_id
             ORDER BY s.id DESC LIMIT 1) = 'EVALUATED'
      ORDER BY p.prediction_timestamp ASC
    `).all(horizon, before.toISOString());

    return rows.map((row) => ({
      prediction: rowToPrediction(row),
      outcome: rowToOutcome(row),
    }));
  }

  count(): number {
    const row = z.object({ count: z.number().int() }).parse(
      this.db.prepare(`SELECT COUNT(*) AS count FROM outcomes`).get()
    );
    return row.count;
  }
}

/**
 * Zeitliche Regeln eines Outcomes relativ zu seiner Prediction.
 * Wird beim Schreiben und vom Guard beim Audit verwendet.
 */
export function checkOutcomeTiming(
  outcome: Outcome,
  predictionTimestamp: Date,
  minEvalDelayMs: number
): IntegrityViolation[] {
  const violations: IntegrityViolation[] = [];
  const delayMs = outcome.evaluationTimestamp.getTime() - predictionTimestamp.getTime();

  if (delayMs < minEvalDelayMs) {
    violations.push({
      category: 'min_delay',
      severity: 'critical',
      outcomeId: outcome.outcomeId,
      predictionId: outcome.predictionId,
      message: `Evaluation nach ${Math.round(delayMs / 60000)} min (Minimum ${Math.round(minEvalDelayMs / 60000)} min)`,
      details: { delayMs, minEvalDelayMs },
    });
  }

  const exitMs = outcome.exitTimestamp.getTime();
  if (exitMs <= predictionTimestamp.getTime() || exitMs > outcome.evaluationTimestamp.getTime()) {
    violations.push({
      category: 'exit_ordering',
      severity: 'critical',
      outcomeId: outcome.outcomeId,
      predictionId: outcome.predictionId,
      message: 'Exit-Preis liegt nicht zwischen Prediction und Evaluation',
      details: {
        predictionTimestamp: predictionTimestamp.toISOString(),
        exitTimestamp: outcome.exitTimestamp.toISOString(),
        evaluationTimestamp: outcome.evaluationTimestamp.toISOString(),
      },
    });
  }

  return violations;
}

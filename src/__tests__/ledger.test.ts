/**
 * Tests fuer den Prediction-Ledger
 * Append-only, Eindeutigkeit pro Bucket, Status-Lifecycle
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  DuplicatePredictionError,
  ImmutableRecordError,
  InvalidStatusTransitionError,
  TemporalIntegrityViolation,
} from '../errors.js';
import { buildOutcome, buildPrediction, createTestPipeline, HOUR, type TestPipeline } from './helpers.js';

vi.mock('../utils/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { default: log, logger: log };
});

const T0 = new Date('2025-03-03T00:00:00Z');

describe('PredictionRepository', () => {
  let ctx: TestPipeline;

  beforeEach(() => {
    ctx = createTestPipeline({ start: T0 });
  });

  describe('append', () => {
    it('stores the prediction verbatim and starts PENDING', () => {
      const prediction = buildPrediction({ timestamp: T0, values: { rsi: 25 }, action: 'BUY', confidence: 0.8 });
      ctx.pipeline.predictions.append(prediction);

      const stored = ctx.pipeline.predictions.getById(prediction.predictionId);
      expect(stored).toEqual(prediction);
      expect(ctx.pipeline.predictions.getStatus(prediction.predictionId)).toBe('PENDING');
    });

    it('rejects a second prediction in the same symbol bucket', () => {
      const first = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(first);

      const second = buildPrediction({ timestamp: new Date(T0.getTime() + HOUR) });

      try {
        ctx.pipeline.predictions.append(second);
        expect.fail('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(DuplicatePredictionError);
        if (err instanceof DuplicatePredictionError) {
          expect(err.timeBucket).toBe('2025-03-03T00:00:00.000Z');
          expect(err.existingPredictionId).toBe(first.predictionId);
        }
      }
      expect(ctx.pipeline.predictions.getById(second.predictionId)).toBeNull();
    });

    it('allows the same bucket for another symbol', () => {
      ctx.pipeline.predictions.append(buildPrediction({ timestamp: T0, symbol: 'QBE' }));
      ctx.pipeline.predictions.append(buildPrediction({ timestamp: T0, symbol: 'BHP' }));

      expect(ctx.pipeline.predictions.listInWindow()).toHaveLength(2);
    });

    it('refuses to rewrite an existing prediction id', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);

      expect(() => ctx.pipeline.predictions.append(prediction)).toThrow(ImmutableRecordError);
    });

    it('rejects backdated predictions and writes nothing', () => {
      const prediction = buildPrediction({ timestamp: T0, createdAt: new Date(T0.getTime() + 10_000) });

      expect(() => ctx.pipeline.predictions.append(prediction)).toThrow(TemporalIntegrityViolation);
      expect(ctx.pipeline.predictions.getById(prediction.predictionId)).toBeNull();
    });
  });

  describe('immutability', () => {
    it('aborts UPDATE on predictions', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);

      expect(() =>
        ctx.db.prepare(`UPDATE predictions SET predicted_action = 'SELL' WHERE prediction_id = ?`).run(prediction.predictionId)
      ).toThrow(/predictions are immutable/);
      expect(ctx.pipeline.predictions.getById(prediction.predictionId)?.predictedAction).toBe('HOLD');
    });

    it('aborts UPDATE on outcomes', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);
      const outcome = buildOutcome(prediction, { returnPct: 2 });
      ctx.pipeline.outcomes.insert(outcome);

      expect(() =>
        ctx.db.prepare(`UPDATE outcomes SET actual_return_pct = 0 WHERE outcome_id = ?`).run(outcome.outcomeId)
      ).toThrow(/outcomes are immutable/);
    });

    it('aborts UPDATE on the status history', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);

      expect(() =>
        ctx.db.prepare(`UPDATE prediction_status SET status = 'EXPIRED' WHERE prediction_id = ?`).run(prediction.predictionId)
      ).toThrow(/append-only/);
    });

    it('aborts DELETE on predictions and outcomes', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);
      const outcome = buildOutcome(prediction, { returnPct: 2 });
      ctx.pipeline.outcomes.insert(outcome);

      expect(() =>
        ctx.db.prepare('DELETE FROM outcomes WHERE outcome_id = ?').run(outcome.outcomeId)
      ).toThrow(/outcomes are immutable/);
      expect(() =>
        ctx.db.prepare('DELETE FROM predictions WHERE prediction_id = ?').run(prediction.predictionId)
      ).toThrow(/predictions are immutable/);
      expect(ctx.pipeline.outcomes.count()).toBe(1);
    });
  });

  describe('transition', () => {
    it('moves PENDING to EVALUATED once', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);
      const at = new Date(T0.getTime() + 25 * HOUR);

      expect(ctx.pipeline.predictions.transition(prediction.predictionId, 'EVALUATED', 'test', at)).toBe(true);
      expect(ctx.pipeline.predictions.transition(prediction.predictionId, 'EVALUATED', 'test', at)).toBe(false);
      expect(ctx.pipeline.predictions.getStatus(prediction.predictionId)).toBe('EVALUATED');
    });

    it('never leaves a terminal status', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);
      const at = new Date(T0.getTime() + 80 * HOUR);
      ctx.pipeline.predictions.transition(prediction.predictionId, 'EXPIRED', 'keine Kurse', at);

      expect(() => ctx.pipeline.predictions.transition(prediction.predictionId, 'EVALUATED', 'test', at))
        .toThrow(InvalidStatusTransitionError);
      expect(ctx.pipeline.predictions.getStatus(prediction.predictionId)).toBe('EXPIRED');
    });

    it('rejects transitions back to PENDING and for unknown predictions', () => {
      const prediction = buildPrediction({ timestamp: T0 });
      ctx.pipeline.predictions.append(prediction);

      expect(() => ctx.pipeline.predictions.transition(prediction.predictionId, 'PENDING', 'test', T0))
        .toThrow(InvalidStatusTransitionError);
      expect(() => ctx.pipeline.predictions.transition('unknown', 'EVALUATED', 'test', T0))
        .toThrow(InvalidStatusTransitionError);
    });
  });

  describe('queries', () => {
    it('lists pending predictions up to a timestamp', () => {
      const early = buildPrediction({ timestamp: T0, symbol: 'QBE' });
      const late = buildPrediction({ timestamp: new Date(T0.getTime() + 2 * HOUR), symbol: 'BHP' });
      const done = buildPrediction({ timestamp: T0, symbol: 'CBA' });
      for (const p of [early, late, done]) {
        ctx.pipeline.predictions.append(p);
      }
      ctx.pipeline.predictions.transition(done.predictionId, 'EVALUATED', 'test', T0);

      const pending = ctx.pipeline.predictions.listPending(new Date(T0.getTime() + HOUR));
      expect(pending.map((p) => p.predictionId)).toEqual([early.predictionId]);
    });

    it('counts predictions by current status', () => {
      const a = buildPrediction({ timestamp: T0, symbol: 'QBE' });
      const b = buildPrediction({ timestamp: T0, symbol: 'BHP' });
      ctx.pipeline.predictions.append(a);
      ctx.pipeline.predictions.append(b);
      ctx.pipeline.predictions.transition(b.predictionId, 'EXPIRED', 'test', T0);

      expect(ctx.pipeline.predictions.countByStatus()).toEqual({ PENDING: 1, EVALUATED: 0, EXPIRED: 1 });
    });

    it('returns predictions of a symbol newest first', () => {
      const older = buildPrediction({ timestamp: T0 });
      const newer = buildPrediction({ timestamp: new Date(T0.getTime() + 24 * HOUR) });
      ctx.pipeline.predictions.append(older);
      ctx.pipeline.predictions.append(newer);

      expect(ctx.pipeline.predictions.listBySymbol('QBE').map((p) => p.predictionId))
        .toEqual([newer.predictionId, older.predictionId]);
      expect(ctx.pipeline.predictions.latestPredictionTimestamp()?.toISOString()).toBe('2025-03-04T00:00:00.000Z');
    });
  });
});

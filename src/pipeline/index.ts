/**
 * Verdrahtung der Pipeline: Repositories, Registry, Engine, Guard, Evaluator, Trainer.
 * Server, Scheduler, CLI-Skripte und Tests bauen alles über createPipeline().
 */

import logger from '../utils/logger.js';
import { PredictionRepository } from '../storage/repositories/predictions.js';
import { OutcomeRepository } from '../storage/repositories/outcomes.js';
import { ModelBundleRepository } from '../storage/repositories/modelBundles.js';
import { PipelineRunRepository } from '../storage/repositories/pipelineRuns.js';
import { ModelRegistry } from '../models/registry.js';
import { buildBaselineBundle } from '../models/baseline.js';
import { PredictionEngine } from '../prediction/engine.js';
import { TemporalIntegrityGuard, type AuditReport } from '../guard/temporalGuard.js';
import { OutcomeEvaluator } from '../evaluation/outcomeEvaluator.js';
import { ModelTrainer } from '../training/trainer.js';
import { TrainingLock } from '../runtime/trainingLock.js';
import { systemClock, type Clock } from '../runtime/clock.js';
import type { SqliteDatabase } from '../storage/db.js';
import type { MarketDataProvider } from '../marketData/types.js';
import type { PromotionRecord } from '../models/types.js';
import type { PipelineSettings, TimeWindow } from '../types/index.js';

export interface PipelineOptions {
  db: SqliteDatabase;
  settings: PipelineSettings;
  marketData: MarketDataProvider;
  trainerLockPath: string;
  clock?: Clock;
}

export interface Pipeline {
  settings: PipelineSettings;
  clock: Clock;
  predictions: PredictionRepository;
  outcomes: OutcomeRepository;
  bundles: ModelBundleRepository;
  runs: PipelineRunRepository;
  registry: ModelRegistry;
  engine: PredictionEngine;
  guard: TemporalIntegrityGuard;
  evaluator: OutcomeEvaluator;
  trainer: ModelTrainer;
  /** Audit mit Eintrag in pipeline_runs */
  audit(window?: TimeWindow): AuditReport;
  /** Promotet das Regel-Baseline-Bundle, falls noch keins aktiv ist */
  ensureBaseline(): PromotionRecord | null;
}

export function createPipeline(options: PipelineOptions): Pipeline {
  const { db, settings, marketData } = options;
  const clock = options.clock ?? systemClock;

  const predictions = new PredictionRepository(db, { creationToleranceMs: settings.creationToleranceMs });
  const outcomes = new OutcomeRepository(db, { minEvalDelayMs: settings.minEvalDelayMs });
  const bundles = new ModelBundleRepository(db);
  const runs = new PipelineRunRepository(db);
  const registry = new ModelRegistry(bundles);

  const guard = new TemporalIntegrityGuard({ predictions, outcomes, settings, clock });
  const engine = new PredictionEngine({ registry, predictions, settings, clock });
  const evaluator = new OutcomeEvaluator({ predictions, outcomes, guard, marketData, runs, settings, clock });
  const trainer = new ModelTrainer({
    outcomes,
    guard,
    registry,
    runs,
    lock: new TrainingLock(options.trainerLockPath),
    settings,
    clock,
  });

  return {
    settings,
    clock,
    predictions,
    outcomes,
    bundles,
    runs,
    registry,
    engine,
    guard,
    evaluator,
    trainer,

    audit(window: TimeWindow = {}): AuditReport {
      const startedAt = clock.now();
      const report = guard.audit(window);
      runs.record({
        runId: report.runId,
        stage: 'audit',
        status: report.blocking ? 'blocking' : report.passed ? 'passed' : 'quarantine',
        startedAt,
        finishedAt: clock.now(),
        report,
      });
      return report;
    },

    ensureBaseline(): PromotionRecord | null {
      if (registry.hasPromoted()) {
        return null;
      }
      const now = clock.now();
      logger.info('[PIPELINE] Kein aktives Bundle, promote Regel-Baseline');
      return registry.promote(buildBaselineBundle(now), 'cold start baseline', now);
    },
  };
}

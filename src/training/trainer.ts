/**
 * Model Trainer
 * Trainiert ein neues ModelBundle ausschließlich aus Daten vor dem Cutoff und
 * promotet es nur, wenn es auf dem Holdout nicht schlechter ist als das aktive Bundle.
 *
 * Ein abgebrochener oder fehlgeschlagener Lauf ändert nichts: Bundle und
 * Promotion werden erst ganz am Ende in einer Transaktion geschrieben.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger.js';
import { assertNoCritical, type TemporalIntegrityGuard } from '../guard/temporalGuard.js';
import { sameSchema, type FeatureSchema } from '../features/schema.js';
import { fitNaiveBayes, fitRidge, fitScaler, transform } from '../models/estimators.js';
import { createModelHandle } from '../models/handle.js';
import { countLabels, labelFor } from './labels.js';
import { inferSchema, matchesSchema, partitionByCutoff, timeRange, toMatrix } from './dataset.js';
import { evaluateHoldout } from './metrics.js';
import {
  InsufficientTrainingDataError,
  OperationCancelledError,
  TemporalIntegrityViolation,
} from '../errors.js';
import type { HoldoutMetrics, ModelBundle } from '../models/types.js';
import type { ModelRegistry } from '../models/registry.js';
import type { OutcomeRepository } from '../storage/repositories/outcomes.js';
import type { PipelineRunRepository } from '../storage/repositories/pipelineRuns.js';
import type { TrainingLock } from '../runtime/trainingLock.js';
import type { Clock } from '../runtime/clock.js';
import type { PipelineSettings, TrainingPair } from '../types/index.js';

export type TrainingStatus = 'promoted' | 'rejected' | 'aborted' | 'cancelled';

export interface TrainingDatasetStats {
  evaluatedPairs: number;
  quarantined: number;
  schemaMismatch: number;
  training: number;
  holdout: number;
  labelCounts: Record<string, number>;
  droppedClasses: string[];
  directionRows: number;
}

export interface TrainingReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  status: TrainingStatus;
  reason: string;
  cutoff: string;
  modelVersion: string | null;
  incumbentVersion: string | null;
  dataset: TrainingDatasetStats;
  candidate: HoldoutMetrics | null;
  incumbent: HoldoutMetrics | null;
  error: { code: string; message: string; details: Record<string, unknown> } | null;
}

export interface ModelTrainerDeps {
  outcomes: OutcomeRepository;
  guard: TemporalIntegrityGuard;
  registry: ModelRegistry;
  runs: PipelineRunRepository;
  lock: TrainingLock;
  settings: PipelineSettings;
  clock: Clock;
}

export interface TrainOptions {
  cutoff?: Date;
  signal?: AbortSignal;
}

function checkAbort(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError('Training');
  }
}

export class ModelTrainer {
  constructor(private readonly deps: ModelTrainerDeps) {}

  /**
   * @throws TrainingInProgressError wenn bereits ein Trainer läuft
   * @throws TemporalIntegrityViolation bei Cutoff in der Zukunft oder kritischem Audit
   */
  async train(options: TrainOptions = {}): Promise<TrainingReport> {
    const { lock } = this.deps;

    lock.acquire();
    try {
      return await this.run(options);
    } finally {
      lock.release();
    }
  }

  private async run(options: TrainOptions): Promise<TrainingReport> {
    const { outcomes, guard, registry, runs, settings, clock } = this.deps;
    const { signal } = options;

    const now = clock.now();
    const cutoff = options.cutoff ?? new Date(now.getTime() - settings.holdoutWindowMs);

    if (cutoff.getTime() > now.getTime()) {
      throw new TemporalIntegrityViolation(`Cutoff ${cutoff.toISOString()} liegt in der Zukunft`, [{
        category: 'future_timestamp',
        severity: 'critical',
        message: 'Training-Cutoff nach jetzt',
        details: { cutoff: cutoff.toISOString(), now: now.toISOString() },
      }]);
    }

    const audit = guard.audit();
    assertNoCritical(audit);

    const incumbent = registry.hasPromoted() ? registry.current() : null;

    const report: TrainingReport = {
      runId: uuidv4(),
      startedAt: now.toISOString(),
      finishedAt: now.toISOString(),
      status: 'aborted',
      reason: '',
      cutoff: cutoff.toISOString(),
      modelVersion: null,
      incumbentVersion: incumbent?.modelVersion ?? null,
      dataset: {
        evaluatedPairs: 0,
        quarantined: 0,
        schemaMismatch: 0,
        training: 0,
        holdout: 0,
        labelCounts: {},
        droppedClasses: [],
        directionRows: 0,
      },
      candidate: null,
      incumbent: null,
      error: null,
    };

    logger.info(`[TRAINER] Start: Cutoff ${report.cutoff}, aktives Bundle ${report.incumbentVersion ?? 'keins'}`);

    try {
      // ═══ Datensatz ═══
      const quarantinedPredictions = new Set(audit.quarantinedPredictionIds);
      const quarantinedOutcomes = new Set(audit.quarantinedOutcomeIds);

      const all = outcomes.listEvaluatedPairs(settings.trainingHorizon, now);
      report.dataset.evaluatedPairs = all.length;

      const clean = all.filter(
        (pair) => !quarantinedPredictions.has(pair.prediction.predictionId) && !quarantinedOutcomes.has(pair.outcome.outcomeId)
      );
      report.dataset.quarantined = all.length - clean.length;

      const schema: FeatureSchema | null = incumbent?.featureSchema ?? inferSchema(clean);
      if (!schema) {
        throw new InsufficientTrainingDataError('Keine evaluierten Predictions vorhanden', { evaluatedPairs: 0 });
      }

      const usable = clean.filter((pair) => matchesSchema(pair, schema));
      report.dataset.schemaMismatch = clean.length - usable.length;

      const { training, holdout } = partitionByCutoff(usable, cutoff, now);
      report.dataset.training = training.length;
      report.dataset.holdout = holdout.length;

      checkAbort(signal);

      // ═══ Fit ═══
      const bundle = this.fit(training, schema, report.dataset, now);
      const candidateHandle = createModelHandle(bundle);
      report.modelVersion = bundle.modelVersion;

      checkAbort(signal);

      // ═══ Holdout ═══
      report.candidate = evaluateHoldout(candidateHandle, holdout, settings.labels, settings.directionAbstainBelow);
      if (incumbent && sameSchema(incumbent.featureSchema, schema)) {
        report.incumbent = evaluateHoldout(incumbent, holdout, settings.labels, settings.directionAbstainBelow);
      }
      bundle.holdout = report.candidate;

      const decision = this.decide(report.candidate, report.incumbent);
      report.reason = decision.reason;

      checkAbort(signal);

      if (decision.promote) {
        registry.promote(bundle, decision.reason, clock.now());
        report.status = 'promoted';
      } else {
        report.status = 'rejected';
        logger.warn(`[TRAINER] Kandidat ${bundle.modelVersion} verworfen: ${decision.reason}`);
      }
    } catch (err) {
      if (err instanceof InsufficientTrainingDataError) {
        report.status = 'aborted';
        report.reason = err.message;
        report.error = { code: err.code, message: err.message, details: err.details };
        logger.warn(`[TRAINER] Abbruch: ${err.message}`, err.details);
      } else if (err instanceof OperationCancelledError) {
        report.status = 'cancelled';
        report.reason = err.message;
        report.error = { code: err.code, message: err.message, details: {} };
        logger.warn('[TRAINER] Training abgebrochen, keine Änderungen');
      } else {
        throw err;
      }
    }

    report.finishedAt = clock.now().toISOString();
    runs.record({
      runId: report.runId,
      stage: 'train',
      status: report.status,
      startedAt: new Date(report.startedAt),
      finishedAt: new Date(report.finishedAt),
      report,
    });

    logger.info(`[TRAINER] Ergebnis: ${report.status} (${report.reason})`);
    return report;
  }

  /**
   * @throws InsufficientTrainingDataError wenn Zeilen- oder Klassen-Untergrenzen verfehlt werden
   */
  private fit(training: TrainingPair[], schema: FeatureSchema, stats: TrainingDatasetStats, now: Date): ModelBundle {
    const { labels: policy, training: floors } = this.deps.settings;

    if (training.length < floors.minTrainingRows) {
      throw new InsufficientTrainingDataError(
        `Nur ${training.length} Trainingszeilen (Minimum ${floors.minTrainingRows})`,
        { rows: training.length, minTrainingRows: floors.minTrainingRows }
      );
    }

    const rows = toMatrix(training, schema);
    const scaler = fitScaler(rows);
    const scaled = rows.map((row) => transform(scaler, row));

    // Action: Klassen unter der Untergrenze fallen weg, mindestens zwei müssen bleiben
    const actionLabels: string[] = training.map((pair) => labelFor(pair, policy));
    const counts = countLabels(actionLabels);
    stats.labelCounts = counts;
    stats.droppedClasses = Object.keys(counts).filter((c) => counts[c] < floors.minSamplesPerClass).sort();

    const keep = actionLabels.map((label) => counts[label] >= floors.minSamplesPerClass);
    const actionRows = scaled.filter((_, i) => keep[i]);
    const actionTargets = actionLabels.filter((_, i) => keep[i]);
    const actionClasses = new Set(actionTargets);

    if (actionClasses.size < 2) {
      throw new InsufficientTrainingDataError(
        `Nur ${actionClasses.size} Action-Klasse(n) mit mindestens ${floors.minSamplesPerClass} Beispielen`,
        { labelCounts: counts, minSamplesPerClass: floors.minSamplesPerClass }
      );
    }

    // Direction: unveränderte Kurse tragen keine Richtung
    const directionIdx = training
      .map((pair, i) => (pair.outcome.actualDirection !== 0 ? i : -1))
      .filter((i) => i >= 0);
    const directionRows = directionIdx.map((i) => scaled[i]);
    const directionTargets = directionIdx.map((i) => String(training[i].outcome.actualDirection));
    const directionCounts = countLabels(directionTargets);
    stats.directionRows = directionRows.length;

    if ((directionCounts['1'] ?? 0) < floors.minSamplesPerClass || (directionCounts['-1'] ?? 0) < floors.minSamplesPerClass) {
      throw new InsufficientTrainingDataError(
        `Zu wenige steigende/fallende Beispiele für die Richtung`,
        { directionCounts, minSamplesPerClass: floors.minSamplesPerClass }
      );
    }

    const magnitudeTargets = training.map((pair) => pair.outcome.actualReturnPct);
    const range = timeRange(training);

    const bundle: ModelBundle = {
      modelVersion: `model-${now.getTime()}-${uuidv4().slice(0, 8)}`,
      featureSchema: { version: schema.version, names: [...schema.names] },
      estimators: {
        kind: 'trained',
        scaler,
        action: fitNaiveBayes(actionRows, actionTargets),
        direction: fitNaiveBayes(directionRows, directionTargets),
        magnitude: fitRidge(scaled, magnitudeTargets),
      },
      trainedFrom: range.from,
      trainedTo: range.to,
      trainingRows: training.length,
      holdout: null,
      createdAt: now,
    };

    logger.info(
      `[TRAINER] Bundle ${bundle.modelVersion} gefittet: ${training.length} Zeilen, ` +
        `Klassen ${[...actionClasses].sort().join('/')}` +
        (stats.droppedClasses.length > 0 ? `, verworfen: ${stats.droppedClasses.join('/')}` : '')
    );

    return bundle;
  }

  private decide(candidate: HoldoutMetrics, incumbent: HoldoutMetrics | null): { promote: boolean; reason: string } {
    const { minHoldoutRows, promotionTolerance } = this.deps.settings.training;

    if (candidate.samples < minHoldoutRows) {
      return { promote: false, reason: `Holdout zu klein (${candidate.samples} < ${minHoldoutRows})` };
    }

    if (!incumbent) {
      return { promote: true, reason: 'kein vergleichbares Bundle aktiv, Untergrenzen erfüllt' };
    }

    const pct = (v: number) => `${(v * 100).toFixed(1)}%`;

    if (candidate.actionAccuracy < incumbent.actionAccuracy - promotionTolerance) {
      return {
        promote: false,
        reason: `Action-Accuracy ${pct(candidate.actionAccuracy)} < aktiv ${pct(incumbent.actionAccuracy)}`,
      };
    }
    if (candidate.directionAccuracy < incumbent.directionAccuracy - promotionTolerance) {
      return {
        promote: false,
        reason: `Direction-Accuracy ${pct(candidate.directionAccuracy)} < aktiv ${pct(incumbent.directionAccuracy)}`,
      };
    }

    return {
      promote: true,
      reason: `Holdout ok: Action ${pct(candidate.actionAccuracy)}, Direction ${pct(candidate.directionAccuracy)}`,
    };
  }
}

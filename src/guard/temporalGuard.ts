/**
 * Temporal Integrity Guard
 * Prüft Ledger und Outcomes auf Lookahead, Backdating, zu frühe Evaluation,
 * Duplikate und verwaiste Outcomes. Liest nur, schreibt nie.
 *
 * Datenqualität blockiert nie: unplausible Indikatoren und Renditen gehen in
 * Quarantäne, Modell-Gesundheit und Evaluationsquote sind informativ.
 *
 * Evaluator und Trainer rufen audit() + assertNoCritical() vor jeder Arbeit auf.
 */

import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger.js';
import { latestSnapshotTime } from '../features/schema.js';
import { timeBucketOf } from '../pipeline/settings.js';
import { checkOutcomeTiming } from '../storage/repositories/outcomes.js';
import {
  TemporalIntegrityViolation,
  type IntegrityViolation,
  type ViolationCategory,
} from '../errors.js';
import type { PredictionRepository } from '../storage/repositories/predictions.js';
import type { OutcomeRepository } from '../storage/repositories/outcomes.js';
import type { Clock } from '../runtime/clock.js';
import type { AuditPolicy, Outcome, PipelineSettings, Prediction, TimeWindow } from '../types/index.js';

export interface AuditReport {
  runId: string;
  auditedAt: string;
  window: { from: string | null; to: string | null };
  predictionsChecked: number;
  outcomesChecked: number;
  violations: IntegrityViolation[];
  counts: Partial<Record<ViolationCategory, number>>;
  passed: boolean;
  blocking: boolean;
  quarantinedPredictionIds: string[];
  quarantinedOutcomeIds: string[];
}

export interface TemporalGuardDeps {
  predictions: PredictionRepository;
  outcomes: OutcomeRepository;
  settings: PipelineSettings;
  clock: Clock;
}

export class TemporalIntegrityGuard {
  constructor(private readonly deps: TemporalGuardDeps) {}

  audit(window: TimeWindow = {}): AuditReport {
    const { predictions, outcomes, settings, clock } = this.deps;
    const now = clock.now();
    const nowMs = now.getTime();

    const ledger = predictions.listInWindow(window);
    const evaluated = outcomes.listForPredictionWindow(window);
    const violations: IntegrityViolation[] = [];

    // ═══ Predictions ═══
    for (const p of ledger) {
      violations.push(...checkPrediction(p, nowMs, settings.creationToleranceMs));
      violations.push(...checkIndicators(p, settings.audit));
    }

    violations.push(...findDuplicates(ledger, settings.bucketMs));

    // ═══ Outcomes ═══
    const byId = new Map(ledger.map((p) => [p.predictionId, p]));
    for (const o of evaluated) {
      const prediction = byId.get(o.predictionId);
      if (!prediction) continue;  // Join garantiert die Prediction

      violations.push(...checkOutcomeTiming(o, prediction.predictionTimestamp, settings.minEvalDelayMs));

      if (Math.abs(o.actualReturnPct) > settings.audit.maxAbsReturnPct) {
        violations.push({
          category: 'extreme_return',
          severity: 'high',
          outcomeId: o.outcomeId,
          predictionId: o.predictionId,
          message: `Rendite ${o.actualReturnPct.toFixed(2)}% (${o.horizon}) über ±${settings.audit.maxAbsReturnPct}%`,
          details: { returnPct: o.actualReturnPct, entryPrice: o.entryPrice, exitPrice: o.exitPrice },
        });
      }

      if (o.evaluationTimestamp.getTime() > nowMs) {
        violations.push({
          category: 'future_timestamp',
          severity: 'critical',
          outcomeId: o.outcomeId,
          predictionId: o.predictionId,
          message: `evaluation_timestamp ${o.evaluationTimestamp.toISOString()} liegt in der Zukunft`,
        });
      }
    }

    for (const orphan of outcomes.listOrphans()) {
      violations.push({
        category: 'referential',
        severity: 'high',
        outcomeId: orphan.outcomeId,
        predictionId: orphan.predictionId,
        message: `Outcome ${orphan.outcomeId} referenziert fehlende Prediction ${orphan.predictionId}`,
      });
    }

    // ═══ Freshness (informativ) ═══
    const latest = predictions.latestPredictionTimestamp();
    if (latest && nowMs - latest.getTime() > settings.staleAfterMs) {
      violations.push({
        category: 'stale_data',
        severity: 'low',
        message: `Letzte Prediction vor ${Math.round((nowMs - latest.getTime()) / 3_600_000)}h`,
        details: { latestPredictionTimestamp: latest.toISOString() },
      });
    }

    // ═══ Modell & Evaluation (informativ) ═══
    violations.push(...checkModelHealth(ledger, settings.audit));

    const longestHorizonMs = Math.max(...settings.horizons.map((h) => h.ms));
    violations.push(...checkEvaluationRate(ledger, evaluated, nowMs - longestHorizonMs - settings.minEvalDelayMs, settings.audit));

    const report = buildReport(violations, {
      now,
      window,
      predictionsChecked: ledger.length,
      outcomesChecked: evaluated.length,
    });

    const summary = `${report.predictionsChecked} Predictions, ${report.outcomesChecked} Outcomes, ${violations.length} Verstöße`;
    if (report.blocking) {
      logger.error(`[GUARD] Audit BLOCKIERT: ${summary}`, { counts: report.counts });
    } else if (!report.passed) {
      logger.warn(`[GUARD] Audit mit Quarantäne: ${summary}`, { counts: report.counts });
    } else {
      logger.info(`[GUARD] Audit bestanden: ${summary}`);
    }

    return report;
  }
}

function checkPrediction(p: Prediction, nowMs: number, creationToleranceMs: number): IntegrityViolation[] {
  const violations: IntegrityViolation[] = [];
  const tsMs = p.predictionTimestamp.getTime();

  const latest = latestSnapshotTime(p.featureSnapshot);
  if (latest.at.getTime() > tsMs) {
    violations.push({
      category: 'leakage',
      severity: 'critical',
      predictionId: p.predictionId,
      message: `Feature-Snapshot (${latest.source}) ist jünger als die Prediction`,
      details: {
        source: latest.source,
        snapshotTime: latest.at.toISOString(),
        predictionTimestamp: p.predictionTimestamp.toISOString(),
      },
    });
  }

  if (tsMs > nowMs) {
    violations.push({
      category: 'future_timestamp',
      severity: 'critical',
      predictionId: p.predictionId,
      message: `prediction_timestamp ${p.predictionTimestamp.toISOString()} liegt in der Zukunft`,
    });
  }

  const gapMs = Math.abs(p.createdAt.getTime() - tsMs);
  if (gapMs > creationToleranceMs) {
    violations.push({
      category: 'creation_gap',
      severity: 'critical',
      predictionId: p.predictionId,
      message: `created_at weicht ${gapMs}ms von prediction_timestamp ab`,
      details: { gapMs, toleranceMs: creationToleranceMs },
    });
  }

  return violations;
}

const MACD_FEATURES = ['macd_line', 'macd_signal', 'macd_histogram'];

/**
 * Indikatoren außerhalb ihres Wertebereichs deuten auf einen Fehler im Collector
 */
function checkIndicators(p: Prediction, policy: AuditPolicy): IntegrityViolation[] {
  const values = p.featureSnapshot.values;
  const issues: Record<string, number> = {};

  const rsi = values.rsi;
  if (rsi !== undefined && (rsi < 0 || rsi > 100)) issues.rsi = rsi;

  for (const name of MACD_FEATURES) {
    const value = values[name];
    if (value !== undefined && Math.abs(value) > policy.maxAbsMacd) issues[name] = value;
  }

  const volume = values.volume_ratio;
  if (volume !== undefined && volume <= 0) issues.volume_ratio = volume;

  const names = Object.keys(issues);
  if (names.length === 0) return [];

  return [{
    category: 'indicator_range',
    severity: 'high',
    predictionId: p.predictionId,
    message: `Unplausible Indikatoren: ${names.map((n) => `${n}=${issues[n]}`).join(', ')}`,
    details: issues,
  }];
}

/**
 * Die jüngsten Predictions sollten sich in Action oder Confidence unterscheiden
 */
function checkModelHealth(ledger: Prediction[], policy: AuditPolicy): IntegrityViolation[] {
  if (ledger.length < policy.healthWindow) return [];

  const recent = [...ledger]
    .sort((a, b) => b.predictionTimestamp.getTime() - a.predictionTimestamp.getTime())
    .slice(0, policy.healthWindow);

  const actions = [...new Set(recent.map((p) => p.predictedAction))].sort();
  const confidences = recent.map((p) => p.actionConfidence);
  const spread = Math.max(...confidences) - Math.min(...confidences);

  const reasons: string[] = [];
  if (actions.length === 1) reasons.push(`nur ${actions[0]}`);
  if (spread < policy.minConfidenceSpread) reasons.push(`Confidence-Spanne ${spread.toFixed(2)}`);
  if (reasons.length === 0) return [];

  return [{
    category: 'model_degenerate',
    severity: 'low',
    message: `Letzte ${recent.length} Predictions: ${reasons.join(', ')}`,
    details: {
      actions,
      confidenceSpread: spread,
      modelVersions: [...new Set(recent.map((p) => p.modelVersion))].sort(),
    },
  }];
}

/**
 * Anteil der fälligen Predictions (längster Horizont + Mindestabstand vorbei) mit Outcome
 */
function checkEvaluationRate(
  ledger: Prediction[],
  evaluated: Outcome[],
  dueBeforeMs: number,
  policy: AuditPolicy
): IntegrityViolation[] {
  const due = ledger.filter((p) => p.predictionTimestamp.getTime() <= dueBeforeMs);
  if (due.length < policy.minEvaluationSample) return [];

  const withOutcome = new Set(evaluated.map((o) => o.predictionId));
  const done = due.filter((p) => withOutcome.has(p.predictionId)).length;
  const rate = done / due.length;
  if (rate >= policy.minEvaluationRate) return [];

  return [{
    category: 'evaluation_rate',
    severity: 'low',
    message: `Nur ${(rate * 100).toFixed(1)}% der fälligen Predictions evaluiert (${done}/${due.length})`,
    details: { due: due.length, evaluated: done, rate },
  }];
}

/**
 * Bucket wird mit der aktuellen Bucket-Größe neu berechnet, damit auch
 * Zeilen aus Läufen mit anderer Konfiguration auffallen.
 */
function findDuplicates(ledger: Prediction[], bucketMs: number): IntegrityViolation[] {
  const groups = new Map<string, Prediction[]>();
  for (const p of ledger) {
    const key = `${p.symbol}|${timeBucketOf(p.predictionTimestamp, bucketMs)}`;
    const group = groups.get(key);
    if (group) {
      group.push(p);
    } else {
      groups.set(key, [p]);
    }
  }

  const violations: IntegrityViolation[] = [];
  for (const [key, group] of groups) {
    if (group.length < 2) continue;
    const [symbol, bucket] = key.split('|');
    for (const p of group) {
      violations.push({
        category: 'duplicate',
        severity: 'high',
        predictionId: p.predictionId,
        message: `${group.length} Predictions für ${symbol} im Bucket ${bucket}`,
        details: { symbol, bucket, predictionIds: group.map((g) => g.predictionId) },
      });
    }
  }
  return violations;
}

function buildReport(
  violations: IntegrityViolation[],
  meta: { now: Date; window: TimeWindow; predictionsChecked: number; outcomesChecked: number }
): AuditReport {
  const counts: Partial<Record<ViolationCategory, number>> = {};
  const quarantinedPredictions = new Set<string>();
  const quarantinedOutcomes = new Set<string>();

  for (const v of violations) {
    counts[v.category] = (counts[v.category] ?? 0) + 1;

    if (v.severity === 'high' || v.severity === 'critical') {
      if (v.predictionId) quarantinedPredictions.add(v.predictionId);
      if (v.outcomeId) quarantinedOutcomes.add(v.outcomeId);
    }
  }

  return {
    runId: uuidv4(),
    auditedAt: meta.now.toISOString(),
    window: {
      from: meta.window.from?.toISOString() ?? null,
      to: meta.window.to?.toISOString() ?? null,
    },
    predictionsChecked: meta.predictionsChecked,
    outcomesChecked: meta.outcomesChecked,
    violations,
    counts,
    passed: violations.every((v) => v.severity === 'low'),
    blocking: violations.some((v) => v.severity === 'critical'),
    quarantinedPredictionIds: [...quarantinedPredictions].sort(),
    quarantinedOutcomeIds: [...quarantinedOutcomes].sort(),
  };
}

/**
 * @throws TemporalIntegrityViolation mit allen kritischen Verstößen
 */
export function assertNoCritical(report: AuditReport): void {
  const critical = report.violations.filter((v) => v.severity === 'critical');
  if (critical.length === 0) return;

  const categories = [...new Set(critical.map((v) => v.category))].join(', ');
  throw new TemporalIntegrityViolation(
    `${critical.length} kritische Integritätsverstöße (${categories}), Operator-Eingriff erforderlich`,
    critical
  );
}

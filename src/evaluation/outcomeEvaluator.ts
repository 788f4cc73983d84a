/**
 * Outcome Evaluator
 * Schreibt für fällige PENDING Predictions je Horizont genau ein Outcome.
 *
 * Ablauf pro Lauf:
 * 1. Guard-Audit (kritisch → Abbruch)
 * 2. PENDING Predictions älter als MIN_EVAL_DELAY, ohne Quarantäne
 * 3. Pro Symbol ein Kursabruf (p-limit parallel, p-retry, harter Timeout)
 * 4. Outcomes insert-or-skip, danach Status EVALUATED bzw. EXPIRED
 *
 * Idempotent: ein zweiter Lauf schreibt nichts doppelt.
 */

import pLimit from 'p-limit';
import pRetry from 'p-retry';
import { v4 as uuidv4 } from 'uuid';
import logger from '../utils/logger.js';
import { assertNoCritical, type TemporalIntegrityGuard } from '../guard/temporalGuard.js';
import { calculateReturnPct, directionOf } from './returns.js';
import { priceAt, type MarketDataProvider, type PriceBar } from '../marketData/types.js';
import {
  MarketDataUnavailableError,
  errorMessage,
  isPipelineError,
  type PipelineErrorCode,
} from '../errors.js';
import type { PredictionRepository } from '../storage/repositories/predictions.js';
import type { OutcomeRepository } from '../storage/repositories/outcomes.js';
import type { PipelineRunRepository } from '../storage/repositories/pipelineRuns.js';
import type { Clock } from '../runtime/clock.js';
import type { EvaluationHorizon, Outcome, PipelineSettings, Prediction } from '../types/index.js';

export interface EvaluationFailure {
  predictionId: string | null;
  symbol: string;
  category: PipelineErrorCode | 'UNEXPECTED';
  message: string;
}

export interface EvaluationReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  status: 'completed' | 'cancelled';
  candidates: number;
  evaluated: number;
  outcomesWritten: number;
  skipped: {
    alreadyEvaluated: number;
    horizonNotReached: number;
    quarantined: number;
  };
  deferred: number;
  expired: number;
  failures: EvaluationFailure[];
  cancelled: boolean;
}

export interface OutcomeEvaluatorDeps {
  predictions: PredictionRepository;
  outcomes: OutcomeRepository;
  guard: TemporalIntegrityGuard;
  marketData: MarketDataProvider;
  runs: PipelineRunRepository;
  settings: PipelineSettings;
  clock: Clock;
}

export interface EvaluateOptions {
  signal?: AbortSignal;
}

interface PendingWork {
  prediction: Prediction;
  due: EvaluationHorizon[];
}

export class OutcomeEvaluator {
  constructor(private readonly deps: OutcomeEvaluatorDeps) {}

  /**
   * @throws TemporalIntegrityViolation wenn der Guard kritische Verstöße meldet
   */
  async evaluatePending(options: EvaluateOptions = {}): Promise<EvaluationReport> {
    const { predictions, guard, runs, settings, clock } = this.deps;
    const { signal } = options;

    const audit = guard.audit();
    assertNoCritical(audit);
    const quarantined = new Set(audit.quarantinedPredictionIds);

    const now = clock.now();
    const report: EvaluationReport = {
      runId: uuidv4(),
      startedAt: now.toISOString(),
      finishedAt: now.toISOString(),
      status: 'completed',
      candidates: 0,
      evaluated: 0,
      outcomesWritten: 0,
      skipped: { alreadyEvaluated: 0, horizonNotReached: 0, quarantined: 0 },
      deferred: 0,
      expired: 0,
      failures: [],
      cancelled: false,
    };

    const pending = predictions.listPending(new Date(now.getTime() - settings.minEvalDelayMs));
    const bySymbol = new Map<string, Prediction[]>();

    for (const p of pending) {
      if (quarantined.has(p.predictionId)) {
        report.skipped.quarantined++;
        continue;
      }
      report.candidates++;
      const list = bySymbol.get(p.symbol);
      if (list) {
        list.push(p);
      } else {
        bySymbol.set(p.symbol, [p]);
      }
    }

    logger.info(`[EVALUATOR] ${report.candidates} Kandidaten in ${bySymbol.size} Symbolen`);

    const limit = pLimit(settings.evalConcurrency);
    await Promise.all(
      [...bySymbol.entries()].map(([symbol, list]) =>
        limit(() => this.evaluateSymbol(symbol, list, now, report, signal))
      )
    );

    if (signal?.aborted) {
      report.cancelled = true;
      report.status = 'cancelled';
    }
    report.finishedAt = clock.now().toISOString();

    runs.record({
      runId: report.runId,
      stage: 'evaluate',
      status: report.status,
      startedAt: new Date(report.startedAt),
      finishedAt: new Date(report.finishedAt),
      report,
    });

    logger.info(
      `[EVALUATOR] Lauf ${report.status}: ${report.evaluated} evaluiert, ${report.outcomesWritten} Outcomes, ` +
        `${report.deferred} verschoben, ${report.expired} abgelaufen, ${report.failures.length} Fehler`
    );

    return report;
  }

  private async evaluateSymbol(
    symbol: string,
    list: Prediction[],
    now: Date,
    report: EvaluationReport,
    signal?: AbortSignal
  ): Promise<void> {
    if (signal?.aborted) return;

    const work = this.collectWork(list, now, report);
    if (work.length === 0) return;

    let bars: PriceBar[];
    try {
      bars = await this.fetchBars(symbol, work, now, signal);
    } catch (err) {
      if (signal?.aborted) return;

      logger.warn(`[EVALUATOR] Marktdaten für ${symbol} nicht verfügbar: ${errorMessage(err)}`);
      for (const { prediction } of work) {
        this.handleUnavailable(prediction, now, report, errorMessage(err));
      }
      return;
    }

    for (const item of work) {
      if (signal?.aborted) return;
      this.evaluatePrediction(item, bars, now, report);
    }
  }

  /**
   * Fällige Horizonte je Prediction; Predictions mit allen Outcomes werden direkt abgeschlossen
   */
  private collectWork(list: Prediction[], now: Date, report: EvaluationReport): PendingWork[] {
    const { outcomes, settings } = this.deps;
    const work: PendingWork[] = [];

    for (const prediction of list) {
      const done = new Set(outcomes.listByPrediction(prediction.predictionId).map((o) => o.horizon));
      const missing = settings.horizons.filter((h) => !done.has(h.label));

      if (missing.length === 0) {
        // Outcomes vorhanden, Statuswechsel fehlte (z.B. Abbruch nach dem Insert)
        this.markEvaluated(prediction, now, report);
        continue;
      }

      const due = missing.filter((h) => isHorizonDue(prediction, h, now, settings.minEvalDelayMs));
      if (due.length === 0) {
        report.skipped.horizonNotReached++;
        continue;
      }

      work.push({ prediction, due });
    }

    return work;
  }

  /**
   * Ein Kursabruf pro Symbol über den gesamten benötigten Zeitraum
   */
  private async fetchBars(symbol: string, work: PendingWork[], now: Date, signal?: AbortSignal): Promise<PriceBar[]> {
    const { marketData, settings } = this.deps;

    let fromMs = Infinity;
    let toMs = -Infinity;
    for (const { prediction, due } of work) {
      const ts = prediction.predictionTimestamp.getTime();
      fromMs = Math.min(fromMs, ts - settings.priceToleranceMs);
      for (const h of due) {
        toMs = Math.max(toMs, ts + h.ms);
      }
    }
    const from = new Date(fromMs);
    const to = new Date(Math.min(toMs, now.getTime()));

    // Harter Timeout pro Symbol, verknüpft mit dem Abbruch-Signal des Laufs
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new MarketDataUnavailableError(symbol, null, `Timeout nach ${settings.marketDataTimeoutMs}ms für ${symbol}`));
    }, settings.marketDataTimeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      return await pRetry(
        () => marketData.getPrices(symbol, from, to, controller.signal),
        {
          retries: settings.marketDataRetries,
          minTimeout: settings.marketDataRetryMinTimeoutMs,
          signal: controller.signal,
          onFailedAttempt: (error) => {
            logger.warn(
              `[EVALUATOR] ${marketData.name} Fehler für ${symbol} (Versuch ${error.attemptNumber}): ${error.message}`
            );
          },
        }
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private evaluatePrediction(item: PendingWork, bars: PriceBar[], now: Date, report: EvaluationReport): void {
    const { outcomes, settings } = this.deps;
    const { prediction, due } = item;
    const ts = prediction.predictionTimestamp;

    try {
      const entry = priceAt(bars, prediction.symbol, ts, settings.priceToleranceMs);

      for (const horizon of due) {
        const exitAt = new Date(ts.getTime() + horizon.ms);
        const exit = priceAt(bars, prediction.symbol, exitAt, settings.priceToleranceMs);

        // Exit-Bar muss nach der Prediction liegen, sonst misst der Return nichts
        if (exit.timestamp.getTime() <= ts.getTime() || exit.timestamp.getTime() > now.getTime()) {
          throw new MarketDataUnavailableError(
            prediction.symbol,
            exitAt,
            `Kein Exit-Kurs für ${prediction.symbol} zwischen Prediction und ${exitAt.toISOString()}`
          );
        }

        const actualReturnPct = calculateReturnPct(entry.price, exit.price);
        const outcome: Outcome = {
          outcomeId: uuidv4(),
          predictionId: prediction.predictionId,
          horizon: horizon.label,
          actualReturnPct,
          actualDirection: directionOf(actualReturnPct),
          entryPrice: entry.price,
          exitPrice: exit.price,
          entryTimestamp: entry.timestamp,
          exitTimestamp: exit.timestamp,
          evaluationTimestamp: now,
        };

        if (outcomes.insert(outcome) === 'inserted') {
          report.outcomesWritten++;
          logger.debug(
            `[EVALUATOR] ${prediction.symbol} ${horizon.label}: ${entry.price} → ${exit.price} ` +
              `(${actualReturnPct >= 0 ? '+' : ''}${actualReturnPct.toFixed(2)}%)`
          );
        } else {
          report.skipped.alreadyEvaluated++;
        }
      }

      const done = new Set(outcomes.listByPrediction(prediction.predictionId).map((o) => o.horizon));
      if (settings.horizons.every((h) => done.has(h.label))) {
        this.markEvaluated(prediction, now, report);
      }
    } catch (err) {
      if (err instanceof MarketDataUnavailableError) {
        this.handleUnavailable(prediction, now, report, err.message);
        return;
      }

      report.failures.push({
        predictionId: prediction.predictionId,
        symbol: prediction.symbol,
        category: isPipelineError(err) ? err.code : 'UNEXPECTED',
        message: errorMessage(err),
      });
      logger.error(`[EVALUATOR] Prediction ${prediction.predictionId} fehlgeschlagen: ${errorMessage(err)}`);
    }
  }

  /**
   * Fehlende Kurse: nach EXPIRY_WINDOW → EXPIRED, vorher erneut im nächsten Lauf
   */
  private handleUnavailable(prediction: Prediction, now: Date, report: EvaluationReport, message: string): void {
    const { predictions, settings } = this.deps;
    const ageMs = now.getTime() - prediction.predictionTimestamp.getTime();

    report.failures.push({
      predictionId: prediction.predictionId,
      symbol: prediction.symbol,
      category: 'MARKET_DATA_UNAVAILABLE',
      message,
    });

    if (ageMs > settings.expiryWindowMs) {
      if (predictions.transition(prediction.predictionId, 'EXPIRED', message, now)) {
        report.expired++;
        logger.warn(`[EVALUATOR] Prediction ${prediction.predictionId} (${prediction.symbol}) abgelaufen`);
      }
    } else {
      report.deferred++;
    }
  }

  private markEvaluated(prediction: Prediction, now: Date, report: EvaluationReport): void {
    if (this.deps.predictions.transition(prediction.predictionId, 'EVALUATED', 'alle Horizonte evaluiert', now)) {
      report.evaluated++;
    } else {
      report.skipped.alreadyEvaluated++;
    }
  }
}

/**
 * Horizont fällig, wenn sowohl der Horizont als auch MIN_EVAL_DELAY verstrichen sind
 */
export function isHorizonDue(prediction: Prediction, horizon: EvaluationHorizon, now: Date, minEvalDelayMs: number): boolean {
  const dueAt = prediction.predictionTimestamp.getTime() + Math.max(horizon.ms, minEvalDelayMs);
  return now.getTime() >= dueAt;
}

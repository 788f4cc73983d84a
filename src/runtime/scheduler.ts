// ═══════════════════════════════════════════════════════════════
//                    PIPELINE SCHEDULER
//   Evaluator im Intervall, Trainer einmal täglich zur TRAIN_HOUR_UTC
// ═══════════════════════════════════════════════════════════════

import { EventEmitter } from 'events';
import logger from '../utils/logger.js';
import { TemporalIntegrityViolation, TrainingInProgressError, errorMessage } from '../errors.js';
import type { EvaluateOptions, EvaluationReport } from '../evaluation/outcomeEvaluator.js';
import type { TrainOptions, TrainingReport } from '../training/trainer.js';
import type { Clock } from './clock.js';

export interface SchedulerStages {
  evaluator: { evaluatePending(options?: EvaluateOptions): Promise<EvaluationReport> };
  trainer: { train(options?: TrainOptions): Promise<TrainingReport> };
}

export interface SchedulerOptions {
  evaluateIntervalMs: number;
  trainHourUtc: number;
  clock: Clock;
}

export type SchedulerStage = 'evaluate' | 'train';

export class PipelineScheduler extends EventEmitter {
  private intervalHandle: NodeJS.Timeout | null = null;
  private controller = new AbortController();
  private evaluating = false;
  private training = false;
  private lastTrainingDay: string | null = null;

  constructor(
    private readonly stages: SchedulerStages,
    private readonly options: SchedulerOptions
  ) {
    super();
  }

  start(): void {
    if (this.intervalHandle) {
      logger.warn('[SCHEDULER] Läuft bereits');
      return;
    }

    this.controller = new AbortController();
    this.intervalHandle = setInterval(() => {
      this.tick().catch((err) => {
        logger.error(`[SCHEDULER] Tick Fehler: ${errorMessage(err)}`);
      });
    }, this.options.evaluateIntervalMs);

    logger.info(
      `[SCHEDULER] Gestartet: Evaluation alle ${Math.round(this.options.evaluateIntervalMs / 60000)} min, ` +
        `Training täglich ${String(this.options.trainHourUtc).padStart(2, '0')}:00 UTC`
    );
    this.emit('started');
  }

  /**
   * Stoppt die Timer und bricht laufende Stufen über das AbortSignal ab
   */
  stop(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
    this.controller.abort();
    logger.info('[SCHEDULER] Gestoppt');
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.intervalHandle !== null;
  }

  async tick(): Promise<void> {
    await this.runEvaluation();

    const now = this.options.clock.now();
    const day = now.toISOString().slice(0, 10);
    if (now.getUTCHours() === this.options.trainHourUtc && this.lastTrainingDay !== day) {
      this.lastTrainingDay = day;
      await this.runTraining();
    }
  }

  async runEvaluation(): Promise<EvaluationReport | null> {
    if (this.evaluating) {
      logger.debug('[SCHEDULER] Evaluation läuft noch, überspringe');
      return null;
    }

    this.evaluating = true;
    try {
      const report = await this.stages.evaluator.evaluatePending({ signal: this.controller.signal });
      this.emit('evaluation_complete', report);
      return report;
    } catch (err) {
      this.handleStageError('evaluate', err);
      return null;
    } finally {
      this.evaluating = false;
    }
  }

  async runTraining(): Promise<TrainingReport | null> {
    if (this.training) {
      logger.debug('[SCHEDULER] Training läuft noch, überspringe');
      return null;
    }

    this.training = true;
    try {
      const report = await this.stages.trainer.train({ signal: this.controller.signal });
      this.emit('training_complete', report);
      return report;
    } catch (err) {
      this.handleStageError('train', err);
      return null;
    } finally {
      this.training = false;
    }
  }

  private handleStageError(stage: SchedulerStage, err: unknown): void {
    if (err instanceof TemporalIntegrityViolation) {
      // Stufe bleibt blockiert bis ein Operator eingreift
      logger.error(`[SCHEDULER] ${stage} blockiert: ${err.message}`);
      this.emit('stage_blocked', { stage, error: err });
      return;
    }
    if (err instanceof TrainingInProgressError) {
      logger.warn(`[SCHEDULER] ${err.message}`);
      return;
    }

    logger.error(`[SCHEDULER] ${stage} fehlgeschlagen: ${errorMessage(err)}`);
    this.emit('stage_error', { stage, error: err });
  }
}

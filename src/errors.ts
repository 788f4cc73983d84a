/**
 * Fehler-Taxonomie der Pipeline
 * Jeder Fehler trägt einen stabilen `code`, den Reports und CLI ausgeben.
 */

export type ViolationCategory =
  | 'leakage'
  | 'future_timestamp'
  | 'min_delay'
  | 'exit_ordering'
  | 'creation_gap'
  | 'duplicate'
  | 'referential'
  | 'indicator_range'
  | 'extreme_return'
  | 'stale_data'
  | 'model_degenerate'
  | 'evaluation_rate';

export type ViolationSeverity = 'critical' | 'high' | 'low';

export interface IntegrityViolation {
  category: ViolationCategory;
  severity: ViolationSeverity;
  message: string;
  predictionId?: string;
  outcomeId?: string;
  details?: Record<string, unknown>;
}

export type PipelineErrorCode =
  | 'FEATURE_SCHEMA'
  | 'DUPLICATE_PREDICTION'
  | 'MARKET_DATA_UNAVAILABLE'
  | 'TEMPORAL_INTEGRITY'
  | 'INSUFFICIENT_TRAINING_DATA'
  | 'NO_PROMOTED_MODEL'
  | 'TRAINING_IN_PROGRESS'
  | 'INVALID_STATUS_TRANSITION'
  | 'IMMUTABLE_RECORD'
  | 'CANCELLED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class FeatureSchemaError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('FEATURE_SCHEMA', message);
    this.issues = issues;
  }
}

export class DuplicatePredictionError extends PipelineError {
  readonly symbol: string;
  readonly timeBucket: string;
  readonly existingPredictionId: string | null;

  constructor(symbol: string, timeBucket: string, existingPredictionId: string | null) {
    super('DUPLICATE_PREDICTION', `Prediction für ${symbol} im Bucket ${timeBucket} existiert bereits`);
    this.symbol = symbol;
    this.timeBucket = timeBucket;
    this.existingPredictionId = existingPredictionId;
  }
}

export class MarketDataUnavailableError extends PipelineError {
  readonly symbol: string;
  readonly requestedAt: Date | null;

  constructor(symbol: string, requestedAt: Date | null, message?: string) {
    super(
      'MARKET_DATA_UNAVAILABLE',
      message ?? `Keine Marktdaten für ${symbol}${requestedAt ? ` um ${requestedAt.toISOString()}` : ''}`
    );
    this.symbol = symbol;
    this.requestedAt = requestedAt;
  }
}

/**
 * Kritischer Bruch der zeitlichen Integrität.
 * Stoppt Evaluator und Trainer bis ein Operator eingreift.
 */
export class TemporalIntegrityViolation extends PipelineError {
  readonly violations: IntegrityViolation[];

  constructor(message: string, violations: IntegrityViolation[]) {
    super('TEMPORAL_INTEGRITY', message);
    this.violations = violations;
  }
}

export class InsufficientTrainingDataError extends PipelineError {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INSUFFICIENT_TRAINING_DATA', message);
    this.details = details;
  }
}

export class NoPromotedModelError extends PipelineError {
  constructor() {
    super('NO_PROMOTED_MODEL', 'Kein promotetes ModelBundle vorhanden. Zuerst `npm run train -- --baseline` ausführen.');
  }
}

export class TrainingInProgressError extends PipelineError {
  readonly holderPid: number | null;

  constructor(holderPid: number | null) {
    super('TRAINING_IN_PROGRESS', `Training läuft bereits${holderPid !== null ? ` (PID: ${holderPid})` : ''}`);
    this.holderPid = holderPid;
  }
}

export class InvalidStatusTransitionError extends PipelineError {
  constructor(predictionId: string, from: string | null, to: string) {
    super('INVALID_STATUS_TRANSITION', `Ungültiger Statuswechsel ${from ?? 'NONE'} → ${to} für Prediction ${predictionId}`);
  }
}

export class ImmutableRecordError extends PipelineError {
  constructor(table: string, id: string) {
    super('IMMUTABLE_RECORD', `${table} ${id} existiert bereits und ist unveränderlich`);
  }
}

export class OperationCancelledError extends PipelineError {
  constructor(stage: string) {
    super('CANCELLED', `${stage} abgebrochen`);
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

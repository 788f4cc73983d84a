// ═══════════════════════════════════════════════════════════════
//                    PREDICTION / OUTCOME TYPES
// ═══════════════════════════════════════════════════════════════

export const PREDICTED_ACTIONS = ['STRONG_BUY', 'BUY', 'HOLD', 'SELL', 'STRONG_SELL'] as const;
export type PredictedAction = (typeof PREDICTED_ACTIONS)[number];

// +1 = steigend, -1 = fallend
export type Direction = 1 | -1;

// 0 = Kurs unverändert (nur bei realisierten Outcomes)
export type RealizedDirection = Direction | 0;

export const PREDICTION_STATUSES = ['PENDING', 'EVALUATED', 'EXPIRED'] as const;
export type PredictionStatus = (typeof PREDICTION_STATUSES)[number];

export const TERMINAL_STATUSES: readonly PredictionStatus[] = ['EVALUATED', 'EXPIRED'];

/**
 * Feature-Vektor wie ihn der Feature-Collector liefert.
 * `observedAt` enthält optional den Zeitpunkt, zu dem ein einzelnes Feature beobachtet wurde.
 */
export interface FeatureVector {
  symbol: string;
  collectedAt: Date;
  schemaVersion: string;
  values: Record<string, number>;
  observedAt?: Record<string, Date>;
}

/**
 * Exakt gespeicherter Feature-Stand einer Prediction (JSON in der DB)
 */
export interface FeatureSnapshot {
  schemaVersion: string;
  collectedAt: string;
  values: Record<string, number>;
  observedAt: Record<string, string>;
}

export interface Prediction {
  predictionId: string;
  symbol: string;
  predictionTimestamp: Date;
  timeBucket: string;
  predictedAction: PredictedAction;
  actionConfidence: number;
  predictedDirection: Direction | null;
  predictedMagnitude: number;
  featureSnapshot: FeatureSnapshot;
  modelVersion: string;
  createdAt: Date;
}

export interface Outcome {
  outcomeId: string;
  predictionId: string;
  horizon: string;
  actualReturnPct: number;
  actualDirection: RealizedDirection;
  entryPrice: number;
  exitPrice: number;
  entryTimestamp: Date;
  exitTimestamp: Date;
  evaluationTimestamp: Date;
}

export interface TrainingPair {
  prediction: Prediction;
  outcome: Outcome;
}

export interface TimeWindow {
  from?: Date;
  to?: Date;
}

// ═══════════════════════════════════════════════════════════════
//                         SETTINGS
// ═══════════════════════════════════════════════════════════════

export interface EvaluationHorizon {
  label: string;  // z.B. '4h'
  ms: number;
}

export interface LabelPolicy {
  buyThreshold: number;     // Return in %, ab dem BUY gelabelt wird
  strongThreshold: number;  // Return in %, ab dem STRONG_BUY gelabelt wird
  minConfidence: number;    // Mindest-Confidence der Prediction für STRONG_*
}

export interface TrainingPolicy {
  minTrainingRows: number;
  minSamplesPerClass: number;
  minHoldoutRows: number;
  promotionTolerance: number;  // erlaubter Accuracy-Rückgang gegenüber dem aktiven Bundle
}

export interface AuditPolicy {
  maxAbsMacd: number;           // |MACD| darüber gilt als Rechenfehler
  maxAbsReturnPct: number;      // |Rendite| in % darüber gilt als Kursfehler
  healthWindow: number;         // jüngste Predictions für den Modell-Check
  minConfidenceSpread: number;  // Confidence-Spanne darunter gilt als degeneriert
  minEvaluationRate: number;    // Anteil fälliger Predictions mit Outcome
  minEvaluationSample: number;  // fällige Predictions, ab denen die Quote geprüft wird
}

export interface PipelineSettings {
  minEvalDelayMs: number;
  holdoutWindowMs: number;
  bucketMs: number;
  creationToleranceMs: number;
  horizons: EvaluationHorizon[];
  trainingHorizon: string;
  expiryWindowMs: number;
  staleAfterMs: number;
  evalConcurrency: number;
  marketDataRetries: number;
  marketDataRetryMinTimeoutMs: number;
  marketDataTimeoutMs: number;
  priceToleranceMs: number;
  directionAbstainBelow: number;
  labels: LabelPolicy;
  training: TrainingPolicy;
  audit: AuditPolicy;
}

export interface Config {
  sqlitePath: string;
  trainerLockPath: string;
  port: number;
  marketData: {
    baseUrl: string;
  };
  scheduler: {
    evaluateIntervalMs: number;
    trainHourUtc: number;
  };
  pipeline: PipelineSettings;
}

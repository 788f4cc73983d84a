import type { EvaluationHorizon, PipelineSettings } from '../types/index.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const HORIZON_UNITS: Record<string, number> = {
  m: MINUTE_MS,
  h: HOUR_MS,
  d: DAY_MS,
};

/**
 * Parst Horizont-Labels wie '30m', '4h' oder '1d'
 */
export function parseHorizon(label: string): EvaluationHorizon {
  const match = /^(\d+)([mhd])$/.exec(label.trim());
  if (!match) {
    throw new Error(`Ungültiger Horizont: "${label}" (erwartet z.B. 1h, 4h, 1d)`);
  }

  const amount = parseInt(match[1], 10);
  const unit = HORIZON_UNITS[match[2]];
  if (amount <= 0 || unit === undefined) {
    throw new Error(`Ungültiger Horizont: "${label}"`);
  }

  return { label: `${amount}${match[2]}`, ms: amount * unit };
}

export function parseHorizons(list: string): EvaluationHorizon[] {
  const horizons = list
    .split(',')
    .map((h) => h.trim())
    .filter((h) => h.length > 0)
    .map(parseHorizon);

  if (horizons.length === 0) {
    throw new Error('Mindestens ein Evaluations-Horizont erforderlich');
  }

  const labels = new Set(horizons.map((h) => h.label));
  if (labels.size !== horizons.length) {
    throw new Error(`Doppelte Horizonte: ${list}`);
  }

  return horizons.sort((a, b) => a.ms - b.ms);
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  minEvalDelayMs: HOUR_MS,
  holdoutWindowMs: 7 * DAY_MS,
  bucketMs: DAY_MS,
  creationToleranceMs: 5 * 1000,
  horizons: parseHorizons('1h,4h,1d'),
  trainingHorizon: '1d',
  expiryWindowMs: 72 * HOUR_MS,
  staleAfterMs: 48 * HOUR_MS,
  evalConcurrency: 4,
  marketDataRetries: 3,
  marketDataRetryMinTimeoutMs: 1000,
  marketDataTimeoutMs: 15_000,
  priceToleranceMs: HOUR_MS,
  directionAbstainBelow: 0.55,
  labels: {
    buyThreshold: 0.5,
    strongThreshold: 1.5,
    minConfidence: 0.6,
  },
  training: {
    minTrainingRows: 50,
    minSamplesPerClass: 5,
    minHoldoutRows: 10,
    promotionTolerance: 0.02,
  },
  audit: {
    maxAbsMacd: 20,
    maxAbsReturnPct: 50,
    healthWindow: 20,
    minConfidenceSpread: 0.1,
    minEvaluationRate: 0.8,
    minEvaluationSample: 20,
  },
};

export type SettingsOverrides = Partial<Omit<PipelineSettings, 'labels' | 'training' | 'audit'>> & {
  labels?: Partial<PipelineSettings['labels']>;
  training?: Partial<PipelineSettings['training']>;
  audit?: Partial<PipelineSettings['audit']>;
};

/**
 * Mergt Overrides in die Defaults und prüft die Konsistenz
 */
export function resolveSettings(overrides: SettingsOverrides = {}): PipelineSettings {
  const settings: PipelineSettings = {
    ...DEFAULT_PIPELINE_SETTINGS,
    ...overrides,
    labels: { ...DEFAULT_PIPELINE_SETTINGS.labels, ...overrides.labels },
    training: { ...DEFAULT_PIPELINE_SETTINGS.training, ...overrides.training },
    audit: { ...DEFAULT_PIPELINE_SETTINGS.audit, ...overrides.audit },
  };

  if (!settings.horizons.some((h) => h.label === settings.trainingHorizon)) {
    throw new Error(
      `Trainings-Horizont ${settings.trainingHorizon} ist nicht in den Evaluations-Horizonten ` +
        `(${settings.horizons.map((h) => h.label).join(', ')}) enthalten`
    );
  }
  if (settings.labels.strongThreshold < settings.labels.buyThreshold) {
    throw new Error('LABEL_STRONG_THRESHOLD muss >= LABEL_BUY_THRESHOLD sein');
  }
  if (settings.audit.healthWindow < 2 || settings.audit.minEvaluationSample < 1) {
    throw new Error('AUDIT_HEALTH_WINDOW muss >= 2 und AUDIT_MIN_EVALUATION_SAMPLE >= 1 sein');
  }
  if (settings.minEvalDelayMs <= 0 || settings.bucketMs <= 0 || settings.holdoutWindowMs <= 0) {
    throw new Error('Zeitfenster müssen positiv sein');
  }

  return settings;
}

/**
 * Startzeit des Buckets als ISO-String (UTC)
 */
export function timeBucketOf(timestamp: Date, bucketMs: number): string {
  const start = Math.floor(timestamp.getTime() / bucketMs) * bucketMs;
  return new Date(start).toISOString();
}

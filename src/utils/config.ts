import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { Config } from '../types/index.js';
import { DEFAULT_PIPELINE_SETTINGS, parseHorizons, resolveSettings } from '../pipeline/settings.js';

// .env laden
dotenvConfig();
dotenvConfig({ path: '.env.local', override: true });

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const defaults = DEFAULT_PIPELINE_SETTINGS;

const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);
const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const ratio = (fallback: number) => z.coerce.number().min(0).max(1).default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().default('3000'),
  SQLITE_PATH: z.string().default('./data/forecast-ledger.db'),
  TRAINER_LOCK_PATH: z.string().default('./data/.trainer.lock'),

  // Zeitliche Grenzen
  MIN_EVAL_DELAY_MINUTES: positiveNumber(defaults.minEvalDelayMs / MINUTE_MS),
  HOLDOUT_WINDOW_DAYS: positiveNumber(defaults.holdoutWindowMs / DAY_MS),
  BUCKET_HOURS: positiveNumber(defaults.bucketMs / HOUR_MS),
  CREATION_TOLERANCE_SECONDS: positiveNumber(defaults.creationToleranceMs / 1000),
  EVAL_HORIZONS: z.string().default(defaults.horizons.map((h) => h.label).join(',')),
  TRAINING_HORIZON: z.string().default(defaults.trainingHorizon),
  EXPIRY_WINDOW_HOURS: positiveNumber(defaults.expiryWindowMs / HOUR_MS),
  STALE_AFTER_HOURS: positiveNumber(defaults.staleAfterMs / HOUR_MS),

  // Marktdaten
  MARKET_DATA_BASE_URL: z.string().url().default('https://query1.finance.yahoo.com'),
  MARKET_DATA_RETRIES: z.coerce.number().int().min(0).default(defaults.marketDataRetries),
  MARKET_DATA_RETRY_MIN_TIMEOUT_MS: positiveInt(defaults.marketDataRetryMinTimeoutMs),
  MARKET_DATA_TIMEOUT_MS: positiveInt(defaults.marketDataTimeoutMs),
  PRICE_TOLERANCE_MINUTES: positiveNumber(defaults.priceToleranceMs / MINUTE_MS),
  EVAL_CONCURRENCY: positiveInt(defaults.evalConcurrency),

  // Labeling (nur Training!)
  LABEL_BUY_THRESHOLD: positiveNumber(defaults.labels.buyThreshold),
  LABEL_STRONG_THRESHOLD: positiveNumber(defaults.labels.strongThreshold),
  LABEL_MIN_CONFIDENCE: ratio(defaults.labels.minConfidence),

  // Training / Promotion
  MIN_TRAINING_ROWS: positiveInt(defaults.training.minTrainingRows),
  MIN_SAMPLES_PER_CLASS: positiveInt(defaults.training.minSamplesPerClass),
  MIN_HOLDOUT_ROWS: positiveInt(defaults.training.minHoldoutRows),
  PROMOTION_TOLERANCE: ratio(defaults.training.promotionTolerance),
  DIRECTION_ABSTAIN_BELOW: ratio(defaults.directionAbstainBelow),

  // Audit (Datenqualität, nicht blockierend)
  AUDIT_MAX_ABS_MACD: positiveNumber(defaults.audit.maxAbsMacd),
  AUDIT_MAX_ABS_RETURN_PCT: positiveNumber(defaults.audit.maxAbsReturnPct),
  AUDIT_HEALTH_WINDOW: positiveInt(defaults.audit.healthWindow),
  AUDIT_MIN_CONFIDENCE_SPREAD: ratio(defaults.audit.minConfidenceSpread),
  AUDIT_MIN_EVALUATION_RATE: ratio(defaults.audit.minEvaluationRate),
  AUDIT_MIN_EVALUATION_SAMPLE: positiveInt(defaults.audit.minEvaluationSample),

  // Scheduler
  EVALUATE_INTERVAL_MS: positiveInt(15 * MINUTE_MS),
  TRAIN_HOUR_UTC: z.coerce.number().int().min(0).max(23).default(2),
});

const env = envSchema.parse(process.env);

export const config: Config = {
  sqlitePath: env.SQLITE_PATH,
  trainerLockPath: env.TRAINER_LOCK_PATH,
  port: parseInt(env.PORT, 10),
  marketData: {
    baseUrl: env.MARKET_DATA_BASE_URL,
  },
  scheduler: {
    evaluateIntervalMs: env.EVALUATE_INTERVAL_MS,
    trainHourUtc: env.TRAIN_HOUR_UTC,
  },
  pipeline: resolveSettings({
    minEvalDelayMs: env.MIN_EVAL_DELAY_MINUTES * MINUTE_MS,
    holdoutWindowMs: env.HOLDOUT_WINDOW_DAYS * DAY_MS,
    bucketMs: env.BUCKET_HOURS * HOUR_MS,
    creationToleranceMs: env.CREATION_TOLERANCE_SECONDS * 1000,
    horizons: parseHorizons(env.EVAL_HORIZONS),
    trainingHorizon: env.TRAINING_HORIZON,
    expiryWindowMs: env.EXPIRY_WINDOW_HOURS * HOUR_MS,
    staleAfterMs: env.STALE_AFTER_HOURS * HOUR_MS,
    evalConcurrency: env.EVAL_CONCURRENCY,
    marketDataRetries: env.MARKET_DATA_RETRIES,
    marketDataRetryMinTimeoutMs: env.MARKET_DATA_RETRY_MIN_TIMEOUT_MS,
    marketDataTimeoutMs: env.MARKET_DATA_TIMEOUT_MS,
    priceToleranceMs: env.PRICE_TOLERANCE_MINUTES * MINUTE_MS,
    directionAbstainBelow: env.DIRECTION_ABSTAIN_BELOW,
    labels: {
      buyThreshold: env.LABEL_BUY_THRESHOLD,
      strongThreshold: env.LABEL_STRONG_THRESHOLD,
      minConfidence: env.LABEL_MIN_CONFIDENCE,
    },
    training: {
      minTrainingRows: env.MIN_TRAINING_ROWS,
      minSamplesPerClass: env.MIN_SAMPLES_PER_CLASS,
      minHoldoutRows: env.MIN_HOLDOUT_ROWS,
      promotionTolerance: env.PROMOTION_TOLERANCE,
    },
    audit: {
      maxAbsMacd: env.AUDIT_MAX_ABS_MACD,
      maxAbsReturnPct: env.AUDIT_MAX_ABS_RETURN_PCT,
      healthWindow: env.AUDIT_HEALTH_WINDOW,
      minConfidenceSpread: env.AUDIT_MIN_CONFIDENCE_SPREAD,
      minEvaluationRate: env.AUDIT_MIN_EVALUATION_RATE,
      minEvaluationSample: env.AUDIT_MIN_EVALUATION_SAMPLE,
    },
  }),
};

export const PORT = config.port;
export const NODE_ENV = env.NODE_ENV;

export default config;

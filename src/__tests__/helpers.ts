/**
 * Gemeinsame Test-Helfer: feste Uhr, In-Process Marktdaten, Feature-Vektoren
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { openDatabase, type SqliteDatabase } from '../storage/db.js';
import { createPipeline, type Pipeline } from '../pipeline/index.js';
import { resolveSettings, timeBucketOf, type SettingsOverrides } from '../pipeline/settings.js';
import { DEFAULT_FEATURE_SCHEMA, toSnapshot } from '../features/schema.js';
import { MarketDataUnavailableError } from '../errors.js';
import type { MarketDataProvider, PriceBar } from '../marketData/types.js';
import type { Clock } from '../runtime/clock.js';
import type {
  FeatureVector,
  Outcome,
  PipelineSettings,
  PredictedAction,
  Prediction,
} from '../types/index.js';

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export class ManualClock implements Clock {
  private current: Date;

  constructor(start: Date) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(at: Date): void {
    this.current = new Date(at.getTime());
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export class StaticMarketDataProvider implements MarketDataProvider {
  readonly name = 'static';
  calls = 0;
  private bars = new Map<string, PriceBar[]>();
  private failures = new Map<string, Error>();
  private stalled = new Set<string>();

  setBars(symbol: string, bars: Array<[Date, number]>): void {
    this.bars.set(symbol, bars.map(([timestamp, price]) => ({ timestamp, price })));
  }

  failWith(symbol: string, error: Error = new MarketDataUnavailableError(symbol, null, `${symbol} nicht erreichbar`)): void {
    this.failures.set(symbol, error);
  }

  /** Anfragen für `symbol` antworten nie */
  stall(symbol: string): void {
    this.stalled.add(symbol);
  }

  async getPrices(symbol: string, from: Date, to: Date): Promise<PriceBar[]> {
    this.calls++;
    if (this.stalled.has(symbol)) {
      return new Promise<PriceBar[]>(() => undefined);
    }
    const failure = this.failures.get(symbol);
    if (failure) {
      throw failure;
    }
    return (this.bars.get(symbol) ?? [])
      .filter((b) => b.timestamp.getTime() >= from.getTime() && b.timestamp.getTime() <= to.getTime())
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }
}

/**
 * Neutrale Werte für alle Features des Default-Schemas
 */
export function neutralValues(): Record<string, number> {
  const values: Record<string, number> = {};
  for (const name of DEFAULT_FEATURE_SCHEMA.names) {
    values[name] = 0;
  }
  values.rsi = 50;
  values.volume_ratio = 1;
  values.vix_level = 15;
  return values;
}

export function buildVector(
  symbol: string,
  collectedAt: Date,
  overrides: Record<string, number> = {},
  observedAt?: Record<string, Date>
): FeatureVector {
  return {
    symbol,
    collectedAt,
    schemaVersion: DEFAULT_FEATURE_SCHEMA.version,
    values: { ...neutralValues(), ...overrides },
    observedAt,
  };
}

export interface PredictionSeed {
  symbol?: string;
  timestamp: Date;
  bucketMs?: number;
  values?: Record<string, number>;
  observedAt?: Record<string, Date>;
  createdAt?: Date;
  action?: PredictedAction;
  confidence?: number;
}

/**
 * Prediction direkt für das Repository (ohne Engine, z.B. für Guard-Szenarien)
 */
export function buildPrediction(seed: PredictionSeed): Prediction {
  const symbol = seed.symbol ?? 'QBE';
  const vector = buildVector(symbol, seed.timestamp, seed.values, seed.observedAt);

  return {
    predictionId: uuidv4(),
    symbol,
    predictionTimestamp: seed.timestamp,
    timeBucket: timeBucketOf(seed.timestamp, seed.bucketMs ?? DAY),
    predictedAction: seed.action ?? 'HOLD',
    actionConfidence: seed.confidence ?? 0.5,
    predictedDirection: null,
    predictedMagnitude: 0,
    featureSnapshot: toSnapshot(vector),
    modelVersion: 'test-model',
    createdAt: seed.createdAt ?? seed.timestamp,
  };
}

export function buildOutcome(prediction: Prediction, opts: {
  horizon?: string;
  horizonMs?: number;
  returnPct: number;
  evaluationDelayMs?: number;
}): Outcome {
  const ts = prediction.predictionTimestamp.getTime();
  const horizonMs = opts.horizonMs ?? DAY;
  const entryPrice = 100;

  return {
    outcomeId: uuidv4(),
    predictionId: prediction.predictionId,
    horizon: opts.horizon ?? '1d',
    actualReturnPct: opts.returnPct,
    actualDirection: opts.returnPct > 0 ? 1 : opts.returnPct < 0 ? -1 : 0,
    entryPrice,
    exitPrice: entryPrice * (1 + opts.returnPct / 100),
    entryTimestamp: new Date(ts),
    exitTimestamp: new Date(ts + horizonMs),
    evaluationTimestamp: new Date(ts + (opts.evaluationDelayMs ?? horizonMs + HOUR)),
  };
}

export function testSettings(overrides: SettingsOverrides = {}): PipelineSettings {
  return resolveSettings({
    marketDataRetries: 0,
    marketDataRetryMinTimeoutMs: 1,
    marketDataTimeoutMs: 2000,
    ...overrides,
  });
}

export interface TestPipeline {
  db: SqliteDatabase;
  pipeline: Pipeline;
  clock: ManualClock;
  marketData: StaticMarketDataProvider;
  lockPath: string;
}

export function createTestPipeline(opts: { start: Date; settings?: PipelineSettings }): TestPipeline {
  const db = openDatabase(':memory:');
  const clock = new ManualClock(opts.start);
  const marketData = new StaticMarketDataProvider();
  const lockPath = join(tmpdir(), `forecast-ledger-test-${uuidv4()}.lock`);

  const pipeline = createPipeline({
    db,
    settings: opts.settings ?? testSettings(),
    marketData,
    trainerLockPath: lockPath,
    clock,
  });

  return { db, pipeline, clock, marketData, lockPath };
}

/**
 * Prediction + Outcome + Status EVALUATED, wie sie der Evaluator hinterlassen würde
 */
export function seedEvaluated(pipeline: Pipeline, seed: PredictionSeed & { returnPct: number }): Prediction {
  const prediction = buildPrediction(seed);
  pipeline.predictions.append(prediction);

  const outcome = buildOutcome(prediction, { returnPct: seed.returnPct });
  pipeline.outcomes.insert(outcome);
  pipeline.predictions.transition(prediction.predictionId, 'EVALUATED', 'test', outcome.evaluationTimestamp);

  return prediction;
}

/**
 * Deterministischer Pseudo-Zufall (LCG) für reproduzierbare Property-Tests
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/**
 * End-to-End: Prediction → Outcome → Audit → Training
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { rmSync } from 'fs';
import { parseHorizons } from '../src/pipeline/settings.js';
import {
  buildVector,
  createTestPipeline,
  DAY,
  HOUR,
  testSettings,
  type TestPipeline,
} from '../src/__tests__/helpers.js';

vi.mock('../src/utils/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { default: log, logger: log };
});

const T0 = new Date('2025-03-03T00:00:00Z');

describe('pipeline end to end', () => {
  let ctx: TestPipeline | null = null;

  afterEach(() => {
    if (ctx) rmSync(ctx.lockPath, { force: true });
    ctx = null;
  });

  it('predicts QBE, evaluates the day after and passes the audit', async () => {
    ctx = createTestPipeline({ start: T0, settings: testSettings({ horizons: parseHorizons('1d') }) });
    const { pipeline, clock, marketData } = ctx;
    pipeline.ensureBaseline();

    const prediction = pipeline.engine.predict('QBE', buildVector('QBE', T0, {
      rsi: 25,
      macd_histogram: 0.4,
      price_vs_sma20: 2.5,
      sentiment_score: 0.3,
    }));

    expect(prediction.predictedAction).toBe('BUY');
    expect(prediction.actionConfidence).toBe(0.8);
    expect(prediction.predictedDirection).toBe(1);

    marketData.setBars('QBE', [[T0, 100], [new Date(T0.getTime() + DAY), 102.76]]);
    clock.advance(DAY + HOUR);

    const first = await pipeline.evaluator.evaluatePending();
    expect(first.outcomesWritten).toBe(1);

    const [outcome] = pipeline.outcomes.listByPrediction(prediction.predictionId);
    expect(outcome.actualReturnPct).toBeCloseTo(2.76, 10);
    expect(outcome.actualDirection).toBe(1);
    expect(outcome.entryPrice).toBe(100);
    expect(outcome.exitPrice).toBe(102.76);
    expect(pipeline.predictions.getStatus(prediction.predictionId)).toBe('EVALUATED');

    const audit = pipeline.audit();
    expect(audit.passed).toBe(true);
    expect(audit.violations).toEqual([]);

    const second = await pipeline.evaluator.evaluatePending();
    expect(second.candidates).toBe(0);
    expect(pipeline.outcomes.count()).toBe(1);
  });

  it('keeps serving the baseline when training data is insufficient', async () => {
    ctx = createTestPipeline({ start: T0, settings: testSettings({ horizons: parseHorizons('1d') }) });
    const baseline = ctx.pipeline.ensureBaseline();

    const report = await ctx.pipeline.trainer.train();

    expect(report.status).toBe('aborted');
    expect(ctx.pipeline.registry.current().modelVersion).toBe(baseline?.modelVersion);
    expect(ctx.pipeline.runs.latest('train')?.status).toBe('aborted');
  });
});

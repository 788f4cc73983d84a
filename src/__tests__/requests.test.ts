/**
 * Tests fuer das Einlesen von Feature-Dateien
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ZodError } from 'zod';
import { parseFeatureFile } from '../prediction/requests.js';
import { DEFAULT_FEATURE_SCHEMA } from '../features/schema.js';
import { createTestPipeline, DAY, neutralValues, type TestPipeline } from './helpers.js';

vi.mock('../utils/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { default: log, logger: log };
});

const WRITTEN = new Date('2025-03-03T00:00:00Z');
const READ = new Date(WRITTEN.getTime() + 3 * DAY);

function entry(symbol: string, extra: Record<string, unknown> = {}) {
  return { symbol, schemaVersion: DEFAULT_FEATURE_SCHEMA.version, values: neutralValues(), ...extra };
}

describe('parseFeatureFile', () => {
  it('stamps collectedAt with the read time when the file has none', () => {
    const [request] = parseFeatureFile([entry('qbe')], READ);

    expect(request.symbol).toBe('QBE');
    expect(request.features.symbol).toBe('QBE');
    expect(request.features.collectedAt.toISOString()).toBe('2025-03-06T00:00:00.000Z');
  });

  it('keeps an explicit collectedAt and observedAt', () => {
    const [request] = parseFeatureFile([entry('BHP', {
      collectedAt: '2025-03-05T12:00:00.000Z',
      observedAt: { rsi: '2025-03-05T11:00:00.000Z' },
    })], READ);

    expect(request.features.collectedAt.toISOString()).toBe('2025-03-05T12:00:00.000Z');
    expect(request.features.observedAt?.rsi?.toISOString()).toBe('2025-03-05T11:00:00.000Z');
  });

  it('rejects malformed entries', () => {
    expect(() => parseFeatureFile([{ symbol: 'QBE', values: {} }], READ)).toThrow(ZodError);
    expect(() => parseFeatureFile([entry('QBE', { collectedAt: 'gestern' })], READ)).toThrow(ZodError);
  });
});

describe('predicting from a feature file read days after it was written', () => {
  let ctx: TestPipeline;

  beforeEach(() => {
    ctx = createTestPipeline({ start: READ });
    ctx.pipeline.ensureBaseline();
  });

  it('predicts entries without collectedAt and reports stale explicit ones', () => {
    const requests = parseFeatureFile([
      entry('QBE'),
      entry('BHP', { collectedAt: WRITTEN.toISOString() }),
    ], ctx.clock.now());

    const report = ctx.pipeline.engine.predictMany(requests);

    expect(report.created).toHaveLength(1);
    expect(report.created[0].symbol).toBe('QBE');
    expect(report.created[0].predictionTimestamp.toISOString()).toBe('2025-03-06T00:00:00.000Z');
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0].symbol).toBe('BHP');
    expect(report.failures[0].code).toBe('TEMPORAL_INTEGRITY');
  });
});

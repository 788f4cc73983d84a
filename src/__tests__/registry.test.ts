/**
 * Tests fuer ModelBundle Registry und ModelHandle
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { openDatabase } from '../storage/db.js';
import { ModelBundleRepository } from '../storage/repositories/modelBundles.js';
import { ModelRegistry } from '../models/registry.js';
import { buildBaselineBundle } from '../models/baseline.js';
import { createModelHandle } from '../models/handle.js';
import { fitNaiveBayes, fitRidge, fitScaler, transform } from '../models/estimators.js';
import { ImmutableRecordError, NoPromotedModelError } from '../errors.js';
import type { ModelBundle } from '../models/types.js';

vi.mock('../utils/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { default: log, logger: log };
});

const T0 = new Date('2025-03-03T00:00:00Z');

function trainedBundle(modelVersion: string): ModelBundle {
  const rows = [[0, 1], [0.2, 1.1], [5, 3], [5.2, 2.9], [0.1, 0.9], [5.1, 3.1]];
  const scaler = fitScaler(rows);
  const scaled = rows.map((row) => transform(scaler, row));

  return {
    modelVersion,
    featureSchema: { version: 't1', names: ['a', 'b'] },
    estimators: {
      kind: 'trained',
      scaler,
      action: fitNaiveBayes(scaled, ['BUY', 'BUY', 'SELL', 'SELL', 'BUY', 'SELL']),
      direction: fitNaiveBayes(scaled, ['1', '1', '-1', '-1', '1', '-1']),
      magnitude: fitRidge(scaled, [1, 1.2, -1, -1.1, 0.9, -1]),
    },
    trainedFrom: new Date('2025-02-01T00:00:00Z'),
    trainedTo: new Date('2025-02-20T00:00:00Z'),
    trainingRows: rows.length,
    holdout: null,
    createdAt: T0,
  };
}

describe('ModelRegistry', () => {
  let bundles: ModelBundleRepository;
  let registry: ModelRegistry;

  beforeEach(() => {
    bundles = new ModelBundleRepository(openDatabase(':memory:'));
    registry = new ModelRegistry(bundles);
  });

  it('throws until a bundle is promoted', () => {
    expect(registry.hasPromoted()).toBe(false);
    expect(() => registry.current()).toThrow(NoPromotedModelError);
  });

  it('promotes and remembers the previous version', () => {
    const baseline = buildBaselineBundle(T0);
    const first = registry.promote(baseline, 'cold start', T0);
    const second = registry.promote(trainedBundle('model-1'), 'holdout ok', T0);

    expect(first.previousVersion).toBeNull();
    expect(second.previousVersion).toBe(baseline.modelVersion);
    expect(registry.current().modelVersion).toBe('model-1');
    expect(bundles.getPromoted()?.modelVersion).toBe('model-1');
  });

  it('rolls back to the previous version', () => {
    const baseline = buildBaselineBundle(T0);
    registry.promote(baseline, 'cold start', T0);
    registry.promote(trainedBundle('model-1'), 'holdout ok', T0);

    const record = registry.rollback('manuell', new Date(T0.getTime() + 1000));

    expect(record?.modelVersion).toBe(baseline.modelVersion);
    expect(record?.previousVersion).toBe('model-1');
    expect(registry.current().modelVersion).toBe(baseline.modelVersion);
    expect(bundles.promotionHistory().map((p) => p.reason)).toEqual(['manuell', 'holdout ok', 'cold start']);
  });

  it('walks back one promotion per rollback', () => {
    const baseline = buildBaselineBundle(T0);
    registry.promote(baseline, 'cold start', T0);
    registry.promote(trainedBundle('model-1'), 'holdout ok', T0);
    registry.promote(trainedBundle('model-2'), 'holdout ok', T0);

    const first = registry.rollback('manuell', new Date(T0.getTime() + 1000));
    const second = registry.rollback('manuell', new Date(T0.getTime() + 2000));

    expect(first?.modelVersion).toBe('model-1');
    expect(second?.modelVersion).toBe(baseline.modelVersion);
    expect(second?.previousVersion).toBe('model-1');
    expect(second?.rollback).toBe(true);
    expect(registry.current().modelVersion).toBe(baseline.modelVersion);
    expect(bundles.activeChain()).toEqual([baseline.modelVersion]);

    // Am Anfang der Kette ist Schluss
    expect(registry.rollback('manuell', new Date(T0.getTime() + 3000))).toBeNull();
    expect(registry.current().modelVersion).toBe(baseline.modelVersion);
  });

  it('continues the chain after a promotion that follows a rollback', () => {
    const baseline = buildBaselineBundle(T0);
    registry.promote(baseline, 'cold start', T0);
    registry.promote(trainedBundle('model-1'), 'holdout ok', T0);
    registry.rollback('manuell', T0);
    registry.promote(trainedBundle('model-2'), 'holdout ok', T0);

    expect(bundles.activeChain()).toEqual([baseline.modelVersion, 'model-2']);
    expect(registry.rollback('manuell', T0)?.modelVersion).toBe(baseline.modelVersion);
  });

  it('cannot roll back without a previous version', () => {
    registry.promote(buildBaselineBundle(T0), 'cold start', T0);

    expect(registry.rollback('manuell', T0)).toBeNull();
  });

  it('never overwrites a registered version', () => {
    registry.promote(trainedBundle('model-1'), 'holdout ok', T0);

    expect(() => registry.promote(trainedBundle('model-1'), 'again', T0)).toThrow(ImmutableRecordError);
    expect(bundles.promotionHistory()).toHaveLength(1);
    expect(registry.current().modelVersion).toBe('model-1');
  });

  it('registers without promoting', () => {
    bundles.register(trainedBundle('model-2'));

    expect(bundles.listVersions()).toEqual(['model-2']);
    expect(registry.hasPromoted()).toBe(false);
  });

  it('picks up promotions from another registry after reload', () => {
    const other = new ModelRegistry(bundles);
    expect(registry.hasPromoted()).toBe(false);

    other.promote(trainedBundle('model-1'), 'holdout ok', T0);

    expect(registry.hasPromoted()).toBe(false);
    expect(registry.reload()?.modelVersion).toBe('model-1');
  });

  it('restores a trained bundle exactly from storage', () => {
    const bundle = trainedBundle('model-1');
    bundles.register(bundle);

    const restored = bundles.getByVersion('model-1');
    expect(restored).toEqual(bundle);

    if (!restored) return;
    const features = [0.1, 1];
    expect(createModelHandle(restored).predict(features)).toEqual(createModelHandle(bundle).predict(features));
  });
});

describe('createModelHandle', () => {
  it('returns a frozen handle detached from the bundle', () => {
    const bundle = trainedBundle('model-1');
    const handle = createModelHandle(bundle);

    bundle.featureSchema.names.push('c');

    expect(Object.isFrozen(handle)).toBe(true);
    expect(Object.isFrozen(handle.featureSchema)).toBe(true);
    expect(handle.featureSchema.names).toEqual(['a', 'b']);
  });

  it('predicts with trained estimators', () => {
    const handle = createModelHandle(trainedBundle('model-1'));

    const bullish = handle.predict([0.1, 1]);
    const bearish = handle.predict([5.1, 3]);

    expect(bullish.action).toBe('BUY');
    expect(bullish.direction).toBe(1);
    expect(bullish.magnitude).toBeGreaterThan(0);
    expect(bearish.action).toBe('SELL');
    expect(bearish.direction).toBe(-1);
    expect(bearish.magnitude).toBeLessThan(0);
  });

  it('rejects feature arrays of the wrong length', () => {
    const handle = createModelHandle(trainedBundle('model-1'));

    expect(() => handle.predict([1])).toThrow(/erwartet 2 Features/);
  });
});

/**
 * Tests fuer Feature-Schema Validierung und Snapshots
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DEFAULT_FEATURE_SCHEMA,
  latestSnapshotTime,
  sameSchema,
  toSnapshot,
  validateFeatureVector,
} from '../features/schema.js';
import { FeatureSchemaError } from '../errors.js';
import { buildVector } from './helpers.js';

vi.mock('../utils/logger.js', () => {
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
  return { default: log, logger: log };
});

const T0 = new Date('2025-03-03T00:00:00Z');

describe('validateFeatureVector', () => {
  it('returns values in schema order', () => {
    const features = validateFeatureVector(buildVector('QBE', T0, { sentiment_score: 0.3, rsi: 25 }), DEFAULT_FEATURE_SCHEMA);

    expect(features).toHaveLength(DEFAULT_FEATURE_SCHEMA.names.length);
    expect(features[0]).toBe(0.3);   // sentiment_score
    expect(features[4]).toBe(25);    // rsi
  });

  it('rejects a different schema version', () => {
    const vector = { ...buildVector('QBE', T0), schemaVersion: 'v2' };
    expect(() => validateFeatureVector(vector, DEFAULT_FEATURE_SCHEMA)).toThrow(FeatureSchemaError);
  });

  it('rejects unknown features', () => {
    try {
      validateFeatureVector(buildVector('QBE', T0, { foo: 1 }), DEFAULT_FEATURE_SCHEMA);
      expect.fail('should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(FeatureSchemaError);
      if (err instanceof FeatureSchemaError) {
        expect(err.issues).toEqual(['unbekannte Features: foo']);
      }
    }
  });

  it('rejects missing features', () => {
    const vector = buildVector('QBE', T0);
    delete vector.values.rsi;
    expect(() => validateFeatureVector(vector, DEFAULT_FEATURE_SCHEMA)).toThrow(FeatureSchemaError);
  });

  it('rejects non-finite values', () => {
    expect(() => validateFeatureVector(buildVector('QBE', T0, { rsi: Number.NaN }), DEFAULT_FEATURE_SCHEMA))
      .toThrow(FeatureSchemaError);
    expect(() => validateFeatureVector(buildVector('QBE', T0, { rsi: Infinity }), DEFAULT_FEATURE_SCHEMA))
      .toThrow(FeatureSchemaError);
  });

  it('rejects observedAt entries for unknown features', () => {
    const vector = buildVector('QBE', T0, {}, { foo: T0 });
    expect(() => validateFeatureVector(vector, DEFAULT_FEATURE_SCHEMA)).toThrow(/observedAt/);
  });
});

describe('snapshots', () => {
  it('stores collectedAt and observedAt as ISO strings', () => {
    const observed = new Date('2025-03-02T22:00:00Z');
    const snapshot = toSnapshot(buildVector('QBE', T0, { rsi: 25 }, { rsi: observed }));

    expect(snapshot.collectedAt).toBe('2025-03-03T00:00:00.000Z');
    expect(snapshot.observedAt).toEqual({ rsi: '2025-03-02T22:00:00.000Z' });
    expect(snapshot.values.rsi).toBe(25);
  });

  it('finds the latest timestamp in a snapshot', () => {
    const later = new Date('2025-03-03T01:00:00Z');
    const snapshot = toSnapshot(buildVector('QBE', T0, {}, { rsi: later }));

    const latest = latestSnapshotTime(snapshot);
    expect(latest.source).toBe('rsi');
    expect(latest.at.toISOString()).toBe('2025-03-03T01:00:00.000Z');
  });

  it('falls back to collectedAt without observedAt', () => {
    const latest = latestSnapshotTime(toSnapshot(buildVector('QBE', T0)));
    expect(latest.source).toBe('collectedAt');
  });
});

describe('sameSchema', () => {
  it('compares version and ordered names', () => {
    expect(sameSchema(DEFAULT_FEATURE_SCHEMA, { version: 'v1', names: [...DEFAULT_FEATURE_SCHEMA.names] })).toBe(true);
    expect(sameSchema(DEFAULT_FEATURE_SCHEMA, { version: 'v1', names: [...DEFAULT_FEATURE_SCHEMA.names].reverse() })).toBe(false);
    expect(sameSchema(DEFAULT_FEATURE_SCHEMA, { version: 'v2', names: [...DEFAULT_FEATURE_SCHEMA.names] })).toBe(false);
  });
});

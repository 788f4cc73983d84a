/**
 * Tests fuer die Schätzer (Scaler, Naive Bayes, Ridge) und Baseline-Regeln
 */

import { describe, it, expect } from 'vitest';
import {
  fitNaiveBayes,
  fitRidge,
  fitScaler,
  predictNaiveBayes,
  predictRidge,
  transform,
} from '../models/estimators.js';
import { baselineAction, countSignals, DEFAULT_BASELINE_RULES } from '../models/baseline.js';

describe('fitScaler', () => {
  it('centers and scales each column', () => {
    const scaler = fitScaler([[1, 10], [3, 10]]);

    expect(scaler.means).toEqual([2, 10]);
    expect(scaler.stds).toEqual([1, 1]);
    expect(transform(scaler, [3, 10])).toEqual([1, 0]);
  });

  it('rejects rows of the wrong width', () => {
    const scaler = fitScaler([[1, 2]]);
    expect(() => transform(scaler, [1])).toThrow(/passt nicht zum Scaler/);
  });
});

describe('Gaussian Naive Bayes', () => {
  const rows = [[0], [0.1], [-0.1], [5], [5.1], [4.9]];
  const labels = ['a', 'a', 'a', 'b', 'b', 'b'];

  it('learns sorted classes with their priors', () => {
    const params = fitNaiveBayes(rows, labels);

    expect(params.classes).toEqual(['a', 'b']);
    expect(params.priors).toEqual([0.5, 0.5]);
    expect(params.means[0][0]).toBeCloseTo(0, 10);
    expect(params.means[1][0]).toBeCloseTo(5, 10);
  });

  it('predicts the closest class with normalized probabilities', () => {
    const params = fitNaiveBayes(rows, labels);

    const near = predictNaiveBayes(params, [0.05]);
    expect(near.label).toBe('a');
    expect(near.probability).toBeGreaterThan(0.99);
    expect(near.probabilities.a + near.probabilities.b).toBeCloseTo(1, 10);

    expect(predictNaiveBayes(params, [5.2]).label).toBe('b');
  });

  it('rejects mismatched input', () => {
    expect(() => fitNaiveBayes([[1]], ['a', 'b'])).toThrow(/gleich lang/);
    expect(() => fitNaiveBayes([], [])).toThrow(/nicht leer/);
  });
});

describe('Ridge regression', () => {
  const rows = [[0], [1], [2], [3], [4]];
  const targets = rows.map(([x]) => 2 * x + 1);

  it('recovers a linear relation with little regularization', () => {
    const params = fitRidge(rows, targets, 1e-8);

    expect(params.intercept).toBeCloseTo(1, 4);
    expect(params.weights[0]).toBeCloseTo(2, 4);
    expect(predictRidge(params, [10])).toBeCloseTo(21, 3);
  });

  it('shrinks weights with stronger regularization', () => {
    const params = fitRidge(rows, targets, 10);

    expect(params.weights[0]).toBeLessThan(2);
    expect(params.weights[0]).toBeGreaterThan(0);
  });
});

describe('baseline rules', () => {
  const neutral = { rsi: 50, macd_histogram: 0, price_vs_sma20: 0, sentiment_score: 0, volume_ratio: 1 };

  it('counts bullish and bearish signals', () => {
    expect(countSignals({ ...neutral, rsi: 25, macd_histogram: 0.4 }, DEFAULT_BASELINE_RULES)).toEqual({ bullish: 2, bearish: 0 });
    expect(countSignals({ ...neutral, rsi: 75, sentiment_score: -0.3 }, DEFAULT_BASELINE_RULES)).toEqual({ bullish: 0, bearish: 2 });
    expect(countSignals({ ...neutral, volume_ratio: 3 }, DEFAULT_BASELINE_RULES)).toEqual({ bullish: 0.5, bearish: 0 });
  });

  it('needs a margin of more than one signal for BUY or SELL', () => {
    expect(baselineAction({ bullish: 2, bearish: 1 }, DEFAULT_BASELINE_RULES)).toEqual({ action: 'HOLD', confidence: 0.75 });
    expect(baselineAction({ bullish: 2.5, bearish: 1 }, DEFAULT_BASELINE_RULES)).toEqual({ action: 'BUY', confidence: 0.8 });
    expect(baselineAction({ bullish: 0, bearish: 2 }, DEFAULT_BASELINE_RULES)).toEqual({ action: 'SELL', confidence: 0.5 });
    expect(baselineAction({ bullish: 0, bearish: 0 }, DEFAULT_BASELINE_RULES)).toEqual({ action: 'HOLD', confidence: 0.5 });
  });
});

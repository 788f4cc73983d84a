/**
 * Tests fuer Config Defaults und Env-Overrides
 * Prueft dass die zeitlichen Grenzen sicher vorbelegt sind
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';

const PIPELINE_ENV = [
  'MIN_EVAL_DELAY_MINUTES',
  'HOLDOUT_WINDOW_DAYS',
  'BUCKET_HOURS',
  'EVAL_HORIZONS',
  'TRAINING_HORIZON',
  'EXPIRY_WINDOW_HOURS',
  'PROMOTION_TOLERANCE',
  'TRAIN_HOUR_UTC',
  'PORT',
  'TRAINER_LOCK_PATH',
];

describe('Config Defaults', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // Reset env und Module-Cache
    vi.resetModules();
    process.env = { ...originalEnv };
    for (const key of PIPELINE_ENV) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('MIN_EVAL_DELAY defaults to one hour', async () => {
    const { config } = await import('../src/utils/config.js');
    expect(config.pipeline.minEvalDelayMs).toBe(60 * 60 * 1000);
  });

  it('HOLDOUT_WINDOW defaults to seven days', async () => {
    const { config } = await import('../src/utils/config.js');
    expect(config.pipeline.holdoutWindowMs).toBe(7 * 24 * 60 * 60 * 1000);
  });

  it('evaluates 1h, 4h and 1d and trains on 1d by default', async () => {
    const { config } = await import('../src/utils/config.js');
    expect(config.pipeline.horizons.map((h) => h.label)).toEqual(['1h', '4h', '1d']);
    expect(config.pipeline.trainingHorizon).toBe('1d');
  });

  it('expires predictions after 72 hours by default', async () => {
    const { config } = await import('../src/utils/config.js');
    expect(config.pipeline.expiryWindowMs).toBe(72 * 60 * 60 * 1000);
  });

  it('uses port 3000 and a lock file next to the database', async () => {
    const { config, PORT } = await import('../src/utils/config.js');
    expect(PORT).toBe(3000);
    expect(config.trainerLockPath).toBe('./data/.trainer.lock');
  });
});

describe('Config Overrides', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    vi.resetModules();
    process.env = { ...originalEnv };
    for (const key of PIPELINE_ENV) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('reads the minimum evaluation delay in minutes', async () => {
    process.env.MIN_EVAL_DELAY_MINUTES = '30';
    const { config } = await import('../src/utils/config.js');
    expect(config.pipeline.minEvalDelayMs).toBe(30 * 60 * 1000);
  });

  it('sorts configured horizons', async () => {
    process.env.EVAL_HORIZONS = '4h,1h';
    process.env.TRAINING_HORIZON = '4h';
    const { config } = await import('../src/utils/config.js');
    expect(config.pipeline.horizons.map((h) => h.label)).toEqual(['1h', '4h']);
  });

  it('refuses a training horizon that is never evaluated', async () => {
    process.env.EVAL_HORIZONS = '1h,4h';
    await expect(import('../src/utils/config.js')).rejects.toThrow(/Trainings-Horizont/);
  });

  it('refuses a promotion tolerance above 1', async () => {
    process.env.PROMOTION_TOLERANCE = '2';
    await expect(import('../src/utils/config.js')).rejects.toThrow();
  });

  it('refuses a training hour outside the day', async () => {
    process.env.TRAIN_HOUR_UTC = '24';
    await expect(import('../src/utils/config.js')).rejects.toThrow();
  });
});

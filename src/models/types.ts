/**
 * ModelBundle: versionierte Einheit aus Feature-Schema und drei Schätzern.
 * Die Engine liest immer ein komplettes Bundle, nie einzelne Schätzer.
 */

import { z } from 'zod';
import { featureSchemaSchema, type FeatureSchema } from '../features/schema.js';
import type { NaiveBayesParams, RidgeParams, ScalerParams } from './estimators.js';

export interface BaselineRules {
  rsiOversold: number;
  rsiOverbought: number;
  smaBand: number;
  sentimentBand: number;
  volumeSpike: number;
  maxConfidence: number;
  defaultMagnitude: number;
}

export interface TrainedEstimators {
  kind: 'trained';
  scaler: ScalerParams;
  action: NaiveBayesParams;
  direction: NaiveBayesParams;
  magnitude: RidgeParams;
}

export interface BaselineEstimators {
  kind: 'baseline';
  rules: BaselineRules;
}

export type EstimatorSet = TrainedEstimators | BaselineEstimators;

export interface HoldoutMetrics {
  samples: number;
  actionAccuracy: number;
  directionAccuracy: number;
  directionCoverage: number;   // Anteil ohne Enthaltung
  magnitudeMae: number;
  simulatedReturnPct: number;  // Summe der Renditen aus BUY/SELL-Signalen
  simulatedTrades: number;
  winRate: number;
}

export interface ModelBundle {
  modelVersion: string;
  featureSchema: FeatureSchema;
  estimators: EstimatorSet;
  trainedFrom: Date | null;
  trainedTo: Date | null;
  trainingRows: number;
  holdout: HoldoutMetrics | null;
  createdAt: Date;
}

export interface PromotionRecord {
  modelVersion: string;
  previousVersion: string | null;
  reason: string;
  promotedAt: Date;
  rollback: boolean;
}

// ═══════════════════════════════════════════════════════════════
//                    PERSISTENZ-SCHEMAS (JSON)
// ═══════════════════════════════════════════════════════════════

const numberArray = z.array(z.number());

const naiveBayesSchema = z.object({
  classes: z.array(z.string()).min(1),
  priors: numberArray,
  means: z.array(numberArray),
  variances: z.array(numberArray),
});

export const estimatorSetSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('trained'),
    scaler: z.object({ means: numberArray, stds: numberArray }),
    action: naiveBayesSchema,
    direction: naiveBayesSchema,
    magnitude: z.object({ intercept: z.number(), weights: numberArray, lambda: z.number() }),
  }),
  z.object({
    kind: z.literal('baseline'),
    rules: z.object({
      rsiOversold: z.number(),
      rsiOverbought: z.number(),
      smaBand: z.number(),
      sentimentBand: z.number(),
      volumeSpike: z.number(),
      maxConfidence: z.number(),
      defaultMagnitude: z.number(),
    }),
  }),
]);

export const holdoutMetricsSchema = z.object({
  samples: z.number().int(),
  actionAccuracy: z.number(),
  directionAccuracy: z.number(),
  directionCoverage: z.number(),
  magnitudeMae: z.number(),
  simulatedReturnPct: z.number(),
  simulatedTrades: z.number().int(),
  winRate: z.number(),
});

export { featureSchemaSchema };

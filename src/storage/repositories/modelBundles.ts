/**
 * ModelBundle Registry
 * Bundles sind unveränderlich. Das aktive Bundle ist die letzte Zeile in model_promotions,
 * Rollback ist eine neue Promotion auf eine ältere Version. Die Historie wird als Stack
 * gelesen: Promotions legen auf, Rollbacks nehmen ab. Wiederholte Rollbacks gehen so
 * Schritt für Schritt zurück, statt zwischen zwei Versionen zu pendeln.
 */

import { z } from 'zod';
import type { SqliteDatabase } from '../db.js';
import { isUniqueViolation } from '../db.js';
import { ImmutableRecordError } from '../../errors.js';
import {
  estimatorSetSchema,
  featureSchemaSchema,
  holdoutMetricsSchema,
  type ModelBundle,
  type PromotionRecord,
} from '../../models/types.js';

const bundleRowSchema = z.object({
  model_version: z.string(),
  kind: z.enum(['trained', 'baseline']),
  feature_schema: z.string(),
  estimators: z.string(),
  trained_from: z.string().nullable(),
  trained_to: z.string().nullable(),
  training_rows: z.number().int(),
  holdout_report: z.string().nullable(),
  created_at: z.string(),
});

const promotionRowSchema = z.object({
  model_version: z.string(),
  previous_version: z.string().nullable(),
  reason: z.string(),
  promoted_at: z.string(),
  is_rollback: z.number().int(),
});

const versionRowSchema = z.object({
  model_version: z.string(),
});

export function rowToBundle(row: unknown): ModelBundle {
  const r = bundleRowSchema.parse(row);
  return {
    modelVersion: r.model_version,
    featureSchema: featureSchemaSchema.parse(JSON.parse(r.feature_schema)),
    estimators: estimatorSetSchema.parse(JSON.parse(r.estimators)),
    trainedFrom: r.trained_from ? new Date(r.trained_from) : null,
    trainedTo: r.trained_to ? new Date(r.trained_to) : null,
    trainingRows: r.training_rows,
    holdout: r.holdout_report ? holdoutMetricsSchema.parse(JSON.parse(r.holdout_report)) : null,
    createdAt: new Date(r.created_at),
  };
}

function rowToPromotion(row: unknown): PromotionRecord {
  const r = promotionRowSchema.parse(row);
  return {
    modelVersion: r.model_version,
    previousVersion: r.previous_version,
    reason: r.reason,
    promotedAt: new Date(r.promoted_at),
    rollback: r.is_rollback === 1,
  };
}

export class ModelBundleRepository {
  constructor(private readonly db: SqliteDatabase) {}

  /**
   * Registriert ein Bundle ohne es zu aktivieren
   * @throws ImmutableRecordError wenn die Version bereits existiert
   */
  register(bundle: ModelBundle): void {
    try {
      this.insertBundle(bundle);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ImmutableRecordError('ModelBundle', bundle.modelVersion);
      }
      throw err;
    }
  }

  /**
   * Registrierung und Promotion in einer Transaktion: entweder beides oder nichts
   */
  registerAndPromote(bundle: ModelBundle, reason: string, at: Date): PromotionRecord {
    const apply = this.db.transaction((): PromotionRecord => {
      this.register(bundle);
      return this.insertPromotion(bundle.modelVersion, reason, at, false);
    });
    return apply();
  }

  /**
   * Aktiviert eine bereits registrierte Version (z.B. Rollback)
   */
  promote(modelVersion: string, reason: string, at: Date): PromotionRecord {
    const apply = this.db.transaction((): PromotionRecord => {
      if (!this.getByVersion(modelVersion)) {
        throw new Error(`ModelBundle ${modelVersion} ist nicht registriert`);
      }
      return this.insertPromotion(modelVersion, reason, at, false);
    });
    return apply();
  }

  /**
   * Rollback auf die Version, die vor der aktiven promotet wurde
   * @returns null wenn es keine Vorgänger-Version gibt
   */
  rollback(reason: string, at: Date): PromotionRecord | null {
    const apply = this.db.transaction((): PromotionRecord | null => {
      const chain = this.activeChain();
      const target = chain[chain.length - 2];
      if (!target) {
        return null;
      }
      return this.insertPromotion(target, reason, at, true);
    });
    return apply();
  }

  /**
   * Versionen, auf die noch zurückgerollt werden kann (älteste zuerst, aktive zuletzt)
   */
  activeChain(): string[] {
    const rows = this.db.prepare(`
      SELECT model_version, previous_version, reason, promoted_at, is_rollback
      FROM model_promotions
      ORDER BY id ASC
    `).all();

    const chain: string[] = [];
    for (const record of rows.map(rowToPromotion)) {
      if (record.rollback) {
        chain.pop();
      } else {
        chain.push(record.modelVersion);
      }
    }
    return chain;
  }

  getPromoted(): ModelBundle | null {
    const row = this.db.prepare(`
      SELECT b.* FROM model_bundles b
      JOIN model_promotions p ON p.model_version = b.model_version
      ORDER BY p.id DESC
      LIMIT 1
    `).get();

    return row ? rowToBundle(row) : null;
  }

  getByVersion(modelVersion: string): ModelBundle | null {
    const row = this.db.prepare(`SELECT * FROM model_bundles WHERE model_version = ?`).get(modelVersion);
    return row ? rowToBundle(row) : null;
  }

  listVersions(limit: number = 50): string[] {
    const rows = this.db.prepare(`
      SELECT model_version FROM model_bundles
      ORDER BY created_at DESC, model_version DESC
      LIMIT ?
    `).all(limit);

    return rows.map((row) => versionRowSchema.parse(row).model_version);
  }

  promotionHistory(limit: number = 20): PromotionRecord[] {
    const rows = this.db.prepare(`
      SELECT model_version, previous_version, reason, promoted_at, is_rollback
      FROM model_promotions
      ORDER BY id DESC
      LIMIT ?
    `).all(limit);

    return rows.map(rowToPromotion);
  }

  private insertBundle(b: ModelBundle): void {
    this.db.prepare(`
      INSERT INTO model_bundles (
        model_version, kind, feature_schema, estimators,
        trained_from, trained_to, training_rows, holdout_report, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      b.modelVersion,
      b.estimators.kind,
      JSON.stringify(b.featureSchema),
      JSON.stringify(b.estimators),
      b.trainedFrom?.toISOString() ?? null,
      b.trainedTo?.toISOString() ?? null,
      b.trainingRows,
      b.holdout ? JSON.stringify(b.holdout) : null,
      b.createdAt.toISOString()
    );
  }

  private insertPromotion(modelVersion: string, reason: string, at: Date, rollback: boolean): PromotionRecord {
    const previous = this.promotionHistory(1)[0]?.modelVersion ?? null;

    this.db.prepare(`
      INSERT INTO model_promotions (model_version, previous_version, reason, promoted_at, is_rollback)
      VALUES (?, ?, ?, ?, ?)
    `).run(modelVersion, previous, reason, at.toISOString(), rollback ? 1 : 0);

    return { modelVersion, previousVersion: previous, reason, promotedAt: at, rollback };
  }
}

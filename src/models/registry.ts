/**
 * ModelRegistry
 * Hält den aktiven ModelHandle im Speicher. Promotion schreibt zuerst in SQLite
 * und tauscht danach den Pointer; laufende Vorhersagen behalten ihren Handle.
 */

import logger from '../utils/logger.js';
import { NoPromotedModelError } from '../errors.js';
import type { ModelBundleRepository } from '../storage/repositories/modelBundles.js';
import { createModelHandle, type ModelHandle } from './handle.js';
import type { ModelBundle, PromotionRecord } from './types.js';

export class ModelRegistry {
  private handle: ModelHandle | null = null;
  private loaded = false;

  constructor(private readonly bundles: ModelBundleRepository) {}

  /**
   * Aktiver Handle (lazy aus der DB geladen)
   * @throws NoPromotedModelError wenn noch nie ein Bundle promotet wurde
   */
  current(): ModelHandle {
    if (!this.loaded) {
      this.reload();
    }
    if (!this.handle) {
      throw new NoPromotedModelError();
    }
    return this.handle;
  }

  hasPromoted(): boolean {
    if (!this.loaded) {
      this.reload();
    }
    return this.handle !== null;
  }

  /**
   * Liest das promotete Bundle neu (z.B. nach Promotion aus einem anderen Prozess)
   */
  reload(): ModelHandle | null {
    const bundle = this.bundles.getPromoted();
    this.handle = bundle ? createModelHandle(bundle) : null;
    this.loaded = true;

    if (bundle) {
      logger.debug(`[REGISTRY] Aktives Bundle: ${bundle.modelVersion} (${bundle.estimators.kind})`);
    }
    return this.handle;
  }

  /**
   * Registriert und aktiviert ein neues Bundle
   */
  promote(bundle: ModelBundle, reason: string, at: Date): PromotionRecord {
    // Handle vor dem Schreiben bauen: ein defektes Bundle wird nie aktiv
    const next = createModelHandle(bundle);
    const record = this.bundles.registerAndPromote(bundle, reason, at);

    this.handle = next;
    this.loaded = true;

    logger.info(
      `[REGISTRY] Promotion: ${record.previousVersion ?? 'keins'} → ${record.modelVersion} (${reason})`
    );
    return record;
  }

  /**
   * Aktiviert die vorher aktive Version erneut
   */
  rollback(reason: string, at: Date): PromotionRecord | null {
    const record = this.bundles.rollback(reason, at);
    if (!record) {
      logger.warn('[REGISTRY] Rollback nicht möglich: keine Vorgänger-Version');
      return null;
    }

    this.reload();
    logger.info(`[REGISTRY] Rollback: ${record.previousVersion ?? 'keins'} → ${record.modelVersion}`);
    return record;
  }
}

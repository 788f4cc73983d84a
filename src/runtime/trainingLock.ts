// ═══════════════════════════════════════════════════════════════
//                    TRAINING LOCK
//   Höchstens ein Trainer gleichzeitig: im Prozess per Flag,
//   prozessübergreifend per PID-Datei
// ═══════════════════════════════════════════════════════════════
import { existsSync, mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import logger from '../utils/logger.js';
import { TrainingInProgressError, errorMessage } from '../errors.js';

// Prozessweit, unabhängig von der Anzahl Lock-Instanzen
const heldPaths = new Set<string>();

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 = prüft nur ob Prozess existiert
    return true;
  } catch (err) {
    // EPERM: Prozess existiert, gehört aber einem anderen User
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

function readHolder(lockPath: string): number | null {
  try {
    const pid = parseInt(readFileSync(lockPath, 'utf-8').trim(), 10);
    return Number.isFinite(pid) ? pid : null;
  } catch {
    return null;  // Datei zwischen exists und read verschwunden
  }
}

export class TrainingLock {
  constructor(private readonly lockPath: string) {}

  /**
   * @throws TrainingInProgressError wenn ein anderer Trainer läuft
   */
  acquire(): void {
    if (heldPaths.has(this.lockPath)) {
      throw new TrainingInProgressError(process.pid);
    }

    const dir = dirname(this.lockPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    if (!this.tryCreate()) {
      const pid = readHolder(this.lockPath);
      if (pid !== null && pid !== process.pid && isProcessAlive(pid)) {
        throw new TrainingInProgressError(pid);
      }

      // Altes Lock File, überschreiben
      logger.warn(`[LOCK] Stale Trainer-Lock (PID ${pid ?? '?'} tot), übernehme...`);
      unlinkSync(this.lockPath);
      if (!this.tryCreate()) {
        throw new TrainingInProgressError(readHolder(this.lockPath));
      }
    }

    heldPaths.add(this.lockPath);
    logger.debug(`[LOCK] Trainer-Lock erworben (PID: ${process.pid})`);
  }

  release(): void {
    if (!heldPaths.delete(this.lockPath)) {
      return;
    }

    try {
      if (existsSync(this.lockPath) && readHolder(this.lockPath) === process.pid) {
        unlinkSync(this.lockPath);
      }
      logger.debug('[LOCK] Trainer-Lock freigegeben');
    } catch (err) {
      logger.error(`[LOCK] Freigabe Fehler: ${errorMessage(err)}`);
    }
  }

  isHeld(): boolean {
    return heldPaths.has(this.lockPath);
  }

  /**
   * Exklusives Anlegen ('wx' schlägt fehl, wenn die Datei existiert)
   */
  private tryCreate(): boolean {
    try {
      writeFileSync(this.lockPath, String(process.pid), { flag: 'wx' });
      return true;
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
        return false;
      }
      throw err;
    }
  }
}

/**
 * Pipeline Runs Repository
 * Jeder Evaluator-, Trainer- und Audit-Lauf hinterlässt seinen Report als JSON.
 */

import { z } from 'zod';
import type { SqliteDatabase } from '../db.js';
import { logger } from '../../utils/logger.js';

export type PipelineStage = 'evaluate' | 'train' | 'audit';

export interface PipelineRun {
  runId: string;
  stage: PipelineStage;
  status: string;
  startedAt: Date;
  finishedAt: Date;
  report: unknown;
}

const runRowSchema = z.object({
  run_id: z.string(),
  stage: z.enum(['evaluate', 'train', 'audit']),
  status: z.string(),
  started_at: z.string(),
  finished_at: z.string(),
  report: z.string(),
});

function rowToRun(row: unknown): PipelineRun {
  const r = runRowSchema.parse(row);
  return {
    runId: r.run_id,
    stage: r.stage,
    status: r.status,
    startedAt: new Date(r.started_at),
    finishedAt: new Date(r.finished_at),
    report: JSON.parse(r.report),
  };
}

export class PipelineRunRepository {
  constructor(private readonly db: SqliteDatabase) {}

  record(run: PipelineRun): void {
    this.db.prepare(`
      INSERT INTO pipeline_runs (run_id, stage, status, started_at, finished_at, report)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      run.runId,
      run.stage,
      run.status,
      run.startedAt.toISOString(),
      run.finishedAt.toISOString(),
      JSON.stringify(run.report)
    );

    logger.debug(`[RUNS] ${run.stage} ${run.runId}: ${run.status}`);
  }

  getById(runId: string): PipelineRun | null {
    const row = this.db.prepare(`SELECT * FROM pipeline_runs WHERE run_id = ?`).get(runId);
    return row ? rowToRun(row) : null;
  }

  listRecent(stage?: PipelineStage, limit: number = 20): PipelineRun[] {
    const rows = stage
      ? this.db.prepare(`
          SELECT * FROM pipeline_runs WHERE stage = ?
          ORDER BY started_at DESC LIMIT ?
        `).all(stage, limit)
      : this.db.prepare(`
          SELECT * FROM pipeline_runs
          ORDER BY started_at DESC LIMIT ?
        `).all(limit);

    return rows.map(rowToRun);
  }

  latest(stage: PipelineStage): PipelineRun | null {
    return this.listRecent(stage, 1)[0] ?? null;
  }
}

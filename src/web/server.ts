import express, { type Request, type Response, type NextFunction } from 'express';
import { createServer, type Server } from 'http';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import type { Pipeline } from '../pipeline/index.js';
import type { PipelineScheduler } from '../runtime/scheduler.js';
import type { PipelineStage } from '../storage/repositories/pipelineRuns.js';

const limitSchema = z.coerce.number().int().min(1).max(500).default(50);
const stageSchema = z.enum(['evaluate', 'train', 'audit']).optional();
const windowSchema = z.object({
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
});

function firstQuery(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/**
 * Read-only HTTP-Oberfläche für Operatoren.
 * Schreibende Operationen laufen ausschließlich über Scheduler und CLI.
 */
export function createWebApp(pipeline: Pipeline, scheduler?: PipelineScheduler): express.Express {
  const app = express();
  app.disable('x-powered-by');

  // ═══════════════════════════════════════════════════════════════
  //                        HEALTH
  // ═══════════════════════════════════════════════════════════════

  app.get('/health', (_req: Request, res: Response) => {
    const checks = {
      database: true,
      model: pipeline.registry.hasPromoted(),
      scheduler: scheduler ? scheduler.isRunning() : false,
    };

    let statusCounts: Record<string, number> = {};
    try {
      statusCounts = pipeline.predictions.countByStatus();
    } catch (err) {
      checks.database = false;
      logger.error(`[WEB] Health DB Fehler: ${errorMessage(err)}`);
    }

    const healthy = checks.database && checks.model;
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      checks,
      activeModel: checks.model ? pipeline.registry.current().modelVersion : null,
      predictions: statusCounts,
    });
  });

  // ═══════════════════════════════════════════════════════════════
  //                        PREDICTIONS
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/predictions', (req: Request, res: Response) => {
    const limit = limitSchema.safeParse(firstQuery(req.query.limit));
    if (!limit.success) {
      res.status(400).json({ error: 'Ungültiges limit' });
      return;
    }

    const symbol = firstQuery(req.query.symbol);
    const list = symbol
      ? pipeline.predictions.listBySymbol(symbol.toUpperCase(), limit.data)
      : pipeline.predictions.listRecent(limit.data);

    res.json(list.map((p) => ({ ...p, status: pipeline.predictions.getStatus(p.predictionId) })));
  });

  app.get('/api/predictions/:id', (req: Request, res: Response) => {
    const prediction = pipeline.predictions.getById(req.params.id);
    if (!prediction) {
      res.status(404).json({ error: 'Prediction nicht gefunden' });
      return;
    }

    res.json({
      ...prediction,
      status: pipeline.predictions.getStatus(prediction.predictionId),
      outcomes: pipeline.outcomes.listByPrediction(prediction.predictionId),
    });
  });

  // ═══════════════════════════════════════════════════════════════
  //                        MODELS / AUDIT / RUNS
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/models', (_req: Request, res: Response) => {
    const active = pipeline.bundles.getPromoted();
    res.json({
      active: active
        ? {
            modelVersion: active.modelVersion,
            kind: active.estimators.kind,
            featureSchema: active.featureSchema,
            trainingRows: active.trainingRows,
            holdout: active.holdout,
          }
        : null,
      versions: pipeline.bundles.listVersions(),
      promotions: pipeline.bundles.promotionHistory(),
    });
  });

  app.get('/api/audit', (req: Request, res: Response) => {
    const window = windowSchema.safeParse({
      from: firstQuery(req.query.from),
      to: firstQuery(req.query.to),
    });
    if (!window.success) {
      res.status(400).json({ error: 'from/to müssen ISO-Zeitstempel sein' });
      return;
    }

    // Guard liest nur, der Audit-Lauf wird nicht gespeichert
    res.json(pipeline.guard.audit({
      from: window.data.from ? new Date(window.data.from) : undefined,
      to: window.data.to ? new Date(window.data.to) : undefined,
    }));
  });

  app.get('/api/runs', (req: Request, res: Response) => {
    const stage = stageSchema.safeParse(firstQuery(req.query.stage));
    const limit = limitSchema.safeParse(firstQuery(req.query.limit));
    if (!stage.success || !limit.success) {
      res.status(400).json({ error: 'Ungültige Parameter' });
      return;
    }

    const filter: PipelineStage | undefined = stage.data;
    res.json(pipeline.runs.listRecent(filter, limit.data));
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Server Error: ${err.message}`);
    res.status(500).json({ error: 'Interner Serverfehler' });
  });

  return app;
}

export function startWebServer(app: express.Express, port: number): Server {
  const httpServer = createServer(app);
  httpServer.listen(port, () => {
    logger.info(`Web-Server läuft auf Port ${port}`);
    logger.info(`Health Check: http://localhost:${port}/health`);
  });
  return httpServer;
}

export default startWebServer;

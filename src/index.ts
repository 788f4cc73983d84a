#!/usr/bin/env node

import type { Server } from 'http';
import { config, NODE_ENV } from './utils/config.js';
import logger from './utils/logger.js';
import { errorMessage } from './errors.js';
import { initDatabase, closeDatabase } from './storage/db.js';
import { createPipeline } from './pipeline/index.js';
import { YahooChartProvider } from './marketData/yahoo.js';
import { PipelineScheduler } from './runtime/scheduler.js';
import { createWebApp, startWebServer } from './web/server.js';

// ═══════════════════════════════════════════════════════════════
//                    FORECAST LEDGER
//                    Main Entry Point
// ═══════════════════════════════════════════════════════════════

const BANNER = `
╔═══════════════════════════════════════════════════════════════╗
║                                                               ║
║     📒 FORECAST LEDGER                                        ║
║                                                               ║
║     🔒 Append-only Predictions                                ║
║     ⏱  Outcomes strikt nach der Prediction                    ║
║     🧠 Training nur aus Vergangenheit                         ║
║                                                               ║
╚═══════════════════════════════════════════════════════════════╝
`;

async function main(): Promise<void> {
  console.log('\x1b[32m' + BANNER + '\x1b[0m');

  logger.info('═══════════════════════════════════════════════════════');
  logger.info('  Forecast Ledger wird gestartet...');
  logger.info('═══════════════════════════════════════════════════════');

  // 0. Datenbank initialisieren (MUSS zuerst passieren!)
  const db = initDatabase(config.sqlitePath);
  logger.info('  SQLite Datenbank: ✅ Initialisiert');

  const settings = config.pipeline;
  const pipeline = createPipeline({
    db,
    settings,
    marketData: new YahooChartProvider({
      baseUrl: config.marketData.baseUrl,
      timeoutMs: settings.marketDataTimeoutMs,
    }),
    trainerLockPath: config.trainerLockPath,
  });

  // 1. Cold Start: Baseline, falls noch kein Bundle promotet ist
  pipeline.ensureBaseline();

  logger.info(`  Environment: ${NODE_ENV}`);
  logger.info(`  Aktives Bundle: ${pipeline.registry.current().modelVersion}`);
  logger.info(`  Horizonte: ${settings.horizons.map((h) => h.label).join(', ')} (Training: ${settings.trainingHorizon})`);
  logger.info(`  Min. Evaluations-Verzögerung: ${settings.minEvalDelayMs / 60000} min`);
  logger.info(`  Holdout-Fenster: ${settings.holdoutWindowMs / 86_400_000} Tage`);
  logger.info('═══════════════════════════════════════════════════════');

  // 2. Scheduler
  const scheduler = new PipelineScheduler(
    { evaluator: pipeline.evaluator, trainer: pipeline.trainer },
    {
      evaluateIntervalMs: config.scheduler.evaluateIntervalMs,
      trainHourUtc: config.scheduler.trainHourUtc,
      clock: pipeline.clock,
    }
  );

  scheduler.on('stage_blocked', ({ stage }: { stage: string }) => {
    logger.error(`[MAIN] Stufe ${stage} blockiert: Integritätsverstoß, Operator-Eingriff erforderlich (npm run audit)`);
  });

  // 3. Web-Server (read-only)
  const httpServer = startWebServer(createWebApp(pipeline, scheduler), config.port);

  scheduler.start();

  logger.info('═══════════════════════════════════════════════════════');
  logger.info('  ✅ Alle Systeme ONLINE');
  logger.info('═══════════════════════════════════════════════════════');

  setupGracefulShutdown(scheduler, httpServer);
}

function setupGracefulShutdown(scheduler: PipelineScheduler, httpServer: Server): void {
  const shutdown = (signal: string): void => {
    logger.info(`${signal} empfangen, fahre herunter...`);

    try {
      // Bricht laufende Evaluations- und Trainingsläufe ab
      scheduler.stop();
      httpServer.close();
      closeDatabase();
    } catch (err) {
      logger.error(`Shutdown-Fehler: ${errorMessage(err)}`);
    }

    logger.info('Auf Wiedersehen! 👋');
    process.exit(0);
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  // Unhandled Errors
  process.on('uncaughtException', (err) => {
    logger.error(`Uncaught Exception: ${err.message}`);
    logger.error(err.stack || '');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled Rejection: ${errorMessage(reason)}`);
    process.exit(1);
  });
}

// Start
main().catch((err) => {
  console.error('Fatal Error:', err);
  process.exit(1);
});

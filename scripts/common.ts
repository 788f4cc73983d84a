/**
 * Gemeinsame Helfer der CLI-Skripte
 */

import chalk from 'chalk';
import { config } from '../src/utils/config.js';
import { initDatabase, closeDatabase } from '../src/storage/db.js';
import { createPipeline, type Pipeline } from '../src/pipeline/index.js';
import { YahooChartProvider } from '../src/marketData/yahoo.js';
import { errorMessage, isPipelineError } from '../src/errors.js';

export function openPipeline(): Pipeline {
  const db = initDatabase(config.sqlitePath);
  return createPipeline({
    db,
    settings: config.pipeline,
    marketData: new YahooChartProvider({
      baseUrl: config.marketData.baseUrl,
      timeoutMs: config.pipeline.marketDataTimeoutMs,
    }),
    trainerLockPath: config.trainerLockPath,
  });
}

export function hasFlag(args: string[], ...names: string[]): boolean {
  return args.some((arg) => names.includes(arg));
}

export function flagValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx >= 0 ? args[idx + 1] : undefined;
}

export function parseDateFlag(args: string[], name: string): Date | undefined {
  const value = flagValue(args, name);
  if (value === undefined) return undefined;

  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    console.error(chalk.red(`Ungültiges Datum für ${name}: ${value}`));
    process.exit(1);
  }
  return date;
}

/**
 * SIGINT bricht den laufenden Batch über das AbortSignal ab
 */
export function abortOnSigint(): AbortController {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error(chalk.yellow('\nAbbruch angefordert...'));
    controller.abort();
  });
  return controller;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function fail(err: unknown, json: boolean): never {
  const code = isPipelineError(err) ? err.code : 'UNEXPECTED';
  if (json) {
    printJson({ error: { code, message: errorMessage(err) } });
  } else {
    console.error(chalk.red(`\n✗ [${code}] ${errorMessage(err)}\n`));
  }
  closeDatabase();
  process.exit(code === 'TEMPORAL_INTEGRITY' ? 2 : 1);
}

export function header(title: string): void {
  console.log('');
  console.log(chalk.bold.blue(`  ${title}`));
  console.log(chalk.gray('━'.repeat(50)));
  console.log('');
}

export const pct = (v: number): string => `${(v * 100).toFixed(1)}%`;

#!/usr/bin/env tsx
/**
 * Einmaliger Evaluator-Lauf
 *
 * Usage:
 *   npm run evaluate
 *   npm run evaluate -- --json
 */

import chalk from 'chalk';
import { closeDatabase } from '../src/storage/db.js';
import { abortOnSigint, fail, hasFlag, header, openPipeline, printJson } from './common.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const json = hasFlag(args, '--json');

  try {
    const pipeline = openPipeline();
    const controller = abortOnSigint();
    const report = await pipeline.evaluator.evaluatePending({ signal: controller.signal });

    if (json) {
      printJson(report);
    } else {
      header('Outcome Evaluation');
      console.log(`  Kandidaten:        ${report.candidates}`);
      console.log(`  Evaluiert:         ${chalk.green(report.evaluated)}`);
      console.log(`  Outcomes:          ${report.outcomesWritten}`);
      console.log(`  Übersprungen:      ${report.skipped.alreadyEvaluated} bereits, ` +
        `${report.skipped.horizonNotReached} nicht fällig, ${report.skipped.quarantined} Quarantäne`);
      console.log(`  Verschoben:        ${chalk.yellow(report.deferred)}`);
      console.log(`  Abgelaufen:        ${chalk.red(report.expired)}`);
      if (report.failures.length > 0) {
        console.log('');
        for (const f of report.failures) {
          console.log(chalk.gray(`  ${f.symbol.padEnd(8)} [${f.category}] ${f.message}`));
        }
      }
      if (report.cancelled) {
        console.log(chalk.yellow('\n  Lauf abgebrochen, geschriebene Outcomes bleiben erhalten'));
      }
      console.log('');
    }

    closeDatabase();
  } catch (err) {
    fail(err, json);
  }
}

main().catch((err) => fail(err, false));

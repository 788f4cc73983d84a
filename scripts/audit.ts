#!/usr/bin/env tsx
/**
 * Temporal Integrity Audit
 *
 * Usage:
 *   npm run audit
 *   npm run audit -- --from 2025-01-01 --to 2025-02-01
 *   npm run audit -- --json
 *
 * Exit-Code: 0 bestanden, 1 Quarantäne (high), 2 blockierend (critical)
 */

import chalk from 'chalk';
import { closeDatabase } from '../src/storage/db.js';
import { fail, hasFlag, header, openPipeline, parseDateFlag, printJson } from './common.js';

const SEVERITY_COLOR = {
  critical: chalk.red,
  high: chalk.yellow,
  low: chalk.gray,
} as const;

function main(): void {
  const args = process.argv.slice(2);
  const json = hasFlag(args, '--json');

  try {
    const pipeline = openPipeline();
    const report = pipeline.audit({
      from: parseDateFlag(args, '--from'),
      to: parseDateFlag(args, '--to'),
    });

    if (json) {
      printJson(report);
    } else {
      header('Temporal Integrity Audit');
      console.log(`  Predictions: ${report.predictionsChecked}`);
      console.log(`  Outcomes:    ${report.outcomesChecked}`);
      console.log('');

      for (const v of report.violations) {
        const color = SEVERITY_COLOR[v.severity];
        const ref = v.predictionId ?? v.outcomeId ?? '';
        console.log(color(`  [${v.severity.toUpperCase()}] ${v.category.padEnd(16)} ${ref}`));
        console.log(chalk.gray(`      ${v.message}`));
      }

      console.log('');
      if (report.blocking) {
        console.log(chalk.red.bold('  ✗ BLOCKIERT: Evaluator und Trainer stoppen bis zur Korrektur'));
      } else if (!report.passed) {
        console.log(chalk.yellow(
          `  ⚠ Quarantäne: ${report.quarantinedPredictionIds.length} Predictions, ${report.quarantinedOutcomeIds.length} Outcomes`
        ));
      } else {
        console.log(chalk.green('  ✓ Audit bestanden'));
      }
      console.log('');
    }

    closeDatabase();
    process.exit(report.blocking ? 2 : report.passed ? 0 : 1);
  } catch (err) {
    fail(err, json);
  }
}

main();

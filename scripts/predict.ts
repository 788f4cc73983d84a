#!/usr/bin/env tsx
/**
 * Predictions aus Feature-Vektoren erzeugen
 *
 * Usage:
 *   npm run predict -- --file data/features.json
 *   npm run predict -- --file data/features.json --json
 *
 * Die Datei enthält ein Array von { symbol, collectedAt?, schemaVersion, values, observedAt? }.
 * Ohne collectedAt gilt der Zeitpunkt des Einlesens.
 */

import { readFileSync } from 'fs';
import chalk from 'chalk';
import { closeDatabase } from '../src/storage/db.js';
import { parseFeatureFile } from '../src/prediction/requests.js';
import { fail, flagValue, hasFlag, header, openPipeline, pct, printJson } from './common.js';

function main(): void {
  const args = process.argv.slice(2);
  const json = hasFlag(args, '--json');
  const file = flagValue(args, '--file');

  if (!file || hasFlag(args, '--help', '-h')) {
    console.log(`
${chalk.bold('USAGE')}
  npm run predict -- --file <features.json> [--json]
`);
    process.exit(file ? 0 : 1);
  }

  try {
    const pipeline = openPipeline();
    const requests = parseFeatureFile(JSON.parse(readFileSync(file, 'utf-8')), new Date());
    const report = pipeline.engine.predictMany(requests);

    if (json) {
      printJson(report);
    } else {
      header('Predictions');
      for (const p of report.created) {
        console.log(
          `  ${chalk.green('✓')} ${p.symbol.padEnd(8)} ${p.predictedAction.padEnd(12)} ` +
            `${pct(p.actionConfidence).padStart(6)}  Richtung: ${p.predictedDirection ?? '-'}`
        );
      }
      for (const d of report.duplicates) {
        console.log(`  ${chalk.yellow('•')} ${d.symbol.padEnd(8)} Duplikat im Bucket ${d.timeBucket}`);
      }
      for (const e of report.schemaErrors) {
        console.log(`  ${chalk.red('✗')} ${e.symbol.padEnd(8)} ${e.message}`);
        for (const issue of e.issues) console.log(chalk.gray(`             ${issue}`));
      }
      for (const f of report.failures) {
        console.log(`  ${chalk.red('✗')} ${f.symbol.padEnd(8)} [${f.code}] ${f.message}`);
      }
      console.log('');
      console.log(chalk.gray(`  ${report.created.length}/${report.requested} erstellt`));
      console.log('');
    }

    closeDatabase();
    process.exit(report.failures.length > 0 ? 1 : 0);
  } catch (err) {
    fail(err, json);
  }
}

main();

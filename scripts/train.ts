#!/usr/bin/env tsx
/**
 * Model Training / Promotion
 *
 * Usage:
 *   npm run train                                # Cutoff = jetzt - HOLDOUT_WINDOW_DAYS
 *   npm run train -- --cutoff 2025-03-01T00:00:00Z
 *   npm run train -- --baseline                  # Regel-Baseline promoten (Cold Start)
 *   npm run train -- --rollback                  # vorherige Version reaktivieren
 *   npm run train -- --json
 */

import chalk from 'chalk';
import { closeDatabase } from '../src/storage/db.js';
import { buildBaselineBundle } from '../src/models/baseline.js';
import type { HoldoutMetrics } from '../src/models/types.js';
import { abortOnSigint, fail, hasFlag, header, openPipeline, parseDateFlag, pct, printJson } from './common.js';

function printMetrics(label: string, m: HoldoutMetrics | null): void {
  if (!m) {
    console.log(chalk.gray(`  ${label}: -`));
    return;
  }
  console.log(
    `  ${label}: Action ${pct(m.actionAccuracy)}, Direction ${pct(m.directionAccuracy)} ` +
      `(Abdeckung ${pct(m.directionCoverage)}), MAE ${m.magnitudeMae.toFixed(2)}, ` +
      `Sim. Return ${m.simulatedReturnPct.toFixed(2)}% / ${m.simulatedTrades} Trades, Win-Rate ${pct(m.winRate)}`
  );
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const json = hasFlag(args, '--json');

  try {
    const pipeline = openPipeline();
    const now = pipeline.clock.now();

    if (hasFlag(args, '--baseline')) {
      const record = pipeline.registry.promote(buildBaselineBundle(now), 'manuelle Baseline', now);
      if (json) printJson(record);
      else console.log(chalk.green(`\n✓ Baseline ${record.modelVersion} promotet\n`));
      closeDatabase();
      return;
    }

    if (hasFlag(args, '--rollback')) {
      const record = pipeline.registry.rollback('manueller Rollback', now);
      if (json) printJson(record);
      else if (record) console.log(chalk.green(`\n✓ Rollback auf ${record.modelVersion}\n`));
      else console.log(chalk.yellow('\nKeine Vorgänger-Version vorhanden\n'));
      closeDatabase();
      process.exit(record ? 0 : 1);
    }

    const controller = abortOnSigint();
    const report = await pipeline.trainer.train({
      cutoff: parseDateFlag(args, '--cutoff'),
      signal: controller.signal,
    });

    if (json) {
      printJson(report);
    } else {
      header('Model Training');
      const color = report.status === 'promoted' ? chalk.green : report.status === 'rejected' ? chalk.yellow : chalk.red;
      console.log(`  Status:    ${color(report.status.toUpperCase())}`);
      console.log(`  Grund:     ${report.reason}`);
      console.log(`  Cutoff:    ${report.cutoff}`);
      console.log(`  Kandidat:  ${report.modelVersion ?? '-'}`);
      console.log(`  Aktiv vor: ${report.incumbentVersion ?? '-'}`);
      console.log('');
      console.log(chalk.gray(`  Daten: ${report.dataset.training} Training, ${report.dataset.holdout} Holdout, ` +
        `${report.dataset.quarantined} Quarantäne, ${report.dataset.schemaMismatch} Schema-Abweichung`));
      console.log(chalk.gray(`  Labels: ${JSON.stringify(report.dataset.labelCounts)}`));
      console.log('');
      printMetrics('Kandidat', report.candidate);
      printMetrics('Aktiv   ', report.incumbent);
      console.log('');
    }

    closeDatabase();
    process.exit(report.status === 'aborted' ? 1 : 0);
  } catch (err) {
    fail(err, json);
  }
}

main().catch((err) => fail(err, false));

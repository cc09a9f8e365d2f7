/**
 * News Reader — Run Cycle Script
 *
 * Runs one refresh cycle against the configured sources and prints
 * the cycle report.
 *
 * Usage:
 *   npm run cycle
 *   npm run cycle -- --json     # Raw report as JSON
 */

import { loadConfig } from '../src/config/environment';
import { createNewsReader } from '../src/bootstrap';
import { logger } from '../src/lib/logger';
import { errorMessage } from '../src/lib/errors';
import type { CycleReport } from '../src/scheduler/scheduler';

function printReport(report: CycleReport, storeSize: number): void {
  console.log('\n' + '='.repeat(60));
  console.log('REFRESH CYCLE');
  console.log('='.repeat(60));
  console.log(`Cycle: ${report.cycleId}`);
  console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)}s`);
  console.log('');

  for (const source of report.sources) {
    const line =
      source.status === 'ok'
        ? `fetched ${source.fetched}, new ${source.inserted}, updated ${source.updated}, ` +
          `duplicates ${source.duplicates}, malformed ${source.skippedMalformed}`
        : source.status === 'skipped'
          ? 'skipped (degraded)'
          : `FAILED (${source.errorKind}): ${source.error}`;
    console.log(`  ${source.sourceId.padEnd(24)} ${line}`);
  }

  console.log('');
  console.log(`Articles inserted: ${report.totals.inserted}`);
  console.log(`Articles updated: ${report.totals.updated}`);
  console.log(`Articles evicted: ${report.evicted}`);
  console.log(`Articles cached: ${storeSize}`);
  if (report.persistenceError) {
    console.log(`Persistence error: ${report.persistenceError}`);
  }
  console.log('='.repeat(60) + '\n');
}

async function runCycle(): Promise<void> {
  const json = process.argv.slice(2).includes('--json');

  const config = await loadConfig();
  const reader = createNewsReader(config);

  if (reader.store.persistent) {
    await reader.store.hydrate();
  }

  const report = await reader.scheduler.runCycle();

  if (json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printReport(report, reader.store.size());
  }

  process.exitCode = report.totals.failedSources === report.sources.length && report.sources.length > 0 ? 1 : 0;
}

runCycle().catch(error => {
  logger.error('Cycle failed', { error: errorMessage(error) });
  process.exit(1);
});

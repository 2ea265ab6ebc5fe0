/**
 * Sync one scope from HLTV into the store.
 *
 * Run: npm run sync -- --kind event --id 8040
 *      npm run sync -- --kind team --unseen 5 --full-stats --max-players 10
 *
 * Ctrl+C stops planning new units; units already in flight finish and the
 * run can be resumed by running the same command again.
 */
import './load-env';

import { loadSyncConfig } from '@hltvsync/core';
import { DATABASE_ERROR_MESSAGE, toPersistenceError } from '@hltvsync/db';
import { createSyncEngine } from '@/lib/create-engine';
import { parseSyncArgs } from '@/lib/cli-args';
import { runSync } from '@/lib/sync-run';

async function main() {
  const command = parseSyncArgs(process.argv.slice(2));
  const config = loadSyncConfig();
  const { engine, close } = createSyncEngine(
    { ...config, headless: command.show ? false : config.headless },
    { dryRun: command.dryRun },
  );

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nStopping after in-flight units finish…');
    controller.abort();
  });

  try {
    try {
      await engine.store.ping();
    } catch (err) {
      const pe = toPersistenceError(err, 'ping');
      throw pe.connectivity ? new Error(`${DATABASE_ERROR_MESSAGE}\n${pe.message}`) : pe;
    }

    const summary = await runSync(engine, {
      scope: command.scope,
      limits: command.limits,
      refresh: command.refresh,
      signal: controller.signal,
    });

    console.log(`Run ${summary.runId}${summary.resumed ? ' (resumed)' : ''}: ${summary.state}`);
    console.log(`States: ${summary.history.join(' → ')}`);
    for (const u of summary.units) console.log(`  ${u.status.padEnd(7)} ${u.key}`);
    for (const f of summary.failures) {
      const signals = f.signals.length ? ` [${f.signals.join(', ')}]` : '';
      console.log(`  failed ${f.unitKey} (${f.reason}, ${f.attempts} attempts)${signals}: ${f.message}`);
    }
    if (summary.errorMessage) console.log(`Error: ${summary.errorMessage}`);
    if (command.dryRun) console.log('Dry run: nothing was written to the database.');
    if (summary.state === 'FAILED') process.exitCode = 1;
  } finally {
    await close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

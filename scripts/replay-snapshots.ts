/**
 * Re-apply stored page snapshots to the database without fetching anything.
 *
 * Run: npm run replay -- [snapshot dir]   (defaults to SNAPSHOT_DIR)
 */
import './load-env';

import path from 'path';
import { Reconciler } from '@hltvsync/agents';
import { loadSyncConfig } from '@hltvsync/core';
import { createPostgresSyncStore, getDb } from '@hltvsync/db';
import { replaySnapshots } from '@/lib/snapshot-disk';

async function main() {
  const config = loadSyncConfig();
  const dir = path.resolve(process.cwd(), process.argv[2] ?? config.snapshotDir);
  const store = createPostgresSyncStore(getDb(config.databaseUrl));

  try {
    console.log(`Replaying snapshots from ${dir}…`);
    const outcomes = await replaySnapshots(dir, new Reconciler(store));
    const applied = outcomes.filter((o) => o.ok);
    for (const o of outcomes.filter((x) => !x.ok)) {
      console.log(`  skipped ${path.relative(dir, o.file)}: ${o.error ?? 'unknown error'}`);
    }
    console.log(
      `Done. ${applied.length} snapshots applied (${applied.reduce((n, o) => n + o.records, 0)} records), ${outcomes.length - applied.length} skipped.`,
    );
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

/**
 * Print row counts for every table.
 *
 * Run: npm run stats
 */
import './load-env';

import { loadSyncConfig } from '@hltvsync/core';
import { createPostgresSyncStore, getDb, STORE_TABLES } from '@hltvsync/db';

async function main() {
  const config = loadSyncConfig();
  const store = createPostgresSyncStore(getDb(config.databaseUrl));
  try {
    const counts = await store.countRows();
    const width = Math.max(...STORE_TABLES.map((t) => t.length));
    for (const table of STORE_TABLES) {
      console.log(`${table.padEnd(width)}  ${counts[table]}`);
    }
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

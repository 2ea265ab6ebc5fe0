/**
 * Wires configuration into a ready-to-run SyncEngine.
 */

import {
  ExtractorAgent,
  PlaywrightBrowserDriver,
  Reconciler,
  SessionManager,
  type BrowserDriver,
  type SessionManagerOptions,
} from '@hltvsync/agents';
import { DEFAULT_PAGE_KINDS, setAgentLogLevel, type SyncConfig } from '@hltvsync/core';
import { createPostgresSyncStore, getDb, MemorySyncStore, type SyncStore } from '@hltvsync/db';
import { createDiskSnapshotSink } from './snapshot-disk';
import type { SyncEngine } from './types';

export interface EngineOptions {
  /** Use an in-memory store; nothing reaches the database. */
  dryRun?: boolean;
  store?: SyncStore;
  driver?: BrowserDriver;
  writeSnapshots?: boolean;
}

export interface EngineHandle {
  engine: SyncEngine;
  /** Closes browser sessions and the store. */
  close(): Promise<void>;
}

export function sessionOptions(config: SyncConfig, driver: BrowserDriver): SessionManagerOptions {
  return {
    driver,
    pageKinds: DEFAULT_PAGE_KINDS,
    maxSessions: config.maxSessions,
    minNavDelayMs: config.minNavDelayMs,
    navJitterMs: config.navJitterMs,
    navTimeoutMs: config.navTimeoutMs,
    readyTimeoutMs: config.readyTimeoutMs,
    retry: config.retry,
  };
}

export function createSyncEngine(config: SyncConfig, options: EngineOptions = {}): EngineHandle {
  const store =
    options.store ??
    (options.dryRun ? new MemorySyncStore() : createPostgresSyncStore(getDb(config.databaseUrl)));
  const driver =
    options.driver ??
    new PlaywrightBrowserDriver({
      headless: config.headless,
      executablePath: config.chromiumPath,
      channel: config.chromiumPath ? undefined : 'chrome',
    });

  setAgentLogLevel(config.logLevel);
  const sessions = new SessionManager(sessionOptions(config, driver));

  const engine: SyncEngine = {
    store,
    fetcher: sessions,
    extractor: new ExtractorAgent(),
    reconciler: new Reconciler(store),
    snapshots: options.writeSnapshots === false ? null : createDiskSnapshotSink(config.snapshotDir),
    planner: { baseUrl: config.baseUrl, pageKinds: DEFAULT_PAGE_KINDS },
    concurrency: { LISTING: 1, ...config.concurrency },
  };

  return {
    engine,
    async close() {
      try {
        await sessions.close();
      } finally {
        await store.close();
      }
    },
  };
}

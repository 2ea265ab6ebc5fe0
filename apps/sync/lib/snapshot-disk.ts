/**
 * Persist one structured snapshot per completed entity unit, and replay them.
 * Layout: <root>/<page_kind>/<external_id>/<captured_at>.json, so refreshing
 * an entity adds a capture next to the earlier ones.
 *
 * Replaying goes straight to the Reconciler, so scraping and persistence can
 * be retried independently.
 */

import { mkdir, readdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { agentLog } from '@hltvsync/core';
import type { Reconciler } from '@hltvsync/agents';
import { PersistenceError } from '@hltvsync/db';
import {
  entitySnapshotSchema,
  pageKindEnum,
  SNAPSHOT_VERSION,
  type EntitySnapshot,
  type ExtractionResult,
  type PageKind,
} from '@hltvsync/schemas';

export interface SnapshotSink {
  write(snapshot: EntitySnapshot): Promise<string>;
}

/** `2024-07-01T12:00:00.000Z` → `2024-07-01T12-00-00-000Z`: no separators a filesystem rejects. */
function captureStamp(capturedAt: string): string {
  return capturedAt.replace(/[:.]/g, '-');
}

export function snapshotPath(
  rootDir: string,
  pageKind: PageKind,
  externalId: number,
  capturedAt: string,
): string {
  return path.join(rootDir, pageKind, String(externalId), `${captureStamp(capturedAt)}.json`);
}

export function toSnapshot(unitKey: string, result: ExtractionResult): EntitySnapshot | null {
  if (result.primaryId === null) return null;
  return {
    version: SNAPSHOT_VERSION,
    unitKey,
    pageKind: result.pageKind,
    externalId: result.primaryId,
    url: result.url,
    capturedAt: result.capturedAt,
    records: result.records,
    extras: result.extras,
  };
}

export function createDiskSnapshotSink(rootDir: string): SnapshotSink {
  return {
    async write(snapshot) {
      const file = snapshotPath(
        rootDir,
        snapshot.pageKind,
        snapshot.externalId,
        snapshot.capturedAt,
      );
      await mkdir(path.dirname(file), { recursive: true });
      // Write-then-rename so a crash never leaves a half-written snapshot behind.
      const tmp = `${file}.tmp`;
      await writeFile(tmp, JSON.stringify(snapshot, null, 2), 'utf-8');
      await rename(tmp, file);
      return file;
    },
  };
}

const REPLAY_ORDER: PageKind[] = [
  'event_overview',
  'event_results',
  'event_stats',
  'team_roster',
  'player_profile',
];

export interface LoadedSnapshot {
  file: string;
  snapshot: EntitySnapshot;
}

export interface ReplayOutcome {
  file: string;
  ok: boolean;
  records: number;
  error?: string;
}

/** Snapshot files of one page kind: per-entity capture directories, plus flat `<id>.json` files. */
async function snapshotFiles(kindDir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(kindDir, { withFileTypes: true })) {
    const entryPath = path.join(kindDir, entry.name);
    if (entry.isDirectory()) {
      const captures = (await readdir(entryPath)).filter((f) => f.endsWith('.json'));
      files.push(...captures.sort().map((f) => path.join(entryPath, f)));
    } else if (entry.name.endsWith('.json')) {
      files.push(entryPath);
    }
  }
  return files;
}

/**
 * Every valid snapshot under `rootDir`, parents first, then by capture time, so
 * an entity's later captures are applied after its earlier ones.
 */
export async function readSnapshots(
  rootDir: string,
): Promise<{ loaded: LoadedSnapshot[]; invalid: ReplayOutcome[] }> {
  const loaded: LoadedSnapshot[] = [];
  const invalid: ReplayOutcome[] = [];
  let dirs: string[];
  try {
    dirs = await readdir(rootDir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return { loaded, invalid };
    throw err;
  }

  for (const dir of dirs) {
    if (!pageKindEnum.safeParse(dir).success) continue;
    for (const file of await snapshotFiles(path.join(rootDir, dir))) {
      try {
        const parsed = entitySnapshotSchema.safeParse(JSON.parse(await readFile(file, 'utf-8')));
        if (parsed.success) loaded.push({ file, snapshot: parsed.data });
        else invalid.push({ file, ok: false, records: 0, error: parsed.error.issues[0]?.message });
      } catch (err) {
        invalid.push({
          file,
          ok: false,
          records: 0,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  loaded.sort(
    (a, b) =>
      REPLAY_ORDER.indexOf(a.snapshot.pageKind) - REPLAY_ORDER.indexOf(b.snapshot.pageKind) ||
      a.snapshot.capturedAt.localeCompare(b.snapshot.capturedAt),
  );
  return { loaded, invalid };
}

/**
 * Apply every snapshot through the Reconciler, each in its own transaction.
 * Stops on a connectivity failure; any other failure is reported per file.
 */
export async function replaySnapshots(
  rootDir: string,
  reconciler: Reconciler,
): Promise<ReplayOutcome[]> {
  const { loaded, invalid } = await readSnapshots(rootDir);
  const outcomes: ReplayOutcome[] = [...invalid];
  for (const { file, snapshot } of loaded) {
    try {
      await reconciler.applyUnit(snapshot.records, { observedAt: new Date(snapshot.capturedAt) });
      outcomes.push({ file, ok: true, records: snapshot.records.length });
    } catch (err) {
      if (err instanceof PersistenceError && err.connectivity) throw err;
      const message = err instanceof Error ? err.message : String(err);
      agentLog('Replay', `Snapshot not applied: ${path.basename(file)}`, {
        level: 'warn',
        detail: message,
      });
      outcomes.push({ file, ok: false, records: snapshot.records.length, error: message });
    }
  }
  return outcomes;
}

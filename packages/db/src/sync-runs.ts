import { and, asc, count, desc, eq, ne } from 'drizzle-orm';
import type { PgTable } from 'drizzle-orm/pg-core';
import type { Executor } from './client';
import {
  events,
  teams,
  players,
  eventTeams,
  eventStats,
  teamPlayers,
  syncRuns,
  syncCheckpoints,
  syncUnitFailures,
} from './schema';
import type {
  CreateRunInput,
  RecordUnitFailureInput,
  StoreTable,
  SyncRunRow,
  UnitFailureRow,
  UpdateRunInput,
} from './store';

export async function createSyncRun(db: Executor, input: CreateRunInput): Promise<SyncRunRow> {
  const [run] = await db
    .insert(syncRuns)
    .values({
      scopeKey: input.scopeKey,
      scope: input.scope,
      limits: input.limits,
      planSnapshot: input.planSnapshot,
      state: 'PLANNING',
    })
    .returning();
  if (!run) throw new Error('Insert into sync_runs returned no row');
  return run;
}

export async function findResumableSyncRun(
  db: Executor,
  scopeKey: string,
): Promise<SyncRunRow | null> {
  const [run] = await db
    .select()
    .from(syncRuns)
    .where(and(eq(syncRuns.scopeKey, scopeKey), ne(syncRuns.state, 'DONE')))
    .orderBy(desc(syncRuns.createdAt))
    .limit(1);
  return run ?? null;
}

export async function updateSyncRun(db: Executor, runId: string, input: UpdateRunInput) {
  await db
    .update(syncRuns)
    .set({ ...input, updatedAt: new Date() })
    .where(eq(syncRuns.id, runId));
}

/** Checkpoint + plan snapshot in one transaction; re-checkpointing a unit is a no-op. */
export async function checkpointUnit(
  db: Executor,
  runId: string,
  unitKey: string,
  planSnapshot: unknown,
) {
  await db.transaction(async (tx) => {
    await tx.insert(syncCheckpoints).values({ runId, unitKey }).onConflictDoNothing();
    await tx
      .update(syncRuns)
      .set({ planSnapshot, state: 'CHECKPOINTED', updatedAt: new Date() })
      .where(eq(syncRuns.id, runId));
  });
}

export async function listCheckpointedUnits(db: Executor, runId: string): Promise<string[]> {
  const rows = await db
    .select({ unitKey: syncCheckpoints.unitKey })
    .from(syncCheckpoints)
    .where(eq(syncCheckpoints.runId, runId))
    .orderBy(asc(syncCheckpoints.completedAt));
  return rows.map((r) => r.unitKey);
}

export async function insertUnitFailure(db: Executor, input: RecordUnitFailureInput) {
  await db.insert(syncUnitFailures).values(input);
}

export async function listUnitFailuresForRun(
  db: Executor,
  runId: string,
): Promise<UnitFailureRow[]> {
  return db
    .select()
    .from(syncUnitFailures)
    .where(eq(syncUnitFailures.runId, runId))
    .orderBy(asc(syncUnitFailures.id));
}

const COUNTED: [StoreTable, PgTable][] = [
  ['events', events],
  ['teams', teams],
  ['players', players],
  ['event_teams', eventTeams],
  ['event_stats', eventStats],
  ['team_players', teamPlayers],
  ['sync_runs', syncRuns],
  ['sync_checkpoints', syncCheckpoints],
  ['sync_unit_failures', syncUnitFailures],
];

export async function countAllRows(db: Executor): Promise<Record<StoreTable, number>> {
  const out: Record<StoreTable, number> = {
    events: 0,
    teams: 0,
    players: 0,
    event_teams: 0,
    event_stats: 0,
    team_players: 0,
    sync_runs: 0,
    sync_checkpoints: 0,
    sync_unit_failures: 0,
  };
  for (const [name, table] of COUNTED) {
    const [row] = await db.select({ n: count() }).from(table);
    out[name] = row?.n ?? 0;
  }
  return out;
}

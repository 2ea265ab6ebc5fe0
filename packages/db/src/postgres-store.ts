import { sql } from 'drizzle-orm';
import { closeDb, type Db, type Executor } from './client';
import * as entities from './entities';
import * as assoc from './associations';
import * as runs from './sync-runs';
import type { SyncStore, SyncStoreTx } from './store';

function bindTx(db: Executor): SyncStoreTx {
  return {
    events: {
      find: (id) => entities.getEventById(db, id),
      insert: (row) => entities.insertEvent(db, row),
      update: (id, patch) => entities.updateEvent(db, id, patch),
    },
    teams: {
      find: (id) => entities.getTeamById(db, id),
      insert: (row) => entities.insertTeam(db, row),
      update: (id, patch) => entities.updateTeam(db, id, patch),
    },
    players: {
      find: (id) => entities.getPlayerById(db, id),
      insert: (row) => entities.insertPlayer(db, row),
      update: (id, patch) => entities.updatePlayer(db, id, patch),
    },
    eventTeams: {
      find: (eventId, teamId) => assoc.getEventTeam(db, eventId, teamId),
      insert: (row) => assoc.insertEventTeam(db, row),
      update: (eventId, teamId, patch) => assoc.updateEventTeam(db, eventId, teamId, patch),
    },
    eventStats: {
      find: (eventId, playerId) => assoc.getEventStat(db, eventId, playerId),
      insert: (row) => assoc.insertEventStat(db, row),
      update: (eventId, playerId, patch) => assoc.updateEventStat(db, eventId, playerId, patch),
    },
    teamPlayers: {
      find: (teamId, playerId, observedAt) =>
        assoc.getTeamPlayerObservation(db, teamId, playerId, observedAt),
      insert: (row) => assoc.insertTeamPlayer(db, row),
      update: (id, patch) => assoc.updateTeamPlayer(db, id, patch),
    },
  };
}

export function createPostgresSyncStore(db: Db): SyncStore {
  return {
    transaction: (fn) => db.transaction((tx) => fn(bindTx(tx))),
    ping: async () => {
      await db.execute(sql`select 1`);
    },
    findExistingIds: (kind, ids) => entities.listExistingIds(db, kind, ids),
    createRun: (input) => runs.createSyncRun(db, input),
    findResumableRun: (scopeKey) => runs.findResumableSyncRun(db, scopeKey),
    updateRun: (runId, input) => runs.updateSyncRun(db, runId, input),
    completeUnit: (runId, unitKey, plan) => runs.checkpointUnit(db, runId, unitKey, plan),
    listCompletedUnits: (runId) => runs.listCheckpointedUnits(db, runId),
    recordUnitFailure: (input) => runs.insertUnitFailure(db, input),
    listUnitFailures: (runId) => runs.listUnitFailuresForRun(db, runId),
    countRows: () => runs.countAllRows(db),
    close: () => closeDb(),
  };
}

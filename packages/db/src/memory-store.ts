/**
 * In-process SyncStore for tests and dry runs.
 *
 * Transactions run against a copy of the state that replaces the live state only
 * when the callback resolves. All operations are serialized, and keys and
 * foreign keys are checked the way the Postgres schema checks them.
 */

import { randomUUID } from 'node:crypto';
import type { EntityKind } from '@hltvsync/schemas';
import { ConstraintViolationError } from './db-error';
import type {
  CreateRunInput,
  EventRow,
  EventStatRow,
  EventTeamRow,
  NewEventRow,
  NewEventStatRow,
  NewEventTeamRow,
  NewPlayerRow,
  NewTeamPlayerRow,
  NewTeamRow,
  PlayerRow,
  RecordUnitFailureInput,
  StoreTable,
  SyncRunRow,
  SyncStore,
  SyncStoreTx,
  TeamPlayerRow,
  TeamRow,
  UnitFailureRow,
  UpdateRunInput,
} from './store';

interface CheckpointRow {
  unitKey: string;
  completedAt: Date;
}

interface MemoryState {
  events: Map<number, EventRow>;
  teams: Map<number, TeamRow>;
  players: Map<number, PlayerRow>;
  eventTeams: Map<string, EventTeamRow>;
  eventStats: Map<string, EventStatRow>;
  teamPlayers: Map<number, TeamPlayerRow>;
  runs: Map<string, SyncRunRow>;
  checkpoints: Map<string, CheckpointRow[]>;
  failures: UnitFailureRow[];
  seq: number;
}

function emptyState(): MemoryState {
  return {
    events: new Map(),
    teams: new Map(),
    players: new Map(),
    eventTeams: new Map(),
    eventStats: new Map(),
    teamPlayers: new Map(),
    runs: new Map(),
    checkpoints: new Map(),
    failures: [],
    seq: 0,
  };
}

const pairKey = (a: number, b: number) => `${a}:${b}`;

function toEventRow(r: NewEventRow, now: Date): EventRow {
  return {
    id: r.id,
    name: r.name ?? null,
    startDate: r.startDate ?? null,
    endDate: r.endDate ?? null,
    location: r.location ?? null,
    prizePool: r.prizePool ?? null,
    eventType: r.eventType ?? null,
    status: r.status ?? null,
    teamsCount: r.teamsCount ?? null,
    createdAt: r.createdAt ?? now,
    updatedAt: r.updatedAt ?? now,
  };
}

function toTeamRow(r: NewTeamRow, now: Date): TeamRow {
  return {
    id: r.id,
    name: r.name ?? null,
    country: r.country ?? null,
    worldRank: r.worldRank ?? null,
    createdAt: r.createdAt ?? now,
    updatedAt: r.updatedAt ?? now,
  };
}

function toPlayerRow(r: NewPlayerRow, now: Date): PlayerRow {
  return {
    id: r.id,
    nickname: r.nickname ?? null,
    realName: r.realName ?? null,
    country: r.country ?? null,
    age: r.age ?? null,
    currentTeamId: r.currentTeamId ?? null,
    totalKills: r.totalKills ?? null,
    totalDeaths: r.totalDeaths ?? null,
    kdRatio: r.kdRatio ?? null,
    rating: r.rating ?? null,
    kast: r.kast ?? null,
    adr: r.adr ?? null,
    kpr: r.kpr ?? null,
    apr: r.apr ?? null,
    impact: r.impact ?? null,
    headshotPct: r.headshotPct ?? null,
    mapsPlayed: r.mapsPlayed ?? null,
    roundsPlayed: r.roundsPlayed ?? null,
    statsUpdatedAt: r.statsUpdatedAt ?? null,
    createdAt: r.createdAt ?? now,
    updatedAt: r.updatedAt ?? now,
  };
}

export class MemorySyncStore implements SyncStore {
  private state: MemoryState = emptyState();
  private queue: Promise<unknown> = Promise.resolve();

  /** Serializes `fn` after every previously queued operation. */
  private exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const result = this.queue.then(fn);
    // The chain only orders work; callers see the rejection through `result`.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private bindTx(s: MemoryState): SyncStoreTx {
    const nextId = () => ++s.seq;
    return {
      events: {
        find: async (id) => s.events.get(id) ?? null,
        insert: async (row) => {
          if (s.events.has(row.id)) return false;
          s.events.set(row.id, toEventRow(row, new Date()));
          return true;
        },
        update: async (id, patch) => {
          const current = s.events.get(id);
          if (current) s.events.set(id, { ...current, ...patch, id, updatedAt: new Date() });
        },
      },
      teams: {
        find: async (id) => s.teams.get(id) ?? null,
        insert: async (row) => {
          if (s.teams.has(row.id)) return false;
          s.teams.set(row.id, toTeamRow(row, new Date()));
          return true;
        },
        update: async (id, patch) => {
          const current = s.teams.get(id);
          if (current) s.teams.set(id, { ...current, ...patch, id, updatedAt: new Date() });
        },
      },
      players: {
        find: async (id) => s.players.get(id) ?? null,
        insert: async (row) => {
          if (s.players.has(row.id)) return false;
          s.players.set(row.id, toPlayerRow(row, new Date()));
          return true;
        },
        update: async (id, patch) => {
          const current = s.players.get(id);
          if (current) s.players.set(id, { ...current, ...patch, id, updatedAt: new Date() });
        },
      },
      eventTeams: {
        find: async (eventId, teamId) => s.eventTeams.get(pairKey(eventId, teamId)) ?? null,
        insert: async (row: NewEventTeamRow) => {
          requireParent(s.events.has(row.eventId), 'event_teams', 'events', row.eventId);
          requireParent(s.teams.has(row.teamId), 'event_teams', 'teams', row.teamId);
          const key = pairKey(row.eventId, row.teamId);
          if (s.eventTeams.has(key)) return false;
          s.eventTeams.set(key, {
            id: nextId(),
            eventId: row.eventId,
            teamId: row.teamId,
            placement: row.placement ?? null,
            placementLabel: row.placementLabel ?? null,
            prize: row.prize ?? null,
            updatedAt: new Date(),
          });
          return true;
        },
        update: async (eventId, teamId, patch) => {
          const key = pairKey(eventId, teamId);
          const current = s.eventTeams.get(key);
          if (current) {
            s.eventTeams.set(key, { ...current, ...patch, eventId, teamId, updatedAt: new Date() });
          }
        },
      },
      eventStats: {
        find: async (eventId, playerId) => s.eventStats.get(pairKey(eventId, playerId)) ?? null,
        insert: async (row: NewEventStatRow) => {
          requireParent(s.events.has(row.eventId), 'event_stats', 'events', row.eventId);
          requireParent(s.players.has(row.playerId), 'event_stats', 'players', row.playerId);
          const key = pairKey(row.eventId, row.playerId);
          if (s.eventStats.has(key)) return false;
          s.eventStats.set(key, {
            id: nextId(),
            eventId: row.eventId,
            playerId: row.playerId,
            rating: row.rating ?? null,
            mapsPlayed: row.mapsPlayed ?? null,
            kdRatio: row.kdRatio ?? null,
            updatedAt: new Date(),
          });
          return true;
        },
        update: async (eventId, playerId, patch) => {
          const key = pairKey(eventId, playerId);
          const current = s.eventStats.get(key);
          if (current) {
            s.eventStats.set(key, {
              ...current,
              ...patch,
              eventId,
              playerId,
              updatedAt: new Date(),
            });
          }
        },
      },
      teamPlayers: {
        find: async (teamId, playerId, observedAt) => {
          for (const row of s.teamPlayers.values()) {
            if (
              row.teamId === teamId &&
              row.playerId === playerId &&
              row.observedAt.getTime() === observedAt.getTime()
            ) {
              return row;
            }
          }
          return null;
        },
        insert: async (row: NewTeamPlayerRow) => {
          requireParent(s.teams.has(row.teamId), 'team_players', 'teams', row.teamId);
          requireParent(s.players.has(row.playerId), 'team_players', 'players', row.playerId);
          for (const existing of s.teamPlayers.values()) {
            if (
              existing.teamId === row.teamId &&
              existing.playerId === row.playerId &&
              existing.observedAt.getTime() === row.observedAt.getTime()
            ) {
              return false;
            }
          }
          const id = nextId();
          s.teamPlayers.set(id, {
            id,
            teamId: row.teamId,
            playerId: row.playerId,
            role: row.role ?? null,
            isCurrent: row.isCurrent ?? true,
            observedAt: row.observedAt,
          });
          return true;
        },
        update: async (id, patch) => {
          const current = s.teamPlayers.get(id);
          if (current) s.teamPlayers.set(id, { ...current, ...patch, id });
        },
      },
    };
  }

  transaction<T>(fn: (tx: SyncStoreTx) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      const draft = structuredClone(this.state);
      const out = await fn(this.bindTx(draft));
      this.state = draft;
      return out;
    });
  }

  async ping(): Promise<void> {}

  findExistingIds(kind: EntityKind, ids: number[]): Promise<Set<number>> {
    return this.exclusive(() => {
      const table =
        kind === 'EVENT' ? this.state.events : kind === 'TEAM' ? this.state.teams : this.state.players;
      return new Set(ids.filter((id) => table.has(id)));
    });
  }

  createRun(input: CreateRunInput): Promise<SyncRunRow> {
    return this.exclusive(() => {
      const now = new Date();
      const run: SyncRunRow = {
        id: randomUUID(),
        scopeKey: input.scopeKey,
        scope: input.scope,
        limits: input.limits,
        state: 'PLANNING',
        planSnapshot: input.planSnapshot,
        summary: null,
        errorMessage: null,
        startedAt: now,
        finishedAt: null,
        createdAt: now,
        updatedAt: now,
      };
      this.state.runs.set(run.id, run);
      return structuredClone(run);
    });
  }

  findResumableRun(scopeKey: string): Promise<SyncRunRow | null> {
    return this.exclusive(() => {
      let latest: SyncRunRow | null = null;
      for (const run of this.state.runs.values()) {
        if (run.scopeKey === scopeKey && run.state !== 'DONE') latest = run;
      }
      return latest ? structuredClone(latest) : null;
    });
  }

  updateRun(runId: string, input: UpdateRunInput): Promise<void> {
    return this.exclusive(() => {
      const run = this.state.runs.get(runId);
      if (!run) return;
      this.state.runs.set(runId, { ...run, ...structuredClone(input), updatedAt: new Date() });
    });
  }

  completeUnit(runId: string, unitKey: string, planSnapshot: unknown): Promise<void> {
    return this.exclusive(() => {
      const run = this.state.runs.get(runId);
      requireParent(run !== undefined, 'sync_checkpoints', 'sync_runs', runId);
      const rows = this.state.checkpoints.get(runId) ?? [];
      if (!rows.some((r) => r.unitKey === unitKey)) {
        rows.push({ unitKey, completedAt: new Date() });
      }
      this.state.checkpoints.set(runId, rows);
      if (run) {
        this.state.runs.set(runId, {
          ...run,
          planSnapshot: structuredClone(planSnapshot),
          state: 'CHECKPOINTED',
          updatedAt: new Date(),
        });
      }
    });
  }

  listCompletedUnits(runId: string): Promise<string[]> {
    return this.exclusive(() => (this.state.checkpoints.get(runId) ?? []).map((r) => r.unitKey));
  }

  recordUnitFailure(input: RecordUnitFailureInput): Promise<void> {
    return this.exclusive(() => {
      requireParent(this.state.runs.has(input.runId), 'sync_unit_failures', 'sync_runs', input.runId);
      this.state.failures.push({
        ...input,
        signals: [...input.signals],
        id: ++this.state.seq,
        createdAt: new Date(),
      });
    });
  }

  listUnitFailures(runId: string): Promise<UnitFailureRow[]> {
    return this.exclusive(() =>
      this.state.failures.filter((f) => f.runId === runId).map((f) => structuredClone(f)),
    );
  }

  countRows(): Promise<Record<StoreTable, number>> {
    return this.exclusive(() => {
      const s = this.state;
      let checkpoints = 0;
      for (const rows of s.checkpoints.values()) checkpoints += rows.length;
      return {
        events: s.events.size,
        teams: s.teams.size,
        players: s.players.size,
        event_teams: s.eventTeams.size,
        event_stats: s.eventStats.size,
        team_players: s.teamPlayers.size,
        sync_runs: s.runs.size,
        sync_checkpoints: checkpoints,
        sync_unit_failures: s.failures.length,
      };
    });
  }

  async close(): Promise<void> {}

  /** Read-only views for assertions and the stats script. */
  snapshot() {
    return structuredClone({
      events: [...this.state.events.values()],
      teams: [...this.state.teams.values()],
      players: [...this.state.players.values()],
      eventTeams: [...this.state.eventTeams.values()],
      eventStats: [...this.state.eventStats.values()],
      teamPlayers: [...this.state.teamPlayers.values()],
    });
  }
}

function requireParent(
  present: boolean,
  table: string,
  parent: string,
  id: number | string,
): void {
  if (!present) {
    throw new ConstraintViolationError(
      `${table}: foreign key violation, ${parent} ${id} does not exist`,
      '23503',
    );
  }
}

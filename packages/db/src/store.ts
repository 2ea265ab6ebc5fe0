/**
 * Storage contract used by the reconciler and the orchestrator.
 *
 * Two implementations: `createPostgresSyncStore` (Drizzle on node-postgres) and
 * `MemorySyncStore` (tests, dry runs). Both enforce the same keys and foreign keys.
 */

import type { EntityKind, FailureReason, RunState } from '@hltvsync/schemas';
import type {
  events,
  teams,
  players,
  eventTeams,
  eventStats,
  teamPlayers,
  syncRuns,
  syncUnitFailures,
} from './schema';

export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;
export type TeamRow = typeof teams.$inferSelect;
export type NewTeamRow = typeof teams.$inferInsert;
export type PlayerRow = typeof players.$inferSelect;
export type NewPlayerRow = typeof players.$inferInsert;
export type EventTeamRow = typeof eventTeams.$inferSelect;
export type NewEventTeamRow = typeof eventTeams.$inferInsert;
export type EventStatRow = typeof eventStats.$inferSelect;
export type NewEventStatRow = typeof eventStats.$inferInsert;
export type TeamPlayerRow = typeof teamPlayers.$inferSelect;
export type NewTeamPlayerRow = typeof teamPlayers.$inferInsert;
export type SyncRunRow = typeof syncRuns.$inferSelect;
export type UnitFailureRow = typeof syncUnitFailures.$inferSelect;

/**
 * `insert` skips a row whose key is already taken (a concurrent transaction may
 * have committed it after `find` missed) and resolves `false` in that case.
 */
export interface EntityTable<Row, Insert> {
  find(id: number): Promise<Row | null>;
  insert(row: Insert): Promise<boolean>;
  update(id: number, patch: Partial<Insert>): Promise<void>;
}

export interface EventTeamTable {
  find(eventId: number, teamId: number): Promise<EventTeamRow | null>;
  insert(row: NewEventTeamRow): Promise<boolean>;
  update(eventId: number, teamId: number, patch: Partial<NewEventTeamRow>): Promise<void>;
}

export interface EventStatTable {
  find(eventId: number, playerId: number): Promise<EventStatRow | null>;
  insert(row: NewEventStatRow): Promise<boolean>;
  update(eventId: number, playerId: number, patch: Partial<NewEventStatRow>): Promise<void>;
}

export interface TeamPlayerTable {
  find(teamId: number, playerId: number, observedAt: Date): Promise<TeamPlayerRow | null>;
  insert(row: NewTeamPlayerRow): Promise<boolean>;
  update(id: number, patch: Partial<NewTeamPlayerRow>): Promise<void>;
}

/** Everything one unit of work may touch, inside a single transaction. */
export interface SyncStoreTx {
  events: EntityTable<EventRow, NewEventRow>;
  teams: EntityTable<TeamRow, NewTeamRow>;
  players: EntityTable<PlayerRow, NewPlayerRow>;
  eventTeams: EventTeamTable;
  eventStats: EventStatTable;
  teamPlayers: TeamPlayerTable;
}

export interface CreateRunInput {
  scopeKey: string;
  scope: unknown;
  limits: unknown;
  planSnapshot: unknown;
}

export interface UpdateRunInput {
  state?: RunState;
  planSnapshot?: unknown;
  summary?: unknown;
  errorMessage?: string | null;
  finishedAt?: Date | null;
}

export interface RecordUnitFailureInput {
  runId: string;
  unitKey: string;
  pageKind: string;
  url: string;
  reason: FailureReason;
  attempts: number;
  signals: string[];
  message: string;
}

export const STORE_TABLES = [
  'events',
  'teams',
  'players',
  'event_teams',
  'event_stats',
  'team_players',
  'sync_runs',
  'sync_checkpoints',
  'sync_unit_failures',
] as const;
export type StoreTable = (typeof STORE_TABLES)[number];

export interface SyncStore {
  /** Runs `fn` atomically: all of its writes become visible, or none do. */
  transaction<T>(fn: (tx: SyncStoreTx) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
  /** Subset of `ids` already stored for the entity kind. */
  findExistingIds(kind: EntityKind, ids: number[]): Promise<Set<number>>;

  createRun(input: CreateRunInput): Promise<SyncRunRow>;
  /** Latest run for the scope that has not reached DONE. */
  findResumableRun(scopeKey: string): Promise<SyncRunRow | null>;
  updateRun(runId: string, input: UpdateRunInput): Promise<void>;

  /** Marks the unit complete and stores the plan snapshot in one write. */
  completeUnit(runId: string, unitKey: string, planSnapshot: unknown): Promise<void>;
  listCompletedUnits(runId: string): Promise<string[]>;

  recordUnitFailure(input: RecordUnitFailureInput): Promise<void>;
  listUnitFailures(runId: string): Promise<UnitFailureRow[]>;

  countRows(): Promise<Record<StoreTable, number>>;
  close(): Promise<void>;
}

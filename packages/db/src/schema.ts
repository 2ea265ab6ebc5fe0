import {
  pgTable,
  pgEnum,
  uuid,
  serial,
  integer,
  text,
  boolean,
  timestamp,
  jsonb,
  date,
  doublePrecision,
  primaryKey,
  uniqueIndex,
  index,
} from 'drizzle-orm/pg-core';

// Enums (storage)
export const eventTypeEnum = pgEnum('event_type', ['LAN', 'ONLINE', 'REGIONAL', 'LOCAL']);
export const eventStatusEnum = pgEnum('event_status', ['UPCOMING', 'ONGOING', 'FINISHED']);
export const runStateEnum = pgEnum('sync_run_state', [
  'PLANNING',
  'FETCHING',
  'RECONCILING',
  'CHECKPOINTED',
  'DONE',
  'FAILED',
]);
export const failureReasonEnum = pgEnum('sync_failure_reason', [
  'BLOCKED',
  'TRANSIENT',
  'EXTRACTION',
  'PERSISTENCE',
]);

// Entities are keyed by the site's own external id, never a surrogate.
export const events = pgTable('events', {
  id: integer('id').primaryKey(),
  name: text('name'),
  startDate: date('start_date'),
  endDate: date('end_date'),
  location: text('location'),
  prizePool: text('prize_pool'),
  eventType: eventTypeEnum('event_type'),
  status: eventStatusEnum('status'),
  teamsCount: integer('teams_count'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const teams = pgTable('teams', {
  id: integer('id').primaryKey(),
  name: text('name'),
  country: text('country'),
  worldRank: integer('world_rank'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const players = pgTable(
  'players',
  {
    id: integer('id').primaryKey(),
    nickname: text('nickname'),
    realName: text('real_name'),
    country: text('country'),
    age: integer('age'),
    // Weak reference: no foreign key, the team may not be stored yet.
    currentTeamId: integer('current_team_id'),
    totalKills: integer('total_kills'),
    totalDeaths: integer('total_deaths'),
    kdRatio: doublePrecision('kd_ratio'),
    rating: doublePrecision('rating'),
    kast: doublePrecision('kast'),
    adr: doublePrecision('adr'),
    kpr: doublePrecision('kpr'),
    apr: doublePrecision('apr'),
    impact: doublePrecision('impact'),
    headshotPct: doublePrecision('headshot_pct'),
    mapsPlayed: integer('maps_played'),
    roundsPlayed: integer('rounds_played'),
    statsUpdatedAt: timestamp('stats_updated_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => ({
    currentTeamIdx: index('players_current_team_idx').on(t.currentTeamId),
  }),
);

// Per-(event, team) facts; overwritten with the latest observation.
export const eventTeams = pgTable(
  'event_teams',
  {
    id: serial('id').primaryKey(),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    teamId: integer('team_id')
      .notNull()
      .references(() => teams.id, { onDelete: 'cascade' }),
    placement: integer('placement'),
    placementLabel: text('placement_label'),
    prize: text('prize'),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => ({
    eventTeamUnique: uniqueIndex('event_teams_event_team_idx').on(t.eventId, t.teamId),
  }),
);

export const eventStats = pgTable(
  'event_stats',
  {
    id: serial('id').primaryKey(),
    eventId: integer('event_id')
      .notNull()
      .references(() => events.id, { onDelete: 'cascade' }),
    playerId: integer('player_id')
      .notNull()
      .references(() => players.id, { onDelete: 'cascade' }),
    rating: doublePrecision('rating'),
    mapsPlayed: integer('maps_played'),
    kdRatio: doublePrecision('kd_ratio'),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => ({
    eventPlayerUnique: uniqueIndex('event_stats_event_player_idx').on(t.eventId, t.playerId),
  }),
);

// Roster history: one row per observation, never overwritten.
export const teamPlayers = pgTable(
  'team_players',
  {
    id: serial('id').primaryKey(),
    teamId: integer('team_id')
      .notNull()
      .references(() => teams.id, { onDelete: 'cascade' }),
    playerId: integer('player_id')
      .notNull()
      .references(() => players.id, { onDelete: 'cascade' }),
    role: text('role'),
    isCurrent: boolean('is_current').default(true).notNull(),
    observedAt: timestamp('observed_at').notNull(),
  },
  (t) => ({
    observationUnique: uniqueIndex('team_players_observation_idx').on(
      t.teamId,
      t.playerId,
      t.observedAt,
    ),
  }),
);

export const syncRuns = pgTable(
  'sync_runs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    scopeKey: text('scope_key').notNull(),
    scope: jsonb('scope').$type<unknown>().notNull(),
    limits: jsonb('limits').$type<unknown>(),
    state: runStateEnum('state').notNull().default('PLANNING'),
    planSnapshot: jsonb('plan_snapshot').$type<unknown>(),
    summary: jsonb('summary').$type<unknown>(),
    errorMessage: text('error_message'),
    startedAt: timestamp('started_at').defaultNow().notNull(),
    finishedAt: timestamp('finished_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (t) => ({
    scopeKeyIdx: index('sync_runs_scope_key_idx').on(t.scopeKey),
  }),
);

export const syncCheckpoints = pgTable(
  'sync_checkpoints',
  {
    runId: uuid('run_id')
      .notNull()
      .references(() => syncRuns.id, { onDelete: 'cascade' }),
    unitKey: text('unit_key').notNull(),
    completedAt: timestamp('completed_at').defaultNow().notNull(),
  },
  (t) => ({
    pk: primaryKey({ columns: [t.runId, t.unitKey] }),
  }),
);

export const syncUnitFailures = pgTable(
  'sync_unit_failures',
  {
    id: serial('id').primaryKey(),
    runId: uuid('run_id')
      .notNull()
      .references(() => syncRuns.id, { onDelete: 'cascade' }),
    unitKey: text('unit_key').notNull(),
    pageKind: text('page_kind').notNull(),
    url: text('url').notNull(),
    reason: failureReasonEnum('reason').notNull(),
    attempts: integer('attempts').notNull(),
    signals: jsonb('signals').$type<string[]>().default([]).notNull(),
    message: text('message').notNull(),
    createdAt: timestamp('created_at').defaultNow().notNull(),
  },
  (t) => ({
    runIdx: index('sync_unit_failures_run_idx').on(t.runId),
  }),
);

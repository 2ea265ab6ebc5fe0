/**
 * Reconciler: upserts extracted records and their associations by external id.
 *
 * Each call runs in one store transaction. `applyUnit` writes one unit's whole
 * record set atomically, parents before children.
 */

import { agentLog } from '@hltvsync/core';
import {
  PersistenceError,
  toPersistenceError,
  type NewEventRow,
  type NewEventStatRow,
  type NewEventTeamRow,
  type NewPlayerRow,
  type NewTeamPlayerRow,
  type NewTeamRow,
  type SyncStore,
  type SyncStoreTx,
} from '@hltvsync/db';
import type {
  AssociationRecord,
  EntityRecord,
  EventRecord,
  EventStatRecord,
  EventTeamRecord,
  PlayerRecord,
  RosterEntryRecord,
  SyncRecord,
  TeamRecord,
} from '@hltvsync/schemas';
import { PatchBuilder } from './merge.js';

export type UpsertOutcome = 'INSERTED' | 'UPDATED' | 'UNCHANGED';
/** An existing association row counts as UPDATED even when no attribute changed. */
export type AssociationOutcome = 'INSERTED' | 'UPDATED';

type EventTeamAttributes = Omit<EventTeamRecord, 'kind' | 'eventId' | 'teamId'>;
type EventStatAttributes = Omit<EventStatRecord, 'kind' | 'eventId' | 'playerId'>;
type RosterAttributes = Partial<Omit<RosterEntryRecord, 'kind' | 'teamId' | 'playerId'>> & {
  observedAt?: Date;
};

export type AssociationArgs =
  | [kind: 'event_team', eventId: number, teamId: number, attributes?: EventTeamAttributes]
  | [kind: 'event_stat', eventId: number, playerId: number, attributes?: EventStatAttributes]
  | [kind: 'roster_entry', teamId: number, playerId: number, attributes?: RosterAttributes];

export interface ApplyOptions {
  /** Observation time for roster history entries. */
  observedAt: Date;
}

export interface ApplySummary {
  inserted: number;
  updated: number;
  unchanged: number;
  byKind: Partial<Record<SyncRecord['kind'], number>>;
}

const PARENT_ORDER: Record<SyncRecord['kind'], number> = {
  event: 0,
  team: 1,
  player: 2,
  event_team: 3,
  event_stat: 4,
  roster_entry: 5,
};

/** Parents first; stable within a kind so page order is kept. */
export function orderForApply(records: SyncRecord[]): SyncRecord[] {
  return records
    .map((r, i) => ({ r, i }))
    .sort((a, b) => PARENT_ORDER[a.r.kind] - PARENT_ORDER[b.r.kind] || a.i - b.i)
    .map(({ r }) => r);
}

function missingParent(child: string, parent: string, id: number): PersistenceError {
  return new PersistenceError(`${child}: referenced ${parent} ${id} does not exist`, {
    connectivity: false,
    code: '23503',
  });
}

/**
 * Runs a find-then-insert write a second time when its insert found the key
 * taken: a concurrent unit committed that row after `find` missed, and the
 * second pass merges into it.
 */
async function retryOnTakenKey<T>(what: string, write: () => Promise<T | null>): Promise<T> {
  const first = await write();
  if (first !== null) return first;
  const second = await write();
  if (second !== null) return second;
  throw new PersistenceError(`${what}: key taken but no row found`, {
    connectivity: false,
    code: '23505',
  });
}

async function upsertEvent(tx: SyncStoreTx, r: EventRecord): Promise<UpsertOutcome> {
  return retryOnTakenKey<UpsertOutcome>(`events ${r.id}`, async () => {
    const current = await tx.events.find(r.id);
    const b = new PatchBuilder<NewEventRow>(current)
      .set('name', r.name)
      .set('startDate', r.startDate)
      .set('endDate', r.endDate)
      .set('location', r.location)
      .set('prizePool', r.prizePool)
      .set('eventType', r.eventType)
      .set('status', r.status)
      .set('teamsCount', r.teamsCount);
    if (!current) {
      return (await tx.events.insert({ ...b.patch, id: r.id })) ? 'INSERTED' : null;
    }
    if (!b.changed) return 'UNCHANGED';
    await tx.events.update(r.id, b.patch);
    return 'UPDATED';
  });
}

async function upsertTeam(tx: SyncStoreTx, r: TeamRecord): Promise<UpsertOutcome> {
  return retryOnTakenKey<UpsertOutcome>(`teams ${r.id}`, async () => {
    const current = await tx.teams.find(r.id);
    const b = new PatchBuilder<NewTeamRow>(current)
      .set('name', r.name)
      .set('country', r.country)
      .set('worldRank', r.worldRank);
    if (!current) {
      return (await tx.teams.insert({ ...b.patch, id: r.id })) ? 'INSERTED' : null;
    }
    if (!b.changed) return 'UNCHANGED';
    await tx.teams.update(r.id, b.patch);
    return 'UPDATED';
  });
}

async function upsertPlayer(tx: SyncStoreTx, r: PlayerRecord, now: Date): Promise<UpsertOutcome> {
  return retryOnTakenKey<UpsertOutcome>(`players ${r.id}`, async () => {
    const current = await tx.players.find(r.id);
    const b = new PatchBuilder<NewPlayerRow>(current)
      .set('nickname', r.nickname)
      .set('realName', r.realName)
      .set('country', r.country)
      .set('age', r.age)
      .set('currentTeamId', r.currentTeamId);

    if (r.stats) {
      // Career stats are one snapshot: every observed field is written together.
      const before = b.size;
      b.set('totalKills', r.stats.totalKills)
        .set('totalDeaths', r.stats.totalDeaths)
        .set('kdRatio', r.stats.kdRatio)
        .set('rating', r.stats.rating)
        .set('kast', r.stats.kast)
        .set('adr', r.stats.adr)
        .set('kpr', r.stats.kpr)
        .set('apr', r.stats.apr)
        .set('impact', r.stats.impact)
        .set('headshotPct', r.stats.headshotPct)
        .set('mapsPlayed', r.stats.mapsPlayed)
        .set('roundsPlayed', r.stats.roundsPlayed);
      if (b.size > before) b.always('statsUpdatedAt', now);
    }

    if (!current) {
      return (await tx.players.insert({ ...b.patch, id: r.id })) ? 'INSERTED' : null;
    }
    if (!b.changed) return 'UNCHANGED';
    await tx.players.update(r.id, b.patch);
    return 'UPDATED';
  });
}

async function upsertEventTeam(tx: SyncStoreTx, r: EventTeamRecord): Promise<AssociationOutcome> {
  if (!(await tx.events.find(r.eventId))) throw missingParent('event_teams', 'event', r.eventId);
  if (!(await tx.teams.find(r.teamId))) throw missingParent('event_teams', 'team', r.teamId);
  return retryOnTakenKey<AssociationOutcome>(`event_teams ${r.eventId}:${r.teamId}`, async () => {
    const current = await tx.eventTeams.find(r.eventId, r.teamId);
    const b = new PatchBuilder<NewEventTeamRow>(current)
      .set('placement', r.placement)
      .set('placementLabel', r.placementLabel)
      .set('prize', r.prize);
    if (!current) {
      const row = { ...b.patch, eventId: r.eventId, teamId: r.teamId };
      return (await tx.eventTeams.insert(row)) ? 'INSERTED' : null;
    }
    if (b.changed) await tx.eventTeams.update(r.eventId, r.teamId, b.patch);
    return 'UPDATED';
  });
}

async function upsertEventStat(tx: SyncStoreTx, r: EventStatRecord): Promise<AssociationOutcome> {
  if (!(await tx.events.find(r.eventId))) throw missingParent('event_stats', 'event', r.eventId);
  if (!(await tx.players.find(r.playerId))) throw missingParent('event_stats', 'player', r.playerId);
  return retryOnTakenKey<AssociationOutcome>(`event_stats ${r.eventId}:${r.playerId}`, async () => {
    const current = await tx.eventStats.find(r.eventId, r.playerId);
    const b = new PatchBuilder<NewEventStatRow>(current)
      .set('rating', r.rating)
      .set('mapsPlayed', r.mapsPlayed)
      .set('kdRatio', r.kdRatio);
    if (!current) {
      const row = { ...b.patch, eventId: r.eventId, playerId: r.playerId };
      return (await tx.eventStats.insert(row)) ? 'INSERTED' : null;
    }
    if (b.changed) await tx.eventStats.update(r.eventId, r.playerId, b.patch);
    return 'UPDATED';
  });
}

/** Roster history is keyed by (team, player, observedAt): a new observation adds a row. */
async function upsertRosterEntry(
  tx: SyncStoreTx,
  r: RosterEntryRecord,
  observedAt: Date,
): Promise<AssociationOutcome> {
  if (!(await tx.teams.find(r.teamId))) throw missingParent('team_players', 'team', r.teamId);
  if (!(await tx.players.find(r.playerId))) throw missingParent('team_players', 'player', r.playerId);
  return retryOnTakenKey<AssociationOutcome>(`team_players ${r.teamId}:${r.playerId}`, async () => {
    const current = await tx.teamPlayers.find(r.teamId, r.playerId, observedAt);
    const b = new PatchBuilder<NewTeamPlayerRow>(current)
      .set('role', r.role)
      .set('isCurrent', r.isCurrent);
    if (!current) {
      const row = { ...b.patch, teamId: r.teamId, playerId: r.playerId, observedAt };
      return (await tx.teamPlayers.insert(row)) ? 'INSERTED' : null;
    }
    if (b.changed) await tx.teamPlayers.update(current.id, b.patch);
    return 'UPDATED';
  });
}

function applyEntity(tx: SyncStoreTx, r: EntityRecord, now: Date): Promise<UpsertOutcome> {
  switch (r.kind) {
    case 'event':
      return upsertEvent(tx, r);
    case 'team':
      return upsertTeam(tx, r);
    case 'player':
      return upsertPlayer(tx, r, now);
  }
}

function applyAssociation(
  tx: SyncStoreTx,
  r: AssociationRecord,
  observedAt: Date,
): Promise<AssociationOutcome> {
  switch (r.kind) {
    case 'event_team':
      return upsertEventTeam(tx, r);
    case 'event_stat':
      return upsertEventStat(tx, r);
    case 'roster_entry':
      return upsertRosterEntry(tx, r, observedAt);
  }
}

function associationFromArgs(args: AssociationArgs): {
  record: AssociationRecord;
  observedAt?: Date;
} {
  switch (args[0]) {
    case 'event_team':
      return { record: { ...args[3], kind: 'event_team', eventId: args[1], teamId: args[2] } };
    case 'event_stat':
      return { record: { ...args[3], kind: 'event_stat', eventId: args[1], playerId: args[2] } };
    case 'roster_entry': {
      const attrs = args[3];
      return {
        record: {
          kind: 'roster_entry',
          teamId: args[1],
          playerId: args[2],
          role: attrs?.role,
          isCurrent: attrs?.isCurrent ?? true,
        },
        observedAt: attrs?.observedAt,
      };
    }
  }
}

function isEntity(r: SyncRecord): r is EntityRecord {
  return r.kind === 'event' || r.kind === 'team' || r.kind === 'player';
}

export class Reconciler {
  constructor(
    private readonly store: SyncStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async upsert(record: EntityRecord): Promise<UpsertOutcome> {
    return this.inTransaction('upsert', (tx) => applyEntity(tx, record, this.now()));
  }

  async upsertAssociation(...args: AssociationArgs): Promise<AssociationOutcome> {
    const { record, observedAt } = associationFromArgs(args);
    return this.inTransaction('upsertAssociation', (tx) =>
      applyAssociation(tx, record, observedAt ?? this.now()),
    );
  }

  /** All of one unit's records in a single transaction: all visible, or none. */
  async applyUnit(records: SyncRecord[], options: ApplyOptions): Promise<ApplySummary> {
    const ordered = orderForApply(records);
    const summary = await this.inTransaction('applyUnit', async (tx) => {
      const out: ApplySummary = { inserted: 0, updated: 0, unchanged: 0, byKind: {} };
      const now = this.now();
      for (const r of ordered) {
        const outcome = isEntity(r)
          ? await applyEntity(tx, r, now)
          : await applyAssociation(tx, r, options.observedAt);
        if (outcome === 'INSERTED') out.inserted++;
        else if (outcome === 'UPDATED') out.updated++;
        else out.unchanged++;
        out.byKind[r.kind] = (out.byKind[r.kind] ?? 0) + 1;
      }
      return out;
    });
    agentLog(
      'Reconciler',
      `Applied ${records.length} records (${summary.inserted} inserted, ${summary.updated} updated, ${summary.unchanged} unchanged)`,
      { level: 'info' },
    );
    return summary;
  }

  private async inTransaction<T>(operation: string, fn: (tx: SyncStoreTx) => Promise<T>): Promise<T> {
    try {
      return await this.store.transaction(fn);
    } catch (err) {
      throw toPersistenceError(err, operation);
    }
  }
}

import { eq, inArray } from 'drizzle-orm';
import type { EntityKind } from '@hltvsync/schemas';
import type { Executor } from './client';
import { events, teams, players } from './schema';
import type {
  EventRow,
  NewEventRow,
  TeamRow,
  NewTeamRow,
  PlayerRow,
  NewPlayerRow,
} from './store';

export async function getEventById(db: Executor, id: number): Promise<EventRow | null> {
  const [row] = await db.select().from(events).where(eq(events.id, id)).limit(1);
  return row ?? null;
}

export async function insertEvent(db: Executor, row: NewEventRow): Promise<boolean> {
  const inserted = await db
    .insert(events)
    .values(row)
    .onConflictDoNothing({ target: events.id })
    .returning({ id: events.id });
  return inserted.length > 0;
}

export async function updateEvent(db: Executor, id: number, patch: Partial<NewEventRow>) {
  await db
    .update(events)
    .set({ ...patch, updatedAt: new Date() })
    .where(eq(events.id, id));
}

export async function getTeamById(db: Executor, id: number): Promise<TeamRow | null> {
  const [row] = await db.select().from(teams).where(eq(teams.id, id)).limit(1);
  return row ?? null;
}

export async function insertTeam(db: Executor, row: NewTeamRow): Promise<boolean> {
  const inserted = await db
    .insert(teams)
    .values(row)
    .onConflictDoNothing({ target: teams.id })
    .returning({ id: teams.id });
  return inserted.length > 0;
}

export async function updateTeam(db: Executor, id: number, patch: Partial<NewTeamRow>) {
  await db
    .update(teams)
    .set({ ...patch, updatedAt: new Date() })
    .where(eq(teams.id, id));
}

export async function getPlayerById(db: Executor, id: number): Promise<PlayerRow | null> {
  const [row] = await db.select().from(players).where(eq(players.id, id)).limit(1);
  return row ?? null;
}

export async function insertPlayer(db: Executor, row: NewPlayerRow): Promise<boolean> {
  const inserted = await db
    .insert(players)
    .values(row)
    .onConflictDoNothing({ target: players.id })
    .returning({ id: players.id });
  return inserted.length > 0;
}

export async function updatePlayer(db: Executor, id: number, patch: Partial<NewPlayerRow>) {
  await db
    .update(players)
    .set({ ...patch, updatedAt: new Date() })
    .where(eq(players.id, id));
}

export async function listExistingIds(
  db: Executor,
  kind: EntityKind,
  ids: number[],
): Promise<Set<number>> {
  if (ids.length === 0) return new Set();
  const table = kind === 'EVENT' ? events : kind === 'TEAM' ? teams : players;
  const rows = await db.select({ id: table.id }).from(table).where(inArray(table.id, ids));
  return new Set(rows.map((r) => r.id));
}

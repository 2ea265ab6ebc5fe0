import { and, eq } from 'drizzle-orm';
import type { Executor } from './client';
import { eventTeams, eventStats, teamPlayers } from './schema';
import type {
  EventTeamRow,
  NewEventTeamRow,
  EventStatRow,
  NewEventStatRow,
  TeamPlayerRow,
  NewTeamPlayerRow,
} from './store';

export async function getEventTeam(
  db: Executor,
  eventId: number,
  teamId: number,
): Promise<EventTeamRow | null> {
  const [row] = await db
    .select()
    .from(eventTeams)
    .where(and(eq(eventTeams.eventId, eventId), eq(eventTeams.teamId, teamId)))
    .limit(1);
  return row ?? null;
}

export async function insertEventTeam(db: Executor, row: NewEventTeamRow): Promise<boolean> {
  const inserted = await db
    .insert(eventTeams)
    .values(row)
    .onConflictDoNothing({ target: [eventTeams.eventId, eventTeams.teamId] })
    .returning({ id: eventTeams.id });
  return inserted.length > 0;
}

export async function updateEventTeam(
  db: Executor,
  eventId: number,
  teamId: number,
  patch: Partial<NewEventTeamRow>,
) {
  await db
    .update(eventTeams)
    .set({ ...patch, updatedAt: new Date() })
    .where(and(eq(eventTeams.eventId, eventId), eq(eventTeams.teamId, teamId)));
}

export async function getEventStat(
  db: Executor,
  eventId: number,
  playerId: number,
): Promise<EventStatRow | null> {
  const [row] = await db
    .select()
    .from(eventStats)
    .where(and(eq(eventStats.eventId, eventId), eq(eventStats.playerId, playerId)))
    .limit(1);
  return row ?? null;
}

export async function insertEventStat(db: Executor, row: NewEventStatRow): Promise<boolean> {
  const inserted = await db
    .insert(eventStats)
    .values(row)
    .onConflictDoNothing({ target: [eventStats.eventId, eventStats.playerId] })
    .returning({ id: eventStats.id });
  return inserted.length > 0;
}

export async function updateEventStat(
  db: Executor,
  eventId: number,
  playerId: number,
  patch: Partial<NewEventStatRow>,
) {
  await db
    .update(eventStats)
    .set({ ...patch, updatedAt: new Date() })
    .where(and(eq(eventStats.eventId, eventId), eq(eventStats.playerId, playerId)));
}

export async function getTeamPlayerObservation(
  db: Executor,
  teamId: number,
  playerId: number,
  observedAt: Date,
): Promise<TeamPlayerRow | null> {
  const [row] = await db
    .select()
    .from(teamPlayers)
    .where(
      and(
        eq(teamPlayers.teamId, teamId),
        eq(teamPlayers.playerId, playerId),
        eq(teamPlayers.observedAt, observedAt),
      ),
    )
    .limit(1);
  return row ?? null;
}

export async function insertTeamPlayer(db: Executor, row: NewTeamPlayerRow): Promise<boolean> {
  const inserted = await db
    .insert(teamPlayers)
    .values(row)
    .onConflictDoNothing({ target: [teamPlayers.teamId, teamPlayers.playerId, teamPlayers.observedAt] })
    .returning({ id: teamPlayers.id });
  return inserted.length > 0;
}

export async function updateTeamPlayer(
  db: Executor,
  id: number,
  patch: Partial<NewTeamPlayerRow>,
) {
  await db.update(teamPlayers).set(patch).where(eq(teamPlayers.id, id));
}

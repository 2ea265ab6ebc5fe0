import { z } from 'zod';
import { entityKindEnum, eventStatusEnum, eventTypeEnum, pageKindEnum } from './enums';

/**
 * Extracted record variants.
 *
 * Every attribute is optional AND nullable:
 * - `undefined` means the fragment was not present in the page (not observed)
 * - `null` means the fragment was present but empty
 *
 * Neither ever clears a stored value; see the reconciler merge rules.
 */

const externalId = z.number().int().positive();
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
const maybe = <T extends z.ZodTypeAny>(schema: T) => schema.nullable().optional();

export const eventRecordSchema = z.object({
  kind: z.literal('event'),
  id: externalId,
  name: maybe(z.string()),
  startDate: maybe(isoDate),
  endDate: maybe(isoDate),
  location: maybe(z.string()),
  prizePool: maybe(z.string()),
  eventType: maybe(eventTypeEnum),
  status: maybe(eventStatusEnum),
  teamsCount: maybe(z.number().int().nonnegative()),
});
export type EventRecord = z.infer<typeof eventRecordSchema>;

export const teamRecordSchema = z.object({
  kind: z.literal('team'),
  id: externalId,
  name: maybe(z.string()),
  country: maybe(z.string()),
  worldRank: maybe(z.number().int().positive()),
});
export type TeamRecord = z.infer<typeof teamRecordSchema>;

export const playerStatsSchema = z.object({
  totalKills: maybe(z.number().int().nonnegative()),
  totalDeaths: maybe(z.number().int().nonnegative()),
  kdRatio: maybe(z.number()),
  rating: maybe(z.number()),
  kast: maybe(z.number()),
  adr: maybe(z.number()),
  kpr: maybe(z.number()),
  apr: maybe(z.number()),
  impact: maybe(z.number()),
  headshotPct: maybe(z.number()),
  mapsPlayed: maybe(z.number().int().nonnegative()),
  roundsPlayed: maybe(z.number().int().nonnegative()),
});
export type PlayerStats = z.infer<typeof playerStatsSchema>;

export const playerRecordSchema = z.object({
  kind: z.literal('player'),
  id: externalId,
  nickname: maybe(z.string()),
  realName: maybe(z.string()),
  country: maybe(z.string()),
  age: maybe(z.number().int().positive()),
  /** Weak reference: the team need not be stored. */
  currentTeamId: maybe(externalId),
  stats: playerStatsSchema.optional(),
});
export type PlayerRecord = z.infer<typeof playerRecordSchema>;

export const eventStatRecordSchema = z.object({
  kind: z.literal('event_stat'),
  eventId: externalId,
  playerId: externalId,
  rating: maybe(z.number()),
  mapsPlayed: maybe(z.number().int().nonnegative()),
  kdRatio: maybe(z.number()),
});
export type EventStatRecord = z.infer<typeof eventStatRecordSchema>;

export const eventTeamRecordSchema = z.object({
  kind: z.literal('event_team'),
  eventId: externalId,
  teamId: externalId,
  placement: maybe(z.number().int().positive()),
  placementLabel: maybe(z.string()),
  prize: maybe(z.string()),
});
export type EventTeamRecord = z.infer<typeof eventTeamRecordSchema>;

export const rosterEntryRecordSchema = z.object({
  kind: z.literal('roster_entry'),
  teamId: externalId,
  playerId: externalId,
  role: maybe(z.string()),
  isCurrent: z.boolean().default(true),
});
export type RosterEntryRecord = z.infer<typeof rosterEntryRecordSchema>;

export const syncRecordSchema = z.discriminatedUnion('kind', [
  eventRecordSchema,
  teamRecordSchema,
  playerRecordSchema,
  eventStatRecordSchema,
  eventTeamRecordSchema,
  rosterEntryRecordSchema,
]);
export type SyncRecord = z.infer<typeof syncRecordSchema>;
export type EntityRecord = EventRecord | TeamRecord | PlayerRecord;
export type AssociationRecord = EventStatRecord | EventTeamRecord | RosterEntryRecord;

/** A reference to another entity found on a page, in page order. */
export const discoveredRefSchema = z.object({
  kind: entityKindEnum,
  id: externalId,
  name: z.string().nullable(),
});
export type DiscoveredRef = z.infer<typeof discoveredRefSchema>;

export const extractionResultSchema = z.object({
  pageKind: pageKindEnum,
  url: z.string(),
  capturedAt: z.string(),
  /** External id of the page's own entity; null for listing pages. */
  primaryId: externalId.nullable(),
  records: z.array(syncRecordSchema),
  links: z.array(discoveredRefSchema),
  extras: z.record(z.unknown()),
});
export type ExtractionResult = z.infer<typeof extractionResultSchema>;

import { z } from 'zod';

export const entityKindEnum = z.enum(['EVENT', 'TEAM', 'PLAYER']);
export type EntityKind = z.infer<typeof entityKindEnum>;

export const pageKindEnum = z.enum([
  'event_listing',
  'event_archive',
  'event_overview',
  'event_results',
  'event_stats',
  'team_ranking',
  'team_roster',
  'player_listing',
  'player_profile',
]);
export type PageKind = z.infer<typeof pageKindEnum>;

/** Page kinds that only list references to other entities and are never persisted. */
export const LISTING_PAGE_KINDS = [
  'event_listing',
  'event_archive',
  'team_ranking',
  'player_listing',
] as const;

export const eventTypeEnum = z.enum(['LAN', 'ONLINE', 'REGIONAL', 'LOCAL']);
export type EventType = z.infer<typeof eventTypeEnum>;

export const eventStatusEnum = z.enum(['UPCOMING', 'ONGOING', 'FINISHED']);
export type EventStatus = z.infer<typeof eventStatusEnum>;

export const runStateEnum = z.enum([
  'PLANNING',
  'FETCHING',
  'RECONCILING',
  'CHECKPOINTED',
  'DONE',
  'FAILED',
]);
export type RunState = z.infer<typeof runStateEnum>;

export const unitStatusEnum = z.enum(['PENDING', 'DONE', 'FAILED']);
export type UnitStatus = z.infer<typeof unitStatusEnum>;

export const failureReasonEnum = z.enum(['BLOCKED', 'TRANSIENT', 'EXTRACTION', 'PERSISTENCE']);
export type FailureReason = z.infer<typeof failureReasonEnum>;

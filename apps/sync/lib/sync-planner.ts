/**
 * Sync Planner: pure code.
 *
 * Turns a scope directive into units of work and, after each unit completes,
 * decides which dependent units follow. No I/O: the caller supplies the set
 * of ids already in the store when a listing is expanded.
 *
 * Dependency order: a unit is only planned once the unit that stores its
 * parent has committed (event → results/stats → teams → players).
 */

import { z } from 'zod';
import { buildPageUrl, DEFAULT_PAGE_KINDS, type PageKindTable } from '@hltvsync/core';
import {
  entityKindEnum,
  LISTING_PAGE_KINDS,
  pageKindEnum,
  scopeDirectiveSchema,
  syncLimitsSchema,
  unitStatusEnum,
  type DiscoveredRef,
  type EntityKind,
  type ExtractionResult,
  type PageKind,
  type ScopeDirective,
  type SyncLimits,
} from '@hltvsync/schemas';

// ── Plan model (persisted on the run row) ───────────────────────────────────

export const planUnitSchema = z.object({
  key: z.string(),
  pageKind: pageKindEnum,
  externalId: z.number().int().positive().nullable(),
  /** Position in a paged listing (the event archive); absent elsewhere. */
  offset: z.number().int().nonnegative().optional(),
  url: z.string(),
  status: unitStatusEnum,
  parentKey: z.string().nullable(),
});
export type PlanUnit = z.infer<typeof planUnitSchema>;

export const planSnapshotSchema = z.object({
  version: z.literal(1),
  scope: scopeDirectiveSchema,
  limits: syncLimitsSchema,
  units: z.array(planUnitSchema),
  /** Entity units planned so far, per kind; compared against the limits. */
  counts: z.record(entityKindEnum, z.number().int().nonnegative()),
});
export type PlanSnapshot = z.infer<typeof planSnapshotSchema>;

export type UnitGroup = 'LISTING' | EntityKind;

export interface PlannerEnv {
  baseUrl: string;
  pageKinds?: PageKindTable;
  /** Archive pages an unseen event scope may walk; defaults to DEFAULT_MAX_ARCHIVE_PAGES. */
  maxArchivePages?: number;
}

export const DEFAULT_MAX_ARCHIVE_PAGES = 20;

// ── Page kind roles ─────────────────────────────────────────────────────────

const LISTING_FOR: Record<EntityKind, PageKind> = {
  EVENT: 'event_listing',
  TEAM: 'team_ranking',
  PLAYER: 'player_listing',
};

/** The page that stores an entity of this kind. */
const ENTITY_PAGE: Record<EntityKind, PageKind> = {
  EVENT: 'event_overview',
  TEAM: 'team_roster',
  PLAYER: 'player_profile',
};

export function isListingPage(pageKind: PageKind): boolean {
  return LISTING_PAGE_KINDS.some((kind) => kind === pageKind);
}

export function unitGroup(pageKind: PageKind): UnitGroup {
  if (isListingPage(pageKind)) return 'LISTING';
  if (pageKind === 'team_roster') return 'TEAM';
  if (pageKind === 'player_profile') return 'PLAYER';
  return 'EVENT';
}

export function unitKey(pageKind: PageKind, externalId: number | null, offset?: number): string {
  if (offset !== undefined) return `${pageKind}:offset=${offset}`;
  return `${pageKind}:${externalId ?? 'list'}`;
}

function limitFor(limits: SyncLimits, kind: EntityKind): number | undefined {
  if (kind === 'EVENT') return limits.maxEvents;
  if (kind === 'TEAM') return limits.maxTeams;
  return limits.maxPlayers;
}

/** True while another entity of `kind` may still be planned. */
export function canPlanEntity(plan: PlanSnapshot, kind: EntityKind): boolean {
  const limit = limitFor(plan.limits, kind);
  return limit === undefined || (plan.counts[kind] ?? 0) < limit;
}

function makeUnit(
  env: PlannerEnv,
  pageKind: PageKind,
  externalId: number | null,
  parentKey: string | null,
  offset?: number,
): PlanUnit {
  const table = env.pageKinds ?? DEFAULT_PAGE_KINDS;
  const unit: PlanUnit = {
    key: unitKey(pageKind, externalId, offset),
    pageKind,
    externalId,
    url: buildPageUrl(env.baseUrl, pageKind, externalId, table, offset),
    status: 'PENDING',
    parentKey,
  };
  if (offset !== undefined) unit.offset = offset;
  return unit;
}

/**
 * Adds the entity's own unit unless it is already planned or its kind's limit
 * is reached. Returns the added unit, if any.
 */
function planEntity(
  plan: PlanSnapshot,
  env: PlannerEnv,
  kind: EntityKind,
  id: number,
  parentKey: string | null,
): PlanUnit | null {
  const key = unitKey(ENTITY_PAGE[kind], id);
  if (plan.units.some((u) => u.key === key)) return null;
  if (!canPlanEntity(plan, kind)) return null;
  const unit = makeUnit(env, ENTITY_PAGE[kind], id, parentKey);
  plan.units.push(unit);
  plan.counts[kind] = (plan.counts[kind] ?? 0) + 1;
  return unit;
}

function planPage(
  plan: PlanSnapshot,
  env: PlannerEnv,
  pageKind: PageKind,
  id: number,
  parentKey: string,
): PlanUnit | null {
  const key = unitKey(pageKind, id);
  if (plan.units.some((u) => u.key === key)) return null;
  const unit = makeUnit(env, pageKind, id, parentKey);
  plan.units.push(unit);
  return unit;
}

/**
 * The archive page after `unit`, while an unseen event scope is still short of
 * its count. The `/events` listing leads to offset 0; each archive page leads to
 * the offset past the events it listed. An empty archive page ends the walk.
 */
function nextArchivePage(
  plan: PlanSnapshot,
  env: PlannerEnv,
  unit: PlanUnit,
  listed: number,
): PlanUnit | null {
  const { scope } = plan;
  if (scope.kind !== 'EVENT' || scope.selector.type !== 'unseen') return null;
  if ((plan.counts.EVENT ?? 0) >= scope.selector.count) return null;
  if (!canPlanEntity(plan, 'EVENT')) return null;

  let offset: number;
  if (unit.pageKind === 'event_listing') offset = 0;
  else if (unit.pageKind === 'event_archive' && listed > 0) offset = (unit.offset ?? 0) + listed;
  else return null;

  const walked = plan.units.filter((u) => u.pageKind === 'event_archive').length;
  if (walked >= (env.maxArchivePages ?? DEFAULT_MAX_ARCHIVE_PAGES)) return null;
  if (plan.units.some((u) => u.key === unitKey('event_archive', null, offset))) return null;
  const page = makeUnit(env, 'event_archive', null, unit.key, offset);
  plan.units.push(page);
  return page;
}

// ── Entry points ────────────────────────────────────────────────────────────

export function createPlan(
  scope: ScopeDirective,
  limits: SyncLimits,
  env: PlannerEnv,
): PlanSnapshot {
  const plan: PlanSnapshot = {
    version: 1,
    scope,
    limits,
    units: [],
    counts: { EVENT: 0, TEAM: 0, PLAYER: 0 },
  };
  if (scope.selector.type === 'id') {
    planEntity(plan, env, scope.kind, scope.selector.id, null);
  } else if (canPlanEntity(plan, scope.kind)) {
    plan.units.push(makeUnit(env, LISTING_FOR[scope.kind], null, null));
  }
  return plan;
}

/** Ids from a listing that a follow-up unseen expansion will ask the store about. */
export function listingCandidates(result: ExtractionResult, kind: EntityKind): number[] {
  return result.links.filter((l) => l.kind === kind).map((l) => l.id);
}

/**
 * Units that follow a completed unit. Mutates `plan` (appends units, bumps counts)
 * and returns what was added, in planning order.
 *
 * An unseen scope takes at most `count` entities across all of its listing
 * pages; events keep paging through the archive until that count is met.
 *
 * `storedIds` is only consulted for listing units: the ids among the listing
 * that the store already holds.
 */
export function expandPlan(
  plan: PlanSnapshot,
  unit: PlanUnit,
  result: ExtractionResult,
  env: PlannerEnv,
  storedIds: ReadonlySet<number> = new Set(),
): PlanUnit[] {
  const added: PlanUnit[] = [];
  const push = (u: PlanUnit | null) => {
    if (u) added.push(u);
  };
  const { scope } = plan;

  if (isListingPage(unit.pageKind)) {
    if (scope.selector.type !== 'unseen') return added;
    const listed = refsOfKind(result.links, scope.kind);
    for (const ref of listed) {
      if ((plan.counts[scope.kind] ?? 0) >= scope.selector.count) break;
      if (storedIds.has(ref.id)) continue;
      const u = planEntity(plan, env, scope.kind, ref.id, unit.key);
      if (!u) {
        if (!canPlanEntity(plan, scope.kind)) break;
        continue;
      }
      added.push(u);
    }
    push(nextArchivePage(plan, env, unit, listed.length));
    return added;
  }

  if (!scope.fullStats || unit.externalId === null) return added;

  switch (unit.pageKind) {
    case 'event_overview':
      push(planPage(plan, env, 'event_results', unit.externalId, unit.key));
      push(planPage(plan, env, 'event_stats', unit.externalId, unit.key));
      break;
    case 'event_results':
      for (const ref of refsOfKind(result.links, 'TEAM')) {
        if (!canPlanEntity(plan, 'TEAM')) break;
        push(planEntity(plan, env, 'TEAM', ref.id, unit.key));
      }
      break;
    case 'team_roster':
      for (const ref of refsOfKind(result.links, 'PLAYER')) {
        if (!canPlanEntity(plan, 'PLAYER')) break;
        push(planEntity(plan, env, 'PLAYER', ref.id, unit.key));
      }
      break;
    default:
      break;
  }
  return added;
}

function refsOfKind(links: DiscoveredRef[], kind: EntityKind): DiscoveredRef[] {
  return links.filter((l) => l.kind === kind);
}

/** Units still to run, in plan order. */
export function pendingUnits(plan: PlanSnapshot): PlanUnit[] {
  return plan.units.filter((u) => u.status === 'PENDING');
}

/**
 * Prepare a persisted plan for resumption: completed units (by checkpoint)
 * are DONE, failed units get another chance.
 */
export function resumePlan(plan: PlanSnapshot, completedKeys: Iterable<string>): PlanSnapshot {
  const done = new Set(completedKeys);
  return {
    ...plan,
    units: plan.units.map((u): PlanUnit => ({
      ...u,
      status: done.has(u.key) ? 'DONE' : 'PENDING',
    })),
  };
}

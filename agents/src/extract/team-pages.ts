/**
 * Team page extractors: world ranking listing and team profile with roster.
 */

import { parseEntityId } from '@hltvsync/core';
import type {
  DiscoveredRef,
  PlayerRecord,
  RosterEntryRecord,
  SyncRecord,
  TeamRecord,
} from '@hltvsync/schemas';
import {
  collectRefs,
  fail,
  observedValue,
  requireIdentity,
  result,
  type PageExtractor,
} from './context.js';
import { attrOf, parseOrdinal, textAt, textOf, type HTMLElement } from './html.js';

export const extractTeamRanking: PageExtractor = (doc, ctx) => {
  const rows = doc.querySelectorAll('.ranked-team');
  if (rows.length === 0) fail(ctx, 'ranking list not found');
  const seen = new Set<number>();
  const links: DiscoveredRef[] = [];
  for (const row of rows) {
    const id = parseEntityId(attrOf(row.querySelector('a[href*="/team/"]'), 'href'), 'TEAM');
    if (id === null || seen.has(id)) continue;
    seen.add(id);
    links.push({ kind: 'TEAM', id, name: textAt(row, '.teamLine .name') ?? textAt(row, '.name') });
  }
  return result(ctx, null, [], links);
};

function worldRank(doc: HTMLElement): { value: number | null; present: boolean } {
  const stats = doc.querySelectorAll('.profile-team-stat');
  const ranked = stats.find((s) => (textAt(s, 'b') ?? '').toLowerCase().includes('ranking'));
  const el = ranked?.querySelector('.right') ?? null;
  return { value: parseOrdinal(textOf(el)), present: el !== null };
}

function teamCountry(doc: HTMLElement): string | null {
  const el = doc.querySelector('.team-country');
  return textOf(el) ?? attrOf(el?.querySelector('img.flag'), 'title');
}

export const extractTeamRoster: PageExtractor = (doc, ctx) => {
  const teamId = requireIdentity(doc, ctx, 'TEAM');
  if (!doc.querySelector('.teamProfile')) fail(ctx, 'team profile container not found');

  const rank = worldRank(doc);
  const team: TeamRecord = {
    kind: 'team',
    id: teamId,
    name: observedValue(
      textAt(doc, '.profile-team-name'),
      doc.querySelector('.profile-team-name') !== null,
    ),
    country: observedValue(teamCountry(doc), doc.querySelector('.team-country') !== null),
    worldRank: observedValue(rank.value, rank.present),
  };

  // Roles come from the players table when the page has one.
  const roles = new Map<number, string | null>();
  for (const row of doc.querySelectorAll('table.players-table tbody tr')) {
    const pid = parseEntityId(attrOf(row.querySelector('a[href*="/player/"]'), 'href'), 'PLAYER');
    if (pid !== null && !roles.has(pid)) {
      roles.set(pid, textAt(row, '.status-cell') ?? textAt(row, '.player-role'));
    }
  }

  const refs = collectRefs(
    doc,
    '.bodyshot-team a[href*="/player/"], table.players-table a[href*="/player/"]',
    'PLAYER',
    (a) => attrOf(a, 'title') ?? textAt(a, '.text-ellipsis') ?? textOf(a),
  );

  const players: PlayerRecord[] = refs.map((r) => ({
    kind: 'player',
    id: r.id,
    nickname: r.name ?? undefined,
    currentTeamId: teamId,
  }));
  const roster: RosterEntryRecord[] = refs.map((r) => ({
    kind: 'roster_entry',
    teamId,
    playerId: r.id,
    role: roles.has(r.id) ? roles.get(r.id) : undefined,
    isCurrent: true,
  }));

  const records: SyncRecord[] = [team, ...players, ...roster];
  return result(ctx, teamId, records, refs);
};

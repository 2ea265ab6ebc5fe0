/**
 * Event page extractors: listing, archive, overview, results (placements), stats.
 */

import { parseEntityId } from '@hltvsync/core';
import type {
  EventRecord,
  EventTeamRecord,
  EventStatRecord,
  EventType,
  PlayerRecord,
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
import {
  attrOf,
  decodeEmbeddedJson,
  deriveEventStatus,
  parseInteger,
  parseNumber,
  parseOrdinal,
  textAt,
  textOf,
  unixMsToDate,
  type HTMLElement,
} from './html.js';

export const extractEventListing: PageExtractor = (doc, ctx) => {
  const holder = doc.querySelector('.events-holder');
  if (!holder) fail(ctx, 'events listing container not found');
  const links = collectRefs(
    holder,
    'a.ongoing-event, a.big-event, a.small-event',
    'EVENT',
    (a) =>
      textAt(a, '.big-event-name') ??
      textAt(a, '.event-name-small') ??
      textAt(a, '.text-ellipsis') ??
      textOf(a),
  );
  return result(ctx, null, [], links);
};

/** Archive pages list past events as small cards only; an empty page ends the archive. */
export const extractEventArchive: PageExtractor = (doc, ctx) => {
  const holder = doc.querySelector('.events-holder');
  if (!holder) fail(ctx, 'events archive container not found');
  const links = collectRefs(
    holder,
    "a.small-event[href*='/events/']",
    'EVENT',
    (a) => textAt(a, '.text-ellipsis') ?? textOf(a),
  );
  return result(ctx, null, [], links);
};

const EVENT_TYPE_TOKENS: [RegExp, EventType][] = [
  [/\bOnline\b/i, 'ONLINE'],
  [/\bIntl\.\s*LAN\b/, 'LAN'],
  [/\bReg\.\s*LAN\b/, 'REGIONAL'],
  [/\bLocal\s+LAN\b/, 'LOCAL'],
  [/\bLAN\b/, 'LAN'],
];

/**
 * "Online" → ONLINE, "Intl. LAN" → LAN, "Reg. LAN" → REGIONAL, "Local LAN" → LOCAL.
 * Tokens are matched whole, so a country such as "Poland" yields null.
 */
export function eventTypeFromText(text: string | null): EventType | null {
  if (!text) return null;
  for (const [token, type] of EVENT_TYPE_TOKENS) {
    if (token.test(text)) return type;
  }
  return null;
}

function readBrackets(doc: HTMLElement): unknown[] {
  const out: unknown[] = [];
  for (const el of doc.querySelectorAll('.slotted-bracket-placeholder')) {
    const payload = decodeEmbeddedJson(attrOf(el, 'data-slotted-bracket-json'));
    if (payload !== null) out.push(payload);
  }
  return out;
}

export const extractEventOverview: PageExtractor = (doc, ctx) => {
  const id = requireIdentity(doc, ctx, 'EVENT');
  const info = doc.querySelector('table.info');

  const dates = info ? info.querySelectorAll('td.eventdate span[data-unix]') : [];
  const startDate = dates.length > 0 ? unixMsToDate(attrOf(dates[0], 'data-unix')) : null;
  const endDate =
    dates.length > 1 ? unixMsToDate(attrOf(dates[dates.length - 1], 'data-unix')) : startDate;

  const prizeCell = info?.querySelector('td.prizepool') ?? null;
  const prizePool = attrOf(prizeCell, 'title') ?? textOf(prizeCell);
  const locationCell = info?.querySelector('td.location') ?? null;
  const location = locationCell
    ? (textAt(locationCell, '.text-ellipsis') ?? textOf(locationCell))
    : null;
  const typeCell = doc.querySelector('.eventType, .event-type');
  const eventType = eventTypeFromText(textOf(typeCell) ?? textOf(locationCell));
  const teamsCell = info?.querySelector('td.teamsNumber') ?? null;

  const event: EventRecord = {
    kind: 'event',
    id,
    name: observedValue(
      textAt(doc, 'h1.event-hub-title') ?? textAt(doc, '.eventname'),
      doc.querySelector('h1.event-hub-title, .eventname') !== null,
    ),
    startDate: observedValue(startDate, dates.length > 0),
    endDate: observedValue(endDate, dates.length > 0),
    location: observedValue(location, locationCell !== null),
    prizePool: observedValue(prizePool, prizeCell !== null),
    eventType: observedValue(eventType, typeCell !== null || eventType !== null),
    status: observedValue(deriveEventStatus(startDate, endDate, ctx.capturedAt), dates.length > 0),
    teamsCount: observedValue(parseInteger(textOf(teamsCell)), teamsCell !== null),
  };

  return result(ctx, id, [event], [], { brackets: readBrackets(doc) });
};

const ORDINAL_RE = /\d+(?:\s*-\s*\d+)?(?:st|nd|rd|th)/i;

function placementText(block: HTMLElement): string | null {
  const explicit = textAt(block, '.placement-pos') ?? textAt(block, '.position');
  if (explicit) return explicit;
  const m = ORDINAL_RE.exec(textOf(block) ?? '');
  return m ? m[0] : null;
}

export const extractEventResults: PageExtractor = (doc, ctx) => {
  const eventId = requireIdentity(doc, ctx, 'EVENT');
  const placements = doc.querySelectorAll('.placements .placement');
  const attending = doc.querySelectorAll('.teams-attending .team-box');
  if (!doc.querySelector('.placements, .teams-attending')) {
    fail(ctx, 'no placements or attending teams section');
  }

  const teams = new Map<number, TeamRecord>();
  const assoc = new Map<number, EventTeamRecord>();

  for (const block of placements) {
    const link = block.querySelector('a[href*="/team/"]');
    const teamId = parseEntityId(attrOf(link, 'href'), 'TEAM');
    if (teamId === null || assoc.has(teamId)) continue;
    const label = placementText(block);
    const prizeEl = block.querySelector('.prize, .prizeMoney');
    teams.set(teamId, {
      kind: 'team',
      id: teamId,
      name: textAt(block, '.team') ?? textOf(link) ?? undefined,
    });
    assoc.set(teamId, {
      kind: 'event_team',
      eventId,
      teamId,
      placement: observedValue(parseOrdinal(label), label !== null),
      placementLabel: observedValue(label, label !== null),
      prize: observedValue(textOf(prizeEl), prizeEl !== null),
    });
  }

  for (const box of attending) {
    const link = box.querySelector('a[href*="/team/"]');
    const teamId = parseEntityId(attrOf(link, 'href'), 'TEAM');
    if (teamId === null) continue;
    if (!teams.has(teamId)) {
      teams.set(teamId, {
        kind: 'team',
        id: teamId,
        name: textAt(box, '.team-name') ?? textAt(box, '.text') ?? textOf(link) ?? undefined,
      });
    }
    if (!assoc.has(teamId)) assoc.set(teamId, { kind: 'event_team', eventId, teamId });
  }

  const records: SyncRecord[] = [
    { kind: 'event', id: eventId },
    ...teams.values(),
    ...assoc.values(),
  ];
  const links = [...teams.values()].map((t) => ({
    kind: 'TEAM' as const,
    id: t.id,
    name: t.name ?? null,
  }));
  return result(ctx, eventId, records, links);
};

export const extractEventStats: PageExtractor = (doc, ctx) => {
  const eventId = requireIdentity(doc, ctx, 'EVENT');
  const players = new Map<number, PlayerRecord>();
  const stats = new Map<number, EventStatRecord>();
  let skipped = 0;

  const boxes = doc.querySelectorAll('.top-x-box');
  for (const box of boxes) {
    const link = box.querySelector('a.name') ?? box.querySelector('a[href*="/players/"]');
    const playerId = parseEntityId(attrOf(link, 'href'), 'PLAYER');
    if (playerId === null) {
      skipped++;
      continue;
    }
    if (stats.has(playerId)) continue;
    const ratingEl = box.querySelector('.rating .bold');
    const mapsEl = box.querySelector('.average .bold');
    players.set(playerId, { kind: 'player', id: playerId, nickname: textOf(link) ?? undefined });
    stats.set(playerId, {
      kind: 'event_stat',
      eventId,
      playerId,
      rating: observedValue(parseNumber(textOf(ratingEl)), ratingEl !== null),
      mapsPlayed: observedValue(parseInteger(textOf(mapsEl)), mapsEl !== null),
    });
  }

  // Table layout: one row per player.
  if (boxes.length === 0) {
    for (const row of doc.querySelectorAll('table.stats-table tbody tr')) {
      const link = row.querySelector('td.playerCol a');
      const playerId = parseEntityId(attrOf(link, 'href'), 'PLAYER');
      if (playerId === null) {
        skipped++;
        continue;
      }
      if (stats.has(playerId)) continue;
      const ratingEl = row.querySelector('td.ratingCol');
      const mapsEl = row.querySelector('td.mapsCol');
      const kdEl = row.querySelector('td.kdCol');
      players.set(playerId, { kind: 'player', id: playerId, nickname: textOf(link) ?? undefined });
      stats.set(playerId, {
        kind: 'event_stat',
        eventId,
        playerId,
        rating: observedValue(parseNumber(textOf(ratingEl)), ratingEl !== null),
        mapsPlayed: observedValue(parseInteger(textOf(mapsEl)), mapsEl !== null),
        kdRatio: observedValue(parseNumber(textOf(kdEl)), kdEl !== null),
      });
    }
  }

  if (stats.size === 0 && !doc.querySelector('.top-x-box, table.stats-table')) {
    fail(ctx, 'no player statistics section');
  }

  const records: SyncRecord[] = [
    { kind: 'event', id: eventId },
    ...players.values(),
    ...stats.values(),
  ];
  const links = [...players.values()].map((p) => ({
    kind: 'PLAYER' as const,
    id: p.id,
    name: p.nickname ?? null,
  }));
  return result(ctx, eventId, records, links, { skippedRows: skipped });
};

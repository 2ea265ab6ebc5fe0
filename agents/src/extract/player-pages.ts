/**
 * Player page extractors: stats listing and the player's stats profile.
 */

import { parseEntityId } from '@hltvsync/core';
import type { PlayerRecord, PlayerStats } from '@hltvsync/schemas';
import {
  collectRefs,
  fail,
  observedValue,
  requireIdentity,
  result,
  type PageExtractor,
} from './context.js';
import { attrOf, parseInteger, parseNumber, textAt, textOf, type HTMLElement } from './html.js';

export const extractPlayerListing: PageExtractor = (doc, ctx) => {
  const table = doc.querySelector('table.stats-table');
  if (!table) fail(ctx, 'players table not found');
  return result(ctx, null, [], collectRefs(table, 'td.playerCol a', 'PLAYER'));
};

type StatKey = keyof PlayerStats;

const INTEGER_STATS: ReadonlySet<StatKey> = new Set([
  'totalKills',
  'totalDeaths',
  'mapsPlayed',
  'roundsPlayed',
]);

/** Label (lower-cased, whitespace collapsed) → stat field. */
const STAT_LABELS: Record<string, StatKey> = {
  'total kills': 'totalKills',
  'total deaths': 'totalDeaths',
  'headshot %': 'headshotPct',
  'k/d ratio': 'kdRatio',
  'damage / round': 'adr',
  'maps played': 'mapsPlayed',
  'rounds played': 'roundsPlayed',
  'kills / round': 'kpr',
  'assists / round': 'apr',
  'rating 1.0': 'rating',
  'rating 2.0': 'rating',
  'rating 2.1': 'rating',
  'rating 3.0': 'rating',
  kast: 'kast',
  impact: 'impact',
  adr: 'adr',
  kpr: 'kpr',
};

function labelKey(text: string | null): StatKey | undefined {
  if (!text) return undefined;
  return STAT_LABELS[text.toLowerCase().replace(/\s+/g, ' ').trim()];
}

function readStats(doc: HTMLElement): PlayerStats | undefined {
  const stats: PlayerStats = {};
  let any = false;
  const put = (key: StatKey | undefined, raw: string | null) => {
    if (!key || stats[key] !== undefined) return;
    const n = INTEGER_STATS.has(key) ? parseInteger(raw) : parseNumber(raw);
    stats[key] = n;
    any = true;
  };

  // Detailed rows first: "<span>Total kills</span><span>45,012</span>"
  for (const row of doc.querySelectorAll('.stats-row')) {
    const spans = row.querySelectorAll('span');
    if (spans.length >= 2) put(labelKey(textOf(spans[0])), textOf(spans[spans.length - 1]));
  }

  // Summary boxes fill what the rows did not have.
  for (const box of doc.querySelectorAll('.summaryStatBreakdown')) {
    const label =
      textAt(box, '.summaryStatBreakdownSubHeader b') ??
      textAt(box, '.summaryStatBreakdownSubHeader');
    put(labelKey(label), textAt(box, '.summaryStatBreakdownDataValue'));
  }

  return any ? stats : undefined;
}

function nicknameFromTitle(doc: HTMLElement): string | null {
  const title = textAt(doc, 'title');
  const m = title ? /'([^']+)'/.exec(title) : null;
  return m ? m[1] : null;
}

export const extractPlayerProfile: PageExtractor = (doc, ctx) => {
  const id = requireIdentity(doc, ctx, 'PLAYER');
  const summary = doc.querySelector('.playerSummaryStatBox');
  if (!summary && doc.querySelectorAll('.stats-row').length === 0) {
    fail(ctx, 'player summary not found');
  }

  const nickname = textAt(doc, '.summaryNickname') ?? nicknameFromTitle(doc);
  const realNameEl = doc.querySelector('.summaryRealname');
  const ageEl = doc.querySelector('.summaryPlayerAge');
  const teamEl = doc.querySelector('.SummaryTeamname');
  const teamLink = teamEl?.querySelector('a[href*="/team"]') ?? null;

  const player: PlayerRecord = {
    kind: 'player',
    id,
    nickname: nickname ?? undefined,
    realName: observedValue(
      realNameEl ? (textAt(realNameEl, '.text-ellipsis') ?? textOf(realNameEl)) : null,
      realNameEl !== null,
    ),
    country: observedValue(
      attrOf(realNameEl?.querySelector('img.flag'), 'title') ??
        attrOf(doc.querySelector('.player-summary-stat-box-left-flag .flag'), 'title'),
      realNameEl !== null,
    ),
    age: observedValue(parseInteger(textOf(ageEl)), ageEl !== null),
    // "No team" renders the block without a link: observed, but empty.
    currentTeamId: observedValue(parseEntityId(attrOf(teamLink, 'href'), 'TEAM'), teamEl !== null),
    stats: readStats(doc),
  };

  return result(ctx, id, [player]);
};

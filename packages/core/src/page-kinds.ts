/**
 * Page fetch boundary: where each page kind lives and when it counts as loaded.
 *
 * `{id}` in a template is replaced by the entity's external id and `{offset}`
 * by a listing offset. Slugs are placeholders; the site redirects to the
 * canonical slug.
 */

import type { PageKind } from '@hltvsync/schemas';

export interface PageKindConfig {
  urlTemplate: string;
  /** CSS selector that is present once the page's main content has rendered. */
  readySelector: string;
}

export type PageKindTable = Record<PageKind, PageKindConfig>;

export const DEFAULT_PAGE_KINDS: PageKindTable = {
  event_listing: { urlTemplate: '/events', readySelector: '.events-holder' },
  event_archive: {
    urlTemplate: '/events/archive?offset={offset}',
    readySelector: '.events-holder',
  },
  event_overview: { urlTemplate: '/events/{id}/event', readySelector: 'table.info' },
  /** Same page as the overview; a run reuses the overview's capture when it has one. */
  event_results: {
    urlTemplate: '/events/{id}/event',
    readySelector: '.placements, .teams-attending',
  },
  event_stats: { urlTemplate: '/stats?event={id}', readySelector: '.top-x-box, .stats-table' },
  team_ranking: { urlTemplate: '/ranking/teams', readySelector: '.ranked-team' },
  team_roster: { urlTemplate: '/team/{id}/team', readySelector: '.teamProfile' },
  player_listing: { urlTemplate: '/stats/players', readySelector: '.stats-table' },
  player_profile: {
    urlTemplate: '/stats/players/{id}/player',
    readySelector: '.playerSummaryStatBox, .stats-row',
  },
};

export function buildPageUrl(
  baseUrl: string,
  pageKind: PageKind,
  id: number | null,
  table: PageKindTable = DEFAULT_PAGE_KINDS,
  offset = 0,
): string {
  let path = table[pageKind].urlTemplate;
  if (path.includes('{id}')) {
    if (id === null) throw new Error(`Page kind ${pageKind} needs an external id`);
    path = path.replace('{id}', String(id));
  }
  return `${baseUrl}${path.replace('{offset}', String(offset))}`;
}

/**
 * Page-to-record extraction. Pure: content in, typed records (or a failure) out.
 */

import type { ExtractionResult, PageKind } from '@hltvsync/schemas';
import { ExtractionError } from '../shared/errors.js';
import type { ExtractContext, PageExtractor } from './context.js';
import {
  extractEventArchive,
  extractEventListing,
  extractEventOverview,
  extractEventResults,
  extractEventStats,
} from './event-pages.js';
import { extractPlayerListing, extractPlayerProfile } from './player-pages.js';
import { extractTeamRanking, extractTeamRoster } from './team-pages.js';
import { loadDocument } from './html.js';

export const PAGE_EXTRACTORS: Record<PageKind, PageExtractor> = {
  event_listing: extractEventListing,
  event_archive: extractEventArchive,
  event_overview: extractEventOverview,
  event_results: extractEventResults,
  event_stats: extractEventStats,
  team_ranking: extractTeamRanking,
  team_roster: extractTeamRoster,
  player_listing: extractPlayerListing,
  player_profile: extractPlayerProfile,
};

export interface ExtractInput {
  html: string;
  url: string;
  finalUrl?: string;
  capturedAt: string;
  expectedId: number | null;
}

export type ExtractOutcome =
  | { type: 'extracted'; result: ExtractionResult }
  | { type: 'failed'; pageKind: PageKind; url: string; reason: string };

/** Throws `ExtractionError` when the page cannot be identified or has no recognizable content. */
export function extractPage(pageKind: PageKind, input: ExtractInput): ExtractionResult {
  const ctx: ExtractContext = {
    pageKind,
    url: input.url,
    finalUrl: input.finalUrl ?? input.url,
    capturedAt: input.capturedAt,
    expectedId: input.expectedId,
  };
  return PAGE_EXTRACTORS[pageKind](loadDocument(input.html), ctx);
}

export function extract(pageKind: PageKind, input: ExtractInput): ExtractOutcome {
  try {
    return { type: 'extracted', result: extractPage(pageKind, input) };
  } catch (err) {
    if (err instanceof ExtractionError) {
      return { type: 'failed', pageKind, url: input.url, reason: err.message };
    }
    throw err;
  }
}

import { describe, it, expect } from 'vitest';
import { eventTypeFromText, extract, extractPage } from '@hltvsync/agents';
import {
  BASE_URL,
  eventArchivePage,
  eventListingPage,
  eventPage,
  eventStatsPage,
} from '../helpers/pages';

const CAPTURED_AT = '2024-07-01T12:00:00.000Z';
const EVENT_URL = `${BASE_URL}/events/8040/event`;
const STATS_URL = `${BASE_URL}/stats?event=8040`;

const page = (html: string, url: string, expectedId: number | null) => ({
  html,
  url,
  capturedAt: CAPTURED_AT,
  expectedId,
});

const SAMPLE_EVENT = eventPage(8040, {
  placements: [
    { teamId: 9001, team: 'Alpha Wolves', pos: '1st', prize: '$100,000' },
    { teamId: 9002, team: 'Bravo Five', pos: '2nd', prize: '$50,000' },
    { teamId: 9003, team: 'Charlie Squad', pos: '3-4th' },
  ],
  attending: [
    { teamId: 9001, team: 'Alpha Wolves' },
    { teamId: 9004, team: 'Delta Unit' },
  ],
});

describe('event listing', () => {
  it('lists events in page order', () => {
    const html = eventListingPage([
      { id: 8041, name: 'Spring Open' },
      { id: 8040, name: 'Sample Cup 2024' },
      { id: 8041, name: 'Spring Open' },
    ]);
    const result = extractPage('event_listing', page(html, `${BASE_URL}/events`, null));
    expect(result.primaryId).toBeNull();
    expect(result.records).toEqual([]);
    expect(result.links).toEqual([
      { kind: 'EVENT', id: 8041, name: 'Spring Open' },
      { kind: 'EVENT', id: 8040, name: 'Sample Cup 2024' },
    ]);
  });

  it('fails when the listing container is missing', () => {
    const url = `${BASE_URL}/events`;
    expect(extract('event_listing', page('<html><body></body></html>', url, null))).toEqual({
      type: 'failed',
      pageKind: 'event_listing',
      url,
      reason: `event_listing ${url}: events listing container not found`,
    });
  });
});

describe('event archive', () => {
  const ARCHIVE_URL = `${BASE_URL}/events/archive?offset=50`;

  it('lists archived events by card', () => {
    const html = eventArchivePage([
      { id: 7100, name: 'Winter Masters 2023' },
      { id: 7099, name: 'Autumn Series' },
    ]);
    const result = extractPage('event_archive', page(html, ARCHIVE_URL, null));
    expect(result.pageKind).toBe('event_archive');
    expect(result.records).toEqual([]);
    expect(result.links).toEqual([
      { kind: 'EVENT', id: 7100, name: 'Winter Masters 2023' },
      { kind: 'EVENT', id: 7099, name: 'Autumn Series' },
    ]);
  });

  it('returns no links past the end of the archive', () => {
    const result = extractPage('event_archive', page(eventArchivePage([]), ARCHIVE_URL, null));
    expect(result.links).toEqual([]);
  });

  it('fails when the archive container is missing', () => {
    expect(extract('event_archive', page('<html><body></body></html>', ARCHIVE_URL, null))).toEqual({
      type: 'failed',
      pageKind: 'event_archive',
      url: ARCHIVE_URL,
      reason: `event_archive ${ARCHIVE_URL}: events archive container not found`,
    });
  });
});

describe('event overview', () => {
  it('reads the event fields and derives its status from the capture time', () => {
    const result = extractPage('event_overview', page(SAMPLE_EVENT, EVENT_URL, 8040));
    expect(result.primaryId).toBe(8040);
    expect(result.records).toEqual([
      {
        kind: 'event',
        id: 8040,
        name: 'Sample Cup 2024',
        startDate: '2024-06-01',
        endDate: '2024-06-09',
        location: 'Cologne, Germany',
        prizePool: '$250,000',
        eventType: 'LAN',
        status: 'FINISHED',
        teamsCount: 8,
      },
    ]);
  });

  it('decodes the embedded bracket payload into extras', () => {
    const result = extractPage('event_overview', page(SAMPLE_EVENT, EVENT_URL, 8040));
    expect(result.extras).toEqual({ brackets: [{ rounds: 2 }] });
  });

  it('reads the event type from the location cell when no type label is shown', () => {
    const withType = (location: string) =>
      eventPage(8040)
        .replace('<div class="eventType">Intl. LAN</div>', '')
        .replace('<span class="text-ellipsis">Cologne, Germany</span>', location);
    const typeOf = (html: string) => {
      const [event] = extractPage('event_overview', page(html, EVENT_URL, 8040)).records;
      return event.kind === 'event' ? event.eventType : 'not an event';
    };

    expect(typeOf(withType('<span class="text-ellipsis">Warsaw, Poland</span>'))).toBeUndefined();
    expect(typeOf(withType('<span class="text-ellipsis">Stockholm, Sweden</span> Reg. LAN'))).toBe(
      'REGIONAL',
    );
  });

  it('leaves fields it did not see undefined', () => {
    const html = `<html><head><link rel="canonical" href="${BASE_URL}/events/8040/x"></head>
      <body><h1 class="event-hub-title">Quiet Event</h1></body></html>`;
    const [event] = extractPage('event_overview', page(html, EVENT_URL, 8040)).records;
    expect(event).toEqual({ kind: 'event', id: 8040, name: 'Quiet Event' });
  });

  it('uses the single date as both start and end', () => {
    const html = `<html><head><link rel="canonical" href="${BASE_URL}/events/8040/x"></head><body>
      <table class="info"><tr><td class="eventdate"><span data-unix="1735689600000">Jan 1st</span></td></tr></table>
      </body></html>`;
    const [event] = extractPage('event_overview', page(html, EVENT_URL, 8040)).records;
    expect(event).toMatchObject({ startDate: '2025-01-01', endDate: '2025-01-01', status: 'UPCOMING' });
  });

  it('rejects a page that belongs to another event', () => {
    const html = eventPage(8041);
    expect(() => extractPage('event_overview', page(html, EVENT_URL, 8040))).toThrow(
      `event_overview ${EVENT_URL}: page identifies as event 8041, expected 8040`,
    );
  });

  it('rejects a page that does not say which event it is', () => {
    const html = '<html><body><h1 class="event-hub-title">Anything</h1></body></html>';
    expect(() => extractPage('event_overview', page(html, EVENT_URL, 8040))).toThrow(
      `event_overview ${EVENT_URL}: no event identity on page`,
    );
  });
});

describe('event results', () => {
  it('yields teams and placements, then attending teams without a placement', () => {
    const result = extractPage('event_results', page(SAMPLE_EVENT, EVENT_URL, 8040));
    expect(result.records).toEqual([
      { kind: 'event', id: 8040 },
      { kind: 'team', id: 9001, name: 'Alpha Wolves' },
      { kind: 'team', id: 9002, name: 'Bravo Five' },
      { kind: 'team', id: 9003, name: 'Charlie Squad' },
      { kind: 'team', id: 9004, name: 'Delta Unit' },
      {
        kind: 'event_team',
        eventId: 8040,
        teamId: 9001,
        placement: 1,
        placementLabel: '1st',
        prize: '$100,000',
      },
      {
        kind: 'event_team',
        eventId: 8040,
        teamId: 9002,
        placement: 2,
        placementLabel: '2nd',
        prize: '$50,000',
      },
      { kind: 'event_team', eventId: 8040, teamId: 9003, placement: 3, placementLabel: '3-4th' },
      { kind: 'event_team', eventId: 8040, teamId: 9004 },
    ]);
    expect(result.links.map((l) => l.id)).toEqual([9001, 9002, 9003, 9004]);
  });

  it('fails when the page has neither placements nor attending teams', () => {
    expect(() => extractPage('event_results', page(eventPage(8040), EVENT_URL, 8040))).toThrow(
      'no placements or attending teams section',
    );
  });
});

describe('event stats', () => {
  it('reads the top player boxes', () => {
    const html = eventStatsPage(8040, [
      { id: 7001, nick: 'alphaone', rating: '1.25', maps: '12' },
      { id: 7002, nick: 'bravotwo', rating: '1.10', maps: '11' },
    ]);
    const result = extractPage('event_stats', page(html, STATS_URL, 8040));
    expect(result.records).toEqual([
      { kind: 'event', id: 8040 },
      { kind: 'player', id: 7001, nickname: 'alphaone' },
      { kind: 'player', id: 7002, nickname: 'bravotwo' },
      { kind: 'event_stat', eventId: 8040, playerId: 7001, rating: 1.25, mapsPlayed: 12 },
      { kind: 'event_stat', eventId: 8040, playerId: 7002, rating: 1.1, mapsPlayed: 11 },
    ]);
    expect(result.extras).toEqual({ skippedRows: 0 });
  });

  it('falls back to the stats table and counts rows it cannot attribute', () => {
    const html = `<html><head><link rel="canonical" href="${STATS_URL}"></head><body>
      <table class="stats-table"><tbody>
        <tr><td class="playerCol"><a href="/stats/players/7001/alphaone">alphaone</a></td>
            <td class="mapsCol">12</td><td class="kdCol">1.31</td><td class="ratingCol">1.25</td></tr>
        <tr><td class="playerCol">unknown</td><td class="mapsCol">3</td></tr>
      </tbody></table></body></html>`;
    const result = extractPage('event_stats', page(html, STATS_URL, 8040));
    expect(result.records.filter((r) => r.kind === 'event_stat')).toEqual([
      { kind: 'event_stat', eventId: 8040, playerId: 7001, rating: 1.25, mapsPlayed: 12, kdRatio: 1.31 },
    ]);
    expect(result.extras).toEqual({ skippedRows: 1 });
  });

  it('fails when there is no statistics section', () => {
    const html = `<html><head><link rel="canonical" href="${STATS_URL}"></head><body></body></html>`;
    expect(() => extractPage('event_stats', page(html, STATS_URL, 8040))).toThrow(
      `event_stats ${STATS_URL}: no player statistics section`,
    );
  });
});

describe('eventTypeFromText', () => {
  it.each([
    ['Online', 'ONLINE'],
    ['Intl. LAN', 'LAN'],
    ['Reg. LAN', 'REGIONAL'],
    ['Local LAN', 'LOCAL'],
    ['LAN', 'LAN'],
    ['Intl. LAN Sweden', 'LAN'],
    ['Online Europe', 'ONLINE'],
    ['Poland', null],
    ['Lanxess Arena, Cologne', null],
    ['Showmatch', null],
  ])('%s → %s', (text, expected) => {
    expect(eventTypeFromText(text)).toBe(expected);
  });
});

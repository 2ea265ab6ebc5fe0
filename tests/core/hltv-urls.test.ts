import { describe, it, expect } from 'vitest';
import { buildPageUrl, parseEntityId, parseEntityRef } from '@hltvsync/core';

describe('parseEntityRef', () => {
  it.each([
    ['/team/9001/alpha-wolves', { kind: 'TEAM', id: 9001 }],
    ['/stats/teams/9001/alpha-wolves', { kind: 'TEAM', id: 9001 }],
    ['/player/7001/alphaone', { kind: 'PLAYER', id: 7001 }],
    ['/stats/players/7001/alphaone', { kind: 'PLAYER', id: 7001 }],
    ['/events/8040/sample-cup-2024', { kind: 'EVENT', id: 8040 }],
    ['https://www.hltv.org/stats?event=8040', { kind: 'EVENT', id: 8040 }],
    ['https://www.hltv.org/team/9001/alpha-wolves#tab-rosterBox', { kind: 'TEAM', id: 9001 }],
  ])('reads %s', (href, expected) => {
    expect(parseEntityRef(href)).toEqual(expected);
  });

  it('returns null for links that name no entity', () => {
    expect(parseEntityRef('/news/12345/some-story')).toBeNull();
    expect(parseEntityRef('/events')).toBeNull();
    expect(parseEntityRef(null)).toBeNull();
  });
});

describe('parseEntityId', () => {
  it('only matches the requested kind', () => {
    expect(parseEntityId('/stats/players/7001/alphaone?event=8040', 'PLAYER')).toBe(7001);
    expect(parseEntityId('/stats/players/7001/alphaone?event=8040', 'EVENT')).toBe(8040);
    expect(parseEntityId('/team/9001/alpha-wolves', 'PLAYER')).toBeNull();
  });
});

describe('buildPageUrl', () => {
  it('fills the id into the page kind template', () => {
    expect(buildPageUrl('https://www.hltv.org', 'event_stats', 8040)).toBe(
      'https://www.hltv.org/stats?event=8040',
    );
    expect(buildPageUrl('https://www.hltv.org', 'team_ranking', null)).toBe(
      'https://www.hltv.org/ranking/teams',
    );
  });

  it('fills the offset into the archive template', () => {
    expect(buildPageUrl('https://www.hltv.org', 'event_archive', null, undefined, 100)).toBe(
      'https://www.hltv.org/events/archive?offset=100',
    );
    expect(buildPageUrl('https://www.hltv.org', 'event_archive', null)).toBe(
      'https://www.hltv.org/events/archive?offset=0',
    );
  });

  it('refuses an entity page without an id', () => {
    expect(() => buildPageUrl('https://www.hltv.org', 'team_roster', null)).toThrow(
      'Page kind team_roster needs an external id',
    );
  });
});

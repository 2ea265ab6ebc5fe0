import { beforeEach, describe, it, expect } from 'vitest';
import { clearAgentLogs, getAgentLogs } from '@hltvsync/core';
import { ConstraintViolationError, MemorySyncStore } from '@hltvsync/db';
import type { ScopeDirective } from '@hltvsync/schemas';
import { planSnapshotSchema } from '@/lib/sync-planner';
import { runSync } from '@/lib/sync-run';
import { FakeBrowserDriver } from '../helpers/fake-browser';
import { createTestEngine } from '../helpers/engine';
import {
  BASE_URL,
  CHALLENGE_PAGE,
  eventArchivePage,
  eventListingPage,
  eventPage,
  eventStatsPage,
  playerPage,
  rankingPage,
  rosterPage,
} from '../helpers/pages';

const EVENT_URL = `${BASE_URL}/events/8040/event`;
const STATS_URL = `${BASE_URL}/stats?event=8040`;
const RANKING_URL = `${BASE_URL}/ranking/teams`;
const rosterUrl = (id: number) => `${BASE_URL}/team/${id}/team`;
const playerUrl = (id: number) => `${BASE_URL}/stats/players/${id}/player`;

const eventScope = (fullStats: boolean): ScopeDirective => ({
  kind: 'EVENT',
  selector: { type: 'id', id: 8040 },
  fullStats,
});

const finishedEvent = () =>
  eventPage(8040, {
    placements: [
      { teamId: 9001, team: 'Alpha Wolves', pos: '1st', prize: '$100,000' },
      { teamId: 9002, team: 'Bravo Five', pos: '2nd' },
    ],
  });

const statsPage = () =>
  eventStatsPage(8040, [
    { id: 7001, nick: 'alphaone', rating: '1.15', maps: '12' },
    { id: 7002, nick: 'bravotwo', rating: '0.98', maps: '12' },
  ]);

/** Records the planned unit keys of every committed checkpoint; the first commit is slow. */
class SlowFirstCheckpointStore extends MemorySyncStore {
  readonly committedPlans: string[][] = [];

  override async completeUnit(runId: string, unitKey: string, planSnapshot: unknown): Promise<void> {
    if (this.committedPlans.length === 0) {
      for (let i = 0; i < 20; i++) await new Promise<void>((resolve) => setImmediate(resolve));
    }
    await super.completeUnit(runId, unitKey, planSnapshot);
    this.committedPlans.push(planSnapshotSchema.parse(planSnapshot).units.map((u) => u.key));
  }
}

/** Store whose transactions fail with the given error. */
class FailingStore extends MemorySyncStore {
  constructor(private readonly error: Error) {
    super();
  }

  override transaction<T>(): Promise<T> {
    return Promise.reject(this.error);
  }
}

describe('runSync', () => {
  beforeEach(() => clearAgentLogs());

  it('syncs a single event by id', async () => {
    const driver = new FakeBrowserDriver().on(EVENT_URL, { html: eventPage(8040) });
    const { engine, store, snapshots } = createTestEngine({ driver });

    const summary = await runSync(engine, { scope: eventScope(false) });

    expect(summary.state).toBe('DONE');
    expect(summary.resumed).toBe(false);
    expect(summary.history).toEqual([
      'PLANNING',
      'FETCHING',
      'RECONCILING',
      'CHECKPOINTED',
      'PLANNING',
      'DONE',
    ]);
    expect(summary.units).toEqual([
      { key: 'event_overview:8040', pageKind: 'event_overview', externalId: 8040, status: 'DONE' },
    ]);

    const { events, eventTeams } = store.snapshot();
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      id: 8040,
      name: 'Sample Cup 2024',
      startDate: '2024-06-01',
      endDate: '2024-06-09',
      status: 'FINISHED',
    });
    expect(eventTeams).toEqual([]);

    expect(snapshots.written.map((s) => [s.unitKey, s.pageKind, s.externalId])).toEqual([
      ['event_overview:8040', 'event_overview', 8040],
    ]);
    expect(await store.listCompletedUnits(summary.runId ?? '')).toEqual(['event_overview:8040']);
    expect(await store.findResumableRun('EVENT:id=8040:basic')).toBeNull();

    const outcome = getAgentLogs().filter((l) => l.agent === 'SyncOrchestrator' && l.level === 'success');
    expect(outcome.map((l) => l.message)).toEqual([
      'Checkpointed event_overview:8040',
      `Run ${summary.runId} DONE: 1 done, 0 failed, 0 pending`,
    ]);
  });

  it('syncs only unseen teams from the ranking', async () => {
    const driver = new FakeBrowserDriver()
      .on(
        RANKING_URL,
        {
          html: rankingPage([
            { id: 9001, name: 'Alpha Wolves' },
            { id: 9005, name: 'Echo Legion' },
            { id: 9006, name: 'Foxtrot Club' },
            { id: 9007, name: 'Golf Union' },
          ]),
        },
      )
      .on(rosterUrl(9005), { html: rosterPage(9005, { name: 'Echo Legion' }) })
      .on(rosterUrl(9006), { html: rosterPage(9006, { name: 'Foxtrot Club' }) });
    const { engine, store } = createTestEngine({ driver });
    await engine.reconciler.upsert({ kind: 'team', id: 9001, name: 'Alpha Wolves', worldRank: 3 });

    const summary = await runSync(engine, {
      scope: { kind: 'TEAM', selector: { type: 'unseen', count: 2 }, fullStats: false },
    });

    expect(summary.state).toBe('DONE');
    expect(summary.units.map((u) => u.key)).toEqual([
      'team_ranking:list',
      'team_roster:9005',
      'team_roster:9006',
    ]);
    expect(driver.visits).toEqual([RANKING_URL, rosterUrl(9005), rosterUrl(9006)]);
    const { teams } = store.snapshot();
    expect(teams.map((t) => [t.id, t.name, t.worldRank])).toEqual([
      [9001, 'Alpha Wolves', 3],
      [9005, 'Echo Legion', null],
      [9006, 'Foxtrot Club', null],
    ]);
  });

  it('pages into the event archive for unseen events the listing lacks', async () => {
    const archiveUrl = `${BASE_URL}/events/archive?offset=0`;
    const driver = new FakeBrowserDriver()
      .on(`${BASE_URL}/events`, {
        html: eventListingPage([
          { id: 8041, name: 'Spring Open' },
          { id: 8040, name: 'Sample Cup 2024' },
        ]),
      })
      .on(archiveUrl, {
        html: eventArchivePage([
          { id: 8040, name: 'Sample Cup 2024' },
          { id: 8039, name: 'Winter Masters' },
        ]),
      })
      .on(`${BASE_URL}/events/8041/event`, { html: eventPage(8041, { name: 'Spring Open' }) })
      .on(`${BASE_URL}/events/8039/event`, { html: eventPage(8039, { name: 'Winter Masters' }) });
    const { engine, store } = createTestEngine({ driver });
    await engine.reconciler.upsert({ kind: 'event', id: 8040, name: 'Sample Cup 2024' });

    const summary = await runSync(engine, {
      scope: { kind: 'EVENT', selector: { type: 'unseen', count: 2 }, fullStats: false },
    });

    expect(summary.state).toBe('DONE');
    expect(summary.units.map((u) => [u.key, u.status])).toEqual([
      ['event_listing:list', 'DONE'],
      ['event_overview:8041', 'DONE'],
      ['event_archive:offset=0', 'DONE'],
      ['event_overview:8039', 'DONE'],
    ]);
    expect(driver.visits).not.toContain(`${BASE_URL}/events/archive?offset=2`);
    const names = store.snapshot().events.map((e) => [e.id, e.name]);
    expect(names.sort((a, b) => Number(a[0]) - Number(b[0]))).toEqual([
      [8039, 'Winter Masters'],
      [8040, 'Sample Cup 2024'],
      [8041, 'Spring Open'],
    ]);
  });

  it('never stores a plan that drops units a previous checkpoint stored', async () => {
    const driver = new FakeBrowserDriver()
      .on(RANKING_URL, {
        html: rankingPage([
          { id: 9005, name: 'Echo Legion' },
          { id: 9006, name: 'Foxtrot Club' },
        ]),
      })
      .on(rosterUrl(9005), {
        html: rosterPage(9005, { name: 'Echo Legion', players: [{ id: 7005, nick: 'echoone' }] }),
      })
      .on(rosterUrl(9006), {
        html: rosterPage(9006, { name: 'Foxtrot Club', players: [{ id: 7006, nick: 'foxone' }] }),
      })
      .on(playerUrl(7005), { html: playerPage(7005, { nick: 'echoone' }) })
      .on(playerUrl(7006), { html: playerPage(7006, { nick: 'foxone' }) });
    const store = new SlowFirstCheckpointStore();
    const { engine } = createTestEngine({ driver, store, concurrency: { TEAM: 2, PLAYER: 2 } });

    const summary = await runSync(engine, {
      scope: { kind: 'TEAM', selector: { type: 'unseen', count: 2 }, fullStats: true },
    });

    expect(summary.state).toBe('DONE');
    expect(store.committedPlans).toHaveLength(5);
    store.committedPlans.forEach((keys, i) => {
      if (i > 0) expect(keys).toEqual(expect.arrayContaining(store.committedPlans[i - 1]));
    });
    expect([...store.committedPlans[4]].sort()).toEqual([
      'player_profile:7005',
      'player_profile:7006',
      'team_ranking:list',
      'team_roster:9005',
      'team_roster:9006',
    ]);
  });

  it('retries a challenged stats page with backoff', async () => {
    const driver = new FakeBrowserDriver()
      .on(EVENT_URL, { html: finishedEvent() })
      .on(STATS_URL, { html: CHALLENGE_PAGE }, { html: CHALLENGE_PAGE }, { html: statsPage() });
    const { engine, store, clock } = createTestEngine({ driver });

    const summary = await runSync(engine, { scope: eventScope(true), limits: { maxTeams: 0 } });

    expect(summary.state).toBe('DONE');
    expect(summary.failures).toEqual([]);
    expect(summary.units.map((u) => [u.key, u.status])).toEqual([
      ['event_overview:8040', 'DONE'],
      ['event_results:8040', 'DONE'],
      ['event_stats:8040', 'DONE'],
    ]);
    expect(clock.sleeps).toEqual([1000, 2000]);

    const { eventTeams, eventStats } = store.snapshot();
    expect(eventTeams.map((r) => [r.teamId, r.placement, r.prize])).toEqual([
      [9001, 1, '$100,000'],
      [9002, 2, null],
    ]);
    expect(eventStats.map((r) => [r.playerId, r.rating, r.mapsPlayed])).toEqual([
      [7001, 1.15, 12],
      [7002, 0.98, 12],
    ]);
  });

  it('reads the results from the overview capture without loading the event page again', async () => {
    const driver = new FakeBrowserDriver()
      .on(EVENT_URL, { html: finishedEvent() })
      .on(STATS_URL, { html: statsPage() });
    const { engine, store, snapshots } = createTestEngine({ driver });

    const summary = await runSync(engine, { scope: eventScope(true), limits: { maxTeams: 0 } });

    expect(summary.state).toBe('DONE');
    expect(driver.visits).toEqual([EVENT_URL, STATS_URL]);
    expect(store.snapshot().eventTeams.map((r) => [r.teamId, r.placement])).toEqual([
      [9001, 1],
      [9002, 2],
    ]);
    const [overview, results] = snapshots.written;
    expect(results.pageKind).toBe('event_results');
    expect(results.capturedAt).toBe(overview.capturedAt);
  });

  it('records a blocked unit and finishes the rest of the run', async () => {
    const driver = new FakeBrowserDriver()
      .on(EVENT_URL, { html: finishedEvent() })
      .on(STATS_URL, { html: CHALLENGE_PAGE });
    const { engine, store } = createTestEngine({ driver });

    const summary = await runSync(engine, { scope: eventScope(true), limits: { maxTeams: 0 } });

    expect(summary.state).toBe('DONE');
    expect(summary.failures).toEqual([
      {
        unitKey: 'event_stats:8040',
        pageKind: 'event_stats',
        url: STATS_URL,
        reason: 'BLOCKED',
        attempts: 3,
        signals: ['challenge_title', 'browser_check_notice'],
        message: 'Blocked by anti-bot challenge after 3 attempts',
      },
    ]);
    expect(summary.units.find((u) => u.key === 'event_stats:8040')?.status).toBe('FAILED');
    expect(store.snapshot().eventStats).toEqual([]);

    const rows = await store.listUnitFailures(summary.runId ?? '');
    expect(rows.map((r) => [r.unitKey, r.reason, r.attempts])).toEqual([['event_stats:8040', 'BLOCKED', 3]]);

    const warning = getAgentLogs().find((l) => l.message === 'Unit failed (BLOCKED): event_stats:8040');
    expect(warning?.detail).toBe('Blocked by anti-bot challenge after 3 attempts');
  });

  it('resumes a cancelled run from its last checkpoint', async () => {
    const controller = new AbortController();
    const first = new FakeBrowserDriver()
      .on(EVENT_URL, { html: finishedEvent() })
      .on(STATS_URL, { html: statsPage() });
    first.onVisit = (_url, visit) => {
      if (visit === 1) controller.abort();
    };
    const { engine, store } = createTestEngine({ driver: first });

    const cancelled = await runSync(engine, {
      scope: eventScope(true),
      limits: { maxTeams: 0 },
      signal: controller.signal,
    });
    expect(cancelled.state).toBe('FAILED');
    expect(cancelled.errorMessage).toBe('Run cancelled');
    expect(cancelled.units.map((u) => u.status)).toEqual(['DONE', 'PENDING', 'PENDING']);

    const second = new FakeBrowserDriver()
      .on(EVENT_URL, { html: finishedEvent() })
      .on(STATS_URL, { html: statsPage() });
    const resumed = await runSync(createTestEngine({ driver: second, store }).engine, {
      scope: eventScope(true),
      limits: { maxTeams: 0 },
    });
    expect(resumed.resumed).toBe(true);
    expect(resumed.runId).toBe(cancelled.runId);
    expect(resumed.state).toBe('DONE');
    expect(second.visits).toEqual([EVENT_URL, STATS_URL]);
    expect(store.snapshot().eventStats).toHaveLength(2);
    expect(store.snapshot().eventTeams).toHaveLength(2);
  });

  it('starts over when asked to refresh', async () => {
    const driver = new FakeBrowserDriver().on(EVENT_URL, { html: eventPage(8040) });
    const store = new MemorySyncStore();
    const run = await store.createRun({
      scopeKey: 'EVENT:id=8040:basic',
      scope: eventScope(false),
      limits: {},
      planSnapshot: {},
    });

    const summary = await runSync(createTestEngine({ driver, store }).engine, {
      scope: eventScope(false),
      refresh: true,
    });
    expect(summary.resumed).toBe(false);
    expect(summary.runId).not.toBe(run.id);
    expect((await store.countRows()).sync_runs).toBe(2);
  });

  it('keeps the plan within the entity limits', async () => {
    const driver = new FakeBrowserDriver()
      .on(EVENT_URL, { html: finishedEvent() })
      .on(STATS_URL, { html: statsPage() })
      .on(rosterUrl(9001), {
        html: rosterPage(9001, {
          name: 'Alpha Wolves',
          players: [
            { id: 7001, nick: 'alphaone' },
            { id: 7003, nick: 'charliethree' },
          ],
        }),
      })
      .on(playerUrl(7001), { html: playerPage(7001, { nick: 'alphaone', age: 27 }) });
    const { engine, store } = createTestEngine({ driver });

    const summary = await runSync(engine, {
      scope: eventScope(true),
      limits: { maxTeams: 1, maxPlayers: 1 },
    });

    expect(summary.state).toBe('DONE');
    expect(summary.units.map((u) => [u.key, u.status])).toEqual([
      ['event_overview:8040', 'DONE'],
      ['event_results:8040', 'DONE'],
      ['event_stats:8040', 'DONE'],
      ['team_roster:9001', 'DONE'],
      ['player_profile:7001', 'DONE'],
    ]);
    expect(driver.visits).not.toContain(rosterUrl(9002));
    const player = store.snapshot().players.find((p) => p.id === 7001);
    expect(player).toMatchObject({ nickname: 'alphaone', age: 27, currentTeamId: 9001 });
  });

  it('fails an unidentifiable page as an extraction failure', async () => {
    const driver = new FakeBrowserDriver().on(rosterUrl(9005), {
      html: rosterPage(9005, { name: 'Echo Legion', canonicalId: 9006 }),
    });
    const { engine, store } = createTestEngine({ driver });

    const summary = await runSync(engine, {
      scope: { kind: 'TEAM', selector: { type: 'id', id: 9005 }, fullStats: false },
    });

    expect(summary.state).toBe('DONE');
    expect(summary.failures).toMatchObject([
      {
        reason: 'EXTRACTION',
        attempts: 1,
        message:
          'team_roster https://www.hltv.org/team/9005/team: page identifies as team 9006, expected 9005',
      },
    ]);
    expect(store.snapshot().teams).toEqual([]);
  });

  it('fails a unit whose write breaks a constraint and keeps going', async () => {
    const driver = new FakeBrowserDriver().on(EVENT_URL, { html: eventPage(8040) });
    const store = new FailingStore(new ConstraintViolationError('events: duplicate id 8040', '23505'));
    const { engine } = createTestEngine({ driver, store });

    const summary = await runSync(engine, { scope: eventScope(false) });

    expect(summary.state).toBe('DONE');
    expect(summary.failures).toMatchObject([
      { unitKey: 'event_overview:8040', reason: 'PERSISTENCE', message: 'applyUnit: events: duplicate id 8040' },
    ]);
  });

  it('stops the run when the store is unreachable and leaves the unit pending', async () => {
    const driver = new FakeBrowserDriver().on(EVENT_URL, { html: eventPage(8040) });
    const down = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), {
      code: 'ECONNREFUSED',
    });
    const store = new FailingStore(down);
    const { engine } = createTestEngine({ driver, store });

    const summary = await runSync(engine, { scope: eventScope(false) });

    expect(summary.state).toBe('FAILED');
    expect(summary.errorMessage).toBe('applyUnit: connect ECONNREFUSED 127.0.0.1:5432');
    expect(summary.failures).toEqual([]);
    expect(summary.units.map((u) => u.status)).toEqual(['PENDING']);
    expect((await store.findResumableRun('EVENT:id=8040:basic'))?.state).toBe('FAILED');
  });
});

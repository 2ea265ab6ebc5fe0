import { describe, it, expect, beforeEach } from 'vitest';
import { Reconciler, orderForApply } from '@hltvsync/agents';
import { MemorySyncStore, PersistenceError, type SyncStoreTx } from '@hltvsync/db';
import type { SyncRecord } from '@hltvsync/schemas';

const T1 = new Date('2024-07-01T12:00:00.000Z');
const T2 = new Date('2024-07-02T12:00:00.000Z');
const T3 = new Date('2024-07-03T12:00:00.000Z');

/** Player lookups miss once for `hiddenPlayerId`, as when another unit commits it meanwhile. */
class LateCommitStore extends MemorySyncStore {
  hiddenPlayerId: number | null = null;

  override transaction<T>(fn: (tx: SyncStoreTx) => Promise<T>): Promise<T> {
    return super.transaction((tx) =>
      fn({
        ...tx,
        players: {
          ...tx.players,
          find: async (id) => {
            if (id !== this.hiddenPlayerId) return tx.players.find(id);
            this.hiddenPlayerId = null;
            return null;
          },
        },
      }),
    );
  }
}

describe('Reconciler', () => {
  let store: MemorySyncStore;
  let now: Date;
  let reconciler: Reconciler;

  beforeEach(() => {
    store = new MemorySyncStore();
    now = T1;
    reconciler = new Reconciler(store, () => now);
  });

  describe('entities', () => {
    it('inserts, then reports unchanged for the same values', async () => {
      const record = { kind: 'event', id: 8040, name: 'Sample Cup 2024', location: 'Cologne' } as const;
      expect(await reconciler.upsert(record)).toBe('INSERTED');
      expect(await reconciler.upsert(record)).toBe('UNCHANGED');
      expect(store.snapshot().events).toHaveLength(1);
    });

    it('never clears a stored value with null or an unobserved field', async () => {
      await reconciler.upsert({ kind: 'event', id: 8040, name: 'Sample Cup 2024', location: 'Cologne' });
      expect(await reconciler.upsert({ kind: 'event', id: 8040, name: null })).toBe('UNCHANGED');
      expect(await reconciler.upsert({ kind: 'event', id: 8040, name: 'Sample Cup' })).toBe('UPDATED');
      const [event] = store.snapshot().events;
      expect(event.name).toBe('Sample Cup');
      expect(event.location).toBe('Cologne');
    });

    it('keeps a world rank when a later page does not show one', async () => {
      await reconciler.upsert({ kind: 'team', id: 9001, name: 'Alpha Wolves', worldRank: 5 });
      await reconciler.upsert({ kind: 'team', id: 9001, name: 'Alpha Wolves' });
      expect(store.snapshot().teams[0].worldRank).toBe(5);
    });

    it('stamps statsUpdatedAt only when a stat changes', async () => {
      await reconciler.upsert({ kind: 'player', id: 7001, stats: { rating: 1.1, kast: 70 } });
      expect(store.snapshot().players[0].statsUpdatedAt).toEqual(T1);

      now = T2;
      expect(await reconciler.upsert({ kind: 'player', id: 7001, stats: { rating: 1.1 } })).toBe(
        'UNCHANGED',
      );
      expect(store.snapshot().players[0].statsUpdatedAt).toEqual(T1);

      now = T3;
      expect(await reconciler.upsert({ kind: 'player', id: 7001, stats: { rating: 1.2 } })).toBe(
        'UPDATED',
      );
      const [player] = store.snapshot().players;
      expect(player.rating).toBe(1.2);
      expect(player.kast).toBe(70);
      expect(player.statsUpdatedAt).toEqual(T3);
    });
  });

  describe('associations', () => {
    beforeEach(async () => {
      await reconciler.upsert({ kind: 'event', id: 8040 });
      await reconciler.upsert({ kind: 'team', id: 9001 });
      await reconciler.upsert({ kind: 'player', id: 7001 });
    });

    it('rejects an association whose parent is missing', async () => {
      const attempt = reconciler.upsertAssociation('event_team', 8041, 9001, { placement: 1 });
      await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
      await expect(attempt).rejects.toMatchObject({
        code: '23503',
        connectivity: false,
        message: 'event_teams: referenced event 8041 does not exist',
      });
    });

    it('overwrites an event placement with the latest observation', async () => {
      expect(
        await reconciler.upsertAssociation('event_team', 8040, 9001, {
          placement: 2,
          placementLabel: '2nd',
        }),
      ).toBe('INSERTED');
      expect(await reconciler.upsertAssociation('event_team', 8040, 9001, { placement: 1 })).toBe(
        'UPDATED',
      );
      const rows = store.snapshot().eventTeams;
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({ placement: 1, placementLabel: '2nd' });
    });

    it('adds a roster row per observation time', async () => {
      await reconciler.upsertAssociation('roster_entry', 9001, 7001, { role: 'Starter', observedAt: T1 });
      await reconciler.upsertAssociation('roster_entry', 9001, 7001, { role: 'Benched', observedAt: T2 });
      await reconciler.upsertAssociation('roster_entry', 9001, 7001, { role: 'Coach', observedAt: T2 });
      const rows = store.snapshot().teamPlayers.map((r) => [r.observedAt.toISOString(), r.role]);
      expect(rows).toEqual([
        [T1.toISOString(), 'Starter'],
        [T2.toISOString(), 'Coach'],
      ]);
    });
  });

  describe('applyUnit', () => {
    it('writes parents before children and counts outcomes', async () => {
      const records: SyncRecord[] = [
        { kind: 'roster_entry', teamId: 9001, playerId: 7001, role: 'Starter', isCurrent: true },
        { kind: 'player', id: 7001, nickname: 'alphaone', currentTeamId: 9001 },
        { kind: 'team', id: 9001, name: 'Alpha Wolves' },
      ];
      expect(orderForApply(records).map((r) => r.kind)).toEqual(['team', 'player', 'roster_entry']);

      const summary = await reconciler.applyUnit(records, { observedAt: T2 });
      expect(summary).toEqual({
        inserted: 3,
        updated: 0,
        unchanged: 0,
        byKind: { team: 1, player: 1, roster_entry: 1 },
      });
      expect(store.snapshot().teamPlayers[0].observedAt).toEqual(T2);
    });

    it('commits nothing when one record fails', async () => {
      const records: SyncRecord[] = [
        { kind: 'event', id: 8040, name: 'Sample Cup 2024' },
        { kind: 'event_team', eventId: 8040, teamId: 9999, placement: 1 },
      ];
      await expect(reconciler.applyUnit(records, { observedAt: T1 })).rejects.toMatchObject({
        message: 'event_teams: referenced team 9999 does not exist',
      });
      expect(store.snapshot().events).toEqual([]);
    });

    it('merges into a row that another unit committed after the lookup missed', async () => {
      const racing = new LateCommitStore();
      const racingReconciler = new Reconciler(racing, () => now);
      await racingReconciler.upsert({ kind: 'player', id: 7001, nickname: 'alphaone', country: 'Denmark' });

      racing.hiddenPlayerId = 7001;
      const summary = await racingReconciler.applyUnit(
        [{ kind: 'player', id: 7001, nickname: 'alphaone', realName: 'Anders Test' }],
        { observedAt: T2 },
      );

      expect(summary).toEqual({ inserted: 0, updated: 1, unchanged: 0, byKind: { player: 1 } });
      expect(racing.hiddenPlayerId).toBeNull();
      expect(racing.snapshot().players).toMatchObject([
        { id: 7001, nickname: 'alphaone', realName: 'Anders Test', country: 'Denmark' },
      ]);
    });
  });
});

import { describe, it, expect } from 'vitest';
import { parseSyncArgs } from '@/lib/cli-args';

describe('parseSyncArgs', () => {
  it('builds an id scope', () => {
    expect(parseSyncArgs(['--kind', 'event', '--id', '8040'])).toEqual({
      scope: { kind: 'EVENT', selector: { type: 'id', id: 8040 }, fullStats: false },
      limits: {},
      refresh: false,
      dryRun: false,
      show: false,
    });
  });

  it('builds an unseen scope with limits and switches', () => {
    const cmd = parseSyncArgs([
      '--kind',
      'team',
      '--unseen',
      '5',
      '--full-stats',
      '--max-players',
      '0',
      '--dry-run',
      '--refresh',
    ]);
    expect(cmd.scope).toEqual({ kind: 'TEAM', selector: { type: 'unseen', count: 5 }, fullStats: true });
    expect(cmd.limits).toEqual({ maxPlayers: 0 });
    expect(cmd.dryRun).toBe(true);
    expect(cmd.refresh).toBe(true);
  });

  it('requires exactly one selector', () => {
    expect(() => parseSyncArgs(['--kind', 'player'])).toThrow('Pass exactly one of --id or --unseen');
    expect(() => parseSyncArgs(['--kind', 'player', '--id', '1', '--unseen', '2'])).toThrow(
      'Pass exactly one of --id or --unseen',
    );
  });

  it('names the bad flag and prints usage', () => {
    expect(() => parseSyncArgs(['--kind', 'map', '--id', '1'])).toThrow(/^--kind: [\s\S]*Usage: npm run sync/);
    expect(() => parseSyncArgs(['--kind', 'team', '--id', 'abc'])).toThrow(/^--id: /);
  });

  it('rejects unknown flags', () => {
    expect(() => parseSyncArgs(['--kind', 'team', '--id', '1', '--verbose'])).toThrow(
      "Unknown option '--verbose'",
    );
  });
});

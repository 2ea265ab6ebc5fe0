/**
 * Command-line flags → scope directive + limits. Only the entry scripts use
 * this; the orchestrator itself takes the parsed directive.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import {
  scopeDirectiveSchema,
  syncLimitsSchema,
  type ScopeDirective,
  type SyncLimits,
} from '@hltvsync/schemas';

export interface SyncCommand {
  scope: ScopeDirective;
  limits: SyncLimits;
  refresh: boolean;
  dryRun: boolean;
  show: boolean;
}

export const SYNC_USAGE = `Usage: npm run sync -- --kind event|team|player (--id N | --unseen N) [options]

  --full-stats        also sync results, stats, rosters and player profiles below the entity
  --max-events N      stop planning events after N
  --max-teams N       stop planning teams after N
  --max-players N     stop planning players after N
  --refresh           start a new run instead of resuming an unfinished one
  --dry-run           keep everything in memory; nothing is written to the database
  --show              run the browser headed`;

const count = z.coerce.number().int().nonnegative();

const flagsSchema = z
  .object({
    kind: z.enum(['event', 'team', 'player']),
    id: z.coerce.number().int().positive().optional(),
    unseen: z.coerce.number().int().positive().optional(),
    'full-stats': z.boolean().default(false),
    'max-events': count.optional(),
    'max-teams': count.optional(),
    'max-players': count.optional(),
    refresh: z.boolean().default(false),
    'dry-run': z.boolean().default(false),
    show: z.boolean().default(false),
  })
  .refine((f) => (f.id === undefined) !== (f.unseen === undefined), {
    message: 'Pass exactly one of --id or --unseen',
  });

export function parseSyncArgs(argv: string[]): SyncCommand {
  const { values } = parseArgs({
    args: argv,
    options: {
      kind: { type: 'string' },
      id: { type: 'string' },
      unseen: { type: 'string' },
      'full-stats': { type: 'boolean' },
      'max-events': { type: 'string' },
      'max-teams': { type: 'string' },
      'max-players': { type: 'string' },
      refresh: { type: 'boolean' },
      'dry-run': { type: 'boolean' },
      show: { type: 'boolean' },
    },
    strict: true,
  });

  const parsed = flagsSchema.safeParse(values);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `--${issue.path.join('.')}: ` : '';
    throw new Error(`${where}${issue?.message ?? 'invalid arguments'}\n\n${SYNC_USAGE}`);
  }
  const f = parsed.data;

  const scope = scopeDirectiveSchema.parse({
    kind: f.kind.toUpperCase(),
    selector: f.id !== undefined ? { type: 'id', id: f.id } : { type: 'unseen', count: f.unseen },
    fullStats: f['full-stats'],
  });
  const limits = syncLimitsSchema.parse({
    maxEvents: f['max-events'],
    maxTeams: f['max-teams'],
    maxPlayers: f['max-players'],
  });
  return { scope, limits, refresh: f.refresh, dryRun: f['dry-run'], show: f.show };
}

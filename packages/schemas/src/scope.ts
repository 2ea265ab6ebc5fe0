import { z } from 'zod';
import { entityKindEnum } from './enums';

export const scopeSelectorSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('id'), id: z.number().int().positive() }),
  z.object({ type: z.literal('unseen'), count: z.number().int().positive() }),
]);
export type ScopeSelector = z.infer<typeof scopeSelectorSchema>;

/** Plan request handed to the orchestrator; opaque to any command-line syntax. */
export const scopeDirectiveSchema = z.object({
  kind: entityKindEnum,
  selector: scopeSelectorSchema,
  fullStats: z.boolean().default(false),
});
export type ScopeDirective = z.infer<typeof scopeDirectiveSchema>;

/** Per-invocation bounds. Absent means unbounded; 0 plans none of that kind. */
export const syncLimitsSchema = z.object({
  maxEvents: z.number().int().nonnegative().optional(),
  maxTeams: z.number().int().nonnegative().optional(),
  maxPlayers: z.number().int().nonnegative().optional(),
});
export type SyncLimits = z.infer<typeof syncLimitsSchema>;

/** Stable key that identifies "the same scope" across runs, for resumption. */
export function scopeKey(scope: ScopeDirective): string {
  const sel =
    scope.selector.type === 'id' ? `id=${scope.selector.id}` : `unseen=${scope.selector.count}`;
  return `${scope.kind}:${sel}:${scope.fullStats ? 'full' : 'basic'}`;
}

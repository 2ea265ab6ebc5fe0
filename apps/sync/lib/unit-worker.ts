/**
 * Unit worker: one planned page through Session Manager → Extractor → Reconciler,
 * then checkpoint.
 *
 * The reconciliation transaction wraps only the apply step; the fetch happens
 * before it, outside any transaction. A unit planned on the URL of the unit that
 * planned it (event results after the overview) extracts from that capture. The checkpoint is written only after the
 * unit's records have committed.
 */

import type { FetchOutcome } from '@hltvsync/agents';
import { agentLog } from '@hltvsync/core';
import { PersistenceError, toPersistenceError } from '@hltvsync/db';
import type { ExtractionResult, FailureReason } from '@hltvsync/schemas';
import type { RunStateMachine } from './run-state';
import { toSnapshot } from './snapshot-disk';
import {
  expandPlan,
  isListingPage,
  listingCandidates,
  type PlanSnapshot,
  type PlanUnit,
} from './sync-planner';
import type { FailureReport, SyncEngine } from './types';

const AGENT = 'SyncOrchestrator';

export type FetchedPage = Extract<FetchOutcome, { type: 'ok' }>;

export interface UnitContext {
  engine: SyncEngine;
  runId: string;
  plan: PlanSnapshot;
  machine: RunStateMachine;
  /** Marks the unit done and stores the plan as it stands when the write runs. */
  checkpoint(unitKey: string): Promise<void>;
  /** Captures by URL, kept for a planned unit on the same page and taken once. */
  captures: Map<string, FetchedPage>;
}

export type UnitResult =
  | { type: 'done'; added: PlanUnit[] }
  | { type: 'failed'; failure: FailureReport }
  /** The store is unreachable; the unit stays pending and the run must stop. */
  | { type: 'aborted'; error: PersistenceError };

function connectivityError(err: unknown, operation: string): PersistenceError | null {
  const pe = toPersistenceError(err, operation);
  return pe.connectivity ? pe : null;
}

async function fail(
  ctx: UnitContext,
  unit: PlanUnit,
  reason: FailureReason,
  attempts: number,
  signals: string[],
  message: string,
): Promise<UnitResult> {
  const failure: FailureReport = {
    unitKey: unit.key,
    pageKind: unit.pageKind,
    url: unit.url,
    reason,
    attempts,
    signals,
    message,
  };
  agentLog(AGENT, `Unit failed (${reason}): ${unit.key}`, { level: 'warn', detail: message });
  try {
    await ctx.engine.store.recordUnitFailure({ runId: ctx.runId, ...failure });
  } catch (err) {
    const lost = connectivityError(err, 'recordUnitFailure');
    if (lost) {
      unit.status = 'PENDING';
      return { type: 'aborted', error: lost };
    }
    throw err;
  }
  unit.status = 'FAILED';
  return { type: 'failed', failure };
}

async function writeSnapshot(ctx: UnitContext, unit: PlanUnit, result: ExtractionResult) {
  const sink = ctx.engine.snapshots;
  const snapshot = toSnapshot(unit.key, result);
  if (!sink || !snapshot) return;
  try {
    const file = await sink.write(snapshot);
    agentLog(AGENT, `Snapshot written: ${file}`, { level: 'debug' });
  } catch (err) {
    // The records are already committed; a lost snapshot only costs replayability.
    agentLog(AGENT, `Snapshot not written for ${unit.key}`, {
      level: 'warn',
      detail: err instanceof Error ? err.message : String(err),
    });
  }
}

export async function runUnit(unit: PlanUnit, ctx: UnitContext): Promise<UnitResult> {
  const { engine, machine, plan } = ctx;

  machine.transition('FETCHING');
  const reused = ctx.captures.get(unit.url);
  if (reused) {
    ctx.captures.delete(unit.url);
    agentLog(AGENT, `Reusing capture for ${unit.key}`, { level: 'debug', detail: unit.url });
  } else {
    agentLog(AGENT, `Fetching ${unit.key}`, { level: 'info', detail: unit.url });
  }
  const fetched = reused ?? (await engine.fetcher.fetch(unit.pageKind, unit.url));
  if (fetched.type === 'failed') {
    return fail(ctx, unit, fetched.reason, fetched.attempts, fetched.signals, fetched.message);
  }
  const { content, attempts } = fetched;

  const extracted = await engine.extractor.execute(
    {
      pageKind: unit.pageKind,
      url: content.url,
      finalUrl: content.finalUrl,
      html: content.html,
      capturedAt: content.capturedAt,
      expectedId: unit.externalId,
    },
    { runId: ctx.runId, unitKey: unit.key },
  );
  if (!extracted.success) {
    return fail(ctx, unit, 'EXTRACTION', attempts, [], extracted.error);
  }
  const result = extracted.data;

  if (!isListingPage(unit.pageKind)) {
    machine.transition('RECONCILING');
    try {
      await engine.reconciler.applyUnit(result.records, {
        observedAt: new Date(result.capturedAt),
      });
    } catch (err) {
      const pe = toPersistenceError(err, 'applyUnit');
      if (pe.connectivity) {
        unit.status = 'PENDING';
        return { type: 'aborted', error: pe };
      }
      return fail(ctx, unit, 'PERSISTENCE', attempts, [], pe.message);
    }
    await writeSnapshot(ctx, unit, result);
  }

  let storedIds: Set<number> | undefined;
  if (isListingPage(unit.pageKind) && plan.scope.selector.type === 'unseen') {
    try {
      storedIds = await engine.store.findExistingIds(
        plan.scope.kind,
        listingCandidates(result, plan.scope.kind),
      );
    } catch (err) {
      const pe = toPersistenceError(err, 'findExistingIds');
      if (pe.connectivity) {
        unit.status = 'PENDING';
        return { type: 'aborted', error: pe };
      }
      return fail(ctx, unit, 'PERSISTENCE', attempts, [], pe.message);
    }
  }

  const added = expandPlan(plan, unit, result, engine.planner, storedIds);
  if (added.some((u) => u.url === unit.url)) ctx.captures.set(unit.url, fetched);
  unit.status = 'DONE';
  try {
    await ctx.checkpoint(unit.key);
  } catch (err) {
    // Without a checkpoint the unit runs again on resume, from the last stored plan.
    unit.status = 'PENDING';
    const pe = toPersistenceError(err, 'completeUnit');
    if (pe.connectivity) return { type: 'aborted', error: pe };
    throw pe;
  }
  machine.transition('CHECKPOINTED');
  agentLog(AGENT, `Checkpointed ${unit.key}`, {
    level: 'success',
    detail: added.length ? `planned ${added.map((u) => u.key).join(', ')}` : undefined,
  });
  return { type: 'done', added };
}

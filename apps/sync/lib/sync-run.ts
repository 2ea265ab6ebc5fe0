/**
 * Sync Orchestrator run loop.
 *
 * Plans (or resumes) a run for a scope directive, then drains the plan with a
 * bounded worker pool: one group per unit kind, each with its own concurrency.
 * Unit failures are recorded and the run continues; a connectivity-level
 * store failure or cancellation stops new units while in-flight ones finish.
 */

import { agentLog } from '@hltvsync/core';
import { DATABASE_ERROR_MESSAGE, PersistenceError, toPersistenceError } from '@hltvsync/db';
import { scopeDirectiveSchema, scopeKey, syncLimitsSchema, type RunState } from '@hltvsync/schemas';
import { RunStateMachine } from './run-state';
import {
  createPlan,
  pendingUnits,
  planSnapshotSchema,
  resumePlan,
  unitGroup,
  type PlanSnapshot,
  type PlanUnit,
  type UnitGroup,
} from './sync-planner';
import type { FailureReport, RunSummary, SyncEngine, SyncRequest } from './types';
import { runUnit, type FetchedPage, type UnitResult } from './unit-worker';

const AGENT = 'SyncOrchestrator';

/**
 * Checkpoint writes run one at a time, each storing the plan as it is when the
 * write starts, so a stored plan never loses units a previous checkpoint stored.
 */
export function createCheckpointWriter(
  engine: SyncEngine,
  runId: string,
  plan: PlanSnapshot,
): (unitKey: string) => Promise<void> {
  let tail: Promise<void> = Promise.resolve();
  return (unitKey) => {
    const write = tail.then(() => engine.store.completeUnit(runId, unitKey, structuredClone(plan)));
    // The chain only orders writes; each caller sees its own rejection through `write`.
    tail = write.catch(() => undefined);
    return write;
  };
}

interface PreparedRun {
  runId: string;
  plan: PlanSnapshot;
  resumed: boolean;
}

async function prepareRun(engine: SyncEngine, request: SyncRequest): Promise<PreparedRun> {
  const scope = scopeDirectiveSchema.parse(request.scope);
  const limits = syncLimitsSchema.parse(request.limits ?? {});
  const key = scopeKey(scope);
  const { store } = engine;

  if (!request.refresh) {
    const existing = await store.findResumableRun(key);
    const stored = existing ? planSnapshotSchema.safeParse(existing.planSnapshot) : null;
    if (existing && stored?.success) {
      const completed = await store.listCompletedUnits(existing.id);
      // Limits of the new invocation apply to whatever is still to be planned.
      const plan = { ...resumePlan(stored.data, completed), limits };
      await store.updateRun(existing.id, {
        state: 'PLANNING',
        planSnapshot: plan,
        errorMessage: null,
        finishedAt: null,
      });
      agentLog(AGENT, `Resuming run ${existing.id} for ${key}`, {
        level: 'info',
        detail: `${completed.length} units already checkpointed`,
      });
      return { runId: existing.id, plan, resumed: true };
    }
    if (existing) {
      agentLog(AGENT, `Stored plan for run ${existing.id} is unreadable; starting over`, {
        level: 'warn',
      });
    }
  }

  const plan = createPlan(scope, limits, engine.planner);
  const run = await store.createRun({ scopeKey: key, scope, limits, planSnapshot: plan });
  agentLog(AGENT, `Planned run ${run.id} for ${key}`, {
    level: 'info',
    detail: plan.units.map((u) => u.key).join(', ') || 'nothing to do',
  });
  return { runId: run.id, plan, resumed: false };
}

/**
 * Run one scope to completion (or until cancelled / the store is lost).
 * Throws only when the run cannot be started or finished at all (store down
 * before planning, or the final state cannot be recorded).
 */
export async function runSync(engine: SyncEngine, request: SyncRequest): Promise<RunSummary> {
  const machine = new RunStateMachine('PLANNING', (from, to) =>
    agentLog(AGENT, `Run ${from} → ${to}`, { level: 'debug' }),
  );

  let prepared: PreparedRun;
  try {
    prepared = await prepareRun(engine, request);
  } catch (err) {
    const pe = toPersistenceError(err, 'prepareRun');
    if (pe.connectivity) {
      agentLog(AGENT, DATABASE_ERROR_MESSAGE, { level: 'error', detail: pe.message });
    }
    throw pe;
  }
  const { runId, plan, resumed } = prepared;

  const checkpoint = createCheckpointWriter(engine, runId, plan);
  const captures = new Map<string, FetchedPage>();
  const failures: FailureReport[] = [];
  const inFlight = new Map<string, Promise<void>>();
  const running: Record<UnitGroup, number> = { LISTING: 0, EVENT: 0, TEAM: 0, PLAYER: 0 };
  // Held on an object: it is set from worker callbacks.
  const halt: { error: Error | null } = { error: null };
  const cancelled = () => request.signal?.aborted === true;

  const settle = (result: UnitResult) => {
    if (result.type === 'failed') failures.push(result.failure);
    else if (result.type === 'aborted') halt.error ??= result.error;
  };

  const start = (unit: PlanUnit) => {
    const group = unitGroup(unit.pageKind);
    running[group]++;
    const task = runUnit(unit, { engine, runId, plan, machine, checkpoint, captures })
      .then(settle)
      .catch((err: unknown) => {
        // Anything escaping the worker is outside a single unit's failure modes.
        unit.status = 'PENDING';
        halt.error ??= err instanceof Error ? err : new Error(String(err));
      })
      .finally(() => {
        running[group]--;
        inFlight.delete(unit.key);
      });
    inFlight.set(unit.key, task);
  };

  for (;;) {
    machine.transition('PLANNING');
    if (!halt.error && !cancelled()) {
      for (const unit of pendingUnits(plan)) {
        if (inFlight.has(unit.key)) continue;
        const group = unitGroup(unit.pageKind);
        if (running[group] < engine.concurrency[group]) start(unit);
      }
    }
    if (inFlight.size === 0) break;
    await Promise.race(inFlight.values());
  }

  const pending = pendingUnits(plan).length;
  let finalState: Extract<RunState, 'DONE' | 'FAILED'> = 'DONE';
  let errorMessage: string | null = null;
  if (halt.error) {
    finalState = 'FAILED';
    errorMessage = halt.error.message;
  } else if (cancelled() && pending > 0) {
    finalState = 'FAILED';
    errorMessage = 'Run cancelled';
  }
  machine.transition(finalState);

  const summary: RunSummary = {
    runId,
    state: finalState,
    history: machine.history,
    resumed,
    units: plan.units.map((u) => ({
      key: u.key,
      pageKind: u.pageKind,
      externalId: u.externalId,
      status: u.status,
    })),
    failures,
    errorMessage,
  };

  const done = plan.units.filter((u) => u.status === 'DONE').length;
  agentLog(
    AGENT,
    `Run ${runId} ${finalState}: ${done} done, ${failures.length} failed, ${pending} pending`,
    { level: finalState === 'DONE' ? 'success' : 'error', detail: errorMessage ?? undefined },
  );

  try {
    await engine.store.updateRun(runId, {
      state: finalState,
      finishedAt: new Date(),
      errorMessage,
      summary: {
        done,
        failed: failures.length,
        pending,
        failures: failures.map((f) => ({ unitKey: f.unitKey, reason: f.reason })),
      },
    });
  } catch (err) {
    // The run already failed on the store; its last checkpoint stands.
    if (halt.error instanceof PersistenceError && halt.error.connectivity) {
      agentLog(AGENT, `Could not record final state for run ${runId}`, {
        level: 'warn',
        detail: err instanceof Error ? err.message : String(err),
      });
    } else {
      throw toPersistenceError(err, 'updateRun');
    }
  }
  return summary;
}

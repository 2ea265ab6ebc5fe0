/**
 * Run-level state machine.
 *
 * PLANNING → FETCHING → RECONCILING → CHECKPOINTED → (PLANNING …) → DONE | FAILED
 *
 * With more than one worker, phases of different units interleave, so the
 * non-terminal states may follow each other in any order the table allows.
 * Entering the current state again is a no-op.
 */

import type { RunState } from '@hltvsync/schemas';

export const RUN_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  PLANNING: ['FETCHING', 'RECONCILING', 'CHECKPOINTED', 'DONE', 'FAILED'],
  FETCHING: ['RECONCILING', 'CHECKPOINTED', 'PLANNING', 'FAILED'],
  RECONCILING: ['CHECKPOINTED', 'FETCHING', 'PLANNING', 'FAILED'],
  CHECKPOINTED: ['PLANNING', 'FETCHING', 'RECONCILING', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export function isTerminal(state: RunState): boolean {
  return state === 'DONE' || state === 'FAILED';
}

export class RunStateMachine {
  private current: RunState;
  private readonly trail: RunState[];

  constructor(
    initial: RunState = 'PLANNING',
    private readonly onTransition?: (from: RunState, to: RunState) => void,
  ) {
    this.current = initial;
    this.trail = [initial];
  }

  get state(): RunState {
    return this.current;
  }

  get history(): RunState[] {
    return [...this.trail];
  }

  canTransition(to: RunState): boolean {
    return to === this.current || RUN_TRANSITIONS[this.current].includes(to);
  }

  /** Returns false for a same-state no-op, true when the state changed. */
  transition(to: RunState): boolean {
    if (to === this.current) return false;
    if (!RUN_TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Illegal run transition ${this.current} → ${to}`);
    }
    const from = this.current;
    this.current = to;
    this.trail.push(to);
    this.onTransition?.(from, to);
    return true;
  }
}

/**
 * Batch State Machine
 *
 * Strict state machine for a split batch.
 *
 * State Flow (per input i, in caller order):
 * AWAITING-START → ANALYZING(i) → SPLITTING-LEFT(i) → SPLITTING-RIGHT(i) → COLLECTING(i) → … → COMPLETE
 *                        ↘ CANCELLED (from any non-terminal state)
 *
 * A failed step moves straight on to ANALYZING(i+1) or COMPLETE.
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - Every transition is recorded
 */

import { StateTransitionError } from './errors/index.js';

export type BatchState =
  | { kind: 'awaiting-start' }
  | { kind: 'analyzing'; index: number }
  | { kind: 'splitting-left'; index: number }
  | { kind: 'splitting-right'; index: number }
  | { kind: 'collecting'; index: number }
  | { kind: 'complete' }
  | { kind: 'cancelled' };

export type BatchStateKind = BatchState['kind'];

/**
 * Represents a state transition with metadata
 */
export interface BatchStateTransition {
  from: BatchState;
  to: BatchState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state kind to the set of kinds it can transition to
 */
const validTransitions: Record<BatchStateKind, Set<BatchStateKind>> = {
  'awaiting-start': new Set<BatchStateKind>([
    'analyzing',
    'complete', // Empty batch
    'cancelled',
  ]),
  analyzing: new Set<BatchStateKind>([
    'splitting-left',
    'analyzing', // Probe failed, next file
    'complete',
    'cancelled',
  ]),
  'splitting-left': new Set<BatchStateKind>([
    'splitting-right',
    'analyzing', // Left failed, right is skipped
    'complete',
    'cancelled',
  ]),
  'splitting-right': new Set<BatchStateKind>([
    'collecting',
    'analyzing',
    'complete',
    'cancelled',
  ]),
  collecting: new Set<BatchStateKind>([
    'analyzing',
    'complete',
    'cancelled',
  ]),
  complete: new Set<BatchStateKind>([]), // Terminal state
  cancelled: new Set<BatchStateKind>([]), // Terminal state
};

function indexOf(state: BatchState): number | undefined {
  return 'index' in state ? state.index : undefined;
}

/**
 * Check if a state transition is valid.
 * Steps within a file keep its index; a new file must be the next index.
 */
export function isValidTransition(from: BatchState, to: BatchState): boolean {
  if (!validTransitions[from.kind].has(to.kind)) {
    return false;
  }

  const fromIndex = indexOf(from);
  const toIndex = indexOf(to);
  if (toIndex === undefined) {
    return true;
  }

  if (to.kind === 'analyzing') {
    return toIndex === (fromIndex === undefined ? 0 : fromIndex + 1);
  }
  return toIndex === fromIndex;
}

/**
 * Get all state kinds reachable from the current state
 */
export function getNextStates(current: BatchStateKind): BatchStateKind[] {
  return Array.from(validTransitions[current]);
}

export function isTerminalState(state: BatchState): boolean {
  return state.kind === 'complete' || state.kind === 'cancelled';
}

/**
 * Human-readable state, e.g. `splitting-left(2)`
 */
export function describeState(state: BatchState): string {
  const index = indexOf(state);
  return index === undefined ? state.kind : `${state.kind}(${index})`;
}

/**
 * Batch State Machine class
 * Manages state transitions with validation and history
 */
export class BatchStateMachine {
  private currentState: BatchState;
  private history: BatchStateTransition[];

  constructor(initialState: BatchState = { kind: 'awaiting-start' }) {
    this.currentState = initialState;
    this.history = [];
  }

  /**
   * Get the current state
   */
  getState(): BatchState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<BatchStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: BatchState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: BatchState, reason?: string): BatchStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(
        this.currentState.kind,
        targetState.kind,
        `Invalid state transition from ${describeState(this.currentState)} to ${describeState(targetState)}`
      );
    }

    const transition: BatchStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Check if the batch is in a terminal state
   */
  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  isCancelled(): boolean {
    return this.currentState.kind === 'cancelled';
  }

  cancel(reason?: string): BatchStateTransition {
    return this.transitionTo({ kind: 'cancelled' }, reason);
  }
}

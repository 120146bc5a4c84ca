import { describe, it, expect } from 'vitest';
import {
  BatchStateMachine,
  isValidTransition,
  describeState,
  getNextStates,
} from './stateMachine.js';
import { StateTransitionError } from './errors/index.js';

describe('isValidTransition', () => {
  it('starts a batch at the first file', () => {
    expect(isValidTransition({ kind: 'awaiting-start' }, { kind: 'analyzing', index: 0 })).toBe(true);
    expect(isValidTransition({ kind: 'awaiting-start' }, { kind: 'analyzing', index: 1 })).toBe(false);
  });

  it('keeps the index within a file', () => {
    expect(
      isValidTransition({ kind: 'analyzing', index: 2 }, { kind: 'splitting-left', index: 2 })
    ).toBe(true);
    expect(
      isValidTransition({ kind: 'splitting-left', index: 2 }, { kind: 'splitting-right', index: 3 })
    ).toBe(false);
  });

  it('moves from a failed left side straight to the next file', () => {
    expect(
      isValidTransition({ kind: 'splitting-left', index: 1 }, { kind: 'analyzing', index: 2 })
    ).toBe(true);
    expect(
      isValidTransition({ kind: 'splitting-left', index: 1 }, { kind: 'collecting', index: 1 })
    ).toBe(false);
  });

  it('allows cancellation from any non-terminal state', () => {
    expect(isValidTransition({ kind: 'collecting', index: 0 }, { kind: 'cancelled' })).toBe(true);
    expect(isValidTransition({ kind: 'complete' }, { kind: 'cancelled' })).toBe(false);
  });
});

describe('BatchStateMachine', () => {
  it('records a full single-file run', () => {
    const machine = new BatchStateMachine();
    machine.transitionTo({ kind: 'analyzing', index: 0 });
    machine.transitionTo({ kind: 'splitting-left', index: 0 });
    machine.transitionTo({ kind: 'splitting-right', index: 0 });
    machine.transitionTo({ kind: 'collecting', index: 0 });
    machine.transitionTo({ kind: 'complete' }, 'batch finished');

    expect(machine.isTerminal()).toBe(true);
    expect(machine.getHistory().map((t) => describeState(t.to))).toEqual([
      'analyzing(0)',
      'splitting-left(0)',
      'splitting-right(0)',
      'collecting(0)',
      'complete',
    ]);
    expect(machine.getHistory()[4]?.reason).toBe('batch finished');
  });

  it('throws on an invalid transition and keeps its state', () => {
    const machine = new BatchStateMachine();
    expect(() => machine.transitionTo({ kind: 'collecting', index: 0 })).toThrow(StateTransitionError);
    expect(machine.getState()).toEqual({ kind: 'awaiting-start' });
  });

  it('absorbs in the cancelled state', () => {
    const machine = new BatchStateMachine();
    machine.cancel('user request');
    expect(machine.isCancelled()).toBe(true);
    expect(getNextStates('cancelled')).toEqual([]);
    expect(() => machine.transitionTo({ kind: 'complete' })).toThrow(
      'Invalid state transition from cancelled to complete'
    );
  });
});

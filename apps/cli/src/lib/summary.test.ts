import { describe, it, expect } from 'vitest';
import type { BatchOutcome, SplitResult } from '@dualcut/core';
import {
  EXIT_CANCELLED,
  EXIT_FAILURE,
  EXIT_SUCCESS,
  describeFailure,
  describeResult,
  exitCodeFor,
  summarizeBatch,
} from './summary.js';

const RESULT: SplitResult = {
  input: '/videos/a.mp4',
  leftOutput: '/videos/a-left.mp4',
  rightOutput: '/videos/a-right.mp4',
  leftSize: 1536,
  rightSize: 5 * 1024 * 1024,
  durationMs: 125000,
  capability: 'software',
};

function outcome(partial: Partial<BatchOutcome>): BatchOutcome {
  return {
    status: 'complete',
    capability: 'software',
    total: 1,
    results: [RESULT],
    failures: [],
    stoppedEarly: false,
    ...partial,
  };
}

describe('summarizeBatch', () => {
  it('counts successes and failures', () => {
    expect(
      summarizeBatch(
        outcome({
          total: 3,
          results: [RESULT, { ...RESULT, input: '/videos/c.mp4' }],
          failures: [{ index: 1, path: '/videos/b.mp4', error: 'Conversion failed' }],
        })
      )
    ).toEqual({ total: 3, succeeded: 2, failed: 1, skipped: 0, cancelled: false });
  });

  it('counts inputs left behind by a cancellation', () => {
    expect(summarizeBatch(outcome({ status: 'cancelled', total: 3 }))).toEqual({
      total: 3,
      succeeded: 1,
      failed: 0,
      skipped: 2,
      cancelled: true,
    });
  });
});

describe('describeResult', () => {
  it('lists both outputs with sizes', () => {
    expect(describeResult(RESULT)).toEqual([
      'a.mp4',
      '  left:  /videos/a-left.mp4 (1.50 KB)',
      '  right: /videos/a-right.mp4 (5.00 MB)',
      '  took 2m 5s',
    ]);
  });
});

describe('describeFailure', () => {
  it('names the file and the error', () => {
    expect(describeFailure({ index: 1, path: '/videos/b.mp4', error: 'Conversion failed' })).toBe(
      'b.mp4: Conversion failed'
    );
  });
});

describe('exitCodeFor', () => {
  it('is zero only when every input succeeded', () => {
    expect(exitCodeFor(outcome({}))).toBe(EXIT_SUCCESS);
    expect(
      exitCodeFor(outcome({ total: 2, failures: [{ index: 1, path: '/videos/b.mp4', error: 'x' }] }))
    ).toBe(EXIT_FAILURE);
    expect(exitCodeFor(outcome({ total: 3, stoppedEarly: true, failures: [{ index: 0, path: '/videos/a.mp4', error: 'x' }], results: [] }))).toBe(EXIT_FAILURE);
    expect(exitCodeFor(outcome({ status: 'cancelled', total: 2 }))).toBe(EXIT_CANCELLED);
  });
});

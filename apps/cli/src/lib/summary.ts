/**
 * Batch Summary
 *
 * Plain-text pieces of the end-of-batch report. Colouring is left to the caller.
 */

import { basename } from 'node:path';
import { formatDuration, formatFileSize } from '@dualcut/utils';
import type { BatchFailure, BatchOutcome, SplitResult } from '@dualcut/core';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  /** Inputs never reached because of cancellation or an early stop */
  skipped: number;
  cancelled: boolean;
}

export function summarizeBatch(outcome: BatchOutcome): BatchSummary {
  const succeeded = outcome.results.length;
  const failed = outcome.failures.length;
  return {
    total: outcome.total,
    succeeded,
    failed,
    skipped: Math.max(0, outcome.total - succeeded - failed),
    cancelled: outcome.status === 'cancelled',
  };
}

export function describeResult(result: SplitResult): string[] {
  return [
    basename(result.input),
    `  left:  ${result.leftOutput} (${formatFileSize(result.leftSize)})`,
    `  right: ${result.rightOutput} (${formatFileSize(result.rightSize)})`,
    `  took ${formatDuration(result.durationMs)}`,
  ];
}

export function describeFailure(failure: BatchFailure): string {
  return `${basename(failure.path)}: ${failure.error}`;
}

/**
 * 0 only when every input was split
 */
export function exitCodeFor(outcome: BatchOutcome): number {
  if (outcome.status === 'cancelled') return EXIT_CANCELLED;
  const allSucceeded = outcome.failures.length === 0 && outcome.results.length === outcome.total;
  return allSucceeded ? EXIT_SUCCESS : EXIT_FAILURE;
}

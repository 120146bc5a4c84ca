import { describe, it, expect, vi } from 'vitest';
import { OutputDirectoryError } from '@dualcut/core';
import { startBatch } from './split.js';

function fakeSpinner() {
  const calls: string[] = [];
  return {
    calls,
    start: vi.fn((text?: string) => calls.push(`start:${text ?? ''}`)),
    stop: vi.fn(() => calls.push('stop')),
  };
}

describe('startBatch', () => {
  it('stops the spinner once the batch has started', async () => {
    const spinner = fakeSpinner();
    const start = vi.fn(async () => ({ kind: 'analyzing' as const, index: 0 }));

    await startBatch({ start }, spinner);

    expect(start).toHaveBeenCalledTimes(1);
    expect(spinner.calls).toEqual(['start:Detecting encoder...', 'stop']);
  });

  it('stops the spinner before the start error reaches the caller', async () => {
    const spinner = fakeSpinner();
    const start = vi.fn(async () => {
      throw new OutputDirectoryError('/readonly/exports', 'EACCES: permission denied');
    });

    await expect(startBatch({ start }, spinner)).rejects.toBeInstanceOf(OutputDirectoryError);
    expect(spinner.stop).toHaveBeenCalledTimes(1);
  });
});

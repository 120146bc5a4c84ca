import { describe, it, expect } from 'vitest';
import { formatDuration, formatClock } from './time.js';
import { formatFileSize } from './file.js';

describe('formatDuration', () => {
  it('formats sub-second durations in ms', () => {
    expect(formatDuration(250)).toBe('250ms');
  });

  it('formats seconds, minutes and hours', () => {
    expect(formatDuration(42_000)).toBe('42s');
    expect(formatDuration(125_000)).toBe('2m 5s');
    expect(formatDuration(3_723_000)).toBe('1h 2m 3s');
  });
});

describe('formatClock', () => {
  it('uses M:SS under an hour and H:MM:SS above', () => {
    expect(formatClock(65.4)).toBe('1:05');
    expect(formatClock(3725)).toBe('1:02:05');
  });
});

describe('formatFileSize', () => {
  it('picks the largest fitting unit', () => {
    expect(formatFileSize(512)).toBe('512 B');
    expect(formatFileSize(1536)).toBe('1.50 KB');
    expect(formatFileSize(5 * 1024 * 1024)).toBe('5.00 MB');
    expect(formatFileSize(3 * 1024 * 1024 * 1024)).toBe('3.00 GB');
  });
});

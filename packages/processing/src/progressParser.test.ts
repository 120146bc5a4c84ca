import { describe, it, expect } from 'vitest';
import {
  FFmpegProgressParser,
  estimateEta,
  formatEta,
  formatProgress,
  parseProgressLine,
  parseTimestamp,
} from './progressParser.js';

const STATUS_LINE =
  'frame=  240 fps= 59 q=-1.0 size=    8192kB time=00:00:04.00 bitrate=16777.2kbits/s speed=1.98x';

describe('parseTimestamp', () => {
  it('reads two fractional digits as hundredths', () => {
    expect(parseTimestamp('00:10:45.20')).toBeCloseTo(645.2, 6);
  });

  it('reads a single fractional digit as tenths', () => {
    expect(parseTimestamp('01:00:00.5')).toBeCloseTo(3600.5, 6);
  });

  it('truncates extra fractional digits', () => {
    expect(parseTimestamp('00:00:01.239')).toBeCloseTo(1.23, 6);
  });

  it('rejects other shapes', () => {
    expect(parseTimestamp('1:00')).toBeUndefined();
  });
});

describe('parseProgressLine', () => {
  it('extracts every field of a status line', () => {
    expect(parseProgressLine(STATUS_LINE)).toEqual({
      currentTimeSecs: 4,
      frame: 240,
      fps: 59,
      speed: 1.98,
    });
  });

  it('ignores lines without a timestamp', () => {
    expect(parseProgressLine('frame=  10 fps=30 speed=1.0x')).toBeNull();
  });

  it('falls back to zero for absent or malformed fields', () => {
    expect(parseProgressLine('frame=  12 fps=. time=00:00:01.00 speed=N/A')).toEqual({
      currentTimeSecs: 1,
      frame: 12,
      fps: 0,
      speed: 0,
    });
  });
});

describe('FFmpegProgressParser', () => {
  it('latches the first duration line', () => {
    const parser = new FFmpegProgressParser();

    expect(parser.feed('  Duration: 00:01:30.00, start: 0.000000, bitrate: 48211 kb/s')).toBeNull();
    expect(parser.durationSecs).toBe(90);

    const first = parser.feed('frame=  60 fps=30 time=00:00:02.00 speed=1.0x');
    const second = parser.feed('frame= 120 fps=30 time=00:00:04.00 speed=1.0x');
    parser.feed('  Duration: 00:05:00.00, start: 0.000000, bitrate: 1000 kb/s');
    const third = parser.feed('frame= 180 fps=30 time=00:00:06.00 speed=1.0x');

    expect([first, second, third].map((p) => p?.totalDurationSecs)).toEqual([90, 90, 90]);
    expect(parser.durationSecs).toBe(90);
  });

  it('keeps a known duration over a later duration line', () => {
    const parser = new FFmpegProgressParser(120);
    parser.feed('  Duration: 00:01:30.00, start: 0.000000, bitrate: 48211 kb/s');
    expect(parser.durationSecs).toBe(120);
    expect(parser.hasDuration).toBe(true);
  });

  it('computes the percentage against the total', () => {
    const parser = new FFmpegProgressParser(8);
    expect(parser.feed(STATUS_LINE)).toEqual({
      currentTimeSecs: 4,
      totalDurationSecs: 8,
      frame: 240,
      fps: 59,
      speed: 1.98,
      percentage: 50,
    });
  });

  it('clamps the percentage at 100', () => {
    const parser = new FFmpegProgressParser(90);
    expect(parser.feed('frame=1 time=00:02:00.00 speed=1x')?.percentage).toBe(100);
  });

  it('still reports progress without a duration', () => {
    const parser = new FFmpegProgressParser();
    const progress = parser.feed(STATUS_LINE);

    expect(parser.hasDuration).toBe(false);
    expect(progress?.percentage).toBe(0);
    expect(progress?.totalDurationSecs).toBe(0);
    expect(progress && estimateEta(progress)).toBeUndefined();
  });
});

describe('estimateEta', () => {
  it('divides the remaining time by the speed', () => {
    expect(estimateEta({ currentTimeSecs: 30, totalDurationSecs: 90, speed: 2 })).toBe(30);
  });

  it('is undefined while the speed is zero', () => {
    expect(estimateEta({ currentTimeSecs: 30, totalDurationSecs: 90, speed: 0 })).toBeUndefined();
  });

  it('floors at zero once the total is reached', () => {
    expect(estimateEta({ currentTimeSecs: 95, totalDurationSecs: 90, speed: 1 })).toBe(0);
  });
});

describe('formatEta', () => {
  it('formats seconds, minutes and hours', () => {
    expect(formatEta(undefined)).toBe('calculating...');
    expect(formatEta(42)).toBe('~42s');
    expect(formatEta(187)).toBe('~3:07');
    expect(formatEta(3900)).toBe('~1h 05m');
  });

  it('truncates partial seconds', () => {
    expect(formatEta(59.6)).toBe('~59s');
    expect(formatEta(187.9)).toBe('~3:07');
  });
});

describe('formatProgress', () => {
  it('formats a snapshot with a known total', () => {
    expect(
      formatProgress({
        currentTimeSecs: 45,
        totalDurationSecs: 90,
        frame: 2700,
        fps: 59.94,
        speed: 1.5,
        percentage: 50,
      })
    ).toBe('50.0% | frame 2700 | 59.9 fps | 1.50x | ETA: ~30s');
  });

  it('shows the position when the total is unknown', () => {
    expect(
      formatProgress({
        currentTimeSecs: 65,
        totalDurationSecs: 0,
        frame: 0,
        fps: 0,
        speed: 0,
        percentage: 0,
      })
    ).toBe('1:05 | ETA: calculating...');
  });
});

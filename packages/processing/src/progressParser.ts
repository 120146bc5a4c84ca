/**
 * Progress Parser
 *
 * Turns FFmpeg's stderr status lines into EncodingProgress snapshots.
 *
 *   Duration: 00:10:45.20, start: 0.000000, bitrate: 48211 kb/s
 *   frame=  240 fps= 59 q=-1.0 size=   8192kB time=00:00:04.00 bitrate=16777.2kbits/s speed=1.98x
 *
 * The total duration latches on the first Duration line (or a duration
 * known up front) and never changes for the life of the parser.
 */

import { formatClock } from '@dualcut/utils';
import type { EncodingProgress } from '@dualcut/core';

const TIMESTAMP = String.raw`(\d{2}):(\d{2}):(\d{2})\.(\d+)`;

const DURATION_PATTERN = new RegExp(String.raw`Duration:\s*${TIMESTAMP}`);
const TIME_PATTERN = new RegExp(String.raw`time=\s*${TIMESTAMP}`);
const TIMESTAMP_PATTERN = new RegExp(`^${TIMESTAMP}$`);
const FRAME_PATTERN = /frame=\s*(\d+)/;
const FPS_PATTERN = /fps=\s*([\d.]+)/;
const SPEED_PATTERN = /speed=\s*([\d.]+)x/;

/**
 * Fields of a single status line, before the duration is applied
 */
export interface ProgressLineFields {
  currentTimeSecs: number;
  frame: number;
  fps: number;
  speed: number;
}

function toNumber(value: string | undefined): number {
  const parsed = Number(value ?? '');
  return Number.isFinite(parsed) ? parsed : 0;
}

function secondsFromMatch(match: RegExpMatchArray): number {
  const hours = toNumber(match[1]);
  const minutes = toNumber(match[2]);
  const seconds = toNumber(match[3]);
  // Hundredths: `.5` -> 50, `.209` -> 20
  const hundredths = toNumber((match[4] ?? '').padEnd(2, '0').slice(0, 2));
  return hours * 3600 + minutes * 60 + seconds + hundredths / 100;
}

/**
 * Parse `HH:MM:SS.ff` into seconds
 */
export function parseTimestamp(value: string): number | undefined {
  const match = value.trim().match(TIMESTAMP_PATTERN);
  return match ? secondsFromMatch(match) : undefined;
}

/**
 * Total duration from a `Duration:` header line
 */
export function parseDurationLine(line: string): number | undefined {
  const match = line.match(DURATION_PATTERN);
  return match ? secondsFromMatch(match) : undefined;
}

/**
 * Parse a status line. Lines without `time=` are not progress lines.
 */
export function parseProgressLine(line: string): ProgressLineFields | null {
  const timeMatch = line.match(TIME_PATTERN);
  if (!timeMatch) return null;

  return {
    currentTimeSecs: secondsFromMatch(timeMatch),
    frame: toNumber(line.match(FRAME_PATTERN)?.[1]),
    fps: toNumber(line.match(FPS_PATTERN)?.[1]),
    speed: toNumber(line.match(SPEED_PATTERN)?.[1]),
  };
}

export class FFmpegProgressParser {
  private totalDuration: number | undefined;

  constructor(knownDurationSecs?: number) {
    if (knownDurationSecs !== undefined && Number.isFinite(knownDurationSecs) && knownDurationSecs > 0) {
      this.totalDuration = knownDurationSecs;
    }
  }

  get durationSecs(): number | undefined {
    return this.totalDuration;
  }

  get hasDuration(): boolean {
    return this.totalDuration !== undefined;
  }

  /**
   * Feed one logical stderr line; returns a snapshot for status lines
   */
  feed(line: string): EncodingProgress | null {
    if (this.totalDuration === undefined) {
      this.totalDuration = parseDurationLine(line);
    }

    const fields = parseProgressLine(line);
    if (!fields) return null;

    const total = this.totalDuration ?? 0;
    const percentage = total > 0
      ? Math.min(100, (fields.currentTimeSecs / total) * 100)
      : 0;

    return {
      ...fields,
      totalDurationSecs: total,
      percentage,
    };
  }
}

/**
 * Seconds remaining at the current speed, or undefined while it can't be known
 */
export function estimateEta(
  progress: Pick<EncodingProgress, 'currentTimeSecs' | 'totalDurationSecs' | 'speed'>
): number | undefined {
  const { currentTimeSecs, totalDurationSecs, speed } = progress;
  if (speed <= 0 || totalDurationSecs <= 0) return undefined;

  const remaining = totalDurationSecs - currentTimeSecs;
  return remaining > 0 ? remaining / speed : 0;
}

/**
 * Format an ETA, e.g. `~42s`, `~3:07`, `~1h 05m`
 */
export function formatEta(etaSecs: number | undefined): string {
  if (etaSecs === undefined || !Number.isFinite(etaSecs)) return 'calculating...';

  const total = Math.floor(etaSecs);
  if (total < 60) {
    return `~${total}s`;
  }

  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  if (hours > 0) {
    return `~${hours}h ${String(minutes).padStart(2, '0')}m`;
  }
  return `~${minutes}:${String(total % 60).padStart(2, '0')}`;
}

/**
 * Format a snapshot for display
 */
export function formatProgress(progress: EncodingProgress): string {
  const parts: string[] = [];

  if (progress.totalDurationSecs > 0) {
    parts.push(`${progress.percentage.toFixed(1)}%`);
  } else {
    parts.push(formatClock(progress.currentTimeSecs));
  }

  if (progress.frame > 0) {
    parts.push(`frame ${progress.frame}`);
  }

  if (progress.fps > 0) {
    parts.push(`${progress.fps.toFixed(1)} fps`);
  }

  if (progress.speed > 0) {
    parts.push(`${progress.speed.toFixed(2)}x`);
  }

  parts.push(`ETA: ${formatEta(estimateEta(progress))}`);

  return parts.join(' | ');
}

/**
 * Split Types
 */

import type { EncodingCapability } from './encoding.js';

export type SplitSide = 'left' | 'right';

export interface CropRegion {
  width: number;
  height: number;
  x: number;
  y: number;
}

/**
 * Probed description of an input file
 */
export interface VideoDescriptor {
  path: string;
  width: number;
  height: number;
  codec: string;
  fileSize?: number;
}

/**
 * Snapshot of an encode, recomputed on every parsed progress line
 */
export interface EncodingProgress {
  currentTimeSecs: number;
  totalDurationSecs: number;
  frame: number;
  fps: number;
  speed: number;  // x realtime
  percentage: number;  // 0-100
}

/**
 * Produced only once both sides of an input have been written
 */
export interface SplitResult {
  input: string;
  leftOutput: string;
  rightOutput: string;
  leftSize: number;
  rightSize: number;
  durationMs: number;
  capability: EncodingCapability;
}

export interface BatchFailure {
  index: number;
  path: string;
  error: string;
}

interface BatchPosition {
  index: number;
  total: number;
}

export type BatchProgressEvent =
  | (BatchPosition & { type: 'analyzing'; path: string })
  | (BatchPosition & { type: 'analyzed'; video: VideoDescriptor; durationSecs?: number })
  | (BatchPosition & { type: 'processing'; path: string; side: SplitSide })
  | (BatchPosition & { type: 'progress'; side: SplitSide; progress: EncodingProgress })
  | (BatchPosition & { type: 'completed'; result: SplitResult })
  | (BatchPosition & { type: 'failed'; path: string; error: string });

export interface BatchOutcome {
  status: 'complete' | 'cancelled';
  capability: EncodingCapability;
  total: number;
  results: SplitResult[];
  failures: BatchFailure[];
  /** A failure ended the batch because continue-on-error was off */
  stoppedEarly: boolean;
}

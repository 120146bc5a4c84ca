/**
 * Split Geometry and Presets
 *
 * Fixed crop rules for side-by-side recordings (two 1920x1080 halves of a
 * 3840x1080 frame) and parsing of user-facing names.
 */

import { InvalidQualityError, InvalidSideError } from './errors/index.js';
import type { QualityPreset } from './types/encoding.js';
import type { CropRegion, SplitSide, VideoDescriptor } from './types/split.js';

export const QUALITY_PRESETS: readonly QualityPreset[] = ['lossless', 'high', 'medium'];

export const DEFAULT_QUALITY: QualityPreset = 'lossless';

const SPLIT_SIDES: readonly SplitSide[] = ['left', 'right'];

export const EXPECTED_WIDTH = 3840;
export const EXPECTED_HEIGHT = 1080;

/**
 * Crop regions are independent of the actual input size; callers validate
 * dimensions separately.
 */
const CROP_REGIONS: Record<SplitSide, CropRegion> = {
  left: { width: 1920, height: 1080, x: 0, y: 0 },
  right: { width: 1920, height: 1080, x: 1920, y: 0 },
};

function isQualityPreset(value: string): value is QualityPreset {
  return QUALITY_PRESETS.some((preset) => preset === value);
}

function isSplitSide(value: string): value is SplitSide {
  return SPLIT_SIDES.some((side) => side === value);
}

/**
 * Parse a quality preset name (case-insensitive)
 */
export function parseQualityPreset(value: string): QualityPreset {
  const normalized = value.trim().toLowerCase();
  if (!isQualityPreset(normalized)) {
    throw new InvalidQualityError(value);
  }
  return normalized;
}

/**
 * Parse a side name (case-insensitive)
 */
export function parseSplitSide(value: string): SplitSide {
  const normalized = value.trim().toLowerCase();
  if (!isSplitSide(normalized)) {
    throw new InvalidSideError(value);
  }
  return normalized;
}

/**
 * FFmpeg crop filter for a side, e.g. `crop=1920:1080:1920:0`
 */
export function cropFilter(side: SplitSide): string {
  const { width, height, x, y } = CROP_REGIONS[side];
  return `crop=${width}:${height}:${x}:${y}`;
}

export function hasExpectedDimensions(video: Pick<VideoDescriptor, 'width' | 'height'>): boolean {
  return video.width === EXPECTED_WIDTH && video.height === EXPECTED_HEIGHT;
}

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b);
}

/**
 * Reduced aspect ratio, e.g. 3840x1080 -> `32:9`
 */
export function aspectRatio(video: Pick<VideoDescriptor, 'width' | 'height'>): string {
  const divisor = gcd(video.width, video.height);
  if (divisor === 0) return '0:0';
  return `${video.width / divisor}:${video.height / divisor}`;
}

/**
 * Encoding Presets
 *
 * Maps a (quality, capability) pair to the engine's video arguments.
 * Hardware backends expose different rate-control knobs, so each one has
 * its own table. Audio is always stream-copied.
 */

import { CAPABILITIES, type EncodingCapability, type QualityPreset } from '@dualcut/core';

type RateControlTable = Record<QualityPreset, readonly string[]>;

// libx264: constant rate factor (crf 0 is lossless)
const SOFTWARE_RATE_CONTROL: RateControlTable = {
  lossless: ['-crf', '0', '-preset', 'veryslow'],
  high: ['-crf', '18', '-preset', 'slow'],
  medium: ['-crf', '23', '-preset', 'medium'],
};

// VideoToolbox: bitrate ceiling, software fallback allowed
const VIDEOTOOLBOX_RATE_CONTROL: RateControlTable = {
  lossless: ['-b:v', '25M', '-allow_sw', '1'],
  high: ['-b:v', '15M', '-allow_sw', '1'],
  medium: ['-b:v', '10M', '-allow_sw', '1'],
};

const NVENC_RATE_CONTROL: RateControlTable = {
  lossless: ['-preset', 'p7', '-cq', '15'],
  high: ['-preset', 'p7', '-cq', '18'],
  medium: ['-preset', 'p4', '-cq', '23'],
};

const QSV_RATE_CONTROL: RateControlTable = {
  lossless: ['-global_quality', '15', '-look_ahead', '1'],
  high: ['-global_quality', '18', '-look_ahead', '1'],
  medium: ['-global_quality', '23', '-look_ahead', '1'],
};

const AMF_RATE_CONTROL: RateControlTable = {
  lossless: ['-rc', 'cqp', '-qp_i', '15', '-qp_p', '15'],
  high: ['-rc', 'cqp', '-qp_i', '18', '-qp_p', '18'],
  medium: ['-rc', 'cqp', '-qp_i', '23', '-qp_p', '23'],
};

function rateControlFor(capability: EncodingCapability): RateControlTable {
  switch (capability) {
    case 'software':
      return SOFTWARE_RATE_CONTROL;
    case 'videotoolbox':
      return VIDEOTOOLBOX_RATE_CONTROL;
    case 'nvenc':
      return NVENC_RATE_CONTROL;
    case 'qsv':
      return QSV_RATE_CONTROL;
    case 'amf':
      return AMF_RATE_CONTROL;
  }
}

/**
 * Plan the encoding arguments for one side.
 * Always `-c:v <codec> ...rateControl -c:a copy`.
 */
export function planEncodingArgs(
  quality: QualityPreset,
  capability: EncodingCapability
): string[] {
  return [
    '-c:v', CAPABILITIES[capability].codec,
    ...rateControlFor(capability)[quality],
    '-c:a', 'copy',
  ];
}

/**
 * Hardware "lossless" is only the backend's best quality point
 */
export function isTrueLossless(
  quality: QualityPreset,
  capability: EncodingCapability
): boolean {
  return quality === 'lossless' && capability === 'software';
}

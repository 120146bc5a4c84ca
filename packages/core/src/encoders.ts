/**
 * Encoding Capabilities
 *
 * H.264 backends in detection preference order. Software (libx264) is the
 * terminal fallback and is always available.
 */

import type { CapabilityInfo, EncodingCapability } from './types/encoding.js';

export const CAPABILITY_PREFERENCE: readonly EncodingCapability[] = [
  'videotoolbox',
  'nvenc',
  'qsv',
  'amf',
  'software',
];

export const CAPABILITIES: Record<EncodingCapability, CapabilityInfo> = {
  videotoolbox: {
    codec: 'h264_videotoolbox',
    label: 'VideoToolbox (Apple)',
    hardware: true,
    platforms: ['darwin'],
  },
  nvenc: {
    codec: 'h264_nvenc',
    label: 'NVENC (NVIDIA)',
    hardware: true,
  },
  qsv: {
    codec: 'h264_qsv',
    label: 'Quick Sync (Intel)',
    hardware: true,
  },
  amf: {
    codec: 'h264_amf',
    label: 'AMF (AMD)',
    hardware: true,
  },
  software: {
    codec: 'libx264',
    label: 'Software (libx264)',
    hardware: false,
  },
};

/**
 * Whether a capability may be attempted on the given host platform
 */
export function isSupportedOnPlatform(
  capability: EncodingCapability,
  platform: NodeJS.Platform
): boolean {
  const { platforms } = CAPABILITIES[capability];
  return platforms === undefined || platforms.includes(platform);
}

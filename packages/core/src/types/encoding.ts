/**
 * Encoding Types
 */

/**
 * Abstract fidelity tier, independent of the backend
 */
export type QualityPreset = 'lossless' | 'high' | 'medium';

/**
 * Backend the engine can use to produce H.264.
 * Listed in detection preference order.
 */
export type EncodingCapability = 'videotoolbox' | 'nvenc' | 'qsv' | 'amf' | 'software';

export interface CapabilityInfo {
  /** Engine encoder identifier, e.g. `h264_nvenc` */
  codec: string;
  label: string;
  hardware: boolean;
  /** Host platforms the capability may be attempted on (any when omitted) */
  platforms?: readonly NodeJS.Platform[];
}

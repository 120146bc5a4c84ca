/**
 * @dualcut/media
 *
 * Media analysis layer.
 *
 * Responsibilities:
 * - Describe the video stream of an input with ffprobe
 * - Read container duration for progress calculation
 */

// Probing
export { FFProbe, type VideoProbe } from './probes/ffprobe.js';

// Types
export {
  probeStreamSchema,
  probeOutputSchema,
  type ProbeStream,
  type ProbeOutput,
} from './types.js';

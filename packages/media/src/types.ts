/**
 * Media Types
 *
 * Shapes of ffprobe output consumed by the probes.
 */

import { z } from 'zod';

/**
 * One entry of `-show_entries stream=width,height,codec_name,codec_type -of json`.
 * Every field is optional; ffprobe omits what a stream doesn't carry.
 */
export const probeStreamSchema = z.object({
  width: z.number().int().nonnegative().optional(),
  height: z.number().int().nonnegative().optional(),
  codec_name: z.string().optional(),
  codec_type: z.string().optional(),
});

export const probeOutputSchema = z.object({
  streams: z.array(probeStreamSchema),
});

export type ProbeStream = z.infer<typeof probeStreamSchema>;
export type ProbeOutput = z.infer<typeof probeOutputSchema>;

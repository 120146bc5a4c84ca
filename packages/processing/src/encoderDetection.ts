/**
 * Encoder Detection
 *
 * Picks the best H.264 backend from a single `ffmpeg -encoders` listing.
 * Any probe failure means "no hardware", never an error.
 */

import { createLogger, processRunner, type CommandRunner } from '@dualcut/utils';
import {
  CAPABILITIES,
  CAPABILITY_PREFERENCE,
  isSupportedOnPlatform,
  type EncodingCapability,
} from '@dualcut/core';

const log = createLogger({ component: 'encoder-detection' });

export interface EncoderDetectorOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
}

export interface CapabilityAvailability {
  capability: EncodingCapability;
  codec: string;
  label: string;
  hardware: boolean;
  supportedOnPlatform: boolean;
  available: boolean;
}

export class EncoderDetector {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;

  constructor(options: EncoderDetectorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? processRunner;
    this.platform = options.platform ?? process.platform;
  }

  /**
   * First capability in preference order whose encoder is listed,
   * falling back to software
   */
  async detect(): Promise<EncodingCapability> {
    const listing = await this.listEncoders();
    if (listing === null) return 'software';

    for (const capability of CAPABILITY_PREFERENCE) {
      if (!isSupportedOnPlatform(capability, this.platform)) continue;
      if (listing.includes(CAPABILITIES[capability].codec)) {
        log.debug({ capability }, 'Detected encoder');
        return capability;
      }
    }

    return 'software';
  }

  /**
   * Availability of every capability, in preference order
   */
  async listAvailableCapabilities(): Promise<CapabilityAvailability[]> {
    const listing = await this.listEncoders();

    return CAPABILITY_PREFERENCE.map((capability) => {
      const { codec, label, hardware } = CAPABILITIES[capability];
      const supportedOnPlatform = isSupportedOnPlatform(capability, this.platform);
      const listed = listing !== null && listing.includes(codec);

      return {
        capability,
        codec,
        label,
        hardware,
        supportedOnPlatform,
        available: !hardware || (supportedOnPlatform && listed),
      };
    });
  }

  private async listEncoders(): Promise<string | null> {
    try {
      const result = await this.runner.run(this.ffmpegPath, ['-hide_banner', '-encoders'], {
        timeout: 10000,
      });
      if (result.exitCode !== 0) {
        log.debug({ exitCode: result.exitCode }, 'Encoder listing failed, using software');
        return null;
      }
      return result.stdout;
    } catch (error) {
      log.debug({ error: error instanceof Error ? error.message : String(error) }, 'Encoder listing could not start, using software');
      return null;
    }
  }
}

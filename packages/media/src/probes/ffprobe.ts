/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Describes the video stream of an input and reads its duration.
 */

import {
  createLogger,
  processRunner,
  tryGetFileSizeBytes,
  type CommandResult,
  type CommandRunner,
} from '@dualcut/utils';
import { ProbeError, type VideoDescriptor } from '@dualcut/core';
import { probeOutputSchema, type ProbeStream } from '../types.js';

const log = createLogger({ module: 'ffprobe' });

/**
 * Anything that can describe an input and report its duration
 */
export interface VideoProbe {
  describe(filePath: string): Promise<VideoDescriptor>;
  duration(filePath: string): Promise<number>;
}

type VideoStream = ProbeStream & { width: number; height: number };

function isUsableVideoStream(stream: ProbeStream): stream is VideoStream {
  return stream.codec_type === 'video' && stream.width !== undefined && stream.height !== undefined;
}

export class FFProbe implements VideoProbe {
  private ffprobePath: string;
  private runner: CommandRunner;

  constructor(ffprobePath: string = 'ffprobe', runner: CommandRunner = processRunner) {
    this.ffprobePath = ffprobePath;
    this.runner = runner;
  }

  /**
   * Describe the first video stream that carries dimensions
   */
  async describe(filePath: string): Promise<VideoDescriptor> {
    const args = [
      '-v', 'error',
      '-show_entries', 'stream=width,height,codec_name,codec_type',
      '-of', 'json',
      filePath,
    ];

    const result = await this.invoke(filePath, args);

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch {
      throw new ProbeError(filePath, `Failed to parse ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = probeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(filePath, `Unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }

    const stream = parsed.data.streams.find(isUsableVideoStream);
    if (!stream) {
      throw new ProbeError(filePath, 'No video stream found in file');
    }

    return {
      path: filePath,
      width: stream.width,
      height: stream.height,
      codec: stream.codec_name ?? 'unknown',
      fileSize: await tryGetFileSizeBytes(filePath),
    };
  }

  /**
   * Container duration in seconds
   */
  async duration(filePath: string): Promise<number> {
    const args = [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ];

    const result = await this.invoke(filePath, args);
    const text = result.stdout.trim();
    const seconds = Number(text);

    if (text === '' || !Number.isFinite(seconds) || seconds < 0) {
      throw new ProbeError(filePath, `Failed to parse duration: ${text.substring(0, 50) || '(empty)'}`);
    }

    return seconds;
  }

  private async invoke(filePath: string, args: string[]): Promise<CommandResult> {
    log.debug({ command: `${this.ffprobePath} ${args.join(' ')}` }, 'ffprobe command');

    let result: CommandResult;
    try {
      result = await this.runner.run(this.ffprobePath, args, {
        timeout: 60000, // 1 minute timeout
      });
    } catch (error) {
      throw new ProbeError(filePath, error instanceof Error ? error.message : String(error));
    }

    if (result.exitCode !== 0) {
      throw new ProbeError(filePath, result.stderr.trim() || `ffprobe exited with code ${result.exitCode}`);
    }

    return result;
  }
}

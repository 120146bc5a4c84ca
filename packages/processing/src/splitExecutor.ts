/**
 * Split Executor
 *
 * Runs FFmpeg for one side of one input, streaming its stderr through a
 * fresh progress parser. The video is written by FFmpeg straight to the
 * output path.
 */

import { createLogger, processRunner, splitLines, type CommandRunner } from '@dualcut/utils';
import {
  cropFilter,
  SplitFailedError,
  type EncodingCapability,
  type EncodingProgress,
  type QualityPreset,
  type SplitSide,
} from '@dualcut/core';
import { planEncodingArgs } from './presets.js';
import { FFmpegProgressParser } from './progressParser.js';

const log = createLogger({ component: 'split-executor' });

export interface SplitJob {
  input: string;
  output: string;
  side: SplitSide;
  quality: QualityPreset;
  capability: EncodingCapability;
  /** Seeds the progress parser when the duration was probed beforehand */
  durationSecs?: number;
  timeoutMs?: number;
}

export type SplitOutcome =
  | { success: true; durationMs: number }
  | { success: false; error: string; exitCode: number | null; stderr: string };

export interface SplitExecutorOptions {
  ffmpegPath?: string;
  runner?: CommandRunner;
}

const ERROR_PATTERNS = [
  /\bError[:\s]([^\r\n]+)/i,
  /\bInvalid[:\s]([^\r\n]+)/i,
  /No such file or directory/,
  /Permission denied/,
  /Cannot open/,
  /Conversion failed/,
];

/**
 * Build the full FFmpeg argument list for one side
 */
export function buildSplitArgs(job: SplitJob): string[] {
  return [
    '-i', job.input,
    '-vf', cropFilter(job.side),
    ...planEncodingArgs(job.quality, job.capability),
    '-y',
    job.output,
  ];
}

/**
 * Pull a readable message out of FFmpeg's diagnostic text
 */
export function extractError(stderr: string): string {
  for (const pattern of ERROR_PATTERNS) {
    const match = stderr.match(pattern);
    if (match) {
      return (match[1] ?? match[0]).trim();
    }
  }

  // Last few lines if no specific error found
  return splitLines(stderr).slice(-3).join('\n');
}

export class SplitExecutor {
  private readonly ffmpegPath: string;
  private readonly runner: CommandRunner;

  constructor(options: SplitExecutorOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.runner = options.runner ?? processRunner;
  }

  /**
   * Run one side. Resolves with the outcome; never rejects for engine failures.
   */
  async run(
    job: SplitJob,
    onProgress: (progress: EncodingProgress) => void
  ): Promise<SplitOutcome> {
    const args = buildSplitArgs(job);
    const parser = new FFmpegProgressParser(job.durationSecs);

    log.debug({ side: job.side, command: `${this.ffmpegPath} ${args.join(' ')}` }, 'FFmpeg command');

    try {
      const result = await this.runner.stream(this.ffmpegPath, args, {
        timeout: job.timeoutMs,
        onLine: (line) => {
          const progress = parser.feed(line);
          if (progress) onProgress(progress);
        },
      });

      if (result.timedOut) {
        return {
          success: false,
          error: `FFmpeg timed out after ${job.timeoutMs ?? 0}ms`,
          exitCode: result.exitCode,
          stderr: result.stderr,
        };
      }

      if (result.exitCode !== 0) {
        const error = extractError(result.stderr) || `FFmpeg exited with code ${result.exitCode}`;
        log.debug({ side: job.side, exitCode: result.exitCode, error }, 'Split failed');
        return { success: false, error, exitCode: result.exitCode, stderr: result.stderr };
      }

      return { success: true, durationMs: result.duration };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.debug({ side: job.side, error: message }, 'FFmpeg could not be started');
      return { success: false, error: message, exitCode: null, stderr: '' };
    }
  }
}

/**
 * Throw SplitFailedError for a failed outcome
 */
export function assertSplitSucceeded(
  side: SplitSide,
  outcome: SplitOutcome
): asserts outcome is Extract<SplitOutcome, { success: true }> {
  if (!outcome.success) {
    throw new SplitFailedError(side, outcome.error, outcome.exitCode, outcome.stderr);
  }
}

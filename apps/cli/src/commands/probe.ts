/**
 * Probe Command
 *
 * Show what a video looks like to the splitter.
 */

import ora from 'ora';
import chalk from 'chalk';
import { createLogger, formatClock, formatFileSize, pathExists } from '@dualcut/utils';
import {
  EXPECTED_HEIGHT,
  EXPECTED_WIDTH,
  aspectRatio,
  getBinaryPath,
  hasExpectedDimensions,
} from '@dualcut/core';
import { FFProbe } from '@dualcut/media';
import {
  describeError,
  printError,
  printHeader,
  printJson,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

const log = createLogger({ command: 'probe' });

interface ProbeOptions {
  json?: boolean;
}

export async function probeCommand(path: string, options: ProbeOptions): Promise<void> {
  if (!(await pathExists(path))) {
    printError(`Video file not found: ${path}`);
    process.exit(1);
  }

  const spinner = ora('Analyzing video...').start();

  try {
    const probe = new FFProbe(getBinaryPath('ffprobe'));
    const video = await probe.describe(path);

    let durationSecs: number | undefined;
    try {
      durationSecs = await probe.duration(path);
    } catch (error) {
      log.debug({ path, error: describeError(error) }, 'Duration unavailable');
    }

    spinner.stop();

    const expected = hasExpectedDimensions(video);

    if (options.json) {
      printJson({ ...video, durationSecs, aspectRatio: aspectRatio(video), expectedDimensions: expected });
      return;
    }

    printHeader('Video Information');
    printKeyValue('File', path);
    printKeyValue('Dimensions', `${video.width}x${video.height}`);
    printKeyValue('Codec', video.codec);
    printKeyValue('Duration', durationSecs !== undefined ? formatClock(durationSecs) : chalk.gray('unknown'));
    printKeyValue('Size', video.fileSize !== undefined ? formatFileSize(video.fileSize) : chalk.gray('unknown'));
    printKeyValue('Aspect ratio', aspectRatio(video));
    console.log();

    if (expected) {
      printSuccess(`Side-by-side ${EXPECTED_WIDTH}x${EXPECTED_HEIGHT} recording`);
    } else {
      printWarning(
        `Expected ${EXPECTED_WIDTH}x${EXPECTED_HEIGHT}, got ${video.width}x${video.height}; ` +
        'the fixed crop regions may not match this file'
      );
    }
  } catch (error) {
    spinner.fail('Analysis failed');
    printError(describeError(error));
    process.exit(1);
  }
}

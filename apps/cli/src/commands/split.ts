/**
 * Split Command
 *
 * Split one or more side-by-side recordings into left and right files.
 */

import ora from 'ora';
import chalk from 'chalk';
import { basename } from 'node:path';
import { formatDuration, formatFileSize } from '@dualcut/utils';
import {
  CAPABILITIES,
  checkBinary,
  hasExpectedDimensions,
  parseQualityPreset,
  type BatchOutcome,
  type BatchProgressEvent,
} from '@dualcut/core';
import { BatchOrchestrator, formatProgress, isTrueLossless } from '@dualcut/processing';
import { loadCliConfig } from '../config/index.js';
import {
  describeError,
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';
import { describeFailure, describeResult, exitCodeFor, summarizeBatch } from '../lib/summary.js';

export interface SplitOptions {
  format?: string;
  quality?: string;
  output?: string;
  /** false when --no-hw-accel is given */
  hwAccel?: boolean;
  continueOnError?: boolean;
}

const spinner = ora();

interface Spinner {
  start(text?: string): unknown;
  stop(): unknown;
}

/**
 * Start the batch behind a spinner that is stopped however start ends
 */
export async function startBatch(
  orchestrator: Pick<BatchOrchestrator, 'start'>,
  detecting: Spinner
): Promise<void> {
  detecting.start('Detecting encoder...');
  try {
    await orchestrator.start();
  } finally {
    detecting.stop();
  }
}

export async function splitCommand(videos: string[], options: SplitOptions): Promise<void> {
  let orchestrator: BatchOrchestrator;

  try {
    const config = loadCliConfig();

    await checkBinary('ffmpeg');
    await checkBinary('ffprobe');

    const quality = options.quality !== undefined ? parseQualityPreset(options.quality) : config.quality;

    orchestrator = new BatchOrchestrator({
      inputs: videos,
      quality,
      hardwareAccel: options.hwAccel === false ? false : config.hardwareAccel,
      outputDir: options.output ?? config.outputDir,
      outputFormat: options.format ?? config.outputFormat,
      continueOnError: options.continueOnError === true || config.continueOnError,
      onEvent: (event) => renderEvent(event),
    });

    await startBatch(orchestrator, ora());

    printInfo(`Encoder: ${CAPABILITIES[orchestrator.capability].label}, quality: ${quality}`);
    if (quality === 'lossless' && !isTrueLossless(quality, orchestrator.capability)) {
      printWarning(
        'Hardware encoders have no true lossless mode; using their highest quality setting. ' +
        'Pass --no-hw-accel for lossless libx264 output.'
      );
    }
  } catch (error) {
    printError(describeError(error));
    process.exit(1);
  }

  let interrupted = false;
  const onSigint = () => {
    if (interrupted) {
      spinner.stop();
      process.exit(130);
    }
    interrupted = true;
    orchestrator.cancel();
    spinner.warn('Cancelling after the current step (Ctrl+C again to exit now)');
  };
  process.on('SIGINT', onSigint);

  try {
    const outcome = await orchestrator.run();
    spinner.stop();
    printSummary(outcome);
    process.exitCode = exitCodeFor(outcome);
  } catch (error) {
    spinner.fail('Batch failed');
    printError(describeError(error));
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

function prefix(event: BatchProgressEvent): string {
  return chalk.gray(`[${event.index + 1}/${event.total}]`);
}

function renderEvent(event: BatchProgressEvent): void {
  switch (event.type) {
    case 'analyzing':
      spinner.start(`${prefix(event)} Analyzing ${basename(event.path)}...`);
      break;
    case 'analyzed':
      if (!hasExpectedDimensions(event.video)) {
        spinner.warn(
          `${prefix(event)} ${basename(event.video.path)} is ${event.video.width}x${event.video.height}, expected 3840x1080`
        );
      }
      break;
    case 'processing':
      spinner.start(`${prefix(event)} ${basename(event.path)} ${event.side} side...`);
      break;
    case 'progress':
      spinner.text = `${prefix(event)} ${event.side}: ${formatProgress(event.progress)}`;
      break;
    case 'completed':
      spinner.succeed(
        `${prefix(event)} ${basename(event.result.input)} ` +
        chalk.gray(
          `(${formatFileSize(event.result.leftSize)} + ${formatFileSize(event.result.rightSize)}, ` +
          `${formatDuration(event.result.durationMs)})`
        )
      );
      break;
    case 'failed':
      spinner.fail(`${prefix(event)} ${basename(event.path)}: ${event.error}`);
      break;
  }
}

function printSummary(outcome: BatchOutcome): void {
  const summary = summarizeBatch(outcome);

  printHeader('Summary');
  printKeyValue('Total', summary.total);
  printKeyValue(chalk.green('✓ Succeeded'), summary.succeeded);
  printKeyValue(chalk.red('✗ Failed'), summary.failed);
  if (summary.skipped > 0) {
    printKeyValue('Not processed', summary.skipped);
  }

  for (const result of outcome.results) {
    console.log();
    for (const line of describeResult(result)) {
      console.log(line);
    }
  }

  if (outcome.failures.length > 0) {
    console.log();
    for (const failure of outcome.failures) {
      printError(describeFailure(failure));
    }
  }

  console.log();
  if (summary.cancelled) {
    printWarning('Batch cancelled');
  } else if (outcome.stoppedEarly) {
    printWarning('Stopped after the first failure (use --continue-on-error to keep going)');
  } else if (summary.failed === 0) {
    printSuccess(`All ${summary.total} file(s) split`);
  }
}

/**
 * Encoders Command
 *
 * Show which H.264 backends FFmpeg offers here and which one a split would use.
 */

import ora from 'ora';
import chalk from 'chalk';
import { CAPABILITIES, getBinaryPath } from '@dualcut/core';
import { EncoderDetector, type CapabilityAvailability } from '@dualcut/processing';
import { describeError, printError, printHeader, printSuccess, printTable } from '../lib/output.js';

function availabilityLabel(entry: CapabilityAvailability): string {
  if (entry.available) return 'yes';
  return entry.supportedOnPlatform ? 'no' : 'not on this platform';
}

export async function encodersCommand(): Promise<void> {
  const spinner = ora('Detecting encoders...').start();

  try {
    const detector = new EncoderDetector({ ffmpegPath: getBinaryPath('ffmpeg') });
    const selected = await detector.detect();
    const list = await detector.listAvailableCapabilities();
    spinner.stop();

    printHeader('Encoders');
    printTable(
      list.map((entry) => ({
        Backend: entry.label,
        Encoder: entry.codec,
        Hardware: entry.hardware ? 'yes' : 'no',
        Available: availabilityLabel(entry),
      }))
    );
    console.log();
    printSuccess(`Selected: ${chalk.cyan(CAPABILITIES[selected].label)}`);
  } catch (error) {
    spinner.fail('Encoder detection failed');
    printError(describeError(error));
    process.exit(1);
  }
}

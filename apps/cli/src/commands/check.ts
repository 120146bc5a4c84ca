/**
 * Check Command
 *
 * Verify that ffmpeg and ffprobe can be run.
 */

import chalk from 'chalk';
import {
  binaries,
  getBinaryFolders,
  getBinaryVersion,
  type BinaryName,
} from '@dualcut/core';
import { printError, printHeader, printInfo, printKeyValue, printSuccess } from '../lib/output.js';

const BINARY_NAMES: readonly BinaryName[] = ['ffmpeg', 'ffprobe'];

function installHint(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin':
      return 'brew install ffmpeg';
    case 'win32':
      return 'winget install ffmpeg';
    default:
      return 'sudo apt install ffmpeg  (or your distribution\'s package manager)';
  }
}

export async function checkCommand(): Promise<void> {
  printHeader('Dependency Check');

  let missing = false;

  for (const name of BINARY_NAMES) {
    const config = binaries()[name];
    const version = await getBinaryVersion(name);

    if (version) {
      printSuccess(`${name}: ${version}`);
    } else {
      printError(`${name}: not found`);
      missing = true;
    }
    printKeyValue('Path', `${config.resolvedPath} ${chalk.gray(`(${config.source})`)}`);
  }

  console.log();

  if (missing) {
    printInfo(`Install FFmpeg: ${chalk.cyan(installHint(process.platform))}`);
    printInfo(`Or set ${chalk.cyan('FFMPEG_PATH')} and ${chalk.cyan('FFPROBE_PATH')}`);
    printInfo(`Or place the binaries in ${chalk.cyan(getBinaryFolders().os)}`);
    process.exitCode = 1;
    return;
  }

  printSuccess('Ready to split');
}

#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line interface for dualcut: split side-by-side dual-camera
 * recordings into separate left and right videos.
 */

import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { splitCommand } from './commands/split.js';
import { probeCommand } from './commands/probe.js';
import { encodersCommand } from './commands/encoders.js';
import { checkCommand } from './commands/check.js';
import { configCommand } from './commands/config.js';

const program = new Command();

program
  .name('dualcut')
  .description('Split side-by-side dual-camera recordings into left and right videos')
  .version('1.0.0');

// ============================================
// SPLITTING
// ============================================

program
  .command('split <videos...>')
  .description('Split one or more 3840x1080 recordings into two 1920x1080 videos')
  .option('-f, --format <ext>', 'Output format (defaults to the input extension)')
  .option('-q, --quality <preset>', 'Quality preset: lossless, high, medium')
  .option('-o, --output <dir>', 'Output directory (defaults to the input directory)')
  .option('--no-hw-accel', 'Disable hardware acceleration')
  .option('--continue-on-error', 'Keep processing remaining files after a failure')
  .action(splitCommand);

// ============================================
// DIAGNOSTICS
// ============================================

program
  .command('probe <path>')
  .description('Show dimensions, codec and duration of a video')
  .option('--json', 'Output in JSON format')
  .action(probeCommand);

program
  .command('encoders')
  .description('List available H.264 encoders and the one that would be used')
  .action(encodersCommand);

program
  .command('check')
  .description('Check that ffmpeg and ffprobe are installed')
  .action(checkCommand);

program
  .command('config')
  .description('View or modify configuration')
  .option('--set <key=value>', 'Set a config value')
  .option('--get <key>', 'Get a config value')
  .option('--list', 'List all config values')
  .option('--reset', 'Reset to defaults')
  .action(configCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('dualcut --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
await program.parseAsync();

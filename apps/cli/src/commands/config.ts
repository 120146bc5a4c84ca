/**
 * Config Command
 *
 * View and manage ~/.dualcut/config.json.
 */

import chalk from 'chalk';
import {
  CONFIG_FILE,
  configKeys,
  isConfigKey,
  loadCliConfig,
  parseConfigUpdate,
  resetConfig,
  saveConfig,
  type CliConfig,
  type ConfigKey,
} from '../config/index.js';
import { describeError, printError, printHeader, printKeyValue, printSuccess, printInfo } from '../lib/output.js';

type ConfigAction = 'get' | 'set' | 'list' | 'reset';

interface ConfigOptions {
  list?: boolean;
  get?: string;
  set?: string;
  reset?: boolean;
}

const configDescriptions: Record<ConfigKey, string> = {
  quality: 'Quality preset: lossless, high or medium',
  outputFormat: 'Output file extension (defaults to the input\'s)',
  outputDir: 'Directory for split files (defaults to the input\'s)',
  hardwareAccel: 'Use a hardware encoder when one is available',
  continueOnError: 'Keep going after a file fails',
};

export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    switch (determineAction(options)) {
      case 'list':
        listConfig();
        break;
      case 'get':
        getConfig(options.get ?? '');
        break;
      case 'set':
        setConfig(options.set ?? '');
        break;
      case 'reset':
        resetConfig();
        printSuccess('Configuration reset to defaults');
        break;
    }
  } catch (error) {
    printError(describeError(error));
    process.exit(1);
  }
}

function determineAction(options: ConfigOptions): ConfigAction {
  if (options.reset) return 'reset';
  if (options.set !== undefined) return 'set';
  if (options.get !== undefined) return 'get';
  return 'list';
}

function formatValue(value: CliConfig[ConfigKey]): string {
  return value === undefined ? chalk.gray('not set') : String(value);
}

function listConfig(): void {
  const config = loadCliConfig();
  printHeader('Configuration');

  for (const key of configKeys) {
    console.log(`${chalk.cyan(key)}: ${formatValue(config[key])}`);
    console.log(`  ${chalk.gray(configDescriptions[key])}`);
    console.log();
  }

  console.log(chalk.gray(`File: ${CONFIG_FILE}`));
  console.log(chalk.gray('Use "dualcut config --set <key=value>" to set a value'));
}

function requireKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    printError(`Unknown config key: ${key}`);
    console.log(chalk.gray(`Valid keys: ${configKeys.join(', ')}`));
    process.exit(1);
  }
  return key;
}

function getConfig(rawKey: string): void {
  const key = requireKey(rawKey);
  printKeyValue(key, formatValue(loadCliConfig()[key]));
}

function setConfig(assignment: string): void {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    printError('Usage: dualcut config --set <key=value>');
    process.exit(1);
  }

  const key = requireKey(assignment.slice(0, separator).trim());
  const value = assignment.slice(separator + 1);

  saveConfig(parseConfigUpdate(key, value));

  printSuccess(`Set ${key} = ${value.trim()}`);
  printInfo('Environment variables still take precedence over the file');
}

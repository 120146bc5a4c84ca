/**
 * CLI Configuration
 *
 * Precedence: command-line flags, then environment (and .env), then
 * ~/.dualcut/config.json, then defaults. Flags are applied by the commands.
 */

import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { DEFAULT_QUALITY, ValidationError, parseQualityPreset, type QualityPreset } from '@dualcut/core';
import { normalizeOutputFormat } from '@dualcut/processing';

dotenvConfig();

// Config file location
export const CONFIG_DIR = join(homedir(), '.dualcut');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

const qualitySchema = z.string().trim().toLowerCase().pipe(z.enum(['lossless', 'high', 'medium']));

const booleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES].join(', ')}`,
  })
  .transform((value) => TRUE_VALUES.includes(value));

// Environment schema
export const envSchema = z.object({
  DUALCUT_QUALITY: qualitySchema.optional(),
  DUALCUT_OUTPUT_DIR: z.string().min(1).optional(),
  DUALCUT_HW_ACCEL: booleanFlagSchema.optional(),
});

// Config file schema
export const configFileSchema = z.object({
  quality: qualitySchema.default(DEFAULT_QUALITY),
  outputFormat: z.string().regex(/^\.?[A-Za-z0-9]+$/, 'Must be a file extension such as mp4').optional(),
  outputDir: z.string().min(1).optional(),
  hardwareAccel: z.boolean().default(true),
  continueOnError: z.boolean().default(false),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export const configKeys = ['quality', 'outputFormat', 'outputDir', 'hardwareAccel', 'continueOnError'] as const;
export type ConfigKey = typeof configKeys[number];

export interface CliConfig {
  quality: QualityPreset;
  outputFormat?: string;
  outputDir?: string;
  hardwareAccel: boolean;
  continueOnError: boolean;
  configFile: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
}

/**
 * Raw contents of the config file; empty when it doesn't exist
 */
export function loadConfigFile(file: string = CONFIG_FILE): Record<string, unknown> {
  if (!existsSync(file)) {
    return {};
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ValidationError('configFile', `${file} is not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const parsed = z.record(z.unknown()).safeParse(content);
  if (!parsed.success) {
    throw new ValidationError('configFile', `${file} must contain a JSON object`);
  }
  return parsed.data;
}

/**
 * Merge file and environment settings over the defaults
 */
export function resolveConfig(
  fileContent: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
  file: string = CONFIG_FILE
): CliConfig {
  const parsedFile = configFileSchema.safeParse(fileContent);
  if (!parsedFile.success) {
    throw new ValidationError('configFile', describeIssues(parsedFile.error));
  }

  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ValidationError('environment', describeIssues(parsedEnv.error));
  }

  const fileConfig = parsedFile.data;
  const envConfig = parsedEnv.data;

  return {
    quality: envConfig.DUALCUT_QUALITY ?? fileConfig.quality,
    outputFormat: fileConfig.outputFormat,
    outputDir: envConfig.DUALCUT_OUTPUT_DIR ?? fileConfig.outputDir,
    hardwareAccel: envConfig.DUALCUT_HW_ACCEL ?? fileConfig.hardwareAccel,
    continueOnError: fileConfig.continueOnError,
    configFile: file,
  };
}

export function loadCliConfig(file: string = CONFIG_FILE, env: NodeJS.ProcessEnv = process.env): CliConfig {
  return resolveConfig(loadConfigFile(file), env, file);
}

export function parseBooleanValue(field: string, raw: string): boolean {
  const parsed = booleanFlagSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(field, `Expected true or false, got "${raw}"`);
  }
  return parsed.data;
}

/**
 * Validate a `key=value` pair from the command line
 */
export function parseConfigUpdate(key: ConfigKey, raw: string): Partial<ConfigFile> {
  switch (key) {
    case 'quality':
      return { quality: parseQualityPreset(raw) };
    case 'outputFormat':
      return { outputFormat: normalizeOutputFormat(raw) };
    case 'outputDir':
      if (raw.trim() === '') {
        throw new ValidationError(key, 'Must not be empty');
      }
      return { outputDir: raw.trim() };
    case 'hardwareAccel':
      return { hardwareAccel: parseBooleanValue(key, raw) };
    case 'continueOnError':
      return { continueOnError: parseBooleanValue(key, raw) };
  }
}

export function isConfigKey(key: string): key is ConfigKey {
  return configKeys.some((configKey) => configKey === key);
}

// Save config to file
export function saveConfig(updates: Partial<ConfigFile>, file: string = CONFIG_FILE): void {
  mkdirSync(dirname(file), { recursive: true });
  const merged = { ...loadConfigFile(file), ...updates };
  writeFileSync(file, JSON.stringify(merged, null, 2));
}

export function resetConfig(file: string = CONFIG_FILE): void {
  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, '{}');
}

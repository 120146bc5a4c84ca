/**
 * Binary Configuration
 *
 * Centralized configuration for the external engine binaries.
 * Supports Windows, macOS and Linux binaries with automatic OS detection.
 *
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Bundled binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { type CommandRunner, processRunner } from '@dualcut/utils';
import { EngineNotFoundError } from '../errors/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export type BinarySource = 'env' | 'bundled' | 'system';

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: BinarySource;
}

/**
 * All supported binaries
 */
export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

export type BinaryName = keyof BinariesConfig;

/**
 * Resolve binary path with priority:
 * 1. Environment variable
 * 2. Bundled binary folder
 * 3. System PATH
 */
function resolveBinaryPath(name: string, envVar: string): BinaryConfig {
  const envPath = process.env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const bundledPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // Let the system PATH resolve it; availability is checked at runtime
  return { name, envVar, resolvedPath: name, source: 'system' };
}

function resolveBinaries(): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH'),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH'),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = resolveBinaries();
  }
  return _binaries;
}

/**
 * Get a specific binary path
 */
export function getBinaryPath(name: BinaryName): string {
  return binaries()[name].resolvedPath;
}

/**
 * Run `<binary> -version`; resolves to the first output line, or null if
 * the binary can't be started or exits non-zero
 */
export async function getBinaryVersion(
  name: BinaryName,
  runner: CommandRunner = processRunner
): Promise<string | null> {
  try {
    const result = await runner.run(getBinaryPath(name), ['-version'], { timeout: 5000 });
    if (result.exitCode !== 0) return null;
    return result.stdout.split('\n')[0]?.trim() || null;
  } catch {
    return null;
  }
}

/**
 * Check if a binary is available
 */
export async function isBinaryAvailable(
  name: BinaryName,
  runner: CommandRunner = processRunner
): Promise<boolean> {
  return (await getBinaryVersion(name, runner)) !== null;
}

/**
 * Throw EngineNotFoundError unless the binary runs
 */
export async function checkBinary(
  name: BinaryName,
  runner: CommandRunner = processRunner
): Promise<void> {
  if (!(await isBinaryAvailable(name, runner))) {
    throw new EngineNotFoundError(name, getBinaryPath(name));
  }
}

/**
 * Get binary folder paths for user reference
 */
export function getBinaryFolders(): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder()),
  };
}

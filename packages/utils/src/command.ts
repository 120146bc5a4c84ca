/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Timeout handling
 * - Output capture
 * - Line streaming of diagnostic output
 * - Signal forwarding
 */

import { spawn, SpawnOptions } from 'node:child_process';
import { LineSplitter } from './lines.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

export interface StreamCommandOptions extends Omit<CommandOptions, 'timeout'> {
  /** Called once per logical stderr line, in arrival order */
  onLine: (line: string) => void;
  timeout?: number; // milliseconds, no limit when omitted
}

/**
 * Abstraction over subprocess execution so callers never spawn directly.
 * `run` collects full output (probes), `stream` pushes stderr lines while
 * the process runs (encodes).
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
  stream(command: string, args: string[], options: StreamCommandOptions): Promise<CommandResult>;
}

/**
 * Execute an external command safely
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @returns Promise resolving to CommandResult, rejecting if the process cannot be spawned
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      setTimeout(() => child.kill('SIGKILL'), 10000).unref();
    }, timeout);

    const onAbort = () => child.kill('SIGTERM');
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });
  });
}

/**
 * Execute an external command, streaming its stderr line by line.
 *
 * stdout is discarded. Lines are recovered on either `\r` or `\n` so
 * in-place status updates arrive as separate lines. The promise settles
 * after the child's stdio has closed.
 */
export async function streamCommand(
  command: string,
  args: string[],
  options: StreamCommandOptions
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout,
    maxOutputSize = 1024 * 1024, // keep the last 1MB of diagnostics
    signal,
    onLine,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'ignore', 'pipe'],
      windowsHide: true,
    });

    const splitter = new LineSplitter();
    let stderr = '';
    let settled = false;

    let timeoutId: NodeJS.Timeout | null = null;
    if (timeout !== undefined) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
        setTimeout(() => child.kill('SIGKILL'), 10000).unref();
      }, timeout);
    }

    const onAbort = () => child.kill('SIGTERM');
    signal?.addEventListener('abort', onAbort, { once: true });

    const cleanup = () => {
      if (timeoutId) clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    };

    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr = (stderr + chunk).slice(-maxOutputSize);
      for (const line of splitter.push(chunk)) {
        onLine(line);
      }
    });

    child.on('close', (code, exitSignal) => {
      cleanup();
      if (settled) return;
      settled = true;

      for (const line of splitter.flush()) {
        onLine(line);
      }

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout: '',
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    child.on('error', (error) => {
      cleanup();
      if (settled) return;
      settled = true;
      reject(error);
    });
  });
}

/**
 * Default runner backed by real subprocesses
 */
export const processRunner: CommandRunner = {
  run: executeCommand,
  stream: streamCommand,
};

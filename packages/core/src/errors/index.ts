/**
 * Custom Error Classes
 */

import type { BatchStateKind } from '../stateMachine.js';
import type { SplitSide } from '../types/split.js';

/**
 * Base error class for all dualcut errors
 */
export class DualcutError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DualcutError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends DualcutError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * The video engine (or its probe tool) can't be run
 */
export class EngineNotFoundError extends DualcutError {
  constructor(binary: string, path: string) {
    super(
      `${binary} is not installed or not found (tried ${path})`,
      'ENGINE_NOT_FOUND',
      { binary, path }
    );
    this.name = 'EngineNotFoundError';
  }
}

/**
 * Probing a file failed: spawn error, non-zero exit, bad output or no video stream
 */
export class ProbeError extends DualcutError {
  constructor(filePath: string, reason: string) {
    super(
      `Failed to analyze video: ${reason}`,
      'PROBE_FAILED',
      { filePath, reason }
    );
    this.name = 'ProbeError';
  }
}

export class InvalidQualityError extends DualcutError {
  constructor(value: string) {
    super(
      `Invalid quality preset: ${value}. Valid options: lossless, high, medium`,
      'INVALID_QUALITY',
      { value }
    );
    this.name = 'InvalidQualityError';
  }
}

export class InvalidSideError extends DualcutError {
  constructor(value: string) {
    super(
      `Invalid side: ${value}. Valid options: left, right`,
      'INVALID_SIDE',
      { value }
    );
    this.name = 'InvalidSideError';
  }
}

/**
 * The engine exited non-zero (or never started) while splitting one side
 */
export class SplitFailedError extends DualcutError {
  constructor(
    side: SplitSide,
    message: string,
    exitCode: number | null,
    stderr: string
  ) {
    super(
      `FFmpeg processing failed (${side}): ${message}`,
      'SPLIT_FAILED',
      { side, exitCode, stderr: stderr.substring(Math.max(0, stderr.length - 1000)) }
    );
    this.name = 'SplitFailedError';
  }
}

export class OutputDirectoryError extends DualcutError {
  constructor(dirPath: string, cause: string) {
    super(
      `Failed to create output directory: ${dirPath} (${cause})`,
      'OUTPUT_DIRECTORY_FAILED',
      { dirPath, cause }
    );
    this.name = 'OutputDirectoryError';
  }
}

/**
 * State transition error for invalid batch state changes
 */
export class StateTransitionError extends DualcutError {
  constructor(
    fromState: BatchStateKind,
    toState: BatchStateKind,
    message?: string
  ) {
    super(
      message ?? `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

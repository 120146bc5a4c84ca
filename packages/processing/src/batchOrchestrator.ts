/**
 * Batch Orchestrator
 *
 * Drives analyze -> split left -> split right -> collect for every input,
 * in caller order, one engine process at a time. The state lives in a
 * BatchStateMachine; each `advance()` does the work of the current state
 * and makes exactly one transition.
 *
 * Cancellation is checked when entering analyzing, splitting-left or
 * splitting-right, and again before the work of those states begins.
 * A running engine is never interrupted.
 */

import { dirname, join } from 'node:path';
import {
  createLogger,
  ensureDir,
  getBasename,
  getExtension,
  pathExists,
  tryGetFileSizeBytes,
} from '@dualcut/utils';
import {
  BatchStateMachine,
  DualcutError,
  OutputDirectoryError,
  SplitFailedError,
  ValidationError,
  describeState,
  getBinaryPath,
  hasExpectedDimensions,
  type BatchFailure,
  type BatchOutcome,
  type BatchProgressEvent,
  type BatchState,
  type EncodingCapability,
  type EncodingProgress,
  type QualityPreset,
  type SplitResult,
  type SplitSide,
  type VideoDescriptor,
} from '@dualcut/core';
import { FFProbe, type VideoProbe } from '@dualcut/media';
import { EncoderDetector } from './encoderDetection.js';
import { SplitExecutor, type SplitJob, type SplitOutcome } from './splitExecutor.js';

const log = createLogger({ component: 'batch' });

const OUTPUT_FORMAT_PATTERN = /^[A-Za-z0-9]+$/;
const DEFAULT_OUTPUT_FORMAT = 'mp4';

export interface BatchOptions {
  inputs: string[];
  quality: QualityPreset;
  /** Skips detection when set */
  capability?: EncodingCapability;
  hardwareAccel?: boolean;
  outputDir?: string;
  outputFormat?: string;
  continueOnError?: boolean;
  timeoutMs?: number;
  onEvent?: (event: BatchProgressEvent) => void;
}

export interface SideExecutor {
  run(job: SplitJob, onProgress: (progress: EncodingProgress) => void): Promise<SplitOutcome>;
}

export interface CapabilitySource {
  detect(): Promise<EncodingCapability>;
}

export interface BatchDependencies {
  probe: VideoProbe;
  executor: SideExecutor;
  detector: CapabilitySource;
  fileSize: (path: string) => Promise<number | undefined>;
  ensureDir: (path: string) => Promise<void>;
  pathExists: (path: string) => Promise<boolean>;
  now: () => number;
}

export interface OutputLocation {
  outputDir?: string;
  outputFormat?: string;
}

interface FileContext {
  index: number;
  input: string;
  video: VideoDescriptor;
  durationSecs?: number;
  outputs: Record<SplitSide, string>;
  startedAt: number;
}

/**
 * Normalize an output format (`.MKV` -> `MKV`)
 */
export function normalizeOutputFormat(format: string): string {
  const normalized = format.trim().replace(/^\./, '');
  if (!OUTPUT_FORMAT_PATTERN.test(normalized)) {
    throw new ValidationError('outputFormat', `"${format}" is not a valid file extension`);
  }
  return normalized;
}

/**
 * `<dir>/<stem>-<side>.<ext>`; the directory defaults to the input's own
 * and the extension to the input's, then mp4
 */
export function outputPathFor(input: string, side: SplitSide, location: OutputLocation = {}): string {
  const ext = location.outputFormat !== undefined
    ? normalizeOutputFormat(location.outputFormat)
    : getExtension(input) || DEFAULT_OUTPUT_FORMAT;
  const dir = location.outputDir ?? dirname(input);
  return join(dir, `${getBasename(input)}-${side}.${ext}`);
}

function isCancellable(state: BatchState): boolean {
  return state.kind === 'analyzing' || state.kind === 'splitting-left' || state.kind === 'splitting-right';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class BatchOrchestrator {
  private readonly options: BatchOptions;
  private readonly deps: BatchDependencies;
  private readonly machine = new BatchStateMachine();
  private readonly results: SplitResult[] = [];
  private readonly failures: BatchFailure[] = [];
  private capabilityInUse: EncodingCapability = 'software';
  private current: FileContext | undefined;
  private cancelRequested = false;
  private stoppedEarly = false;

  constructor(options: BatchOptions, deps: Partial<BatchDependencies> = {}) {
    if (options.outputFormat !== undefined) {
      normalizeOutputFormat(options.outputFormat);
    }

    this.options = options;
    this.deps = {
      probe: deps.probe ?? new FFProbe(getBinaryPath('ffprobe')),
      executor: deps.executor ?? new SplitExecutor({ ffmpegPath: getBinaryPath('ffmpeg') }),
      detector: deps.detector ?? new EncoderDetector({ ffmpegPath: getBinaryPath('ffmpeg') }),
      fileSize: deps.fileSize ?? tryGetFileSizeBytes,
      ensureDir: deps.ensureDir ?? ensureDir,
      pathExists: deps.pathExists ?? pathExists,
      now: deps.now ?? Date.now,
    };
  }

  get state(): BatchState {
    return this.machine.getState();
  }

  get capability(): EncodingCapability {
    return this.capabilityInUse;
  }

  get total(): number {
    return this.options.inputs.length;
  }

  get isCancelRequested(): boolean {
    return this.cancelRequested;
  }

  /**
   * Request cancellation; observed at the next stage boundary
   */
  cancel(): void {
    if (this.cancelRequested || this.machine.isTerminal()) return;
    this.cancelRequested = true;
    log.info({ state: describeState(this.state) }, 'Cancellation requested');
  }

  /**
   * Resolve the capability, prepare the output directory and enter the first state
   */
  async start(): Promise<BatchState> {
    if (this.state.kind !== 'awaiting-start') {
      throw new DualcutError('Batch has already started', 'BATCH_ALREADY_STARTED', {
        state: describeState(this.state),
      });
    }

    this.capabilityInUse = await this.resolveCapability();

    const { outputDir } = this.options;
    if (outputDir !== undefined) {
      try {
        await this.deps.ensureDir(outputDir);
      } catch (error) {
        throw new OutputDirectoryError(outputDir, errorMessage(error));
      }
    }

    log.info({ total: this.total, capability: this.capabilityInUse, quality: this.options.quality }, 'Starting batch');

    if (this.total === 0) {
      this.transition({ kind: 'complete' }, 'Empty batch');
    } else {
      this.transition({ kind: 'analyzing', index: 0 });
    }
    return this.state;
  }

  /**
   * Do the work of the current state and make one transition
   */
  async advance(): Promise<BatchState> {
    const state = this.state;

    if (this.cancelRequested && isCancellable(state)) {
      this.cancelNow();
      return this.state;
    }

    switch (state.kind) {
      case 'awaiting-start':
        return this.start();
      case 'analyzing':
        await this.analyze(state.index);
        break;
      case 'splitting-left':
        await this.split(state.index, 'left');
        break;
      case 'splitting-right':
        await this.split(state.index, 'right');
        break;
      case 'collecting':
        await this.collect(state.index);
        break;
      case 'complete':
      case 'cancelled':
        break;
    }

    return this.state;
  }

  /**
   * Run the whole batch to a terminal state
   */
  async run(): Promise<BatchOutcome> {
    while (!this.machine.isTerminal()) {
      await this.advance();
    }
    return this.outcome();
  }

  /**
   * Final report; only available once the batch is complete or cancelled
   */
  outcome(): BatchOutcome {
    if (!this.machine.isTerminal()) {
      throw new DualcutError('Batch has not finished', 'BATCH_NOT_FINISHED', {
        state: describeState(this.state),
      });
    }

    return {
      status: this.machine.isCancelled() ? 'cancelled' : 'complete',
      capability: this.capabilityInUse,
      total: this.total,
      results: [...this.results],
      failures: [...this.failures],
      stoppedEarly: this.stoppedEarly,
    };
  }

  private async resolveCapability(): Promise<EncodingCapability> {
    if (this.options.capability !== undefined) return this.options.capability;
    if (this.options.hardwareAccel === false) return 'software';
    return this.deps.detector.detect();
  }

  private async analyze(index: number): Promise<void> {
    const input = this.inputAt(index);
    this.current = undefined;
    this.emit({ type: 'analyzing', index, total: this.total, path: input });

    if (!(await this.deps.pathExists(input))) {
      this.fail(index, input, `Video file not found: ${input}`);
      return;
    }

    let video: VideoDescriptor;
    try {
      video = await this.deps.probe.describe(input);
    } catch (error) {
      this.fail(index, input, errorMessage(error));
      return;
    }

    let durationSecs: number | undefined;
    try {
      durationSecs = await this.deps.probe.duration(input);
    } catch (error) {
      log.debug({ input, error: errorMessage(error) }, 'Duration probe failed, continuing without it');
    }

    if (!hasExpectedDimensions(video)) {
      log.warn({ input, width: video.width, height: video.height }, 'Unexpected dimensions for a side-by-side recording');
    }

    this.emit({ type: 'analyzed', index, total: this.total, video, durationSecs });

    const location: OutputLocation = {
      outputDir: this.options.outputDir,
      outputFormat: this.options.outputFormat,
    };
    this.current = {
      index,
      input,
      video,
      durationSecs,
      outputs: {
        left: outputPathFor(input, 'left', location),
        right: outputPathFor(input, 'right', location),
      },
      startedAt: this.deps.now(),
    };

    this.transition({ kind: 'splitting-left', index });
  }

  private async split(index: number, side: SplitSide): Promise<void> {
    const context = this.contextFor(index);
    this.emit({ type: 'processing', index, total: this.total, path: context.input, side });

    const outcome = await this.deps.executor.run(
      {
        input: context.input,
        output: context.outputs[side],
        side,
        quality: this.options.quality,
        capability: this.capabilityInUse,
        durationSecs: context.durationSecs,
        timeoutMs: this.options.timeoutMs,
      },
      (progress) => this.emit({ type: 'progress', index, total: this.total, side, progress })
    );

    if (!outcome.success) {
      const error = new SplitFailedError(side, outcome.error, outcome.exitCode, outcome.stderr);
      this.fail(index, context.input, error.message);
      return;
    }

    if (side === 'left') {
      this.transition({ kind: 'splitting-right', index });
    } else {
      this.transition({ kind: 'collecting', index });
    }
  }

  private async collect(index: number): Promise<void> {
    const context = this.contextFor(index);
    const [leftSize, rightSize] = await Promise.all([
      this.outputSize(context.outputs.left),
      this.outputSize(context.outputs.right),
    ]);

    const result: SplitResult = {
      input: context.input,
      leftOutput: context.outputs.left,
      rightOutput: context.outputs.right,
      leftSize,
      rightSize,
      durationMs: this.deps.now() - context.startedAt,
      capability: this.capabilityInUse,
    };

    this.results.push(result);
    this.current = undefined;
    log.info({ input: context.input, durationMs: result.durationMs }, 'Split complete');
    this.emit({ type: 'completed', index, total: this.total, result });

    this.moveToNextFile(index);
  }

  private async outputSize(path: string): Promise<number> {
    try {
      return (await this.deps.fileSize(path)) ?? 0;
    } catch (error) {
      log.warn({ output: path, error: errorMessage(error) }, 'Could not read output size');
      return 0;
    }
  }

  private fail(index: number, path: string, error: string): void {
    this.failures.push({ index, path, error });
    this.current = undefined;
    log.warn({ input: path, error }, 'File failed');
    this.emit({ type: 'failed', index, total: this.total, path, error });

    if (this.options.continueOnError ?? true) {
      this.moveToNextFile(index);
    } else {
      this.stoppedEarly = index + 1 < this.total;
      this.transition({ kind: 'complete' }, 'Stopped after failure');
    }
  }

  private moveToNextFile(index: number): void {
    if (index + 1 < this.total) {
      this.transition({ kind: 'analyzing', index: index + 1 });
    } else {
      this.transition({ kind: 'complete' });
    }
  }

  /**
   * Transition, diverting to cancelled at the stage boundaries
   */
  private transition(target: BatchState, reason?: string): void {
    if (this.cancelRequested && (isCancellable(target) || this.state.kind === 'awaiting-start')) {
      this.cancelNow();
      return;
    }

    this.machine.transitionTo(target, reason);
  }

  private cancelNow(): void {
    this.current = undefined;
    this.machine.cancel('Cancellation requested');
    log.info({ results: this.results.length, failures: this.failures.length }, 'Batch cancelled');
  }

  private inputAt(index: number): string {
    const input = this.options.inputs[index];
    if (input === undefined) {
      throw new DualcutError(`No input at index ${index}`, 'INVALID_BATCH_INDEX', { index });
    }
    return input;
  }

  private contextFor(index: number): FileContext {
    const context = this.current;
    if (context === undefined || context.index !== index) {
      throw new DualcutError(`No analyzed input for index ${index}`, 'INVALID_BATCH_INDEX', { index });
    }
    return context;
  }

  private emit(event: BatchProgressEvent): void {
    this.options.onEvent?.(event);
  }
}

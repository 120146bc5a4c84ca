/**
 * @dualcut/processing
 *
 * Split pipeline:
 * - Encoder detection
 * - Argument planning per quality and backend
 * - FFmpeg progress parsing
 * - Per-side split execution
 * - Batch orchestration
 */

// Encoding Presets
export { planEncodingArgs, isTrueLossless } from './presets.js';

// Progress Parser
export {
  FFmpegProgressParser,
  parseTimestamp,
  parseDurationLine,
  parseProgressLine,
  estimateEta,
  formatEta,
  formatProgress,
  type ProgressLineFields,
} from './progressParser.js';

// Encoder Detection
export {
  EncoderDetector,
  type EncoderDetectorOptions,
  type CapabilityAvailability,
} from './encoderDetection.js';

// Split Executor
export {
  SplitExecutor,
  buildSplitArgs,
  extractError,
  assertSplitSucceeded,
  type SplitJob,
  type SplitOutcome,
  type SplitExecutorOptions,
} from './splitExecutor.js';

// Batch Orchestrator
export {
  BatchOrchestrator,
  normalizeOutputFormat,
  outputPathFor,
  type BatchOptions,
  type BatchDependencies,
  type SideExecutor,
  type CapabilitySource,
  type OutputLocation,
} from './batchOrchestrator.js';
